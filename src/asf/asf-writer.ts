/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	type Block,
	type ByteEdit,
	blockEnd,
	blockPayload,
	editDelta,
	insertion,
	removal,
	spliceBytes,
	u32Edit,
	u64Edit,
} from '../container';
import { NoWritableTagsError, StructuralLimitError, UnsupportedLayoutError } from '../errors';
import {
	hasTextFields,
	type MetadataRequest,
	resolveTextFields,
	TEXT_FIELDS,
	type TextField,
	type TextFields,
} from '../metadata';
import { FileSlice, readU64Le } from '../reader';
import {
	type AsfDescriptor,
	asfString,
	type ContentDescription,
	type ContentDescriptionField,
	createContentDescriptionObject,
	createExtendedContentDescriptionObject,
	createStringDescriptor,
	emptyContentDescription,
	readContentDescription,
	readExtendedContentDescriptors,
} from './asf-objects';
import {
	ASF_CONTENT_DESCRIPTION_OBJECT_GUID,
	ASF_EXTENDED_CONTENT_DESCRIPTION_OBJECT_GUID,
	ASF_FILE_PROPERTIES_OBJECT_GUID,
	ASF_OBJECT_HEADER_SIZE,
	matchesGuid,
} from './asf-misc';
import { ASF_HEADER_COUNT_OFFSET, ASF_HEADER_SIZE_OFFSET, type AsfObjectTag, readAsfHeader } from './asf-reader';

const ASF_NAMESPACES = ['ASF', 'WMA', 'WMV', 'Audio:ASF', 'Audio:WMA', 'Video:ASF'];

/** Offset of the File Size field within the File Properties Object. */
const FILE_SIZE_OFFSET = ASF_OBJECT_HEADER_SIZE + 16;

const CONTENT_DESCRIPTION_MAPPING: Partial<Record<TextField, ContentDescriptionField>> = {
	title: 'title',
	artist: 'author',
	copyright: 'copyright',
	description: 'description',
};

const DESCRIPTOR_NAMES: Partial<Record<TextField, string>> = {
	artist: 'WM/Author',
	album: 'WM/AlbumTitle',
	albumArtist: 'WM/AlbumArtist',
	genre: 'WM/Genre',
	date: 'WM/Year',
	trackNumber: 'WM/TrackNumber',
};

const isObject = (guid: string) => (object: Block<AsfObjectTag>) => matchesGuid(object.bytes, 0, guid);

/**
 * Replaces the first object matching `guid` with `bytes` and removes any further ones. Without a match, the object
 * is appended at the end of the header. Returns the change in object count.
 */
const replaceObject = (
	objects: Block<AsfObjectTag>[],
	guid: string,
	bytes: Uint8Array,
	headerEnd: number,
	edits: ByteEdit[],
) => {
	const matches = objects.filter(isObject(guid));
	if (matches.length === 0) {
		edits.push(insertion(headerEnd, bytes));
		return 1;
	}

	edits.push({ start: matches[0].offset, end: blockEnd(matches[0]), bytes });
	for (const duplicate of matches.slice(1)) {
		edits.push(removal(duplicate.offset, blockEnd(duplicate)));
	}

	return 1 - matches.length;
};

const buildContentDescription = (objects: Block<AsfObjectTag>[], fields: TextFields) => {
	const existing = objects.find(isObject(ASF_CONTENT_DESCRIPTION_OBJECT_GUID));
	let description: ContentDescription = emptyContentDescription();

	if (existing) {
		const parsed = readContentDescription(blockPayload(existing));
		if (!parsed) {
			throw new UnsupportedLayoutError('Content Description Object is malformed.', {
				format: 'asf',
				offset: existing.offset,
			});
		}
		description = parsed;
	}

	for (const field of TEXT_FIELDS) {
		const target = CONTENT_DESCRIPTION_MAPPING[field];
		const value = fields[field];
		if (target !== undefined && value !== undefined) {
			description[target] = asfString(value);
		}
	}

	return createContentDescriptionObject(description);
};

const buildExtendedContentDescription = (objects: Block<AsfObjectTag>[], descriptors: AsfDescriptor[]) => {
	const existing = objects.find(isObject(ASF_EXTENDED_CONTENT_DESCRIPTION_OBJECT_GUID));
	let kept: AsfDescriptor[] = [];

	if (existing) {
		const parsed = readExtendedContentDescriptors(blockPayload(existing));
		if (!parsed) {
			throw new UnsupportedLayoutError('Extended Content Description Object is malformed.', {
				format: 'asf',
				offset: existing.offset,
			});
		}
		kept = parsed.filter(descriptor => !descriptors.some(x => x.name === descriptor.name));
	}

	return createExtendedContentDescriptionObject([...kept, ...descriptors]);
};

/**
 * Rewrites the Content Description and Extended Content Description objects inside the Header Object, then updates
 * the header's size and object count. Everything after the header is copied verbatim.
 */
export const writeAsfMetadata = (data: Uint8Array, request: MetadataRequest) => {
	const fields = resolveTextFields(request, ASF_NAMESPACES, 'derivedFirst');
	if (!hasTextFields(fields)) {
		throw new NoWritableTagsError({ format: 'asf' });
	}

	const layout = readAsfHeader(data);
	const edits: ByteEdit[] = [];
	let countDelta = 0;

	const writesContentDescription = TEXT_FIELDS.some(
		field => CONTENT_DESCRIPTION_MAPPING[field] !== undefined && fields[field] !== undefined,
	);
	if (writesContentDescription) {
		countDelta += replaceObject(
			layout.blocks,
			ASF_CONTENT_DESCRIPTION_OBJECT_GUID,
			buildContentDescription(layout.blocks, fields),
			layout.end,
			edits,
		);
	}

	const descriptors: AsfDescriptor[] = [];
	for (const field of TEXT_FIELDS) {
		const name = DESCRIPTOR_NAMES[field];
		const value = fields[field];
		if (name !== undefined && value !== undefined) {
			descriptors.push(createStringDescriptor(name, value));
		}
	}
	if (descriptors.length > 0) {
		countDelta += replaceObject(
			layout.blocks,
			ASF_EXTENDED_CONTENT_DESCRIPTION_OBJECT_GUID,
			buildExtendedContentDescription(layout.blocks, descriptors),
			layout.end,
			edits,
		);
	}

	const delta = editDelta(edits);
	const newHeaderSize = layout.headerSize + delta;
	const newCount = Math.max(0, layout.objectCount + countDelta);
	if (newCount > 0xffffffff) {
		throw new StructuralLimitError('Too many header objects.', {
			format: 'asf',
			offset: ASF_HEADER_COUNT_OFFSET,
			found: `${newCount}`,
		});
	}

	edits.push(u64Edit(ASF_HEADER_SIZE_OFFSET, newHeaderSize, true));
	edits.push(u32Edit(ASF_HEADER_COUNT_OFFSET, newCount, true));

	const fileProperties = layout.blocks.find(isObject(ASF_FILE_PROPERTIES_OBJECT_GUID));
	if (fileProperties && fileProperties.totalLength >= FILE_SIZE_OFFSET + 8) {
		const position = fileProperties.offset + FILE_SIZE_OFFSET;
		const fileSize = readU64Le(FileSlice.of(data, position, position + 8));
		if (fileSize === data.byteLength) {
			edits.push(u64Edit(position, data.byteLength + delta, true));
		}
	}

	return spliceBytes(data, edits);
};
