/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	type ByteEdit,
	blockEnd,
	blockPayload,
	editDelta,
	insertion,
	locateBlock,
	mapOffset,
	removalEdits,
	spliceBytes,
} from '../container';
import { FormatError, NoWritableTagsError, StructuralLimitError, UnsupportedLayoutError } from '../errors';
import {
	hasTextFields,
	type MetadataRequest,
	resolveTextFields,
	TEXT_FIELDS,
	type TextField,
	type TextFields,
} from '../metadata';
import { bytesEqual, describeBytes } from '../misc';
import { FileSlice } from '../reader';
import {
	type EBML,
	type EBMLBlock,
	type EBMLElement,
	EBMLId,
	EBMLUnicodeString,
	encodeUnsignedInt,
	encodeVarInt,
	maxVarIntValue,
	readChildElements,
	readEbmlElements,
	readUnicodeString,
	readUnsignedInt,
	serializeEBML,
} from './ebml';

const MATROSKA_NAMESPACES = ['Matroska', 'MKV', 'WebM', 'Video:Matroska'];

export const SIMPLE_TAG_NAMES: Record<TextField, string> = {
	title: 'TITLE',
	artist: 'ARTIST',
	album: 'ALBUM',
	albumArtist: 'ALBUM_ARTIST',
	comment: 'COMMENT',
	genre: 'GENRE',
	date: 'DATE_RELEASED',
	copyright: 'COPYRIGHT',
	description: 'DESCRIPTION',
	trackNumber: 'PART_NUMBER',
};

const EBML_MAGIC = /* #__PURE__ */ new Uint8Array([0x1a, 0x45, 0xdf, 0xa3]);
const TAGS_ID_BYTES = /* #__PURE__ */ encodeUnsignedInt(EBMLId.Tags, 4);

const simpleTagName = (data: Uint8Array, simpleTag: EBMLBlock) => {
	const name = readChildElements(data, simpleTag).blocks.find(child => child.tag.id === EBMLId.TagName);
	return name
		? readUnicodeString(FileSlice.of(data, name.offset + name.headerLength), name.payloadLength)
		: null;
};

/**
 * Splits the Tag elements of the given Tags elements into those aimed at specific tracks, chapters or attachments,
 * which are kept whole, and the SimpleTags of file-level Tags (empty Targets) that aren't being overwritten.
 */
const collectKeptTags = (data: Uint8Array, tagsElements: EBMLBlock[], overwrittenNames: Set<string>) => {
	const keptTags: Uint8Array[] = [];
	const keptSimpleTags: Uint8Array[] = [];

	for (const tags of tagsElements) {
		for (const tag of readChildElements(data, tags).blocks) {
			if (tag.tag.id !== EBMLId.Tag) {
				continue;
			}

			const children = readChildElements(data, tag).blocks;
			const targets = children.find(child => child.tag.id === EBMLId.Targets);
			if (targets && targets.payloadLength > 0) {
				keptTags.push(tag.bytes);
				continue;
			}

			for (const child of children) {
				if (child.tag.id !== EBMLId.SimpleTag) {
					continue;
				}

				const name = simpleTagName(data, child);
				if (name === null || !overwrittenNames.has(name.toUpperCase())) {
					keptSimpleTags.push(child.bytes);
				}
			}
		}
	}

	return { keptTags, keptSimpleTags };
};

export const createTagsElement = (
	fields: TextFields,
	keptTags: Uint8Array[] = [],
	keptSimpleTags: Uint8Array[] = [],
) => {
	const simpleTags: EBML[] = [...keptSimpleTags];
	for (const field of TEXT_FIELDS) {
		const value = fields[field];
		if (value === undefined) {
			continue;
		}

		simpleTags.push({ id: EBMLId.SimpleTag, data: [
			{ id: EBMLId.TagName, data: new EBMLUnicodeString(SIMPLE_TAG_NAMES[field]) },
			{ id: EBMLId.TagString, data: new EBMLUnicodeString(value) },
		] });
	}

	const element: EBMLElement = { id: EBMLId.Tags, data: [
		...keptTags,
		{ id: EBMLId.Tag, data: [
			{ id: EBMLId.Targets, data: [] },
			...simpleTags,
		] },
	] };

	return serializeEBML(element);
};

/** Re-encodes an unsigned integer element's value at its stored width. */
const positionEdit = (element: EBMLBlock, value: number): ByteEdit => {
	const width = element.payloadLength;
	if (width === 0 || width > 8 || value >= 2 ** (8 * width)) {
		throw new StructuralLimitError('Remapped position no longer fits into its element.', {
			format: 'matroska',
			offset: element.offset,
			expected: `at most ${width} bytes`,
			found: `${value}`,
		});
	}

	const start = element.offset + element.headerLength;
	return { start, end: start + width, bytes: encodeUnsignedInt(value, width) };
};

const readPosition = (data: Uint8Array, element: EBMLBlock) => {
	return readUnsignedInt(FileSlice.of(data, element.offset + element.headerLength), element.payloadLength);
};

const findChildren = (data: Uint8Array, parent: EBMLBlock, id: EBMLId) => {
	return readChildElements(data, parent).blocks.filter(child => child.tag.id === id);
};

interface RemapContext {
	data: Uint8Array;
	/** Absolute position of the Segment payload, which segment positions are relative to. */
	segmentDataStart: number;
	edits: ByteEdit[];
	removedTags: EBMLBlock[];
	/** Output position of the new Tags element. */
	newTagsPosition: number;
}

const remapPosition = (context: RemapContext, element: EBMLBlock, seekId: Uint8Array | null) => {
	const target = context.segmentDataStart + readPosition(context.data, element);
	const pointsAtRemovedTags = seekId !== null
		&& bytesEqual(seekId, TAGS_ID_BYTES)
		&& context.removedTags.some(tags => tags.offset === target);

	const mapped = pointsAtRemovedTags ? context.newTagsPosition : mapOffset(context.edits, target);
	if (mapped === null) {
		throw new UnsupportedLayoutError('Stored position points into an element that is being removed.', {
			format: 'matroska',
			offset: element.offset,
		});
	}

	return mapped === target ? null : positionEdit(element, mapped - context.segmentDataStart);
};

/** Edits for every SeekHead SeekPosition and every Cues CueClusterPosition that moves. */
const positionEdits = (context: RemapContext, segmentChildren: EBMLBlock[]) => {
	const { data } = context;
	const result: ByteEdit[] = [];

	for (const seekHead of segmentChildren.filter(child => child.tag.id === EBMLId.SeekHead)) {
		for (const seek of findChildren(data, seekHead, EBMLId.Seek)) {
			const children = readChildElements(data, seek).blocks;
			const seekId = children.find(child => child.tag.id === EBMLId.SeekID);
			const seekPosition = children.find(child => child.tag.id === EBMLId.SeekPosition);
			if (!seekPosition) {
				continue;
			}

			const edit = remapPosition(context, seekPosition, seekId ? blockPayload(seekId) : null);
			if (edit) result.push(edit);
		}
	}

	for (const cues of segmentChildren.filter(child => child.tag.id === EBMLId.Cues)) {
		for (const cuePoint of findChildren(data, cues, EBMLId.CuePoint)) {
			for (const trackPositions of findChildren(data, cuePoint, EBMLId.CueTrackPositions)) {
				for (const clusterPosition of findChildren(data, trackPositions, EBMLId.CueClusterPosition)) {
					const edit = remapPosition(context, clusterPosition, null);
					if (edit) result.push(edit);
				}
			}
		}
	}

	return result;
};

/**
 * Writes a file-level Tags element in front of the first Cluster, or at the end of the Segment when there is none.
 * Tags elements ahead of the first Cluster are merged into it and removed. The Segment's size keeps its width.
 */
export const writeMatroskaMetadata = (data: Uint8Array, request: MetadataRequest) => {
	if (data.byteLength < EBML_MAGIC.byteLength || !bytesEqual(data.subarray(0, 4), EBML_MAGIC)) {
		throw new FormatError('Not an EBML file.', {
			format: 'matroska',
			offset: 0,
			expected: '0x1a45dfa3',
			found: describeBytes(data.subarray(0, 4)),
		});
	}

	const fields = resolveTextFields(request, MATROSKA_NAMESPACES, 'derivedFirst');
	if (!hasTextFields(fields)) {
		throw new NoWritableTagsError({ format: 'matroska' });
	}

	const topLevel = readEbmlElements(data, 0, data.byteLength);
	const segment = topLevel.blocks.find(element => element.tag.id === EBMLId.Segment);
	if (!segment) {
		throw new UnsupportedLayoutError('File has no Segment element.', { format: 'matroska' });
	}

	const segmentDataStart = segment.offset + segment.headerLength;
	const children = readChildElements(data, segment).blocks;
	const firstClusterIndex = locateBlock(children, child => child.tag.id === EBMLId.Cluster);
	const headChildren = firstClusterIndex === null ? children : children.slice(0, firstClusterIndex);

	if (firstClusterIndex !== null && children.slice(firstClusterIndex).some(child => child.tag.id === EBMLId.Tags)) {
		console.warn('Matroska Tags elements placed after the first Cluster are left unchanged.');
	}

	const removedTags = headChildren.filter(child => child.tag.id === EBMLId.Tags);
	const overwrittenNames = new Set(
		TEXT_FIELDS.filter(field => fields[field] !== undefined).map(field => SIMPLE_TAG_NAMES[field]),
	);
	const { keptTags, keptSimpleTags } = collectKeptTags(data, removedTags, overwrittenNames);
	const newTags = createTagsElement(fields, keptTags, keptSimpleTags);

	const insertPosition = firstClusterIndex === null ? blockEnd(segment) : children[firstClusterIndex].offset;
	const structuralEdits = [
		...removalEdits(headChildren, child => child.tag.id === EBMLId.Tags),
		insertion(insertPosition, newTags),
	];

	const newTagsPosition = mapOffset(structuralEdits, insertPosition);
	if (newTagsPosition === null) {
		throw new UnsupportedLayoutError('Tags insertion point lies inside a removed element.', {
			format: 'matroska',
			offset: insertPosition,
		});
	}

	const edits = [
		...structuralEdits,
		...positionEdits({
			data,
			segmentDataStart,
			edits: structuralEdits,
			removedTags,
			newTagsPosition: newTagsPosition - newTags.byteLength,
		}, children),
	];

	if (!segment.tag.unknownSize) {
		const newSize = segment.payloadLength + editDelta(edits);
		if (newSize > maxVarIntValue(segment.tag.sizeWidth)) {
			throw new StructuralLimitError('Segment size no longer fits into its size field.', {
				format: 'matroska',
				offset: segment.offset + segment.tag.idWidth,
				expected: `at most ${maxVarIntValue(segment.tag.sizeWidth)} bytes`,
				found: `${newSize} bytes`,
			});
		}

		const sizeStart = segment.offset + segment.tag.idWidth;
		edits.push({
			start: sizeStart,
			end: sizeStart + segment.tag.sizeWidth,
			bytes: encodeVarInt(newSize, segment.tag.sizeWidth),
		});
	}

	return spliceBytes(data, edits);
};
