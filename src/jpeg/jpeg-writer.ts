/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	type Block,
	blockEnd,
	blockPayload,
	type ContainerLayout,
	insertion,
	removalEdits,
	spliceBytes,
} from '../container';
import { NoWritableTagsError, UnsupportedLayoutError } from '../errors';
import {
	type MetadataRequest,
	type MetadataValue,
	pickBinary,
	presentKeys,
	rejectKeys,
	toText,
} from '../metadata';
import { concatBytes, last, textEncoder } from '../misc';
import { collectXmpProperties, createXmpPacket, readXmpProperties, type XmpProperty } from '../xmp';
import { type JpegSegmentKind, type JpegSegmentTag, readJpegSegments, XMP_SIGNATURE } from './jpeg-reader';
import {
	type AfcpEntry,
	assembleExtendedXmp,
	createAfcpSegment,
	createIccSegments,
	createJfifSegment,
	createPhotoshopResource,
	createPhotoshopSegment,
	createXmpSegment,
	DEFAULT_JFIF_INFO,
	type ExtendedXmpChunk,
	type JfifInfo,
	JfifUnits,
	type PhotoshopResource,
	readAfcpEntries,
	readExtendedXmpChunk,
	readJfifInfo,
	readPhotoshopResources,
} from './jpeg-segments';

const ICC_KEYS = ['ICC_Profile', 'ICC:Profile'];
const JFIF_KEYS = ['JFIF:JFIFVersion', 'JFIF:ResolutionUnit', 'JFIF:XResolution', 'JFIF:YResolution'];
const PHOTOSHOP_KEY_REGEX = /^Photoshop:(\d+|0x[0-9a-fA-F]+)$/;

type JpegLayout = ContainerLayout<JpegSegmentTag>;
type JpegSegment = Block<JpegSegmentTag>;

/**
 * Where a new run of segments goes: where the first removed one was, else after the last segment of the same
 * family, else right after SOI, but never in front of a leading JFIF segment.
 */
const insertionPosition = (layout: JpegLayout, removed: JpegSegment[], family: JpegSegmentKind[]) => {
	if (removed.length > 0) {
		return removed[0].offset;
	}

	const sibling = last(layout.blocks.filter(segment => family.includes(segment.tag.kind)));
	if (sibling) {
		return blockEnd(sibling);
	}

	const first = layout.blocks[0];
	if (first && first.tag.kind === 'jfif') {
		return blockEnd(first);
	}

	return layout.start;
};

/** Removes every segment of the given kinds and inserts the new run in their place. */
const replaceSegments = (
	data: Uint8Array,
	layout: JpegLayout,
	kinds: JpegSegmentKind[],
	family: JpegSegmentKind[],
	newSegments: Uint8Array[],
) => {
	const isTarget = (segment: JpegSegment) => kinds.includes(segment.tag.kind);
	const removed = layout.blocks.filter(isTarget);
	const edits = removalEdits(layout.blocks, isTarget);

	if (newSegments.length > 0) {
		edits.push(insertion(insertionPosition(layout, removed, family), concatBytes(newSegments)));
	}

	return spliceBytes(data, edits);
};

/** Text is stored as UTF-8; binary values as they are. */
const valueBytes = (key: string, value: MetadataValue) => {
	return value instanceof Uint8Array ? value : textEncoder.encode(toText(key, value));
};

const parseJfifUnits = (key: string, value: MetadataValue) => {
	if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 2) {
		return value;
	}

	switch (typeof value === 'string' ? value.toLowerCase() : null) {
		case 'none': return JfifUnits.NONE;
		case 'inches': return JfifUnits.INCHES;
		case 'cm': return JfifUnits.CENTIMETERS;
	}

	throw new TypeError(`request['${key}'] must be 0, 1, 2, 'None', 'inches' or 'cm'.`);
};

const parseU16 = (key: string, value: MetadataValue) => {
	const number = Number(toText(key, value));
	if (!Number.isInteger(number) || number < 1 || number > 0xffff) {
		throw new TypeError(`request['${key}'] must be an integer between 1 and 65535.`);
	}

	return number;
};

const writeJfif = (data: Uint8Array, request: MetadataRequest) => {
	const layout = readJpegSegments(data);
	const existing = layout.blocks.find(segment => segment.tag.kind === 'jfif');
	const info: JfifInfo = { ...((existing && readJfifInfo(blockPayload(existing))) ?? DEFAULT_JFIF_INFO) };

	for (const key of JFIF_KEYS) {
		const value = request[key];
		if (value === null || value === undefined) {
			continue;
		}

		if (key === 'JFIF:JFIFVersion') {
			const match = /^(\d+)\.(\d+)$/.exec(toText(key, value));
			if (!match || Number(match[1]) > 255 || Number(match[2]) > 255) {
				throw new TypeError(`request['${key}'] must look like '1.02'.`);
			}
			info.majorVersion = Number(match[1]);
			info.minorVersion = Number(match[2]);
		} else if (key === 'JFIF:ResolutionUnit') {
			info.units = parseJfifUnits(key, value);
		} else if (key === 'JFIF:XResolution') {
			info.xDensity = parseU16(key, value);
		} else {
			info.yDensity = parseU16(key, value);
		}
	}

	return replaceSegments(data, layout, ['jfif'], ['jfif'], [createJfifSegment(info)]);
};

/** The packets already in the file, the main one first. The extended packet is only a continuation of it. */
const readStoredXmp = (layout: JpegLayout) => {
	const main = layout.blocks
		.filter(segment => segment.tag.kind === 'xmp')
		.map(segment => blockPayload(segment).subarray(XMP_SIGNATURE.byteLength));

	const chunks: ExtendedXmpChunk[] = [];
	for (const segment of layout.blocks.filter(x => x.tag.kind === 'extendedXmp')) {
		const chunk = readExtendedXmpChunk(blockPayload(segment));
		if (!chunk) {
			throw new UnsupportedLayoutError('Extended XMP segment has an unknown layout.', {
				format: 'jpeg',
				offset: segment.offset,
			});
		}
		chunks.push(chunk);
	}

	const extended = assembleExtendedXmp(chunks);
	if (!extended) {
		throw new UnsupportedLayoutError('Extended XMP chunks don\'t add up to a whole packet.', { format: 'jpeg' });
	}

	const stored = readXmpProperties([...main, ...extended]);
	// Everything ends up in the one main packet
	stored.properties = stored.properties.filter(x => !(x.prefix === 'xmpNote' && x.name === 'HasExtendedXMP'));

	return stored;
};

const writeXmp = (data: Uint8Array, properties: XmpProperty[]) => {
	const layout = readJpegSegments(data);
	const packet = createXmpPacket(properties, readStoredXmp(layout));

	return replaceSegments(data, layout, ['xmp', 'extendedXmp'], ['exif', 'xmp', 'extendedXmp'], [
		createXmpSegment(packet),
	]);
};

/** An empty profile removes the existing one. */
const writeIcc = (data: Uint8Array, profile: Uint8Array) => {
	const layout = readJpegSegments(data);
	return replaceSegments(data, layout, ['icc'], ['icc'], createIccSegments(profile));
};

const writePhotoshop = (data: Uint8Array, resourceValues: Map<number, Uint8Array>) => {
	const layout = readJpegSegments(data);
	const existing: PhotoshopResource[] = [];

	for (const segment of layout.blocks.filter(x => x.tag.kind === 'photoshop')) {
		const resources = readPhotoshopResources(blockPayload(segment));
		if (!resources) {
			throw new UnsupportedLayoutError('Existing Photoshop segment has an unknown layout.', {
				format: 'jpeg',
				offset: segment.offset,
			});
		}
		existing.push(...resources);
	}

	const resources = [
		...existing.filter(resource => resource.signature !== '8BIM' || !resourceValues.has(resource.id)),
		...[...resourceValues].map(([id, value]) => createPhotoshopResource(id, value)),
	];

	return replaceSegments(data, layout, ['photoshop'], ['photoshop'], [createPhotoshopSegment(resources)]);
};

const writeAfcp = (data: Uint8Array, entries: AfcpEntry[]) => {
	const layout = readJpegSegments(data);
	const existingSegment = layout.blocks.find(segment => segment.tag.kind === 'afcp');

	let kept: AfcpEntry[] = [];
	if (existingSegment) {
		const existing = readAfcpEntries(blockPayload(existingSegment));
		if (!existing) {
			throw new UnsupportedLayoutError('Existing AFCP segment has an unknown layout.', {
				format: 'jpeg',
				offset: existingSegment.offset,
			});
		}
		kept = existing.filter(entry => !entries.some(x => x.name === entry.name));
	}

	return replaceSegments(data, layout, ['afcp'], ['afcp'], [createAfcpSegment([...kept, ...entries])]);
};

const parsePhotoshopValues = (request: MetadataRequest) => {
	const values = new Map<number, Uint8Array>();

	for (const key of presentKeys(request)) {
		const match = PHOTOSHOP_KEY_REGEX.exec(key);
		const value = request[key];
		if (!match || value === null || value === undefined) {
			continue;
		}

		const id = Number(match[1]);
		if (id > 0xffff) {
			throw new TypeError(`Photoshop resource ID in '${key}' doesn't fit into 16 bits.`);
		}

		values.set(id, valueBytes(key, value));
	}

	return values;
};

const parseAfcpEntries = (request: MetadataRequest) => {
	const entries: AfcpEntry[] = [];

	for (const key of presentKeys(request)) {
		const value = request[key];
		if (!key.startsWith('AFCP:') || value === null || value === undefined) {
			continue;
		}

		entries.push({ name: key.slice('AFCP:'.length), value: valueBytes(key, value) });
	}

	return entries;
};

/**
 * Rewrites the JFIF, XMP, ICC, Photoshop and AFCP segments the request sets, one kind at a time and in that order.
 * Every other segment, the scan data and anything after EOI are kept.
 */
export const writeJpegMetadata = (data: Uint8Array, request: MetadataRequest) => {
	rejectKeys(request, 'jpeg', key =>
		(key.startsWith('JFIF:') && !JFIF_KEYS.includes(key))
		|| (key.startsWith('Photoshop:') && !PHOTOSHOP_KEY_REGEX.test(key)),
	);

	// Fail on a bad signature before looking at the request any further
	readJpegSegments(data);

	const hasJfif = JFIF_KEYS.some(key => request[key] !== null && request[key] !== undefined);
	const xmpProperties = collectXmpProperties(request);
	const iccProfile = pickBinary(request, ICC_KEYS);
	const photoshopValues = parsePhotoshopValues(request);
	const afcpEntries = parseAfcpEntries(request);

	if (!hasJfif && xmpProperties.length === 0 && !iccProfile && photoshopValues.size === 0 && afcpEntries.length === 0) {
		throw new NoWritableTagsError({ format: 'jpeg' });
	}

	let result = data;
	if (hasJfif) {
		result = writeJfif(result, request);
	}
	if (xmpProperties.length > 0) {
		result = writeXmp(result, xmpProperties);
	}
	if (iccProfile) {
		result = writeIcc(result, iccProfile);
	}
	if (photoshopValues.size > 0) {
		result = writePhotoshop(result, photoshopValues);
	}
	if (afcpEntries.length > 0) {
		result = writeAfcp(result, afcpEntries);
	}

	return result;
};
