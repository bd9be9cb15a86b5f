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
	mapOffset,
	removalEdits,
	spliceBytes,
	u32Edit,
	u64Edit,
} from '../container';
import { FormatError, NoWritableTagsError, StructuralLimitError, UnsupportedLayoutError } from '../errors';
import {
	hasKeyWithPrefix,
	hasTextFields,
	type MetadataRequest,
	rejectKeys,
	resolveTextFields,
	TEXT_FIELDS,
	type TextFields,
} from '../metadata';
import { concatBytes, describeBytes, last, toDataView } from '../misc';
import type { ResolvedWriterOptions } from '../options';
import { FileSlice, readU32Be, readU64Be } from '../reader';
import { collectXmpProperties, createXmpPacket, hasXmpKeys, readXmpProperties, type XmpProperty } from '../xmp';
import {
	type Box,
	box,
	checkedCompactSize,
	ilstItem,
	meta,
	paddingBox,
	rawBox,
	serializeBoxes,
	uuid,
} from './isobmff-boxes';
import {
	findBox,
	findBoxPath,
	hasIsobmffSignature,
	type IsobmffBox,
	type IsobmffLayout,
	metaChildrenOffset,
	readBoxes,
	readChildBoxes,
} from './isobmff-reader';

const QUICKTIME_NAMESPACES = ['QuickTime', 'MP4', 'ItemList'];

/** Tag classes with their own atoms (keys-indexed lists, Xtra, track-level metadata) that aren't written. */
const REJECTED_KEY_PREFIXES = [
	'QuickTimeKeys:',
	'MicrosoftXtra:',
	'Xtra:',
	'AudioKeys:',
	'VideoKeys:',
];
const TRACK_LEVEL_KEY_REGEX = /^QuickTime:Track\d+:/;

const isRejectedKey = (key: string) => {
	return REJECTED_KEY_PREFIXES.some(prefix => key.startsWith(prefix)) || TRACK_LEVEL_KEY_REGEX.test(key);
};

export const XMP_UUID = 'BE7ACFCB97A942E89C71999491E3AFAC';
const XMP_UUID_BYTES = /* #__PURE__ */ new Uint8Array(
	/* #__PURE__ */ Array.from({ length: 16 }, (_, i) => parseInt(XMP_UUID.slice(2 * i, 2 * i + 2), 16)),
);

/**
 * Adds the `free` box that rounds the run up to the configured padding, after the run or, for a run that has to stay
 * last in the file, in front of it.
 */
const padRun = (run: Uint8Array, options: ResolvedWriterOptions, paddingFirst = false) => {
	const padding = paddingBox(run.byteLength, options.quickTimePad);
	if (!padding) {
		return run;
	}

	const paddingBytes = serializeBoxes([padding]);
	return concatBytes(paddingFirst ? [paddingBytes, run] : [run, paddingBytes]);
};

/**
 * Rewrites every `stco` and `co64` entry whose target moves under the given edits. Fragmented files keep offsets in
 * `moof` boxes as well; those aren't touched.
 */
const chunkOffsetEdits = (data: Uint8Array, topLevel: IsobmffLayout, edits: ByteEdit[]) => {
	const moov = findBox(topLevel, 'moov');
	if (!moov) {
		return [];
	}

	const result: ByteEdit[] = [];
	const traks = readChildBoxes(data, moov).blocks.filter(child => child.tag.type === 'trak');

	for (const trak of traks) {
		const stbl = findBoxPath(data, readChildBoxes(data, trak), ['mdia', 'minf', 'stbl']);
		if (!stbl) {
			continue;
		}

		for (const table of readChildBoxes(data, stbl).blocks) {
			const isLarge = table.tag.type === 'co64';
			if (table.tag.type !== 'stco' && !isLarge) {
				continue;
			}

			const slice = FileSlice.of(data, table.offset + table.headerLength, blockEnd(table));
			slice.skip(4); // Version and flags
			const entryCount = readU32Be(slice);
			const entrySize = isLarge ? 8 : 4;

			if (entryCount * entrySize > slice.remainingLength) {
				throw new UnsupportedLayoutError(`"${table.tag.type}" box declares more entries than it holds.`, {
					format: 'isobmff',
					offset: table.offset,
					expected: `at most ${Math.floor(slice.remainingLength / entrySize)} entries`,
					found: `${entryCount} entries`,
				});
			}

			for (let i = 0; i < entryCount; i++) {
				const position = slice.filePos;
				const chunkOffset = isLarge ? readU64Be(slice) : readU32Be(slice);
				const mapped = mapOffset(edits, chunkOffset);

				if (mapped === null) {
					throw new UnsupportedLayoutError('Chunk offset points into a box that is being replaced.', {
						format: 'isobmff',
						offset: position,
					});
				}
				if (mapped === chunkOffset) {
					continue;
				}

				if (isLarge) {
					result.push(u64Edit(position, mapped, false));
				} else if (mapped > 0xffffffff) {
					throw new StructuralLimitError('Shifted chunk offset no longer fits into "stco".', {
						format: 'isobmff',
						offset: position,
						expected: 'at most 4294967295',
						found: `${mapped}`,
					});
				} else {
					result.push(u32Edit(position, mapped, false));
				}
			}
		}
	}

	return result;
};

/** Edits that make the `moov` header declare its new size, widening it to the 64-bit form when needed. */
export const moovSizeEdits = (moov: IsobmffBox, newSize: number): ByteEdit[] => {
	switch (moov.tag.sizeForm) {
		case 'toEnd':
			return [];
		case 'large':
			return [u64Edit(moov.offset + 8, newSize, false)];
		case 'compact': {
			if (newSize <= 0xffffffff) {
				return [u32Edit(moov.offset, newSize, false)];
			}

			const header = new Uint8Array(16);
			const view = toDataView(header);
			view.setUint32(0, 1, false);
			header.set(moov.bytes.subarray(4, 8), 4);
			view.setUint32(8, Math.floor((newSize + 8) / 2 ** 32), false);
			view.setUint32(12, (newSize + 8) >>> 0, false);

			return [{ start: moov.offset, end: moov.offset + 8, bytes: header }];
		}
	}
};

/**
 * Replaces every `moov/udta` with one new `udta` appended as the last child of `moov`. Non-`meta` children of the old
 * boxes and the ilst items that aren't being set are carried over as stored.
 */
const writeItemList = (data: Uint8Array, fields: TextFields, options: ResolvedWriterOptions) => {
	const topLevel = readBoxes(data);
	const moov = findBox(topLevel, 'moov');
	if (!moov) {
		throw new UnsupportedLayoutError('File has no "moov" box to hold the item list.', { format: 'isobmff' });
	}
	if (findBox(topLevel, 'moof')) {
		console.warn('Fragmented ISO-BMFF file: data offsets stored in "moof" boxes are not updated.');
	}

	const newItems: Box[] = [];
	for (const field of TEXT_FIELDS) {
		const value = fields[field];
		if (value !== undefined) {
			newItems.push(ilstItem(field, value));
		}
	}
	const newItemTypes = new Set(newItems.map(item => item.type));

	const moovChildren = readChildBoxes(data, moov);
	const keptChildren: Box[] = [];
	const keptItems: Box[] = [];

	for (const udta of moovChildren.blocks.filter(child => child.tag.type === 'udta')) {
		for (const child of readChildBoxes(data, udta).blocks) {
			if (child.tag.type !== 'meta') {
				keptChildren.push(rawBox(child.bytes));
				continue;
			}

			const ilst = findBox(readChildBoxes(data, child, metaChildrenOffset(data, child)), 'ilst');
			if (!ilst) {
				continue;
			}

			for (const item of readChildBoxes(data, ilst).blocks) {
				if (!newItemTypes.has(item.tag.type)) {
					keptItems.push(rawBox(item.bytes));
				}
			}
		}
	}

	const udta = box('udta', undefined, [...keptChildren, meta(options.quickTimeHandler, [...keptItems, ...newItems])]);
	const edits = [
		...removalEdits(moovChildren.blocks, child => child.tag.type === 'udta'),
		insertion(blockEnd(moov), padRun(serializeBoxes([udta]), options)),
	];

	edits.push(...moovSizeEdits(moov, moov.totalLength + editDelta(edits)));
	edits.push(...chunkOffsetEdits(data, topLevel, edits));

	return spliceBytes(data, edits);
};

/**
 * Replaces every top-level XMP `uuid` box with one merged packet at the very end of the file. A box that used to run
 * to the end of the file gets an explicit size first.
 */
const writeXmpBox = (data: Uint8Array, properties: XmpProperty[], options: ResolvedWriterOptions) => {
	const topLevel = readBoxes(data);
	const isXmpBox = (candidate: IsobmffBox) => candidate.tag.type === 'uuid' && candidate.tag.userType === XMP_UUID;

	const stored = readXmpProperties(
		topLevel.blocks.filter(isXmpBox).map(candidate => blockPayload(candidate).subarray(XMP_UUID_BYTES.byteLength)),
	);
	const packet = createXmpPacket(properties, stored);

	const edits = removalEdits(topLevel.blocks, isXmpBox);
	const lastKept = last(topLevel.blocks.filter(candidate => !isXmpBox(candidate)));
	if (lastKept && lastKept.tag.sizeForm === 'toEnd') {
		edits.push(u32Edit(lastKept.offset, checkedCompactSize(lastKept.tag.type, lastKept.totalLength), false));
	}

	edits.push(insertion(data.byteLength, padRun(serializeBoxes([uuid(XMP_UUID_BYTES, packet)]), options, true)));
	edits.push(...chunkOffsetEdits(data, topLevel, edits));

	return spliceBytes(data, edits);
};

/**
 * Writes XMP into a top-level `uuid` box and descriptive text into `moov/udta/meta/ilst`. Item list tags are written
 * when a `QuickTime:` key asks for them, or when the request has no XMP keys at all and the fallbacks resolve.
 */
export const writeIsobmffMetadata = (
	data: Uint8Array,
	request: MetadataRequest,
	options: ResolvedWriterOptions,
) => {
	if (!hasIsobmffSignature(data)) {
		throw new FormatError('Not an ISO-BMFF file.', {
			format: 'isobmff',
			offset: 4,
			expected: 'a known leading box type',
			found: describeBytes(data.subarray(4, 8)),
		});
	}

	rejectKeys(request, 'isobmff', isRejectedKey);

	const xmpProperties = collectXmpProperties(request);
	const fields = resolveTextFields(request, QUICKTIME_NAMESPACES);
	const writesItemList = hasTextFields(fields)
		&& (hasKeyWithPrefix(request, ['QuickTime:']) || !hasXmpKeys(request));

	if (xmpProperties.length === 0 && !writesItemList) {
		throw new NoWritableTagsError({ format: 'isobmff' });
	}

	let result = data;
	if (writesItemList) {
		result = writeItemList(result, fields, options);
	}
	if (xmpProperties.length > 0) {
		result = writeXmpBox(result, xmpProperties, options);
	}

	return result;
};
