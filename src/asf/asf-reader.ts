/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, type ContainerLayout, createBlock } from '../container';
import { FormatError, UnsupportedLayoutError } from '../errors';
import { describeBytes } from '../misc';
import { FileSlice, readU32Le, readU64Le } from '../reader';
import { ASF_GUID_SIZE, ASF_HEADER_OBJECT_GUID, ASF_OBJECT_HEADER_SIZE, matchesGuid } from './asf-misc';

export const ASF_HEADER_SIZE_OFFSET = 16;
export const ASF_HEADER_COUNT_OFFSET = 24;
/** GUID, size and object count; the reserved bytes follow. */
const ASF_HEADER_FIXED_SIZE = 28;

export type AsfReservedWidth = 2 | 4;

export interface AsfObjectTag {
	/** The object's GUID as stored. */
	guid: Uint8Array;
}

export interface AsfHeaderLayout extends ContainerLayout<AsfObjectTag> {
	/** Value of the Header Object's size field, which also marks where the header ends. */
	headerSize: number;
	/** Value of the Header Object's object count field. */
	objectCount: number;
	reservedWidth: AsfReservedWidth;
}

/** Walks the header's children assuming the given reserved width. Returns null if they don't tile the header. */
const tryReadChildren = (data: Uint8Array, headerSize: number, reservedWidth: AsfReservedWidth) => {
	const start = ASF_HEADER_FIXED_SIZE + reservedWidth;
	if (start > headerSize) {
		return null;
	}

	const slice = FileSlice.of(data, start, headerSize);
	const objects: Block<AsfObjectTag>[] = [];

	while (slice.remainingLength > 0) {
		if (slice.remainingLength < ASF_OBJECT_HEADER_SIZE) {
			return null;
		}

		const offset = slice.filePos;
		slice.skip(ASF_GUID_SIZE);
		const size = readU64Le(slice);
		if (size < ASF_OBJECT_HEADER_SIZE || size > headerSize - offset) {
			return null;
		}

		objects.push(createBlock(
			data,
			{ guid: data.subarray(offset, offset + ASF_GUID_SIZE) },
			offset,
			ASF_OBJECT_HEADER_SIZE,
			size - ASF_OBJECT_HEADER_SIZE,
		));
		slice.filePos = offset + size;
	}

	return objects;
};

/**
 * Parses the top-level Header Object. Encoders disagree on whether two or four reserved bytes precede the first
 * child, so both widths are tried and a width is accepted only if its children exactly fill the header.
 */
export const readAsfHeader = (data: Uint8Array): AsfHeaderLayout => {
	if (!matchesGuid(data, 0, ASF_HEADER_OBJECT_GUID)) {
		throw new FormatError('Not an ASF file.', {
			format: 'asf',
			offset: 0,
			expected: 'the Header Object GUID',
			found: describeBytes(data.subarray(0, ASF_GUID_SIZE)),
		});
	}
	if (data.byteLength < ASF_HEADER_FIXED_SIZE + 2) {
		throw new UnsupportedLayoutError('Header Object is truncated.', { format: 'asf', offset: 0 });
	}

	const slice = FileSlice.of(data, ASF_HEADER_SIZE_OFFSET);
	const headerSize = readU64Le(slice);
	const objectCount = readU32Le(slice);

	if (headerSize > data.byteLength || headerSize < ASF_HEADER_FIXED_SIZE + 2) {
		throw new UnsupportedLayoutError('Header Object size is inconsistent with the file.', {
			format: 'asf',
			offset: ASF_HEADER_SIZE_OFFSET,
			expected: `between ${ASF_HEADER_FIXED_SIZE + 2} and ${data.byteLength} bytes`,
			found: `${headerSize} bytes`,
		});
	}

	const candidates: { reservedWidth: AsfReservedWidth; objects: Block<AsfObjectTag>[] }[] = [];
	for (const reservedWidth of [2, 4] as const) {
		const objects = tryReadChildren(data, headerSize, reservedWidth);
		if (objects) {
			candidates.push({ reservedWidth, objects });
		}
	}

	if (candidates.length === 0) {
		throw new UnsupportedLayoutError('Header Object children can\'t be parsed with either reserved width.', {
			format: 'asf',
			offset: ASF_HEADER_FIXED_SIZE,
			expected: '2 or 4 reserved bytes followed by objects filling the header',
		});
	}

	let chosen = candidates[0];
	if (candidates.length > 1) {
		const matchingCount = candidates.filter(candidate => candidate.objects.length === objectCount);
		if (matchingCount.length === 1) {
			chosen = matchingCount[0];
		} else {
			console.warn(
				`ASF header parses with both 2 and 4 reserved bytes; assuming ${chosen.reservedWidth}.`,
			);
		}
	}

	return {
		start: ASF_HEADER_FIXED_SIZE + chosen.reservedWidth,
		blocks: chosen.objects,
		end: headerSize,
		headerSize,
		objectCount,
		reservedWidth: chosen.reservedWidth,
	};
};
