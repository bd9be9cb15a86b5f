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
import { FileSlice, readAscii, readU32Le } from '../reader';

export const RIFF_HEADER_SIZE = 12;
export const RIFF_CHUNK_HEADER_SIZE = 8;
export const RIFF_SIZE_OFFSET = 4;
/** Written by streaming encoders that never came back to fill in the size. */
export const RIFF_SIZE_PLACEHOLDER = 0xffffffff;

export type RiffFormType = 'WAVE' | 'AVI ';

export interface RiffChunkTag {
	fourCC: string;
	/** For LIST chunks, the list type that opens the payload. */
	listType: string | null;
}

export interface RiffLayout extends ContainerLayout<RiffChunkTag> {
	formType: RiffFormType;
	/** The value of the RIFF header's size field. */
	riffSize: number;
	/** True when the size field holds a streaming placeholder (0 or 0xFFFFFFFF) and the walk ran to the end of the file. */
	sizeIsPlaceholder: boolean;
}

const isRiffFormType = (value: string): value is RiffFormType => value === 'WAVE' || value === 'AVI ';

/**
 * Walks the top-level chunks of a RIFF file. The walk is bounded by the RIFF size field, so data appended after the
 * RIFF chunk (such as a trailing ID3 tag) ends up in the trailer.
 */
export const readRiffChunks = (data: Uint8Array): RiffLayout => {
	if (data.byteLength < RIFF_HEADER_SIZE) {
		throw new FormatError('File is too short to be a RIFF file.', { format: 'riff', offset: 0 });
	}

	const slice = FileSlice.of(data);
	const magic = readAscii(slice, 4);
	if (magic !== 'RIFF') {
		throw new FormatError('Not a RIFF file.', {
			format: 'riff',
			offset: 0,
			expected: '"RIFF"',
			found: describeBytes(data.subarray(0, 4)),
		});
	}

	const riffSize = readU32Le(slice);
	const formType = readAscii(slice, 4);
	if (!isRiffFormType(formType)) {
		throw new FormatError('Unsupported RIFF form type.', {
			format: 'riff',
			offset: 8,
			expected: '"WAVE" or "AVI "',
			found: describeBytes(data.subarray(8, 12)),
		});
	}

	const sizeIsPlaceholder = riffSize === 0 || riffSize === RIFF_SIZE_PLACEHOLDER;
	const declaredEnd = RIFF_CHUNK_HEADER_SIZE + riffSize;
	const bound = !sizeIsPlaceholder && declaredEnd >= RIFF_HEADER_SIZE
		? Math.min(declaredEnd, data.byteLength)
		: data.byteLength;
	const chunks: Block<RiffChunkTag>[] = [];

	while (bound - slice.filePos >= RIFF_CHUNK_HEADER_SIZE) {
		const offset = slice.filePos;
		const fourCC = readAscii(slice, 4);
		const size = readU32Le(slice);

		if (size > bound - slice.filePos) {
			throw new UnsupportedLayoutError(`Chunk "${fourCC}" runs past the end of the RIFF data.`, {
				format: 'riff',
				offset,
				expected: `at most ${bound - slice.filePos} bytes`,
				found: `${size} bytes`,
			});
		}

		const listType = fourCC === 'LIST' && size >= 4 ? readAscii(slice.slice(slice.filePos, 4), 4) : null;

		// Chunks are word-aligned; a missing pad byte is tolerated only at the very end
		const padding = (size & 1) === 1 && slice.filePos + size < bound ? 1 : 0;
		chunks.push(createBlock(
			data,
			{ fourCC, listType },
			offset,
			RIFF_CHUNK_HEADER_SIZE,
			size,
			RIFF_CHUNK_HEADER_SIZE + size + padding,
		));
		slice.skip(size + padding);
	}

	return {
		start: RIFF_HEADER_SIZE,
		blocks: chunks,
		end: slice.filePos,
		formType,
		riffSize,
		sizeIsPlaceholder,
	};
};

export interface RiffInfoEntry {
	fourCC: string;
	/** The entry's data as stored, including its NUL terminator. */
	data: Uint8Array;
}

/** Splits the payload of a LIST/INFO chunk (after the list type) into its entries. */
export const readRiffInfoEntries = (payload: Uint8Array, offset: number) => {
	const slice = FileSlice.of(payload, 4);
	const entries: RiffInfoEntry[] = [];

	while (slice.remainingLength >= RIFF_CHUNK_HEADER_SIZE) {
		const entryOffset = slice.filePos;
		const fourCC = readAscii(slice, 4);
		const size = readU32Le(slice);

		if (size > slice.remainingLength) {
			throw new UnsupportedLayoutError(`INFO entry "${fourCC}" runs past the end of its list.`, {
				format: 'riff',
				offset: offset + entryOffset,
			});
		}

		entries.push({ fourCC, data: payload.subarray(slice.filePos, slice.filePos + size) });
		slice.skip(Math.min(size + (size & 1), slice.remainingLength));
	}

	return entries;
};
