/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type ContainerLayout, type Block, createBlock } from '../container';
import { FormatError, UnsupportedLayoutError } from '../errors';
import { asciiBytes, bytesStartWith, describeBytes } from '../misc';
import { FileSlice, readU24Be, readU8 } from '../reader';

export const FLAC_SIGNATURE = /* #__PURE__ */ asciiBytes('fLaC');
export const FLAC_BLOCK_HEADER_SIZE = 4;

export enum FlacBlockType {
	STREAMINFO = 0,
	PADDING = 1,
	APPLICATION = 2,
	SEEKTABLE = 3,
	VORBIS_COMMENT = 4,
	CUESHEET = 5,
	PICTURE = 6,
}

export interface FlacBlockTag {
	type: number;
	/** Whether this block carries the last-metadata-block flag. */
	isLast: boolean;
}

/** Walks the metadata blocks up to and including the one flagged as last. The audio frames are the trailer. */
export const readFlacMetadataBlocks = (data: Uint8Array): ContainerLayout<FlacBlockTag> => {
	if (!bytesStartWith(data, FLAC_SIGNATURE)) {
		throw new FormatError('Not a FLAC file.', {
			format: 'flac',
			offset: 0,
			expected: '"fLaC"',
			found: describeBytes(data.subarray(0, 4)),
		});
	}

	const slice = FileSlice.of(data, FLAC_SIGNATURE.byteLength);
	const blocks: Block<FlacBlockTag>[] = [];

	while (true) {
		const offset = slice.filePos;
		if (slice.remainingLength < FLAC_BLOCK_HEADER_SIZE) {
			throw new UnsupportedLayoutError('Metadata ended without a block flagged as last.', {
				format: 'flac',
				offset,
			});
		}

		const flagAndType = readU8(slice);
		const length = readU24Be(slice);

		if (length > slice.remainingLength) {
			throw new UnsupportedLayoutError('Metadata block runs past the end of the file.', {
				format: 'flac',
				offset,
				expected: `at most ${slice.remainingLength} bytes`,
				found: `${length} bytes`,
			});
		}

		const tag: FlacBlockTag = {
			type: flagAndType & 0x7f,
			isLast: (flagAndType & 0x80) !== 0,
		};
		blocks.push(createBlock(data, tag, offset, FLAC_BLOCK_HEADER_SIZE, length));
		slice.skip(length);

		if (tag.isLast) {
			break;
		}
	}

	return {
		start: FLAC_SIGNATURE.byteLength,
		blocks,
		end: slice.filePos,
	};
};
