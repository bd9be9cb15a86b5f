/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, type ContainerLayout, createBlock } from '../container';
import { UnsupportedLayoutError } from '../errors';
import { describeBytes } from '../misc';
import { FileSlice, readAscii, readU16Be, readU32Be, readU8 } from '../reader';
import { decodeSynchsafe, isSynchsafe } from '../varint';

export const ID3_HEADER_SIZE = 10;
export const ID3_FRAME_HEADER_SIZE = 10;

export enum Id3V2TextEncoding {
	ISO_8859_1 = 0,
	UTF_16_WITH_BOM = 1,
	UTF_16_BE_NO_BOM = 2,
	UTF_8 = 3,
}

export type Id3Version = 3 | 4;

export interface Id3FrameTag {
	id: string;
}

export interface Id3TagLayout extends ContainerLayout<Id3FrameTag> {
	version: Id3Version;
	/** Position right after the tag, where the audio starts. */
	tagEnd: number;
}

const FRAME_ID_REGEX = /^[A-Z0-9]{4}$/;

/**
 * Reads the ID3v2 tag at the start of the file. Returns null if there is none. Only plain v2.3 and v2.4 tags are
 * accepted; anything using unsynchronisation, an extended header or a footer can't be rewritten frame by frame.
 */
export const readId3Tag = (data: Uint8Array): Id3TagLayout | null => {
	const slice = FileSlice.of(data);
	if (slice.remainingLength < ID3_HEADER_SIZE || readAscii(slice, 3) !== 'ID3') {
		return null;
	}

	const majorVersion = readU8(slice);
	slice.skip(1); // Revision
	const flags = readU8(slice);
	const rawSize = readU32Be(slice);

	if (majorVersion !== 3 && majorVersion !== 4) {
		throw new UnsupportedLayoutError(`ID3v2.${majorVersion} tags are not supported.`, {
			format: 'mp3',
			offset: 3,
			expected: '3 or 4',
			found: `${majorVersion}`,
		});
	}
	const version: Id3Version = majorVersion === 3 ? 3 : 4;
	if (flags !== 0) {
		throw new UnsupportedLayoutError('ID3 tag uses header flags.', {
			format: 'mp3',
			offset: 5,
			expected: '0x00',
			found: `0x${flags.toString(16).padStart(2, '0')}`,
		});
	}
	if (!isSynchsafe(rawSize)) {
		throw new UnsupportedLayoutError('ID3 tag size is not synchsafe.', { format: 'mp3', offset: 6 });
	}

	const tagEnd = ID3_HEADER_SIZE + decodeSynchsafe(rawSize);
	if (tagEnd > data.byteLength) {
		throw new UnsupportedLayoutError('ID3 tag runs past the end of the file.', {
			format: 'mp3',
			offset: 6,
			expected: `at most ${data.byteLength - ID3_HEADER_SIZE} bytes`,
			found: `${tagEnd - ID3_HEADER_SIZE} bytes`,
		});
	}

	const frameSlice = FileSlice.of(data, ID3_HEADER_SIZE, tagEnd);
	const frames: Block<Id3FrameTag>[] = [];

	while (frameSlice.remainingLength >= ID3_FRAME_HEADER_SIZE) {
		const offset = frameSlice.filePos;
		if (data[offset] === 0) {
			break; // Padding
		}

		const id = readAscii(frameSlice, 4);
		if (!FRAME_ID_REGEX.test(id)) {
			throw new UnsupportedLayoutError('Invalid frame ID.', {
				format: 'mp3',
				offset,
				expected: 'four uppercase letters or digits',
				found: describeBytes(data.subarray(offset, offset + 4)),
			});
		}

		const rawFrameSize = readU32Be(frameSlice);
		const size = version === 4 ? decodeSynchsafe(rawFrameSize) : rawFrameSize;
		readU16Be(frameSlice); // Flags

		if (size > frameSlice.remainingLength) {
			throw new UnsupportedLayoutError(`Frame "${id}" runs past the end of the tag.`, {
				format: 'mp3',
				offset,
				expected: `at most ${frameSlice.remainingLength} bytes`,
				found: `${size} bytes`,
			});
		}

		frames.push(createBlock(data, { id }, offset, ID3_FRAME_HEADER_SIZE, size));
		frameSlice.skip(size);
	}

	return {
		start: ID3_HEADER_SIZE,
		blocks: frames,
		end: frameSlice.filePos,
		version,
		tagEnd,
	};
};
