/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, type ContainerLayout, createBlock } from '../container';
import { FormatError, UnsupportedLayoutError } from '../errors';
import { asciiBytes, bytesStartWith, describeBytes } from '../misc';
import { FileSlice, readBytes, readU32Le, readU8 } from '../reader';

export const OGGS = /* #__PURE__ */ asciiBytes('OggS');
export const OGG_PAGE_HEADER_SIZE = 27;
export const OGG_CHECKSUM_OFFSET = 22;
export const OGG_SEGMENT_COUNT_OFFSET = 26;

export enum OggHeaderType {
	CONTINUATION = 0x01,
	BEGINNING_OF_STREAM = 0x02,
	END_OF_STREAM = 0x04,
}

export interface OggPageTag {
	headerType: number;
	serialNumber: number;
	sequenceNumber: number;
	/** The page's lacing values, one per segment. */
	lacing: Uint8Array;
}

// https://www.rfc-editor.org/rfc/rfc3533#section-6
export const readOggPages = (data: Uint8Array): ContainerLayout<OggPageTag> => {
	if (!bytesStartWith(data, OGGS)) {
		throw new FormatError('Not an Ogg file.', {
			format: 'ogg',
			offset: 0,
			expected: '"OggS"',
			found: describeBytes(data.subarray(0, 4)),
		});
	}

	const slice = FileSlice.of(data);
	const pages: Block<OggPageTag>[] = [];

	while (slice.remainingLength > 0) {
		const offset = slice.filePos;
		if (!bytesStartWith(data, OGGS, offset)) {
			throw new UnsupportedLayoutError('Lost page synchronization.', {
				format: 'ogg',
				offset,
				expected: '"OggS"',
				found: describeBytes(data.subarray(offset, offset + 4)),
			});
		}
		if (slice.remainingLength < OGG_PAGE_HEADER_SIZE) {
			throw new UnsupportedLayoutError('Page header is truncated.', { format: 'ogg', offset });
		}

		slice.skip(5); // Capture pattern and version
		const headerType = readU8(slice);
		slice.skip(8); // Granule position
		const serialNumber = readU32Le(slice);
		const sequenceNumber = readU32Le(slice);
		slice.skip(4); // Checksum
		const segmentCount = readU8(slice);

		if (slice.remainingLength < segmentCount) {
			throw new UnsupportedLayoutError('Lacing table is truncated.', { format: 'ogg', offset });
		}

		const lacing = readBytes(slice, segmentCount);
		const payloadLength = lacing.reduce((a, b) => a + b, 0);

		if (payloadLength > slice.remainingLength) {
			throw new UnsupportedLayoutError('Page payload runs past the end of the file.', {
				format: 'ogg',
				offset,
				expected: `at most ${slice.remainingLength} bytes`,
				found: `${payloadLength} bytes`,
			});
		}

		pages.push(createBlock(
			data,
			{ headerType, serialNumber, sequenceNumber, lacing },
			offset,
			OGG_PAGE_HEADER_SIZE + segmentCount,
			payloadLength,
		));
		slice.skip(payloadLength);
	}

	return {
		start: 0,
		blocks: pages,
		end: slice.filePos,
	};
};
