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

export enum JpegMarker {
	TEM = 0x01,
	SOI = 0xd8,
	EOI = 0xd9,
	SOS = 0xda,
	APP0 = 0xe0,
	APP1 = 0xe1,
	APP2 = 0xe2,
	APP13 = 0xed,
}

export type JpegSegmentKind =
	| 'jfif'
	| 'exif'
	| 'xmp'
	| 'extendedXmp'
	| 'icc'
	| 'afcp'
	| 'photoshop'
	| 'other';

export interface JpegSegmentTag {
	marker: number;
	kind: JpegSegmentKind;
}

export const JFIF_SIGNATURE = /* #__PURE__ */ asciiBytes('JFIF\0');
export const EXIF_SIGNATURE = /* #__PURE__ */ asciiBytes('Exif\0\0');
export const XMP_SIGNATURE = /* #__PURE__ */ asciiBytes('http://ns.adobe.com/xap/1.0/\0');
export const EXTENDED_XMP_SIGNATURE = /* #__PURE__ */ asciiBytes('http://ns.adobe.com/xmp/extension/\0');
export const ICC_SIGNATURE = /* #__PURE__ */ asciiBytes('ICC_PROFILE\0');
export const AFCP_SIGNATURE = /* #__PURE__ */ asciiBytes('AFCP');
export const PHOTOSHOP_SIGNATURE = /* #__PURE__ */ asciiBytes('Photoshop 3.0\0');

const SEGMENT_SIGNATURES: { marker: number; signature: Uint8Array; kind: JpegSegmentKind }[] = [
	{ marker: JpegMarker.APP0, signature: JFIF_SIGNATURE, kind: 'jfif' },
	{ marker: JpegMarker.APP1, signature: EXIF_SIGNATURE, kind: 'exif' },
	{ marker: JpegMarker.APP1, signature: XMP_SIGNATURE, kind: 'xmp' },
	{ marker: JpegMarker.APP1, signature: EXTENDED_XMP_SIGNATURE, kind: 'extendedXmp' },
	{ marker: JpegMarker.APP2, signature: ICC_SIGNATURE, kind: 'icc' },
	{ marker: JpegMarker.APP2, signature: AFCP_SIGNATURE, kind: 'afcp' },
	{ marker: JpegMarker.APP13, signature: PHOTOSHOP_SIGNATURE, kind: 'photoshop' },
];

/** Markers that carry no length field. */
const isStandaloneMarker = (marker: number) => {
	return marker === JpegMarker.TEM || (marker >= 0xd0 && marker <= 0xd7) || marker === 0x00;
};

export const classifySegment = (marker: number, payload: Uint8Array): JpegSegmentKind => {
	for (const entry of SEGMENT_SIGNATURES) {
		if (entry.marker === marker && bytesStartWith(payload, entry.signature)) {
			return entry.kind;
		}
	}

	return 'other';
};

/**
 * Walks the marker segments between SOI and the first scan. Fill bytes before a marker belong to the segment that
 * follows them. The walk ends at EOI or right after the SOS header, so the entropy-coded data is the trailer.
 */
export const readJpegSegments = (data: Uint8Array): ContainerLayout<JpegSegmentTag> => {
	if (data.byteLength < 2 || data[0] !== 0xff || data[1] !== JpegMarker.SOI) {
		throw new FormatError('Not a JPEG file.', {
			format: 'jpeg',
			offset: 0,
			expected: '0xffd8',
			found: describeBytes(data.subarray(0, 2)),
		});
	}

	const segments: Block<JpegSegmentTag>[] = [];
	let pos = 2;

	while (pos < data.byteLength) {
		const offset = pos;
		if (data[pos] !== 0xff) {
			throw new UnsupportedLayoutError('Expected a marker.', {
				format: 'jpeg',
				offset,
				expected: '0xff',
				found: describeBytes(data.subarray(pos, pos + 1)),
			});
		}

		while (pos + 1 < data.byteLength && data[pos + 1] === 0xff) {
			pos++; // Fill byte
		}
		if (pos + 1 >= data.byteLength) {
			throw new UnsupportedLayoutError('File ends inside a marker.', { format: 'jpeg', offset });
		}

		const marker = data[pos + 1];
		const markerLength = pos + 2 - offset;

		if (marker === JpegMarker.EOI) {
			pos = offset;
			break;
		}

		if (isStandaloneMarker(marker)) {
			segments.push(createBlock(data, { marker, kind: 'other' }, offset, markerLength, 0));
			pos += 2;
			continue;
		}

		if (pos + 4 > data.byteLength) {
			throw new UnsupportedLayoutError('Segment length is truncated.', { format: 'jpeg', offset });
		}

		const length = (data[pos + 2] << 8) | data[pos + 3];
		if (length < 2 || pos + 2 + length > data.byteLength) {
			throw new UnsupportedLayoutError('Segment length is inconsistent with the file.', {
				format: 'jpeg',
				offset,
				expected: `between 2 and ${data.byteLength - pos - 2}`,
				found: `${length}`,
			});
		}

		const payloadStart = pos + 4;
		const payload = data.subarray(payloadStart, pos + 2 + length);
		segments.push(createBlock(
			data,
			{ marker, kind: classifySegment(marker, payload) },
			offset,
			markerLength + 2,
			length - 2,
		));
		pos += 2 + length;

		if (marker === JpegMarker.SOS) {
			break;
		}
	}

	return {
		start: 2,
		blocks: segments,
		end: pos,
	};
};
