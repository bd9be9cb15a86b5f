/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { StructuralLimitError } from '../errors';
import { concatBytes, textDecoder, textEncoder, toDataView } from '../misc';
import { FileSlice, readAscii, readBytes, readU16Be, readU32Be, readU8 } from '../reader';
import { BufferWriter } from '../writer';
import {
	AFCP_SIGNATURE,
	EXTENDED_XMP_SIGNATURE,
	ICC_SIGNATURE,
	JFIF_SIGNATURE,
	JpegMarker,
	PHOTOSHOP_SIGNATURE,
	XMP_SIGNATURE,
} from './jpeg-reader';

/** The length field counts itself, so this much payload fits in a segment. */
export const MAX_SEGMENT_PAYLOAD_SIZE = 0xffff - 2;
export const ICC_CHUNK_SIZE = 65504;
export const MAX_ICC_CHUNK_COUNT = 255;

const PHOTOSHOP_RESOURCE_SIGNATURE = '8BIM';

export const createJpegSegment = (marker: number, payload: Uint8Array) => {
	if (payload.byteLength > MAX_SEGMENT_PAYLOAD_SIZE) {
		throw new StructuralLimitError(`APP${marker - JpegMarker.APP0} segment payload is too large.`, {
			format: 'jpeg',
			expected: `at most ${MAX_SEGMENT_PAYLOAD_SIZE} bytes`,
			found: `${payload.byteLength} bytes`,
		});
	}

	const segment = new Uint8Array(4 + payload.byteLength);
	const view = toDataView(segment);
	view.setUint8(0, 0xff);
	view.setUint8(1, marker);
	view.setUint16(2, payload.byteLength + 2, false);
	segment.set(payload, 4);

	return segment;
};

export enum JfifUnits {
	NONE = 0,
	INCHES = 1,
	CENTIMETERS = 2,
}

export interface JfifInfo {
	majorVersion: number;
	minorVersion: number;
	units: JfifUnits;
	xDensity: number;
	yDensity: number;
	/** Thumbnail dimensions and RGB data, carried over as stored. */
	thumbnail: Uint8Array;
}

export const DEFAULT_JFIF_INFO: Readonly<JfifInfo> = {
	majorVersion: 1,
	minorVersion: 1,
	units: JfifUnits.INCHES,
	xDensity: 72,
	yDensity: 72,
	thumbnail: /* #__PURE__ */ new Uint8Array(2),
};

export const readJfifInfo = (payload: Uint8Array): JfifInfo | null => {
	if (payload.byteLength < JFIF_SIGNATURE.byteLength + 9) {
		return null;
	}

	const slice = FileSlice.of(payload, JFIF_SIGNATURE.byteLength);
	const majorVersion = readU8(slice);
	const minorVersion = readU8(slice);
	const units = readU8(slice);
	const xDensity = readU16Be(slice);
	const yDensity = readU16Be(slice);
	if (units > JfifUnits.CENTIMETERS) {
		return null;
	}

	return {
		majorVersion,
		minorVersion,
		units,
		xDensity,
		yDensity,
		thumbnail: readBytes(slice, slice.remainingLength),
	};
};

export const createJfifSegment = (info: JfifInfo) => {
	const fixed = new Uint8Array(7);
	const view = toDataView(fixed);
	view.setUint8(0, info.majorVersion);
	view.setUint8(1, info.minorVersion);
	view.setUint8(2, info.units);
	view.setUint16(3, info.xDensity, false);
	view.setUint16(5, info.yDensity, false);

	return createJpegSegment(JpegMarker.APP0, concatBytes([JFIF_SIGNATURE, fixed, info.thumbnail]));
};

export const createXmpSegment = (packet: Uint8Array) => {
	return createJpegSegment(JpegMarker.APP1, concatBytes([XMP_SIGNATURE, packet]));
};

export interface ExtendedXmpChunk {
	/** Hex MD5 of the whole extended packet, shared by all of its chunks. */
	guid: string;
	fullLength: number;
	offset: number;
	data: Uint8Array;
}

const EXTENDED_XMP_HEADER_SIZE = EXTENDED_XMP_SIGNATURE.byteLength + 32 + 4 + 4;

export const readExtendedXmpChunk = (payload: Uint8Array): ExtendedXmpChunk | null => {
	if (payload.byteLength < EXTENDED_XMP_HEADER_SIZE) {
		return null;
	}

	const slice = FileSlice.of(payload, EXTENDED_XMP_SIGNATURE.byteLength);
	const guid = readAscii(slice, 32);
	const fullLength = readU32Be(slice);
	const offset = readU32Be(slice);
	const data = readBytes(slice, slice.remainingLength);
	if (offset + data.byteLength > fullLength) {
		return null;
	}

	return { guid, fullLength, offset, data };
};

/** Joins the chunks of each extended packet by offset. Returns null if a packet has gaps or overlaps. */
export const assembleExtendedXmp = (chunks: ExtendedXmpChunk[]) => {
	const packets: Uint8Array[] = [];
	const guids = [...new Set(chunks.map(chunk => chunk.guid))];

	for (const guid of guids) {
		const parts = chunks
			.filter(chunk => chunk.guid === guid)
			.sort((a, b) => a.offset - b.offset);

		let position = 0;
		for (const part of parts) {
			if (part.offset !== position || part.fullLength !== parts[0].fullLength) {
				return null;
			}
			position += part.data.byteLength;
		}
		if (position !== parts[0].fullLength) {
			return null;
		}

		packets.push(concatBytes(parts.map(part => part.data)));
	}

	return packets;
};

/** Splits a profile into numbered APP2 chunks. */
export const createIccSegments = (profile: Uint8Array) => {
	const chunkCount = Math.ceil(profile.byteLength / ICC_CHUNK_SIZE);
	if (chunkCount > MAX_ICC_CHUNK_COUNT) {
		throw new StructuralLimitError('ICC profile needs too many chunks.', {
			format: 'jpeg',
			expected: `at most ${MAX_ICC_CHUNK_COUNT} chunks`,
			found: `${chunkCount} chunks`,
		});
	}

	const segments: Uint8Array[] = [];
	for (let i = 0; i < chunkCount; i++) {
		const chunk = profile.subarray(i * ICC_CHUNK_SIZE, (i + 1) * ICC_CHUNK_SIZE);
		segments.push(createJpegSegment(
			JpegMarker.APP2,
			concatBytes([ICC_SIGNATURE, new Uint8Array([i + 1, chunkCount]), chunk]),
		));
	}

	return segments;
};

/** Image resource signatures Photoshop and older Adobe tools wrote. Only 8BIM resources are ever replaced. */
export const PHOTOSHOP_RESOURCE_SIGNATURES = [PHOTOSHOP_RESOURCE_SIGNATURE, 'MeSa', 'PHUT', 'AgHg', 'DCSR'];

export interface PhotoshopResource {
	signature: string;
	id: number;
	/** The complete resource block as stored, including its padding. */
	raw: Uint8Array;
}

/**
 * Splits the resource blocks of an APP13 payload. Zero bytes after the last block are fill. Returns null if anything
 * else follows, including a resource that runs past the segment and continues in the next one.
 */
export const readPhotoshopResources = (payload: Uint8Array): PhotoshopResource[] | null => {
	const slice = FileSlice.of(payload, PHOTOSHOP_SIGNATURE.byteLength);
	const resources: PhotoshopResource[] = [];

	while (slice.remainingLength > 0) {
		const start = slice.filePos;
		if (payload.subarray(start).every(x => x === 0)) {
			break;
		}
		if (slice.remainingLength < 12) return null;

		const signature = readAscii(slice, 4);
		if (!PHOTOSHOP_RESOURCE_SIGNATURES.includes(signature)) return null;

		const id = readU16Be(slice);
		const nameLength = readU8(slice);
		const namePadded = nameLength + ((nameLength + 1) % 2); // Length byte plus name is even
		if (slice.remainingLength < namePadded + 4) return null;
		slice.skip(namePadded);

		const size = readU32Be(slice);
		const sizePadded = size + (size % 2);
		if (slice.remainingLength < size) return null;
		slice.skip(Math.min(sizePadded, slice.remainingLength));

		resources.push({ signature, id, raw: payload.subarray(start, slice.filePos) });
	}

	return resources;
};

/** Builds a resource with an empty name. */
export const createPhotoshopResource = (id: number, data: Uint8Array): PhotoshopResource => {
	const writer = new BufferWriter();
	const header = new Uint8Array(12);
	const view = toDataView(header);

	header.set(textEncoder.encode(PHOTOSHOP_RESOURCE_SIGNATURE), 0);
	view.setUint16(4, id, false);
	// Bytes 6 and 7: the empty name, padded to an even length
	view.setUint32(8, data.byteLength, false);

	writer.write(header);
	writer.write(data);
	if (data.byteLength % 2 !== 0) {
		writer.write(new Uint8Array(1));
	}

	return { signature: PHOTOSHOP_RESOURCE_SIGNATURE, id, raw: writer.finalize() };
};

export const createPhotoshopSegment = (resources: PhotoshopResource[]) => {
	return createJpegSegment(
		JpegMarker.APP13,
		concatBytes([PHOTOSHOP_SIGNATURE, ...resources.map(resource => resource.raw)]),
	);
};

export interface AfcpEntry {
	name: string;
	value: Uint8Array;
}

const AFCP_HEADER_SIZE = AFCP_SIGNATURE.byteLength + 4;

/** Reads the name/value entries following the AFCP header. Returns null if they don't parse cleanly. */
export const readAfcpEntries = (payload: Uint8Array): AfcpEntry[] | null => {
	if (payload.byteLength < AFCP_HEADER_SIZE) {
		return null;
	}

	const slice = FileSlice.of(payload, AFCP_HEADER_SIZE);
	const entries: AfcpEntry[] = [];

	while (slice.remainingLength > 0) {
		if (slice.remainingLength < 2) return null;
		const nameLength = readU16Be(slice);
		if (slice.remainingLength < nameLength + 4) return null;
		const name = textDecoder.decode(readBytes(slice, nameLength));
		const valueLength = readU32Be(slice);
		if (slice.remainingLength < valueLength) return null;

		entries.push({ name, value: readBytes(slice, valueLength) });
	}

	return entries;
};

export const createAfcpSegment = (entries: AfcpEntry[]) => {
	const writer = new BufferWriter();
	writer.write(AFCP_SIGNATURE);
	writer.write(new Uint8Array(4));

	for (const entry of entries) {
		const name = textEncoder.encode(entry.name);
		const nameLength = new Uint8Array(2);
		toDataView(nameLength).setUint16(0, name.byteLength, false);
		const valueLength = new Uint8Array(4);
		toDataView(valueLength).setUint32(0, entry.value.byteLength, false);

		writer.write(nameLength);
		writer.write(name);
		writer.write(valueLength);
		writer.write(entry.value);
	}

	return createJpegSegment(JpegMarker.APP2, writer.finalize());
};
