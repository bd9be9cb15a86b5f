/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, type ContainerLayout, createBlock } from '../container';
import { UnsupportedLayoutError } from '../errors';
import { assertNever, describeBytes, textDecoder, textEncoder } from '../misc';
import { FileSlice, readBytes, readU8 } from '../reader';
import { BufferWriter, Writer } from '../writer';

export interface EBMLElement {
	id: number;
	/** Width of the size field of a master element. Defaults to 4. */
	size?: number;
	data:
		| number
		| string
		| Uint8Array
		| EBMLUnicodeString
		| (EBML | null)[];
}

export type EBML = EBMLElement | Uint8Array | (EBML | null)[];

export class EBMLUnicodeString {
	constructor(public value: string) {}
}

/** Defines the EBML IDs touched when rewriting Matroska tags. */
export enum EBMLId {
	Segment = 0x18538067,
	SeekHead = 0x114d9b74,
	Seek = 0x4dbb,
	SeekID = 0x53ab,
	SeekPosition = 0x53ac,
	Cluster = 0x1f43b675,
	Cues = 0x1c53bb6b,
	CuePoint = 0xbb,
	CueTrackPositions = 0xb7,
	CueClusterPosition = 0xf1,
	Tags = 0x1254c367,
	Tag = 0x7373,
	Targets = 0x63c0,
	SimpleTag = 0x67c8,
	TagName = 0x45a3,
	TagString = 0x4487,
}

export const MAX_ID_WIDTH = 4;
export const MAX_VAR_INT_SIZE = 8;
export const MIN_HEADER_SIZE = 2; // 1-byte ID and 1-byte size

export const measureUnsignedInt = (value: number) => {
	let width = 1;
	while (width < 8 && value >= 2 ** (8 * width)) {
		width++;
	}

	return width;
};

/** Largest value a size field of the given width can hold. All bits set is reserved for "unknown". */
export const maxVarIntValue = (width: number) => 2 ** (7 * width) - 2;

export const measureVarInt = (value: number) => {
	for (let width = 1; width <= MAX_VAR_INT_SIZE; width++) {
		if (value <= maxVarIntValue(width)) {
			return width;
		}
	}

	throw new RangeError(`EBML varint size not supported: ${value}.`);
};

export class EBMLWriter {
	helper = new Uint8Array(8);
	helperView = new DataView(this.helper.buffer);

	constructor(private writer: Writer) {}

	writeByte(value: number) {
		this.helperView.setUint8(0, value);
		this.writer.write(this.helper.subarray(0, 1));
	}

	writeUnsignedInt(value: number, width = measureUnsignedInt(value)) {
		if (width < 1 || width > 8) {
			throw new RangeError(`Bad unsigned int size ${width}.`);
		}

		// Division instead of shifts, since bitwise operators work on 32 bits only
		for (let i = 0; i < width; i++) {
			this.helperView.setUint8(i, Math.floor(value / 2 ** (8 * (width - 1 - i))) & 0xff);
		}

		this.writer.write(this.helper.subarray(0, width));
	}

	writeVarInt(value: number, width = measureVarInt(value)) {
		if (width < 1 || width > MAX_VAR_INT_SIZE || value < 0 || value > maxVarIntValue(width)) {
			throw new RangeError(`${value} can't be written as an EBML varint of width ${width}.`);
		}

		for (let i = 0; i < width; i++) {
			this.helperView.setUint8(i, Math.floor(value / 2 ** (8 * (width - 1 - i))) & 0xff);
		}
		// Length marker
		this.helper[0] |= 1 << (8 - width);

		this.writer.write(this.helper.subarray(0, width));
	}

	writeAsciiString(str: string) {
		this.writer.write(new Uint8Array(str.split('').map(x => x.charCodeAt(0))));
	}

	writeEBML(data: EBML | null) {
		if (data === null) return;

		if (data instanceof Uint8Array) {
			this.writer.write(data);
		} else if (Array.isArray(data)) {
			for (const elem of data) {
				this.writeEBML(elem);
			}
		} else {
			this.writeUnsignedInt(data.id); // ID field

			if (Array.isArray(data.data)) {
				const sizePos = this.writer.getPos();
				const sizeSize = data.size ?? 4;
				this.writer.seek(this.writer.getPos() + sizeSize);

				const startPos = this.writer.getPos();
				this.writeEBML(data.data);

				const size = this.writer.getPos() - startPos;
				const endPos = this.writer.getPos();
				this.writer.seek(sizePos);
				this.writeVarInt(size, sizeSize);
				this.writer.seek(endPos);
			} else if (typeof data.data === 'number') {
				const size = measureUnsignedInt(data.data);
				this.writeVarInt(size);
				this.writeUnsignedInt(data.data, size);
			} else if (typeof data.data === 'string') {
				this.writeVarInt(data.data.length);
				this.writeAsciiString(data.data);
			} else if (data.data instanceof Uint8Array) {
				this.writeVarInt(data.data.byteLength);
				this.writer.write(data.data);
			} else if (data.data instanceof EBMLUnicodeString) {
				const bytes = textEncoder.encode(data.data.value);
				this.writeVarInt(bytes.length);
				this.writer.write(bytes);
			} else {
				assertNever(data.data);
			}
		}
	}
}

export const serializeEBML = (data: EBML) => {
	const writer = new BufferWriter();
	new EBMLWriter(writer).writeEBML(data);
	return writer.finalize();
};

export const encodeVarInt = (value: number, width: number) => {
	const writer = new BufferWriter(MAX_VAR_INT_SIZE);
	new EBMLWriter(writer).writeVarInt(value, width);
	return writer.finalize();
};

export const encodeUnsignedInt = (value: number, width: number) => {
	const writer = new BufferWriter(MAX_VAR_INT_SIZE);
	new EBMLWriter(writer).writeUnsignedInt(value, width);
	return writer.finalize();
};

/** Width of a varint as given by the position of the first set bit, or null for a zero first byte. */
export const varIntWidth = (firstByte: number) => {
	if (firstByte === 0) {
		return null; // Invalid VINT
	}

	let width = 1;
	let mask = 0x80;
	while ((firstByte & mask) === 0) {
		width++;
		mask >>= 1;
	}

	return width;
};

export const readUnsignedInt = (slice: FileSlice, width: number) => {
	let value = 0;

	// Read bytes from most significant to least significant
	for (let i = 0; i < width; i++) {
		value *= 1 << 8;
		value += readU8(slice);
	}

	return value;
};

export interface EBMLElementHeader {
	id: number;
	idWidth: number;
	/** The declared payload size, or null for the "unknown" sentinel. */
	size: number | null;
	sizeWidth: number;
}

/** Reads an element header, returning null if the bytes don't form one. */
export const readElementHeader = (slice: FileSlice): EBMLElementHeader | null => {
	if (slice.remainingLength < MIN_HEADER_SIZE) {
		return null;
	}

	const idWidth = varIntWidth(slice.bytes[slice.filePos]);
	if (idWidth === null || idWidth > MAX_ID_WIDTH || slice.remainingLength < idWidth + 1) {
		return null;
	}
	const id = readUnsignedInt(slice, idWidth);

	const firstSizeByte = slice.bytes[slice.filePos];
	const sizeWidth = varIntWidth(firstSizeByte);
	if (sizeWidth === null || slice.remainingLength < sizeWidth) {
		return null;
	}

	const marker = 1 << (8 - sizeWidth);
	let size = firstSizeByte & (marker - 1);
	let allOnes = size === marker - 1;
	slice.skip(1);

	for (let i = 1; i < sizeWidth; i++) {
		const byte = readU8(slice);
		size = size * 256 + byte;
		allOnes &&= byte === 0xff;
	}

	return { id, idWidth, size: allOnes ? null : size, sizeWidth };
};

export interface EBMLTag {
	id: number;
	idWidth: number;
	sizeWidth: number;
	/** Whether the element declared the "unknown" size and was taken to run to the end of its parent. */
	unknownSize: boolean;
}

export type EBMLBlock = Block<EBMLTag>;

/**
 * Walks the sibling elements in `[start, end)`. An element of unknown size is taken to run to the end of the range,
 * which ends the walk. A tail shorter than an element header becomes the layout's trailer.
 */
export const readEbmlElements = (data: Uint8Array, start: number, end: number): ContainerLayout<EBMLTag> => {
	const slice = FileSlice.of(data, start, end);
	const elements: EBMLBlock[] = [];

	while (slice.remainingLength >= MIN_HEADER_SIZE) {
		const offset = slice.filePos;
		const header = readElementHeader(slice);
		if (!header) {
			throw new UnsupportedLayoutError('Invalid EBML element header.', {
				format: 'matroska',
				offset,
				expected: 'an element ID of at most 4 bytes and a size of at most 8 bytes',
				found: describeBytes(data.subarray(offset, Math.min(offset + 4, end))),
			});
		}

		const headerLength = slice.filePos - offset;
		const size = header.size ?? end - slice.filePos;
		if (size > slice.remainingLength) {
			throw new UnsupportedLayoutError(`Element 0x${header.id.toString(16)} runs past its parent.`, {
				format: 'matroska',
				offset,
				expected: `at most ${slice.remainingLength} bytes`,
				found: `${size} bytes`,
			});
		}

		elements.push(createBlock(data, {
			id: header.id,
			idWidth: header.idWidth,
			sizeWidth: header.sizeWidth,
			unknownSize: header.size === null,
		}, offset, headerLength, size));
		slice.skip(size);
	}

	return { start, blocks: elements, end: slice.filePos };
};

/** Parses the children of a master element. */
export const readChildElements = (data: Uint8Array, parent: EBMLBlock) => {
	return readEbmlElements(data, parent.offset + parent.headerLength, parent.offset + parent.totalLength);
};

export const readUnicodeString = (slice: FileSlice, length: number) => {
	const bytes = readBytes(slice, length);

	// Actual string length might be shorter due to null terminators
	let strLength = 0;
	while (strLength < length && bytes[strLength] !== 0) {
		strLength += 1;
	}

	return textDecoder.decode(bytes.subarray(0, strLength));
};
