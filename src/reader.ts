/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { toDataView } from './misc';

/**
 * A cursor over a window of an in-memory file. `filePos` is always an absolute position in the file, so offsets read
 * through a slice can be handed straight to the splicer.
 */
export class FileSlice {
	/** The current absolute position in the file. */
	filePos: number;
	readonly view: DataView;

	constructor(
		/** The complete file. */
		public readonly bytes: Uint8Array,
		/** Absolute position of the first byte of this slice. */
		public readonly start: number,
		/** Absolute position one past the last byte of this slice. */
		public readonly end: number,
	) {
		if (start < 0 || end > bytes.byteLength || start > end) {
			throw new RangeError(`Invalid slice [${start}, ${end}) of a ${bytes.byteLength}-byte file.`);
		}

		this.filePos = start;
		this.view = toDataView(bytes);
	}

	static of(bytes: Uint8Array, start = 0, end = bytes.byteLength) {
		return new FileSlice(bytes, start, end);
	}

	get length() {
		return this.end - this.start;
	}

	get remainingLength() {
		return this.end - this.filePos;
	}

	skip(byteCount: number) {
		this.filePos += byteCount;
	}

	/** Creates a new slice covering `length` bytes from `filePos` without advancing this one. */
	slice(filePos: number, length = this.end - filePos) {
		return new FileSlice(this.bytes, filePos, filePos + length);
	}
}

const check = (slice: FileSlice, byteCount: number) => {
	if (slice.filePos < slice.start || slice.filePos + byteCount > slice.end) {
		throw new RangeError(
			`Tried reading ${byteCount} bytes at ${slice.filePos}, outside of [${slice.start}, ${slice.end}).`,
		);
	}
};

export const readBytes = (slice: FileSlice, length: number) => {
	check(slice, length);
	const bytes = slice.bytes.subarray(slice.filePos, slice.filePos + length);
	slice.filePos += length;
	return bytes;
};

export const readU8 = (slice: FileSlice) => {
	check(slice, 1);
	return slice.view.getUint8(slice.filePos++);
};

export const readU16 = (slice: FileSlice, littleEndian: boolean) => {
	check(slice, 2);
	const value = slice.view.getUint16(slice.filePos, littleEndian);
	slice.filePos += 2;
	return value;
};

export const readU16Be = (slice: FileSlice) => readU16(slice, false);
export const readU16Le = (slice: FileSlice) => readU16(slice, true);

export const readU24Be = (slice: FileSlice) => {
	check(slice, 3);
	const value = (slice.view.getUint16(slice.filePos, false) << 8) | slice.view.getUint8(slice.filePos + 2);
	slice.filePos += 3;
	return value;
};

export const readU32 = (slice: FileSlice, littleEndian: boolean) => {
	check(slice, 4);
	const value = slice.view.getUint32(slice.filePos, littleEndian);
	slice.filePos += 4;
	return value;
};

export const readU32Be = (slice: FileSlice) => readU32(slice, false);
export const readU32Le = (slice: FileSlice) => readU32(slice, true);

export const readU64Be = (slice: FileSlice) => {
	const high = readU32Be(slice);
	const low = readU32Be(slice);
	return high * 0x100000000 + low;
};

export const readU64Le = (slice: FileSlice) => {
	const low = readU32Le(slice);
	const high = readU32Le(slice);
	return high * 0x100000000 + low;
};

export const readAscii = (slice: FileSlice, length: number) => {
	check(slice, length);
	let str = '';

	for (let i = 0; i < length; i++) {
		str += String.fromCharCode(slice.view.getUint8(slice.filePos++));
	}

	return str;
};

