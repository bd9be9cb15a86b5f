/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export function assert(x: unknown): asserts x {
	if (!x) {
		throw new Error('Assertion failed.');
	}
}

export const assertNever = (x: never): never => {
	throw new Error(`Unexpected value: ${String(x)}`);
};

export const textEncoder = /* #__PURE__ */ new TextEncoder();
export const textDecoder = /* #__PURE__ */ new TextDecoder();
export const utf16LeDecoder = /* #__PURE__ */ new TextDecoder('utf-16le');

export const toDataView = (source: Uint8Array) => {
	return new DataView(source.buffer, source.byteOffset, source.byteLength);
};

export const last = <T>(arr: T[]) => {
	return arr && arr[arr.length - 1];
};

export const isIso88591Compatible = (text: string) => {
	for (let i = 0; i < text.length; i++) {
		const code = text.charCodeAt(i);
		if (code > 255) {
			return false;
		}
	}

	return true;
};

export const concatBytes = (parts: Uint8Array[]) => {
	let totalLength = 0;
	for (const part of parts) {
		totalLength += part.byteLength;
	}

	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const part of parts) {
		result.set(part, offset);
		offset += part.byteLength;
	}

	return result;
};

export const bytesEqual = (a: Uint8Array, b: Uint8Array) => {
	if (a.byteLength !== b.byteLength) {
		return false;
	}

	for (let i = 0; i < a.byteLength; i++) {
		if (a[i] !== b[i]) {
			return false;
		}
	}

	return true;
};

/** Checks whether `data` contains `pattern` starting at `offset`. */
export const bytesStartWith = (data: Uint8Array, pattern: Uint8Array, offset = 0) => {
	if (offset < 0 || offset + pattern.byteLength > data.byteLength) {
		return false;
	}

	for (let i = 0; i < pattern.byteLength; i++) {
		if (data[offset + i] !== pattern[i]) {
			return false;
		}
	}

	return true;
};

export const asciiBytes = (text: string) => {
	const bytes = new Uint8Array(text.length);
	for (let i = 0; i < text.length; i++) {
		bytes[i] = text.charCodeAt(i) & 0xff;
	}

	return bytes;
};

export const latin1Bytes = asciiBytes;

/** Encodes a string as UTF-16LE, optionally followed by a two-byte terminator. */
export const utf16LeBytes = (text: string, nullTerminated = false) => {
	const bytes = new Uint8Array(2 * text.length + (nullTerminated ? 2 : 0));
	const view = toDataView(bytes);
	for (let i = 0; i < text.length; i++) {
		view.setUint16(2 * i, text.charCodeAt(i), true);
	}

	return bytes;
};

/** Encodes a string as UTF-16 with a little-endian byte order mark. */
export const utf16WithBomBytes = (text: string, nullTerminated = false) => {
	return concatBytes([new Uint8Array([0xff, 0xfe]), utf16LeBytes(text, nullTerminated)]);
};

export const decodeUtf16Le = (bytes: Uint8Array) => {
	let length = bytes.byteLength - (bytes.byteLength % 2);
	while (length >= 2 && bytes[length - 1] === 0 && bytes[length - 2] === 0) {
		length -= 2;
	}

	return utf16LeDecoder.decode(bytes.subarray(0, length));
};

/** Renders a few bytes for an error message: quoted if printable ASCII, hex otherwise. */
export const describeBytes = (bytes: Uint8Array) => {
	if (bytes.byteLength > 0 && bytes.every(byte => byte >= 0x20 && byte < 0x7f)) {
		return `"${String.fromCharCode(...bytes)}"`;
	}

	return bytes.byteLength === 0
		? 'end of file'
		: '0x' + Array.from(bytes, byte => byte.toString(16).padStart(2, '0')).join('');
};
