/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

// Fixed- and variable-width size encodings shared by the codecs. The EBML varint lives in matroska/ebml.ts.

/** Largest value a 32-bit synchsafe integer (four 7-bit groups) can hold. */
export const MAX_SYNCHSAFE_VALUE = 2 ** 28 - 1;

/** Largest block length a FLAC metadata block header can declare. */
export const MAX_UINT24_VALUE = 0xffffff;

/** An Ogg page holds at most this many lacing values. */
export const MAX_OGG_LACING_VALUES = 255;

export const encodeSynchsafe = (value: number) => {
	if (!Number.isInteger(value) || value < 0 || value > MAX_SYNCHSAFE_VALUE) {
		throw new RangeError(`${value} can't be represented as a synchsafe integer.`);
	}

	return ((value & 0x0fe00000) << 3)
		| ((value & 0x001fc000) << 2)
		| ((value & 0x00003f80) << 1)
		| (value & 0x0000007f);
};

export const decodeSynchsafe = (synchsafed: number) => {
	let mask = 0x7f000000;
	let unsynchsafed = 0;

	while (mask !== 0) {
		unsynchsafed >>= 1;
		unsynchsafed |= synchsafed & mask;
		mask >>= 8;
	}

	return unsynchsafed;
};

/** Checks that none of the four bytes has its top bit set. */
export const isSynchsafe = (value: number) => (value & 0x80808080) === 0;

export const getUint24 = (view: DataView, byteOffset: number, littleEndian: boolean) => {
	const byte1 = view.getUint8(byteOffset);
	const byte2 = view.getUint8(byteOffset + 1);
	const byte3 = view.getUint8(byteOffset + 2);

	if (littleEndian) {
		return byte1 | (byte2 << 8) | (byte3 << 16);
	} else {
		return (byte1 << 16) | (byte2 << 8) | byte3;
	}
};

export const setUint24 = (view: DataView, byteOffset: number, value: number, littleEndian: boolean) => {
	if (!Number.isInteger(value) || value < 0 || value > MAX_UINT24_VALUE) {
		throw new RangeError(`${value} doesn't fit into 24 bits.`);
	}

	if (littleEndian) {
		view.setUint8(byteOffset, value & 0xff);
		view.setUint8(byteOffset + 1, (value >> 8) & 0xff);
		view.setUint8(byteOffset + 2, (value >> 16) & 0xff);
	} else {
		view.setUint8(byteOffset, (value >> 16) & 0xff);
		view.setUint8(byteOffset + 1, (value >> 8) & 0xff);
		view.setUint8(byteOffset + 2, value & 0xff);
	}
};

/**
 * Builds the lacing values for a packet of the given length. A value of 255 means the packet continues, so a packet
 * whose length is a multiple of 255 (including the empty packet) is closed off with an explicit 0.
 */
export const buildOggLacing = (packetLength: number) => {
	if (!Number.isInteger(packetLength) || packetLength < 0) {
		throw new RangeError(`Invalid packet length ${packetLength}.`);
	}

	const lacing: number[] = [];
	let remaining = packetLength;

	while (remaining >= 255) {
		lacing.push(255);
		remaining -= 255;
	}

	lacing.push(remaining);
	return lacing;
};

/**
 * Splits a lacing table after the first packet that ends within it. Returns null if every value is 255, meaning the
 * first packet continues on the next page.
 */
export const splitOggLacing = (lacing: ArrayLike<number>) => {
	for (let i = 0; i < lacing.length; i++) {
		if (lacing[i] < 255) {
			const head = Array.from(lacing).slice(0, i + 1);
			const tail = Array.from(lacing).slice(i + 1);
			return {
				head,
				tail,
				packetLength: head.reduce((a, b) => a + b, 0),
			};
		}
	}

	return null;
};
