/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

const OGG_CRC_POLYNOMIAL = 0x04c11db7;

// MSB-first, zero initial value, no final XOR. Not exported; the table must never be written to.
const OGG_CRC_TABLE = /* #__PURE__ */ (() => {
	const table = new Uint32Array(256);

	for (let i = 0; i < 256; i++) {
		let crc = i << 24;
		for (let j = 0; j < 8; j++) {
			crc = (crc & 0x80000000) ? (crc << 1) ^ OGG_CRC_POLYNOMIAL : crc << 1;
		}

		table[i] = crc >>> 0;
	}

	return table;
})();

/** Computes the Ogg page checksum of `data`. The checksum field of a page must be zeroed before calling this. */
export const computeOggCrc = (data: Uint8Array) => {
	let crc = 0;

	for (let i = 0; i < data.byteLength; i++) {
		crc = ((crc << 8) ^ OGG_CRC_TABLE[((crc >>> 24) ^ data[i]) & 0xff]) >>> 0;
	}

	return crc;
};
