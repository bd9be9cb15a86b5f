/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

// http://drang.s4.xrea.com/program/tips/id3tag/wmp/03_asf_top_level_header_object.html

export const ASF_HEADER_OBJECT_GUID = '75B22630-668E-11CF-A6D9-00AA0062CE6C';
export const ASF_FILE_PROPERTIES_OBJECT_GUID = '8CABDCA1-A947-11CF-8EE4-00C00C205365';
export const ASF_CONTENT_DESCRIPTION_OBJECT_GUID = '75B22633-668E-11CF-A6D9-00AA0062CE6C';
export const ASF_EXTENDED_CONTENT_DESCRIPTION_OBJECT_GUID = 'D2D0A440-E307-11D2-97F0-00A0C95EA850';

export const ASF_GUID_SIZE = 16;
export const ASF_OBJECT_HEADER_SIZE = 24;

/** The GUID written as plain big-endian hex, as it appears in its textual form. */
export const guidToBigEndianBytes = (guid: string) => {
	const hex = guid.replace(/-/g, '');
	if (!/^[0-9a-fA-F]{32}$/.test(hex)) {
		throw new TypeError(`Invalid GUID "${guid}".`);
	}

	const bytes = new Uint8Array(ASF_GUID_SIZE);
	for (let i = 0; i < ASF_GUID_SIZE; i++) {
		bytes[i] = parseInt(hex.slice(2 * i, 2 * i + 2), 16);
	}

	return bytes;
};

/** The GUID in ASF byte order: the first three groups are little-endian, the last two as written. */
export const guidToBytes = (guid: string) => {
	const bytes = guidToBigEndianBytes(guid);
	bytes.subarray(0, 4).reverse();
	bytes.subarray(4, 6).reverse();
	bytes.subarray(6, 8).reverse();

	return bytes;
};

/** Accepts both ASF byte order and the big-endian literal some producers write. */
export const matchesGuid = (data: Uint8Array, offset: number, guid: string) => {
	if (offset < 0 || offset + ASF_GUID_SIZE > data.byteLength) {
		return false;
	}

	const actual = data.subarray(offset, offset + ASF_GUID_SIZE);
	const equals = (expected: Uint8Array) => expected.every((byte, i) => actual[i] === byte);

	return equals(guidToBytes(guid)) || equals(guidToBigEndianBytes(guid));
};
