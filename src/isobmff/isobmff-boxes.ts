/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { StructuralLimitError } from '../errors';
import type { TextField } from '../metadata';
import { assert, concatBytes, textEncoder } from '../misc';
import { BufferWriter, Writer } from '../writer';
import { MIN_BOX_HEADER_SIZE } from './isobmff-reader';

export interface Box {
	type: string;
	contents?: Uint8Array;
	children?: (Box | null)[];
	size?: number;
	largeSize?: boolean;
	/** A complete box carried over from the input, written as is. */
	raw?: Uint8Array;
}

export class IsobmffBoxWriter {
	private helper = new Uint8Array(8);
	private helperView = new DataView(this.helper.buffer);

	constructor(private writer: Writer) {}

	writeU32(value: number) {
		this.helperView.setUint32(0, value, false);
		this.writer.write(this.helper.subarray(0, 4));
	}

	writeU64(value: number) {
		this.helperView.setUint32(0, Math.floor(value / 2 ** 32), false);
		this.helperView.setUint32(4, value, false);
		this.writer.write(this.helper.subarray(0, 8));
	}

	writeAscii(text: string) {
		for (let i = 0; i < text.length; i++) {
			this.helperView.setUint8(i % 8, text.charCodeAt(i));
			if (i % 8 === 7) this.writer.write(this.helper);
		}

		if (text.length % 8 !== 0) {
			this.writer.write(this.helper.subarray(0, text.length % 8));
		}
	}

	writeBox(box: Box) {
		if (box.raw) {
			this.writer.write(box.raw);
		} else if (box.contents && !box.children) {
			this.writeBoxHeader(box, box.size ?? box.contents.byteLength + this.measureBoxHeader(box));
			this.writer.write(box.contents);
		} else {
			const startPos = this.writer.getPos();
			this.writeBoxHeader(box, 0);

			if (box.contents) this.writer.write(box.contents);
			if (box.children) for (const child of box.children) if (child) this.writeBox(child);

			const endPos = this.writer.getPos();
			const size = box.size ?? endPos - startPos;
			this.writer.seek(startPos);
			this.writeBoxHeader(box, size);
			this.writer.seek(endPos);
		}
	}

	writeBoxHeader(box: Box, size: number) {
		this.writeU32(box.largeSize ? 1 : size);
		this.writeAscii(box.type);
		if (box.largeSize) this.writeU64(size);
	}

	measureBoxHeader(box: Box) {
		return 8 + (box.largeSize ? 8 : 0);
	}
}

/** Writes a run of boxes into a new buffer. */
export const serializeBoxes = (boxes: Box[]) => {
	const writer = new BufferWriter();
	const boxWriter = new IsobmffBoxWriter(writer);
	for (const box of boxes) {
		boxWriter.writeBox(box);
	}

	return writer.finalize();
};

const bytes = /* #__PURE__ */ new Uint8Array(8);
const view = /* #__PURE__ */ new DataView(bytes.buffer);

const u8 = (value: number) => {
	return [(value % 0x100 + 0x100) % 0x100];
};

const u16 = (value: number) => {
	view.setUint16(0, value, false);
	return [bytes[0], bytes[1]];
};

const u24 = (value: number) => {
	view.setUint32(0, value, false);
	return [bytes[1], bytes[2], bytes[3]];
};

const u32 = (value: number) => {
	view.setUint32(0, value, false);
	return [bytes[0], bytes[1], bytes[2], bytes[3]];
};

const ascii = (text: string, nullTerminated = false) => {
	const result = Array.from(text, char => char.charCodeAt(0) & 0xff);
	if (nullTerminated) result.push(0x00);
	return result;
};

type NestedNumberArray = (number | NestedNumberArray)[];

const flatten = (values: NestedNumberArray, result: number[] = []) => {
	for (const value of values) {
		if (typeof value === 'number') {
			result.push(value);
		} else {
			flatten(value, result);
		}
	}

	return result;
};

export const box = (type: string, contents?: NestedNumberArray, children?: (Box | null)[]): Box => ({
	type,
	contents: contents && new Uint8Array(flatten(contents)),
	children,
});

/** A FullBox always starts with a version byte, followed by three flag bytes. */
export const fullBox = (
	type: string,
	version: number,
	flags: number,
	contents?: NestedNumberArray,
	children?: (Box | null)[],
) => box(
	type,
	[u8(version), u24(flags), contents ?? []],
	children,
);

export const rawBox = (data: Uint8Array): Box => ({ type: '', raw: data });

/** Free Space Box, zero-filled. */
export const free = (size: number): Box => {
	assert(size >= MIN_BOX_HEADER_SIZE);
	return { type: 'free', contents: new Uint8Array(size - MIN_BOX_HEADER_SIZE) };
};

/**
 * Returns the `free` box that pads a run of `length` bytes to a multiple of `pad`, or null if no padding is needed.
 * The box can't be smaller than its own header, so short gaps grow by whole multiples.
 */
export const paddingBox = (length: number, pad: number) => {
	if (pad <= 0) {
		return null;
	}

	let gap = (pad - (length % pad)) % pad;
	if (gap === 0) {
		return null;
	}

	while (gap < MIN_BOX_HEADER_SIZE) {
		gap += pad;
	}

	return free(gap);
};

/** Handler Reference Box of a metadata `meta` box. */
export const hdlr = (handlerType: string) => fullBox('hdlr', 0, 0, [
	u32(0), // Pre-defined
	ascii(handlerType), // Handler type
	ascii(handlerType === 'mdir' ? 'appl' : '\0\0\0\0'), // Reserved, by convention the manufacturer
	u32(0), // Reserved
	u32(0), // Reserved
	ascii('', true), // Name
]);

/** User Extension Box. */
export const uuid = (userType: Uint8Array, payload: Uint8Array): Box => ({
	type: 'uuid',
	contents: concatBytes([userType, payload]),
});

/** Maps each text field to the ilst item holding it. */
export const ILST_ITEM_TYPES: Record<TextField, string> = {
	title: '©nam',
	artist: '©ART',
	album: '©alb',
	albumArtist: 'aART',
	comment: '©cmt',
	genre: '©gen',
	date: '©day',
	copyright: 'cprt',
	description: '©des',
	trackNumber: 'trkn',
};

const dataStringBoxLong = (value: string) => {
	return box('data', [
		u32(1), // Type indicator (UTF-8)
		u32(0), // Locale indicator
		...textEncoder.encode(value),
	]);
};

const TRACK_NUMBER_REGEX = /^\s*(\d+)\s*(?:\/\s*(\d+)\s*)?$/;

/** Parses '3' or '3/12' into the binary `trkn` payload. */
export const trackNumberDataBox = (text: string) => {
	const match = TRACK_NUMBER_REGEX.exec(text);
	const trackNumber = match ? Number(match[1]) : NaN;
	const tracksTotal = match && match[2] !== undefined ? Number(match[2]) : 0;

	if (!(trackNumber >= 0 && trackNumber <= 0xffff && tracksTotal <= 0xffff)) {
		throw new TypeError(`Track number '${text}' must look like '3' or '3/12', with values up to 65535.`);
	}

	return box('data', [
		u32(0), // Type indicator (binary)
		u32(0), // Locale indicator
		u16(0), // Empty
		u16(trackNumber),
		u16(tracksTotal),
		u16(0), // Empty
	]);
};

export const ilstItem = (field: TextField, value: string) => box(ILST_ITEM_TYPES[field], undefined, [
	field === 'trackNumber' ? trackNumberDataBox(value) : dataStringBoxLong(value),
]);

/** Metadata Box (mdir-style, item list without keys box). */
export const meta = (handlerType: string, items: Box[]) => fullBox('meta', 0, 0, undefined, [
	hdlr(handlerType),
	box('ilst', undefined, items),
]);

/** Patches a box's 32-bit size. Fails when it doesn't fit, since widening would move everything after it. */
export const checkedCompactSize = (type: string, size: number) => {
	if (size > 0xffffffff) {
		throw new StructuralLimitError(`"${type}" box no longer fits into a 32-bit size.`, {
			format: 'isobmff',
			expected: 'at most 4294967295 bytes',
			found: `${size} bytes`,
		});
	}

	return size;
};
