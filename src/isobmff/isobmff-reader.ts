/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, type ContainerLayout, createBlock } from '../container';
import { UnsupportedLayoutError } from '../errors';
import { FileSlice, readAscii, readBytes, readU32Be, readU64Be } from '../reader';

export const MIN_BOX_HEADER_SIZE = 8;
export const MAX_BOX_HEADER_SIZE = 16;
export const USER_TYPE_SIZE = 16;

/** How a box declares its size: 32-bit, 64-bit (size field 1), or "extends to the end of the file" (size field 0). */
export type BoxSizeForm = 'compact' | 'large' | 'toEnd';

export interface BoxTag {
	type: string;
	sizeForm: BoxSizeForm;
	/** The 16-byte extended type of a `uuid` box, as uppercase hex. */
	userType: string | null;
}

export type IsobmffBox = Block<BoxTag>;
export type IsobmffLayout = ContainerLayout<BoxTag>;

const LEADING_BOX_TYPES = ['ftyp', 'moov', 'mdat', 'free', 'skip', 'wide', 'pnot', 'uuid'];

/** Checks whether the file starts with a box an ISO-BMFF or QuickTime file can begin with. */
export const hasIsobmffSignature = (data: Uint8Array) => {
	return data.byteLength >= MIN_BOX_HEADER_SIZE
		&& LEADING_BOX_TYPES.includes(String.fromCharCode(data[4], data[5], data[6], data[7]));
};

const toHex = (bytes: Uint8Array) => Array.from(bytes, x => x.toString(16).padStart(2, '0')).join('').toUpperCase();

/**
 * Walks the boxes in `[start, end)`. A tail too short to hold a box header (a QuickTime terminator, stray zeros) ends
 * the walk and becomes the layout's trailer.
 */
export const readBoxes = (data: Uint8Array, start = 0, end = data.byteLength): IsobmffLayout => {
	const slice = FileSlice.of(data, start, end);
	const boxes: IsobmffBox[] = [];

	while (slice.remainingLength >= MIN_BOX_HEADER_SIZE) {
		const offset = slice.filePos;
		const size = readU32Be(slice);
		const type = readAscii(slice, 4);

		let sizeForm: BoxSizeForm = 'compact';
		let totalSize = size;
		let headerSize = MIN_BOX_HEADER_SIZE;

		if (size === 1) {
			if (slice.remainingLength < 8) {
				throw new UnsupportedLayoutError(`Box "${type}" is cut off inside its 64-bit size field.`, {
					format: 'isobmff',
					offset,
				});
			}

			sizeForm = 'large';
			totalSize = readU64Be(slice);
			headerSize = MAX_BOX_HEADER_SIZE;
		} else if (size === 0) {
			sizeForm = 'toEnd';
			totalSize = end - offset;
		}

		if (totalSize < headerSize || offset + totalSize > end) {
			throw new UnsupportedLayoutError(`Box "${type}" has an invalid size.`, {
				format: 'isobmff',
				offset,
				expected: `between ${headerSize} and ${end - offset} bytes`,
				found: `${totalSize} bytes`,
			});
		}

		let userType: string | null = null;
		if (type === 'uuid' && totalSize - headerSize >= USER_TYPE_SIZE) {
			userType = toHex(readBytes(slice, USER_TYPE_SIZE));
		}

		boxes.push(createBlock(data, { type, sizeForm, userType }, offset, headerSize, totalSize - headerSize));
		slice.filePos = offset + totalSize;
	}

	return { start, blocks: boxes, end: slice.filePos };
};

/** Parses the children of a container box. `skip` covers any fields that precede them, like a FullBox's version. */
export const readChildBoxes = (data: Uint8Array, parent: IsobmffBox, skip = 0) => {
	return readBoxes(data, parent.offset + parent.headerLength + skip, parent.offset + parent.totalLength);
};

export const findBox = (layout: IsobmffLayout, type: string) => {
	return layout.blocks.find(box => box.tag.type === type) ?? null;
};

/**
 * Finds the box at the end of a path of container boxes, returning null when any link is missing. Only plain
 * container boxes may appear along the way.
 */
export const findBoxPath = (data: Uint8Array, layout: IsobmffLayout, path: string[]): IsobmffBox | null => {
	let result = findBox(layout, path[0]);

	for (const type of path.slice(1)) {
		if (!result) {
			return null;
		}

		result = findBox(readChildBoxes(data, result), type);
	}

	return result;
};

/**
 * The `meta` box is a FullBox in ISO files but a plain container in older QuickTime files. Tells the two apart by
 * whether a box type can be found where the first child would be.
 */
export const metaChildrenOffset = (data: Uint8Array, meta: IsobmffBox) => {
	const payload = meta.offset + meta.headerLength;
	const looksLikeChild = payload + 8 <= meta.offset + meta.totalLength
		&& /^[\x20-\x7e\xa9]{4}$/.test(String.fromCharCode(...data.subarray(payload + 4, payload + 8)));

	return looksLikeChild ? 0 : 4;
};
