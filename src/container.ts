/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { toDataView } from './misc';

/**
 * One framed unit of a container (segment, chunk, page, block, object, box or element). `Tag` is the format's own
 * description of what the unit is.
 */
export interface Block<Tag> {
	tag: Tag;
	/** Absolute position of the block's first header byte. */
	offset: number;
	headerLength: number;
	payloadLength: number;
	/** Header, payload and any alignment padding that follows the payload. */
	totalLength: number;
	/** View into the original buffer covering `totalLength` bytes. */
	bytes: Uint8Array;
}

/**
 * The result of walking a container. `data[0, start)`, followed by every block in order, followed by
 * `data[end, length)` reproduces the input exactly.
 */
export interface ContainerLayout<Tag> {
	/** Length of the signature and fixed header preceding the first block. */
	start: number;
	blocks: Block<Tag>[];
	/** Position after the last block; everything from here on is opaque trailer data. */
	end: number;
}

export const createBlock = <Tag>(
	data: Uint8Array,
	tag: Tag,
	offset: number,
	headerLength: number,
	payloadLength: number,
	totalLength = headerLength + payloadLength,
): Block<Tag> => ({
	tag,
	offset,
	headerLength,
	payloadLength,
	totalLength,
	bytes: data.subarray(offset, offset + totalLength),
});

export const blockPayload = <Tag>(block: Block<Tag>) => {
	return block.bytes.subarray(block.headerLength, block.headerLength + block.payloadLength);
};

export const blockEnd = <Tag>(block: Block<Tag>) => block.offset + block.totalLength;

export const locateBlock = <Tag>(
	blocks: Block<Tag>[],
	predicate: (block: Block<Tag>, index: number) => boolean,
) => {
	const index = blocks.findIndex(predicate);
	return index === -1 ? null : index;
};

/** Replaces `data[start, end)` with `bytes`. Positions refer to the original buffer. */
export interface ByteEdit {
	start: number;
	end: number;
	bytes: Uint8Array;
}

const EMPTY = /* #__PURE__ */ new Uint8Array(0);

export const insertion = (position: number, bytes: Uint8Array): ByteEdit => ({
	start: position,
	end: position,
	bytes,
});

export const removal = (start: number, end: number): ByteEdit => ({ start, end, bytes: EMPTY });

/** One removal per block matching the predicate, not just the first. */
export const removalEdits = <Tag>(
	blocks: Block<Tag>[],
	predicate: (block: Block<Tag>, index: number) => boolean,
) => {
	return blocks
		.filter(predicate)
		.map(block => removal(block.offset, blockEnd(block)));
};

export const u32Edit = (position: number, value: number, littleEndian: boolean): ByteEdit => {
	const bytes = new Uint8Array(4);
	toDataView(bytes).setUint32(0, value, littleEndian);
	return { start: position, end: position + 4, bytes };
};

export const u64Edit = (position: number, value: number, littleEndian: boolean): ByteEdit => {
	const bytes = new Uint8Array(8);
	const view = toDataView(bytes);
	const high = Math.floor(value / 2 ** 32);
	const low = value >>> 0;

	if (littleEndian) {
		view.setUint32(0, low, true);
		view.setUint32(4, high, true);
	} else {
		view.setUint32(0, high, false);
		view.setUint32(4, low, false);
	}

	return { start: position, end: position + 8, bytes };
};

/** Insertions sort before a removal or replacement starting at the same position; ties keep their given order. */
export const sortEdits = (edits: ByteEdit[]) => {
	return [...edits].sort((a, b) => a.start - b.start || (a.end - a.start) - (b.end - b.start));
};

/**
 * Produces a new buffer in which each edit's range is replaced by its bytes. Every byte outside the edited ranges is
 * copied unchanged and in order.
 */
export const spliceBytes = (data: Uint8Array, edits: ByteEdit[]) => {
	const sorted = sortEdits(edits);

	let outputLength = data.byteLength;
	let previousEnd = 0;
	for (const edit of sorted) {
		if (edit.start < 0 || edit.end < edit.start || edit.end > data.byteLength) {
			throw new RangeError(`Edit [${edit.start}, ${edit.end}) lies outside of the ${data.byteLength}-byte buffer.`);
		}
		if (edit.start < previousEnd) {
			throw new RangeError(`Edit [${edit.start}, ${edit.end}) overlaps a previous edit ending at ${previousEnd}.`);
		}

		previousEnd = edit.end;
		outputLength += edit.bytes.byteLength - (edit.end - edit.start);
	}

	const result = new Uint8Array(outputLength);
	let readPos = 0;
	let writePos = 0;

	for (const edit of sorted) {
		result.set(data.subarray(readPos, edit.start), writePos);
		writePos += edit.start - readPos;

		result.set(edit.bytes, writePos);
		writePos += edit.bytes.byteLength;

		readPos = edit.end;
	}

	result.set(data.subarray(readPos), writePos);
	return result;
};

/** Net change in length caused by the edits. */
export const editDelta = (edits: ByteEdit[]) => {
	let delta = 0;
	for (const edit of edits) {
		delta += edit.bytes.byteLength - (edit.end - edit.start);
	}

	return delta;
};

/**
 * Translates a position in the original buffer into the output of `spliceBytes(data, edits)`. An insertion at exactly
 * `position` shifts it, since the inserted bytes land in front of whatever started there. Returns null if `position`
 * falls inside a range that gets replaced.
 */
export const mapOffset = (edits: ByteEdit[], position: number) => {
	let shift = 0;

	for (const edit of sortEdits(edits)) {
		if (edit.start === edit.end) {
			if (edit.start <= position) {
				shift += edit.bytes.byteLength;
			}
		} else if (edit.end <= position) {
			shift += edit.bytes.byteLength - (edit.end - edit.start);
		} else if (edit.start <= position) {
			return null;
		}
	}

	return position + shift;
};
