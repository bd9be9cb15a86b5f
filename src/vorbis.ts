/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { TEXT_FIELDS, type TextField, type TextFields } from './metadata';
import { concatBytes, textDecoder, textEncoder, toDataView } from './misc';

// https://datatracker.ietf.org/doc/html/rfc7845#section-5.2
// https://xiph.org/vorbis/doc/v-comment.html

export const VORBIS_FIELD_NAMES: Record<TextField, string> = {
	title: 'TITLE',
	artist: 'ARTIST',
	album: 'ALBUM',
	albumArtist: 'ALBUMARTIST',
	comment: 'COMMENT',
	genre: 'GENRE',
	date: 'DATE',
	copyright: 'COPYRIGHT',
	description: 'DESCRIPTION',
	trackNumber: 'TRACKNUMBER',
};

export interface VorbisComment {
	/** Upper-cased field name, or the whole comment if it has no `=`. */
	key: string;
	/** The comment exactly as stored, without its length prefix. */
	raw: Uint8Array;
}

export interface VorbisCommentList {
	vendor: Uint8Array;
	comments: VorbisComment[];
	/** Number of bytes the vendor string and the comment list took up. */
	byteLength: number;
}

/** Parses a comment list starting at the vendor length. Returns null if a length points past the end of `bytes`. */
export const readVorbisComments = (bytes: Uint8Array): VorbisCommentList | null => {
	const view = toDataView(bytes);
	let pos = 0;

	if (pos + 4 > bytes.byteLength) return null;
	const vendorLength = view.getUint32(pos, true);
	pos += 4;

	if (pos + vendorLength > bytes.byteLength) return null;
	const vendor = bytes.subarray(pos, pos + vendorLength);
	pos += vendorLength;

	if (pos + 4 > bytes.byteLength) return null;
	const listLength = view.getUint32(pos, true);
	pos += 4;

	const comments: VorbisComment[] = [];
	for (let i = 0; i < listLength; i++) {
		if (pos + 4 > bytes.byteLength) return null;
		const length = view.getUint32(pos, true);
		pos += 4;

		if (pos + length > bytes.byteLength) return null;
		const raw = bytes.subarray(pos, pos + length);
		pos += length;

		const string = textDecoder.decode(raw);
		const separatorIndex = string.indexOf('=');
		const key = (separatorIndex === -1 ? string : string.slice(0, separatorIndex)).toUpperCase();

		comments.push({ key, raw });
	}

	return { vendor, comments, byteLength: pos };
};

/**
 * Returns the comments to store: every existing comment whose field isn't being set, in its original order, followed
 * by one `NAME=value` comment per field.
 */
export const mergeVorbisComments = (existing: VorbisComment[], fields: TextFields) => {
	const replacedKeys = new Set<string>();
	for (const field of TEXT_FIELDS) {
		if (fields[field] !== undefined) {
			replacedKeys.add(VORBIS_FIELD_NAMES[field]);
		}
	}

	const result: Uint8Array[] = existing
		.filter(comment => !replacedKeys.has(comment.key))
		.map(comment => comment.raw);

	for (const field of TEXT_FIELDS) {
		const value = fields[field];
		if (value !== undefined) {
			result.push(textEncoder.encode(`${VORBIS_FIELD_NAMES[field]}=${value}`));
		}
	}

	return result;
};

/**
 * Creates a comment header: the codec-specific packet signature (may be empty, as in FLAC), the vendor string, the
 * comment list and, for Vorbis, the framing bit.
 */
export const createVorbisComments = (
	headerBytes: Uint8Array,
	vendor: Uint8Array,
	comments: Uint8Array[],
	framingBit: boolean,
) => {
	const parts: Uint8Array[] = [headerBytes];

	let currentBuffer = new Uint8Array(4 + vendor.byteLength);
	let currentView = toDataView(currentBuffer);
	currentView.setUint32(0, vendor.byteLength, true);
	currentBuffer.set(vendor, 4);
	parts.push(currentBuffer);

	currentBuffer = new Uint8Array(4);
	toDataView(currentBuffer).setUint32(0, comments.length, true);
	parts.push(currentBuffer);

	for (const comment of comments) {
		currentBuffer = new Uint8Array(4 + comment.byteLength);
		currentView = toDataView(currentBuffer);
		currentView.setUint32(0, comment.byteLength, true);
		currentBuffer.set(comment, 4);
		parts.push(currentBuffer);
	}

	if (framingBit) {
		parts.push(new Uint8Array([0x01]));
	}

	return concatBytes(parts);
};
