/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, blockPayload, insertion, spliceBytes } from '../container';
import { FormatError, NoWritableTagsError } from '../errors';
import { hasTextFields, type MetadataRequest, resolveTextFields, TEXT_FIELDS, type TextField } from '../metadata';
import { describeBytes } from '../misc';
import { type Id3FrameTag, Id3V2TextEncoding, type Id3Version, readId3Tag } from './id3-reader';
import { createId3Tag, type Id3NewFrame } from './id3-writer';

const MP3_NAMESPACES = ['ID3', 'ID3v2', 'MP3', 'Audio:MP3'];

const TEXT_FRAME_IDS: Partial<Record<TextField, string>> = {
	title: 'TIT2',
	artist: 'TPE1',
	album: 'TALB',
	albumArtist: 'TPE2',
	genre: 'TCON',
	trackNumber: 'TRCK',
	copyright: 'TCOP',
};

const dateFrameId = (version: Id3Version) => version === 4 ? 'TDRC' : 'TYER';

/** True for a COMM frame with an empty description, the one plain comment a tag usually carries. */
const isPlainComment = (frame: Block<Id3FrameTag>) => {
	if (frame.tag.id !== 'COMM') {
		return false;
	}

	const payload = blockPayload(frame);
	const encoding = payload[0];
	let pos = 4; // Encoding and language

	if (encoding === Id3V2TextEncoding.UTF_16_WITH_BOM || encoding === Id3V2TextEncoding.UTF_16_BE_NO_BOM) {
		if ((payload[pos] === 0xff && payload[pos + 1] === 0xfe) || (payload[pos] === 0xfe && payload[pos + 1] === 0xff)) {
			pos += 2;
		}
		return payload[pos] === 0 && payload[pos + 1] === 0;
	}

	return payload[pos] === 0;
};

const isMpegFrameSync = (data: Uint8Array) => data.byteLength >= 2 && data[0] === 0xff && (data[1] & 0xe0) === 0xe0;

/**
 * Rebuilds the ID3v2 tag at the start of the file, keeping the frames that aren't being set. Files without a tag get
 * a new v2.4 tag. The audio data is copied verbatim; any padding of the old tag is dropped.
 */
export const writeMp3Metadata = (data: Uint8Array, request: MetadataRequest) => {
	const layout = readId3Tag(data);
	if (!layout && !isMpegFrameSync(data)) {
		throw new FormatError('Not an MP3 file.', {
			format: 'mp3',
			offset: 0,
			expected: '"ID3" or an MPEG frame sync',
			found: describeBytes(data.subarray(0, 3)),
		});
	}

	const fields = resolveTextFields(request, MP3_NAMESPACES, 'derivedFirst');
	const version: Id3Version = layout?.version ?? 4;
	const newFrames: Id3NewFrame[] = [];
	const replacedIds = new Set<string>();

	for (const field of TEXT_FIELDS) {
		const text = fields[field];
		if (text === undefined) {
			continue;
		}

		if (field === 'comment') {
			newFrames.push({ type: 'comment', text });
		} else if (field === 'date') {
			replacedIds.add('TDRC').add('TYER');
			newFrames.push({ type: 'text', id: dateFrameId(version), text });
		} else {
			const id = TEXT_FRAME_IDS[field];
			if (id !== undefined) {
				replacedIds.add(id);
				newFrames.push({ type: 'text', id, text });
			}
		}
	}

	if (!hasTextFields(fields) || newFrames.length === 0) {
		throw new NoWritableTagsError({ format: 'mp3' });
	}

	const replacesComment = fields.comment !== undefined;
	const keptFrames = (layout?.blocks ?? [])
		.filter(frame => !replacedIds.has(frame.tag.id) && !(replacesComment && isPlainComment(frame)))
		.map(frame => frame.bytes);

	const tag = createId3Tag(version, keptFrames, newFrames);
	return spliceBytes(data, [
		layout
			? { start: 0, end: layout.tagEnd, bytes: tag }
			: insertion(0, tag),
	]);
};
