/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	type ByteEdit,
	blockEnd,
	blockPayload,
	insertion,
	locateBlock,
	spliceBytes,
} from '../container';
import { NoWritableTagsError, StructuralLimitError, UnsupportedLayoutError } from '../errors';
import { hasTextFields, type MetadataRequest, resolveTextFields } from '../metadata';
import { last, textEncoder, toDataView } from '../misc';
import type { ResolvedWriterOptions } from '../options';
import { MAX_UINT24_VALUE, setUint24 } from '../varint';
import { createVorbisComments, mergeVorbisComments, readVorbisComments } from '../vorbis';
import { FLAC_BLOCK_HEADER_SIZE, FlacBlockType, readFlacMetadataBlocks } from './flac-reader';

const FLAC_NAMESPACES = ['Vorbis', 'FLAC', 'Audio:FLAC'];

export const createFlacMetadataBlock = (type: FlacBlockType, isLast: boolean, payload: Uint8Array) => {
	if (payload.byteLength > MAX_UINT24_VALUE) {
		throw new StructuralLimitError('Metadata block is too large for its 24-bit length field.', {
			format: 'flac',
			expected: `at most ${MAX_UINT24_VALUE} bytes`,
			found: `${payload.byteLength} bytes`,
		});
	}

	const block = new Uint8Array(FLAC_BLOCK_HEADER_SIZE + payload.byteLength);
	const view = toDataView(block);
	view.setUint8(0, (isLast ? 0x80 : 0) | type);
	setUint24(view, 1, payload.byteLength, false);
	block.set(payload, FLAC_BLOCK_HEADER_SIZE);

	return block;
};

/**
 * Replaces the first VORBIS_COMMENT block in place, keeping the comments whose fields aren't being set. Without one,
 * a new block is appended after the last metadata block, which hands over its last flag.
 */
export const writeFlacMetadata = (
	data: Uint8Array,
	request: MetadataRequest,
	options: ResolvedWriterOptions,
) => {
	const fields = resolveTextFields(request, FLAC_NAMESPACES, 'derivedFirst');
	if (!hasTextFields(fields)) {
		throw new NoWritableTagsError({ format: 'flac' });
	}

	const layout = readFlacMetadataBlocks(data);
	const index = locateBlock(layout.blocks, block => block.tag.type === FlacBlockType.VORBIS_COMMENT);
	const edits: ByteEdit[] = [];

	if (index !== null) {
		const block = layout.blocks[index];
		const existing = readVorbisComments(blockPayload(block));
		if (!existing) {
			throw new UnsupportedLayoutError('Existing VORBIS_COMMENT block is malformed.', {
				format: 'flac',
				offset: block.offset,
			});
		}

		const payload = createVorbisComments(
			new Uint8Array(0),
			existing.vendor,
			mergeVorbisComments(existing.comments, fields),
			false,
		);

		edits.push({
			start: block.offset,
			end: blockEnd(block),
			bytes: createFlacMetadataBlock(FlacBlockType.VORBIS_COMMENT, block.tag.isLast, payload),
		});
	} else {
		const lastBlock = last(layout.blocks);
		const payload = createVorbisComments(
			new Uint8Array(0),
			textEncoder.encode(options.vendorString),
			mergeVorbisComments([], fields),
			false,
		);

		// Move the last flag over to the new block
		edits.push({
			start: lastBlock.offset,
			end: lastBlock.offset + 1,
			bytes: new Uint8Array([lastBlock.bytes[0] & 0x7f]),
		});
		edits.push(insertion(
			blockEnd(lastBlock),
			createFlacMetadataBlock(FlacBlockType.VORBIS_COMMENT, true, payload),
		));
	}

	return spliceBytes(data, edits);
};
