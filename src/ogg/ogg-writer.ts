/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type Block, blockEnd, blockPayload, locateBlock, spliceBytes } from '../container';
import { computeOggCrc } from '../crc';
import {
	IntegrityCheckError,
	NoWritableTagsError,
	StructuralLimitError,
	UnsupportedLayoutError,
} from '../errors';
import { hasTextFields, type MetadataRequest, resolveTextFields } from '../metadata';
import { asciiBytes, bytesStartWith, concatBytes, textEncoder, toDataView } from '../misc';
import type { ResolvedWriterOptions } from '../options';
import { buildOggLacing, MAX_OGG_LACING_VALUES, splitOggLacing } from '../varint';
import { createVorbisComments, mergeVorbisComments, readVorbisComments } from '../vorbis';
import {
	OGG_CHECKSUM_OFFSET,
	OGG_PAGE_HEADER_SIZE,
	OGG_SEGMENT_COUNT_OFFSET,
	OggHeaderType,
	type OggPageTag,
	readOggPages,
} from './ogg-reader';

const OGG_NAMESPACES = ['Vorbis', 'Opus', 'Ogg', 'Audio:OGG', 'Audio:OPUS', 'Audio:Opus'];

export type OggAudioCodec = 'vorbis' | 'opus';

interface OggCodecSignatures {
	identification: Uint8Array;
	comment: Uint8Array;
	framingBit: boolean;
}

// https://xiph.org/vorbis/doc/Vorbis_I_spec.html#x1-620004.2.1
// https://datatracker.ietf.org/doc/html/rfc7845#section-5
const SIGNATURES: Record<OggAudioCodec, OggCodecSignatures> = {
	vorbis: {
		identification: /* #__PURE__ */ new Uint8Array([0x01, ...asciiBytes('vorbis')]),
		comment: /* #__PURE__ */ new Uint8Array([0x03, ...asciiBytes('vorbis')]),
		framingBit: true,
	},
	opus: {
		identification: /* #__PURE__ */ asciiBytes('OpusHead'),
		comment: /* #__PURE__ */ asciiBytes('OpusTags'),
		framingBit: false,
	},
};

/** Finds the first logical stream carrying Vorbis or Opus audio. */
export const findOggAudioStream = (pages: Block<OggPageTag>[]) => {
	for (const page of pages) {
		if (!(page.tag.headerType & OggHeaderType.BEGINNING_OF_STREAM)) {
			continue;
		}

		const payload = blockPayload(page);
		for (const codec of ['vorbis', 'opus'] as const) {
			if (bytesStartWith(payload, SIGNATURES[codec].identification)) {
				return { codec, serialNumber: page.tag.serialNumber };
			}
		}
	}

	return null;
};

/**
 * Assembles a page from an existing header, new lacing values and payload, and computes the checksum over the
 * finished page.
 */
export const createOggPage = (originalHeader: Uint8Array, lacing: number[], payload: Uint8Array) => {
	const page = new Uint8Array(OGG_PAGE_HEADER_SIZE + lacing.length + payload.byteLength);
	page.set(originalHeader.subarray(0, OGG_PAGE_HEADER_SIZE), 0);
	page[OGG_SEGMENT_COUNT_OFFSET] = lacing.length;
	page.set(lacing, OGG_PAGE_HEADER_SIZE);
	page.set(payload, OGG_PAGE_HEADER_SIZE + lacing.length);

	const view = toDataView(page);
	view.setUint32(OGG_CHECKSUM_OFFSET, 0, true);
	view.setUint32(OGG_CHECKSUM_OFFSET, computeOggCrc(page), true);

	return page;
};

/**
 * Rewrites the comment header of the first Vorbis or Opus stream. The new packet must end on the page the old one
 * started on; any packets following it on that page are carried over unchanged.
 */
export const writeOggMetadata = (
	data: Uint8Array,
	request: MetadataRequest,
	options: ResolvedWriterOptions,
) => {
	const fields = resolveTextFields(request, OGG_NAMESPACES, 'derivedFirst');
	if (!hasTextFields(fields)) {
		throw new NoWritableTagsError({ format: 'ogg' });
	}

	const layout = readOggPages(data);
	const stream = findOggAudioStream(layout.blocks);
	if (!stream) {
		throw new UnsupportedLayoutError('No Vorbis or Opus stream found.', { format: 'ogg' });
	}

	const signatures = SIGNATURES[stream.codec];
	const index = locateBlock(layout.blocks, page =>
		page.tag.serialNumber === stream.serialNumber
		&& !(page.tag.headerType & OggHeaderType.CONTINUATION)
		&& bytesStartWith(blockPayload(page), signatures.comment),
	);
	if (index === null) {
		throw new UnsupportedLayoutError('Comment header page not found.', { format: 'ogg' });
	}

	const page = layout.blocks[index];
	const split = splitOggLacing(page.tag.lacing);
	if (!split) {
		throw new UnsupportedLayoutError('Comment header spans multiple pages.', {
			format: 'ogg',
			offset: page.offset,
		});
	}

	const payload = blockPayload(page);
	const oldPacket = payload.subarray(0, split.packetLength);
	const remainder = payload.subarray(split.packetLength);
	const remainderLength = split.tail.reduce((a, b) => a + b, 0);

	if (remainder.byteLength !== remainderLength) {
		throw new IntegrityCheckError('Data following the comment header doesn\'t match its lacing values.', {
			format: 'ogg',
			offset: page.offset,
			expected: `${remainderLength} bytes`,
			found: `${remainder.byteLength} bytes`,
		});
	}

	const existing = readVorbisComments(oldPacket.subarray(signatures.comment.byteLength));
	if (!existing) {
		throw new UnsupportedLayoutError('Existing comment header is malformed.', {
			format: 'ogg',
			offset: page.offset,
		});
	}

	let newPacket = createVorbisComments(
		signatures.comment,
		existing.vendor.byteLength > 0 ? existing.vendor : textEncoder.encode(options.vendorString),
		mergeVorbisComments(existing.comments, fields),
		signatures.framingBit,
	);

	if (stream.codec === 'opus') {
		// Opus allows binary data after the comment list, which must be kept
		const trailing = oldPacket.subarray(signatures.comment.byteLength + existing.byteLength);
		newPacket = concatBytes([newPacket, trailing]);
	}

	const lacing = [...buildOggLacing(newPacket.byteLength), ...split.tail];
	if (lacing.length > MAX_OGG_LACING_VALUES) {
		throw new StructuralLimitError('Comment header doesn\'t fit into its page.', {
			format: 'ogg',
			offset: page.offset,
			expected: `at most ${MAX_OGG_LACING_VALUES} lacing values`,
			found: `${lacing.length}`,
		});
	}

	const newPage = createOggPage(page.bytes, lacing, concatBytes([newPacket, remainder]));
	return spliceBytes(data, [{ start: page.offset, end: blockEnd(page), bytes: newPage }]);
};
