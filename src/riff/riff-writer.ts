/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	type ByteEdit,
	blockPayload,
	insertion,
	locateBlock,
	removalEdits,
	spliceBytes,
	u32Edit,
	editDelta,
} from '../container';
import { NoWritableTagsError, StructuralLimitError } from '../errors';
import { type MetadataRequest, resolveTextFields, TEXT_FIELDS, type TextField } from '../metadata';
import { concatBytes, last, textEncoder } from '../misc';
import { BufferWriter, Writer } from '../writer';
import {
	readRiffChunks,
	readRiffInfoEntries,
	RIFF_CHUNK_HEADER_SIZE,
	RIFF_SIZE_OFFSET,
	type RiffInfoEntry,
} from './riff-reader';

export class RIFFWriter {
	private helper = new Uint8Array(4);
	private helperView = new DataView(this.helper.buffer);

	constructor(private writer: Writer) {}

	writeFourCC(fourCC: string) {
		for (let i = 0; i < 4; i++) {
			this.helper[i] = i < fourCC.length ? fourCC.charCodeAt(i) : 0x20;
		}
		this.writer.write(this.helper);
	}

	writeUint32(value: number) {
		this.helperView.setUint32(0, value, true);
		this.writer.write(this.helper);
	}

	writeBytes(data: Uint8Array) {
		this.writer.write(data);
	}

	writePadding() {
		// RIFF chunks must be word-aligned
		if (this.writer.getPos() % 2 !== 0) {
			this.writer.write(new Uint8Array(1));
		}
	}

	startList(listType: string) {
		this.writeFourCC('LIST');
		const sizePos = this.writer.getPos();
		this.writeUint32(0); // Size placeholder
		this.writeFourCC(listType);
		return sizePos;
	}

	endList(sizePos: number) {
		const currentPos = this.writer.getPos();
		const size = currentPos - sizePos - 4;
		this.writer.seek(sizePos);
		this.writeUint32(size);
		this.writer.seek(currentPos);
	}

	startChunk(fourCC: string) {
		this.writeFourCC(fourCC);
		const sizePos = this.writer.getPos();
		this.writeUint32(0); // Size placeholder
		return sizePos;
	}

	/** Patches the chunk size, which excludes the pad byte written afterwards. */
	endChunk(sizePos: number) {
		const currentPos = this.writer.getPos();
		const size = currentPos - sizePos - 4;
		this.writer.seek(sizePos);
		this.writeUint32(size);
		this.writer.seek(currentPos);
		this.writePadding();
	}
}

// https://exiftool.org/TagNames/RIFF.html#Info
export const RIFF_INFO_IDS: Partial<Record<TextField, string>> = {
	title: 'INAM',
	artist: 'IART',
	album: 'IPRD',
	comment: 'ICMT',
	genre: 'IGNR',
	date: 'ICRD',
	copyright: 'ICOP',
	description: 'ISBJ',
	trackNumber: 'ITRK',
};

/** Stores the text as UTF-8 followed by a NUL terminator. */
export const riffInfoText = (text: string) => concatBytes([textEncoder.encode(text), new Uint8Array(1)]);

/** Builds a complete `LIST` chunk of type `INFO`, including the trailing pad byte of each entry. */
export const createRiffInfoList = (entries: RiffInfoEntry[]) => {
	const writer = new BufferWriter();
	const riffWriter = new RIFFWriter(writer);

	const listPos = riffWriter.startList('INFO');
	for (const entry of entries) {
		const chunkPos = riffWriter.startChunk(entry.fourCC);
		riffWriter.writeBytes(entry.data);
		riffWriter.endChunk(chunkPos);
	}
	riffWriter.endList(listPos);

	return writer.finalize();
};

/**
 * Removes every LIST/INFO chunk and appends one rebuilt list after the last chunk. Entries of the first existing list
 * that aren't being set are carried over. The RIFF size field grows by the net change.
 */
export const writeRiffMetadata = (data: Uint8Array, request: MetadataRequest) => {
	const layout = readRiffChunks(data);
	const namespaces = layout.formType === 'WAVE'
		? ['RIFF', 'WAV', 'Audio:WAV']
		: ['RIFF', 'AVI', 'Video:AVI'];
	const fields = resolveTextFields(request, namespaces, 'derivedFirst');

	const newEntries: RiffInfoEntry[] = [];
	for (const field of TEXT_FIELDS) {
		const fourCC = RIFF_INFO_IDS[field];
		const value = fields[field];
		if (fourCC !== undefined && value !== undefined) {
			newEntries.push({ fourCC, data: riffInfoText(value) });
		}
	}

	if (newEntries.length === 0) {
		throw new NoWritableTagsError({ format: 'riff' });
	}

	const isInfoList = (chunk: (typeof layout.blocks)[number]) =>
		chunk.tag.fourCC === 'LIST' && chunk.tag.listType === 'INFO';

	const firstInfoIndex = locateBlock(layout.blocks, isInfoList);
	const keptEntries = firstInfoIndex !== null
		? readRiffInfoEntries(blockPayload(layout.blocks[firstInfoIndex]), layout.blocks[firstInfoIndex].offset)
			.filter(entry => !newEntries.some(newEntry => newEntry.fourCC === entry.fourCC))
		: [];

	let list = createRiffInfoList([...keptEntries, ...newEntries]);

	const lastChunk = last(layout.blocks);
	if (lastChunk && lastChunk.totalLength % 2 !== 0) {
		// The last chunk's pad byte was missing; restore it so the new list stays word-aligned
		list = concatBytes([new Uint8Array(1), list]);
	}

	const edits: ByteEdit[] = [
		...removalEdits(layout.blocks, isInfoList),
		insertion(layout.end, list),
	];

	const oldRiffSize = layout.sizeIsPlaceholder ? layout.end - RIFF_CHUNK_HEADER_SIZE : layout.riffSize;
	const newRiffSize = oldRiffSize + editDelta(edits);
	if (newRiffSize > 0xffffffff) {
		throw new StructuralLimitError('File would exceed the 4 GiB RIFF size limit.', {
			format: 'riff',
			offset: RIFF_SIZE_OFFSET,
			found: `${newRiffSize + RIFF_CHUNK_HEADER_SIZE} bytes`,
		});
	}

	edits.push(u32Edit(RIFF_SIZE_OFFSET, newRiffSize, true));
	return spliceBytes(data, edits);
};
