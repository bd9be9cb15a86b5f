/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { StructuralLimitError } from '../errors';
import { decodeUtf16Le, toDataView, utf16LeBytes } from '../misc';
import { FileSlice, readBytes, readU16Le } from '../reader';
import { BufferWriter, Writer } from '../writer';
import {
	ASF_CONTENT_DESCRIPTION_OBJECT_GUID,
	ASF_EXTENDED_CONTENT_DESCRIPTION_OBJECT_GUID,
	guidToBytes,
} from './asf-misc';

const MAX_U16 = 0xffff;

/** The five strings of a Content Description Object, in storage order. */
export const CONTENT_DESCRIPTION_FIELDS = ['title', 'author', 'copyright', 'description', 'rating'] as const;
export type ContentDescriptionField = (typeof CONTENT_DESCRIPTION_FIELDS)[number];

/** Each field as stored: UTF-16LE including its terminator, or empty. */
export type ContentDescription = Record<ContentDescriptionField, Uint8Array>;

export enum AsfDescriptorValueType {
	UNICODE = 0,
	BYTE_ARRAY = 1,
	BOOL = 2,
	DWORD = 3,
	QWORD = 4,
	WORD = 5,
}

export interface AsfDescriptor {
	name: string;
	/** The complete descriptor as stored, from its name length to the end of its value. */
	raw: Uint8Array;
}

class AsfObjectWriter {
	private helper = new Uint8Array(8);
	private helperView = toDataView(this.helper);

	constructor(private writer: Writer) {}

	writeU16(value: number) {
		this.helperView.setUint16(0, value, true);
		this.writer.write(this.helper.subarray(0, 2));
	}

	writeU64(value: number) {
		this.helperView.setUint32(0, value >>> 0, true);
		this.helperView.setUint32(4, Math.floor(value / 2 ** 32), true);
		this.writer.write(this.helper);
	}

	writeBytes(data: Uint8Array) {
		this.writer.write(data);
	}

	/** Writes a GUID followed by a placeholder size; returns the object's start. */
	startObject(guid: string) {
		const startPos = this.writer.getPos();
		this.writer.write(guidToBytes(guid));
		this.writeU64(0);
		return startPos;
	}

	endObject(startPos: number) {
		const endPos = this.writer.getPos();
		this.writer.seek(startPos + 16);
		this.writeU64(endPos - startPos);
		this.writer.seek(endPos);
	}
}

const checkU16 = (value: number, what: string) => {
	if (value > MAX_U16) {
		throw new StructuralLimitError(`${what} exceeds its 16-bit field.`, {
			format: 'asf',
			expected: `at most ${MAX_U16}`,
			found: `${value}`,
		});
	}
};

/** Encodes a string the way ASF stores it: UTF-16LE with a two-byte terminator. */
export const asfString = (text: string) => utf16LeBytes(text, true);

export const readContentDescription = (payload: Uint8Array): ContentDescription | null => {
	if (payload.byteLength < 2 * CONTENT_DESCRIPTION_FIELDS.length) {
		return null;
	}

	const slice = FileSlice.of(payload);
	const lengths = CONTENT_DESCRIPTION_FIELDS.map(() => readU16Le(slice));
	const total = lengths.reduce((a, b) => a + b, 0);
	if (total > slice.remainingLength) {
		return null;
	}

	return {
		title: readBytes(slice, lengths[0]),
		author: readBytes(slice, lengths[1]),
		copyright: readBytes(slice, lengths[2]),
		description: readBytes(slice, lengths[3]),
		rating: readBytes(slice, lengths[4]),
	};
};

export const emptyContentDescription = (): ContentDescription => ({
	title: new Uint8Array(0),
	author: new Uint8Array(0),
	copyright: new Uint8Array(0),
	description: new Uint8Array(0),
	rating: new Uint8Array(0),
});

export const createContentDescriptionObject = (description: ContentDescription) => {
	const writer = new BufferWriter();
	const asfWriter = new AsfObjectWriter(writer);

	const startPos = asfWriter.startObject(ASF_CONTENT_DESCRIPTION_OBJECT_GUID);
	for (const field of CONTENT_DESCRIPTION_FIELDS) {
		checkU16(description[field].byteLength, `Content description ${field} length`);
		asfWriter.writeU16(description[field].byteLength);
	}
	for (const field of CONTENT_DESCRIPTION_FIELDS) {
		asfWriter.writeBytes(description[field]);
	}
	asfWriter.endObject(startPos);

	return writer.finalize();
};

/** Splits an Extended Content Description payload into its descriptors. Returns null on overrun. */
export const readExtendedContentDescriptors = (payload: Uint8Array): AsfDescriptor[] | null => {
	if (payload.byteLength < 2) {
		return null;
	}

	const slice = FileSlice.of(payload);
	const count = readU16Le(slice);
	const descriptors: AsfDescriptor[] = [];

	for (let i = 0; i < count; i++) {
		const start = slice.filePos;
		if (slice.remainingLength < 2) return null;
		const nameLength = readU16Le(slice);
		if (slice.remainingLength < nameLength + 4) return null;
		const name = decodeUtf16Le(readBytes(slice, nameLength));
		slice.skip(2); // Value type
		const valueLength = readU16Le(slice);
		if (slice.remainingLength < valueLength) return null;
		slice.skip(valueLength);

		descriptors.push({ name, raw: payload.subarray(start, slice.filePos) });
	}

	return descriptors;
};

export const createStringDescriptor = (name: string, value: string): AsfDescriptor => {
	const nameBytes = asfString(name);
	const valueBytes = asfString(value);
	checkU16(nameBytes.byteLength, `Descriptor name "${name}" length`);
	checkU16(valueBytes.byteLength, `Descriptor "${name}" value length`);

	const writer = new BufferWriter();
	const asfWriter = new AsfObjectWriter(writer);
	asfWriter.writeU16(nameBytes.byteLength);
	asfWriter.writeBytes(nameBytes);
	asfWriter.writeU16(AsfDescriptorValueType.UNICODE);
	asfWriter.writeU16(valueBytes.byteLength);
	asfWriter.writeBytes(valueBytes);

	return { name, raw: writer.finalize() };
};

export const createExtendedContentDescriptionObject = (descriptors: AsfDescriptor[]) => {
	checkU16(descriptors.length, 'Content descriptor count');

	const writer = new BufferWriter();
	const asfWriter = new AsfObjectWriter(writer);

	const startPos = asfWriter.startObject(ASF_EXTENDED_CONTENT_DESCRIPTION_OBJECT_GUID);
	asfWriter.writeU16(descriptors.length);
	for (const descriptor of descriptors) {
		asfWriter.writeBytes(descriptor.raw);
	}
	asfWriter.endObject(startPos);

	return writer.finalize();
};
