/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { StructuralLimitError } from '../errors';
import { isIso88591Compatible, latin1Bytes, textEncoder, utf16WithBomBytes } from '../misc';
import { encodeSynchsafe, MAX_SYNCHSAFE_VALUE } from '../varint';
import { BufferWriter, Writer } from '../writer';
import { ID3_HEADER_SIZE, Id3V2TextEncoding, type Id3Version } from './id3-reader';

export class Id3Writer {
	private helper = new Uint8Array(8);
	private helperView = new DataView(this.helper.buffer);

	constructor(private writer: Writer, private version: Id3Version) {}

	writeU8(value: number) {
		this.helper[0] = value;
		this.writer.write(this.helper.subarray(0, 1));
	}

	writeU16(value: number) {
		this.helperView.setUint16(0, value, false);
		this.writer.write(this.helper.subarray(0, 2));
	}

	writeU32(value: number) {
		this.helperView.setUint32(0, value, false);
		this.writer.write(this.helper.subarray(0, 4));
	}

	writeAscii(text: string) {
		for (let i = 0; i < text.length; i++) {
			this.helper[i] = text.charCodeAt(i);
		}
		this.writer.write(this.helper.subarray(0, text.length));
	}

	writeSynchsafeU32(value: number) {
		this.writeU32(encodeSynchsafe(value));
	}

	writeBytes(data: Uint8Array) {
		this.writer.write(data);
	}

	writeTagHeader(size: number) {
		this.writeAscii('ID3');
		this.writeU8(this.version);
		this.writeU8(0); // Revision
		this.writeU8(0); // Flags
		this.writeSynchsafeU32(size);
	}

	/** Frame sizes are synchsafe from v2.4 on. */
	writeFrameHeader(frameId: string, frameSize: number) {
		this.writeAscii(frameId);
		if (this.version === 4) {
			this.writeSynchsafeU32(frameSize);
		} else {
			this.writeU32(frameSize);
		}
		this.writeU16(0x0000);
	}

	/** Picks ISO-8859-1 when the text allows it, else UTF-8 (v2.4) or UTF-16 with BOM (v2.3). */
	encodingFor(text: string) {
		if (isIso88591Compatible(text)) {
			return Id3V2TextEncoding.ISO_8859_1;
		}

		return this.version === 4 ? Id3V2TextEncoding.UTF_8 : Id3V2TextEncoding.UTF_16_WITH_BOM;
	}

	/** Encodes the text including its terminator. */
	encodeString(text: string, encoding: Id3V2TextEncoding) {
		switch (encoding) {
			case Id3V2TextEncoding.ISO_8859_1: {
				const bytes = new Uint8Array(text.length + 1);
				bytes.set(latin1Bytes(text), 0);
				return bytes;
			}
			case Id3V2TextEncoding.UTF_8: {
				const utf8Data = textEncoder.encode(text);
				const bytes = new Uint8Array(utf8Data.byteLength + 1);
				bytes.set(utf8Data, 0);
				return bytes;
			}
			default: {
				return utf16WithBomBytes(text, true);
			}
		}
	}

	writeId3V2TextFrame(frameId: string, text: string) {
		const encoding = this.encodingFor(text);
		const textData = this.encodeString(text, encoding);

		this.writeFrameHeader(frameId, 1 + textData.byteLength);
		this.writeU8(encoding);
		this.writeBytes(textData);
	}

	writeId3V2CommentFrame(comment: string) {
		const encoding = this.encodingFor(comment);
		const shortDescription = this.encodeString('', encoding);
		const textData = this.encodeString(comment, encoding);

		this.writeFrameHeader('COMM', 1 + 3 + shortDescription.byteLength + textData.byteLength);
		this.writeU8(encoding);
		this.writeAscii('und');
		this.writeBytes(shortDescription);
		this.writeBytes(textData);
	}
}

export type Id3NewFrame =
	| { type: 'text'; id: string; text: string }
	| { type: 'comment'; text: string };

/** Builds a complete tag: header, the kept frames as stored, then the new frames. No padding is added. */
export const createId3Tag = (version: Id3Version, keptFrames: Uint8Array[], newFrames: Id3NewFrame[]) => {
	const body = new BufferWriter();
	const bodyWriter = new Id3Writer(body, version);

	for (const frame of keptFrames) {
		bodyWriter.writeBytes(frame);
	}
	for (const frame of newFrames) {
		if (frame.type === 'text') {
			bodyWriter.writeId3V2TextFrame(frame.id, frame.text);
		} else {
			bodyWriter.writeId3V2CommentFrame(frame.text);
		}
	}

	const frames = body.finalize();
	if (frames.byteLength > MAX_SYNCHSAFE_VALUE) {
		throw new StructuralLimitError('ID3 tag is too large for its synchsafe size field.', {
			format: 'mp3',
			expected: `at most ${MAX_SYNCHSAFE_VALUE} bytes`,
			found: `${frames.byteLength} bytes`,
		});
	}

	const tag = new BufferWriter(ID3_HEADER_SIZE + frames.byteLength);
	const tagWriter = new Id3Writer(tag, version);
	tagWriter.writeTagHeader(frames.byteLength);
	tagWriter.writeBytes(frames);

	return tag.finalize();
};
