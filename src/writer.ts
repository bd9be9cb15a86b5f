/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export abstract class Writer {
	/** Writes the given data to the current position. */
	abstract write(data: Uint8Array): void;
	/** Changes the current position. */
	abstract seek(newPos: number): void;
	/** Returns the current position. */
	abstract getPos(): number;
}

/** Writes into a growable in-memory buffer. Every block builder gets its own instance. */
export class BufferWriter extends Writer {
	private pos = 0;
	private buffer: ArrayBuffer;
	private bytes: Uint8Array;
	private maxPos = 0;

	constructor(initialSize = 2 ** 10) {
		super();

		this.buffer = new ArrayBuffer(initialSize);
		this.bytes = new Uint8Array(this.buffer);
	}

	private ensureSize(size: number) {
		let newLength = this.buffer.byteLength;
		while (newLength < size) newLength *= 2;

		if (newLength === this.buffer.byteLength) return;

		const newBuffer = new ArrayBuffer(newLength);
		const newBytes = new Uint8Array(newBuffer);
		newBytes.set(this.bytes, 0);

		this.buffer = newBuffer;
		this.bytes = newBytes;
	}

	override write(data: Uint8Array) {
		this.ensureSize(this.pos + data.byteLength);

		this.bytes.set(data, this.pos);
		this.pos += data.byteLength;

		this.maxPos = Math.max(this.maxPos, this.pos);
	}

	override seek(newPos: number) {
		if (newPos < 0) {
			throw new RangeError(`Cannot seek to negative position ${newPos}.`);
		}

		// Seeking past the end leaves zero bytes behind once something gets written there
		this.ensureSize(newPos);
		this.pos = newPos;
		this.maxPos = Math.max(this.maxPos, this.pos);
	}

	override getPos() {
		return this.pos;
	}

	/** Returns a copy of everything written so far. */
	finalize() {
		return this.bytes.slice(0, this.maxPos);
	}
}
