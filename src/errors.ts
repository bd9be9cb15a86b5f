/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import type { ContainerFormat } from './format';

/** Where in the file a failure was detected and what was expected there. */
export interface MetadataErrorContext {
	/** Null when the container couldn't be identified at all. */
	format: ContainerFormat | null;
	offset?: number;
	expected?: string;
	found?: string;
}

/** Base class of every error thrown while rewriting a container. */
export class MetadataWriteError extends Error {
	readonly format: ContainerFormat | null;
	readonly offset: number | null;
	readonly expected: string | null;
	readonly found: string | null;

	constructor(message: string, context: MetadataErrorContext) {
		super(formatMessage(message, context));
		this.name = 'MetadataWriteError';
		this.format = context.format;
		this.offset = context.offset ?? null;
		this.expected = context.expected ?? null;
		this.found = context.found ?? null;
	}
}

const formatMessage = (message: string, context: MetadataErrorContext) => {
	let result = context.format !== null ? `[${context.format}] ${message}` : message;
	if (context.offset !== undefined) {
		result += ` (at offset ${context.offset})`;
	}
	if (context.expected !== undefined) {
		result += ` Expected ${context.expected}`;
		result += context.found !== undefined ? `, found ${context.found}.` : '.';
	}

	return result;
};

/** The container signature is missing or invalid. */
export class FormatError extends MetadataWriteError {
	constructor(message: string, context: MetadataErrorContext) {
		super(message, context);
		this.name = 'FormatError';
	}
}

/** A protocol ceiling (segment length, lacing count, chunk count, size-field width) would be exceeded. */
export class StructuralLimitError extends MetadataWriteError {
	constructor(message: string, context: MetadataErrorContext) {
		super(message, context);
		this.name = 'StructuralLimitError';
	}
}

/** The file is framed in a way that can't be edited without guessing. */
export class UnsupportedLayoutError extends MetadataWriteError {
	constructor(message: string, context: MetadataErrorContext) {
		super(message, context);
		this.name = 'UnsupportedLayoutError';
	}
}

/** Bytes that are supposed to be carried over verbatim don't add up. */
export class IntegrityCheckError extends MetadataWriteError {
	constructor(message: string, context: MetadataErrorContext) {
		super(message, context);
		this.name = 'IntegrityCheckError';
	}
}

/** The request names a tag class this container's writer refuses to emit. */
export class UnsupportedTagError extends MetadataWriteError {
	/** The offending request keys. */
	readonly keys: string[];

	constructor(keys: string[], context: MetadataErrorContext) {
		super(`Writing ${keys.join(', ')} is not supported.`, context);
		this.name = 'UnsupportedTagError';
		this.keys = keys;
	}
}

/** Nothing in the request applies to this container. */
export class NoWritableTagsError extends MetadataWriteError {
	constructor(context: MetadataErrorContext) {
		super('The request contains no tags that can be written to this container.', context);
		this.name = 'NoWritableTagsError';
	}
}
