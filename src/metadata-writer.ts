/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { writeAsfMetadata } from './asf/asf-writer';
import { FormatError } from './errors';
import { writeFlacMetadata } from './flac/flac-writer';
import { CONTAINER_FORMATS, type ContainerFormat, detectContainerFormat } from './format';
import { writeIsobmffMetadata } from './isobmff/isobmff-writer';
import { writeJpegMetadata } from './jpeg/jpeg-writer';
import { writeMatroskaMetadata } from './matroska/matroska-writer';
import { type MetadataRequest, validateMetadataRequest } from './metadata';
import { assertNever, describeBytes } from './misc';
import { writeMp3Metadata } from './mp3/mp3-writer';
import { writeOggMetadata } from './ogg/ogg-writer';
import { type MetadataWriterOptions, type ResolvedWriterOptions, resolveWriterOptions } from './options';
import { writeRiffMetadata } from './riff/riff-writer';

/**
 * Rewrites the metadata of in-memory files. Holds nothing but its validated, frozen options, so one instance can be
 * shared freely.
 */
export class MetadataWriter {
	/** The resolved options, with every default filled in. */
	readonly options: ResolvedWriterOptions;

	constructor(options: MetadataWriterOptions = {}) {
		this.options = resolveWriterOptions(options);
	}

	/**
	 * Returns a new buffer holding the file with the requested metadata written. The input is never modified, and
	 * every byte outside the rewritten structures is carried over as is.
	 *
	 * @param format - Skips detection when the container is already known.
	 */
	write(data: Uint8Array, request: MetadataRequest, format?: ContainerFormat) {
		if (!(data instanceof Uint8Array)) {
			throw new TypeError('data must be a Uint8Array.');
		}
		validateMetadataRequest(request);
		if (format !== undefined && !CONTAINER_FORMATS.includes(format)) {
			throw new TypeError(`format, when provided, must be one of ${CONTAINER_FORMATS.join(', ')}.`);
		}

		const resolvedFormat = format ?? detectContainerFormat(data);
		if (resolvedFormat === null) {
			throw new FormatError('Unrecognized container.', {
				format: null,
				offset: 0,
				expected: 'a known container signature',
				found: describeBytes(data.subarray(0, 4)),
			});
		}

		switch (resolvedFormat) {
			case 'jpeg': return writeJpegMetadata(data, request);
			case 'riff': return writeRiffMetadata(data, request);
			case 'ogg': return writeOggMetadata(data, request, this.options);
			case 'flac': return writeFlacMetadata(data, request, this.options);
			case 'mp3': return writeMp3Metadata(data, request);
			case 'asf': return writeAsfMetadata(data, request);
			case 'isobmff': return writeIsobmffMetadata(data, request, this.options);
			case 'matroska': return writeMatroskaMetadata(data, request);
			default: return assertNever(resolvedFormat);
		}
	}
}

/** Shorthand for a one-off `new MetadataWriter(options).write(data, request)`. */
export const writeMetadata = (data: Uint8Array, request: MetadataRequest, options?: MetadataWriterOptions) => {
	return new MetadataWriter(options).write(data, request);
};
