/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { MetadataRequest } from './metadata';
import { MetadataWriter } from './metadata-writer';
import type { MetadataWriterOptions } from './options';

/** A hidden sibling of `inputPath` with a random suffix. */
export const temporaryPathFor = (inputPath: string) => {
	return path.join(path.dirname(inputPath), `.${path.basename(inputPath)}.${randomBytes(8).toString('hex')}.tmp`);
};

/**
 * Rewrites the metadata of a file on disk. The result is written to a temporary file next to the input, which then
 * replaces the input, so readers never see a half-written file. Resolves to the new file size.
 */
export const rewriteMetadataFile = async (
	inputPath: string,
	request: MetadataRequest,
	options?: MetadataWriterOptions,
) => {
	if (typeof inputPath !== 'string') {
		throw new TypeError('inputPath must be a string.');
	}

	const writer = new MetadataWriter(options);
	const data = new Uint8Array(await fs.readFile(inputPath));
	const result = writer.write(data, request);

	const tempPath = temporaryPathFor(inputPath);
	// Never follow or overwrite something already sitting at the temporary path
	await fs.writeFile(tempPath, result, { flag: 'wx' });

	try {
		await fs.rename(tempPath, inputPath);
	} catch (error) {
		await fs.rm(tempPath, { force: true });
		throw error;
	}

	return result.byteLength;
};
