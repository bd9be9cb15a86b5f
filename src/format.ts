/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { ASF_HEADER_OBJECT_GUID, matchesGuid } from './asf/asf-misc';
import { hasIsobmffSignature } from './isobmff/isobmff-reader';
import { asciiBytes, bytesStartWith } from './misc';

/** The closed set of containers this library can rewrite. */
export type ContainerFormat =
	| 'jpeg'
	| 'riff'
	| 'ogg'
	| 'flac'
	| 'mp3'
	| 'asf'
	| 'isobmff'
	| 'matroska';

export const CONTAINER_FORMATS: readonly ContainerFormat[] = [
	'jpeg',
	'riff',
	'ogg',
	'flac',
	'mp3',
	'asf',
	'isobmff',
	'matroska',
];

const EBML_MAGIC = /* #__PURE__ */ new Uint8Array([0x1a, 0x45, 0xdf, 0xa3]);

/** Identifies a container by its leading bytes. Returns null when nothing matches. */
export const detectContainerFormat = (data: Uint8Array): ContainerFormat | null => {
	if (data.byteLength >= 2 && data[0] === 0xff && data[1] === 0xd8) {
		return 'jpeg';
	}

	if (bytesStartWith(data, asciiBytes('RIFF'))) {
		return 'riff';
	}

	if (bytesStartWith(data, asciiBytes('OggS'))) {
		return 'ogg';
	}

	if (bytesStartWith(data, asciiBytes('fLaC'))) {
		return 'flac';
	}

	if (bytesStartWith(data, EBML_MAGIC)) {
		return 'matroska';
	}

	if (matchesGuid(data, 0, ASF_HEADER_OBJECT_GUID)) {
		return 'asf';
	}

	if (hasIsobmffSignature(data)) {
		return 'isobmff';
	}

	if (bytesStartWith(data, asciiBytes('ID3'))) {
		return 'mp3';
	}

	// Bare MPEG audio frame sync
	if (data.byteLength >= 2 && data[0] === 0xff && (data[1] & 0xe0) === 0xe0) {
		return 'mp3';
	}

	return null;
};
