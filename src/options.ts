/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

/** Settings that shape the bytes the writers emit. */
export interface MetadataWriterOptions {
	/**
	 * When greater than zero, each run of atoms appended to an ISO-BMFF file is followed by a zero-filled `free` atom
	 * so that the run's length is a multiple of this value. Defaults to 0.
	 */
	quickTimePad?: number;
	/** The four-character handler type of the `hdlr` atom in a synthesized `meta` atom. Defaults to `'mdir'`. */
	quickTimeHandler?: string;
	/** Vendor string of newly created Vorbis comment blocks. Existing vendor strings are kept. */
	vendorString?: string;
}

export type ResolvedWriterOptions = Readonly<Required<MetadataWriterOptions>>;

export const DEFAULT_VENDOR_STRING = 'metasplice';

export const validateMetadataWriterOptions = (options: MetadataWriterOptions) => {
	if (!options || typeof options !== 'object') {
		throw new TypeError('options must be an object.');
	}
	if (
		options.quickTimePad !== undefined
		&& (!Number.isInteger(options.quickTimePad) || options.quickTimePad < 0)
	) {
		throw new TypeError('options.quickTimePad, when provided, must be a non-negative integer.');
	}
	if (options.quickTimeHandler !== undefined) {
		if (typeof options.quickTimeHandler !== 'string' || !/^[\x20-\x7e\xa9]{4}$/.test(options.quickTimeHandler)) {
			throw new TypeError('options.quickTimeHandler, when provided, must be a four-character code.');
		}
	}
	if (options.vendorString !== undefined && typeof options.vendorString !== 'string') {
		throw new TypeError('options.vendorString, when provided, must be a string.');
	}
};

export const resolveWriterOptions = (options: MetadataWriterOptions = {}): ResolvedWriterOptions => {
	validateMetadataWriterOptions(options);

	return Object.freeze({
		quickTimePad: options.quickTimePad ?? 0,
		quickTimeHandler: options.quickTimeHandler ?? 'mdir',
		vendorString: options.vendorString ?? DEFAULT_VENDOR_STRING,
	});
};
