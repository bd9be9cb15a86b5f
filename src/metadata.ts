/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { UnsupportedTagError } from './errors';
import type { ContainerFormat } from './format';

export type MetadataValue = string | number | boolean | Uint8Array;

/**
 * A resolved, flat mapping from namespaced keys (`XMP:Title`, `EXIF:Artist`, `QuickTime:Title`, `Title`, ...) to
 * values. Entries set to null or undefined are ignored. The request is never modified.
 */
export type MetadataRequest = Readonly<Record<string, MetadataValue | null | undefined>>;

/** The descriptive text fields the audio and video containers know how to store. */
export type TextField =
	| 'title'
	| 'artist'
	| 'album'
	| 'albumArtist'
	| 'comment'
	| 'genre'
	| 'date'
	| 'copyright'
	| 'description'
	| 'trackNumber';

export const TEXT_FIELDS: readonly TextField[] = [
	'title',
	'artist',
	'album',
	'albumArtist',
	'comment',
	'genre',
	'date',
	'copyright',
	'description',
	'trackNumber',
];

export type TextFields = Partial<Record<TextField, string>>;

const FIELD_KEY_NAMES: Record<TextField, string> = {
	title: 'Title',
	artist: 'Artist',
	album: 'Album',
	albumArtist: 'AlbumArtist',
	comment: 'Comment',
	genre: 'Genre',
	date: 'Date',
	copyright: 'Copyright',
	description: 'Description',
	trackNumber: 'TrackNumber',
};

/** Keys from other standards that a container falls back to when its own namespace doesn't set a field. */
const DERIVED_KEYS: Record<TextField, string[]> = {
	title: ['XMP:Title'],
	artist: ['XMP:Artist', 'XMP:Creator', 'EXIF:Artist'],
	album: ['XMP:Album'],
	albumArtist: ['XMP:AlbumArtist'],
	comment: ['XMP:Comment', 'EXIF:UserComment'],
	genre: ['XMP:Genre'],
	date: ['XMP:CreateDate', 'XMP:Date', 'EXIF:DateTimeOriginal'],
	copyright: ['XMP:Rights', 'XMP:Copyright', 'EXIF:Copyright'],
	description: ['XMP:Description', 'EXIF:ImageDescription'],
	trackNumber: ['XMP:TrackNumber', 'Track'],
};

export const validateMetadataRequest = (request: MetadataRequest) => {
	if (!request || typeof request !== 'object' || Array.isArray(request)) {
		throw new TypeError('request must be an object.');
	}

	for (const key of Object.keys(request)) {
		const value = request[key];
		if (value === null || value === undefined) {
			continue;
		}

		if (typeof value === 'number') {
			if (!Number.isFinite(value)) {
				throw new TypeError(`request['${key}'] must be a finite number.`);
			}
		} else if (typeof value !== 'string' && typeof value !== 'boolean' && !(value instanceof Uint8Array)) {
			throw new TypeError(`request['${key}'] must be a string, number, boolean or Uint8Array.`);
		}
	}
};

/** Returns the keys of the request that hold an actual value. */
export const presentKeys = (request: MetadataRequest) => {
	return Object.keys(request).filter(key => request[key] !== null && request[key] !== undefined);
};

/** Converts a scalar request value into the text stored in a container. */
export const toText = (key: string, value: MetadataValue) => {
	if (typeof value === 'string') {
		return value;
	}

	if (typeof value === 'number') {
		return String(value);
	}

	throw new TypeError(`request['${key}'] must be a string or a number to be written as text.`);
};

/** Returns the first non-empty text value among `keys`, in order. */
export const pickText = (request: MetadataRequest, keys: string[]) => {
	for (const key of keys) {
		const value = request[key];
		if (value === null || value === undefined) {
			continue;
		}

		const text = toText(key, value);
		if (text !== '') {
			return text;
		}
	}

	return null;
};

/**
 * Which keys a container reads first: its own namespaces (`QuickTime:Title`), or the keys derived from other
 * standards (`XMP:Title`). The bare field name always comes last.
 */
export type KeyPrecedence = 'ownFirst' | 'derivedFirst';

/** The keys, in precedence order, that can set `field` for a container owning the given namespaces. */
export const fieldKeys = (field: TextField, namespaces: string[], precedence: KeyPrecedence = 'ownFirst') => {
	const name = FIELD_KEY_NAMES[field];
	const own = namespaces.map(namespace => `${namespace}:${name}`);
	const derived = DERIVED_KEYS[field];

	return precedence === 'ownFirst'
		? [...own, ...derived, name]
		: [...derived, ...own, name];
};

/** Resolves every text field, taking the first non-empty value in the container's precedence order. */
export const resolveTextFields = (
	request: MetadataRequest,
	namespaces: string[],
	precedence: KeyPrecedence = 'ownFirst',
) => {
	const fields: TextFields = {};

	for (const field of TEXT_FIELDS) {
		const text = pickText(request, fieldKeys(field, namespaces, precedence));
		if (text !== null) {
			fields[field] = text;
		}
	}

	return fields;
};

export const hasTextFields = (fields: TextFields) => Object.keys(fields).length > 0;

/** True if any present key starts with one of the prefixes. */
export const hasKeyWithPrefix = (request: MetadataRequest, prefixes: string[]) => {
	return presentKeys(request).some(key => prefixes.some(prefix => key.startsWith(prefix)));
};

/** Throws if the request asks for any key matching the predicate. */
export const rejectKeys = (
	request: MetadataRequest,
	format: ContainerFormat,
	predicate: (key: string) => boolean,
) => {
	const rejected = presentKeys(request).filter(predicate);
	if (rejected.length > 0) {
		throw new UnsupportedTagError(rejected, { format });
	}
};

/** Returns the binary value stored under the first present key, or null. */
export const pickBinary = (request: MetadataRequest, keys: string[]) => {
	for (const key of keys) {
		const value = request[key];
		if (value === null || value === undefined) {
			continue;
		}

		if (!(value instanceof Uint8Array)) {
			throw new TypeError(`request['${key}'] must be a Uint8Array.`);
		}

		return value;
	}

	return null;
};
