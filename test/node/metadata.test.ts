import { expect, test } from 'vitest';
import { FormatError, MetadataWriteError, UnsupportedTagError } from '../../src/errors';
import {
	fieldKeys,
	hasKeyWithPrefix,
	pickBinary,
	presentKeys,
	rejectKeys,
	resolveTextFields,
	validateMetadataRequest,
} from '../../src/metadata';
import { resolveWriterOptions, validateMetadataWriterOptions } from '../../src/options';

test('own namespace wins over derived keys and bare names', () => {
	const fields = resolveTextFields({
		'Matroska:Title': 'Own',
		'XMP:Title': 'Derived',
		'Title': 'Bare',
		'XMP:Artist': 'Someone',
		'Genre': 'Ambient',
	}, ['Matroska']);

	expect(fields).toEqual({ title: 'Own', artist: 'Someone', genre: 'Ambient' });
});

test('derived keys can take precedence over the own namespace', () => {
	const request = { 'Audio:WAV:Title': 'Own', 'XMP:Title': 'Derived', 'Audio:WAV:Genre': 'Ambient', 'Genre': 'Bare' };

	expect(resolveTextFields(request, ['Audio:WAV'], 'derivedFirst')).toEqual({ title: 'Derived', genre: 'Ambient' });
	expect(fieldKeys('artist', ['WAV'], 'derivedFirst')).toEqual([
		'XMP:Artist',
		'XMP:Creator',
		'EXIF:Artist',
		'WAV:Artist',
		'Artist',
	]);
});

test('empty strings and nulls fall through to the next key', () => {
	const fields = resolveTextFields({
		'Vorbis:Title': '',
		'XMP:Title': null,
		'Title': 'Fallback',
		'TrackNumber': 7,
	}, ['Vorbis']);

	expect(fields).toEqual({ title: 'Fallback', trackNumber: '7' });
});

test('non-text values can\'t be written as text fields', () => {
	expect(() => resolveTextFields({ Title: true }, [])).toThrow(TypeError);
});

test('request validation', () => {
	expect(() => validateMetadataRequest({ Title: 'a', Rating: 3, Flag: false, Blob: new Uint8Array(1) })).not.toThrow();
	expect(() => validateMetadataRequest({ Rating: Number.NaN })).toThrow(TypeError);
	expect(() => validateMetadataRequest({ Rating: Infinity })).toThrow(TypeError);
});

test('present keys and prefixes', () => {
	const request = { 'QuickTime:Title': 'x', 'XMP:Title': undefined, 'Artist': null };

	expect(presentKeys(request)).toEqual(['QuickTime:Title']);
	expect(hasKeyWithPrefix(request, ['QuickTime:'])).toBe(true);
	expect(hasKeyWithPrefix(request, ['XMP:'])).toBe(false);
});

test('binary values', () => {
	const profile = new Uint8Array([1, 2, 3]);

	expect(pickBinary({ ICC_Profile: profile }, ['ICC_Profile'])).toBe(profile);
	expect(pickBinary({}, ['ICC_Profile'])).toBe(null);
	expect(() => pickBinary({ ICC_Profile: 'nope' }, ['ICC_Profile'])).toThrow(TypeError);
});

test('rejected keys are all reported', () => {
	let error: unknown = null;
	try {
		rejectKeys({ 'Keys:Title': 'a', 'Title': 'b', 'Keys:Artist': 'c' }, 'isobmff', key => key.startsWith('Keys:'));
	} catch (e) {
		error = e;
	}

	expect(error).toBeInstanceOf(UnsupportedTagError);
	expect(error).toBeInstanceOf(MetadataWriteError);
	expect(error).toMatchObject({ keys: ['Keys:Title', 'Keys:Artist'], format: 'isobmff' });
});

test('error messages carry their context', () => {
	const error = new FormatError('Bad signature.', { format: 'riff', offset: 0, expected: 'RIFF', found: 'RIFX' });

	expect(error.message).toBe('[riff] Bad signature. (at offset 0) Expected RIFF, found RIFX.');
	expect(error.name).toBe('FormatError');
	expect(error.offset).toBe(0);

	const unknown = new FormatError('Unrecognized container.', { format: null });
	expect(unknown.message).toBe('Unrecognized container.');
	expect(unknown.offset).toBe(null);
});

test('writer options are validated and frozen', () => {
	const options = resolveWriterOptions();

	expect(options).toEqual({ quickTimePad: 0, quickTimeHandler: 'mdir', vendorString: 'metasplice' });
	expect(Object.isFrozen(options)).toBe(true);

	expect(resolveWriterOptions({ quickTimePad: 64, quickTimeHandler: 'mp7t' })).toMatchObject({
		quickTimePad: 64,
		quickTimeHandler: 'mp7t',
	});

	expect(() => validateMetadataWriterOptions({ quickTimePad: -1 })).toThrow(TypeError);
	expect(() => validateMetadataWriterOptions({ quickTimePad: 1.5 })).toThrow(TypeError);
	expect(() => validateMetadataWriterOptions({ quickTimeHandler: 'abc' })).toThrow(TypeError);
});
