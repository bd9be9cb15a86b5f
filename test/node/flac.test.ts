import { expect, test } from 'vitest';
import { FormatError, NoWritableTagsError, UnsupportedLayoutError } from '../../src/errors';
import { readFlacMetadataBlocks } from '../../src/flac/flac-reader';
import { writeFlacMetadata } from '../../src/flac/flac-writer';
import { resolveWriterOptions } from '../../src/options';
import { bytes, FLAC_FRAMES, FLAC_STREAMINFO_PAYLOAD, flacBlock, vorbisCommentPacket } from './fixtures';

const options = resolveWriterOptions();

const flacComments = (vendor: string, comments: string[]) => vorbisCommentPacket(bytes(), vendor, comments, false);

test('block walk stops at the last block', () => {
	const data = bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(1, true, new Array<number>(10).fill(0)),
		FLAC_FRAMES,
	);
	const layout = readFlacMetadataBlocks(data);

	expect(layout.blocks.map(block => [block.offset, block.tag.type, block.tag.isLast])).toEqual([
		[4, 0, false],
		[42, 1, true],
	]);
	expect(layout.end).toBe(56);
});

test('a comment block is added after the last block', () => {
	const data = bytes('fLaC', flacBlock(0, true, FLAC_STREAMINFO_PAYLOAD), FLAC_FRAMES);

	const result = writeFlacMetadata(data, { Title: 'Song' }, options);

	const comments = flacComments('metasplice', ['TITLE=Song']);
	expect(comments.byteLength).toBe(32);
	expect(result).toEqual(bytes(
		'fLaC',
		[0x00, 0, 0, 34], FLAC_STREAMINFO_PAYLOAD,
		[0x84, 0, 0, 32], comments,
		FLAC_FRAMES,
	));
});

test('new blocks use the configured vendor string', () => {
	const data = bytes('fLaC', flacBlock(0, true, FLAC_STREAMINFO_PAYLOAD), FLAC_FRAMES);

	const result = writeFlacMetadata(data, { 'FLAC:Artist': 'Band' }, resolveWriterOptions({ vendorString: 'tagger' }));

	expect(result).toEqual(bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, true, flacComments('tagger', ['ARTIST=Band'])),
		FLAC_FRAMES,
	));
});

test('an existing comment block is rewritten in place', () => {
	const padding = flacBlock(1, true, new Array<number>(8).fill(0));
	const data = bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, false, flacComments('reference libFLAC', ['TITLE=Old', 'ARTIST=Band'])),
		padding,
		FLAC_FRAMES,
	);

	const result = writeFlacMetadata(data, { 'Vorbis:Title': 'New', 'Title': 'Ignored' }, options);

	expect(result).toEqual(bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, false, flacComments('reference libFLAC', ['ARTIST=Band', 'TITLE=New'])),
		padding,
		FLAC_FRAMES,
	));
	expect(writeFlacMetadata(result, { 'Vorbis:Title': 'New' }, options)).toEqual(result);
});

test('a last comment block stays last', () => {
	const data = bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, true, flacComments('v', [])),
		FLAC_FRAMES,
	);

	const result = writeFlacMetadata(data, { Genre: 'Jazz' }, options);

	expect(result).toEqual(bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, true, flacComments('v', ['GENRE=Jazz'])),
		FLAC_FRAMES,
	));
});

test('rejects what it can\'t write', () => {
	const data = bytes('fLaC', flacBlock(0, true, FLAC_STREAMINFO_PAYLOAD), FLAC_FRAMES);

	expect(() => writeFlacMetadata(data, { Foo: 'x' }, options)).toThrow(NoWritableTagsError);
	expect(() => writeFlacMetadata(bytes('ID3', [4, 0, 0]), { Title: 'x' }, options)).toThrow(FormatError);

	const unterminated = bytes('fLaC', flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD));
	expect(() => writeFlacMetadata(unterminated, { Title: 'x' }, options)).toThrow(UnsupportedLayoutError);

	const malformed = bytes('fLaC', flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD), flacBlock(4, true, [200, 0, 0, 0]));
	expect(() => writeFlacMetadata(malformed, { Title: 'x' }, options)).toThrow(UnsupportedLayoutError);
});

test('XMP keys win over the FLAC namespace', () => {
	const data = bytes('fLaC', flacBlock(0, true, FLAC_STREAMINFO_PAYLOAD), FLAC_FRAMES);

	const result = writeFlacMetadata(data, { 'Audio:FLAC:Title': 'From FLAC', 'XMP:Title': 'From XMP' }, options);

	expect(result).toEqual(bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, true, flacComments('metasplice', ['TITLE=From XMP'])),
		FLAC_FRAMES,
	));
});
