import { expect, test } from 'vitest';
import { FormatError, NoWritableTagsError, UnsupportedLayoutError } from '../../src/errors';
import { readId3Tag } from '../../src/mp3/id3-reader';
import { writeMp3Metadata } from '../../src/mp3/mp3-writer';
import { bytes, id3Frame, id3Tag, MPEG_FRAME } from './fixtures';

test('frame walk stops at padding', () => {
	const data = bytes(id3Tag(3, [id3Frame('TIT2', bytes([0], 'Old\0'))], 12), MPEG_FRAME);
	const layout = readId3Tag(data);

	expect(layout).not.toBe(null);
	expect(layout?.version).toBe(3);
	expect(layout?.blocks.map(frame => [frame.tag.id, frame.offset, frame.totalLength])).toEqual([['TIT2', 10, 15]]);
	expect(layout?.end).toBe(25);
	expect(layout?.tagEnd).toBe(37);
	expect(readId3Tag(MPEG_FRAME)).toBe(null);
});

test('a bare MPEG stream gets a new v2.4 tag', () => {
	const result = writeMp3Metadata(MPEG_FRAME, { Title: 'Song' });

	expect(result).toEqual(bytes(
		'ID3', [4, 0, 0], [0, 0, 0, 16],
		'TIT2', [0, 0, 0, 6], [0, 0], [0], 'Song\0',
		MPEG_FRAME,
	));
});

test('a v2.3 tag keeps its version and unrelated frames and loses its padding', () => {
	const artist = id3Frame('TPE1', bytes([0], 'Band\0'));
	const data = bytes(id3Tag(3, [artist, id3Frame('TIT2', bytes([0], 'Old\0'))], 40), MPEG_FRAME);

	const result = writeMp3Metadata(data, { 'ID3:Title': 'New', 'Title': 'Ignored', 'Date': '2024' });

	expect(result).toEqual(bytes(
		id3Tag(3, [artist, id3Frame('TIT2', bytes([0], 'New\0')), id3Frame('TYER', bytes([0], '2024\0'))]),
		MPEG_FRAME,
	));
	expect(writeMp3Metadata(result, { 'ID3:Title': 'New', 'Date': '2024' })).toEqual(result);
});

test('dates replace both date frames and use TDRC in v2.4', () => {
	const data = bytes(id3Tag(4, [id3Frame('TYER', bytes([0], '1999\0'))]), MPEG_FRAME);

	const result = writeMp3Metadata(data, { Date: '2024-05-01' });

	expect(result).toEqual(bytes(id3Tag(4, [id3Frame('TDRC', bytes([0], '2024-05-01\0'))]), MPEG_FRAME));
});

test('only the plain comment is replaced', () => {
	const described = id3Frame('COMM', bytes([0], 'eng', 'iTunNORM\0', '0001\0'));
	const plain = id3Frame('COMM', bytes([0], 'eng', '\0', 'old\0'));
	const data = bytes(id3Tag(4, [described, plain]), MPEG_FRAME);

	const result = writeMp3Metadata(data, { Comment: 'new' });

	expect(result).toEqual(bytes(
		id3Tag(4, [described, id3Frame('COMM', bytes([0], 'und', '\0', 'new\0'))]),
		MPEG_FRAME,
	));
});

test('text outside Latin-1 is encoded per version', () => {
	const v4 = writeMp3Metadata(MPEG_FRAME, { Artist: 'Ω' });
	expect(v4).toEqual(bytes(id3Tag(4, [id3Frame('TPE1', [3, 0xce, 0xa9, 0])]), MPEG_FRAME));

	const v3 = writeMp3Metadata(bytes(id3Tag(3, []), MPEG_FRAME), { Artist: 'Ω' });
	expect(v3).toEqual(bytes(id3Tag(3, [id3Frame('TPE1', [1, 0xff, 0xfe, 0xa9, 0x03, 0, 0])]), MPEG_FRAME));
});

test('rejects what it can\'t write', () => {
	expect(() => writeMp3Metadata(bytes('RIFF', [0, 0, 0, 0]), { Title: 'x' })).toThrow(FormatError);
	expect(() => writeMp3Metadata(MPEG_FRAME, { Description: 'x' })).toThrow(NoWritableTagsError);

	const flagged = bytes(id3Tag(4, [id3Frame('TIT2', bytes([0], 'a\0'))], 0, 0x40), MPEG_FRAME);
	expect(() => writeMp3Metadata(flagged, { Title: 'x' })).toThrow(UnsupportedLayoutError);

	const v22 = bytes('ID3', [2, 0, 0], [0, 0, 0, 0], MPEG_FRAME);
	expect(() => writeMp3Metadata(v22, { Title: 'x' })).toThrow(UnsupportedLayoutError);
});

test('XMP keys win over the ID3 namespace', () => {
	const result = writeMp3Metadata(MPEG_FRAME, { 'Audio:MP3:Title': 'From MP3', 'XMP:Title': 'From XMP' });

	expect(result).toEqual(bytes(id3Tag(4, [id3Frame('TIT2', bytes([0], 'From XMP\0'))]), MPEG_FRAME));
});
