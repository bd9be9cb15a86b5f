import { expect, test } from 'vitest';
import { FormatError, UnsupportedTagError } from '../../src/errors';
import { detectContainerFormat } from '../../src/format';
import { writeJpegMetadata } from '../../src/jpeg/jpeg-writer';
import { MetadataWriter, writeMetadata } from '../../src/metadata-writer';
import { writeRiffMetadata } from '../../src/riff/riff-writer';
import {
	asf,
	bytes,
	EBML_HEADER,
	EXIF_APP1,
	FLAC_FRAMES,
	FLAC_STREAMINFO_PAYLOAD,
	flacBlock,
	FTYP,
	id3Tag,
	JFIF_APP0,
	jpeg,
	MPEG_FRAME,
	oggVorbis,
	VORBIS_COMMENT_SIGNATURE,
	vorbisCommentPacket,
	WAV_FMT,
	wav,
} from './fixtures';

test('containers are told apart by their leading bytes', () => {
	const comments = vorbisCommentPacket(VORBIS_COMMENT_SIGNATURE, 'v', [], true);

	expect(detectContainerFormat(jpeg(JFIF_APP0))).toBe('jpeg');
	expect(detectContainerFormat(wav(WAV_FMT))).toBe('riff');
	expect(detectContainerFormat(oggVorbis([comments.byteLength], comments))).toBe('ogg');
	expect(detectContainerFormat(bytes('fLaC', flacBlock(0, true, FLAC_STREAMINFO_PAYLOAD)))).toBe('flac');
	expect(detectContainerFormat(bytes(id3Tag(4, []), MPEG_FRAME))).toBe('mp3');
	expect(detectContainerFormat(MPEG_FRAME)).toBe('mp3');
	expect(detectContainerFormat(asf())).toBe('asf');
	expect(detectContainerFormat(FTYP)).toBe('isobmff');
	expect(detectContainerFormat(EBML_HEADER)).toBe('matroska');
	expect(detectContainerFormat(bytes('GIF89a'))).toBe(null);
	expect(detectContainerFormat(new Uint8Array(0))).toBe(null);
});

test('writes through the detected container\'s writer', () => {
	const image = jpeg(JFIF_APP0, EXIF_APP1);
	const audio = wav(WAV_FMT);

	expect(writeMetadata(image, { 'XMP:Title': 'A' })).toEqual(writeJpegMetadata(image, { 'XMP:Title': 'A' }));
	expect(writeMetadata(audio, { Title: 'A' })).toEqual(writeRiffMetadata(audio, { Title: 'A' }));
});

test('the input is never modified', () => {
	const data = wav(WAV_FMT);
	const copy = data.slice();

	const result = new MetadataWriter().write(data, { Title: 'A' });

	expect(result).not.toBe(data);
	expect(data).toEqual(copy);
});

test('an explicit format skips detection', () => {
	const writer = new MetadataWriter();

	expect(() => writer.write(wav(WAV_FMT), { Title: 'A' }, 'flac')).toThrow(FormatError);
});

test('options are resolved once per writer', () => {
	const writer = new MetadataWriter({ vendorString: 'tagger' });

	expect(writer.options).toEqual({ quickTimePad: 0, quickTimeHandler: 'mdir', vendorString: 'tagger' });
	expect(() => new MetadataWriter({ quickTimePad: -8 })).toThrow(TypeError);

	const data = bytes('fLaC', flacBlock(0, true, FLAC_STREAMINFO_PAYLOAD), FLAC_FRAMES);
	const result = writer.write(data, { Title: 'A' });
	expect(result).toEqual(bytes(
		'fLaC',
		flacBlock(0, false, FLAC_STREAMINFO_PAYLOAD),
		flacBlock(4, true, vorbisCommentPacket(bytes(), 'tagger', ['TITLE=A'], false)),
		FLAC_FRAMES,
	));
});

test('unrecognized data fails without a format', () => {
	let error: unknown = null;
	try {
		writeMetadata(bytes('GIF89a'), { Title: 'A' });
	} catch (e) {
		error = e;
	}

	expect(error).toBeInstanceOf(FormatError);
	expect(error).toMatchObject({
		format: null,
		offset: 0,
		message: 'Unrecognized container. (at offset 0) Expected a known container signature, found "GIF8".',
	});
});

test('invalid requests are rejected before any parsing', () => {
	expect(() => writeMetadata(bytes('GIF89a'), { Rating: Number.NaN })).toThrow(TypeError);
	expect(() => writeMetadata(jpeg(JFIF_APP0), { 'Photoshop:Slices': 'x' })).toThrow(UnsupportedTagError);
});
