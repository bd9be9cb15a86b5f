import { expect, test } from 'vitest';
import {
	FormatError,
	NoWritableTagsError,
	StructuralLimitError,
	UnsupportedLayoutError,
	UnsupportedTagError,
} from '../../src/errors';
import { blockPayload } from '../../src/container';
import { readJpegSegments, XMP_SIGNATURE } from '../../src/jpeg/jpeg-reader';
import { createXmpSegment, ICC_CHUNK_SIZE } from '../../src/jpeg/jpeg-segments';
import { writeJpegMetadata } from '../../src/jpeg/jpeg-writer';
import type { MetadataRequest } from '../../src/metadata';
import { textDecoder } from '../../src/misc';
import { buildXmpPacket } from '../../src/xmp';
import { bytes, EXIF_APP1, JFIF_APP0, jpeg, JPEG_SCAN_DATA, jpegSegment, u32be } from './fixtures';

const xmpSegment = (request: MetadataRequest) => {
	const packet = buildXmpPacket(request);
	if (!packet) throw new Error('Request has no XMP keys.');
	return createXmpSegment(packet);
};

const EXTENDED_GUID = '0123456789ABCDEF0123456789ABCDEF';

/** One chunk of an extended packet, holding `length` bytes from `offset`. */
const extendedXmpSegment = (packet: string, offset: number, length: number) => {
	return jpegSegment(0xe1, bytes(
		'http://ns.adobe.com/xmp/extension/\0',
		EXTENDED_GUID,
		u32be(packet.length),
		u32be(offset),
		packet.slice(offset, offset + length),
	));
};

const kinds = (data: Uint8Array) => readJpegSegments(data).blocks.map(segment => segment.tag.kind);

test('segment walk stops after the scan header', () => {
	const data = jpeg(JFIF_APP0, EXIF_APP1);
	const layout = readJpegSegments(data);

	expect(layout.blocks.map(segment => [segment.offset, segment.totalLength])).toEqual([[2, 18], [20, 14], [34, 10]]);
	expect(kinds(data)).toEqual(['jfif', 'exif', 'other']);
	expect(layout.end).toBe(44);
	expect([...data.subarray(layout.end, layout.end + JPEG_SCAN_DATA.byteLength)]).toEqual([...JPEG_SCAN_DATA]);
});

test('fill bytes before a marker belong to the segment', () => {
	const data = bytes([0xff, 0xd8, 0xff], JFIF_APP0, [0xff, 0xd9]);
	const layout = readJpegSegments(data);

	expect(layout.blocks[0]).toMatchObject({ offset: 2, headerLength: 5, payloadLength: 14, totalLength: 19 });
});

test('new XMP goes after the EXIF segment', () => {
	const data = jpeg(JFIF_APP0, EXIF_APP1);
	const request = { 'XMP:Title': 'Sunset' };

	const result = writeJpegMetadata(data, request);

	expect(result).toEqual(bytes(data.subarray(0, 34), xmpSegment(request), data.subarray(34)));
	expect(kinds(result)).toEqual(['jfif', 'exif', 'xmp', 'other']);
});

test('existing XMP is replaced where it was', () => {
	const oldXmp = jpegSegment(0xe1, bytes('http://ns.adobe.com/xap/1.0/\0', '<old/>'));
	const extendedXmp = extendedXmpSegment('<more/>', 0, 7);
	const data = jpeg(JFIF_APP0, oldXmp, EXIF_APP1, extendedXmp);
	const request = { 'XMP:Title': 'Sunset' };

	const result = writeJpegMetadata(data, request);

	expect(result).toEqual(jpeg(JFIF_APP0, xmpSegment(request), EXIF_APP1));
	expect(writeJpegMetadata(result, request)).toEqual(result);
});

test('stored XMP properties survive a rewrite', () => {
	const main = '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">'
		+ '<rdf:Description rdf:about="" xmlns:xmp="http://ns.adobe.com/xap/1.0/"'
		+ ` xmlns:xmpNote="http://ns.adobe.com/xmp/note/" xmp:Rating="3" xmpNote:HasExtendedXMP="${EXTENDED_GUID}"/>`
		+ '</rdf:RDF></x:xmpmeta>';
	const extended = '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">'
		+ '<rdf:Description rdf:about="" xmlns:dc="http://purl.org/dc/elements/1.1/">'
		+ '<dc:title><rdf:Alt><rdf:li xml:lang="x-default">Old</rdf:li></rdf:Alt></dc:title>'
		+ '<dc:source>scan</dc:source>'
		+ '</rdf:Description></rdf:RDF></x:xmpmeta>';
	const data = jpeg(
		JFIF_APP0,
		jpegSegment(0xe1, bytes('http://ns.adobe.com/xap/1.0/\0', main)),
		extendedXmpSegment(extended, 100, extended.length - 100),
		extendedXmpSegment(extended, 0, 100),
	);

	const result = writeJpegMetadata(data, { 'XMP:Title': 'New' });

	expect(kinds(result)).toEqual(['jfif', 'xmp', 'other']);
	const segment = readJpegSegments(result).blocks[1];
	expect(textDecoder.decode(blockPayload(segment).subarray(XMP_SIGNATURE.byteLength)).split('\n')).toEqual([
		'<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
		'<x:xmpmeta xmlns:x="adobe:ns:meta/">',
		' <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
		'  <rdf:Description rdf:about=""',
		'    xmlns:xmp="http://ns.adobe.com/xap/1.0/"',
		'    xmlns:dc="http://purl.org/dc/elements/1.1/"',
		'  >',
		'   <xmp:Rating>3</xmp:Rating>',
		'   <dc:title>',
		'    <rdf:Alt>',
		'     <rdf:li xml:lang="x-default">New</rdf:li>',
		'    </rdf:Alt>',
		'   </dc:title>',
		'   <dc:source>scan</dc:source>',
		'  </rdf:Description>',
		' </rdf:RDF>',
		'</x:xmpmeta>',
		'<?xpacket end="w"?>',
	]);
	expect(writeJpegMetadata(result, { 'XMP:Title': 'New' })).toEqual(result);
});

test('extended XMP with a missing chunk is rejected', () => {
	const packet = '<x:xmpmeta xmlns:x="adobe:ns:meta/"></x:xmpmeta>';
	const data = jpeg(JFIF_APP0, extendedXmpSegment(packet, 10, packet.length - 10));

	expect(() => writeJpegMetadata(data, { 'XMP:Title': 'x' })).toThrow(UnsupportedLayoutError);
});

test('XMP packet layout', () => {
	const packet = buildXmpPacket({ 'XMP:Title': 'Sunset & Sea', 'XMP:Rating': 5, 'Title': 'ignored' });
	const lines = textDecoder.decode(packet ?? new Uint8Array()).split('\n');

	expect(lines).toEqual([
		'<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
		'<x:xmpmeta xmlns:x="adobe:ns:meta/">',
		' <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
		'  <rdf:Description rdf:about=""',
		'    xmlns:dc="http://purl.org/dc/elements/1.1/"',
		'    xmlns:xmp="http://ns.adobe.com/xap/1.0/"',
		'  >',
		'   <dc:title>',
		'    <rdf:Alt>',
		'     <rdf:li xml:lang="x-default">Sunset &amp; Sea</rdf:li>',
		'    </rdf:Alt>',
		'   </dc:title>',
		'   <xmp:Rating>5</xmp:Rating>',
		'  </rdf:Description>',
		' </rdf:RDF>',
		'</x:xmpmeta>',
		'<?xpacket end="w"?>',
	]);
});

test('ICC profiles are split into numbered chunks after JFIF', () => {
	const profile = new Uint8Array(70000).fill(7);

	const result = writeJpegMetadata(jpeg(JFIF_APP0, EXIF_APP1), { ICC_Profile: profile });
	const segments = readJpegSegments(result).blocks;

	expect(segments.map(segment => segment.tag.kind)).toEqual(['jfif', 'icc', 'icc', 'exif', 'other']);
	expect(segments[1].payloadLength).toBe(12 + 2 + ICC_CHUNK_SIZE);
	expect(segments[2].payloadLength).toBe(12 + 2 + 70000 - ICC_CHUNK_SIZE);
	expect([...blockPayload(segments[1]).subarray(12, 14)]).toEqual([1, 2]);
	expect([...blockPayload(segments[2]).subarray(12, 14)]).toEqual([2, 2]);
});

test('an empty ICC profile removes every chunk', () => {
	const chunk = (index: number) => jpegSegment(0xe2, bytes('ICC_PROFILE\0', [index, 2], [1, 2, 3]));
	const data = jpeg(JFIF_APP0, chunk(1), EXIF_APP1, chunk(2));

	expect(writeJpegMetadata(data, { 'ICC:Profile': new Uint8Array(0) })).toEqual(jpeg(JFIF_APP0, EXIF_APP1));
});

test('ICC profiles needing more than 255 chunks are rejected', () => {
	const profile = new Uint8Array(255 * ICC_CHUNK_SIZE + 1);

	expect(() => writeJpegMetadata(jpeg(JFIF_APP0), { ICC_Profile: profile })).toThrow(StructuralLimitError);
});

test('Photoshop resources are merged by ID', () => {
	const kept = bytes('8BIM', [0x04, 0x25, 0, 0], u32be(2), 'xy');
	const replaced = bytes('8BIM', [0x04, 0x04, 0, 0], u32be(3), 'old', [0]);
	const data = jpeg(JFIF_APP0, jpegSegment(0xed, bytes('Photoshop 3.0\0', replaced, kept)), EXIF_APP1);

	const result = writeJpegMetadata(data, { 'Photoshop:0x0404': 'abc' });

	const expectedSegment = jpegSegment(0xed, bytes(
		'Photoshop 3.0\0',
		kept,
		bytes('8BIM', [0x04, 0x04, 0, 0], u32be(3), 'abc', [0]),
	));
	expect(result).toEqual(jpeg(JFIF_APP0, expectedSegment, EXIF_APP1));
});

test('resources with older signatures are kept as stored', () => {
	const legacy = bytes('MeSa', [0x04, 0x04, 0, 0], u32be(2), 'ms');
	const replaced = bytes('8BIM', [0x04, 0x04, 0, 0], u32be(3), 'old', [0]);
	const data = jpeg(JFIF_APP0, jpegSegment(0xed, bytes('Photoshop 3.0\0', legacy, replaced, [0, 0])));

	const result = writeJpegMetadata(data, { 'Photoshop:1028': 'new' });

	const expectedSegment = jpegSegment(0xed, bytes(
		'Photoshop 3.0\0',
		legacy,
		bytes('8BIM', [0x04, 0x04, 0, 0], u32be(3), 'new', [0]),
	));
	expect(result).toEqual(jpeg(JFIF_APP0, expectedSegment));
});

test('Photoshop segments that don\'t split into resources are rejected', () => {
	const continued = bytes('8BIM', [0x04, 0x04, 0, 0], u32be(100), 'abc');
	const unknown = bytes('XYZW', [0x04, 0x04, 0, 0], u32be(0));

	for (const resources of [continued, unknown]) {
		const data = jpeg(JFIF_APP0, jpegSegment(0xed, bytes('Photoshop 3.0\0', resources)));
		expect(() => writeJpegMetadata(data, { 'Photoshop:0x0404': 'x' })).toThrow(UnsupportedLayoutError);
	}
});

test('AFCP entries', () => {
	const result = writeJpegMetadata(jpeg(JFIF_APP0), { 'AFCP:Note': 'hi' });

	const expectedSegment = jpegSegment(0xe2, bytes('AFCP', [0, 0, 0, 0], [0, 4], 'Note', u32be(2), 'hi'));
	expect(result).toEqual(jpeg(JFIF_APP0, expectedSegment));
});

test('JFIF density is rewritten in place', () => {
	const data = jpeg(JFIF_APP0, EXIF_APP1);

	const result = writeJpegMetadata(data, { 'JFIF:XResolution': 300, 'JFIF:YResolution': '300' });

	const expected = data.slice();
	expected.set([1, 44, 1, 44], 14);
	expect(result).toEqual(expected);
});

test('rejects what it can\'t write', () => {
	const data = jpeg(JFIF_APP0);

	expect(() => writeJpegMetadata(bytes('GIF89a'), { 'XMP:Title': 'x' })).toThrow(FormatError);
	expect(() => writeJpegMetadata(data, { Title: 'x' })).toThrow(NoWritableTagsError);
	expect(() => writeJpegMetadata(data, { 'Photoshop:Layers': 'x' })).toThrow(UnsupportedTagError);
	expect(() => writeJpegMetadata(data, { 'JFIF:Comment': 'x' })).toThrow(UnsupportedTagError);
	expect(() => writeJpegMetadata(data, { 'XMP:Description': 'x'.repeat(70000) })).toThrow(StructuralLimitError);
});
