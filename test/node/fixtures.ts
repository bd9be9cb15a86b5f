import { computeOggCrc } from '../../src/crc';
import { asciiBytes, concatBytes, textEncoder, utf16LeBytes } from '../../src/misc';

// Small synthetic files. Audio and image payloads are placeholder bytes; only the framing is real.

type Part = Uint8Array | string | number[];

const toBytes = (part: Part) => {
	if (typeof part === 'string') return asciiBytes(part);
	if (Array.isArray(part)) return new Uint8Array(part);
	return part;
};

export const bytes = (...parts: Part[]) => concatBytes(parts.map(toBytes));

export const u16be = (value: number) => [(value >> 8) & 0xff, value & 0xff];
export const u32be = (value: number) => [(value >>> 24) & 0xff, (value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
export const u16le = (value: number) => [value & 0xff, (value >> 8) & 0xff];
export const u32le = (value: number) => [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff];
export const u64le = (value: number) => [...u32le(value >>> 0), ...u32le(Math.floor(value / 2 ** 32))];

export const readU32Le = (data: Uint8Array, offset: number) => {
	return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(offset, true);
};

export const readU32Be = (data: Uint8Array, offset: number) => {
	return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(offset, false);
};

export const readU64Le = (data: Uint8Array, offset: number) => {
	return readU32Le(data, offset) + readU32Le(data, offset + 4) * 2 ** 32;
};

/** Returns the index of the first occurrence of `pattern`, or -1. */
export const indexOfBytes = (data: Uint8Array, pattern: Uint8Array, from = 0) => {
	outer: for (let i = from; i + pattern.byteLength <= data.byteLength; i++) {
		for (let j = 0; j < pattern.byteLength; j++) {
			if (data[i + j] !== pattern[j]) continue outer;
		}
		return i;
	}

	return -1;
};

// JPEG

export const jpegSegment = (marker: number, payload: Part) => {
	const body = toBytes(payload);
	return bytes([0xff, marker], u16be(body.byteLength + 2), body);
};

export const JFIF_APP0 = jpegSegment(0xe0, bytes('JFIF\0', [1, 1, 1, 0, 72, 0, 72, 0, 0]));
export const EXIF_APP1 = jpegSegment(0xe1, bytes('Exif\0\0', [0x4d, 0x4d, 0, 0x2a]));
export const JPEG_SOS = jpegSegment(0xda, [1, 1, 0, 0, 0x3f, 0]);
export const JPEG_SCAN_DATA = new Uint8Array([0x12, 0x34, 0xff, 0x00, 0x56]);

/** SOI, the given segments, a scan and EOI. */
export const jpeg = (...segments: Uint8Array[]) => {
	return bytes([0xff, 0xd8], ...segments, JPEG_SOS, JPEG_SCAN_DATA, [0xff, 0xd9]);
};

// RIFF

export const riffChunk = (fourCC: string, payload: Part, pad = true) => {
	const body = toBytes(payload);
	return bytes(fourCC, u32le(body.byteLength), body, pad && body.byteLength % 2 === 1 ? [0] : []);
};

export const riffInfoList = (entries: [string, string][]) => {
	return riffChunk('LIST', bytes('INFO', ...entries.map(([fourCC, text]) => riffChunk(fourCC, bytes(text, [0])))));
};

export const WAV_FMT = riffChunk('fmt ', [1, 0, 1, 0, 0x44, 0xac, 0, 0, 0x88, 0x58, 1, 0, 2, 0, 16, 0]);

export const wav = (...chunks: Uint8Array[]) => {
	const body = bytes('WAVE', ...chunks);
	return bytes('RIFF', u32le(body.byteLength), body);
};

// Ogg

export interface OggPageOptions {
	headerType?: number;
	serial?: number;
	sequence?: number;
	lacing: number[];
	payload: Uint8Array;
}

export const oggPage = ({ headerType = 0, serial = 1, sequence = 0, lacing, payload }: OggPageOptions) => {
	const page = bytes(
		'OggS',
		[0, headerType],
		[0, 0, 0, 0, 0, 0, 0, 0],
		u32le(serial),
		u32le(sequence),
		[0, 0, 0, 0],
		[lacing.length],
		lacing,
		payload,
	);
	page.set(u32le(computeOggCrc(page)), 22);
	return page;
};

/** A comment header packet: signature, vendor, comments and, for Vorbis, the framing bit. */
export const vorbisCommentPacket = (signature: Uint8Array, vendor: string, comments: string[], framingBit: boolean) => {
	return bytes(
		signature,
		u32le(vendor.length),
		vendor,
		u32le(comments.length),
		...comments.map(comment => bytes(u32le(textEncoder.encode(comment).byteLength), textEncoder.encode(comment))),
		framingBit ? [1] : [],
	);
};

export const VORBIS_IDENTIFICATION = bytes([1], 'vorbis', new Array<number>(23).fill(0));
export const VORBIS_COMMENT_SIGNATURE = bytes([3], 'vorbis');
export const VORBIS_SETUP_START = bytes([5], 'vorb');

/** Identification page, then a page holding the given comment lacing and payload, then an audio page. */
export const oggVorbis = (commentLacing: number[], commentPayload: Uint8Array) => {
	return bytes(
		oggPage({ headerType: 2, sequence: 0, lacing: [VORBIS_IDENTIFICATION.byteLength], payload: VORBIS_IDENTIFICATION }),
		oggPage({ sequence: 1, lacing: commentLacing, payload: commentPayload }),
		oggPage({ sequence: 2, lacing: [4], payload: bytes([9, 8, 7, 6]) }),
	);
};

// FLAC

export const flacBlock = (type: number, isLast: boolean, payload: Part) => {
	const body = toBytes(payload);
	const length = body.byteLength;
	return bytes([(isLast ? 0x80 : 0) | type, (length >> 16) & 0xff, (length >> 8) & 0xff, length & 0xff], body);
};

export const FLAC_STREAMINFO_PAYLOAD = new Uint8Array(34).fill(0x11);
export const FLAC_FRAMES = new Uint8Array([0xff, 0xf8, 0x69, 0x08, 0x00, 0x42]);

// MP3

export const MPEG_FRAME = new Uint8Array([0xff, 0xfb, 0x90, 0x64, 0x00, 0x00, 0x00, 0x00]);

export const id3Frame = (id: string, payload: Part) => {
	const body = toBytes(payload);
	// Test frames stay below 128 bytes, where synchsafe and plain sizes agree
	return bytes(id, u32be(body.byteLength), [0, 0], body);
};

export const id3Tag = (version: 3 | 4, frames: Uint8Array[], padding = 0, flags = 0) => {
	const body = bytes(...frames, new Array<number>(padding).fill(0));
	return bytes('ID3', [version, 0, flags], u32be(body.byteLength), body);
};

// ASF

export const guidBytes = (guid: string) => {
	const hex = guid.replace(/-/g, '');
	const result = Array.from({ length: 16 }, (_, i) => parseInt(hex.slice(2 * i, 2 * i + 2), 16));
	return [...result.slice(0, 4).reverse(), ...result.slice(4, 6).reverse(), ...result.slice(6, 8).reverse(), ...result.slice(8)];
};

export const asfObject = (guid: string, payload: Part) => {
	const body = toBytes(payload);
	return bytes(guidBytes(guid), u64le(24 + body.byteLength), body);
};

export const asfText = (text: string) => utf16LeBytes(text, true);

export const asfContentDescription = (title: string) => {
	const titleBytes = asfText(title);
	return asfObject(
		'75B22633-668E-11CF-A6D9-00AA0062CE6C',
		bytes(u16le(titleBytes.byteLength), u16le(0), u16le(0), u16le(0), u16le(0), titleBytes),
	);
};

/** File Properties with an all-zero file ID, so the header parses with two reserved bytes only. */
export const asfFileProperties = (fileSize: number) => {
	return asfObject('8CABDCA1-A947-11CF-8EE4-00C00C205365', bytes(
		new Array<number>(16).fill(0),
		u64le(fileSize),
		new Array<number>(56).fill(0),
	));
};

export const ASF_DATA = bytes(
	guidBytes('75B22636-668E-11CF-A6D9-00AA0062CE6C'),
	u64le(50),
	new Array<number>(26).fill(0x5a),
);

/** A Header Object holding File Properties plus the given objects, followed by a Data Object. */
export const asf = (...objects: Uint8Array[]) => {
	const headerSize = 30 + 104 + objects.reduce((a, b) => a + b.byteLength, 0);
	const fileSize = headerSize + ASF_DATA.byteLength;

	return bytes(
		guidBytes('75B22630-668E-11CF-A6D9-00AA0062CE6C'),
		u64le(headerSize),
		u32le(1 + objects.length),
		[0x01, 0x02],
		asfFileProperties(fileSize),
		...objects,
		ASF_DATA,
	);
};

// ISO-BMFF

export const isoBox = (type: string, ...parts: Part[]) => {
	const body = bytes(...parts);
	return bytes(u32be(8 + body.byteLength), type, body);
};

export const FTYP = isoBox('ftyp', 'isom', u32be(0x200), 'isom');

/** A `moov` whose single track has one chunk at `chunkOffset`, with optional extra children. */
export const moov = (chunkOffset: number, ...extra: Uint8Array[]) => {
	const stco = isoBox('stco', [0, 0, 0, 0], u32be(1), u32be(chunkOffset));
	const trak = isoBox('trak', isoBox('mdia', isoBox('minf', isoBox('stbl', stco))));
	return isoBox('moov', trak, ...extra);
};

export const MDAT_PAYLOAD = new Uint8Array(16).fill(0xab);

// EBML

const ebmlSize = (size: number) => {
	if (size < 127) return [0x80 | size];
	return [0x40 | (size >> 8), size & 0xff];
};

export const ebml = (id: number[], ...parts: Part[]) => {
	const body = bytes(...parts);
	return bytes(id, ebmlSize(body.byteLength), body);
};

export const EBML_HEADER = ebml([0x1a, 0x45, 0xdf, 0xa3], ebml([0x42, 0x82], 'matroska'));
