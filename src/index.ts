/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export {
	MetadataWriter,
	writeMetadata,
} from './metadata-writer';
export {
	type MetadataWriterOptions,
	type ResolvedWriterOptions,
	validateMetadataWriterOptions,
} from './options';
export {
	CONTAINER_FORMATS,
	type ContainerFormat,
	detectContainerFormat,
} from './format';
export {
	type MetadataRequest,
	type MetadataValue,
	type TextField,
	TEXT_FIELDS,
} from './metadata';
export {
	MetadataWriteError,
	type MetadataErrorContext,
	FormatError,
	StructuralLimitError,
	UnsupportedLayoutError,
	IntegrityCheckError,
	UnsupportedTagError,
	NoWritableTagsError,
} from './errors';
export {
	type Block,
	type ContainerLayout,
	type ByteEdit,
	locateBlock,
	removalEdits,
	spliceBytes,
	mapOffset,
} from './container';
export {
	computeOggCrc,
} from './crc';
export {
	encodeSynchsafe,
	decodeSynchsafe,
	buildOggLacing,
	splitOggLacing,
} from './varint';
export {
	encodeVarInt,
	readElementHeader,
} from './matroska/ebml';
export {
	buildXmpPacket,
} from './xmp';

export { writeJpegMetadata } from './jpeg/jpeg-writer';
export { readJpegSegments } from './jpeg/jpeg-reader';
export { writeRiffMetadata } from './riff/riff-writer';
export { readRiffChunks } from './riff/riff-reader';
export { writeOggMetadata } from './ogg/ogg-writer';
export { readOggPages } from './ogg/ogg-reader';
export { writeFlacMetadata } from './flac/flac-writer';
export { readFlacMetadataBlocks } from './flac/flac-reader';
export { writeMp3Metadata } from './mp3/mp3-writer';
export { readId3Tag } from './mp3/id3-reader';
export { writeAsfMetadata } from './asf/asf-writer';
export { readAsfHeader } from './asf/asf-reader';
export { writeIsobmffMetadata } from './isobmff/isobmff-writer';
export { readBoxes } from './isobmff/isobmff-reader';
export { writeMatroskaMetadata } from './matroska/matroska-writer';
export { readEbmlElements } from './matroska/ebml';
