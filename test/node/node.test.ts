import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, expect, test } from 'vitest';
import { FormatError } from '../../src/errors';
import { writeMetadata } from '../../src/metadata-writer';
import { rewriteMetadataFile, temporaryPathFor } from '../../src/node';
import { bytes, WAV_FMT, wav } from './fixtures';

let directory: string;

beforeEach(async () => {
	directory = await fs.mkdtemp(path.join(os.tmpdir(), 'metasplice-'));
});

afterEach(async () => {
	await fs.rm(directory, { recursive: true, force: true });
});

test('rewrites a file in place', async () => {
	const data = wav(WAV_FMT);
	const filePath = path.join(directory, 'audio.wav');
	await fs.writeFile(filePath, data);

	const size = await rewriteMetadataFile(filePath, { Title: 'On disk' });

	const written = new Uint8Array(await fs.readFile(filePath));
	expect(written).toEqual(writeMetadata(data, { Title: 'On disk' }));
	expect(size).toBe(written.byteLength);
	expect(await fs.readdir(directory)).toEqual(['audio.wav']);
});

test('a failed rewrite leaves the file as it was', async () => {
	const data = bytes('not a media file');
	const filePath = path.join(directory, 'notes.txt');
	await fs.writeFile(filePath, data);

	await expect(rewriteMetadataFile(filePath, { Title: 'x' })).rejects.toThrow(FormatError);

	expect(new Uint8Array(await fs.readFile(filePath))).toEqual(data);
	expect(await fs.readdir(directory)).toEqual(['notes.txt']);
});

test('a missing file rejects', async () => {
	await expect(rewriteMetadataFile(path.join(directory, 'missing.wav'), { Title: 'x' })).rejects.toThrow();
});

test('temporary paths sit next to the file under a random name', () => {
	const filePath = path.join(directory, 'photo.jpg');

	const first = temporaryPathFor(filePath);
	const second = temporaryPathFor(filePath);

	expect(path.dirname(first)).toBe(directory);
	expect(path.basename(first)).toMatch(/^\.photo\.jpg\.[0-9a-f]{16}\.tmp$/);
	expect(second).not.toBe(first);
});

test('files sitting at old counter-style temporary names are left alone', async () => {
	const data = wav(WAV_FMT);
	const filePath = path.join(directory, 'audio.wav');
	await fs.writeFile(filePath, data);
	const planted = `.audio.wav.${process.pid}.0.tmp`;
	await fs.writeFile(path.join(directory, planted), 'placed');

	await rewriteMetadataFile(filePath, { Title: 'On disk' });

	expect(await fs.readFile(path.join(directory, planted), 'utf8')).toBe('placed');
	expect((await fs.readdir(directory)).sort()).toEqual([planted, 'audio.wav']);
});
