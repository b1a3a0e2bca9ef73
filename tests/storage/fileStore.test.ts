import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { decodeWav, readWavHeader, WAV_HEADER_BYTES } from '../../src/audio/wav.js';
import { InvalidRequestError, StorageError } from '../../src/errors/index.js';
import { FileStore } from '../../src/storage/fileStore.js';

const format = { sampleRate: 8000, channels: 1, sampleWidth: 2 };
const meetingId = '2024_01_02_03_04_05';

describe('FileStore', () => {
  let rootDir: string;
  let store: FileStore;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'meeting-store-'));
    store = new FileStore({ rootDir });
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('allocates the next free second when the id is taken', async () => {
    const start = new Date(2024, 0, 2, 3, 4, 5);
    const first = await store.allocateMeeting(start);
    const second = await store.allocateMeeting(start);

    expect(first).toBe('2024_01_02_03_04_05');
    expect(second).toBe('2024_01_02_03_04_06');
    expect(await store.listMeetingIds()).toEqual([first, second]);
  });

  it('lists only meeting directories', async () => {
    await fs.mkdir(path.join(rootDir, 'notes'));
    await fs.writeFile(path.join(rootDir, '2024_01_01_00_00_00'), 'not a folder');
    await store.allocateMeeting(new Date(2024, 4, 1, 12, 0, 0));

    expect(await store.listMeetingIds()).toEqual(['2024_05_01_12_00_00']);
  });

  it('returns an empty list when the root does not exist yet', async () => {
    const missing = new FileStore({ rootDir: path.join(rootDir, 'missing') });
    expect(await missing.listMeetingIds()).toEqual([]);
  });

  it('treats missing text artifacts as empty', async () => {
    expect(await store.readText(meetingId, 'summary')).toBe('');
    expect(await store.readText(meetingId, 'title')).toBe('');
    expect(await store.readAudio(meetingId)).toBeUndefined();
  });

  it('appends transcript text and overwrites title', async () => {
    await store.appendTranscript(meetingId, 'Hello ');
    await store.appendTranscript(meetingId, 'world.');
    await store.writeText(meetingId, 'title', 'Draft');
    await store.writeText(meetingId, 'title', 'Planning');

    expect(await store.readText(meetingId, 'transcript')).toBe('Hello world.');
    expect(await store.readText(meetingId, 'title')).toBe('Planning');
    expect(await fs.readFile(path.join(rootDir, meetingId, 'transcription.txt'), 'utf8')).toBe('Hello world.');
  });

  it('merges audio segments into the cumulative file', async () => {
    await store.appendAudio(meetingId, Buffer.from([1, 0, 2, 0]), format);
    await store.appendAudio(meetingId, Buffer.from([3, 0]), format);
    await store.writeAudioChunk(meetingId, Buffer.from([3, 0]), format);

    const audio = await store.readAudio(meetingId);
    expect(audio).toBeDefined();
    if (audio) {
      expect([...decodeWav(audio).data]).toEqual([1, 0, 2, 0, 3, 0]);
    }
    const chunk = await fs.readFile(path.join(rootDir, meetingId, 'audio_temp.wav'));
    expect([...decodeWav(chunk).data]).toEqual([3, 0]);
    expect(await store.hasArtifact(meetingId, 'audio')).toBe(true);
  });

  it('appends new samples and patches the header sizes in place', async () => {
    await store.appendAudio(meetingId, Buffer.from([1, 0, 2, 0]), format);
    await store.appendAudio(meetingId, Buffer.from([3, 0]), format);

    const raw = await fs.readFile(path.join(rootDir, meetingId, 'audio.wav'));
    expect(raw.length).toBe(WAV_HEADER_BYTES + 6);
    expect(raw.readUInt32LE(4)).toBe(36 + 6);
    expect(raw.readUInt32LE(40)).toBe(6);
    expect(readWavHeader(raw).format).toEqual(format);
    expect([...raw.subarray(WAV_HEADER_BYTES)]).toEqual([1, 0, 2, 0, 3, 0]);
  });

  it('refuses to merge audio in another format', async () => {
    await store.appendAudio(meetingId, Buffer.alloc(4), format);
    await expect(store.appendAudio(meetingId, Buffer.alloc(4), { ...format, sampleRate: 16000 })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    expect((await fs.stat(path.join(rootDir, meetingId, 'audio.wav'))).size).toBe(WAV_HEADER_BYTES + 4);
  });

  it('rejects ids that are not meeting timestamps', async () => {
    await expect(store.readText('../secrets', 'title')).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(store.writeText('notes', 'title', 'x')).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it('wraps filesystem failures with the artifact name', async () => {
    await fs.mkdir(path.join(rootDir, meetingId, 'title.txt'), { recursive: true });
    const error = await store.writeText(meetingId, 'title', 'x').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageError);
    if (error instanceof StorageError) {
      expect(error.artifact).toBe('title');
      expect(error.message).toBe(`Could not write title for meeting ${meetingId}.`);
    }
  });
});
