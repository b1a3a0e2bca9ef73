import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { decodeWav } from '../../src/audio/wav.js';
import { CaptureLoop } from '../../src/capture/captureLoop.js';
import { FileStore } from '../../src/storage/fileStore.js';
import { CaptureSessionStore, getSessionKey, isSessionExpired } from '../../scripts/server/stores.js';

const format = { sampleRate: 8000, channels: 1, sampleWidth: 2 };
const startedAt = new Date(2024, 6, 1, 10, 0, 0);

describe('capture sessions', () => {
  let rootDir: string;
  let store: FileStore;
  let sessions: CaptureSessionStore;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'capture-sessions-'));
    store = new FileStore({ rootDir });
    sessions = new CaptureSessionStore(() => new CaptureLoop({ store, transcriber: { transcribe: async () => 'bye' } }));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('normalizes session keys', () => {
    expect(getSessionKey(undefined)).toBe('anonymous');
    expect(getSessionKey('  tab-1 ')).toBe('tab-1');
    expect(getSessionKey('bad key!')).toBe('anonymous');
  });

  it('keeps one capture loop per session', () => {
    const first = sessions.get('tab-1');
    expect(sessions.get('tab-1')).toBe(first);
    expect(sessions.get('tab-2')).not.toBe(first);
    expect(sessions.size).toBe(2);
    expect(sessions.has('tab-3')).toBe(false);
  });

  it('reports which meeting is being recorded', async () => {
    const loop = sessions.get('tab-1');
    sessions.get('tab-2');
    const { meetingId } = await loop.start(startedAt);

    expect(meetingId).toBe('2024_07_01_10_00_00');
    expect(sessions.isRecording('2024_07_01_10_00_00')).toBe(true);
    expect(sessions.isRecording('2024_07_01_09_00_00')).toBe(false);

    await loop.stop();
    expect(sessions.isRecording('2024_07_01_10_00_00')).toBe(false);
  });

  it('evicts stale sessions and stops recordings left behind', async () => {
    sessions.get('idle-tab', 0);
    const abandoned = sessions.get('closed-tab', 0);
    await abandoned.start(startedAt);
    abandoned.appendFrames([{ format, data: Buffer.alloc(16000) }]);
    sessions.get('fresh-tab', 9000);

    const evicted = await sessions.evictStale(10_000, 5000);

    expect(evicted.map((entry) => entry.sessionKey)).toEqual(['idle-tab', 'closed-tab']);
    expect(evicted[0]).toEqual({ sessionKey: 'idle-tab', meetingId: undefined, flush: undefined });
    expect(evicted[1]).toMatchObject({
      sessionKey: 'closed-tab',
      meetingId: '2024_07_01_10_00_00',
      flush: { final: true, text: 'bye', durationMs: 1000 }
    });
    expect(sessions.size).toBe(1);
    expect(sessions.has('fresh-tab')).toBe(true);
    expect(sessions.isRecording('2024_07_01_10_00_00')).toBe(false);

    const audio = await store.readAudio('2024_07_01_10_00_00');
    expect(audio && decodeWav(audio).data.length).toBe(16000);
    expect(await store.readText('2024_07_01_10_00_00', 'transcript')).toBe('bye');
  });

  it('measures idleness from the last request', () => {
    expect(isSessionExpired(1000, 6000, 5000)).toBe(false);
    expect(isSessionExpired(1000, 6001, 5000)).toBe(true);
  });
});
