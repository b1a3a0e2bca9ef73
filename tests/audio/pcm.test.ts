import { describe, expect, it } from 'vitest';
import { AudioSegment, bytesPerSecond, durationMs, validateAudioFormat } from '../../src/audio/pcm.js';
import { InvalidRequestError } from '../../src/errors/index.js';

const format = { sampleRate: 8000, channels: 1, sampleWidth: 2 };

describe('pcm helpers', () => {
  it('computes byte rate and duration', () => {
    expect(bytesPerSecond(format)).toBe(16000);
    expect(durationMs(8000, format)).toBe(500);
  });

  it('rejects unsupported formats', () => {
    expect(() => validateAudioFormat({ sampleRate: 0, channels: 1, sampleWidth: 2 })).toThrow(InvalidRequestError);
    expect(() => validateAudioFormat({ sampleRate: 8000, channels: 1, sampleWidth: 5 })).toThrow(
      'Unsupported sample width: 5.'
    );
  });
});

describe('AudioSegment', () => {
  it('accumulates frames in arrival order and clears', () => {
    const segment = new AudioSegment(format);
    segment.append({ format, data: Buffer.from([1, 2]) });
    segment.append({ format, data: Buffer.from([3, 4, 5, 6]) });

    expect(segment.size).toBe(6);
    expect([...segment.toBuffer()]).toEqual([1, 2, 3, 4, 5, 6]);

    segment.clear();
    expect(segment.isEmpty).toBe(true);
    expect(segment.durationMs).toBe(0);
  });

  it('rejects frames with a different format', () => {
    const segment = new AudioSegment(format);
    expect(() => segment.append({ format: { ...format, sampleRate: 16000 }, data: Buffer.alloc(2) })).toThrow(
      'Audio frame format does not match the recording format.'
    );
  });

  it('rejects frames that split a sample', () => {
    const segment = new AudioSegment({ ...format, channels: 2 });
    expect(() => segment.append({ format: { ...format, channels: 2 }, data: Buffer.alloc(6) })).toThrow(
      'Audio frame length must be a multiple of 4 bytes.'
    );
  });
});
