import { describe, expect, it } from 'vitest';
import { decodeWav } from '../../src/audio/wav.js';
import { SpeechToTextRequest } from '../../src/llm/types.js';
import { TranscriptionService } from '../../src/transcription/transcriptionService.js';

const format = { sampleRate: 8000, channels: 1, sampleWidth: 2 };

describe('TranscriptionService', () => {
  it('encodes the segment as wav and passes the language hint', async () => {
    const requests: SpeechToTextRequest[] = [];
    const service = new TranscriptionService({
      client: {
        transcribe: async (request) => {
          requests.push(request);
          return 'Olá a todos.';
        }
      },
      language: 'pt'
    });

    const text = await service.transcribe({ pcm: Buffer.alloc(16000), format });

    expect(text).toBe('Olá a todos.');
    expect(requests).toHaveLength(1);
    expect(requests[0].language).toBe('pt');
    expect(requests[0].mimeType).toBe('audio/wav');
    expect(decodeWav(requests[0].audio).data.length).toBe(16000);
  });

  it('leaves the language unset for auto-detection', async () => {
    let seen: SpeechToTextRequest | undefined;
    const service = new TranscriptionService({
      client: {
        transcribe: async (request) => {
          seen = request;
          return 'hi';
        }
      },
      language: '  '
    });

    await service.transcribe({ pcm: Buffer.alloc(160), format });
    expect(seen?.language).toBeUndefined();
  });

  it('skips the call for an empty segment', async () => {
    let calls = 0;
    const service = new TranscriptionService({
      client: {
        transcribe: async () => {
          calls += 1;
          return 'never';
        }
      }
    });

    expect(await service.transcribe({ pcm: Buffer.alloc(0), format })).toBe('');
    expect(calls).toBe(0);
  });
});
