import { AudioFormat, durationMs } from '../audio/pcm.js';
import { encodeWav } from '../audio/wav.js';
import { SpeechToTextClient } from '../llm/types.js';

export interface TranscriptionServiceOptions {
  client: SpeechToTextClient;
  /** ISO-639-1 code; omitted means the service detects the language. */
  language?: string;
}

export interface TranscriptionSegment {
  pcm: Buffer;
  format: AudioFormat;
}

export class TranscriptionService {
  private readonly client: SpeechToTextClient;
  private readonly language?: string;

  constructor(options: TranscriptionServiceOptions) {
    this.client = options.client;
    this.language = options.language?.trim() || undefined;
  }

  async transcribe(segment: TranscriptionSegment): Promise<string> {
    if (durationMs(segment.pcm.length, segment.format) === 0) {
      return '';
    }
    return this.client.transcribe({
      audio: encodeWav(segment.pcm, segment.format),
      fileName: 'audio_temp.wav',
      mimeType: 'audio/wav',
      language: this.language
    });
  }
}
