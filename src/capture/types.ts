import type { AudioFormat } from '../audio/pcm.js';

/** `stopping` covers the final flush; no frames are accepted in it. */
export type CaptureState = 'idle' | 'recording' | 'stopping';

export type FlushStep = 'audio' | 'transcription' | 'transcript';

export interface FlushError {
  step: FlushStep;
  type: string;
  message: string;
}

export interface FlushOutcome {
  meetingId: string;
  /** 1-based position of this flush within the recording. */
  index: number;
  durationMs: number;
  text: string;
  final: boolean;
  errors: FlushError[];
}

export interface CaptureSnapshot {
  state: CaptureState;
  meetingId?: string;
  startedAt?: string;
  format?: AudioFormat;
  transcript: string;
  bufferedMs: number;
  flushCount: number;
}

export interface SegmentTranscriber {
  transcribe(segment: { pcm: Buffer; format: AudioFormat }): Promise<string>;
}
