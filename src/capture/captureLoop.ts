import { AudioFormat, AudioFrame, AudioSegment, durationMs, validateAudioFormat } from '../audio/pcm.js';
import { describeError, InvalidRequestError } from '../errors/index.js';
import { FileStore } from '../storage/fileStore.js';
import { CaptureSnapshot, CaptureState, FlushError, FlushOutcome, FlushStep, SegmentTranscriber } from './types.js';

export const DEFAULT_FLUSH_INTERVAL_MS = 5000;

export interface CaptureLoopOptions {
  store: FileStore;
  transcriber: SegmentTranscriber;
  flushIntervalMs?: number;
}

const toFlushError = (step: FlushStep, error: unknown): FlushError => ({ step, ...describeError(error) });

export class CaptureLoop {
  private readonly store: FileStore;
  private readonly transcriber: SegmentTranscriber;
  private readonly flushIntervalMs: number;

  private state: CaptureState = 'idle';
  private meetingId?: string;
  private startedAt?: Date;
  private segment?: AudioSegment;
  private transcript = '';
  private flushCount = 0;
  private lastFlushAt = 0;
  private pending?: Promise<FlushOutcome>;

  constructor(options: CaptureLoopOptions) {
    this.store = options.store;
    this.transcriber = options.transcriber;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
  }

  get isRecording(): boolean {
    return this.state === 'recording';
  }

  /** True while the meeting is still being written, including the final flush. */
  get isActive(): boolean {
    return this.state !== 'idle';
  }

  async start(now: Date): Promise<CaptureSnapshot> {
    if (this.state !== 'idle') {
      throw new InvalidRequestError('A recording is already in progress.');
    }
    const meetingId = await this.store.allocateMeeting(now);
    this.state = 'recording';
    this.meetingId = meetingId;
    this.startedAt = now;
    this.segment = undefined;
    this.transcript = '';
    this.flushCount = 0;
    this.lastFlushAt = now.getTime();
    this.pending = undefined;
    return this.snapshot();
  }

  appendFrames(frames: AudioFrame[]): void {
    if (this.state === 'stopping') {
      throw new InvalidRequestError('The recording is stopping and no longer accepts audio.');
    }
    if (this.state !== 'recording') {
      throw new InvalidRequestError('Start a recording before sending audio.');
    }
    for (const frame of frames) {
      if (!this.segment) {
        this.segment = new AudioSegment(validateAudioFormat(frame.format));
      }
      this.segment.append(frame);
    }
  }

  async tick(now: Date): Promise<FlushOutcome | undefined> {
    if (this.state !== 'recording' || this.pending || !this.segment || this.segment.isEmpty) {
      return undefined;
    }
    if (now.getTime() - this.lastFlushAt < this.flushIntervalMs) {
      return undefined;
    }
    this.lastFlushAt = now.getTime();
    return this.runFlush(false);
  }

  async stop(): Promise<FlushOutcome | undefined> {
    if (this.state !== 'recording') {
      throw new InvalidRequestError('No recording is in progress.');
    }
    this.state = 'stopping';
    try {
      if (this.pending) {
        await this.pending;
      }
      if (this.segment && !this.segment.isEmpty) {
        return await this.runFlush(true);
      }
      return undefined;
    } finally {
      this.state = 'idle';
    }
  }

  snapshot(): CaptureSnapshot {
    return {
      state: this.state,
      meetingId: this.meetingId,
      startedAt: this.startedAt?.toISOString(),
      format: this.segment?.format,
      transcript: this.transcript,
      bufferedMs: this.segment?.durationMs ?? 0,
      flushCount: this.flushCount
    };
  }

  private async runFlush(final: boolean): Promise<FlushOutcome> {
    const flush = this.flush(final);
    this.pending = flush;
    try {
      return await flush;
    } finally {
      this.pending = undefined;
    }
  }

  private async flush(final: boolean): Promise<FlushOutcome> {
    const { meetingId, segment } = this;
    if (!meetingId || !segment) {
      throw new InvalidRequestError('No recording is in progress.');
    }
    // Frames that arrive while this flush awaits belong to the next segment.
    const pcm = segment.toBuffer();
    const format: AudioFormat = segment.format;
    segment.clear();
    this.flushCount += 1;

    const errors: FlushError[] = [];
    try {
      await this.store.appendAudio(meetingId, pcm, format);
      await this.store.writeAudioChunk(meetingId, pcm, format);
    } catch (error) {
      errors.push(toFlushError('audio', error));
    }

    let text = '';
    try {
      text = await this.transcriber.transcribe({ pcm, format });
    } catch (error) {
      errors.push(toFlushError('transcription', error));
    }

    if (text) {
      try {
        await this.store.appendTranscript(meetingId, text);
        this.transcript += text;
      } catch (error) {
        errors.push(toFlushError('transcript', error));
      }
    }

    return {
      meetingId,
      index: this.flushCount,
      durationMs: durationMs(pcm.length, format),
      text,
      final,
      errors
    };
  }
}
