import { InvalidRequestError } from '../errors/index.js';

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  /** Bytes per sample: 1 (unsigned 8-bit), 2, 3 or 4 (signed little-endian). */
  sampleWidth: number;
}

export interface AudioFrame {
  format: AudioFormat;
  data: Buffer;
}

const SUPPORTED_SAMPLE_WIDTHS = new Set([1, 2, 3, 4]);

export const validateAudioFormat = (format: AudioFormat): AudioFormat => {
  if (!Number.isInteger(format.sampleRate) || format.sampleRate <= 0) {
    throw new InvalidRequestError(`Unsupported sample rate: ${format.sampleRate}.`);
  }
  if (!Number.isInteger(format.channels) || format.channels <= 0) {
    throw new InvalidRequestError(`Unsupported channel count: ${format.channels}.`);
  }
  if (!SUPPORTED_SAMPLE_WIDTHS.has(format.sampleWidth)) {
    throw new InvalidRequestError(`Unsupported sample width: ${format.sampleWidth}.`);
  }
  return format;
};

export const isSameFormat = (left: AudioFormat, right: AudioFormat): boolean =>
  left.sampleRate === right.sampleRate && left.channels === right.channels && left.sampleWidth === right.sampleWidth;

export const bytesPerSecond = (format: AudioFormat): number => format.sampleRate * format.channels * format.sampleWidth;

export const durationMs = (byteLength: number, format: AudioFormat): number =>
  Math.round((byteLength / bytesPerSecond(format)) * 1000);

export class AudioSegment {
  readonly format: AudioFormat;
  private frames: Buffer[] = [];
  private byteLength = 0;

  constructor(format: AudioFormat) {
    this.format = validateAudioFormat(format);
  }

  append(frame: AudioFrame): void {
    if (!isSameFormat(frame.format, this.format)) {
      throw new InvalidRequestError('Audio frame format does not match the recording format.');
    }
    const blockAlign = this.format.channels * this.format.sampleWidth;
    if (frame.data.length % blockAlign !== 0) {
      throw new InvalidRequestError(`Audio frame length must be a multiple of ${blockAlign} bytes.`);
    }
    if (!frame.data.length) {
      return;
    }
    this.frames.push(frame.data);
    this.byteLength += frame.data.length;
  }

  get isEmpty(): boolean {
    return this.byteLength === 0;
  }

  get size(): number {
    return this.byteLength;
  }

  get durationMs(): number {
    return durationMs(this.byteLength, this.format);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.frames, this.byteLength);
  }

  clear(): void {
    this.frames = [];
    this.byteLength = 0;
  }
}
