import { InvalidRequestError } from '../errors/index.js';
import { AudioFormat } from './pcm.js';

export const WAV_HEADER_BYTES = 44;

export interface DecodedWav {
  format: AudioFormat;
  data: Buffer;
}

export const encodeWav = (pcm: Buffer, format: AudioFormat): Buffer => {
  const blockAlign = format.channels * format.sampleWidth;
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0, 'ascii');
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.sampleWidth * 8, 34);
  header.write('data', 36, 'ascii');
  setWavDataSize(header, pcm.length);
  return Buffer.concat([header, pcm]);
};

export interface WavHeader {
  format: AudioFormat;
  dataBytes: number;
}

// Only the canonical 44-byte PCM layout written by encodeWav is accepted.
export const readWavHeader = (header: Buffer): WavHeader => {
  if (
    header.length < WAV_HEADER_BYTES ||
    header.toString('ascii', 0, 4) !== 'RIFF' ||
    header.toString('ascii', 8, 12) !== 'WAVE' ||
    header.toString('ascii', 12, 16) !== 'fmt ' ||
    header.toString('ascii', 36, 40) !== 'data'
  ) {
    throw new InvalidRequestError('Audio file is not a PCM WAV file.');
  }
  if (header.readUInt16LE(20) !== 1) {
    throw new InvalidRequestError('Audio file is not uncompressed PCM.');
  }
  return {
    format: {
      channels: header.readUInt16LE(22),
      sampleRate: header.readUInt32LE(24),
      sampleWidth: header.readUInt16LE(34) / 8
    },
    dataBytes: header.readUInt32LE(40)
  };
};

/** Rewrites the RIFF and data chunk sizes in place. */
export const setWavDataSize = (header: Buffer, dataBytes: number): void => {
  header.writeUInt32LE(36 + dataBytes, 4);
  header.writeUInt32LE(dataBytes, 40);
};

export const decodeWav = (wav: Buffer): DecodedWav => {
  const { format, dataBytes } = readWavHeader(wav);
  const dataSize = Math.min(dataBytes, wav.length - WAV_HEADER_BYTES);
  return { format, data: wav.subarray(WAV_HEADER_BYTES, WAV_HEADER_BYTES + dataSize) };
};
