import fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { AudioFormat, isSameFormat } from '../audio/pcm.js';
import { encodeWav, readWavHeader, setWavDataSize, WAV_HEADER_BYTES } from '../audio/wav.js';
import { InvalidRequestError, StorageArtifact, StorageError } from '../errors/index.js';
import { assertMeetingId, formatMeetingId, isMeetingId } from './meetingId.js';

export type TextArtifact = 'transcript' | 'title' | 'summary';

export const ARTIFACT_FILES = {
  audio: 'audio.wav',
  audioChunk: 'audio_temp.wav',
  transcript: 'transcription.txt',
  title: 'title.txt',
  summary: 'summary.txt'
} as const;

const MAX_ALLOCATION_ATTEMPTS = 60;

export interface FileStoreOptions {
  rootDir: string;
}

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

export class FileStore {
  private readonly rootDir: string;

  constructor(options: FileStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
  }

  async allocateMeeting(date: Date): Promise<string> {
    await this.wrap('meeting', 'create the meetings folder', () => fs.mkdir(this.rootDir, { recursive: true }));
    for (let attempt = 0; attempt < MAX_ALLOCATION_ATTEMPTS; attempt += 1) {
      const meetingId = formatMeetingId(new Date(date.getTime() + attempt * 1000));
      const dir = this.meetingDir(meetingId);
      try {
        await fs.mkdir(dir);
        return meetingId;
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) {
          throw new StorageError(`Could not create meeting ${meetingId}.`, 'meeting', error);
        }
      }
    }
    throw new StorageError('Could not allocate a free meeting id.', 'meeting');
  }

  async listMeetingIds(): Promise<string[]> {
    let entries: Array<{ name: string; isDirectory(): boolean }>;
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw new StorageError('Could not list meetings.', 'meeting', error);
    }
    return entries
      .filter((entry) => entry.isDirectory() && isMeetingId(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async hasMeeting(meetingId: string): Promise<boolean> {
    const dir = this.meetingDir(meetingId);
    try {
      const stats = await fs.stat(dir);
      return stats.isDirectory();
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw new StorageError(`Could not read meeting ${meetingId}.`, 'meeting', error);
    }
  }

  async readText(meetingId: string, artifact: TextArtifact): Promise<string> {
    const content = await this.readFile(meetingId, artifact);
    return content ? content.toString('utf8') : '';
  }

  async hasArtifact(meetingId: string, artifact: keyof typeof ARTIFACT_FILES): Promise<boolean> {
    const filePath = this.artifactPath(meetingId, artifact);
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw new StorageError(`Could not read ${artifact} for meeting ${meetingId}.`, artifact, error);
    }
  }

  async writeText(meetingId: string, artifact: Exclude<TextArtifact, 'transcript'>, text: string): Promise<void> {
    const filePath = this.artifactPath(meetingId, artifact);
    await this.ensureMeetingDir(meetingId, artifact);
    await this.wrap(artifact, `write ${artifact} for meeting ${meetingId}`, () => fs.writeFile(filePath, text, 'utf8'));
  }

  async appendTranscript(meetingId: string, text: string): Promise<void> {
    const filePath = this.artifactPath(meetingId, 'transcript');
    await this.ensureMeetingDir(meetingId, 'transcript');
    await this.wrap('transcript', `append transcript for meeting ${meetingId}`, () =>
      fs.appendFile(filePath, text, 'utf8')
    );
  }

  async readAudio(meetingId: string): Promise<Buffer | undefined> {
    return this.readFile(meetingId, 'audio');
  }

  /**
   * Appends PCM to the cumulative WAV file. Only the new bytes are written;
   * the header sizes are patched in place.
   */
  async appendAudio(meetingId: string, pcm: Buffer, format: AudioFormat): Promise<void> {
    const filePath = this.artifactPath(meetingId, 'audio');
    await this.ensureMeetingDir(meetingId, 'audio');
    const handle = await this.openForUpdate(meetingId, filePath);
    if (!handle) {
      await this.wrap('audio', `write audio for meeting ${meetingId}`, () => fs.writeFile(filePath, encodeWav(pcm, format)));
      return;
    }
    try {
      const header = Buffer.alloc(WAV_HEADER_BYTES);
      const { bytesRead } = await this.wrap('audio', `read audio for meeting ${meetingId}`, () =>
        handle.read(header, 0, WAV_HEADER_BYTES, 0)
      );
      const stored = readWavHeader(header.subarray(0, bytesRead));
      if (!isSameFormat(stored.format, format)) {
        throw new InvalidRequestError(`Audio format does not match the stored audio for meeting ${meetingId}.`);
      }
      setWavDataSize(header, stored.dataBytes + pcm.length);
      await this.wrap('audio', `write audio for meeting ${meetingId}`, async () => {
        await handle.write(pcm, 0, pcm.length, WAV_HEADER_BYTES + stored.dataBytes);
        await handle.write(header, 0, WAV_HEADER_BYTES, 0);
      });
    } finally {
      await handle.close();
    }
  }

  async writeAudioChunk(meetingId: string, pcm: Buffer, format: AudioFormat): Promise<void> {
    const filePath = this.artifactPath(meetingId, 'audioChunk');
    await this.ensureMeetingDir(meetingId, 'audioChunk');
    await this.wrap('audioChunk', `write audio chunk for meeting ${meetingId}`, () =>
      fs.writeFile(filePath, encodeWav(pcm, format))
    );
  }

  private meetingDir(meetingId: string): string {
    return path.join(this.rootDir, assertMeetingId(meetingId));
  }

  private artifactPath(meetingId: string, artifact: keyof typeof ARTIFACT_FILES): string {
    return path.join(this.meetingDir(meetingId), ARTIFACT_FILES[artifact]);
  }

  private async ensureMeetingDir(meetingId: string, artifact: StorageArtifact): Promise<void> {
    const dir = this.meetingDir(meetingId);
    await this.wrap(artifact, `create folder for meeting ${meetingId}`, () => fs.mkdir(dir, { recursive: true }));
  }

  private async openForUpdate(meetingId: string, filePath: string): Promise<FileHandle | undefined> {
    try {
      return await fs.open(filePath, 'r+');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return undefined;
      }
      throw new StorageError(`Could not open audio for meeting ${meetingId}.`, 'audio', error);
    }
  }

  private async readFile(meetingId: string, artifact: keyof typeof ARTIFACT_FILES): Promise<Buffer | undefined> {
    const filePath = this.artifactPath(meetingId, artifact);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return undefined;
      }
      throw new StorageError(`Could not read ${artifact} for meeting ${meetingId}.`, artifact, error);
    }
  }

  private async wrap<T>(artifact: StorageArtifact, action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new StorageError(`Could not ${action}.`, artifact, error);
    }
  }
}
