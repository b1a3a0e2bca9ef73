import type { CaptureLoop } from '../../src/capture/captureLoop.js';
import type { FlushOutcome } from '../../src/capture/types.js';

export const SESSION_HEADER = 'x-session-id';

const SESSION_KEY_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export const getSessionKey = (header: string | undefined): string => {
  const value = header?.trim();
  if (!value || !SESSION_KEY_PATTERN.test(value)) {
    return 'anonymous';
  }
  return value;
};

interface CaptureSession {
  loop: CaptureLoop;
  lastSeenAt: number;
}

export interface EvictedSession {
  sessionKey: string;
  meetingId?: string;
  flush?: FlushOutcome;
}

export const isSessionExpired = (lastSeenAt: number, now: number, maxIdleMs: number): boolean =>
  now - lastSeenAt > maxIdleMs;

export class CaptureSessionStore {
  private readonly sessions = new Map<string, CaptureSession>();
  private readonly createLoop: () => CaptureLoop;

  constructor(createLoop: () => CaptureLoop) {
    this.createLoop = createLoop;
  }

  get(sessionKey: string, now: number = Date.now()): CaptureLoop {
    const existing = this.sessions.get(sessionKey);
    if (existing) {
      existing.lastSeenAt = now;
      return existing.loop;
    }
    const loop = this.createLoop();
    this.sessions.set(sessionKey, { loop, lastSeenAt: now });
    return loop;
  }

  has(sessionKey: string): boolean {
    return this.sessions.has(sessionKey);
  }

  get size(): number {
    return this.sessions.size;
  }

  isRecording(meetingId: string): boolean {
    for (const { loop } of this.sessions.values()) {
      if (loop.isActive && loop.snapshot().meetingId === meetingId) {
        return true;
      }
    }
    return false;
  }

  /**
   * Drops sessions not seen for `maxIdleMs`. A recording left behind by a
   * closed tab is stopped first so its buffered audio reaches the meeting.
   */
  async evictStale(now: number, maxIdleMs: number): Promise<EvictedSession[]> {
    const evicted: EvictedSession[] = [];
    for (const [sessionKey, session] of [...this.sessions]) {
      if (!isSessionExpired(session.lastSeenAt, now, maxIdleMs)) {
        continue;
      }
      const { loop } = session;
      if (loop.isActive && !loop.isRecording) {
        // Already stopping; picked up on a later pass.
        continue;
      }
      const seenAt = session.lastSeenAt;
      const flush = loop.isRecording ? await loop.stop() : undefined;
      if (session.lastSeenAt !== seenAt) {
        // The tab came back while the recording was being stopped.
        continue;
      }
      this.sessions.delete(sessionKey);
      evicted.push({ sessionKey, meetingId: loop.snapshot().meetingId, flush });
    }
    return evicted;
  }
}
