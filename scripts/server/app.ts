import express, { NextFunction, Request, Response } from 'express';
import type { AudioFormat } from '../../src/audio/pcm.js';
import type { CaptureLoop } from '../../src/capture/captureLoop.js';
import type { FlushOutcome } from '../../src/capture/types.js';
import {
  AuthError,
  describeError,
  InvalidRequestError,
  NotFoundError,
  OutputValidationError,
  ServiceError,
  StorageError,
  ThrottledError
} from '../../src/errors/index.js';
import type { MeetingBrowser } from '../../src/meetings/meetingBrowser.js';
import { logEvent } from './logging.js';
import { CaptureSessionStore, getSessionKey, SESSION_HEADER } from './stores.js';

export interface AppOptions {
  browser: MeetingBrowser;
  sessions: CaptureSessionStore;
  clock?: () => Date;
  publicDir?: string;
  maxFrameBytes?: number;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const DEFAULT_FORMAT: AudioFormat = { sampleRate: 48000, channels: 1, sampleWidth: 2 };

const handle =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const readIntegerHeader = (req: Request, name: string, fallback: number): number => {
  const raw = req.get(name);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidRequestError(`Header ${name} must be a positive integer.`);
  }
  return value;
};

const readAudioFormat = (req: Request): AudioFormat => ({
  sampleRate: readIntegerHeader(req, 'x-sample-rate', DEFAULT_FORMAT.sampleRate),
  channels: readIntegerHeader(req, 'x-channels', DEFAULT_FORMAT.channels),
  sampleWidth: readIntegerHeader(req, 'x-sample-width', DEFAULT_FORMAT.sampleWidth)
});

const hasHttpStatus = (error: unknown): error is Error & { status: number } =>
  error instanceof Error && 'status' in error && typeof error.status === 'number';

export const mapErrorToStatus = (error: unknown): number => {
  if (error instanceof InvalidRequestError) {
    return 400;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof AuthError) {
    return 401;
  }
  if (error instanceof ThrottledError) {
    return 429;
  }
  if (error instanceof ServiceError || error instanceof OutputValidationError) {
    return 502;
  }
  if (error instanceof StorageError) {
    return 500;
  }
  // Body parser failures carry their own 4xx status.
  if (hasHttpStatus(error) && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return 500;
};

const logFlush = (sessionKey: string, outcome: FlushOutcome | undefined) => {
  if (!outcome) {
    return;
  }
  const failed = outcome.errors.length > 0;
  logEvent(
    failed ? 'flush_error' : 'flush_complete',
    {
      meetingId: outcome.meetingId,
      index: outcome.index,
      durationMs: outcome.durationMs,
      textLength: outcome.text.length,
      final: outcome.final,
      errors: outcome.errors
    },
    { sessionKey, component: 'capture', level: failed ? 'warn' : 'info' }
  );
};

export const createApp = (options: AppOptions) => {
  const { browser, sessions } = options;
  const clock = options.clock ?? (() => new Date());
  const app = express();

  const sessionFor = (req: Request): { sessionKey: string; loop: CaptureLoop } => {
    const sessionKey = getSessionKey(req.get(SESSION_HEADER));
    return { sessionKey, loop: sessions.get(sessionKey, clock().getTime()) };
  };

  app.post(
    '/api/recording/start',
    handle(async (req, res) => {
      const { sessionKey, loop } = sessionFor(req);
      const recording = await loop.start(clock());
      logEvent('recording_started', { meetingId: recording.meetingId }, { sessionKey, component: 'capture' });
      res.status(201).json({ recording });
    })
  );

  app.post(
    '/api/recording/frames',
    express.raw({ type: 'application/octet-stream', limit: options.maxFrameBytes ?? 10 * 1024 * 1024 }),
    handle(async (req, res) => {
      const { sessionKey, loop } = sessionFor(req);
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new InvalidRequestError('Audio frames must be sent as application/octet-stream.');
      }
      loop.appendFrames([{ format: readAudioFormat(req), data: body }]);
      const flush = await loop.tick(clock());
      logFlush(sessionKey, flush);
      res.json({ recording: loop.snapshot(), flush: flush ?? null });
    })
  );

  app.get(
    '/api/recording',
    handle(async (req, res) => {
      const { sessionKey, loop } = sessionFor(req);
      const flush = await loop.tick(clock());
      logFlush(sessionKey, flush);
      res.json({ recording: loop.snapshot(), flush: flush ?? null });
    })
  );

  app.post(
    '/api/recording/stop',
    handle(async (req, res) => {
      const { sessionKey, loop } = sessionFor(req);
      const flush = await loop.stop();
      logFlush(sessionKey, flush);
      const recording = loop.snapshot();
      logEvent(
        'recording_stopped',
        { meetingId: recording.meetingId, flushCount: recording.flushCount },
        { sessionKey, component: 'capture' }
      );
      res.json({ recording, flush: flush ?? null });
    })
  );

  app.get(
    '/api/meetings',
    handle(async (_req, res) => {
      res.json({ meetings: await browser.listMeetings() });
    })
  );

  app.get(
    '/api/meetings/:id',
    handle(async (req, res) => {
      res.json({ meeting: await browser.openMeeting(req.params.id) });
    })
  );

  app.put(
    '/api/meetings/:id/title',
    express.json(),
    handle(async (req, res) => {
      const body: unknown = req.body;
      const title = typeof body === 'object' && body !== null && 'title' in body ? body.title : undefined;
      if (typeof title !== 'string') {
        throw new InvalidRequestError('Body must contain a string title.');
      }
      res.json({ meeting: await browser.setTitle(req.params.id, title) });
    })
  );

  app.get(
    '/api/meetings/:id/audio',
    handle(async (req, res) => {
      const audio = await browser.readAudio(req.params.id);
      res.type('audio/wav').send(audio);
    })
  );

  if (options.publicDir) {
    app.use(express.static(options.publicDir));
  }

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { type: 'NotFoundError', message: 'Route not found.' } });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = mapErrorToStatus(error);
    const described = describeError(error);
    logEvent(
      'request_error',
      { method: req.method, path: req.path, status, errorType: described.type, message: described.message },
      { sessionKey: getSessionKey(req.get(SESSION_HEADER)), level: status >= 500 ? 'error' : 'warn' }
    );
    res.status(status).json({ error: described });
  });

  return app;
};
