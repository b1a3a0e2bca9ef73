import 'dotenv/config';
import { CaptureLoop } from '../src/capture/captureLoop.js';
import { describeError } from '../src/errors/index.js';
import { OpenAiClient } from '../src/llm/openAiClient.js';
import { SummarizationService } from '../src/llm/summarizationService.js';
import { MeetingBrowser } from '../src/meetings/meetingBrowser.js';
import { FileStore } from '../src/storage/fileStore.js';
import { TranscriptionService } from '../src/transcription/transcriptionService.js';
import { createApp } from './server/app.js';
import {
  filesFolder,
  flushIntervalMs,
  maxFrameBytes,
  openAiBaseUrl,
  port,
  publicDir,
  requireEnv,
  sessionIdleMs,
  summaryModel,
  transcriptionLanguage,
  transcriptionModel
} from './server/config.js';
import { logEvent } from './server/logging.js';
import { CaptureSessionStore } from './server/stores.js';

const SESSION_SWEEP_INTERVAL_MS = 60_000;

const client = new OpenAiClient({
  apiKey: requireEnv('OPENAI_API_KEY'),
  baseUrl: openAiBaseUrl,
  chatModel: summaryModel,
  transcriptionModel
});

const store = new FileStore({ rootDir: filesFolder });
const transcriber = new TranscriptionService({ client, language: transcriptionLanguage });
const summarizer = new SummarizationService({ client });

const sessions = new CaptureSessionStore(() => new CaptureLoop({ store, transcriber, flushIntervalMs }));

const browser = new MeetingBrowser({
  store,
  summarizer,
  isRecording: (meetingId) => sessions.isRecording(meetingId),
  onSummaryEvent: (event, payload) =>
    logEvent(event, payload, { component: 'llm', level: event === 'summary_error' ? 'error' : 'info' })
});

const app = createApp({ browser, sessions, publicDir, maxFrameBytes });

const evictStaleSessions = async () => {
  const evicted = await sessions.evictStale(Date.now(), sessionIdleMs);
  for (const { sessionKey, meetingId, flush } of evicted) {
    logEvent(
      'session_evicted',
      { meetingId, finalFlush: Boolean(flush), errors: flush?.errors ?? [] },
      { sessionKey, component: 'capture' }
    );
  }
};

setInterval(() => {
  evictStaleSessions().catch((error: unknown) => {
    logEvent('session_evict_error', { ...describeError(error) }, { component: 'capture', level: 'error' });
  });
}, SESSION_SWEEP_INTERVAL_MS).unref();

app.listen(port, () => {
  logEvent('server_started', { port, filesFolder, flushIntervalMs });
  console.log(`Meeting transcriber listening on http://localhost:${port}`);
});
