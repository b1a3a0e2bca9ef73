import path from 'node:path';

export const requireEnv = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing ${key} environment variable.`);
  }
  return value;
};

export const parseNumber = (value: string | undefined, fallback: number): number => {
  const floored = Math.floor(Number(value));
  if (!Number.isFinite(floored) || floored <= 0) {
    return fallback;
  }
  return floored;
};

const parseSeconds = (value: string | undefined, fallbackSeconds: number): number => {
  return parseNumber(value, fallbackSeconds) * 1000;
};

export const port = parseNumber(process.env.PORT, 8501);
export const filesFolder = path.resolve(process.env.FILES_FOLDER ?? 'files');
export const publicDir = path.resolve(process.env.PUBLIC_DIR ?? 'public');
export const flushIntervalMs = parseSeconds(process.env.FLUSH_INTERVAL_SECONDS, 5);
export const sessionIdleMs = parseSeconds(process.env.SESSION_IDLE_SECONDS, 600);
export const maxFrameBytes = parseNumber(process.env.MAX_FRAME_BYTES, 10 * 1024 * 1024);

export const openAiBaseUrl = process.env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1';
export const transcriptionModel = process.env.TRANSCRIPTION_MODEL ?? 'whisper-1';
export const transcriptionLanguage = process.env.TRANSCRIPTION_LANGUAGE || undefined;
export const summaryModel = process.env.SUMMARY_MODEL ?? 'gpt-3.5-turbo-1106';
