import crypto from 'node:crypto';

export type LogLevel = 'info' | 'warn' | 'error';

let logEnabled = process.env.LOG_EVENTS !== 'false';

export const isLogEnabled = () => logEnabled;

export const setLogEnabled = (enabled: boolean) => {
  logEnabled = enabled;
};

export const hashValue = (value?: string): string => {
  if (!value) {
    return 'unknown';
  }
  const salt = process.env.LOG_HASH_SALT ?? '';
  return crypto.createHash('sha256').update(`${salt}:${value}`).digest('hex').slice(0, 16);
};

const redactText = (value: string): string => {
  return value
    .replace(/[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi, '[REDACTED_EMAIL]')
    .replace(/https?:\/\/\S+/gi, '[REDACTED_URL]')
    .replace(/\+?\d[\d\s().-]{7,}\d/g, '[REDACTED_PHONE]')
    .replace(/\b\d{6,}\b/g, '[REDACTED_ID]')
    .replace(/Bearer\s+[A-Za-z0-9\-_.=]+/gi, 'Bearer [REDACTED_TOKEN]')
    .replace(/\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\b/g, '[REDACTED_TOKEN]');
};

const truncateText = (value: string, maxLength = 200): string => {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, maxLength)}...`;
};

const sanitizePayload = (value: unknown, maxLength = 200): unknown => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return truncateText(redactText(value), maxLength);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizePayload(item, maxLength));
  }
  if (typeof value === 'object') {
    return Object.entries(value).reduce<Record<string, unknown>>((acc, [key, val]) => {
      acc[key] = sanitizePayload(val, maxLength);
      return acc;
    }, {});
  }
  return String(value);
};

export interface LogContext {
  sessionKey?: string;
  component?: string;
  level?: LogLevel;
  maxLength?: number;
}

export const logEvent = (event: string, payload: Record<string, unknown>, context: LogContext = {}) => {
  if (!isLogEnabled()) {
    return;
  }
  const base = {
    timestamp: new Date().toISOString(),
    level: context.level ?? 'info',
    component: context.component ?? 'server',
    event,
    sessionId: context.sessionKey ? hashValue(context.sessionKey) : undefined
  };
  const sanitized = sanitizePayload(payload, context.maxLength ?? 200);
  console.log(JSON.stringify({ ...base, ...(sanitized as Record<string, unknown>) }));
};
