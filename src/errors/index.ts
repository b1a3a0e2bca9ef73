export class AuthError extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'AuthError';
    this.cause = cause;
  }
}

export class ThrottledError extends Error {
  readonly retryAfterSeconds?: number;
  readonly cause?: unknown;

  constructor(message: string, retryAfterSeconds?: number, cause?: unknown) {
    super(message);
    this.name = 'ThrottledError';
    this.retryAfterSeconds = retryAfterSeconds;
    this.cause = cause;
  }
}

export class NotFoundError extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'NotFoundError';
    this.cause = cause;
  }
}

export class InvalidRequestError extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'InvalidRequestError';
    this.cause = cause;
  }
}

export class OutputValidationError extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'OutputValidationError';
    this.cause = cause;
  }
}

export class ServiceError extends Error {
  readonly status: number;
  readonly code?: string;
  readonly cause?: unknown;

  constructor(message: string, status: number, code?: string, cause?: unknown) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
    this.code = code;
    this.cause = cause;
  }
}

export type StorageArtifact = 'meeting' | 'audio' | 'audioChunk' | 'transcript' | 'title' | 'summary';

export class StorageError extends Error {
  readonly artifact: StorageArtifact;
  readonly cause?: unknown;

  constructor(message: string, artifact: StorageArtifact, cause?: unknown) {
    super(message);
    this.name = 'StorageError';
    this.artifact = artifact;
    this.cause = cause;
  }
}

export const mapApiError = (status: number, message: string, code?: string, retryAfterSeconds?: number): Error => {
  if (status === 401 || status === 403) {
    return new AuthError(message);
  }
  if (status === 404) {
    return new NotFoundError(message);
  }
  if (status === 429 || status === 503) {
    return new ThrottledError(message, retryAfterSeconds);
  }
  if (status >= 400 && status < 500) {
    return new InvalidRequestError(message);
  }
  return new ServiceError(message, status, code);
};

export const describeError = (error: unknown): { type: string; message: string } => {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: 'UnknownError', message: 'Unknown error' };
};
