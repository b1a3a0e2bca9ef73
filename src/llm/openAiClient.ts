import { mapApiError, OutputValidationError, ServiceError } from '../errors/index.js';
import { LlmClient, LlmCompletionOptions, LlmMessage, SpeechToTextClient, SpeechToTextRequest } from './types.js';

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_CHAT_MODEL = 'gpt-3.5-turbo-1106';
export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl?: string;
  chatModel?: string;
  transcriptionModel?: string;
  defaultOptions?: LlmCompletionOptions;
  fetcher?: typeof fetch;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  error?: { message?: string; code?: string };
}

interface ErrorResponse {
  error?: { message?: string; code?: string };
}

const normalizeBaseUrl = (baseUrl: string): string => baseUrl.replace(/\/+$/, '');

const parseErrorPayload = (text: string): ErrorResponse => {
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null ? (parsed as ErrorResponse) : {};
  } catch {
    return {};
  }
};

const getRetryAfterSeconds = (response: Response): number | undefined => {
  const header = response.headers.get('Retry-After');
  if (!header) {
    return undefined;
  }
  const value = Number(header);
  return Number.isFinite(value) ? value : undefined;
};

export class OpenAiClient implements LlmClient, SpeechToTextClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly chatModel: string;
  private readonly transcriptionModel: string;
  private readonly defaultOptions: LlmCompletionOptions;
  private readonly fetcher: typeof fetch;

  constructor(options: OpenAiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? DEFAULT_OPENAI_BASE_URL);
    this.chatModel = options.chatModel ?? DEFAULT_CHAT_MODEL;
    this.transcriptionModel = options.transcriptionModel ?? DEFAULT_TRANSCRIPTION_MODEL;
    this.defaultOptions = options.defaultOptions ?? {};
    this.fetcher = options.fetcher ?? fetch;
  }

  async complete(messages: LlmMessage[], options?: LlmCompletionOptions): Promise<string> {
    const payload = {
      model: this.chatModel,
      messages,
      temperature: options?.temperature ?? this.defaultOptions.temperature,
      max_tokens: options?.maxTokens ?? this.defaultOptions.maxTokens
    };

    const text = await this.send('/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(payload)
    });

    let data: ChatCompletionResponse;
    try {
      data = JSON.parse(text) as ChatCompletionResponse;
    } catch {
      throw new OutputValidationError('OpenAI response was not valid JSON.');
    }

    if (data.error?.message) {
      const code = data.error.code ? ` (${data.error.code})` : '';
      throw new ServiceError(`OpenAI error${code}: ${data.error.message}`, 200, data.error.code);
    }

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new OutputValidationError('OpenAI response missing message content.');
    }

    return content;
  }

  async transcribe(request: SpeechToTextRequest): Promise<string> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(request.audio)], { type: request.mimeType }), request.fileName);
    form.append('model', this.transcriptionModel);
    form.append('response_format', 'text');
    if (request.language) {
      form.append('language', request.language);
    }

    return this.send('/audio/transcriptions', {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: form
    });
  }

  private async send(path: string, init: RequestInit): Promise<string> {
    let response: Response;
    try {
      response = await this.fetcher(`${this.baseUrl}${path}`, init);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown error';
      throw new ServiceError(`OpenAI request to ${path} failed: ${reason}`, 0, undefined, error);
    }

    const text = await response.text();
    if (!response.ok) {
      const payload = parseErrorPayload(text);
      const message = payload.error?.message ?? `OpenAI request failed (${response.status})`;
      throw mapApiError(response.status, message, payload.error?.code, getRetryAfterSeconds(response));
    }
    return text;
  }
}
