export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmCompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LlmClient {
  complete(messages: LlmMessage[], options?: LlmCompletionOptions): Promise<string>;
}

export interface SpeechToTextRequest {
  audio: Buffer;
  fileName: string;
  mimeType: string;
  language?: string;
}

export interface SpeechToTextClient {
  transcribe(request: SpeechToTextRequest): Promise<string>;
}
