import { InvalidRequestError } from '../errors/index.js';
import { buildMeetingSummaryPrompt } from './promptTemplates.js';
import { LlmClient, LlmCompletionOptions } from './types.js';

export interface SummarizationServiceOptions {
  client: LlmClient;
  completionOptions?: LlmCompletionOptions;
}

export class SummarizationService {
  private readonly client: LlmClient;
  private readonly completionOptions?: LlmCompletionOptions;

  constructor(options: SummarizationServiceOptions) {
    this.client = options.client;
    this.completionOptions = options.completionOptions;
  }

  async summarize(transcript: string): Promise<string> {
    if (!transcript.trim()) {
      throw new InvalidRequestError('Transcript is empty.');
    }
    const summary = await this.client.complete(
      [{ role: 'user', content: buildMeetingSummaryPrompt(transcript) }],
      this.completionOptions
    );
    return summary.trim();
  }
}
