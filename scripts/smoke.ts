import 'dotenv/config';
import fs from 'node:fs/promises';
import { decodeWav } from '../src/audio/wav.js';
import { OpenAiClient } from '../src/llm/openAiClient.js';
import { SummarizationService } from '../src/llm/summarizationService.js';
import { TranscriptionService } from '../src/transcription/transcriptionService.js';
import { openAiBaseUrl, requireEnv, summaryModel, transcriptionLanguage, transcriptionModel } from './server/config.js';

const SAMPLE_TRANSCRIPT =
  'Alice will deliver the deck by Friday. Bob will update the roadmap next week. The team agreed to revisit the budget.';

const main = async () => {
  const client = new OpenAiClient({
    apiKey: requireEnv('OPENAI_API_KEY'),
    baseUrl: openAiBaseUrl,
    chatModel: summaryModel,
    transcriptionModel
  });

  let transcript = SAMPLE_TRANSCRIPT;
  const audioPath = process.argv[2];
  if (audioPath) {
    const { data, format } = decodeWav(await fs.readFile(audioPath));
    const transcriber = new TranscriptionService({ client, language: transcriptionLanguage });
    transcript = await transcriber.transcribe({ pcm: data, format });
    console.log('\nTranscription result:');
    console.log(transcript);
  }

  const summarizer = new SummarizationService({ client });
  console.log('\nSummary result:');
  console.log(await summarizer.summarize(transcript));
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
