export * from './errors/index.js';
export * from './audio/pcm.js';
export * from './audio/wav.js';
export * from './storage/meetingId.js';
export * from './storage/fileStore.js';
export * from './llm/types.js';
export * from './llm/openAiClient.js';
export * from './llm/promptTemplates.js';
export * from './llm/summarizationService.js';
export * from './transcription/transcriptionService.js';
export * from './capture/types.js';
export * from './capture/captureLoop.js';
export * from './meetings/meetingBrowser.js';
