export const TRANSCRIPT_DELIMITER = '####';

export const buildMeetingSummaryPrompt = (transcript: string): string => {
  return `Summarize the text delimited by ${TRANSCRIPT_DELIMITER}.
The text is a transcription of a meeting.
The summary should include the main topics discussed.
The summary should have a maximum of 300 characters.
The summary should be in running text.
At the end, all agreements and arrangements made in the meeting should be presented in bullet point format.

The final format I want is:

Meeting Summary:
- write the summary here.

text: ${TRANSCRIPT_DELIMITER}${transcript}${TRANSCRIPT_DELIMITER}`;
};
