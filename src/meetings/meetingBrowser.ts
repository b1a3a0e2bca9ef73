import { describeError, NotFoundError } from '../errors/index.js';
import { FileStore } from '../storage/fileStore.js';
import { formatMeetingLabel } from '../storage/meetingId.js';

export interface MeetingSummarizer {
  summarize(transcript: string): Promise<string>;
}

export interface MeetingListItem {
  id: string;
  label: string;
  title: string;
}

export type SummaryState = 'stored' | 'generated' | 'empty' | 'failed' | 'recording';

export interface MeetingDetails {
  id: string;
  label: string;
  title: string;
  needsTitle: boolean;
  transcript: string;
  hasAudio: boolean;
  summary: string;
  summaryState: SummaryState;
  summaryError?: string;
}

export interface MeetingBrowserOptions {
  store: FileStore;
  summarizer: MeetingSummarizer;
  /** Meetings still being recorded are shown without a summary. */
  isRecording?: (meetingId: string) => boolean;
  onSummaryEvent?: (event: 'summary_request' | 'summary_complete' | 'summary_error', payload: Record<string, unknown>) => void;
}

type SummaryResult = Pick<MeetingDetails, 'summary' | 'summaryState' | 'summaryError'>;

export class MeetingBrowser {
  private readonly store: FileStore;
  private readonly summarizer: MeetingSummarizer;
  private readonly isRecording: (meetingId: string) => boolean;
  private readonly onSummaryEvent?: MeetingBrowserOptions['onSummaryEvent'];
  // One summary request per meeting at a time; concurrent opens share it.
  private readonly inFlight = new Map<string, Promise<SummaryResult>>();

  constructor(options: MeetingBrowserOptions) {
    this.store = options.store;
    this.summarizer = options.summarizer;
    this.isRecording = options.isRecording ?? (() => false);
    this.onSummaryEvent = options.onSummaryEvent;
  }

  async listMeetings(): Promise<MeetingListItem[]> {
    const ids = await this.store.listMeetingIds();
    const newestFirst = [...ids].reverse();
    return Promise.all(
      newestFirst.map(async (id) => {
        const title = (await this.store.readText(id, 'title')).trim();
        return { id, label: formatMeetingLabel(id, title), title };
      })
    );
  }

  async openMeeting(meetingId: string): Promise<MeetingDetails> {
    await this.requireMeeting(meetingId);
    const [title, transcript, storedSummary, hasAudio, hasTitle] = await Promise.all([
      this.store.readText(meetingId, 'title'),
      this.store.readText(meetingId, 'transcript'),
      this.store.readText(meetingId, 'summary'),
      this.store.hasArtifact(meetingId, 'audio'),
      this.store.hasArtifact(meetingId, 'title')
    ]);

    const base = {
      id: meetingId,
      label: formatMeetingLabel(meetingId, title),
      title: title.trim(),
      needsTitle: !hasTitle,
      transcript,
      hasAudio
    };

    if (this.isRecording(meetingId)) {
      return { ...base, summary: '', summaryState: 'recording' };
    }
    if (storedSummary.trim()) {
      return { ...base, summary: storedSummary, summaryState: 'stored' };
    }
    if (!transcript.trim()) {
      return { ...base, summary: '', summaryState: 'empty' };
    }
    return { ...base, ...(await this.summarizeOnce(meetingId, transcript)) };
  }

  async setTitle(meetingId: string, title: string): Promise<MeetingListItem> {
    await this.requireMeeting(meetingId);
    const trimmed = title.trim();
    await this.store.writeText(meetingId, 'title', trimmed);
    return { id: meetingId, label: formatMeetingLabel(meetingId, trimmed), title: trimmed };
  }

  async readAudio(meetingId: string): Promise<Buffer> {
    await this.requireMeeting(meetingId);
    const audio = await this.store.readAudio(meetingId);
    if (!audio) {
      throw new NotFoundError(`Meeting ${meetingId} has no audio yet.`);
    }
    return audio;
  }

  private summarizeOnce(meetingId: string, transcript: string): Promise<SummaryResult> {
    const existing = this.inFlight.get(meetingId);
    if (existing) {
      return existing;
    }
    const request = this.generateSummary(meetingId, transcript).finally(() => this.inFlight.delete(meetingId));
    this.inFlight.set(meetingId, request);
    return request;
  }

  private async generateSummary(meetingId: string, transcript: string): Promise<SummaryResult> {
    const started = Date.now();
    this.onSummaryEvent?.('summary_request', { meetingId, transcriptLength: transcript.length });
    try {
      const summary = await this.summarizer.summarize(transcript);
      await this.store.writeText(meetingId, 'summary', summary);
      this.onSummaryEvent?.('summary_complete', { meetingId, latencyMs: Date.now() - started });
      return { summary, summaryState: 'generated' };
    } catch (error) {
      const { type, message } = describeError(error);
      this.onSummaryEvent?.('summary_error', {
        meetingId,
        latencyMs: Date.now() - started,
        errorType: type,
        message
      });
      return { summary: '', summaryState: 'failed', summaryError: message };
    }
  }

  private async requireMeeting(meetingId: string): Promise<void> {
    if (!(await this.store.hasMeeting(meetingId))) {
      throw new NotFoundError(`Meeting ${meetingId} was not found.`);
    }
  }
}
