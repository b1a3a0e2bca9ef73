import { InvalidRequestError } from '../errors/index.js';

export const MEETING_ID_PATTERN = /^(\d{4})_(\d{2})_(\d{2})_(\d{2})_(\d{2})_(\d{2})$/;

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatMeetingId = (date: Date): string =>
  [
    String(date.getFullYear()).padStart(4, '0'),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds())
  ].join('_');

export const isMeetingId = (value: string): boolean => MEETING_ID_PATTERN.test(value);

export const assertMeetingId = (value: string): string => {
  if (!isMeetingId(value)) {
    throw new InvalidRequestError(`Invalid meeting id: ${value}.`);
  }
  return value;
};

export const formatMeetingLabel = (meetingId: string, title = ''): string => {
  const match = MEETING_ID_PATTERN.exec(meetingId);
  if (!match) {
    throw new InvalidRequestError(`Invalid meeting id: ${meetingId}.`);
  }
  const [, year, month, day, hour, minute, second] = match;
  const label = `${year}/${month}/${day} ${hour}:${minute}:${second}`;
  const trimmedTitle = title.trim();
  return trimmedTitle ? `${label} - ${trimmedTitle}` : label;
};
