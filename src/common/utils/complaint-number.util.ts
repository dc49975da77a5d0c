const COMPLAINT_NO_PATTERN = /^CMP-(\d{8})-(\d{6})$/;
export const COMPLAINT_NO_PREFIX = 'CMP';
export const SEQUENCE_WIDTH = 6;
export const MAX_SEQUENCE = 999_999;

export interface ParsedComplaintNo {
  dateKey: string;
  sequence: number;
}

/** Calendar date of `at` in `timeZone`, as YYYYMMDD. */
export function toDateKey(at: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(at);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((part) => part.type === type)?.value ?? '';
  return `${pick('year')}${pick('month')}${pick('day')}`;
}

export function formatComplaintNo(dateKey: string, sequence: number): string {
  if (!/^\d{8}$/.test(dateKey)) {
    throw new RangeError(`Invalid date key: ${dateKey}`);
  }
  if (!Number.isInteger(sequence) || sequence < 1 || sequence > MAX_SEQUENCE) {
    throw new RangeError(`Sequence out of range: ${sequence}`);
  }
  return `${COMPLAINT_NO_PREFIX}-${dateKey}-${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
}

export function parseComplaintNo(value: string): ParsedComplaintNo | null {
  const match = COMPLAINT_NO_PATTERN.exec(value);
  if (!match) return null;
  return { dateKey: match[1], sequence: parseInt(match[2], 10) };
}

export function isComplaintNo(value: string): boolean {
  return COMPLAINT_NO_PATTERN.test(value);
}
