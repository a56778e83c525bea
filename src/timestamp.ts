import { parse, isValid } from 'date-fns';
import { TimestampFormatError } from './errors';
import { error } from './logging';

export const RELEASE_DATE_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export type TimestampInput = string | Date | number | null | undefined;

/** Parses a mod database release date, in local time. */
export function parseReleaseDate(text: string): Date {
  const date = parse(text, RELEASE_DATE_FORMAT, new Date());
  if (!isValid(date)) {
    const innerError = new RangeError(`time data '${text}' does not match format '${RELEASE_DATE_FORMAT}'`);
    error(innerError.message);
    throw new TimestampFormatError(`Invalid release date: ${innerError.message}`, text, innerError);
  }
  return date;
}

function toEpochSeconds(date: Date): number {
  const ms = date.getTime();
  if (Number.isNaN(ms)) {
    throw new TimestampFormatError('Invalid release date: invalid Date', String(date), new RangeError('Invalid time value'));
  }
  return Math.trunc(ms / 1000);
}

export function encodeTimestamp(value: TimestampInput): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return toEpochSeconds(parseReleaseDate(value));
  }
  if (typeof value === 'number') {
    return Math.trunc(value);
  }
  return toEpochSeconds(value);
}

export function decodeTimestamp(value: number | null): Date | null {
  if (value === null) {
    return null;
  }
  return new Date(value * 1000);
}
