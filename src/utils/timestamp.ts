import dayjs from 'dayjs';
import type { Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { IqError } from '../errors';

dayjs.extend(utc);

// The service speaks microsecond precision; JavaScript dates stop at milliseconds.
const ISO_MICROSECONDS = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{1,6}Z$/;

/**
 * Format a date as `YYYY-MM-DDTHH:MM:SS.ffffffZ` in UTC
 */
export function isoFormat(timestamp: Date | Dayjs): string {
    return dayjs.utc(timestamp).format('YYYY-MM-DDTHH:mm:ss.SSS[000Z]');
}

/**
 * Parse a `YYYY-MM-DDTHH:MM:SS.ffffffZ` timestamp (sub-millisecond digits are dropped)
 */
export function fromIsoFormat(timestamp: string): Date {
    if (!ISO_MICROSECONDS.test(timestamp)) {
        throw new IqError(`The timestamp '${timestamp}' is not in YYYY-MM-DDTHH:MM:SS.ffffffZ format.`);
    }
    return dayjs.utc(timestamp).toDate();
}

/**
 * Lenient parse for catalog timestamps; null when the text is not a date
 */
export function parseServiceTimestamp(timestamp: string): Dayjs | null {
    if (!timestamp) {
        return null;
    }
    const parsed = dayjs.utc(timestamp);
    return parsed.isValid() ? parsed : null;
}
