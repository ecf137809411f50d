import { DAY_MS, HOUR_MS } from './_consts.ts';

const ISO_TIMESTAMP_REGEX =
	/^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;
const FILTER_DATE_REGEX = /^(\d{4})-?(\d{2})-?(\d{2})$/;

function offsetMinutes(zone: string): number {
	if (zone === 'Z') {
		return 0;
	}
	const sign = zone.startsWith('-') ? -1 : 1;
	const digits = zone.slice(1).replace(':', '');
	const hours = Number.parseInt(digits.slice(0, 2), 10);
	const minutes = Number.parseInt(digits.slice(2, 4), 10);
	return sign * (hours * 60 + minutes);
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
	const probe = new Date(Date.UTC(year, month - 1, day));
	return (
		probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day
	);
}

/**
 * Parses an ISO-8601 timestamp as written by the Codex TUI (microsecond
 * fractions, `Z` or numeric offset; no offset means UTC) into a normalized
 * `toISOString()` form. Returns undefined for anything else.
 */
export function parseTimestamp(text: string): string | undefined {
	const match = ISO_TIMESTAMP_REGEX.exec(text.trim());
	if (match == null) {
		return undefined;
	}
	const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zone] = match;
	if (
		yearText == null ||
		monthText == null ||
		dayText == null ||
		hourText == null ||
		minuteText == null ||
		secondText == null
	) {
		return undefined;
	}

	const year = Number.parseInt(yearText, 10);
	const month = Number.parseInt(monthText, 10);
	const day = Number.parseInt(dayText, 10);
	const hour = Number.parseInt(hourText, 10);
	const minute = Number.parseInt(minuteText, 10);
	const second = Number.parseInt(secondText, 10);
	if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
		return undefined;
	}

	const millis = fraction == null ? 0 : Number.parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10);
	const local = Date.UTC(year, month - 1, day, hour, minute, second, millis);
	const utc = local - offsetMinutes(zone ?? 'Z') * 60_000;
	return new Date(utc).toISOString();
}

export function toEpochMs(timestamp: string): number {
	return Date.parse(timestamp);
}

export function addHours(timestamp: string, hours: number): string {
	return new Date(toEpochMs(timestamp) + hours * HOUR_MS).toISOString();
}

export function toDateKey(timestamp: string): string {
	return new Date(toEpochMs(timestamp)).toISOString().slice(0, 10);
}

export function dateKeyDaysBefore(now: Date, days: number): string {
	return new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10);
}

export function nextDateKey(dateKey: string): string {
	return new Date(Date.parse(`${dateKey}T00:00:00.000Z`) + DAY_MS).toISOString().slice(0, 10);
}

export function normalizeFilterDate(value?: string): string | undefined {
	if (value == null || value.trim() === '') {
		return undefined;
	}
	const match = FILTER_DATE_REGEX.exec(value.trim());
	const [, yearText, monthText, dayText] = match ?? [];
	if (yearText == null || monthText == null || dayText == null) {
		throw new Error(`Invalid date: ${value}. Expected YYYY-MM-DD or YYYYMMDD`);
	}
	if (
		!isValidCalendarDate(
			Number.parseInt(yearText, 10),
			Number.parseInt(monthText, 10),
			Number.parseInt(dayText, 10),
		)
	) {
		throw new Error(`Invalid date: ${value}`);
	}
	return `${yearText}-${monthText}-${dayText}`;
}

export function isWithinRange(dateKey: string, since?: string, until?: string): boolean {
	if (since != null && dateKey < since) {
		return false;
	}
	if (until != null && dateKey > until) {
		return false;
	}
	return true;
}

export function formatDuration(seconds: number): string {
	const clamped = Math.max(0, Math.floor(seconds));
	const hours = Math.floor(clamped / 3600);
	const minutes = Math.floor((clamped % 3600) / 60);
	return `${hours}:${String(minutes).padStart(2, '0')}`;
}

if (import.meta.vitest != null) {
	describe('parseTimestamp', () => {
		it('normalizes microsecond UTC timestamps', () => {
			expect(parseTimestamp('2025-08-25T10:00:05.123456Z')).toBe('2025-08-25T10:00:05.123Z');
		});

		it('treats timestamps without a zone as UTC', () => {
			expect(parseTimestamp('2025-08-25T10:00:05')).toBe('2025-08-25T10:00:05.000Z');
		});

		it('converts numeric offsets to UTC', () => {
			expect(parseTimestamp('2025-08-25T10:00:00+02:00')).toBe('2025-08-25T08:00:00.000Z');
			expect(parseTimestamp('2025-08-25T23:30:00-0130')).toBe('2025-08-26T01:00:00.000Z');
		});

		it('rejects malformed or impossible timestamps', () => {
			expect(parseTimestamp('2025-02-30T10:00:00Z')).toBeUndefined();
			expect(parseTimestamp('2025-08-25T25:00:00Z')).toBeUndefined();
			expect(parseTimestamp('yesterday')).toBeUndefined();
		});
	});

	describe('normalizeFilterDate', () => {
		it('accepts compact and dashed dates', () => {
			expect(normalizeFilterDate('20250911')).toBe('2025-09-11');
			expect(normalizeFilterDate('2025-09-11')).toBe('2025-09-11');
			expect(normalizeFilterDate(undefined)).toBeUndefined();
		});

		it('throws on invalid dates', () => {
			expect(() => normalizeFilterDate('2025-13-01')).toThrow('Invalid date');
			expect(() => normalizeFilterDate('last week')).toThrow('Expected YYYY-MM-DD');
		});
	});

	describe('date helpers', () => {
		it('computes UTC date keys and day arithmetic', () => {
			expect(toDateKey('2025-09-11T23:59:59.999Z')).toBe('2025-09-11');
			expect(nextDateKey('2025-02-28')).toBe('2025-03-01');
			expect(dateKeyDaysBefore(new Date('2025-09-30T12:00:00.000Z'), 30)).toBe('2025-08-31');
			expect(addHours('2025-08-25T07:45:00.000Z', 5)).toBe('2025-08-25T12:45:00.000Z');
		});

		it('formats durations as hours and minutes', () => {
			expect(formatDuration(3 * 3600 + 7 * 60 + 59)).toBe('3:07');
			expect(formatDuration(-5)).toBe('0:00');
		});
	});
}
