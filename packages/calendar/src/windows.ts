/**
 * Recurring calendar windows: weekdays, weekends, chosen days, daily time ranges
 * and business hours, computed per local day in an IANA time zone.
 */

import { Timeline, type MaskSource } from '@spanset/algebra';
import {
	DAY,
	HOUR,
	InvalidArgumentError,
	durationSchema,
	durationToSeconds,
	interval,
	parseOptions,
	type Bound,
	type Duration,
	type Interval,
} from '@spanset/core';
import { z } from 'zod';
import { addLocalDays, isValidTimeZone, localDayOf, wallClockToBound, weekdayOf } from './zoned.js';

// ============================================================================
// Types
// ============================================================================

export type DayOfWeek = 'sunday' | 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday';

/**
 * Maps JavaScript's getUTCDay() (0=Sunday) to day names.
 */
const DAY_INDEX_TO_NAME: readonly DayOfWeek[] = [
	'sunday',
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
];

const WORKING_DAYS: readonly DayOfWeek[] = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'];

const timezoneSchema = z
	.string()
	.refine(isValidTimeZone, (value) => ({ message: `Unknown time zone "${value}"` }));

const dayOfWeekSchema = z.enum(['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday']);

/**
 * Shape shared by every window: which local days, and which part of each day.
 */
interface WindowSpec {
	days: ReadonlySet<DayOfWeek>;
	/** Seconds after local midnight */
	startOffset: number;
	/** Seconds of wall-clock time */
	length: number;
	timezone: string;
}

// ============================================================================
// Calendar window
// ============================================================================

/**
 * A mask timeline with one interval per matching local day.
 *
 * Windows repeat forever in both directions, so they need finite query
 * bounds; intersect or query them over a finite range.
 */
export class CalendarWindow extends Timeline<Interval> implements MaskSource {
	readonly isMask = true;

	constructor(
		readonly name: string,
		private readonly spec: WindowSpec,
	) {
		super();
	}

	get timezone(): string {
		return this.spec.timezone;
	}

	*fetch(start: Bound, end: Bound): Generator<Interval> {
		if (start === null || end === null) {
			throw new InvalidArgumentError(`${this.name} requires finite start and end bounds`);
		}

		const { days, startOffset, length, timezone } = this.spec;
		// The previous day's window may still be open at `start`
		let day = addLocalDays(localDayOf(start, timezone), -1);

		while (true) {
			const windowStart = wallClockToBound(day, startOffset, timezone);
			if (windowStart >= end) {
				return;
			}
			const name = DAY_INDEX_TO_NAME[weekdayOf(day)];
			if (name !== undefined && days.has(name)) {
				const windowEnd = wallClockToBound(day, startOffset + length, timezone);
				if (windowEnd > start && windowEnd > windowStart) {
					yield interval(windowStart, windowEnd);
				}
			}
			day = addLocalDays(day, 1);
		}
	}
}

// ============================================================================
// Factories
// ============================================================================

function parseTimezone(timezone: string, label: string): string {
	return parseOptions(timezoneSchema, timezone, `${label}: timezone`);
}

/**
 * Whole local days from Monday to Friday.
 *
 * @example
 * const weekdayMeetings = meetings.and(weekdays('Europe/London'));
 */
export function weekdays(timezone = 'UTC'): CalendarWindow {
	return new CalendarWindow('weekdays', {
		days: new Set(WORKING_DAYS),
		startOffset: 0,
		length: DAY,
		timezone: parseTimezone(timezone, 'weekdays'),
	});
}

/**
 * Whole local Saturdays and Sundays.
 */
export function weekends(timezone = 'UTC'): CalendarWindow {
	return new CalendarWindow('weekends', {
		days: new Set<DayOfWeek>(['saturday', 'sunday']),
		startOffset: 0,
		length: DAY,
		timezone: parseTimezone(timezone, 'weekends'),
	});
}

/**
 * Whole local days matching one or more day names.
 *
 * @example
 * const tuesdaysAndThursdays = dayOfWeek(['tuesday', 'thursday'], 'America/Chicago');
 */
export function dayOfWeek(days: DayOfWeek | readonly DayOfWeek[], timezone = 'UTC'): CalendarWindow {
	const parsed = parseOptions(
		z.array(dayOfWeekSchema).nonempty('at least one day is required'),
		typeof days === 'string' ? [days] : [...days],
		'dayOfWeek: days',
	);
	return new CalendarWindow('dayOfWeek', {
		days: new Set(parsed),
		startOffset: 0,
		length: DAY,
		timezone: parseTimezone(timezone, 'dayOfWeek'),
	});
}

export interface TimeOfDayOptions {
	/** Time after local midnight the window opens; defaults to 0 */
	start?: Duration;
	/** Wall-clock length of the window, at most one day; defaults to one day */
	duration?: Duration;
	/** IANA zone; defaults to UTC */
	timezone?: string;
}

const timeOfDaySchema = z
	.object({
		start: durationSchema.default(0),
		duration: durationSchema.default(DAY),
		timezone: timezoneSchema.default('UTC'),
	})
	.strict();

/**
 * The same wall-clock range every day.
 *
 * @throws InvalidArgumentError when `start` is outside [0, 1 day) or `duration`
 * is not in (0, 1 day]
 *
 * @example
 * // 09:30 to 17:30 every day in Berlin
 * const office = timeOfDay({ start: { hours: 9, minutes: 30 }, duration: { hours: 8 }, timezone: 'Europe/Berlin' });
 */
export function timeOfDay(options: TimeOfDayOptions = {}): CalendarWindow {
	const parsed = parseOptions(timeOfDaySchema, options, 'timeOfDay');
	const startOffset = durationToSeconds(parsed.start);
	const length = durationToSeconds(parsed.duration);

	if (!Number.isSafeInteger(startOffset) || startOffset < 0 || startOffset >= DAY) {
		throw new InvalidArgumentError(`timeOfDay: start must be within [0, ${DAY}) seconds, got ${startOffset}`, 'start');
	}
	if (!Number.isSafeInteger(length) || length <= 0 || length > DAY) {
		throw new InvalidArgumentError(`timeOfDay: duration must be within (0, ${DAY}] seconds, got ${length}`, 'duration');
	}

	return new CalendarWindow('timeOfDay', {
		days: new Set(DAY_INDEX_TO_NAME),
		startOffset,
		length,
		timezone: parsed.timezone,
	});
}

export interface BusinessHoursOptions {
	/** IANA zone; defaults to UTC */
	timezone?: string;
	/** Opening hour, inclusive; defaults to 9 */
	startHour?: number;
	/** Closing hour, exclusive; defaults to 17 */
	endHour?: number;
}

const businessHoursSchema = z
	.object({
		timezone: timezoneSchema.default('UTC'),
		startHour: z.number().int().min(0).max(23).default(9),
		endHour: z.number().int().min(1).max(24).default(17),
	})
	.strict()
	.refine((value) => value.startHour < value.endHour, {
		message: 'startHour must be before endHour',
		path: ['startHour'],
	});

/**
 * Weekday working hours.
 *
 * @example
 * const free = businessHours({ timezone: 'America/Los_Angeles' }).minus(calendar);
 * const extended = businessHours({ startHour: 8, endHour: 18 });
 */
export function businessHours(options: BusinessHoursOptions = {}): CalendarWindow {
	const parsed = parseOptions(businessHoursSchema, options, 'businessHours');
	return new CalendarWindow('businessHours', {
		days: new Set(WORKING_DAYS),
		startOffset: parsed.startHour * HOUR,
		length: (parsed.endHour - parsed.startHour) * HOUR,
		timezone: parsed.timezone,
	});
}
