/**
 * Timezone helpers: zone validation, local-day arithmetic and a zoned bound coercer.
 */

import { InvalidArgumentError, coerceBound, dateToBound, hasUtcOffset, parseDay, type BoundCoercer } from '@spanset/core';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * A local calendar day, independent of any zone.
 */
export interface LocalDay {
	year: number;
	month: number;
	day: number;
}

/**
 * True when `timezone` is an IANA zone the runtime knows.
 */
export function isValidTimeZone(timezone: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: timezone });
		return true;
	} catch (error) {
		if (error instanceof RangeError) {
			return false;
		}
		throw error;
	}
}

/**
 * The local day an instant falls on in `timezone`.
 */
export function localDayOf(seconds: number, timezone: string): LocalDay {
	const formatted = formatInTimeZone(new Date(seconds * 1000), timezone, 'yyyy-MM-dd');
	const day = parseDay(formatted);
	if (!day) {
		throw new RangeError(`Unexpected local date "${formatted}" for ${timezone}`);
	}
	return day;
}

/**
 * Moves a local day by whole days.
 */
export function addLocalDays(day: LocalDay, amount: number): LocalDay {
	const shifted = new Date(Date.UTC(day.year, day.month - 1, day.day + amount));
	return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

/**
 * Day of week of a local day, 0 for Sunday through 6 for Saturday.
 */
export function weekdayOf(day: LocalDay): number {
	return new Date(Date.UTC(day.year, day.month - 1, day.day)).getUTCDay();
}

/**
 * The instant, in Unix seconds, at which the wall clock in `timezone` shows
 * `offsetSeconds` past local midnight of `day`. Offsets past one day roll
 * into the following days.
 */
export function wallClockToBound(day: LocalDay, offsetSeconds: number, timezone: string): number {
	const naive = new Date(Date.UTC(day.year, day.month - 1, day.day) + offsetSeconds * 1000);
	const wallTime = naive.toISOString().slice(0, 19);
	return Math.floor(fromZonedTime(wallTime, timezone).getTime() / 1000);
}

/**
 * A bound coercer that reads offset-less strings in `timezone`.
 *
 * - `YYYY-MM-DD` covers the whole local day: local midnight on a start edge,
 *   the next local midnight on an end edge
 * - `YYYY-MM-DDTHH:mm[:ss]` is a wall-clock time in the zone
 * - everything else behaves as the default coercer
 *
 * @throws InvalidArgumentError when the zone is unknown
 *
 * @example
 * const meetings = staticTimeline(rows, { coerceBound: zonedBounds('America/New_York') });
 * meetings.query('2024-01-15', '2024-01-16'); // two New York days
 */
export function zonedBounds(timezone: string): BoundCoercer {
	if (!isValidTimeZone(timezone)) {
		throw new InvalidArgumentError(`zonedBounds: unknown time zone "${timezone}"`, 'timezone');
	}

	return (value, edge) => {
		if (typeof value !== 'string') {
			return coerceBound(value, edge);
		}

		const day = parseDay(value);
		if (day) {
			const local = edge === 'start' ? day : addLocalDays(day, 1);
			return wallClockToBound(local, 0, timezone);
		}

		if (hasUtcOffset(value)) {
			return coerceBound(value, edge);
		}

		return dateToBound(fromZonedTime(value, timezone), edge);
	};
}
