/**
 * In-memory leaf timelines.
 */

import {
	compareIntervals,
	finiteEnd,
	finiteStart,
	validateInterval,
	type Bound,
	type BoundCoercer,
	type Interval,
} from '@spanset/core';
import { Timeline, type MaskTimeline } from './timeline.js';
import type { MaskSource } from './types.js';

/**
 * Options for in-memory timelines.
 */
export interface StaticTimelineOptions {
	/** Declare the intervals plain; defaults to false */
	mask?: boolean;
	/** Bound coercer used when this timeline is queried directly or is a first child */
	coerceBound?: BoundCoercer;
}

/**
 * A fixed, sorted list of intervals.
 *
 * A running maximum of ends lets `fetch` binary-search to the first interval
 * that can reach the query start, even when long intervals precede short ones.
 */
export class StaticTimeline<T extends Interval> extends Timeline<T> {
	readonly isMask: boolean;
	private readonly items: readonly T[];
	private readonly maxEnds: readonly number[];

	constructor(intervals: Iterable<T>, options: StaticTimelineOptions = {}) {
		super(options.coerceBound);
		this.isMask = options.mask ?? false;

		const items = [...intervals];
		for (const item of items) {
			validateInterval(item);
		}
		items.sort(compareIntervals);
		this.items = items;

		const maxEnds: number[] = [];
		let running = Number.NEGATIVE_INFINITY;
		for (const item of items) {
			running = Math.max(running, finiteEnd(item));
			maxEnds.push(running);
		}
		this.maxEnds = maxEnds;
	}

	/** Number of stored intervals */
	get size(): number {
		return this.items.length;
	}

	*fetch(start: Bound, end: Bound): Generator<T> {
		const lower = start ?? Number.NEGATIVE_INFINITY;
		const upper = end ?? Number.POSITIVE_INFINITY;

		for (let i = this.firstReaching(lower); i < this.items.length; i++) {
			const item = this.items[i];
			if (item === undefined || finiteStart(item) >= upper) {
				return;
			}
			if (finiteEnd(item) > lower) {
				yield item;
			}
		}
	}

	/**
	 * Index of the first item whose running maximum end passes `lower`.
	 */
	private firstReaching(lower: number): number {
		let lo = 0;
		let hi = this.maxEnds.length;
		while (lo < hi) {
			const mid = (lo + hi) >>> 1;
			const maxEnd = this.maxEnds[mid] ?? Number.NEGATIVE_INFINITY;
			if (maxEnd > lower) {
				hi = mid;
			} else {
				lo = mid + 1;
			}
		}
		return lo;
	}
}

class StaticMask extends StaticTimeline<Interval> implements MaskSource {
	readonly isMask = true;

	constructor(intervals: Iterable<Interval>, coerceBound?: BoundCoercer) {
		super(intervals, { mask: true, coerceBound });
	}
}

/**
 * Builds an in-memory timeline.
 *
 * @throws ValidationError when an interval is malformed
 *
 * @example
 * const meetings = staticTimeline<Meeting>([
 *   { start: 0, end: 10, title: 'Standup' },
 *   { start: 20, end: 30, title: 'Review' },
 * ]);
 * const holidays = staticTimeline([interval(100, 200)], { mask: true });
 */
export function staticTimeline(
	intervals: Iterable<Interval>,
	options: StaticTimelineOptions & { mask: true },
): MaskTimeline;
export function staticTimeline<T extends Interval>(
	intervals: Iterable<T>,
	options?: StaticTimelineOptions,
): Timeline<T>;
export function staticTimeline<T extends Interval>(
	intervals: Iterable<T>,
	options: StaticTimelineOptions = {},
): Timeline<T> | MaskTimeline {
	if (options.mask === true) {
		return new StaticMask(intervals, options.coerceBound);
	}
	return new StaticTimeline(intervals, options);
}

/**
 * In-memory timeline of rich intervals.
 *
 * @example
 * const busy = timeline({ start: 10, end: 20, who: 'alice' });
 */
export function timeline<T extends Interval>(...intervals: T[]): Timeline<T> {
	return new StaticTimeline(intervals);
}

/**
 * In-memory mask timeline of plain intervals.
 *
 * @example
 * const officeHours = mask(interval(9 * HOUR, 17 * HOUR));
 */
export function mask(...intervals: Interval[]): MaskTimeline {
	return new StaticMask(intervals);
}
