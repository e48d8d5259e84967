/**
 * Aggregate measurements over a finite window.
 *
 * Every function takes a finite [start, end) window in any bound form the
 * source accepts. A window whose start is after its end measures nothing.
 *
 * @throws InvalidArgumentError when either side of the window is unbounded
 */

import { InvalidArgumentError, coerceBound, duration, type BoundInput, type Interval } from '@spanset/core';
import { stream } from './query.js';
import { flatten } from './timeline.js';
import type { Source } from './types.js';

interface Window {
	start: number;
	end: number;
}

function finiteWindow(source: Source<Interval>, start: BoundInput, end: BoundInput, label: string): Window | undefined {
	const coerce = source.coerceBound ?? coerceBound;
	const lower = coerce(start, 'start');
	const upper = coerce(end, 'end');
	if (lower === null || upper === null) {
		throw new InvalidArgumentError(`${label}: the window must have a finite start and end`);
	}
	return lower > upper ? undefined : { start: lower, end: upper };
}

function lengthOf(value: Interval): number {
	return duration(value) ?? 0;
}

/**
 * Seconds covered by the source within the window. Overlapping intervals are
 * counted once.
 *
 * @example
 * totalDuration(meetings, '2024-01-15', '2024-01-16'); // busy seconds that day
 */
export function totalDuration(source: Source<Interval>, start: BoundInput, end: BoundInput): number {
	const window = finiteWindow(source, start, end, 'totalDuration');
	if (!window) {
		return 0;
	}
	let total = 0;
	for (const value of stream(flatten(source), window.start, window.end)) {
		total += lengthOf(value);
	}
	return total;
}

/**
 * The longest interval within the window, clipped to it.
 * Ties go to the earliest.
 */
export function maxDuration<T extends Interval>(
	source: Source<T>,
	start: BoundInput,
	end: BoundInput,
): T | undefined {
	const window = finiteWindow(source, start, end, 'maxDuration');
	if (!window) {
		return undefined;
	}
	let longest: T | undefined;
	for (const value of stream(source, window.start, window.end)) {
		if (!longest || lengthOf(value) > lengthOf(longest)) {
			longest = value;
		}
	}
	return longest;
}

/**
 * The shortest interval within the window, clipped to it.
 * Ties go to the earliest.
 */
export function minDuration<T extends Interval>(
	source: Source<T>,
	start: BoundInput,
	end: BoundInput,
): T | undefined {
	const window = finiteWindow(source, start, end, 'minDuration');
	if (!window) {
		return undefined;
	}
	let shortest: T | undefined;
	for (const value of stream(source, window.start, window.end)) {
		if (!shortest || lengthOf(value) < lengthOf(shortest)) {
			shortest = value;
		}
	}
	return shortest;
}

/**
 * Number of intervals the source yields within the window.
 */
export function countIntervals(source: Source<Interval>, start: BoundInput, end: BoundInput): number {
	const window = finiteWindow(source, start, end, 'countIntervals');
	if (!window) {
		return 0;
	}
	let count = 0;
	for (const _value of stream(source, window.start, window.end)) {
		count++;
	}
	return count;
}

/**
 * Fraction of the window covered by the source, between 0 and 1.
 * An empty window has a ratio of 0.
 *
 * @example
 * coverageRatio(busy, 0, 100); // 0.25 when 25 seconds are busy
 */
export function coverageRatio(source: Source<Interval>, start: BoundInput, end: BoundInput): number {
	const window = finiteWindow(source, start, end, 'coverageRatio');
	if (!window || window.end <= window.start) {
		return 0;
	}
	return totalDuration(source, window.start, window.end) / (window.end - window.start);
}
