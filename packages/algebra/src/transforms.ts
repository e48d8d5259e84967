/**
 * Shape-changing transforms: buffering intervals and bridging small gaps.
 */

import {
	InvalidArgumentError,
	MAX_BOUND,
	MIN_BOUND,
	durationSchema,
	durationToSeconds,
	finiteEnd,
	finiteStart,
	parseOptions,
	toBound,
	withBounds,
	type Bound,
	type Duration,
	type Interval,
} from '@spanset/core';
import { z } from 'zod';
import { Timeline } from './timeline.js';
import type { Source } from './types.js';

export interface BufferOptions {
	/** Time added before each interval's start; defaults to 0 */
	before?: Duration;
	/** Time added after each interval's end; defaults to 0 */
	after?: Duration;
}

export interface MergeWithinOptions {
	/** Largest gap, in seconds or as a Duration, that still joins two intervals */
	gap: Duration;
}

const bufferOptionsSchema = z
	.object({
		before: durationSchema.default(0),
		after: durationSchema.default(0),
	})
	.strict();

const mergeWithinOptionsSchema = z.object({ gap: durationSchema }).strict();

function nonNegativeSeconds(value: Duration, label: string, path: string): number {
	const seconds = durationToSeconds(value);
	if (!Number.isSafeInteger(seconds) || seconds < 0) {
		throw new InvalidArgumentError(
			`${label}: ${path} must be a non-negative whole number of seconds, got ${seconds}`,
			path,
		);
	}
	return seconds;
}

// ============================================================================
// Buffer
// ============================================================================

/**
 * Each interval of the source widened by fixed amounts.
 */
export class BufferedTimeline<T extends Interval> extends Timeline<T> {
	readonly before: number;
	readonly after: number;

	constructor(
		readonly source: Source<T>,
		options: BufferOptions,
	) {
		const parsed = parseOptions(bufferOptionsSchema, options, 'buffer');
		super(source.coerceBound);
		this.before = nonNegativeSeconds(parsed.before, 'buffer', 'before');
		this.after = nonNegativeSeconds(parsed.after, 'buffer', 'after');
	}

	get isMask(): boolean {
		return this.source.isMask;
	}

	*fetch(start: Bound, end: Bound): Generator<T> {
		// An interval ending at e reaches the range once e + after passes its start
		const innerStart = start === null ? null : toBound(start - this.after);
		const innerEnd = end === null ? null : toBound(end + this.before);

		for (const value of this.source.fetch(innerStart, innerEnd)) {
			yield withBounds(
				value,
				toBound(Math.max(MIN_BOUND, finiteStart(value) - this.before)),
				toBound(Math.min(MAX_BOUND, finiteEnd(value) + this.after)),
			);
		}
	}
}

/**
 * Extends every interval by `before` at its start and `after` at its end.
 * Unbounded sides stay unbounded. Metadata is kept.
 *
 * @throws InvalidArgumentError when `before` or `after` is negative
 *
 * @example
 * // 15 minutes of travel time around every meeting
 * const blocked = buffer(meetings, { before: { minutes: 15 }, after: { minutes: 15 } });
 */
export function buffer<T extends Interval>(source: Source<T>, options: BufferOptions): Timeline<T> {
	return new BufferedTimeline(source, options);
}

// ============================================================================
// Merge within
// ============================================================================

/**
 * Runs of source intervals joined across gaps no longer than `gap`.
 */
export class MergedTimeline<T extends Interval> extends Timeline<T> {
	readonly gap: number;

	constructor(
		readonly source: Source<T>,
		options: MergeWithinOptions,
	) {
		const parsed = parseOptions(mergeWithinOptionsSchema, options, 'mergeWithin');
		super(source.coerceBound);
		this.gap = nonNegativeSeconds(parsed.gap, 'mergeWithin', 'gap');
	}

	get isMask(): boolean {
		return this.source.isMask;
	}

	*fetch(start: Bound, end: Bound): Generator<T> {
		const lower = start ?? MIN_BOUND;
		const upper = end ?? MAX_BOUND;
		// Look back one gap so a run that starts before the range keeps its first interval
		const innerStart = start === null ? null : toBound(start - this.gap - 1);
		const innerEnd = end === null ? null : toBound(end + this.gap);

		let current: T | undefined;
		let currentEnd = MIN_BOUND;

		const finish = (value: T): T | undefined => {
			if (finiteStart(value) >= upper || currentEnd <= lower) {
				return undefined;
			}
			return currentEnd === finiteEnd(value) ? value : withBounds(value, value.start, toBound(currentEnd));
		};

		for (const value of this.source.fetch(innerStart, innerEnd)) {
			if (current && finiteStart(value) - currentEnd <= this.gap) {
				currentEnd = Math.max(currentEnd, finiteEnd(value));
				continue;
			}
			if (current) {
				const merged = finish(current);
				if (merged) yield merged;
			}
			current = value;
			currentEnd = finiteEnd(value);
		}

		if (current) {
			const merged = finish(current);
			if (merged) yield merged;
		}
	}
}

/**
 * Coalesces intervals separated by at most `gap` seconds. Overlapping and
 * touching intervals always merge; the merged interval keeps the metadata of
 * the first interval in its run.
 *
 * The source is read from `gap + 1` seconds before the query start. When a
 * run began further back, the merged interval carries the metadata of the
 * first run member inside that look-behind, so a bounded query can report
 * different metadata than an unbounded one.
 *
 * @throws InvalidArgumentError when `gap` is negative
 *
 * @example
 * // Treat meetings less than 10 minutes apart as one busy block
 * const blocks = mergeWithin(meetings, { gap: { minutes: 10 } });
 */
export function mergeWithin<T extends Interval>(source: Source<T>, options: MergeWithinOptions): Timeline<T> {
	return new MergedTimeline(source, options);
}
