/**
 * TTL cache decorator.
 *
 * Remembers which ranges of a source have been fetched and when. Queries are
 * answered from fresh segments where possible; only the uncovered (or
 * expired) parts of the range are fetched from the wrapped source.
 */

import {
	InvalidArgumentError,
	MAX_BOUND,
	MIN_BOUND,
	compareIntervals,
	durationSchema,
	durationToMs,
	finiteEnd,
	finiteStart,
	parseOptions,
	toBound,
	withBounds,
	type Bound,
	type BoundCoercer,
	type BoundInput,
	type Duration,
	type Interval,
} from '@spanset/core';
import { z } from 'zod';
import { Timeline } from './timeline.js';
import type { Source } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Minimal logger accepted by the cache. `console` and pino loggers both fit.
 */
export interface CacheLogger {
	debug(message: string, context?: Record<string, unknown>): void;
}

export interface CacheOptions {
	/** How long a fetched range stays fresh; must be positive */
	ttl: Duration;
	/** Time source for freshness checks; defaults to the system clock */
	clock?: () => Date;
	/** Receives a debug line per upstream fetch, fracture and prune */
	logger?: CacheLogger;
	/** Overrides the wrapped source's coercer */
	coerceBound?: BoundCoercer;
}

/**
 * A snapshot of one cached range.
 */
export interface CacheSegment<T extends Interval> {
	readonly start: Bound;
	readonly end: Bound;
	readonly fetchedAt: Date;
	readonly intervals: readonly T[];
}

interface Segment<T extends Interval> {
	start: number;
	end: number;
	fetchedAt: number;
	intervals: T[];
}

const silentLogger: CacheLogger = {
	debug() {},
};

const isFunction = (value: unknown): boolean => typeof value === 'function';

const cacheOptionsSchema = z
	.object({
		ttl: durationSchema,
		clock: z.custom<() => Date>(isFunction, 'Expected a function returning a Date').optional(),
		logger: z
			.custom<CacheLogger>(
				(value) =>
					typeof value === 'object' &&
					value !== null &&
					'debug' in value &&
					typeof value.debug === 'function',
				'Expected an object with a debug method',
			)
			.optional(),
		coerceBound: z.custom<BoundCoercer>(isFunction, 'Expected a bound coercer').optional(),
	})
	.strict();

/**
 * Part of an interval read from one or more adjacent segments.
 */
interface Piece<T extends Interval> {
	value: T;
	start: number;
	end: number;
}

/**
 * True when both intervals carry the same fields apart from their bounds.
 */
function sameMetadata(a: Interval, b: Interval): boolean {
	if (a === b) return true;
	const fields = (value: Interval) => Object.entries(value).filter(([key]) => key !== 'start' && key !== 'end');
	const aFields = fields(a);
	const bFields = new Map(fields(b));
	return (
		aFields.length === bFields.size &&
		aFields.every(([key, value]) => bFields.has(key) && Object.is(bFields.get(key), value))
	);
}

function touches<T extends Interval>(value: T, start: number, end: number): boolean {
	return finiteStart(value) < end && finiteEnd(value) > start;
}

function slice<T extends Interval>(segment: Segment<T>, start: number, end: number): Segment<T> {
	return {
		start,
		end,
		fetchedAt: segment.fetchedAt,
		intervals: segment.intervals.filter((value) => touches(value, start, end)),
	};
}

/**
 * The parts of `segment` outside [start, end).
 */
function remainders<T extends Interval>(segment: Segment<T>, start: number, end: number): Segment<T>[] {
	const parts: Segment<T>[] = [];
	if (segment.start < start) {
		parts.push(slice(segment, segment.start, start));
	}
	if (segment.end > end) {
		parts.push(slice(segment, end, segment.end));
	}
	return parts;
}

// ============================================================================
// Cached timeline
// ============================================================================

/**
 * Caches a source's results per fetched range with a time-to-live.
 *
 * Segments never overlap. Fetching a range that overlaps expired segments
 * splits them: the parts outside the new range survive with their original
 * timestamp, the part inside is replaced.
 *
 * Every segment answers for its own range only. An interval cut by a segment
 * boundary is joined back with the matching piece from the next segment, so
 * intervals that straddle segments are returned once while genuine
 * duplicates from upstream are kept. When upstream changed between two
 * fetches, each segment still reports what it saw.
 *
 * Not safe for concurrent mutation; callers serialise access.
 */
export class CachedTimeline<T extends Interval> extends Timeline<T> {
	private readonly ttlMs: number;
	private readonly clock: () => Date;
	private readonly logger: CacheLogger;
	private store: Segment<T>[] = [];

	constructor(
		readonly source: Source<T>,
		options: CacheOptions,
	) {
		const parsed = parseOptions(cacheOptionsSchema, options, 'cached');
		super(parsed.coerceBound ?? source.coerceBound);

		this.ttlMs = durationToMs(parsed.ttl);
		if (this.ttlMs <= 0) {
			throw new InvalidArgumentError(`cached: ttl must be positive, got ${this.ttlMs}ms`, 'ttl');
		}
		this.clock = parsed.clock ?? (() => new Date());
		this.logger = parsed.logger ?? silentLogger;
	}

	get isMask(): boolean {
		return this.source.isMask;
	}

	*fetch(start: Bound, end: Bound): Generator<T> {
		const lower = start ?? MIN_BOUND;
		const upper = end ?? MAX_BOUND;
		if (lower >= upper) {
			return;
		}

		const now = this.clock().getTime();
		for (const [missStart, missEnd] of this.misses(lower, upper, now)) {
			this.load(missStart, missEnd, now);
		}

		const results: T[] = [];
		let open: Piece<T>[] = [];

		for (const segment of this.store) {
			if (segment.end <= lower || segment.start >= upper) {
				continue;
			}
			const from = Math.max(segment.start, lower);
			const to = Math.min(segment.end, upper);
			const carried = open;
			open = [];

			for (const value of segment.intervals) {
				if (!touches(value, from, to)) {
					continue;
				}
				let piece: Piece<T> = {
					value,
					start: Math.max(finiteStart(value), from),
					end: Math.min(finiteEnd(value), to),
				};
				// A piece cut by the previous segment boundary continues a carried piece
				if (finiteStart(value) < from) {
					const index = carried.findIndex((prior) => prior.end === from && sameMetadata(prior.value, value));
					const prior = carried[index];
					if (prior) {
						carried.splice(index, 1);
						piece = { value: prior.value, start: prior.start, end: piece.end };
					}
				}
				if (finiteEnd(value) > to) {
					open.push(piece);
				} else {
					results.push(withBounds(piece.value, toBound(piece.start), toBound(piece.end)));
				}
			}

			for (const piece of carried) {
				results.push(withBounds(piece.value, toBound(piece.start), toBound(piece.end)));
			}
		}
		for (const piece of open) {
			results.push(withBounds(piece.value, toBound(piece.start), toBound(piece.end)));
		}

		results.sort(compareIntervals);
		yield* results;
	}

	/**
	 * Drops cached coverage of [start, end), or everything without arguments.
	 * Segments partly inside the range keep their outside parts.
	 */
	invalidate(start?: BoundInput, end?: BoundInput): void {
		if (start === undefined && end === undefined) {
			this.clear();
			return;
		}
		const lower = this.coerceBound(start, 'start') ?? MIN_BOUND;
		const upper = this.coerceBound(end, 'end') ?? MAX_BOUND;
		if (lower >= upper) {
			return;
		}
		this.store = this.store.flatMap((segment) =>
			segment.end <= lower || segment.start >= upper ? [segment] : remainders(segment, lower, upper),
		);
		this.logger.debug('cache invalidate', { start: toBound(lower), end: toBound(upper) });
	}

	/**
	 * Removes expired segments and returns how many were removed.
	 */
	prune(): number {
		const now = this.clock().getTime();
		const before = this.store.length;
		this.store = this.store.filter((segment) => this.isFresh(segment, now));
		const removed = before - this.store.length;
		if (removed > 0) {
			this.logger.debug('cache prune', { removed });
		}
		return removed;
	}

	/**
	 * Forgets everything.
	 */
	clear(): void {
		this.store = [];
	}

	/**
	 * Snapshot of the cached segments in ascending order.
	 */
	segments(): CacheSegment<T>[] {
		return this.store.map((segment) => ({
			start: toBound(segment.start),
			end: toBound(segment.end),
			fetchedAt: new Date(segment.fetchedAt),
			intervals: [...segment.intervals],
		}));
	}

	private isFresh(segment: Segment<T>, now: number): boolean {
		return now - segment.fetchedAt < this.ttlMs;
	}

	/**
	 * Sub-ranges of [lower, upper) not covered by a fresh segment.
	 */
	private misses(lower: number, upper: number, now: number): [number, number][] {
		const gaps: [number, number][] = [];
		let cursor = lower;
		for (const segment of this.store) {
			if (segment.end <= cursor || !this.isFresh(segment, now)) {
				continue;
			}
			if (segment.start >= upper) {
				break;
			}
			if (segment.start > cursor) {
				gaps.push([cursor, segment.start]);
			}
			cursor = segment.end;
			if (cursor >= upper) {
				return gaps;
			}
		}
		if (cursor < upper) {
			gaps.push([cursor, upper]);
		}
		return gaps;
	}

	/**
	 * Fetches [start, end) upstream and stores it, splitting the expired
	 * segments it overlaps.
	 */
	private load(start: number, end: number, now: number): void {
		const intervals = [...this.source.fetch(toBound(start), toBound(end))];
		this.logger.debug('cache miss', {
			start: toBound(start),
			end: toBound(end),
			intervals: intervals.length,
		});

		const kept: Segment<T>[] = [];
		for (const segment of this.store) {
			if (segment.end <= start || segment.start >= end) {
				kept.push(segment);
				continue;
			}
			const parts = remainders(segment, start, end);
			this.logger.debug('cache fracture', {
				start: toBound(segment.start),
				end: toBound(segment.end),
				kept: parts.length,
			});
			kept.push(...parts);
		}

		kept.push({ start, end, fetchedAt: now, intervals });
		kept.sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));
		this.store = kept;
	}
}

/**
 * Wraps a source with a TTL cache.
 *
 * @throws InvalidArgumentError when the ttl is not positive or an option is malformed
 *
 * @example
 * const calendar = cached(remoteCalendar, { ttl: { minutes: 5 } });
 * calendar.query(0, 100);   // fetches [0, 100)
 * calendar.query(50, 150);  // fetches only [100, 150)
 */
export function cached<T extends Interval>(source: Source<T>, options: CacheOptions): CachedTimeline<T> {
	return new CachedTimeline(source, options);
}
