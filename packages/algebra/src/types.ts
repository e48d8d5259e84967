/**
 * Type definitions shared by the operator tree, the cache and the query entry point.
 * All intervals are half-open: [start, end)
 */

import type { Bound, BoundCoercer, Interval } from '@spanset/core';

/**
 * Anything that can produce intervals for a query range.
 *
 * Contract for implementers:
 * - `fetch` yields intervals in non-decreasing `(start, end)` order
 * - yielded intervals may extend past `[start, end)`; the query entry point clips
 * - every call is an independent evaluation; no cursor state survives between calls
 *
 * Out-of-order output is not detected; operators downstream of such a source
 * produce undefined results.
 *
 * @example
 * const holidays: Source = {
 *   isMask: true,
 *   *fetch(start, end) {
 *     yield { start: 1_704_067_200, end: 1_704_153_600 };
 *   },
 * };
 */
export interface Source<T extends Interval = Interval> {
	/** True when the source yields plain intervals that carry no metadata */
	readonly isMask: boolean;
	/** Strategy for interpreting caller-facing query bounds; defaults to `coerceBound` */
	readonly coerceBound?: BoundCoercer;
	/** Yield intervals overlapping [start, end); null bounds are unbounded */
	fetch(start: Bound, end: Bound): Iterable<T>;
}

/**
 * A source statically known to yield plain intervals.
 * Intersecting a rich timeline with one keeps the rich side's metadata only.
 */
export interface MaskSource extends Source<Interval> {
	readonly isMask: true;
}

/**
 * Builds the plain interval used for gaps produced by complement and flatten.
 */
export type MaskFactory = (start: Bound, end: Bound) => Interval;

/**
 * Delivery order of query results.
 * `desc` is the ascending result reversed (newest first).
 */
export type Direction = 'asc' | 'desc';

/**
 * Options for the query entry point.
 */
export interface QueryOptions {
	/** Result order; defaults to 'asc' */
	direction?: Direction;
}

/**
 * Options accepted by operators that create gap intervals.
 */
export interface ComplementOptions {
	/** Custom constructor for gap intervals; they stay mask intervals */
	maskFactory?: MaskFactory;
}
