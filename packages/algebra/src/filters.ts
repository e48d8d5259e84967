/**
 * Predicates over single intervals.
 */

import { ConstructionError, type Interval } from '@spanset/core';
import type { Source } from './types.js';

/**
 * A boolean predicate over one interval.
 *
 * Filters combine with other filters through `and`, `or` and `not`. They are
 * applied to a timeline with `timeline.where(filter)` or `timeline.and(filter)`;
 * `or` never mixes filters and timelines.
 *
 * @example
 * const long = filter<Meeting>((m) => (m.end ?? Infinity) - (m.start ?? -Infinity) >= 3600);
 * const external = filter<Meeting>((m) => m.external);
 * const longOrExternal = long.or(external);
 */
export class Filter<T extends Interval = Interval> {
	constructor(private readonly predicate: (value: T) => boolean) {}

	/**
	 * True when the interval passes the filter.
	 */
	test(value: T): boolean {
		return this.predicate(value);
	}

	/**
	 * Passes intervals accepted by both filters.
	 */
	and(other: Filter<T>): Filter<T> {
		return allOf(this, other);
	}

	/**
	 * Passes intervals accepted by either filter.
	 *
	 * @throws ConstructionError when given a timeline instead of a filter
	 */
	or(other: Filter<T> | Source<Interval>): Filter<T> {
		if (!(other instanceof Filter)) {
			throw new ConstructionError(
				'Cannot combine a filter and a timeline with or(); apply filters with timeline.where(filter) and combine filters with filter.or(other)',
			);
		}
		return anyOf(this, other);
	}

	/**
	 * Passes intervals rejected by this filter.
	 */
	not(): Filter<T> {
		return new Filter((value) => !this.test(value));
	}
}

/**
 * Creates a filter from a predicate function.
 */
export function filter<T extends Interval = Interval>(predicate: (value: T) => boolean): Filter<T> {
	return new Filter(predicate);
}

/**
 * Passes intervals accepted by every filter. With no filters, passes everything.
 */
export function allOf<T extends Interval>(...filters: Filter<T>[]): Filter<T> {
	return new Filter((value) => filters.every((f) => f.test(value)));
}

/**
 * Passes intervals accepted by at least one filter. With no filters, passes nothing.
 */
export function anyOf<T extends Interval>(...filters: Filter<T>[]): Filter<T> {
	return new Filter((value) => filters.some((f) => f.test(value)));
}
