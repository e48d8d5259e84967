/**
 * Properties: named views of an interval that build filters by comparison.
 *
 * @example
 * const priority = field<Ticket, 'priority'>('priority');
 * const urgentAndLong = priority.gte(8).and(hours.gte(2));
 * const urgent = tickets.where(urgentAndLong);
 */

import { DAY, HOUR, MINUTE, SECOND, finiteEnd, finiteStart, type Interval } from '@spanset/core';
import { Filter } from './filters.js';

/**
 * Values with a natural order.
 */
export type Comparable = number | string | bigint | Date;

/**
 * Reads a value from an interval and compares it against constants.
 */
export class Property<T extends Interval, V> {
	constructor(private readonly read: (value: T) => V) {}

	/**
	 * The property's value for an interval.
	 */
	get(value: T): V {
		return this.read(value);
	}

	/**
	 * Builds a filter from an arbitrary check of the property value.
	 */
	matches(check: (value: V) => boolean): Filter<T> {
		return new Filter((value) => check(this.read(value)));
	}

	eq(expected: V): Filter<T> {
		return this.matches((value) => value === expected);
	}

	ne(expected: V): Filter<T> {
		return this.matches((value) => value !== expected);
	}

	gt<C extends Comparable>(this: Property<T, C>, bound: C): Filter<T> {
		return this.matches((value) => value > bound);
	}

	gte<C extends Comparable>(this: Property<T, C>, bound: C): Filter<T> {
		return this.matches((value) => value >= bound);
	}

	lt<C extends Comparable>(this: Property<T, C>, bound: C): Filter<T> {
		return this.matches((value) => value < bound);
	}

	lte<C extends Comparable>(this: Property<T, C>, bound: C): Filter<T> {
		return this.matches((value) => value <= bound);
	}
}

/**
 * A property read from a named field.
 */
export function field<T extends Interval, K extends keyof T>(name: K): Property<T, T[K]> {
	return new Property((value: T) => value[name]);
}

/**
 * A property computed from the whole interval.
 *
 * @example
 * const attendeeCount = computed((m: Meeting) => m.attendees.length);
 */
export function computed<T extends Interval, V>(accessor: (value: T) => V): Property<T, V> {
	return new Property(accessor);
}

function durationIn(scale: number): Property<Interval, number> {
	return new Property((value) => {
		if (value.start === null || value.end === null) {
			return Number.POSITIVE_INFINITY;
		}
		return (value.end - value.start) / scale;
	});
}

/** Length in seconds; unbounded intervals are infinitely long */
export const seconds = durationIn(SECOND);
/** Length in minutes */
export const minutes = durationIn(MINUTE);
/** Length in hours */
export const hours = durationIn(HOUR);
/** Length in days */
export const days = durationIn(DAY);

/** Start as a number; unbounded starts read as MIN_BOUND */
export const startAt = new Property<Interval, number>(finiteStart);
/** End as a number; unbounded ends read as MAX_BOUND */
export const endAt = new Property<Interval, number>(finiteEnd);

/**
 * Passes intervals whose property value is one of `values`.
 */
export function oneOf<T extends Interval, V>(property: Property<T, V>, values: Iterable<V>): Filter<T> {
	const allowed = new Set(values);
	return property.matches((value) => allowed.has(value));
}

/**
 * Passes intervals whose collection property shares at least one member with `values`.
 *
 * @example
 * const tagged = events.where(hasAny(field<Event, 'tags'>('tags'), ['work', 'urgent']));
 */
export function hasAny<T extends Interval, V>(
	property: Property<T, Iterable<V>>,
	values: Iterable<V>,
): Filter<T> {
	const wanted = [...values];
	return property.matches((collection) => {
		const members = new Set(collection);
		return wanted.some((item) => members.has(item));
	});
}

/**
 * Passes intervals whose collection property contains every member of `values`.
 */
export function hasAll<T extends Interval, V>(
	property: Property<T, Iterable<V>>,
	values: Iterable<V>,
): Filter<T> {
	const wanted = [...values];
	return property.matches((collection) => {
		const members = new Set(collection);
		return wanted.every((item) => members.has(item));
	});
}
