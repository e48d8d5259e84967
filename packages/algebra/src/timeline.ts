/**
 * The operator tree: timelines and the set operators that compose them.
 *
 * Building a tree performs no I/O. Each `fetch` walks the tree afresh, pulling
 * sorted intervals from children on demand.
 */

import {
	ConstructionError,
	coerceBound as defaultCoerceBound,
	type Bound,
	type BoundCoercer,
	type BoundInput,
	type Interval,
} from '@spanset/core';
import { Filter } from './filters.js';
import { query, stream } from './query.js';
import { complementSorted, intersectSorted, mergeSorted, plainMask, subtractSorted } from './streams.js';
import type { ComplementOptions, MaskFactory, MaskSource, QueryOptions, Source } from './types.js';

/**
 * A timeline known to yield plain intervals only.
 */
export type MaskTimeline = Timeline<Interval> & MaskSource;

function inheritCoercer(sources: readonly Source<Interval>[]): BoundCoercer {
	return sources.find((source) => source.coerceBound)?.coerceBound ?? defaultCoerceBound;
}

// ============================================================================
// Timeline
// ============================================================================

/**
 * Base class of every node in the operator tree.
 *
 * Subclasses implement `fetch`; composition and querying live here.
 * Timelines are immutable once constructed and can be shared between trees
 * and queried any number of times.
 */
export abstract class Timeline<T extends Interval = Interval> implements Source<T> {
	abstract readonly isMask: boolean;

	protected constructor(readonly coerceBound: BoundCoercer = defaultCoerceBound) {}

	/**
	 * Yield intervals overlapping [start, end) in `(start, end)` order.
	 * Intervals may extend past the requested range.
	 */
	abstract fetch(start: Bound, end: Bound): Iterable<T>;

	/**
	 * Union with other timelines.
	 *
	 * @throws ConstructionError when any operand is a filter
	 */
	or(...others: (Source<T> | Filter<T>)[]): Timeline<T> {
		const sources: Source<T>[] = [this];
		for (const other of others) {
			if (other instanceof Filter) {
				throw new ConstructionError(
					'Cannot combine a timeline and a filter with or(); use timeline.where(filter) to apply a filter',
				);
			}
			sources.push(other);
		}
		return union(...sources);
	}

	/**
	 * Intersection with a mask keeps this timeline's intervals and metadata.
	 */
	and(other: MaskSource): Timeline<T>;
	/**
	 * A filter keeps the intervals it accepts.
	 */
	and(other: Filter<T>): Timeline<T>;
	/**
	 * Intersection with another timeline; rich operands each contribute a copy per overlap.
	 */
	and<U extends Interval>(other: Source<U>): Timeline<T | U>;
	and<U extends Interval>(other: Source<U> | Filter<T>): Timeline<T> | Timeline<T | U> {
		if (other instanceof Filter) {
			return new Filtered(this, other);
		}
		if (isMaskSource(other)) {
			return Intersection.build<T>([this], [other]);
		}
		return intersection<T | U>(this, other);
	}

	/**
	 * Keep only intervals accepted by the filter.
	 */
	where(predicate: Filter<T>): Timeline<T> {
		return new Filtered(this, predicate);
	}

	/**
	 * Remove the time covered by the subtractors, keeping this timeline's metadata.
	 */
	minus(...subtractors: Source<Interval>[]): Timeline<T> {
		return difference(this, ...subtractors);
	}

	/**
	 * The gaps of this timeline.
	 */
	not(options: ComplementOptions = {}): MaskTimeline {
		return complement(this, options);
	}

	/**
	 * Coalesced coverage as plain intervals.
	 */
	flatten(options: ComplementOptions = {}): MaskTimeline {
		return flatten(this, options);
	}

	/**
	 * Run a query: coerce the bounds, fetch, clip to [start, end) and order.
	 */
	query(start?: BoundInput, end?: BoundInput, options: QueryOptions = {}): T[] {
		return query(this, start, end, options);
	}

	/**
	 * Lazy ascending variant of `query`.
	 */
	stream(start?: BoundInput, end?: BoundInput): Generator<T> {
		return stream(this, start, end);
	}
}

function isMaskSource(source: Source<Interval>): source is MaskSource {
	return source.isMask;
}

// ============================================================================
// Source adapter
// ============================================================================

/**
 * Wraps a plain Source so it gains the composition methods.
 */
class SourceTimeline<T extends Interval> extends Timeline<T> {
	readonly isMask: boolean;

	constructor(private readonly source: Source<T>) {
		super(source.coerceBound);
		this.isMask = source.isMask;
	}

	fetch(start: Bound, end: Bound): Iterable<T> {
		return this.source.fetch(start, end);
	}
}

/**
 * Lifts any object satisfying the Source contract into a Timeline.
 * Timelines are returned unchanged.
 */
export function fromSource<T extends Interval>(source: Source<T>): Timeline<T> {
	if (source instanceof Timeline) {
		return source;
	}
	return new SourceTimeline(source);
}

// ============================================================================
// Union
// ============================================================================

/**
 * K-way merge of the children. Every interval is emitted unchanged, including
 * duplicates from different children.
 */
export class Union<T extends Interval> extends Timeline<T> {
	readonly isMask: boolean;

	constructor(readonly sources: readonly Source<T>[]) {
		super(inheritCoercer(sources));
		this.isMask = sources.every((source) => source.isMask);
	}

	fetch(start: Bound, end: Bound): Iterable<T> {
		return mergeSorted(this.sources.map((source) => source.fetch(start, end)));
	}
}

function isUnion<T extends Interval>(source: Source<T>): source is Union<T> {
	return source instanceof Union;
}

/**
 * Combines timelines with union semantics. Nested unions are flattened into a
 * single merge.
 *
 * @throws ConstructionError when called without timelines
 *
 * @example
 * const busy = union(workCalendar, personalCalendar, travel);
 */
export function union<T extends Interval>(...sources: Source<T>[]): Timeline<T> {
	if (sources.length === 0) {
		throw new ConstructionError('union() requires at least one timeline');
	}
	const flattened = sources.flatMap((source) => (isUnion(source) ? source.sources : [source]));
	return new Union(flattened);
}

// ============================================================================
// Intersection
// ============================================================================

/**
 * Time present in every child.
 *
 * Children are split into emitters, whose intervals appear (clipped) in the
 * output, and constraints, which only restrict it:
 * - all children masks: the first child emits, one interval per overlap
 * - mixed: only the rich children emit, masks are never duplicated
 * - all rich: every child emits its own copy of each overlap; flatten to coalesce
 */
export class Intersection<T extends Interval> extends Timeline<T> {
	readonly isMask: boolean;

	private constructor(
		readonly emitters: readonly Source<T>[],
		readonly constraints: readonly Source<Interval>[],
	) {
		super(inheritCoercer([...emitters, ...constraints]));
		this.isMask = emitters.every((source) => source.isMask);
	}

	/**
	 * Builds an intersection node. Nested intersections among `sources` are
	 * flattened; `masks` are always constraints.
	 */
	static build<T extends Interval>(
		sources: readonly Source<T>[],
		masks: readonly Source<Interval>[] = [],
	): Intersection<T> {
		const candidates: Source<T>[] = [];
		const constraints: Source<Interval>[] = [];

		for (const source of sources) {
			if (isIntersection(source)) {
				candidates.push(...source.emitters);
				constraints.push(...source.constraints);
			} else {
				candidates.push(source);
			}
		}

		const rich = candidates.filter((source) => !source.isMask);
		if (rich.length > 0) {
			const plain = candidates.filter((source) => source.isMask);
			return new Intersection(rich, [...plain, ...constraints, ...masks]);
		}

		const [first, ...rest] = candidates;
		if (!first) {
			throw new ConstructionError('intersection() requires at least one timeline');
		}
		return new Intersection([first], [...rest, ...constraints, ...masks]);
	}

	fetch(start: Bound, end: Bound): Iterable<T> {
		return intersectSorted(
			this.emitters.map((source) => source.fetch(start, end)),
			this.constraints.map((source) => source.fetch(start, end)),
		);
	}
}

function isIntersection<T extends Interval>(source: Source<T>): source is Intersection<T> {
	return source instanceof Intersection;
}

/**
 * Combines timelines with intersection semantics.
 *
 * @throws ConstructionError when called without timelines
 *
 * @example
 * const meetingsInOfficeHours = intersection(meetings, officeHours);
 */
export function intersection<T extends Interval>(...sources: Source<T>[]): Timeline<T> {
	if (sources.length === 0) {
		throw new ConstructionError('intersection() requires at least one timeline');
	}
	return Intersection.build(sources);
}

// ============================================================================
// Difference
// ============================================================================

/**
 * Source intervals with every subtractor's time removed.
 */
export class Difference<T extends Interval> extends Timeline<T> {

	constructor(
		readonly source: Source<T>,
		readonly subtractors: readonly Source<Interval>[],
	) {
		super(inheritCoercer([source]));
	}

	get isMask(): boolean {
		return this.source.isMask;
	}

	fetch(start: Bound, end: Bound): Iterable<T> {
		const events = this.source.fetch(start, end);
		if (this.subtractors.length === 0) {
			return events;
		}
		return subtractSorted(
			events,
			mergeSorted(this.subtractors.map((subtractor) => subtractor.fetch(start, end))),
		);
	}
}

/**
 * Removes the subtractors' time from `source`.
 *
 * @example
 * const free = difference(workingHours, meetings, focusBlocks);
 */
export function difference<T extends Interval>(
	source: Source<T>,
	...subtractors: Source<Interval>[]
): Timeline<T> {
	return new Difference(source, subtractors);
}

// ============================================================================
// Complement
// ============================================================================

/**
 * The gaps between a child's intervals. Always yields mask intervals.
 */
export class Complement extends Timeline<Interval> implements MaskSource {
	readonly isMask = true;
	private readonly maskFactory: MaskFactory;

	constructor(
		readonly source: Source<Interval>,
		options: ComplementOptions = {},
	) {
		super(inheritCoercer([source]));
		this.maskFactory = options.maskFactory ?? plainMask;
	}

	fetch(start: Bound, end: Bound): Iterable<Interval> {
		return complementSorted(this.source.fetch(start, end), start, end, this.maskFactory);
	}
}

/**
 * The time not covered by `source`.
 * Unbounded query sides with nothing in the way produce unbounded gaps.
 *
 * @example
 * const free = complement(busy);
 * free.query(0, 30); // gaps within [0, 30)
 * free.query();      // works without bounds too
 */
export function complement(source: Source<Interval>, options: ComplementOptions = {}): MaskTimeline {
	return new Complement(source, options);
}

/**
 * Coalesced coverage of `source`: overlapping and touching intervals merge,
 * metadata is dropped. Computed as the complement of the complement.
 */
export function flatten(source: Source<Interval>, options: ComplementOptions = {}): MaskTimeline {
	return new Complement(new Complement(source), options);
}

// ============================================================================
// Filtered
// ============================================================================

/**
 * Passes through the child intervals accepted by a filter.
 */
export class Filtered<T extends Interval> extends Timeline<T> {

	constructor(
		readonly source: Source<T>,
		readonly predicate: Filter<T>,
	) {
		super(inheritCoercer([source]));
	}

	get isMask(): boolean {
		return this.source.isMask;
	}

	*fetch(start: Bound, end: Bound): Generator<T> {
		for (const value of this.source.fetch(start, end)) {
			if (this.predicate.test(value)) {
				yield value;
			}
		}
	}
}

/**
 * Applies a filter to a timeline.
 */
export function filtered<T extends Interval>(source: Source<T>, predicate: Filter<T>): Timeline<T> {
	return new Filtered(source, predicate);
}
