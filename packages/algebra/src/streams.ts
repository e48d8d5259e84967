/**
 * Streaming interval arithmetic over sorted sequences.
 * All intervals are half-open [start, end), meaning start is inclusive and end is exclusive.
 *
 * Every function here is a generator: nothing is pulled from an input until the
 * caller asks for the next output, and inputs are closed when the caller stops early.
 * Inputs must already be ordered by `(start, end)`.
 */

import {
	MAX_BOUND,
	MIN_BOUND,
	compareIntervals,
	finiteEnd,
	finiteStart,
	interval,
	toBound,
	withBounds,
	type Bound,
	type Interval,
} from '@spanset/core';
import type { MaskFactory } from './types.js';

/**
 * A peekable position in a sorted stream.
 */
class Cursor<T extends Interval> {
	private constructor(
		private readonly iterator: Iterator<T>,
		public current: T,
	) {}

	/**
	 * Opens a cursor on the first element, or returns undefined for an empty stream.
	 */
	static open<T extends Interval>(items: Iterable<T>): Cursor<T> | undefined {
		const iterator = items[Symbol.iterator]();
		const first = iterator.next();
		if (first.done) {
			return undefined;
		}
		return new Cursor(iterator, first.value);
	}

	/**
	 * Moves to the next element. Returns false once the stream is exhausted.
	 */
	advance(): boolean {
		const next = this.iterator.next();
		if (next.done) {
			return false;
		}
		this.current = next.value;
		return true;
	}

	/**
	 * Moves past every element positioned exactly like the current one.
	 */
	advanceDistinct(): boolean {
		const previous = this.current;
		while (this.advance()) {
			if (compareIntervals(this.current, previous) !== 0) {
				return true;
			}
		}
		return false;
	}

	close(): void {
		this.iterator.return?.();
	}
}

function closeAll(cursors: Iterable<Cursor<Interval> | undefined>): void {
	for (const cursor of cursors) {
		cursor?.close();
	}
}

/**
 * Merges sorted streams into one sorted stream, keeping every element.
 * Ties are emitted in stream order.
 *
 * @example
 * ```typescript
 * const merged = [...mergeSorted([
 *   [interval(0, 10), interval(20, 30)],
 *   [interval(5, 15)],
 * ])];
 * // Result: [[0, 10), [5, 15), [20, 30)]
 * ```
 */
export function* mergeSorted<T extends Interval>(streams: readonly Iterable<T>[]): Generator<T> {
	const cursors: (Cursor<T> | undefined)[] = streams.map((stream) => Cursor.open(stream));

	try {
		while (true) {
			let best: Cursor<T> | undefined;
			let bestIndex = -1;

			for (let i = 0; i < cursors.length; i++) {
				const cursor = cursors[i];
				if (cursor && (!best || compareIntervals(cursor.current, best.current) < 0)) {
					best = cursor;
					bestIndex = i;
				}
			}

			if (!best) {
				return;
			}

			yield best.current;

			if (!best.advance()) {
				cursors[bestIndex] = undefined;
			}
		}
	} finally {
		closeAll(cursors);
	}
}

/**
 * Computes the time present in every input stream.
 *
 * One current interval is held per stream. Whenever all of them overlap, the
 * shared window `(max starts, min ends)` is yielded as a clipped copy of each
 * `emitters` interval; `constraints` only shape the window. Afterwards every
 * stream whose interval ends at the window's end moves on, skipping entries
 * positioned exactly like the one it leaves.
 *
 * @param emitters - Streams whose intervals (and metadata) appear in the output
 * @param constraints - Streams that restrict the output without appearing in it
 */
export function* intersectSorted<T extends Interval>(
	emitters: readonly Iterable<T>[],
	constraints: readonly Iterable<Interval>[] = [],
): Generator<T> {
	const emitting = emitters.map((stream) => Cursor.open(stream));
	const constraining = constraints.map((stream) => Cursor.open(stream));
	const all: (Cursor<Interval> | undefined)[] = [...emitting, ...constraining];

	try {
		const cursors: Cursor<Interval>[] = [];
		for (const cursor of all) {
			if (!cursor) {
				return;
			}
			cursors.push(cursor);
		}
		const emitCursors: Cursor<T>[] = [];
		for (const cursor of emitting) {
			if (cursor) emitCursors.push(cursor);
		}
		if (cursors.length === 0) {
			return;
		}

		while (true) {
			let windowStart = MIN_BOUND;
			let windowEnd = MAX_BOUND;
			for (const cursor of cursors) {
				windowStart = Math.max(windowStart, finiteStart(cursor.current));
				windowEnd = Math.min(windowEnd, finiteEnd(cursor.current));
			}

			if (windowStart < windowEnd) {
				const start = toBound(windowStart);
				const end = toBound(windowEnd);
				for (const cursor of emitCursors) {
					yield withBounds(cursor.current, start, end);
				}
			}

			for (const cursor of cursors) {
				if (finiteEnd(cursor.current) === windowEnd && !cursor.advanceDistinct()) {
					return;
				}
			}
		}
	} finally {
		closeAll(all);
	}
}

/**
 * Removes all time covered by `subtractors` from each `source` interval.
 * May split intervals if subtraction punches holes in the middle; every
 * fragment keeps its source interval's metadata.
 *
 * Subtractors that might still matter are kept in a window, so source
 * intervals that overlap one another are each carved correctly. Fragments
 * are held back until no later source interval can produce an earlier one,
 * which keeps the output sorted.
 *
 * @example
 * ```typescript
 * const from = [interval(0, 30)];
 * const subtract = [interval(10, 20)];
 * const result = [...subtractSorted(from, subtract)];
 * // Result: [[0, 10), [20, 30)]
 * ```
 */
export function* subtractSorted<T extends Interval>(
	source: Iterable<T>,
	subtractors: Iterable<Interval>,
): Generator<T> {
	const holes = Cursor.open(subtractors);
	let upcoming: Interval | undefined = holes?.current;
	let active: Interval[] = [];
	const pending: T[] = [];

	const pull = (): Interval | undefined => (holes?.advance() ? holes.current : undefined);
	const hold = (fragment: T): void => {
		let index = pending.length;
		while (index > 0) {
			const previous = pending[index - 1];
			if (previous === undefined || compareIntervals(previous, fragment) <= 0) break;
			index--;
		}
		pending.splice(index, 0, fragment);
	};

	try {
		for (const event of source) {
			const eventStart = finiteStart(event);
			const eventEnd = finiteEnd(event);

			while (pending.length > 0) {
				const [next] = pending;
				if (next === undefined || finiteStart(next) >= eventStart) break;
				pending.shift();
				yield next;
			}

			// Later source intervals start no earlier, so holes ending here are spent
			active = active.filter((hole) => finiteEnd(hole) > eventStart);

			while (upcoming && finiteStart(upcoming) < eventEnd) {
				if (finiteEnd(upcoming) > eventStart) {
					active.push(upcoming);
				}
				upcoming = pull();
			}

			let cursor = eventStart;
			for (const hole of active) {
				const holeStart = finiteStart(hole);
				const holeEnd = finiteEnd(hole);

				if (holeStart >= eventEnd) break;
				if (holeEnd <= cursor) continue;

				if (holeStart > cursor) {
					hold(withBounds(event, toBound(cursor), toBound(holeStart)));
				}
				cursor = holeEnd;
				if (cursor >= eventEnd) break;
			}

			if (cursor < eventEnd) {
				hold(cursor === eventStart ? event : withBounds(event, toBound(cursor), toBound(eventEnd)));
			}
		}

		yield* pending;
	} finally {
		holes?.close();
	}
}

/**
 * Default constructor for gap intervals.
 */
export const plainMask: MaskFactory = (start, end) => interval(start, end);

/**
 * Yields the gaps between `source` intervals within [start, end).
 * A null bound with nothing constraining that side produces an unbounded gap.
 *
 * @example
 * ```typescript
 * const gaps = [...complementSorted([interval(10, 20)], 0, 30)];
 * // Result: [[0, 10), [20, 30)]
 *
 * const everything = [...complementSorted([], null, null)];
 * // Result: [(−∞, +∞)]
 * ```
 */
export function* complementSorted(
	source: Iterable<Interval>,
	start: Bound,
	end: Bound,
	maskFactory: MaskFactory = plainMask,
): Generator<Interval> {
	const lower = start ?? MIN_BOUND;
	const upper = end ?? MAX_BOUND;
	let cursor = lower;

	for (const event of source) {
		if (finiteStart(event) >= upper) {
			break;
		}

		const segmentStart = Math.max(finiteStart(event), lower);
		const segmentEnd = Math.min(finiteEnd(event), upper);

		if (segmentEnd <= segmentStart || segmentEnd <= cursor) {
			continue;
		}

		if (segmentStart > cursor) {
			yield maskFactory(toBound(cursor), toBound(segmentStart));
		}

		cursor = segmentEnd;
		if (cursor >= upper) {
			return;
		}
	}

	if (cursor < upper) {
		yield maskFactory(toBound(cursor), toBound(upper));
	}
}
