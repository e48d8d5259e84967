import { describe, expect, test } from 'vitest';
import { ConstructionError, interval, type Bound, type Interval } from '@spanset/core';
import { filter } from '../src/filters.js';
import { mask, staticTimeline, timeline } from '../src/static.js';
import {
	Complement,
	Intersection,
	Union,
	complement,
	difference,
	flatten,
	fromSource,
	intersection,
	union,
} from '../src/timeline.js';
import type { Source } from '../src/types.js';

interface Meeting extends Interval {
	title: string;
}

const meeting = (start: number, end: number, title: string): Meeting => ({ start, end, title });

describe('union', () => {
	test('merges children in order and keeps duplicates', () => {
		const a = timeline(meeting(0, 10, 'a'), meeting(20, 30, 'a2'));
		const b = timeline(meeting(5, 15, 'b'), meeting(20, 30, 'b2'));

		expect(union(a, b).query(0, 40).map((m) => m.title)).toEqual(['a', 'b', 'a2', 'b2']);
	});

	test('flattens nested unions into one node', () => {
		const a = mask(interval(0, 1));
		const b = mask(interval(1, 2));
		const c = mask(interval(2, 3));
		const nested = union(union(a, b), c);

		expect(nested).toBeInstanceOf(Union);
		expect(nested instanceof Union ? nested.sources.length : 0).toBe(3);
	});

	test('is a mask only when every child is a mask', () => {
		expect(union(mask(interval(0, 1)), mask(interval(1, 2))).isMask).toBe(true);
		expect(union<Interval>(mask(interval(0, 1)), timeline(meeting(1, 2, 'x'))).isMask).toBe(false);
	});

	test('rejects an empty argument list', () => {
		expect(() => union()).toThrow(ConstructionError);
	});

	test('or() rejects filters', () => {
		const meetings = timeline(meeting(0, 10, 'a'));
		const long = filter<Meeting>((m) => (m.end ?? 0) - (m.start ?? 0) > 5);
		expect(() => meetings.or(long)).toThrow(ConstructionError);
	});
});

describe('intersection', () => {
	test('emits one interval per window when every child is a mask', () => {
		const result = intersection(mask(interval(0, 10)), mask(interval(5, 15))).query(0, 20);
		expect(result).toEqual([interval(5, 10)]);
	});

	test('keeps the rich side when intersecting with a mask', () => {
		const meetings = timeline(meeting(0, 10, 'standup'), meeting(20, 40, 'review'));
		const office = mask(interval(5, 30));

		expect(meetings.and(office).query(0, 50)).toEqual([meeting(5, 10, 'standup'), meeting(20, 30, 'review')]);
	});

	test('emits a copy from each rich child', () => {
		const a = timeline(meeting(0, 10, 'a'));
		const b = timeline(meeting(5, 15, 'b'));

		expect(a.and(b).query(0, 20)).toEqual([meeting(5, 10, 'a'), meeting(5, 10, 'b')]);
	});

	test('flattening a rich intersection coalesces the copies', () => {
		const a = timeline(meeting(0, 10, 'a'));
		const b = timeline(meeting(5, 15, 'b'));

		expect(flatten(a.and(b)).query(0, 20)).toEqual([interval(5, 10)]);
	});

	test('flattens nested intersections', () => {
		const node = intersection(intersection(mask(interval(0, 10)), mask(interval(2, 8))), mask(interval(4, 6)));

		expect(node).toBeInstanceOf(Intersection);
		expect(node instanceof Intersection ? node.emitters.length + node.constraints.length : 0).toBe(3);
		expect(node.query()).toEqual([interval(4, 6)]);
	});

	test('a single child yields its own intervals', () => {
		expect(intersection(mask(interval(0, 10))).query(0, 20)).toEqual([interval(0, 10)]);
	});

	test('rejects an empty argument list', () => {
		expect(() => intersection()).toThrow(ConstructionError);
	});

	test('and() with a filter keeps matching intervals', () => {
		const meetings = timeline(meeting(0, 10, 'keep'), meeting(20, 30, 'drop'));
		const keep = filter<Meeting>((m) => m.title === 'keep');

		expect(meetings.and(keep).query()).toEqual([meeting(0, 10, 'keep')]);
	});
});

describe('difference', () => {
	test('removes subtractor time', () => {
		expect(mask(interval(0, 30)).minus(mask(interval(10, 20))).query(0, 30)).toEqual([
			interval(0, 10),
			interval(20, 30),
		]);
	});

	test('merges several subtractors', () => {
		const day = timeline(meeting(0, 100, 'day'));
		const result = difference(day, mask(interval(10, 20)), mask(interval(15, 30), interval(50, 60))).query(0, 100);

		expect(result).toEqual([meeting(0, 10, 'day'), meeting(30, 50, 'day'), meeting(60, 100, 'day')]);
	});

	test('keeps the source unchanged without subtractors', () => {
		const source = timeline(meeting(0, 10, 'a'));
		expect(difference(source).query()).toEqual([meeting(0, 10, 'a')]);
	});

	test('follows the source mask flag', () => {
		expect(mask(interval(0, 1)).minus(timeline(meeting(0, 1, 'x'))).isMask).toBe(true);
		expect(timeline(meeting(0, 1, 'x')).minus(mask(interval(0, 1))).isMask).toBe(false);
	});
});

describe('complement', () => {
	test('yields the gaps in the query range', () => {
		expect(complement(mask(interval(10, 20))).query(0, 30)).toEqual([interval(0, 10), interval(20, 30)]);
	});

	test('is always a mask', () => {
		const gaps = timeline(meeting(0, 10, 'a')).not();
		expect(gaps).toBeInstanceOf(Complement);
		expect(gaps.isMask).toBe(true);
	});

	test('answers unbounded queries', () => {
		expect(complement(mask()).query()).toEqual([interval(null, null)]);
		expect(complement(mask(interval(10, 20))).query()).toEqual([interval(null, 10), interval(20, null)]);
	});

	test('builds gaps with the mask factory', () => {
		const gaps = complement(mask(interval(10, 20)), {
			maskFactory: (start, end) => ({ start, end }),
		}).query(0, 30);
		expect(gaps).toEqual([
			{ start: 0, end: 10 },
			{ start: 20, end: 30 },
		]);
	});
});

describe('flatten', () => {
	test('coalesces overlapping and touching intervals and drops metadata', () => {
		const busy = timeline(meeting(0, 10, 'a'), meeting(5, 15, 'b'), meeting(15, 20, 'c'), meeting(30, 40, 'd'));

		expect(busy.flatten().query(0, 50)).toEqual([interval(0, 20), interval(30, 40)]);
	});

	test('handles unbounded intervals without query bounds', () => {
		expect(flatten(mask(interval(null, 5), interval(3, 10))).query()).toEqual([interval(null, 10)]);
	});
});

describe('filtered', () => {
	test('where() passes matching intervals through unmodified', () => {
		const a = meeting(0, 10, 'a');
		const result = timeline(a, meeting(5, 8, 'b')).where(filter<Meeting>((m) => m.title === 'a')).query();

		expect(result).toEqual([a]);
		expect(result[0]).toBe(a);
	});
});

describe('fromSource', () => {
	test('lifts a plain source and keeps it lazy', () => {
		const calls: [Bound, Bound][] = [];
		const source: Source = {
			isMask: true,
			*fetch(start, end) {
				calls.push([start, end]);
				yield interval(0, 10);
			},
		};
		const lifted = fromSource(source);

		expect(calls).toEqual([]);
		expect(lifted.not().query(0, 20)).toEqual([interval(10, 20)]);
		expect(calls).toEqual([[0, 20]]);
	});

	test('returns timelines unchanged', () => {
		const existing = staticTimeline([interval(0, 1)]);
		expect(fromSource(existing)).toBe(existing);
	});
});
