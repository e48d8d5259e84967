import { describe, expect, test } from 'vitest';
import { InvalidArgumentError, ValidationError, interval, type Bound, type Interval } from '@spanset/core';
import { query, resolveRange, stream } from '../src/query.js';
import { mask, staticTimeline, timeline } from '../src/static.js';
import type { Source } from '../src/types.js';

interface Shift extends Interval {
	who: string;
}

const shift = (start: number, end: number, who: string): Shift => ({ start, end, who });

describe('query', () => {
	const shifts = timeline(shift(0, 10, 'ann'), shift(5, 20, 'ben'), shift(30, 40, 'cat'));

	test('clips results to the query range and keeps metadata', () => {
		expect(shifts.query(8, 35)).toEqual([shift(8, 10, 'ann'), shift(8, 20, 'ben'), shift(30, 35, 'cat')]);
	});

	test('returns everything without bounds', () => {
		expect(query(shifts).map((s) => s.who)).toEqual(['ann', 'ben', 'cat']);
	});

	test('desc reverses the ascending result', () => {
		expect(shifts.query(0, 50, { direction: 'desc' }).map((s) => s.who)).toEqual(['cat', 'ben', 'ann']);
	});

	test('start after end is an error', () => {
		expect(() => shifts.query(20, 10)).toThrow(InvalidArgumentError);
	});

	test('an empty range returns nothing', () => {
		expect(shifts.query(5, 5)).toEqual([]);
	});

	test('drops intervals that clip to nothing', () => {
		const source: Source = {
			isMask: true,
			*fetch() {
				yield interval(0, 5);
				yield interval(10, 20);
			},
		};
		expect(query(source, 5, 15)).toEqual([interval(10, 15)]);
	});

	test('accepts dates and ISO strings', () => {
		const day = staticTimeline([interval(1_705_276_800, 1_705_363_200)], { mask: true });
		expect(day.query('2024-01-15T09:00:00Z', new Date('2024-01-15T10:00:00Z'))).toEqual([
			interval(1_705_309_200, 1_705_312_800),
		]);
	});

	test('rejects local date-times without an offset', () => {
		expect(() => shifts.query('2024-01-15T09:00:00', null)).toThrow(ValidationError);
	});

	test('coerces bounds with the source coercer', () => {
		const seen: string[] = [];
		const hours = staticTimeline([interval(0, 100)], {
			coerceBound: (value, edge) => {
				seen.push(edge);
				return typeof value === 'number' ? value * 10 : null;
			},
		});

		expect(hours.query(1, 2)).toEqual([interval(10, 20)]);
		expect(seen).toEqual(['start', 'end']);
	});

	test('composites inherit the first child coercer', () => {
		const scaled = staticTimeline([interval(0, 100)], {
			mask: true,
			coerceBound: (value) => (typeof value === 'number' ? value * 10 : null),
		});

		expect(scaled.not().query(1, 20)).toEqual([interval(100, 200)]);
	});
});

describe('stream', () => {
	test('yields lazily in ascending order', () => {
		const calls: [Bound, Bound][] = [];
		const source: Source = {
			isMask: true,
			*fetch(start, end) {
				calls.push([start, end]);
				yield interval(0, 10);
				yield interval(20, 30);
			},
		};

		const results = stream(source, 5, 25);
		expect(calls).toEqual([]);
		expect(results.next().value).toEqual(interval(5, 10));
		expect(calls).toEqual([[5, 25]]);
		expect([...results]).toEqual([interval(20, 25)]);
	});

	test('validates bounds before iteration', () => {
		expect(() => stream(mask(), 10, 0)).toThrow(InvalidArgumentError);
	});
});

describe('resolveRange', () => {
	test('returns the coerced range', () => {
		expect(resolveRange(mask(), '2024-01-15', '2024-01-15')).toEqual(interval(1_705_276_800, 1_705_363_200));
		expect(resolveRange(mask())).toEqual(interval(null, null));
	});
});
