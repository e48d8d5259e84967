import { describe, expect, test } from 'vitest';
import { InvalidArgumentError, MINUTE, interval, type Bound, type Interval } from '@spanset/core';
import { mask, timeline } from '../src/static.js';
import { buffer, mergeWithin } from '../src/transforms.js';
import type { Source } from '../src/types.js';

interface Visit extends Interval {
	name: string;
}

const visit = (start: number, end: number, name: string): Visit => ({ start, end, name });

describe('buffer', () => {
	test('extends every interval and keeps metadata', () => {
		const visits = timeline(visit(100, 200, 'a'), visit(500, 600, 'b'));
		expect(buffer(visits, { before: 10, after: 20 }).query()).toEqual([visit(90, 220, 'a'), visit(490, 620, 'b')]);
	});

	test('accepts structured durations', () => {
		const visits = timeline(visit(3600, 7200, 'a'));
		const padded = buffer(visits, { before: { minutes: 15 }, after: { minutes: 5 } });
		expect(padded.query()).toEqual([visit(3600 - 15 * MINUTE, 7200 + 5 * MINUTE, 'a')]);
	});

	test('widens the upstream fetch so buffered intervals reaching the range are found', () => {
		const calls: [Bound, Bound][] = [];
		const source: Source = {
			isMask: true,
			*fetch(start, end) {
				calls.push([start, end]);
				yield interval(0, 10);
			},
		};

		expect(buffer(source, { before: 5, after: 15 }).query(20, 30)).toEqual([interval(20, 25)]);
		expect(calls).toEqual([[5, 35]]);
	});

	test('keeps unbounded sides unbounded', () => {
		expect(buffer(mask(interval(null, 10), interval(20, null)), { before: 5, after: 5 }).query()).toEqual([
			interval(null, 15),
			interval(15, null),
		]);
	});

	test('rejects negative amounts', () => {
		expect(() => buffer(mask(), { before: -1 })).toThrow(InvalidArgumentError);
		expect(() => buffer(mask(), { after: { minutes: -5 } })).toThrow(InvalidArgumentError);
	});

	test('follows the source mask flag', () => {
		expect(buffer(mask(), {}).isMask).toBe(true);
	});
});

describe('mergeWithin', () => {
	test('joins intervals separated by at most the gap', () => {
		const visits = timeline(visit(0, 10, 'a'), visit(15, 20, 'b'), visit(30, 40, 'c'), visit(46, 50, 'd'));
		expect(mergeWithin(visits, { gap: 5 }).query()).toEqual([visit(0, 20, 'a'), visit(30, 40, 'c'), visit(46, 50, 'd')]);
	});

	test('a zero gap merges overlapping and touching intervals only', () => {
		const visits = timeline(visit(0, 10, 'a'), visit(5, 8, 'b'), visit(10, 12, 'c'), visit(13, 14, 'd'));
		expect(mergeWithin(visits, { gap: 0 }).query()).toEqual([visit(0, 12, 'a'), visit(13, 14, 'd')]);
	});

	test('returns unmerged intervals unchanged', () => {
		const only = visit(0, 10, 'a');
		const [result] = mergeWithin(timeline(only), { gap: 5 }).query();
		expect(result).toBe(only);
	});

	test('merges runs that start before the query range', () => {
		const visits = timeline(visit(0, 10, 'a'), visit(12, 20, 'b'));
		expect(mergeWithin(visits, { gap: 5 }).query(15, 30)).toEqual([visit(15, 20, 'a')]);
	});

	test('looks back only one gap for the start of a run', () => {
		const visits = timeline(visit(0, 10, 'a'), visit(12, 20, 'b'), visit(22, 30, 'c'));
		const merged = mergeWithin(visits, { gap: 5 });
		expect(merged.query()).toEqual([visit(0, 30, 'a')]);
		// Reads from 20, so the run is reported from 'c'
		expect(merged.query(26, 40)).toEqual([visit(26, 30, 'c')]);
	});

	test('merges into unbounded intervals', () => {
		expect(mergeWithin(mask(interval(0, 10), interval(12, null)), { gap: 2 }).query()).toEqual([
			interval(0, null),
		]);
	});

	test('rejects a negative gap', () => {
		expect(() => mergeWithin(mask(), { gap: -1 })).toThrow(InvalidArgumentError);
	});
});
