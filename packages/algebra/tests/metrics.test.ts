import { describe, expect, test } from 'vitest';
import { InvalidArgumentError, interval, type Interval } from '@spanset/core';
import { countIntervals, coverageRatio, maxDuration, minDuration, totalDuration } from '../src/metrics.js';
import { mask, timeline } from '../src/static.js';

interface Call extends Interval {
	caller: string;
}

const call = (start: number, end: number, caller: string): Call => ({ start, end, caller });

const calls = timeline(call(0, 10, 'a'), call(5, 25, 'b'), call(40, 45, 'c'), call(90, 120, 'd'));

describe('totalDuration', () => {
	test('counts overlapping time once and clips to the window', () => {
		// [0, 25) + [40, 45) + [90, 100)
		expect(totalDuration(calls, 0, 100)).toBe(40);
	});

	test('is zero for an empty or inverted window', () => {
		expect(totalDuration(calls, 50, 50)).toBe(0);
		expect(totalDuration(calls, 60, 50)).toBe(0);
	});

	test('requires a finite window', () => {
		expect(() => totalDuration(calls, 0, null)).toThrow(InvalidArgumentError);
		expect(() => totalDuration(calls, undefined, 10)).toThrow(InvalidArgumentError);
	});
});

describe('maxDuration and minDuration', () => {
	test('return clipped extremes with metadata', () => {
		expect(maxDuration(calls, 0, 100)).toEqual(call(5, 25, 'b'));
		expect(minDuration(calls, 0, 100)).toEqual(call(40, 45, 'c'));
		expect(maxDuration(calls, 0, 95)).toEqual(call(5, 25, 'b'));
		expect(minDuration(calls, 0, 92)).toEqual(call(90, 92, 'd'));
	});

	test('return undefined when nothing is in the window', () => {
		expect(maxDuration(calls, 60, 80)).toBeUndefined();
		expect(minDuration(calls, 60, 50)).toBeUndefined();
	});
});

describe('countIntervals', () => {
	test('counts the intervals the source yields', () => {
		expect(countIntervals(calls, 0, 100)).toBe(4);
		expect(countIntervals(calls, 20, 50)).toBe(2);
		expect(countIntervals(calls, 60, 50)).toBe(0);
	});
});

describe('coverageRatio', () => {
	test('is the covered fraction of the window', () => {
		expect(coverageRatio(mask(interval(0, 25)), 0, 100)).toBe(0.25);
		expect(coverageRatio(calls, 0, 100)).toBe(0.4);
	});

	test('is zero for an empty window', () => {
		expect(coverageRatio(calls, 10, 10)).toBe(0);
	});
});
