import { describe, expect, test } from 'vitest';
import { ValidationError, interval, type Interval } from '@spanset/core';
import { StaticTimeline, mask, staticTimeline, timeline } from '../src/static.js';

interface Booking extends Interval {
	room: string;
}

const booking = (start: number, end: number, room: string): Booking => ({ start, end, room });

describe('staticTimeline', () => {
	test('sorts its intervals by start then end', () => {
		const rooms = timeline(booking(20, 30, 'c'), booking(0, 10, 'b'), booking(0, 5, 'a'));
		expect(rooms.query().map((b) => b.room)).toEqual(['a', 'b', 'c']);
	});

	test('finds long intervals that start before shorter ones', () => {
		const rooms = timeline(booking(0, 1000, 'long'), booking(10, 20, 'short'), booking(30, 40, 'later'));
		expect([...rooms.fetch(500, 600)].map((b) => b.room)).toEqual(['long']);
		expect([...rooms.fetch(35, 36)].map((b) => b.room)).toEqual(['long', 'later']);
	});

	test('fetch excludes intervals that only touch the range', () => {
		const rooms = timeline(booking(0, 10, 'a'), booking(20, 30, 'b'));
		expect([...rooms.fetch(10, 20)]).toEqual([]);
	});

	test('fetch returns unclipped intervals', () => {
		const rooms = timeline(booking(0, 10, 'a'));
		expect([...rooms.fetch(5, 6)]).toEqual([booking(0, 10, 'a')]);
	});

	test('stores unbounded intervals', () => {
		const open = mask(interval(null, 5), interval(100, null));
		expect([...open.fetch(null, null)]).toEqual([interval(null, 5), interval(100, null)]);
		expect([...open.fetch(200, 300)]).toEqual([interval(100, null)]);
	});

	test('validates intervals', () => {
		expect(() => timeline(booking(10, 0, 'bad'))).toThrow(ValidationError);
		expect(() => timeline(booking(0.5, 1, 'bad'))).toThrow(ValidationError);
	});

	test('is rich by default and a mask on request', () => {
		expect(staticTimeline([interval(0, 1)]).isMask).toBe(false);
		expect(staticTimeline([interval(0, 1)], { mask: true }).isMask).toBe(true);
		expect(mask(interval(0, 1)).isMask).toBe(true);
	});

	test('fetch is restartable', () => {
		const rooms = new StaticTimeline([booking(0, 10, 'a')]);
		expect([...rooms.fetch(0, 10)]).toEqual([...rooms.fetch(0, 10)]);
		expect(rooms.size).toBe(1);
	});
});
