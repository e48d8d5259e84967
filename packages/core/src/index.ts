/**
 * spanset core
 *
 * Shared interval primitives for spanset packages.
 * All intervals are half-open: [start, end)
 *
 * @packageDocumentation
 */

// Interval model
export {
	MAX_BOUND,
	MIN_BOUND,
	clip,
	compareIntervals,
	createInterval,
	duration,
	finiteEnd,
	finiteStart,
	interval,
	isEmpty,
	overlaps,
	toBound,
	validateInterval,
	withBounds,
} from './interval.js';
export type { Bound, Interval } from './interval.js';

// Bound coercion
export {
	assertFiniteBound,
	coerceBound,
	dateToBound,
	hasUtcOffset,
	parseDay,
} from './bounds.js';
export type { BoundCoercer, BoundEdge, BoundInput } from './bounds.js';

// Durations
export {
	DAY,
	HOUR,
	MINUTE,
	SECOND,
	WEEK,
	durationSchema,
	durationToMs,
	durationToSeconds,
} from './time.js';
export type { Duration } from './time.js';

// Errors
export {
	ConstructionError,
	InvalidArgumentError,
	SpansetError,
	ValidationError,
} from './errors.js';
export type { SpansetErrorCode } from './errors.js';

// Option parsing
export { parseOptions } from './options.js';
