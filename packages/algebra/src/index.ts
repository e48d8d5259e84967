/**
 * spanset algebra
 *
 * Composable set operations over lazily fetched interval timelines.
 * Build a tree of unions, intersections, differences and complements over
 * any number of sources, then query it for a range.
 *
 * @packageDocumentation
 */

// Operator tree
export {
	Complement,
	Difference,
	Filtered,
	Intersection,
	Timeline,
	Union,
	complement,
	difference,
	filtered,
	flatten,
	fromSource,
	intersection,
	union,
} from './timeline.js';
export type { MaskTimeline } from './timeline.js';
// In-memory timelines
export { StaticTimeline, mask, staticTimeline, timeline } from './static.js';
export type { StaticTimelineOptions } from './static.js';
// Query entry point
export { query, resolveRange, stream } from './query.js';
// Filters and properties
export { Filter, allOf, anyOf, filter } from './filters.js';
export {
	Property,
	computed,
	days,
	endAt,
	field,
	hasAll,
	hasAny,
	hours,
	minutes,
	oneOf,
	seconds,
	startAt,
} from './properties.js';
export type { Comparable } from './properties.js';
// Caching
export { CachedTimeline, cached } from './cache.js';
export type { CacheLogger, CacheOptions, CacheSegment } from './cache.js';
// Transforms
export { BufferedTimeline, MergedTimeline, buffer, mergeWithin } from './transforms.js';
export type { BufferOptions, MergeWithinOptions } from './transforms.js';
// Metrics
export { countIntervals, coverageRatio, maxDuration, minDuration, totalDuration } from './metrics.js';
// Stream primitives
export { complementSorted, intersectSorted, mergeSorted, plainMask, subtractSorted } from './streams.js';

// All types
export type { ComplementOptions, Direction, MaskFactory, MaskSource, QueryOptions, Source } from './types.js';
