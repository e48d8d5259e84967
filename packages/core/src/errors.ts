/**
 * Error classes raised by spanset packages.
 *
 * All errors are thrown synchronously by the operation that detects them and
 * are never retried inside the library.
 */

/**
 * Machine-readable error codes.
 */
export type SpansetErrorCode = 'VALIDATION' | 'INVALID_ARGUMENT' | 'CONSTRUCTION';

/**
 * Base class for every error thrown by spanset.
 */
export class SpansetError extends Error {
	readonly code: SpansetErrorCode;

	constructor(code: SpansetErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * A value could not be turned into a well-formed interval or bound,
 * e.g. an interval whose finite start lies after its finite end.
 */
export class ValidationError extends SpansetError {
	constructor(message: string) {
		super('VALIDATION', message);
	}
}

/**
 * A parameter is outside its accepted domain: negative buffers or gaps,
 * a non-positive TTL, a query whose start lies after its end.
 */
export class InvalidArgumentError extends SpansetError {
	readonly path: string | undefined;

	constructor(message: string, path?: string) {
		super('INVALID_ARGUMENT', message);
		this.path = path;
	}
}

/**
 * Two operands were combined with an operator that does not accept them,
 * such as `or` between a timeline and a filter.
 */
export class ConstructionError extends SpansetError {
	constructor(message: string) {
		super('CONSTRUCTION', message);
	}
}
