/**
 * Option parsing at construction boundaries.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidArgumentError } from './errors.js';

/**
 * Parses an options object against a zod schema.
 *
 * @param schema - The schema describing the accepted options
 * @param value - Raw options supplied by the caller
 * @param label - Name of the operation, used as the message prefix
 * @returns The parsed (and defaulted) options
 * @throws InvalidArgumentError with the first issue's path and message
 */
export function parseOptions<Output, Input = Output>(
	schema: ZodType<Output, ZodTypeDef, Input>,
	value: unknown,
	label: string,
): Output {
	const result = schema.safeParse(value);
	if (result.success) {
		return result.data;
	}

	const [issue] = result.error.issues;
	const path = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
	const detail = issue ? issue.message : 'invalid options';
	throw new InvalidArgumentError(
		path ? `${label}: ${path}: ${detail}` : `${label}: ${detail}`,
		path,
	);
}
