import type { PlaceholderNode, TupleNode } from './ast.js';
import { PlaceholderError } from '../common/errors.js';
import { ErrorCode } from '../common/types.js';

export function placeholder(name: string): PlaceholderNode {
	return { type: 'placeholder', name };
}

/**
 * Generates `count` placeholders named `prefix1` .. `prefixN`.
 * Never returns an empty list: a count below one is an error.
 */
export function generatePlaceholders(prefix: string, count: number): PlaceholderNode[] {
	if (!Number.isInteger(count) || count <= 0) {
		throw new PlaceholderError(`Cannot generate ${count} placeholders`, ErrorCode.ZeroLengthPlaceholderRequest);
	}
	return Array.from({ length: count }, (_, i) => placeholder(`${prefix}${i + 1}`));
}

/** Wraps a batch of placeholders into a tuple, e.g. for `x IN (?,?,?)`. */
export function makePlaceholderTuple(placeholders: readonly PlaceholderNode[]): TupleNode {
	const [first, ...rest] = placeholders;
	if (first === undefined) {
		throw new PlaceholderError('Cannot build a tuple from zero placeholders', ErrorCode.ZeroLengthPlaceholderRequest);
	}
	return { type: 'tuple', items: [first, ...rest] };
}

export interface PlaceholderBatch {
	placeholders: PlaceholderNode[];
	tuple: TupleNode;
}

export function placeholderTuple(prefix: string, count: number): PlaceholderBatch {
	const placeholders = generatePlaceholders(prefix, count);
	return { placeholders, tuple: makePlaceholderTuple(placeholders) };
}
