import type { BinaryOperatorNode, OperatorNode, UnaryOperatorNode } from '../ast/ast.js';
import { Associativity, type OperatorKind } from '../common/constants.js';
import { RenderError } from '../common/errors.js';
import { ErrorCode } from '../common/types.js';

/** The part of an output context the resolver consults. */
export interface OperatorTables {
	precedenceFor(kind: OperatorKind): number | undefined;
	associativityFor(kind: OperatorKind): Associativity | undefined;
}

/** Zero (and anything that is not a positive integer) means "unset". */
export function isUsablePrecedence(value: number | undefined): value is number {
	return value !== undefined && Number.isInteger(value) && value > 0;
}

function isAssociativity(value: unknown): value is Associativity {
	return value === Associativity.Left || value === Associativity.Right || value === Associativity.NonAssociative;
}

/**
 * Effective precedence: the operator's own override, else the dialect's entry for its kind.
 * Larger binds tighter.
 */
export function resolvePrecedence(op: OperatorNode, tables: OperatorTables): number {
	if (isUsablePrecedence(op.precedence)) {
		return op.precedence;
	}
	const fromDialect = tables.precedenceFor(op.kind);
	if (isUsablePrecedence(fromDialect)) {
		return fromDialect;
	}
	throw new RenderError(`No precedence defined for operator '${op.kind}'`, ErrorCode.PrecedenceUndefined);
}

/**
 * Effective associativity: the operator's own override, else the dialect's entry for its kind.
 * Ternary operators have none.
 */
export function resolveAssociativity(op: UnaryOperatorNode | BinaryOperatorNode, tables: OperatorTables): Associativity {
	if (isAssociativity(op.associativity)) {
		return op.associativity;
	}
	const fromDialect = tables.associativityFor(op.kind);
	if (isAssociativity(fromDialect)) {
		return fromDialect;
	}
	throw new RenderError(`No associativity defined for operator '${op.kind}'`, ErrorCode.AssociativityUndefined);
}
