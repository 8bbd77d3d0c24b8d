import { isOperator, type BinaryOperatorNode, type SqlNode, type TernaryOperatorNode, type UnaryOperatorNode } from '../ast/ast.js';
import { Associativity } from '../common/constants.js';
import { RenderError } from '../common/errors.js';
import { ErrorCode } from '../common/types.js';
import { resolveAssociativity, resolvePrecedence, type OperatorTables } from './precedence.js';

/*
 * Parenthesization decisions, one per operator arity.
 * Only operator children are ever wrapped here; every other node is self-delimiting.
 */

export interface UnaryShape {
	/** Right-associative prints `SYMBOL operand`, left-associative `operand SYMBOL` */
	placement: 'prefix' | 'postfix';
	precedence: number;
}

/** Resolves placement and precedence of a unary operator; non-associative is rejected. */
export function unaryShape(op: UnaryOperatorNode, tables: OperatorTables): UnaryShape {
	const associativity = resolveAssociativity(op, tables);
	if (associativity === Associativity.NonAssociative) {
		throw new RenderError(`Unary operator '${op.kind}' cannot be non-associative`, ErrorCode.NonAssociativeUnary);
	}
	return {
		placement: associativity === Associativity.Right ? 'prefix' : 'postfix',
		precedence: resolvePrecedence(op, tables),
	};
}

/** The operand is wrapped only when it binds strictly looser. Ties never wrap. */
export function unaryOperandNeedsParens(operand: SqlNode, ownPrecedence: number, tables: OperatorTables): boolean {
	if (!isOperator(operand)) return false;
	return resolvePrecedence(operand, tables) < ownPrecedence;
}

export interface BinaryShape {
	associativity: Associativity;
	precedence: number;
}

export function binaryShape(op: BinaryOperatorNode, tables: OperatorTables): BinaryShape {
	const associativity = resolveAssociativity(op, tables);
	return { associativity, precedence: resolvePrecedence(op, tables) };
}

/**
 * Whether one side of a binary operator needs wrapping.
 *
 * A non-associative parent wraps any child of equal or lower precedence.
 * Otherwise a looser child is wrapped, and an equal one only when it sits on the side
 * opposite the parent's associativity: `a - (b - c)` keeps its parentheses, `a - b - c` needs none.
 */
export function binaryChildNeedsParens(child: SqlNode, side: 'left' | 'right', shape: BinaryShape, tables: OperatorTables): boolean {
	if (!isOperator(child)) return false;
	const childPrecedence = resolvePrecedence(child, tables);
	const { associativity, precedence } = shape;
	if (associativity === Associativity.NonAssociative) {
		return childPrecedence <= precedence;
	}
	const tieTarget = side === 'left' ? Associativity.Right : Associativity.Left;
	return childPrecedence < precedence || (childPrecedence === precedence && associativity === tieTarget);
}

export function ternaryPrecedence(op: TernaryOperatorNode, tables: OperatorTables): number {
	return resolvePrecedence(op, tables);
}

/** With no associativity to break a tie, an equal-precedence operand is always wrapped. */
export function ternaryOperandNeedsParens(operand: SqlNode, ownPrecedence: number, tables: OperatorTables): boolean {
	if (!isOperator(operand)) return false;
	return resolvePrecedence(operand, tables) <= ownPrecedence;
}
