import type { BinaryOperatorNode, NegatedTernary, NegatedUnary, OperatorNode, SqlNode, TernaryOperatorNode, UnaryOperatorNode } from './ast.js';
import { OperatorKind, type Associativity } from '../common/constants.js';
import { MisuseError } from '../common/errors.js';
import { toNode, type Operand } from './builders.js';

// --- Generic constructors (custom operators) ---

export interface UnaryOptions {
	negated?: NegatedUnary;
	precedence?: number;
	associativity?: Associativity;
}

export function unaryOperator(kind: OperatorKind, symbol: string, operand: Operand, options: UnaryOptions = {}): UnaryOperatorNode {
	checkPrecedence(options.precedence);
	return { type: 'unary', kind, symbol, operand: toNode(operand), ...overrides(options) };
}

export interface BinaryOptions {
	negated?: NegatedUnary;
	precedence?: number;
	associativity?: Associativity;
	suppressSpace?: boolean;
}

export function binaryOperator(kind: OperatorKind, symbol: string, left: Operand, right: Operand, options: BinaryOptions = {}): BinaryOperatorNode {
	checkPrecedence(options.precedence);
	return {
		type: 'binary', kind, symbol, left: toNode(left), right: toNode(right),
		...overrides(options),
		...(options.suppressSpace === undefined ? {} : { suppressSpace: options.suppressSpace }),
	};
}

export interface TernaryOptions {
	negated?: NegatedTernary;
	precedence?: number;
}

export function ternaryOperator(
	kind: OperatorKind,
	symbols: readonly [string, string],
	operands: readonly [Operand, Operand, Operand],
	options: TernaryOptions = {},
): TernaryOperatorNode {
	checkPrecedence(options.precedence);
	const [first, second, third] = operands;
	return {
		type: 'ternary', kind, symbols, operands: [toNode(first), toNode(second), toNode(third)],
		...(options.negated === undefined ? {} : { negated: options.negated }),
		...(options.precedence === undefined ? {} : { precedence: options.precedence }),
	};
}

// --- Overrides ---

/** Copies only the overrides that are set, so absent ones never appear as keys. */
function overrides(options: UnaryOptions): UnaryOptions {
	return {
		...(options.negated === undefined ? {} : { negated: options.negated }),
		...(options.precedence === undefined ? {} : { precedence: options.precedence }),
		...(options.associativity === undefined ? {} : { associativity: options.associativity }),
	};
}

/** Zero stays reserved as "unset"; an override must be a positive integer. */
function checkPrecedence(precedence: number | undefined): void {
	if (precedence !== undefined && (!Number.isInteger(precedence) || precedence <= 0)) {
		throw new MisuseError(`Precedence override must be a positive integer, got ${precedence}`);
	}
}

export function withPrecedence<T extends OperatorNode>(op: T, precedence: number): T {
	checkPrecedence(precedence);
	return { ...op, precedence };
}

export function withAssociativity<T extends UnaryOperatorNode | BinaryOperatorNode>(op: T, associativity: Associativity): T {
	return { ...op, associativity };
}

// --- Unary ---

/** Logical NOT; collapses into a negatable operand during rewrite. */
export function not(operand: Operand): UnaryOperatorNode {
	return unaryOperator(OperatorKind.Not, 'NOT', operand);
}

export function negative(operand: Operand): UnaryOperatorNode {
	return unaryOperator(OperatorKind.Negative, '-', operand);
}

function truthTest(kind: OperatorKind, symbol: string, negatedKind: OperatorKind, negatedSymbol: string) {
	return (operand: Operand): UnaryOperatorNode =>
		unaryOperator(kind, symbol, operand, { negated: { kind: negatedKind, symbol: negatedSymbol } });
}

export const isNull = truthTest(OperatorKind.IsNull, 'IS NULL', OperatorKind.IsNotNull, 'IS NOT NULL');
export const isNotNull = truthTest(OperatorKind.IsNotNull, 'IS NOT NULL', OperatorKind.IsNull, 'IS NULL');
export const isTrue = truthTest(OperatorKind.IsTrue, 'IS TRUE', OperatorKind.IsNotTrue, 'IS NOT TRUE');
export const isNotTrue = truthTest(OperatorKind.IsNotTrue, 'IS NOT TRUE', OperatorKind.IsTrue, 'IS TRUE');
export const isFalse = truthTest(OperatorKind.IsFalse, 'IS FALSE', OperatorKind.IsNotFalse, 'IS NOT FALSE');
export const isNotFalse = truthTest(OperatorKind.IsNotFalse, 'IS NOT FALSE', OperatorKind.IsFalse, 'IS FALSE');

// --- Binary ---

function plain(kind: OperatorKind, symbol: string) {
	return (left: Operand, right: Operand): BinaryOperatorNode => binaryOperator(kind, symbol, left, right);
}

function negatable(kind: OperatorKind, symbol: string, negatedKind: OperatorKind, negatedSymbol: string) {
	return (left: Operand, right: Operand): BinaryOperatorNode =>
		binaryOperator(kind, symbol, left, right, { negated: { kind: negatedKind, symbol: negatedSymbol } });
}

export const and = plain(OperatorKind.And, 'AND');
export const or = plain(OperatorKind.Or, 'OR');
export const add = plain(OperatorKind.Add, '+');
export const sub = plain(OperatorKind.Sub, '-');
export const mul = plain(OperatorKind.Mul, '*');
export const div = plain(OperatorKind.Div, '/');
export const mod = plain(OperatorKind.Mod, '%');
export const concat = plain(OperatorKind.Concat, '||');
export const lt = plain(OperatorKind.Lt, '<');
export const lte = plain(OperatorKind.Lte, '<=');
export const gt = plain(OperatorKind.Gt, '>');
export const gte = plain(OperatorKind.Gte, '>=');
export const eq = negatable(OperatorKind.Eq, '=', OperatorKind.NotEq, '<>');
export const notEq = negatable(OperatorKind.NotEq, '<>', OperatorKind.Eq, '=');
export const inList = negatable(OperatorKind.In, 'IN', OperatorKind.NotIn, 'NOT IN');
export const notIn = negatable(OperatorKind.NotIn, 'NOT IN', OperatorKind.In, 'IN');
export const like = negatable(OperatorKind.Like, 'LIKE', OperatorKind.NotLike, 'NOT LIKE');
export const notLike = negatable(OperatorKind.NotLike, 'NOT LIKE', OperatorKind.Like, 'LIKE');
export const ilike = negatable(OperatorKind.ILike, 'ILIKE', OperatorKind.NotILike, 'NOT ILIKE');
export const notIlike = negatable(OperatorKind.NotILike, 'NOT ILIKE', OperatorKind.ILike, 'ILIKE');

/** Left-nested AND over one or more conditions: allOf(a, b, c) is (a AND b) AND c. */
export function allOf(first: Operand, ...rest: Operand[]): SqlNode {
	return rest.reduce<SqlNode>((acc, next) => and(acc, next), toNode(first));
}

/** Left-nested OR over one or more conditions. */
export function anyOf(first: Operand, ...rest: Operand[]): SqlNode {
	return rest.reduce<SqlNode>((acc, next) => or(acc, next), toNode(first));
}

// --- Ternary ---

export function between(expr: Operand, low: Operand, high: Operand): TernaryOperatorNode {
	return ternaryOperator(OperatorKind.Between, ['BETWEEN', 'AND'], [expr, low, high], {
		negated: { kind: OperatorKind.NotBetween, symbols: ['NOT BETWEEN', 'AND'] },
	});
}

export function notBetween(expr: Operand, low: Operand, high: Operand): TernaryOperatorNode {
	return ternaryOperator(OperatorKind.NotBetween, ['NOT BETWEEN', 'AND'], [expr, low, high], {
		negated: { kind: OperatorKind.Between, symbols: ['BETWEEN', 'AND'] },
	});
}
