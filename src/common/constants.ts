/**
 * Operator kinds known to the dialect tables.
 * Custom operators may reuse a kind to borrow its precedence, or carry their own overrides.
 */
export enum OperatorKind {
	Mul = 'mul',
	Div = 'div',
	Mod = 'mod',
	Add = 'add',
	Sub = 'sub',
	Concat = 'concat',
	Negative = 'negative',
	IsNull = 'isNull',
	IsNotNull = 'isNotNull',
	IsTrue = 'isTrue',
	IsNotTrue = 'isNotTrue',
	IsFalse = 'isFalse',
	IsNotFalse = 'isNotFalse',
	In = 'in',
	NotIn = 'notIn',
	Between = 'between',
	NotBetween = 'notBetween',
	Like = 'like',
	NotLike = 'notLike',
	ILike = 'ilike',
	NotILike = 'notIlike',
	Lt = 'lt',
	Lte = 'lte',
	Gt = 'gt',
	Gte = 'gte',
	Eq = 'eq',
	NotEq = 'notEq',
	Not = 'not',
	And = 'and',
	Or = 'or',
}

/**
 * Governs tie-breaking between operators of equal precedence.
 * For unary operators it also picks the side: Right is prefix, Left is postfix.
 */
export enum Associativity {
	Left = 'left',
	Right = 'right',
	NonAssociative = 'nonAssociative',
}

export type JoinType = 'JOIN' | 'LEFT JOIN' | 'RIGHT JOIN' | 'FULL JOIN';

/** Names of the built-in dialects, usable in place of a dialect object. */
export type DialectName = 'standard' | 'postgres' | 'mysql' | 'named';

export const DEFAULT_DIALECT: DialectName = 'standard';

/** Nesting depth beyond which rewrite and render give up instead of exhausting the stack. */
export const DEFAULT_MAX_DEPTH = 512;
