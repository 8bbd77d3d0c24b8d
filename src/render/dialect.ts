import { Associativity, OperatorKind, type DialectName } from '../common/constants.js';
import { MisuseError } from '../common/errors.js';

export type PrecedenceTable = Readonly<Partial<Record<OperatorKind, number>>>;
export type AssociativityTable = Readonly<Partial<Record<OperatorKind, Associativity>>>;

/**
 * Everything the renderer needs to know about a target SQL flavour.
 */
export interface Dialect {
	readonly name: string;
	/** Larger binds tighter; a missing or zero entry means undefined */
	readonly precedence: PrecedenceTable;
	readonly associativity: AssociativityTable;
	quoteIdentifier(name: string): string;
	renderPlaceholder(name: string, position: number): string;
}

// --- Identifier Quoting Logic ---

const PLAIN_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

// Words that cannot appear unquoted as identifiers in the grammar we emit
const RESERVED_WORDS = new Set([
	'all', 'and', 'as', 'asc', 'between', 'by', 'case', 'cast', 'cross', 'current_date', 'current_time',
	'current_timestamp', 'default', 'desc', 'distinct', 'else', 'end', 'except', 'false', 'from', 'full',
	'group', 'having', 'ilike', 'in', 'inner', 'intersect', 'is', 'join', 'left', 'like', 'limit', 'not',
	'null', 'nulls', 'offset', 'on', 'or', 'order', 'outer', 'right', 'select', 'table', 'then', 'true',
	'union', 'user', 'using', 'when', 'where', 'with',
]);

/**
 * Builds a quoting function that quotes an identifier only if necessary.
 * Quoting is needed if the identifier:
 * - Is a reserved word (case-insensitive).
 * - Does not match the plain identifier pattern (starts with letter/_, contains letters/numbers/_).
 */
export function quoteIfNeeded(quote: string): (name: string) => string {
	return (name: string): string => {
		if (RESERVED_WORDS.has(name.toLowerCase()) || !PLAIN_IDENTIFIER.test(name)) {
			return `${quote}${name.split(quote).join(quote + quote)}${quote}`; // Escape internal quotes
		}
		return name;
	};
}

// --- Operator tables ---

function tier(kinds: readonly OperatorKind[], value: number): Partial<Record<OperatorKind, number>> {
	return Object.fromEntries(kinds.map(kind => [kind, value]));
}

function sameAssociativity(kinds: readonly OperatorKind[], value: Associativity): Partial<Record<OperatorKind, Associativity>> {
	return Object.fromEntries(kinds.map(kind => [kind, value]));
}

const MULTIPLICATIVE = [OperatorKind.Mul, OperatorKind.Div, OperatorKind.Mod] as const;
const ADDITIVE = [OperatorKind.Add, OperatorKind.Sub] as const;
const MEMBERSHIP = [
	OperatorKind.Between, OperatorKind.NotBetween, OperatorKind.In, OperatorKind.NotIn,
	OperatorKind.Like, OperatorKind.NotLike, OperatorKind.ILike, OperatorKind.NotILike,
] as const;
const COMPARISON = [OperatorKind.Lt, OperatorKind.Lte, OperatorKind.Gt, OperatorKind.Gte, OperatorKind.Eq, OperatorKind.NotEq] as const;
const TRUTH_TESTS = [
	OperatorKind.IsNull, OperatorKind.IsNotNull, OperatorKind.IsTrue,
	OperatorKind.IsNotTrue, OperatorKind.IsFalse, OperatorKind.IsNotFalse,
] as const;

export const DEFAULT_PRECEDENCE: PrecedenceTable = {
	[OperatorKind.Negative]: 11,
	...tier(MULTIPLICATIVE, 10),
	...tier(ADDITIVE, 9),
	[OperatorKind.Concat]: 8,
	...tier(MEMBERSHIP, 7),
	...tier(COMPARISON, 6),
	...tier(TRUTH_TESTS, 5),
	[OperatorKind.Not]: 4,
	[OperatorKind.And]: 3,
	[OperatorKind.Or]: 2,
};

export const DEFAULT_ASSOCIATIVITY: AssociativityTable = {
	[OperatorKind.Negative]: Associativity.Right,
	...sameAssociativity([...MULTIPLICATIVE, ...ADDITIVE, OperatorKind.Concat], Associativity.Left),
	...sameAssociativity([...MEMBERSHIP, ...COMPARISON], Associativity.NonAssociative),
	// Postfix tests
	...sameAssociativity(TRUTH_TESTS, Associativity.Left),
	[OperatorKind.Not]: Associativity.Right,
	[OperatorKind.And]: Associativity.Left,
	[OperatorKind.Or]: Associativity.Left,
};

// --- Built-in dialects ---

const doubleQuoted = quoteIfNeeded('"');

/** `?` placeholders, double-quoted identifiers. */
export const standardDialect: Dialect = {
	name: 'standard',
	precedence: DEFAULT_PRECEDENCE,
	associativity: DEFAULT_ASSOCIATIVITY,
	quoteIdentifier: doubleQuoted,
	renderPlaceholder: () => '?',
};

/** `$1`, `$2`, ... placeholders. */
export const postgresDialect: Dialect = {
	name: 'postgres',
	precedence: DEFAULT_PRECEDENCE,
	associativity: DEFAULT_ASSOCIATIVITY,
	quoteIdentifier: doubleQuoted,
	renderPlaceholder: (_name, position) => `$${position}`,
};

/** `?` placeholders, backtick-quoted identifiers. */
export const mysqlDialect: Dialect = {
	name: 'mysql',
	precedence: DEFAULT_PRECEDENCE,
	associativity: DEFAULT_ASSOCIATIVITY,
	quoteIdentifier: quoteIfNeeded('`'),
	renderPlaceholder: () => '?',
};

/** `:name` placeholders. */
export const namedDialect: Dialect = {
	name: 'named',
	precedence: DEFAULT_PRECEDENCE,
	associativity: DEFAULT_ASSOCIATIVITY,
	quoteIdentifier: doubleQuoted,
	renderPlaceholder: name => `:${name}`,
};

const BUILTIN_DIALECTS: Record<DialectName, Dialect> = {
	standard: standardDialect,
	postgres: postgresDialect,
	mysql: mysqlDialect,
	named: namedDialect,
};

export function getDialect(name: DialectName): Dialect {
	return BUILTIN_DIALECTS[name];
}

export interface DialectOverrides {
	name?: string;
	precedence?: PrecedenceTable;
	associativity?: AssociativityTable;
	quoteIdentifier?: (name: string) => string;
	renderPlaceholder?: (name: string, position: number) => string;
}

/**
 * Derives a dialect from a base, merging the operator tables entry by entry.
 * A precedence entry must be a positive integer; zero stays reserved for "unset".
 */
export function createDialect(base: Dialect, overrides: DialectOverrides): Dialect {
	for (const [kind, value] of Object.entries(overrides.precedence ?? {})) {
		if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
			throw new MisuseError(`Precedence for '${kind}' must be a positive integer, got ${value}`);
		}
	}
	return {
		name: overrides.name ?? `${base.name}+custom`,
		precedence: { ...base.precedence, ...overrides.precedence },
		associativity: { ...base.associativity, ...overrides.associativity },
		quoteIdentifier: overrides.quoteIdentifier ?? base.quoteIdentifier,
		renderPlaceholder: overrides.renderPlaceholder ?? base.renderPlaceholder,
	};
}
