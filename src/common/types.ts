/**
 * Scalar values that may appear as SQL literals or be bound to placeholders.
 */
export type SqlValue = number | string | bigint | Uint8Array | boolean | null;

/**
 * Named input values supplied when binding a compiled statement.
 */
export type SqlParameters = Record<string, SqlValue>;

/** A list that always holds at least one element. */
export type NonEmptyArray<T> = readonly [T, ...T[]];

/**
 * Error codes carried by every {@link ComposerError}.
 * Used by callers to tell failure kinds apart without matching messages.
 */
export enum ErrorCode {
	/** Neither the operator nor the dialect gives a precedence */
	PrecedenceUndefined = 'PRECEDENCE_UNDEFINED',
	/** Neither the operator nor the dialect gives an associativity */
	AssociativityUndefined = 'ASSOCIATIVITY_UNDEFINED',
	/** A unary operator resolved to non-associative */
	NonAssociativeUnary = 'NON_ASSOCIATIVE_UNARY',
	/** A container node has none of its alternatives populated */
	UnknownStructuralVariant = 'UNKNOWN_STRUCTURAL_VARIANT',
	ZeroLengthPlaceholderRequest = 'ZERO_LENGTH_PLACEHOLDER_REQUEST',
	UnboundPlaceholder = 'UNBOUND_PLACEHOLDER',
	UnknownInputKey = 'UNKNOWN_INPUT_KEY',
	DepthLimitExceeded = 'DEPTH_LIMIT_EXCEEDED',
	/** The API was used incorrectly at construction time */
	Misuse = 'MISUSE',
}
