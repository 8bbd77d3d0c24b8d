/**
 * sql-composer - composable SQL expressions rendered to parameterized text
 *
 * Trees are built from plain immutable values, canonicalized once by the rewrite pass,
 * and printed against a dialect that supplies operator precedence, identifier quoting
 * and placeholder syntax.
 */

// Compilation
export { compile, render, resolveCompileOptions, CompiledQuery } from './compile.js';
export type { CompileOptions, ResolvedCompileOptions } from './compile.js';
export { rewrite } from './rewrite/rewrite.js';
export { renderNode, literalToString } from './render/render.js';
export { OutputContext } from './render/output-context.js';
export { PlaceholderBinder } from './render/placeholder-binder.js';

// Dialects
export {
	standardDialect, postgresDialect, mysqlDialect, namedDialect, getDialect, createDialect, quoteIfNeeded,
	DEFAULT_PRECEDENCE, DEFAULT_ASSOCIATIVITY,
} from './render/dialect.js';
export type { Dialect, DialectOverrides, PrecedenceTable, AssociativityTable } from './render/dialect.js';

// Common data types and constants
export { ErrorCode } from './common/types.js';
export type { SqlValue, SqlParameters, NonEmptyArray } from './common/types.js';
export { OperatorKind, Associativity, DEFAULT_DIALECT, DEFAULT_MAX_DEPTH } from './common/constants.js';
export type { DialectName, JoinType } from './common/constants.js';
export { ComposerError, RenderError, PlaceholderError, MisuseError } from './common/errors.js';

// Tree
export type * from './ast/ast.js';
export { isOperator } from './ast/ast.js';
export * from './ast/builders.js';
export * from './ast/operators.js';
export * from './ast/types.js';
export * from './ast/placeholders.js';

// Operator capabilities
export { isNegatable, negate } from './operator/capabilities.js';
export { resolvePrecedence, resolveAssociativity } from './operator/precedence.js';
export type { OperatorTables } from './operator/precedence.js';
