import type { SqlValue, NonEmptyArray } from '../common/types.js';
import type { Associativity, JoinType, OperatorKind } from '../common/constants.js';
import { RenderError } from '../common/errors.js';
import { ErrorCode } from '../common/types.js';

/**
 * SQL composition tree definitions
 * These interfaces define the values application code composes and the renderer prints.
 * Nodes are immutable; the rewrite pass builds new nodes rather than editing these.
 */

// Base for all nodes
export interface BaseNode {
	readonly type: 'literal' | 'verbatim' | 'sqlType' | 'column' | 'table' | 'labeledTable' | 'placeholder'
		| 'unary' | 'binary' | 'ternary' | 'tuple' | 'case' | 'cast' | 'function' | 'labeledColumn' | 'labeledSelect'
		| 'subquery' | 'join' | 'fromItem' | 'from' | 'where' | 'groupBy' | 'having' | 'orderBy' | 'orderByItem'
		| 'limit' | 'offset' | 'select';
}

// --- Leaves ---

// Literal value (number, string, null, etc.), escaped on output
export interface LiteralNode extends BaseNode {
	readonly type: 'literal';
	readonly value: SqlValue;
}

// Text emitted exactly as given
export interface VerbatimNode extends BaseNode {
	readonly type: 'verbatim';
	readonly text: string;
}

// Type name used by CAST, e.g. DECIMAL(10,2)
export interface SqlTypeNode extends BaseNode {
	readonly type: 'sqlType';
	readonly name: string;
}

export interface ColumnNode extends BaseNode {
	readonly type: 'column';
	readonly name: string;
	readonly table?: string; // Optional table label qualifier
}

export interface TableNode extends BaseNode {
	readonly type: 'table';
	readonly name: string;
	readonly schema?: string;
}

export interface LabeledTableNode extends BaseNode {
	readonly type: 'labeledTable';
	readonly name: string;
	readonly label: string;
	readonly schema?: string;
}

// Named parameter, resolved to a position while rendering
export interface PlaceholderNode extends BaseNode {
	readonly type: 'placeholder';
	readonly name: string;
}

// --- Operators ---

export interface NegatedUnary {
	readonly kind: OperatorKind;
	readonly symbol: string;
}

export interface UnaryOperatorNode extends BaseNode {
	readonly type: 'unary';
	readonly kind: OperatorKind;
	readonly symbol: string; // NOT, IS NULL, -, etc.
	readonly operand: SqlNode;
	readonly negated?: NegatedUnary;
	/** Overrides the dialect precedence when set; never zero */
	readonly precedence?: number;
	/** Overrides the dialect associativity; Right renders as prefix, Left as postfix */
	readonly associativity?: Associativity;
}

export interface BinaryOperatorNode extends BaseNode {
	readonly type: 'binary';
	readonly kind: OperatorKind;
	readonly symbol: string; // +, -, AND, OR, =, <, etc.
	readonly left: SqlNode;
	readonly right: SqlNode;
	readonly negated?: NegatedUnary;
	readonly precedence?: number;
	readonly associativity?: Associativity;
	/** Glue the symbol to both operands instead of surrounding it with spaces */
	readonly suppressSpace?: boolean;
}

export interface NegatedTernary {
	readonly kind: OperatorKind;
	readonly symbols: readonly [string, string];
}

// Infix operator with two symbols, e.g. x BETWEEN a AND b
export interface TernaryOperatorNode extends BaseNode {
	readonly type: 'ternary';
	readonly kind: OperatorKind;
	readonly symbols: readonly [string, string];
	readonly operands: readonly [SqlNode, SqlNode, SqlNode];
	readonly negated?: NegatedTernary;
	readonly precedence?: number;
}

export type OperatorNode = UnaryOperatorNode | BinaryOperatorNode | TernaryOperatorNode;

// --- Expressions with their own delimiters ---

export interface TupleNode extends BaseNode {
	readonly type: 'tuple';
	readonly items: NonEmptyArray<SqlNode>;
}

export interface CaseBranch {
	readonly when: SqlNode;
	readonly then: SqlNode;
}

export interface CaseNode extends BaseNode {
	readonly type: 'case';
	readonly branches: NonEmptyArray<CaseBranch>;
	readonly else?: SqlNode;
}

export interface CastNode extends BaseNode {
	readonly type: 'cast';
	readonly expr: SqlNode;
	readonly sqlType: SqlTypeNode;
}

export interface FunctionNode extends BaseNode {
	readonly type: 'function';
	readonly name: string;
	readonly args: readonly SqlNode[];
	/** Print a bare name when there are no arguments, e.g. CURRENT_TIMESTAMP */
	readonly omitParentheses: boolean;
}

export interface SubqueryNode extends BaseNode {
	readonly type: 'subquery';
	readonly select: SelectNode;
}

// --- Statement structure ---

export interface LabeledColumnNode extends BaseNode {
	readonly type: 'labeledColumn';
	readonly expr: SqlNode;
	readonly label: string;
}

export interface LabeledSelectNode extends BaseNode {
	readonly type: 'labeledSelect';
	readonly select: SelectNode;
	readonly label: string;
}

export interface JoinNode extends BaseNode {
	readonly type: 'join';
	readonly joinType: JoinType;
	readonly left: FromItemNode;
	readonly right: FromItemNode;
	readonly on: SqlNode;
}

/**
 * One source in a FROM clause.
 * Exactly one alternative is expected; a node with none fails to render.
 */
export interface FromItemNode extends BaseNode {
	readonly type: 'fromItem';
	readonly table?: LabeledTableNode;
	readonly subquery?: LabeledSelectNode;
	readonly join?: JoinNode;
}

export interface FromClauseNode extends BaseNode {
	readonly type: 'from';
	readonly item: FromItemNode;
}

export interface WhereClauseNode extends BaseNode {
	readonly type: 'where';
	readonly expr: SqlNode;
}

export interface GroupByClauseNode extends BaseNode {
	readonly type: 'groupBy';
	readonly exprs: NonEmptyArray<SqlNode>;
}

export interface HavingClauseNode extends BaseNode {
	readonly type: 'having';
	readonly expr: SqlNode;
}

export interface OrderByItemNode extends BaseNode {
	readonly type: 'orderByItem';
	readonly expr: SqlNode;
	readonly desc: boolean;
	readonly nulls?: 'first' | 'last';
}

export interface OrderByClauseNode extends BaseNode {
	readonly type: 'orderBy';
	readonly items: NonEmptyArray<OrderByItemNode>;
}

export interface LimitClauseNode extends BaseNode {
	readonly type: 'limit';
	readonly expr: SqlNode;
}

export interface OffsetClauseNode extends BaseNode {
	readonly type: 'offset';
	readonly expr: SqlNode;
}

export interface SelectNode extends BaseNode {
	readonly type: 'select';
	readonly columns: NonEmptyArray<SqlNode>;
	readonly from?: FromClauseNode;
	readonly where?: WhereClauseNode;
	readonly groupBy?: GroupByClauseNode;
	readonly having?: HavingClauseNode;
	readonly orderBy?: OrderByClauseNode;
	readonly limit?: LimitClauseNode;
	readonly offset?: OffsetClauseNode;
}

export type LeafNode = LiteralNode | VerbatimNode | SqlTypeNode | ColumnNode | TableNode | LabeledTableNode | PlaceholderNode;

export type SqlNode = LeafNode | OperatorNode | TupleNode | CaseNode | CastNode | FunctionNode | SubqueryNode
	| LabeledColumnNode | LabeledSelectNode | JoinNode | FromItemNode | FromClauseNode | WhereClauseNode
	| GroupByClauseNode | HavingClauseNode | OrderByItemNode | OrderByClauseNode | LimitClauseNode
	| OffsetClauseNode | SelectNode;

export function isOperator(node: SqlNode): node is OperatorNode {
	return node.type === 'unary' || node.type === 'binary' || node.type === 'ternary';
}

// Reached only by trees assembled outside the type system
export function unknownNode(node: never): never {
	const value: unknown = node;
	const type = typeof value === 'object' && value !== null && 'type' in value ? String(value.type) : String(value);
	throw new RenderError(`Unknown node type '${type}'`, ErrorCode.UnknownStructuralVariant);
}
