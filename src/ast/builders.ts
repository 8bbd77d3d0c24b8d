import type * as AST from './ast.js';
import type { JoinType } from '../common/constants.js';
import { MisuseError } from '../common/errors.js';
import type { NonEmptyArray, SqlValue } from '../common/types.js';

/** Anything accepted where an expression is expected; plain values become literals. */
export type Operand = AST.SqlNode | SqlValue;

export function toNode(value: Operand): AST.SqlNode {
	if (typeof value === 'object' && value !== null && !(value instanceof Uint8Array)) {
		return value;
	}
	return literal(value);
}

function toNodes(values: NonEmptyArray<Operand>): NonEmptyArray<AST.SqlNode> {
	const [first, ...rest] = values;
	return [toNode(first), ...rest.map(toNode)];
}

// --- Leaves ---

export function literal(value: SqlValue): AST.LiteralNode {
	// SQL has no spelling for NaN or the infinities
	if (typeof value === 'number' && !Number.isFinite(value)) {
		throw new MisuseError(`Literal must be a finite number, got ${value}`);
	}
	return { type: 'literal', value };
}

/** Emitted as-is: no quoting, no escaping. */
export function verbatim(text: string): AST.VerbatimNode {
	return { type: 'verbatim', text };
}

export function column(name: string, table?: string): AST.ColumnNode {
	return table === undefined ? { type: 'column', name } : { type: 'column', name, table };
}

export function table(name: string, schema?: string): AST.TableNode {
	return schema === undefined ? { type: 'table', name } : { type: 'table', name, schema };
}

export function labeledTable(name: string, label: string, schema?: string): AST.LabeledTableNode {
	return schema === undefined ? { type: 'labeledTable', name, label } : { type: 'labeledTable', name, label, schema };
}

// --- Expressions ---

export function tuple(first: Operand, ...rest: Operand[]): AST.TupleNode {
	return { type: 'tuple', items: toNodes([first, ...rest]) };
}

/**
 * CASE WHEN ... THEN ... [ELSE ...] END
 * @param branches condition/result pairs, in order
 */
export function caseWhen(branches: NonEmptyArray<readonly [Operand, Operand]>, elseResult?: Operand): AST.CaseNode {
	const [first, ...rest] = branches.map(([when, then]) => ({ when: toNode(when), then: toNode(then) }));
	const node: AST.CaseNode = { type: 'case', branches: [first, ...rest] };
	return elseResult === undefined ? node : { ...node, else: toNode(elseResult) };
}

export function cast(expr: Operand, sqlType: AST.SqlTypeNode): AST.CastNode {
	return { type: 'cast', expr: toNode(expr), sqlType };
}

const FUNCTION_NAME = /^[A-Za-z][A-Za-z0-9_.]*$/;

function checkFunctionName(name: string): void {
	if (!FUNCTION_NAME.test(name)) {
		throw new MisuseError(`Illegal function name: ${name}`);
	}
}

/**
 * Returns a constructor for calls to the named function.
 * The name is checked once, here; an illegal name is a programming error.
 */
export function func(name: string): (...args: Operand[]) => AST.FunctionNode {
	checkFunctionName(name);
	return (...args: Operand[]) => ({ type: 'function', name, args: args.map(toNode), omitParentheses: false });
}

/** A niladic function printed without parentheses, e.g. CURRENT_TIMESTAMP. */
export function func0(name: string): AST.FunctionNode {
	checkFunctionName(name);
	return { type: 'function', name, args: [], omitParentheses: true };
}

export function subquery(select: AST.SelectNode): AST.SubqueryNode {
	return { type: 'subquery', select };
}

// --- FROM sources ---

export function labeledColumn(expr: Operand, label: string): AST.LabeledColumnNode {
	return { type: 'labeledColumn', expr: toNode(expr), label };
}

export function labeledSelect(select: AST.SelectNode, label: string): AST.LabeledSelectNode {
	return { type: 'labeledSelect', select, label };
}

export type FromSource = AST.FromItemNode | AST.LabeledTableNode | AST.LabeledSelectNode | AST.JoinNode;

export function fromItem(source: FromSource): AST.FromItemNode {
	switch (source.type) {
		case 'fromItem': return source;
		case 'labeledTable': return { type: 'fromItem', table: source };
		case 'labeledSelect': return { type: 'fromItem', subquery: source };
		case 'join': return { type: 'fromItem', join: source };
	}
}

function joinOf(joinType: JoinType) {
	return (left: FromSource, right: FromSource, on: Operand): AST.JoinNode =>
		({ type: 'join', joinType, left: fromItem(left), right: fromItem(right), on: toNode(on) });
}

export const join = joinOf('JOIN');
export const leftJoin = joinOf('LEFT JOIN');
export const rightJoin = joinOf('RIGHT JOIN');
export const fullJoin = joinOf('FULL JOIN');

// --- Ordering hints ---

export function asc(expr: Operand): AST.OrderByItemNode {
	return { type: 'orderByItem', expr: toNode(expr), desc: false };
}

export function desc(expr: Operand): AST.OrderByItemNode {
	return { type: 'orderByItem', expr: toNode(expr), desc: true };
}

export function nullsFirst(item: AST.OrderByItemNode): AST.OrderByItemNode {
	return { ...item, nulls: 'first' };
}

export function nullsLast(item: AST.OrderByItemNode): AST.OrderByItemNode {
	return { ...item, nulls: 'last' };
}

// --- SELECT ---

export interface SelectOptions {
	columns: NonEmptyArray<Operand>;
	from?: FromSource;
	where?: Operand;
	groupBy?: NonEmptyArray<Operand>;
	having?: Operand;
	/** Plain expressions sort ascending */
	orderBy?: NonEmptyArray<AST.OrderByItemNode | Operand>;
	limit?: Operand;
	offset?: Operand;
}

function toOrderByItem(value: AST.OrderByItemNode | Operand): AST.OrderByItemNode {
	const node = toNode(value);
	return node.type === 'orderByItem' ? node : asc(node);
}

// --- Clauses ---

export function fromClause(source: FromSource): AST.FromClauseNode {
	return { type: 'from', item: fromItem(source) };
}

export function whereClause(expr: Operand): AST.WhereClauseNode {
	return { type: 'where', expr: toNode(expr) };
}

export function groupByClause(first: Operand, ...rest: Operand[]): AST.GroupByClauseNode {
	return { type: 'groupBy', exprs: toNodes([first, ...rest]) };
}

export function havingClause(expr: Operand): AST.HavingClauseNode {
	return { type: 'having', expr: toNode(expr) };
}

export function orderByClause(first: AST.OrderByItemNode | Operand, ...rest: (AST.OrderByItemNode | Operand)[]): AST.OrderByClauseNode {
	return { type: 'orderBy', items: mapOrderBy([first, ...rest]) };
}

export function limitClause(expr: Operand): AST.LimitClauseNode {
	return { type: 'limit', expr: toNode(expr) };
}

export function offsetClause(expr: Operand): AST.OffsetClauseNode {
	return { type: 'offset', expr: toNode(expr) };
}

/** Builds a SELECT; only the clauses given are emitted, in standard order. */
export function select(options: SelectOptions): AST.SelectNode {
	const { from, where, groupBy, having, orderBy, limit, offset } = options;
	return {
		type: 'select',
		columns: toNodes(options.columns),
		...(from === undefined ? {} : { from: fromClause(from) }),
		...(where === undefined ? {} : { where: whereClause(where) }),
		...(groupBy === undefined ? {} : { groupBy: groupByClause(...groupBy) }),
		...(having === undefined ? {} : { having: havingClause(having) }),
		...(orderBy === undefined ? {} : { orderBy: orderByClause(...orderBy) }),
		...(limit === undefined ? {} : { limit: limitClause(limit) }),
		...(offset === undefined ? {} : { offset: offsetClause(offset) }),
	};
}

function mapOrderBy(items: NonEmptyArray<AST.OrderByItemNode | Operand>): NonEmptyArray<AST.OrderByItemNode> {
	const [first, ...rest] = items;
	return [toOrderByItem(first), ...rest.map(toOrderByItem)];
}
