/**
 * Writes composition trees into an output context as SQL text.
 *
 * Formatting Notes:
 * - Keywords are emitted uppercase.
 * - Identifiers go through the dialect's quoting rule.
 * - String literals are single-quoted with embedded quotes doubled.
 * - List items are joined with a bare comma; clauses with a single space.
 */
import type * as AST from '../ast/ast.js';
import { unknownNode } from '../ast/ast.js';
import { RenderError } from '../common/errors.js';
import { ErrorCode, type SqlValue } from '../common/types.js';
import {
	binaryChildNeedsParens, binaryShape, ternaryOperandNeedsParens, ternaryPrecedence,
	unaryOperandNeedsParens, unaryShape,
} from '../operator/parenthesize.js';
import type { OutputContext } from './output-context.js';

export function renderNode(node: AST.SqlNode, ctx: OutputContext): void {
	ctx.enter();
	try {
		renderVariant(node, ctx);
	} finally {
		ctx.leave();
	}
}

function renderVariant(node: AST.SqlNode, ctx: OutputContext): void {
	switch (node.type) {
		case 'literal':
			ctx.appendLiteral(literalToString(node.value));
			return;
		case 'verbatim':
			ctx.appendLiteral(node.text);
			return;
		case 'sqlType':
			ctx.appendLiteral(node.name);
			return;
		case 'column':
			if (node.table) {
				ctx.appendIdentifier(node.table);
				ctx.appendLiteral('.');
			}
			ctx.appendIdentifier(node.name);
			return;
		case 'table':
			qualifiedName(node.schema, node.name, ctx);
			return;
		case 'labeledTable':
			qualifiedName(node.schema, node.name, ctx);
			ctx.appendLiteral(' ');
			ctx.appendIdentifier(node.label);
			return;
		case 'placeholder': {
			const position = ctx.bindPlaceholder(node.name);
			ctx.appendLiteral(ctx.renderPlaceholder(node.name, position));
			return;
		}

		case 'unary':
			return renderUnary(node, ctx);
		case 'binary':
			return renderBinary(node, ctx);
		case 'ternary':
			return renderTernary(node, ctx);

		case 'tuple':
			parenthesized(() => commaSeparated(node.items, ctx), ctx);
			return;
		case 'case':
			ctx.appendLiteral('CASE');
			for (const branch of node.branches) {
				ctx.appendLiteral(' WHEN ');
				renderNode(branch.when, ctx);
				ctx.appendLiteral(' THEN ');
				renderNode(branch.then, ctx);
			}
			if (node.else) {
				ctx.appendLiteral(' ELSE ');
				renderNode(node.else, ctx);
			}
			ctx.appendLiteral(' END');
			return;
		case 'cast':
			ctx.appendLiteral('CAST(');
			renderNode(node.expr, ctx);
			ctx.appendLiteral(' AS ');
			renderNode(node.sqlType, ctx);
			ctx.appendLiteral(')');
			return;
		case 'function':
			ctx.appendLiteral(node.name);
			if (node.args.length === 0) {
				if (!node.omitParentheses) ctx.appendLiteral('()');
				return;
			}
			parenthesized(() => commaSeparated(node.args, ctx), ctx);
			return;
		case 'subquery':
			parenthesized(() => renderNode(node.select, ctx), ctx);
			return;

		case 'labeledColumn':
			renderNode(node.expr, ctx);
			ctx.appendLiteral(' ');
			ctx.appendIdentifier(node.label);
			return;
		case 'labeledSelect':
			parenthesized(() => renderNode(node.select, ctx), ctx);
			ctx.appendLiteral(' ');
			ctx.appendIdentifier(node.label);
			return;
		case 'join':
			renderNode(node.left, ctx);
			ctx.appendLiteral(` ${node.joinType} `);
			renderNode(node.right, ctx);
			ctx.appendLiteral(' ON ');
			renderNode(node.on, ctx);
			return;
		case 'fromItem':
			return renderFromItem(node, ctx);
		case 'from':
			ctx.appendLiteral('FROM ');
			renderNode(node.item, ctx);
			return;
		case 'where':
			ctx.appendLiteral('WHERE ');
			renderNode(node.expr, ctx);
			return;
		case 'groupBy':
			ctx.appendLiteral('GROUP BY ');
			commaSeparated(node.exprs, ctx);
			return;
		case 'having':
			ctx.appendLiteral('HAVING ');
			renderNode(node.expr, ctx);
			return;
		case 'orderBy':
			ctx.appendLiteral('ORDER BY ');
			commaSeparated(node.items, ctx);
			return;
		case 'orderByItem':
			renderNode(node.expr, ctx);
			if (node.desc) ctx.appendLiteral(' DESC');
			// Only the placement that differs from the default is spelled out
			if (node.desc && node.nulls === 'last') ctx.appendLiteral(' NULLS LAST');
			if (!node.desc && node.nulls === 'first') ctx.appendLiteral(' NULLS FIRST');
			return;
		case 'limit':
			ctx.appendLiteral('LIMIT ');
			renderNode(node.expr, ctx);
			return;
		case 'offset':
			ctx.appendLiteral('OFFSET ');
			renderNode(node.expr, ctx);
			return;
		case 'select':
			return renderSelect(node, ctx);

		default:
			return unknownNode(node);
	}
}

function renderUnary(op: AST.UnaryOperatorNode, ctx: OutputContext): void {
	const shape = unaryShape(op, ctx);
	const wrap = unaryOperandNeedsParens(op.operand, shape.precedence, ctx);
	if (shape.placement === 'prefix') {
		ctx.appendLiteral(`${op.symbol} `);
	}
	child(op.operand, wrap, ctx);
	if (shape.placement === 'postfix') {
		ctx.appendLiteral(` ${op.symbol}`);
	}
}

function renderBinary(op: AST.BinaryOperatorNode, ctx: OutputContext): void {
	const shape = binaryShape(op, ctx);
	child(op.left, binaryChildNeedsParens(op.left, 'left', shape, ctx), ctx);
	ctx.appendLiteral(op.suppressSpace ? op.symbol : ` ${op.symbol} `);
	child(op.right, binaryChildNeedsParens(op.right, 'right', shape, ctx), ctx);
}

function renderTernary(op: AST.TernaryOperatorNode, ctx: OutputContext): void {
	const precedence = ternaryPrecedence(op, ctx);
	const [first, second, third] = op.operands;
	child(first, ternaryOperandNeedsParens(first, precedence, ctx), ctx);
	ctx.appendLiteral(` ${op.symbols[0]} `);
	child(second, ternaryOperandNeedsParens(second, precedence, ctx), ctx);
	ctx.appendLiteral(` ${op.symbols[1]} `);
	child(third, ternaryOperandNeedsParens(third, precedence, ctx), ctx);
}

function renderFromItem(item: AST.FromItemNode, ctx: OutputContext): void {
	if (item.table) {
		renderNode(item.table, ctx);
	} else if (item.subquery) {
		renderNode(item.subquery, ctx);
	} else if (item.join) {
		renderNode(item.join, ctx);
	} else {
		throw new RenderError('FROM item has no table, subquery or join', ErrorCode.UnknownStructuralVariant);
	}
}

function renderSelect(stmt: AST.SelectNode, ctx: OutputContext): void {
	ctx.appendLiteral('SELECT ');
	commaSeparated(stmt.columns, ctx);
	const clauses = [stmt.from, stmt.where, stmt.groupBy, stmt.having, stmt.orderBy, stmt.limit, stmt.offset];
	for (const clause of clauses) {
		if (clause) {
			ctx.appendLiteral(' ');
			renderNode(clause, ctx);
		}
	}
}

// --- Helpers ---

function child(node: AST.SqlNode, wrap: boolean, ctx: OutputContext): void {
	if (wrap) {
		parenthesized(() => renderNode(node, ctx), ctx);
	} else {
		renderNode(node, ctx);
	}
}

function parenthesized(body: () => void, ctx: OutputContext): void {
	ctx.appendLiteral('(');
	body();
	ctx.appendLiteral(')');
}

function commaSeparated(nodes: readonly AST.SqlNode[], ctx: OutputContext): void {
	nodes.forEach((node, index) => {
		if (index > 0) ctx.appendLiteral(',');
		renderNode(node, ctx);
	});
}

function qualifiedName(schema: string | undefined, name: string, ctx: OutputContext): void {
	if (schema) {
		ctx.appendIdentifier(schema);
		ctx.appendLiteral('.');
	}
	ctx.appendIdentifier(name);
}

export function literalToString(value: SqlValue): string {
	if (value === null) return 'NULL';
	if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`; // Escape single quotes
	if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
	if (value instanceof Uint8Array) {
		const hex = Buffer.from(value).toString('hex');
		return `X'${hex}'`;
	}
	return String(value);
}
