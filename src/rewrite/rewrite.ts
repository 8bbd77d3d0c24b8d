import type * as AST from '../ast/ast.js';
import { isOperator, unknownNode } from '../ast/ast.js';
import { DEFAULT_MAX_DEPTH } from '../common/constants.js';
import { RenderError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { ErrorCode, type NonEmptyArray } from '../common/types.js';
import { isLogicalNot, isNegatable, negate } from '../operator/capabilities.js';

const log = createLogger('rewrite');

/**
 * Returns the canonical form of a tree.
 *
 * Children are canonicalized first, except below a NOT: there the un-rewritten operand decides
 * whether the NOT collapses into the operand's negated form (`NOT x IS NULL` -> `x IS NOT NULL`).
 * The input is never modified; untouched leaves are shared with the result.
 * Rewriting a canonical tree yields an equivalent tree.
 */
export function rewrite(node: AST.SqlNode, maxDepth: number = DEFAULT_MAX_DEPTH): AST.SqlNode {
	return new Rewriter(maxDepth).visit(node);
}

class Rewriter {
	private depth = 0;

	constructor(private readonly maxDepth: number) {}

	visit(node: AST.SqlNode): AST.SqlNode {
		return this.nested(() => this.visitVariant(node));
	}

	/** Every descent, through `visit` or a structural helper, counts toward the limit. */
	private nested<T>(body: () => T): T {
		if (++this.depth > this.maxDepth) {
			throw new RenderError(`Expression nesting exceeds ${this.maxDepth} levels`, ErrorCode.DepthLimitExceeded);
		}
		try {
			return body();
		} finally {
			this.depth--;
		}
	}

	private visitVariant(node: AST.SqlNode): AST.SqlNode {
		switch (node.type) {
			case 'literal':
			case 'verbatim':
			case 'sqlType':
			case 'column':
			case 'table':
			case 'labeledTable':
			case 'placeholder':
				return node;

			case 'unary':
				return this.unary(node);
			case 'binary':
				return { ...node, left: this.visit(node.left), right: this.visit(node.right) };
			case 'ternary': {
				const [first, second, third] = node.operands;
				return { ...node, operands: [this.visit(first), this.visit(second), this.visit(third)] };
			}

			case 'tuple':
				return { ...node, items: this.all(node.items) };
			case 'case':
				return {
					...node,
					branches: mapNonEmpty(node.branches, branch => ({ when: this.visit(branch.when), then: this.visit(branch.then) })),
					...(node.else && { else: this.visit(node.else) }),
				};
			case 'cast':
				return { ...node, expr: this.visit(node.expr) };
			case 'function':
				return { ...node, args: node.args.map(arg => this.visit(arg)) };
			case 'subquery':
				return { ...node, select: this.select(node.select) };
			case 'labeledColumn':
				return { ...node, expr: this.visit(node.expr) };
			case 'labeledSelect':
				return { ...node, select: this.select(node.select) };
			case 'join':
				return this.joinParts(node);
			case 'fromItem':
				return this.fromItemParts(node);
			case 'from':
				return { ...node, item: this.fromItem(node.item) };
			case 'where':
			case 'having':
			case 'limit':
			case 'offset':
				return { ...node, expr: this.visit(node.expr) };
			case 'groupBy':
				return { ...node, exprs: this.all(node.exprs) };
			case 'orderBy':
				return { ...node, items: mapNonEmpty(node.items, item => this.orderByItem(item)) };
			case 'orderByItem':
				return this.orderByItem(node);
			case 'select':
				return this.selectClauses(node);
			default:
				return unknownNode(node);
		}
	}

	private unary(node: AST.UnaryOperatorNode): AST.SqlNode {
		if (isLogicalNot(node) && isOperator(node.operand) && isNegatable(node.operand)) {
			log('Collapsing NOT over %s', node.operand.kind);
			return this.visit(negate(node.operand));
		}
		return { ...node, operand: this.visit(node.operand) };
	}

	private all(nodes: NonEmptyArray<AST.SqlNode>): NonEmptyArray<AST.SqlNode> {
		return mapNonEmpty(nodes, node => this.visit(node));
	}

	private orderByItem(item: AST.OrderByItemNode): AST.OrderByItemNode {
		return { ...item, expr: this.visit(item.expr) };
	}

	private join(node: AST.JoinNode): AST.JoinNode {
		return this.nested(() => this.joinParts(node));
	}

	private joinParts(node: AST.JoinNode): AST.JoinNode {
		return { ...node, left: this.fromItem(node.left), right: this.fromItem(node.right), on: this.visit(node.on) };
	}

	private fromItem(item: AST.FromItemNode): AST.FromItemNode {
		return this.nested(() => this.fromItemParts(item));
	}

	private fromItemParts(item: AST.FromItemNode): AST.FromItemNode {
		if (item.table) return item;
		if (item.subquery) return { ...item, subquery: { ...item.subquery, select: this.select(item.subquery.select) } };
		if (item.join) return { ...item, join: this.join(item.join) };
		return item;
	}

	private select(stmt: AST.SelectNode): AST.SelectNode {
		return this.nested(() => this.selectClauses(stmt));
	}

	private selectClauses(stmt: AST.SelectNode): AST.SelectNode {
		const { from, where, groupBy, having, orderBy, limit, offset } = stmt;
		return {
			...stmt,
			columns: this.all(stmt.columns),
			...(from && { from: { ...from, item: this.fromItem(from.item) } }),
			...(where && { where: { ...where, expr: this.visit(where.expr) } }),
			...(groupBy && { groupBy: { ...groupBy, exprs: this.all(groupBy.exprs) } }),
			...(having && { having: { ...having, expr: this.visit(having.expr) } }),
			...(orderBy && { orderBy: { ...orderBy, items: mapNonEmpty(orderBy.items, item => this.orderByItem(item)) } }),
			...(limit && { limit: { ...limit, expr: this.visit(limit.expr) } }),
			...(offset && { offset: { ...offset, expr: this.visit(offset.expr) } }),
		};
	}
}

function mapNonEmpty<T, U>(items: NonEmptyArray<T>, fn: (item: T) => U): NonEmptyArray<U> {
	const [first, ...rest] = items;
	return [fn(first), ...rest.map(fn)];
}
