import { expect } from 'chai';
import { column, labeledTable, select, tuple } from '../src/ast/builders.js';
import {
	add, and, between, eq, inList, isNotNull, isNull, isTrue, like, negative, not, withPrecedence,
} from '../src/ast/operators.js';
import type { SqlNode } from '../src/ast/ast.js';
import { OperatorKind } from '../src/common/constants.js';
import { MisuseError, RenderError } from '../src/common/errors.js';
import { ErrorCode } from '../src/common/types.js';
import { isNegatable, negate } from '../src/operator/capabilities.js';
import { rewrite } from '../src/rewrite/rewrite.js';
import { expectComposerError, joinChain, nestedSubqueries, raw, sql } from './helpers/sql.js';

const a = column('a');
const b = column('b');
const x = column('x');

describe('Negation normalization', () => {
	it('collapses NOT over IS NULL into IS NOT NULL', () => {
		expect(raw(rewrite(not(isNull(x))))).to.equal(raw(isNotNull(x)));
		expect(sql(not(isNull(x)))).to.equal('x IS NOT NULL');
	});

	it('cancels a double NOT', () => {
		expect(sql(not(not(eq(a, b))))).to.equal(sql(eq(a, b)));
		expect(sql(not(not(eq(a, b))))).to.equal('a = b');
	});

	it('cancels a double NOT over an operand that is not negatable', () => {
		expect(sql(not(not(add(a, b))))).to.equal('a + b');
		expect(sql(not(not(a)))).to.equal('a');
	});

	it('keeps collapsing through several levels', () => {
		expect(sql(not(not(not(isNull(x)))))).to.equal('x IS NOT NULL');
	});

	it('swaps negatable binary and ternary operators', () => {
		expect(sql(not(eq(a, 1)))).to.equal('a <> 1');
		expect(sql(not(inList(a, tuple(1, 2))))).to.equal('a NOT IN (1,2)');
		expect(sql(not(like(a, 'x%')))).to.equal("a NOT LIKE 'x%'");
		expect(sql(not(between(x, 1, 2)))).to.equal('x NOT BETWEEN 1 AND 2');
	});

	it('keeps NOT over operands that are not negatable', () => {
		expect(sql(not(a))).to.equal('NOT a');
		expect(sql(not(and(a, b)))).to.equal('NOT (a AND b)');
	});

	it('collapses negations nested below other nodes', () => {
		expect(sql(and(not(eq(a, 1)), not(isTrue(b))))).to.equal('a <> 1 AND b IS NOT TRUE');
		const query = select({ columns: [a], from: labeledTable('t', 'x'), where: not(isNull(a)) });
		expect(sql(query)).to.equal('SELECT a FROM t x WHERE a IS NOT NULL');
	});

	it('is idempotent', () => {
		const tree: SqlNode = select({
			columns: [a, negative(b)],
			where: and(not(eq(a, 1)), not(and(a, b))),
		});
		const once = rewrite(tree);
		expect(rewrite(once)).to.deep.equal(once);
	});

	it('leaves the input tree untouched', () => {
		const tree = not(isNull(x));
		const before = JSON.stringify(tree);
		const result = rewrite(tree);
		expect(JSON.stringify(tree)).to.equal(before);
		expect(tree.operand).to.have.property('kind', OperatorKind.IsNull);
		expect(result).to.have.property('kind', OperatorKind.IsNotNull);
	});

	it('fails with DepthLimitExceeded beyond the nesting limit', () => {
		let deep: SqlNode = a;
		for (let i = 0; i < 20; i++) deep = negative(deep);
		expectComposerError(() => rewrite(deep, 10), RenderError, ErrorCode.DepthLimitExceeded);
		expect(rewrite(deep, 21)).to.deep.equal(deep);
	});

	it('counts joins toward the nesting limit', () => {
		const query = joinChain(50);
		expectComposerError(() => rewrite(query, 10), RenderError, ErrorCode.DepthLimitExceeded);
		expect(rewrite(query, 200)).to.deep.equal(query);
	});

	it('counts nested FROM subqueries toward the nesting limit', () => {
		const query = nestedSubqueries(30);
		expectComposerError(() => rewrite(query, 10), RenderError, ErrorCode.DepthLimitExceeded);
		expect(rewrite(query, 200)).to.deep.equal(query);
	});
});

describe('Operator negation', () => {
	it('reports negatability', () => {
		expect(isNegatable(not(a))).to.be.true;
		expect(isNegatable(eq(a, b))).to.be.true;
		expect(isNegatable(between(a, 1, 2))).to.be.true;
		expect(isNegatable(add(a, b))).to.be.false;
		expect(isNegatable(negative(a))).to.be.false;
	});

	it('swaps kind and symbol while keeping operands and overrides', () => {
		const negated = negate(withPrecedence(eq(a, b), 42));
		expect(negated).to.deep.equal({
			type: 'binary',
			kind: OperatorKind.NotEq,
			symbol: '<>',
			left: a,
			right: b,
			negated: { kind: OperatorKind.Eq, symbol: '=' },
			precedence: 42,
		});
	});

	it('swaps both symbols of a ternary operator', () => {
		const negated = negate(between(a, 1, 2));
		expect(negated).to.have.property('kind', OperatorKind.NotBetween);
		expect(negated).to.have.deep.property('symbols', ['NOT BETWEEN', 'AND']);
		expect(negated).to.have.deep.property('negated', { kind: OperatorKind.Between, symbols: ['BETWEEN', 'AND'] });
	});

	it('unwraps NOT', () => {
		expect(negate(not(a))).to.equal(a);
	});

	it('refuses to negate an operator without a counterpart', () => {
		expectComposerError(() => negate(add(a, b)), MisuseError, ErrorCode.Misuse);
	});
});
