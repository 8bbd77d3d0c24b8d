import { expect } from 'chai';
import type { FromItemNode } from '../src/ast/ast.js';
import {
	asc, caseWhen, cast, column, desc, func, func0, labeledColumn, labeledSelect, labeledTable, leftJoin,
	literal, nullsFirst, nullsLast, select, subquery, table, tuple, verbatim, join,
} from '../src/ast/builders.js';
import { eq, gt, gte, inList, lt } from '../src/ast/operators.js';
import { placeholder } from '../src/ast/placeholders.js';
import { decimal, TEXT } from '../src/ast/types.js';
import { compile } from '../src/compile.js';
import { MisuseError, RenderError } from '../src/common/errors.js';
import { ErrorCode } from '../src/common/types.js';
import { expectComposerError, sql } from './helpers/sql.js';

describe('Rendering', () => {
	describe('leaves', () => {
		it('escapes and formats literals', () => {
			expect(sql(literal("it's"))).to.equal("'it''s'");
			expect(sql(literal(null))).to.equal('NULL');
			expect(sql(literal(true))).to.equal('TRUE');
			expect(sql(literal(false))).to.equal('FALSE');
			expect(sql(literal(42))).to.equal('42');
			expect(sql(literal(-1.5))).to.equal('-1.5');
			expect(sql(literal(10n))).to.equal('10');
			expect(sql(literal(new Uint8Array([0xde, 0xad])))).to.equal("X'dead'");
		});

		it('rejects numbers SQL cannot spell', () => {
			for (const value of [NaN, Infinity, -Infinity]) {
				expectComposerError(() => literal(value), MisuseError, ErrorCode.Misuse);
			}
			expectComposerError(() => eq(column('a'), NaN), MisuseError, ErrorCode.Misuse);
		});

		it('emits verbatim text untouched', () => {
			expect(sql(verbatim("now() - interval '1 day'"))).to.equal("now() - interval '1 day'");
		});

		it('quotes identifiers only when needed', () => {
			expect(sql(column('id', 'u'))).to.equal('u.id');
			expect(sql(column('order'))).to.equal('"order"');
			expect(sql(column('weird name'))).to.equal('"weird name"');
			expect(sql(column('a"b'))).to.equal('"a""b"');
			expect(sql(column('order'), { dialect: 'mysql' })).to.equal('`order`');
		});

		it('qualifies tables with their schema', () => {
			expect(sql(table('users', 'public'))).to.equal('public.users');
			expect(sql(table('users'))).to.equal('users');
			expect(sql(labeledTable('events', 'e', 'audit'))).to.equal('audit.events e');
		});
	});

	describe('expressions', () => {
		it('renders casts', () => {
			expect(sql(cast(column('a'), decimal(10, 2)))).to.equal('CAST(a AS DECIMAL(10,2))');
			expect(sql(cast(1, TEXT))).to.equal('CAST(1 AS TEXT)');
		});

		it('renders function calls', () => {
			expect(sql(func('coalesce')(column('a'), 0))).to.equal('coalesce(a,0)');
			expect(sql(func('now')())).to.equal('now()');
			expect(sql(func0('CURRENT_TIMESTAMP'))).to.equal('CURRENT_TIMESTAMP');
			expect(sql(func('pg_catalog.lower')(column('a')))).to.equal('pg_catalog.lower(a)');
		});

		it('rejects illegal function names at construction', () => {
			expectComposerError(() => func('1abc'), MisuseError, ErrorCode.Misuse);
			expectComposerError(() => func('drop table;'), MisuseError, ErrorCode.Misuse);
			expectComposerError(() => func0(''), MisuseError, ErrorCode.Misuse);
		});

		it('renders CASE expressions', () => {
			const a = column('a');
			const expr = caseWhen([[gt(a, 0), 'pos'], [lt(a, 0), 'neg']], 'zero');
			expect(sql(expr)).to.equal("CASE WHEN a > 0 THEN 'pos' WHEN a < 0 THEN 'neg' ELSE 'zero' END");
			expect(sql(caseWhen([[gt(a, 0), 1]]))).to.equal('CASE WHEN a > 0 THEN 1 END');
		});

		it('renders tuples with a bare comma', () => {
			expect(sql(tuple(1, 2, 3))).to.equal('(1,2,3)');
		});

		it('renders subqueries in parentheses', () => {
			const ids = subquery(select({ columns: [column('user_id')], from: labeledTable('orders', 'o') }));
			expect(sql(inList(column('id'), ids))).to.equal('id IN (SELECT user_id FROM orders o)');
		});
	});

	describe('SELECT', () => {
		it('renders every clause in order, separated by single spaces', () => {
			const count = func('count');
			const query = compile(select({
				columns: [column('id', 'u'), labeledColumn(count(column('id', 'o')), 'orders')],
				from: leftJoin(labeledTable('users', 'u'), labeledTable('orders', 'o'), eq(column('user_id', 'o'), column('id', 'u'))),
				where: gte(column('created', 'u'), placeholder('since')),
				groupBy: [column('id', 'u')],
				having: gt(count(column('id', 'o')), 5),
				orderBy: [nullsLast(desc(column('id', 'u'))), column('name', 'u')],
				limit: 10,
				offset: placeholder('skip'),
			}));
			expect(query.sql).to.equal(
				'SELECT u.id,count(o.id) orders FROM users u LEFT JOIN orders o ON o.user_id = u.id'
				+ ' WHERE u.created >= ? GROUP BY u.id HAVING count(o.id) > 5'
				+ ' ORDER BY u.id DESC NULLS LAST,u.name LIMIT 10 OFFSET ?',
			);
			expect(query.placeholders).to.deep.equal(['since', 'skip']);
		});

		it('omits absent clauses', () => {
			expect(sql(select({ columns: [1] }))).to.equal('SELECT 1');
			expect(sql(select({ columns: [column('a')], from: labeledTable('t', 'x'), limit: 1 }))).to.equal('SELECT a FROM t x LIMIT 1');
		});

		it('selects from a labeled subquery', () => {
			const inner = select({ columns: [labeledColumn(1, 'n')] });
			expect(sql(select({ columns: [column('n', 's')], from: labeledSelect(inner, 's') }))).to.equal('SELECT s.n FROM (SELECT 1 n) s');
		});

		it('chains joins', () => {
			const users = labeledTable('users', 'u');
			const orders = labeledTable('orders', 'o');
			const items = labeledTable('items', 'i');
			const from = join(join(users, orders, eq(column('user_id', 'o'), column('id', 'u'))), items, eq(column('order_id', 'i'), column('id', 'o')));
			expect(sql(select({ columns: [column('id', 'i')], from }))).to.equal(
				'SELECT i.id FROM users u JOIN orders o ON o.user_id = u.id JOIN items i ON i.order_id = o.id',
			);
		});

		it('spells out only non-default NULLS placement', () => {
			const a = column('a');
			const order = (item: ReturnType<typeof asc>) => sql(select({ columns: [a], orderBy: [item] }));
			expect(order(asc(a))).to.equal('SELECT a ORDER BY a');
			expect(order(nullsFirst(asc(a)))).to.equal('SELECT a ORDER BY a NULLS FIRST');
			expect(order(nullsLast(asc(a)))).to.equal('SELECT a ORDER BY a');
			expect(order(nullsFirst(desc(a)))).to.equal('SELECT a ORDER BY a DESC');
			expect(order(nullsLast(desc(a)))).to.equal('SELECT a ORDER BY a DESC NULLS LAST');
		});

		it('fails on a FROM item with no alternative populated', () => {
			const empty: FromItemNode = { type: 'fromItem' };
			expectComposerError(() => sql(select({ columns: [1], from: empty })), RenderError, ErrorCode.UnknownStructuralVariant);
		});
	});
});
