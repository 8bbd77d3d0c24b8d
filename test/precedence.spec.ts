import { expect } from 'chai';
import { column } from '../src/ast/builders.js';
import {
	add, between, binaryOperator, mul, ternaryOperator, unaryOperator, withAssociativity, withPrecedence,
} from '../src/ast/operators.js';
import { Associativity, OperatorKind } from '../src/common/constants.js';
import { MisuseError, RenderError } from '../src/common/errors.js';
import { ErrorCode } from '../src/common/types.js';
import { resolveAssociativity, resolvePrecedence, type OperatorTables } from '../src/operator/precedence.js';
import { expectComposerError } from './helpers/sql.js';

// Knows only ADD
const tables: OperatorTables = {
	precedenceFor: kind => kind === OperatorKind.Add ? 9 : undefined,
	associativityFor: kind => kind === OperatorKind.Add ? Associativity.Left : undefined,
};

describe('Precedence resolution', () => {
	const a = column('a');
	const b = column('b');

	describe('resolvePrecedence', () => {
		it('falls back to the dialect table', () => {
			expect(resolvePrecedence(add(a, b), tables)).to.equal(9);
		});

		it('prefers the operator override', () => {
			expect(resolvePrecedence(withPrecedence(add(a, b), 3), tables)).to.equal(3);
		});

		it('uses an override when the dialect has no entry', () => {
			expect(resolvePrecedence(withPrecedence(mul(a, b), 4), tables)).to.equal(4);
		});

		it('treats a stored zero override as unset', () => {
			const handBuilt = { ...add(a, b), precedence: 0 };
			expect(resolvePrecedence(handBuilt, tables)).to.equal(9);
		});

		it('fails with PrecedenceUndefined when neither source has a value', () => {
			expectComposerError(() => resolvePrecedence(mul(a, b), tables), RenderError, ErrorCode.PrecedenceUndefined);
			expectComposerError(() => resolvePrecedence(between(a, 1, 2), tables), RenderError, ErrorCode.PrecedenceUndefined);
		});

		it('treats a zero dialect entry as undefined', () => {
			const zeroed: OperatorTables = { ...tables, precedenceFor: () => 0 };
			expectComposerError(() => resolvePrecedence(add(a, b), zeroed), RenderError, ErrorCode.PrecedenceUndefined);
		});
	});

	describe('resolveAssociativity', () => {
		it('falls back to the dialect table', () => {
			expect(resolveAssociativity(add(a, b), tables)).to.equal(Associativity.Left);
		});

		it('prefers the operator override', () => {
			expect(resolveAssociativity(withAssociativity(add(a, b), Associativity.Right), tables)).to.equal(Associativity.Right);
		});

		it('fails with AssociativityUndefined when neither source has a value', () => {
			expectComposerError(() => resolveAssociativity(mul(a, b), tables), RenderError, ErrorCode.AssociativityUndefined);
		});
	});

	describe('withPrecedence', () => {
		it('rejects zero, negative and fractional levels', () => {
			for (const level of [0, -1, 1.5]) {
				expectComposerError(() => withPrecedence(add(a, b), level), MisuseError, ErrorCode.Misuse);
			}
		});

		it('does not modify the original operator', () => {
			const original = add(a, b);
			const raised = withPrecedence(original, 20);
			expect(raised.precedence).to.equal(20);
			expect(original.precedence).to.be.undefined;
		});
	});

	describe('operator constructors', () => {
		it('leave out overrides passed as undefined', () => {
			const unary = unaryOperator(OperatorKind.Not, 'NOT', a, { precedence: undefined, associativity: undefined });
			expect(Object.keys(unary)).to.deep.equal(['type', 'kind', 'symbol', 'operand']);
			const binary = binaryOperator(OperatorKind.Add, '+', a, b, { negated: undefined, suppressSpace: undefined });
			expect(Object.keys(binary)).to.deep.equal(['type', 'kind', 'symbol', 'left', 'right']);
			const ternary = ternaryOperator(OperatorKind.Between, ['BETWEEN', 'AND'], [a, 1, 2], { precedence: undefined });
			expect(Object.keys(ternary)).to.deep.equal(['type', 'kind', 'symbols', 'operands']);
		});

		it('keep the overrides that are set', () => {
			const unary = unaryOperator(OperatorKind.Not, 'NOT', a, { precedence: 7, associativity: Associativity.Right });
			expect(unary).to.include({ precedence: 7, associativity: Associativity.Right });
			expect(binaryOperator(OperatorKind.Add, '+', a, b, { suppressSpace: false })).to.have.property('suppressSpace', false);
		});
	});
});
