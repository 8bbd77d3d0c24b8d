import type { OperatorNode, SqlNode } from '../ast/ast.js';
import { OperatorKind } from '../common/constants.js';
import { MisuseError } from '../common/errors.js';

/** True for the logical NOT, which negates by unwrapping its operand. */
export function isLogicalNot(op: OperatorNode): boolean {
	return op.type === 'unary' && op.kind === OperatorKind.Not;
}

/**
 * Whether the operator can produce its logical negation without a NOT wrapper.
 * NOT itself always can.
 */
export function isNegatable(op: OperatorNode): boolean {
	if (isLogicalNot(op)) return true;
	switch (op.type) {
		case 'unary':
		case 'binary':
			return op.negated !== undefined && op.negated.symbol !== '';
		case 'ternary':
			return op.negated !== undefined && op.negated.symbols[0] !== '' && op.negated.symbols[1] !== '';
	}
}

/**
 * Returns the negated counterpart of an operator.
 * Kind and symbol(s) swap with the stored counterpart; operands and overrides carry over.
 * NOT negates to its operand unchanged.
 */
export function negate(op: OperatorNode): SqlNode {
	if (!isNegatable(op)) {
		throw new MisuseError(`Operator '${op.kind}' has no negated form`);
	}
	switch (op.type) {
		case 'unary': {
			if (op.kind === OperatorKind.Not) return op.operand;
			const { negated } = op;
			if (!negated) throw new MisuseError(`Operator '${op.kind}' has no negated form`);
			return { ...op, kind: negated.kind, symbol: negated.symbol, negated: { kind: op.kind, symbol: op.symbol } };
		}
		case 'binary': {
			const { negated } = op;
			if (!negated) throw new MisuseError(`Operator '${op.kind}' has no negated form`);
			return { ...op, kind: negated.kind, symbol: negated.symbol, negated: { kind: op.kind, symbol: op.symbol } };
		}
		case 'ternary': {
			const { negated } = op;
			if (!negated) throw new MisuseError(`Operator '${op.kind}' has no negated form`);
			return { ...op, kind: negated.kind, symbols: negated.symbols, negated: { kind: op.kind, symbols: op.symbols } };
		}
	}
}
