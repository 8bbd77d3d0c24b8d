import type { SqlTypeNode } from './ast.js';

export function sqlType(name: string): SqlTypeNode {
	return { type: 'sqlType', name };
}

export const SMALLINT = sqlType('SMALLINT');
export const INTEGER = sqlType('INTEGER');
export const BIGINT = sqlType('BIGINT');
export const BOOLEAN = sqlType('BOOLEAN');
export const REAL = sqlType('REAL');
export const DOUBLE_PRECISION = sqlType('DOUBLE PRECISION');
export const TEXT = sqlType('TEXT');
export const TIMESTAMP = sqlType('TIMESTAMP');

export function decimal(precision: number, scale: number): SqlTypeNode {
	return sqlType(`DECIMAL(${precision},${scale})`);
}
