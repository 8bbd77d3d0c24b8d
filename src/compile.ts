import type { SqlNode } from './ast/ast.js';
import { DEFAULT_DIALECT, DEFAULT_MAX_DEPTH, type DialectName } from './common/constants.js';
import { MisuseError, PlaceholderError } from './common/errors.js';
import { createLogger } from './common/logger.js';
import { ErrorCode, type SqlParameters, type SqlValue } from './common/types.js';
import { getDialect, type Dialect } from './render/dialect.js';
import { OutputContext } from './render/output-context.js';
import { renderNode } from './render/render.js';
import { rewrite } from './rewrite/rewrite.js';

const log = createLogger('compile');
const errorLog = log.extend('error');

export interface CompileOptions {
	/** A dialect object or the name of a built-in one. Defaults to 'standard' (`?` placeholders). */
	dialect?: Dialect | DialectName;
	/** Deepest nesting accepted before failing with DepthLimitExceeded */
	maxDepth?: number;
}

export interface ResolvedCompileOptions {
	dialect: Dialect;
	maxDepth: number;
}

export function resolveCompileOptions(options: CompileOptions = {}): ResolvedCompileOptions {
	const { dialect = DEFAULT_DIALECT, maxDepth = DEFAULT_MAX_DEPTH } = options;
	if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
		throw new MisuseError(`maxDepth must be a positive integer, got ${maxDepth}`);
	}
	return {
		dialect: typeof dialect === 'string' ? getDialect(dialect) : dialect,
		maxDepth,
	};
}

/**
 * Result of rendering a statement: the text and the placeholder names in position order.
 */
export class CompiledQuery {
	constructor(
		public readonly sql: string,
		public readonly placeholders: readonly string[],
	) {}

	/**
	 * Orders named values by placeholder position, ready to hand to a driver.
	 * Every placeholder needs a value, and every value must belong to a placeholder.
	 */
	bind(values: SqlParameters): SqlValue[] {
		const known = new Set(this.placeholders);
		for (const key of Object.keys(values)) {
			if (!known.has(key)) {
				throw new PlaceholderError(`No placeholder named '${key}'`, ErrorCode.UnknownInputKey);
			}
		}
		return this.placeholders.map(name => {
			if (!Object.hasOwn(values, name)) {
				throw new PlaceholderError(`No value supplied for placeholder '${name}'`, ErrorCode.UnboundPlaceholder);
			}
			return values[name];
		});
	}

	toString(): string {
		return this.sql;
	}
}

/** Renders a tree as-is, without the rewrite pass. */
export function render(node: SqlNode, options?: CompileOptions): CompiledQuery {
	const { dialect, maxDepth } = resolveCompileOptions(options);
	const ctx = new OutputContext(dialect, maxDepth);
	try {
		renderNode(node, ctx);
	} catch (e) {
		errorLog('Rendering %s failed: %O', node.type, e);
		throw e;
	}
	log('Rendered (%s): %s [%d placeholder(s)]', dialect.name, ctx.text, ctx.placeholders.length);
	return new CompiledQuery(ctx.text, ctx.placeholders);
}

/**
 * Canonicalizes a tree and renders it.
 * Any failure aborts the whole pass; no partial text is returned.
 */
export function compile(node: SqlNode, options?: CompileOptions): CompiledQuery {
	const resolved = resolveCompileOptions(options);
	return render(rewrite(node, resolved.maxDepth), resolved);
}
