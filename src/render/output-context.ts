import type { Associativity, OperatorKind } from '../common/constants.js';
import { DEFAULT_MAX_DEPTH } from '../common/constants.js';
import { RenderError } from '../common/errors.js';
import { ErrorCode } from '../common/types.js';
import type { OperatorTables } from '../operator/precedence.js';
import type { Dialect } from './dialect.js';
import { PlaceholderBinder } from './placeholder-binder.js';

/**
 * Collects the text and placeholder bindings of a single render pass.
 * One context per pass; contexts share nothing, so independent trees can render side by side.
 */
export class OutputContext implements OperatorTables {
	private readonly parts: string[] = [];
	private readonly binder = new PlaceholderBinder();
	private depth = 0;

	constructor(
		public readonly dialect: Dialect,
		private readonly maxDepth: number = DEFAULT_MAX_DEPTH,
	) {}

	appendLiteral(text: string): void {
		this.parts.push(text);
	}

	appendIdentifier(name: string): void {
		this.parts.push(this.dialect.quoteIdentifier(name));
	}

	precedenceFor(kind: OperatorKind): number | undefined {
		return this.dialect.precedence[kind];
	}

	associativityFor(kind: OperatorKind): Associativity | undefined {
		return this.dialect.associativity[kind];
	}

	bindPlaceholder(name: string): number {
		return this.binder.bind(name);
	}

	renderPlaceholder(name: string, position: number): string {
		return this.dialect.renderPlaceholder(name, position);
	}

	/** Tracks nesting so runaway trees fail with a typed error rather than a stack overflow. */
	enter(): void {
		if (++this.depth > this.maxDepth) {
			throw new RenderError(`Expression nesting exceeds ${this.maxDepth} levels`, ErrorCode.DepthLimitExceeded);
		}
	}

	leave(): void {
		this.depth--;
	}

	get text(): string {
		return this.parts.join('');
	}

	/** Placeholder names in position order */
	get placeholders(): readonly string[] {
		return this.binder.names;
	}
}
