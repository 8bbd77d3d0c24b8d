/**
 * Assigns 1-based positions to placeholder names for one render pass.
 * A name seen again reuses its first position.
 */
export class PlaceholderBinder {
	private readonly positions = new Map<string, number>();

	bind(name: string): number {
		const existing = this.positions.get(name);
		if (existing !== undefined) {
			return existing;
		}
		const position = this.positions.size + 1;
		this.positions.set(name, position);
		return position;
	}

	positionOf(name: string): number | undefined {
		return this.positions.get(name);
	}

	/** Bound names, in position order */
	get names(): readonly string[] {
		return [...this.positions.keys()];
	}

	get size(): number {
		return this.positions.size;
	}
}
