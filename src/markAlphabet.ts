import type { MarkBinding } from "./types";

export class MarkAlphabetError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MarkAlphabetError";
	}
}

/**
 * Validated, ordered set of mark bindings. The first binding is the default
 * mark used when advancing.
 */
export class MarkAlphabet {
	private readonly bindings: readonly MarkBinding[];
	private readonly glyphsByKey: Map<string, string> = new Map();

	constructor(bindings: readonly MarkBinding[]) {
		if (bindings.length === 0) {
			throw new MarkAlphabetError("Mark alphabet must not be empty");
		}

		const seenGlyphs: string[] = [];
		for (const { key, glyph } of bindings) {
			if ([...key].length !== 1) {
				throw new MarkAlphabetError(
					`Mark key must be a single character: "${key}"`,
				);
			}
			if (glyph.length === 0) {
				throw new MarkAlphabetError(`Glyph for key "${key}" is empty`);
			}
			if (this.glyphsByKey.has(key)) {
				throw new MarkAlphabetError(`Duplicate mark key "${key}"`);
			}
			// A glyph that prefixes another would make a line carry both.
			const clash = seenGlyphs.find(
				(other) => other.startsWith(glyph) || glyph.startsWith(other),
			);
			if (clash !== undefined) {
				throw new MarkAlphabetError(
					clash === glyph
						? `Duplicate glyph "${glyph}"`
						: `Glyphs "${clash}" and "${glyph}" overlap`,
				);
			}
			seenGlyphs.push(glyph);
			this.glyphsByKey.set(key, glyph);
		}

		this.bindings = bindings.map((binding) => ({ ...binding }));
	}

	get defaultGlyph(): string {
		return this.bindings[0].glyph;
	}

	get keys(): string[] {
		return this.bindings.map((binding) => binding.key);
	}

	glyphForKey(key: string): string | undefined {
		return this.glyphsByKey.get(key);
	}

	/**
	 * Get the binding whose glyph starts the line, if any
	 */
	markOf(text: string): MarkBinding | undefined {
		return this.bindings.find((binding) => text.startsWith(binding.glyph));
	}

	isMarked(text: string): boolean {
		return this.markOf(text) !== undefined;
	}
}
