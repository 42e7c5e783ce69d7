import { findItem } from "./itemPattern";
import { MarkAlphabet } from "./markAlphabet";
import type { LineDocument } from "./types";

export interface AdvanceResult {
	/** Line the cursor ended on */
	line: number;
	/** True when the default mark was inserted on that line */
	marked: boolean;
}

/**
 * Mark toggling, line classification and navigation over a LineDocument
 */
export class LineMarker {
	constructor(private readonly alphabet: MarkAlphabet) {}

	getAlphabet(): MarkAlphabet {
		return this.alphabet;
	}

	isMarked(text: string): boolean {
		return this.alphabet.isMarked(text);
	}

	/**
	 * Remove `glyph` if it already marks the current line, replace any other
	 * mark with it, otherwise insert it at the start of the line.
	 */
	async toggleMark(doc: LineDocument, glyph: string): Promise<void> {
		const { line } = doc.getCursor();
		const text = doc.lineAt(line);
		const current = this.alphabet.markOf(text);

		if (current?.glyph === glyph) {
			await doc.replace(line, 0, glyph.length, "");
		} else if (current) {
			await doc.replace(line, 0, current.glyph.length, glyph);
		} else {
			await doc.replace(line, 0, 0, glyph);
		}

		doc.setCursor({ line, column: 0 });
	}

	/**
	 * Move to the next line and give it the default mark unless it already
	 * carries one.
	 */
	async advanceAndMark(doc: LineDocument): Promise<AdvanceResult> {
		const line = this.moveBy(doc, 1);
		doc.revealCursorInCenter();

		if (this.isMarked(doc.lineAt(line))) {
			return { line, marked: false };
		}

		await doc.replace(line, 0, 0, this.alphabet.defaultGlyph);
		doc.setCursor({ line, column: 0 });
		return { line, marked: true };
	}

	previousLine(doc: LineDocument): number {
		const line = this.moveBy(doc, -1);
		doc.revealCursorInCenter();
		return line;
	}

	/**
	 * From a marked line, move to the last marked line of its run. Does
	 * nothing on an unmarked line.
	 */
	moveToLastMarkedOfRun(doc: LineDocument): number {
		const start = doc.getCursor().line;
		if (!this.isMarked(doc.lineAt(start))) {
			return start;
		}

		let line = start;
		while (line + 1 < doc.lineCount && this.isMarked(doc.lineAt(line + 1))) {
			line += 1;
		}

		doc.setCursor({ line, column: 0 });
		doc.revealCursorInCenter();
		return line;
	}

	/**
	 * Item on the current line, searched from the cursor column and never
	 * inside the line's mark
	 */
	extractItem(doc: LineDocument): string | undefined {
		const { line, column } = doc.getCursor();
		const text = doc.lineAt(line);
		return findItem(text, Math.max(column, this.markLength(text)))?.text;
	}

	/**
	 * Put the cursor on the first character of the line's item
	 */
	jumpToItem(doc: LineDocument): boolean {
		const { line } = doc.getCursor();
		const text = doc.lineAt(line);
		const match = findItem(text, this.markLength(text));
		if (!match) {
			return false;
		}
		doc.setCursor({ line, column: match.column });
		return true;
	}

	private markLength(text: string): number {
		return this.alphabet.markOf(text)?.glyph.length ?? 0;
	}

	private moveBy(doc: LineDocument, delta: number): number {
		const lastLine = Math.max(0, doc.lineCount - 1);
		const line = Math.max(
			0,
			Math.min(doc.getCursor().line + delta, lastLine),
		);
		doc.setCursor({ line, column: 0 });
		return line;
	}
}
