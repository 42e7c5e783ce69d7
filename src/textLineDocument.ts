import type { CursorPosition, LineDocument } from "./types";

/**
 * LineDocument over an in-memory list of lines
 */
export class TextLineDocument implements LineDocument {
	private readonly lines: string[];
	private cursor: CursorPosition = { line: 0, column: 0 };
	/** Line last scrolled into the centre of the view */
	centeredLine: number | undefined;

	constructor(text: string | string[]) {
		this.lines = typeof text === "string" ? text.split("\n") : [...text];
		if (this.lines.length === 0) {
			this.lines.push("");
		}
	}

	get lineCount(): number {
		return this.lines.length;
	}

	getText(): string {
		return this.lines.join("\n");
	}

	getLines(): string[] {
		return [...this.lines];
	}

	lineAt(line: number): string {
		const text = this.lines[line];
		if (text === undefined) {
			throw new RangeError(`Line ${line} is out of range`);
		}
		return text;
	}

	getCursor(): CursorPosition {
		return { ...this.cursor };
	}

	setCursor(position: CursorPosition): void {
		const line = Math.max(0, Math.min(position.line, this.lines.length - 1));
		const column = Math.max(
			0,
			Math.min(position.column, this.lines[line].length),
		);
		this.cursor = { line, column };
	}

	async replace(
		line: number,
		startColumn: number,
		endColumn: number,
		text: string,
	): Promise<void> {
		const current = this.lineAt(line);
		this.lines[line] =
			current.slice(0, startColumn) + text + current.slice(endColumn);
	}

	async typeText(text: string): Promise<void> {
		const { line, column } = this.cursor;
		await this.replace(line, column, column, text);
		this.cursor = { line, column: column + text.length };
	}

	revealCursorInCenter(): void {
		this.centeredLine = this.cursor.line;
	}
}
