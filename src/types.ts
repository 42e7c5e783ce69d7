/**
 * A single key-to-glyph mark binding
 */
export interface MarkBinding {
	/** Character typed at the start of a line to toggle this mark */
	key: string;
	/** Text placed at the start of the line */
	glyph: string;
}

/**
 * Cursor location (both 0-based)
 */
export interface CursorPosition {
	line: number;
	column: number;
}

/**
 * Explicit document/cursor handle the marker operates on
 */
export interface LineDocument {
	readonly lineCount: number;
	lineAt(line: number): string;
	getCursor(): CursorPosition;
	setCursor(position: CursorPosition): void;
	/** Replace `[startColumn, endColumn)` of a line with `text` */
	replace(
		line: number,
		startColumn: number,
		endColumn: number,
		text: string,
	): Promise<void>;
	/** Ordinary character insertion at the cursor */
	typeText(text: string): Promise<void>;
	revealCursorInCenter(): void;
}

export interface Logger {
	info(message: string): void;
	warn(message: string): void;
	error(message: string | Error): void;
}

export const ACTION_NAMES = [
	"advanceAndMark",
	"advanceMarkAndSearch",
	"previousLine",
	"nextUnmarked",
	"jumpToItem",
	"searchFavourites",
	"searchDuckDuckGo",
	"searchWikipedia",
	"searchBrowser",
	"searchDictionary",
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type ActionKeyMap = Record<ActionName, string>;

/**
 * A lookup returns a non-empty string on success, "" when it found nothing
 */
export type LookupStrategy = (query: string) => Promise<string>;

export interface LineMarkerConfig {
	marks: MarkBinding[];
	actionKeys: ActionKeyMap;
	dictionaryHost: string;
	wikipediaLanguage: string;
	lookupTimeoutMs: number;
}
