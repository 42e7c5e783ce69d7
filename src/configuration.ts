import { MarkAlphabet, MarkAlphabetError } from "./markAlphabet";
import { ACTION_NAMES } from "./types";
import type {
	ActionKeyMap,
	ActionName,
	LineMarkerConfig,
	MarkBinding,
} from "./types";

export const CONFIG_SECTION = "lineMarker";

export const DEFAULT_MARKS: readonly MarkBinding[] = [
	{ key: "#", glyph: "#" },
	{ key: "?", glyph: "?" },
	{ key: "!", glyph: "!" },
];

export const DEFAULT_ACTION_KEYS: Readonly<ActionKeyMap> = {
	advanceAndMark: "n",
	advanceMarkAndSearch: "N",
	previousLine: "p",
	nextUnmarked: "u",
	jumpToItem: "e",
	searchFavourites: "f",
	searchDuckDuckGo: "d",
	searchWikipedia: "w",
	searchBrowser: "b",
	searchDictionary: "l",
};

export const DEFAULT_CONFIG: Readonly<LineMarkerConfig> = {
	marks: [...DEFAULT_MARKS],
	actionKeys: { ...DEFAULT_ACTION_KEYS },
	dictionaryHost: "lexin.udir.no",
	wikipediaLanguage: "en",
	lookupTimeoutMs: 8000,
};

/** Reads one raw setting value, `undefined` when unset */
export type SettingReader = (key: string) => unknown;

export interface ParsedConfiguration {
	config: LineMarkerConfig;
	alphabet: MarkAlphabet;
	/** Settings that were rejected and replaced by their defaults */
	warnings: string[];
	/** Set when the configured alphabet was rejected */
	alphabetError?: MarkAlphabetError;
}

function isSingleCharacter(value: unknown): value is string {
	return typeof value === "string" && [...value].length === 1;
}

function parseMarks(value: unknown): MarkBinding[] {
	if (!Array.isArray(value)) {
		throw new MarkAlphabetError("marks must be a list of { key, glyph }");
	}
	return value.map((entry: unknown, index) => {
		if (typeof entry !== "object" || entry === null) {
			throw new MarkAlphabetError(`marks[${index}] is not an object`);
		}
		const key: unknown = Reflect.get(entry, "key");
		const glyph: unknown = Reflect.get(entry, "glyph");
		if (typeof key !== "string" || typeof glyph !== "string") {
			throw new MarkAlphabetError(
				`marks[${index}] needs string "key" and "glyph"`,
			);
		}
		return { key, glyph };
	});
}

function parseActionKeys(value: unknown, warnings: string[]): ActionKeyMap {
	const actionKeys: ActionKeyMap = { ...DEFAULT_ACTION_KEYS };
	if (value === undefined) {
		return actionKeys;
	}
	if (typeof value !== "object" || value === null) {
		warnings.push("actionKeys must be an object; using defaults");
		return actionKeys;
	}

	for (const action of ACTION_NAMES) {
		const key: unknown = Reflect.get(value, action);
		if (key === undefined) {
			continue;
		}
		if (isSingleCharacter(key)) {
			actionKeys[action] = key;
		} else {
			warnings.push(`actionKeys.${action} must be a single character`);
		}
	}

	const seen = new Map<string, ActionName>();
	for (const action of ACTION_NAMES) {
		const previous = seen.get(actionKeys[action]);
		if (previous) {
			warnings.push(
				`actionKeys.${action} reuses "${actionKeys[action]}" from ${previous}; using defaults`,
			);
			return { ...DEFAULT_ACTION_KEYS };
		}
		seen.set(actionKeys[action], action);
	}
	return actionKeys;
}

function buildAlphabet(
	marks: MarkBinding[],
	actionKeys: ActionKeyMap,
): MarkAlphabet {
	const alphabet = new MarkAlphabet(marks);
	const actionKeySet = new Set(Object.values(actionKeys));
	const collision = alphabet.keys.find((key) => actionKeySet.has(key));
	if (collision !== undefined) {
		throw new MarkAlphabetError(
			`Mark key "${collision}" is already bound to an action`,
		);
	}
	return alphabet;
}

function parseString(
	name: string,
	value: unknown,
	fallback: string,
	warnings: string[],
): string {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || value.trim().length === 0) {
		warnings.push(`${name} must be a non-empty string`);
		return fallback;
	}
	return value.trim();
}

function parseTimeout(value: unknown, warnings: string[]): number {
	if (value === undefined) {
		return DEFAULT_CONFIG.lookupTimeoutMs;
	}
	if (typeof value !== "number" || !Number.isFinite(value) || value < 1) {
		warnings.push("lookupTimeoutMs must be at least 1");
		return DEFAULT_CONFIG.lookupTimeoutMs;
	}
	return Math.floor(value);
}

/**
 * Turn raw settings into a validated configuration. Invalid settings fall
 * back to their defaults.
 */
export function parseConfiguration(read: SettingReader): ParsedConfiguration {
	const warnings: string[] = [];
	let actionKeys = parseActionKeys(read("actionKeys"), warnings);
	let marks: MarkBinding[] = [...DEFAULT_MARKS];
	let alphabet: MarkAlphabet;
	let alphabetError: MarkAlphabetError | undefined;

	try {
		const rawMarks = read("marks");
		if (rawMarks !== undefined) {
			marks = parseMarks(rawMarks);
		}
		alphabet = buildAlphabet(marks, actionKeys);
	} catch (error) {
		if (!(error instanceof MarkAlphabetError)) {
			throw error;
		}
		alphabetError = error;
		marks = [...DEFAULT_MARKS];
		try {
			alphabet = buildAlphabet(marks, actionKeys);
		} catch (fallbackError) {
			if (!(fallbackError instanceof MarkAlphabetError)) {
				throw fallbackError;
			}
			// Custom action keys clash with the default marks.
			warnings.push(fallbackError.message);
			actionKeys = { ...DEFAULT_ACTION_KEYS };
			alphabet = buildAlphabet(marks, actionKeys);
		}
	}

	return {
		config: {
			marks,
			actionKeys,
			dictionaryHost: parseString(
				"dictionaryHost",
				read("dictionaryHost"),
				DEFAULT_CONFIG.dictionaryHost,
				warnings,
			),
			wikipediaLanguage: parseString(
				"wikipediaLanguage",
				read("wikipediaLanguage"),
				DEFAULT_CONFIG.wikipediaLanguage,
				warnings,
			),
			lookupTimeoutMs: parseTimeout(read("lookupTimeoutMs"), warnings),
		},
		alphabet,
		warnings,
		alphabetError,
	};
}
