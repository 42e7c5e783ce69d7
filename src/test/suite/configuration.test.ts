import * as assert from "assert";
import {
	DEFAULT_ACTION_KEYS,
	DEFAULT_CONFIG,
	DEFAULT_MARKS,
	parseConfiguration,
} from "../../configuration";
import { MarkAlphabetError } from "../../markAlphabet";

suite("parseConfiguration", () => {
	function reader(settings: Record<string, unknown>) {
		return (key: string): unknown => settings[key];
	}

	test("unset settings use the defaults", () => {
		const parsed = parseConfiguration(reader({}));
		assert.deepStrictEqual(parsed.config, DEFAULT_CONFIG);
		assert.deepStrictEqual(parsed.warnings, []);
		assert.strictEqual(parsed.alphabetError, undefined);
		assert.strictEqual(parsed.alphabet.defaultGlyph, "#");
	});

	test("accepts a custom alphabet", () => {
		const parsed = parseConfiguration(
			reader({
				marks: [
					{ key: "x", glyph: "✓ " },
					{ key: "o", glyph: "✗ " },
				],
			}),
		);
		assert.strictEqual(parsed.alphabetError, undefined);
		assert.strictEqual(parsed.alphabet.defaultGlyph, "✓ ");
		assert.strictEqual(parsed.alphabet.isMarked("✗ pending"), true);
	});

	test("an invalid alphabet falls back to the default marks", () => {
		const parsed = parseConfiguration(
			reader({
				marks: [
					{ key: "a", glyph: "*" },
					{ key: "b", glyph: "*" },
				],
			}),
		);
		assert.ok(parsed.alphabetError instanceof MarkAlphabetError);
		assert.strictEqual(parsed.alphabetError?.message, 'Duplicate glyph "*"');
		assert.deepStrictEqual(parsed.config.marks, DEFAULT_MARKS);
		assert.strictEqual(parsed.alphabet.defaultGlyph, "#");
	});

	test("malformed mark entries are rejected", () => {
		const parsed = parseConfiguration(reader({ marks: [{ key: "a" }] }));
		assert.strictEqual(
			parsed.alphabetError?.message,
			'marks[0] needs string "key" and "glyph"',
		);
	});

	test("mark keys may not shadow action keys", () => {
		const parsed = parseConfiguration(
			reader({ marks: [{ key: "n", glyph: "*" }] }),
		);
		assert.strictEqual(
			parsed.alphabetError?.message,
			'Mark key "n" is already bound to an action',
		);
		assert.deepStrictEqual(parsed.config.actionKeys, DEFAULT_ACTION_KEYS);
	});

	test("an invalid alphabet keeps custom action keys", () => {
		const parsed = parseConfiguration(
			reader({
				actionKeys: { advanceAndMark: "j" },
				marks: [{ key: "#", glyph: "" }],
			}),
		);
		assert.strictEqual(
			parsed.alphabetError?.message,
			'Glyph for key "#" is empty',
		);
		assert.deepStrictEqual(parsed.config.marks, DEFAULT_MARKS);
		assert.strictEqual(parsed.config.actionKeys.advanceAndMark, "j");
		assert.deepStrictEqual(parsed.warnings, []);
	});

	test("action keys clashing with the default marks are reset", () => {
		const parsed = parseConfiguration(
			reader({ actionKeys: { advanceAndMark: "#" }, marks: [] }),
		);
		assert.strictEqual(
			parsed.alphabetError?.message,
			"Mark alphabet must not be empty",
		);
		assert.deepStrictEqual(parsed.config.actionKeys, DEFAULT_ACTION_KEYS);
		assert.deepStrictEqual(parsed.warnings, [
			'Mark key "#" is already bound to an action',
		]);
	});

	test("action keys can be rebound one at a time", () => {
		const parsed = parseConfiguration(
			reader({ actionKeys: { previousLine: "P", jumpToItem: "jj" } }),
		);
		assert.strictEqual(parsed.config.actionKeys.previousLine, "P");
		assert.strictEqual(parsed.config.actionKeys.jumpToItem, "e");
		assert.deepStrictEqual(parsed.warnings, [
			"actionKeys.jumpToItem must be a single character",
		]);
	});

	test("duplicate action keys reset all action keys", () => {
		const parsed = parseConfiguration(
			reader({ actionKeys: { previousLine: "n" } }),
		);
		assert.deepStrictEqual(parsed.config.actionKeys, DEFAULT_ACTION_KEYS);
		assert.deepStrictEqual(parsed.warnings, [
			'actionKeys.previousLine reuses "n" from advanceAndMark; using defaults',
		]);
	});

	test("invalid scalar settings fall back with a warning", () => {
		const parsed = parseConfiguration(
			reader({
				dictionaryHost: "  ",
				wikipediaLanguage: " nb ",
				lookupTimeoutMs: -1,
			}),
		);
		assert.strictEqual(parsed.config.dictionaryHost, "lexin.udir.no");
		assert.strictEqual(parsed.config.wikipediaLanguage, "nb");
		assert.strictEqual(parsed.config.lookupTimeoutMs, 8000);
		assert.deepStrictEqual(parsed.warnings, [
			"dictionaryHost must be a non-empty string",
			"lookupTimeoutMs must be at least 1",
		]);
	});

	test("a zero timeout falls back to the default", () => {
		const parsed = parseConfiguration(reader({ lookupTimeoutMs: 0 }));
		assert.strictEqual(parsed.config.lookupTimeoutMs, 8000);
		assert.deepStrictEqual(parsed.warnings, [
			"lookupTimeoutMs must be at least 1",
		]);
	});

	test("timeouts are whole milliseconds", () => {
		const parsed = parseConfiguration(reader({ lookupTimeoutMs: 2500.7 }));
		assert.strictEqual(parsed.config.lookupTimeoutMs, 2500);
	});
});
