import { favouriteSearch } from "./favouriteSearch";
import type { NamedStrategy } from "./favouriteSearch";
import { LineMarker } from "./lineMarker";
import { LookupReporter } from "./lookupReporter";
import { ACTION_NAMES } from "./types";
import type {
	ActionKeyMap,
	ActionName,
	LineDocument,
	Logger,
	LookupStrategy,
} from "./types";

export interface LookupSet {
	duckDuckGo: LookupStrategy;
	wikipedia: LookupStrategy;
	browser: LookupStrategy;
	dictionary: LookupStrategy;
}

export type KeyBinding =
	| { kind: "mark"; glyph: string }
	| { kind: "action"; action: ActionName };

/**
 * Maps typed characters to marker operations and runs them one at a time
 */
export class KeyDispatcher {
	private readonly table: Map<string, KeyBinding> = new Map();
	private readonly favourites: NamedStrategy[];
	private readonly pendingLookups = new Set<Promise<void>>();
	private tail: Promise<void> = Promise.resolve();

	constructor(
		private readonly marker: LineMarker,
		actionKeys: ActionKeyMap,
		private readonly lookups: LookupSet,
		private readonly reporter: LookupReporter,
		private readonly logger: Logger,
	) {
		for (const action of ACTION_NAMES) {
			this.table.set(actionKeys[action], { kind: "action", action });
		}
		// Mark keys win over action keys.
		const alphabet = marker.getAlphabet();
		for (const key of alphabet.keys) {
			const glyph = alphabet.glyphForKey(key);
			if (glyph !== undefined) {
				this.table.set(key, { kind: "mark", glyph });
			}
		}

		this.favourites = [
			{ name: "DuckDuckGo", lookup: lookups.duckDuckGo },
			{ name: "Wikipedia", lookup: lookups.wikipedia },
			{ name: "Browser", lookup: lookups.browser },
		];
	}

	bindingFor(key: string): KeyBinding | undefined {
		return this.table.get(key);
	}

	/**
	 * Handle one typed character. Unbound keys, and any key typed away from
	 * the start of a line, are inserted as ordinary text. Resolves true when
	 * the key ran a marker operation.
	 */
	handleKey(doc: LineDocument, key: string): Promise<boolean> {
		return this.enqueue(async () => {
			const binding = this.table.get(key);
			if (!binding || doc.getCursor().column !== 0) {
				await doc.typeText(key);
				return false;
			}

			if (binding.kind === "mark") {
				await this.marker.toggleMark(doc, binding.glyph);
			} else {
				await this.perform(doc, binding.action);
			}
			return true;
		});
	}

	/**
	 * Toggle the mark bound to `key` without the start-of-line check
	 */
	toggleMark(doc: LineDocument, key: string): Promise<boolean> {
		return this.enqueue(async () => {
			const glyph = this.marker.getAlphabet().glyphForKey(key);
			if (glyph === undefined) {
				return false;
			}
			await this.marker.toggleMark(doc, glyph);
			return true;
		});
	}

	runAction(doc: LineDocument, action: ActionName): Promise<void> {
		return this.enqueue(() => this.perform(doc, action));
	}

	/**
	 * Run an ordinary insertion behind the keystrokes already queued
	 */
	passThrough(insert: () => Promise<unknown>): Promise<void> {
		return this.enqueue(async () => {
			await insert();
		});
	}

	/**
	 * Wait for queued keystrokes and outstanding lookups
	 */
	async whenIdle(): Promise<void> {
		await this.tail;
		while (this.pendingLookups.size > 0) {
			await Promise.allSettled(Array.from(this.pendingLookups));
		}
	}

	private enqueue<T>(task: () => Promise<T>): Promise<T> {
		const run = this.tail.then(task);
		this.tail = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async perform(doc: LineDocument, action: ActionName): Promise<void> {
		switch (action) {
			case "advanceAndMark":
				await this.marker.advanceAndMark(doc);
				return;
			case "advanceMarkAndSearch": {
				const { marked } = await this.marker.advanceAndMark(doc);
				if (marked) {
					this.lookupItem(doc, "Favourites", (query) =>
						favouriteSearch(this.favourites, query, this.logger),
					);
				}
				return;
			}
			case "previousLine":
				this.marker.previousLine(doc);
				return;
			case "nextUnmarked":
				this.marker.moveToLastMarkedOfRun(doc);
				return;
			case "jumpToItem":
				this.marker.jumpToItem(doc);
				return;
			case "searchFavourites":
				this.lookupItem(doc, "Favourites", (query) =>
					favouriteSearch(this.favourites, query, this.logger),
				);
				return;
			case "searchDuckDuckGo":
				this.lookupItem(doc, "DuckDuckGo", this.lookups.duckDuckGo);
				return;
			case "searchWikipedia":
				this.lookupItem(doc, "Wikipedia", this.lookups.wikipedia);
				return;
			case "searchBrowser":
				this.lookupItem(doc, "Browser", this.lookups.browser);
				return;
			case "searchDictionary":
				this.lookupItem(doc, "Dictionary", this.lookups.dictionary);
				return;
		}
	}

	/**
	 * Start a lookup of the current line's item. Lookups only read, so the
	 * next keystroke does not wait for them.
	 */
	private lookupItem(
		doc: LineDocument,
		name: string,
		lookup: LookupStrategy,
	): void {
		const ticket = this.reporter.begin();
		const item = this.marker.extractItem(doc);
		if (item === undefined) {
			this.reporter.report(ticket, "", "");
			return;
		}

		this.logger.info(`${name} lookup for "${item}"`);
		const pending = lookup(item)
			.catch((error: unknown) => {
				const reason = error instanceof Error ? error.message : String(error);
				this.logger.warn(`${name} lookup for "${item}" failed: ${reason}`);
				return "";
			})
			.then((result) => {
				this.reporter.report(ticket, item, result);
			})
			.catch((error: unknown) => {
				this.logger.error(
					error instanceof Error ? error : new Error(String(error)),
				);
			})
			.finally(() => {
				this.pendingLookups.delete(pending);
			});
		this.pendingLookups.add(pending);
	}
}
