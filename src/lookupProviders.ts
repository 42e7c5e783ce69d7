import type { LookupStrategy } from "./types";

const DUCKDUCKGO_API_URL = "https://api.duckduckgo.com/";
const DUCKDUCKGO_SEARCH_URL = "https://duckduckgo.com/";
const DEFAULT_TIMEOUT_MS = 8000;

export type FetchFn = typeof fetch;

/** Opens a URL outside the editor; resolves false when the host refused */
export type UrlOpener = (url: string) => Promise<boolean>;

export class LookupError extends Error {
	constructor(
		readonly provider: string,
		message: string,
		readonly status?: number,
	) {
		super(message);
		this.name = "LookupError";
	}
}

export interface HttpLookupOptions {
	fetchFn?: FetchFn;
	timeoutMs?: number;
}

async function getJson(
	provider: string,
	url: string,
	options: HttpLookupOptions,
): Promise<unknown> {
	const fetchFn = options.fetchFn ?? fetch;
	const response = await fetchFn(url, {
		headers: { Accept: "application/json" },
		signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
	});

	if (response.status === 404) {
		return undefined;
	}
	if (!response.ok) {
		throw new LookupError(
			provider,
			`${provider} responded with HTTP ${response.status}`,
			response.status,
		);
	}

	try {
		return await response.json();
	} catch {
		throw new LookupError(provider, `${provider} returned malformed JSON`);
	}
}

function readStringField(body: unknown, field: string): string {
	if (typeof body !== "object" || body === null) {
		return "";
	}
	const value: unknown = Reflect.get(body, field);
	return typeof value === "string" ? value.trim() : "";
}

/**
 * DuckDuckGo Instant Answer lookup; answers with the `Abstract` field
 */
export function createDuckDuckGoLookup(
	options: HttpLookupOptions = {},
): LookupStrategy {
	return async (query) => {
		const params = new URLSearchParams({
			q: query,
			format: "json",
			no_html: "1",
			skip_disambig: "1",
		});
		const body = await getJson(
			"DuckDuckGo",
			`${DUCKDUCKGO_API_URL}?${params.toString()}`,
			options,
		);
		return readStringField(body, "Abstract");
	};
}

/**
 * Wikipedia page summary lookup; answers with the `extract` field
 */
export function createWikipediaLookup(
	language: string,
	options: HttpLookupOptions = {},
): LookupStrategy {
	return async (query) => {
		const title = encodeURIComponent(query.trim().replace(/ /g, "_"));
		const body = await getJson(
			"Wikipedia",
			`https://${language}.wikipedia.org/api/rest_v1/page/summary/${title}`,
			options,
		);
		return readStringField(body, "extract");
	};
}

export function buildBrowserSearchUrl(query: string): string {
	return `${DUCKDUCKGO_SEARCH_URL}?${new URLSearchParams({ q: query }).toString()}`;
}

export function buildDictionaryUrl(host: string, item: string): string {
	return (
		`http://${host}/lexin.html?&dict=nbo-nny-maxi` +
		"&checked-languages=E&checked-languages=N&checked-languages=NNY" +
		`&search=${encodeURIComponent(item)}`
	);
}

/**
 * Open a URL built from the query; answers with the URL that was opened
 */
export function createBrowserLookup(
	openUrl: UrlOpener,
	buildUrl: (query: string) => string = buildBrowserSearchUrl,
): LookupStrategy {
	return async (query) => {
		const url = buildUrl(query);
		return (await openUrl(url)) ? url : "";
	};
}
