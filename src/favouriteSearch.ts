import type { Logger, LookupStrategy } from "./types";

export interface NamedStrategy {
	name: string;
	lookup: LookupStrategy;
}

/**
 * Try each strategy in order and return the first non-empty result. A
 * strategy that throws counts as having found nothing.
 */
export async function favouriteSearch(
	strategies: readonly NamedStrategy[],
	query: string,
	logger: Logger,
): Promise<string> {
	for (const strategy of strategies) {
		let result: string;
		try {
			result = await strategy.lookup(query);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			logger.warn(`${strategy.name} lookup for "${query}" failed: ${reason}`);
			continue;
		}

		if (result.length > 0) {
			logger.info(`${strategy.name} answered "${query}"`);
			return result;
		}
	}

	logger.info(`No lookup answered "${query}"`);
	return "";
}
