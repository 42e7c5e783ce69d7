import type { Logger } from "./types";

/** Receives a lookup result; "" means nothing was found */
export type ReportSink = (result: string, query: string) => void;

/**
 * Shows lookup results so that only the most recently started lookup wins;
 * a slow, older lookup never overwrites a newer one.
 */
export class LookupReporter {
	private latestTicket = 0;

	constructor(
		private readonly sink: ReportSink,
		private readonly logger: Logger,
	) {}

	begin(): number {
		this.latestTicket += 1;
		return this.latestTicket;
	}

	report(ticket: number, query: string, result: string): boolean {
		if (ticket !== this.latestTicket) {
			this.logger.info(`Dropped stale result for "${query}"`);
			return false;
		}
		this.sink(result, query);
		return true;
	}
}
