/**
 * A letter, then letters, spaces, periods or hyphens, ending in a letter or
 * a period.
 */
const ITEM_PATTERN = /\p{L}[\p{L} .-]*[\p{L}.]/gu;

export interface ItemMatch {
	text: string;
	/** Column where the item starts */
	column: number;
}

/**
 * Find the first item on a line at or after `fromColumn`
 */
export function findItem(text: string, fromColumn = 0): ItemMatch | undefined {
	const pattern = new RegExp(ITEM_PATTERN.source, ITEM_PATTERN.flags);
	pattern.lastIndex = Math.max(0, fromColumn);
	const match = pattern.exec(text);
	if (!match) {
		return undefined;
	}
	return { text: match[0], column: match.index };
}
