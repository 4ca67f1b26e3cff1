/**
 * String helpers for building narrative text and matching player input.
 *
 * @module utils/string
 */

/**
 * Capitalizes the first character of a string.
 *
 * @example
 * ```typescript
 * capitalizeFirst("a brass lantern") // "A brass lantern"
 * capitalizeFirst("") // ""
 * ```
 */
export function capitalizeFirst(text: string): string {
	if (!text) return text;
	return text[0].toUpperCase() + text.slice(1);
}

/**
 * Prefixes a noun phrase with the matching indefinite article.
 *
 * @example
 * ```typescript
 * withArticle("lamp") // "a lamp"
 * withArticle("elvish sword") // "an elvish sword"
 * ```
 */
export function withArticle(name: string): string {
	return /^[aeiou]/i.test(name) ? `an ${name}` : `a ${name}`;
}

/**
 * Joins a list into an English enumeration.
 *
 * @example
 * ```typescript
 * joinWithAnd(["a", "b", "c"]) // "a, b and c"
 * joinWithAnd(["a"]) // "a"
 * joinWithAnd(["a", "b"], "or") // "a or b"
 * ```
 */
export function joinWithAnd(
	items: readonly string[],
	conjunction = "and"
): string {
	if (items.length <= 1) return items.join("");
	return `${items.slice(0, -1).join(", ")} ${conjunction} ${
		items[items.length - 1]
	}`;
}

/**
 * Edit distance between two strings (insertions, deletions, substitutions).
 */
export function levenshtein(a: string, b: string): number {
	if (a === b) return 0;
	if (!a.length) return b.length;
	if (!b.length) return a.length;
	let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
	for (let i = 1; i <= a.length; i++) {
		const current = [i];
		for (let j = 1; j <= b.length; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			current[j] = Math.min(
				previous[j] + 1,
				current[j - 1] + 1,
				previous[j - 1] + cost
			);
		}
		previous = current;
	}
	return previous[b.length];
}

/**
 * Finds the candidates closest to `word`.
 *
 * Candidates further than `maxDistance` edits away are dropped. The rest are
 * ordered by distance, then alphabetically, and cut to `limit` entries.
 *
 * @example
 * ```typescript
 * suggest("tkae", ["take", "talk", "tie"]) // ["take", "tie"]
 * ```
 */
export function suggest(
	word: string,
	candidates: Iterable<string>,
	maxDistance = 2,
	limit = 3
): string[] {
	const scored: Array<{ candidate: string; distance: number }> = [];
	for (const candidate of new Set(candidates)) {
		if (candidate === word) continue;
		const distance = levenshtein(word, candidate);
		if (distance <= maxDistance) scored.push({ candidate, distance });
	}
	scored.sort(
		(a, b) => a.distance - b.distance || a.candidate.localeCompare(b.candidate)
	);
	return scored.slice(0, limit).map((entry) => entry.candidate);
}
