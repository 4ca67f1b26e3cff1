/**
 * Registry: help - centralized helpfile access
 *
 * Populated by the help package; read by the HELP command.
 *
 * @module registry/help
 */

import logger from "../utils/logger.js";
import type { Helpfile } from "../core/help.js";

/**
 * Maps keywords (including aliases) to their helpfile entries.
 */
const helpRegistry: Map<string, Helpfile> = new Map();

/**
 * Register a helpfile under its keyword and all of its aliases.
 * Keywords already taken are skipped with a warning.
 */
export function registerHelpfile(helpfile: Helpfile): void {
	const keyword = helpfile.keyword.toLowerCase();
	const existing = helpRegistry.get(keyword);
	if (existing) {
		logger.warn(
			`Helpfile keyword conflict: "${keyword}" already defined by "${existing.keyword}"`
		);
		return;
	}
	helpRegistry.set(keyword, helpfile);

	for (const alias of helpfile.aliases) {
		const aliasLower = alias.toLowerCase();
		const taken = helpRegistry.get(aliasLower);
		if (taken) {
			logger.warn(
				`Helpfile alias conflict: "${aliasLower}" in "${helpfile.keyword}" already defined by "${taken.keyword}"`
			);
			continue;
		}
		helpRegistry.set(aliasLower, helpfile);
	}
	logger.debug(`Registered helpfile: ${keyword}`);
}

export function getHelpfileRegistry(): ReadonlyMap<string, Helpfile> {
	return helpRegistry;
}

/**
 * Every registered helpfile once, sorted by keyword.
 */
export function getHelpfiles(): Helpfile[] {
	return Array.from(new Set(helpRegistry.values())).sort((a, b) =>
		a.keyword.localeCompare(b.keyword)
	);
}

/**
 * Look up a helpfile by keyword or alias (case-insensitive).
 */
export function getHelpfile(keyword: string): Helpfile | undefined {
	return helpRegistry.get(keyword.toLowerCase());
}

/**
 * Helpfiles whose keyword or an alias starts with `search`, sorted by
 * keyword.
 *
 * @example
 * autocompleteHelpfile("mov") // [movement]
 */
export function autocompleteHelpfile(search: string): Helpfile[] {
	const searchLower = search.toLowerCase();
	const matched = new Set<Helpfile>();
	for (const [key, helpfile] of helpRegistry) {
		if (key.startsWith(searchLower)) matched.add(helpfile);
	}
	return Array.from(matched).sort((a, b) => a.keyword.localeCompare(b.keyword));
}

export function clearHelpfiles(): void {
	helpRegistry.clear();
}
