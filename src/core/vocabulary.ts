/**
 * Vocabulary tables the parser reads: verbs and their synonyms, phrasal
 * verbs, abbreviations, directions, prepositions, modifiers and noun
 * synonyms. The tables are data (`data/vocabulary.yaml`); this module only
 * defines their shape.
 *
 * @module core/vocabulary
 */

import { DIRECTION } from "../direction.js";

/**
 * The closed set of prepositions that split a command into its primary and
 * secondary phrases.
 */
export enum PREPOSITION {
	WITH = "with",
	TO = "to",
	IN = "in",
	ON = "on",
	FROM = "from",
	AT = "at",
	UNDER = "under",
	BEHIND = "behind",
	THROUGH = "through",
	OFF = "off",
	ABOUT = "about",
}

export function toPreposition(text: string): PREPOSITION | undefined {
	for (const preposition of Object.values(PREPOSITION)) {
		if (preposition === text) return preposition;
	}
	return undefined;
}

export interface Vocabulary {
	/** Articles dropped wherever they appear. */
	articles: ReadonlySet<string>;
	/** Filler words dropped wherever they appear. */
	ignore: ReadonlySet<string>;
	/** Word separating items in a list of objects. */
	conjunctions: ReadonlySet<string>;
	abbreviations: ReadonlyMap<string, string>;
	directions: ReadonlyMap<string, DIRECTION>;
	/** Single word → canonical verb. */
	verbs: ReadonlyMap<string, string>;
	/** Two-word phrase → canonical verb, matched before single words. */
	phrasal: ReadonlyMap<string, string>;
	/** Canonical verb → trailing particle → rewritten verb. */
	particles: ReadonlyMap<string, ReadonlyMap<string, string>>;
	/** Verb words that carry a direction of their own ("descend"). */
	impliedDirections: ReadonlyMap<string, DIRECTION>;
	/** Verbs that read a direction token after them. */
	directionVerbs: ReadonlySet<string>;
	/** Direction assumed when the verb names an object but no direction. */
	defaultDirections: ReadonlyMap<string, DIRECTION>;
	prepositions: ReadonlyMap<string, PREPOSITION>;
	modifiers: ReadonlyMap<string, string>;
	nouns: ReadonlyMap<string, string>;
	/** Every canonical verb the game recognizes. */
	knownVerbs: ReadonlySet<string>;
}

/**
 * Every word or phrase that starts a command; used for near-match
 * suggestions.
 */
export function commandWords(vocabulary: Vocabulary): Set<string> {
	const words = new Set<string>(vocabulary.verbs.keys());
	for (const phrase of vocabulary.phrasal.keys()) words.add(phrase);
	for (const direction of vocabulary.directions.keys()) words.add(direction);
	return words;
}

/**
 * Lowercase display form of a canonical verb.
 *
 * @example
 * ```typescript
 * verbLabel("TURN_ON") // "turn on"
 * ```
 */
export function verbLabel(verb: string): string {
	return verb.toLowerCase().replace(/_/g, " ");
}
