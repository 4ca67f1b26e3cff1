/**
 * Registry: vocabulary - the parser tables loaded at start-up
 *
 * Set by the vocabulary package.
 *
 * @module registry/vocabulary
 */

import type { Vocabulary } from "../core/vocabulary.js";

let VOCABULARY: Vocabulary | undefined;

export function setVocabulary(vocabulary: Vocabulary): void {
	VOCABULARY = vocabulary;
}

/**
 * The loaded vocabulary. Throws when the vocabulary package has not run.
 */
export function getVocabulary(): Vocabulary {
	if (!VOCABULARY) throw new Error("Vocabulary has not been loaded");
	return VOCABULARY;
}
