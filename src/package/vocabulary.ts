/**
 * Package: vocabulary - parser tables loader
 *
 * Loads `data/vocabulary.yaml` into the vocabulary registry.
 *
 * Behavior
 * - Verb synonyms are listed per canonical verb; every canonical verb is
 *   recognized even when no command module handles it yet
 * - Direction words, abbreviations and phrasal verbs must point at known
 *   directions and verbs
 * - Any problem aborts loading with a `WorldDataError` listing all of them
 *
 * @example
 * import vocabularyPkg from './package/vocabulary.js';
 * await vocabularyPkg.loader();
 *
 * @module package/vocabulary
 */
import { join, relative } from "path";
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { WorldDataError } from "../utils/errors.js";
import {
	readRecord,
	readStringList,
	readStringMap,
	type Problems,
} from "../utils/data.js";
import { text2dir, type DIRECTION } from "../direction.js";
import {
	toPreposition,
	type PREPOSITION,
	type Vocabulary,
} from "../core/vocabulary.js";
import { setVocabulary } from "../registry/vocabulary.js";

export const VOCABULARY_PATH = join(getDataDirectory(), "vocabulary.yaml");

function readDirections(
	value: unknown,
	where: string,
	problems: Problems
): Map<string, DIRECTION> {
	const directions = new Map<string, DIRECTION>();
	for (const [word, name] of readStringMap(value, where, problems)) {
		const direction = text2dir(name);
		if (!direction) {
			problems.push(`${where}.${word}: unknown direction "${name}"`);
			continue;
		}
		directions.set(word, direction);
	}
	return directions;
}

/**
 * Builds a vocabulary from parsed YAML.
 *
 * @throws WorldDataError when any table is malformed or points at an unknown
 * verb, direction or preposition
 */
export function parseVocabulary(data: unknown): Vocabulary {
	const problems: Problems = [];
	const root = readRecord(data, "vocabulary", problems);

	const verbs = new Map<string, string>();
	const knownVerbs = new Set<string>();
	const verbTable = readRecord(root.verbs, "verbs", problems);
	for (const [verb, synonyms] of Object.entries(verbTable)) {
		knownVerbs.add(verb);
		verbs.set(verb.toLowerCase(), verb);
		for (const word of readStringList(synonyms, `verbs.${verb}`, problems)) {
			if (verbs.has(word) && verbs.get(word) !== verb) {
				problems.push(
					`verbs.${verb}: "${word}" already means ${verbs.get(word)}`
				);
				continue;
			}
			verbs.set(word, verb);
		}
	}

	const phrasal = readStringMap(root.phrasal, "phrasal", problems);
	for (const [phrase, verb] of phrasal) {
		knownVerbs.add(verb);
		if (phrase.split(" ").length !== 2) {
			problems.push(`phrasal.${phrase}: phrasal verbs are two words`);
		}
	}

	const particles = new Map<string, ReadonlyMap<string, string>>();
	const particleTable = readRecord(root.particles, "particles", problems);
	for (const [verb, table] of Object.entries(particleTable)) {
		const rewrites = readStringMap(table, `particles.${verb}`, problems);
		for (const [particle, rewritten] of rewrites) {
			if (!knownVerbs.has(rewritten)) {
				problems.push(
					`particles.${verb}.${particle}: unknown verb "${rewritten}"`
				);
			}
		}
		particles.set(verb, rewrites);
	}

	const abbreviations = readStringMap(
		root.abbreviations,
		"abbreviations",
		problems
	);
	const directions = readDirections(root.directions, "directions", problems);
	for (const [abbreviation, word] of abbreviations) {
		if (!verbs.has(word) && !directions.has(word)) {
			problems.push(
				`abbreviations.${abbreviation}: "${word}" is neither a verb nor a direction`
			);
		}
	}

	const directionVerbs = new Set(
		readStringList(root.direction_verbs, "direction_verbs", problems)
	);
	const prepositions = new Map<string, PREPOSITION>();
	for (const [word, name] of readStringMap(
		root.prepositions,
		"prepositions",
		problems
	)) {
		const preposition = toPreposition(name);
		if (!preposition) {
			problems.push(`prepositions.${word}: unknown preposition "${name}"`);
			continue;
		}
		prepositions.set(word, preposition);
	}

	const impliedDirections = readDirections(
		root.implied_directions,
		"implied_directions",
		problems
	);
	const defaultDirections = readDirections(
		root.default_directions,
		"default_directions",
		problems
	);
	for (const verb of [
		...directionVerbs,
		...particles.keys(),
		...defaultDirections.keys(),
	]) {
		if (!knownVerbs.has(verb)) problems.push(`unknown verb "${verb}"`);
	}

	const vocabulary: Vocabulary = {
		articles: new Set(readStringList(root.articles, "articles", problems)),
		ignore: new Set(readStringList(root.ignore, "ignore", problems)),
		conjunctions: new Set(
			readStringList(root.conjunctions, "conjunctions", problems)
		),
		abbreviations,
		directions,
		verbs,
		phrasal,
		particles,
		impliedDirections,
		directionVerbs,
		defaultDirections,
		prepositions,
		modifiers: readStringMap(root.modifiers, "modifiers", problems),
		nouns: readStringMap(root.nouns, "nouns", problems),
		knownVerbs,
	};

	if (problems.length) throw new WorldDataError(problems);
	return Object.freeze(vocabulary);
}

/**
 * Reads and parses a vocabulary file.
 */
export async function readVocabulary(
	path: string = VOCABULARY_PATH
): Promise<Vocabulary> {
	logger.debug(
		`Loading vocabulary from ${relative(getSafeRootDirectory(), path)}`
	);
	const content = await readFile(path, "utf-8");
	const vocabulary = parseVocabulary(YAML.load(content));
	logger.debug(
		`Vocabulary loaded: ${vocabulary.knownVerbs.size} verbs, ${vocabulary.verbs.size} verb words`
	);
	return vocabulary;
}

export default {
	name: "vocabulary",
	loader: async () => {
		setVocabulary(await readVocabulary());
	},
} satisfies Package;
