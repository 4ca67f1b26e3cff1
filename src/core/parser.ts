/**
 * Command parser: free text in, {@link ParsedCommand} out.
 *
 * Parsing is a pure function of the input and the vocabulary tables. It never
 * looks at game state, so the same text always produces the same command.
 *
 * Steps
 * 1. Lowercase, strip punctuation, split on whitespace, drop articles and
 *    filler words.
 * 2. Expand an abbreviated first word (`x` → `examine`, `n` → `north`).
 * 3. Find the verb: a bare direction means GO; two-word phrasal verbs
 *    (`look under`, `turn on`) are tried before single words.
 * 4. A trailing particle rewrites the verb (`turn lamp on` → TURN_ON).
 * 5. Verbs such as GO and CLIMB read a direction token.
 * 6. Modifiers (`all`, `back`) are pulled out wherever they appear.
 * 7. The first preposition splits the rest into a primary phrase and a
 *    secondary phrase. The primary phrase may list several objects.
 *
 * @example
 * ```typescript
 * const result = parse("put the coin in the box", vocabulary);
 * // result.command.verb === "PUT"
 * // result.command.object === "coin"
 * // result.command.preposition === PREPOSITION.IN
 * // result.command.target === "box"
 * ```
 *
 * @module core/parser
 */

import type { DIRECTION } from "../direction.js";
import { suggest } from "../utils/string.js";
import {
	PREPOSITION,
	commandWords,
	type Vocabulary,
} from "./vocabulary.js";

/**
 * A structured command. Deeply frozen once built.
 */
export interface ParsedCommand {
	readonly verb: string;
	/** First (or only) primary object phrase. */
	readonly object?: string;
	/** Every primary object phrase, for "take lamp and sword". */
	readonly objects: readonly string[];
	/** Secondary phrase after the preposition. */
	readonly target?: string;
	readonly direction?: DIRECTION;
	readonly preposition?: PREPOSITION;
	readonly modifiers: readonly string[];
	readonly raw: string;
}

export type ParseFailureReason = "empty" | "not-understood";

export type ParseResult =
	| { success: true; command: ParsedCommand }
	| {
			success: false;
			reason: ParseFailureReason;
			word?: string;
			suggestions: readonly string[];
	  };

export const MODIFIER_ALL = "ALL";
export const MODIFIER_BACK = "BACK";

/**
 * Splits text into lowercase tokens without articles or filler words.
 * Commas become their own token so they can separate list items.
 */
export function tokenize(raw: string, vocabulary: Vocabulary): string[] {
	return raw
		.toLowerCase()
		.replace(/,/g, " , ")
		.replace(/[^a-z0-9',\s-]/g, " ")
		.split(/\s+/)
		.filter(
			(token) =>
				token.length > 0 &&
				!vocabulary.articles.has(token) &&
				!vocabulary.ignore.has(token)
		);
}

/**
 * Joins a phrase, replacing noun synonyms with their canonical noun.
 */
export function canonicalPhrase(
	tokens: readonly string[],
	vocabulary: Vocabulary
): string {
	return tokens
		.filter((token) => token !== ",")
		.map((token) => vocabulary.nouns.get(token) ?? token)
		.join(" ");
}

/**
 * Splits a primary phrase on conjunctions and commas into object phrases.
 */
export function splitObjects(
	tokens: readonly string[],
	vocabulary: Vocabulary
): string[] {
	const phrases: string[] = [];
	let current: string[] = [];
	for (const token of tokens) {
		if (token === "," || vocabulary.conjunctions.has(token)) {
			if (current.length) phrases.push(canonicalPhrase(current, vocabulary));
			current = [];
			continue;
		}
		current.push(token);
	}
	if (current.length) phrases.push(canonicalPhrase(current, vocabulary));
	return phrases;
}

/**
 * Builds a frozen ParsedCommand, leaving absent fields out entirely.
 */
export function createCommand(fields: {
	verb: string;
	objects?: readonly string[];
	target?: string;
	direction?: DIRECTION;
	preposition?: PREPOSITION;
	modifiers?: readonly string[];
	raw: string;
}): ParsedCommand {
	const objects = Object.freeze([...(fields.objects ?? [])]);
	const command: ParsedCommand = {
		verb: fields.verb,
		...(objects.length ? { object: objects[0] } : {}),
		objects,
		...(fields.target ? { target: fields.target } : {}),
		...(fields.direction ? { direction: fields.direction } : {}),
		...(fields.preposition ? { preposition: fields.preposition } : {}),
		modifiers: Object.freeze([...(fields.modifiers ?? [])]),
		raw: fields.raw,
	};
	return Object.freeze(command);
}

/**
 * Parses raw player input.
 *
 * Never throws: input without a recognizable verb comes back as a failure
 * with near-match suggestions for the first word.
 */
export function parse(raw: string, vocabulary: Vocabulary): ParseResult {
	const text = raw.trim();
	const tokens = tokenize(text, vocabulary);
	if (!tokens.length) {
		return { success: false, reason: "empty", suggestions: [] };
	}

	const first = vocabulary.abbreviations.get(tokens[0]) ?? tokens[0];
	let verb: string | undefined;
	let direction: DIRECTION | undefined;
	let rest: string[];

	const leadingDirection = vocabulary.directions.get(first);
	const phrasal =
		tokens.length > 1
			? vocabulary.phrasal.get(`${first} ${tokens[1]}`)
			: undefined;
	if (leadingDirection) {
		verb = "GO";
		direction = leadingDirection;
		rest = tokens.slice(1);
	} else if (phrasal) {
		verb = phrasal;
		rest = tokens.slice(2);
	} else {
		verb = vocabulary.verbs.get(first);
		direction = vocabulary.impliedDirections.get(first);
		rest = tokens.slice(1);
	}

	if (!verb) {
		return {
			success: false,
			reason: "not-understood",
			word: first,
			suggestions: suggest(first, commandWords(vocabulary)),
		};
	}

	// "turn lamp on"
	const particles = vocabulary.particles.get(verb);
	if (particles && rest.length > 1) {
		const rewritten = particles.get(rest[rest.length - 1]);
		if (rewritten) {
			verb = rewritten;
			rest = rest.slice(0, -1);
		}
	}

	if (vocabulary.directionVerbs.has(verb) && !direction && rest.length) {
		const word = vocabulary.abbreviations.get(rest[0]) ?? rest[0];
		const found = vocabulary.directions.get(word);
		if (found) {
			direction = found;
			rest = rest.slice(1);
		}
	}

	const modifiers: string[] = [];
	rest = rest.filter((token) => {
		const modifier = vocabulary.modifiers.get(token);
		if (!modifier) return true;
		if (!modifiers.includes(modifier)) modifiers.push(modifier);
		return false;
	});

	let preposition: PREPOSITION | undefined;
	let primary = rest;
	let secondary: string[] = [];
	const split = rest.findIndex((token) => vocabulary.prepositions.has(token));
	if (split >= 0) {
		preposition = vocabulary.prepositions.get(rest[split]);
		primary = rest.slice(0, split);
		secondary = rest.slice(split + 1);
	}

	// "talk to troll", "dig in sand with shovel"
	if (
		!primary.length &&
		secondary.length &&
		preposition !== PREPOSITION.WITH &&
		!modifiers.includes(MODIFIER_ALL)
	) {
		const next = secondary.findIndex((token) =>
			vocabulary.prepositions.has(token)
		);
		if (next >= 0) {
			primary = secondary.slice(0, next);
			preposition = vocabulary.prepositions.get(secondary[next]);
			secondary = secondary.slice(next + 1);
		} else {
			primary = secondary;
			secondary = [];
		}
	}

	const objects = splitObjects(primary, vocabulary);
	if (!direction && objects.length) {
		direction = vocabulary.defaultDirections.get(verb);
	}

	return {
		success: true,
		command: createCommand({
			verb,
			objects,
			target: secondary.length
				? canonicalPhrase(secondary, vocabulary)
				: undefined,
			direction,
			preposition,
			modifiers,
			raw: text,
		}),
	};
}
