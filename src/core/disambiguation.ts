/**
 * Answers to the engine's questions.
 *
 * After an ambiguous reference or a missing parameter the engine records a
 * {@link PendingInteraction} on the state and asks the player. The next input
 * is offered here first:
 *
 * - Awaiting disambiguation: a reply naming exactly one of the candidates
 *   ("rusty", "the elvish one") completes the original command with it.
 * - Awaiting a parameter: the reply fills the missing role ("railing",
 *   "to the railing", "north").
 * - A reply that is a complete command of its own cancels the question and
 *   runs as that command.
 * - Anything else drops the question with a failure.
 *
 * Either way the state is back to idle afterwards unless the resumed
 * command asks something new.
 *
 * @module core/disambiguation
 */

import { MODIFIER_ALL, canonicalPhrase, createCommand, parse, tokenize } from "./parser.js";
import type { ParsedCommand } from "./parser.js";
import { ROLE } from "./result.js";
import { matchObjects } from "./scope.js";
import type { Bindings, GameState, PendingInteraction } from "./state.js";
import type { Vocabulary } from "./vocabulary.js";

export type PendingAnswer =
	| { kind: "resume"; command: ParsedCommand; bindings: Bindings }
	| { kind: "replace" }
	| { kind: "reject"; message: string };

const FILLER = new Set(["one", "ones"]);

function isFullCommand(input: string, vocabulary: Vocabulary): boolean {
	return parse(input, vocabulary).success;
}

function answerDisambiguation(
	pending: Extract<PendingInteraction, { kind: "disambiguation" }>,
	input: string,
	state: GameState,
	vocabulary: Vocabulary
): PendingAnswer {
	const tokens = tokenize(input, vocabulary).filter((token) => !FILLER.has(token));
	const phrase = canonicalPhrase(tokens, vocabulary);
	const matches = matchObjects(state, phrase, pending.candidates);
	if (matches.length === 1) {
		const chosen = matches[0];
		if (pending.role === ROLE.TOOL) {
			return {
				kind: "resume",
				command: pending.command,
				bindings: { ...pending.bindings, tool: chosen },
			};
		}
		return {
			kind: "resume",
			command: pending.command,
			bindings: {
				...pending.bindings,
				objects: { ...pending.bindings.objects, [pending.index]: chosen },
			},
		};
	}
	if (isFullCommand(input, vocabulary)) return { kind: "replace" };
	return {
		kind: "reject",
		message: matches.length
			? "That still doesn't say which one you mean. Never mind."
			: "That isn't one of the choices. Never mind.",
	};
}

function answerParameter(
	pending: Extract<PendingInteraction, { kind: "parameter" }>,
	input: string,
	state: GameState,
	vocabulary: Vocabulary
): PendingAnswer {
	const command = pending.command;
	const tokens = tokenize(input, vocabulary);
	if (!tokens.length) {
		return { kind: "reject", message: "Never mind." };
	}

	if (pending.role === ROLE.DIRECTION) {
		const word = vocabulary.abbreviations.get(tokens[0]) ?? tokens[0];
		const direction = vocabulary.directions.get(word);
		if (direction && tokens.length === 1) {
			return {
				kind: "resume",
				command: createCommand({ ...command, direction }),
				bindings: pending.bindings,
			};
		}
		if (isFullCommand(input, vocabulary)) return { kind: "replace" };
		return { kind: "reject", message: "That isn't a direction. Never mind." };
	}

	// "take lamp" answers a question as a new command, but "lamp" or
	// "rope" on their own answer it.
	const first = tokens[0];
	if (
		isFullCommand(input, vocabulary) &&
		!vocabulary.prepositions.has(first) &&
		!state.world.isObjectWord(vocabulary.nouns.get(first) ?? first)
	) {
		return { kind: "replace" };
	}

	const words = vocabulary.prepositions.has(first) ? tokens.slice(1) : tokens;
	const phrase = canonicalPhrase(words, vocabulary);
	if (!phrase) return { kind: "reject", message: "Never mind." };

	if (pending.role === ROLE.TOOL) {
		const preposition = command.preposition ?? vocabulary.prepositions.get(first);
		return {
			kind: "resume",
			command: createCommand({ ...command, target: phrase, preposition }),
			bindings: pending.bindings,
		};
	}
	return {
		kind: "resume",
		command: createCommand({
			...command,
			objects: [phrase],
			modifiers: command.modifiers.filter((modifier) => modifier !== MODIFIER_ALL),
		}),
		bindings: pending.bindings,
	};
}

/**
 * Interprets `input` as the answer to the pending question.
 */
export function answerPending(
	pending: PendingInteraction,
	input: string,
	state: GameState,
	vocabulary: Vocabulary
): PendingAnswer {
	if (pending.kind === "disambiguation") {
		return answerDisambiguation(pending, input, state, vocabulary);
	}
	return answerParameter(pending, input, state, vocabulary);
}
