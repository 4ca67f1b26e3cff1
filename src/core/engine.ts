/**
 * The command engine: raw text in, {@link ActionResult} out.
 *
 * `handlePlayerInput` is the single entry point. It routes an answer to a
 * pending question, parses, and then `execute`s the command:
 *
 * 1. Look up the handler for the canonical verb. Recognized verbs without
 *    one are NOT_YET_AVAILABLE.
 * 2. Check the roles the handler declares. A missing required role asks
 *    for it (MISSING_PARAMETER) and remembers the command.
 * 3. Resolve noun phrases to object ids in the declared scope. Several
 *    equally good matches ask which one (AMBIGUOUS_REFERENCE).
 * 4. Run the handler against a working copy of the state, once per object
 *    for multi-object commands.
 * 5. On success commit the copy, then advance the move counter and drain
 *    light sources unless the verb is a meta verb.
 *
 * A failed command leaves the state untouched apart from the pending
 * question and the input remembered for AGAIN. A handler that throws is
 * logged and the error rethrown; nothing it did is committed.
 *
 * @example
 * ```typescript
 * const engine = new Engine({ world, vocabulary, registry });
 * const state = engine.newGame("session-1");
 * const result = engine.handlePlayerInput("open mailbox", state);
 * // result.success === true, result.outcome === OUTCOME.OK
 * ```
 *
 * @module core/engine
 */

import logger from "../utils/logger.js";
import { capitalizeFirst, joinWithAnd } from "../utils/string.js";
import type {
	ArgumentRule,
	CommandArgs,
	CommandContext,
	CommandObject,
	Theme,
} from "./command.js";
import { nameOf, the } from "./describe.js";
import { answerPending } from "./disambiguation.js";
import { MODIFIER_ALL, parse, type ParsedCommand } from "./parser.js";
import {
	OUTCOME,
	ROLE,
	absent,
	blocked,
	createResult,
	mismatch,
	type ActionResult,
	type Reply,
} from "./result.js";
import { SCOPE, resolvePhrase, type Resolution } from "./scope.js";
import { GameState, type Bindings } from "./state.js";
import { passTime } from "./turn.js";
import { verbLabel, type Vocabulary } from "./vocabulary.js";
import type { World } from "./world.js";
import type { CommandRegistry } from "../registry/command.js";

export const GAME_OVER =
	"The game is over. You can RESTART, RESTORE a saved game or QUIT.";

export interface EngineOptions {
	world: World;
	vocabulary: Vocabulary;
	registry: CommandRegistry;
	theme?: Theme;
	/** Sanity a new game starts with. */
	sanity?: number;
}

type Step = Resolution | { kind: "failed"; result: ActionResult };

const EMPTY_BINDINGS: Bindings = { objects: {} };

/**
 * Compares states while ignoring the bookkeeping that every input touches.
 */
function fingerprint(state: GameState): string {
	return JSON.stringify({
		...state.toSnapshot(),
		lastInput: undefined,
		pending: undefined,
	});
}

function promptFor(
	rule: ArgumentRule,
	context: CommandContext,
	args: CommandArgs,
	fallback: string
): string {
	if (typeof rule.prompt === "function") return rule.prompt(context, args);
	return rule.prompt ?? fallback;
}

export class Engine {
	readonly world: World;
	readonly vocabulary: Vocabulary;
	readonly registry: CommandRegistry;
	readonly theme: Theme;
	readonly startingSanity?: number;

	constructor(options: EngineOptions) {
		this.world = options.world;
		this.vocabulary = options.vocabulary;
		this.registry = options.registry;
		this.theme = options.theme ?? "haunted";
		this.startingSanity = options.sanity;
	}

	newGame(sessionId: string): GameState {
		return GameState.create(this.world, sessionId, {
			sanity: this.startingSanity,
		});
	}

	/**
	 * Interprets one line of player input against `state`, mutating it in
	 * place when the command succeeds.
	 */
	handlePlayerInput(raw: string, state: GameState): ActionResult {
		const input = raw.trim();
		logger.debug(`[${state.sessionId}] > ${input}`);
		const pending = state.pending;
		if (pending) {
			state.pending = undefined;
			const answer = answerPending(pending, input, state, this.vocabulary);
			if (answer.kind === "resume") {
				return this.execute(answer.command, state, answer.bindings);
			}
			if (answer.kind === "reject") {
				return createResult({
					success: false,
					outcome: OUTCOME.NOT_UNDERSTOOD,
					message: answer.message,
				});
			}
		}
		return this.interpret(input, state);
	}

	private interpret(input: string, state: GameState): ActionResult {
		const parsed = parse(input, this.vocabulary);
		if (!parsed.success) {
			if (parsed.reason === "empty") {
				return createResult({
					success: false,
					outcome: OUTCOME.NOT_UNDERSTOOD,
					message: "I beg your pardon?",
				});
			}
			const suggestions = [...parsed.suggestions];
			const hint = suggestions.length
				? ` Did you mean ${joinWithAnd(
						suggestions.map((word) => `"${word}"`),
						"or"
				  )}?`
				: "";
			return createResult(
				{
					success: false,
					outcome: OUTCOME.NOT_UNDERSTOOD,
					message: `I don't know the word "${parsed.word ?? input}".${hint}`,
				},
				{ suggestions }
			);
		}

		if (parsed.command.verb === "AGAIN") {
			const last = state.lastInput;
			if (!last) {
				return createResult({
					success: false,
					outcome: OUTCOME.STATE_CONFLICT,
					message: "There is nothing to repeat.",
				});
			}
			return this.interpret(last, state);
		}

		state.lastInput = input;
		return this.execute(parsed.command, state);
	}

	/**
	 * Runs a parsed command. `bindings` carries objects already chosen
	 * while answering a question about this command.
	 */
	execute(
		command: ParsedCommand,
		state: GameState,
		bindings: Bindings = EMPTY_BINDINGS
	): ActionResult {
		const handler = this.registry.get(command.verb);
		const label = verbLabel(command.verb);
		if (!handler) {
			if (this.vocabulary.knownVerbs.has(command.verb)) {
				return createResult({
					success: false,
					outcome: OUTCOME.NOT_YET_AVAILABLE,
					message: `Sorry, "${label}" isn't something you can do yet.`,
				});
			}
			return createResult({
				success: false,
				outcome: OUTCOME.NOT_UNDERSTOOD,
				message: "I don't know how to do that.",
			});
		}
		if (state.ended && !handler.afterEnd) return createResult(blocked(GAME_OVER));

		const draft = state.clone();
		draft.pending = undefined;
		const context: CommandContext = {
			world: this.world,
			state: draft,
			command,
			theme: this.theme,
			notifications: [],
			affected: new Set(),
			newGame: () => this.newGame(state.sessionId),
		};
		const args: CommandArgs = {};
		let current = bindings;
		const ask = (role: ROLE, message: string): ActionResult => {
			state.pending = { kind: "parameter", command, role, bindings: current };
			return createResult(
				{ success: false, outcome: OUTCOME.MISSING_PARAMETER, message },
				{ role }
			);
		};

		if (command.direction) {
			args.direction = command.direction;
		} else if (handler.direction === "required") {
			return ask(ROLE.DIRECTION, `Which way do you want to ${label}?`);
		}
		if (handler.topic && command.target) args.topic = command.target;

		if (handler.tool) {
			if (current.tool) {
				args.tool = current.tool;
			} else if (command.target) {
				const step = this.resolve(context, command.target, handler.tool);
				if (step.kind === "failed") return step.result;
				if (step.kind === "ambiguous") {
					return this.ambiguous(context, state, {
						role: ROLE.TOOL,
						index: 0,
						ids: step.ids,
						phrase: command.target,
						bindings: current,
					});
				}
				if (step.kind === "found") {
					args.tool = step.id;
					current = { ...current, tool: step.id };
				}
			} else if (handler.tool.required) {
				return ask(
					ROLE.TOOL,
					promptFor(handler.tool, context, args, `What do you want to ${label} it with?`)
				);
			}
		}

		const ids: string[] = [];
		if (handler.object) {
			const rule = handler.object;
			if (!command.objects.length) {
				if (command.modifiers.includes(MODIFIER_ALL) && rule.all) {
					ids.push(...rule.all(context, args));
					if (!ids.length) {
						return createResult(absent(`There's nothing here to ${label}.`));
					}
				} else if (rule.required) {
					return ask(
						ROLE.OBJECT,
						promptFor(rule, context, args, `What do you want to ${label}?`)
					);
				}
			} else {
				if (command.objects.length > 1 && !rule.multiple) {
					return createResult(
						mismatch(`You can only ${label} one thing at a time.`)
					);
				}
				const objects: Record<number, string> = { ...current.objects };
				for (const [index, phrase] of command.objects.entries()) {
					const bound = objects[index];
					if (bound) {
						ids.push(bound);
						continue;
					}
					const step = this.resolve(context, phrase, rule);
					if (step.kind === "failed") return step.result;
					if (step.kind === "ambiguous") {
						return this.ambiguous(context, state, {
							role: ROLE.OBJECT,
							index,
							ids: step.ids,
							phrase,
							bindings: { ...current, objects },
						});
					}
					if (step.kind === "found") {
						objects[index] = step.id;
						ids.push(step.id);
					}
				}
			}
		}

		return this.run(handler, context, args, ids, state);
	}

	private run(
		handler: CommandObject,
		context: CommandContext,
		args: CommandArgs,
		ids: readonly string[],
		state: GameState
	): ActionResult {
		const draft = context.state;
		const before = fingerprint(draft);
		const replies: { id?: string; reply: Reply }[] = [];
		try {
			if (!ids.length) {
				replies.push({ reply: handler.execute(context, args) });
			} else {
				for (const id of ids) {
					replies.push({ id, reply: handler.execute(context, { ...args, object: id }) });
				}
			}
		} catch (error) {
			logger.error(
				`[${state.sessionId}] ${context.command.verb} failed on "${context.command.raw}": ${error}`
			);
			throw error;
		}

		const reply = this.combine(context, replies);
		if (!reply.success) return createResult(reply);

		for (const id of ids) context.affected.add(id);
		const stateChanged = fingerprint(draft) !== before;
		if (!handler.meta) passTime(context);
		const roomChanged = draft.currentRoom !== state.currentRoom;
		state.assign(draft);
		return createResult(reply, {
			notifications: context.notifications,
			effects: {
				roomChanged,
				stateChanged,
				affected: [...context.affected],
			},
		});
	}

	/**
	 * One reply for a whole multi-object command: "lamp: Taken." per line,
	 * successful when any part succeeded.
	 */
	private combine(
		context: CommandContext,
		replies: readonly { id?: string; reply: Reply }[]
	): Reply {
		if (replies.length === 1) return replies[0].reply;
		const lines = replies.map(({ id, reply }) =>
			id ? `${capitalizeFirst(nameOf(context, id))}: ${reply.message}` : reply.message
		);
		const success = replies.some(({ reply }) => reply.success);
		const last = replies[replies.length - 1].reply;
		return {
			success,
			outcome: success ? OUTCOME.OK : last.outcome,
			message: lines.join("\n"),
		};
	}

	private resolve(
		context: CommandContext,
		phrase: string,
		rule: ArgumentRule
	): Step {
		const state = context.state;
		const resolution = resolvePhrase(state, phrase, rule.scope);
		if (resolution.kind !== "missing") return resolution;
		if (rule.scope === SCOPE.HELD) {
			const nearby = resolvePhrase(state, phrase, SCOPE.REACHABLE);
			if (nearby.kind === "found") {
				return {
					kind: "failed",
					result: createResult(absent(`You're not carrying ${the(context, nearby.id)}.`)),
				};
			}
		}
		return {
			kind: "failed",
			result: createResult(absent(`You don't see any ${phrase} here.`)),
		};
	}

	private ambiguous(
		context: CommandContext,
		state: GameState,
		question: {
			role: ROLE.OBJECT | ROLE.TOOL;
			index: number;
			ids: string[];
			phrase: string;
			bindings: Bindings;
		}
	): ActionResult {
		state.pending = {
			kind: "disambiguation",
			command: context.command,
			role: question.role,
			index: question.index,
			candidates: question.ids,
			bindings: question.bindings,
		};
		const words = question.phrase.split(" ");
		const head = words[words.length - 1];
		const choices = question.ids.map((id) => the(context, id));
		return createResult(
			{
				success: false,
				outcome: OUTCOME.AMBIGUOUS_REFERENCE,
				message: `Which ${head} do you mean, ${joinWithAnd(choices, "or")}?`,
			},
			{ candidates: question.ids }
		);
	}
}
