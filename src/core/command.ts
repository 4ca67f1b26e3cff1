/**
 * Command definitions: what a verb handler declares and what it receives.
 *
 * A command module under `src/commands/` default-exports a
 * {@link CommandObject}. The object names the
 * canonical verbs it handles and declares which roles the verb needs. The
 * engine checks those declarations, resolves noun phrases to object ids and
 * only then calls `execute`, so a handler can rely on everything it marked
 * as required being present and in scope.
 *
 * Quick start
 * ```ts
 * export default {
 *   verb: "READ",
 *   object: { required: true, scope: SCOPE.REACHABLE, prompt: "What do you want to read?" },
 *   execute(context, args) {
 *     if (!args.object) return mismatch("Read what?");
 *     const text = context.world.object(args.object).text;
 *     return text ? ok(text) : mismatch("There's nothing written on it.");
 *   },
 * } satisfies CommandObject;
 * ```
 *
 * @module core/command
 */

import type { DIRECTION } from "../direction.js";
import type { ParsedCommand } from "./parser.js";
import type { Reply } from "./result.js";
import type { SCOPE } from "./scope.js";
import type { GameState } from "./state.js";
import type { World } from "./world.js";

export type Theme = "haunted" | "classic";

/**
 * Context provided to command execution.
 *
 * `state` is a working copy: the engine commits it only when the handler
 * returns, so a handler that throws part-way leaves the session untouched.
 */
export interface CommandContext {
	readonly world: World;
	readonly state: GameState;
	readonly command: ParsedCommand;
	readonly theme: Theme;
	/** Secondary lines collected while the command runs. */
	readonly notifications: string[];
	/** Object ids touched by the command. */
	readonly affected: Set<string>;
	/** A fresh game for this session, for RESTART. */
	readonly newGame: () => GameState;
}

/**
 * Resolved arguments. Object roles hold object ids, never phrases.
 */
export interface CommandArgs {
	object?: string;
	tool?: string;
	direction?: DIRECTION;
	/** Raw secondary phrase, for verbs that take a topic. */
	topic?: string;
}

/**
 * How the engine fills an object role.
 */
export interface ArgumentRule {
	required: boolean;
	scope: SCOPE;
	/** Question asked when a required role is missing. */
	prompt?: string | ((context: CommandContext, args: CommandArgs) => string);
	/** Accepts several objects ("take lamp and sword", "drop all"). */
	multiple?: boolean;
	/** Objects "all" stands for. */
	all?: (context: CommandContext, args: CommandArgs) => string[];
}

/**
 * Priority levels for verb ownership. When two modules claim the same verb,
 * the higher priority wins.
 */
export enum PRIORITY {
	LOW = 0,
	NORMAL = 1,
	HIGH = 2,
}

export interface CommandObject {
	/** Canonical verb handled. */
	verb: string;
	/** Further canonical verbs handled by the same code. */
	aliases?: string[];
	priority?: PRIORITY;
	object?: ArgumentRule;
	tool?: ArgumentRule;
	direction?: "required" | "optional";
	/** Passes the secondary phrase through as `args.topic`. */
	topic?: boolean;
	/** Does not take a turn (SCORE, SAVE, VERBOSE). */
	meta?: boolean;
	/** Still allowed after the game has ended. */
	afterEnd?: boolean;
	execute: (context: CommandContext, args: CommandArgs) => Reply;
}

/**
 * Every canonical verb a command object handles.
 */
export function verbsOf(command: CommandObject): string[] {
	return [command.verb, ...(command.aliases ?? [])];
}

export function isCommandObject(value: unknown): value is CommandObject {
	if (typeof value !== "object" || value === null) return false;
	if (!("verb" in value) || typeof value.verb !== "string") return false;
	if (!("execute" in value) || typeof value.execute !== "function") return false;
	if ("aliases" in value && value.aliases !== undefined) {
		if (!Array.isArray(value.aliases)) return false;
		if (!value.aliases.every((alias) => typeof alias === "string")) return false;
	}
	return true;
}
