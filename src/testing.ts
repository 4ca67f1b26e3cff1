/**
 * Test fixtures: the real world, vocabulary and commands wired into an
 * engine, loaded once per process.
 *
 * Tests play in the classic theme so messages read plainly.
 *
 * @module testing
 */

import type { CommandContext } from "./core/command.js";
import { Engine } from "./core/engine.js";
import { parse } from "./core/parser.js";
import type { GameState } from "./core/state.js";
import type { ActionResult } from "./core/result.js";
import { loadCommands } from "./package/commands.js";
import { readVocabulary } from "./package/vocabulary.js";
import { readWorld } from "./package/world.js";
import { CommandRegistry } from "./registry/command.js";

let loading: Promise<Engine> | undefined;

export function loadTestEngine(): Promise<Engine> {
	loading ??= (async () => {
		const registry = new CommandRegistry();
		const [world, vocabulary] = await Promise.all([
			readWorld(),
			readVocabulary(),
			loadCommands(registry),
		]);
		return new Engine({ world, vocabulary, registry, theme: "classic" });
	})();
	return loading;
}

/**
 * Plays each line in order and returns the last result.
 */
export function play(
	engine: Engine,
	state: GameState,
	...lines: string[]
): ActionResult {
	let result: ActionResult | undefined;
	for (const line of lines) result = engine.handlePlayerInput(line, state);
	if (!result) throw new Error("play() needs at least one line");
	return result;
}

/**
 * A command context over `state`, for calling helpers directly.
 */
export function contextFor(
	engine: Engine,
	state: GameState,
	raw = "look"
): CommandContext {
	const parsed = parse(raw, engine.vocabulary);
	if (!parsed.success) throw new Error(`Cannot parse "${raw}"`);
	return {
		world: engine.world,
		state,
		command: parsed.command,
		theme: engine.theme,
		notifications: [],
		affected: new Set(),
		newGame: () => engine.newGame(state.sessionId),
	};
}
