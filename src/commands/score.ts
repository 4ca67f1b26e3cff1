/**
 * SCORE: reports points, the best possible total and the move count.
 *
 * @example
 * ```
 * score
 * ```
 *
 * @module commands/score
 */

import type { CommandContext, CommandObject } from "../core/command.js";
import { ok } from "../core/result.js";
import type { World } from "../core/world.js";

/**
 * Every treasure's value plus every room's first-visit bonus.
 */
export function maxScore(world: World): number {
	let total = 0;
	for (const template of world.objects.values()) total += template.treasure;
	for (const room of world.rooms.values()) total += room.firstVisit.score;
	return total;
}

export function scoreLine(context: CommandContext): string {
	const { score, moves } = context.state;
	const unit = moves === 1 ? "move" : "moves";
	return `Your score is ${score} of a possible ${maxScore(context.world)}, in ${moves} ${unit}.`;
}

export default {
	verb: "SCORE",
	meta: true,
	afterEnd: true,
	execute: (context) => ok(scoreLine(context)),
} satisfies CommandObject;
