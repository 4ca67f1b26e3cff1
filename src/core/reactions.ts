/**
 * Applying data-driven reactions and the other shared side effects: score,
 * the curse and revealed objects.
 *
 * @module core/reactions
 */

import type { CommandContext } from "./command.js";
import { themed } from "./describe.js";
import { adjustSanity } from "./sanity.js";
import { inRoom, type Reaction } from "./world.js";

/**
 * Flag recording that a once-only reaction has fired.
 */
export function reactionFlag(objectId: string, key: string): string {
	return `reaction:${objectId}:${key}`;
}

/**
 * True when the reaction's flag conditions hold and, for once-only
 * reactions, it has not fired yet.
 */
export function canReact(
	context: CommandContext,
	reaction: Reaction,
	objectId: string,
	key: string
): boolean {
	if (!context.state.meets(reaction.requires)) return false;
	return !reaction.once || !context.state.hasFlag(reactionFlag(objectId, key));
}

export function awardScore(context: CommandContext, points: number): void {
	if (points === 0) return;
	context.state.score += points;
	context.notifications.push(
		points > 0
			? `[Your score has gone up by ${points}.]`
			: `[Your score has gone down by ${-points}.]`
	);
}

export function curse(context: CommandContext): void {
	if (context.state.cursed) return;
	context.state.cursed = true;
	context.notifications.push(
		"A chill settles into your bones. Something has marked you."
	);
}

/**
 * Applies a reaction's state changes and returns its message.
 * Revealed objects appear in the current room.
 */
export function applyReaction(
	context: CommandContext,
	reaction: Reaction,
	objectId: string,
	key: string
): string {
	const state = context.state;
	if (reaction.once) state.setFlag(reactionFlag(objectId, key));
	for (const flag of reaction.setsFlags) state.setFlag(flag);
	for (const flag of reaction.clearsFlags) state.clearFlag(flag);
	for (const id of reaction.reveals) {
		state.moveObject(id, inRoom(state.currentRoom));
		context.affected.add(id);
	}
	for (const id of reaction.unlocks) {
		state.updateObject(id, { locked: false });
		context.affected.add(id);
	}
	if (reaction.sanity) adjustSanity(context, reaction.sanity);
	awardScore(context, reaction.score);
	if (reaction.curse) curse(context);
	return themed(context, reaction.message, reaction.themed);
}
