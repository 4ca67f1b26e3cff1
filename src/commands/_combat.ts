/**
 * Combat helpers for ATTACK and THROW.
 *
 * A blow takes the weapon's damage off the target's health. A target that
 * drops to zero is defeated: it vanishes, leaves behind what it carried and
 * sets its victory flag. Otherwise it strikes back, costing sanity equal to
 * its strength less the armor the player wears (at least 1). A blow landing
 * on a player whose sanity is already gone ends the game.
 *
 * @module commands/_combat
 */

import type { CommandContext } from "../core/command.js";
import { the, themed } from "../core/describe.js";
import { adjustSanity } from "../core/sanity.js";
import { DESTROYED, heldBy, inRoom, isActor } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";

export const BARE_HANDS = 1;
export const DEFAULT_WEAPON_DAMAGE = 5;
export const VICTORY_SANITY_COST = 2;

export function weaponDamage(context: CommandContext, weapon?: string): number {
	if (!weapon) return BARE_HANDS;
	return context.world.object(weapon).damage ?? DEFAULT_WEAPON_DAMAGE;
}

/** Total armor of what the player is wearing. */
export function wornArmor(context: CommandContext): number {
	const state = context.state;
	return state.inventory
		.filter((id) => state.objectState(id).worn)
		.reduce((total, id) => total + context.world.object(id).armor, 0);
}

function defeat(context: CommandContext, id: string): string {
	const state = context.state;
	const template = context.world.object(id);
	for (const item of state.contentsOf(heldBy(id))) {
		state.moveObject(item, inRoom(state.currentRoom));
		context.affected.add(item);
	}
	state.updateObject(id, { health: 0 });
	state.moveObject(id, DESTROYED);
	if (isActor(template) && template.victoryFlag) state.setFlag(template.victoryFlag);
	adjustSanity(context, -VICTORY_SANITY_COST);
	return (
		(isActor(template) && template.deathMessage) ||
		`${capitalizeFirst(the(context, id))} collapses and is still.`
	);
}

function counterattack(context: CommandContext, id: string): string {
	const state = context.state;
	const template = context.world.object(id);
	const The = capitalizeFirst(the(context, id));
	if (state.sanity === 0) {
		state.ended = true;
		return `${The} strikes back, and the darkness takes you.\n\n**** You have died ****`;
	}
	const strength = isActor(template) ? template.strength : 1;
	adjustSanity(context, -Math.max(1, strength - wornArmor(context)));
	return themed(
		context,
		`${The} strikes back. You reel from the blow.`,
		`${The} strikes back, and for a moment you see what it really is.`
	);
}

/**
 * Lands a blow of `damage` on an actor and returns what happens next.
 */
export function wound(context: CommandContext, id: string, damage: number): string {
	const state = context.state;
	const health = (state.objectState(id).health ?? 1) - damage;
	if (health <= 0) return defeat(context, id);
	state.updateObject(id, { health, disposition: "hostile" });
	return counterattack(context, id);
}
