/**
 * Sanity: the haunted theme's second health bar.
 *
 * Sanity drops on entering unsettling rooms, in fights and through cursed
 * objects, and comes back through a few calming actions. Every change goes
 * through {@link adjustSanity}, which clamps the value and reports it to the
 * player, including a line whenever the player's tier changes.
 *
 * Tiers
 * - `normal`: 75 and above
 * - `disturbed`: 50 to 74
 * - `unreliable`: 25 to 49
 * - `garbled`: below 25
 *
 * @module core/sanity
 */

import type { CommandContext } from "./command.js";

export enum SANITY_TIER {
	NORMAL = "normal",
	DISTURBED = "disturbed",
	UNRELIABLE = "unreliable",
	GARBLED = "garbled",
}

export function sanityTier(value: number): SANITY_TIER {
	if (value >= 75) return SANITY_TIER.NORMAL;
	if (value >= 50) return SANITY_TIER.DISTURBED;
	if (value >= 25) return SANITY_TIER.UNRELIABLE;
	return SANITY_TIER.GARBLED;
}

function lossMessage(value: number): string {
	if (value > 50) return "Your sanity slips as dread washes over you...";
	if (value > 25) return "The horrors gnaw at your mind...";
	if (value > 0) return "Reality fractures around you...";
	return "Your mind shatters into fragments...";
}

/**
 * Changes sanity by `delta` and records what the player notices.
 * Returns the change actually applied after clamping.
 */
export function adjustSanity(context: CommandContext, delta: number): number {
	const state = context.state;
	const before = state.sanity;
	state.sanity = before + delta;
	const applied = state.sanity - before;
	if (applied === 0) return 0;
	context.notifications.push(
		applied < 0 ? lossMessage(state.sanity) : "A sense of calm returns to you."
	);
	const tier = sanityTier(state.sanity);
	if (tier !== sanityTier(before)) {
		context.notifications.push(`Your perception shifts... (${tier})`);
	}
	return applied;
}

/**
 * One-line reading for DIAGNOSE and SCORE.
 */
export function describeSanity(value: number): string {
	switch (sanityTier(value)) {
		case SANITY_TIER.NORMAL:
			return "Your mind is clear.";
		case SANITY_TIER.DISTURBED:
			return "You are jumpy. Shadows seem to move when you aren't looking.";
		case SANITY_TIER.UNRELIABLE:
			return "You can no longer fully trust what you see.";
		default:
			return "Your thoughts come apart as fast as you gather them.";
	}
}
