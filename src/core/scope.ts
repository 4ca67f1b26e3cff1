/**
 * Scope: which objects the player can see and reach, and how a noun phrase
 * picks among them.
 *
 * Reachable objects are those in the current room (when there is light),
 * those carried, and anything inside an open container among them, however
 * deep. A dark room hides everything except what the player carries and
 * lit light sources.
 *
 * @module core/scope
 */

import {
	CAPABILITY,
	hasCapability,
	inRoom,
	inside,
	isContainer,
	INVENTORY,
} from "./world.js";
import type { GameState } from "./state.js";

export enum SCOPE {
	/** Room, inventory and open containers in either. */
	REACHABLE = "reachable",
	/** Inventory and open containers in it. */
	HELD = "held",
	/** Room and open containers in it, nothing carried. */
	ROOM = "room",
}

export type Resolution =
	| { kind: "found"; id: string }
	| { kind: "ambiguous"; ids: string[] }
	| { kind: "missing" };

/**
 * True when the object is giving off light right now.
 */
export function isLightSource(state: GameState, id: string): boolean {
	const template = state.world.object(id);
	return (
		state.objectState(id).lit &&
		(hasCapability(template, CAPABILITY.LIGHTABLE) ||
			hasCapability(template, CAPABILITY.FIRE_SOURCE))
	);
}

/**
 * True when a container's contents can be reached.
 */
export function isAccessible(state: GameState, id: string): boolean {
	const template = state.world.object(id);
	if (!isContainer(template)) return false;
	return !hasCapability(template, CAPABILITY.OPENABLE) || state.objectState(id).open;
}

/**
 * True when a container's contents can be seen.
 */
export function isSeeThrough(state: GameState, id: string): boolean {
	const template = state.world.object(id);
	return (
		isAccessible(state, id) ||
		(isContainer(template) && hasCapability(template, CAPABILITY.TRANSPARENT))
	);
}

function expand(state: GameState, ids: readonly string[]): string[] {
	const result: string[] = [];
	const visit = (id: string) => {
		if (result.includes(id)) return;
		result.push(id);
		if (isAccessible(state, id)) {
			for (const child of state.contentsOf(inside(id))) visit(child);
		}
	};
	ids.forEach(visit);
	return result;
}

/**
 * True when the current room is lit, by itself or by a light source the
 * player carries or that sits in the room.
 */
export function isLit(state: GameState): boolean {
	const room = state.world.room(state.currentRoom);
	if (!room.isDark) return true;
	const nearby = expand(state, [
		...state.inventory,
		...state.contentsOf(inRoom(state.currentRoom)),
	]);
	return nearby.some((id) => isLightSource(state, id));
}

export function heldObjects(state: GameState): string[] {
	return expand(state, state.contentsOf(INVENTORY));
}

export function roomObjects(state: GameState): string[] {
	const here = state.contentsOf(inRoom(state.currentRoom));
	if (isLit(state)) return expand(state, here);
	return here.filter((id) => isLightSource(state, id));
}

export function reachableObjects(state: GameState): string[] {
	return [...heldObjects(state), ...roomObjects(state)];
}

export function objectsInScope(state: GameState, scope: SCOPE): string[] {
	switch (scope) {
		case SCOPE.HELD:
			return heldObjects(state);
		case SCOPE.ROOM:
			return roomObjects(state);
		default:
			return reachableObjects(state);
	}
}

/**
 * Candidates whose words cover every word of the phrase, keeping only the
 * best group: objects named by the phrase's last word outrank objects
 * that merely carry it as an adjective.
 */
export function matchObjects(
	state: GameState,
	phrase: string,
	ids: readonly string[]
): string[] {
	const tokens = phrase.split(/\s+/).filter(Boolean);
	if (!tokens.length) return [];
	const matches = ids.filter((id) => {
		const words = state.world.wordsFor(id);
		return tokens.every((token) => words.has(token));
	});
	const head = tokens[tokens.length - 1];
	const named = matches.filter((id) => state.world.nounsFor(id).has(head));
	return named.length ? named : matches;
}

/**
 * Resolves a noun phrase against the objects in scope.
 */
export function resolvePhrase(
	state: GameState,
	phrase: string,
	scope: SCOPE
): Resolution {
	const matches = matchObjects(state, phrase, objectsInScope(state, scope));
	if (matches.length === 1) return { kind: "found", id: matches[0] };
	if (matches.length > 1) return { kind: "ambiguous", ids: matches };
	return { kind: "missing" };
}
