/**
 * Liquid bookkeeping for FILL, POUR and DRINK.
 *
 * @module commands/_liquid
 */

import type { CommandContext } from "../core/command.js";
import { reachableObjects, resolvePhrase, SCOPE } from "../core/scope.js";

/**
 * Where liquid comes from. `from` is a container that loses what it gives;
 * without it the source never runs dry (the river, a spring).
 */
export interface LiquidSource {
	kind: string;
	from?: string;
}

export function capacityOf(context: CommandContext, id: string): number {
	return context.world.object(id).liquidCapacity ?? 1;
}

function sourceObject(
	context: CommandContext,
	id: string
): LiquidSource | undefined {
	const template = context.world.object(id);
	if (template.liquidSource) return { kind: template.liquidSource };
	const liquid = context.state.objectState(id).liquid;
	if (liquid && liquid.amount > 0) return { kind: liquid.kind, from: id };
	return undefined;
}

/**
 * Finds something to fill `target` from: the named object, then water in
 * the room, then any liquid source within reach.
 */
export function findSource(
	context: CommandContext,
	target: string,
	phrase?: string
): LiquidSource | undefined {
	const state = context.state;
	if (phrase) {
		const named = resolvePhrase(state, phrase, SCOPE.REACHABLE);
		if (named.kind === "found" && named.id !== target) {
			const source = sourceObject(context, named.id);
			if (source) return source;
		}
	}
	if (context.world.room(state.currentRoom).hasWater) return { kind: "water" };
	for (const id of reachableObjects(state)) {
		if (id === target) continue;
		if (context.world.object(id).liquidSource) return sourceObject(context, id);
	}
	return undefined;
}

/**
 * Moves up to `amount` of liquid out of a container. Returns how much left it.
 */
export function drain(context: CommandContext, id: string, amount: number): number {
	const liquid = context.state.objectState(id).liquid;
	if (!liquid) return 0;
	const taken = Math.min(amount, liquid.amount);
	const left = liquid.amount - taken;
	context.state.updateObject(id, {
		liquid: left > 0 ? { kind: liquid.kind, amount: left } : undefined,
	});
	context.affected.add(id);
	return taken;
}
