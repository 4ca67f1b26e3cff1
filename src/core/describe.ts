/**
 * Narrative text: object names, room descriptions and listings.
 *
 * Under the haunted theme objects and rooms use their themed name and
 * description where the world data gives one; otherwise the plain text is
 * used for both themes.
 *
 * @module core/describe
 */

import { capitalizeFirst, joinWithAnd, withArticle } from "../utils/string.js";
import type { CommandContext, Theme } from "./command.js";
import { isLit, isSeeThrough } from "./scope.js";
import type { GameState } from "./state.js";
import {
	CAPABILITY,
	hasCapability,
	inRoom,
	inside,
	isActor,
	isContainer,
	type ObjectTemplate,
} from "./world.js";

export const DARKNESS =
	"It is pitch black. You are likely to be eaten by a grue.";

/**
 * Picks between plain and themed text.
 */
export function themed(
	context: { theme: Theme },
	plain: string,
	haunted?: string
): string {
	return context.theme === "haunted" && haunted ? haunted : plain;
}

export function nameOf(context: CommandContext, id: string): string {
	const template = context.world.object(id);
	return themed(context, template.name, template.themedName);
}

/** "the lamp" */
export function the(context: CommandContext, id: string): string {
	return `the ${nameOf(context, id)}`;
}

/** "a lamp", "an egg" */
export function a(context: CommandContext, id: string): string {
	return withArticle(nameOf(context, id));
}

function hereLine(context: CommandContext, template: ObjectTemplate): string {
	if (template.here) return template.here;
	const name = a(context, template.id);
	if (isActor(template)) return `${capitalizeFirst(name)} is here.`;
	return `There is ${name} here.`;
}

/**
 * "The mailbox contains a leaflet." for an open or transparent container
 * with something in it.
 */
export function contentsLine(
	context: CommandContext,
	id: string
): string | undefined {
	const state = context.state;
	if (!isSeeThrough(state, id)) return undefined;
	const contents = state.contentsOf(inside(id));
	if (!contents.length) return undefined;
	return `${capitalizeFirst(the(context, id))} contains ${joinWithAnd(
		contents.map((child) => a(context, child))
	)}.`;
}

/**
 * Listing lines for the loose objects in the current room. Scenery and doors
 * are part of the room description and are not listed.
 */
export function roomObjectLines(context: CommandContext): string[] {
	const state = context.state;
	const lines: string[] = [];
	for (const id of state.contentsOf(inRoom(state.currentRoom))) {
		if (id === state.currentVehicle) continue;
		const template = context.world.object(id);
		if (template.type === "scenery" || template.type === "door") {
			const contents = contentsLine(context, id);
			if (contents) lines.push(contents);
			continue;
		}
		lines.push(hereLine(context, template));
		const contents = contentsLine(context, id);
		if (contents) lines.push(contents);
	}
	return lines;
}

/**
 * Room description for the current room.
 *
 * - `verbose` always prints the full description
 * - `brief` prints it on the first visit and on LOOK
 * - `superbrief` prints only the name unless forced
 */
export function describeRoom(
	context: CommandContext,
	options: { force?: boolean; firstVisit?: boolean } = {}
): string {
	const state = context.state;
	const room = context.world.room(state.currentRoom);
	if (!isLit(state)) return room.darkDescription ?? DARKNESS;
	const force = options.force ?? false;
	const title = state.currentVehicle
		? `${room.name}, in ${the(context, state.currentVehicle)}`
		: room.name;
	const lines = [title];
	const full =
		force ||
		state.verbosity === "verbose" ||
		(state.verbosity === "brief" && (options.firstVisit ?? false));
	if (full) lines.push(themed(context, room.description, room.themedDescription));
	if (force || state.verbosity !== "superbrief") {
		lines.push(...roomObjectLines(context));
	}
	return lines.join("\n");
}

/**
 * EXAMINE text: the description plus whatever state is visible.
 */
export function describeObject(context: CommandContext, id: string): string {
	const state = context.state;
	const template = context.world.object(id);
	const objectState = state.objectState(id);
	const lines = [
		themed(context, template.description, template.themedDescription),
	];
	const The = capitalizeFirst(the(context, id));
	if (hasCapability(template, CAPABILITY.OPENABLE)) {
		lines.push(`${The} is ${objectState.open ? "open" : "closed"}.`);
	}
	if (
		hasCapability(template, CAPABILITY.LIGHTABLE) ||
		hasCapability(template, CAPABILITY.FIRE_SOURCE)
	) {
		if (objectState.lit) lines.push(`${The} is lit.`);
	}
	if (isContainer(template) && isSeeThrough(state, id)) {
		lines.push(contentsLine(context, id) ?? `${The} is empty.`);
	}
	if (objectState.liquid) {
		lines.push(`${The} contains some ${objectState.liquid.kind}.`);
	}
	if (objectState.tiedTo) {
		lines.push(`${The} is tied to ${the(context, objectState.tiedTo)}.`);
	}
	if (objectState.inflated) lines.push(`${The} is inflated.`);
	if (objectState.worn) lines.push("You are wearing it.");
	return lines.join("\n");
}

/**
 * Inventory listing, one object per line, with container contents indented.
 */
export function describeInventory(context: CommandContext): string {
	const state = context.state;
	const held = state.inventory;
	if (!held.length) return "You are empty-handed.";
	const lines = ["You are carrying:"];
	const list = (ids: string[], depth: number) => {
		for (const id of ids) {
			const worn = state.objectState(id).worn ? " (being worn)" : "";
			const lit = state.objectState(id).lit ? " (providing light)" : "";
			lines.push(`${"  ".repeat(depth)}${a(context, id)}${worn}${lit}`);
			if (isSeeThrough(state, id)) list(state.contentsOf(inside(id)), depth + 1);
		}
	};
	list(held, 1);
	return lines.join("\n");
}

/**
 * Names of carried objects, for session responses.
 */
export function inventoryNames(
	state: GameState,
	theme: Theme
): string[] {
	return state.inventory.map((id) => {
		const template = state.world.object(id);
		return themed({ theme }, template.name, template.themedName);
	});
}
