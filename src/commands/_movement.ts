/**
 * Movement helpers shared by GO, CLIMB, ENTER, EXIT, BOARD and DISEMBARK.
 *
 * @module commands/_movement
 */

import type { CommandContext } from "../core/command.js";
import { describeRoom, the } from "../core/describe.js";
import { awardScore } from "../core/reactions.js";
import { blocked, conflict, mismatch, ok, type Reply } from "../core/result.js";
import { adjustSanity } from "../core/sanity.js";
import { CAPABILITY, hasCapability, inRoom, isVehicle } from "../core/world.js";
import type { DIRECTION } from "../direction.js";
import { capitalizeFirst } from "../utils/string.js";

export const NO_EXIT = "You can't go that way.";

/**
 * Puts the player (and their vehicle) in `roomId` and describes it.
 * The first visit awards the room's bonus; every entry applies its
 * sanity effect.
 */
export function enterRoom(context: CommandContext, roomId: string): string {
	const state = context.state;
	const room = context.world.room(roomId);
	state.currentRoom = roomId;
	if (state.currentVehicle) {
		state.moveObject(state.currentVehicle, inRoom(roomId));
		context.affected.add(state.currentVehicle);
	}
	const firstVisit = !state.visited.has(roomId);
	if (firstVisit) {
		state.visited.add(roomId);
		awardScore(context, room.firstVisit.score);
		if (room.firstVisit.sanity) adjustSanity(context, room.firstVisit.sanity);
	}
	if (room.sanityEffect) adjustSanity(context, room.sanityEffect);
	return describeRoom(context, { firstVisit });
}

/**
 * Follows the exit in `direction`, checking flags, doors and water.
 */
export function travel(context: CommandContext, direction: DIRECTION): Reply {
	const state = context.state;
	const room = context.world.room(state.currentRoom);
	const exit = room.exits.get(direction);
	if (!exit) return blocked(NO_EXIT);
	if (exit.to === undefined || !state.meets(exit.requires)) {
		return blocked(exit.blocked ?? NO_EXIT);
	}
	if (exit.door && !state.objectState(exit.door).open) {
		return blocked(`${capitalizeFirst(the(context, exit.door))} is closed.`);
	}

	const destination = context.world.room(exit.to);
	const vehicle = state.currentVehicle;
	if (vehicle) {
		const template = context.world.object(vehicle);
		if (isVehicle(template) && template.requiresWater && !destination.hasWater) {
			return blocked(
				`You can't take ${the(context, vehicle)} onto dry land. You'll have to get out first.`
			);
		}
	} else if (destination.deepWater) {
		return blocked("The water is too deep to wade. You would need a boat.");
	}
	return ok(enterRoom(context, exit.to));
}

/**
 * Climbs into a vehicle in the current room.
 */
export function board(context: CommandContext, id: string): Reply {
	const state = context.state;
	const template = context.world.object(id);
	const The = capitalizeFirst(the(context, id));
	if (!isVehicle(template) || !hasCapability(template, CAPABILITY.BOARDABLE)) {
		return mismatch(`You can't get into ${the(context, id)}.`, "not boardable");
	}
	if (state.currentVehicle === id) {
		return conflict(`You're already in ${the(context, id)}.`);
	}
	if (state.currentVehicle) {
		return conflict(
			`You'll have to get out of ${the(context, state.currentVehicle)} first.`
		);
	}
	if (state.locationOf(id).kind !== "room") {
		return mismatch(`You'll have to put ${the(context, id)} down first.`, "not in the room");
	}
	if (
		hasCapability(template, CAPABILITY.INFLATABLE) &&
		!state.objectState(id).inflated
	) {
		return mismatch(`${The} is a heap of deflated plastic.`, "not inflated");
	}
	if (template.requiresWater && !context.world.room(state.currentRoom).hasWater) {
		return mismatch(`${The} is meant for the water.`, "needs water");
	}
	state.currentVehicle = id;
	return ok(`You are now in ${the(context, id)}.`);
}

/**
 * Gets out of the current vehicle, staying in its room.
 */
export function disembark(context: CommandContext): Reply {
	const state = context.state;
	const vehicle = state.currentVehicle;
	if (!vehicle) return conflict("You're not in anything.");
	if (context.world.room(state.currentRoom).deepWater) {
		return blocked("The water here is far too deep. You had better stay aboard.");
	}
	state.currentVehicle = undefined;
	context.affected.add(vehicle);
	return ok(`You get out of ${the(context, vehicle)}.`);
}
