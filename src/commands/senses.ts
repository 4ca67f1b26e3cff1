/**
 * LISTEN and SMELL: the room's sounds and smell, or an object's reaction.
 *
 * @example
 * ```
 * listen
 * smell garlic
 * ```
 *
 * @module commands/senses
 */

import type { CommandObject } from "../core/command.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { react } from "./_helpers.js";

export default {
	verb: "LISTEN",
	aliases: ["SMELL"],
	object: { required: false, scope: SCOPE.REACHABLE },
	execute(context, args) {
		const listening = context.command.verb === "LISTEN";
		const nothing = listening ? "You hear nothing unusual." : "You smell nothing unusual.";
		if (args.object) return ok(react(context, args.object) || nothing);
		const room = context.world.room(context.state.currentRoom);
		return ok((listening ? room.sounds : room.smell) ?? nothing);
	},
} satisfies CommandObject;
