/**
 * BOARD: climbs into a vehicle in the room.
 *
 * @example
 * ```
 * board boat
 * get in boat
 * ```
 *
 * @module commands/board
 */

import type { CommandObject } from "../core/command.js";
import { SCOPE } from "../core/scope.js";
import { withObject } from "./_helpers.js";
import { board } from "./_movement.js";

export default {
	verb: "BOARD",
	object: {
		required: true,
		scope: SCOPE.ROOM,
		prompt: "What do you want to get into?",
	},
	execute: withObject((context, id) => board(context, id)),
} satisfies CommandObject;
