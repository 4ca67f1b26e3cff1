/**
 * EXIT: gets out of the current vehicle, or goes out.
 *
 * @module commands/exit
 */

import type { CommandObject } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { disembark, travel } from "./_movement.js";

export default {
	verb: "EXIT",
	execute(context) {
		if (context.state.currentVehicle) return disembark(context);
		return travel(context, DIRECTION.OUT);
	},
} satisfies CommandObject;
