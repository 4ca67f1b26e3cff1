/**
 * DISEMBARK: gets out of the current vehicle.
 *
 * @module commands/disembark
 */

import type { CommandObject } from "../core/command.js";
import { disembark } from "./_movement.js";

export default {
	verb: "DISEMBARK",
	execute: (context) => disembark(context),
} satisfies CommandObject;
