/**
 * INVENTORY: lists what the player is carrying.
 *
 * @example
 * ```
 * inventory
 * i
 * ```
 *
 * @module commands/inventory
 */

import type { CommandObject } from "../core/command.js";
import { describeInventory } from "../core/describe.js";
import { ok } from "../core/result.js";

export default {
	verb: "INVENTORY",
	meta: true,
	execute: (context) => ok(describeInventory(context)),
} satisfies CommandObject;
