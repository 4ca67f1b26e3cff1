/**
 * RESTORE: asks the session layer to load a saved game. Works after the
 * game has ended.
 *
 * @module commands/restore
 */

import type { CommandObject } from "../core/command.js";
import { OUTCOME } from "../core/result.js";
import { DEFAULT_SLOT } from "./save.js";

export default {
	verb: "RESTORE",
	meta: true,
	afterEnd: true,
	execute: (context) => ({
		success: true,
		outcome: OUTCOME.OK,
		message: "Restored.",
		persistence: { action: "restore", slot: context.command.object ?? DEFAULT_SLOT },
	}),
} satisfies CommandObject;
