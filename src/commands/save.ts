/**
 * SAVE: asks the session layer to store the game.
 *
 * The optional word after the verb names a slot.
 *
 * @example
 * ```
 * save
 * save cellar
 * ```
 *
 * @module commands/save
 */

import type { CommandObject } from "../core/command.js";
import { OUTCOME } from "../core/result.js";

export const DEFAULT_SLOT = "default";

export default {
	verb: "SAVE",
	meta: true,
	execute: (context) => {
		const slot = context.command.object ?? DEFAULT_SLOT;
		return {
			success: true,
			outcome: OUTCOME.OK,
			message: "Saved.",
			persistence: { action: "save", slot },
		};
	},
} satisfies CommandObject;
