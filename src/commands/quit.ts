/**
 * QUIT: ends the game and tells the front end to close.
 *
 * @module commands/quit
 */

import type { CommandObject } from "../core/command.js";
import { themed } from "../core/describe.js";
import { OUTCOME } from "../core/result.js";
import { scoreLine } from "./score.js";

export default {
	verb: "QUIT",
	meta: true,
	afterEnd: true,
	execute(context) {
		context.state.ended = true;
		const farewell = themed(
			context,
			"Goodbye.",
			"The front door creaks shut behind you. The house will wait."
		);
		return {
			success: true,
			outcome: OUTCOME.OK,
			message: `${scoreLine(context)}\n${farewell}`,
			quit: true,
		};
	},
} satisfies CommandObject;
