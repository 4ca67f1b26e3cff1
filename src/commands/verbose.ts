/**
 * VERBOSE, BRIEF and SUPERBRIEF: how much a room says on arrival.
 *
 * - verbose: the full description every time
 * - brief: the full description on the first visit only
 * - superbrief: the room name only
 *
 * @module commands/verbose
 */

import type { CommandObject } from "../core/command.js";
import { ok } from "../core/result.js";
import type { Verbosity } from "../core/state.js";

const MODES: Record<string, { verbosity: Verbosity; message: string }> = {
	VERBOSE: { verbosity: "verbose", message: "Maximum verbosity." },
	BRIEF: { verbosity: "brief", message: "Brief descriptions." },
	SUPERBRIEF: { verbosity: "superbrief", message: "Superbrief descriptions." },
};

export default {
	verb: "VERBOSE",
	aliases: ["BRIEF", "SUPERBRIEF"],
	meta: true,
	execute(context) {
		const mode = MODES[context.command.verb] ?? MODES.VERBOSE;
		context.state.verbosity = mode.verbosity;
		return ok(mode.message);
	},
} satisfies CommandObject;
