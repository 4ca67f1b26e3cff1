/**
 * HELP: shows a helpfile. With no topic it shows the general one.
 *
 * A topic matches a helpfile keyword or alias; otherwise the first
 * helpfile the topic is a prefix of.
 *
 * @example
 * ```
 * help
 * help movement
 * help mov
 * ```
 *
 * @module commands/help
 */

import type { CommandObject } from "../core/command.js";
import type { Helpfile } from "../core/help.js";
import { absent, ok } from "../core/result.js";
import { autocompleteHelpfile, getHelpfile, getHelpfiles } from "../registry/help.js";

export const GENERAL_TOPIC = "help";

export const FALLBACK_HELP =
	"Type what you want to do in plain words: GO NORTH, TAKE LAMP, OPEN THE MAILBOX. LOOK describes where you are and INVENTORY lists what you carry.";

function render(helpfile: Helpfile): string {
	const lines = [helpfile.content];
	if (helpfile.related.length) {
		lines.push("", `See also: ${helpfile.related.join(", ")}`);
	}
	return lines.join("\n");
}

export default {
	verb: "HELP",
	meta: true,
	afterEnd: true,
	execute(context) {
		const topic = context.command.object;
		if (!topic) {
			const general = getHelpfile(GENERAL_TOPIC);
			if (!general) return ok(FALLBACK_HELP);
			const topics = getHelpfiles()
				.filter((helpfile) => helpfile !== general)
				.map((helpfile) => helpfile.keyword);
			const lines = [render(general)];
			if (topics.length) lines.push("", `Topics: ${topics.join(", ")}`);
			return ok(lines.join("\n"));
		}
		const helpfile = getHelpfile(topic) ?? autocompleteHelpfile(topic)[0];
		if (!helpfile) return absent(`There is no help on "${topic}".`);
		return ok(render(helpfile));
	},
} satisfies CommandObject;
