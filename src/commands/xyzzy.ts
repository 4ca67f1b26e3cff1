/**
 * XYZZY: an old magic word that does nothing here.
 *
 * @module commands/xyzzy
 */

import type { CommandObject } from "../core/command.js";
import { ok } from "../core/result.js";

export default {
	verb: "XYZZY",
	meta: true,
	execute: () => ok('A hollow voice says "Fool."'),
} satisfies CommandObject;
