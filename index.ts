import { createInterface } from "readline/promises";
import { join } from "path";
import { loadAllPackages } from "./package.js";
import logger from "./src/utils/logger.js";
import { Engine } from "./src/core/engine.js";
import { CONFIG } from "./src/registry/config.js";
import { getCommandRegistry } from "./src/registry/command.js";
import { getVocabulary } from "./src/registry/vocabulary.js";
import { getWorld } from "./src/registry/world.js";
import { getSafeRootDirectory } from "./src/utils/path.js";
import { FileSaveStore } from "./src/save.js";
import { SessionManager, welcome } from "./src/session.js";

await logger.block("packages", async () => {
	logger.info("Loading packages...");
	await loadAllPackages();
});

const engine = new Engine({
	world: getWorld(),
	vocabulary: getVocabulary(),
	registry: getCommandRegistry(),
	theme: CONFIG.game.theme,
	sanity: CONFIG.player.sanity,
});
const sessions = new SessionManager({
	engine,
	store: new FileSaveStore(join(getSafeRootDirectory(), CONFIG.saves.directory)),
});

const sessionId = process.env.HOLLOW_MANOR_SESSION || "local";
const terminal = createInterface({ input: process.stdin, output: process.stdout });

console.log(welcome(engine, CONFIG.game.name));
console.log("");
console.log((await sessions.submit({ sessionId, raw: "look" })).narrative);

try {
	for (;;) {
		const line = await terminal.question("\n> ");
		const response = await sessions.submit({ sessionId, raw: line });
		console.log(response.narrative);
		if (response.quit) break;
	}
} finally {
	terminal.close();
	logger.info("Goodbye");
}
