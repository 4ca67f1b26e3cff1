import { suite, test, before, after } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { commandFromModule, isCommandFile, loadCommands } from "./commands.js";
import { CommandRegistry } from "../registry/command.js";

suite("package/commands.ts", () => {
	suite("isCommandFile()", () => {
		test("should accept command modules", () => {
			assert.strictEqual(isCommandFile("take.ts"), true);
			assert.strictEqual(isCommandFile("take.js"), true);
		});

		test("should skip helpers, specs and declarations", () => {
			assert.strictEqual(isCommandFile("_helpers.ts"), false);
			assert.strictEqual(isCommandFile("take.spec.ts"), false);
			assert.strictEqual(isCommandFile("take.d.ts"), false);
			assert.strictEqual(isCommandFile("readme.txt"), false);
		});
	});

	suite("commandFromModule()", () => {
		const execute = () => ({ success: true, outcome: "ok", message: "" });

		test("should take the default export", () => {
			const command = { verb: "WAIT", execute };
			assert.strictEqual(commandFromModule({ default: command }), command);
		});

		test("should fall back to a named command export", () => {
			const command = { verb: "WAIT", execute };
			assert.strictEqual(commandFromModule({ command }), command);
		});

		test("should reject anything else", () => {
			assert.strictEqual(commandFromModule({ default: { verb: "WAIT" } }), undefined);
			assert.strictEqual(
				commandFromModule({ default: { verb: "WAIT", execute, aliases: "HOLD" } }),
				undefined
			);
			assert.strictEqual(commandFromModule(undefined), undefined);
		});
	});

	suite("loadCommands()", () => {
		let directory: string;

		before(async () => {
			directory = await mkdtemp(join(tmpdir(), "hollow-manor-commands-"));
			await writeFile(
				join(directory, "frob.js"),
				'module.exports = { verb: "FROB", aliases: ["TWIDDLE"], execute: () => ({ success: true, outcome: "ok", message: "Frobbed." }) };\n',
				"utf-8"
			);
			await writeFile(join(directory, "empty.js"), "module.exports = {};\n", "utf-8");
			await writeFile(join(directory, "broken.js"), "module.exports = {\n", "utf-8");
			await writeFile(
				join(directory, "_shared.js"),
				'module.exports = { verb: "SHARED", execute: () => undefined };\n',
				"utf-8"
			);
			await writeFile(join(directory, "readme.txt"), "not a command\n", "utf-8");
		});

		after(async () => {
			await rm(directory, { recursive: true, force: true });
		});

		test("should load valid modules and skip the rest", async () => {
			const registry = new CommandRegistry();
			const loaded = await loadCommands(registry, directory);
			assert.strictEqual(loaded, 1);
			assert.deepStrictEqual(registry.verbs(), ["FROB", "TWIDDLE"]);
		});

		test("should load the game's commands", async () => {
			const registry = new CommandRegistry();
			await loadCommands(registry);
			for (const verb of ["TAKE", "GO", "LOOK", "SAVE", "TURN_ON"]) {
				assert.ok(registry.has(verb), verb);
			}
		});
	});
});
