import { suite, test, before } from "node:test";
import assert from "node:assert";
import { loadTestEngine } from "../testing.js";
import type { Engine } from "./engine.js";
import {
	SCOPE,
	heldObjects,
	isLit,
	isSeeThrough,
	reachableObjects,
	resolvePhrase,
	roomObjects,
} from "./scope.js";
import { INVENTORY, inside } from "./world.js";

suite("core/scope.ts", () => {
	let engine: Engine;

	before(async () => {
		engine = await loadTestEngine();
	});

	test("should reach into open containers only", () => {
		const state = engine.newGame("scope");
		assert.deepStrictEqual(roomObjects(state), ["mailbox", "front_door"]);
		state.updateObject("mailbox", { open: true });
		assert.deepStrictEqual(roomObjects(state), ["mailbox", "advertisement", "front_door"]);
	});

	test("should put carried objects first", () => {
		const state = engine.newGame("scope");
		state.moveObject("lamp", INVENTORY);
		assert.deepStrictEqual(heldObjects(state), ["lamp"]);
		assert.deepStrictEqual(reachableObjects(state), ["lamp", "mailbox", "front_door"]);
	});

	test("should hide a dark room's contents", () => {
		const state = engine.newGame("scope");
		state.currentRoom = "attic";
		assert.strictEqual(isLit(state), false);
		assert.deepStrictEqual(roomObjects(state), []);
	});

	test("should light a dark room with a carried lamp", () => {
		const state = engine.newGame("scope");
		state.currentRoom = "attic";
		state.moveObject("lamp", INVENTORY);
		state.updateObject("lamp", { lit: true });
		assert.strictEqual(isLit(state), true);
		assert.deepStrictEqual(roomObjects(state), ["rope", "knife", "cloak"]);
	});

	test("should see into a closed transparent container without reaching in", () => {
		const state = engine.newGame("scope");
		state.currentRoom = "living_room";
		state.moveObject("painting", inside("trophy_case"));
		assert.strictEqual(isSeeThrough(state, "trophy_case"), true);
		assert.strictEqual(reachableObjects(state).includes("painting"), false);
	});

	suite("resolvePhrase()", () => {
		test("should report every equally good match", () => {
			const state = engine.newGame("scope");
			state.currentRoom = "living_room";
			assert.deepStrictEqual(resolvePhrase(state, "sword", SCOPE.REACHABLE), {
				kind: "ambiguous",
				ids: ["elvish_sword", "rusty_sword"],
			});
		});

		test("should narrow by adjective", () => {
			const state = engine.newGame("scope");
			state.currentRoom = "living_room";
			assert.deepStrictEqual(resolvePhrase(state, "rusty sword", SCOPE.REACHABLE), {
				kind: "found",
				id: "rusty_sword",
			});
			assert.deepStrictEqual(resolvePhrase(state, "elvish", SCOPE.REACHABLE), {
				kind: "found",
				id: "elvish_sword",
			});
		});

		test("should prefer objects named by the last word", () => {
			const state = engine.newGame("scope");
			state.currentRoom = "living_room";
			// the trophy case is glass-fronted; the mirror is a glass
			assert.deepStrictEqual(resolvePhrase(state, "glass", SCOPE.REACHABLE), {
				kind: "found",
				id: "mirror",
			});
		});

		test("should respect the scope", () => {
			const state = engine.newGame("scope");
			state.currentRoom = "living_room";
			assert.deepStrictEqual(resolvePhrase(state, "lamp", SCOPE.HELD), {
				kind: "missing",
			});
			state.moveObject("lamp", INVENTORY);
			assert.deepStrictEqual(resolvePhrase(state, "lamp", SCOPE.ROOM), {
				kind: "missing",
			});
		});
	});
});
