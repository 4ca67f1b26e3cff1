import { suite, test, before } from "node:test";
import assert from "node:assert";
import { loadTestEngine } from "../testing.js";
import type { Engine } from "./engine.js";
import { GameState } from "./state.js";
import { INVENTORY, inRoom, inside } from "./world.js";

suite("core/state.ts", () => {
	let engine: Engine;

	before(async () => {
		engine = await loadTestEngine();
	});

	test("should start a new game in the start room", () => {
		const state = engine.newGame("s1");
		assert.strictEqual(state.sessionId, "s1");
		assert.strictEqual(state.currentRoom, "west_of_house");
		assert.strictEqual(state.sanity, 100);
		assert.strictEqual(state.score, 0);
		assert.strictEqual(state.moves, 0);
		assert.deepStrictEqual([...state.visited], ["west_of_house"]);
		assert.deepStrictEqual(state.inventory, []);
	});

	test("should fill light sources with their battery", () => {
		const state = engine.newGame("s1");
		assert.strictEqual(state.resources.get("lamp"), 300);
		assert.strictEqual(state.resources.get("matchbook"), 10);
		assert.strictEqual(state.resources.has("candles"), false);
	});

	test("should clamp sanity to 0..100", () => {
		const state = engine.newGame("s1");
		state.sanity = 140;
		assert.strictEqual(state.sanity, 100);
		state.sanity = -5;
		assert.strictEqual(state.sanity, 0);
	});

	test("should read locations from the templates until moved", () => {
		const state = engine.newGame("s1");
		assert.deepStrictEqual(state.locationOf("advertisement"), inside("mailbox"));
		state.moveObject("advertisement", INVENTORY);
		assert.strictEqual(state.isHeld("advertisement"), true);
		assert.deepStrictEqual(state.inventory, ["advertisement"]);
		state.moveObject("advertisement", inside("mailbox"));
		assert.strictEqual(state.toSnapshot().locations.advertisement, undefined);
	});

	test("should list contents in world order", () => {
		const state = engine.newGame("s1");
		assert.deepStrictEqual(state.contentsOf(inRoom("living_room")), [
			"trophy_case",
			"rug",
			"lamp",
			"elvish_sword",
			"rusty_sword",
			"mirror",
		]);
	});

	test("should patch object state without touching the template", () => {
		const state = engine.newGame("s1");
		state.updateObject("mailbox", { open: true });
		assert.strictEqual(state.objectState("mailbox").open, true);
		assert.strictEqual(engine.world.object("mailbox").state.open, false);
	});

	test("should treat false and 0 flags as unset", () => {
		const state = engine.newGame("s1");
		state.setFlag("a");
		state.setFlag("b", 0);
		state.setFlag("c", false);
		assert.strictEqual(state.hasFlag("a"), true);
		assert.strictEqual(state.hasFlag("b"), false);
		assert.strictEqual(state.hasFlag("c"), false);
		assert.strictEqual(state.meets({ a: true, b: false }), true);
		assert.strictEqual(state.meets({ a: false }), false);
	});

	test("should clone independently", () => {
		const state = engine.newGame("s1");
		const copy = state.clone();
		copy.moveObject("lamp", INVENTORY);
		copy.setFlag("rug_moved");
		copy.updateRoom("clearing", { dug: true });
		assert.strictEqual(state.isHeld("lamp"), false);
		assert.strictEqual(state.hasFlag("rug_moved"), false);
		assert.strictEqual(state.roomState("clearing").dug, false);
	});

	test("should survive a snapshot round trip", () => {
		const state = engine.newGame("s1");
		state.currentRoom = "kitchen";
		state.visited.add("kitchen");
		state.sanity = 42;
		state.score = 15;
		state.moves = 7;
		state.cursed = true;
		state.moveObject("garlic", INVENTORY);
		state.updateObject("sack", { open: true });
		state.updateRoom("clearing", { dug: true });
		state.setFlag("rug_moved");

		const restored = GameState.fromSnapshot(engine.world, state.toSnapshot());
		assert.deepStrictEqual(restored.toSnapshot(), state.toSnapshot());
		assert.strictEqual(restored.isHeld("garlic"), true);
		assert.strictEqual(restored.objectState("sack").open, true);
	});
});
