import { suite, test, before } from "node:test";
import assert from "node:assert";
import { loadTestEngine, play } from "../testing.js";
import type { Engine } from "../core/engine.js";
import { DARKNESS } from "../core/describe.js";
import { OUTCOME } from "../core/result.js";
import type { GameState } from "../core/state.js";
import { inRoom, INVENTORY } from "../core/world.js";

function carryLitLamp(state: GameState) {
	state.moveObject("lamp", INVENTORY);
	state.updateObject("lamp", { lit: true });
}

suite("commands/movement", () => {
	let engine: Engine;

	before(async () => {
		engine = await loadTestEngine();
	});

	suite("GO", () => {
		test("should describe a room on the first visit", () => {
			const state = engine.newGame("go-first");
			const result = engine.handlePlayerInput("north", state);
			assert.strictEqual(result.success, true);
			assert.strictEqual(
				result.message,
				"North of House\nYou are facing the north side of the house. There is no door here, and all the windows are boarded up."
			);
			assert.strictEqual(result.effects.roomChanged, true);
			assert.strictEqual(state.currentRoom, "north_of_house");
			assert.strictEqual(state.moves, 1);
		});

		test("should keep revisits brief", () => {
			const state = engine.newGame("go-brief");
			const result = play(engine, state, "go north", "w");
			assert.strictEqual(result.message, "West of House\nThere is a small mailbox here.");
		});

		test("should give the blocked message of a shut exit", () => {
			const state = engine.newGame("go-boarded");
			const result = engine.handlePlayerInput("east", state);
			assert.strictEqual(result.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(result.message, "The door is boarded and you can't remove the boards.");
			assert.strictEqual(state.currentRoom, "west_of_house");
			assert.strictEqual(state.moves, 0);
		});

		test("should refuse a direction with no exit", () => {
			const state = engine.newGame("go-nowhere");
			const result = engine.handlePlayerInput("up", state);
			assert.strictEqual(result.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(result.message, "You can't go that way.");
		});

		test("should need the window open", () => {
			const state = engine.newGame("go-window");
			state.currentRoom = "behind_house";
			const shut = engine.handlePlayerInput("west", state);
			assert.strictEqual(shut.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(shut.message, "The small window is closed.");

			assert.strictEqual(engine.handlePlayerInput("open window", state).message, "Opened.");
			const through = engine.handlePlayerInput("west", state);
			assert.strictEqual(state.currentRoom, "kitchen");
			assert.ok(through.message.startsWith("Kitchen\n"));
			assert.deepStrictEqual(through.notifications, ["[Your score has gone up by 5.]"]);
			assert.strictEqual(state.score, 5);
		});

		test("should keep the trap door hidden until the rug moves", () => {
			const state = engine.newGame("go-trapdoor");
			state.currentRoom = "living_room";
			assert.strictEqual(engine.handlePlayerInput("down", state).message, "You can't go that way.");

			play(engine, state, "push rug");
			const closed = engine.handlePlayerInput("down", state);
			assert.strictEqual(closed.message, "The trap door is closed.");

			play(engine, state, "open trap door");
			const dark = engine.handlePlayerInput("down", state);
			assert.strictEqual(state.currentRoom, "cellar");
			assert.strictEqual(dark.message, DARKNESS);
			assert.deepStrictEqual(dark.notifications, [
				"[Your score has gone up by 5.]",
				"Your sanity slips as dread washes over you...",
			]);
			assert.strictEqual(state.sanity, 95);
		});

		test("should describe a dark room by its own darkness", () => {
			const state = engine.newGame("go-attic");
			state.currentRoom = "kitchen";
			const result = engine.handlePlayerInput("up", state);
			assert.strictEqual(
				result.message,
				"It is pitch black. You can hear something breathing in the rafters."
			);
			assert.strictEqual(state.sanity, 98);
		});

		test("should describe a dark room by lamplight", () => {
			const state = engine.newGame("go-lamplight");
			state.currentRoom = "living_room";
			state.setFlag("rug_moved");
			state.moveObject("trap_door", inRoom("living_room"));
			state.updateObject("trap_door", { open: true });
			carryLitLamp(state);
			const result = engine.handlePlayerInput("d", state);
			assert.strictEqual(
				result.message,
				"Cellar\nYou are in a dark and damp cellar. A passage leads east, and an iron portcullis bars the way north. A great iron wheel is set into the wall.\nA nasty-looking troll, brandishing a bloody axe, blocks all passages out of the room."
			);
		});

		test("should hold flag-gated exits shut until the flag is set", () => {
			const state = engine.newGame("go-troll");
			state.currentRoom = "cellar";
			carryLitLamp(state);
			const guarded = engine.handlePlayerInput("east", state);
			assert.strictEqual(guarded.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(guarded.message, "The troll blocks the passage east, fingering its axe.");
			assert.strictEqual(
				engine.handlePlayerInput("north", state).message,
				"The portcullis is down."
			);

			state.setFlag("troll_defeated");
			const open = engine.handlePlayerInput("east", state);
			assert.strictEqual(open.success, true);
			assert.strictEqual(state.currentRoom, "gallery");
			assert.ok(open.message.startsWith("Gallery\n"));
		});

		test("should ask which way when no direction is given", () => {
			const state = engine.newGame("go-ask");
			const result = engine.handlePlayerInput("walk", state);
			assert.strictEqual(result.outcome, OUTCOME.MISSING_PARAMETER);
			assert.strictEqual(result.message, "Which way do you want to go?");
		});
	});

	suite("ENTER and EXIT", () => {
		test("should climb through an open window", () => {
			const state = engine.newGame("enter-window");
			state.currentRoom = "behind_house";
			assert.strictEqual(
				engine.handlePlayerInput("enter window", state).message,
				"The small window is closed."
			);
			play(engine, state, "open window", "enter window");
			assert.strictEqual(state.currentRoom, "kitchen");

			play(engine, state, "exit");
			assert.strictEqual(state.currentRoom, "behind_house");
		});

		test("should refuse things that cannot be entered", () => {
			const state = engine.newGame("enter-mailbox");
			const result = engine.handlePlayerInput("enter mailbox", state);
			assert.strictEqual(result.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(result.message, "You can't enter the small mailbox.");
		});
	});

	suite("CLIMB", () => {
		test("should climb the tree and back down", () => {
			const state = engine.newGame("climb-tree");
			state.currentRoom = "forest_path";
			const up = engine.handlePlayerInput("climb tree", state);
			assert.strictEqual(
				up.message,
				"Up a Tree\nYou are about ten feet above the ground nestled among some large branches.\nThere is a bird's nest here."
			);
			play(engine, state, "climb down");
			assert.strictEqual(state.currentRoom, "forest_path");
		});

		test("should only climb up or down", () => {
			const state = engine.newGame("climb-sideways");
			assert.strictEqual(engine.handlePlayerInput("climb", state).message, "You can't climb that way.");
			assert.strictEqual(
				engine.handlePlayerInput("climb east", state).message,
				"You can't climb that way."
			);
		});

		test("should refuse things that cannot be climbed", () => {
			const state = engine.newGame("climb-mailbox");
			const result = engine.handlePlayerInput("climb mailbox", state);
			assert.strictEqual(result.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(result.message, "You can't climb the small mailbox.");
		});
	});

	suite("the boat", () => {
		test("should not let the player wade into deep water", () => {
			const state = engine.newGame("wade");
			state.currentRoom = "river_bank";
			const result = engine.handlePlayerInput("east", state);
			assert.strictEqual(result.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(result.message, "The water is too deep to wade. You would need a boat.");
		});

		test("should cross the river by boat", () => {
			const state = engine.newGame("boat");
			state.currentRoom = "river_bank";
			const flat = engine.handlePlayerInput("board boat", state);
			assert.strictEqual(flat.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(flat.message, "The magic boat is a heap of deflated plastic.");

			assert.strictEqual(
				engine.handlePlayerInput("inflate boat", state).message,
				"The magic boat fills with air and takes shape."
			);
			assert.strictEqual(
				engine.handlePlayerInput("get in boat", state).message,
				"You are now in the magic boat."
			);
			const again = engine.handlePlayerInput("board boat", state);
			assert.strictEqual(again.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(again.message, "You're already in the magic boat.");

			const river = engine.handlePlayerInput("east", state);
			assert.strictEqual(
				river.message,
				"River, in the magic boat\nYou are on the river. The current carries you gently along. A sandy beach lies to the south."
			);
			assert.deepStrictEqual(state.locationOf("boat"), inRoom("river"));

			const stay = engine.handlePlayerInput("disembark", state);
			assert.strictEqual(stay.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(stay.message, "The water here is far too deep. You had better stay aboard.");
			assert.strictEqual(state.currentVehicle, "boat");

			const beach = engine.handlePlayerInput("south", state);
			assert.strictEqual(
				beach.message,
				"Sandy Beach, in the magic boat\nYou are on a sandy beach on the far shore of the river."
			);
			assert.deepStrictEqual(beach.notifications, ["[Your score has gone up by 5.]"]);

			assert.strictEqual(
				engine.handlePlayerInput("get out", state).message,
				"You get out of the magic boat."
			);
			assert.strictEqual(state.currentVehicle, undefined);
			assert.deepStrictEqual(state.locationOf("boat"), inRoom("sandy_beach"));
		});

		test("should keep the boat off dry land", () => {
			const state = engine.newGame("boat-land");
			state.currentRoom = "river_bank";
			play(engine, state, "inflate boat", "board boat");
			const result = engine.handlePlayerInput("west", state);
			assert.strictEqual(result.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(
				result.message,
				"You can't take the magic boat onto dry land. You'll have to get out first."
			);
			assert.strictEqual(state.currentRoom, "river_bank");
		});

		test("should say when there is nothing to get out of", () => {
			const state = engine.newGame("boat-none");
			const result = engine.handlePlayerInput("disembark", state);
			assert.strictEqual(result.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(result.message, "You're not in anything.");
		});
	});
});
