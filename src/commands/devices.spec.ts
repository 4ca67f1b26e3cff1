import { suite, test, before } from "node:test";
import assert from "node:assert";
import { loadTestEngine, play } from "../testing.js";
import type { Engine } from "../core/engine.js";
import { DARKNESS } from "../core/describe.js";
import { OUTCOME } from "../core/result.js";
import type { GameState } from "../core/state.js";
import { DESTROYED, inRoom, INVENTORY } from "../core/world.js";

function carryLitLamp(state: GameState, battery?: number) {
	state.moveObject("lamp", INVENTORY);
	state.updateObject("lamp", { lit: true });
	if (battery !== undefined) state.resources.set("lamp", battery);
}

suite("commands/devices", () => {
	let engine: Engine;

	before(async () => {
		engine = await loadTestEngine();
	});

	suite("LIGHT and EXTINGUISH", () => {
		test("should switch the lamp on and off", () => {
			const state = engine.newGame("lamp");
			state.currentRoom = "living_room";
			assert.strictEqual(
				engine.handlePlayerInput("turn on lamp", state).message,
				"The brass lantern is now on."
			);
			const again = engine.handlePlayerInput("light lamp", state);
			assert.strictEqual(again.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(again.message, "The brass lantern is already lit.");
			assert.strictEqual(
				engine.handlePlayerInput("turn lamp off", state).message,
				"The brass lantern is now off."
			);
			assert.strictEqual(state.objectState("lamp").lit, false);
		});

		test("should light up a dark room", () => {
			const state = engine.newGame("lamp-dark");
			state.currentRoom = "attic";
			state.moveObject("lamp", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("turn on lamp", state).message,
				"The brass lantern is now on.\nAttic\nThis is the attic. The only exit is a stairway leading down.\nThere is a coil of rope here.\nThere is a nasty knife here.\nThere is a velvet cloak here."
			);
			const off = engine.handlePlayerInput("turn off lamp", state);
			assert.strictEqual(off.message, `The brass lantern is now off.\n${DARKNESS}`);
			assert.deepStrictEqual(off.notifications, []);
		});

		test("should refuse a spent lamp", () => {
			const state = engine.newGame("lamp-spent");
			state.moveObject("lamp", INVENTORY);
			state.resources.set("lamp", 0);
			const result = engine.handlePlayerInput("turn on lamp", state);
			assert.strictEqual(result.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(result.message, "The brass lantern has nothing left to give. It stays dark.");
		});

		test("should refuse things that give no light", () => {
			const state = engine.newGame("light-mailbox");
			assert.strictEqual(
				engine.handlePlayerInput("light mailbox", state).message,
				"You can't light the small mailbox."
			);
		});

		test("should light the candles from a burning match", () => {
			const state = engine.newGame("candles");
			state.currentRoom = "temple";
			const unlit = engine.handlePlayerInput("light candles", state);
			assert.strictEqual(unlit.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(unlit.message, "You'll need a flame to light the pair of candles.");

			state.moveObject("matchbook", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("light matchbook", state).message,
				"The matchbook is now lit."
			);
			assert.strictEqual(
				engine.handlePlayerInput("light candles", state).message,
				"The pair of candles is now lit."
			);
			assert.strictEqual(state.objectState("candles").lit, true);
		});
	});

	suite("light drain", () => {
		test("should warn as the lamp runs down", () => {
			const state = engine.newGame("drain");
			state.currentRoom = "living_room";
			carryLitLamp(state, 21);
			assert.deepStrictEqual(engine.handlePlayerInput("wait", state).notifications, [
				"The brass lantern is growing dim.",
			]);

			state.resources.set("lamp", 6);
			assert.deepStrictEqual(engine.handlePlayerInput("wait", state).notifications, [
				"The brass lantern is flickering and about to go out.",
			]);

			state.resources.set("lamp", 1);
			assert.deepStrictEqual(engine.handlePlayerInput("wait", state).notifications, [
				"The brass lantern flickers and goes out.",
			]);
			assert.strictEqual(state.objectState("lamp").lit, false);
			assert.strictEqual(state.resources.get("lamp"), 0);
		});

		test("should announce the dark when the last light dies", () => {
			const state = engine.newGame("drain-dark");
			state.currentRoom = "attic";
			carryLitLamp(state, 1);
			assert.deepStrictEqual(engine.handlePlayerInput("wait", state).notifications, [
				"The brass lantern flickers and goes out.",
				DARKNESS,
			]);
		});

		test("should drain twice as fast under the curse", () => {
			const state = engine.newGame("drain-curse");
			state.cursed = true;
			carryLitLamp(state, 22);
			const result = engine.handlePlayerInput("wait", state);
			assert.deepStrictEqual(result.notifications, ["The brass lantern is growing dim."]);
			assert.strictEqual(state.resources.get("lamp"), 20);
		});

		test("should not drain on meta commands", () => {
			const state = engine.newGame("drain-meta");
			carryLitLamp(state, 50);
			play(engine, state, "inventory", "score", "diagnose");
			assert.strictEqual(state.resources.get("lamp"), 50);
		});
	});

	suite("TURN", () => {
		test("should raise and lower the portcullis", () => {
			const state = engine.newGame("wheel");
			state.currentRoom = "cellar";
			carryLitLamp(state);
			assert.strictEqual(
				engine.handlePlayerInput("turn wheel", state).message,
				"The wheel grinds round. To the north, the portcullis rattles up into the ceiling."
			);
			assert.strictEqual(state.hasFlag("cellar_gate_open"), true);

			const further = engine.handlePlayerInput("turn wheel", state);
			assert.strictEqual(further.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(further.message, "The iron wheel won't turn any further.");

			assert.strictEqual(
				engine.handlePlayerInput("turn wheel back", state).message,
				"The wheel grinds back. The portcullis crashes down."
			);
			assert.strictEqual(state.hasFlag("cellar_gate_open"), false);
			assert.strictEqual(
				engine.handlePlayerInput("turn wheel back", state).message,
				"The iron wheel won't turn back any further."
			);
		});

		test("should open the way north once the wheel is turned", () => {
			const state = engine.newGame("wheel-north");
			state.currentRoom = "cellar";
			carryLitLamp(state);
			play(engine, state, "turn wheel", "north");
			assert.strictEqual(state.currentRoom, "crypt");
		});

		test("should unlock the iron door at the right position", () => {
			const state = engine.newGame("dial");
			state.currentRoom = "gallery";
			assert.strictEqual(
				engine.handlePlayerInput("turn dial", state).message,
				"The brass dial clicks round to 1."
			);
			assert.strictEqual(
				engine.handlePlayerInput("turn dial", state).message,
				"The brass dial clicks round to 2."
			);
			assert.strictEqual(
				engine.handlePlayerInput("open iron door", state).message,
				"The iron door is locked."
			);
			assert.strictEqual(
				engine.handlePlayerInput("turn dial", state).message,
				"The brass dial clicks round to 3.\nSomething clicks inside the iron door."
			);
			assert.strictEqual(state.objectState("iron_door").locked, false);

			play(engine, state, "open iron door", "east");
			assert.strictEqual(state.currentRoom, "vault");
		});

		test("should refuse things that do not turn", () => {
			const state = engine.newGame("turn-mailbox");
			const result = engine.handlePlayerInput("turn mailbox", state);
			assert.strictEqual(result.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(result.message, "You can't turn the small mailbox.");
		});
	});

	suite("PUSH", () => {
		test("should move the rug to reveal the trap door", () => {
			const state = engine.newGame("rug");
			state.currentRoom = "living_room";
			const push = engine.handlePlayerInput("push rug", state);
			assert.strictEqual(
				push.message,
				"With a great effort, the rug is moved to one side of the room, revealing the dusty cover of a closed trap door."
			);
			assert.strictEqual(state.hasFlag("rug_moved"), true);
			assert.deepStrictEqual(state.locationOf("trap_door"), inRoom("living_room"));

			const again = engine.handlePlayerInput("move rug", state);
			assert.strictEqual(again.success, true);
			assert.strictEqual(again.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(again.message, "The oriental rug has already been moved.");
		});

		test("should not move everything", () => {
			const state = engine.newGame("push-lamp");
			state.currentRoom = "living_room";
			assert.strictEqual(
				engine.handlePlayerInput("push lamp", state).message,
				"Moving the brass lantern doesn't accomplish anything."
			);
		});
	});

	suite("TIE and UNTIE", () => {
		test("should tie the rope and untie it again", () => {
			const state = engine.newGame("tie");
			state.currentRoom = "dome";
			state.moveObject("rope", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("tie rope to hook", state).message,
				"The coil of rope is now tied to the iron hook."
			);
			assert.strictEqual(state.hasFlag("rope_on_hook"), true);
			assert.deepStrictEqual(state.locationOf("rope"), inRoom("dome"));

			const take = engine.handlePlayerInput("take rope", state);
			assert.strictEqual(take.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(
				take.message,
				"The coil of rope is tied to the iron hook. You'll have to untie it first."
			);

			assert.strictEqual(
				engine.handlePlayerInput("untie rope", state).message,
				"You untie the coil of rope from the iron hook."
			);
			assert.strictEqual(state.hasFlag("rope_on_hook"), false);
			assert.strictEqual(
				engine.handlePlayerInput("untie rope", state).message,
				"The coil of rope isn't tied to anything."
			);
		});

		test("should move the rope from the hook to the railing", () => {
			const state = engine.newGame("tie-again");
			state.currentRoom = "dome";
			state.moveObject("rope", INVENTORY);
			play(engine, state, "tie rope to hook");
			const result = engine.handlePlayerInput("tie rope to railing", state);
			assert.strictEqual(result.success, true);
			assert.strictEqual(state.objectState("rope").tiedTo, "railing");
			assert.deepStrictEqual(state.objectState("hook").tiedObjects, []);
			assert.deepStrictEqual(state.objectState("railing").tiedObjects, ["rope"]);
			assert.strictEqual(state.hasFlag("rope_on_hook"), false);
			assert.strictEqual(state.hasFlag("rope_on_railing"), true);
		});

		test("should refuse tying something to itself", () => {
			const state = engine.newGame("tie-self");
			state.currentRoom = "dome";
			state.moveObject("rope", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("tie rope to rope", state).message,
				"You can't tie something to itself."
			);
		});

		test("should climb down a rope tied to the railing", () => {
			const state = engine.newGame("tie-descend");
			state.currentRoom = "dome";
			state.moveObject("rope", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("down", state).message,
				"The drop is far too deep to climb without a rope."
			);
			play(engine, state, "tie rope to railing");
			const down = engine.handlePlayerInput("climb down", state);
			assert.strictEqual(state.currentRoom, "temple");
			assert.ok(down.message.startsWith("Temple\n"));
			assert.strictEqual(state.sanity, 90);
		});
	});

	suite("INFLATE and DEFLATE", () => {
		test("should inflate and deflate the boat", () => {
			const state = engine.newGame("inflate");
			state.currentRoom = "river_bank";
			play(engine, state, "inflate boat");
			assert.strictEqual(state.objectState("boat").inflated, true);
			assert.strictEqual(
				engine.handlePlayerInput("inflate boat", state).message,
				"The magic boat is already inflated."
			);
			assert.strictEqual(
				engine.handlePlayerInput("deflate boat", state).message,
				"The magic boat deflates with a long sigh."
			);
			assert.strictEqual(
				engine.handlePlayerInput("deflate boat", state).message,
				"The magic boat isn't inflated."
			);
		});

		test("should not deflate the boat from inside", () => {
			const state = engine.newGame("deflate-aboard");
			state.currentRoom = "river_bank";
			play(engine, state, "inflate boat", "board boat");
			const result = engine.handlePlayerInput("deflate boat", state);
			assert.strictEqual(result.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(result.message, "You can't deflate it while you're sitting in it.");
		});

		test("should need the pump", () => {
			const state = engine.newGame("inflate-pump");
			state.currentRoom = "river_bank";
			state.moveObject("hand_pump", DESTROYED);
			assert.strictEqual(
				engine.handlePlayerInput("inflate boat", state).message,
				"You'll need something to inflate the magic boat with."
			);
			state.moveObject("shovel", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("inflate boat with shovel", state).message,
				"The shovel won't inflate the magic boat."
			);
		});
	});
});
