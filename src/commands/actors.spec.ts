import { suite, test, before } from "node:test";
import assert from "node:assert";
import { loadTestEngine, play } from "../testing.js";
import { GAME_OVER, type Engine } from "../core/engine.js";
import { OUTCOME } from "../core/result.js";
import type { GameState } from "../core/state.js";
import { DESTROYED, heldBy, inRoom, inside, INVENTORY } from "../core/world.js";

const REEL = "The troll strikes back. You reel from the blow.";

function inCellar(state: GameState, ...carried: string[]) {
	state.currentRoom = "cellar";
	state.visited.add("cellar");
	state.moveObject("lamp", INVENTORY);
	state.updateObject("lamp", { lit: true });
	for (const id of carried) state.moveObject(id, INVENTORY);
}

suite("commands/actors", () => {
	let engine: Engine;

	before(async () => {
		engine = await loadTestEngine();
	});

	suite("ATTACK", () => {
		test("should fight the troll until it gives way", () => {
			const state = engine.newGame("troll");
			inCellar(state, "elvish_sword");
			const first = engine.handlePlayerInput("attack troll with sword", state);
			assert.strictEqual(first.message, `You strike the troll with the elvish sword.\n${REEL}`);
			assert.deepStrictEqual(first.notifications, [
				"Your sanity slips as dread washes over you...",
			]);
			assert.strictEqual(state.objectState("troll").health, 5);
			assert.strictEqual(state.sanity, 96);

			const second = engine.handlePlayerInput("kill troll with sword", state);
			assert.strictEqual(
				second.message,
				"You strike the troll with the elvish sword.\nThe troll staggers back, disarmed, and sinks into a sinister black fog that drifts away through the walls."
			);
			assert.strictEqual(state.sanity, 94);
			assert.strictEqual(state.hasFlag("troll_defeated"), true);
			assert.deepStrictEqual(state.locationOf("troll"), DESTROYED);
			assert.deepStrictEqual(state.locationOf("troll_axe"), inRoom("cellar"));

			play(engine, state, "east");
			assert.strictEqual(state.currentRoom, "gallery");
		});

		test("should fight with bare hands", () => {
			const state = engine.newGame("troll-hands");
			inCellar(state);
			const result = engine.handlePlayerInput("hit troll", state);
			assert.strictEqual(result.message, `You hit the troll with your bare hands.\n${REEL}`);
			assert.strictEqual(state.objectState("troll").health, 9);
		});

		test("should soften blows with armor", () => {
			const state = engine.newGame("troll-armor");
			inCellar(state, "cloak");
			state.updateObject("cloak", { worn: true });
			play(engine, state, "attack troll");
			assert.strictEqual(state.sanity, 98);
		});

		test("should end the game when the mind is gone", () => {
			const state = engine.newGame("troll-death");
			inCellar(state);
			state.sanity = 0;
			const result = engine.handlePlayerInput("attack troll", state);
			assert.strictEqual(
				result.message,
				"You hit the troll with your bare hands.\nThe troll strikes back, and the darkness takes you.\n\n**** You have died ****"
			);
			assert.strictEqual(state.ended, true);

			const look = engine.handlePlayerInput("look", state);
			assert.strictEqual(look.outcome, OUTCOME.BLOCKED);
			assert.strictEqual(look.message, GAME_OVER);
		});

		test("should hurt the troll with a thrown weapon", () => {
			const state = engine.newGame("troll-throw");
			inCellar(state, "knife");
			const result = engine.handlePlayerInput("throw knife at troll", state);
			assert.strictEqual(result.message, `You throw the nasty knife at the troll.\n${REEL}`);
			assert.strictEqual(state.objectState("troll").health, 7);
			assert.deepStrictEqual(state.locationOf("knife"), inRoom("cellar"));
		});

		test("should refuse pointless attacks", () => {
			const state = engine.newGame("attack-mailbox");
			const mailbox = engine.handlePlayerInput("attack mailbox", state);
			assert.strictEqual(mailbox.outcome, OUTCOME.CAPABILITY_MISMATCH);
			assert.strictEqual(mailbox.message, "Attacking the small mailbox would accomplish nothing.");

			const lamp = engine.newGame("attack-lamp");
			inCellar(lamp);
			assert.strictEqual(
				engine.handlePlayerInput("attack troll with lamp", lamp).message,
				"The brass lantern is no weapon."
			);
			assert.strictEqual(lamp.objectState("troll").health, 10);
		});
	});

	suite("the caretaker", () => {
		function onThePorch(name: string): GameState {
			const state = engine.newGame(name);
			state.currentRoom = "south_of_house";
			state.visited.add("south_of_house");
			return state;
		}

		test("should sleep until woken", () => {
			const state = onThePorch("caretaker-wake");
			const talk = engine.handlePlayerInput("talk to caretaker", state);
			assert.strictEqual(talk.outcome, OUTCOME.STATE_CONFLICT);
			assert.strictEqual(talk.message, "The caretaker is asleep.");

			assert.strictEqual(
				engine.handlePlayerInput("wake caretaker", state).message,
				"The caretaker wakes with a start."
			);
			assert.strictEqual(
				engine.handlePlayerInput("wake up caretaker", state).message,
				"The caretaker is already awake."
			);
		});

		test("should talk about topics", () => {
			const state = onThePorch("caretaker-talk");
			play(engine, state, "wake caretaker");
			assert.strictEqual(
				engine.handlePlayerInput("talk to caretaker", state).message,
				'"Nobody comes here," the caretaker says. "Nobody should."'
			);
			assert.strictEqual(
				engine.handlePlayerInput("ask caretaker about house", state).message,
				'"Built by the Hollows. They never left. Not all the way."'
			);
		});

		test("should trade the key for garlic", () => {
			const state = onThePorch("caretaker-gift");
			state.moveObject("garlic", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("give garlic to caretaker", state).message,
				"The caretaker is asleep."
			);

			play(engine, state, "wake caretaker");
			const gift = engine.handlePlayerInput("give garlic to caretaker", state);
			assert.strictEqual(
				gift.message,
				'The caretaker sniffs the garlic, nods and drops a brass key at your feet. "You\'ll want that," he says.'
			);
			assert.deepStrictEqual(gift.notifications, ["[Your score has gone up by 5.]"]);
			assert.deepStrictEqual(state.locationOf("garlic"), heldBy("caretaker"));
			assert.deepStrictEqual(state.locationOf("brass_key"), inRoom("south_of_house"));
		});

		test("should only give what is in hand", () => {
			const state = onThePorch("caretaker-sack");
			state.moveObject("sack", INVENTORY);
			state.updateObject("sack", { open: true });
			play(engine, state, "wake caretaker");
			const result = engine.handlePlayerInput("give garlic to caretaker", state);
			assert.strictEqual(result.outcome, OUTCOME.OBJECT_NOT_PRESENT);
			assert.strictEqual(result.message, "You'll have to take the clove of garlic out first.");
			assert.deepStrictEqual(state.locationOf("garlic"), inside("sack"));
		});

		test("should accept other gifts quietly", () => {
			const state = onThePorch("caretaker-lamp");
			state.moveObject("lamp", INVENTORY);
			play(engine, state, "wake caretaker");
			assert.strictEqual(
				engine.handlePlayerInput("give lamp to caretaker", state).message,
				"The caretaker takes the brass lantern without a word."
			);
		});

		test("should react to a kiss", () => {
			const state = onThePorch("caretaker-kiss");
			assert.strictEqual(
				engine.handlePlayerInput("kiss caretaker", state).message,
				"The caretaker wipes his cheek and goes back to sleep."
			);
		});
	});

	suite("people and things", () => {
		test("should not treat objects as people", () => {
			const state = engine.newGame("not-people");
			state.moveObject("lamp", INVENTORY);
			assert.strictEqual(
				engine.handlePlayerInput("talk to mailbox", state).message,
				"You can't talk to the small mailbox."
			);
			assert.strictEqual(
				engine.handlePlayerInput("wake mailbox", state).message,
				"The small mailbox isn't asleep."
			);
			assert.strictEqual(
				engine.handlePlayerInput("give lamp to mailbox", state).message,
				"You can't give anything to the small mailbox."
			);
			assert.strictEqual(
				engine.handlePlayerInput("kiss mailbox", state).message,
				"You kiss the small mailbox. Nothing happens."
			);
		});

		test("should hear the troll out", () => {
			const state = engine.newGame("troll-talk");
			inCellar(state);
			assert.strictEqual(
				engine.handlePlayerInput("talk to troll", state).message,
				"The troll growls something that is not a word."
			);
		});
	});
});
