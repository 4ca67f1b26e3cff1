import { suite, test, before } from "node:test";
import assert from "node:assert";
import { readVocabulary } from "../package/vocabulary.js";
import { DIRECTION } from "../direction.js";
import { MODIFIER_ALL, MODIFIER_BACK, parse, tokenize, type ParsedCommand } from "./parser.js";
import { PREPOSITION, type Vocabulary } from "./vocabulary.js";

suite("core/parser.ts", () => {
	let vocabulary: Vocabulary;

	before(async () => {
		vocabulary = await readVocabulary();
	});

	function command(raw: string): ParsedCommand {
		const result = parse(raw, vocabulary);
		if (!result.success) assert.fail(`"${raw}" did not parse`);
		return result.command;
	}

	suite("tokenize()", () => {
		test("should drop articles, filler and punctuation", () => {
			assert.deepStrictEqual(tokenize("Take the lamp, please!", vocabulary), [
				"take",
				"lamp",
				",",
			]);
		});
	});

	suite("parse()", () => {
		test("should parse a verb and an object", () => {
			const parsed = command("open mailbox");
			assert.strictEqual(parsed.verb, "OPEN");
			assert.strictEqual(parsed.object, "mailbox");
			assert.deepStrictEqual(parsed.objects, ["mailbox"]);
		});

		test("should ignore articles and case", () => {
			assert.deepStrictEqual(command("TAKE THE LAMP"), {
				...command("take lamp"),
				raw: "TAKE THE LAMP",
			});
		});

		test("should map verb synonyms to one canonical verb", () => {
			for (const raw of ["take lamp", "get lamp", "grab lamp", "pick up lamp"]) {
				assert.strictEqual(command(raw).verb, "TAKE", raw);
				assert.strictEqual(command(raw).object, "lamp", raw);
			}
		});

		test("should map noun synonyms to their canonical noun", () => {
			assert.strictEqual(command("take lantern").object, "lamp");
			assert.strictEqual(command("take the torch").object, "lamp");
		});

		test("should read a bare direction as GO", () => {
			const parsed = command("north");
			assert.strictEqual(parsed.verb, "GO");
			assert.strictEqual(parsed.direction, DIRECTION.NORTH);
		});

		test("should expand abbreviations", () => {
			assert.strictEqual(command("n").direction, DIRECTION.NORTH);
			assert.strictEqual(command("u").direction, DIRECTION.UP);
			assert.strictEqual(command("x lamp").verb, "EXAMINE");
			assert.strictEqual(command("i").verb, "INVENTORY");
		});

		test("should read the direction after GO and CLIMB", () => {
			assert.strictEqual(command("go west").direction, DIRECTION.WEST);
			assert.strictEqual(command("climb down").direction, DIRECTION.DOWN);
		});

		test("should assume up when climbing an object", () => {
			const parsed = command("climb tree");
			assert.strictEqual(parsed.verb, "CLIMB");
			assert.strictEqual(parsed.object, "tree");
			assert.strictEqual(parsed.direction, DIRECTION.UP);
		});

		test("should take the direction implied by the verb", () => {
			assert.strictEqual(command("descend").direction, DIRECTION.DOWN);
		});

		test("should prefer phrasal verbs", () => {
			assert.strictEqual(command("look under rug").verb, "LOOK_UNDER");
			assert.strictEqual(command("turn on lamp").verb, "TURN_ON");
			assert.strictEqual(command("look at mirror").verb, "EXAMINE");
		});

		test("should rewrite the verb for a trailing particle", () => {
			const parsed = command("turn lamp on");
			assert.strictEqual(parsed.verb, "TURN_ON");
			assert.strictEqual(parsed.object, "lamp");
			assert.strictEqual(parsed.preposition, undefined);
		});

		test("should split on the first preposition", () => {
			const parsed = command("put the coin in the box");
			assert.strictEqual(parsed.verb, "PUT");
			assert.strictEqual(parsed.object, "coin");
			assert.strictEqual(parsed.preposition, PREPOSITION.IN);
			assert.strictEqual(parsed.target, "box");
		});

		test("should keep adjectives in the phrase", () => {
			assert.strictEqual(command("attack troll with elvish sword").target, "elvish sword");
		});

		test("should move a leading preposition's phrase into the object", () => {
			const parsed = command("talk to caretaker about house");
			assert.strictEqual(parsed.verb, "TALK");
			assert.strictEqual(parsed.object, "caretaker");
			assert.strictEqual(parsed.preposition, PREPOSITION.ABOUT);
			assert.strictEqual(parsed.target, "house");
		});

		test("should split lists of objects", () => {
			assert.deepStrictEqual(command("take lamp and sword").objects, ["lamp", "sword"]);
			assert.deepStrictEqual(command("drop lamp, rope and knife").objects, [
				"lamp",
				"rope",
				"knife",
			]);
		});

		test("should pull out modifiers", () => {
			const all = command("take all");
			assert.deepStrictEqual(all.modifiers, [MODIFIER_ALL]);
			assert.deepStrictEqual(all.objects, []);
			const back = command("turn dial back");
			assert.deepStrictEqual(back.modifiers, [MODIFIER_BACK]);
			assert.strictEqual(back.object, "dial");
		});

		test("should report empty input", () => {
			const result = parse("   ", vocabulary);
			assert.strictEqual(result.success, false);
			if (!result.success) assert.strictEqual(result.reason, "empty");
		});

		test("should suggest near matches for an unknown verb", () => {
			const result = parse("lok", vocabulary);
			assert.strictEqual(result.success, false);
			if (result.success) return;
			assert.strictEqual(result.reason, "not-understood");
			assert.strictEqual(result.word, "lok");
			assert.ok(result.suggestions.includes("look"));
		});

		test("should always parse the same text the same way", () => {
			const raw = "put the leaflet and the sword in the case";
			assert.deepStrictEqual(command(raw), command(raw));
		});

		test("should return a frozen command", () => {
			assert.ok(Object.isFrozen(command("take lamp")));
		});
	});
});
