import { suite, test, before } from "node:test";
import assert from "node:assert";
import { contextFor, loadTestEngine } from "../testing.js";
import type { Engine } from "./engine.js";
import { adjustSanity, describeSanity, sanityTier, SANITY_TIER } from "./sanity.js";

suite("core/sanity.ts", () => {
	let engine: Engine;

	before(async () => {
		engine = await loadTestEngine();
	});

	suite("sanityTier()", () => {
		test("should place values in their tiers", () => {
			assert.strictEqual(sanityTier(100), SANITY_TIER.NORMAL);
			assert.strictEqual(sanityTier(75), SANITY_TIER.NORMAL);
			assert.strictEqual(sanityTier(74), SANITY_TIER.DISTURBED);
			assert.strictEqual(sanityTier(50), SANITY_TIER.DISTURBED);
			assert.strictEqual(sanityTier(49), SANITY_TIER.UNRELIABLE);
			assert.strictEqual(sanityTier(25), SANITY_TIER.UNRELIABLE);
			assert.strictEqual(sanityTier(24), SANITY_TIER.GARBLED);
			assert.strictEqual(sanityTier(0), SANITY_TIER.GARBLED);
		});
	});

	suite("adjustSanity()", () => {
		test("should clamp at zero and report the change applied", () => {
			const state = engine.newGame("sanity");
			state.sanity = 10;
			const context = contextFor(engine, state);
			assert.strictEqual(adjustSanity(context, -15), -10);
			assert.strictEqual(state.sanity, 0);
			assert.deepStrictEqual(context.notifications, [
				"Your mind shatters into fragments...",
			]);
		});

		test("should clamp at one hundred", () => {
			const state = engine.newGame("sanity");
			state.sanity = 95;
			const context = contextFor(engine, state);
			assert.strictEqual(adjustSanity(context, 10), 5);
			assert.strictEqual(state.sanity, 100);
			assert.deepStrictEqual(context.notifications, ["A sense of calm returns to you."]);
		});

		test("should say nothing when nothing changes", () => {
			const state = engine.newGame("sanity");
			const context = contextFor(engine, state);
			assert.strictEqual(adjustSanity(context, 5), 0);
			assert.deepStrictEqual(context.notifications, []);
		});

		test("should announce a change of tier", () => {
			const state = engine.newGame("sanity");
			state.sanity = 80;
			const context = contextFor(engine, state);
			adjustSanity(context, -10);
			assert.strictEqual(state.sanity, 70);
			assert.deepStrictEqual(context.notifications, [
				"Your sanity slips as dread washes over you...",
				"Your perception shifts... (disturbed)",
			]);
		});
	});

	suite("describeSanity()", () => {
		test("should describe a clear mind", () => {
			assert.strictEqual(describeSanity(90), "Your mind is clear.");
		});
	});
});
