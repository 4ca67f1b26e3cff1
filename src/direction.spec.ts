import { suite, test } from "node:test";
import assert from "node:assert";
import {
	DIRECTION,
	DIRECTIONS,
	dir2reverse,
	dir2text,
	text2dir,
} from "./direction.js";

suite("direction.ts", () => {
	suite("dir2reverse()", () => {
		test("should reverse every direction into a different one", () => {
			for (const dir of DIRECTIONS) {
				const reverse = dir2reverse(dir);
				assert.notStrictEqual(reverse, dir);
				assert.strictEqual(dir2reverse(reverse), dir);
			}
		});

		test("should pair in with out", () => {
			assert.strictEqual(dir2reverse(DIRECTION.IN), DIRECTION.OUT);
		});
	});

	suite("dir2text()", () => {
		test("should give full and short names", () => {
			assert.strictEqual(dir2text(DIRECTION.SOUTHWEST), "southwest");
			assert.strictEqual(dir2text(DIRECTION.SOUTHWEST, true), "sw");
		});

		test("should fall back to the full name when there is no abbreviation", () => {
			assert.strictEqual(dir2text(DIRECTION.OUT, true), "out");
		});
	});

	suite("text2dir()", () => {
		test("should parse full and abbreviated names", () => {
			assert.strictEqual(text2dir("north"), DIRECTION.NORTH);
			assert.strictEqual(text2dir("NE"), DIRECTION.NORTHEAST);
			assert.strictEqual(text2dir("u"), DIRECTION.UP);
			assert.strictEqual(text2dir("in"), DIRECTION.IN);
		});

		test("should return undefined for unknown text", () => {
			assert.strictEqual(text2dir("sideways"), undefined);
		});
	});
});
