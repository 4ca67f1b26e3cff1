import { suite, test } from "node:test";
import assert from "node:assert";
import {
	capitalizeFirst,
	joinWithAnd,
	levenshtein,
	suggest,
	withArticle,
} from "./string.js";

suite("utils/string.ts", () => {
	suite("capitalizeFirst()", () => {
		test("should capitalize the first letter", () => {
			assert.strictEqual(capitalizeFirst("a brass lantern"), "A brass lantern");
		});

		test("should leave an empty string alone", () => {
			assert.strictEqual(capitalizeFirst(""), "");
		});
	});

	suite("withArticle()", () => {
		test("should use 'a' before consonants", () => {
			assert.strictEqual(withArticle("lamp"), "a lamp");
		});

		test("should use 'an' before vowels", () => {
			assert.strictEqual(withArticle("elvish sword"), "an elvish sword");
		});
	});

	suite("joinWithAnd()", () => {
		test("should join three items", () => {
			assert.strictEqual(joinWithAnd(["a", "b", "c"]), "a, b and c");
		});

		test("should join two items", () => {
			assert.strictEqual(joinWithAnd(["a", "b"]), "a and b");
		});

		test("should return a single item unchanged", () => {
			assert.strictEqual(joinWithAnd(["a"]), "a");
			assert.strictEqual(joinWithAnd([]), "");
		});
	});

	suite("levenshtein()", () => {
		test("should count edits", () => {
			assert.strictEqual(levenshtein("take", "take"), 0);
			assert.strictEqual(levenshtein("tkae", "take"), 2);
			assert.strictEqual(levenshtein("kitten", "sitting"), 3);
			assert.strictEqual(levenshtein("", "abc"), 3);
		});
	});

	suite("suggest()", () => {
		test("should order by distance then alphabetically", () => {
			assert.deepStrictEqual(suggest("tkae", ["take", "talk", "tie"]), [
				"take",
				"tie",
			]);
		});

		test("should drop distant candidates and exact matches", () => {
			assert.deepStrictEqual(suggest("look", ["look", "inventory"]), []);
		});

		test("should respect the limit", () => {
			assert.deepStrictEqual(suggest("aa", ["ab", "ac", "ad", "ae"], 2, 2), [
				"ab",
				"ac",
			]);
		});
	});
});
