import { suite, test } from "node:test";
import assert from "node:assert";
import { isPackageFile, sortPackages } from "../../package.js";
import { isPackage, type Package } from "./package.js";

function pkg(name: string, dependencies?: string[]): Package {
	return { name, dependencies, loader: async () => {} };
}

suite("utils/package.ts", () => {
	suite("isPackage()", () => {
		test("should accept a named loader", () => {
			assert.strictEqual(isPackage(pkg("world")), true);
			assert.strictEqual(isPackage(pkg("world", ["config"])), true);
		});

		test("should reject malformed packages", () => {
			assert.strictEqual(isPackage({ name: "", loader: async () => {} }), false);
			assert.strictEqual(isPackage({ name: "world" }), false);
			assert.strictEqual(
				isPackage({ name: "world", dependencies: [1], loader: async () => {} }),
				false
			);
			assert.strictEqual(isPackage(undefined), false);
		});
	});

	suite("isPackageFile()", () => {
		test("should skip tests and declarations", () => {
			assert.strictEqual(isPackageFile("world.ts"), true);
			assert.strictEqual(isPackageFile("world.js"), true);
			assert.strictEqual(isPackageFile("world.spec.ts"), false);
			assert.strictEqual(isPackageFile("world.d.ts"), false);
			assert.strictEqual(isPackageFile("world.yaml"), false);
		});
	});

	suite("sortPackages()", () => {
		test("should load dependencies first", () => {
			const sorted = sortPackages([
				pkg("commands", ["vocabulary"]),
				pkg("world", ["config"]),
				pkg("vocabulary"),
				pkg("config"),
			]);
			assert.deepStrictEqual(
				sorted.map((p) => p.name),
				["vocabulary", "commands", "config", "world"]
			);
		});

		test("should skip dependencies that do not exist", () => {
			const sorted = sortPackages([pkg("help", ["manual"])]);
			assert.deepStrictEqual(
				sorted.map((p) => p.name),
				["help"]
			);
		});

		test("should refuse circular dependencies", () => {
			assert.throws(
				() => sortPackages([pkg("a", ["b"]), pkg("b", ["a"])]),
				/Circular dependency detected: a -> b -> a/
			);
		});
	});
});
