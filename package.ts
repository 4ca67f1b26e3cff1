/**
 * Package loader that automatically discovers and loads all packages
 * from src/package/ directory in the correct dependency order.
 *
 * This module:
 * 1. Discovers all package files in src/package/ (dist/src/package/ at runtime)
 * 2. Builds a dependency graph from package dependencies
 * 3. Loads packages in topological order (dependencies first)
 */

import { fileURLToPath, pathToFileURL } from "url";
import { dirname, join } from "path";
import { readdir } from "fs/promises";
import { existsSync } from "fs";
import logger from "./src/utils/logger.js";
import { isPackage, type Package } from "./src/utils/package.js";

const projectRoot = dirname(fileURLToPath(import.meta.url));

/**
 * Check if a file is a package file (not a test file)
 */
export function isPackageFile(filename: string): boolean {
	return (
		(filename.endsWith(".ts") || filename.endsWith(".js")) &&
		!filename.endsWith(".d.ts") &&
		!filename.includes(".spec.") &&
		!filename.includes(".test.")
	);
}

async function findPackageFiles(dir: string): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	return entries
		.filter((entry) => entry.isFile() && isPackageFile(entry.name))
		.map((entry) => join(dir, entry.name))
		.sort();
}

async function loadPackageModule(filePath: string): Promise<Package> {
	const module: unknown = await import(pathToFileURL(filePath).href);
	const pkg =
		typeof module === "object" && module !== null && "default" in module
			? module.default
			: undefined;
	if (!isPackage(pkg)) {
		throw new Error(
			`Package file ${filePath} does not export a default Package object with a name`
		);
	}
	return pkg;
}

/**
 * Topological sort of packages based on dependencies
 * Returns packages in order: dependencies first, dependents last
 */
export function sortPackages(packages: readonly Package[]): Package[] {
	const byName = new Map(packages.map((pkg) => [pkg.name, pkg]));
	const sorted: Package[] = [];
	const visited = new Set<string>();
	const visiting: string[] = [];

	function visit(pkg: Package): void {
		if (visiting.includes(pkg.name)) {
			const cycle = visiting.concat([pkg.name]);
			throw new Error(`Circular dependency detected: ${cycle.join(" -> ")}`);
		}
		if (visited.has(pkg.name)) return;
		visiting.push(pkg.name);
		for (const name of pkg.dependencies ?? []) {
			const dependency = byName.get(name);
			if (!dependency) {
				logger.warn(
					`Package "${pkg.name}" depends on "${name}" which was not found in package directory`
				);
				continue;
			}
			visit(dependency);
		}
		visiting.pop();
		visited.add(pkg.name);
		sorted.push(pkg);
	}

	for (const pkg of packages) visit(pkg);
	return sorted;
}

/**
 * Load all packages from src/package/ directory in dependency order
 */
export async function loadAllPackages(): Promise<void> {
	// beside this file: src/package under tsx, dist/src/package once built
	const packageDir = join(projectRoot, "src", "package");
	if (!existsSync(packageDir)) {
		throw new Error(`Package directory not found: ${packageDir}`);
	}

	logger.info(`Discovering packages in ${packageDir}...`);
	const packageFiles = await findPackageFiles(packageDir);
	if (packageFiles.length === 0) {
		logger.warn(`No package files found in ${packageDir}`);
		return;
	}

	const packages: Package[] = [];
	for (const file of packageFiles) {
		const pkg = await loadPackageModule(file);
		logger.debug(`Loaded package definition: ${pkg.name}`);
		packages.push(pkg);
	}

	const sorted = sortPackages(packages);
	logger.info(`Loading ${sorted.length} package(s) in dependency order...`);
	for (const pkg of sorted) {
		await logger.block(pkg.name, pkg.loader);
	}
	logger.info(`Successfully loaded ${sorted.length} package(s)`);
}
