/**
 * A loadable unit of start-up work.
 *
 * Every module under `src/package/` default-exports one of these. The root
 * package loader discovers them and runs their loaders so that each
 * package's `dependencies` have finished loading before it starts.
 *
 * @module utils/package
 */

import { isRecord } from "./types.js";

export interface Package {
	name: string;
	dependencies?: string[];
	loader: () => Promise<void>;
}

export function isPackage(value: unknown): value is Package {
	if (!isRecord(value)) return false;
	if (typeof value.name !== "string" || !value.name) return false;
	if (typeof value.loader !== "function") return false;
	const dependencies = value.dependencies;
	return (
		dependencies === undefined ||
		(Array.isArray(dependencies) &&
			dependencies.every((dependency) => typeof dependency === "string"))
	);
}
