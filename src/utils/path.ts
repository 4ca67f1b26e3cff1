import { join } from "path";

/**
 * Returns the root directory runtime data is resolved against.
 * Prefers the `HOLLOW_MANOR_HOME` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const home = process.env.HOLLOW_MANOR_HOME;

	if (home) {
		return home;
	}

	return process.cwd();
}

/** The `data/` directory under the root directory. */
export function getDataDirectory(): string {
	return join(getSafeRootDirectory(), "data");
}
