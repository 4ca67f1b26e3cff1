/**
 * Fatal error types.
 *
 * Gameplay problems never throw; they come back as action results. These
 * classes cover the two places where the engine refuses to go on: loading
 * world data with broken references, and reading a save that cannot be
 * trusted.
 *
 * @module utils/errors
 */

export class WorldDataError extends Error {
	code = "WORLD_DATA_ERROR";
	readonly problems: readonly string[];

	constructor(problems: readonly string[]) {
		super(
			`World data is invalid (${problems.length} problem${
				problems.length === 1 ? "" : "s"
			}):\n- ${problems.join("\n- ")}`
		);
		this.name = "WorldDataError";
		this.problems = problems;
	}
}

export type PersistenceErrorKind = "not-found" | "corrupt" | "incompatible";

export class PersistenceError extends Error {
	code = "PERSISTENCE_ERROR";
	readonly kind: PersistenceErrorKind;
	details?: Record<string, unknown>;

	constructor(
		kind: PersistenceErrorKind,
		message: string,
		details?: Record<string, unknown>
	) {
		super(message);
		this.name = "PersistenceError";
		this.kind = kind;
		this.details = details;
	}
}
