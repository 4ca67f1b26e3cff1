/**
 * Action results and the outcome taxonomy.
 *
 * Every command, successful or not, ends in an {@link ActionResult}. Failures
 * are values, never exceptions: the outcome says which kind of failure it was
 * so callers (and tests) can tell "I don't know that word" from "you can't
 * do that to the rug".
 *
 * Handlers return a smaller {@link Reply}; the engine fills in notifications
 * and side-effect flags centrally.
 *
 * @module core/result
 */

export enum OUTCOME {
	OK = "ok",
	NOT_UNDERSTOOD = "not-understood",
	NOT_YET_AVAILABLE = "not-yet-available",
	MISSING_PARAMETER = "missing-parameter",
	AMBIGUOUS_REFERENCE = "ambiguous-reference",
	OBJECT_NOT_PRESENT = "object-not-present",
	CAPABILITY_MISMATCH = "capability-mismatch",
	STATE_CONFLICT = "state-conflict",
	BLOCKED = "blocked",
	PERSISTENCE_FAILURE = "persistence-failure",
}

/** The roles a command can be missing or be ambiguous about. */
export enum ROLE {
	OBJECT = "object",
	TOOL = "tool",
	DIRECTION = "direction",
}

export interface Effects {
	roomChanged: boolean;
	stateChanged: boolean;
	/** Object ids the command touched. */
	affected: string[];
}

export interface PersistenceRequest {
	action: "save" | "restore";
	slot: string;
}

export interface ActionResult {
	success: boolean;
	outcome: OUTCOME;
	message: string;
	/** Secondary lines: sanity changes, a failing lamp, score. */
	notifications: string[];
	effects: Effects;
	/** Missing role, for MISSING_PARAMETER. */
	role?: ROLE;
	/** Candidate object ids, for AMBIGUOUS_REFERENCE. */
	candidates?: string[];
	/** Near-match words, for NOT_UNDERSTOOD. */
	suggestions?: string[];
	/** Why an action is impossible, for CAPABILITY_MISMATCH. */
	reason?: string;
	/** Work the session layer has to do after the command. */
	persistence?: PersistenceRequest;
	quit?: boolean;
}

/**
 * What a handler hands back to the engine.
 */
export interface Reply {
	success: boolean;
	outcome: OUTCOME;
	message: string;
	reason?: string;
	persistence?: PersistenceRequest;
	quit?: boolean;
}

export function ok(message: string): Reply {
	return { success: true, outcome: OUTCOME.OK, message };
}

/**
 * An impossible action, with the reason it is impossible.
 */
export function mismatch(message: string, reason: string = message): Reply {
	return {
		success: false,
		outcome: OUTCOME.CAPABILITY_MISMATCH,
		message,
		reason,
	};
}

/**
 * The object is already in the requested state. Some verbs treat that as a
 * harmless success ("already full"), most as a soft failure.
 */
export function conflict(message: string, success = false): Reply {
	return { success, outcome: OUTCOME.STATE_CONFLICT, message };
}

/**
 * Refused by a rule of the world: no exit, a locked way, the wrong key.
 */
export function blocked(message: string): Reply {
	return { success: false, outcome: OUTCOME.BLOCKED, message };
}

export function absent(message: string): Reply {
	return { success: false, outcome: OUTCOME.OBJECT_NOT_PRESENT, message };
}

/**
 * Builds a complete result with no side effects.
 */
export function createResult(
	reply: Reply,
	extra: Partial<ActionResult> = {}
): ActionResult {
	return {
		...reply,
		notifications: [],
		effects: { roomChanged: false, stateChanged: false, affected: [] },
		...extra,
	};
}
