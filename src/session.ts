/**
 * Sessions: one game state per player, one command at a time.
 *
 * The {@link SessionManager} is what a front end talks to. It keeps a game
 * state per session id, runs submissions for the same session strictly in
 * order, and carries out the SAVE and RESTORE requests commands return.
 *
 * @example
 * ```typescript
 * const sessions = new SessionManager({ engine, store: new MemorySaveStore() });
 * const response = await sessions.submit({ sessionId: "alice", raw: "open mailbox" });
 * console.log(response.narrative);
 * ```
 *
 * @module session
 */

import logger from "./utils/logger.js";
import { PersistenceError } from "./utils/errors.js";
import { inventoryNames, themed } from "./core/describe.js";
import type { Engine } from "./core/engine.js";
import { OUTCOME, type ActionResult } from "./core/result.js";
import type { GameState } from "./core/state.js";
import { decodeSave, encodeSave, type SaveStore } from "./save.js";

export interface SessionInput {
	sessionId: string;
	raw: string;
}

export interface SessionResponse {
	narrative: string;
	/** Name of the room the player is in afterwards. */
	currentRoom: string;
	inventory: string[];
	score: number;
	success: boolean;
	outcome: OUTCOME;
	/** The player asked to leave. */
	quit: boolean;
}

interface Session {
	state: GameState;
	/** Tail of the submission queue. */
	queue: Promise<unknown>;
}

export class SessionManager {
	readonly engine: Engine;
	readonly store: SaveStore;
	private readonly sessions = new Map<string, Session>();

	constructor(options: { engine: Engine; store: SaveStore }) {
		this.engine = options.engine;
		this.store = options.store;
	}

	private session(sessionId: string): Session {
		let session = this.sessions.get(sessionId);
		if (!session) {
			logger.info(`New session ${sessionId}`);
			session = {
				state: this.engine.newGame(sessionId),
				queue: Promise.resolve(),
			};
			this.sessions.set(sessionId, session);
		}
		return session;
	}

	/**
	 * The live state of a session, created on first use.
	 */
	stateOf(sessionId: string): GameState {
		return this.session(sessionId).state;
	}

	has(sessionId: string): boolean {
		return this.sessions.has(sessionId);
	}

	end(sessionId: string): void {
		this.sessions.delete(sessionId);
	}

	/**
	 * Queues one line of input. Resolves once it and everything submitted
	 * before it for the same session has run.
	 */
	submit(input: SessionInput): Promise<SessionResponse> {
		const session = this.session(input.sessionId);
		const run = session.queue.then(() => this.process(session, input.raw));
		// a failed submission must not stall the ones behind it
		session.queue = run.catch((error: unknown) => {
			logger.error(`[${input.sessionId}] submission failed: ${error}`);
		});
		return run;
	}

	private async process(session: Session, raw: string): Promise<SessionResponse> {
		const state = session.state;
		const before = state.clone();
		let result = this.engine.handlePlayerInput(raw, state);
		if (result.persistence) {
			result = await this.persist(state, before, result);
		}
		return this.respond(state, result);
	}

	private async persist(
		state: GameState,
		before: GameState,
		result: ActionResult
	): Promise<ActionResult> {
		const request = result.persistence;
		if (!request) return result;
		try {
			if (request.action === "save") {
				await this.store.write(state.sessionId, request.slot, encodeSave(state));
				logger.info(`[${state.sessionId}] saved slot ${request.slot}`);
				return result;
			}
			const blob = await this.store.read(state.sessionId, request.slot);
			const restored = decodeSave(blob, this.engine.world);
			restored.sessionId = state.sessionId;
			state.assign(restored);
			logger.info(`[${state.sessionId}] restored slot ${request.slot}`);
			return {
				...result,
				effects: { ...result.effects, roomChanged: true, stateChanged: true },
			};
		} catch (error) {
			if (!(error instanceof PersistenceError)) {
				logger.error(`[${state.sessionId}] ${request.action} failed: ${error}`);
			}
			if (request.action === "restore") state.assign(before);
			const reason =
				error instanceof PersistenceError
					? error.message
					: `Something went wrong: ${error instanceof Error ? error.message : String(error)}`;
			return {
				...result,
				success: false,
				outcome: OUTCOME.PERSISTENCE_FAILURE,
				message: `${request.action === "save" ? "Save" : "Restore"} failed. ${reason}`,
			};
		}
	}

	private respond(state: GameState, result: ActionResult): SessionResponse {
		const room = this.engine.world.room(state.currentRoom);
		return {
			narrative: [result.message, ...result.notifications].join("\n"),
			currentRoom: room.name,
			inventory: inventoryNames(state, this.engine.theme),
			score: state.score,
			success: result.success,
			outcome: result.outcome,
			quit: result.quit === true,
		};
	}
}

/**
 * Greeting shown when a session starts.
 */
export function welcome(engine: Engine, name: string): string {
	return themed(
		engine,
		`Welcome to ${name}. Type HELP if you get stuck.`,
		`Welcome to ${name}. The door has already closed behind you. Type HELP if you get stuck.`
	);
}
