/**
 * Per-session game state.
 *
 * A `GameState` is the overlay one session keeps on top of the shared
 * {@link World}: where the player is, what changed about each object, flags,
 * counters and the pending question (if any). Templates are never touched;
 * reads fall back to them for anything the session has not changed.
 *
 * Object locations live in a single map keyed by object id, so an object is
 * always in exactly one place. Moving it replaces its entry.
 *
 * @example
 * ```typescript
 * const state = GameState.create(world, "session-1");
 * state.moveObject("lamp", INVENTORY);
 * state.updateObject("lamp", { lit: true });
 * state.sanity -= 15; // clamped to [0, 100]
 * ```
 *
 * @module core/state
 */

import {
	formatLocation,
	parseLocation,
	sameLocation,
	INVENTORY,
	type Location,
	type ObjectState,
	type World,
} from "./world.js";
import type { ParsedCommand } from "./parser.js";
import type { ROLE } from "./result.js";

export type Verbosity = "verbose" | "brief" | "superbrief";

export const VERBOSITIES: readonly Verbosity[] = [
	"verbose",
	"brief",
	"superbrief",
];

export type FlagValue = boolean | number;

export const MIN_SANITY = 0;
export const MAX_SANITY = 100;

/**
 * Objects already resolved for a command that is waiting on another answer.
 * `objects` is keyed by the index of the phrase in `command.objects`.
 */
export interface Bindings {
	objects: Readonly<Record<number, string>>;
	tool?: string;
}

export type PendingInteraction =
	| {
			kind: "disambiguation";
			command: ParsedCommand;
			role: ROLE.OBJECT | ROLE.TOOL;
			/** Index of the ambiguous phrase, for the object role. */
			index: number;
			candidates: readonly string[];
			bindings: Bindings;
	  }
	| {
			kind: "parameter";
			command: ParsedCommand;
			role: ROLE;
			bindings: Bindings;
	  };

export interface RoomState {
	dug: boolean;
}

const DEFAULT_ROOM_STATE: Readonly<RoomState> = Object.freeze({ dug: false });

/**
 * Plain, serializable form of a game state.
 */
export interface GameSnapshot {
	sessionId: string;
	currentRoom: string;
	sanity: number;
	score: number;
	moves: number;
	verbosity: Verbosity;
	cursed: boolean;
	ended: boolean;
	flags: Record<string, FlagValue>;
	resources: Record<string, number>;
	visited: string[];
	currentVehicle?: string;
	lastInput?: string;
	/** Only objects that moved, by id. */
	locations: Record<string, string>;
	/** Only objects whose state changed, by id. */
	objects: Record<string, ObjectState>;
	rooms: Record<string, RoomState>;
	pending?: PendingInteraction;
}

/**
 * Copies an object state, leaving unset optional fields out entirely.
 */
export function compactObjectState(state: Readonly<ObjectState>): ObjectState {
	return {
		open: state.open,
		locked: state.locked,
		lit: state.lit,
		...(state.tiedTo !== undefined ? { tiedTo: state.tiedTo } : {}),
		tiedObjects: [...state.tiedObjects],
		...(state.liquid ? { liquid: { ...state.liquid } } : {}),
		...(state.health !== undefined ? { health: state.health } : {}),
		...(state.disposition !== undefined
			? { disposition: state.disposition }
			: {}),
		inflated: state.inflated,
		rotation: state.rotation,
		activated: state.activated,
		pushed: state.pushed,
		worn: state.worn,
		cut: state.cut,
		custom: { ...state.custom },
	};
}

export class GameState {
	readonly world: World;
	sessionId: string;
	currentRoom: string;
	score = 0;
	moves = 0;
	verbosity: Verbosity = "brief";
	cursed = false;
	/** Set by QUIT and by death; only a few verbs still work afterwards. */
	ended = false;
	currentVehicle?: string;
	pending?: PendingInteraction;
	lastInput?: string;
	flags = new Map<string, FlagValue>();
	/** Remaining turns of light per light source. */
	resources = new Map<string, number>();
	visited = new Set<string>();
	private _sanity = MAX_SANITY;
	private locations = new Map<string, Location>();
	private objectStates = new Map<string, ObjectState>();
	private roomStates = new Map<string, RoomState>();

	constructor(world: World, sessionId: string) {
		this.world = world;
		this.sessionId = sessionId;
		this.currentRoom = world.startRoom;
	}

	/**
	 * A fresh game: the player in the start room, full light sources.
	 */
	static create(
		world: World,
		sessionId: string,
		options: { sanity?: number } = {}
	): GameState {
		const state = new GameState(world, sessionId);
		state.visited.add(world.startRoom);
		if (options.sanity !== undefined) state.sanity = options.sanity;
		for (const template of world.objects.values()) {
			if (template.light?.battery !== undefined) {
				state.resources.set(template.id, template.light.battery);
			}
		}
		return state;
	}

	get sanity(): number {
		return this._sanity;
	}

	/** Always clamped to [0, 100]. */
	set sanity(value: number) {
		this._sanity = Math.max(MIN_SANITY, Math.min(MAX_SANITY, Math.round(value)));
	}

	locationOf(id: string): Location {
		return this.locations.get(id) ?? this.world.object(id).location;
	}

	/**
	 * Moves an object. Its previous location is simply replaced.
	 */
	moveObject(id: string, location: Location): void {
		const template = this.world.object(id);
		if (sameLocation(template.location, location)) {
			this.locations.delete(id);
			return;
		}
		this.locations.set(id, location);
	}

	/**
	 * Object ids at a location, in world order.
	 */
	contentsOf(location: Location): string[] {
		const ids: string[] = [];
		for (const id of this.world.objects.keys()) {
			if (sameLocation(this.locationOf(id), location)) ids.push(id);
		}
		return ids;
	}

	get inventory(): string[] {
		return this.contentsOf(INVENTORY);
	}

	isHeld(id: string): boolean {
		return this.locationOf(id).kind === "inventory";
	}

	objectState(id: string): Readonly<ObjectState> {
		return this.objectStates.get(id) ?? this.world.object(id).state;
	}

	updateObject(id: string, patch: Partial<ObjectState>): Readonly<ObjectState> {
		const next = compactObjectState({ ...this.objectState(id), ...patch });
		this.objectStates.set(id, next);
		return next;
	}

	roomState(id: string): Readonly<RoomState> {
		return this.roomStates.get(id) ?? DEFAULT_ROOM_STATE;
	}

	updateRoom(id: string, patch: Partial<RoomState>): void {
		this.roomStates.set(id, { ...this.roomState(id), ...patch });
	}

	hasFlag(name: string): boolean {
		const value = this.flags.get(name);
		return value !== undefined && value !== false && value !== 0;
	}

	setFlag(name: string, value: FlagValue = true): void {
		this.flags.set(name, value);
	}

	clearFlag(name: string): void {
		this.flags.delete(name);
	}

	/**
	 * Checks a set of flag conditions (`{ rug_moved: true }`).
	 */
	meets(conditions: Readonly<Record<string, boolean>>): boolean {
		for (const [flag, required] of Object.entries(conditions)) {
			if (this.hasFlag(flag) !== required) return false;
		}
		return true;
	}

	/**
	 * An independent copy sharing only the immutable world.
	 */
	clone(): GameState {
		const copy = new GameState(this.world, this.sessionId);
		copy.assign(this);
		return copy;
	}

	/**
	 * Replaces every field of this state with a copy of `other`'s.
	 */
	assign(other: GameState): void {
		this.sessionId = other.sessionId;
		this.currentRoom = other.currentRoom;
		this._sanity = other._sanity;
		this.score = other.score;
		this.moves = other.moves;
		this.verbosity = other.verbosity;
		this.cursed = other.cursed;
		this.ended = other.ended;
		this.currentVehicle = other.currentVehicle;
		this.pending = other.pending;
		this.lastInput = other.lastInput;
		this.flags = new Map(other.flags);
		this.resources = new Map(other.resources);
		this.visited = new Set(other.visited);
		this.locations = new Map(other.locations);
		this.objectStates = new Map(other.objectStates);
		this.roomStates = new Map(other.roomStates);
	}

	toSnapshot(): GameSnapshot {
		const locations: Record<string, string> = {};
		for (const [id, location] of this.locations) {
			locations[id] = formatLocation(location);
		}
		const objects: Record<string, ObjectState> = {};
		for (const [id, state] of this.objectStates) {
			objects[id] = compactObjectState(state);
		}
		const rooms: Record<string, RoomState> = {};
		for (const [id, state] of this.roomStates) {
			rooms[id] = { ...state };
		}
		return {
			sessionId: this.sessionId,
			currentRoom: this.currentRoom,
			sanity: this.sanity,
			score: this.score,
			moves: this.moves,
			verbosity: this.verbosity,
			cursed: this.cursed,
			ended: this.ended,
			flags: Object.fromEntries(this.flags),
			resources: Object.fromEntries(this.resources),
			visited: [...this.visited],
			...(this.currentVehicle !== undefined
				? { currentVehicle: this.currentVehicle }
				: {}),
			...(this.lastInput !== undefined ? { lastInput: this.lastInput } : {}),
			locations,
			objects,
			rooms,
			...(this.pending !== undefined ? { pending: this.pending } : {}),
		};
	}

	static fromSnapshot(world: World, snapshot: GameSnapshot): GameState {
		const state = new GameState(world, snapshot.sessionId);
		state.currentRoom = snapshot.currentRoom;
		state.sanity = snapshot.sanity;
		state.score = snapshot.score;
		state.moves = snapshot.moves;
		state.verbosity = snapshot.verbosity;
		state.cursed = snapshot.cursed;
		state.ended = snapshot.ended;
		state.currentVehicle = snapshot.currentVehicle;
		state.lastInput = snapshot.lastInput;
		state.pending = snapshot.pending;
		state.flags = new Map(Object.entries(snapshot.flags));
		state.resources = new Map(Object.entries(snapshot.resources));
		state.visited = new Set(snapshot.visited);
		for (const [id, location] of Object.entries(snapshot.locations)) {
			state.locations.set(id, parseLocation(location));
		}
		for (const [id, objectState] of Object.entries(snapshot.objects)) {
			state.objectStates.set(id, compactObjectState(objectState));
		}
		for (const [id, roomState] of Object.entries(snapshot.rooms)) {
			state.roomStates.set(id, { ...roomState });
		}
		return state;
	}
}
