/**
 * World model: the immutable rooms and object templates every session shares.
 *
 * A `World` is built once by the world package and never changes afterwards.
 * Everything a session can change (where an object is, whether a door is
 * open, how much oil is left in a bottle) lives in that session's
 * {@link GameState} overlay, which falls back to the template values here.
 *
 * Objects are a tagged union on `type`. Fields that only make sense for one
 * kind of object (container capacity, creature strength, vehicle water
 * requirements) sit on that variant. Verbs check what an object can do
 * through its fixed capability set with {@link hasCapability} rather than by
 * poking at optional fields.
 *
 * @module core/world
 */

import type { DIRECTION } from "../direction.js";

/**
 * The closed set of things an object can have done to it.
 */
export enum CAPABILITY {
	TAKEABLE = "takeable",
	OPENABLE = "openable",
	LOCKABLE = "lockable",
	FLAMMABLE = "flammable",
	CUTTABLE = "cuttable",
	CLIMBABLE = "climbable",
	TURNABLE = "turnable",
	TIEABLE = "tieable",
	INFLATABLE = "inflatable",
	READABLE = "readable",
	MOVEABLE = "moveable",
	WEARABLE = "wearable",
	EDIBLE = "edible",
	DRINKABLE = "drinkable",
	FILLABLE = "fillable",
	LIGHTABLE = "lightable",
	FIRE_SOURCE = "fire_source",
	WEAPON = "weapon",
	CUTTING_TOOL = "cutting_tool",
	DIGGING_TOOL = "digging_tool",
	ANCHOR = "anchor",
	BOARDABLE = "boardable",
	ENTERABLE = "enterable",
	TRANSPARENT = "transparent",
}

/**
 * Parses a capability name from world data.
 */
export function toCapability(name: string): CAPABILITY | undefined {
	for (const capability of Object.values(CAPABILITY)) {
		if (capability === name) return capability;
	}
	return undefined;
}

export type ObjectType =
	| "item"
	| "container"
	| "door"
	| "vehicle"
	| "scenery"
	| "npc"
	| "creature";

export const OBJECT_TYPES: readonly ObjectType[] = [
	"item",
	"container",
	"door",
	"vehicle",
	"scenery",
	"npc",
	"creature",
];

export type Disposition = "asleep" | "awake" | "hostile" | "friendly";

export const DISPOSITIONS: readonly Disposition[] = [
	"asleep",
	"awake",
	"hostile",
	"friendly",
];

/**
 * Where an object is. Every object has exactly one location at a time.
 */
export type Location =
	| { kind: "room"; id: string }
	| { kind: "inventory" }
	| { kind: "inside"; id: string }
	| { kind: "npc"; id: string }
	| { kind: "nowhere" }
	| { kind: "destroyed" };

export const INVENTORY: Location = Object.freeze({ kind: "inventory" });
export const NOWHERE: Location = Object.freeze({ kind: "nowhere" });
export const DESTROYED: Location = Object.freeze({ kind: "destroyed" });

export function inRoom(id: string): Location {
	return { kind: "room", id };
}

export function inside(id: string): Location {
	return { kind: "inside", id };
}

export function heldBy(id: string): Location {
	return { kind: "npc", id };
}

/**
 * Formats a location the way world data and save files spell it:
 * a bare room id, `inventory`, `inside:<id>`, `npc:<id>`, `nowhere` or
 * `destroyed`.
 */
export function formatLocation(location: Location): string {
	switch (location.kind) {
		case "room":
			return location.id;
		case "inside":
			return `inside:${location.id}`;
		case "npc":
			return `npc:${location.id}`;
		default:
			return location.kind;
	}
}

/**
 * Parses the textual form produced by {@link formatLocation}.
 */
export function parseLocation(text: string): Location {
	if (text === "inventory") return INVENTORY;
	if (text === "nowhere") return NOWHERE;
	if (text === "destroyed") return DESTROYED;
	if (text.startsWith("inside:")) return inside(text.slice(7));
	if (text.startsWith("npc:")) return heldBy(text.slice(4));
	return inRoom(text);
}

export function sameLocation(a: Location, b: Location): boolean {
	return formatLocation(a) === formatLocation(b);
}

export interface Liquid {
	kind: string;
	amount: number;
}

export type CustomValue = string | number | boolean;

/**
 * The mutable state of one object. Templates hold the initial value; the
 * session overlay holds a replacement once anything changes.
 */
export interface ObjectState {
	open: boolean;
	locked: boolean;
	lit: boolean;
	tiedTo?: string;
	tiedObjects: readonly string[];
	liquid?: Readonly<Liquid>;
	health?: number;
	disposition?: Disposition;
	inflated: boolean;
	rotation: number;
	activated: boolean;
	pushed: boolean;
	worn: boolean;
	cut: boolean;
	custom: Readonly<Record<string, CustomValue>>;
}

export const DEFAULT_OBJECT_STATE: Readonly<ObjectState> = Object.freeze({
	open: false,
	locked: false,
	lit: false,
	tiedObjects: [],
	inflated: false,
	rotation: 0,
	activated: false,
	pushed: false,
	worn: false,
	cut: false,
	custom: {},
});

/**
 * A data-driven effect: a line of narrative plus the state changes that go
 * with it. Flavor verbs, NPC replies, push reveals and dial side effects are
 * all reactions.
 */
export interface Reaction {
	message: string;
	themed?: string;
	/** Game flags that must hold for the reaction to apply. */
	requires: Readonly<Record<string, boolean>>;
	setsFlags: readonly string[];
	clearsFlags: readonly string[];
	/** Objects moved from wherever they are into the reacting object's room. */
	reveals: readonly string[];
	/** Objects whose `locked` state is cleared. */
	unlocks: readonly string[];
	sanity: number;
	score: number;
	curse: boolean;
	once: boolean;
}

export interface TurnSpec {
	/** Number of dial positions; absent for simple one-way turnables. */
	positions?: number;
	/** Position at which the effect fires. */
	activation: number;
	effect: Reaction;
	/** Effect applied when a simple turnable is turned back. */
	reverse?: Reaction;
}

export interface TieSpec {
	/** Anchor object ids the rope can be tied to. */
	targets: readonly string[];
	/** Game flag set while tied to a given anchor. */
	flags: Readonly<Record<string, string>>;
	message?: string;
}

export interface LightSpec {
	/** Turns of light a fresh source holds; absent for sources that never run out. */
	battery?: number;
	/** Needs a flame to light (candles), rather than a switch. */
	fire?: boolean;
}

interface BaseTemplate {
	id: string;
	name: string;
	themedName?: string;
	synonyms: readonly string[];
	adjectives: readonly string[];
	description: string;
	themedDescription?: string;
	/** Line shown in room listings instead of "There is a ... here." */
	here?: string;
	capabilities: ReadonlySet<CAPABILITY>;
	location: Location;
	state: Readonly<ObjectState>;
	text?: string;
	treasure: number;
	damage?: number;
	armor: number;
	key?: string;
	light?: LightSpec;
	liquidCapacity?: number;
	liquidSource?: string;
	push?: Reaction;
	turn?: TurnSpec;
	tie?: TieSpec;
	splitsInto: readonly string[];
	inflateTool?: string;
	leadsTo?: string;
	reactions: Readonly<Record<string, Reaction>>;
}

export interface ItemTemplate extends BaseTemplate {
	type: "item" | "scenery" | "door";
}

export interface ContainerTemplate extends BaseTemplate {
	type: "container";
	capacity: number;
	/** Contents spill into the room when the container is opened. */
	releaseOnOpen: boolean;
	/** Treasures placed inside award their points once. */
	scoring: boolean;
}

export interface VehicleTemplate extends BaseTemplate {
	type: "vehicle";
	requiresWater: boolean;
}

export interface ActorTemplate extends BaseTemplate {
	type: "npc" | "creature";
	strength: number;
	dialogue: Readonly<Record<string, string>>;
	gifts: Readonly<Record<string, Reaction>>;
	drops: readonly string[];
	deathMessage?: string;
	victoryFlag?: string;
}

export type ObjectTemplate =
	| ItemTemplate
	| ContainerTemplate
	| VehicleTemplate
	| ActorTemplate;

export interface Exit {
	/** Absent for exits that only exist to explain why you can't go that way. */
	to?: string;
	/** Door object that must be open to pass. */
	door?: string;
	/** Game flags that must hold to pass. */
	requires: Readonly<Record<string, boolean>>;
	blocked?: string;
}

export interface Room {
	id: string;
	name: string;
	description: string;
	themedDescription?: string;
	darkDescription?: string;
	exits: ReadonlyMap<DIRECTION, Exit>;
	sounds?: string;
	smell?: string;
	hasWater: boolean;
	/** Can only be entered by water vehicle. */
	deepWater: boolean;
	isDark: boolean;
	isDiggable: boolean;
	sanityEffect: number;
	firstVisit: { score: number; sanity: number };
	buried: readonly string[];
}

/**
 * Typed capability accessor.
 *
 * @example
 * ```typescript
 * if (!hasCapability(lamp, CAPABILITY.LIGHTABLE)) return mismatch(...);
 * ```
 */
export function hasCapability(
	template: ObjectTemplate,
	capability: CAPABILITY
): boolean {
	return template.capabilities.has(capability);
}

export function isContainer(
	template: ObjectTemplate
): template is ContainerTemplate {
	return template.type === "container";
}

export function isVehicle(template: ObjectTemplate): template is VehicleTemplate {
	return template.type === "vehicle";
}

export function isActor(template: ObjectTemplate): template is ActorTemplate {
	return template.type === "npc" || template.type === "creature";
}

/**
 * Every word a player may use to refer to an object.
 */
export function objectWords(template: ObjectTemplate): Set<string> {
	const words = new Set<string>();
	const add = (phrase: string) => {
		for (const word of phrase.toLowerCase().split(/\s+/)) {
			if (word) words.add(word);
		}
	};
	add(template.id.replace(/_/g, " "));
	add(template.name);
	if (template.themedName) add(template.themedName);
	for (const synonym of template.synonyms) add(synonym);
	for (const adjective of template.adjectives) add(adjective);
	return words;
}

/**
 * Words that can stand for the object on their own (not adjectives).
 */
export function objectNouns(template: ObjectTemplate): Set<string> {
	const nouns = new Set<string>();
	const last = (phrase: string) => {
		const words = phrase.toLowerCase().split(/\s+/).filter(Boolean);
		if (words.length) nouns.add(words[words.length - 1]);
	};
	last(template.name);
	if (template.themedName) last(template.themedName);
	for (const synonym of template.synonyms) last(synonym);
	return nouns;
}

/**
 * The immutable world: rooms and object templates keyed by id.
 *
 * Iteration order of `objects` is the order objects were declared in the
 * data files; listings and "all" follow it.
 */
export class World {
	readonly rooms: ReadonlyMap<string, Room>;
	readonly objects: ReadonlyMap<string, ObjectTemplate>;
	readonly startRoom: string;
	private readonly wordIndex: ReadonlyMap<string, ReadonlySet<string>>;
	private readonly nounIndex: ReadonlyMap<string, ReadonlySet<string>>;

	constructor(options: {
		rooms: ReadonlyMap<string, Room>;
		objects: ReadonlyMap<string, ObjectTemplate>;
		startRoom: string;
	}) {
		this.rooms = options.rooms;
		this.objects = options.objects;
		this.startRoom = options.startRoom;
		const words = new Map<string, ReadonlySet<string>>();
		const nouns = new Map<string, ReadonlySet<string>>();
		for (const template of this.objects.values()) {
			words.set(template.id, objectWords(template));
			nouns.set(template.id, objectNouns(template));
		}
		this.wordIndex = words;
		this.nounIndex = nouns;
		Object.freeze(this);
	}

	getRoom(id: string): Room | undefined {
		return this.rooms.get(id);
	}

	getObject(id: string): ObjectTemplate | undefined {
		return this.objects.get(id);
	}

	/**
	 * Looks up an object that is known to exist.
	 * Throws for unknown ids; world validation guarantees every reference
	 * inside the world resolves.
	 */
	object(id: string): ObjectTemplate {
		const template = this.objects.get(id);
		if (!template) throw new Error(`Unknown object "${id}"`);
		return template;
	}

	/**
	 * Looks up a room that is known to exist.
	 */
	room(id: string): Room {
		const room = this.rooms.get(id);
		if (!room) throw new Error(`Unknown room "${id}"`);
		return room;
	}

	/** Words that refer to the object. */
	wordsFor(id: string): ReadonlySet<string> {
		return this.wordIndex.get(id) ?? new Set();
	}

	/** Head nouns of the object. */
	nounsFor(id: string): ReadonlySet<string> {
		return this.nounIndex.get(id) ?? new Set();
	}

	/** True when `word` refers to some object in the world. */
	isObjectWord(word: string): boolean {
		for (const words of this.wordIndex.values()) {
			if (words.has(word)) return true;
		}
		return false;
	}
}
