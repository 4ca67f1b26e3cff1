/**
 * Package: world - rooms and object templates loader
 *
 * Loads `data/world/rooms.yaml` and `data/world/objects.yaml` into an
 * immutable {@link World} and publishes it in the world registry.
 *
 * Behavior
 * - Keys are snake_case; fields the loader does not know are ignored
 * - Unknown capability names are logged and skipped
 * - An object's `state` block fills the typed state fields; any other key
 *   in it becomes a custom flag
 * - Every reference (exit targets, doors, locations, keys, reveals, drops,
 *   tie targets, buried objects, the start room) must exist; otherwise
 *   loading stops with a `WorldDataError` listing every problem found
 *
 * @example
 * import worldPkg from './package/world.js';
 * await worldPkg.loader();
 * const world = getWorld();
 *
 * @module package/world
 */
import { join, relative } from "path";
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { WorldDataError } from "../utils/errors.js";
import type { DataRecord } from "../utils/types.js";
import {
	readBoolean,
	readFlagConditions,
	readNumber,
	readOptionalNumber,
	readRecord,
	readRequiredString,
	readString,
	readStringList,
	readStringMap,
	type Problems,
} from "../utils/data.js";
import { text2dir, type DIRECTION } from "../direction.js";
import {
	CAPABILITY,
	DEFAULT_OBJECT_STATE,
	DISPOSITIONS,
	OBJECT_TYPES,
	World,
	parseLocation,
	toCapability,
	type CustomValue,
	type Disposition,
	type Exit,
	type Location,
	type ObjectState,
	type ObjectTemplate,
	type ObjectType,
	type Reaction,
	type Room,
	type TieSpec,
	type TurnSpec,
} from "../core/world.js";
import { setWorld } from "../registry/world.js";

export const WORLD_DIRECTORY = join(getDataDirectory(), "world");

const TYPED_STATE_KEYS = new Set([
	"open",
	"locked",
	"lit",
	"tied_to",
	"tied_objects",
	"liquid",
	"health",
	"disposition",
	"inflated",
	"rotation",
	"activated",
	"pushed",
	"worn",
	"cut",
]);

function readObjectType(
	value: unknown,
	where: string,
	problems: Problems
): ObjectType {
	const text = readString(value, where, problems) ?? "item";
	const type = OBJECT_TYPES.find((candidate) => candidate === text);
	if (!type) {
		problems.push(`${where}: unknown object type "${text}"`);
		return "item";
	}
	return type;
}

function readDisposition(
	value: unknown,
	where: string,
	problems: Problems
): Disposition | undefined {
	const text = readString(value, where, problems);
	if (text === undefined) return undefined;
	const disposition = DISPOSITIONS.find((candidate) => candidate === text);
	if (!disposition) problems.push(`${where}: unknown disposition "${text}"`);
	return disposition;
}

/**
 * Reads an object state block over `base`. Also used to read object state
 * back from save files.
 */
export function readObjectState(
	value: unknown,
	where: string,
	problems: Problems,
	base: Readonly<ObjectState> = DEFAULT_OBJECT_STATE
): ObjectState {
	const record = readRecord(value, where, problems);
	const state: ObjectState = {
		open: readBoolean(record.open, base.open, `${where}.open`, problems),
		locked: readBoolean(record.locked, base.locked, `${where}.locked`, problems),
		lit: readBoolean(record.lit, base.lit, `${where}.lit`, problems),
		tiedObjects: record.tied_objects === undefined
			? base.tiedObjects
			: readStringList(record.tied_objects, `${where}.tied_objects`, problems),
		inflated: readBoolean(record.inflated, base.inflated, `${where}.inflated`, problems),
		rotation: readNumber(record.rotation, base.rotation, `${where}.rotation`, problems),
		activated: readBoolean(record.activated, base.activated, `${where}.activated`, problems),
		pushed: readBoolean(record.pushed, base.pushed, `${where}.pushed`, problems),
		worn: readBoolean(record.worn, base.worn, `${where}.worn`, problems),
		cut: readBoolean(record.cut, base.cut, `${where}.cut`, problems),
		custom: { ...base.custom },
	};
	const tiedTo = readString(record.tied_to, `${where}.tied_to`, problems) ?? base.tiedTo;
	if (tiedTo !== undefined) state.tiedTo = tiedTo;
	const health = readOptionalNumber(record.health, `${where}.health`, problems) ?? base.health;
	if (health !== undefined) state.health = health;
	const disposition =
		readDisposition(record.disposition, `${where}.disposition`, problems) ??
		base.disposition;
	if (disposition !== undefined) state.disposition = disposition;
	if (record.liquid !== undefined && record.liquid !== null) {
		const liquid = readRecord(record.liquid, `${where}.liquid`, problems);
		state.liquid = {
			kind: readRequiredString(liquid.kind, `${where}.liquid.kind`, problems),
			amount: readNumber(liquid.amount, 1, `${where}.liquid.amount`, problems),
		};
	} else if (base.liquid) {
		state.liquid = base.liquid;
	}

	const custom: Record<string, CustomValue> = { ...base.custom };
	const extra = record.custom === undefined
		? Object.entries(record).filter(([key]) => !TYPED_STATE_KEYS.has(key))
		: Object.entries(readRecord(record.custom, `${where}.custom`, problems));
	for (const [key, item] of extra) {
		if (
			typeof item === "string" ||
			typeof item === "number" ||
			typeof item === "boolean"
		) {
			custom[key] = item;
		} else {
			problems.push(`${where}.${key}: expected text, a number or true/false`);
		}
	}
	state.custom = custom;
	return state;
}

/**
 * The data form of an object state, as {@link readObjectState} reads it.
 */
export function writeObjectState(state: Readonly<ObjectState>): DataRecord {
	return {
		open: state.open,
		locked: state.locked,
		lit: state.lit,
		...(state.tiedTo !== undefined ? { tied_to: state.tiedTo } : {}),
		tied_objects: [...state.tiedObjects],
		...(state.liquid ? { liquid: { ...state.liquid } } : {}),
		...(state.health !== undefined ? { health: state.health } : {}),
		...(state.disposition !== undefined ? { disposition: state.disposition } : {}),
		inflated: state.inflated,
		rotation: state.rotation,
		activated: state.activated,
		pushed: state.pushed,
		worn: state.worn,
		cut: state.cut,
		custom: { ...state.custom },
	};
}

/**
 * Reads a reaction. A bare string is a reaction with only a message.
 */
function readReaction(value: unknown, where: string, problems: Problems): Reaction {
	const record: DataRecord =
		typeof value === "string" ? { message: value } : readRecord(value, where, problems);
	const reaction: Reaction = {
		message: readRequiredString(record.message, `${where}.message`, problems),
		requires: readFlagConditions(record.requires, `${where}.requires`, problems),
		setsFlags: readStringList(record.sets_flags, `${where}.sets_flags`, problems),
		clearsFlags: readStringList(record.clears_flags, `${where}.clears_flags`, problems),
		reveals: readStringList(record.reveals, `${where}.reveals`, problems),
		unlocks: readStringList(record.unlocks, `${where}.unlocks`, problems),
		sanity: readNumber(record.sanity, 0, `${where}.sanity`, problems),
		score: readNumber(record.score, 0, `${where}.score`, problems),
		curse: readBoolean(record.curse, false, `${where}.curse`, problems),
		once: readBoolean(record.once, false, `${where}.once`, problems),
	};
	const themed = readString(record.themed, `${where}.themed`, problems);
	if (themed !== undefined) reaction.themed = themed;
	return reaction;
}

function readReactions(
	value: unknown,
	where: string,
	problems: Problems
): Record<string, Reaction> {
	const reactions: Record<string, Reaction> = {};
	for (const [key, item] of Object.entries(readRecord(value, where, problems))) {
		reactions[key.toUpperCase()] = readReaction(item, `${where}.${key}`, problems);
	}
	return reactions;
}

function readCapabilities(
	value: unknown,
	where: string,
	problems: Problems
): Set<CAPABILITY> {
	const capabilities = new Set<CAPABILITY>();
	for (const name of readStringList(value, where, problems)) {
		const capability = toCapability(name);
		if (!capability) {
			logger.warn(`${where}: ignoring unknown capability "${name}"`);
			continue;
		}
		capabilities.add(capability);
	}
	return capabilities;
}

function readTurn(value: unknown, where: string, problems: Problems): TurnSpec | undefined {
	if (value === undefined || value === null) return undefined;
	const record = readRecord(value, where, problems);
	const turn: TurnSpec = {
		activation: readNumber(record.activation, 1, `${where}.activation`, problems),
		effect: readReaction(record.effect, `${where}.effect`, problems),
	};
	const positions = readOptionalNumber(record.positions, `${where}.positions`, problems);
	if (positions !== undefined) {
		if (positions < 2 || !Number.isInteger(positions)) {
			problems.push(`${where}.positions: expected a whole number of at least 2`);
		} else if (turn.activation < 0 || turn.activation >= positions) {
			problems.push(`${where}.activation: must be between 0 and ${positions - 1}`);
		}
		turn.positions = positions;
	}
	if (record.reverse !== undefined) {
		turn.reverse = readReaction(record.reverse, `${where}.reverse`, problems);
	}
	return turn;
}

function readTie(value: unknown, where: string, problems: Problems): TieSpec | undefined {
	if (value === undefined || value === null) return undefined;
	const record = readRecord(value, where, problems);
	const tie: TieSpec = {
		targets: readStringList(record.targets, `${where}.targets`, problems),
		flags: Object.fromEntries(readStringMap(record.flags, `${where}.flags`, problems)),
	};
	const message = readString(record.message, `${where}.message`, problems);
	if (message !== undefined) tie.message = message;
	return tie;
}

function readObject(id: string, value: unknown, problems: Problems): ObjectTemplate {
	const where = `objects.${id}`;
	const record = readRecord(value, where, problems);
	const type = readObjectType(record.type, `${where}.type`, problems);
	const lock = readRecord(record.lock, `${where}.lock`, problems);
	const light = readRecord(record.light, `${where}.light`, problems);
	const cut = readRecord(record.cut, `${where}.cut`, problems);
	const inflate = readRecord(record.inflate, `${where}.inflate`, problems);
	const location = readString(record.location, `${where}.location`, problems);

	const stateBlock = readRecord(record.state, `${where}.state`, problems);
	// health and disposition may sit at the top level of an actor
	const state = readObjectState(
		{
			...(record.health !== undefined ? { health: record.health } : {}),
			...(record.disposition !== undefined ? { disposition: record.disposition } : {}),
			...stateBlock,
		},
		`${where}.state`,
		problems
	);

	const base = {
		id,
		name: readRequiredString(record.name, `${where}.name`, problems),
		synonyms: readStringList(record.synonyms, `${where}.synonyms`, problems).map(
			(word) => word.toLowerCase()
		),
		adjectives: readStringList(record.adjectives, `${where}.adjectives`, problems).map(
			(word) => word.toLowerCase()
		),
		description: readString(record.description, `${where}.description`, problems) ??
			"You see nothing special.",
		capabilities: readCapabilities(record.capabilities, `${where}.capabilities`, problems),
		location: location === undefined ? parseLocation("nowhere") : parseLocation(location),
		state: Object.freeze(state),
		treasure: readNumber(record.treasure, 0, `${where}.treasure`, problems),
		armor: readNumber(record.armor, 0, `${where}.armor`, problems),
		splitsInto: readStringList(cut.splits_into, `${where}.cut.splits_into`, problems),
		reactions: readReactions(record.reactions, `${where}.reactions`, problems),
		...optional("themedName", readString(record.themed_name, `${where}.themed_name`, problems)),
		...optional(
			"themedDescription",
			readString(record.themed_description, `${where}.themed_description`, problems)
		),
		...optional("here", readString(record.here, `${where}.here`, problems)),
		...optional("text", readString(record.text, `${where}.text`, problems)),
		...optional("damage", readOptionalNumber(record.damage, `${where}.damage`, problems)),
		...optional("key", readString(lock.key ?? record.key, `${where}.lock.key`, problems)),
		...optional(
			"light",
			record.light === undefined
				? undefined
				: {
						...optional(
							"battery",
							readOptionalNumber(light.battery, `${where}.light.battery`, problems)
						),
						// only flames can light other things
						...(readBoolean(light.fire, false, `${where}.light.fire`, problems)
							? { fire: true }
							: {}),
				  }
		),
		...optional(
			"liquidCapacity",
			readOptionalNumber(record.liquid_capacity, `${where}.liquid_capacity`, problems)
		),
		...optional(
			"liquidSource",
			readString(record.liquid_source, `${where}.liquid_source`, problems)
		),
		...optional(
			"push",
			record.push === undefined ? undefined : readReaction(record.push, `${where}.push`, problems)
		),
		...optional("turn", readTurn(record.turn, `${where}.turn`, problems)),
		...optional("tie", readTie(record.tie, `${where}.tie`, problems)),
		...optional("inflateTool", readString(inflate.tool, `${where}.inflate.tool`, problems)),
		...optional("leadsTo", readString(record.leads_to, `${where}.leads_to`, problems)),
	};

	switch (type) {
		case "container":
			return {
				...base,
				type,
				capacity: readNumber(record.capacity, 10, `${where}.capacity`, problems),
				releaseOnOpen: readBoolean(
					record.release_on_open,
					false,
					`${where}.release_on_open`,
					problems
				),
				scoring: readBoolean(record.scoring, false, `${where}.scoring`, problems),
			};
		case "vehicle":
			return {
				...base,
				type,
				requiresWater: readBoolean(
					record.requires_water,
					false,
					`${where}.requires_water`,
					problems
				),
			};
		case "npc":
		case "creature": {
			const gifts: Record<string, Reaction> = {};
			for (const [item, reaction] of Object.entries(
				readRecord(record.gifts, `${where}.gifts`, problems)
			)) {
				gifts[item] = readReaction(reaction, `${where}.gifts.${item}`, problems);
			}
			return {
				...base,
				type,
				strength: readNumber(record.strength, 1, `${where}.strength`, problems),
				dialogue: Object.fromEntries(
					readStringMap(record.dialogue, `${where}.dialogue`, problems)
				),
				gifts,
				drops: readStringList(record.drops, `${where}.drops`, problems),
				...optional(
					"deathMessage",
					readString(record.death_message, `${where}.death_message`, problems)
				),
				...optional(
					"victoryFlag",
					readString(record.victory_flag, `${where}.victory_flag`, problems)
				),
			};
		}
		default:
			return { ...base, type };
	}
}

/**
 * `{ [key]: value }`, or nothing when the value is absent.
 */
function optional<K extends string, V>(
	key: K,
	value: V | undefined
): { [P in K]?: V } {
	if (value === undefined) return {};
	const entry: { [P in K]?: V } = {};
	entry[key] = value;
	return entry;
}

function readExit(value: unknown, where: string, problems: Problems): Exit {
	if (typeof value === "string") return { to: value, requires: {} };
	const record = readRecord(value, where, problems);
	const exit: Exit = {
		requires: readFlagConditions(record.requires, `${where}.requires`, problems),
	};
	const to = readString(record.to, `${where}.to`, problems);
	if (to !== undefined) exit.to = to;
	const door = readString(record.door, `${where}.door`, problems);
	if (door !== undefined) exit.door = door;
	const blocked = readString(record.blocked, `${where}.blocked`, problems);
	if (blocked !== undefined) exit.blocked = blocked;
	if (exit.to === undefined && exit.blocked === undefined) {
		problems.push(`${where}: an exit needs a destination or a blocked message`);
	}
	return exit;
}

function readRoom(id: string, value: unknown, problems: Problems): Room {
	const where = `rooms.${id}`;
	const record = readRecord(value, where, problems);
	const exits = new Map<DIRECTION, Exit>();
	for (const [name, exit] of Object.entries(readRecord(record.exits, `${where}.exits`, problems))) {
		const direction = text2dir(name);
		if (!direction) {
			problems.push(`${where}.exits.${name}: unknown direction`);
			continue;
		}
		exits.set(direction, readExit(exit, `${where}.exits.${name}`, problems));
	}
	const firstVisit = readRecord(record.first_visit, `${where}.first_visit`, problems);
	return {
		id,
		name: readRequiredString(record.name, `${where}.name`, problems),
		description: readString(record.description, `${where}.description`, problems) ?? "",
		exits,
		hasWater: readBoolean(record.has_water, false, `${where}.has_water`, problems),
		deepWater: readBoolean(record.deep_water, false, `${where}.deep_water`, problems),
		isDark: readBoolean(record.is_dark, false, `${where}.is_dark`, problems),
		isDiggable: readBoolean(record.is_diggable, false, `${where}.is_diggable`, problems),
		sanityEffect: readNumber(record.sanity_effect, 0, `${where}.sanity_effect`, problems),
		firstVisit: {
			score: readNumber(firstVisit.score, 0, `${where}.first_visit.score`, problems),
			sanity: readNumber(firstVisit.sanity, 0, `${where}.first_visit.sanity`, problems),
		},
		buried: readStringList(record.buried, `${where}.buried`, problems),
		...optional(
			"themedDescription",
			readString(record.themed_description, `${where}.themed_description`, problems)
		),
		...optional(
			"darkDescription",
			readString(record.dark_description, `${where}.dark_description`, problems)
		),
		...optional("sounds", readString(record.sounds, `${where}.sounds`, problems)),
		...optional("smell", readString(record.smell, `${where}.smell`, problems)),
	};
}

function checkLocation(
	location: Location,
	where: string,
	rooms: ReadonlyMap<string, Room>,
	objects: ReadonlyMap<string, ObjectTemplate>,
	problems: Problems
): void {
	switch (location.kind) {
		case "room":
			if (!rooms.has(location.id)) {
				problems.push(`${where}: unknown room "${location.id}"`);
			}
			return;
		case "inside":
		case "npc":
			if (!objects.has(location.id)) {
				problems.push(`${where}: unknown object "${location.id}"`);
			}
			return;
		default:
			return;
	}
}

function checkReaction(
	reaction: Reaction,
	where: string,
	objects: ReadonlyMap<string, ObjectTemplate>,
	problems: Problems
): void {
	for (const id of [...reaction.reveals, ...reaction.unlocks]) {
		if (!objects.has(id)) problems.push(`${where}: unknown object "${id}"`);
	}
}

/**
 * Checks that every reference in the world resolves.
 */
function validate(
	rooms: ReadonlyMap<string, Room>,
	objects: ReadonlyMap<string, ObjectTemplate>,
	startRoom: string,
	problems: Problems
): void {
	if (!rooms.has(startRoom)) problems.push(`start_room: unknown room "${startRoom}"`);
	const need = (id: string | undefined, where: string) => {
		if (id !== undefined && !objects.has(id)) {
			problems.push(`${where}: unknown object "${id}"`);
		}
	};

	for (const room of rooms.values()) {
		for (const [direction, exit] of room.exits) {
			const where = `rooms.${room.id}.exits.${direction}`;
			if (exit.to !== undefined && !rooms.has(exit.to)) {
				problems.push(`${where}: unknown room "${exit.to}"`);
			}
			need(exit.door, `${where}.door`);
		}
		room.buried.forEach((id) => need(id, `rooms.${room.id}.buried`));
	}

	for (const template of objects.values()) {
		const where = `objects.${template.id}`;
		checkLocation(template.location, `${where}.location`, rooms, objects, problems);
		if (template.location.kind === "inside" && template.location.id === template.id) {
			problems.push(`${where}.location: an object cannot be inside itself`);
		}
		need(template.key, `${where}.lock.key`);
		need(template.inflateTool, `${where}.inflate.tool`);
		need(template.state.tiedTo, `${where}.state.tied_to`);
		template.splitsInto.forEach((id) => need(id, `${where}.cut.splits_into`));
		template.tie?.targets.forEach((id) => need(id, `${where}.tie.targets`));
		if (template.leadsTo !== undefined && !rooms.has(template.leadsTo)) {
			problems.push(`${where}.leads_to: unknown room "${template.leadsTo}"`);
		}
		if (template.push) checkReaction(template.push, `${where}.push`, objects, problems);
		if (template.turn) {
			checkReaction(template.turn.effect, `${where}.turn.effect`, objects, problems);
			if (template.turn.reverse) {
				checkReaction(template.turn.reverse, `${where}.turn.reverse`, objects, problems);
			}
		}
		for (const [verb, reaction] of Object.entries(template.reactions)) {
			checkReaction(reaction, `${where}.reactions.${verb}`, objects, problems);
		}
		if (template.type === "npc" || template.type === "creature") {
			template.drops.forEach((id) => need(id, `${where}.drops`));
			for (const [item, reaction] of Object.entries(template.gifts)) {
				need(item, `${where}.gifts`);
				checkReaction(reaction, `${where}.gifts.${item}`, objects, problems);
			}
		}
	}
}

/**
 * Builds a world from the parsed room and object files.
 *
 * @throws WorldDataError listing every malformed field and dangling reference
 */
export function parseWorld(roomData: unknown, objectData: unknown): World {
	const problems: Problems = [];
	const roomRoot = readRecord(roomData, "rooms file", problems);
	const objectRoot = readRecord(objectData, "objects file", problems);

	const rooms = new Map<string, Room>();
	for (const [id, value] of Object.entries(readRecord(roomRoot.rooms, "rooms", problems))) {
		rooms.set(id, readRoom(id, value, problems));
	}
	const objects = new Map<string, ObjectTemplate>();
	for (const [id, value] of Object.entries(
		readRecord(objectRoot.objects, "objects", problems)
	)) {
		objects.set(id, readObject(id, value, problems));
	}
	const startRoom = readRequiredString(roomRoot.start_room, "start_room", problems);

	validate(rooms, objects, startRoom, problems);
	if (problems.length) throw new WorldDataError(problems);
	return new World({ rooms, objects, startRoom });
}

/**
 * Reads and parses the world files in `directory`.
 */
export async function readWorld(directory: string = WORLD_DIRECTORY): Promise<World> {
	logger.debug(`Loading world from ${relative(getSafeRootDirectory(), directory)}`);
	const [rooms, objects] = await Promise.all([
		readFile(join(directory, "rooms.yaml"), "utf-8"),
		readFile(join(directory, "objects.yaml"), "utf-8"),
	]);
	const world = parseWorld(YAML.load(rooms), YAML.load(objects));
	logger.info(`World loaded: ${world.rooms.size} rooms, ${world.objects.size} objects`);
	return world;
}

export default {
	name: "world",
	loader: async () => {
		setWorld(await readWorld());
	},
} satisfies Package;
