/**
 * Save files: encoding a game state and storing it in slots.
 *
 * A save is a YAML document:
 *
 * ```yaml
 * format: hollow-manor-save
 * version: 1
 * checksum: <sha256 of the state block>
 * state:
 *   currentRoom: kitchen
 *   ...
 * ```
 *
 * Decoding checks the format and version (`incompatible`), the checksum and
 * the shape of every field (`corrupt`), and that every room and object the
 * save mentions exists in the world it is loaded into (`incompatible`).
 *
 * A pending question is kept with its command, candidates and the objects
 * already chosen. The SAVE command never meets one: typing SAVE cancels the
 * question before the command runs.
 *
 * @module save
 */

import { createHash } from "crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { join, relative } from "path";
import YAML from "js-yaml";
import logger from "./utils/logger.js";
import { PersistenceError } from "./utils/errors.js";
import { getSafeRootDirectory } from "./utils/path.js";
import { isRecord, type DataRecord } from "./utils/types.js";
import {
	readBoolean,
	readNumber,
	readRecord,
	readRequiredString,
	readString,
	readStringList,
	readStringMap,
	type Problems,
} from "./utils/data.js";
import { readObjectState, writeObjectState } from "./package/world.js";
import { createCommand, type ParsedCommand } from "./core/parser.js";
import { ROLE } from "./core/result.js";
import {
	GameState,
	VERBOSITIES,
	type Bindings,
	type FlagValue,
	type GameSnapshot,
	type PendingInteraction,
	type RoomState,
	type Verbosity,
} from "./core/state.js";
import { toPreposition } from "./core/vocabulary.js";
import { parseLocation, type ObjectState, type World } from "./core/world.js";
import { text2dir } from "./direction.js";

export const SAVE_FORMAT = "hollow-manor-save";
export const SAVE_VERSION = 1;

function checksum(state: DataRecord): string {
	return createHash("sha256").update(JSON.stringify(state)).digest("hex");
}

function commandRecord(command: ParsedCommand): DataRecord {
	return {
		verb: command.verb,
		objects: [...command.objects],
		...(command.target !== undefined ? { target: command.target } : {}),
		...(command.direction !== undefined ? { direction: command.direction } : {}),
		...(command.preposition !== undefined ? { preposition: command.preposition } : {}),
		modifiers: [...command.modifiers],
		raw: command.raw,
	};
}

function pendingRecord(pending: PendingInteraction): DataRecord {
	const bindings: DataRecord = {
		objects: { ...pending.bindings.objects },
		...(pending.bindings.tool !== undefined ? { tool: pending.bindings.tool } : {}),
	};
	const question = {
		kind: pending.kind,
		command: commandRecord(pending.command),
		role: pending.role,
	};
	if (pending.kind === "parameter") return { ...question, bindings };
	return {
		...question,
		index: pending.index,
		candidates: [...pending.candidates],
		bindings,
	};
}

function stateRecord(state: GameState): DataRecord {
	const snapshot = state.toSnapshot();
	const objects: Record<string, DataRecord> = {};
	for (const [id, objectState] of Object.entries(snapshot.objects)) {
		objects[id] = writeObjectState(objectState);
	}
	return {
		sessionId: snapshot.sessionId,
		currentRoom: snapshot.currentRoom,
		...(snapshot.currentVehicle !== undefined
			? { currentVehicle: snapshot.currentVehicle }
			: {}),
		sanity: snapshot.sanity,
		score: snapshot.score,
		moves: snapshot.moves,
		verbosity: snapshot.verbosity,
		cursed: snapshot.cursed,
		ended: snapshot.ended,
		...(snapshot.lastInput !== undefined ? { lastInput: snapshot.lastInput } : {}),
		flags: snapshot.flags,
		resources: snapshot.resources,
		visited: snapshot.visited,
		locations: snapshot.locations,
		objects,
		rooms: snapshot.rooms,
		...(snapshot.pending !== undefined ? { pending: pendingRecord(snapshot.pending) } : {}),
	};
}

/**
 * Serializes a game state to a save document.
 */
export function encodeSave(state: GameState): string {
	const record = stateRecord(state);
	return YAML.dump(
		{
			format: SAVE_FORMAT,
			version: SAVE_VERSION,
			checksum: checksum(record),
			state: record,
		},
		{ noRefs: true, lineWidth: 120 }
	);
}

function readVerbosity(value: unknown, problems: Problems): Verbosity {
	const text = readString(value, "state.verbosity", problems);
	const verbosity = VERBOSITIES.find((candidate) => candidate === text);
	if (!verbosity) {
		problems.push(`state.verbosity: unknown verbosity "${text}"`);
		return "brief";
	}
	return verbosity;
}

function readFlags(value: unknown, problems: Problems): Record<string, FlagValue> {
	const flags: Record<string, FlagValue> = {};
	for (const [name, flag] of Object.entries(readRecord(value, "state.flags", problems))) {
		if (typeof flag === "boolean" || typeof flag === "number") {
			flags[name] = flag;
		} else {
			problems.push(`state.flags.${name}: expected true/false or a number`);
		}
	}
	return flags;
}

function readCommand(value: unknown, where: string, problems: Problems): ParsedCommand {
	const record = readRecord(value, where, problems);
	const directionText = readString(record.direction, `${where}.direction`, problems);
	const direction = directionText === undefined ? undefined : text2dir(directionText);
	if (directionText !== undefined && !direction) {
		problems.push(`${where}.direction: unknown direction "${directionText}"`);
	}
	const prepositionText = readString(record.preposition, `${where}.preposition`, problems);
	const preposition =
		prepositionText === undefined ? undefined : toPreposition(prepositionText);
	if (prepositionText !== undefined && !preposition) {
		problems.push(`${where}.preposition: unknown preposition "${prepositionText}"`);
	}
	return createCommand({
		verb: readRequiredString(record.verb, `${where}.verb`, problems),
		objects: readStringList(record.objects, `${where}.objects`, problems),
		target: readString(record.target, `${where}.target`, problems),
		direction,
		preposition,
		modifiers: readStringList(record.modifiers, `${where}.modifiers`, problems),
		raw: readRequiredString(record.raw, `${where}.raw`, problems),
	});
}

function readBindings(value: unknown, where: string, problems: Problems): Bindings {
	const record = readRecord(value, where, problems);
	const objects: Record<number, string> = {};
	for (const [key, id] of readStringMap(record.objects, `${where}.objects`, problems)) {
		const index = Number(key);
		if (!Number.isInteger(index) || index < 0) {
			problems.push(`${where}.objects.${key}: expected a phrase index`);
			continue;
		}
		objects[index] = id;
	}
	const tool = readString(record.tool, `${where}.tool`, problems);
	return { objects, ...(tool !== undefined ? { tool } : {}) };
}

function readPending(value: unknown, problems: Problems): PendingInteraction | undefined {
	if (value === undefined || value === null) return undefined;
	const where = "state.pending";
	const record = readRecord(value, where, problems);
	const command = readCommand(record.command, `${where}.command`, problems);
	const bindings = readBindings(record.bindings, `${where}.bindings`, problems);
	const roleText = readString(record.role, `${where}.role`, problems);
	const role = Object.values(ROLE).find((candidate) => candidate === roleText);
	if (!role) {
		problems.push(`${where}.role: unknown role "${roleText}"`);
		return undefined;
	}
	switch (record.kind) {
		case "parameter":
			return { kind: "parameter", command, role, bindings };
		case "disambiguation":
			if (role !== ROLE.OBJECT && role !== ROLE.TOOL) {
				problems.push(`${where}.role: cannot choose between ${role}s`);
				return undefined;
			}
			return {
				kind: "disambiguation",
				command,
				role,
				index: readNumber(record.index, 0, `${where}.index`, problems),
				candidates: readStringList(record.candidates, `${where}.candidates`, problems),
				bindings,
			};
		default:
			problems.push(`${where}.kind: unknown question "${String(record.kind)}"`);
			return undefined;
	}
}

function readSnapshot(data: DataRecord, problems: Problems): GameSnapshot {
	const resources: Record<string, number> = {};
	for (const [id, amount] of Object.entries(
		readRecord(data.resources, "state.resources", problems)
	)) {
		resources[id] = readNumber(amount, 0, `state.resources.${id}`, problems);
	}
	const objects: Record<string, ObjectState> = {};
	for (const [id, objectState] of Object.entries(
		readRecord(data.objects, "state.objects", problems)
	)) {
		objects[id] = readObjectState(objectState, `state.objects.${id}`, problems);
	}
	const rooms: Record<string, RoomState> = {};
	for (const [id, roomState] of Object.entries(
		readRecord(data.rooms, "state.rooms", problems)
	)) {
		const record = readRecord(roomState, `state.rooms.${id}`, problems);
		rooms[id] = { dug: readBoolean(record.dug, false, `state.rooms.${id}.dug`, problems) };
	}
	const currentVehicle = readString(data.currentVehicle, "state.currentVehicle", problems);
	const lastInput = readString(data.lastInput, "state.lastInput", problems);
	const pending = readPending(data.pending, problems);
	return {
		sessionId: readRequiredString(data.sessionId, "state.sessionId", problems),
		currentRoom: readRequiredString(data.currentRoom, "state.currentRoom", problems),
		...(currentVehicle !== undefined ? { currentVehicle } : {}),
		sanity: readNumber(data.sanity, 100, "state.sanity", problems),
		score: readNumber(data.score, 0, "state.score", problems),
		moves: readNumber(data.moves, 0, "state.moves", problems),
		verbosity: readVerbosity(data.verbosity, problems),
		cursed: readBoolean(data.cursed, false, "state.cursed", problems),
		ended: readBoolean(data.ended, false, "state.ended", problems),
		...(lastInput !== undefined ? { lastInput } : {}),
		flags: readFlags(data.flags, problems),
		resources,
		visited: readStringList(data.visited, "state.visited", problems),
		locations: Object.fromEntries(
			readStringMap(data.locations, "state.locations", problems)
		),
		objects,
		rooms,
		...(pending !== undefined ? { pending } : {}),
	};
}

/**
 * Names in the snapshot that the world does not have.
 */
function unknownReferences(world: World, snapshot: GameSnapshot): string[] {
	const missing: string[] = [];
	const room = (id: string, where: string) => {
		if (!world.getRoom(id)) missing.push(`${where}: unknown room "${id}"`);
	};
	const object = (id: string, where: string) => {
		if (!world.getObject(id)) missing.push(`${where}: unknown object "${id}"`);
	};
	room(snapshot.currentRoom, "currentRoom");
	if (snapshot.currentVehicle) object(snapshot.currentVehicle, "currentVehicle");
	for (const id of snapshot.visited) room(id, "visited");
	for (const id of Object.keys(snapshot.rooms)) room(id, "rooms");
	for (const id of Object.keys(snapshot.objects)) object(id, "objects");
	for (const id of Object.keys(snapshot.resources)) object(id, "resources");
	if (snapshot.pending) {
		const { bindings } = snapshot.pending;
		for (const id of Object.values(bindings.objects)) object(id, "pending.bindings");
		if (bindings.tool) object(bindings.tool, "pending.bindings");
		if (snapshot.pending.kind === "disambiguation") {
			for (const id of snapshot.pending.candidates) object(id, "pending.candidates");
		}
	}
	for (const [id, text] of Object.entries(snapshot.locations)) {
		object(id, "locations");
		const location = parseLocation(text);
		if (location.kind === "room") room(location.id, `locations.${id}`);
		if (location.kind === "inside" || location.kind === "npc") {
			object(location.id, `locations.${id}`);
		}
	}
	return missing;
}

/**
 * Reads a save document back into a game state for `world`.
 *
 * @throws PersistenceError when the document cannot be trusted
 */
export function decodeSave(blob: string, world: World): GameState {
	let document: unknown;
	try {
		document = YAML.load(blob);
	} catch (error) {
		throw new PersistenceError("corrupt", "The save file could not be read.", {
			cause: String(error),
		});
	}
	if (!isRecord(document)) {
		throw new PersistenceError("corrupt", "The save file could not be read.");
	}
	if (document.format !== SAVE_FORMAT || document.version !== SAVE_VERSION) {
		throw new PersistenceError("incompatible", "That save is from a different game.", {
			format: document.format,
			version: document.version,
		});
	}
	if (!isRecord(document.state) || document.checksum !== checksum(document.state)) {
		throw new PersistenceError("corrupt", "The save file has been damaged.");
	}

	const problems: Problems = [];
	const snapshot = readSnapshot(document.state, problems);
	if (problems.length) {
		throw new PersistenceError("corrupt", "The save file has been damaged.", {
			problems,
		});
	}
	const missing = unknownReferences(world, snapshot);
	if (missing.length) {
		throw new PersistenceError("incompatible", "That save belongs to a different world.", {
			problems: missing,
		});
	}
	return GameState.fromSnapshot(world, snapshot);
}

/**
 * Where save documents live, keyed by session and slot.
 */
export interface SaveStore {
	write(sessionId: string, slot: string, blob: string): Promise<void>;
	/** @throws PersistenceError `not-found` for an empty slot */
	read(sessionId: string, slot: string): Promise<string>;
}

/**
 * Slot and session names as file-safe words.
 */
export function sanitizeSlot(name: string): string {
	const safe = name
		.toLowerCase()
		.replace(/[^a-z0-9_-]+/g, "-")
		.replace(/^-+|-+$/g, "");
	return safe || "default";
}

export class MemorySaveStore implements SaveStore {
	private readonly slots = new Map<string, string>();

	private key(sessionId: string, slot: string): string {
		return `${sessionId}/${sanitizeSlot(slot)}`;
	}

	async write(sessionId: string, slot: string, blob: string): Promise<void> {
		this.slots.set(this.key(sessionId, slot), blob);
	}

	async read(sessionId: string, slot: string): Promise<string> {
		const blob = this.slots.get(this.key(sessionId, slot));
		if (blob === undefined) {
			throw new PersistenceError("not-found", `There is no saved game called "${slot}".`);
		}
		return blob;
	}
}

/**
 * YAML files under `<directory>/<session>/<slot>.yaml`.
 */
export class FileSaveStore implements SaveStore {
	readonly directory: string;

	constructor(directory: string) {
		this.directory = directory;
	}

	pathFor(sessionId: string, slot: string): string {
		return join(this.directory, sanitizeSlot(sessionId), `${sanitizeSlot(slot)}.yaml`);
	}

	async write(sessionId: string, slot: string, blob: string): Promise<void> {
		const filePath = this.pathFor(sessionId, slot);
		const tempPath = `${filePath}.tmp`;
		await mkdir(join(this.directory, sanitizeSlot(sessionId)), { recursive: true });
		try {
			// Write to temporary file first
			await writeFile(tempPath, blob, "utf-8");
			// Atomically rename temp file to final location
			await rename(tempPath, filePath);
			logger.debug(`Saved game: ${relative(getSafeRootDirectory(), filePath)}`);
		} catch (error) {
			await unlink(tempPath).catch((cleanupError: unknown) => {
				logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
			});
			throw error;
		}
	}

	async read(sessionId: string, slot: string): Promise<string> {
		const filePath = this.pathFor(sessionId, slot);
		try {
			return await readFile(filePath, "utf-8");
		} catch (error) {
			logger.debug(`No save at ${filePath}: ${error}`);
			throw new PersistenceError("not-found", `There is no saved game called "${slot}".`);
		}
	}
}
