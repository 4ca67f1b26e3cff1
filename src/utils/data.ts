/**
 * Readers for untyped YAML data.
 *
 * Each reader takes the value, a human-readable path used in messages, and a
 * `problems` list it appends to instead of throwing, so a loader can report
 * every problem in a file at once. Readers return a usable fallback when the
 * value is missing or malformed.
 *
 * @module utils/data
 */

import { isRecord, type DataRecord } from "./types.js";

export type Problems = string[];

export function readRecord(
	value: unknown,
	where: string,
	problems: Problems
): DataRecord {
	if (value === undefined || value === null) return {};
	if (isRecord(value)) return value;
	problems.push(`${where}: expected a mapping`);
	return {};
}

export function readString(
	value: unknown,
	where: string,
	problems: Problems
): string | undefined {
	if (value === undefined || value === null) return undefined;
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	problems.push(`${where}: expected text`);
	return undefined;
}

export function readRequiredString(
	value: unknown,
	where: string,
	problems: Problems
): string {
	const text = readString(value, where, problems);
	if (text === undefined) {
		problems.push(`${where}: is required`);
		return "";
	}
	return text;
}

export function readNumber(
	value: unknown,
	fallback: number,
	where: string,
	problems: Problems
): number {
	if (value === undefined || value === null) return fallback;
	if (typeof value === "number" && Number.isFinite(value)) return value;
	problems.push(`${where}: expected a number`);
	return fallback;
}

export function readOptionalNumber(
	value: unknown,
	where: string,
	problems: Problems
): number | undefined {
	if (value === undefined || value === null) return undefined;
	return readNumber(value, 0, where, problems);
}

export function readBoolean(
	value: unknown,
	fallback: boolean,
	where: string,
	problems: Problems
): boolean {
	if (value === undefined || value === null) return fallback;
	if (typeof value === "boolean") return value;
	problems.push(`${where}: expected true or false`);
	return fallback;
}

/**
 * Reads a list of strings. A single string is accepted as a one-item list.
 */
export function readStringList(
	value: unknown,
	where: string,
	problems: Problems
): string[] {
	if (value === undefined || value === null) return [];
	if (typeof value === "string") return [value];
	if (!Array.isArray(value)) {
		problems.push(`${where}: expected a list`);
		return [];
	}
	const list: string[] = [];
	value.forEach((item, index) => {
		const text = readString(item, `${where}[${index}]`, problems);
		if (text !== undefined) list.push(text);
	});
	return list;
}

/**
 * Reads a mapping of strings to strings.
 */
export function readStringMap(
	value: unknown,
	where: string,
	problems: Problems
): Map<string, string> {
	const map = new Map<string, string>();
	const record = readRecord(value, where, problems);
	for (const [key, item] of Object.entries(record)) {
		const text = readString(item, `${where}.${key}`, problems);
		if (text !== undefined) map.set(key, text);
	}
	return map;
}

/**
 * Reads a mapping of flag names to required boolean values.
 */
export function readFlagConditions(
	value: unknown,
	where: string,
	problems: Problems
): Record<string, boolean> {
	const conditions: Record<string, boolean> = {};
	if (typeof value === "string") {
		conditions[value] = true;
		return conditions;
	}
	if (Array.isArray(value)) {
		for (const flag of readStringList(value, where, problems)) {
			conditions[flag] = true;
		}
		return conditions;
	}
	const record = readRecord(value, where, problems);
	for (const [flag, required] of Object.entries(record)) {
		conditions[flag] = readBoolean(required, true, `${where}.${flag}`, problems);
	}
	return conditions;
}
