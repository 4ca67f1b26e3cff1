/**
 * Deep readonly utility type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = {
	readonly [P in keyof T]: T[P] extends object ? DeepReadonly<T[P]> : T[P];
};

/**
 * A plain record as produced by YAML or JSON parsing.
 */
export type DataRecord = Record<string, unknown>;

/**
 * Narrows an untyped value to a plain (non-array) record.
 */
export function isRecord(value: unknown): value is DataRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * True when `value` has the same primitive type as `sample`.
 */
export function isSameType<V>(sample: V, value: unknown): value is V {
	return typeof value === typeof sample;
}
