// PURITY: SHELL (readJSONFile); the guards are pure
// INVARIANT: parsed JSON is typed as JSONValue, never any

import * as fs from "node:fs";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

export function isNumber(value: JSONValue): value is number {
	return typeof value === "number" && Number.isFinite(value);
}

export function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

export function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return isArray(value) && value.every(isString);
}

/**
 * Reads and parses a JSON file. Throws on IO or syntax errors.
 */
export function readJSONFile(file: fs.PathLike): JSONValue {
	const parsed: JSONValue = JSON.parse(fs.readFileSync(file, "utf8"));
	return parsed;
}
