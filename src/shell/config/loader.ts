// PURITY: SHELL
// INVARIANT: a missing default config file yields defaults; an explicit --config must exist
// COMPLEXITY: O(size of config file)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError, describeCause } from "../../core/errors.js";
import type { LinterConfig } from "../../core/types/index.js";
import {
	isJSONObject,
	isNumber,
	isStringArray,
	type JSONValue,
	readJSONFile,
} from "../utils/json.js";

export const CONFIG_FILE_NAME = "contract-lint.config.json";

/** 1 MiB */
export const DEFAULT_MAX_SOURCE_BYTES = 1024 * 1024;

export const DEFAULT_LINTER_CONFIG: LinterConfig = {
	whitelist: [],
	maxSourceBytes: DEFAULT_MAX_SOURCE_BYTES,
};

/**
 * Validates parsed config JSON. Unknown keys are ignored; a present key of
 * the wrong type is an error.
 *
 * @returns The config, or a message describing the first problem
 */
export function validateLinterConfig(value: JSONValue): LinterConfig | string {
	if (!isJSONObject(value)) return "expected a JSON object";

	const whitelist: JSONValue | undefined = value["whitelist"];
	const maxSourceBytes: JSONValue | undefined = value["maxSourceBytes"];

	let patterns: readonly string[] = DEFAULT_LINTER_CONFIG.whitelist;
	if (whitelist !== undefined) {
		if (!isStringArray(whitelist)) return '"whitelist" must be an array of strings';
		patterns = whitelist.map((pattern) => pattern.trim()).filter((p) => p.length > 0);
	}

	let limit = DEFAULT_LINTER_CONFIG.maxSourceBytes;
	if (maxSourceBytes !== undefined) {
		if (!isNumber(maxSourceBytes) || !Number.isInteger(maxSourceBytes) || maxSourceBytes <= 0) {
			return '"maxSourceBytes" must be a positive integer';
		}
		limit = maxSourceBytes;
	}

	return { whitelist: patterns, maxSourceBytes: limit };
}

/**
 * Loads contract-lint.config.json.
 *
 * A missing file at the default location yields the defaults; an explicit
 * path that does not exist, unreadable JSON or an invalid shape fail with
 * ConfigError.
 *
 * @param configPath Explicit config path (from --config)
 */
export const loadLinterConfig = (
	configPath?: string,
): Effect.Effect<LinterConfig, ConfigError> =>
	Effect.suspend(() => {
		const resolved = path.resolve(process.cwd(), configPath ?? CONFIG_FILE_NAME);
		if (configPath === undefined && !fs.existsSync(resolved)) {
			return Effect.succeed(DEFAULT_LINTER_CONFIG);
		}
		return Effect.try({
			try: () => readJSONFile(resolved),
			catch: (cause) => new ConfigError({ path: resolved, detail: describeCause(cause) }),
		}).pipe(
			Effect.flatMap((parsed) => {
				const validated = validateLinterConfig(parsed);
				return typeof validated === "string"
					? Effect.fail(new ConfigError({ path: resolved, detail: validated }))
					: Effect.succeed(validated);
			}),
		);
	});
