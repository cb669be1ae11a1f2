// PURITY: SHELL (reads process.argv)
// INVARIANT: unknown flags are ignored; repeated --whitelist values accumulate
// COMPLEXITY: O(n) over argv

import { parseWhitelist } from "../../core/diagnostics/index.js";
import type {
	CLIOptions,
	OutputFormat,
	PayloadEncoding,
} from "../../core/types/index.js";

interface ArgState {
	readonly targetPath: string;
	readonly whitelist: readonly string[];
	readonly encoding: PayloadEncoding;
	readonly format: OutputFormat;
	readonly maxBytes: number | undefined;
	readonly configPath: string | undefined;
}

type ValueFlagHandler = (value: string, current: ArgState) => ArgState;

const ENCODINGS: readonly PayloadEncoding[] = ["plain", "base64", "gzip"];
const FORMATS: readonly OutputFormat[] = ["text", "json"];

const isEncoding = (value: string): value is PayloadEncoding =>
	ENCODINGS.some((encoding) => encoding === value);

const isFormat = (value: string): value is OutputFormat =>
	FORMATS.some((format) => format === value);

// Flags that take a value; an unrecognized value leaves the default in place.
const valueHandlers: Record<string, ValueFlagHandler | undefined> = {
	"--whitelist": (value, current) => ({
		...current,
		whitelist: [...current.whitelist, ...parseWhitelist(value)],
	}),
	"--encoding": (value, current) =>
		isEncoding(value) ? { ...current, encoding: value } : current,
	"--format": (value, current) =>
		isFormat(value) ? { ...current, format: value } : current,
	"--max-bytes": (value, current) => {
		const parsed = Number.parseInt(value, 10);
		return Number.isFinite(parsed) && parsed > 0
			? { ...current, maxBytes: parsed }
			: current;
	},
	"--config": (value, current) => ({ ...current, configPath: value }),
};

/**
 * Parses command line arguments.
 *
 * @returns Command line options
 *
 * @example
 * ```ts
 * // Command: contract-lint token.py --whitelist "S13,S2-" --format json
 * const options = parseCLIArgs();
 * // { targetPath: "token.py", whitelist: ["S13", "S2-"], encoding: "plain", format: "json" }
 * ```
 */
export function parseCLIArgs(): CLIOptions {
	const args = process.argv.slice(2);
	let state: ArgState = {
		targetPath: "-",
		whitelist: [],
		encoding: "plain",
		format: "text",
		maxBytes: undefined,
		configPath: undefined,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const handler = valueHandlers[arg];
		if (handler !== undefined) {
			const value = args.at(i + 1);
			if (value !== undefined) {
				state = handler(value, state);
				i++;
			}
			continue;
		}
		if (arg === "-" || !arg.startsWith("--")) {
			state = { ...state, targetPath: arg };
		}
	}

	const { maxBytes, configPath, ...rest } = state;
	return {
		...rest,
		...(maxBytes === undefined ? {} : { maxBytes }),
		...(configPath === undefined ? {} : { configPath }),
	};
}
