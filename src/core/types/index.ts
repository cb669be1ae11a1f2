// PURITY: CORE

export type {
	CLIOptions,
	LinterConfig,
	OutputFormat,
	PayloadEncoding,
} from "./config.js";
export type { RawFinding, RawLocation } from "./findings.js";
