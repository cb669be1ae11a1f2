// PURITY: CORE
// INVARIANT: all fields readonly; defaults live in shell/config

/**
 * Encoding of the bytes handed to the CLI.
 */
export type PayloadEncoding = "plain" | "base64" | "gzip";

export type OutputFormat = "text" | "json";

/**
 * Configuration from contract-lint.config.json.
 *
 * @property whitelist Extra suppression patterns, unioned with the defaults
 * @property maxSourceBytes Upper bound on the raw payload size
 */
export interface LinterConfig {
	readonly whitelist: ReadonlyArray<string>;
	readonly maxSourceBytes: number;
}

/**
 * Command line options.
 *
 * @property targetPath Contract file to check, or "-" for stdin
 * @property whitelist Patterns from --whitelist (already split and trimmed)
 * @property encoding Encoding of the payload bytes
 * @property format Output format for the lint result
 * @property maxBytes Overrides LinterConfig.maxSourceBytes when set
 * @property configPath Explicit config file; default is looked up in cwd
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly whitelist: ReadonlyArray<string>;
	readonly encoding: PayloadEncoding;
	readonly format: OutputFormat;
	readonly maxBytes?: number;
	readonly configPath?: string;
}
