// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A checker raised instead of returning findings.
 *
 * @pure true (Data class)
 * @invariant checker.length > 0
 * @complexity O(1)
 */
export class CheckerFault extends Data.TaggedError("CheckerFault")<{
	readonly checker: string;
	readonly detail: string;
}> {}

/**
 * Payload bytes could not be decoded into source text.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly encoding: "base64" | "gzip";
	readonly detail: string;
}> {}

/**
 * Payload exceeds the configured byte limit.
 *
 * @pure true (Data class)
 * @invariant size > limit
 * @complexity O(1)
 */
export class PayloadTooLarge extends Data.TaggedError("PayloadTooLarge")<{
	readonly size: number;
	readonly limit: number;
}> {}

/**
 * Configuration file exists but is not a valid linter config.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Union type of all application errors for Effect signatures.
 * `CheckerFault` never escapes the engine; it is folded into a diagnostic.
 */
export type AppError =
	| CheckerFault
	| DecodeError
	| PayloadTooLarge
	| ConfigError
	| FSError;

/**
 * Text of an arbitrary thrown value.
 *
 * @pure true
 * @postcondition result is the Error message when cause is an Error
 */
export const describeCause = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);
