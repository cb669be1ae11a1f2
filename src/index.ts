// PURITY: Re-exports only (meta-module)
// INVARIANT: SHELL internals stay private; only the engine, CORE data and checker seams are public
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Lints one contract and returns its diagnostics.
 *
 * @example
 * ```typescript
 * import { lintPromise, makeSourceText } from "contract-lint";
 *
 * const result = await lintPromise(
 *   makeSourceText("@export\ndef ping(x: int):\n    return x\n", "ping.py"),
 *   ["S13"],
 * );
 *
 * if (result.success) {
 *   console.log("✅ No issues");
 * }
 * ```
 */
export { lint, lintPromise, lintSync, makeLinter } from "./app/engine.js";
export type { Lint } from "./app/engine.js";

/**
 * CLI orchestration for programmatic usage; returns an ExitCode, never exits.
 */
export { runLinter } from "./app/runLinter.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Diagnostic,
	ExitCode,
	LintResult,
	Position,
	Severity,
	SourceText,
} from "./core/models.js";
export { makeLintResult, makeSourceText } from "./core/models.js";
export type {
	CLIOptions,
	LinterConfig,
	OutputFormat,
	PayloadEncoding,
	RawFinding,
} from "./core/types/index.js";
export {
	CheckerFault,
	ConfigError,
	DecodeError,
	FSError,
	PayloadTooLarge,
} from "./core/errors.js";
export type { AppError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export {
	dedupeDiagnostics,
	effectiveWhitelist,
	filterDiagnostics,
	matchesWhitelist,
	parseWhitelist,
	serializeLintResult,
	toDiagnostic,
	toWireResult,
} from "./core/diagnostics/index.js";
export type { WireDiagnostic, WireLintResult } from "./core/diagnostics/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CHECKERS (for composing a custom engine with makeLinter)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	contractChecker,
	DEFAULT_CHECKERS,
	defineChecker,
	syntaxChecker,
} from "./shell/linters/index.js";
export type { Checker, CheckerDefinition } from "./shell/linters/index.js";
export { DEFAULT_WHITELIST } from "./shell/data/tables.js";
export { decodePayload } from "./shell/payload/decode.js";
