// PURITY: CORE
// INVARIANT: message and severity never depend on the checker that produced the finding
// COMPLEXITY: O(1) per finding

import type { Diagnostic, Position } from "../models.js";
import type { RawFinding } from "../types/index.js";

/**
 * Converts a checker's 1-based location into a 0-based position.
 * A finding without a column is placed at column 0.
 *
 * @pure true
 * @invariant result.line ≥ 0 ∧ result.column ≥ 0
 */
export const toPosition = (line: number, column: number | undefined): Position => ({
	line: Math.max(0, line - 1),
	column: Math.max(0, (column ?? 1) - 1),
});

/**
 * Normalizes one raw finding into a diagnostic.
 *
 * @pure true
 * @postcondition raw.line === undefined → result.position === undefined
 * @postcondition result.severity = "error"
 *
 * @example
 * ```ts
 * toDiagnostic({ message: "x", line: 5, column: 3 });
 * // { message: "x", severity: "error", position: { line: 4, column: 2 } }
 * ```
 */
export const toDiagnostic = (raw: RawFinding): Diagnostic =>
	raw.line === undefined
		? { message: raw.message, severity: "error" }
		: {
				message: raw.message,
				severity: "error",
				position: toPosition(raw.line, raw.column),
			};
