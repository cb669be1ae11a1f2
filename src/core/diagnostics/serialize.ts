// PURITY: CORE
// INVARIANT: key order is success, errors / message, severity, position / line, column
// COMPLEXITY: O(n)

import type { Diagnostic, LintResult, Severity } from "../models.js";

export interface WirePosition {
	readonly line: number;
	readonly column: number;
}

export interface WireDiagnostic {
	readonly message: string;
	readonly severity: Severity;
	readonly position?: WirePosition;
}

export interface WireLintResult {
	readonly success: boolean;
	readonly errors: readonly WireDiagnostic[];
}

/**
 * Rebuilds the diagnostic with a fixed key order; `position` is omitted,
 * not null, when absent.
 *
 * @pure true
 */
export const toWireDiagnostic = (diagnostic: Diagnostic): WireDiagnostic =>
	diagnostic.position === undefined
		? { message: diagnostic.message, severity: diagnostic.severity }
		: {
				message: diagnostic.message,
				severity: diagnostic.severity,
				position: {
					line: diagnostic.position.line,
					column: diagnostic.position.column,
				},
			};

export const toWireResult = (result: LintResult): WireLintResult => ({
	success: result.success,
	errors: result.errors.map(toWireDiagnostic),
});

/**
 * JSON text of a lint result. `indent` is forwarded to JSON.stringify.
 *
 * @pure true
 */
export const serializeLintResult = (
	result: LintResult,
	indent?: number,
): string => JSON.stringify(toWireResult(result), null, indent);
