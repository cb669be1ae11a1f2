// PURITY: SHELL (console output)
// INVARIANT: json output is exactly the wire form of the result, one line
// COMPLEXITY: O(n) where n = |diagnostics|

import { Effect } from "effect";
import { match } from "ts-pattern";

import { serializeLintResult } from "../../core/diagnostics/index.js";
import type { Diagnostic, LintResult } from "../../core/models.js";
import type { OutputFormat } from "../../core/types/index.js";

/**
 * Human-readable line for one diagnostic. Positions are shown 1-based,
 * the way editors count.
 */
export function formatDiagnostic(diagnostic: Diagnostic, filename: string): string {
	const { position, message } = diagnostic;
	return position === undefined
		? `❌ ${filename}  ${message}`
		: `❌ ${filename}:${position.line + 1}:${position.column + 1}  ${message}`;
}

function printText(result: LintResult, filename: string): Effect.Effect<void> {
	return Effect.sync(() => {
		if (result.errors.length === 0) {
			console.log(`✅ No issues found in ${filename}`);
			return;
		}
		for (const diagnostic of result.errors) {
			console.log(formatDiagnostic(diagnostic, filename));
		}
		const noun = result.errors.length === 1 ? "error" : "errors";
		console.log(`\n📊 Total: ${result.errors.length} ${noun}`);
	});
}

/**
 * Writes a lint result to stdout.
 *
 * @param filename - label used in text output; ignored for json
 */
export function printResult(
	result: LintResult,
	filename: string,
	format: OutputFormat,
): Effect.Effect<void> {
	return match<OutputFormat, Effect.Effect<void>>(format)
		.with("json", () => Effect.sync(() => console.log(serializeLintResult(result))))
		.with("text", () => printText(result, filename))
		.exhaustive();
}
