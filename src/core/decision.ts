// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping LintResult → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { ExitCode, LintResult } from "./models.js";

/**
 * Computes process exit code from a lint result.
 *
 * @returns 1 when the result carries any diagnostic; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition result.success → exitCode = 0
 *
 * @example
 * ```ts
 * computeExitCode({ success: true, errors: [] }); // 0
 * ```
 */
export const computeExitCode = (result: LintResult): ExitCode =>
	pipe(
		result,
		(r) => r.success && r.errors.length === 0,
		(clean): ExitCode => (clean ? 0 : 1),
	);
