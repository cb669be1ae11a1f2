// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the linter process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Complete text of one contract module plus the name it is reported under.
 *
 * @remarks
 * - @invariant content is analyzed as-is (no trimming, no normalization)
 */
export interface SourceText {
	readonly content: string;
	readonly filename: string;
}

export const makeSourceText = (
	content: string,
	filename = "<string>",
): SourceText => ({ content, filename });

/**
 * Zero-based location in the source.
 *
 * @remarks
 * - @invariant line ≥ 0 ∧ column ≥ 0
 */
export interface Position {
	readonly line: number;
	readonly column: number;
}

/**
 * Severity of a diagnostic. Every diagnostic the engine emits today is an
 * error; the union leaves room for advisory levels.
 */
export type Severity = "error" | "warning";

export interface Diagnostic {
	readonly message: string;
	readonly severity: Severity;
	readonly position?: Position;
}

/**
 * Outcome of one lint run.
 *
 * @remarks
 * - @invariant success ↔ errors.length = 0
 * - @invariant errors contains no two entries with equal (message, position)
 */
export interface LintResult {
	readonly success: boolean;
	readonly errors: readonly Diagnostic[];
}

/**
 * @pure true
 * @postcondition result.success = (errors.length === 0)
 */
export const makeLintResult = (errors: readonly Diagnostic[]): LintResult => ({
	success: errors.length === 0,
	errors,
});
