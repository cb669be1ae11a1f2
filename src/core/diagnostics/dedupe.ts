// PURITY: CORE
// INVARIANT: first occurrence wins; an absent position never equals a present one
// COMPLEXITY: O(n) time / O(n) space

import type { Diagnostic } from "../models.js";

/**
 * Identity of a diagnostic for deduplication: message plus position.
 * Severity is not part of the key.
 *
 * @pure true
 */
export const diagnosticKey = (diagnostic: Diagnostic): string =>
	diagnostic.position === undefined
		? `${diagnostic.message}\u0000-`
		: `${diagnostic.message}\u0000${diagnostic.position.line}:${diagnostic.position.column}`;

/**
 * Stable deduplication on (message, position).
 *
 * @pure true
 * @postcondition ∀ i < j: key(result[i]) ≠ key(result[j])
 * @postcondition result is a subsequence of diagnostics
 */
export const dedupeDiagnostics = (
	diagnostics: readonly Diagnostic[],
): readonly Diagnostic[] => {
	const seen = new Set<string>();
	return diagnostics.filter((diagnostic) => {
		const key = diagnosticKey(diagnostic);
		if (seen.has(key)) return false;
		seen.add(key);
		return true;
	});
};
