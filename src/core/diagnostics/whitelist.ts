// PURITY: CORE
// INVARIANT: matching is case-sensitive substring containment; the empty pattern matches nothing
// COMPLEXITY: O(|diagnostics| · |patterns| · |message|)

import type { Diagnostic } from "../models.js";

/**
 * Splits a comma-separated pattern list. Pieces are trimmed and empty
 * pieces dropped, so `"a, ,b,"` yields `["a", "b"]`.
 *
 * @pure true
 */
export const parseWhitelist = (input: string | undefined): readonly string[] =>
	input === undefined
		? []
		: input
				.split(",")
				.map((piece) => piece.trim())
				.filter((piece) => piece.length > 0);

/**
 * Union of the default patterns and the caller's patterns.
 * Caller patterns only ever widen suppression.
 *
 * @pure true
 * @postcondition defaults ⊆ result
 */
export const effectiveWhitelist = (
	defaults: Iterable<string>,
	supplied: Iterable<string>,
): ReadonlySet<string> => {
	const patterns = new Set<string>();
	for (const pattern of [...defaults, ...supplied]) {
		if (pattern.length > 0) patterns.add(pattern);
	}
	return patterns;
};

export const matchesWhitelist = (
	message: string,
	patterns: Iterable<string>,
): boolean => {
	for (const pattern of patterns) {
		if (pattern.length > 0 && message.includes(pattern)) return true;
	}
	return false;
};

/**
 * Drops every diagnostic whose message contains a whitelist pattern.
 *
 * @pure true
 * @invariant relative order of surviving diagnostics is preserved
 */
export const filterDiagnostics = (
	diagnostics: readonly Diagnostic[],
	patterns: ReadonlySet<string>,
): readonly Diagnostic[] =>
	patterns.size === 0
		? diagnostics
		: diagnostics.filter((d) => !matchesWhitelist(d.message, patterns));
