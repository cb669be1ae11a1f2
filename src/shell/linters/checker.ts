// PURITY: SHELL
// INVARIANT: a checker either returns all of its findings or fails with one CheckerFault
// COMPLEXITY: O(1) wrapper over the checker's own cost

import { Effect } from "effect";

import { CheckerFault, describeCause } from "../../core/errors.js";
import type { SourceText } from "../../core/models.js";
import type { RawFinding } from "../../core/types/index.js";

/**
 * A concrete checker: produces native findings and knows how to map each
 * one into the shared RawFinding shape.
 */
export interface CheckerDefinition<Native> {
	readonly id: string;
	readonly run: (source: SourceText) => Iterable<Native>;
	readonly adapt: (finding: Native) => RawFinding;
}

/**
 * Checker as the engine sees it; the native finding type is erased.
 */
export interface Checker {
	readonly id: string;
	readonly check: (source: SourceText) => Effect.Effect<readonly RawFinding[], CheckerFault>;
}

/**
 * Location shape shared by the checkers' native findings: 1-based
 * `lineno` and `col`, both absent for whole-source findings.
 */
export interface LocatedFinding {
	readonly message: string;
	readonly lineno?: number;
	readonly col?: number;
}

/**
 * Adapter for any LocatedFinding; a finding with a line but no column is
 * placed at column 1.
 */
export const fromLocated = (finding: LocatedFinding): RawFinding =>
	finding.lineno === undefined
		? { message: finding.message }
		: { message: finding.message, line: finding.lineno, column: finding.col ?? 1 };

/**
 * Lifts a definition into an Effect-returning checker. Anything the
 * definition throws (while running or adapting) becomes a CheckerFault.
 */
export const defineChecker = <Native>(definition: CheckerDefinition<Native>): Checker => ({
	id: definition.id,
	check: (source) =>
		Effect.try({
			try: (): readonly RawFinding[] =>
				Array.from(definition.run(source), (finding) => definition.adapt(finding)),
			catch: (cause) => new CheckerFault({ checker: definition.id, detail: describeCause(cause) }),
		}),
});
