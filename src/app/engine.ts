// PURITY: APP (composes SHELL checkers with CORE transforms)
// INVARIANT: lint never fails; checker faults and defects become diagnostics
// INVARIANT: findings keep checker order regardless of completion order
// COMPLEXITY: O(c + n·w) where c = checker cost, n = |diagnostics|, w = |whitelist|

import { Cause, Effect, Option, pipe } from "effect";

import {
	dedupeDiagnostics,
	effectiveWhitelist,
	filterDiagnostics,
	toDiagnostic,
} from "../core/diagnostics/index.js";
import { CheckerFault, describeCause } from "../core/errors.js";
import { type LintResult, makeLintResult, type SourceText } from "../core/models.js";
import type { RawFinding } from "../core/types/index.js";
import { DEFAULT_WHITELIST } from "../shell/data/tables.js";
import { type Checker, DEFAULT_CHECKERS } from "../shell/linters/index.js";
import { debugLog } from "../shell/utils/debug.js";

/**
 * Finding that stands in for a checker that threw.
 *
 * @pure true
 */
export const faultFinding = (fault: CheckerFault): RawFinding => ({
	message: `${fault.checker} failed: ${fault.detail}`,
});

const runChecker = (
	checker: Checker,
	source: SourceText,
): Effect.Effect<readonly RawFinding[]> =>
	checker.check(source).pipe(
		Effect.tap((findings) =>
			Effect.sync(() => debugLog(`${checker.id}: ${findings.length} finding(s)`)),
		),
		// typed failures and defects alike; a crashing checker never escapes lint
		Effect.catchAllCause((cause) =>
			Effect.sync(() => {
				const fault = Option.getOrElse(
					Cause.failureOption(cause),
					() => new CheckerFault({ checker: checker.id, detail: describeCause(Cause.squash(cause)) }),
				);
				debugLog(`${fault.checker} faulted: ${fault.detail}`);
				return [faultFinding(fault)];
			}),
		),
	);

export type Lint = (
	source: SourceText,
	whitelist?: Iterable<string>,
) => Effect.Effect<LintResult>;

/**
 * Builds a lint operation over a fixed checker list and default whitelist.
 *
 * @remarks
 * Checkers run concurrently; results are merged in list order, whitelisted
 * diagnostics are dropped, then duplicates by (message, position) are
 * removed keeping the first.
 */
export const makeLinter =
	(checkers: readonly Checker[], defaults: Iterable<string>): Lint =>
	(source, whitelist = []) =>
		Effect.gen(function* (_) {
			const batches = yield* _(
				Effect.all(
					checkers.map((checker) => runChecker(checker, source)),
					{ concurrency: "unbounded" },
				),
			);
			const diagnostics = batches.flat().map(toDiagnostic);
			const patterns = effectiveWhitelist(defaults, whitelist);
			const kept = filterDiagnostics(diagnostics, patterns);
			const errors = dedupeDiagnostics(kept);
			debugLog(
				`${source.filename}: ${diagnostics.length} raw, ${kept.length} after whitelist, ${errors.length} after dedup`,
			);
			return makeLintResult(errors);
		});

/**
 * Lints one contract with the syntax and contract checkers and the bundled
 * default whitelist.
 *
 * @example
 * ```typescript
 * const result = await Effect.runPromise(
 *   lint(makeSourceText("@export\ndef f(a: int):\n    return a\n"), ["imported but unused"]),
 * );
 * ```
 */
export const lint: Lint = makeLinter(DEFAULT_CHECKERS, DEFAULT_WHITELIST);

export const lintSync = (source: SourceText, whitelist?: Iterable<string>): LintResult =>
	pipe(lint(source, whitelist), Effect.runSync);

export const lintPromise = (
	source: SourceText,
	whitelist?: Iterable<string>,
): Promise<LintResult> => pipe(lint(source, whitelist), Effect.runPromise);
