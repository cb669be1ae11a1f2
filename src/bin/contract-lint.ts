#!/usr/bin/env node

// PURITY: SHELL (BIN layer)
// INVARIANT: single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect } from "effect";

import { runLinter } from "../app/runLinter.js";
import { parseCLIArgs } from "../shell/config/cli.js";

/**
 * CLI entry point for contract-lint.
 *
 * @remarks
 * - @invariant exit code is 0 when the contract has no diagnostics, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const cliOptions = parseCLIArgs();
		const code = await Effect.runPromise(runLinter(cliOptions));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
