// PURITY: APP (orchestrates SHELL effects, returns ExitCode as a value)
// INVARIANT: no process.exit here; the bin entry is the only exit point
// COMPLEXITY: O(payload + lint)

import { Effect, pipe } from "effect";
import { match } from "ts-pattern";

import type { ConfigError, DecodeError, FSError, PayloadTooLarge } from "../core/errors.js";
import { computeExitCode } from "../core/decision.js";
import { type ExitCode, makeLintResult, makeSourceText } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { loadLinterConfig } from "../shell/config/loader.js";
import { readPayload } from "../shell/io/read.js";
import { printResult } from "../shell/output/printer.js";
import {
	decodePayload,
	describePayloadError,
	enforcePayloadLimit,
} from "../shell/payload/decode.js";
import { lint } from "./engine.js";

type RunError = ConfigError | FSError | DecodeError | PayloadTooLarge;

const sourceLabel = (targetPath: string): string =>
	targetPath === "-" ? "<stdin>" : targetPath;

/**
 * Reports a run that never reached the engine.
 *
 * A payload that cannot be decoded is reported as a failed lint result, in
 * the selected format; config and filesystem problems go to stderr.
 */
function reportFailure(error: RunError, cliOptions: CLIOptions): Effect.Effect<ExitCode> {
	const filename = sourceLabel(cliOptions.targetPath);
	return match<RunError, Effect.Effect<ExitCode>>(error)
		.with({ _tag: "DecodeError" }, { _tag: "PayloadTooLarge" }, (e) =>
			printResult(
				makeLintResult([{ message: describePayloadError(e), severity: "error" }]),
				filename,
				cliOptions.format,
			).pipe(Effect.as<ExitCode>(1)),
		)
		.with({ _tag: "ConfigError" }, (e) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ Invalid config ${e.path}: ${e.detail}`);
				return 1;
			}),
		)
		.with({ _tag: "FS" }, (e) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ Cannot read ${e.path ?? filename}: ${e.detail}`);
				return 1;
			}),
		)
		.exhaustive();
}

/**
 * Lints one contract file (or stdin) and returns the process exit code.
 *
 * @pure false (reads files, writes to the console)
 * @effect Effect<ExitCode, never>; every failure is reported and mapped to 1
 * @postcondition exit code is 0 iff the lint result is successful
 */
export function runLinter(cliOptions: CLIOptions): Effect.Effect<ExitCode> {
	const filename = sourceLabel(cliOptions.targetPath);
	const program = Effect.gen(function* (_) {
		const config = yield* _(loadLinterConfig(cliOptions.configPath));
		if (cliOptions.format === "text") {
			console.log(`🔍 Linting contract: ${filename}`);
		}

		const content = yield* _(
			pipe(
				readPayload(cliOptions.targetPath),
				Effect.flatMap((payload) =>
					enforcePayloadLimit(payload, cliOptions.maxBytes ?? config.maxSourceBytes),
				),
				Effect.flatMap((payload) => decodePayload(payload, cliOptions.encoding)),
			),
		);

		const result = yield* _(
			lint(makeSourceText(content, filename), [...config.whitelist, ...cliOptions.whitelist]),
		);
		yield* _(printResult(result, filename, cliOptions.format));
		return computeExitCode(result);
	});

	return program.pipe(Effect.catchAll((error) => reportFailure(error, cliOptions)));
}
