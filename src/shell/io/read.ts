// PURITY: SHELL
// INVARIANT: read failures surface as FSError, never as thrown exceptions
// COMPLEXITY: O(payload size)

import * as fs from "node:fs";

import { Effect } from "effect";

import { describeCause, FSError } from "../../core/errors.js";

/**
 * Reads the payload bytes: the named file, or stdin for "-".
 */
export const readPayload = (targetPath: string): Effect.Effect<Uint8Array, FSError> =>
	Effect.try({
		try: () => (targetPath === "-" ? fs.readFileSync(0) : fs.readFileSync(targetPath)),
		catch: (cause) => new FSError({ path: targetPath, detail: describeCause(cause) }),
	});
