import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/cli.js";

/**
 * Sets process.argv for the duration of a call and restores it afterwards.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

describe("parseCLIArgs", () => {
	it("reads stdin as plain text by default", () => {
		const expected: CLIOptions = {
			targetPath: "-",
			whitelist: [],
			encoding: "plain",
			format: "text",
		};
		expect(withArgv([], () => parseCLIArgs())).toEqual(expected);
	});

	it("takes the positional argument as the target", () => {
		expect(withArgv(["", "token.py"], () => parseCLIArgs()).targetPath).toBe("token.py");
	});

	it("accumulates whitelist patterns across flags", () => {
		const opts = withArgv(["--whitelist", "S13, S2-", "--whitelist", ",S4"], () => parseCLIArgs());
		expect(opts.whitelist).toEqual(["S13", "S2-", "S4"]);
	});

	it("parses encoding, format, limit and config", () => {
		const opts = withArgv(
			["--encoding", "gzip", "--format", "json", "--max-bytes", "2048", "--config", "cfg.json", "c.py"],
			() => parseCLIArgs(),
		);
		expect(opts).toEqual({
			targetPath: "c.py",
			whitelist: [],
			encoding: "gzip",
			format: "json",
			maxBytes: 2048,
			configPath: "cfg.json",
		});
	});

	it("keeps defaults for invalid values", () => {
		const opts = withArgv(["--encoding", "zip", "--format", "xml", "--max-bytes", "-5"], () =>
			parseCLIArgs(),
		);
		expect(opts.encoding).toBe("plain");
		expect(opts.format).toBe("text");
		expect(opts.maxBytes).toBeUndefined();
	});

	it("ignores a value flag at the end of the arguments", () => {
		expect(withArgv(["a.py", "--format"], () => parseCLIArgs()).format).toBe("text");
	});
});
