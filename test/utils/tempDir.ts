import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Creates a fresh temporary directory and returns its path plus a cleanup.
 */
export function makeTempDir(prefix = "contract-lint-"): {
	readonly dir: string;
	readonly write: (name: string, content: string | Uint8Array) => string;
	readonly cleanup: () => void;
} {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
	return {
		dir,
		write: (name, content) => {
			const file = path.join(dir, name);
			fs.writeFileSync(file, content);
			return file;
		},
		cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
	};
}
