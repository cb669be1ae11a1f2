// PURITY: SHELL (stderr)

// Optional debug logger controlled by env CONTRACT_LINT_DEBUG=1.
// Writes to stderr so json output on stdout stays parseable.

const ENV: NodeJS.ProcessEnv & { CONTRACT_LINT_DEBUG?: string } = process.env;

export const isDebugEnabled = (): boolean => ENV.CONTRACT_LINT_DEBUG === "1";

export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error("[contract-lint]", message);
	}
}
