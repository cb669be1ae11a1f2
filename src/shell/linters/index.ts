// PURITY: SHELL (checker registry)
// INVARIANT: DEFAULT_CHECKERS order is the reporting order
// COMPLEXITY: O(1)

import type { Checker } from "./checker.js";
import { contractChecker } from "./contract/index.js";
import { syntaxChecker } from "./syntax/index.js";

export {
	type Checker,
	type CheckerDefinition,
	defineChecker,
	fromLocated,
	type LocatedFinding,
} from "./checker.js";
export { contractChecker, lintContract } from "./contract/index.js";
export { analyzeSyntax, syntaxChecker } from "./syntax/index.js";

/**
 * Checkers in reporting order: syntax findings precede contract findings.
 */
export const DEFAULT_CHECKERS: readonly Checker[] = [syntaxChecker, contractChecker];
