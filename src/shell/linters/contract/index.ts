// PURITY: SHELL (parses, then runs the policy walker)
// INVARIANT: an unparsable module yields the same single finding as the syntax checker
// COMPLEXITY: O(n)

import { syntaxFailureFields } from "../../../core/python/index.js";
import { CONTRACT_POLICY, PYTHON_BUILTINS, STDLIB_MODULES } from "../../data/tables.js";
import { parseModule } from "../../parser/python.js";
import { type Checker, defineChecker, fromLocated } from "../checker.js";
import { ContractLinter } from "./linter.js";
import type { Violation } from "./violations.js";

export { annotationName, ContractLinter } from "./linter.js";
export type { Violation, ViolationCode } from "./violations.js";
export { VIOLATION_TRIGGERS } from "./violations.js";

/**
 * Policy violations for one module. A module that does not parse yields
 * the same single failure the syntax checker reports.
 */
export function lintContract(content: string): readonly Violation[] {
	const outcome = parseModule(content);
	if (outcome._tag === "Failed") {
		return [{ code: "syntax", ...syntaxFailureFields(outcome.failure) }];
	}
	return new ContractLinter(CONTRACT_POLICY, PYTHON_BUILTINS, STDLIB_MODULES).check(
		outcome.root,
	);
}

export const contractChecker: Checker = defineChecker<Violation>({
	id: "contracting",
	run: (source) => lintContract(source.content),
	adapt: fromLocated,
});
