// PURITY: SHELL (parses, then runs the pure analyzer)
// INVARIANT: an unparsable module yields exactly one finding
// COMPLEXITY: O(n) parse + analyzer cost

import { syntaxFailureFields } from "../../../core/python/index.js";
import { PYTHON_BUILTINS } from "../../data/tables.js";
import { parseModule } from "../../parser/python.js";
import { type Checker, defineChecker, fromLocated } from "../checker.js";
import { SyntaxAnalyzer } from "./analyzer.js";
import type { FlakeMessage } from "./messages.js";

export { SyntaxAnalyzer } from "./analyzer.js";
export type { FlakeKind, FlakeMessage } from "./messages.js";

/**
 * Findings for one module: the parse failure alone when the module does
 * not parse, scope analysis otherwise.
 */
export function analyzeSyntax(content: string): readonly FlakeMessage[] {
	const outcome = parseModule(content);
	if (outcome._tag === "Failed") {
		return [{ kind: "SyntaxError", ...syntaxFailureFields(outcome.failure) }];
	}
	return new SyntaxAnalyzer(PYTHON_BUILTINS).analyze(outcome.root);
}

export const syntaxChecker: Checker = defineChecker<FlakeMessage>({
	id: "syntax",
	run: (source) => analyzeSyntax(source.content),
	adapt: fromLocated,
});
