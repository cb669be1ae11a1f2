// PURITY: CORE
// INVARIANT: every export is a total, pure function

export { dedupeDiagnostics, diagnosticKey } from "./dedupe.js";
export { toDiagnostic, toPosition } from "./normalize.js";
export type {
	WireDiagnostic,
	WireLintResult,
	WirePosition,
} from "./serialize.js";
export {
	serializeLintResult,
	toWireDiagnostic,
	toWireResult,
} from "./serialize.js";
export {
	effectiveWhitelist,
	filterDiagnostics,
	matchesWhitelist,
	parseWhitelist,
} from "./whitelist.js";
