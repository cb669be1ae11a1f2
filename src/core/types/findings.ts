// PURITY: CORE
// INVARIANT: line and column are 1-based when present; a column without a line is ignored

/**
 * Narrow shape every checker maps its native findings into before the
 * engine normalizes them.
 *
 * @property message Human-readable text; becomes Diagnostic.message verbatim
 * @property line 1-based line, absent when the finding has no location
 * @property column 1-based column, absent when the checker reports none
 */
export interface RawFinding {
	readonly message: string;
	readonly line?: number;
	readonly column?: number;
}

/**
 * 1-based location as checkers report it.
 */
export interface RawLocation {
	readonly line: number;
	readonly column: number;
}
