// PURITY: mutable per-analysis state, never shared across runs
// INVARIANT: a scope sees its own bindings first, then enclosing function scopes, then module
// COMPLEXITY: O(1) per lookup per scope level

import type { SyntaxNode } from "../../../core/python/index.js";

/**
 * How a name came to be bound. Definitions (imports, functions, classes)
 * are the bindings a later rebind can "redefine while unused".
 */
export type BindingKind =
	| "import"
	| "future-import"
	| "function"
	| "class"
	| "argument"
	| "assignment"
	| "named-expression"
	| "loop"
	| "binding";

export class Binding {
	used = false;

	/**
	 * @param fullName Import text as reported ("os.path", "a.b as c"); the name otherwise
	 * @param node Statement or definition the binding is reported at
	 */
	constructor(
		readonly name: string,
		readonly kind: BindingKind,
		readonly node: SyntaxNode,
		readonly fullName: string = name,
	) {}

	get isDefinition(): boolean {
		return (
			this.kind === "import" ||
			this.kind === "future-import" ||
			this.kind === "function" ||
			this.kind === "class"
		);
	}

	get isImport(): boolean {
		return this.kind === "import" || this.kind === "future-import";
	}

	/**
	 * Whether binding this over `existing` discards a definition nobody used.
	 */
	redefines(existing: Binding): boolean {
		if (existing.isDefinition) return true;
		return this.isDefinition && existing.kind === "assignment";
	}

	get line(): number {
		return this.node.startPosition.row + 1;
	}
}

export type ScopeKind = "module" | "function" | "class" | "comprehension";

export class Scope {
	readonly bindings = new Map<string, Binding>();
	/** Names declared `global` in this scope. */
	readonly globalNames = new Set<string>();
	readonly nonlocalNames = new Set<string>();
	usesLocals = false;

	constructor(
		readonly kind: ScopeKind,
		readonly parent: Scope | undefined,
	) {}

	lookup(name: string): Binding | undefined {
		return this.bindings.get(name);
	}
}
