// PURITY: SHELL-adjacent (stateful walker over an immutable tree)
// INVARIANT: function and lambda bodies run after the enclosing module has been walked,
//            so they see every module-level binding
// COMPLEXITY: O(n · d) where d = scope depth

import {
	describeParameters,
	type ParameterInfo,
	sameNode,
	type SyntaxNode,
} from "../../../core/python/index.js";
import { type FlakeKind, type FlakeMessage, flakeAt, MESSAGE_TEXT } from "./messages.js";
import { Binding, type BindingKind, Scope, type ScopeKind } from "./scope.js";

const MODULE_MAGIC = ["__file__", "__builtins__", "__annotations__", "WindowsError"];
const CLASS_MAGIC = ["__module__", "__qualname__"];

const COMPREHENSIONS = new Set([
	"list_comprehension",
	"set_comprehension",
	"dictionary_comprehension",
	"generator_expression",
]);
const UNPACKING_TARGETS = new Set([
	"pattern_list",
	"tuple_pattern",
	"list_pattern",
	"tuple",
	"list",
	"expression_list",
]);
const LITERALS = new Set(["string", "concatenated_string", "integer", "float"]);
const SINGLETONS = new Set(["none", "true", "false", "ellipsis"]);
const LOOPS = new Set(["for_statement", "while_statement"]);
const LOOP_BARRIERS = new Set([
	"function_definition",
	"class_definition",
	"lambda",
	"module",
]);
const CONDITIONALS = new Set(["if_statement", "while_statement", "conditional_expression"]);
const FORKS = new Set(["if_statement", "try_statement"]);
const STRING_LITERAL = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

const compact = (text: string): string => text.replace(/\s+/g, "");

const qualify = (module: string, name: string): string =>
	module.endsWith(".") ? `${module}${name}` : `${module}.${name}`;

const stringPrefix = (node: SyntaxNode): string => /^[A-Za-z]*/.exec(node.text)?.[0] ?? "";

const isFormatString = (node: SyntaxNode): boolean =>
	node.type === "string" && /f/i.test(stringPrefix(node));

const hasInterpolation = (node: SyntaxNode): boolean =>
	node.namedChildren.some((child) => child.type === "interpolation");

const isConstant = (node: SyntaxNode): boolean => {
	if (LITERALS.has(node.type) || SINGLETONS.has(node.type)) return true;
	if (node.type === "parenthesized_expression") {
		const inner = node.namedChildren[0];
		return inner !== undefined && isConstant(inner);
	}
	return node.type === "tuple" && node.namedChildren.every(isConstant);
};

const isConstantNonSingleton = (node: SyntaxNode): boolean =>
	isConstant(node) && !SINGLETONS.has(node.type);

/**
 * Identity and display form of a dictionary key, for keys the analyzer
 * can compare statically.
 */
interface KeyIdentity {
	readonly id: string;
	readonly label: string;
	readonly variable: boolean;
}

interface KeyGroup {
	readonly key: KeyIdentity;
	readonly entries: { readonly node: SyntaxNode; readonly value: string }[];
}

const keyIdentity = (key: SyntaxNode): KeyIdentity | undefined => {
	switch (key.type) {
		case "string": {
			if (hasInterpolation(key)) return undefined;
			const parts = STRING_LITERAL.exec(key.text);
			if (parts === null) return undefined;
			const bytes = /b/i.test(parts[1] ?? "");
			const content = parts[3] ?? "";
			const quoted =
				content.includes("'") && !content.includes('"') ? `"${content}"` : `'${content}'`;
			return {
				id: `${bytes ? "b" : "s"}:${content}`,
				label: bytes ? `b${quoted}` : quoted,
				variable: false,
			};
		}
		case "integer":
		case "float":
			return { id: `n:${key.text}`, label: key.text, variable: false };
		case "true":
		case "false":
		case "none":
			return { id: `k:${key.type}`, label: key.text, variable: false };
		case "identifier":
			return { id: `v:${key.text}`, label: key.text, variable: true };
		default:
			return undefined;
	}
};

const ancestors = (node: SyntaxNode): SyntaxNode[] => {
	const chain: SyntaxNode[] = [];
	for (let current = node.parent; current !== null; current = current.parent) {
		chain.push(current);
	}
	return chain;
};

const compareMessages = (a: FlakeMessage, b: FlakeMessage): number =>
	(a.lineno ?? 0) - (b.lineno ?? 0) || (a.col ?? 0) - (b.col ?? 0);

/**
 * Scope-aware analysis of one parsed module: undefined and unused names,
 * redefinitions and a handful of statically detectable mistakes.
 *
 * @remarks
 * - A fresh instance per module; `analyze` is single-use.
 * - Module and class bodies are walked in source order (flow-sensitive).
 * - Messages come back ordered by (line, column), ties in emission order.
 */
export class SyntaxAnalyzer {
	private readonly messages: FlakeMessage[] = [];
	private readonly deferred: Array<() => void> = [];
	private readonly scopes: Scope[] = [];
	private readonly starImports: Binding[] = [];
	private readonly builtins: ReadonlySet<string>;
	private readonly moduleScope: Scope;
	private scope: Scope;
	private exportList: { readonly names: readonly string[]; readonly node: SyntaxNode } | undefined;

	constructor(builtins: ReadonlySet<string>) {
		this.builtins = new Set([...builtins, ...MODULE_MAGIC]);
		this.moduleScope = this.openScope("module", undefined);
		this.scope = this.moduleScope;
	}

	analyze(root: SyntaxNode): readonly FlakeMessage[] {
		this.visitChildren(root);
		for (let next = this.deferred.shift(); next !== undefined; next = this.deferred.shift()) {
			next();
		}
		this.checkExportList();
		for (const scope of this.scopes) this.checkDeadScope(scope);
		this.checkStarImports();
		return [...this.messages].sort(compareMessages);
	}

	// ---------------------------------------------------------------- plumbing

	private report(kind: FlakeKind, node: SyntaxNode, message: string): void {
		this.messages.push(flakeAt(kind, node, message));
	}

	private openScope(kind: ScopeKind, parent: Scope | undefined): Scope {
		const scope = new Scope(kind, parent);
		this.scopes.push(scope);
		return scope;
	}

	private visitChildren(node: SyntaxNode): void {
		for (const child of node.namedChildren) this.visit(child);
	}

	private visitField(node: SyntaxNode, field: string): void {
		const child = node.childForFieldName(field);
		if (child !== null) this.visit(child);
	}

	private visit(node: SyntaxNode): void {
		switch (node.type) {
			case "identifier":
				this.handleLoad(node.text, node);
				return;
			case "comment":
				return;
			case "attribute":
				this.visitField(node, "object");
				return;
			case "keyword_argument":
				this.visitField(node, "value");
				return;
			case "import_statement":
				this.visitImport(node);
				return;
			case "import_from_statement":
				this.visitImportFrom(node);
				return;
			case "future_import_statement":
				this.visitFutureImport(node);
				return;
			case "decorated_definition":
				this.visitDecorated(node);
				return;
			case "function_definition":
				this.visitFunction(node);
				return;
			case "class_definition":
				this.visitClass(node);
				return;
			case "lambda":
				this.visitLambda(node);
				return;
			case "assignment":
				this.visitAssignment(node);
				return;
			case "augmented_assignment":
				this.visitAugmentedAssignment(node);
				return;
			case "named_expression":
				this.visitNamedExpression(node);
				return;
			case "for_statement":
				this.visitFor(node);
				return;
			case "global_statement":
				this.declareNames(node, this.scope.globalNames);
				return;
			case "nonlocal_statement":
				this.declareNames(node, this.scope.nonlocalNames);
				return;
			case "delete_statement":
				this.visitDelete(node);
				return;
			case "as_pattern":
				this.visitAsPattern(node);
				return;
			case "except_clause":
				this.visitExcept(node);
				return;
			case "return_statement":
				this.checkInsideFunction(node, "ReturnOutsideFunction");
				this.visitChildren(node);
				return;
			case "yield":
				this.checkInsideFunction(node, "YieldOutsideFunction");
				this.visitChildren(node);
				return;
			case "break_statement":
				this.checkInsideLoop(node, "BreakOutsideLoop");
				return;
			case "continue_statement":
				this.checkInsideLoop(node, "ContinueOutsideLoop");
				return;
			case "assert_statement":
				this.checkAssertTuple(node);
				this.visitChildren(node);
				return;
			case "comparison_operator":
				this.checkIdentityComparison(node);
				this.visitChildren(node);
				return;
			case "dictionary":
				this.checkRepeatedKeys(node);
				this.visitChildren(node);
				return;
			case "string":
				if (node.parent?.type !== "concatenated_string") this.checkFormatString(node);
				this.visitChildren(node);
				return;
			case "concatenated_string":
				this.checkFormatString(node);
				this.visitChildren(node);
				return;
			default:
				if (COMPREHENSIONS.has(node.type)) {
					this.visitComprehension(node);
					return;
				}
				this.visitChildren(node);
		}
	}

	// ------------------------------------------------------------ name binding

	private handleLoad(name: string, node: SyntaxNode): void {
		if (name === "locals") this.scope.usesLocals = true;
		let innermost = true;
		for (let scope: Scope | undefined = this.scope; scope !== undefined; scope = scope.parent) {
			// Class bodies are not visible from nested scopes.
			const visible = innermost || scope.kind !== "class";
			innermost = false;
			if (!visible) continue;
			const binding = scope.lookup(name);
			if (binding !== undefined) {
				binding.used = true;
				return;
			}
		}
		if (this.builtins.has(name)) return;
		if (this.starImports.length > 0) {
			for (const star of this.starImports) star.used = true;
			const from = this.starImports.map((star) => star.name).join(", ");
			this.report("ImportStarUsage", node, MESSAGE_TEXT.ImportStarUsage(name, from));
			return;
		}
		this.report("UndefinedName", node, MESSAGE_TEXT.UndefinedName(name));
	}

	private bindingScope(name: string, kind: BindingKind): Scope {
		if (this.scope.globalNames.has(name)) return this.moduleScope;
		if (kind === "named-expression") {
			let scope = this.scope;
			while (scope.kind === "comprehension" && scope.parent !== undefined) {
				scope = scope.parent;
			}
			return scope;
		}
		return this.scope;
	}

	private bind(binding: Binding): void {
		if (this.scope.nonlocalNames.has(binding.name)) {
			this.handleLoad(binding.name, binding.node);
			return;
		}
		const scope = this.bindingScope(binding.name, binding.kind);
		const existing = scope.lookup(binding.name);
		if (existing !== undefined) {
			this.checkRedefinition(binding, existing);
			binding.used = existing.used;
		}
		scope.bindings.set(binding.name, binding);
	}

	private checkRedefinition(binding: Binding, existing: Binding): void {
		if (this.differentForks(binding.node, existing.node)) return;
		if (binding.kind === "loop" && existing.isImport) {
			this.report(
				"ImportShadowedByLoopVar",
				binding.node,
				MESSAGE_TEXT.ImportShadowedByLoopVar(binding.name, existing.line),
			);
			return;
		}
		if (existing.used || !binding.redefines(existing)) return;
		if (binding.isImport && existing.isImport && binding.fullName !== existing.fullName) return;
		if (binding.name === "_" && !existing.isImport) return;
		this.report(
			"RedefinedWhileUnused",
			binding.node,
			MESSAGE_TEXT.RedefinedWhileUnused(binding.name, existing.line),
		);
	}

	/**
	 * True when the two nodes sit in mutually exclusive branches of the same
	 * `if` or `try` statement.
	 */
	private differentForks(a: SyntaxNode, b: SyntaxNode): boolean {
		const chainA = [a, ...ancestors(a)];
		const chainB = [b, ...ancestors(b)];
		for (let i = 1; i < chainA.length; i += 1) {
			const candidate = chainA[i];
			if (candidate === undefined) continue;
			const j = chainB.findIndex((node) => sameNode(node, candidate));
			if (j < 0) continue;
			if (!FORKS.has(candidate.type)) return false;
			const branchA = chainA[i - 1];
			const branchB = chainB[j - 1];
			if (branchA === undefined || branchB === undefined) return false;
			return this.forkOf(candidate, branchA) !== this.forkOf(candidate, branchB);
		}
		return false;
	}

	private forkOf(statement: SyntaxNode, branch: SyntaxNode): string {
		if (statement.type === "try_statement") {
			if (branch.type === "except_clause") return `except:${branch.startIndex}`;
			// body, else and finally run on the same path
			return "body";
		}
		if (branch.type === "elif_clause" || branch.type === "else_clause") {
			return `alt:${branch.startIndex}`;
		}
		return branch.type === "block" ? "body" : `other:${branch.startIndex}`;
	}

	private bindTarget(target: SyntaxNode, kind: BindingKind): void {
		if (target.type === "identifier") {
			this.bind(new Binding(target.text, kind, target));
			return;
		}
		if (target.type === "as_pattern_target" && target.namedChildren.length === 0) {
			this.bind(new Binding(target.text, kind, target));
			return;
		}
		const nested: BindingKind = kind === "assignment" ? "binding" : kind;
		if (UNPACKING_TARGETS.has(target.type)) {
			for (const element of target.namedChildren) this.bindTarget(element, nested);
			return;
		}
		if (
			target.type === "list_splat_pattern" ||
			target.type === "list_splat" ||
			target.type === "parenthesized_expression" ||
			target.type === "as_pattern_target"
		) {
			for (const inner of target.namedChildren) this.bindTarget(inner, kind);
			return;
		}
		// attribute and subscript targets only read their base expressions
		this.visit(target);
	}

	private declareNames(statement: SyntaxNode, into: Set<string>): void {
		if (this.scope === this.moduleScope) return;
		for (const child of statement.namedChildren) {
			if (child.type === "identifier") into.add(child.text);
		}
	}

	// -------------------------------------------------------------- statements

	private visitImport(node: SyntaxNode): void {
		for (const child of node.namedChildren) {
			if (child.type === "dotted_name") {
				const fullName = compact(child.text);
				const name = fullName.split(".")[0] ?? fullName;
				this.bind(new Binding(name, "import", node, fullName));
			} else if (child.type === "aliased_import") {
				const original = child.childForFieldName("name");
				const alias = child.childForFieldName("alias");
				if (original === null || alias === null) continue;
				const fullName = compact(original.text);
				const label = alias.text === fullName ? fullName : `${fullName} as ${alias.text}`;
				this.bind(new Binding(alias.text, "import", node, label));
			}
		}
	}

	private visitImportFrom(node: SyntaxNode): void {
		const moduleNode = node.childForFieldName("module_name");
		const module = moduleNode === null ? "" : compact(moduleNode.text);
		for (const child of node.namedChildren) {
			if (moduleNode !== null && sameNode(child, moduleNode)) continue;
			if (child.type === "wildcard_import") {
				this.starImports.push(new Binding(module, "import", node, qualify(module, "*")));
				this.report("ImportStarUsed", node, MESSAGE_TEXT.ImportStarUsed(module));
			} else if (child.type === "dotted_name") {
				const name = compact(child.text);
				this.bind(new Binding(name, "import", node, qualify(module, name)));
			} else if (child.type === "aliased_import") {
				const original = child.childForFieldName("name");
				const alias = child.childForFieldName("alias");
				if (original === null || alias === null) continue;
				const fullName = qualify(module, compact(original.text));
				const label = alias.text === original.text ? fullName : `${fullName} as ${alias.text}`;
				this.bind(new Binding(alias.text, "import", node, label));
			}
		}
	}

	private visitFutureImport(node: SyntaxNode): void {
		for (const child of node.namedChildren) {
			const nameNode =
				child.type === "aliased_import" ? child.childForFieldName("alias") : child;
			if (nameNode === null || nameNode.type === "comment") continue;
			const binding = new Binding(compact(nameNode.text), "future-import", node);
			this.bind(binding);
			binding.used = true;
		}
	}

	private visitDecorated(node: SyntaxNode): void {
		for (const child of node.namedChildren) {
			if (child.type === "decorator") this.visitChildren(child);
		}
		this.visitField(node, "definition");
	}

	private visitParameterExpressions(parameters: readonly ParameterInfo[]): void {
		for (const parameter of parameters) {
			if (parameter.defaultValue !== undefined) this.visit(parameter.defaultValue);
		}
		for (const parameter of parameters) {
			if (parameter.annotation !== undefined) this.visit(parameter.annotation);
		}
	}

	private checkDuplicateArguments(node: SyntaxNode, parameters: readonly ParameterInfo[]): void {
		const seen = new Set<string>();
		const reported = new Set<string>();
		for (const { name } of parameters) {
			if (seen.has(name) && !reported.has(name)) {
				reported.add(name);
				this.report("DuplicateArgument", node, MESSAGE_TEXT.DuplicateArgument(name));
			}
			seen.add(name);
		}
	}

	private visitFunction(node: SyntaxNode): void {
		const parameters = describeParameters(node.childForFieldName("parameters"));
		this.visitParameterExpressions(parameters);
		this.visitField(node, "return_type");
		this.checkDuplicateArguments(node, parameters);
		const name = node.childForFieldName("name");
		if (name !== null) this.bind(new Binding(name.text, "function", node));
		const body = node.childForFieldName("body");
		this.deferFunction(parameters, () => {
			if (body !== null) this.visitChildren(body);
		});
	}

	private visitLambda(node: SyntaxNode): void {
		const parameters = describeParameters(node.childForFieldName("parameters"));
		this.visitParameterExpressions(parameters);
		this.checkDuplicateArguments(node, parameters);
		const body = node.childForFieldName("body");
		this.deferFunction(parameters, () => {
			if (body !== null) this.visit(body);
		});
	}

	private deferFunction(parameters: readonly ParameterInfo[], runBody: () => void): void {
		const enclosing = this.scope;
		this.deferred.push(() => {
			const saved = this.scope;
			this.scope = this.openScope("function", enclosing);
			for (const parameter of parameters) {
				this.bind(new Binding(parameter.name, "argument", parameter.node));
			}
			runBody();
			this.scope = saved;
		});
	}

	private visitClass(node: SyntaxNode): void {
		this.visitField(node, "superclasses");
		const saved = this.scope;
		this.scope = this.openScope("class", saved);
		for (const magic of CLASS_MAGIC) {
			const binding = new Binding(magic, "binding", node);
			binding.used = true;
			this.scope.bindings.set(magic, binding);
		}
		const body = node.childForFieldName("body");
		if (body !== null) this.visitChildren(body);
		this.scope = saved;
		const name = node.childForFieldName("name");
		if (name !== null) this.bind(new Binding(name.text, "class", node));
	}

	private visitAssignment(node: SyntaxNode): void {
		const left = node.childForFieldName("left");
		const annotation = node.childForFieldName("type");
		const right = node.childForFieldName("right");
		if (annotation !== null) this.visit(annotation);
		if (right !== null) this.visit(right);
		if (left === null) return;
		if (right === null) {
			// bare annotation: `x: int` binds nothing
			if (left.type !== "identifier") this.visit(left);
			return;
		}
		this.bindTarget(left, "assignment");
		if (this.scope === this.moduleScope && left.type === "identifier" && left.text === "__all__") {
			this.recordExportList(right, node);
		}
	}

	private visitAugmentedAssignment(node: SyntaxNode): void {
		const left = node.childForFieldName("left");
		if (left === null) return;
		if (left.type === "identifier") this.handleLoad(left.text, left);
		this.visitField(node, "right");
		this.bindTarget(left, "binding");
		if (this.scope === this.moduleScope && left.type === "identifier" && left.text === "__all__") {
			const right = node.childForFieldName("right");
			if (right !== null) this.recordExportList(right, node, this.exportList?.names ?? []);
		}
	}

	private visitNamedExpression(node: SyntaxNode): void {
		this.visitField(node, "value");
		const name = node.childForFieldName("name");
		if (name !== null) this.bind(new Binding(name.text, "named-expression", name));
	}

	private visitFor(node: SyntaxNode): void {
		this.visitField(node, "right");
		const left = node.childForFieldName("left");
		if (left !== null) this.bindTarget(left, "loop");
		this.visitField(node, "body");
		this.visitField(node, "alternative");
	}

	private visitComprehension(node: SyntaxNode): void {
		const saved = this.scope;
		let opened = false;
		const open = (): void => {
			if (!opened) {
				this.scope = this.openScope("comprehension", saved);
				opened = true;
			}
		};
		for (const clause of node.namedChildren) {
			if (clause.type === "for_in_clause") {
				// the first iterable is evaluated in the enclosing scope
				this.visitField(clause, "right");
				open();
				const left = clause.childForFieldName("left");
				if (left !== null) this.bindTarget(left, "binding");
			} else if (clause.type === "if_clause") {
				this.visitChildren(clause);
			}
		}
		open();
		this.visitField(node, "body");
		this.scope = saved;
	}

	private visitDelete(node: SyntaxNode): void {
		const targets = node.namedChildren.flatMap((child) =>
			child.type === "expression_list" ? child.namedChildren : [child],
		);
		for (const target of targets) {
			if (target.type !== "identifier") {
				this.visit(target);
				continue;
			}
			if (ancestors(target).some((node) => CONDITIONALS.has(node.type))) continue;
			const name = target.text;
			if (this.scope.globalNames.has(name)) {
				this.scope.globalNames.delete(name);
			} else if (!this.scope.bindings.delete(name)) {
				this.report("UndefinedName", target, MESSAGE_TEXT.UndefinedName(name));
			}
		}
	}

	private visitAsPattern(node: SyntaxNode): void {
		const alias = node.childForFieldName("alias");
		for (const child of node.namedChildren) {
			if (alias !== null && sameNode(child, alias)) continue;
			this.visit(child);
		}
		if (alias !== null) this.bindTarget(alias, "binding");
	}

	private visitExcept(node: SyntaxNode): void {
		const asToken = node.children.find((child) => child.type === "as");
		for (const child of node.namedChildren) {
			if (
				asToken !== undefined &&
				child.type === "identifier" &&
				child.startIndex > asToken.startIndex
			) {
				this.bindTarget(child, "binding");
				continue;
			}
			this.visit(child);
		}
	}

	// ------------------------------------------------------------------ checks

	private checkInsideFunction(
		node: SyntaxNode,
		kind: "ReturnOutsideFunction" | "YieldOutsideFunction",
	): void {
		if (this.scope.kind === "module" || this.scope.kind === "class") {
			this.report(kind, node, MESSAGE_TEXT[kind]());
		}
	}

	private checkInsideLoop(
		node: SyntaxNode,
		kind: "BreakOutsideLoop" | "ContinueOutsideLoop",
	): void {
		let child = node;
		for (let current = node.parent; current !== null; current = current.parent) {
			if (LOOPS.has(current.type)) {
				const alternative = current.childForFieldName("alternative");
				if (alternative === null || !sameNode(alternative, child)) return;
			}
			if (LOOP_BARRIERS.has(current.type)) break;
			child = current;
		}
		this.report(kind, node, MESSAGE_TEXT[kind]());
	}

	private checkAssertTuple(node: SyntaxNode): void {
		const test = node.namedChildren.find((child) => child.type !== "comment");
		if (
			test !== undefined &&
			test.type === "tuple" &&
			test.namedChildren.some((element) => element.type !== "comment")
		) {
			this.report("AssertTuple", node, MESSAGE_TEXT.AssertTuple());
		}
	}

	private checkIdentityComparison(node: SyntaxNode): void {
		const operands = node.namedChildren.filter((child) => child.type !== "comment");
		for (let i = 0; i + 1 < operands.length; i += 1) {
			const left = operands[i];
			const right = operands[i + 1];
			if (left === undefined || right === undefined) continue;
			const identity = node.children.some(
				(token) =>
					token.startIndex >= left.endIndex &&
					token.endIndex <= right.startIndex &&
					(token.type === "is" || token.type === "is not"),
			);
			if (identity && (isConstantNonSingleton(left) || isConstantNonSingleton(right))) {
				this.report("IsLiteral", node, MESSAGE_TEXT.IsLiteral());
			}
		}
	}

	private checkRepeatedKeys(node: SyntaxNode): void {
		const groups = new Map<string, KeyGroup>();
		for (const pair of node.namedChildren) {
			if (pair.type !== "pair") continue;
			const keyNode = pair.childForFieldName("key");
			const valueNode = pair.childForFieldName("value");
			if (keyNode === null || valueNode === null) continue;
			const key = keyIdentity(keyNode);
			if (key === undefined) continue;
			let group = groups.get(key.id);
			if (group === undefined) {
				group = { key, entries: [] };
				groups.set(key.id, group);
			}
			group.entries.push({ node: keyNode, value: compact(valueNode.text) });
		}
		for (const { key, entries } of groups.values()) {
			if (entries.length < 2) continue;
			const counts = new Map<string, number>();
			for (const { value } of entries) counts.set(value, (counts.get(value) ?? 0) + 1);
			if (![...counts.values()].some((count) => count === 1)) continue;
			for (const entry of entries) {
				if (key.variable) {
					this.report(
						"MultiValueRepeatedKeyVariable",
						entry.node,
						MESSAGE_TEXT.MultiValueRepeatedKeyVariable(key.label),
					);
				} else {
					this.report(
						"MultiValueRepeatedKeyLiteral",
						entry.node,
						MESSAGE_TEXT.MultiValueRepeatedKeyLiteral(key.label),
					);
				}
			}
		}
	}

	private checkFormatString(node: SyntaxNode): void {
		const parts =
			node.type === "concatenated_string"
				? node.namedChildren.filter((child) => child.type === "string")
				: [node];
		const formatted = parts.filter(isFormatString);
		if (formatted.length > 0 && !formatted.some(hasInterpolation)) {
			this.report("FStringMissingPlaceholders", node, MESSAGE_TEXT.FStringMissingPlaceholders());
		}
	}

	// ------------------------------------------------------- end-of-module passes

	private recordExportList(
		value: SyntaxNode,
		statement: SyntaxNode,
		previous: readonly string[] = [],
	): void {
		if (value.type !== "list" && value.type !== "tuple") return;
		const names = value.namedChildren
			.filter((element) => element.type === "string" && !hasInterpolation(element))
			.map((element) => STRING_LITERAL.exec(element.text)?.[3])
			.filter((name): name is string => name !== undefined);
		this.exportList = { names: [...previous, ...names], node: statement };
	}

	private checkExportList(): void {
		if (this.exportList === undefined) return;
		for (const name of this.exportList.names) {
			const binding = this.moduleScope.lookup(name);
			if (binding !== undefined) {
				binding.used = true;
			} else if (this.starImports.length === 0) {
				this.report("UndefinedExport", this.exportList.node, MESSAGE_TEXT.UndefinedExport(name));
			}
		}
	}

	private checkDeadScope(scope: Scope): void {
		if (scope.kind === "class") return;
		for (const binding of scope.bindings.values()) {
			if (binding.used) continue;
			if (binding.kind === "import") {
				this.report("UnusedImport", binding.node, MESSAGE_TEXT.UnusedImport(binding.fullName));
			} else if (
				scope.kind === "function" &&
				binding.kind === "assignment" &&
				binding.name !== "_" &&
				!scope.globalNames.has(binding.name) &&
				!scope.usesLocals
			) {
				this.report("UnusedVariable", binding.node, MESSAGE_TEXT.UnusedVariable(binding.name));
			}
		}
	}

	private checkStarImports(): void {
		for (const star of this.starImports) {
			if (!star.used) {
				this.report("UnusedImport", star.node, MESSAGE_TEXT.UnusedImport(star.fullName));
			}
		}
	}
}
