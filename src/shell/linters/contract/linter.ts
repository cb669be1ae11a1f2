// PURITY: SHELL-adjacent (stateful walker over an immutable tree)
// INVARIANT: rules are independent; every violation is reported, no early exit
// COMPLEXITY: O(n) walk + O(n) breadth-first search for the first function

import {
	breadthFirst,
	decoratorExpression,
	decoratorName,
	decoratorsOf,
	describeParameters,
	isAsync,
	type ParameterInfo,
	type SyntaxNode,
	unwrapDefinition,
	unwrapType,
} from "../../../core/python/index.js";
import type { ContractPolicy } from "../../data/tables.js";
import { type Violation, type ViolationCode, violationAt } from "./violations.js";

const IMPORTS = new Set(["import_statement", "import_from_statement", "future_import_statement"]);
const TUPLE_TARGETS = new Set(["pattern_list", "tuple_pattern"]);

/**
 * Text of an annotation as the policy lists it: `int`, `datetime.datetime`,
 * or the raw source for anything more complex.
 */
export const annotationName = (annotation: SyntaxNode): string => {
	const expression = unwrapType(annotation);
	if (expression.type === "attribute") {
		const object = expression.childForFieldName("object");
		const attribute = expression.childForFieldName("attribute");
		if (object !== null && attribute !== null) return `${object.text}.${attribute.text}`;
	}
	return expression.text;
};

const keywordNames = (call: SyntaxNode): string[] => {
	const args = call.childForFieldName("arguments");
	if (args === null) return [];
	return args.namedChildren
		.filter((child) => child.type === "keyword_argument")
		.map((child) => child.childForFieldName("name")?.text ?? "");
};

/**
 * First synchronous function in breadth-first order.
 */
const firstFunction = (root: SyntaxNode): SyntaxNode | undefined => {
	for (const node of breadthFirst(root)) {
		if (node.type === "function_definition" && !isAsync(node)) return node;
	}
	return undefined;
};

interface ArgumentUse {
	readonly name: string;
	readonly fn: SyntaxNode;
}

interface AnnotationUse {
	readonly annotation: string | undefined;
	readonly fn: SyntaxNode;
}

/**
 * Contract policy checks over one parsed module.
 *
 * @remarks
 * Walk-time rules report as they are met; argument reuse (S15), the missing
 * export (S13) and annotation rules (S16, S17, S18) are reported after the
 * walk, in that order. A fresh instance per module.
 */
export class ContractLinter {
	private readonly violations: Violation[] = [];
	private readonly ormNames = new Set<string>();
	private readonly visitedArgs: ArgumentUse[] = [];
	private readonly argumentAnnotations: AnnotationUse[] = [];
	private readonly returnAnnotations: AnnotationUse[] = [];
	private readonly illegalBuiltins: ReadonlySet<string>;
	private readonly validDecorators: readonly string[];
	private hasExport = false;
	private constructorSeen = false;

	constructor(
		private readonly policy: ContractPolicy,
		builtins: ReadonlySet<string>,
		private readonly stdlibModules: ReadonlySet<string>,
	) {
		this.illegalBuiltins = new Set(
			[...builtins].filter((name) => !policy.allowedBuiltins.has(name)),
		);
		this.validDecorators = [policy.constructorDecorator, policy.exportDecorator];
	}

	check(root: SyntaxNode): readonly Violation[] {
		this.visit(root);
		this.finalChecks(root);
		return this.violations;
	}

	private report(code: ViolationCode, node: SyntaxNode, detail?: string): void {
		this.violations.push(violationAt(code, node, detail));
	}

	private visitAll(nodes: Iterable<SyntaxNode>): void {
		for (const node of nodes) this.visit(node);
	}

	private visitField(node: SyntaxNode, field: string): void {
		const child = node.childForFieldName(field);
		if (child !== null) this.visit(child);
	}

	private visit(node: SyntaxNode): void {
		switch (node.type) {
			case "comment":
				return;
			case "identifier":
				this.checkName(node.text, node);
				return;
			case "as_pattern_target":
				if (node.namedChildren.length === 0) this.checkName(node.text, node);
				else this.visitAll(node.namedChildren);
				return;
			case "attribute":
				this.visitAttribute(node);
				return;
			case "import_statement":
				this.visitImport(node);
				return;
			case "import_from_statement":
			case "future_import_statement":
				this.report("S4", node);
				return;
			case "decorated_definition":
				this.visitDecorated(node);
				return;
			case "class_definition":
				this.visitClass(node);
				return;
			case "function_definition":
				if (isAsync(node)) {
					this.report("S7", node);
					this.report("S1", node);
					this.visitDefinitionParts(node, describeParameters(node.childForFieldName("parameters")));
				} else {
					this.visitFunction(node);
				}
				return;
			case "lambda":
				this.report("S1", node);
				this.visitDefinitionParts(node, describeParameters(node.childForFieldName("parameters")));
				return;
			case "global_statement":
			case "nonlocal_statement":
				this.report("S1", node);
				return;
			case "assignment":
				this.visitAssignment(node);
				return;
			case "call":
				this.visitCall(node);
				return;
			case "keyword_argument":
				this.visitField(node, "value");
				return;
			case "except_clause":
				this.visitExcept(node);
				return;
			default:
				this.genericVisit(node);
		}
	}

	private genericVisit(node: SyntaxNode): void {
		if (
			this.policy.illegalNodeTypes.has(node.type) ||
			(node.type === "for_statement" && isAsync(node))
		) {
			this.report("S1", node);
		}
		this.visitAll(node.namedChildren);
	}

	private checkName(name: string, node: SyntaxNode): void {
		if (name.startsWith("_") || name.endsWith("_")) this.report("S2", node, name);
		if (this.policy.reservedNames.has(name)) this.report("S14", node, name);
		if (this.illegalBuiltins.has(name)) this.report("S14", node, name);
	}

	private visitAttribute(node: SyntaxNode): void {
		const attribute = node.childForFieldName("attribute");
		if (attribute !== null) {
			const name = attribute.text;
			if (name.startsWith("_") || name.endsWith("_")) this.report("S2", node, name);
			if (this.policy.reservedNames.has(name)) this.report("S14", node, name);
		}
		this.visitField(node, "object");
	}

	private visitImport(node: SyntaxNode): void {
		for (const child of node.namedChildren) {
			const moduleNode =
				child.type === "aliased_import" ? child.childForFieldName("name") : child;
			if (moduleNode === null || moduleNode.type !== "dotted_name") continue;
			const module = moduleNode.text.replace(/\s+/g, "");
			const topLevel = module.split(".")[0] ?? module;
			if (this.stdlibModules.has(topLevel)) this.report("S14", node, module);
		}
	}

	private visitDecorated(node: SyntaxNode): void {
		const definition = unwrapDefinition(node);
		if (definition === undefined) return;
		if (definition.type !== "function_definition") {
			for (const decorator of decoratorsOf(definition)) {
				const expression = decoratorExpression(decorator);
				if (expression !== undefined) this.visit(expression);
			}
		}
		this.visit(definition);
	}

	private visitClass(node: SyntaxNode): void {
		this.report("S6", node);
		this.report("S1", node);
		this.visitField(node, "superclasses");
		this.visitField(node, "body");
	}

	private visitExcept(node: SyntaxNode): void {
		const asToken = node.children.find((child) => child.type === "as");
		for (const child of node.namedChildren) {
			// the handler's name is a plain string, not a variable reference
			if (asToken !== undefined && child.type === "identifier" && child.startIndex > asToken.startIndex) {
				continue;
			}
			this.visit(child);
		}
	}

	private visitCall(node: SyntaxNode): void {
		const callee = node.childForFieldName("function");
		if (callee !== null && callee.type === "identifier" && this.illegalBuiltins.has(callee.text)) {
			this.report("S14", node, callee.text);
		}
		this.genericVisit(node);
	}

	private visitAssignment(node: SyntaxNode): void {
		const left = node.childForFieldName("left");
		const right = node.childForFieldName("right");
		// annotated assignments are not ORM definitions
		const annotated = node.childForFieldName("type") !== null;
		if (!annotated && right !== null) {
			if (right.type === "identifier" && this.policy.ormOverloadClassNames.has(right.text)) {
				this.report("S14", node, right.text);
			}
			if (right.type === "call") this.checkOrmDefinition(node, left, right);
		}
		this.genericVisit(node);
	}

	private checkOrmDefinition(node: SyntaxNode, left: SyntaxNode | null, call: SyntaxNode): void {
		const callee = call.childForFieldName("function");
		if (callee === null || callee.type !== "identifier") return;
		if (!this.policy.ormClassNames.has(callee.text)) return;
		if (
			this.policy.ormOverloadClassNames.has(callee.text) &&
			keywordNames(call).some((keyword) => this.policy.ormForbiddenKeywords.has(keyword))
		) {
			this.report("S11", node);
		}
		if (left !== null && TUPLE_TARGETS.has(left.type)) this.report("S12", node);
		if (left !== null && left.type === "identifier") this.ormNames.add(left.text);
	}

	private visitFunction(fn: SyntaxNode): void {
		const statements = fn.childForFieldName("body")?.namedChildren ?? [];
		for (const statement of statements) {
			if (IMPORTS.has(statement.type)) this.report("S3", fn);
		}
		for (const statement of statements) {
			const nested = unwrapDefinition(statement);
			if (nested !== undefined && nested.type === "function_definition" && !isAsync(nested)) {
				this.report("S19", fn);
			}
		}

		const decorators = decoratorsOf(fn);
		if (decorators.length > 1) {
			this.report("S10", fn, `Detected: ${decorators.length} MAX limit: 1`);
		}
		let exported = false;
		for (const decorator of decorators) {
			const name = decoratorName(decorator);
			if (name === undefined) {
				this.report("S8", fn);
				continue;
			}
			if (!this.validDecorators.includes(name)) {
				this.report(
					"S8",
					fn,
					`Invalid decorator '${name}'. Valid list: ${this.validDecorators.join(", ")}`,
				);
			}
			if (name === this.policy.exportDecorator) {
				this.hasExport = true;
				exported = true;
			}
			if (name === this.policy.constructorDecorator) {
				if (this.constructorSeen) this.report("S9", fn);
				this.constructorSeen = true;
			}
		}

		const parameters = describeParameters(fn.childForFieldName("parameters"));
		for (const parameter of parameters) {
			if (parameter.kind !== "positional") continue;
			this.visitedArgs.push({ name: parameter.name, fn });
			if (exported) {
				this.argumentAnnotations.push({
					annotation:
						parameter.annotation === undefined ? undefined : annotationName(parameter.annotation),
					fn,
				});
			}
		}
		const returns = fn.childForFieldName("return_type");
		if (exported && returns !== null) {
			this.returnAnnotations.push({ annotation: annotationName(returns), fn });
		}

		this.visitDefinitionParts(fn, parameters);
	}

	/**
	 * Everything under a def or lambda that is an expression: annotations,
	 * defaults, body, decorators and the return annotation. Parameter names
	 * are declarations and are not checked as names.
	 */
	private visitDefinitionParts(node: SyntaxNode, parameters: readonly ParameterInfo[]): void {
		for (const parameter of parameters) {
			if (parameter.annotation !== undefined) this.visit(parameter.annotation);
		}
		for (const parameter of parameters) {
			if (parameter.defaultValue !== undefined) this.visit(parameter.defaultValue);
		}
		this.visitField(node, "body");
		for (const decorator of decoratorsOf(node)) {
			const expression = decoratorExpression(decorator);
			if (expression !== undefined) this.visit(expression);
		}
		this.visitField(node, "return_type");
	}

	private finalChecks(root: SyntaxNode): void {
		for (const { name, fn } of this.visitedArgs) {
			if (this.ormNames.has(name)) this.report("S15", fn);
		}

		if (!this.hasExport) {
			const first = firstFunction(root);
			if (first !== undefined) this.report("S13", first);
		}

		for (const { annotation, fn } of this.argumentAnnotations) {
			if (annotation === undefined) {
				this.report("S17", fn);
			} else if (!this.policy.allowedAnnotations.has(annotation)) {
				this.report("S16", fn, annotation);
			}
		}

		for (const { annotation, fn } of this.returnAnnotations) {
			this.report("S18", fn, annotation);
		}
	}
}
