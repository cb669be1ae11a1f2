// PURITY: CORE
// INVARIANT: helpers only read the tree; nothing here parses or mutates
// COMPLEXITY: O(size of the inspected subtree)

import type Parser from "tree-sitter";

import type { RawLocation } from "../types/index.js";

export type SyntaxNode = Parser.SyntaxNode;

/**
 * 1-based location of a node's first character.
 */
export const locationOf = (node: SyntaxNode): RawLocation => ({
	line: node.startPosition.row + 1,
	column: node.startPosition.column + 1,
});

/**
 * Node wrappers are recreated on every traversal, so identity is by span.
 */
export const sameNode = (a: SyntaxNode, b: SyntaxNode): boolean =>
	a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;

export const hasToken = (node: SyntaxNode, token: string): boolean =>
	node.children.some((child) => child.type === token);

/** `async def`, `async for`, `async with` */
export const isAsync = (node: SyntaxNode): boolean => hasToken(node, "async");

/**
 * Decorators attached to a function or class definition, in source order.
 */
export const decoratorsOf = (definition: SyntaxNode): readonly SyntaxNode[] => {
	const parent = definition.parent;
	if (parent === null || parent.type !== "decorated_definition") return [];
	return parent.namedChildren.filter((child) => child.type === "decorator");
};

export const decoratorExpression = (decorator: SyntaxNode): SyntaxNode | undefined =>
	decorator.namedChildren.find((child) => child.type !== "comment");

/**
 * Name a decorator refers to: `@export` and `@export()` both give "export".
 * Attribute or otherwise complex decorators give undefined.
 */
export const decoratorName = (decorator: SyntaxNode): string | undefined => {
	const expression = decoratorExpression(decorator);
	if (expression === undefined) return undefined;
	if (expression.type === "identifier") return expression.text;
	if (expression.type === "call") {
		const callee = expression.childForFieldName("function");
		return callee !== null && callee.type === "identifier" ? callee.text : undefined;
	}
	return undefined;
};

/**
 * Function or class behind an optional decorator wrapper.
 */
export const unwrapDefinition = (node: SyntaxNode): SyntaxNode | undefined =>
	node.type === "decorated_definition"
		? node.childForFieldName("definition") ?? undefined
		: node;

/**
 * One formal parameter of a def or lambda.
 *
 * @property name Bound name (without `*` or `**`)
 * @property kind "positional" for plain parameters before any `*`
 * @property node Node the name is reported at
 * @property annotation `type` node, when annotated
 * @property defaultValue Default expression, when present
 */
export type ParameterKind = "positional" | "variadic" | "keyword-only";

export interface ParameterInfo {
	readonly name: string;
	readonly kind: ParameterKind;
	readonly node: SyntaxNode;
	readonly annotation?: SyntaxNode;
	readonly defaultValue?: SyntaxNode;
}

const splatName = (node: SyntaxNode): SyntaxNode | undefined =>
	node.namedChildren.find((child) => child.type === "identifier");

const parameterNameNode = (node: SyntaxNode): SyntaxNode | undefined => {
	switch (node.type) {
		case "identifier":
			return node;
		case "list_splat_pattern":
		case "dictionary_splat_pattern":
			return splatName(node);
		case "default_parameter":
		case "typed_default_parameter": {
			const name = node.childForFieldName("name");
			return name === null ? undefined : parameterNameNode(name);
		}
		case "typed_parameter": {
			const first = node.namedChildren[0];
			return first === undefined ? undefined : parameterNameNode(first);
		}
		default:
			return undefined;
	}
};

/**
 * Flattens a `parameters` / `lambda_parameters` node. Separators (`*`, `/`)
 * and comments are skipped.
 */
export const describeParameters = (
	parameters: SyntaxNode | null,
): readonly ParameterInfo[] => {
	if (parameters === null) return [];
	const described: ParameterInfo[] = [];
	let afterStar = false;
	for (const parameter of parameters.namedChildren) {
		if (parameter.type === "keyword_separator") afterStar = true;
		const nameNode = parameterNameNode(parameter);
		if (nameNode === undefined) continue;
		const variadic =
			nameNode.parent !== null &&
			(nameNode.parent.type === "list_splat_pattern" ||
				nameNode.parent.type === "dictionary_splat_pattern");
		const kind: ParameterKind = variadic
			? "variadic"
			: afterStar
				? "keyword-only"
				: "positional";
		if (variadic) afterStar = true;
		const annotation = parameter.childForFieldName("type") ?? undefined;
		const defaultValue =
			parameter.type === "default_parameter" ||
			parameter.type === "typed_default_parameter"
				? parameter.childForFieldName("value") ?? undefined
				: undefined;
		described.push({
			name: nameNode.text,
			kind,
			node: nameNode,
			...(annotation === undefined ? {} : { annotation }),
			...(defaultValue === undefined ? {} : { defaultValue }),
		});
	}
	return described;
};

/**
 * Expression inside a `type` wrapper node.
 */
export const unwrapType = (node: SyntaxNode): SyntaxNode =>
	node.type === "type" ? node.namedChildren[0] ?? node : node;

/**
 * Pre-order traversal.
 *
 * @complexity O(n)
 */
export function* preorder(root: SyntaxNode): Generator<SyntaxNode> {
	const stack: SyntaxNode[] = [root];
	for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
		yield node;
		const children = node.children;
		for (let i = children.length - 1; i >= 0; i -= 1) {
			const child = children[i];
			if (child !== undefined) stack.push(child);
		}
	}
}

/**
 * Breadth-first traversal.
 *
 * @complexity O(n)
 */
export function* breadthFirst(root: SyntaxNode): Generator<SyntaxNode> {
	const queue: SyntaxNode[] = [root];
	for (let head = 0; head < queue.length; head += 1) {
		const node = queue[head];
		if (node === undefined) continue;
		yield node;
		queue.push(...node.namedChildren);
	}
}
