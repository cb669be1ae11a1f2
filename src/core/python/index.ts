// PURITY: CORE (tree-sitter node types only)

export {
	containsNullBytes,
	findSyntaxFailure,
	INVALID_SYNTAX_MESSAGE,
	NULL_BYTES_MESSAGE,
	type SyntaxFailure,
	syntaxFailureFields,
} from "./syntax-failure.js";
export {
	breadthFirst,
	decoratorExpression,
	decoratorName,
	decoratorsOf,
	describeParameters,
	hasToken,
	isAsync,
	locationOf,
	type ParameterInfo,
	type ParameterKind,
	preorder,
	sameNode,
	type SyntaxNode,
	unwrapDefinition,
	unwrapType,
} from "./tree.js";
