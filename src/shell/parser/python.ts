// PURITY: SHELL (native parser)
// INVARIANT: a fresh parser per call; nothing is shared between concurrent checkers
// COMPLEXITY: O(n) in source length

import { createRequire } from "node:module";

import type Parser from "tree-sitter";

import {
	containsNullBytes,
	findSyntaxFailure,
	NULL_BYTES_MESSAGE,
	type SyntaxFailure,
	type SyntaxNode,
} from "../../core/python/index.js";

// Both packages are CommonJS native addons.
const require = createRequire(import.meta.url);
const ParserCtor: typeof Parser = require("tree-sitter");
const Python: unknown = require("tree-sitter-python");

const CHUNK = 4096;

export const createPythonParser = (): Parser => {
	const parser = new ParserCtor();
	parser.setLanguage(Python);
	return parser;
};

/**
 * Outcome of parsing one contract module.
 */
export type ParseOutcome =
	| { readonly _tag: "Parsed"; readonly root: SyntaxNode }
	| { readonly _tag: "Failed"; readonly failure: SyntaxFailure };

/**
 * Parses a source module, reporting the first syntax failure instead of a
 * partially recovered tree.
 */
export const parseModule = (content: string): ParseOutcome => {
	if (containsNullBytes(content)) {
		return { _tag: "Failed", failure: { message: NULL_BYTES_MESSAGE } };
	}
	// Chunked input lifts the addon's fixed string buffer limit.
	const tree = createPythonParser().parse((index: number) =>
		content.slice(index, index + CHUNK),
	);
	const failure = findSyntaxFailure(tree.rootNode);
	return failure === undefined
		? { _tag: "Parsed", root: tree.rootNode }
		: { _tag: "Failed", failure };
};
