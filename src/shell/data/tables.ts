// PURITY: SHELL (reads bundled data files once, at module load)
// INVARIANT: every table is validated before use; a malformed file fails the import
// COMPLEXITY: O(total table size)

import {
	isJSONObject,
	isString,
	isStringArray,
	type JSONObject,
	type JSONValue,
	readJSONFile,
} from "../utils/json.js";

const dataFile = (name: string): URL =>
	new URL(`../../../data/${name}`, import.meta.url);

function readStringList(name: string): ReadonlyArray<string> {
	const value = readJSONFile(dataFile(name));
	if (!isStringArray(value)) {
		throw new Error(`${name}: expected an array of strings`);
	}
	return value;
}

/**
 * Contract policy knobs the rule linter enforces.
 *
 * @property allowedBuiltins Builtins a contract may reference
 * @property illegalNodeTypes Syntax node kinds rejected outright (S1)
 * @property reservedNames Identifiers reserved for the runtime
 * @property ormClassNames Storage constructors recognized in assignments
 * @property ormOverloadClassNames ORM constructors whose keywords are checked (S11)
 * @property ormForbiddenKeywords Keywords S11 rejects
 * @property allowedAnnotations Argument annotations accepted on exported functions
 */
export interface ContractPolicy {
	readonly allowedBuiltins: ReadonlySet<string>;
	readonly illegalNodeTypes: ReadonlySet<string>;
	readonly reservedNames: ReadonlySet<string>;
	readonly exportDecorator: string;
	readonly constructorDecorator: string;
	readonly ormClassNames: ReadonlySet<string>;
	readonly ormOverloadClassNames: ReadonlySet<string>;
	readonly ormForbiddenKeywords: ReadonlySet<string>;
	readonly allowedAnnotations: ReadonlySet<string>;
}

function setField(source: JSONObject, key: string): ReadonlySet<string> {
	const value: JSONValue | undefined = source[key];
	if (value === undefined || !isStringArray(value)) {
		throw new Error(`contract-policy.json: "${key}" must be an array of strings`);
	}
	return new Set(value);
}

function stringField(source: JSONObject, key: string): string {
	const value: JSONValue | undefined = source[key];
	if (value === undefined || !isString(value)) {
		throw new Error(`contract-policy.json: "${key}" must be a string`);
	}
	return value;
}

function readPolicy(): ContractPolicy {
	const value = readJSONFile(dataFile("contract-policy.json"));
	if (!isJSONObject(value)) {
		throw new Error("contract-policy.json: expected an object");
	}
	return {
		allowedBuiltins: setField(value, "allowedBuiltins"),
		illegalNodeTypes: setField(value, "illegalNodeTypes"),
		reservedNames: setField(value, "reservedNames"),
		exportDecorator: stringField(value, "exportDecorator"),
		constructorDecorator: stringField(value, "constructorDecorator"),
		ormClassNames: setField(value, "ormClassNames"),
		ormOverloadClassNames: setField(value, "ormOverloadClassNames"),
		ormForbiddenKeywords: setField(value, "ormForbiddenKeywords"),
		allowedAnnotations: setField(value, "allowedAnnotations"),
	};
}

/** Names resolvable without a binding: the interpreter's builtins. */
export const PYTHON_BUILTINS: ReadonlySet<string> = new Set(
	readStringList("python-builtins.json"),
);

/** Top-level standard library modules; importing any of them is rejected. */
export const STDLIB_MODULES: ReadonlySet<string> = new Set(
	readStringList("python-stdlib-modules.json"),
);

export const CONTRACT_POLICY: ContractPolicy = readPolicy();

/**
 * Patterns always applied on top of caller-supplied ones. They silence
 * undefined-name findings for names the contract runtime injects.
 */
export const DEFAULT_WHITELIST: ReadonlySet<string> = new Set(
	readStringList("default-whitelist.json"),
);
