export * from './errors.js';
export {
	CliParser,
	type CliParserOptions,
	DEFAULT_HELP_MARKERS,
	type ParseOptions,
} from './parser.js';
export { jsonReplacer, Namespace } from './resolve/namespace.js';
export { type ResolveOptions, resolve } from './resolve/resolver.js';
export {
	type ParseOutcome,
	type ParseResult,
	type ParseStatus,
	type ResultJSON,
	resultToJSON,
} from './resolve/result.js';
export { closestNames } from './suggest.js';
export { tokenize } from './tokenize.js';
export { Command, type CommandOptions } from './tree/command.js';
export { Group, type GroupOptions } from './tree/group.js';
export {
	type DefaultHandler,
	getDefaultHelpHandler,
	getDefaultNoCommandHandler,
	type HandlerDirective,
	type HelpHandler,
	setDefaultHelpHandler,
	setDefaultNoCommandHandler,
} from './tree/handlers.js';
export type { NodeOptions, TreeNode } from './tree/node.js';
export { Argument, Option, type OptionDefinition } from './tree/params.js';
export {
	type LiteralResult,
	parseLiteral,
	parseLiteralTokens,
} from './types/literal.js';
export {
	type Coercion,
	createScalarRegistry,
	defaultScalars,
	ScalarRegistry,
	type ScalarValue,
} from './types/scalars.js';
export {
	type ArraySpec,
	array,
	formatTypeSpec,
	renderValue,
	type ScalarSpec,
	type StructSpec,
	type StructValue,
	scalar,
	struct,
	type TypeSpec,
	type Value,
} from './types/spec.js';
export { renderTree, renderUsage, usageLine } from './usage.js';
