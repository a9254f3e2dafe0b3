import path from 'node:path';
import { DefinitionError } from '../core/errors.js';
import { CliParser, type CliParserOptions } from '../core/parser.js';
import type { Command } from '../core/tree/command.js';
import type { Group } from '../core/tree/group.js';
import type { TreeNode } from '../core/tree/node.js';
import type { ScalarRegistry } from '../core/types/scalars.js';
import { array, scalar, struct, type TypeSpec } from '../core/types/spec.js';
import { childLogger } from '../obs/logger.js';
import { readDocument } from './config.js';
import {
	type CommandDef,
	formatZodIssues,
	type GroupDef,
	type OptionDef,
	type TreeDef,
	TreeDefZ,
	type TypeDef,
} from './schema.js';

const log = childLogger({ mod: 'tree-file' });

export function toTypeSpec(def: TypeDef, scalars: ScalarRegistry): TypeSpec {
	if (typeof def === 'string') {
		return scalar(def, scalars);
	}
	if ('array' in def) {
		return array(toTypeSpec(def.array, scalars));
	}
	return struct(
		Object.entries(def.struct).map(([name, field]): [string, TypeSpec] => [
			name,
			toTypeSpec(field, scalars),
		])
	);
}

function addOptions(node: TreeNode, defs: OptionDef[] = []): void {
	for (const def of defs) {
		node.addOption({
			short: def.short,
			long: def.long,
			name: def.name,
			type:
				def.type === undefined
					? undefined
					: toTypeSpec(def.type, node.scalars),
			default: def.default === undefined ? undefined : String(def.default),
			description: def.description,
		});
	}
}

function addCommand(parent: Group, name: string, def: CommandDef): Command {
	const command = parent.addCommand(name, { description: def.description });
	addOptions(command, def.options);
	for (const arg of def.arguments ?? []) {
		command.addArgument(
			arg.name,
			arg.type === undefined
				? 'string'
				: toTypeSpec(arg.type, command.scalars),
			{ description: arg.description }
		);
	}
	return command;
}

function fillGroup(group: Group, def: GroupDef): void {
	addOptions(group, def.options);
	for (const [name, child] of Object.entries(def.groups ?? {})) {
		const sub = group.addGroup(name, { description: child.description });
		fillGroup(sub, child);
	}
	for (const [name, child] of Object.entries(def.commands ?? {})) {
		addCommand(group, name, child);
	}
}

/** Validates raw data against the tree schema. */
export function parseTreeDef(data: unknown, source = 'tree'): TreeDef {
	const parsed = TreeDefZ.safeParse(data ?? {});
	if (!parsed.success) {
		throw new DefinitionError(
			'InvalidDefinition',
			`Invalid tree definition at ${source}: ${formatZodIssues(parsed.error)}`
		);
	}
	return parsed.data;
}

export function buildParser(
	def: TreeDef,
	opts: Omit<CliParserOptions, 'description'> = {}
): CliParser {
	const parser = new CliParser({
		...opts,
		prog: opts.prog ?? def.prog,
		helpMarkers: opts.helpMarkers ?? def.helpMarkers,
		description: def.description,
	});
	fillGroup(parser, def);
	return parser;
}

/** Reads a `.yaml`, `.yml` or `.json` tree and builds the parser. */
export function loadTreeFile(
	file: string,
	opts: Omit<CliParserOptions, 'description'> = {}
): CliParser {
	let data: unknown;
	try {
		data = readDocument(file);
	} catch (e) {
		const err = new DefinitionError(
			'InvalidDefinition',
			`Cannot read tree definition ${file}: ${e instanceof Error ? e.message : String(e)}`
		);
		err.cause = e;
		throw err;
	}
	if (data === undefined) {
		throw new DefinitionError(
			'InvalidDefinition',
			`Tree definition not found: ${file}`
		);
	}
	const def = parseTreeDef(data, file);
	const parser = buildParser(def, {
		...opts,
		prog: opts.prog ?? def.prog ?? path.basename(file, path.extname(file)),
	});
	log.debug({ msg: 'tree.loaded', file, prog: parser.prog });
	return parser;
}
