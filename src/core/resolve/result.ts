import type { Command } from '../tree/command.js';
import type { Group } from '../tree/group.js';
import type { TreeNode } from '../tree/node.js';
import type { Namespace } from './namespace.js';

export interface ParseResult {
	/** Absent when resolution stopped at a group. */
	readonly command: Command | undefined;
	/** Last group traversed; the command's parent when there is one. */
	readonly group: Group;
	/** Dotted names from the root, e.g. `vms.instances.list`. */
	readonly commandPath: string;
	readonly args: Namespace;
	/** One per traversed level, root first. */
	readonly levels: readonly Namespace[];
	/** Options of the deepest level. */
	readonly options: Namespace;
	/** Every value keyed by its dotted path. */
	readonly namespace: Namespace;
	readonly context: unknown;
	readonly leftover: readonly string[];
}

export type ParseOutcome =
	| { readonly status: 'resolved'; readonly result: ParseResult }
	| {
			readonly status: 'no-command';
			readonly node: TreeNode;
			readonly result: ParseResult;
	  }
	| { readonly status: 'help'; readonly node: TreeNode }
	| { readonly status: 'exit'; readonly node: TreeNode };

export type ParseStatus = ParseOutcome['status'];

export interface ResultJSON {
	command: string | null;
	group: string;
	args: Record<string, unknown>;
	options: Record<string, unknown>;
	levels: Record<string, unknown>[];
	namespace: Record<string, unknown>;
	leftover: string[];
}

export function resultToJSON(result: ParseResult): ResultJSON {
	return {
		command: result.command ? result.commandPath : null,
		group: result.group.fullName(),
		args: result.args.toJSON(),
		options: result.options.toJSON(),
		levels: result.levels.map((ns) => ns.toJSON()),
		namespace: result.namespace.toJSON(),
		leftover: [...result.leftover],
	};
}
