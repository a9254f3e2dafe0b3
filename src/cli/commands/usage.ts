/** biome-ignore-all lint/suspicious/noConsole: CLI output */

import type { Command } from 'commander';
import { ParseError } from '../../core/errors.js';
import { closestNames, formatSuggestions } from '../../core/suggest.js';
import { describeNode, type TreeNode } from '../../core/tree/node.js';
import { renderUsage } from '../../core/usage.js';
import type { ConfigLocations } from '../../store/config.js';
import { EXIT_OK, openTree, reportError } from '../shared.js';

export interface UsageCommandOptions extends ConfigLocations {
	treePath: string;
	/** Group and command names below the root. */
	path: string[];
}

export function findNode(root: TreeNode, path: readonly string[]): TreeNode {
	let node = root;
	for (const [i, name] of path.entries()) {
		const child = node.kind === 'group' ? node.child(name) : undefined;
		if (!child) {
			const names = node.kind === 'group' ? node.childNames() : [];
			const suggestions = closestNames(names, name);
			throw new ParseError(
				'UnknownCommand',
				`Unknown command '${name}' under ${describeNode(node)}.${formatSuggestions(suggestions)}`,
				{ tokenIndex: i, token: name, expected: names.join('|'), suggestions }
			);
		}
		node = child;
	}
	return node;
}

export function handleUsageCommand(opts: UsageCommandOptions): number {
	try {
		const { parser } = openTree(opts.treePath, opts);
		console.log(renderUsage(findNode(parser, opts.path), parser.prog));
		return EXIT_OK;
	} catch (e) {
		return reportError(e, false);
	}
}

export function registerUsageCommand(program: Command) {
	program
		.command('usage')
		.description('Print the usage screen of one node of a tree definition')
		.argument('<tree>', 'tree definition file (.yaml, .yml or .json)')
		.argument('[path...]', 'group and command names below the root')
		.action((treePath: string, path: string[]) => {
			process.exitCode = handleUsageCommand({ treePath, path });
		});
}
