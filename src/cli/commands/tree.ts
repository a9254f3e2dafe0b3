/** biome-ignore-all lint/suspicious/noConsole: CLI output */

import type { Command } from 'commander';
import { renderTree } from '../../core/usage.js';
import type { ConfigLocations } from '../../store/config.js';
import { EXIT_OK, openTree, reportError } from '../shared.js';

export interface TreeCommandOptions extends ConfigLocations {
	treePath: string;
}

export function handleTreeCommand(opts: TreeCommandOptions): number {
	try {
		const { parser } = openTree(opts.treePath, opts);
		console.log(renderTree(parser));
		return EXIT_OK;
	} catch (e) {
		return reportError(e, false);
	}
}

export function registerTreeCommand(program: Command) {
	program
		.command('tree')
		.description('Print an outline of a tree definition')
		.argument('<tree>', 'tree definition file (.yaml, .yml or .json)')
		.action((treePath: string) => {
			process.exitCode = handleTreeCommand({ treePath });
		});
}
