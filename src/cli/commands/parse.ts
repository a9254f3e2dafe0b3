/** biome-ignore-all lint/suspicious/noConsole: CLI output */

import type { Command } from 'commander';
import { jsonReplacer } from '../../core/resolve/namespace.js';
import { type ParseOutcome, resultToJSON } from '../../core/resolve/result.js';
import { renderUsage } from '../../core/usage.js';
import { childLogger } from '../../obs/logger.js';
import type { ConfigLocations } from '../../store/config.js';
import {
	EXIT_NO_COMMAND,
	EXIT_OK,
	openTree,
	printJSON,
	reportError,
} from '../shared.js';

export interface ParseCommandOptions extends ConfigLocations {
	treePath: string;
	tokens: string[];
	/** Whole command line as one string; tokenized instead of `tokens`. */
	line?: string;
	partial?: boolean;
	json?: boolean;
}

const log = childLogger({ mod: 'cli.parse' });

export function handleParseCommand(opts: ParseCommandOptions): number {
	let json = opts.json === true;
	try {
		const { config, parser } = openTree(opts.treePath, opts);
		json = json || config.output === 'json';
		const partial = opts.partial ?? config.partial ?? false;
		const outcome = parser.parse(opts.line ?? opts.tokens, { partial });
		log.info({ msg: 'parse.outcome', status: outcome.status, partial });
		return printOutcome(outcome, parser.prog, json);
	} catch (e) {
		return reportError(e, json);
	}
}

function printOutcome(
	outcome: ParseOutcome,
	prog: string,
	json: boolean
): number {
	switch (outcome.status) {
		case 'resolved': {
			const body = resultToJSON(outcome.result);
			if (json) {
				printJSON({ status: outcome.status, ...body });
				return EXIT_OK;
			}
			console.log(`resolved ${body.command ?? `(group ${body.group})`}`);
			for (const [key, value] of outcome.result.namespace) {
				console.log(`${key}=${JSON.stringify(value, jsonReplacer)}`);
			}
			if (body.leftover.length) {
				console.log(`leftover: ${body.leftover.join(' ')}`);
			}
			return EXIT_OK;
		}
		case 'no-command':
			if (json) {
				printJSON({
					status: outcome.status,
					node: outcome.node.fullName(),
					...resultToJSON(outcome.result),
				});
			} else {
				console.error(renderUsage(outcome.node, prog));
			}
			return EXIT_NO_COMMAND;
		case 'help':
			if (json) {
				printJSON({
					status: outcome.status,
					node: outcome.node.fullName(),
					usage: renderUsage(outcome.node, prog),
				});
			} else {
				console.log(renderUsage(outcome.node, prog));
			}
			return EXIT_OK;
		case 'exit':
			if (json) {
				printJSON({
					status: outcome.status,
					node: outcome.node.fullName(),
				});
			}
			return EXIT_OK;
	}
}

export function registerParseCommand(program: Command) {
	program
		.command('parse')
		.description(
			'Resolve a command line against a tree definition (put tokens after --)'
		)
		.argument('<tree>', 'tree definition file (.yaml, .yml or .json)')
		.argument('[tokens...]', 'tokens to resolve')
		.option('--line <text>', 'tokenize one command-line string instead')
		.option('--partial', 'keep unrecognized trailing input as leftover')
		.option('--json', 'output JSON')
		.allowUnknownOption()
		.action(
			(
				treePath: string,
				tokens: string[],
				flags: { line?: string; partial?: boolean; json?: boolean }
			) => {
				process.exitCode = handleParseCommand({
					treePath,
					tokens,
					line: flags.line,
					partial: flags.partial,
					json: flags.json,
				});
			}
		);
}
