/** biome-ignore-all lint/suspicious/noConsole: CLI output */

import { isNestArgsError, ParseError } from '../core/errors.js';
import type { CliParser } from '../core/parser.js';
import { jsonReplacer } from '../core/resolve/namespace.js';
import { getLogger } from '../obs/logger.js';
import { type ConfigLocations, loadConfig } from '../store/config.js';
import type { NestArgsConfig } from '../store/schema.js';
import { loadTreeFile } from '../store/tree-file.js';

export const EXIT_OK = 0;
export const EXIT_NO_COMMAND = 1;
export const EXIT_ERROR = 2;

export interface TreeCommandContext {
	config: NestArgsConfig;
	parser: CliParser;
}

/** Loads config, then the tree with config-level prog and help markers. */
export function openTree(
	treePath: string,
	where: ConfigLocations = {}
): TreeCommandContext {
	const { config, userPath, projectPath } = loadConfig(where);
	getLogger().debug({ msg: 'config.loaded', userPath, projectPath });
	const parser = loadTreeFile(treePath, {
		prog: config.prog,
		helpMarkers: config.helpMarkers,
	});
	return { config, parser };
}

export function printJSON(value: unknown): void {
	console.log(JSON.stringify(value, jsonReplacer, 2));
}

/** Prints `e` the way the CLI reports failures and returns the exit code. */
export function reportError(e: unknown, json: boolean): number {
	const message = e instanceof Error ? e.message : String(e);
	getLogger().debug({ msg: 'cli.error', error: message });
	if (json) {
		printJSON({
			status: 'error',
			code: isNestArgsError(e) ? e.code : 'Error',
			message,
			...(e instanceof ParseError
				? {
						tokenIndex: e.tokenIndex,
						token: e.token,
						expected: e.expected,
						suggestions: e.suggestions,
					}
				: {}),
		});
		return EXIT_ERROR;
	}
	console.error(isNestArgsError(e) ? `${e.code}: ${message}` : message);
	return EXIT_ERROR;
}
