#!/usr/bin/env node
/** biome-ignore-all lint/suspicious/noConsole: CLI output */

import { Command } from 'commander';
import { isLogLevel, setLogLevel } from '../obs/logger.js';
import { loadConfig } from '../store/config.js';
import { formatBuildInfo, VERSION } from '../util/build-info.js';
import { registerParseCommand } from './commands/parse.js';
import { registerTreeCommand } from './commands/tree.js';
import { registerUsageCommand } from './commands/usage.js';
import { EXIT_ERROR } from './shared.js';

function createProgram(): Command {
	const program = new Command();
	program
		.name('nestargs')
		.description('Resolve command lines against nested command trees')
		.version(VERSION ?? '0.0.0');

	program.option(
		'-l, --log-level <level>',
		'log level (debug|info|warn|error)'
	);

	program.hook('preAction', (thisCmd) => {
		const opts = thisCmd.opts<{ logLevel?: string }>();
		const level = opts.logLevel ?? loadConfig().config.logLevel;
		if (level === undefined) {
			return;
		}
		if (!isLogLevel(level)) {
			return program.error(
				`Invalid log level '${level}' (expected debug|info|warn|error)`,
				{ exitCode: EXIT_ERROR }
			);
		}
		setLogLevel(level);
	});

	program
		.command('version')
		.description('Show detailed version and build information')
		.action(() => {
			console.log(formatBuildInfo());
		});

	registerParseCommand(program);
	registerTreeCommand(program);
	registerUsageCommand(program);
	return program;
}

try {
	createProgram().parse(process.argv);
} catch (e) {
	console.error(e instanceof Error ? e.message : String(e));
	process.exitCode = EXIT_ERROR;
}
