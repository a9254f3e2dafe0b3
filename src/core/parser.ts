import { resolve } from './resolve/resolver.js';
import type { ParseOutcome } from './resolve/result.js';
import { tokenize } from './tokenize.js';
import { Group, type GroupOptions } from './tree/group.js';
import type { TreeSettings } from './tree/node.js';
import { defaultScalars, type ScalarRegistry } from './types/scalars.js';

export const DEFAULT_HELP_MARKERS: readonly string[] = ['-h', '--help'];

export interface CliParserOptions extends GroupOptions {
	/** Program name shown in usage text. */
	prog?: string;
	/** Scalar kinds that string type names resolve against. */
	scalars?: ScalarRegistry;
	helpMarkers?: readonly string[];
}

export interface ParseOptions {
	partial?: boolean;
}

/**
 * Root of a command tree. Build it with `addOption`, `addGroup` and
 * `addCommand`, then call `parse`. The first parse freezes the tree.
 */
export class CliParser extends Group {
	readonly prog: string;

	constructor(options: CliParserOptions = {}) {
		const settings: TreeSettings = {
			scalars: options.scalars ?? defaultScalars.clone(),
			helpMarkers: Object.freeze([
				...(options.helpMarkers ?? DEFAULT_HELP_MARKERS),
			]),
			frozen: false,
		};
		super(options.prog ?? 'cli', undefined, options, settings);
		this.prog = options.prog ?? 'cli';
	}

	/** Further additions anywhere in the tree fail once frozen. */
	freeze(): this {
		this.settings.frozen = true;
		return this;
	}

	parse(
		input: string | readonly string[],
		options: ParseOptions = {}
	): ParseOutcome {
		const tokens = typeof input === 'string' ? tokenize(input) : input;
		this.freeze();
		return resolve(this, tokens, { partial: options.partial ?? false });
	}
}
