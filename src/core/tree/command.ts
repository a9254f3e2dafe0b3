import { DefinitionError } from '../errors.js';
import type { TypeSpec } from '../types/spec.js';
import type { Group } from './group.js';
import {
	CliNode,
	describeNode,
	type NodeOptions,
	type TreeSettings,
	validateName,
} from './node.js';
import { Argument, type Option } from './params.js';

export interface CommandOptions extends NodeOptions {
	/** Opaque value handed back in the parse result. */
	context?: unknown;
}

export class Command extends CliNode {
	readonly kind = 'command' as const;
	declare readonly parent: Group;
	readonly context: unknown;
	private readonly args: Argument[] = [];

	constructor(
		name: string,
		parent: Group,
		options: CommandOptions,
		settings: TreeSettings
	) {
		super(name, parent, options, settings);
		this.context = options.context;
	}

	get arguments(): readonly Argument[] {
		return this.args;
	}

	addArgument(
		name: string,
		type: TypeSpec | string = 'string',
		opts: { description?: string } = {}
	): Argument {
		this.assertMutable();
		validateName(name, 'argument');
		if (
			this.args.some((a) => a.name === name) ||
			this.options.some((o) => o.key === name)
		) {
			throw new DefinitionError(
				'DuplicateName',
				`Name '${name}' is already used on ${describeNode(this)}`
			);
		}
		const arg = new Argument({
			name,
			type: this.resolveType(type),
			description: opts.description,
			position: this.args.length,
			owner: this,
		});
		this.args.push(arg);
		return arg;
	}

	descendantOptions(): Option[] {
		return [];
	}

	protected reservedKeys(): string[] {
		return this.args.map((a) => a.name);
	}
}
