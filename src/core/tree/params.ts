import type { TypeSpec, Value } from '../types/spec.js';
import type { Command } from './command.js';
import type { CliNode } from './node.js';

export interface OptionDefinition {
	short?: string;
	long?: string;
	/** Namespace key; defaults to the long name, then the short name. */
	name?: string;
	/** Omitted for a flag. A string names a scalar kind. */
	type?: TypeSpec | string;
	/** Literal text, parsed against `type` when the option is added. */
	default?: string;
	description?: string;
}

export class Option {
	readonly short: string | undefined;
	readonly long: string | undefined;
	readonly key: string;
	readonly type: TypeSpec | undefined;
	readonly defaultLiteral: string | undefined;
	readonly defaultValue: Value | undefined;
	readonly description: string | undefined;
	readonly owner: CliNode;

	constructor(init: {
		short?: string;
		long?: string;
		key: string;
		type?: TypeSpec;
		defaultLiteral?: string;
		defaultValue?: Value;
		description?: string;
		owner: CliNode;
	}) {
		this.short = init.short;
		this.long = init.long;
		this.key = init.key;
		this.type = init.type;
		this.defaultLiteral = init.defaultLiteral;
		this.defaultValue = init.defaultValue;
		this.description = init.description;
		this.owner = init.owner;
		Object.freeze(this);
	}

	get isFlag(): boolean {
		return this.type === undefined;
	}

	/** `-s/--long`, `-s` or `--long`. */
	label(): string {
		const parts: string[] = [];
		if (this.short) {
			parts.push(`-${this.short}`);
		}
		if (this.long) {
			parts.push(`--${this.long}`);
		}
		return parts.join('/');
	}

	/** Value before any token sets it; `undefined` leaves the key out. */
	initialValue(): Value | undefined {
		return this.isFlag ? false : this.defaultValue;
	}
}

export class Argument {
	readonly name: string;
	readonly type: TypeSpec;
	readonly description: string | undefined;
	/** Zero-based, fixed at declaration. */
	readonly position: number;
	readonly owner: Command;

	constructor(init: {
		name: string;
		type: TypeSpec;
		description?: string;
		position: number;
		owner: Command;
	}) {
		this.name = init.name;
		this.type = init.type;
		this.description = init.description;
		this.position = init.position;
		this.owner = init.owner;
		Object.freeze(this);
	}
}
