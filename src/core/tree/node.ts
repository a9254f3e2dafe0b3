import { DefinitionError } from '../errors.js';
import { parseLiteral } from '../types/literal.js';
import type { ScalarRegistry } from '../types/scalars.js';
import { scalar, type TypeSpec, type Value } from '../types/spec.js';
import type { Command } from './command.js';
import type { Group } from './group.js';
import {
	type DefaultHandler,
	getDefaultHelpHandler,
	getDefaultNoCommandHandler,
	type HelpHandler,
} from './handlers.js';
import { Option, type OptionDefinition } from './params.js';

export type TreeNode = Group | Command;

/** Shared by every node of one tree. */
export interface TreeSettings {
	readonly scalars: ScalarRegistry;
	readonly helpMarkers: readonly string[];
	frozen: boolean;
}

export interface NodeOptions {
	description?: string;
	/** Fires when resolution stops at this node without a command. */
	onDefault?: DefaultHandler;
	/** `null` turns help markers off here and below. */
	onHelp?: HelpHandler | null;
}

const NAME_RE = /^[A-Za-z0-9_][A-Za-z0-9_-]*$/;
const SHORT_RE = /^[^\s-]$/;
const LONG_RE = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function validateName(name: string, what: string): void {
	if (!NAME_RE.test(name)) {
		throw new DefinitionError(
			'InvalidDefinition',
			`Invalid ${what} name '${name}': use letters, digits, '-' and '_', not starting with '-'`
		);
	}
}

export function isOptionToken(token: string): boolean {
	return token.length > 1 && token.startsWith('-');
}

export function describeNode(node: CliNode): string {
	return node.parent ? `${node.kind} '${node.fullName()}'` : 'root';
}

export abstract class CliNode {
	abstract readonly kind: 'group' | 'command';
	readonly name: string;
	readonly parent: Group | undefined;
	readonly description: string | undefined;
	/** Root is level 0. */
	readonly level: number;
	readonly onDefault: DefaultHandler | undefined;
	readonly onHelp: HelpHandler | null | undefined;
	protected readonly settings: TreeSettings;
	private readonly ownOptions: Option[] = [];

	protected constructor(
		name: string,
		parent: Group | undefined,
		options: NodeOptions,
		settings: TreeSettings
	) {
		this.name = name;
		this.parent = parent;
		this.description = options.description;
		this.level = parent ? parent.level + 1 : 0;
		this.onDefault = options.onDefault;
		this.onHelp = options.onHelp;
		this.settings = settings;
	}

	get options(): readonly Option[] {
		return this.ownOptions;
	}

	get scalars(): ScalarRegistry {
		return this.settings.scalars;
	}

	get helpMarkers(): readonly string[] {
		return this.settings.helpMarkers;
	}

	get frozen(): boolean {
		return this.settings.frozen;
	}

	/** Root first, this node last. */
	lineage(): CliNode[] {
		const out: CliNode[] = [];
		for (let n: CliNode | undefined = this; n; n = n.parent) {
			out.unshift(n);
		}
		return out;
	}

	/** Names from the first level below the root down to this node. */
	path(): string[] {
		return this.lineage()
			.slice(1)
			.map((n) => n.name);
	}

	fullName(sep = '.'): string {
		return this.path().join(sep);
	}

	/** Prefix of this level's keys in the global namespace. */
	keyPrefix(): string {
		const full = this.fullName('.');
		return full ? `${full}.` : '';
	}

	/** Own options first, then each ancestor's, nearest first. */
	visibleOptions(): Option[] {
		const out: Option[] = [];
		for (let n: CliNode | undefined = this; n; n = n.parent) {
			out.push(...n.options);
		}
		return out;
	}

	/** Resolves `--long` or `-s` against own then inherited options. */
	findOption(token: string): Option | undefined {
		if (token.startsWith('--')) {
			const long = token.slice(2);
			return this.visibleOptions().find((o) => o.long === long);
		}
		if (token.length === 2 && token.startsWith('-')) {
			const short = token.slice(1);
			return this.visibleOptions().find((o) => o.short === short);
		}
		return;
	}

	/** Nearest help handler, or `null` where help is turned off. */
	helpHandler(): HelpHandler | null {
		for (let n: CliNode | undefined = this; n; n = n.parent) {
			if (n.onHelp !== undefined) {
				return n.onHelp;
			}
		}
		return getDefaultHelpHandler();
	}

	defaultHandler(): DefaultHandler {
		for (let n: CliNode | undefined = this; n; n = n.parent) {
			if (n.onDefault) {
				return n.onDefault;
			}
		}
		return getDefaultNoCommandHandler();
	}

	isHelpToken(token: string): boolean {
		return (
			this.settings.helpMarkers.includes(token) &&
			this.helpHandler() !== null
		);
	}

	/** Options declared anywhere below this node. */
	abstract descendantOptions(): Option[];

	/** Keys other than option keys that this level's namespace holds. */
	protected reservedKeys(): string[] {
		return [];
	}

	protected assertMutable(): void {
		if (this.settings.frozen) {
			throw new DefinitionError(
				'InvalidDefinition',
				`Cannot change ${describeNode(this)}: the tree is frozen once parsing starts`
			);
		}
	}

	resolveType(type: TypeSpec | string): TypeSpec {
		return typeof type === 'string' ? scalar(type, this.scalars) : type;
	}

	addOption(def: OptionDefinition): Option {
		this.assertMutable();
		const { short, long } = def;
		if (short === undefined && long === undefined) {
			throw new DefinitionError(
				'InvalidDefinition',
				`Option on ${describeNode(this)} needs a short or a long name`
			);
		}
		if (short !== undefined && !SHORT_RE.test(short)) {
			throw new DefinitionError(
				'InvalidDefinition',
				`Invalid short option name '${short}': expected one character`
			);
		}
		if (long !== undefined && !LONG_RE.test(long)) {
			throw new DefinitionError(
				'InvalidDefinition',
				`Invalid long option name '${long}'`
			);
		}
		const key = def.name ?? long ?? short ?? '';
		validateName(key, 'option');

		const markers = [
			short !== undefined ? `-${short}` : undefined,
			long !== undefined ? `--${long}` : undefined,
		].filter((m): m is string => m !== undefined);
		if (this.helpHandler() !== null) {
			const reserved = markers.find((m) =>
				this.settings.helpMarkers.includes(m)
			);
			if (reserved) {
				throw new DefinitionError(
					'DuplicateName',
					`Option '${reserved}' on ${describeNode(this)} is reserved for help`
				);
			}
		}
		for (const other of [
			...this.visibleOptions(),
			...this.descendantOptions(),
		]) {
			const clash =
				(short !== undefined && other.short === short) ||
				(long !== undefined && other.long === long);
			if (clash) {
				throw new DefinitionError(
					'DuplicateName',
					`Option '${markers.join('/')}' on ${describeNode(this)} clashes with '${other.label()}' on ${describeNode(other.owner)}`
				);
			}
		}
		if (
			this.ownOptions.some((o) => o.key === key) ||
			this.reservedKeys().includes(key)
		) {
			throw new DefinitionError(
				'DuplicateName',
				`Name '${key}' is already used on ${describeNode(this)}`
			);
		}

		const type =
			def.type === undefined ? undefined : this.resolveType(def.type);
		let defaultValue: Value | undefined;
		if (def.default !== undefined) {
			if (!type) {
				throw new DefinitionError(
					'InvalidDefinition',
					`Flag '${markers.join('/')}' takes no default`
				);
			}
			defaultValue = parseDefault(def.default, type, markers.join('/'));
		}

		const option = new Option({
			short,
			long,
			key,
			type,
			defaultLiteral: def.default,
			defaultValue,
			description: def.description,
			owner: this,
		});
		this.ownOptions.push(option);
		return option;
	}
}

function parseDefault(text: string, type: TypeSpec, label: string): Value {
	try {
		return parseLiteral(text, type, `default of '${label}'`);
	} catch (e) {
		const err = new DefinitionError(
			'InvalidDefinition',
			e instanceof Error ? e.message : String(e)
		);
		err.cause = e;
		throw err;
	}
}
