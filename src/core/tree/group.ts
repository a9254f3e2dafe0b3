import { DefinitionError } from '../errors.js';
import { Command, type CommandOptions } from './command.js';
import {
	CliNode,
	describeNode,
	type NodeOptions,
	type TreeSettings,
	validateName,
} from './node.js';
import type { Option } from './params.js';

export type GroupOptions = NodeOptions;

export class Group extends CliNode {
	readonly kind = 'group' as const;
	private readonly groupMap = new Map<string, Group>();
	private readonly commandMap = new Map<string, Command>();

	constructor(
		name: string,
		parent: Group | undefined,
		options: GroupOptions,
		settings: TreeSettings
	) {
		super(name, parent, options, settings);
	}

	get groups(): Group[] {
		return Array.from(this.groupMap.values());
	}

	get commands(): Command[] {
		return Array.from(this.commandMap.values());
	}

	/** Groups and commands share one name space per level. */
	child(name: string): Group | Command | undefined {
		return this.groupMap.get(name) ?? this.commandMap.get(name);
	}

	childNames(): string[] {
		return [...this.groupMap.keys(), ...this.commandMap.keys()];
	}

	addGroup(name: string, options: GroupOptions = {}): Group {
		this.claimChildName(name, 'group');
		const group = new Group(name, this, options, this.settings);
		this.groupMap.set(name, group);
		return group;
	}

	addCommand(name: string, options: CommandOptions = {}): Command {
		this.claimChildName(name, 'command');
		const command = new Command(name, this, options, this.settings);
		this.commandMap.set(name, command);
		return command;
	}

	descendantOptions(): Option[] {
		const out: Option[] = [];
		for (const child of [...this.groups, ...this.commands]) {
			out.push(...child.options, ...child.descendantOptions());
		}
		return out;
	}

	private claimChildName(name: string, what: 'group' | 'command'): void {
		this.assertMutable();
		validateName(name, what);
		if (this.child(name)) {
			throw new DefinitionError(
				'DuplicateName',
				`'${name}' already exists under ${describeNode(this)}`
			);
		}
	}
}
