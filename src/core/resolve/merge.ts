import type { Value } from '../types/spec.js';
import type { Command } from '../tree/command.js';
import type { Group } from '../tree/group.js';
import type { CliNode, TreeNode } from '../tree/node.js';
import type { Argument, Option } from '../tree/params.js';
import { Namespace } from './namespace.js';
import type { ParseResult } from './result.js';

/** Values gathered during one resolution, before they become namespaces. */
export class ValueCollector {
	private readonly optionValues = new Map<Option, Value>();
	private readonly argValues: [Argument, Value][] = [];

	setOption(option: Option, value: Value): void {
		// last occurrence wins
		this.optionValues.set(option, value);
	}

	addArgument(arg: Argument, value: Value): void {
		this.argValues.push([arg, value]);
	}

	optionValue(option: Option): Value | undefined {
		return this.optionValues.get(option);
	}

	arguments(): readonly [Argument, Value][] {
		return this.argValues;
	}
}

function deepFreeze<T extends Value>(value: T): T {
	const work: Value[] = [value];
	for (let v = work.pop(); v !== undefined; v = work.pop()) {
		if (typeof v === 'object' && !Object.isFrozen(v)) {
			Object.freeze(v);
			for (const child of Object.values(v)) {
				work.push(child);
			}
		}
	}
	return value;
}

/** Own options of `node`, explicit values over declared defaults. */
export function levelEntries(
	node: CliNode,
	collector: ValueCollector
): [string, Value][] {
	const out: [string, Value][] = [];
	for (const option of node.options) {
		const v = collector.optionValue(option) ?? option.initialValue();
		if (v !== undefined) {
			out.push([option.key, deepFreeze(v)]);
		}
	}
	return out;
}

export function buildResult(input: {
	traversed: readonly TreeNode[];
	stop: TreeNode;
	collector: ValueCollector;
	leftover: readonly string[];
}): ParseResult {
	const { traversed, stop, collector } = input;
	const command: Command | undefined =
		stop.kind === 'command' ? stop : undefined;
	const group: Group = stop.kind === 'command' ? stop.parent : stop;

	const levels: Namespace[] = [];
	const global: [string, Value][] = [];
	for (const node of traversed) {
		const entries = levelEntries(node, collector);
		levels.push(new Namespace(entries));
		const prefix = node.keyPrefix();
		for (const [key, value] of entries) {
			global.push([prefix + key, value]);
		}
	}

	const args: [string, Value][] = collector
		.arguments()
		.map(([arg, value]): [string, Value] => [arg.name, deepFreeze(value)]);
	if (command) {
		const prefix = command.keyPrefix();
		for (const [name, value] of args) {
			global.push([prefix + name, value]);
		}
	}

	const result: ParseResult = {
		command,
		group,
		commandPath: command ? command.fullName() : '',
		args: new Namespace(args),
		levels: Object.freeze(levels),
		options: levels[levels.length - 1] ?? new Namespace(),
		namespace: new Namespace(global),
		context: command?.context,
		leftover: Object.freeze([...input.leftover]),
	};
	return Object.freeze(result);
}
