import type { Command } from './tree/command.js';
import type { Group } from './tree/group.js';
import type { TreeNode } from './tree/node.js';
import type { Option } from './tree/params.js';
import { formatTypeSpec } from './types/spec.js';

type Row = [left: string, right: string];

function optionLabel(option: Option): string {
	return option.type
		? `${option.label()} <${formatTypeSpec(option.type)}>`
		: option.label();
}

function optionText(option: Option): string {
	const parts: string[] = [];
	if (option.description) {
		parts.push(option.description);
	}
	if (option.defaultLiteral !== undefined) {
		parts.push(`(default: ${option.defaultLiteral})`);
	}
	return parts.join(' ');
}

function section(title: string, rows: Row[]): string[] {
	if (rows.length === 0) {
		return [];
	}
	const width = Math.max(...rows.map(([left]) => left.length));
	return [
		'',
		`${title}:`,
		...rows.map(([left, right]) =>
			`  ${left.padEnd(width)}  ${right}`.trimEnd()
		),
	];
}

export function usageLine(node: TreeNode, prog: string): string {
	const parts = [prog, ...node.path()];
	if (node.visibleOptions().length > 0) {
		parts.push('[options]');
	}
	if (node.kind === 'command') {
		parts.push(...node.arguments.map((a) => `<${a.name}>`));
	} else if (node.childNames().length > 0) {
		parts.push('<command>');
	}
	return `Usage: ${parts.join(' ')}`;
}

/** Usage screen for one node of the tree. */
export function renderUsage(node: TreeNode, prog: string): string {
	const lines = [usageLine(node, prog)];
	if (node.description) {
		lines.push('', node.description);
	}
	if (node.kind === 'command') {
		lines.push(
			...section(
				'Arguments',
				node.arguments.map((a): Row => [
					`<${a.name}>`,
					[formatTypeSpec(a.type), a.description]
						.filter((s) => s !== undefined)
						.join('  '),
				])
			)
		);
	}
	const own = node.options.map((o): Row => [
		optionLabel(o),
		optionText(o),
	]);
	if (node.helpHandler() !== null && node.helpMarkers.length > 0) {
		own.push([node.helpMarkers.join('/'), 'Show this help']);
	}
	lines.push(...section('Options', own));
	const inherited = node
		.visibleOptions()
		.filter((o) => o.owner !== node)
		.map((o): Row => [optionLabel(o), optionText(o)]);
	lines.push(...section('Inherited options', inherited));
	if (node.kind === 'group') {
		lines.push(
			...section(
				'Groups',
				node.groups.map((g): Row => [g.name, g.description ?? ''])
			),
			...section(
				'Commands',
				node.commands.map((c): Row => [c.name, c.description ?? ''])
			)
		);
	}
	return lines.join('\n');
}

function optionsSuffix(node: TreeNode): string {
	return node.options.map((o) => ` [${optionLabel(o)}]`).join('');
}

function commandLine(command: Command): string {
	const args = command.arguments
		.map((a) => ` <${a.name}:${formatTypeSpec(a.type)}>`)
		.join('');
	return `${command.name}${args}${optionsSuffix(command)}`;
}

/**
 * Indented outline of everything below `group`, two spaces per level.
 * Group names end in `/`; groups are listed before commands.
 */
export function renderTree(group: Group): string {
	const lines: string[] = [];
	const walk = (node: Group, depth: number) => {
		const pad = '  '.repeat(depth);
		for (const g of node.groups) {
			lines.push(`${pad}${g.name}/${optionsSuffix(g)}`);
			walk(g, depth + 1);
		}
		for (const c of node.commands) {
			lines.push(`${pad}${commandLine(c)}`);
		}
	};
	lines.push(`${group.name}${optionsSuffix(group)}`);
	walk(group, 1);
	return lines.join('\n');
}
