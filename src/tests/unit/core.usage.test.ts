import { describe, expect, it } from 'vitest';
import { CliParser } from '../../core/parser.js';
import { renderTree, renderUsage, usageLine } from '../../core/usage.js';

function buildTree(opts: { help?: boolean } = {}) {
	const cli = new CliParser({
		prog: 'demo',
		description: 'Demo tool',
		...(opts.help === false ? { onHelp: null } : {}),
	});
	cli.addOption({ short: 'v', long: 'verbose', description: 'More output' });
	const vms = cli.addGroup('vms', { description: 'Virtual machines' });
	const list = vms.addCommand('list', { description: 'List machines' });
	list.addArgument('zone', 'string', { description: 'Zone name' });
	list.addOption({
		long: 'limit',
		type: 'int',
		default: '10',
		description: 'Max rows',
	});
	return { cli, vms, list };
}

describe('usage text', () => {
	it('renders a command screen', () => {
		const { list } = buildTree();
		expect(renderUsage(list, 'demo')).toBe(
			[
				'Usage: demo vms list [options] <zone>',
				'',
				'List machines',
				'',
				'Arguments:',
				'  <zone>  string  Zone name',
				'',
				'Options:',
				'  --limit <int>  Max rows (default: 10)',
				'  -h/--help      Show this help',
				'',
				'Inherited options:',
				'  -v/--verbose  More output',
			].join('\n')
		);
	});

	it('renders a group screen', () => {
		const { cli } = buildTree();
		expect(renderUsage(cli, 'demo')).toBe(
			[
				'Usage: demo [options] <command>',
				'',
				'Demo tool',
				'',
				'Options:',
				'  -v/--verbose  More output',
				'  -h/--help     Show this help',
				'',
				'Groups:',
				'  vms  Virtual machines',
			].join('\n')
		);
	});

	it('omits the help row where help is off', () => {
		const { vms } = buildTree({ help: false });
		expect(usageLine(vms, 'demo')).toBe('Usage: demo vms [options] <command>');
		expect(renderUsage(vms, 'demo')).not.toContain('Show this help');
	});

	it('renders an outline of the tree', () => {
		const { cli } = buildTree();
		expect(renderTree(cli)).toBe(
			[
				'demo [-v/--verbose]',
				'  vms/',
				'    list <zone:string> [--limit <int>]',
			].join('\n')
		);
	});
});
