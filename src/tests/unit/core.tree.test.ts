import { describe, expect, it } from 'vitest';
import { DefinitionError } from '../../core/errors.js';
import { CliParser } from '../../core/parser.js';
import { array, scalar } from '../../core/types/spec.js';

function definitionError(fn: () => unknown): DefinitionError {
	try {
		fn();
	} catch (e) {
		if (e instanceof DefinitionError) {
			return e;
		}
		throw e;
	}
	throw new Error('expected a DefinitionError');
}

describe('command tree', () => {
	it('tracks names, levels and paths', () => {
		const cli = new CliParser({ prog: 'demo' });
		const vms = cli.addGroup('vms');
		const instances = vms.addGroup('instances');
		const list = instances.addCommand('list');
		expect(list.level).toBe(3);
		expect(list.path()).toEqual(['vms', 'instances', 'list']);
		expect(list.fullName()).toBe('vms.instances.list');
		expect(list.keyPrefix()).toBe('vms.instances.list.');
		expect(cli.keyPrefix()).toBe('');
		expect(vms.child('instances')).toBe(instances);
		expect(cli.childNames()).toEqual(['vms']);
	});

	it('rejects duplicate and invalid child names', () => {
		const cli = new CliParser();
		cli.addGroup('vms');
		const dup = definitionError(() => cli.addCommand('vms'));
		expect(dup.code).toBe('DuplicateName');
		expect(dup.message).toBe("'vms' already exists under root");

		expect(definitionError(() => cli.addGroup('a.b')).code).toBe(
			'InvalidDefinition'
		);
		expect(definitionError(() => cli.addCommand('-x')).code).toBe(
			'InvalidDefinition'
		);
		expect(definitionError(() => cli.addCommand('')).code).toBe(
			'InvalidDefinition'
		);
	});

	it('derives option keys', () => {
		const cli = new CliParser();
		const cmd = cli.addCommand('run');
		expect(cmd.addOption({ short: 'm', long: 'married' }).key).toBe(
			'married'
		);
		expect(cmd.addOption({ short: 'x' }).key).toBe('x');
		expect(cmd.addOption({ long: 'dry-run', name: 'dryRun' }).key).toBe(
			'dryRun'
		);
		expect(definitionError(() => cmd.addOption({})).code).toBe(
			'InvalidDefinition'
		);
	});

	it('keeps option names unique along every path', () => {
		const cli = new CliParser();
		cli.addOption({ short: 'v', long: 'verbose' });
		const vms = cli.addGroup('vms');
		const clash = definitionError(() => vms.addOption({ short: 'v' }));
		expect(clash.code).toBe('DuplicateName');
		expect(clash.message).toBe(
			"Option '-v' on group 'vms' clashes with '-v/--verbose' on root"
		);

		vms.addCommand('stop').addOption({ long: 'force' });
		expect(definitionError(() => cli.addOption({ long: 'force' })).code).toBe(
			'DuplicateName'
		);
		// siblings may reuse names
		vms.addCommand('start').addOption({ long: 'force' });
	});

	it('reserves help markers while help is enabled', () => {
		const cli = new CliParser();
		const err = definitionError(() => cli.addOption({ short: 'h' }));
		expect(err.code).toBe('DuplicateName');
		expect(err.message).toBe("Option '-h' on root is reserved for help");

		const quiet = new CliParser({ onHelp: null });
		const host = quiet.addOption({ short: 'h', long: 'host', type: 'string' });
		expect(host.key).toBe('host');
	});

	it('validates defaults at definition time', () => {
		const cli = new CliParser();
		const flag = definitionError(() =>
			cli.addOption({ long: 'dry', default: 'x' })
		);
		expect(flag.code).toBe('InvalidDefinition');
		expect(flag.message).toBe("Flag '--dry' takes no default");

		const bad = definitionError(() =>
			cli.addOption({ long: 'n', type: 'int', default: 'abc' })
		);
		expect(bad.code).toBe('InvalidDefinition');
		expect(bad.message).toBe("default of '--n': 'abc' is not a valid int");

		const ids = cli.addOption({
			long: 'ids',
			type: array(scalar('int')),
			default: '[1, 2]',
		});
		expect(ids.defaultValue).toEqual([1, 2]);
	});

	it('shares one namespace between arguments and option keys', () => {
		const cli = new CliParser();
		const cmd = cli.addCommand('user');
		cmd.addOption({ long: 'name', type: 'string' });
		expect(definitionError(() => cmd.addArgument('name')).code).toBe(
			'DuplicateName'
		);
		cmd.addArgument('age', 'int');
		expect(
			definitionError(() => cmd.addOption({ long: 'age', type: 'int' })).code
		).toBe('DuplicateName');
		expect(cmd.arguments.map((a) => a.position)).toEqual([0]);
	});

	it('freezes on the first parse', () => {
		const cli = new CliParser();
		cli.addCommand('run');
		cli.parse(['run']);
		const err = definitionError(() => cli.addCommand('stop'));
		expect(err.code).toBe('InvalidDefinition');
		expect(err.message).toBe(
			'Cannot change root: the tree is frozen once parsing starts'
		);
	});
});
