import { afterEach, describe, expect, it, vi } from 'vitest';
import { LiteralError, ParseError } from '../../core/errors.js';
import { CliParser } from '../../core/parser.js';
import { Namespace } from '../../core/resolve/namespace.js';
import {
	type ParseOutcome,
	type ParseResult,
	resultToJSON,
} from '../../core/resolve/result.js';
import {
	type HandlerDirective,
	setDefaultNoCommandHandler,
} from '../../core/tree/handlers.js';
import type { TreeNode } from '../../core/tree/node.js';
import {
	array,
	scalar,
	struct,
	type TypeSpec,
	type Value,
} from '../../core/types/spec.js';

const int = scalar('int');

function buildTree() {
	const cli = new CliParser({ prog: 'demo' });
	cli.addOption({ short: 'v', long: 'verbose' });
	const vms = cli.addGroup('vms', { description: 'Virtual machines' });
	vms.addOption({ long: 'region', type: 'string', default: 'eu' });
	const instances = vms.addGroup('instances');
	const list = instances.addCommand('list', { context: { handler: 'list' } });
	list.addOption({ short: 'l', long: 'long' });
	list.addOption({ long: 'limit', type: 'int' });
	const user = cli.addCommand('user');
	user.addArgument('name');
	user.addArgument('age', 'int');
	user.addArgument('weight', 'float');
	user.addOption({ short: 'm', long: 'married' });
	user.addOption({ long: 'spouse', type: 'string' });
	user.addOption({
		long: 'tags',
		type: array(scalar('string')),
		default: '[]',
	});
	const point = cli.addCommand('point');
	point.addArgument('p', struct({ x: int, y: int }));
	return { cli, vms, list, user, point };
}

function resolved(outcome: ParseOutcome): ParseResult {
	if (outcome.status !== 'resolved') {
		throw new Error(`expected resolved, got ${outcome.status}`);
	}
	return outcome.result;
}

function parseError(fn: () => unknown): ParseError {
	try {
		fn();
	} catch (e) {
		if (e instanceof ParseError) {
			return e;
		}
		throw e;
	}
	throw new Error('expected a ParseError');
}

afterEach(() => {
	setDefaultNoCommandHandler(undefined);
});

describe('resolver', () => {
	it('walks groups down to a command and merges every level', () => {
		const { cli, list } = buildTree();
		const result = resolved(cli.parse(['vms', 'instances', 'list', '-l']));
		expect(result.command).toBe(list);
		expect(result.commandPath).toBe('vms.instances.list');
		expect(result.group.fullName()).toBe('vms.instances');
		expect(result.namespace.toJSON()).toEqual({
			verbose: false,
			'vms.region': 'eu',
			'vms.instances.list.long': true,
		});
		expect(result.levels.map((ns) => ns.toJSON())).toEqual([
			{ verbose: false },
			{ region: 'eu' },
			{},
			{ long: true },
		]);
		expect(result.options.toJSON()).toEqual({ long: true });
		expect(result.context).toEqual({ handler: 'list' });
		expect(result.leftover).toEqual([]);
	});

	it('collects options at the level that declares them', () => {
		const { cli } = buildTree();
		const result = resolved(
			cli.parse([
				'-v',
				'vms',
				'--region',
				'us',
				'instances',
				'list',
				'--limit',
				'5',
			])
		);
		expect(result.namespace.toJSON()).toEqual({
			verbose: true,
			'vms.region': 'us',
			'vms.instances.list.long': false,
			'vms.instances.list.limit': 5,
		});
	});

	it('accepts an ancestor option below its level', () => {
		const { cli } = buildTree();
		const result = resolved(cli.parse(['vms', 'instances', 'list', '-v']));
		expect(result.namespace.get('verbose')).toBe(true);
		expect(result.levels[0].get('verbose')).toBe(true);
	});

	it('lets the last occurrence of an option win', () => {
		const { cli } = buildTree();
		const result = resolved(
			cli.parse(['vms', '--region', 'a', '--region', 'b', 'instances', 'list'])
		);
		expect(result.namespace.get('vms.region')).toBe('b');
	});

	it('fills arguments in order among options', () => {
		const { cli } = buildTree();
		const result = resolved(cli.parse('user Jack 28 72.8 -m --spouse Maria'));
		expect(result.args.toJSON()).toEqual({
			name: 'Jack',
			age: 28,
			weight: 72.8,
		});
		expect(result.namespace.toJSON()).toEqual({
			verbose: false,
			'user.married': true,
			'user.spouse': 'Maria',
			'user.tags': [],
			'user.name': 'Jack',
			'user.age': 28,
			'user.weight': 72.8,
		});
	});

	it('keeps trailing input as leftover in partial mode', () => {
		const { cli } = buildTree();
		const tokens = 'user Jack 28 72.8 -m --spouse Maria extra1 extra2';
		const result = resolved(cli.parse(tokens, { partial: true }));
		expect(result.args.toJSON()).toEqual({
			name: 'Jack',
			age: 28,
			weight: 72.8,
		});
		expect(result.options.toJSON()).toEqual({
			married: true,
			spouse: 'Maria',
			tags: [],
		});
		expect(result.leftover).toEqual(['extra1', 'extra2']);

		const err = parseError(() => cli.parse(tokens));
		expect(err.code).toBe('TooManyArguments');
		expect(err.message).toBe(
			"command 'user' takes 3 argument(s); unexpected 'extra1'"
		);
		expect(err.tokenIndex).toBe(7);
	});

	it('stops at the first unknown option in partial mode', () => {
		const { cli } = buildTree();
		const result = resolved(
			cli.parse(['user', 'A', '1', '2', '--bogus', 'x'], { partial: true })
		);
		expect(result.leftover).toEqual(['--bogus', 'x']);
	});

	it('suggests close names for unknown commands and options', () => {
		const { cli } = buildTree();
		const cmd = parseError(() => cli.parse(['vsm']));
		expect(cmd.code).toBe('UnknownCommand');
		expect(cmd.message).toBe(
			"Unknown command 'vsm' under root. Did you mean: vms?"
		);
		expect(cmd.suggestions).toEqual(['vms']);
		expect(cmd.expected).toBe('vms|user|point');
		expect(cmd.tokenIndex).toBe(0);

		const opt = parseError(() => cli.parse(['user', '--mared']));
		expect(opt.code).toBe('UnknownOption');
		expect(opt.message).toBe(
			"Unknown option '--mared' for command 'user'. Did you mean: --married?"
		);
		expect(opt.tokenIndex).toBe(1);
	});

	it('signals no-command when an unknown name becomes leftover at a group', () => {
		const { cli } = buildTree();
		const outcome = cli.parse(['nope', 'x'], { partial: true });
		expect(outcome.status).toBe('no-command');
		if (outcome.status === 'no-command') {
			expect(outcome.node).toBe(cli);
			expect(outcome.result.leftover).toEqual(['nope', 'x']);
		}
	});

	it('reads negative numbers as arguments', () => {
		const { cli } = buildTree();
		const result = resolved(cli.parse(['user', 'Ann', '-5', '-1.5']));
		expect(result.args.toJSON()).toEqual({
			name: 'Ann',
			age: -5,
			weight: -1.5,
		});
	});

	it('requires every argument, even in partial mode', () => {
		const { cli } = buildTree();
		for (const partial of [false, true]) {
			const err = parseError(() => cli.parse(['user', 'Ann'], { partial }));
			expect(err.code).toBe('MissingArgument');
			expect(err.message).toBe(
				"command 'user' is missing argument(s): <age> <weight>"
			);
			expect(err.expected).toBe('age <int>');
		}
	});

	it('requires a value after a value option', () => {
		const { cli } = buildTree();
		const err = parseError(() =>
			cli.parse(['user', 'A', '1', '2', '--spouse'])
		);
		expect(err.code).toBe('MissingOptionValue');
		expect(err.message).toBe("Option '--spouse' expects a string value");
		expect(err.tokenIndex).toBe(4);
	});

	it('reads literals that span several tokens', () => {
		const { cli } = buildTree();
		const spread = resolved(cli.parse(['point', '{x=1,', 'y=2}']));
		expect(spread.args.get('p')).toEqual({ x: 1, y: 2 });
		expect(spread.leftover).toEqual([]);

		const line = resolved(cli.parse('point {x=1, y=2}'));
		expect(line.namespace.get('point.p')).toEqual({ x: 1, y: 2 });
	});

	it('keeps malformed literals fatal in partial mode', () => {
		const { cli } = buildTree();
		const err = parseError(() =>
			cli.parse(['point', '{x=1'], { partial: true })
		);
		expect(err).toBeInstanceOf(LiteralError);
		expect(err.code).toBe('MalformedLiteral');
		expect(err.message).toBe(
			"argument 'p': unterminated '{' opened at token 1, offset 0"
		);
		expect(err.tokenIndex).toBe(1);
	});

	it('fails on an unterminated array in both modes', () => {
		const cli = new CliParser();
		cli.addCommand('sum').addArgument('values', array(int));
		for (const partial of [false, true]) {
			const err = parseError(() => cli.parse(['sum', '[1,2,'], { partial }));
			expect(err.code).toBe('MalformedLiteral');
			expect(err.message).toBe(
				"argument 'values': unterminated '[' opened at token 1, offset 0"
			);
			expect(err.tokenIndex).toBe(1);
		}
	});

	it('resolves and freezes very deeply nested arguments', () => {
		const depth = 20000;
		let spec: TypeSpec = int;
		for (let i = 0; i < depth; i++) {
			spec = array(spec);
		}
		const cli = new CliParser();
		cli.addCommand('c').addArgument('x', spec);
		const result = resolved(
			cli.parse(['c', `${'['.repeat(depth)}7${']'.repeat(depth)}`])
		);
		let v: Value | undefined = result.args.get('x');
		for (let i = 0; i < depth; i++) {
			if (!Array.isArray(v)) {
				throw new Error(`not an array at depth ${i}`);
			}
			if (!Object.isFrozen(v)) {
				throw new Error(`not frozen at depth ${i}`);
			}
			v = v[0];
		}
		expect(v).toBe(7);

		const err = parseError(() => cli.parse(['c', '5']));
		expect(err.code).toBe('InvalidValue');
		expect(err.message).toBe("argument 'x': expected array literal '[...]'");
		expect(err.expected).toBe(`${'['.repeat(depth)}int${']'.repeat(depth)}`);
	});

	it('returns frozen values', () => {
		const { cli } = buildTree();
		const result = resolved(cli.parse(['point', '{x=1,y=2}']));
		expect(Object.isFrozen(result.args.get('p'))).toBe(true);
		expect(Object.isFrozen(result)).toBe(true);
	});
});

describe('help and default handlers', () => {
	it('signals help at the node where the marker appears', () => {
		const { cli, vms, user } = buildTree();
		const atGroup = cli.parse(['vms', '--help']);
		expect(atGroup).toEqual({ status: 'help', node: vms });
		const atCommand = cli.parse(['user', '-h']);
		expect(atCommand).toEqual({ status: 'help', node: user });
	});

	it('skips the marker when the help handler continues', () => {
		const onHelp = vi.fn((_node: TreeNode): HandlerDirective => 'continue');
		const cli = new CliParser({ onHelp });
		const run = cli.addCommand('run');
		const result = resolved(cli.parse(['-h', 'run']));
		expect(result.command).toBe(run);
		expect(onHelp).toHaveBeenCalledWith(cli);
	});

	it('treats markers as unknown options where help is off', () => {
		const cli = new CliParser({ onHelp: null });
		cli.addCommand('run');
		expect(parseError(() => cli.parse(['-h'])).code).toBe('UnknownOption');
	});

	it('signals no-command when input ends at a group', () => {
		const { cli, vms } = buildTree();
		const outcome = cli.parse(['vms']);
		expect(outcome.status).toBe('no-command');
		if (outcome.status === 'no-command') {
			expect(outcome.node).toBe(vms);
			expect(outcome.result.command).toBeUndefined();
			expect(outcome.result.namespace.toJSON()).toEqual({
				verbose: false,
				'vms.region': 'eu',
			});
		}
	});

	it('signals no-command when only global options are given', () => {
		const { cli } = buildTree();
		const outcome = cli.parse(['-v']);
		expect(outcome.status).toBe('no-command');
		if (outcome.status === 'no-command') {
			expect(outcome.node).toBe(cli);
			expect(outcome.result.commandPath).toBe('');
			expect(outcome.result.namespace.toJSON()).toEqual({ verbose: true });
		}

		const onDefault = vi.fn((_node: TreeNode): HandlerDirective => 'exit');
		const tool = new CliParser({ onDefault });
		tool.addOption({ short: 'v', long: 'verbose' });
		tool.addCommand('run');
		expect(tool.parse(['-v']).status).toBe('exit');
		expect(onDefault).toHaveBeenCalledWith(tool);
	});

	it('uses the nearest default handler', () => {
		const onDefault = vi.fn((_node: TreeNode): HandlerDirective => 'exit');
		const cli = new CliParser();
		const vms = cli.addGroup('vms', { onDefault });
		vms.addGroup('disks');
		const outcome = cli.parse(['vms', 'disks']);
		expect(outcome.status).toBe('exit');
		expect(onDefault).toHaveBeenCalledTimes(1);
		expect(onDefault.mock.calls[0][0].fullName()).toBe('vms.disks');
	});

	it('resolves at the group when the default handler continues', () => {
		const cli = new CliParser({ onDefault: () => 'continue' });
		cli.addGroup('vms');
		const result = resolved(cli.parse(['vms']));
		expect(result.command).toBeUndefined();
		expect(result.commandPath).toBe('');
		expect(result.group.fullName()).toBe('vms');
	});

	it('falls back to the process-wide handler', () => {
		setDefaultNoCommandHandler(() => 'exit');
		const cli = new CliParser();
		cli.addCommand('run');
		expect(cli.parse([]).status).toBe('exit');
	});

	it("runs a command's own default handler only when no input is left", () => {
		const onDefault = vi.fn((_node: TreeNode): HandlerDirective => 'help');
		const cli = new CliParser();
		const show = cli.addCommand('show', { onDefault });
		show.addOption({ long: 'all' });
		expect(cli.parse(['show'])).toEqual({ status: 'help', node: show });
		expect(resolved(cli.parse(['show', '--all'])).options.get('all')).toBe(
			true
		);
		expect(onDefault).toHaveBeenCalledTimes(1);
	});
});

describe('namespace', () => {
	it('looks up exact keys and dotted prefixes', () => {
		const { cli } = buildTree();
		const result = resolved(
			cli.parse(['vms', '--region', 'us', 'instances', 'list', '--limit', '5'])
		);
		const ns = result.namespace;
		expect(ns.lookup('vms.region')).toBe('us');
		const sub = ns.lookup('vms.instances.list');
		expect(sub).toBeInstanceOf(Namespace);
		if (sub instanceof Namespace) {
			expect(sub.toJSON()).toEqual({ long: false, limit: 5 });
		}
		expect(ns.lookup('nope')).toBeUndefined();
		expect(ns.has('verbose')).toBe(true);
		expect(ns.keys()).toEqual([
			'verbose',
			'vms.region',
			'vms.instances.list.long',
			'vms.instances.list.limit',
		]);
	});

	it('serializes bigints as strings', () => {
		expect(String(new Namespace([['a', 1], ['b.c', 2]]))).toBe(
			'{"a":1,"b.c":2}'
		);
		expect(String(new Namespace([['n', 10n]]))).toBe('{"n":"10"}');
	});

	it('converts results to JSON', () => {
		const { cli } = buildTree();
		const result = resolved(
			cli.parse(['vms', 'instances', 'list', 'x'], { partial: true })
		);
		expect(resultToJSON(result)).toEqual({
			command: 'vms.instances.list',
			group: 'vms.instances',
			args: {},
			options: { long: false },
			levels: [{ verbose: false }, { region: 'eu' }, {}, { long: false }],
			namespace: {
				verbose: false,
				'vms.region': 'eu',
				'vms.instances.list.long': false,
			},
			leftover: ['x'],
		});
	});
});
