import { getLogger } from '../../obs/logger.js';
import { ParseError } from '../errors.js';
import { closestNames, formatSuggestions } from '../suggest.js';
import { type LiteralResult, parseLiteralTokens } from '../types/literal.js';
import { formatTypeSpec, type TypeSpec } from '../types/spec.js';
import type { Command } from '../tree/command.js';
import type { Group } from '../tree/group.js';
import type { HandlerDirective } from '../tree/handlers.js';
import { describeNode, isOptionToken, type TreeNode } from '../tree/node.js';
import type { Option } from '../tree/params.js';
import { buildResult, ValueCollector } from './merge.js';
import type { ParseOutcome } from './result.js';

export interface ResolveOptions {
	/** Keep unrecognized trailing input as leftover tokens instead of failing. */
	partial?: boolean;
}

type State = { at: 'group'; node: Group } | { at: 'command'; node: Command };

function directiveOf(
	returned: HandlerDirective | void,
	fallback: HandlerDirective
): HandlerDirective {
	return typeof returned === 'string' ? returned : fallback;
}

const NEGATIVE_NUMBER_RE = /^-(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

class Resolver {
	private readonly collector = new ValueCollector();
	private readonly traversed: TreeNode[] = [];
	private readonly log = getLogger();
	private i = 0;

	constructor(
		private readonly root: Group,
		private readonly tokens: readonly string[],
		private readonly partial: boolean
	) {}

	run(): ParseOutcome {
		let state: State = { at: 'group', node: this.root };
		this.traversed.push(this.root);
		for (;;) {
			const next: State | ParseOutcome =
				state.at === 'group'
					? this.atGroup(state.node)
					: this.atCommand(state.node);
			if ('status' in next) {
				this.log.debug({
					msg: 'resolve.done',
					status: next.status,
					consumed: this.i,
					total: this.tokens.length,
				});
				return next;
			}
			state = next;
		}
	}

	// Options of this level and above, then one group or command name.
	private atGroup(node: Group): State | ParseOutcome {
		while (this.i < this.tokens.length) {
			const token = this.tokens[this.i];
			if (node.isHelpToken(token)) {
				const out = this.help(node);
				if (out) {
					return out;
				}
				this.i++;
				continue;
			}
			if (isOptionToken(token)) {
				const option = node.findOption(token);
				if (!option) {
					if (this.partial) {
						return this.stopAtGroup(node);
					}
					throw this.unknownOption(node, token);
				}
				this.consumeOption(option, token);
				continue;
			}
			const child = node.child(token);
			if (!child) {
				if (this.partial) {
					return this.stopAtGroup(node);
				}
				const names = node.childNames();
				const suggestions = closestNames(names, token);
				throw new ParseError(
					'UnknownCommand',
					`Unknown command '${token}' under ${describeNode(node)}.${formatSuggestions(suggestions)}`,
					{ tokenIndex: this.i, token, expected: names.join('|'), suggestions }
				);
			}
			this.i++;
			this.traversed.push(child);
			this.log.debug({
				msg: 'resolve.enter',
				kind: child.kind,
				path: child.fullName(),
			});
			return child.kind === 'group'
				? { at: 'group', node: child }
				: { at: 'command', node: child };
		}
		return this.stopAtGroup(node);
	}

	private atCommand(command: Command): ParseOutcome {
		if (this.i >= this.tokens.length && command.onDefault) {
			const directive = directiveOf(command.onDefault(command), 'no-command');
			if (directive !== 'continue') {
				return this.signal(directive, command);
			}
		}
		const args = command.arguments;
		let filled = 0;
		while (this.i < this.tokens.length) {
			const token = this.tokens[this.i];
			if (command.isHelpToken(token)) {
				const out = this.help(command);
				if (out) {
					return out;
				}
				this.i++;
				continue;
			}
			if (isOptionToken(token)) {
				const option = command.findOption(token);
				if (option) {
					this.consumeOption(option, token);
					continue;
				}
				const positional =
					filled < args.length && NEGATIVE_NUMBER_RE.test(token);
				if (!positional) {
					if (this.partial) {
						break;
					}
					throw this.unknownOption(command, token);
				}
			}
			if (filled < args.length) {
				const arg = args[filled];
				const { value, consumed } = this.literal(
					arg.type,
					this.i,
					`argument '${arg.name}'`
				);
				this.collector.addArgument(arg, value);
				this.i += consumed;
				filled++;
				continue;
			}
			if (this.partial) {
				break;
			}
			throw new ParseError(
				'TooManyArguments',
				`${describeNode(command)} takes ${args.length} argument(s); unexpected '${token}'`,
				{ tokenIndex: this.i, token, expected: `${args.length} argument(s)` }
			);
		}
		if (filled < args.length) {
			const missing = args.slice(filled);
			throw new ParseError(
				'MissingArgument',
				`${describeNode(command)} is missing argument(s): ${missing
					.map((a) => `<${a.name}>`)
					.join(' ')}`,
				{
					tokenIndex: this.i,
					expected: `${missing[0].name} <${formatTypeSpec(missing[0].type)}>`,
				}
			);
		}
		return { status: 'resolved', result: this.result(command) };
	}

	private consumeOption(option: Option, token: string): void {
		const at = this.i;
		const type = option.type;
		if (!type) {
			this.collector.setOption(option, true);
			this.i++;
			return;
		}
		if (at + 1 >= this.tokens.length) {
			throw new ParseError(
				'MissingOptionValue',
				`Option '${token}' expects a ${formatTypeSpec(type)} value`,
				{ tokenIndex: at, token, expected: formatTypeSpec(type) }
			);
		}
		const { value, consumed } = this.literal(
			type,
			at + 1,
			`option '${token}'`
		);
		this.collector.setOption(option, value);
		this.i = at + 1 + consumed;
	}

	private literal(
		type: TypeSpec,
		start: number,
		subject: string
	): LiteralResult {
		return parseLiteralTokens(this.tokens, start, type, subject);
	}

	// Input ran out, or the rest became leftover, before a command was named.
	private stopAtGroup(node: Group): ParseOutcome {
		const directive = directiveOf(node.defaultHandler()(node), 'no-command');
		this.log.debug({
			msg: 'resolve.no-command',
			path: node.fullName(),
			directive,
		});
		if (directive === 'continue') {
			return { status: 'resolved', result: this.result(node) };
		}
		return this.signal(directive, node);
	}

	/** `undefined` when the handler lets resolution carry on. */
	private help(node: TreeNode): ParseOutcome | undefined {
		const handler = node.helpHandler();
		const directive = handler ? directiveOf(handler(node), 'help') : 'help';
		if (directive === 'continue') {
			return;
		}
		return this.signal(directive, node);
	}

	private signal(
		directive: Exclude<HandlerDirective, 'continue'>,
		node: TreeNode
	): ParseOutcome {
		switch (directive) {
			case 'help':
				return { status: 'help', node };
			case 'exit':
				return { status: 'exit', node };
			case 'no-command':
				return { status: 'no-command', node, result: this.result(node) };
		}
	}

	private result(stop: TreeNode) {
		return buildResult({
			traversed: this.traversed,
			stop,
			collector: this.collector,
			leftover: this.tokens.slice(this.i),
		});
	}

	private unknownOption(node: TreeNode, token: string): ParseError {
		const known = node.visibleOptions().flatMap((o) => o.label().split('/'));
		const suggestions = closestNames(known, token);
		return new ParseError(
			'UnknownOption',
			`Unknown option '${token}' for ${describeNode(node)}.${formatSuggestions(suggestions)}`,
			{ tokenIndex: this.i, token, expected: 'option', suggestions }
		);
	}
}

/** Walks `tokens` through the tree rooted at `root`. */
export function resolve(
	root: Group,
	tokens: readonly string[],
	opts: ResolveOptions = {}
): ParseOutcome {
	return new Resolver(root, tokens, opts.partial ?? false).run();
}
