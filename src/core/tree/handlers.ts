import type { TreeNode } from './node.js';

/**
 * What a default or help handler wants the resolver to do next.
 * - `continue`: carry on as if the handler had not fired
 * - `exit`: stop; the caller decides what exiting means
 * - `no-command`: stop with the no-command signal
 * - `help`: stop with the help signal
 */
export type HandlerDirective = 'continue' | 'exit' | 'no-command' | 'help';

export type HelpHandler = (node: TreeNode) => HandlerDirective | void;
export type DefaultHandler = (node: TreeNode) => HandlerDirective | void;

const signalHelp: HelpHandler = () => 'help';
const signalNoCommand: DefaultHandler = () => 'no-command';

let processHelpHandler: HelpHandler = signalHelp;
let processDefaultHandler: DefaultHandler = signalNoCommand;

/** Fallback for trees whose nodes define no help handler. */
export function setDefaultHelpHandler(fn: HelpHandler | undefined): void {
	processHelpHandler = fn ?? signalHelp;
}

export function getDefaultHelpHandler(): HelpHandler {
	return processHelpHandler;
}

/** Fallback for trees whose nodes define no default handler. */
export function setDefaultNoCommandHandler(fn: DefaultHandler | undefined): void {
	processDefaultHandler = fn ?? signalNoCommand;
}

export function getDefaultNoCommandHandler(): DefaultHandler {
	return processDefaultHandler;
}
