import { LiteralError } from './errors.js';

const GROUP_CLOSE: Record<string, string> = { '[': ']', '{': '}' };

/**
 * Splits a command line on whitespace. Outside brackets, quotes ("..." or
 * '...') and the escapes \" \' \\ are resolved here; text inside `[...]` or
 * `{...}` is kept verbatim so the literal parser sees its quotes. Unbalanced
 * brackets are left for the literal parser to report.
 */
export function tokenize(input: string): string[] {
	const out: string[] = [];
	let cur = '';
	let started = false; // distinguishes "" from no token
	let quote: '"' | "'" | null = null;
	let quoteAt = 0;
	let quoteOffset = 0;
	let esc = false;
	const groups: string[] = [];
	for (let i = 0; i < input.length; i++) {
		const ch = input[i];
		if (groups.length) {
			cur += ch;
			if (esc) {
				esc = false;
			} else if (ch === '\\') {
				esc = true;
			} else if (quote) {
				if (ch === quote) {
					quote = null;
				}
			} else if (ch === '"' || ch === "'") {
				quote = ch;
				quoteAt = i;
				quoteOffset = cur.length - 1;
			} else if (ch === groups[groups.length - 1]) {
				groups.pop();
			} else if (GROUP_CLOSE[ch]) {
				groups.push(GROUP_CLOSE[ch]);
			}
			continue;
		}
		if (esc) {
			cur += ch;
			esc = false;
			continue;
		}
		if (ch === '\\') {
			esc = true;
			started = true;
			continue;
		}
		if (quote) {
			if (ch === quote) {
				quote = null;
			} else {
				cur += ch;
			}
			continue;
		}
		if (ch === '"' || ch === "'") {
			quote = ch;
			quoteAt = i;
			quoteOffset = cur.length;
			started = true;
			continue;
		}
		if (/\s/.test(ch)) {
			if (started) {
				out.push(cur);
				cur = '';
				started = false;
			}
			continue;
		}
		if (GROUP_CLOSE[ch]) {
			groups.push(GROUP_CLOSE[ch]);
		}
		cur += ch;
		started = true;
	}
	if (quote) {
		throw new LiteralError(
			'MalformedLiteral',
			`Unterminated ${quote} quote at character ${quoteAt}`,
			{ token: out.length, offset: quoteOffset }
		);
	}
	if (esc && !groups.length) {
		throw new LiteralError(
			'MalformedLiteral',
			'Dangling escape at end of input',
			{ token: out.length, offset: cur.length }
		);
	}
	if (started) {
		out.push(cur);
	}
	return out;
}
