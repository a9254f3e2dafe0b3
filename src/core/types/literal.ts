import {
	LiteralError,
	type LiteralErrorCode,
	type LiteralPosition,
} from '../errors.js';
import { closestNames, formatSuggestions } from '../suggest.js';
import type { ScalarValue } from './scalars.js';
import {
	type ArraySpec,
	FIELD_NAME_RE,
	formatTypeSpec,
	type ScalarSpec,
	type StructSpec,
	type TypeSpec,
	type Value,
} from './spec.js';

/**
 * Character view over `tokens[start..]`. Only the starting token is visible
 * unless `crossing()` holds, in which case a token boundary reads as a single
 * space and the stream moves on to the next token.
 */
class TokenStream {
	private ti: number;
	private off = 0;

	constructor(
		private readonly tokens: readonly string[],
		private readonly start: number,
		private readonly crossing: () => boolean
	) {
		this.ti = start;
	}

	peek(): string | undefined {
		if (this.ti >= this.tokens.length) {
			return;
		}
		const tok = this.tokens[this.ti];
		if (this.off < tok.length) {
			return tok[this.off];
		}
		if (this.crossing() && this.ti + 1 < this.tokens.length) {
			return ' ';
		}
		return;
	}

	next(): string | undefined {
		const c = this.peek();
		if (c === undefined) {
			return;
		}
		if (this.off < this.tokens[this.ti].length) {
			this.off++;
		} else {
			this.ti++;
			this.off = 0;
		}
		return c;
	}

	/** Takes whatever is left of the current token. */
	restOfToken(): string {
		const tok = this.tokens[this.ti] ?? '';
		const rest = tok.slice(this.off);
		this.off = tok.length;
		return rest;
	}

	position(): LiteralPosition {
		return { token: this.ti, offset: this.off };
	}

	tokenAt(pos: LiteralPosition): string | undefined {
		return this.tokens[pos.token];
	}

	consumed(): number {
		return this.ti - this.start + 1;
	}
}

interface ArrayFrame {
	kind: 'array';
	spec: ArraySpec;
	items: Value[];
	open: LiteralPosition;
}

interface StructFrame {
	kind: 'struct';
	spec: StructSpec;
	fields: Map<string, Value>;
	key: string;
	open: LiteralPosition;
}

type Frame = ArrayFrame | StructFrame;

// Either a finished value or the type of the next value to read.
type Step = { done: true; value: Value } | { done: false; next: TypeSpec };

const OPENER = { array: '[', struct: '{' } as const;
const CLOSER = { array: ']', struct: '}' } as const;
const SPACE_RE = /\s/;

/** Strips one pair of wrapping quotes; `\` escapes only inside quotes. */
function unquote(raw: string): string {
	const t = raw.trim();
	const q = t[0];
	if (t.length >= 2 && (q === '"' || q === "'") && t[t.length - 1] === q) {
		return unescape(t.slice(1, -1));
	}
	return t;
}

function unescape(s: string): string {
	return s.replace(/\\(.)/gs, '$1');
}

class LiteralParser {
	private readonly stack: Frame[] = [];
	private readonly stream: TokenStream;

	constructor(
		tokens: readonly string[],
		start: number,
		private readonly subject: string
	) {
		this.stream = new TokenStream(
			tokens,
			start,
			() => this.stack.length > 0
		);
	}

	run(spec: TypeSpec): LiteralResult {
		let expected = spec;
		for (;;) {
			const begun = this.begin(expected);
			if (!begun.done) {
				expected = begun.next;
				continue;
			}
			const reduced = this.reduce(begun.value);
			if (reduced.done) {
				this.finish();
				return { value: reduced.value, consumed: this.stream.consumed() };
			}
			expected = reduced.next;
		}
	}

	private begin(spec: TypeSpec): Step {
		const top = this.stack.at(-1);
		if (top) {
			this.skipSpace();
			const c = this.stream.peek();
			if (c === undefined) {
				throw this.unterminated(top);
			}
			if (c === ',' || c === ']' || c === '}') {
				throw this.malformed(
					`expected a value before '${c}'`,
					this.stream.position()
				);
			}
		}
		switch (spec.kind) {
			case 'scalar':
				return { done: true, value: this.readScalar(spec, !!top) };
			case 'array':
			case 'struct':
				return this.open(spec);
		}
	}

	// Folds a finished value into the enclosing frames until one needs more input.
	private reduce(value: Value): Step {
		let current = value;
		for (;;) {
			const top = this.stack.at(-1);
			if (!top) {
				return { done: true, value: current };
			}
			if (top.kind === 'array') {
				top.items.push(current);
			} else {
				top.fields.set(top.key, current);
			}
			this.skipSpace();
			const pos = this.stream.position();
			const c = this.stream.next();
			if (c === ',') {
				return {
					done: false,
					next:
						top.kind === 'array'
							? top.spec.element
							: this.readKey(top),
				};
			}
			if (c === CLOSER[top.kind]) {
				this.stack.pop();
				current = this.close(top, pos);
				continue;
			}
			if (c === undefined) {
				throw this.unterminated(top);
			}
			throw this.malformed(
				`unexpected '${c}' (expected ',' or '${CLOSER[top.kind]}')`,
				pos
			);
		}
	}

	private open(spec: ArraySpec | StructSpec): Step {
		this.skipSpace();
		const pos = this.stream.position();
		const opener = OPENER[spec.kind];
		if (this.stream.peek() !== opener) {
			throw this.invalid(
				`expected ${spec.kind} literal '${opener}...${CLOSER[spec.kind]}'`,
				pos,
				spec
			);
		}
		this.stream.next();
		if (spec.kind === 'array') {
			this.stack.push({ kind: 'array', spec, items: [], open: pos });
			this.skipSpace();
			if (this.stream.peek() === ']') {
				this.stream.next();
				this.stack.pop();
				return { done: true, value: [] };
			}
			return { done: false, next: spec.element };
		}
		const frame: StructFrame = {
			kind: 'struct',
			spec,
			fields: new Map(),
			key: '',
			open: pos,
		};
		this.stack.push(frame);
		this.skipSpace();
		if (this.stream.peek() === '}') {
			const closePos = this.stream.position();
			this.stream.next();
			this.stack.pop();
			return { done: true, value: this.close(frame, closePos) };
		}
		return { done: false, next: this.readKey(frame) };
	}

	private readScalar(spec: ScalarSpec, nested: boolean): ScalarValue {
		const pos = this.stream.position();
		let text: string;
		if (nested) {
			const c = this.stream.peek();
			if (c === '[' || c === '{') {
				throw this.invalid(
					`expected ${spec.name}, found '${c}'`,
					pos,
					spec
				);
			}
			text = unquote(this.readDelimited());
		} else {
			text = unquote(this.stream.restOfToken());
		}
		let value: ScalarValue | undefined;
		try {
			value = spec.coerce(text);
		} catch (e) {
			const err = this.invalid(
				`'${text}' is not a valid ${spec.name}`,
				pos,
				spec
			);
			err.cause = e;
			throw err;
		}
		if (value === undefined) {
			throw this.invalid(
				`'${text}' is not a valid ${spec.name}`,
				pos,
				spec
			);
		}
		return value;
	}

	// Raw scalar text up to the next unquoted ',', ']' or '}'.
	private readDelimited(): string {
		let raw = '';
		let quote: string | undefined;
		let quotePos: LiteralPosition | undefined;
		for (;;) {
			const pos = this.stream.position();
			const c = this.stream.peek();
			if (c === undefined) {
				if (quote && quotePos) {
					throw this.malformed(
						`unterminated ${quote} quote at token ${quotePos.token}, offset ${quotePos.offset}`,
						quotePos
					);
				}
				return raw;
			}
			if (!quote) {
				if (c === ',' || c === ']' || c === '}') {
					return raw;
				}
				if (c === '[' || c === '{') {
					throw this.malformed(`unexpected '${c}' inside a value`, pos);
				}
			}
			this.stream.next();
			raw += c;
			if (quote && c === '\\') {
				const escaped = this.stream.next();
				if (escaped !== undefined) {
					raw += escaped;
				}
			} else if (quote) {
				if (c === quote) {
					quote = undefined;
				}
			} else if (c === '"' || c === "'") {
				quote = c;
				quotePos = pos;
			}
		}
	}

	private readKey(frame: StructFrame): TypeSpec {
		this.skipSpace();
		const pos = this.stream.position();
		let raw = '';
		for (;;) {
			const c = this.stream.peek();
			if (c === undefined) {
				throw this.unterminated(frame);
			}
			if (c === '=' || c === ':') {
				break;
			}
			if (c === ',' || c === '}' || c === ']' || c === '[' || c === '{') {
				throw this.malformed(
					raw.trim()
						? `expected '=' after field '${raw.trim()}'`
						: 'expected a field name',
					this.stream.position()
				);
			}
			raw += c;
			this.stream.next();
		}
		this.stream.next();
		const key = raw.trim();
		if (!FIELD_NAME_RE.test(key)) {
			throw this.malformed(`invalid field name '${key}'`, pos);
		}
		const field = frame.spec.fields.get(key);
		if (!field) {
			const known = Array.from(frame.spec.fields.keys());
			const hint = formatSuggestions(closestNames(known, key));
			throw this.fieldError(
				'UnknownField',
				`unknown field '${key}' (fields: ${known.join(', ') || 'none'})${hint ? `.${hint}` : ''}`,
				pos,
				frame.spec
			);
		}
		if (frame.fields.has(key)) {
			throw this.fieldError(
				'DuplicateField',
				`field '${key}' is given more than once`,
				pos,
				frame.spec
			);
		}
		frame.key = key;
		return field;
	}

	private close(frame: Frame, pos: LiteralPosition): Value {
		if (frame.kind === 'array') {
			return frame.items;
		}
		const entries: [string, Value][] = [];
		const missing: string[] = [];
		for (const [name, field] of frame.spec.fields) {
			const v = frame.fields.get(name);
			if (v === undefined && field.kind === 'array') {
				// an omitted list field is an empty list
				entries.push([name, []]);
			} else if (v === undefined) {
				missing.push(name);
			} else {
				entries.push([name, v]);
			}
		}
		if (missing.length) {
			throw this.fieldError(
				'MissingField',
				`missing field${missing.length > 1 ? 's' : ''} ${missing.map((m) => `'${m}'`).join(', ')}`,
				pos,
				frame.spec
			);
		}
		return Object.fromEntries(entries);
	}

	private finish(): void {
		this.skipSpace();
		const pos = this.stream.position();
		if (this.stream.peek() !== undefined) {
			throw this.malformed(
				`unexpected trailing text '${this.stream.restOfToken()}'`,
				pos
			);
		}
	}

	private skipSpace(): void {
		for (;;) {
			const c = this.stream.peek();
			if (c === undefined || !SPACE_RE.test(c)) {
				return;
			}
			this.stream.next();
		}
	}

	private unterminated(frame: Frame): LiteralError {
		const opener = OPENER[frame.kind];
		return this.malformed(
			`unterminated '${opener}' opened at token ${frame.open.token}, offset ${frame.open.offset}`,
			frame.open,
			CLOSER[frame.kind]
		);
	}

	private malformed(
		message: string,
		pos: LiteralPosition,
		expected?: string
	): LiteralError {
		return new LiteralError(
			'MalformedLiteral',
			`${this.subject}: ${message}`,
			pos,
			{ token: this.stream.tokenAt(pos), expected }
		);
	}

	private invalid(
		message: string,
		pos: LiteralPosition,
		spec: TypeSpec
	): LiteralError {
		return new LiteralError('InvalidValue', `${this.subject}: ${message}`, pos, {
			token: this.stream.tokenAt(pos),
			expected: formatTypeSpec(spec),
		});
	}

	private fieldError(
		code: Extract<
			LiteralErrorCode,
			'UnknownField' | 'MissingField' | 'DuplicateField'
		>,
		message: string,
		pos: LiteralPosition,
		spec: StructSpec
	): LiteralError {
		return new LiteralError(code, `${this.subject}: ${message}`, pos, {
			token: this.stream.tokenAt(pos),
			expected: formatTypeSpec(spec),
		});
	}
}

export interface LiteralResult {
	value: Value;
	/** Raw tokens the literal spanned, counting the first. */
	consumed: number;
}

/**
 * Parses the literal that starts at `tokens[start]`. An open bracket or brace
 * carries the literal over into the following tokens.
 */
export function parseLiteralTokens(
	tokens: readonly string[],
	start: number,
	spec: TypeSpec,
	subject = 'literal'
): LiteralResult {
	if (start < 0 || start >= tokens.length) {
		throw new RangeError(
			`Literal start ${start} is outside the ${tokens.length} token(s)`
		);
	}
	return new LiteralParser(tokens, start, subject).run(spec);
}

export function parseLiteral(
	text: string,
	spec: TypeSpec,
	subject?: string
): Value {
	return parseLiteralTokens([text], 0, spec, subject).value;
}
