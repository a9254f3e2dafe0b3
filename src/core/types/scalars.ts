import { DefinitionError } from '../errors.js';

export type ScalarValue = string | number | boolean | bigint;

/** Converts trimmed, unquoted text; `undefined` rejects it. */
export type Coercion = (text: string) => ScalarValue | undefined;

export interface ScalarKind {
	name: string;
	coerce: Coercion;
}

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

export const coerceString: Coercion = (text) => text;

export const coerceInt: Coercion = (text) => {
	if (!INT_RE.test(text)) {
		return;
	}
	const n = Number.parseInt(text, 10);
	return Number.isSafeInteger(n) ? n : undefined;
};

export const coerceFloat: Coercion = (text) => {
	if (!FLOAT_RE.test(text)) {
		return;
	}
	const n = Number(text);
	return Number.isFinite(n) ? n : undefined;
};

export const coerceBool: Coercion = (text) => {
	const t = text.toLowerCase();
	if (TRUE_WORDS.has(t)) {
		return true;
	}
	if (FALSE_WORDS.has(t)) {
		return false;
	}
	return;
};

export class ScalarRegistry {
	private readonly byName = new Map<string, ScalarKind>();

	register(
		name: string,
		coerce: Coercion,
		opts: { aliases?: string[] } = {}
	): ScalarKind {
		const kind: ScalarKind = { name, coerce };
		for (const key of [name, ...(opts.aliases ?? [])]) {
			if (!key.trim()) {
				throw new DefinitionError(
					'InvalidDefinition',
					'Scalar kind name must be non-empty'
				);
			}
			if (this.byName.has(key)) {
				throw new DefinitionError(
					'DuplicateName',
					`Scalar kind '${key}' is already registered`
				);
			}
		}
		for (const key of [name, ...(opts.aliases ?? [])]) {
			this.byName.set(key, kind);
		}
		return kind;
	}

	get(name: string): ScalarKind | undefined {
		return this.byName.get(name);
	}

	resolve(name: string): ScalarKind {
		const kind = this.byName.get(name);
		if (!kind) {
			throw new DefinitionError(
				'InvalidDefinition',
				`Unknown scalar kind '${name}' (known: ${this.names().join(', ')})`
			);
		}
		return kind;
	}

	/** Canonical kind names, aliases excluded. */
	names(): string[] {
		const out: string[] = [];
		for (const kind of this.byName.values()) {
			if (!out.includes(kind.name)) {
				out.push(kind.name);
			}
		}
		return out;
	}

	clone(): ScalarRegistry {
		const copy = new ScalarRegistry();
		for (const [key, kind] of this.byName) {
			copy.byName.set(key, kind);
		}
		return copy;
	}
}

export function createScalarRegistry(): ScalarRegistry {
	const reg = new ScalarRegistry();
	reg.register('string', coerceString, { aliases: ['str', 'text'] });
	reg.register('int', coerceInt, { aliases: ['integer'] });
	reg.register('float', coerceFloat, { aliases: ['number'] });
	reg.register('bool', coerceBool, { aliases: ['boolean'] });
	return reg;
}

export const defaultScalars = createScalarRegistry();
