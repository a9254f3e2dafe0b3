import { DefinitionError } from '../errors.js';
import {
	type Coercion,
	defaultScalars,
	type ScalarRegistry,
	type ScalarValue,
} from './scalars.js';

export interface ScalarSpec {
	readonly kind: 'scalar';
	readonly name: string;
	readonly coerce: Coercion;
}

export interface ArraySpec {
	readonly kind: 'array';
	readonly element: TypeSpec;
}

export interface StructSpec {
	readonly kind: 'struct';
	/** Declared field order is the map's insertion order. */
	readonly fields: ReadonlyMap<string, TypeSpec>;
}

export type TypeSpec = ScalarSpec | ArraySpec | StructSpec;

export type Value = ScalarValue | Value[] | { [field: string]: Value };

export type StructValue = { [field: string]: Value };

export const FIELD_NAME_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export function scalar(
	kind: string,
	registry: ScalarRegistry = defaultScalars
): ScalarSpec {
	const resolved = registry.resolve(kind);
	const spec: ScalarSpec = {
		kind: 'scalar',
		name: resolved.name,
		coerce: resolved.coerce,
	};
	return Object.freeze(spec);
}

export function array(element: TypeSpec): ArraySpec {
	const spec: ArraySpec = { kind: 'array', element };
	return Object.freeze(spec);
}

export function struct(
	fields:
		| Readonly<Record<string, TypeSpec>>
		| Iterable<readonly [string, TypeSpec]>
): StructSpec {
	const pairs: Iterable<readonly [string, TypeSpec]> = isPairIterable(fields)
		? fields
		: Object.entries(fields);
	const map = new Map<string, TypeSpec>();
	for (const [name, field] of pairs) {
		if (!FIELD_NAME_RE.test(name)) {
			throw new DefinitionError(
				'InvalidDefinition',
				`Invalid struct field name '${name}'`
			);
		}
		if (map.has(name)) {
			throw new DefinitionError(
				'DuplicateName',
				`Struct field '${name}' is declared twice`
			);
		}
		map.set(name, field);
	}
	const spec: StructSpec = { kind: 'struct', fields: map };
	return Object.freeze(spec);
}

function isPairIterable(
	x: Readonly<Record<string, TypeSpec>> | Iterable<readonly [string, TypeSpec]>
): x is Iterable<readonly [string, TypeSpec]> {
	return Symbol.iterator in x;
}

// Work items for the iterative renderers: literal text, or a part to expand.
type FormatItem = string | TypeSpec;
type RenderItem = string | { value: Value; spec: TypeSpec };

function pushReversed<T>(work: T[], items: readonly T[]): void {
	for (let k = items.length - 1; k >= 0; k--) {
		work.push(items[k]);
	}
}

export function formatTypeSpec(spec: TypeSpec): string {
	const out: string[] = [];
	const work: FormatItem[] = [spec];
	for (let item = work.pop(); item !== undefined; item = work.pop()) {
		if (typeof item === 'string') {
			out.push(item);
			continue;
		}
		switch (item.kind) {
			case 'scalar':
				out.push(item.name);
				break;
			case 'array':
				out.push('[');
				work.push(']', item.element);
				break;
			case 'struct': {
				const parts: FormatItem[] = ['{'];
				for (const [name, field] of item.fields) {
					if (parts.length > 1) {
						parts.push(', ');
					}
					parts.push(`${name}: `, field);
				}
				parts.push('}');
				pushReversed(work, parts);
				break;
			}
			default:
				return assertNever(item);
		}
	}
	return out.join('');
}

const NEEDS_QUOTES = /[\s,[\]{}=:"'\\]/;

function renderScalar(value: Value): string {
	if (typeof value === 'string') {
		if (value === '' || NEEDS_QUOTES.test(value)) {
			return `"${value.replace(/[\\"]/g, '\\$&')}"`;
		}
		return value;
	}
	if (Object.is(value, -0)) {
		return '-0';
	}
	return String(value);
}

/** Canonical literal text for `value`; parses back to the same value. */
export function renderValue(value: Value, spec: TypeSpec): string {
	const out: string[] = [];
	const work: RenderItem[] = [{ value, spec }];
	for (let item = work.pop(); item !== undefined; item = work.pop()) {
		if (typeof item === 'string') {
			out.push(item);
			continue;
		}
		const { value: v, spec: s } = item;
		switch (s.kind) {
			case 'scalar':
				out.push(renderScalar(v));
				break;
			case 'array': {
				if (!Array.isArray(v)) {
					throw new TypeError(`Expected an array for ${formatTypeSpec(s)}`);
				}
				const parts: RenderItem[] = ['['];
				for (const element of v) {
					if (parts.length > 1) {
						parts.push(',');
					}
					parts.push({ value: element, spec: s.element });
				}
				parts.push(']');
				pushReversed(work, parts);
				break;
			}
			case 'struct': {
				if (!isStructValue(v)) {
					throw new TypeError(`Expected a struct for ${formatTypeSpec(s)}`);
				}
				const parts: RenderItem[] = ['{'];
				for (const [name, field] of s.fields) {
					const fieldValue = v[name];
					if (fieldValue === undefined) {
						continue;
					}
					if (parts.length > 1) {
						parts.push(',');
					}
					parts.push(`${name}=`, { value: fieldValue, spec: field });
				}
				parts.push('}');
				pushReversed(work, parts);
				break;
			}
			default:
				return assertNever(s);
		}
	}
	return out.join('');
}

export function isStructValue(value: Value): value is StructValue {
	return typeof value === 'object' && !Array.isArray(value);
}

export function assertNever(x: never): never {
	throw new Error(`Unexpected type spec: ${JSON.stringify(x)}`);
}
