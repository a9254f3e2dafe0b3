import type { Value } from '../types/spec.js';

/** Immutable ordered key → value mapping with dotted-path lookup. */
export class Namespace implements Iterable<[string, Value]> {
	private readonly map: ReadonlyMap<string, Value>;

	constructor(entries: Iterable<readonly [string, Value]> = []) {
		this.map = new Map(entries);
	}

	get size(): number {
		return this.map.size;
	}

	get(key: string): Value | undefined {
		return this.map.get(key);
	}

	has(key: string): boolean {
		return this.map.has(key);
	}

	/**
	 * Exact key first; otherwise every key under `path.` as a sub-namespace
	 * (`ns.lookup('vms.instances')` holds `list.long`, ...).
	 */
	lookup(path: string): Value | Namespace | undefined {
		if (this.map.has(path)) {
			return this.map.get(path);
		}
		const prefix = `${path}.`;
		const sub: [string, Value][] = [];
		for (const [key, value] of this.map) {
			if (key.startsWith(prefix)) {
				sub.push([key.slice(prefix.length), value]);
			}
		}
		return sub.length ? new Namespace(sub) : undefined;
	}

	keys(): string[] {
		return Array.from(this.map.keys());
	}

	entries(): [string, Value][] {
		return Array.from(this.map.entries());
	}

	[Symbol.iterator](): Iterator<[string, Value]> {
		return this.map.entries();
	}

	toJSON(): Record<string, Value> {
		return Object.fromEntries(this.map);
	}

	toString(): string {
		return JSON.stringify(this.toJSON(), jsonReplacer);
	}
}

/** `JSON.stringify` replacer writing bigints as decimal strings. */
export function jsonReplacer(_key: string, value: unknown): unknown {
	return typeof value === 'bigint' ? value.toString() : value;
}
