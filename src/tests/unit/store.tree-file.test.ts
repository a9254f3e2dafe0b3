import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DefinitionError } from '../../core/errors.js';
import type { ParseOutcome } from '../../core/resolve/result.js';
import { defaultScalars } from '../../core/types/scalars.js';
import { formatTypeSpec } from '../../core/types/spec.js';
import {
	buildParser,
	loadTreeFile,
	parseTreeDef,
	toTypeSpec,
} from '../../store/tree-file.js';

const FIXTURE = fileURLToPath(
	new URL('../fixtures/demo-tree.yaml', import.meta.url)
);

let tmp: string;

beforeEach(() => {
	tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'nestargs-tree-'));
});

afterEach(() => {
	fs.rmSync(tmp, { recursive: true, force: true });
});

function namespaceOf(outcome: ParseOutcome) {
	if (outcome.status !== 'resolved') {
		throw new Error(`expected resolved, got ${outcome.status}`);
	}
	return outcome.result.namespace.toJSON();
}

describe('tree definition files', () => {
	it('builds a parser from YAML', () => {
		const parser = loadTreeFile(FIXTURE);
		expect(parser.prog).toBe('demo');
		expect(parser.description).toBe('Demo tool');
		expect(namespaceOf(parser.parse(['vms', 'list']))).toEqual({
			verbose: false,
			'vms.region': 'eu',
			'vms.list.limit': 10,
		});
		expect(namespaceOf(parser.parse('point {x=1,y=2}'))).toEqual({
			verbose: false,
			'point.p': { x: 1, y: 2 },
		});
		expect(namespaceOf(parser.parse(['sum', '[1.5, 2]']))).toEqual({
			verbose: false,
			'sum.values': [1.5, 2],
		});
	});

	it('names the program after a JSON file without prog', () => {
		const file = path.join(tmp, 'mytool.json');
		fs.writeFileSync(file, '{"commands": {"run": {}}}', 'utf8');
		const parser = loadTreeFile(file);
		expect(parser.prog).toBe('mytool');
		expect(parser.commands.map((c) => c.name)).toEqual(['run']);
	});

	it('lets callers override prog and help markers', () => {
		const parser = loadTreeFile(FIXTURE, {
			prog: 'other',
			helpMarkers: ['-?'],
		});
		expect(parser.prog).toBe('other');
		expect(parser.parse(['-?'])).toEqual({ status: 'help', node: parser });
	});

	it('converts type definitions', () => {
		expect(
			formatTypeSpec(toTypeSpec({ array: { struct: { a: 'int' } } }, defaultScalars))
		).toBe('[{a: int}]');
	});

	it('reports schema problems with their path', () => {
		expect(() =>
			parseTreeDef({ commands: { run: { bogus: 1 } } }, 'inline')
		).toThrowError(
			/^Invalid tree definition at inline: commands\.run: Unrecognized key/
		);
	});

	it('reports definition errors from the tree', () => {
		const def = parseTreeDef({
			commands: { run: { arguments: [{ name: 'n', type: 'colour' }] } },
		});
		expect(() => buildParser(def)).toThrowError(DefinitionError);
		expect(() => buildParser(def)).toThrowError(
			"Unknown scalar kind 'colour'"
		);
	});

	it('fails on a missing file', () => {
		const file = path.join(tmp, 'absent.yaml');
		expect(() => loadTreeFile(file)).toThrowError(
			`Tree definition not found: ${file}`
		);
	});
});
