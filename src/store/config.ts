import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigZ, formatZodIssues, type NestArgsConfig } from './schema.js';

export type ConfigUnknown = Record<string, unknown>;

const CONFIG_DIRNAME = '.nestargs';
const CONFIG_FILENAMES = ['config.yaml', 'config.yml', 'config.json'];

export interface ConfigLocations {
	cwd?: string;
	/** Overrides the home directory (tests). */
	homeDir?: string;
}

export interface LoadResult {
	userPath?: string;
	projectPath?: string;
	config: NestArgsConfig;
}

export function getUserConfigDir(homeDir = os.homedir()): string {
	return path.join(homeDir, CONFIG_DIRNAME);
}

export function getProjectConfigDir(cwd = process.cwd()): string {
	return path.join(cwd, CONFIG_DIRNAME);
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
	return !!x && typeof x === 'object' && !Array.isArray(x);
}

/** Reads a YAML or JSON document; `undefined` when the file is absent. */
export function readDocument(filePath: string): unknown {
	if (!fs.existsSync(filePath)) {
		return;
	}
	const raw = fs.readFileSync(filePath, 'utf8');
	if (filePath.endsWith('.json')) {
		return JSON.parse(raw);
	}
	return YAML.parse(raw) ?? null;
}

function readMaybe(filePath: string): ConfigUnknown | undefined {
	const data = readDocument(filePath);
	if (data === undefined) {
		return;
	}
	// an empty YAML file parses to null
	if (data === null) {
		return {};
	}
	if (!isPlainObject(data)) {
		throw new Error(`Invalid config at ${filePath}: expected a mapping`);
	}
	return data;
}

function findFirstExisting(baseDir: string): {
	path?: string;
	data?: ConfigUnknown;
} {
	for (const name of CONFIG_FILENAMES) {
		const p = path.join(baseDir, name);
		const data = readMaybe(p);
		if (data) {
			return { path: p, data };
		}
	}
	return {};
}

// rhs overrides lhs; arrays replaced by rhs; plain objects merged recursively.
export function deepMerge(lhs: ConfigUnknown, rhs: ConfigUnknown): ConfigUnknown {
	const out: ConfigUnknown = { ...lhs };
	for (const [k, v] of Object.entries(rhs)) {
		const lv = out[k];
		out[k] = isPlainObject(lv) && isPlainObject(v) ? deepMerge(lv, v) : v;
	}
	return out;
}

/** User config first, project config over it. */
export function loadConfig(opts: ConfigLocations = {}): LoadResult {
	const { path: userPath, data: user } = findFirstExisting(
		getUserConfigDir(opts.homeDir)
	);
	const { path: projectPath, data: project } = findFirstExisting(
		getProjectConfigDir(opts.cwd)
	);

	let merged: ConfigUnknown = {};
	if (user) {
		merged = deepMerge(merged, user);
	}
	if (project) {
		merged = deepMerge(merged, project);
	}

	const parsed = ConfigZ.safeParse(merged);
	if (!parsed.success) {
		const where = [userPath, projectPath].filter(Boolean).join(', ');
		throw new Error(
			`Invalid config (${where}): ${formatZodIssues(parsed.error)}`
		);
	}
	return { userPath, projectPath, config: parsed.data };
}
