import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

function readVersion(): string | null {
	const file = fileURLToPath(new URL('../../package.json', import.meta.url));
	const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
	return typeof pkg === 'object' &&
		pkg !== null &&
		'version' in pkg &&
		typeof pkg.version === 'string'
		? pkg.version
		: null;
}

export const VERSION = readVersion();

export function getBuildInfo() {
	const platform = `${process.platform} ${process.arch}`;

	const commit =
		process.env.GIT_COMMIT || process.env.GITHUB_SHA || 'dev';

	const buildDate = process.env.BUILD_DATE || new Date().toISOString();

	return {
		version: VERSION,
		nodeVersion: process.versions.node,
		platform,
		commit,
		buildDate,
	};
}

export function formatBuildInfo() {
	const i = getBuildInfo();
	return [
		`nestargs v${i.version ?? '0.0.0'}`,
		`Runtime: Node.js v${i.nodeVersion}`,
		`Platform: ${i.platform}`,
		`Build: ${i.commit} @ ${i.buildDate}`,
	].join('\n');
}
