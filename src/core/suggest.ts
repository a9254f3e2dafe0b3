function levenshtein(a: string, b: string): number {
	const m = a.length;
	const n = b.length;
	let prev: number[] = Array.from({ length: n + 1 }, (_, j) => j);
	for (let i = 1; i <= m; i++) {
		const cur: number[] = [i];
		for (let j = 1; j <= n; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			cur.push(
				Math.min(
					prev[j] + 1, // deletion
					cur[j - 1] + 1, // insertion
					prev[j - 1] + cost // substitution
				)
			);
		}
		prev = cur;
	}
	return prev[n];
}

/**
 * Closest candidates to `target`, nearest first. Candidates further away than
 * half the target's length (min 2) are not worth suggesting.
 */
export function closestNames(
	candidates: Iterable<string>,
	target: string,
	limit = 3
): string[] {
	const maxDistance = Math.max(2, Math.floor(target.length / 2));
	const scored = Array.from(new Set(candidates))
		.map((key) => ({
			key,
			d: levenshtein(key.toLowerCase(), target.toLowerCase()),
		}))
		.filter((s) => s.d <= maxDistance)
		.sort((x, y) => x.d - y.d || x.key.localeCompare(y.key));
	return scored.slice(0, limit).map((s) => s.key);
}

export function formatSuggestions(suggestions: string[]): string {
	return suggestions.length
		? ` Did you mean: ${suggestions.join(', ')}?`
		: '';
}
