/** Human duration strings ("90s", "1h30m", "2d") to and from milliseconds */

const UNIT_MS: Record<string, number> = {
	s: 1000,
	m: 60 * 1000,
	h: 60 * 60 * 1000,
	d: 24 * 60 * 60 * 1000,
	w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Parses one or more `<number><unit>` groups, units s/m/h/d/w.
 * Returns null for anything else, including a zero total.
 *
 * @example
 * parseDuration("1h30m"); // 5400000
 */
export function parseDuration(input: string): number | null {
	const text = input.trim().toLowerCase();
	if (!/^(\d+[smhdw])+$/.test(text)) return null;

	let total = 0;
	for (const match of text.matchAll(/(\d+)([smhdw])/g)) {
		total += parseInt(match[1], 10) * UNIT_MS[match[2]];
	}
	return total > 0 ? total : null;
}

/**
 * Largest two units, e.g. "2d 3h" or "45s".
 */
export function formatDuration(ms: number): string {
	const seconds = Math.max(0, Math.floor(ms / 1000));
	const parts: Array<[number, string]> = [
		[Math.floor(seconds / 86400), "d"],
		[Math.floor((seconds % 86400) / 3600), "h"],
		[Math.floor((seconds % 3600) / 60), "m"],
		[seconds % 60, "s"],
	];

	const shown = parts.filter(([value]) => value > 0).slice(0, 2);
	if (shown.length === 0) return "0s";
	return shown.map(([value, unit]) => `${value}${unit}`).join(" ");
}
