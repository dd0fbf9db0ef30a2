import {ConfigurationError} from './errors.js';

const UNIT_MS: Record<string, number> = {
	h: 3_600_000,
	m: 60_000,
	s: 1000,
	ms: 1,
	us: 0.001,
};

const SEGMENT = /(\d+(?:\.\d+)?)(h|ms|m|s|us)/g;

/**
 * Parse a compose duration ("1m30s", "500ms", "10s") into milliseconds.
 * Bare numbers are seconds.
 */
export function parseDuration(value: string | number): number {
	if (typeof value === 'number') {
		if (!Number.isFinite(value) || value < 0) {
			throw new ConfigurationError(`Invalid duration: ${value}`);
		}

		return value * 1000;
	}

	const text = value.trim();
	if (/^\d+(?:\.\d+)?$/.test(text)) {
		return Number(text) * 1000;
	}

	let total = 0;
	let consumed = 0;
	for (const match of text.matchAll(SEGMENT)) {
		if (match.index !== consumed) {
			break;
		}

		const [segment, amount, unit] = match;
		total += Number(amount) * (UNIT_MS[unit ?? ''] ?? 0);
		consumed += segment.length;
	}

	if (text.length === 0 || consumed !== text.length) {
		throw new ConfigurationError(`Invalid duration: ${value}`);
	}

	return Math.round(total);
}

export function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${ms}ms`;
	}

	const seconds = ms / 1000;
	return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}
