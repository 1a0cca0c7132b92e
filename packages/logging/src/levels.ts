/**
 * Level table shared by the logger and its config reader.
 */
import type { LevelName, LevelNumber } from './types';

export type { LevelName, LevelNumber };

/** Pino-compatible numbering */
export const levels: Readonly<Record<LevelName, LevelNumber>> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

export function isLevelName(value: string): value is LevelName {
	return Object.prototype.hasOwnProperty.call(levels, value);
}

/**
 * Parse a configured level, ignoring case and surrounding whitespace.
 * Anything that names no level gives undefined.
 */
export function parseLevelName(value: string | undefined): LevelName | undefined {
	const name = value?.trim().toLowerCase();
	return name && isLevelName(name) ? name : undefined;
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}
