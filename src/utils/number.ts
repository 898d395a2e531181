/**
 * Number utility functions.
 *
 * Helpers for keeping simulation stats inside their declared ranges.
 *
 * @module utils/number
 */

/**
 * Clamp a number into the inclusive range [min, max].
 *
 * @example
 * ```typescript
 * clamp(120, 0, 100); // 100
 * clamp(-3, 0, 10);   // 0
 * clamp(4, 0, 10);    // 4
 * ```
 */
export function clamp(value: number, min: number, max: number): number {
	if (value < min) return min;
	if (value > max) return max;
	return value;
}

/**
 * Parse a base-10 integer token the way a player would type one.
 * Accepts an optional sign; anything else returns undefined.
 *
 * @example
 * ```typescript
 * parseInteger("2");   // 2
 * parseInteger("+3");  // 3
 * parseInteger("2a");  // undefined
 * ```
 */
export function parseInteger(token: string): number | undefined {
	if (!/^[+-]?\d+$/.test(token)) return undefined;
	return Number.parseInt(token, 10);
}

/**
 * Format a signed delta with an explicit sign.
 *
 * @example
 * ```typescript
 * formatDelta(2);  // "+2"
 * formatDelta(-2); // "-2"
 * ```
 */
export function formatDelta(value: number): string {
	return value >= 0 ? `+${value}` : `${value}`;
}
