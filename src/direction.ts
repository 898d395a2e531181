/**
 * Direction utilities for movement between rooms.
 *
 * This module provides:
 * - Direction enum (values double as indices into a room's exit table)
 * - Direction-to-text and text-to-direction conversion utilities
 *
 * @module direction
 */

/**
 * Enum for handling directional movement between rooms.
 *
 * @example
 * ```typescript
 * import { DIRECTION } from "./direction.js";
 *
 * const destination = room.exits[DIRECTION.EAST];
 * ```
 */
export enum DIRECTION {
	NORTH = 0,
	EAST = 1,
	SOUTH = 2,
	WEST = 3,
}

/**
 * All directions in exit-table order (north, east, south, west).
 */
export const DIRECTIONS: ReadonlyArray<DIRECTION> = [
	DIRECTION.NORTH,
	DIRECTION.EAST,
	DIRECTION.SOUTH,
	DIRECTION.WEST,
];

const DIR2TEXT: ReadonlyMap<DIRECTION, string> = new Map([
	[DIRECTION.NORTH, "north"],
	[DIRECTION.EAST, "east"],
	[DIRECTION.SOUTH, "south"],
	[DIRECTION.WEST, "west"],
]);

const TEXT2DIR: ReadonlyMap<string, DIRECTION> = new Map([
	["n", DIRECTION.NORTH],
	["north", DIRECTION.NORTH],
	["e", DIRECTION.EAST],
	["east", DIRECTION.EAST],
	["s", DIRECTION.SOUTH],
	["south", DIRECTION.SOUTH],
	["w", DIRECTION.WEST],
	["west", DIRECTION.WEST],
]);

/**
 * Full lowercase name of a direction.
 *
 * @example
 * ```typescript
 * dir2text(DIRECTION.WEST); // "west"
 * ```
 */
export function dir2text(dir: DIRECTION): string {
	return DIR2TEXT.get(dir) ?? "?";
}

/**
 * Parse a direction name or its one-letter abbreviation.
 * Matching is exact and lowercase, the way players type it.
 *
 * @example
 * ```typescript
 * text2dir("e");     // DIRECTION.EAST
 * text2dir("south"); // DIRECTION.SOUTH
 * text2dir("up");    // undefined
 * ```
 */
export function text2dir(text: string): DIRECTION | undefined {
	return TEXT2DIR.get(text);
}
