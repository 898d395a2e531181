/**
 * Items that appear in rooms and inventories.
 *
 * The item set is closed: resources the Monster eats (feed class), junk that
 * hurts it, and stray baby daemons that must be rescued rather than carried.
 *
 * @module core/item
 */

export enum ITEM_TYPE {
	NONE = 0,
	RAM_CHUNK,
	IO_TOKEN,
	CPU_SLICE,
	JUNK_DATA,
	BABY_DAEMON,
}

/** Bit flags carried by room objects and held items. */
export enum ITEM_FLAG {
	IDENTIFIED = 1 << 0,
	MUTATED = 1 << 1,
}

/**
 * An item held in an actor's inventory slot.
 * An empty slot holds `ITEM_TYPE.NONE` with no flags.
 */
export interface HeldItem {
	type: ITEM_TYPE;
	flags: number;
}

/**
 * An item lying in a room slot.
 * `ttl` counts the ticks left before it evaporates; 0 never decays.
 */
export interface RoomObject extends HeldItem {
	ttl: number;
}

const ITEM_NAMES: ReadonlyMap<ITEM_TYPE, string> = new Map([
	[ITEM_TYPE.NONE, "nothing"],
	[ITEM_TYPE.RAM_CHUNK, "RAM chunk"],
	[ITEM_TYPE.IO_TOKEN, "IO token"],
	[ITEM_TYPE.CPU_SLICE, "CPU slice"],
	[ITEM_TYPE.JUNK_DATA, "junk data"],
	[ITEM_TYPE.BABY_DAEMON, "baby daemon"],
]);

export function itemName(type: ITEM_TYPE): string {
	return ITEM_NAMES.get(type) ?? "nothing";
}

export function isFeed(type: ITEM_TYPE): boolean {
	return (
		type === ITEM_TYPE.RAM_CHUNK ||
		type === ITEM_TYPE.IO_TOKEN ||
		type === ITEM_TYPE.CPU_SLICE
	);
}

export function isJunk(type: ITEM_TYPE): boolean {
	return type === ITEM_TYPE.JUNK_DATA;
}

export function hasFlag(item: HeldItem, flag: ITEM_FLAG): boolean {
	return (item.flags & flag) !== 0;
}

export function emptyHeldItem(): HeldItem {
	return { type: ITEM_TYPE.NONE, flags: 0 };
}

export function emptyRoomObject(): RoomObject {
	return { type: ITEM_TYPE.NONE, ttl: 0, flags: 0 };
}
