/**
 * World topology and per-room object tables.
 *
 * The dungeon is a fixed, designer-defined graph of three rooms. Exits are
 * one-way edges: a room may lead somewhere without a path back. Rooms never
 * change after startup; only their object slots do.
 *
 * What you get
 * - `ROOM_ID` and the immutable `ROOMS` table
 * - `roomExit()` / `getRoom()` lookups
 * - `RoomObjectTable`: the fixed-capacity slot array each room owns
 *
 * @example
 * ```ts
 * import { ROOM_ID, roomExit, RoomObjectTable } from "./dungeon.js";
 * import { DIRECTION } from "../direction.js";
 * import { ITEM_TYPE } from "./item.js";
 *
 * roomExit(ROOM_ID.NURSERY, DIRECTION.EAST); // ROOM_ID.BUFFET
 * const table = new RoomObjectTable();
 * table.add(ITEM_TYPE.RAM_CHUNK, 4);
 * ```
 *
 * @module core/dungeon
 */

import { DIRECTION } from "../direction.js";
import {
	ITEM_TYPE,
	emptyRoomObject,
	itemName,
	type RoomObject,
} from "./item.js";
import { parseInteger } from "../utils/number.js";

export enum ROOM_ID {
	NURSERY = 0,
	BUFFET = 1,
	FIELDS = 2,
}

export const ROOM_COUNT = 3;
export const ROOM_MAX_OBJECTS = 4;

export interface Room {
	readonly id: ROOM_ID;
	readonly name: string;
	readonly description: string;
	/** Indexed by DIRECTION; undefined means no exit that way. */
	readonly exits: ReadonlyArray<ROOM_ID | undefined>;
}

export const ROOMS: ReadonlyArray<Room> = [
	{
		id: ROOM_ID.NURSERY,
		name: "/proc/nursery",
		description: "Friendly Monster naps amid warm kernel blankets.",
		exits: [undefined, ROOM_ID.BUFFET, undefined, ROOM_ID.FIELDS],
	},
	{
		id: ROOM_ID.BUFFET,
		name: "/tmp/buffet",
		description: "Resource carts roll in and out, piled high with tasty chunks.",
		exits: [undefined, undefined, undefined, ROOM_ID.NURSERY],
	},
	{
		id: ROOM_ID.FIELDS,
		name: "/dev/null/fields",
		description: "Windy plains sweep away unwanted bits and lost daemons.",
		exits: [undefined, ROOM_ID.NURSERY, undefined, undefined],
	},
];

export function isRoomId(value: number): value is ROOM_ID {
	return Number.isInteger(value) && value >= 0 && value < ROOM_COUNT;
}

export function getRoom(id: ROOM_ID): Room {
	return ROOMS[id];
}

/**
 * Destination of the exit leading `dir` out of `from`, if there is one.
 */
export function roomExit(from: ROOM_ID, dir: DIRECTION): ROOM_ID | undefined {
	return ROOMS[from].exits[dir];
}

/**
 * Fixed-size slot array of objects lying in one room.
 * Empty slots hold `ITEM_TYPE.NONE`; slot order is stable so players can
 * refer to objects by their 1-based slot number.
 */
export class RoomObjectTable {
	private readonly slots: RoomObject[];

	constructor(capacity: number = ROOM_MAX_OBJECTS) {
		this.slots = Array.from({ length: capacity }, () => emptyRoomObject());
	}

	get capacity(): number {
		return this.slots.length;
	}

	/** The slot at `index`, empty or not. */
	get(index: number): RoomObject | undefined {
		return this.slots[index];
	}

	/** Every slot, in order, as a snapshot. */
	entries(): ReadonlyArray<Readonly<RoomObject>> {
		return this.slots.map((object) => ({ ...object }));
	}

	firstFreeSlot(): number | undefined {
		const index = this.slots.findIndex((o) => o.type === ITEM_TYPE.NONE);
		return index < 0 ? undefined : index;
	}

	count(): number {
		return this.slots.filter((o) => o.type !== ITEM_TYPE.NONE).length;
	}

	/**
	 * Place a new object in the first free slot.
	 * @returns The stored object, or undefined when the room is full
	 */
	add(type: ITEM_TYPE, ttl: number): RoomObject | undefined {
		const index = this.firstFreeSlot();
		if (index === undefined) return undefined;
		const object = this.slots[index];
		object.type = type;
		object.ttl = ttl;
		object.flags = 0;
		return object;
	}

	clear(index: number): void {
		const object = this.slots[index];
		if (!object) return;
		object.type = ITEM_TYPE.NONE;
		object.ttl = 0;
		object.flags = 0;
	}

	clearAll(): void {
		for (let i = 0; i < this.slots.length; i++) this.clear(i);
	}

	/** Index of the first slot holding `type`. */
	find(type: ITEM_TYPE): number | undefined {
		const index = this.slots.findIndex((o) => o.type === type);
		return index < 0 ? undefined : index;
	}

	/**
	 * Advance every decaying object by one tick. Objects whose ttl reaches
	 * zero evaporate; objects with ttl 0 are permanent.
	 */
	decay(): void {
		for (let i = 0; i < this.slots.length; i++) {
			const object = this.slots[i];
			if (object.type === ITEM_TYPE.NONE || object.ttl === 0) continue;
			object.ttl--;
			if (object.ttl === 0) this.clear(i);
		}
	}

	/**
	 * Resolve a player's token to a slot index.
	 * A 1-based number picks that slot if it is occupied; otherwise the
	 * token is matched as a case-insensitive prefix of an object's name.
	 */
	match(token: string): number | undefined {
		const index = parseInteger(token);
		if (index !== undefined && index >= 1 && index <= this.slots.length) {
			if (this.slots[index - 1].type !== ITEM_TYPE.NONE) return index - 1;
		}

		const needle = token.toLowerCase();
		const found = this.slots.findIndex(
			(o) =>
				o.type !== ITEM_TYPE.NONE && itemName(o.type).toLowerCase().startsWith(needle)
		);
		return found < 0 ? undefined : found;
	}
}
