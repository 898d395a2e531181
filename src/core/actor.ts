/**
 * Player-controlled actors.
 *
 * An actor is created by a session's first successful `login` and destroyed
 * with that session. The world keeps actors in an id-keyed arena; rooms only
 * hold actor ids, so removing an actor never leaves a dangling reference.
 *
 * @module core/actor
 */
import { ITEM_TYPE, emptyHeldItem, type HeldItem } from "./item.js";
import { parseInteger } from "../utils/number.js";
import type { ROOM_ID } from "./dungeon.js";

export const INVENTORY_SLOTS = 3;
export const MAX_NAME_BYTES = 24;
export const DEFAULT_HP = 5;

/**
 * Cut a display name down to `maxBytes` of UTF-8 without splitting a
 * character.
 *
 * @example
 * ```ts
 * truncateName("a".repeat(30)); // 24 characters
 * ```
 */
export function truncateName(name: string, maxBytes: number = MAX_NAME_BYTES): string {
	let result = "";
	let bytes = 0;
	for (const char of name) {
		const size = Buffer.byteLength(char, "utf8");
		if (bytes + size > maxBytes) break;
		result += char;
		bytes += size;
	}
	return result;
}

export interface ActorOptions {
	id: number;
	name: string;
	roomId: ROOM_ID;
}

export class Actor {
	readonly id: number;
	readonly name: string;
	roomId: ROOM_ID;
	hp: number = DEFAULT_HP;
	readonly inventory: HeldItem[];
	/** 0-based index of the slot `sel` and argument-less commands refer to. */
	selectedSlot = 0;

	constructor(options: ActorOptions) {
		this.id = options.id;
		this.name = truncateName(options.name);
		this.roomId = options.roomId;
		this.inventory = Array.from({ length: INVENTORY_SLOTS }, () => emptyHeldItem());
	}

	firstFree(): number | undefined {
		const index = this.inventory.findIndex((i) => i.type === ITEM_TYPE.NONE);
		return index < 0 ? undefined : index;
	}

	/**
	 * Resolve a slot token: `sel` for the selected slot, or 1..3.
	 */
	matchSlot(token: string): number | undefined {
		if (token === "sel") return Math.min(this.selectedSlot, INVENTORY_SLOTS - 1);
		const index = parseInteger(token);
		if (index !== undefined && index >= 1 && index <= INVENTORY_SLOTS) {
			return index - 1;
		}
		return undefined;
	}

	/** Slot targeted by an optional argument; the selected slot when absent. */
	resolveSlot(token: string | undefined): number | undefined {
		if (token === undefined || token.length === 0) return this.selectedSlot;
		return this.matchSlot(token);
	}

	clearSlot(index: number): void {
		const item = this.inventory[index];
		if (!item) return;
		item.type = ITEM_TYPE.NONE;
		item.flags = 0;
	}

	clearInventory(): void {
		for (let i = 0; i < this.inventory.length; i++) this.clearSlot(i);
		this.selectedSlot = 0;
	}
}
