/**
 * Shared precondition checks for the caretaking commands.
 *
 * Each helper answers the session with the refusal line itself and reports
 * whether the command may go on.
 *
 * @module commands/_care
 */

import type { Actor } from "../core/actor.js";
import { textArgument, type ArgumentValue, type CommandContext } from "../core/command.js";
import type { ROOM_ID } from "../core/dungeon.js";
import { ITEM_TYPE, type HeldItem } from "../core/item.js";

export function requireRoom(
	context: CommandContext,
	actor: Actor,
	room: ROOM_ID,
	refusal: string
): boolean {
	if (actor.roomId === room) return true;
	context.session.emit(refusal);
	return false;
}

export interface HeldSlot {
	index: number;
	item: HeldItem;
}

/**
 * Resolve the `slot` argument to an occupied inventory slot. A missing
 * argument means the selected slot.
 */
export function requireHeldSlot(
	context: CommandContext,
	actor: Actor,
	args: Map<string, ArgumentValue>,
	usage: string
): HeldSlot | undefined {
	const index = actor.resolveSlot(textArgument(args, "slot"));
	if (index === undefined) {
		context.session.emit(usage);
		return undefined;
	}
	const item = actor.inventory[index];
	if (!item || item.type === ITEM_TYPE.NONE) {
		context.session.emit(`Slot ${index + 1} is empty.`);
		return undefined;
	}
	return { index, item };
}
