/**
 * Grab command.
 *
 * Moves an object from the room into the first free inventory slot and
 * selects that slot. The target is a 1-based object number or the start of
 * an object's name; without one the first object is taken.
 *
 * @example
 * ```
 * grab
 * grab 2
 * grab cpu
 * ```
 *
 * **Pattern:** `grab <item:text?>`
 * @module commands/grab
 */

import {
	requireActor,
	textArgument,
	type ArgumentValue,
	type CommandContext,
} from "../core/command.js";
import { ITEM_TYPE, itemName } from "../core/item.js";
import type { CommandObject } from "../package/commands.js";

export default {
	pattern: "grab <item:text?>",
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const { world, session } = context;
		const actor = requireActor(context);
		const table = world.objects(actor.roomId);
		if (table.count() === 0) {
			session.emit("Nothing to grab here.");
			return;
		}

		const slot = table.match(textArgument(args, "item") || "1");
		const object = slot === undefined ? undefined : table.get(slot);
		if (slot === undefined || !object) {
			session.emit("No such item. Try numbers.");
			return;
		}
		if (object.type === ITEM_TYPE.BABY_DAEMON) {
			session.emit("The baby daemon scoots away. Maybe try `rescue`.");
			return;
		}

		const free = actor.firstFree();
		if (free === undefined) {
			session.emit("Inventory full. Try analyze/clean/feed first.");
			return;
		}

		const held = actor.inventory[free];
		held.type = object.type;
		held.flags = object.flags;
		actor.selectedSlot = free;
		table.clear(slot);
		session.emit(`You stash ${itemName(held.type)} in slot ${free + 1}.`);
	},
} satisfies CommandObject;
