/**
 * Clean command.
 *
 * Disposes of a held item. Scrubbing junk lowers the junk load, by more when
 * it is vented in /dev/null/fields; anything else is simply recycled.
 *
 * @example
 * ```
 * clean 3
 * ```
 *
 * **Pattern:** `clean <slot:text?>`
 * @module commands/clean
 */

import { requireActor, type ArgumentValue, type CommandContext } from "../core/command.js";
import { ROOM_ID } from "../core/dungeon.js";
import { isJunk, itemName } from "../core/item.js";
import {
	adjustJunk,
	adjustMood,
	adjustStability,
	recomputeMonsterMood,
} from "../core/system.js";
import type { CommandObject } from "../package/commands.js";
import { requireHeldSlot } from "./_care.js";

export default {
	pattern: "clean <slot:text?>",
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const { world, session } = context;
		const actor = requireActor(context);
		const held = requireHeldSlot(context, actor, args, "Usage: clean <slot#>");
		if (!held) return;

		const type = held.item.type;
		actor.clearSlot(held.index);
		if (!isJunk(type)) {
			session.emit(`You recycle ${itemName(type)}.`);
			return;
		}

		const state = world.state;
		if (actor.roomId === ROOM_ID.FIELDS) {
			adjustJunk(state, -3);
			adjustMood(state, 1);
			adjustStability(state, 1);
		} else {
			adjustJunk(state, -1);
		}
		recomputeMonsterMood(state);
		session.emit("Junk scrubbed. System load eases.");
	},
} satisfies CommandObject;
