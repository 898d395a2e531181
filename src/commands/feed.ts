/**
 * Feed command.
 *
 * Offers a held item to the Monster. Resources calm its hunger and lift its
 * mood; junk data makes it glitch. The item is consumed either way.
 *
 * | item      | hunger | mood | trust | stability | junk |
 * |-----------|--------|------|-------|-----------|------|
 * | RAM chunk | -3     | +2   | +1    | +3        |      |
 * | IO token  | -3     | +3   | +1    | +2        |      |
 * | CPU slice | -4     | +2   | +1    | +2        |      |
 * | junk data | +1     | -3   | -2    | -5        | +2   |
 *
 * @example
 * ```
 * feed
 * feed 1
 * ```
 *
 * **Pattern:** `feed <slot:text?>`
 * @module commands/feed
 */

import { requireActor, type ArgumentValue, type CommandContext } from "../core/command.js";
import { ROOM_ID } from "../core/dungeon.js";
import { ITEM_TYPE, isFeed, isJunk } from "../core/item.js";
import {
	adjustHunger,
	adjustJunk,
	adjustMood,
	adjustStability,
	adjustTrust,
	recomputeMonsterMood,
} from "../core/system.js";
import type { CommandObject } from "../package/commands.js";
import { requireHeldSlot, requireRoom } from "./_care.js";

export default {
	pattern: "feed <slot:text?>",
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const { world, session } = context;
		const actor = requireActor(context);
		if (
			!requireRoom(
				context,
				actor,
				ROOM_ID.NURSERY,
				"The Monster is back in /proc/nursery. Feed there."
			)
		) {
			return;
		}
		const held = requireHeldSlot(context, actor, args, "Usage: feed <slot#>");
		if (!held) return;

		const state = world.state;
		const type = held.item.type;
		if (isFeed(type)) {
			adjustHunger(state, type === ITEM_TYPE.CPU_SLICE ? -4 : -3);
			adjustMood(state, type === ITEM_TYPE.IO_TOKEN ? 3 : 2);
			adjustTrust(state, 1);
			adjustStability(state, type === ITEM_TYPE.RAM_CHUNK ? 3 : 2);
			actor.clearSlot(held.index);
			recomputeMonsterMood(state);
			world.broadcastRoom(
				ROOM_ID.NURSERY,
				`[MONSTER] ${actor.name} feeds the Monster. It purrs happily.`
			);
			return;
		}

		if (isJunk(type)) {
			adjustHunger(state, 1);
			adjustMood(state, -3);
			adjustTrust(state, -2);
			adjustStability(state, -5);
			adjustJunk(state, 2);
			actor.clearSlot(held.index);
			recomputeMonsterMood(state);
			world.broadcastRoom(
				ROOM_ID.NURSERY,
				`[MONSTER] ${actor.name} accidentally feeds junk! The Monster glitches.`
			);
			return;
		}

		session.emit("The Monster refuses that offering.");
	},
} satisfies CommandObject;
