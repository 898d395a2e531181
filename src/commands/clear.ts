/**
 * Vent every junk pile lying in /dev/null/fields.
 *
 * **Pattern:** `clear`
 * @module commands/clear
 */

import { requireActor, type CommandContext } from "../core/command.js";
import { ROOM_ID } from "../core/dungeon.js";
import { ITEM_TYPE } from "../core/item.js";
import {
	adjustJunk,
	adjustMood,
	adjustStability,
	recomputeMonsterMood,
} from "../core/system.js";
import type { CommandObject } from "../package/commands.js";
import { requireRoom } from "./_care.js";

export default {
	pattern: "clear",
	execute(context: CommandContext): void {
		const { world, session } = context;
		const actor = requireActor(context);
		if (
			!requireRoom(
				context,
				actor,
				ROOM_ID.FIELDS,
				"You need to be in /dev/null/fields to clear overflow."
			)
		) {
			return;
		}

		const fields = world.objects(ROOM_ID.FIELDS);
		let vented = 0;
		let slot = fields.find(ITEM_TYPE.JUNK_DATA);
		while (slot !== undefined) {
			fields.clear(slot);
			vented++;
			slot = fields.find(ITEM_TYPE.JUNK_DATA);
		}
		if (vented === 0) {
			session.emit("Fields are tidy already.");
			return;
		}

		const state = world.state;
		adjustJunk(state, -2 * vented);
		adjustStability(state, 1);
		adjustMood(state, 1);
		recomputeMonsterMood(state);
		session.emit(`You vent ${vented} junk piles into the void.`);
	},
} satisfies CommandObject;
