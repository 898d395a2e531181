/**
 * Rescue command.
 *
 * Guides a stray baby daemon home from /dev/null/fields. A daemon that
 * already evaporated can still be recovered while it is reported lost, for
 * a smaller reward. Rescues count toward the IO Pixie helper.
 *
 * **Pattern:** `rescue`
 * @module commands/rescue
 */

import { requireActor, type CommandContext } from "../core/command.js";
import { ROOM_ID } from "../core/dungeon.js";
import { ITEM_TYPE } from "../core/item.js";
import {
	RESCUE_COUNTER_MAX,
	adjustMood,
	adjustStability,
	adjustTrust,
	recomputeMonsterMood,
} from "../core/system.js";
import type { CommandObject } from "../package/commands.js";
import { requireRoom } from "./_care.js";

export default {
	pattern: "rescue",
	execute(context: CommandContext): void {
		const { world, session } = context;
		const actor = requireActor(context);
		if (!requireRoom(context, actor, ROOM_ID.FIELDS, "Rescues happen in /dev/null/fields.")) {
			return;
		}

		const state = world.state;
		const fields = world.objects(ROOM_ID.FIELDS);
		const slot = fields.find(ITEM_TYPE.BABY_DAEMON);
		if (slot !== undefined) {
			fields.clear(slot);
			state.daemonLost = false;
			adjustTrust(state, 2);
			adjustMood(state, 2);
			adjustStability(state, 3);
		} else if (state.daemonLost) {
			state.daemonLost = false;
			adjustTrust(state, 1);
			adjustMood(state, 1);
			adjustStability(state, 2);
		} else {
			session.emit("Nothing to rescue right now.");
			return;
		}

		state.helper.rescueCounter = Math.min(state.helper.rescueCounter + 1, RESCUE_COUNTER_MAX);
		recomputeMonsterMood(state);
		session.emit("You guide the stray daemon back to the nursery.");
	},
} satisfies CommandObject;
