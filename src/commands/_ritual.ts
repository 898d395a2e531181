/**
 * Shared body of the Nursery rituals (`pet`, `debug`, `sing`).
 *
 * @module commands/_ritual
 */

import { requireActor, type CommandContext } from "../core/command.js";
import { ROOM_ID } from "../core/dungeon.js";
import {
	adjustJunk,
	adjustMood,
	adjustStability,
	adjustTrust,
	recomputeMonsterMood,
	type SystemState,
} from "../core/system.js";
import type { CommandObject } from "../package/commands.js";
import { requireRoom } from "./_care.js";

export interface RitualEffect {
	mood?: number;
	trust?: number;
	stability?: number;
	junk?: number;
}

export interface RitualOptions {
	pattern: string;
	/** Reply when the performer is not in the Nursery. */
	refusal: string;
	effect: (state: Readonly<SystemState>) => RitualEffect;
	/** Nursery broadcast; receives the performer's name. */
	announce: (name: string) => string;
}

export function ritual(options: RitualOptions): CommandObject {
	return {
		pattern: options.pattern,
		execute(context: CommandContext): void {
			const { world } = context;
			const actor = requireActor(context);
			if (!requireRoom(context, actor, ROOM_ID.NURSERY, options.refusal)) return;

			const state = world.state;
			const effect = options.effect(state);
			adjustJunk(state, effect.junk ?? 0);
			adjustMood(state, effect.mood ?? 0);
			adjustTrust(state, effect.trust ?? 0);
			adjustStability(state, effect.stability ?? 0);
			recomputeMonsterMood(state);
			world.broadcastRoom(ROOM_ID.NURSERY, options.announce(actor.name));
		},
	};
}
