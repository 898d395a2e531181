/**
 * Object spawning shared by the spawn phase and random events.
 *
 * Each function draws from `world.rng` in a fixed order and returns the
 * announcement to broadcast, or undefined when nothing appeared.
 *
 * @module core/spawn
 */
import { ROOM_ID } from "./dungeon.js";
import { ITEM_FLAG, ITEM_TYPE, itemName } from "./item.js";
import type { Rng } from "./rng.js";
import type { World } from "./world.js";

export const RESOURCE_TTL = { min: 3, max: 5 } as const;
export const DAEMON_TTL = { min: 4, max: 6 } as const;
export const JUNK_TTL = { min: 2, max: 4 } as const;
/** Chance in percent that spawned junk arrives mutated. */
export const MUTATED_JUNK_PERCENT = 30;

/**
 * 40% RAM chunk, 30% IO token, 20% CPU slice, 10% junk data.
 */
export function rollBuffetResource(rng: Rng): ITEM_TYPE {
	const p = rng.percent();
	if (p < 40) return ITEM_TYPE.RAM_CHUNK;
	if (p < 70) return ITEM_TYPE.IO_TOKEN;
	if (p < 90) return ITEM_TYPE.CPU_SLICE;
	return ITEM_TYPE.JUNK_DATA;
}

export function spawnBuffetResource(world: World): string | undefined {
	const table = world.objects(ROOM_ID.BUFFET);
	if (table.firstFreeSlot() === undefined) return undefined;
	const type = rollBuffetResource(world.rng);
	const object = table.add(type, world.rng.range(RESOURCE_TTL.min, RESOURCE_TTL.max));
	if (!object) return undefined;
	if (type === ITEM_TYPE.JUNK_DATA && world.rng.percent() < MUTATED_JUNK_PERCENT) {
		object.flags |= ITEM_FLAG.MUTATED;
	}
	return `[SPAWN] ${itemName(type)} appears in /tmp/buffet.`;
}

/**
 * Let a baby daemon loose in the Fields, unless one already is or the
 * Fields are full.
 */
export function spawnDaemon(world: World): string | undefined {
	const table = world.objects(ROOM_ID.FIELDS);
	if (table.firstFreeSlot() === undefined) return undefined;
	if (world.state.daemonLost) return undefined;
	if (!table.add(ITEM_TYPE.BABY_DAEMON, world.rng.range(DAEMON_TTL.min, DAEMON_TTL.max))) {
		return undefined;
	}
	world.state.daemonLost = true;
	return "[ALERT] A baby daemon wanders into /dev/null/fields!";
}
