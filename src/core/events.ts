/**
 * Weighted random events.
 *
 * One event fires per tick. Events are plain data (a tagged union); the
 * single dispatcher `applyEvent()` interprets them against the world.
 *
 * Selection: sum the weights of the events whose minimum stage has been
 * reached, draw `nextU32() % total`, then walk the table accumulating
 * weights until the draw falls inside an event's bucket.
 *
 * @module core/events
 */
import { ROOM_ID } from "./dungeon.js";
import { ITEM_FLAG, ITEM_TYPE, isFeed, itemName } from "./item.js";
import type { Rng } from "./rng.js";
import { JUNK_TTL, spawnBuffetResource, spawnDaemon } from "./spawn.js";
import {
	STAGE,
	adjustHunger,
	adjustJunk,
	adjustMood,
	adjustStability,
} from "./system.js";
import type { World } from "./world.js";
import { formatDelta } from "../utils/number.js";

export type GameEvent =
	| { kind: "resource-mutation"; junk: number }
	| { kind: "mood-swing"; delta: number }
	| { kind: "lost-process" }
	| { kind: "glitch-storm"; attempts: number; junkPerPile: number }
	| { kind: "lucky-sync"; hungerRelief: number; stabilityBoost: number };

export interface WeightedEvent {
	name: string;
	weight: number;
	minStage: STAGE;
	event: GameEvent;
}

export const EVENT_TABLE: ReadonlyArray<WeightedEvent> = [
	{
		name: "Resource mutation",
		weight: 20,
		minStage: STAGE.GROWING,
		event: { kind: "resource-mutation", junk: 2 },
	},
	{
		name: "Mood swing",
		weight: 20,
		minStage: STAGE.HATCHLING,
		event: { kind: "mood-swing", delta: 2 },
	},
	{
		name: "Lost process",
		weight: 15,
		minStage: STAGE.MATURE,
		event: { kind: "lost-process" },
	},
	{
		name: "Glitch storm",
		weight: 15,
		minStage: STAGE.ELDER,
		event: { kind: "glitch-storm", attempts: 2, junkPerPile: 2 },
	},
	{
		name: "Lucky sync",
		weight: 20,
		minStage: STAGE.HATCHLING,
		event: { kind: "lucky-sync", hungerRelief: 1, stabilityBoost: 2 },
	},
];

export function eligibleEvents(
	stage: STAGE,
	table: ReadonlyArray<WeightedEvent> = EVENT_TABLE
): WeightedEvent[] {
	return table.filter((entry) => stage >= entry.minStage);
}

/**
 * Weighted pick among the events eligible at `stage`. Draws once, or not at
 * all when nothing is eligible.
 */
export function pickEvent(
	stage: STAGE,
	rng: Rng,
	table: ReadonlyArray<WeightedEvent> = EVENT_TABLE
): WeightedEvent | undefined {
	const eligible = eligibleEvents(stage, table);
	const total = eligible.reduce((sum, entry) => sum + entry.weight, 0);
	if (total === 0) return undefined;
	const pick = rng.nextU32() % total;
	let accumulated = 0;
	for (const entry of eligible) {
		accumulated += entry.weight;
		if (pick < accumulated) return entry;
	}
	return undefined;
}

/**
 * Apply one event to the world.
 * @returns The announcement to broadcast, if the event produced one
 */
export function applyEvent(world: World, event: GameEvent): string | undefined {
	const state = world.state;
	switch (event.kind) {
		case "resource-mutation": {
			const table = world.objects(ROOM_ID.BUFFET);
			for (let i = 0; i < table.capacity; i++) {
				const object = table.get(i);
				if (!object || !isFeed(object.type)) continue;
				const original = object.type;
				object.type = ITEM_TYPE.JUNK_DATA;
				object.flags |= ITEM_FLAG.MUTATED;
				adjustJunk(state, event.junk);
				return `[EVENT] A ${itemName(original)} mutates into junk data!`;
			}
			return undefined;
		}
		case "mood-swing": {
			const delta = world.rng.percent() < 50 ? event.delta : -event.delta;
			adjustMood(state, delta);
			if (delta > 0) {
				return `[EVENT] Monster gets lonely then delighted when you wave. mood ${formatDelta(delta)}`;
			}
			return `[EVENT] Monster frets over idle cycles. mood ${formatDelta(delta)}`;
		}
		case "lost-process":
			return spawnDaemon(world);
		case "glitch-storm": {
			const table = world.objects(ROOM_ID.BUFFET);
			let spawned = 0;
			for (let i = 0; i < event.attempts; i++) {
				if (table.firstFreeSlot() === undefined) break;
				if (!table.add(ITEM_TYPE.JUNK_DATA, world.rng.range(JUNK_TTL.min, JUNK_TTL.max))) {
					break;
				}
				spawned++;
			}
			if (spawned === 0) return undefined;
			adjustJunk(state, spawned * event.junkPerPile);
			return `[EVENT] Glitch storm sprays ${spawned} junk piles across /tmp!`;
		}
		case "lucky-sync": {
			adjustHunger(state, -event.hungerRelief);
			adjustStability(state, event.stabilityBoost);
			return (
				spawnBuffetResource(world) ??
				"[EVENT] Lucky sync! Hunger eases and resources sparkle."
			);
		}
		default: {
			const unknown: never = event;
			throw new Error(`Unhandled event ${JSON.stringify(unknown)}`);
		}
	}
}

/**
 * Event phase of a tick: pick, apply and announce one event.
 */
export function runRandomEvent(world: World): WeightedEvent | undefined {
	const entry = pickEvent(world.state.lifecycle, world.rng);
	if (!entry) return undefined;
	const message = applyEvent(world, entry.event);
	if (message) world.broadcastAll(message);
	return entry;
}
