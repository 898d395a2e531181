/**
 * The tick engine.
 *
 * `runTick()` advances the world by exactly one step. Phases run in a fixed
 * order: counter, spawn, update, random event, helpers, cleanup, lifecycle,
 * crash check. The caller must hold `world.lock` for the whole call, so no
 * observer ever sees a partially applied tick.
 *
 * Once the world has crashed a tick changes nothing and keeps reporting the
 * crash until a reset.
 *
 * @module core/tick
 */
import logger from "../logger.js";
import { ROOM_ID } from "./dungeon.js";
import { runRandomEvent } from "./events.js";
import { ITEM_TYPE } from "./item.js";
import {
	advanceLifecycle,
	availableCommandsLine,
	goalLine,
	unlockLine,
} from "./lifecycle.js";
import { JUNK_TTL, spawnBuffetResource, spawnDaemon } from "./spawn.js";
import {
	HAPPY_STREAK_MAX,
	HELPER,
	HUNGER_MAX,
	MONSTER_MOOD,
	MOOD_MAX,
	STABILITY_MAX,
	STAGE,
	adjustHunger,
	adjustJunk,
	adjustMood,
	adjustStability,
	adjustTrust,
	hasHelper,
	recomputeMonsterMood,
	stageName,
	type SystemState,
} from "./system.js";
import type { World } from "./world.js";

export interface SpawnRates {
	resource: number;
	daemon: number;
}

/** Spawn chances in percent, indexed by stage. */
export const SPAWN_RATES: ReadonlyArray<SpawnRates> = [
	{ resource: 40, daemon: 10 },
	{ resource: 55, daemon: 15 },
	{ resource: 65, daemon: 25 },
	{ resource: 70, daemon: 30 },
	{ resource: 75, daemon: 35 },
];

export const JUNK_CRASH_THRESHOLD = 25;
export const MEMORY_SPRITE_TICKS = 20;
export const SCHED_BLESSING_STREAK = 10;
export const IO_PIXIE_RESCUES = 3;

export function spawnRates(stage: STAGE): SpawnRates {
	return SPAWN_RATES[stage] ?? SPAWN_RATES[SPAWN_RATES.length - 1];
}

export function spawnPhase(world: World): void {
	const rates = spawnRates(world.state.lifecycle);
	if (world.rng.percent() < rates.resource) {
		const message = spawnBuffetResource(world);
		if (message) world.broadcastAll(message);
	}
	if (world.rng.percent() < rates.daemon) {
		const message = spawnDaemon(world);
		if (message) world.broadcastAll(message);
	}
}

export function updatePhase(world: World): void {
	const state = world.state;
	adjustHunger(state, hasHelper(state, HELPER.SCHED_BLESSING) ? 0 : 1);
	if (state.hunger >= 8) adjustStability(state, -3);
	if (state.hunger >= 6) adjustMood(state, -1);
	if (state.junkLoad > 0) adjustStability(state, -Math.min(state.junkLoad, 5));
	if (state.trust >= 7 && state.stability < STABILITY_MAX) adjustStability(state, 1);
	recomputeMonsterMood(state);

	if (state.monsterMood === MONSTER_MOOD.OVERFED && world.rng.percent() < 35) {
		const ttl = world.rng.range(JUNK_TTL.min, JUNK_TTL.max);
		if (world.objects(ROOM_ID.BUFFET).add(ITEM_TYPE.JUNK_DATA, ttl)) {
			adjustJunk(state, 2);
			world.broadcastAll("[MONSTER] The Monster sneezes junk into /tmp!");
		}
	}

	if (
		state.monsterMood === MONSTER_MOOD.CONTENT &&
		state.mood >= 3 &&
		world.rng.percent() < 30
	) {
		adjustStability(state, 2);
		world.broadcastAll("[PROC] The Monster forks a helper daemon to tidy things up.");
	}
}

export function helperPhase(world: World): void {
	const state = world.state;
	const helper = state.helper;
	helper.survivedTicks++;

	if (!hasHelper(state, HELPER.MEMORY_SPRITE) && helper.survivedTicks >= MEMORY_SPRITE_TICKS) {
		helper.helpers |= HELPER.MEMORY_SPRITE;
		world.broadcastAll("[HELPER] Memory Sprite joins you, whisking junk away!");
	}

	if (
		state.monsterMood === MONSTER_MOOD.CONTENT ||
		state.monsterMood === MONSTER_MOOD.SLEEPING
	) {
		helper.happyStreak = Math.min(helper.happyStreak + 1, HAPPY_STREAK_MAX);
	} else {
		helper.happyStreak = 0;
	}

	if (!hasHelper(state, HELPER.SCHED_BLESSING) && helper.happyStreak >= SCHED_BLESSING_STREAK) {
		helper.helpers |= HELPER.SCHED_BLESSING;
		world.broadcastAll("[HELPER] Scheduler Blessing granted: hunger gain slowed!");
	}

	if (!hasHelper(state, HELPER.IO_PIXIE) && helper.rescueCounter >= IO_PIXIE_RESCUES) {
		helper.helpers |= HELPER.IO_PIXIE;
		world.broadcastAll("[HELPER] IO Pixie flits in to rescue strays!");
	}

	if (hasHelper(state, HELPER.MEMORY_SPRITE) && state.junkLoad > 0) {
		adjustJunk(state, -1);
		world.broadcastAll("[HELPER] Memory Sprite sweeps away lingering junk.");
	}

	let pixieMessage: string | undefined;
	if (hasHelper(state, HELPER.IO_PIXIE)) {
		const fields = world.objects(ROOM_ID.FIELDS);
		const slot = fields.find(ITEM_TYPE.BABY_DAEMON);
		if (slot !== undefined) {
			fields.clear(slot);
			state.daemonLost = false;
			adjustTrust(state, 1);
			adjustStability(state, 1);
			pixieMessage = "[HELPER] IO Pixie swoops a daemon back to safety!";
		}
	}
	recomputeMonsterMood(state);
	if (pixieMessage) world.broadcastAll(pixieMessage);
}

export function cleanupPhase(world: World): void {
	world.objects(ROOM_ID.BUFFET).decay();
	world.objects(ROOM_ID.FIELDS).decay();
	world.objects(ROOM_ID.NURSERY).decay();
}

export function lifecyclePhase(world: World): void {
	for (const stage of advanceLifecycle(world.state)) {
		logger.info(`Lifecycle advanced to ${stageName(stage)} at tick ${world.state.tick}`);
		world.broadcastAll(`[LIFECYCLE] Stage advanced to ${stageName(stage)}!`);
		const unlocked = unlockLine(stage);
		if (unlocked) world.broadcastAll(unlocked);
		world.broadcastAll(availableCommandsLine(world.state.lifecycle));
		world.broadcastAll(goalLine(world.state.lifecycle));
	}
}

/**
 * The first crash condition that holds, in priority order.
 */
export function crashReason(state: Readonly<SystemState>): string | undefined {
	if (state.stability <= 0) return "stability exhausted";
	if (state.mood <= -MOOD_MAX) return "mood meltdown";
	if (state.trust <= 0) return "trust drained";
	if (state.hunger >= HUNGER_MAX) return "hunger overflow";
	if (state.junkLoad >= JUNK_CRASH_THRESHOLD) return "junk backpressure";
	return undefined;
}

export function crashReport(state: Readonly<SystemState>, reason: string): string {
	return (
		`[CRASH] Kernel Caretakers collapse: ${reason} after ${state.tick} ticks. ` +
		`stability=${state.stability} hunger=${state.hunger} mood=${state.mood} ` +
		`trust=${state.trust} junk=${state.junkLoad}`
	);
}

export function crashCheck(world: World): void {
	const state = world.state;
	if (state.crashed) return;
	const reason = crashReason(state);
	if (!reason) return;
	state.crashed = true;
	logger.warn(`World crashed: ${reason} after ${state.tick} ticks`);
	world.broadcastAll(crashReport(state, reason));
	world.broadcastAll("[CRASH] Friendly Monster dumps core. Thanks for playing!");
}

/**
 * Advance the world one tick. Caller holds `world.lock`.
 * @returns Whether the world is crashed afterwards
 */
export function runTick(world: World): boolean {
	const state = world.state;
	if (state.crashed) return true;

	state.tick = (state.tick + 1) >>> 0;
	spawnPhase(world);
	updatePhase(world);
	runRandomEvent(world);
	helperPhase(world);
	cleanupPhase(world);
	lifecyclePhase(world);
	crashCheck(world);

	return state.crashed;
}
