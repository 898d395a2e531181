/**
 * The global resource-pressure record and everything derived from it.
 *
 * `SystemState` is the one piece of world-scoped mutable state: stability,
 * hunger, mood, trust, junk load, the tick counter, lifecycle stage and the
 * crash flag. Every bounded stat is changed only through the `adjust*`
 * helpers, which clamp on each mutation so no observer can ever see an
 * out-of-range value.
 *
 * The Monster's mood state is derived from the stats by
 * `recomputeMonsterMood()` and never set directly.
 *
 * @example
 * ```ts
 * import { adjustHunger, initialSystemState, recomputeMonsterMood } from "./system.js";
 *
 * const state = initialSystemState();
 * adjustHunger(state, -3);
 * recomputeMonsterMood(state);
 * ```
 *
 * @module core/system
 */
import { clamp } from "../utils/number.js";

export enum STAGE {
	HATCHLING = 0,
	GROWING,
	MATURE,
	ELDER,
	RETIRED,
}

export const STAGE_COUNT = 5;

export enum MONSTER_MOOD {
	SLEEPING = 0,
	HUNGRY,
	CONTENT,
	OVERFED,
	GLITCHING,
}

/** Helper unlock bits. Once set they stay set until a reset. */
export enum HELPER {
	MEMORY_SPRITE = 1 << 0,
	SCHED_BLESSING = 1 << 1,
	IO_PIXIE = 1 << 2,
}

export const STABILITY_MAX = 100;
export const HUNGER_MAX = 10;
export const MOOD_MAX = 10;
export const TRUST_MAX = 10;
export const JUNK_MAX = 50;
export const HAPPY_STREAK_MAX = 60;
export const RESCUE_COUNTER_MAX = 5;

export interface HelperState {
	/** Bitmask of HELPER values. */
	helpers: number;
	happyStreak: number;
	rescueCounter: number;
	survivedTicks: number;
}

export interface SystemState {
	stability: number;
	hunger: number;
	mood: number;
	trust: number;
	tick: number;
	junkLoad: number;
	daemonLost: boolean;
	monsterMood: MONSTER_MOOD;
	helper: HelperState;
	crashed: boolean;
	lifecycle: STAGE;
}

/**
 * Read-only copy of the system state handed to observers.
 */
export interface GameStats {
	tick: number;
	stability: number;
	hunger: number;
	mood: number;
	trust: number;
	junkLoad: number;
	daemonLost: boolean;
	helperMask: number;
	monsterMood: MONSTER_MOOD;
	lifecycle: STAGE;
	crashed: boolean;
}

const STAGE_NAMES: ReadonlyArray<string> = [
	"Hatchling",
	"Growing",
	"Mature",
	"Elder",
	"Retired",
];

const MOOD_NAMES: ReadonlyMap<MONSTER_MOOD, string> = new Map([
	[MONSTER_MOOD.SLEEPING, "sleeping"],
	[MONSTER_MOOD.HUNGRY, "hungry"],
	[MONSTER_MOOD.CONTENT, "content"],
	[MONSTER_MOOD.OVERFED, "overfed"],
	[MONSTER_MOOD.GLITCHING, "glitching"],
]);

const HELPER_NAMES: ReadonlyArray<[HELPER, string]> = [
	[HELPER.MEMORY_SPRITE, "MemorySprite"],
	[HELPER.SCHED_BLESSING, "SchedulerBlessing"],
	[HELPER.IO_PIXIE, "IOPixie"],
];

export function stageName(stage: STAGE): string {
	return STAGE_NAMES[stage] ?? "Unknown";
}

export function monsterMoodName(mood: MONSTER_MOOD): string {
	return MOOD_NAMES.get(mood) ?? "???";
}

/** Display names of the active helpers, in unlock-bit order. */
export function helperNames(mask: number): string[] {
	return HELPER_NAMES.filter(([bit]) => (mask & bit) !== 0).map(([, name]) => name);
}

export function hasHelper(state: SystemState, helper: HELPER): boolean {
	return (state.helper.helpers & helper) !== 0;
}

export function initialSystemState(): SystemState {
	const state: SystemState = {
		stability: STABILITY_MAX,
		hunger: 3,
		mood: 0,
		trust: 3,
		tick: 0,
		junkLoad: 0,
		daemonLost: false,
		monsterMood: MONSTER_MOOD.SLEEPING,
		helper: { helpers: 0, happyStreak: 0, rescueCounter: 0, survivedTicks: 0 },
		crashed: false,
		lifecycle: STAGE.HATCHLING,
	};
	recomputeMonsterMood(state);
	return state;
}

/**
 * Restore `state` to its initial values in place.
 */
export function resetSystemState(state: SystemState): void {
	Object.assign(state, initialSystemState());
}

export function adjustStability(state: SystemState, delta: number): void {
	state.stability = clamp(state.stability + delta, 0, STABILITY_MAX);
}

export function adjustHunger(state: SystemState, delta: number): void {
	state.hunger = clamp(state.hunger + delta, 0, HUNGER_MAX);
}

export function adjustMood(state: SystemState, delta: number): void {
	state.mood = clamp(state.mood + delta, -MOOD_MAX, MOOD_MAX);
}

export function adjustTrust(state: SystemState, delta: number): void {
	state.trust = clamp(state.trust + delta, 0, TRUST_MAX);
}

export function adjustJunk(state: SystemState, delta: number): void {
	state.junkLoad = clamp(state.junkLoad + delta, 0, JUNK_MAX);
}

/**
 * Classify the Monster from its stats. The first matching rule wins.
 */
export function deriveMonsterMood(state: Readonly<SystemState>): MONSTER_MOOD {
	if (state.mood <= -4 || state.junkLoad >= 12) return MONSTER_MOOD.GLITCHING;
	if (state.hunger >= 7) return MONSTER_MOOD.HUNGRY;
	if (state.hunger <= 1 && state.mood >= 2) return MONSTER_MOOD.SLEEPING;
	if (state.hunger <= 1) return MONSTER_MOOD.OVERFED;
	return MONSTER_MOOD.CONTENT;
}

export function recomputeMonsterMood(state: SystemState): void {
	state.monsterMood = deriveMonsterMood(state);
}

export function snapshotStats(state: Readonly<SystemState>): GameStats {
	return {
		tick: state.tick,
		stability: state.stability,
		hunger: state.hunger,
		mood: state.mood,
		trust: state.trust,
		junkLoad: state.junkLoad,
		daemonLost: state.daemonLost,
		helperMask: state.helper.helpers,
		monsterMood: state.monsterMood,
		lifecycle: state.lifecycle,
		crashed: state.crashed,
	};
}
