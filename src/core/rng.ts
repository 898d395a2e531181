/**
 * Random number sources for the simulation.
 *
 * Every roll the world makes goes through an `Rng`, so a run can be made
 * deterministic by configuring a seed, or fully scripted in tests with
 * `SequenceRng`.
 *
 * - `SeededRng`: mulberry32, reproducible for a given seed
 * - `CryptoRng`: `node:crypto` backed, used when the seed is 0
 * - `SequenceRng`: replays a fixed list of raw draws, cycling when exhausted
 *
 * @example
 * ```ts
 * import { createRng } from "./rng.js";
 *
 * const rng = createRng(1234);
 * if (rng.percent() < 40) spawn();
 * const ttl = rng.range(3, 5);
 * ```
 *
 * @module core/rng
 */
import { randomBytes } from "crypto";

export interface Rng {
	/** Uniform unsigned 32-bit integer. */
	nextU32(): number;
	/** Uniform integer in [0, 99]. */
	percent(): number;
	/** Uniform integer in [min, max]; returns `min` without drawing when `max <= min`. */
	range(min: number, max: number): number;
}

abstract class BaseRng implements Rng {
	abstract nextU32(): number;

	percent(): number {
		return this.nextU32() % 100;
	}

	range(min: number, max: number): number {
		if (max <= min) return min;
		return min + (this.nextU32() % (max - min + 1));
	}
}

export class SeededRng extends BaseRng {
	private state: number;

	constructor(seed: number) {
		super();
		this.state = seed >>> 0;
	}

	nextU32(): number {
		this.state = (this.state + 0x6d2b79f5) >>> 0;
		let t = this.state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return (t ^ (t >>> 14)) >>> 0;
	}
}

export class CryptoRng extends BaseRng {
	nextU32(): number {
		return randomBytes(4).readUInt32LE(0);
	}
}

/**
 * Replays scripted raw draws in order, wrapping around at the end.
 *
 * @example
 * ```ts
 * const rng = new SequenceRng([99]); // every percent() roll is 99
 * ```
 */
export class SequenceRng extends BaseRng {
	private readonly values: ReadonlyArray<number>;
	private index = 0;

	constructor(values: ReadonlyArray<number>) {
		super();
		if (values.length === 0) {
			throw new RangeError("SequenceRng needs at least one value");
		}
		this.values = values.map((v) => v >>> 0);
	}

	/** Number of draws taken so far. */
	get draws(): number {
		return this.index;
	}

	nextU32(): number {
		const value = this.values[this.index % this.values.length];
		this.index++;
		return value;
	}
}

/**
 * Pick a source for a configured seed. 0 means non-deterministic.
 */
export function createRng(seed: number): Rng {
	if (seed === 0) return new CryptoRng();
	return new SeededRng(seed);
}
