import { describe, it } from "node:test";
import assert from "node:assert";
import { CryptoRng, SeededRng, SequenceRng, createRng } from "./rng.js";

function take(rng: { nextU32(): number }, count: number): number[] {
	return Array.from({ length: count }, () => rng.nextU32());
}

describe("core/rng.ts", () => {
	describe("SeededRng", () => {
		it("repeats the same sequence for the same seed", () => {
			assert.deepStrictEqual(take(new SeededRng(42), 8), take(new SeededRng(42), 8));
		});

		it("produces different sequences for different seeds", () => {
			assert.notDeepStrictEqual(take(new SeededRng(1), 8), take(new SeededRng(2), 8));
		});

		it("yields unsigned 32-bit integers", () => {
			for (const value of take(new SeededRng(7), 200)) {
				assert.ok(Number.isInteger(value));
				assert.ok(value >= 0 && value <= 0xffffffff);
			}
		});

		it("keeps percent and range inside their bounds", () => {
			const rng = new SeededRng(99);
			for (let i = 0; i < 500; i++) {
				const p = rng.percent();
				assert.ok(p >= 0 && p < 100);
				const r = rng.range(3, 5);
				assert.ok(r >= 3 && r <= 5);
			}
		});
	});

	describe("SequenceRng", () => {
		it("replays values in order and wraps around", () => {
			const rng = new SequenceRng([5, 250, 7]);
			assert.deepStrictEqual(take(rng, 5), [5, 250, 7, 5, 250]);
			assert.strictEqual(rng.draws, 5);
		});

		it("derives percent and range from the raw draw", () => {
			const rng = new SequenceRng([7, 250]);
			assert.strictEqual(rng.percent(), 7);
			assert.strictEqual(rng.percent(), 50);
			// 3 + 7 % 3
			assert.strictEqual(rng.range(3, 5), 4);
		});

		it("does not draw for a degenerate range", () => {
			const rng = new SequenceRng([1]);
			assert.strictEqual(rng.range(5, 5), 5);
			assert.strictEqual(rng.range(6, 2), 6);
			assert.strictEqual(rng.draws, 0);
		});

		it("rejects an empty script", () => {
			assert.throws(() => new SequenceRng([]), RangeError);
		});
	});

	describe("createRng", () => {
		it("uses crypto randomness for seed 0", () => {
			assert.ok(createRng(0) instanceof CryptoRng);
		});

		it("uses the seeded generator otherwise", () => {
			const rng = createRng(1234);
			assert.ok(rng instanceof SeededRng);
			assert.deepStrictEqual(take(rng, 4), take(new SeededRng(1234), 4));
		});
	});
});
