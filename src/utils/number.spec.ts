import { suite, test } from "node:test";
import assert from "node:assert";
import { clamp, formatDelta, parseInteger } from "./number.js";

suite("utils/number.ts", () => {
	test("clamp keeps values inside the range", () => {
		assert.strictEqual(clamp(120, 0, 100), 100);
		assert.strictEqual(clamp(-3, 0, 10), 0);
		assert.strictEqual(clamp(4, 0, 10), 4);
		assert.strictEqual(clamp(-11, -10, 10), -10);
	});

	test("parseInteger accepts signed digits only", () => {
		assert.strictEqual(parseInteger("2"), 2);
		assert.strictEqual(parseInteger("+3"), 3);
		assert.strictEqual(parseInteger("-1"), -1);
		assert.strictEqual(parseInteger("2a"), undefined);
		assert.strictEqual(parseInteger(""), undefined);
		assert.strictEqual(parseInteger("ram"), undefined);
	});

	test("formatDelta prints an explicit sign", () => {
		assert.strictEqual(formatDelta(2), "+2");
		assert.strictEqual(formatDelta(-2), "-2");
		assert.strictEqual(formatDelta(0), "+0");
	});
});
