import { describe, it } from "node:test";
import assert from "node:assert";
import { MAX_PENDING_INPUT, OutputQueue, Session } from "./session.js";

describe("core/session.ts", () => {
	describe("output", () => {
		it("queues newline-terminated messages in order", () => {
			const session = new Session(1, 4096);
			assert.strictEqual(session.emit("one"), true);
			assert.strictEqual(session.emit("two"), true);
			assert.strictEqual(session.drain(), "one\ntwo\n");
			assert.strictEqual(session.drain(), "");
		});

		it("drops a message that does not fit whole", () => {
			const session = new Session(1, 16);
			assert.strictEqual(session.emit("0123456789"), true);
			assert.strictEqual(session.emit("abcdef"), false);
			assert.strictEqual(session.emit("xyz"), true);
			assert.strictEqual(session.drain(), "0123456789\nxyz\n");
		});

		it("wakes a waiting reader when bytes arrive", async () => {
			const session = new Session(1, 4096);
			const pending = session.read();
			session.emit("hi");
			assert.strictEqual((await pending).toString("utf8"), "hi\n");
		});

		it("reads at most the requested bytes", async () => {
			const session = new Session(1, 4096);
			session.emit("hello");
			assert.strictEqual((await session.read(3)).toString("utf8"), "hel");
			assert.strictEqual((await session.read()).toString("utf8"), "lo\n");
		});

		it("resolves waiters with an empty buffer on close", async () => {
			const session = new Session(1, 4096);
			const first = session.read();
			const second = session.read();
			session.close();
			assert.strictEqual((await first).length, 0);
			assert.strictEqual((await second).length, 0);
			assert.strictEqual(session.emit("late"), false);
			assert.strictEqual((await session.read()).length, 0);
			assert.strictEqual(session.closed, true);
		});
	});

	describe("OutputQueue", () => {
		it("tracks its length and refuses pushes after close", () => {
			const queue = new OutputQueue(8);
			assert.strictEqual(queue.push(Buffer.from("abc")), true);
			assert.strictEqual(queue.length, 3);
			queue.close();
			assert.strictEqual(queue.push(Buffer.from("d")), false);
			assert.strictEqual(queue.isClosed, true);
		});
	});

	describe("input", () => {
		it("splits complete lines and keeps the remainder", () => {
			const session = new Session(1, 4096);
			assert.deepStrictEqual(session.receive("look\r\nsay hi\npart"), ["look", "say hi"]);
			assert.deepStrictEqual(session.receive("ial\n"), ["partial"]);
		});

		it("returns empty lines", () => {
			const session = new Session(1, 4096);
			assert.deepStrictEqual(session.receive("\n\n"), ["", ""]);
		});

		it("truncates an overlong line", () => {
			const session = new Session(1, 4096);
			assert.deepStrictEqual(session.receive("a".repeat(300)), []);
			assert.deepStrictEqual(session.receive("bbb\nlook\n"), [
				"a".repeat(MAX_PENDING_INPUT),
				"look",
			]);
		});

		it("cuts an overlong line on a character boundary", () => {
			const session = new Session(1, 4096);
			const head = "a".repeat(MAX_PENDING_INPUT - 1);
			assert.deepStrictEqual(session.receive(`${head}\u00e9`), []);
			assert.deepStrictEqual(session.receive("b\n"), [head]);
		});

		it("accepts raw buffers", () => {
			const session = new Session(1, 4096);
			assert.deepStrictEqual(session.receive(Buffer.from("state\n", "utf8")), ["state"]);
		});
	});

	it("reports login state through the actor id", () => {
		const session = new Session(3, 4096);
		assert.strictEqual(session.loggedIn, false);
		session.actorId = 1;
		assert.strictEqual(session.loggedIn, true);
	});
});
