import { suite, test } from "node:test";
import assert from "node:assert";
import { CommandRegistry, GAME_EVENT, type CommandContext } from "../core/command.js";
import { SequenceRng } from "../core/rng.js";
import { Session } from "../core/session.js";
import { World } from "../core/world.js";
import { COMMAND_REGISTRY } from "../registry/command.js";
import commandsPkg, {
	BUILTIN_COMMANDS,
	JavaScriptCommandAdapter,
	loadCommands,
	type CommandObject,
} from "./commands.js";

function context(): CommandContext {
	const world = new World({ rng: new SequenceRng([0]) });
	const session = new Session(1, 4096);
	world.sessions.add(session);
	return { world, session };
}

suite("package/commands.ts", () => {
	test("loads every built-in command", () => {
		const registry = new CommandRegistry();
		const loaded = loadCommands(registry);
		assert.strictEqual(loaded.length, BUILTIN_COMMANDS.length);
		assert.deepStrictEqual(
			registry
				.getCommands()
				.map((command) => command.name)
				.sort(),
			[
				"analyze",
				"clean",
				"clear",
				"debug",
				"feed",
				"go",
				"grab",
				"inventory",
				"login",
				"look",
				"pet",
				"quit",
				"rescue",
				"reset",
				"say",
				"sing",
				"state",
			]
		);
	});

	test("only login and quit skip the login check", () => {
		const registry = new CommandRegistry();
		loadCommands(registry);
		const open = registry
			.getCommands()
			.filter((command) => !command.requiresLogin)
			.map((command) => command.name)
			.sort();
		assert.deepStrictEqual(open, ["login", "quit"]);
	});

	test("package loader fills the shared registry once", async () => {
		await commandsPkg.loader();
		await commandsPkg.loader();
		assert.strictEqual(COMMAND_REGISTRY.getCommands().length, BUILTIN_COMMANDS.length);
		assert.ok(COMMAND_REGISTRY.get("look"));
	});

	suite("JavaScriptCommandAdapter", () => {
		test("passes parsed arguments and the handler's event through", () => {
			const seen: string[] = [];
			const wave: CommandObject = {
				pattern: "wave <target:text?>",
				execute(_context, args) {
					const target = args.get("target");
					if (typeof target === "string") seen.push(target);
					return GAME_EVENT.RESET;
				},
			};
			const registry = new CommandRegistry();
			loadCommands(registry, [wave]);
			const ctx = context();
			ctx.actor = ctx.world.createActor("ada");
			assert.strictEqual(registry.execute("wave at bob", ctx), GAME_EVENT.RESET);
			assert.deepStrictEqual(seen, ["at bob"]);
		});

		test("wires onError only when the object has one", () => {
			const plain = new JavaScriptCommandAdapter({
				pattern: "go <direction:direction>",
				execute() {},
			});
			assert.strictEqual(plain.onError, undefined);

			const errors: string[] = [];
			const picky = new JavaScriptCommandAdapter({
				pattern: "go <direction:direction>",
				requiresLogin: false,
				execute() {},
				onError(_context, result) {
					errors.push(result.error ?? "");
				},
			});
			const registry = new CommandRegistry();
			registry.register(picky);
			const ctx = context();
			registry.execute("go sideways", ctx);
			assert.deepStrictEqual(errors, ["Invalid direction: sideways"]);
			assert.strictEqual(ctx.session.drain(), "");
		});
	});
});
