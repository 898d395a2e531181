import { suite, test, before, after } from "node:test";
import assert from "node:assert";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import YAML from "js-yaml";
import { loadConfig, normalizeConfig } from "./config.js";
import { CONFIG, CONFIG_DEFAULT, copyDefaultConfig, setConfig } from "../registry/config.js";

suite("package/config.ts", () => {
	let directory: string;

	before(async () => {
		directory = await mkdtemp(join(tmpdir(), "caretakers-config-"));
	});

	after(async () => {
		setConfig(copyDefaultConfig());
		await rm(directory, { recursive: true, force: true });
	});

	suite("normalizeConfig", () => {
		test("returns the defaults for an empty document", () => {
			assert.deepStrictEqual(normalizeConfig(undefined), copyDefaultConfig());
			assert.deepStrictEqual(normalizeConfig("just text"), copyDefaultConfig());
		});

		test("merges known keys and ignores the rest", () => {
			const config = normalizeConfig({
				game: { name: "Night Shift", max_players: 4, motd: "hi" },
				server: { port: 5050 },
				simulation: { tick_ms: 500, rng_seed: 42 },
				extra: true,
			});
			assert.strictEqual(config.game.name, "Night Shift");
			assert.strictEqual(config.game.max_players, 4);
			assert.strictEqual(config.server.host, "127.0.0.1");
			assert.strictEqual(config.server.port, 5050);
			assert.strictEqual(config.simulation.tick_ms, 500);
			assert.strictEqual(config.simulation.rng_seed, 42);
			assert.strictEqual(config.simulation.start_room, 0);
			assert.strictEqual("motd" in config.game, false);
		});

		test("clamps the tick interval and keeps 0 as paused", () => {
			assert.strictEqual(normalizeConfig({ simulation: { tick_ms: 0 } }).simulation.tick_ms, 0);
			assert.strictEqual(normalizeConfig({ simulation: { tick_ms: 3 } }).simulation.tick_ms, 10);
			assert.strictEqual(
				normalizeConfig({ simulation: { tick_ms: 120000 } }).simulation.tick_ms,
				60000
			);
		});

		test("falls back on invalid rooms, seeds and sizes", () => {
			const config = normalizeConfig({
				game: { max_players: 0 },
				server: { port: 70000 },
				simulation: { start_room: 7, rng_seed: -1, output_queue_bytes: 64 },
				status: { enabled: "yes", path: "" },
			});
			assert.strictEqual(config.game.max_players, 1);
			assert.strictEqual(config.server.port, 4040);
			assert.strictEqual(config.simulation.start_room, 0);
			assert.strictEqual(config.simulation.rng_seed, 0);
			assert.strictEqual(config.simulation.output_queue_bytes, 512);
			assert.strictEqual(config.status.enabled, true);
			assert.strictEqual(config.status.path, "data/status.yaml");
		});

		test("ignores values of the wrong type", () => {
			const config = normalizeConfig({ simulation: { tick_ms: "fast", start_room: 2 } });
			assert.strictEqual(config.simulation.tick_ms, 250);
			assert.strictEqual(config.simulation.start_room, 2);
		});
	});

	suite("loadConfig", () => {
		test("creates the file from defaults when it is missing", async () => {
			const path = join(directory, "fresh", "config.yaml");
			const config = await loadConfig(path);
			assert.deepStrictEqual(config, copyDefaultConfig());
			const written = YAML.load(await readFile(path, "utf-8"));
			assert.deepStrictEqual(written, copyDefaultConfig());
		});

		test("applies the loaded file to CONFIG", async () => {
			const path = join(directory, "config.yaml");
			await writeFile(
				path,
				"simulation:\n  tick_ms: 100\n  rng_seed: 7\nstatus:\n  enabled: false\n",
				"utf-8"
			);
			await loadConfig(path);
			assert.strictEqual(CONFIG.simulation.tick_ms, 100);
			assert.strictEqual(CONFIG.simulation.rng_seed, 7);
			assert.strictEqual(CONFIG.status.enabled, false);
			assert.strictEqual(CONFIG.server.port, CONFIG_DEFAULT.server.port);
		});

		test("uses the defaults for a file that is not YAML", async () => {
			const path = join(directory, "broken.yaml");
			await writeFile(path, "game: [unclosed\n", "utf-8");
			const config = await loadConfig(path);
			assert.deepStrictEqual(config, copyDefaultConfig());
		});
	});
});
