/**
 * Package: status - YAML status file
 *
 * Writes the latest stats snapshot to `status.path` (default
 * `data/status.yaml`) after each tick. The file is an observability artefact
 * for dashboards and shell scripts; nothing ever reads it back.
 *
 * Behavior
 * - Writes to `<path>.tmp` and renames it over the target, so readers never
 *   see a half-written file
 * - At most one write is in flight; a write requested meanwhile is skipped
 *   (the next tick brings a fresher snapshot anyway)
 * - Failures are logged and never thrown
 * - Loading the package removes a temp file left by an interrupted write
 *   and creates the writer when `status.enabled` is set
 *
 * @example
 * await statusPkg.loader();
 * await getStatusWriter()?.write(game.getStats());
 *
 * @module package/status
 */
import { dirname } from "path";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import YAML from "js-yaml";
import type { Package } from "package-loader";
import logger from "../logger.js";
import { CONFIG } from "../registry/config.js";
import { resolveRootPath } from "../utils/path.js";
import configPkg from "./config.js";
import { helperNames, monsterMoodName, stageName, type GameStats } from "../core/system.js";

export type StatusDocument = {
	updated: string;
	tick: number;
	lifecycle: string;
	crashed: boolean;
	monster: string;
	stability: number;
	hunger: number;
	mood: number;
	trust: number;
	junk_load: number;
	daemon_lost: boolean;
	helpers: string[];
};

export function toStatusDocument(stats: GameStats, now: Date = new Date()): StatusDocument {
	return {
		updated: now.toISOString(),
		tick: stats.tick,
		lifecycle: stageName(stats.lifecycle),
		crashed: stats.crashed,
		monster: monsterMoodName(stats.monsterMood),
		stability: stats.stability,
		hunger: stats.hunger,
		mood: stats.mood,
		trust: stats.trust,
		junk_load: stats.junkLoad,
		daemon_lost: stats.daemonLost,
		helpers: helperNames(stats.helperMask),
	};
}

export class StatusWriter {
	private pending?: Promise<boolean>;

	constructor(readonly path: string) {}

	/** Whether a write is still in flight. */
	get busy(): boolean {
		return this.pending !== undefined;
	}

	/**
	 * Write a snapshot unless another write is still running.
	 * @returns Whether this snapshot reached the file
	 */
	write(stats: GameStats): Promise<boolean> {
		if (this.pending) {
			logger.debug(`Status write skipped: previous write to ${this.path} still running`);
			return Promise.resolve(false);
		}
		const pending = this.save(toStatusDocument(stats)).finally(() => {
			this.pending = undefined;
		});
		this.pending = pending;
		return pending;
	}

	private async save(document: StatusDocument): Promise<boolean> {
		const tempPath = `${this.path}.tmp`;
		try {
			await mkdir(dirname(this.path), { recursive: true });
			await writeFile(tempPath, YAML.dump(document, { noRefs: true, lineWidth: 120 }), "utf-8");
			await rename(tempPath, this.path);
			return true;
		} catch (error) {
			logger.error(`Failed to write status file ${this.path}: ${error}`);
			await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
			});
			return false;
		}
	}
}

let writer: StatusWriter | undefined;

/** The writer set up by the status package; undefined when disabled. */
export function getStatusWriter(): StatusWriter | undefined {
	return writer;
}

export default {
	name: "status",
	dependencies: [configPkg],
	loader: async () => {
		if (!CONFIG.status.enabled) {
			writer = undefined;
			logger.info("Status file disabled");
			return;
		}
		const path = resolveRootPath(CONFIG.status.path);
		await rm(`${path}.tmp`, { force: true });
		writer = new StatusWriter(path);
		logger.info(`Status file: ${path}`);
	},
} satisfies Package;
