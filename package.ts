/**
 * Loads the packages under src/package/ in dependency order.
 *
 * The package list is fixed; each entry is loaded through package-loader
 * after the packages it depends on.
 */
import { loadPackage, type Package } from "package-loader";
import logger from "./src/logger.js";
import commandsPkg from "./src/package/commands.js";
import configPkg from "./src/package/config.js";
import statusPkg from "./src/package/status.js";

/** Boot order: dependencies first. */
export const PACKAGES: ReadonlyArray<Package> = [configPkg, commandsPkg, statusPkg];

/**
 * Load all packages in order.
 */
export async function loadAllPackages(packages: ReadonlyArray<Package> = PACKAGES): Promise<void> {
	logger.info(`Loading ${packages.length} package(s) in dependency order...`);
	for (const pkg of packages) {
		logger.debug(`Loading package: ${pkg.name}`);
		await loadPackage(pkg);
	}
	logger.info(`Successfully loaded ${packages.length} package(s)`);
}
