import { loadAllPackages } from "./package.js";
import logger from "./src/logger.js";
import { startGame } from "./src/game.js";

try {
	await loadAllPackages();
	await startGame();
	logger.info("Game server started. Press Ctrl+C to stop.");
} catch (error) {
	logger.error(`Failed to start game server: ${error}`);
	process.exitCode = 1;
}
