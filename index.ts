import { loadAllPackages } from "./package.js";
import logger, { describeError } from "./src/utils/logger.js";
import { Engine } from "./src/engine.js";
import { YamlStore } from "./src/package/accounts.js";

await logger.block("packages", async () => {
	logger.info("Loading packages...");
	await loadAllPackages();
});

const store = await logger.block("accounts", () => YamlStore.open());
const engine = new Engine({ store });

try {
	await engine.start();
} catch (error) {
	logger.error("Could not start the server", { error: describeError(error) });
	process.exit(1);
}

let stopping = false;
function shutdown(signal: NodeJS.Signals): void {
	if (stopping) return;
	stopping = true;
	logger.info(`Received ${signal}. Stopping game server...`);
	engine.stop().then(
		() => {
			logger.info("Game server stopped. Exiting process.");
			process.exit(0);
		},
		(error: unknown) => {
			logger.error("Error during shutdown", { error: describeError(error) });
			process.exit(1);
		}
	);
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
