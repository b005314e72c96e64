import { runApp, type Application } from "./app";
import { loadConfig } from "./utils/config";
import { nodeEnvironment } from "./utils/environment";
import { createLogger } from "./utils/logger";

const config = loadConfig();
const logger = createLogger({ pid: nodeEnvironment.pid(), logLevel: config.logLevel, logDir: config.logDir });

class DemoApplication implements Application {
    private heartbeat?: NodeJS.Timeout;

    run(): void {
        // Keeps the process alive until a shutdown signal arrives
        this.heartbeat = setInterval(() => logger.debug("heartbeat"), 60_000);
    }

    banner(): string {
        return "boot-banner demo is up. Press Ctrl+C to stop.";
    }

    stop(): void {
        clearInterval(this.heartbeat);
    }
}

runApp(() => new DemoApplication(), {
    source: { name: "DemoApplication", location: __filename },
    logger,
    config,
    shutdownHooks: true,
}).catch((error: unknown) => {
    logger.error("Failed to start application:", error);
    process.exitCode = 1;
});
