import type { ApplicationSource } from "./home/application-home";
import { StartupReporter, type StartupLogger } from "./services/startup-info";
import { loadConfig, type Config } from "./utils/config";
import { nodeEnvironment, type RuntimeEnvironment } from "./utils/environment";
import { createLogger } from "./utils/logger";
import { installShutdownHooks, type ShutdownTarget } from "./utils/shutdown";
import { Stopwatch } from "./utils/stopwatch";

export interface Application {
    run(): void | Promise<void>;
    banner?(): string | null | undefined | Promise<string | null | undefined>;
    stop?(): void | Promise<void>;
}

export type ApplicationFactory<T extends Application = Application> = () => T;

export interface RunnerLogger extends StartupLogger {
    error(message: string): void;
}

export interface RunOptions {
    source?: ApplicationSource;
    logger?: RunnerLogger;
    environment?: RuntimeEnvironment;
    config?: Config;
    output?: { write(chunk: string): unknown };
    shutdownHooks?: boolean;
    shutdownTarget?: ShutdownTarget;
}

export interface StartedApplication<T extends Application> {
    application: T;
    // No-op unless shutdown hooks were installed
    removeShutdownHooks: () => void;
}

export function currentPid(): string {
    return nodeEnvironment.pid();
}

// Config is only parsed when the default logger has to be built
function resolveLogger(pid: string, options: RunOptions): { logger: RunnerLogger; underTest: boolean } {
    if (options.logger) {
        return {
            logger: options.logger,
            underTest: options.config?.underTest ?? process.env.NODE_ENV === "test",
        };
    }

    const config = options.config ?? loadConfig();
    return {
        logger: createLogger({ pid, logLevel: config.logLevel, logDir: config.logDir }),
        underTest: config.underTest,
    };
}

// Errors from the factory or from run() are rethrown untouched; nothing after the failing step happens.
export async function runApp<T extends Application>(
    factory: ApplicationFactory<T>,
    options: RunOptions = {}
): Promise<StartedApplication<T>> {
    const environment = options.environment ?? nodeEnvironment;

    // Resolved before any logger exists so every line can carry it
    const pid = environment.pid();
    const { logger, underTest } = resolveLogger(pid, options);

    const stopwatch = new Stopwatch(() => environment.now());
    const reporter = new StartupReporter(options.source, { logger, environment, underTest });

    reporter.logStarting();
    stopwatch.start();
    const application = factory();
    await application.run();
    stopwatch.stop();
    reporter.logStarted(stopwatch);

    const banner = await application.banner?.();
    if (banner) {
        (options.output ?? process.stdout).write(`${banner}\n`);
    }

    const removeShutdownHooks = options.shutdownHooks
        ? installShutdownHooks({ reporter, application, logger, target: options.shutdownTarget })
        : () => undefined;

    return { application, removeShutdownHooks };
}
