export { runApp, currentPid, type Application, type ApplicationFactory, type RunOptions, type RunnerLogger, type StartedApplication } from "./app";
export { ApplicationHome, locateApplicationHome, type ApplicationSource, type LocateOptions } from "./home/application-home";
export { findPackageVersion } from "./home/package-version";
export {
    StartupReporter,
    appendField,
    HOST_NAME_RESOLVE_THRESHOLD,
    type StartupLogger,
    type StartupReporterOptions,
} from "./services/startup-info";
export { loadConfig, ConfigError, type Config, type LogLevel } from "./utils/config";
export { nodeEnvironment, type RuntimeEnvironment } from "./utils/environment";
export { createLogger, type Logger, type LoggerOptions } from "./utils/logger";
export { installShutdownHooks, type ShutdownHookOptions, type ShutdownTarget } from "./utils/shutdown";
export { Stopwatch, type Clock } from "./utils/stopwatch";
