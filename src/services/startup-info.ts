import { locateApplicationHome, type ApplicationSource } from "../home/application-home";
import { findPackageVersion } from "../home/package-version";
import { nodeEnvironment, type RuntimeEnvironment } from "../utils/environment";
import type { Stopwatch } from "../utils/stopwatch";

export interface StartupLogger {
    info(message: string): void;
    warn(message: string): void;
}

export interface StartupReporterOptions {
    logger: StartupLogger;
    environment?: RuntimeEnvironment;
    underTest?: boolean;
}

export const HOST_NAME_RESOLVE_THRESHOLD = 200;

const RUNTIME_NAME = "Node.js";
const DEFAULT_NAME = "application";
const DEFAULT_HOST_NAME = "localhost";

// Blank or missing values leave the message untouched
export function appendField(message: string, prefix: string, value: string | undefined): string {
    const trimmed = value?.trim();
    if (!trimmed) {
        return message;
    }
    return `${message}${message.length > 0 ? " " : ""}${prefix}${trimmed}`;
}

export function slowHostNameWarning(resolveTime: number, platform: string): string {
    let warning = `os.hostname() took ${resolveTime} milliseconds to respond. Please verify your network configuration`;
    if (platform === "darwin") {
        warning += " (macOS machines may need to add entries to /etc/hosts)";
    }
    return `${warning}.`;
}

export class StartupReporter {
    private readonly logger: StartupLogger;
    private readonly environment: RuntimeEnvironment;
    private readonly underTest: boolean;

    constructor(
        private readonly source: ApplicationSource | undefined,
        options: StartupReporterOptions
    ) {
        this.logger = options.logger;
        this.environment = options.environment ?? nodeEnvironment;
        this.underTest = options.underTest ?? false;
    }

    get applicationName(): string {
        return this.source?.name.trim() || DEFAULT_NAME;
    }

    currentPid(): string {
        return this.environment.pid();
    }

    logStarting(): void {
        this.logger.info(this.startingMessage());
    }

    logStarted(stopwatch: Stopwatch): void {
        this.logger.info(this.startedMessage(stopwatch));
    }

    logStopping(signal?: string): void {
        this.logger.info(this.stoppingMessage(signal));
    }

    startingMessage(): string {
        let message = `Starting ${this.applicationName}`;
        message = appendField(message, "v", findPackageVersion(this.source?.location));
        message = appendField(message, `using ${RUNTIME_NAME} `, this.environment.runtimeVersion());
        message = appendField(message, "on ", this.resolveHostName());
        message = appendField(message, "with PID ", this.currentPid());

        const context = this.context();
        if (context.length > 0) {
            message += ` (${context})`;
        }
        return message;
    }

    startedMessage(stopwatch: Stopwatch): string {
        let message = `Started ${this.applicationName} in ${stopwatch.elapsedSeconds()} seconds`;
        const uptime = this.environment.uptimeMillis();
        if (uptime !== undefined) {
            message += ` (${RUNTIME_NAME} running for ${uptime / 1000})`;
        }
        return message;
    }

    stoppingMessage(signal?: string): string {
        let message = `Stopping ${this.applicationName}`;
        const uptime = this.environment.uptimeMillis();
        if (uptime !== undefined) {
            message += ` after ${uptime / 1000} seconds`;
        }
        if (signal) {
            message += ` (received ${signal})`;
        }
        return message;
    }

    private resolveHostName(): string {
        const startTime = this.environment.now();
        const hostName = this.environment.hostName() ?? DEFAULT_HOST_NAME;
        const resolveTime = this.environment.now() - startTime;
        if (resolveTime > HOST_NAME_RESOLVE_THRESHOLD) {
            this.logger.warn(slowHostNameWarning(resolveTime, this.environment.platform()));
        }
        return hostName;
    }

    private context(): string {
        const workingDirectory = this.environment.workingDirectory();
        const home = locateApplicationHome(this.source, { underTest: this.underTest, cwd: workingDirectory });

        let context = home.source ?? "";
        context = appendField(context, "started by ", this.environment.userName());
        context = appendField(context, "in ", workingDirectory);
        return context;
    }
}
