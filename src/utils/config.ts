import { z } from "zod";

const DEFAULTS = {
    logLevel: "info" as const,
    nodeEnv: "development" as const,
} as const;

const envSchema = z.object({
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default(DEFAULTS.logLevel),
    LOG_DIR: z.string().trim().min(1, "LOG_DIR must not be empty").optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).default(DEFAULTS.nodeEnv),
});

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface Config {
    readonly logLevel: LogLevel;
    readonly logDir?: string;
    readonly nodeEnv: "development" | "production" | "test";
    readonly underTest: boolean;
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid environment variables:\n${issues.map(issue => `  - ${issue}`).join("\n")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        throw new ConfigError(result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`));
    }

    const parsed = result.data;

    return Object.freeze({
        logLevel: parsed.LOG_LEVEL,
        logDir: parsed.LOG_DIR,
        nodeEnv: parsed.NODE_ENV,
        underTest: parsed.NODE_ENV === "test",
    });
}
