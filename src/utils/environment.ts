import os from "os";

// A lookup that cannot be answered returns undefined; callers pick their own fallback
export interface RuntimeEnvironment {
    pid(): string;
    hostName(): string | undefined;
    runtimeVersion(): string | undefined;
    userName(): string | undefined;
    workingDirectory(): string | undefined;
    uptimeMillis(): number | undefined;
    platform(): string;
    now(): number;
}

function nonEmpty(value: string | undefined): string | undefined {
    return value !== undefined && value.length > 0 ? value : undefined;
}

export const nodeEnvironment: RuntimeEnvironment = {
    pid: () => String(process.pid),

    hostName: () => {
        try {
            return nonEmpty(os.hostname());
        } catch {
            return undefined;
        }
    },

    runtimeVersion: () => nonEmpty(process.versions.node),

    userName: () => {
        // userInfo() throws when the uid has no passwd entry (common in containers)
        try {
            return nonEmpty(os.userInfo().username);
        } catch {
            return nonEmpty(process.env.USER ?? process.env.USERNAME);
        }
    },

    workingDirectory: () => {
        // cwd() throws once the directory has been removed underneath the process
        try {
            return nonEmpty(process.cwd());
        } catch {
            return undefined;
        }
    },

    uptimeMillis: () => {
        const uptime = process.uptime();
        return Number.isFinite(uptime) ? Math.round(uptime * 1000) : undefined;
    },

    platform: () => process.platform,

    now: () => Date.now(),
};
