import winston from "winston";
import path from "path";
import fs from "fs";
import type { LogLevel } from "./config";

export type Logger = winston.Logger;

export interface LoggerOptions {
    // Rendered on every line; resolved by the caller before any logger exists.
    pid: string;
    logLevel?: LogLevel;
    logDir?: string;
    silent?: boolean;
}

export interface LogLineFields {
    timestamp?: unknown;
    level: string;
    message: unknown;
    stack?: unknown;
}

export function formatLine({ timestamp, level, message, stack }: LogLineFields, pid: string): string {
    return `${String(timestamp)} [${level.toUpperCase()}] ${pid} --- ${String(stack || message)}`;
}

function fileTransports(logDir: string | undefined) {
    if (!logDir) {
        return [];
    }

    const logsDir = path.resolve(logDir);
    if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
    }

    return [
        // Write all logs to app.log
        new winston.transports.File({
            filename: path.join(logsDir, "app.log"),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
        // Write errors to error.log
        new winston.transports.File({
            filename: path.join(logsDir, "error.log"),
            level: "error",
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
    ];
}

export function createLogger(options: LoggerOptions): Logger {
    return winston.createLogger({
        level: options.logLevel ?? "info",
        silent: options.silent,
        format: winston.format.combine(
            winston.format.timestamp({
                format: "YYYY-MM-DD HH:mm:ss",
            }),
            winston.format.errors({ stack: true }),
            winston.format.printf(info => formatLine(info, options.pid))
        ),
        transports: [new winston.transports.Console(), ...fileTransports(options.logDir)],
    });
}
