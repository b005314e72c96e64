import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { nodeEnvironment } from "../utils/environment";

// location: the module the application was loaded from (__filename, import.meta.url, ...)
export interface ApplicationSource {
    name: string;
    location?: string | URL;
}

export interface LocateOptions {
    // Skips source detection so a test runner's own files are never reported as the application home.
    underTest?: boolean;
    cwd?: string;
}

const ARCHIVE_BOUNDARY = "!/";
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export class ApplicationHome {
    constructor(
        readonly dir: string,
        readonly source?: string
    ) {}

    toString(): string {
        return this.dir;
    }
}

export function statOf(target: string): fs.Stats | undefined {
    try {
        return fs.statSync(target);
    } catch {
        return undefined;
    }
}

// Decodes file: (and jar:file:) URLs; plain paths pass through, other schemes give undefined
export function toFilePath(location: string | URL): string | undefined {
    let href = typeof location === "string" ? location : location.href;
    if (href.startsWith("jar:")) {
        href = href.slice("jar:".length);
    }

    if (href.startsWith("file:")) {
        try {
            return fileURLToPath(href);
        } catch {
            return undefined;
        }
    }

    if (href.length === 0 || URL_SCHEME.test(href)) {
        return undefined;
    }
    return href;
}

// "/opt/app.asar!/dist/main.js" -> "/opt/app.asar"
export function stripArchiveEntry(file: string): string {
    const separator = file.indexOf(ARCHIVE_BOUNDARY);
    return separator > 0 ? file.substring(0, separator) : file;
}

function findSource(source: ApplicationSource | undefined, underTest: boolean): string | undefined {
    if (!source?.location || underTest) {
        return undefined;
    }

    const file = toFilePath(source.location);
    if (!file) {
        return undefined;
    }

    const archive = stripArchiveEntry(file);
    return statOf(archive) ? path.resolve(archive) : undefined;
}

function findHomeDir(source: string | undefined, cwd: string): string {
    let homeDir = source ?? (cwd.length > 0 ? cwd : ".");
    if (statOf(homeDir)?.isFile()) {
        homeDir = path.dirname(homeDir);
    }
    homeDir = statOf(homeDir) ? homeDir : ".";
    return path.resolve(homeDir);
}

export function locateApplicationHome(source?: ApplicationSource, options: LocateOptions = {}): ApplicationHome {
    const found = findSource(source, options.underTest ?? false);
    const cwd = options.cwd ?? nodeEnvironment.workingDirectory() ?? ".";
    return new ApplicationHome(findHomeDir(found, cwd), found);
}
