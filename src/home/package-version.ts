import fs from "fs";
import path from "path";
import { z } from "zod";
import { statOf, stripArchiveEntry, toFilePath } from "./application-home";

const manifestSchema = z.object({
    version: z.string().min(1),
});

function readManifest(manifestPath: string): string | undefined {
    try {
        return fs.readFileSync(manifestPath, "utf8");
    } catch {
        return undefined;
    }
}

function parseVersion(contents: string): string | undefined {
    let json: unknown;
    try {
        json = JSON.parse(contents);
    } catch {
        return undefined;
    }
    const result = manifestSchema.safeParse(json);
    return result.success ? result.data.version : undefined;
}

// The nearest package.json decides, even when it carries no version
export function findPackageVersion(location?: string | URL): string | undefined {
    if (!location) {
        return undefined;
    }

    const file = toFilePath(location);
    if (!file) {
        return undefined;
    }

    const start = path.resolve(stripArchiveEntry(file));
    let dir = statOf(start)?.isDirectory() ? start : path.dirname(start);

    for (;;) {
        const contents = readManifest(path.join(dir, "package.json"));
        if (contents !== undefined) {
            return parseVersion(contents);
        }

        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}
