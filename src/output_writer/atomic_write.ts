// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function errorCode(e: unknown): string | undefined {
    if (typeof e === "object" && e !== null && "code" in e) {
        return typeof e.code === "string" ? e.code : undefined;
    }
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function syncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errorCode(e);
        if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        // directories cannot be fsynced on some platforms (EISDIR/EPERM on win32)
        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${target}`);
    }
}

/**
 * Write via a temp file in the same directory and rename over the target,
 * so readers never see a half-written artifact.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        syncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        syncPath(dir, "r", fsyncMode, warnings);
    } catch (e) {
        if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
        throw e;
    }
}
