// src/checkpoint_store/atomic_write.ts
//
// temp file -> fsync -> rename -> fsync(dir). A reader never observes a torn
// checkpoint; concurrent writers still race (last rename wins).

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { stableStringify } from './stable_stringify';

export type FsyncMode = 'BEST_EFFORT' | 'REQUIRED';

function errorCode(e: unknown): string | undefined {
    if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
        return e.code;
    }
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === 'ENOSPC' || code === 'EIO';
}

function fsyncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[], dataOnly: boolean): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            if (dataOnly) fs.fdatasyncSync(fd);
            else fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e: unknown) {
        const code = errorCode(e);
        if (fsyncMode === 'REQUIRED' || isFatalBestEffort(code)) throw e;
        // EPERM / EINVAL / EROFS on exotic filesystems: the rename still happened
        warnings.push(`FSYNC_WARN(${code || 'UNKNOWN'}) on ${target}`);
    }
}

export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, 'r+', fsyncMode, warnings, true);
        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);
        fsyncPath(dir, 'r', fsyncMode, warnings, false);
    } catch (e) {
        if (fs.existsSync(tmp)) {
            try {
                fs.unlinkSync(tmp);
            } catch (cleanupErr) {
                warnings.push(`TMP_CLEANUP_FAILED(${errorCode(cleanupErr) || 'UNKNOWN'}) on ${tmp}`);
            }
        }
        throw e;
    }
}

export function atomicWriteJsonSync(params: {
    filePath: string;
    data: unknown;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: stableStringify(params.data, 2) + '\n',
        mode: params.mode,
        fsyncMode: params.fsyncMode,
        warnings: params.warnings,
    });
}
