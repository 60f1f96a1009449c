/**
 * SHELL: Instance Lock
 * Uses proper-lockfile so that one controller at a time drives the bulb and siren.
 * acquire() hands the release function to its caller.
 */

import lockfile from 'proper-lockfile';
import fs from 'fs-extra';
import path from 'path';
import { LockError } from '../core/errors';

const LOCK_FILE = 'controller.lock';
/** Unrecoverable errors: fail fast with the underlying code. */
const FATAL_LOCK_CODES = ['EACCES', 'EPERM', 'EROFS', 'ENOTDIR', 'ENAMETOOLONG'];

export type ReleaseFn = () => Promise<void>;

function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

export class InstanceLock {
    private filePath: string;

    constructor(stateDir: string) {
        this.filePath = path.join(stateDir, LOCK_FILE);
    }

    getPath(): string {
        return this.filePath;
    }

    /**
     * Acquire the lock without waiting. Caller must call release() on shutdown.
     */
    async acquire(): Promise<ReleaseFn> {
        // proper-lockfile requires the target file to exist
        await fs.ensureFile(this.filePath);

        try {
            return await lockfile.lock(this.filePath, {
                stale: 30 * 1000,
                update: 5 * 1000,
                retries: { retries: 0 },
            });
        } catch (err) {
            const code = errorCode(err);
            if (code === 'ELOCKED') {
                throw new LockError('Another controller is already running.', this.filePath);
            }
            if (code && FATAL_LOCK_CODES.includes(code)) {
                throw new LockError(`Cannot acquire lock: ${code}. Check permissions on the state directory.`, this.filePath);
            }
            throw err;
        }
    }

    async isLocked(): Promise<boolean> {
        if (!await fs.pathExists(this.filePath)) return false;
        return lockfile.check(this.filePath, { stale: 30 * 1000 });
    }
}
