import * as fs from 'fs/promises';
import { constants } from 'fs';
import { TimeoutError, isErrnoException } from '../pipeline-errors.js';

/**
 * Filesystem calls made while committing a publish.
 * Tests substitute an implementation that fails on chosen paths.
 */
export interface PublishFileSystem {
    /** Copies without overwriting: fails when `destination` exists. */
    copyFile(source: string, destination: string): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    /** Removes a file; a missing file is not an error. */
    rm(target: string): Promise<void>;
    /** Creates a directory and its parents. Resolves to the first directory created, if any. */
    mkdir(dir: string): Promise<string | undefined>;
    /** Removes an empty directory. */
    rmdir(dir: string): Promise<void>;
    exists(target: string): Promise<boolean>;
}

export const nodeFileSystem: PublishFileSystem = {
    copyFile: (source, destination) => fs.copyFile(source, destination, constants.COPYFILE_EXCL),
    rename: (from, to) => fs.rename(from, to),
    rm: target => fs.rm(target, { force: true }),
    mkdir: dir => fs.mkdir(dir, { recursive: true }),
    rmdir: dir => fs.rmdir(dir),
    exists: async target => {
        try {
            await fs.access(target);
            return true;
        } catch (e: unknown) {
            if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) return false;
            throw e;
        }
    },
};

/**
 * Rejects with a TimeoutError when `promise` has not settled within `timeoutMs`.
 * The underlying operation is not stopped.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new TimeoutError(operation, timeoutMs));
        }, timeoutMs);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
