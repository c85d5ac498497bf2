import fs from 'fs/promises';
import { constants as fsConstants, type Stats } from 'fs';
import path from 'path';
import { configManager } from '../config-manager.js';

/**
 * True when target is basePath itself or lies underneath it
 */
export function isWithin(basePath: string, target: string): boolean {
    const relative = path.relative(basePath, target);
    if (relative === '') return true;
    if (relative === '..' || relative.startsWith(`..${path.sep}`)) return false;
    return !path.isAbsolute(relative);
}

function formatSize(bytes: number): string {
    return `${(bytes / 1024 / 1024).toFixed(1)}MB`;
}

/**
 * Resolve a requested path against the base directory and make sure it is a
 * writable regular file of acceptable size inside it. Missing parent
 * directories and a missing file are created.
 *
 * @returns Absolute, symlink-resolved path of the file
 */
export async function validatePath(requestedPath: string): Promise<string> {
    const { basePath, maxFileSize } = configManager.getConfig();
    const realBase = await fs.realpath(basePath);
    const absolute = path.resolve(realBase, requestedPath);

    if (!isWithin(realBase, absolute)) {
        throw new Error(`Path not allowed: ${requestedPath}. File path is outside the allowed directory ${realBase}`);
    }

    // Symlinks must not lead out of the base directory either. Checked on the
    // deepest existing ancestor before anything is created.
    const existing = await nearestExistingPath(absolute);
    if (!isWithin(realBase, await fs.realpath(existing))) {
        throw new Error(`Path not allowed: ${requestedPath}. It resolves outside the allowed directory ${realBase}`);
    }

    await fs.mkdir(path.dirname(absolute), { recursive: true });

    let stats: Stats;
    try {
        stats = await fs.stat(absolute);
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            await fs.writeFile(absolute, '', 'utf8');
            stats = await fs.stat(absolute);
        } else {
            throw error;
        }
    }

    const resolved = await fs.realpath(absolute);
    if (!isWithin(realBase, resolved)) {
        throw new Error(`Path not allowed: ${requestedPath}. It resolves outside the allowed directory ${realBase}`);
    }

    if (!stats.isFile()) {
        throw new Error(`Path exists but is not a regular file: ${requestedPath}`);
    }

    try {
        await fs.access(resolved, fsConstants.W_OK);
    } catch {
        throw new Error(`File is not writable: ${requestedPath}`);
    }

    if (stats.size > maxFileSize) {
        throw new Error(`File size ${formatSize(stats.size)} exceeds maximum allowed size ${formatSize(maxFileSize)}`);
    }

    return resolved;
}

/**
 * target itself when it exists, otherwise its closest existing ancestor
 */
async function nearestExistingPath(target: string): Promise<string> {
    let current = target;
    for (;;) {
        try {
            await fs.lstat(current);
            return current;
        } catch (error) {
            if (!isErrnoException(error) || error.code !== 'ENOENT') {
                throw error;
            }
        }
        const parent = path.dirname(current);
        if (parent === current) {
            return current;
        }
        current = parent;
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Read a file as UTF-8 text without touching its line endings
 */
export async function readTextFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf8');
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, 'utf8');
}

const fileOperationLocks = new Map<string, Promise<void>>();

/**
 * Run operation while holding the lock for filePath. Operations on the same
 * path run one after another, in call order.
 */
export async function withFileLock<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
    const previous = fileOperationLocks.get(filePath) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
        release = resolve;
    });
    const tail = previous.then(() => current);
    fileOperationLocks.set(filePath, tail);

    await previous;
    try {
        return await operation();
    } finally {
        release();
        if (fileOperationLocks.get(filePath) === tail) {
            fileOperationLocks.delete(filePath);
        }
    }
}
