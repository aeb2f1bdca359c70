import * as fs from 'fs';
import { Writable } from 'stream';

/**
 * File system abstraction interface for testability
 */
export interface IFileSystem {
    exists(path: string): Promise<boolean>;
    mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
    mkdtemp(prefix: string): Promise<string>;
    readFile(path: string): Promise<string>;
    realpath(path: string): Promise<string>;
    rm(path: string, options?: { recursive?: boolean; force?: boolean }): Promise<void>;
    symlink(target: string, path: string): Promise<void>;
    createWriteStream(path: string): Writable;
}

/**
 * Default implementation using Node.js fs module
 */
export class NodeFileSystem implements IFileSystem {
    /**
     * Only a missing entry counts as "does not exist"; permission errors propagate
     */
    async exists(path: string): Promise<boolean> {
        try {
            await fs.promises.stat(path);
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return false;
            }
            throw error;
        }
    }

    async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
        await fs.promises.mkdir(path, options);
    }

    mkdtemp(prefix: string): Promise<string> {
        return fs.promises.mkdtemp(prefix);
    }

    readFile(path: string): Promise<string> {
        return fs.promises.readFile(path, 'utf8');
    }

    realpath(path: string): Promise<string> {
        return fs.promises.realpath(path);
    }

    rm(path: string, options?: { recursive?: boolean; force?: boolean }): Promise<void> {
        return fs.promises.rm(path, options);
    }

    symlink(target: string, path: string): Promise<void> {
        return fs.promises.symlink(target, path);
    }

    createWriteStream(path: string): Writable {
        return fs.createWriteStream(path);
    }
}

/**
 * Structural check: errors raised by `fs` may come from another realm, where `instanceof Error` fails
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
