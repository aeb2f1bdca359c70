import * as os from 'os';
import * as path from 'path';
import { NodeFileSystem } from './interfaces/fs-interface';
import { IoError } from './errors';
import { TempDirOptions } from './models';

/**
 * Runs `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withTempDir<T>(
    prefix: string,
    fn: (dir: string) => Promise<T>,
    options: TempDirOptions = {},
): Promise<T> {
    const fs = options.fileSystem || new NodeFileSystem();
    const tempRoot = options.tempRoot || os.tmpdir();

    let dir: string;
    try {
        dir = await fs.mkdtemp(path.join(tempRoot, prefix));
    } catch (error) {
        throw new IoError(`Failed to create a temporary directory in ${tempRoot}`, { cause: error });
    }

    let result: T;
    try {
        result = await fn(dir);
    } catch (error) {
        // The callback's failure wins; a cleanup failure on top of it is not reported
        await fs.rm(dir, { recursive: true, force: true }).catch(() => undefined);
        throw error;
    }

    try {
        await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
        throw new IoError(`Failed to remove temporary directory ${dir}`, { cause: error });
    }
    return result;
}
