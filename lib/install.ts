import * as path from 'path';
import * as tar from 'tar';
import { IFileSystem, NodeFileSystem, isErrnoException } from './interfaces/fs-interface';
import { ExtractionError, IoError, isError } from './errors';
import { ExtractOptions, InstallOptions } from './models';

/**
 * Extracts a (gzipped) tar archive into an existing directory.
 * Runs in strict mode, so any archive warning fails the extraction.
 */
export async function extractArchive(
    archivePath: string,
    destination: string,
    options: ExtractOptions = {},
): Promise<void> {
    const { strip = 0 } = options;

    try {
        await tar.x({
            file: archivePath,
            cwd: destination,
            strip,
            strict: true,
        });
    } catch (error) {
        const output = isError(error) ? error.message : String(error);
        throw new ExtractionError(`Failed to extract ${archivePath} into ${destination}`, output, { cause: error });
    }
}

/**
 * Extracts a release archive over `installPath`, creating it if needed.
 * The archive's single top-level directory is dropped, so its contents land
 * directly under `installPath`.
 */
export async function installArchive(
    archivePath: string,
    installPath: string,
    options: InstallOptions = {},
): Promise<void> {
    const { strip = 1 } = options;
    const fs = options.fileSystem || new NodeFileSystem();

    try {
        await fs.mkdir(installPath, { recursive: true });
    } catch (error) {
        throw new IoError(`Failed to create install directory ${installPath}`, { cause: error });
    }

    await extractArchive(archivePath, installPath, { strip });
}

export function convenienceSymlinkPath(homeDir: string): string {
    return path.join(homeDir, 'bin', 'discord');
}

/**
 * Creates `<home>/bin/discord` pointing at `target`. Never replaces an existing entry.
 */
export async function createConvenienceSymlink(
    target: string,
    homeDir: string,
    fileSystem?: IFileSystem,
): Promise<string> {
    const fs = fileSystem || new NodeFileSystem();
    const linkPath = convenienceSymlinkPath(homeDir);

    try {
        await fs.mkdir(path.dirname(linkPath), { recursive: true });
    } catch (error) {
        throw new IoError(`Failed to create ${path.dirname(linkPath)}`, { cause: error });
    }

    try {
        await fs.symlink(target, linkPath);
    } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
            throw new IoError(`Cannot create symlink: ${linkPath} already exists`, { cause: error });
        }
        throw new IoError(`Failed to create symlink ${linkPath} -> ${target}`, { cause: error });
    }
    return linkPath;
}
