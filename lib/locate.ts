import * as path from 'path';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { InstallLocator } from './interfaces/locator-interface';
import { IProcessExecutor } from './interfaces/process-interface';
import { InstallNotFoundError } from './errors';
import { runCommand } from './process';

/**
 * Profiles sourced before looking the binary up, so PATH matches the user's shell
 */
export const SHELL_PROFILES = ['.profile', '.bashrc', '.zshrc'];

export const BINARY_NAME = 'discord';

/**
 * Where Discord goes when no existing install is found
 */
export function defaultInstallPath(homeDir: string): string {
    return path.join(homeDir, 'bin', 'discord_bin', 'Discord', 'Discord');
}

/**
 * Builds the bash script that sources each existing profile quietly, then prints the binary's path
 */
export function buildLookupScript(profiles: string[] = SHELL_PROFILES, binaryName: string = BINARY_NAME): string {
    const sources = profiles.map(profile => `[ -f "$HOME/${profile}" ] && . "$HOME/${profile}" >/dev/null 2>&1`);
    return [...sources, `command -v ${binaryName}`].join('; ');
}

export type ShellLookupOptions = {
    homeDir: string;
    profiles?: string[];
    binaryName?: string;
    processExecutor?: IProcessExecutor;
    fileSystem?: IFileSystem;
}

/**
 * Finds the install by asking a login-like bash where the binary is on PATH
 */
export class ShellLookupLocator implements InstallLocator {
    readonly name = 'shell lookup';
    private readonly options: ShellLookupOptions;

    constructor(options: ShellLookupOptions) {
        this.options = options;
    }

    async locate(): Promise<string> {
        const { homeDir, profiles, binaryName = BINARY_NAME, processExecutor } = this.options;
        const fs = this.options.fileSystem || new NodeFileSystem();

        const result = await runCommand(
            '/bin/bash',
            ['-c', buildLookupScript(profiles, binaryName)],
            { env: { ...process.env, HOME: homeDir } },
            processExecutor,
        );
        if (!result.success) {
            throw new InstallNotFoundError(`${binaryName} is not on PATH (${result.error ?? 'lookup failed'})`);
        }

        const binaryPath = result.stdout
            .split('\n')
            .map(line => line.trim())
            .filter(line => line.length > 0)
            .pop();
        if (!binaryPath) {
            throw new InstallNotFoundError(`Lookup for ${binaryName} printed nothing`);
        }

        let resolved: string;
        try {
            resolved = await fs.realpath(binaryPath);
        } catch (error) {
            throw new InstallNotFoundError(`Cannot resolve ${binaryPath}`, { cause: error });
        }
        return path.dirname(resolved);
    }
}

/**
 * Always answers with the default install path
 */
export class FixedDefaultLocator implements InstallLocator {
    readonly name = 'default path';
    private readonly homeDir: string;

    constructor(homeDir: string) {
        this.homeDir = homeDir;
    }

    async locate(): Promise<string> {
        return defaultInstallPath(this.homeDir);
    }
}

export type LocatedInstall = {
    installPath: string;
    locator: string;
}

/**
 * Tries each locator in turn. Failures are handed to `onFailure` and the next
 * locator is tried; only when all of them fail does this reject.
 */
export async function locateInstall(
    locators: InstallLocator[],
    onFailure?: (locator: InstallLocator, error: unknown) => void,
): Promise<LocatedInstall> {
    const failures: unknown[] = [];

    for (const locator of locators) {
        try {
            const installPath = await locator.locate();
            return { installPath, locator: locator.name };
        } catch (error) {
            failures.push(error);
            onFailure?.(locator, error);
        }
    }

    throw new InstallNotFoundError(
        `No installation found (tried ${locators.map(l => l.name).join(', ') || 'nothing'})`,
        { cause: failures[failures.length - 1] },
    );
}
