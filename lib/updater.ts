import * as path from 'path';
import { SemVer } from 'semver';
import { archiveFileName, archiveUrl } from '../data/endpoints';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { IHttpClient, AxiosHttpClient } from './interfaces/http-interface';
import { InstallLocator } from './interfaces/locator-interface';
import { IProgressBarFactory, IStatusReporter } from './interfaces/progress-interface';
import { IoError, describeError } from './errors';
import { downloadArchive } from './download';
import { createConvenienceSymlink, installArchive } from './install';
import { FixedDefaultLocator, ShellLookupLocator, defaultInstallPath, locateInstall } from './locate';
import { withTempDir } from './temp';
import { Spinner } from './ui';
import { zeroVersion, fetchLatestVersion, planUpdate, readInstalledVersion } from './version';
import { UpdateOutcome, UpdaterConfig, UpdaterDependencies } from './models';

const TEMP_DIR_PREFIX = 'discord-update-';

/**
 * Shell lookup first, then the default path
 */
export function defaultLocators(config: UpdaterConfig, dependencies: UpdaterDependencies = {}): InstallLocator[] {
    return [
        new ShellLookupLocator({
            homeDir: config.homeDir,
            processExecutor: dependencies.processExecutor,
            fileSystem: dependencies.fileSystem,
        }),
        new FixedDefaultLocator(config.homeDir),
    ];
}

async function pathExists(fileSystem: IFileSystem, target: string): Promise<boolean> {
    try {
        return await fileSystem.exists(target);
    } catch (error) {
        throw new IoError(`Failed to check whether ${target} exists`, { cause: error });
    }
}

type ApplyUpdateContext = {
    config: UpdaterConfig;
    installPath: string;
    version: SemVer;
    fileSystem: IFileSystem;
    httpClient: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
    reporter: IStatusReporter;
}

/**
 * Downloads the release into a temp directory and extracts it over the install path.
 * The temp directory (and the archive in it) is gone when this settles.
 */
async function applyUpdate(context: ApplyUpdateContext): Promise<void> {
    const { config, installPath, version, fileSystem, httpClient, progressBarFactory, reporter } = context;
    const url = archiveUrl(config.downloadBaseUrl, version.version);

    await withTempDir(TEMP_DIR_PREFIX, async (tempDir) => {
        const archivePath = path.join(tempDir, archiveFileName(version.version));
        await downloadArchive(url, archivePath, {
            name: `discord ${version.version}`,
            fileSystem,
            httpClient,
            progressBarFactory,
        });

        reporter.setMessage(`Extracting Discord to ${installPath}`);
        await installArchive(archivePath, installPath, { fileSystem });
        reporter.finish('Discord extracted');
    }, { tempRoot: config.tempRoot, fileSystem });
}

/**
 * Locate the install, compare versions, and install the latest release if it is newer.
 * A fresh install also gets the `~/bin/discord` symlink.
 */
export async function runUpdate(
    config: UpdaterConfig,
    dependencies: UpdaterDependencies = {},
): Promise<UpdateOutcome> {
    const fileSystem = dependencies.fileSystem || new NodeFileSystem();
    const httpClient = dependencies.httpClient || new AxiosHttpClient();
    const reporter = dependencies.reporter || new Spinner();
    const locators = dependencies.locators || defaultLocators(config, dependencies);

    reporter.start();
    try {
        const { installPath } = await locateInstall(locators, (_locator, error) => {
            reporter.println(`Failed to locate Discord (${describeError(error)}). Will use the default path`);
        });
        reporter.println(`Found Discord install at ${installPath}`);

        const latestVersion = await fetchLatestVersion(config.versionUrl, httpClient);
        const installFresh = !(await pathExists(fileSystem, installPath));
        const currentVersion = installFresh
            ? zeroVersion()
            : await readInstalledVersion(installPath, fileSystem);
        reporter.println(`Latest version: ${latestVersion.version}`);
        reporter.println(`Current version: ${currentVersion.version}`);

        const plan = planUpdate(currentVersion, latestVersion, installFresh);
        if (plan.action === 'none') {
            reporter.println('No update available');
            return { installPath, currentVersion, latestVersion, plan };
        }

        reporter.println('Update available');
        await applyUpdate({
            config,
            installPath,
            version: latestVersion,
            fileSystem,
            httpClient,
            progressBarFactory: dependencies.progressBarFactory,
            reporter,
        });

        if (plan.action !== 'install-fresh') {
            return { installPath, currentVersion, latestVersion, plan };
        }

        const symlinkPath = await createConvenienceSymlink(defaultInstallPath(config.homeDir), config.homeDir, fileSystem);
        reporter.println(`Linked ${symlinkPath} -> ${defaultInstallPath(config.homeDir)}`);
        return { installPath, currentVersion, latestVersion, plan, symlinkPath };
    } finally {
        reporter.stop();
    }
}
