import * as os from 'os';
import { DOWNLOAD_BASE_URL, VERSION_URL } from '../data/endpoints';
import { ConfigError } from './errors';
import { UpdaterConfig } from './models';

/**
 * Environment variables that override the release endpoints, e.g. for a mirror
 */
export const VERSION_URL_ENV = 'DISCORD_UPDATER_VERSION_URL';
export const DOWNLOAD_URL_ENV = 'DISCORD_UPDATER_DOWNLOAD_URL';

/**
 * Reads the run's configuration from the environment. HOME is required.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): UpdaterConfig {
    const homeDir = env.HOME?.trim();
    if (!homeDir) {
        throw new ConfigError('HOME is not set; cannot resolve the install location');
    }

    return {
        homeDir,
        versionUrl: env[VERSION_URL_ENV] || VERSION_URL,
        downloadBaseUrl: env[DOWNLOAD_URL_ENV] || DOWNLOAD_BASE_URL,
        tempRoot: os.tmpdir(),
    };
}
