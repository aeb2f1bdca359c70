// ============================================================================
// Discord Release Endpoints
// ============================================================================

/**
 * Returns the latest stable Linux build as `{ "name": "0.0.x", ... }`
 */
export const VERSION_URL = 'https://discord.com/api/updates/stable?platform=linux';

/**
 * Base URL that versioned tarballs are published under
 */
export const DOWNLOAD_BASE_URL = 'https://dl.discordapp.net/apps/linux';

export function archiveFileName(version: string): string {
    return `discord-${version}.tar.gz`;
}

/**
 * Builds `{base}/{version}/discord-{version}.tar.gz`
 */
export function archiveUrl(baseUrl: string, version: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${version}/${archiveFileName(version)}`;
}
