import * as path from 'path';
import * as semver from 'semver';
import { SemVer } from 'semver';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { IHttpClient, AxiosHttpClient } from './interfaces/http-interface';
import { IoError, NetworkError, ParseError } from './errors';
import { UpdatePlan } from './models';

/**
 * Version assumed when nothing is installed yet. A new instance per call, since `SemVer` is mutable.
 */
export function zeroVersion(): SemVer {
    return new SemVer('0.0.0');
}

/**
 * Path of the metadata file inside an install, relative to the install path
 */
export const BUILD_INFO_PATH = path.join('resources', 'build_info.json');

function pickVersionField(payload: unknown): string {
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
        throw new ParseError('Version payload is not a JSON object');
    }

    let field: string;
    let value: unknown;
    if ('version' in payload) {
        field = 'version';
        value = payload.version;
    } else if ('name' in payload) {
        field = 'name';
        value = payload.name;
    } else {
        throw new ParseError('Version payload has neither a "version" nor a "name" field');
    }

    if (typeof value !== 'string') {
        throw new ParseError(`Version payload field "${field}" is not a string`);
    }
    return value;
}

/**
 * Parses `{"version": "x.y.z"}` (or `{"name": "x.y.z"}`) into a semantic version
 */
export function parseVersion(payload: string | Buffer): SemVer {
    let decoded: unknown;
    try {
        decoded = JSON.parse(payload.toString());
    } catch (error) {
        throw new ParseError('Version payload is not valid JSON', { cause: error });
    }

    const raw = pickVersionField(decoded);
    // semver.parse tolerates a leading "v" or "=" and surrounding whitespace
    const version = raw === raw.trim() && !/^[v=]/i.test(raw) ? semver.parse(raw) : null;
    if (!version) {
        throw new ParseError(`Invalid semantic version: "${raw}"`);
    }
    return version;
}

/**
 * Fetches the latest published version
 */
export async function fetchLatestVersion(url: string, httpClient?: IHttpClient): Promise<SemVer> {
    const http = httpClient || new AxiosHttpClient();

    let body: string;
    try {
        const response = await http.request<string>({
            method: 'GET',
            url,
            responseType: 'text',
        });
        body = response.data;
    } catch (error) {
        throw new NetworkError(`Failed to fetch the latest version from ${url}`, { cause: error });
    }

    return parseVersion(body);
}

/**
 * Reads the version of the copy installed at `installPath`
 */
export async function readInstalledVersion(installPath: string, fileSystem?: IFileSystem): Promise<SemVer> {
    const fs = fileSystem || new NodeFileSystem();
    const buildInfoPath = path.join(installPath, BUILD_INFO_PATH);

    let contents: string;
    try {
        contents = await fs.readFile(buildInfoPath);
    } catch (error) {
        throw new IoError(`Failed to read ${buildInfoPath}`, { cause: error });
    }

    try {
        return parseVersion(contents);
    } catch (error) {
        if (error instanceof ParseError) {
            throw new ParseError(`Failed to parse ${buildInfoPath}: ${error.message}`, { cause: error.cause });
        }
        throw error;
    }
}

/**
 * Decides what to do given the installed and published versions.
 * Anything at or above `latest` is left alone, including a newer local build.
 */
export function planUpdate(current: SemVer, latest: SemVer, installFresh: boolean): UpdatePlan {
    if (semver.lte(latest, current)) {
        return { action: 'none', current, latest };
    }
    if (installFresh) {
        return { action: 'install-fresh', latest };
    }
    return { action: 'upgrade', current, latest };
}
