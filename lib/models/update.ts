import { SemVer } from 'semver';
import {
    IFileSystem,
    IHttpClient,
    InstallLocator,
    IProcessExecutor,
    IProgressBarFactory,
    IStatusReporter,
} from "../interfaces";
import { UpdatePlan } from './version';

/**
 * Settings resolved once per run
 */
export type UpdaterConfig = {
    homeDir: string;
    versionUrl: string;
    downloadBaseUrl: string;
    tempRoot: string;
}

/**
 * Collaborators for a run; anything omitted uses the real implementation
 */
export type UpdaterDependencies = {
    fileSystem?: IFileSystem;
    httpClient?: IHttpClient;
    processExecutor?: IProcessExecutor;
    locators?: InstallLocator[];
    progressBarFactory?: IProgressBarFactory;
    reporter?: IStatusReporter;
}

/**
 * What a completed run found and did
 */
export type UpdateOutcome = {
    installPath: string;
    currentVersion: SemVer;
    latestVersion: SemVer;
    plan: UpdatePlan;
    symlinkPath?: string;
}
