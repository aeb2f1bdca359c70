import { IFileSystem, IHttpClient, IProgressBarFactory } from "../interfaces";

/**
 * Progress information for download operations.
 * A total of 0 means the server sent no usable Content-Length.
 */
export type Progress = {
    loaded: number;
    total: number;
}

/**
 * Options for a single file download
 */
export type DownloadOptions = {
    onProgress?: (progress: Progress) => void;
    fileSystem?: IFileSystem;
    httpClient?: IHttpClient;
}

/**
 * Options for an archive download rendered with a progress bar
 */
export type ArchiveDownloadOptions = DownloadOptions & {
    name?: string;
    progressBarFactory?: IProgressBarFactory;
}

/**
 * Options for a scoped temporary directory
 */
export type TempDirOptions = {
    tempRoot?: string;
    fileSystem?: IFileSystem;
}
