import { IFileSystem } from "../interfaces";

/**
 * Options for extracting a release archive
 */
export type ExtractOptions = {
    /** Number of leading path components dropped from every entry */
    strip?: number;
}

/**
 * Options for install operations
 */
export type InstallOptions = ExtractOptions & {
    fileSystem?: IFileSystem;
}
