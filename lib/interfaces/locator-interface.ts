
/**
 * A way of finding the directory an existing installation lives in.
 * `locate` rejects with InstallNotFoundError when it has nothing to offer.
 */
export interface InstallLocator {
    readonly name: string;
    locate(): Promise<string>;
}
