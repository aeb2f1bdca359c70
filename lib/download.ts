import { Readable } from 'stream';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { IHttpClient, AxiosHttpClient } from './interfaces/http-interface';
import { IoError, NetworkError } from './errors';
import { ArchiveDownloadOptions, DownloadOptions, Progress } from './models';

/**
 * Reads a Content-Length header value; anything unusable counts as unknown (0)
 */
export function parseContentLength(value: unknown): number {
    const parsed = typeof value === 'number' ? value : typeof value === 'string' ? parseInt(value, 10) : NaN;
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

/**
 * Low-level function to stream a URL into a file.
 * Reports `{ loaded: 0, total }` once the response headers arrive, then once per chunk.
 */
export async function downloadFile(
    url: string,
    outputPath: string,
    options: DownloadOptions = {},
): Promise<void> {
    const fs: IFileSystem = options.fileSystem || new NodeFileSystem();
    const http: IHttpClient = options.httpClient || new AxiosHttpClient();
    const { onProgress } = options;

    let body: Readable;
    let total: number;
    try {
        const response = await http.request<Readable>({
            method: 'GET',
            url,
            responseType: 'stream',
        });
        body = response.data;
        total = parseContentLength(response.headers['content-length']);
    } catch (error) {
        throw new NetworkError(`Failed to download ${url}`, { cause: error });
    }

    let loaded = 0;
    onProgress?.({ loaded, total });

    const writer = fs.createWriteStream(outputPath);

    await new Promise<void>((resolve, reject) => {
        let failed = false;

        // Settle only once the file handle is closed, so the caller can remove the file right away
        const fail = (error: Error): void => {
            if (failed) return;
            failed = true;
            body.unpipe(writer);
            body.destroy();
            if (writer.closed) {
                reject(error);
                return;
            }
            writer.once('close', () => reject(error));
            writer.destroy();
        };

        body.on('data', (chunk: Buffer) => {
            loaded += chunk.length;
            onProgress?.({ loaded, total });
        });
        body.on('error', (error: Error) => {
            fail(new NetworkError(`Download of ${url} was interrupted`, { cause: error }));
        });
        writer.on('error', (error: Error) => {
            fail(new IoError(`Failed to write ${outputPath}`, { cause: error }));
        });
        writer.on('finish', () => resolve());
        body.pipe(writer);
    });
}

/**
 * Downloads an archive with a progress bar.
 * The bar is always stopped, so a failed download doesn't leave it on screen.
 */
export async function downloadArchive(
    url: string,
    outputPath: string,
    options: ArchiveDownloadOptions = {},
): Promise<void> {
    const { name = 'download', progressBarFactory, onProgress, fileSystem, httpClient } = options;

    let factory = progressBarFactory;
    if (!factory) {
        const { CliProgressBarFactory } = await import('./ui');
        factory = new CliProgressBarFactory();
    }
    const progressBar = factory.createBar(name);

    let knownTotal: number | undefined;
    try {
        await downloadFile(url, outputPath, {
            fileSystem,
            httpClient,
            onProgress: (progress: Progress) => {
                if (progress.total !== knownTotal) {
                    knownTotal = progress.total;
                    progressBar.setTotal(progress.total);
                }
                progressBar.update(progress.loaded);
                onProgress?.(progress);
            },
        });
    } finally {
        progressBar.stop();
    }
}
