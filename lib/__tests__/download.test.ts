import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import { downloadArchive, downloadFile, parseContentLength } from '../download';
import { IoError, NetworkError } from '../errors';
import { NodeFileSystem } from '../interfaces';
import { Progress } from '../models';
import { createMockFileSystem, createMockHttpClient, createMockProgressBarFactory } from './helpers/mocks';

function streamOf(...chunks: string[]): Readable {
    return Readable.from(chunks.map(chunk => Buffer.from(chunk)));
}

describe('download', () => {
    describe('parseContentLength', () => {
        it.each([
            ['1024', 1024],
            [2048, 2048],
            [undefined, 0],
            ['', 0],
            ['abc', 0],
            ['-5', 0],
            [null, 0],
        ])('should read %p as %p', (value, expected) => {
            expect(parseContentLength(value)).toBe(expected);
        });
    });

    describe('downloadFile', () => {
        let mockHttpClient: ReturnType<typeof createMockHttpClient>;
        let tempDir: string;

        beforeEach(() => {
            mockHttpClient = createMockHttpClient();
            tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'download-test-'));
        });

        afterEach(() => {
            fs.rmSync(tempDir, { recursive: true, force: true });
        });

        it('should stream the response body into the output file', async () => {
            const url = 'https://downloads.example.com/app.tar.gz';
            const outputPath = path.join(tempDir, 'app.tar.gz');
            mockHttpClient.request.mockResolvedValue({
                headers: { 'content-length': '9' },
                data: streamOf('test', ' data'),
            });

            await downloadFile(url, outputPath, {
                fileSystem: new NodeFileSystem(),
                httpClient: mockHttpClient,
            });

            expect(fs.readFileSync(outputPath, 'utf8')).toBe('test data');
            expect(mockHttpClient.request).toHaveBeenCalledWith({
                method: 'GET',
                url,
                responseType: 'stream',
            });
        });

        it('should report the total first and then every chunk', async () => {
            const events: Progress[] = [];
            mockHttpClient.request.mockResolvedValue({
                headers: { 'content-length': '9' },
                data: streamOf('test', ' data'),
            });

            await downloadFile('https://downloads.example.com/app.tar.gz', path.join(tempDir, 'out'), {
                httpClient: mockHttpClient,
                onProgress: (progress) => events.push(progress),
            });

            expect(events).toEqual([
                { loaded: 0, total: 9 },
                { loaded: 4, total: 9 },
                { loaded: 9, total: 9 },
            ]);
        });

        it('should report a total of 0 when there is no Content-Length', async () => {
            const events: Progress[] = [];
            mockHttpClient.request.mockResolvedValue({
                headers: {},
                data: streamOf('abc'),
            });

            await downloadFile('https://downloads.example.com/app.tar.gz', path.join(tempDir, 'out'), {
                httpClient: mockHttpClient,
                onProgress: (progress) => events.push(progress),
            });

            expect(events).toEqual([
                { loaded: 0, total: 0 },
                { loaded: 3, total: 0 },
            ]);
        });

        it('should raise a NetworkError when the request fails', async () => {
            const mockFileSystem = createMockFileSystem();
            mockHttpClient.request.mockRejectedValue(new Error('Request failed with status code 404'));

            const promise = downloadFile('https://downloads.example.com/missing.tar.gz', '/tmp/missing.tar.gz', {
                fileSystem: mockFileSystem,
                httpClient: mockHttpClient,
            });

            await expect(promise).rejects.toBeInstanceOf(NetworkError);
            await expect(promise).rejects.toThrow('Failed to download https://downloads.example.com/missing.tar.gz');
            expect(mockFileSystem.createWriteStream).not.toHaveBeenCalled();
        });

        it('should raise a NetworkError when the body fails mid-stream', async () => {
            const body = new Readable({
                read() {
                    this.push(Buffer.from('partial'));
                    this.destroy(new Error('socket hang up'));
                },
            });
            mockHttpClient.request.mockResolvedValue({ headers: { 'content-length': '100' }, data: body });

            const promise = downloadFile('https://downloads.example.com/app.tar.gz', path.join(tempDir, 'out'), {
                httpClient: mockHttpClient,
            });

            await expect(promise).rejects.toBeInstanceOf(NetworkError);
            await expect(promise).rejects.toThrow('Download of https://downloads.example.com/app.tar.gz was interrupted');
        });

        it('should raise an IoError when the file cannot be written', async () => {
            const mockFileSystem = createMockFileSystem();
            mockFileSystem.createWriteStream.mockReturnValue(new Writable({
                write(_chunk, _encoding, callback) {
                    callback(new Error('ENOSPC: no space left on device'));
                },
            }));
            mockHttpClient.request.mockResolvedValue({ headers: {}, data: streamOf('abc') });

            const promise = downloadFile('https://downloads.example.com/app.tar.gz', '/tmp/full-disk/out', {
                fileSystem: mockFileSystem,
                httpClient: mockHttpClient,
            });

            await expect(promise).rejects.toBeInstanceOf(IoError);
            await expect(promise).rejects.toThrow('Failed to write /tmp/full-disk/out');
        });
    });

    describe('downloadArchive', () => {
        let mockHttpClient: ReturnType<typeof createMockHttpClient>;
        let mockFileSystem: ReturnType<typeof createMockFileSystem>;
        let progressBarFactory: ReturnType<typeof createMockProgressBarFactory>;

        beforeEach(() => {
            mockHttpClient = createMockHttpClient();
            mockFileSystem = createMockFileSystem();
            progressBarFactory = createMockProgressBarFactory();
        });

        it('should drive a progress bar and stop it when done', async () => {
            mockHttpClient.request.mockResolvedValue({
                headers: { 'content-length': '9' },
                data: streamOf('test', ' data'),
            });

            await downloadArchive('https://downloads.example.com/app.tar.gz', '/tmp/app.tar.gz', {
                name: 'discord 0.0.42',
                fileSystem: mockFileSystem,
                httpClient: mockHttpClient,
                progressBarFactory,
            });

            expect(progressBarFactory.createBar).toHaveBeenCalledWith('discord 0.0.42');
            expect(progressBarFactory.bar.setTotal).toHaveBeenCalledTimes(1);
            expect(progressBarFactory.bar.setTotal).toHaveBeenCalledWith(9);
            expect(progressBarFactory.bar.update.mock.calls).toEqual([[0], [4], [9]]);
            expect(progressBarFactory.bar.stop).toHaveBeenCalledTimes(1);
        });

        it('should forward progress to the caller as well', async () => {
            const onProgress = jest.fn();
            mockHttpClient.request.mockResolvedValue({ headers: {}, data: streamOf('ab') });

            await downloadArchive('https://downloads.example.com/app.tar.gz', '/tmp/app.tar.gz', {
                fileSystem: mockFileSystem,
                httpClient: mockHttpClient,
                progressBarFactory,
                onProgress,
            });

            expect(onProgress).toHaveBeenLastCalledWith({ loaded: 2, total: 0 });
        });

        it('should stop the progress bar when the download fails', async () => {
            mockHttpClient.request.mockRejectedValue(new Error('ECONNRESET'));

            await expect(downloadArchive('https://downloads.example.com/app.tar.gz', '/tmp/app.tar.gz', {
                fileSystem: mockFileSystem,
                httpClient: mockHttpClient,
                progressBarFactory,
            })).rejects.toBeInstanceOf(NetworkError);

            expect(progressBarFactory.bar.stop).toHaveBeenCalledTimes(1);
            expect(progressBarFactory.bar.update).not.toHaveBeenCalled();
        });
    });
});
