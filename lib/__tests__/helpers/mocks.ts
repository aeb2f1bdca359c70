/**
 * Mock helpers and factories for testing
 *
 * Note: These types use jest.Mock which is available in test files
 * that have @types/jest installed and configured.
 */
import { EventEmitter } from 'events';
import { PassThrough, Writable } from 'stream';

// Type definitions for mocks
export interface MockFileSystem {
    exists: jest.Mock<Promise<boolean>, [string]>;
    mkdir: jest.Mock<Promise<void>, [string, { recursive?: boolean }?]>;
    mkdtemp: jest.Mock<Promise<string>, [string]>;
    readFile: jest.Mock<Promise<string>, [string]>;
    realpath: jest.Mock<Promise<string>, [string]>;
    rm: jest.Mock<Promise<void>, [string, { recursive?: boolean; force?: boolean }?]>;
    symlink: jest.Mock<Promise<void>, [string, string]>;
    createWriteStream: jest.Mock<Writable, [string]>;
}

export interface MockHttpClient {
    request: jest.Mock;
}

export interface MockProcessExecutor {
    spawn: jest.Mock;
}

export interface MockProgressBar {
    setTotal: jest.Mock<void, [number]>;
    update: jest.Mock<void, [number]>;
    stop: jest.Mock<void, []>;
}

export interface MockProgressBarFactory {
    createBar: jest.Mock<MockProgressBar, [string]>;
    bar: MockProgressBar;
}

export interface MockReporter {
    start: jest.Mock<void, [string?]>;
    println: jest.Mock<void, [string]>;
    setMessage: jest.Mock<void, [string]>;
    finish: jest.Mock<void, [string]>;
    stop: jest.Mock<void, []>;
}

/**
 * A child process stand-in: emit 'data' on stdout/stderr and 'close' / 'error' on the process
 */
export class FakeChildProcess extends EventEmitter {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
}

export function createMockFileSystem(): MockFileSystem {
    return {
        exists: jest.fn<Promise<boolean>, [string]>().mockResolvedValue(false),
        mkdir: jest.fn<Promise<void>, [string, { recursive?: boolean }?]>().mockResolvedValue(undefined),
        mkdtemp: jest.fn<Promise<string>, [string]>(async (prefix: string) => `${prefix}abc123`),
        readFile: jest.fn<Promise<string>, [string]>(),
        realpath: jest.fn<Promise<string>, [string]>(async (target: string) => target),
        rm: jest.fn<Promise<void>, [string, { recursive?: boolean; force?: boolean }?]>().mockResolvedValue(undefined),
        symlink: jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined),
        createWriteStream: jest.fn<Writable, [string]>(() => new PassThrough()),
    };
}

export function createMockHttpClient(): MockHttpClient {
    return {
        request: jest.fn(),
    };
}

export function createMockProcessExecutor(): MockProcessExecutor {
    return {
        spawn: jest.fn(),
    };
}

export function createMockProgressBarFactory(): MockProgressBarFactory {
    const bar: MockProgressBar = {
        setTotal: jest.fn<void, [number]>(),
        update: jest.fn<void, [number]>(),
        stop: jest.fn<void, []>(),
    };
    return {
        createBar: jest.fn<MockProgressBar, [string]>(() => bar),
        bar,
    };
}

export function createMockReporter(): MockReporter {
    return {
        start: jest.fn<void, [string?]>(),
        println: jest.fn<void, [string]>(),
        setMessage: jest.fn<void, [string]>(),
        finish: jest.fn<void, [string]>(),
        stop: jest.fn<void, []>(),
    };
}
