import { types } from 'util';

export type UpdaterErrorKind = 'not-found' | 'network' | 'parse' | 'io' | 'extraction' | 'config';

/**
 * Base class for every failure the updater reports.
 * `kind` lets callers branch without instanceof chains.
 */
export abstract class UpdaterError extends Error {
    abstract readonly kind: UpdaterErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * No existing installation could be found. Recoverable: the default path is used instead.
 */
export class InstallNotFoundError extends UpdaterError {
    readonly kind = 'not-found';
}

export class NetworkError extends UpdaterError {
    readonly kind = 'network';
}

/**
 * Malformed version payload, local or remote
 */
export class ParseError extends UpdaterError {
    readonly kind = 'parse';
}

export class IoError extends UpdaterError {
    readonly kind = 'io';
}

/**
 * Archive extraction failed. `output` holds the extractor's diagnostic text.
 */
export class ExtractionError extends UpdaterError {
    readonly kind = 'extraction';
    readonly output: string;

    constructor(message: string, output: string, options?: { cause?: unknown }) {
        super(message, options);
        this.output = output;
    }
}

export class ConfigError extends UpdaterError {
    readonly kind = 'config';
}

/**
 * True for errors from any realm; `fs` and `tar` errors can fail `instanceof Error` under a sandboxed runner
 */
export function isError(value: unknown): value is Error {
    return value instanceof Error || types.isNativeError(value);
}

/**
 * Renders an error and its chain of causes as a single line
 */
export function describeError(error: unknown): string {
    if (!isError(error)) {
        return String(error);
    }

    const parts: string[] = [error.message];
    let cause: unknown = error.cause;
    while (cause !== undefined) {
        if (isError(cause)) {
            parts.push(cause.message);
            cause = cause.cause;
        } else {
            parts.push(String(cause));
            cause = undefined;
        }
    }

    let description = parts.filter(part => part.length > 0).join(': ');
    if (error instanceof ExtractionError && error.output.length > 0 && !description.includes(error.output)) {
        description += `\n${error.output}`;
    }
    return description;
}
