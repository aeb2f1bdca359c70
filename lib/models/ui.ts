import * as cliProgress from 'cli-progress';

/**
 * Options for configuring a progress bar
 */
export type ProgressBarProps = {
    format?: string;
    barCompleteChar?: string;
    barIncompleteChar?: string;
    hideCursor?: boolean;
    clearOnComplete?: boolean;
    preset?: cliProgress.Preset;
}

/**
 * Where the spinner writes. process.stdout satisfies this.
 */
export type OutputStream = {
    write(chunk: string): boolean;
    isTTY?: boolean;
}
