import * as cliProgress from 'cli-progress';
import { IProgressBar, IProgressBarFactory, IStatusReporter } from './interfaces/progress-interface';
import { OutputStream, ProgressBarProps } from './models';

/**
 * Wrapper for a cli-progress bar to match our interface
 */
class CliProgressBarWrapper implements IProgressBar {
    private bar: cliProgress.SingleBar;

    constructor(bar: cliProgress.SingleBar) {
        this.bar = bar;
    }

    setTotal(total: number): void {
        this.bar.setTotal(total);
    }

    update(value: number): void {
        this.bar.update(value);
    }

    stop(): void {
        this.bar.stop();
    }
}

/**
 * Default progress bar factory implementation.
 * A total of 0 renders as an unknown-size download.
 */
export class CliProgressBarFactory implements IProgressBarFactory {
    private readonly props: ProgressBarProps;

    constructor(props: ProgressBarProps = {}) {
        this.props = props;
    }

    createBar(name: string): IProgressBar {
        const options = this.props;
        const bar = new cliProgress.SingleBar({
            format: options.format ?? '{name} |{bar}| {percentage}% | {value}/{total} bytes | ETA: {eta}s',
            barCompleteChar: options.barCompleteChar ?? '█',
            barIncompleteChar: options.barIncompleteChar ?? '░',
            hideCursor: options.hideCursor ?? true,
            clearOnComplete: options.clearOnComplete ?? true,
        }, options.preset ?? cliProgress.Presets.shades_classic);

        bar.start(0, 0, { name });
        return new CliProgressBarWrapper(bar);
    }
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export const SPINNER_INTERVAL_MS = 100;

/**
 * Status lines plus a spinner for the current activity.
 * On a TTY the spinner redraws every 100ms; elsewhere every message is
 * written as a plain line and no timer runs.
 */
export class Spinner implements IStatusReporter {
    private readonly stream: OutputStream;
    private message = '';
    private frameIndex = 0;
    private updateInterval: NodeJS.Timeout | null = null;

    constructor(stream: OutputStream = process.stdout) {
        this.stream = stream;
    }

    private get interactive(): boolean {
        return this.stream.isTTY === true;
    }

    private clearLine(): void {
        this.stream.write('\r\x1b[K');
    }

    private render(): void {
        if (!this.message) return;
        const frame = SPINNER_FRAMES[this.frameIndex % SPINNER_FRAMES.length];
        this.clearLine();
        this.stream.write(`${frame} ${this.message}`);
        this.frameIndex++;
    }

    private stopTimer(): void {
        if (this.updateInterval) {
            clearInterval(this.updateInterval);
            this.updateInterval = null;
        }
    }

    start(message = ''): void {
        this.message = message;
        if (!this.interactive || this.updateInterval) {
            return;
        }
        this.updateInterval = setInterval(() => {
            this.render();
        }, SPINNER_INTERVAL_MS);
    }

    println(message: string): void {
        if (!this.interactive) {
            this.stream.write(`${message}\n`);
            return;
        }
        this.clearLine();
        this.stream.write(`${message}\n`);
        this.render();
    }

    setMessage(message: string): void {
        this.message = message;
        if (!this.interactive) {
            this.stream.write(`${message}\n`);
            return;
        }
        this.render();
    }

    finish(message: string): void {
        this.stopTimer();
        this.message = '';
        if (this.interactive) {
            this.clearLine();
        }
        this.stream.write(`✓ ${message}\n`);
    }

    stop(): void {
        this.stopTimer();
        if (this.interactive && this.message) {
            this.clearLine();
        }
        this.message = '';
    }
}
