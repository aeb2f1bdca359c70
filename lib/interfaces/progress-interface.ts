
/**
 * Progress bar abstraction interface for testability
 */
export interface IProgressBar {
    setTotal(total: number): void;
    update(value: number): void;
    stop(): void;
}

export interface IProgressBarFactory {
    createBar(name: string): IProgressBar;
}

/**
 * Line-oriented status output with a transient "current activity" message
 */
export interface IStatusReporter {
    start(message?: string): void;
    println(message: string): void;
    setMessage(message: string): void;
    finish(message: string): void;
    stop(): void;
}
