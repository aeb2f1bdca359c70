/**
 * Options for running a command to completion
 */
export type ProcessOptions = {
    env?: NodeJS.ProcessEnv;
}

/**
 * Response from running a command to completion
 */
export type ProcessResponse = {
    success: boolean;
    exitCode: number | null;
    stdout: string;
    stderr: string;
    error?: string;
}
