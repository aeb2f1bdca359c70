import { spawn, StdioOptions } from 'child_process';
import { EventEmitter } from 'events';

/**
 * The parts of a child process the updater reads: its output streams and
 * the 'close' / 'error' events
 */
export interface ISpawnedProcess extends EventEmitter {
    readonly stdout: NodeJS.ReadableStream | null;
    readonly stderr: NodeJS.ReadableStream | null;
}

export type SpawnOptions = {
    stdio?: StdioOptions;
    shell?: boolean;
    env?: NodeJS.ProcessEnv;
}

/**
 * Process execution abstraction interface for testability
 */
export interface IProcessExecutor {
    spawn(command: string, args: string[], options?: SpawnOptions): ISpawnedProcess;
}

/**
 * Default implementation using Node.js child_process
 */
export class NodeProcessExecutor implements IProcessExecutor {
    spawn(command: string, args: string[], options: SpawnOptions = {}): ISpawnedProcess {
        return spawn(command, args, options);
    }
}
