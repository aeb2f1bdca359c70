import { IProcessExecutor, NodeProcessExecutor } from './interfaces/process-interface';
import { ProcessOptions, ProcessResponse } from './models';

/**
 * Runs a command to completion, capturing its output.
 * Never rejects: spawn failures and non-zero exits are reported in the response.
 */
export async function runCommand(
    command: string,
    args: string[],
    options: ProcessOptions = {},
    processExecutor?: IProcessExecutor,
): Promise<ProcessResponse> {
    const executor = processExecutor || new NodeProcessExecutor();

    return new Promise((resolve) => {
        let stdout = '';
        let stderr = '';
        let settled = false;

        const finish = (response: ProcessResponse): void => {
            if (settled) return;
            settled = true;
            resolve(response);
        };

        const child = executor.spawn(command, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            shell: false,
            env: options.env,
        });

        child.stdout?.on('data', (chunk: Buffer | string) => {
            stdout += chunk.toString();
        });
        child.stderr?.on('data', (chunk: Buffer | string) => {
            stderr += chunk.toString();
        });

        child.on('close', (code: number | null) => {
            finish({
                success: code === 0,
                exitCode: code,
                stdout,
                stderr,
                error: code !== 0 ? `Process exited with code ${code}` : undefined,
            });
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
            let errorMessage = error.message;
            if (error.code === 'ENOENT') {
                errorMessage = `Executable not found: ${command}`;
            } else if (error.code === 'EACCES') {
                errorMessage = `Permission denied running ${command}`;
            }

            finish({
                success: false,
                exitCode: null,
                stdout,
                stderr,
                error: errorMessage,
            });
        });
    });
}
