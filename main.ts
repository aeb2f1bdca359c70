#!/usr/bin/env node
import { loadConfig } from './lib/config';
import { describeError } from './lib/errors';
import { runUpdate } from './lib/updater';

async function main(): Promise<void> {
    const config = loadConfig();
    await runUpdate(config);
}

main().catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
});
