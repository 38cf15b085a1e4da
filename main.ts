#!/usr/bin/env node
import { runCli } from './lib/cli';

async function main(): Promise<void> {
    const exitCode = await runCli(process.argv.slice(2));
    process.exit(exitCode);
}

main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(1);
});
