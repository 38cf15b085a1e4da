import { StdioOptions } from 'child_process';

/**
 * Options for executing a single process
 */
export type ProcessOptions = {
    stdio?: StdioOptions;
    onSpawn?: (pid: number | undefined) => void;
}

/**
 * Response from executing a single process
 */
export type ProcessResponse = {
    success: boolean;
    exitCode: number | null;
    error?: string;
}

/**
 * Result of looking up a running process by name.
 * A failed lookup reports running: false and carries the failure message.
 */
export type ProcessLookupResult = {
    running: boolean;
    error?: string;
}
