import { spawn, ChildProcess, StdioOptions } from 'child_process';

/**
 * Process execution abstraction interface for testability
 */
export interface IProcessExecutor {
    spawn(command: string, args: string[], options?: { stdio?: StdioOptions; shell?: boolean; windowsHide?: boolean }): ChildProcess;
}

/**
 * Default implementation using Node.js child_process
 */
export class NodeProcessExecutor implements IProcessExecutor {
    spawn(command: string, args: string[], options: { stdio?: StdioOptions; shell?: boolean; windowsHide?: boolean } = {}): ChildProcess {
        return spawn(command, args, options);
    }
}
