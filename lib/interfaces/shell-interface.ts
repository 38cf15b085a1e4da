import { exec } from 'child_process';
import { promisify } from 'util';

const execAsync = promisify(exec);

/**
 * Shell command abstraction interface for testability
 */
export interface IShellAccess {
    exec(command: string): Promise<{ stdout: string; stderr: string }>;
}

/**
 * Default implementation using Node.js child_process.exec
 */
export class NodeShellAccess implements IShellAccess {
    async exec(command: string): Promise<{ stdout: string; stderr: string }> {
        return execAsync(command, { windowsHide: true });
    }
}
