import { getErrorMessage } from './errors';
import { IShellAccess, NodeShellAccess } from './interfaces';
import { ProcessLookupResult } from './models';

/**
 * Answers whether a process with a given name is running
 */
export interface IProcessInspector {
    inspect(processName: string): Promise<ProcessLookupResult>;
}

/**
 * Normalizes a target process name: trims it and drops a trailing .exe
 */
export function normalizeProcessName(processName: string): string {
    return processName.trim().replace(/\.exe$/i, '');
}

const PROCESS_NAME_PATTERN = /^[\w .-]+$/;

/**
 * Looks processes up with Get-Process.
 * A lookup that fails is reported as not running, with the failure message attached.
 */
export class PowerShellProcessInspector implements IProcessInspector {
    private readonly shell: IShellAccess;

    constructor(shellAccess?: IShellAccess) {
        this.shell = shellAccess || new NodeShellAccess();
    }

    async inspect(processName: string): Promise<ProcessLookupResult> {
        const name = normalizeProcessName(processName);
        if (!name) {
            return { running: false };
        }

        // Get-Process -Name expands wildcards, and the name ends up inside a cmd.exe string
        if (!PROCESS_NAME_PATTERN.test(name)) {
            return {
                running: false,
                error: `Invalid process name: ${name}. Use letters, digits, spaces, dots, dashes or underscores.`,
            };
        }

        try {
            const { stdout } = await this.shell.exec(
                `powershell -NoProfile -NonInteractive -Command "Get-Process -Name '${name}' -ErrorAction SilentlyContinue | Select-Object -First 1 -ExpandProperty Id"`,
            );
            return { running: stdout.trim().length > 0 };
        } catch (error) {
            return {
                running: false,
                error: `Failed to query process ${name}: ${getErrorMessage(error)}`,
            };
        }
    }
}
