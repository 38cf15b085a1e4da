import { ChildProcess } from 'child_process';
import { EXIT_CODES, getErrorMessage } from './errors';
import { IProcessExecutor, NodeProcessExecutor } from './interfaces';
import { DeploymentDecision, InvocationResult, LauncherConfig, ProcessOptions, ProcessResponse } from './models';

/**
 * Launches the deployment executable for a decision
 */
export interface IDeploymentInvoker {
    invoke(decision: DeploymentDecision): Promise<InvocationResult>;
}

/**
 * Low-level function to execute a process and wait for it to exit.
 * Never rejects: spawn failures resolve with exitCode null and a message.
 */
export async function executeProcess(
    executablePath: string,
    args: string[],
    options: ProcessOptions = {},
    processExecutor?: IProcessExecutor,
): Promise<ProcessResponse> {
    const { stdio = 'ignore', onSpawn } = options;
    const executor = processExecutor || new NodeProcessExecutor();

    return new Promise((resolve) => {
        let child: ChildProcess;
        try {
            child = executor.spawn(executablePath, args, {
                stdio,
                shell: false,
                windowsHide: false,
            });
        } catch (error) {
            resolve({
                success: false,
                exitCode: null,
                error: `Failed to start ${executablePath}: ${getErrorMessage(error)}`,
            });
            return;
        }

        if (onSpawn) {
            child.on('spawn', () => onSpawn(child.pid));
        }

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            let errorMessage: string | undefined;
            if (code === null) {
                errorMessage = signal ? `Process terminated by ${signal}` : 'Process exited without an exit code';
            } else if (code !== 0) {
                errorMessage = `Process exited with code ${code}`;
            }

            resolve({
                success: code === 0,
                exitCode: code,
                error: errorMessage,
            });
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
            let errorMessage = error.message;
            if (error.code === 'EACCES') {
                errorMessage = `Access denied starting ${executablePath}. The deployment must run with administrator privileges. (Original error: ${error.message})`;
            } else if (error.code === 'ENOENT') {
                errorMessage = `Executable not found: ${executablePath}. Check that it is packaged next to the deployment files.`;
            }

            resolve({
                success: false,
                exitCode: null,
                error: errorMessage,
            });
        });
    });
}

/**
 * Arguments for the session launcher: the session to attach to,
 * then the deployment executable with its two parameters
 */
export function buildLauncherArgs(config: LauncherConfig, decision: DeploymentDecision): string[] {
    return [
        `-process:${config.launcherSessionProcess}`,
        config.deploymentExecutable,
        '-DeploymentType',
        decision.deploymentType,
        '-DeployMode',
        decision.deployMode,
    ];
}

/**
 * Runs the deployment executable through ServiceUI so its UI reaches the logged-on user
 */
export class ServiceUIDeploymentInvoker implements IDeploymentInvoker {
    private readonly config: LauncherConfig;
    private readonly executor: IProcessExecutor;
    private readonly onSpawn?: (pid: number | undefined) => void;

    constructor(config: LauncherConfig, processExecutor?: IProcessExecutor, onSpawn?: (pid: number | undefined) => void) {
        this.config = config;
        this.executor = processExecutor || new NodeProcessExecutor();
        this.onSpawn = onSpawn;
    }

    async invoke(decision: DeploymentDecision): Promise<InvocationResult> {
        const response = await executeProcess(
            this.config.launcherPath,
            buildLauncherArgs(this.config, decision),
            { onSpawn: this.onSpawn },
            this.executor,
        );

        if (response.exitCode === null) {
            return {
                exitCode: EXIT_CODES.INDETERMINATE,
                error: response.error ?? `${this.config.launcherPath} exited without an exit code`,
            };
        }

        return { exitCode: response.exitCode };
    }
}
