/**
 * Flags a single run is started with
 */
export type DeploymentRequest = {
    /** Process name without extension. Empty means no process is checked. */
    targetProcess: string;
    install: boolean;
    uninstall: boolean;
    doNotDisturb: boolean;
    forceInteractive: boolean;
}

export type DeploymentType = 'Install' | 'Uninstall';

export type DeployMode = 'Interactive' | 'Silent';

/**
 * Parameters handed to the deployment executable
 */
export type DeploymentDecision = {
    readonly deploymentType: DeploymentType;
    readonly deployMode: DeployMode;
}

/**
 * Outcome of launching the deployment executable
 */
export type InvocationResult = {
    exitCode: number;
    error?: string;
}
