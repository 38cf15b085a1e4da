import { ConflictingModeError, DeferredError } from './errors';
import { DeploymentDecision, DeploymentRequest, DeployMode, DeploymentType } from './models';

export type ResolveResult =
    | { success: true; decision: DeploymentDecision }
    | { success: false; error: ConflictingModeError | DeferredError };

/**
 * Rejects a request that asks for both install and uninstall.
 * Needs no process state, so the run can stop before any lookup.
 */
export function checkModeConflict(request: DeploymentRequest): ConflictingModeError | null {
    return request.install && request.uninstall ? new ConflictingModeError() : null;
}

/**
 * Decides deployment type and mode from the request flags and process state
 */
export function resolveDeployment(request: DeploymentRequest, isProcessRunning: boolean): ResolveResult {
    const conflict = checkModeConflict(request);
    if (conflict) {
        return { success: false, error: conflict };
    }

    if (isProcessRunning && request.doNotDisturb) {
        return { success: false, error: new DeferredError(request.targetProcess) };
    }

    const deploymentType: DeploymentType = request.uninstall ? 'Uninstall' : 'Install';
    const deployMode: DeployMode = isProcessRunning || request.forceInteractive ? 'Interactive' : 'Silent';

    return { success: true, decision: Object.freeze({ deploymentType, deployMode }) };
}
