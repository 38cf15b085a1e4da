import { IDeploymentInvoker } from './invoke';
import { Logger } from './logger';
import { DeploymentDecision, DeploymentRequest } from './models';
import { IProcessInspector } from './process-inspector';
import { checkModeConflict, resolveDeployment } from './resolver';

/**
 * Collaborators a deployment run talks to
 */
export type DeploymentDependencies = {
    inspector: IProcessInspector;
    invoker: IDeploymentInvoker;
    logger: Logger;
}

/**
 * Status line printed before the deployment executable is launched
 */
export function formatStatusLine(decision: DeploymentDecision, targetProcess: string): string {
    return `DeploymentType: ${decision.deploymentType}, DeployMode: ${decision.deployMode}, TargetProcess: ${targetProcess || '(none)'}`;
}

/**
 * Runs one deployment: validate flags, inspect the target process,
 * decide type and mode, launch, and return the exit code to report
 */
export async function runDeployment(
    request: DeploymentRequest,
    dependencies: DeploymentDependencies,
): Promise<number> {
    const { inspector, invoker, logger } = dependencies;

    logger.info({ request }, 'Deployment run started');

    const conflict = checkModeConflict(request);
    if (conflict) {
        console.error(conflict.message);
        logger.error({ exitCode: conflict.exitCode }, conflict.message);
        return conflict.exitCode;
    }

    const lookup = await inspector.inspect(request.targetProcess);
    if (lookup.error) {
        logger.warn({ targetProcess: request.targetProcess, error: lookup.error }, 'Process lookup failed, treating target as not running');
    }
    logger.info({ targetProcess: request.targetProcess, running: lookup.running }, 'Process lookup completed');

    const result = resolveDeployment(request, lookup.running);
    if (!result.success) {
        console.error(result.error.message);
        logger.warn({ exitCode: result.error.exitCode }, result.error.message);
        return result.error.exitCode;
    }

    const statusLine = formatStatusLine(result.decision, request.targetProcess);
    console.log(statusLine);
    logger.info({ decision: result.decision }, statusLine);

    const invocation = await invoker.invoke(result.decision);
    if (invocation.error) {
        console.error(`Deployment launch failed: ${invocation.error}`);
        logger.error({ error: invocation.error }, 'Deployment launch failed');
    }

    console.log(`Exit code: ${invocation.exitCode}`);
    logger.info({ exitCode: invocation.exitCode }, 'Deployment finished');

    return invocation.exitCode;
}
