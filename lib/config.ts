import { z } from 'zod';
import { ConfigError } from './errors';
import { LauncherConfig } from './models';

export const VERSION = '1.0.0';

const EnvSchema = z.object({
    DEPLOY_LAUNCHER_PATH: z.string().min(1).default('ServiceUI.exe'),
    DEPLOY_LAUNCHER_PROCESS: z.string().min(1).default('explorer.exe'),
    DEPLOY_EXECUTABLE_PATH: z.string().min(1).default('Deploy-Application.exe'),
    DEPLOY_LOG_DIR: z.string().min(1).default('C:\\Windows\\Logs\\Software'),
    DEPLOY_LOG_NAME: z
        .string()
        .regex(/^[\w.-]+$/, 'must be a plain file name without path separators')
        .default('IntuneDeployLauncher'),
    DEPLOY_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

/**
 * Builds the frozen run configuration from environment variables
 * @throws ConfigError when a variable is set to an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): LauncherConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    const vars = parsed.data;
    return Object.freeze({
        version: VERSION,
        launcherPath: vars.DEPLOY_LAUNCHER_PATH,
        launcherSessionProcess: vars.DEPLOY_LAUNCHER_PROCESS,
        deploymentExecutable: vars.DEPLOY_EXECUTABLE_PATH,
        logDirectory: vars.DEPLOY_LOG_DIR,
        logName: vars.DEPLOY_LOG_NAME,
        logLevel: vars.DEPLOY_LOG_LEVEL,
    });
}
