/**
 * Exit codes reported to Intune
 */
export const EXIT_CODES = {
    /** Indeterminate: the launcher never reported a code */
    INDETERMINATE: 0,
    CONFLICTING_MODE: 1,
    USAGE: 1,
    CONFIG: 1,
    UNEXPECTED: 1,
    /** Target process busy and Do Not Disturb set; Intune retries later */
    DEFERRED: 60012,
} as const;

/**
 * Error that ends the run with a specific exit code
 */
export class DeploymentExitError extends Error {
    readonly exitCode: number;

    constructor(message: string, exitCode: number) {
        super(message);
        this.name = 'DeploymentExitError';
        this.exitCode = exitCode;
    }
}

/**
 * Both -Install and -Uninstall were given
 */
export class ConflictingModeError extends DeploymentExitError {
    constructor() {
        super('Cannot use both -Install and -Uninstall. Choose one.', EXIT_CODES.CONFLICTING_MODE);
        this.name = 'ConflictingModeError';
    }
}

/**
 * Target process is running and Do Not Disturb is set
 */
export class DeferredError extends DeploymentExitError {
    readonly targetProcess: string;

    constructor(targetProcess: string) {
        super(`${targetProcess} is running and -DoNotDisturb is set. Deployment deferred.`, EXIT_CODES.DEFERRED);
        this.name = 'DeferredError';
        this.targetProcess = targetProcess;
    }
}

export class UsageError extends DeploymentExitError {
    constructor(message: string) {
        super(message, EXIT_CODES.USAGE);
        this.name = 'UsageError';
    }
}

export class ConfigError extends DeploymentExitError {
    constructor(message: string) {
        super(message, EXIT_CODES.CONFIG);
        this.name = 'ConfigError';
    }
}

/**
 * Extracts a message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
