export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Settings fixed for the lifetime of a run
 */
export type LauncherConfig = {
    readonly version: string;
    /** Interactive-session launcher that hosts the deployment UI */
    readonly launcherPath: string;
    /** Process whose session the launcher attaches to */
    readonly launcherSessionProcess: string;
    readonly deploymentExecutable: string;
    readonly logDirectory: string;
    readonly logName: string;
    readonly logLevel: LogLevel;
}
