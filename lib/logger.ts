import * as path from 'path';
import pino, { Logger, LoggerOptions } from 'pino';
import { IFileSystem, NodeFileSystem } from './interfaces';
import { LauncherConfig } from './models';

export type { Logger };

/**
 * Formats a date as YYYY-MM-DD in local time
 */
export function formatLogDate(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Path of the transcript for the given day. A new file starts each day.
 */
export function getTranscriptPath(config: LauncherConfig, date: Date = new Date()): string {
    return path.join(config.logDirectory, `${config.logName}_${formatLogDate(date)}.log`);
}

function loggerOptions(config: LauncherConfig): LoggerOptions {
    return {
        level: config.logLevel,
        base: { app: config.logName, version: config.version },
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: {
            err: pino.stdSerializers.err,
        },
    };
}

/**
 * Creates the transcript logger, appending JSON lines to the daily log file.
 * Writes are synchronous so nothing is lost on process.exit.
 */
export function createTranscriptLogger(
    config: LauncherConfig,
    options: { fileSystem?: IFileSystem; date?: Date } = {},
): Logger {
    const fileSys = options.fileSystem || new NodeFileSystem();

    if (!fileSys.existsSync(config.logDirectory)) {
        fileSys.mkdirSync(config.logDirectory, { recursive: true });
    }

    return pino(
        loggerOptions(config),
        pino.destination({ dest: getTranscriptPath(config, options.date), append: true, sync: true }),
    );
}

/**
 * Logger used when the transcript file cannot be opened: same format, written to stderr
 */
export function createFallbackLogger(config: LauncherConfig): Logger {
    return pino(
        loggerOptions(config),
        pino.destination({ dest: 2, sync: true }),
    );
}
