/**
 * Mock helpers and factories for testing
 *
 * Note: These types use jest.Mock which is available in test files
 * that have @types/jest installed and configured.
 */
import { ChildProcess, StdioOptions } from 'child_process';
import pino from 'pino';
import { Logger } from '../../logger';
import { DeploymentDecision, InvocationResult, ProcessLookupResult } from '../../models';

type SpawnOptions = { stdio?: StdioOptions; shell?: boolean; windowsHide?: boolean };

export interface MockFileSystem {
    existsSync: jest.Mock<boolean, [string]>;
    mkdirSync: jest.Mock<void, [string, { recursive?: boolean }?]>;
}

export interface MockProcessSpawn {
    spawn: jest.Mock<ChildProcess, [string, string[], SpawnOptions?]>;
}

export interface MockShell {
    exec: jest.Mock<Promise<{ stdout: string; stderr: string }>, [string]>;
}

export interface MockInspector {
    inspect: jest.Mock<Promise<ProcessLookupResult>, [string]>;
}

export interface MockInvoker {
    invoke: jest.Mock<Promise<InvocationResult>, [DeploymentDecision]>;
}

export type LogEntry = {
    level: number;
    msg: string;
    [key: string]: unknown;
}

export function createMockFileSystem(): MockFileSystem {
    return {
        existsSync: jest.fn<boolean, [string]>(),
        mkdirSync: jest.fn<void, [string, { recursive?: boolean }?]>(),
    };
}

export function createMockProcessSpawn(): MockProcessSpawn {
    return {
        spawn: jest.fn<ChildProcess, [string, string[], SpawnOptions?]>(),
    };
}

export function createMockShell(): MockShell {
    return {
        exec: jest.fn<Promise<{ stdout: string; stderr: string }>, [string]>(),
    };
}

export function createMockInspector(result: ProcessLookupResult = { running: false }): MockInspector {
    return {
        inspect: jest.fn<Promise<ProcessLookupResult>, [string]>().mockResolvedValue(result),
    };
}

export function createMockInvoker(result: InvocationResult = { exitCode: 0 }): MockInvoker {
    return {
        invoke: jest.fn<Promise<InvocationResult>, [DeploymentDecision]>().mockResolvedValue(result),
    };
}

/**
 * Child process that emits the given events on the next tick, in order
 */
export function createFakeChildProcess(events: Array<[string, ...unknown[]]>): ChildProcess {
    const child = new ChildProcess();
    setImmediate(() => {
        for (const [event, ...args] of events) {
            child.emit(event, ...args);
        }
    });
    return child;
}

/**
 * Logger that collects parsed log lines in memory
 */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    const logger = pino({ level: 'trace' }, {
        write(line: string) {
            entries.push(JSON.parse(line));
        },
    });
    return { logger, entries };
}
