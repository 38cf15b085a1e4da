import { loadConfig } from './config';
import { runDeployment } from './deployment';
import { DeploymentExitError, getErrorMessage, UsageError, EXIT_CODES } from './errors';
import { IDeploymentInvoker, ServiceUIDeploymentInvoker } from './invoke';
import { createFallbackLogger, createTranscriptLogger, Logger } from './logger';
import { DeploymentRequest, LauncherConfig } from './models';
import { IProcessInspector, PowerShellProcessInspector } from './process-inspector';

type SwitchName = 'install' | 'uninstall' | 'doNotDisturb' | 'forceInteractive';

const SWITCHES = new Map<string, SwitchName>([
    ['install', 'install'],
    ['uninstall', 'uninstall'],
    ['donotdisturb', 'doNotDisturb'],
    ['forceinteractive', 'forceInteractive'],
]);

const HELP_FLAGS = ['h', 'help', '?'];

export type ParsedArguments = {
    help: boolean;
    request: DeploymentRequest;
}

/**
 * Options for running the CLI. Anything left out uses the production default.
 */
export type CliOptions = {
    env?: Record<string, string | undefined>;
    createLogger?: (config: LauncherConfig) => Logger;
    createFallbackLogger?: (config: LauncherConfig) => Logger;
    inspector?: IProcessInspector;
    invoker?: IDeploymentInvoker;
}

/**
 * Reads the value of a switch given as -Name:value
 */
function parseSwitchValue(arg: string, value: string): boolean {
    const normalized = value.toLowerCase();
    if (normalized === '$true' || normalized === 'true') {
        return true;
    }
    if (normalized === '$false' || normalized === 'false') {
        return false;
    }
    throw new UsageError(`Invalid switch value: ${arg}`);
}

/**
 * Parses PowerShell-style arguments into a deployment request.
 * Names are case-insensitive; -Name, --Name and -Name:value are accepted.
 * @throws UsageError on unknown arguments or a missing -TargetProcess value
 */
export function parseArguments(argv: string[]): ParsedArguments {
    const request: DeploymentRequest = {
        targetProcess: '',
        install: false,
        uninstall: false,
        doNotDisturb: false,
        forceInteractive: false,
    };
    let help = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('-')) {
            throw new UsageError(`Unexpected argument: ${arg}`);
        }

        const body = arg.replace(/^--?/, '');
        const colonIndex = body.indexOf(':');
        const name = (colonIndex >= 0 ? body.slice(0, colonIndex) : body).toLowerCase();
        const inlineValue = colonIndex >= 0 ? body.slice(colonIndex + 1) : undefined;

        if (HELP_FLAGS.includes(name)) {
            help = true;
            continue;
        }

        if (name === 'targetprocess') {
            if (inlineValue !== undefined) {
                request.targetProcess = inlineValue;
                continue;
            }
            const next = argv[i + 1];
            if (next === undefined || next.startsWith('-')) {
                throw new UsageError('-TargetProcess requires a process name');
            }
            request.targetProcess = next;
            i++;
            continue;
        }

        const switchName = SWITCHES.get(name);
        if (!switchName) {
            throw new UsageError(`Unknown argument: ${arg}`);
        }
        request[switchName] = inlineValue === undefined ? true : parseSwitchValue(arg, inlineValue);
    }

    return { help, request };
}

/**
 * Prints usage information
 */
export function printHelp(): void {
    console.log(`
intune-deploy-launcher - Decide how to run a PSADT deployment and launch it

Usage:
  intune-deploy-launcher [-Install | -Uninstall] [-TargetProcess <name>] [-DoNotDisturb] [-ForceInteractive]

Options:
  -Install                 Install the application (default when neither mode is given)
  -Uninstall               Uninstall the application
  -TargetProcess <name>    Process to check before deploying, without extension (e.g. outlook)
  -DoNotDisturb            Defer the deployment (exit 60012) while the target process is running
  -ForceInteractive        Show the deployment UI even when the target process is not running
  -h, --help               Show this help message

Exit codes:
  <n>      Exit code of the deployment executable
  1        -Install and -Uninstall were both given, or the arguments are invalid
  60012    Target process is running and -DoNotDisturb was given; Intune retries later
`);
}

/**
 * Runs the launcher for the given arguments and returns the exit code
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
    let parsed: ParsedArguments;
    try {
        parsed = parseArguments(argv);
    } catch (error) {
        if (error instanceof UsageError) {
            console.error(error.message);
            printHelp();
            return error.exitCode;
        }
        throw error;
    }

    if (parsed.help) {
        printHelp();
        return 0;
    }

    let config: LauncherConfig;
    try {
        config = loadConfig(options.env);
    } catch (error) {
        console.error(getErrorMessage(error));
        return error instanceof DeploymentExitError ? error.exitCode : EXIT_CODES.CONFIG;
    }

    let logger: Logger;
    try {
        logger = (options.createLogger || createTranscriptLogger)(config);
    } catch (error) {
        console.error(`Warning: cannot open transcript in ${config.logDirectory}: ${getErrorMessage(error)}. Logging to stderr.`);
        logger = (options.createFallbackLogger || createFallbackLogger)(config);
    }

    const inspector = options.inspector || new PowerShellProcessInspector();
    const invoker = options.invoker || new ServiceUIDeploymentInvoker(
        config,
        undefined,
        pid => logger.debug({ pid, launcher: config.launcherPath }, 'Launcher started'),
    );

    try {
        return await runDeployment(parsed.request, { inspector, invoker, logger });
    } catch (error) {
        console.error('Error:', getErrorMessage(error));
        logger.fatal({ err: error }, 'Deployment run failed unexpectedly');
        return EXIT_CODES.UNEXPECTED;
    }
}
