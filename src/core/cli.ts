import type { ConfigLocation } from '../config/json-config.js';
import { resolveConfig } from '../config/json-config.js';
import type { PublisherConfig } from '../config/config-schema.js';
import { MissingArgumentError, ValidationError } from '../types/errors.js';
import { configureLogger } from '../utils/logger.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: vm-image-publisher <command> <subcommand> [options]

Commands:
  blob exists|upload|delete                    Manage image blobs in a storage container
  image exists|create|delete                   Manage compute images
  gallery-image-version exists|create|delete   Manage shared gallery image versions
  offer <subcommand>                           Manage cloud partner offers:
                                                 publish, go-live, status, upload-doc,
                                                 add-image-version, remove-image-version,
                                                 deprecate-image
  config show|set                              Inspect or edit a configuration profile

Shared options:
  --profile <name>              Configuration profile (default: default)
  --config-dir <dir>            Directory holding <profile>.json
  --credentials-file <path>     Service principal JSON file
  --sas-token <token>           Shared access signature for blob commands
  --resource-group <name>       Resource group
  --storage-account <name>      Storage account
  --container <name>            Blob container
  --region <name>               Region for new images
  --publisher-id <id>           Cloud partner publisher
  --notification-emails <list>  Comma-separated addresses for offer publishing
  --max-workers <n>             Concurrent chunk uploads
  --max-attempts <n>            Attempts per remote call
  --chunk-size <bytes>          Upload chunk size
  --poll-interval <seconds>     Seconds between status probes
  --timeout <seconds>           Seconds before a wait gives up
  --log-dir <dir>               Write daily activity logs to this directory
  --verbose | --quiet           Raise or lower console verbosity
  --no-color                    Plain console output
  --help, -h                    Show this help message

Examples:
  vm-image-publisher blob upload --image-file ./img.vhd --container images
  vm-image-publisher blob upload --image-file ./img.vhd.xz --expand-image --blob-name img.vhd
  vm-image-publisher image create --image-name sles-20240105 --blob-name img.vhd
  vm-image-publisher offer status --offer-id sles --publisher-id example
`.trim();

export const KNOWN_COMMANDS = new Set(['blob', 'image', 'gallery-image-version', 'offer', 'config']);

/** Exit code for usage errors and missing arguments; everything else exits with 1. */
export const USAGE_EXIT_CODE = 2;

// ── Argument helpers ─────────────────────────────────────────────────────────

export function readOption(args: string[], flag: string): string | undefined {
    const index = args.indexOf(flag);
    if (index === -1) {
        return undefined;
    }
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new ValidationError(`Missing value for ${flag}.`);
    }
    return value;
}

export function requireOption(args: string[], flag: string): string {
    const value = readOption(args, flag);
    if (value === undefined) {
        throw new MissingArgumentError(flag.replace(/^--/, ''), `Pass ${flag} <value>.`);
    }
    return value;
}

export function hasFlag(args: string[], flag: string): boolean {
    return args.includes(flag);
}

function readNumber(args: string[], flag: string): number | undefined {
    const value = readOption(args, flag);
    return value === undefined ? undefined : Number(value);
}

export interface SharedOptions {
    location: ConfigLocation;
    cliValues: Partial<PublisherConfig>;
}

/** Options every command accepts. Values are validated when the config is resolved. */
export function parseSharedOptions(args: string[]): SharedOptions {
    const logLevel = hasFlag(args, '--verbose') ? 'debug' : hasFlag(args, '--quiet') ? 'error' : undefined;
    return {
        location: {
            profile: readOption(args, '--profile'),
            configDir: readOption(args, '--config-dir'),
        },
        cliValues: {
            credentialsFile: readOption(args, '--credentials-file'),
            sasToken: readOption(args, '--sas-token'),
            resourceGroup: readOption(args, '--resource-group'),
            storageAccount: readOption(args, '--storage-account'),
            container: readOption(args, '--container'),
            region: readOption(args, '--region'),
            publisherId: readOption(args, '--publisher-id'),
            notificationEmails: readOption(args, '--notification-emails'),
            maxWorkers: readNumber(args, '--max-workers'),
            maxAttempts: readNumber(args, '--max-attempts'),
            chunkSize: readNumber(args, '--chunk-size'),
            pollInterval: readNumber(args, '--poll-interval'),
            timeout: readNumber(args, '--timeout'),
            logDir: readOption(args, '--log-dir'),
            logLevel,
            noColor: hasFlag(args, '--no-color') ? true : undefined,
        },
    };
}

/** Resolve the effective config for a command and configure logging from it. */
export async function loadCommandConfig(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<PublisherConfig> {
    const { location, cliValues } = parseSharedOptions(args);
    const config = await resolveConfig({ ...location, cliValues, env });
    configureLogger({ level: config.logLevel, logDir: config.logDir, noColor: config.noColor });
    return config;
}

// ── Output ───────────────────────────────────────────────────────────────────

const COLORS = { green: 32, red: 31, yellow: 33 } as const;

export function echoStyle(message: string, noColor: boolean, color?: keyof typeof COLORS): void {
    console.log(noColor || !color ? message : `\u001b[${COLORS[color]}m${message}\u001b[0m`);
}

/**
 * Print a failed command's error and set the exit code: 2 for usage errors, 1 otherwise.
 */
export function reportFailure(summary: string, error: unknown, noColor = false): void {
    const message = error instanceof Error ? error.message : String(error);
    const paint = (text: string) => (noColor ? text : `\u001b[31m${text}\u001b[0m`);
    console.error(paint(summary));
    console.error(paint(message));
    if (error instanceof ValidationError) {
        for (const hint of error.hints) console.error(`  ${hint}`);
    }
    process.exitCode = isUsageError(error) ? USAGE_EXIT_CODE : 1;
}

export function isUsageError(error: unknown): boolean {
    return error instanceof MissingArgumentError || error instanceof ValidationError;
}

/** Prints a subcommand list and marks the invocation as a usage error. */
export function printSubcommandUsage(command: string, subcommands: readonly string[]): void {
    console.error(`Usage: vm-image-publisher ${command} <${subcommands.join('|')}> [options]`);
    process.exitCode = USAGE_EXIT_CODE;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (argv.length > 0 && !argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets the usage exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    const command = argv[0];
    if (command === undefined || KNOWN_COMMANDS.has(command)) {
        return false;
    }

    console.error(`Unknown command: '${command}'`);
    console.error(`Run 'vm-image-publisher --help' to see available commands.`);
    process.exitCode = USAGE_EXIT_CODE;
    return true;
}
