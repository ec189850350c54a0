import * as fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'error';

export interface LoggerOptions {
    level?: LogLevel;
    /** Directory receiving daily `<yyyy-mm-dd>.md` activity files. Unset disables file output. */
    logDir?: string;
    noColor?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, error: 30 };

const SENSITIVE_ENV_KEYS = ['IMGPUB_SAS_TOKEN', 'IMGPUB_CLIENT_SECRET', 'AZURE_CLIENT_SECRET'];

const SENSITIVE_PATTERNS: Array<[RegExp, string]> = [
    [/(Bearer\s+)[A-Za-z0-9\-._~+/]+=*/gi, '$1[REDACTED]'],
    [/([?&]sig=)[^&\s"']+/gi, '$1[REDACTED]'],
    [/("?(?:clientSecret|client_secret|accountKey|account_key|access_token)"?\s*[:=]\s*"?)[^"&\s,}]+/gi, '$1[REDACTED]'],
    [/(AccountKey=)[^;\s]+/gi, '$1[REDACTED]'],
];

let currentOptions: Required<Omit<LoggerOptions, 'logDir'>> & { logDir?: string } = {
    level: 'error',
    noColor: false,
};

/** Set log level and destinations. Called once by the CLI before any command runs. */
export function configureLogger(options: LoggerOptions): void {
    currentOptions = {
        level: options.level ?? currentOptions.level,
        noColor: options.noColor ?? currentOptions.noColor,
        logDir: options.logDir,
    };
}

/**
 * Redact credentials from text before it reaches a console or a log file.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const [pattern, replacement] of SENSITIVE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, replacement);
    }

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.length >= 8) {
            scrubbed = scrubbed.split(value).join('[REDACTED]');
        }
    }

    return scrubbed;
}

function colorize(message: string, level: LogLevel): string {
    if (currentOptions.noColor) return message;
    if (level === 'error') return `\u001b[31m${message}\u001b[0m`;
    if (level === 'debug') return `\u001b[2m${message}\u001b[0m`;
    return message;
}

async function appendEntry(heading: string, body: string): Promise<void> {
    if (!currentOptions.logDir) return;

    const now = new Date();
    const filePath = path.join(currentOptions.logDir, `${now.toISOString().slice(0, 10)}.md`);
    const entry = `## ${heading} @ ${now.toISOString()}\n${body}\n\n`;

    try {
        await fs.mkdir(currentOptions.logDir, { recursive: true });
        await fs.appendFile(filePath, entry, 'utf8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write ${filePath}: ${message}`);
    }
}

/**
 * Record an activity line: echoed to stderr when `level` passes the configured level,
 * and appended to the daily activity file when a log directory is configured.
 */
export async function logActivity(message: string, level: LogLevel = 'info'): Promise<void> {
    const scrubbed = scrubSensitiveText(message);

    if (LEVEL_RANK[level] >= LEVEL_RANK[currentOptions.level]) {
        console.error(colorize(scrubbed, level));
    }

    await appendEntry('Activity', scrubbed);
}

/** Record one remote call at debug level. */
export async function logRequest(
    method: string,
    url: string,
    status: number | undefined,
    durationMs: number,
): Promise<void> {
    const line = `${method.toUpperCase()} ${url} -> ${status ?? 'no response'} (${durationMs}ms)`;
    await logActivity(`[Request] ${line}`, 'debug');
}
