import * as fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { MissingArgumentError, PublisherError, ValidationError } from '../types/errors.js';
import { logActivity, type LogLevel } from '../utils/logger.js';
import {
    CONFIG_DIR_ENV,
    CONFIG_SCHEMA,
    DEFAULT_CONFIG,
    DEFAULT_PROFILE,
    LOG_LEVELS,
    PROFILE_ENV,
    findFieldSpec,
    type ConfigFieldSpec,
    type ConfigKey,
    type PublisherConfig,
} from './config-schema.js';

/** Parsed values from one source, keyed by config field. */
export type ConfigLayer = Map<ConfigKey, string | number | boolean>;

export interface ConfigLocation {
    configDir?: string;
    profile?: string;
}

export interface ResolveConfigOptions extends ConfigLocation {
    /** Values given on the command line; undefined entries are ignored. */
    cliValues?: Partial<PublisherConfig>;
    env?: NodeJS.ProcessEnv;
}

export type RequiredConfig<K extends ConfigKey> = PublisherConfig & { [P in K]-?: NonNullable<PublisherConfig[P]> };

function expandHome(filePath: string): string {
    return filePath.startsWith('~') ? path.join(os.homedir(), filePath.slice(1)) : filePath;
}

export function getConfigDir(overrideDir?: string, env: NodeJS.ProcessEnv = process.env): string {
    const dir = overrideDir || env[CONFIG_DIR_ENV] || path.join(os.homedir(), '.config', 'vm-image-publisher');
    return path.resolve(expandHome(dir));
}

export function getConfigPath(location: ConfigLocation = {}, env: NodeJS.ProcessEnv = process.env): string {
    const profile = location.profile || env[PROFILE_ENV] || DEFAULT_PROFILE;
    return path.join(getConfigDir(location.configDir, env), `${profile}.json`);
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

/** Parse and validate one raw value against its field spec. */
export function parseFieldValue(spec: ConfigFieldSpec, raw: unknown, origin: string): string | number | boolean {
    const invalid = (expected: string) =>
        new ValidationError(`Invalid value for '${spec.key}' in ${origin}: expected ${expected}.`, [spec.remediation]);

    switch (spec.type) {
        case 'string':
            if (typeof raw !== 'string') throw invalid('a string');
            return raw;
        case 'positive-integer': {
            const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw.trim()) : raw;
            if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
                throw invalid('a positive integer');
            }
            return value;
        }
        case 'boolean': {
            if (typeof raw === 'boolean') return raw;
            const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
            if (['true', '1', 'yes'].includes(normalized)) return true;
            if (['false', '0', 'no'].includes(normalized)) return false;
            throw invalid('true or false');
        }
        case 'log-level': {
            const level = LOG_LEVELS.find((candidate) => candidate === raw);
            if (!level) throw invalid(LOG_LEVELS.join(', '));
            return level;
        }
    }
}

/** Validate a parsed profile document. Unknown keys are rejected. */
export function parseConfigDocument(document: unknown, origin: string): ConfigLayer {
    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
        throw new ValidationError(`Config file ${origin} must hold a JSON object.`);
    }

    const layer: ConfigLayer = new Map();
    for (const [key, raw] of Object.entries(document)) {
        const spec = findFieldSpec(key);
        if (!spec) {
            throw new ValidationError(`Unknown config key '${key}' in ${origin}.`, [
                `Recognized keys: ${CONFIG_SCHEMA.map((field) => field.key).join(', ')}.`,
            ]);
        }
        if (raw === null || raw === undefined) continue;
        layer.set(spec.key, parseFieldValue(spec, raw, origin));
    }
    return layer;
}

/** Read `<configDir>/<profile>.json`. A missing file is an empty layer. */
export async function readConfig(location: ConfigLocation = {}, env: NodeJS.ProcessEnv = process.env): Promise<ConfigLayer> {
    const targetPath = getConfigPath(location, env);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return new Map();
        const message = error instanceof Error ? error.message : String(error);
        throw new PublisherError(`Failed to read config file at ${targetPath}: ${message}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new PublisherError(`Failed to parse config file at ${targetPath}: ${message}`, { cause: error });
    }
    return parseConfigDocument(parsed, targetPath);
}

/** `IMGPUB_*` overrides. Empty variables are ignored. */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
    const layer: ConfigLayer = new Map();
    for (const spec of CONFIG_SCHEMA) {
        const raw = env[spec.env];
        if (raw === undefined || raw.trim() === '') continue;
        layer.set(spec.key, parseFieldValue(spec, raw, `environment variable ${spec.env}`));
    }
    return layer;
}

function layerFromValues(values: Partial<PublisherConfig>): ConfigLayer {
    const layer: ConfigLayer = new Map();
    for (const spec of CONFIG_SCHEMA) {
        const value = values[spec.key];
        if (value === undefined) continue;
        layer.set(spec.key, parseFieldValue(spec, value, 'command line'));
    }
    return layer;
}

function stringValue(layer: ConfigLayer, key: ConfigKey): string | undefined {
    const value = layer.get(key);
    return typeof value === 'string' ? value : undefined;
}

function numberValue(layer: ConfigLayer, key: ConfigKey): number | undefined {
    const value = layer.get(key);
    return typeof value === 'number' ? value : undefined;
}

function logLevelValue(layer: ConfigLayer): LogLevel | undefined {
    const value = layer.get('logLevel');
    return LOG_LEVELS.find((level) => level === value);
}

/** Overlay layers in order and fill the gaps from {@link DEFAULT_CONFIG}. */
export function mergeConfigLayers(...layers: ConfigLayer[]): PublisherConfig {
    const merged: ConfigLayer = new Map();
    for (const layer of layers) {
        for (const [key, value] of layer) merged.set(key, value);
    }

    const noColor = merged.get('noColor');
    return {
        maxWorkers: numberValue(merged, 'maxWorkers'),
        maxAttempts: numberValue(merged, 'maxAttempts') ?? DEFAULT_CONFIG.maxAttempts,
        chunkSize: numberValue(merged, 'chunkSize') ?? DEFAULT_CONFIG.chunkSize,
        pollInterval: numberValue(merged, 'pollInterval') ?? DEFAULT_CONFIG.pollInterval,
        timeout: numberValue(merged, 'timeout') ?? DEFAULT_CONFIG.timeout,
        credentialsFile: stringValue(merged, 'credentialsFile'),
        sasToken: stringValue(merged, 'sasToken'),
        resourceGroup: stringValue(merged, 'resourceGroup'),
        storageAccount: stringValue(merged, 'storageAccount'),
        container: stringValue(merged, 'container'),
        region: stringValue(merged, 'region'),
        publisherId: stringValue(merged, 'publisherId'),
        notificationEmails: stringValue(merged, 'notificationEmails'),
        logLevel: logLevelValue(merged) ?? DEFAULT_CONFIG.logLevel,
        noColor: typeof noColor === 'boolean' ? noColor : DEFAULT_CONFIG.noColor,
        logDir: stringValue(merged, 'logDir'),
    };
}

/** Defaults, then the profile file, then `IMGPUB_*` variables, then command-line values. */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<PublisherConfig> {
    const env = options.env ?? process.env;
    const fileLayer = await readConfig(options, env);
    return mergeConfigLayers(fileLayer, readEnvConfig(env), layerFromValues(options.cliValues ?? {}));
}

/** Persist a profile. Written to a temp file first and renamed over the target. */
export async function writeConfig(
    config: Partial<PublisherConfig> | ConfigLayer,
    location: ConfigLocation = {},
    env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
    const targetPath = getConfigPath(location, env);
    const document = Object.fromEntries(config instanceof Map ? config : layerFromValues(config));
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, JSON.stringify(document, null, 2), { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        const message = error instanceof Error ? error.message : String(error);
        throw new PublisherError(`Failed to save config to ${targetPath}: ${message}`, { cause: error });
    }
    void logActivity(`[Config] Saved profile to ${targetPath}.`, 'debug');
    return targetPath;
}

/** Throw {@link MissingArgumentError} for the first listed field without a value. */
export function requireConfig<K extends ConfigKey>(
    config: PublisherConfig,
    fields: readonly K[],
): asserts config is RequiredConfig<K> {
    for (const field of fields) {
        const value = config[field];
        if (value === undefined || value === '') {
            throw new MissingArgumentError(field, findFieldSpec(field)?.remediation);
        }
    }
}
