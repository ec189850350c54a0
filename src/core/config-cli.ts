import { CONFIG_SCHEMA, findFieldSpec } from '../config/config-schema.js';
import { getConfigPath, parseFieldValue, readConfig, writeConfig } from '../config/json-config.js';
import { ValidationError } from '../types/errors.js';
import { hasFlag, loadCommandConfig, parseSharedOptions, printSubcommandUsage, reportFailure } from './cli.js';

async function runShow(args: string[]): Promise<void> {
    const config = await loadCommandConfig(args);
    const { location } = parseSharedOptions(args);

    console.log(`Profile: ${getConfigPath(location)}`);
    for (const spec of CONFIG_SCHEMA) {
        const value = config[spec.key];
        if (value === undefined) continue;
        console.log(`  ${spec.key} = ${spec.secret ? '[REDACTED]' : String(value)}`);
    }
}

async function runSet(args: string[]): Promise<void> {
    const [key, value] = args;
    if (!key || value === undefined || key.startsWith('--')) {
        throw new ValidationError('Usage: config set <key> <value> [--profile <name>] [--config-dir <dir>]');
    }
    const spec = findFieldSpec(key);
    if (!spec) {
        throw new ValidationError(`Unknown config key '${key}'.`, [
            `Recognized keys: ${CONFIG_SCHEMA.map((field) => field.key).join(', ')}.`,
        ]);
    }

    const { location } = parseSharedOptions(args.slice(2));
    const layer = await readConfig(location);
    layer.set(spec.key, parseFieldValue(spec, value, 'command line'));
    const savedTo = await writeConfig(layer, location);
    console.log(`Saved ${spec.key} to ${savedTo}.`);
}

/**
 * Handles `config show|set`.
 * Returns true when the invocation was recognized (handled or failed), false otherwise.
 */
export async function handleConfigCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'config') return false;

    const subcommand = argv[1];
    const args = argv.slice(2);
    try {
        switch (subcommand) {
            case 'show':
                await runShow(args);
                return true;
            case 'set':
                await runSet(args);
                return true;
            default:
                printSubcommandUsage('config', ['show', 'set']);
                return true;
        }
    } catch (error) {
        reportFailure(`Config command failed.`, error, hasFlag(args, '--no-color'));
        return true;
    }
}
