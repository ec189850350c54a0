import type { PublisherConfig } from '../config/config-schema.js';
import { createServiceFactory, type ServiceFactory } from './service-factory.js';
import {
    echoStyle,
    hasFlag,
    loadCommandConfig,
    printSubcommandUsage,
    readOption,
    reportFailure,
    requireOption,
} from './cli.js';

const SUBCOMMANDS = ['exists', 'upload', 'delete'] as const;

async function runExists(config: PublisherConfig, args: string[], services: ServiceFactory): Promise<void> {
    const blobName = requireOption(args, '--blob-name');
    const blobs = await services.blobService(config);
    const exists = await blobs.blobExists(blobName);
    echoStyle(String(exists), config.noColor, exists ? 'green' : undefined);
}

async function runUpload(
    config: PublisherConfig,
    args: string[],
    services: ServiceFactory,
    signal?: AbortSignal,
): Promise<void> {
    const imageFile = requireOption(args, '--image-file');
    const blobs = await services.blobService(config);
    const result = await blobs.uploadImageBlob(imageFile, {
        blobName: readOption(args, '--blob-name'),
        forceReplace: hasFlag(args, '--force-replace'),
        pageBlob: !hasFlag(args, '--block-blob'),
        expandImage: hasFlag(args, '--expand-image'),
        maxWorkers: config.maxWorkers,
        maxAttempts: config.maxAttempts,
        chunkSize: config.chunkSize,
        signal,
    });
    echoStyle(
        `Image blob ${result.blobName} uploaded (${result.report.bytes} bytes in ${result.report.chunks} chunk(s)).`,
        config.noColor,
        'green',
    );
}

async function runDelete(config: PublisherConfig, args: string[], services: ServiceFactory): Promise<void> {
    const blobName = requireOption(args, '--blob-name');
    const blobs = await services.blobService(config);
    const deleted = await blobs.deleteBlob(blobName);
    if (deleted) {
        echoStyle(`Blob ${blobName} deleted.`, config.noColor, 'green');
    } else {
        echoStyle(`Blob ${blobName} not found. Nothing deleted.`, config.noColor, 'yellow');
    }
}

/**
 * Handles `blob exists|upload|delete`.
 * Returns true when the invocation was recognized (handled or failed), false otherwise.
 */
export async function handleBlobCli(
    argv: string[],
    services: ServiceFactory = createServiceFactory(),
    signal?: AbortSignal,
): Promise<boolean> {
    if (argv[0] !== 'blob') return false;

    const subcommand = argv[1];
    const args = argv.slice(2);
    let noColor = hasFlag(args, '--no-color');

    try {
        const config = await loadCommandConfig(args);
        noColor = config.noColor;

        switch (subcommand) {
            case 'exists':
                await runExists(config, args, services);
                return true;
            case 'upload':
                await runUpload(config, args, services, signal);
                return true;
            case 'delete':
                await runDelete(config, args, services);
                return true;
            default:
                printSubcommandUsage('blob', SUBCOMMANDS);
                return true;
        }
    } catch (error) {
        reportFailure(`Unable to run blob ${subcommand ?? ''}`.trim(), error, noColor);
        return true;
    }
}
