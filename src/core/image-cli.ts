import type { PublisherConfig } from '../config/config-schema.js';
import { requireConfig } from '../config/json-config.js';
import type { GalleryImageVersionRef } from '../services/image-service.js';
import { ValidationError } from '../types/errors.js';
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

const SUBCOMMANDS = ['exists', 'create', 'delete'] as const;

function readGeneration(args: string[]): 'V1' | 'V2' | undefined {
    const value = readOption(args, '--hyper-v-generation');
    if (value === undefined || value === 'V1' || value === 'V2') return value;
    throw new ValidationError(`Invalid --hyper-v-generation '${value}'.`, ['Use V1 or V2.']);
}

// ── image ────────────────────────────────────────────────────────────────────

async function runImage(
    subcommand: string | undefined,
    config: PublisherConfig,
    args: string[],
    services: ServiceFactory,
    signal?: AbortSignal,
): Promise<void> {
    switch (subcommand) {
        case 'exists': {
            const imageName = requireOption(args, '--image-name');
            const images = await services.imageService(config, signal);
            const exists = await images.imageExists(imageName);
            echoStyle(String(exists), config.noColor, exists ? 'green' : undefined);
            return;
        }
        case 'create': {
            const imageName = requireOption(args, '--image-name');
            const blobName = requireOption(args, '--blob-name');
            requireConfig(config, ['container', 'storageAccount', 'region']);
            const images = await services.imageService(config, signal);
            await images.createImage({
                imageName,
                blobName,
                container: config.container,
                storageAccount: config.storageAccount,
                region: config.region,
                forceReplace: hasFlag(args, '--force-replace'),
                hyperVGeneration: readGeneration(args),
                wait: !hasFlag(args, '--no-wait'),
            });
            echoStyle(`Image ${imageName} created.`, config.noColor, 'green');
            return;
        }
        case 'delete': {
            const imageName = requireOption(args, '--image-name');
            const images = await services.imageService(config, signal);
            await images.deleteImage(imageName, { wait: !hasFlag(args, '--no-wait') });
            echoStyle(`Image ${imageName} deleted.`, config.noColor, 'green');
            return;
        }
        default:
            printSubcommandUsage('image', SUBCOMMANDS);
    }
}

/**
 * Handles `image exists|create|delete`.
 * Returns true when the invocation was recognized (handled or failed), false otherwise.
 */
export async function handleImageCli(
    argv: string[],
    services: ServiceFactory = createServiceFactory(),
    signal?: AbortSignal,
): Promise<boolean> {
    if (argv[0] !== 'image') return false;
    const args = argv.slice(2);
    let noColor = hasFlag(args, '--no-color');

    try {
        const config = await loadCommandConfig(args);
        noColor = config.noColor;
        await runImage(argv[1], config, args, services, signal);
    } catch (error) {
        reportFailure(`Unable to run image ${argv[1] ?? ''}`.trim(), error, noColor);
    }
    return true;
}

// ── gallery-image-version ────────────────────────────────────────────────────

function readVersionRef(args: string[]): GalleryImageVersionRef {
    return {
        galleryName: requireOption(args, '--gallery-name'),
        galleryImageName: requireOption(args, '--gallery-image-name'),
        version: requireOption(args, '--image-version'),
        resourceGroup: readOption(args, '--gallery-resource-group'),
    };
}

async function runGalleryImageVersion(
    subcommand: string | undefined,
    config: PublisherConfig,
    args: string[],
    services: ServiceFactory,
    signal?: AbortSignal,
): Promise<void> {
    switch (subcommand) {
        case 'exists': {
            const ref = readVersionRef(args);
            const images = await services.imageService(config, signal);
            const exists = await images.galleryImageVersionExists(ref);
            echoStyle(String(exists), config.noColor, exists ? 'green' : undefined);
            return;
        }
        case 'create': {
            const ref = readVersionRef(args);
            const blobName = requireOption(args, '--blob-name');
            requireConfig(config, ['container', 'storageAccount', 'region']);
            const images = await services.imageService(config, signal);
            await images.createGalleryImageVersion({
                ...ref,
                blobName,
                container: config.container,
                storageAccount: config.storageAccount,
                region: config.region,
                wait: !hasFlag(args, '--no-wait'),
            });
            echoStyle(`Gallery image version ${ref.galleryImageName} ${ref.version} created.`, config.noColor, 'green');
            return;
        }
        case 'delete': {
            const ref = readVersionRef(args);
            const images = await services.imageService(config, signal);
            await images.deleteGalleryImageVersion(ref, { wait: !hasFlag(args, '--no-wait') });
            echoStyle(`Gallery image version ${ref.galleryImageName} ${ref.version} deleted.`, config.noColor, 'green');
            return;
        }
        default:
            printSubcommandUsage('gallery-image-version', SUBCOMMANDS);
    }
}

/**
 * Handles `gallery-image-version exists|create|delete`.
 */
export async function handleGalleryImageVersionCli(
    argv: string[],
    services: ServiceFactory = createServiceFactory(),
    signal?: AbortSignal,
): Promise<boolean> {
    if (argv[0] !== 'gallery-image-version') return false;
    const args = argv.slice(2);
    let noColor = hasFlag(args, '--no-color');

    try {
        const config = await loadCommandConfig(args);
        noColor = config.noColor;
        await runGalleryImageVersion(argv[1], config, args, services, signal);
    } catch (error) {
        reportFailure(`Unable to run gallery-image-version ${argv[1] ?? ''}`.trim(), error, noColor);
    }
    return true;
}
