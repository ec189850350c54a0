import * as fs from 'node:fs/promises';
import type { PublisherConfig } from '../config/config-schema.js';
import { requireConfig } from '../config/json-config.js';
import type { CloudPartnerClient } from '../services/cloud-partner.js';
import {
    addImageVersionToOffer,
    deprecateImageInOfferDoc,
    parseImageUrn,
    removeImageVersionFromOffer,
    type OfferDocument,
} from '../services/offer-document.js';
import { MissingArgumentError, PublisherError } from '../types/errors.js';
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

const SUBCOMMANDS = [
    'publish',
    'go-live',
    'status',
    'upload-doc',
    'add-image-version',
    'remove-image-version',
    'deprecate-image',
] as const;

type OfferSubcommand = (typeof SUBCOMMANDS)[number];

const FAILURE_SUMMARY: Record<OfferSubcommand, string> = {
    publish: 'Unable to publish cloud partner offer.',
    'go-live': 'Unable to set cloud partner offer as go-live.',
    status: 'Unable to get cloud partner offer status.',
    'upload-doc': 'Unable to upload cloud partner offer document.',
    'add-image-version': 'Unable to add image to cloud partner offer.',
    'remove-image-version': 'Unable to remove image from cloud partner offer.',
    'deprecate-image': 'Unable to deprecate image in cloud partner offer.',
};

function isSubcommand(value: string | undefined): value is OfferSubcommand {
    return SUBCOMMANDS.some((candidate) => candidate === value);
}

function isOfferDocument(value: unknown): value is OfferDocument {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readOfferDocumentFile(filePath: string): Promise<OfferDocument> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new PublisherError(`Unable to read offer document ${filePath}: ${message}`, { cause: error });
    }
    if (!isOfferDocument(parsed)) {
        throw new PublisherError(`Offer document ${filePath} must hold a JSON object.`);
    }
    return parsed;
}

/** GET the offer document, apply `edit`, PUT the result back. */
async function editOfferDocument(
    partner: CloudPartnerClient,
    offerId: string,
    publisherId: string,
    edit: (doc: OfferDocument) => OfferDocument,
): Promise<void> {
    const doc = await partner.getOfferDocument(offerId, publisherId);
    await partner.putOfferDocument(offerId, publisherId, edit(doc));
}

async function runOffer(
    subcommand: OfferSubcommand,
    config: PublisherConfig,
    args: string[],
    services: ServiceFactory,
    signal?: AbortSignal,
): Promise<void> {
    switch (subcommand) {
        case 'publish': {
            const offerId = requireOption(args, '--offer-id');
            requireConfig(config, ['publisherId', 'notificationEmails']);
            const partner = await services.cloudPartner(config);
            const result = await partner.publishOffer(offerId, config.publisherId, config.notificationEmails, {
                wait: hasFlag(args, '--wait'),
                signal,
            });
            echoStyle(`Published cloud partner offer. Operation URI: ${result.operation}`, config.noColor, 'green');
            return;
        }
        case 'go-live': {
            const offerId = requireOption(args, '--offer-id');
            requireConfig(config, ['publisherId']);
            const partner = await services.cloudPartner(config);
            const result = await partner.goLive(offerId, config.publisherId, { wait: hasFlag(args, '--wait'), signal });
            echoStyle(`Cloud partner offer set as go-live. Operation URI: ${result.operation}`, config.noColor, 'green');
            return;
        }
        case 'status': {
            const offerId = requireOption(args, '--offer-id');
            requireConfig(config, ['publisherId']);
            const partner = await services.cloudPartner(config);
            echoStyle(await partner.getOfferStatus(offerId, config.publisherId), config.noColor);
            return;
        }
        case 'upload-doc': {
            const offerId = requireOption(args, '--offer-id');
            const doc = await readOfferDocumentFile(requireOption(args, '--offer-document-file'));
            requireConfig(config, ['publisherId']);
            const partner = await services.cloudPartner(config);
            await partner.putOfferDocument(offerId, config.publisherId, doc);
            echoStyle(`Offer document uploaded to ${offerId}.`, config.noColor, 'green');
            return;
        }
        case 'add-image-version': {
            const offerId = requireOption(args, '--offer-id');
            const imageName = requireOption(args, '--image-name');
            const description = requireOption(args, '--image-description');
            const label = requireOption(args, '--label');
            const sku = requireOption(args, '--sku');
            const blobUrl =
                readOption(args, '--blob-url') ??
                (await services.signedBlobUrl(config, requireOption(args, '--blob-name'), signal));
            requireConfig(config, ['publisherId']);
            const partner = await services.cloudPartner(config);
            await editOfferDocument(partner, offerId, config.publisherId, (doc) =>
                addImageVersionToOffer(doc, {
                    blobUrl,
                    description,
                    imageName,
                    label,
                    sku,
                    generationId: readOption(args, '--generation-id'),
                    generationSuffix: readOption(args, '--generation-suffix'),
                    vmImagesKey: readOption(args, '--vm-images-key'),
                }),
            );
            echoStyle(`Image ${imageName} added to ${offerId}/${sku}.`, config.noColor, 'green');
            return;
        }
        case 'remove-image-version': {
            const urn = readOption(args, '--image-urn');
            const target = urn
                ? parseImageUrn(urn)
                : {
                      offer: requireOption(args, '--offer-id'),
                      sku: requireOption(args, '--sku'),
                      version: requireOption(args, '--image-version'),
                      publisher: config.publisherId,
                  };
            const publisherId = target.publisher;
            if (!publisherId) {
                throw new MissingArgumentError('publisherId', 'Pass --publisher-id or an --image-urn.');
            }
            const partner = await services.cloudPartner(config);
            await editOfferDocument(partner, target.offer, publisherId, (doc) =>
                removeImageVersionFromOffer(doc, {
                    imageVersion: target.version,
                    sku: target.sku,
                    generationId: readOption(args, '--generation-id'),
                    vmImagesKey: readOption(args, '--vm-images-key'),
                }),
            );
            echoStyle(`Image version ${target.version} removed from ${target.offer}/${target.sku}.`, config.noColor, 'green');
            return;
        }
        case 'deprecate-image': {
            const offerId = requireOption(args, '--offer-id');
            const imageName = requireOption(args, '--image-name');
            const sku = requireOption(args, '--sku');
            requireConfig(config, ['publisherId']);
            const partner = await services.cloudPartner(config);
            await editOfferDocument(partner, offerId, config.publisherId, (doc) =>
                deprecateImageInOfferDoc(doc, { imageName, sku, vmImagesKey: readOption(args, '--vm-images-key') }),
            );
            echoStyle(`Image ${imageName} deprecated in ${offerId}/${sku}.`, config.noColor, 'green');
            return;
        }
    }
}

/**
 * Handles `offer <subcommand>` for cloud partner offers.
 * Returns true when the invocation was recognized (handled or failed), false otherwise.
 */
export async function handleOfferCli(
    argv: string[],
    services: ServiceFactory = createServiceFactory(),
    signal?: AbortSignal,
): Promise<boolean> {
    if (argv[0] !== 'offer') return false;

    const subcommand = argv[1];
    if (!isSubcommand(subcommand)) {
        printSubcommandUsage('offer', SUBCOMMANDS);
        return true;
    }

    const args = argv.slice(2);
    let noColor = hasFlag(args, '--no-color');
    try {
        const config = await loadCommandConfig(args);
        noColor = config.noColor;
        await runOffer(subcommand, config, args, services, signal);
    } catch (error) {
        reportFailure(FAILURE_SUMMARY[subcommand], error, noColor);
    }
    return true;
}
