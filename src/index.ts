#!/usr/bin/env node
import 'dotenv/config';
import { handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { handleBlobCli } from './core/blob-cli.js';
import { handleConfigCli } from './core/config-cli.js';
import { handleGalleryImageVersionCli, handleImageCli } from './core/image-cli.js';
import { handleOfferCli } from './core/offer-cli.js';
import { createServiceFactory } from './core/service-factory.js';
import { logActivity } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot handlers ──────────────────────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 2);
}

// ── Commands ─────────────────────────────────────────────────────────────────

const controller = new AbortController();
process.once('SIGINT', () => {
    void logActivity('[CLI] Interrupted; abandoning the running operation.', 'error');
    controller.abort();
});

const services = createServiceFactory();
const { signal } = controller;

const handled =
    (await handleBlobCli(argv, services, signal)) ||
    (await handleImageCli(argv, services, signal)) ||
    (await handleGalleryImageVersionCli(argv, services, signal)) ||
    (await handleOfferCli(argv, services, signal)) ||
    (await handleConfigCli(argv));

if (!handled) {
    handleHelpCli([]);
    process.exitCode = 2;
}
