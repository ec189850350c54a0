import { OfferDocumentError, ValidationError } from '../types/errors.js';
import { logActivity } from '../utils/logger.js';

export const DEFAULT_VM_IMAGES_KEY = 'microsoft-azure-corevm.vmImagesPublicAzure';

/** One entry of a plan's image-version map, keyed by `YYYY.MM.DD`. */
export interface OfferImageVersion {
    osVhdUrl: string;
    label: string;
    mediaName: string;
    /** `MM/DD/YYYY` */
    publishedDate: string;
    description: string;
    showInGui: boolean;
    lunVhdDetails: unknown[];
    [key: string]: unknown;
}

export interface OfferPlan {
    planId?: string;
    diskGenerations?: OfferPlan[];
    [key: string]: unknown;
}

/** Offer document as served by the cloud partner API. Only the plan tree is typed. */
export interface OfferDocument {
    definition?: {
        plans?: OfferPlan[];
        [key: string]: unknown;
    };
    [key: string]: unknown;
}

export interface AddImageVersionInput {
    blobUrl: string;
    description: string;
    imageName: string;
    label: string;
    sku: string;
    vmImagesKey?: string;
    generationId?: string;
    /** Appended to `mediaName` in the generation plan; defaults to the generation id. */
    generationSuffix?: string;
    /** Release date when the image name carries none. Defaults to now. */
    today?: Date;
}

export interface RemoveImageVersionInput {
    imageVersion: string;
    sku: string;
    generationId?: string;
    vmImagesKey?: string;
}

export interface DeprecateImageInput {
    imageName: string;
    sku: string;
    vmImagesKey?: string;
}

export interface ImageUrn {
    publisher: string;
    offer: string;
    sku: string;
    version: string;
}

interface ReleaseDate {
    year: number;
    month: number;
    day: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

/** First 8-digit run of the image name read as `YYYYMMDD`, or undefined when there is none. */
export function releaseDateFromName(imageName: string): ReleaseDate | undefined {
    const match = /\d{8}/.exec(imageName);
    if (!match) return undefined;

    const digits = match[0];
    const year = Number(digits.slice(0, 4));
    const month = Number(digits.slice(4, 6));
    const day = Number(digits.slice(6, 8));
    const parsed = new Date(Date.UTC(year, month - 1, day));
    if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
        throw new OfferDocumentError(`Image name ${imageName} carries an invalid date ${digits}.`);
    }
    return { year, month, day };
}

/** `YYYY.MM.DD`, the key of an image version in a plan. */
export function releaseKey(date: ReleaseDate): string {
    return `${date.year}.${pad(date.month)}.${pad(date.day)}`;
}

function publishedDate(date: ReleaseDate): string {
    return `${pad(date.month)}/${pad(date.day)}/${date.year}`;
}

/** Split `publisher:offer:sku:version`. */
export function parseImageUrn(urn: string): ImageUrn {
    const parts = urn.split(':');
    const [publisher, offer, sku, version] = parts;
    if (parts.length !== 4 || !publisher || !offer || !sku || !version) {
        throw new ValidationError(`Invalid image URN ${urn}.`, ['Expected publisher:offer:sku:version.']);
    }
    return { publisher, offer, sku, version };
}

function findPlan(doc: OfferDocument, sku: string): OfferPlan {
    const plan = doc.definition?.plans?.find((candidate) => candidate.planId === sku);
    if (!plan) {
        throw new OfferDocumentError(`No match found for SKU: ${sku}. Offer doc not updated.`);
    }
    return plan;
}

function findGeneration(plan: OfferPlan, generationId: string): OfferPlan {
    const generation = plan.diskGenerations?.find((candidate) => candidate.planId === generationId);
    if (!generation) {
        throw new OfferDocumentError(`No match found for generation ID: ${generationId}. Offer doc not updated.`);
    }
    return generation;
}

/** The plan's image-version map, created empty when absent. */
function imageMap(plan: OfferPlan, key: string): Record<string, unknown> {
    const existing = plan[key];
    if (isRecord(existing)) return existing;
    const created: Record<string, unknown> = {};
    plan[key] = created;
    return created;
}

/**
 * Add a dated image version to a SKU plan, and to one of its generation plans when
 * `generationId` is set. Returns an edited copy; the input is not modified.
 */
export function addImageVersionToOffer(doc: OfferDocument, input: AddImageVersionInput): OfferDocument {
    const vmImagesKey = input.vmImagesKey ?? DEFAULT_VM_IMAGES_KEY;
    const today = input.today ?? new Date();
    const date = releaseDateFromName(input.imageName) ?? {
        year: today.getFullYear(),
        month: today.getMonth() + 1,
        day: today.getDate(),
    };
    const release = releaseKey(date);

    const version: OfferImageVersion = {
        osVhdUrl: input.blobUrl,
        label: input.label,
        mediaName: input.imageName,
        publishedDate: publishedDate(date),
        description: input.description,
        showInGui: true,
        lunVhdDetails: [],
    };

    const edited = structuredClone(doc);
    const plan = findPlan(edited, input.sku);
    imageMap(plan, vmImagesKey)[release] = version;

    if (input.generationId) {
        const generation = findGeneration(plan, input.generationId);
        imageMap(generation, vmImagesKey)[release] = {
            ...version,
            mediaName: `${input.imageName}-${input.generationSuffix || input.generationId}`,
        };
    }

    return edited;
}

/**
 * Remove an image version from a SKU plan, and from the named generation plan. Refuses to
 * leave either map without versions. An absent version is not an error.
 */
export function removeImageVersionFromOffer(doc: OfferDocument, input: RemoveImageVersionInput): OfferDocument {
    const vmImagesKey = input.vmImagesKey ?? DEFAULT_VM_IMAGES_KEY;
    const edited = structuredClone(doc);
    const plan = findPlan(edited, input.sku);
    const targets: Array<{ name: string; map: Record<string, unknown> }> = [
        { name: `SKU ${input.sku}`, map: imageMap(plan, vmImagesKey) },
    ];

    if (input.generationId) {
        const generation = findGeneration(plan, input.generationId);
        targets.push({ name: `generation ${input.generationId}`, map: imageMap(generation, vmImagesKey) });
    }

    for (const { name, map } of targets) {
        if (!(input.imageVersion in map)) continue;
        if (Object.keys(map).length === 1) {
            throw new OfferDocumentError(
                `Removing ${input.imageVersion} would leave ${name} with no image versions. Offer doc not updated.`,
            );
        }
        delete map[input.imageVersion];
    }

    return edited;
}

/**
 * Hide the image's version from the portal gallery (`showInGui=false`). The version is
 * located by the date in the image name; a name without a date leaves the document as is.
 */
export function deprecateImageInOfferDoc(doc: OfferDocument, input: DeprecateImageInput): OfferDocument {
    const vmImagesKey = input.vmImagesKey ?? DEFAULT_VM_IMAGES_KEY;
    const date = releaseDateFromName(input.imageName);
    if (!date) {
        void logActivity(`[Offer] ${input.imageName} carries no release date; nothing deprecated.`);
        return doc;
    }

    const release = releaseKey(date);
    const edited = structuredClone(doc);
    const plan = edited.definition?.plans?.find((candidate) => candidate.planId === input.sku);
    const map = plan?.[vmImagesKey];
    const image = isRecord(map) ? map[release] : undefined;
    if (!isRecord(image)) {
        throw new OfferDocumentError(`No match found for image in the SKU: ${input.sku}. Offer doc not updated.`);
    }

    if (image.mediaName === input.imageName) {
        image.showInGui = false;
    } else {
        void logActivity(
            `[Offer] Deprecation image name ${input.imageName} does not match mediaName ${String(image.mediaName)}.`,
        );
    }
    return edited;
}
