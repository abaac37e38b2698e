import { Builder } from 'xml2js';
import moment from 'moment';
import { ChangeFrequency, SitemapEntry } from '../types';
import { SitemapEntryError } from '../errors';

// Limits from http://www.sitemaps.org/protocol.html
export const MAX_ENTRIES_PER_SITEMAP = 25000;
export const MAX_SITEMAP_COUNT = 50000;
export const MAX_SITEMAP_SIZE_BYTES = 10 * 1024 * 1024;

const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';

export interface SitemapEntryInput {
    url: string;
    priority: number;
    lastModified?: Date;
    changeFrequency?: ChangeFrequency;
}

export function createSitemapEntry(input: SitemapEntryInput): SitemapEntry {
    let parsed: URL;
    try {
        parsed = new URL(input.url);
    } catch {
        throw new SitemapEntryError(`Sitemap URL must be absolute: ${input.url}`);
    }
    if (!Number.isFinite(input.priority) || input.priority < 0 || input.priority > 1) {
        throw new SitemapEntryError(`Sitemap priority must be between 0 and 1, got ${input.priority} for ${parsed.href}`);
    }

    const entry: SitemapEntry = {
        url: input.url,
        priority: input.priority,
        ...(input.lastModified ? { lastModified: new Date(input.lastModified.getTime()) } : {}),
        ...(input.changeFrequency ? { changeFrequency: input.changeFrequency } : {}),
    };
    return Object.freeze(entry);
}

export function partitionEntries<T>(entries: readonly T[], size: number = MAX_ENTRIES_PER_SITEMAP): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < entries.length; i += size) {
        chunks.push(entries.slice(i, i + size));
    }
    return chunks;
}

function newBuilder(): Builder {
    return new Builder({ xmldec: { version: '1.0', encoding: 'UTF-8' } });
}

function toUrlElement(entry: SitemapEntry): Record<string, string> {
    const element: Record<string, string> = { loc: entry.url };
    if (entry.lastModified) {
        element.lastmod = moment.utc(entry.lastModified).format('YYYY-MM-DDTHH:mm:ss[Z]');
    }
    if (entry.changeFrequency) {
        element.changefreq = entry.changeFrequency;
    }
    element.priority = entry.priority.toFixed(1);
    return element;
}

export function buildSitemapDocument(entries: readonly SitemapEntry[]): string {
    return newBuilder().buildObject({
        urlset: {
            $: { xmlns: SITEMAP_NAMESPACE },
            url: entries.map(toUrlElement),
        },
    });
}

export function buildSitemapIndexDocument(sitemapUrls: readonly string[]): string {
    return newBuilder().buildObject({
        sitemapindex: {
            $: { xmlns: SITEMAP_NAMESPACE },
            sitemap: sitemapUrls.map((loc) => ({ loc })),
        },
    });
}
