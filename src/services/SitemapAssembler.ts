import {
    ChangeFrequency,
    DistributedCache,
    Logger,
    RouteParams,
    RouteResolver,
    SitemapEntry,
    SitemapService,
} from '../types';
import { isStringArray, setAsJson, tryGetAsJson } from './cacheJson';
import {
    MAX_ENTRIES_PER_SITEMAP,
    MAX_SITEMAP_COUNT,
    MAX_SITEMAP_SIZE_BYTES,
    buildSitemapDocument,
    buildSitemapIndexDocument,
    createSitemapEntry,
    partitionEntries,
} from './sitemapXml';

export const SITEMAP_CACHE_KEY = 'SitemapNodes';

export interface SitemapRouteDefinition {
    route: string;
    params?: RouteParams;
    priority: number;
    lastModified?: Date;
    changeFrequency?: ChangeFrequency;
}

export const STATIC_SITEMAP_ROUTES: readonly SitemapRouteDefinition[] = [
    { route: 'home', priority: 1 },
    { route: 'about', priority: 0.9 },
    { route: 'contact', priority: 0.9 },
];

export interface SitemapAssemblerOptions {
    cache: DistributedCache;
    routes: RouteResolver;
    slidingExpirationSeconds: number;
    logger?: Logger;
    /**
     * Per-resource routes appended after the static ones, e.g. one entry per
     * product in a catalog. Called on every regeneration.
     */
    additionalRoutes?: () => SitemapRouteDefinition[];
    maxEntriesPerSitemap?: number;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isDocumentSet(value: unknown): value is string[] {
    return isStringArray(value) && value.length > 0;
}

/**
 * Builds sitemap XML for the site and keeps the whole document set in the
 * distributed cache under a single key. When there are more entries than fit
 * in one sitemap, document 0 is a sitemap index linking to documents 1..n.
 */
export class SitemapAssembler implements SitemapService {
    private readonly cache: DistributedCache;
    private readonly routes: RouteResolver;
    private readonly logger: Logger;
    private readonly slidingExpirationSeconds: number;
    private readonly additionalRoutes: () => SitemapRouteDefinition[];
    private readonly maxEntriesPerSitemap: number;

    constructor(options: SitemapAssemblerOptions) {
        this.cache = options.cache;
        this.routes = options.routes;
        this.logger = options.logger || console;
        this.slidingExpirationSeconds = options.slidingExpirationSeconds;
        this.additionalRoutes = options.additionalRoutes || (() => []);
        this.maxEntriesPerSitemap = options.maxEntriesPerSitemap || MAX_ENTRIES_PER_SITEMAP;
    }

    /**
     * Returns the root document when `index` is omitted, otherwise the
     * document at that zero-based index, or null when it does not exist.
     */
    async getDocument(index?: number): Promise<string | null> {
        const documents = await this.getDocuments();

        if (index !== undefined && (!Number.isInteger(index) || index < 0 || index >= documents.length)) {
            return null;
        }

        return documents[index === undefined ? 0 : index];
    }

    collectEntries(): SitemapEntry[] {
        let extra: SitemapRouteDefinition[] = [];
        try {
            extra = this.additionalRoutes();
        } catch (error) {
            this.logger.warn(`Skipping additional sitemap routes: ${errorMessage(error)}`);
        }

        const entries: SitemapEntry[] = [];
        for (const definition of [...STATIC_SITEMAP_ROUTES, ...extra]) {
            try {
                entries.push(createSitemapEntry({
                    url: this.routes.routeToAbsoluteUrl(definition.route, definition.params),
                    priority: definition.priority,
                    lastModified: definition.lastModified,
                    changeFrequency: definition.changeFrequency,
                }));
            } catch (error) {
                this.logger.warn(`Skipping sitemap entry for route ${definition.route}: ${errorMessage(error)}`);
            }
        }
        return entries;
    }

    // No lock around regeneration: concurrent misses each rebuild and the last
    // write wins. The output only depends on configuration.
    private async getDocuments(): Promise<string[]> {
        let cacheAvailable = true;
        try {
            const cached = await tryGetAsJson(this.cache, SITEMAP_CACHE_KEY, isDocumentSet);
            if (cached) {
                return cached;
            }
        } catch (error) {
            cacheAvailable = false;
            this.logger.warn(`Sitemap cache read failed, serving uncached sitemap: ${errorMessage(error)}`);
        }

        const documents = this.buildDocuments(this.collectEntries());

        if (cacheAvailable) {
            try {
                await setAsJson(this.cache, SITEMAP_CACHE_KEY, documents, {
                    slidingExpirationSeconds: this.slidingExpirationSeconds,
                });
            } catch (error) {
                this.logger.warn(`Sitemap cache write failed: ${errorMessage(error)}`);
            }
        }

        return documents;
    }

    private buildDocuments(entries: readonly SitemapEntry[]): string[] {
        const chunks = partitionEntries(entries, this.maxEntriesPerSitemap);
        if (chunks.length === 0) {
            chunks.push([]);
        }
        if (chunks.length > MAX_SITEMAP_COUNT) {
            this.logger.warn(
                `Sitemap count of ${chunks.length} exceeds the maximum of ${MAX_SITEMAP_COUNT} allowed by the protocol`
            );
        }

        const documents: string[] = [];
        if (chunks.length > 1) {
            documents.push(buildSitemapIndexDocument(chunks.map((_, i) => this.getSitemapUrl(i + 1))));
        }
        for (const chunk of chunks) {
            documents.push(buildSitemapDocument(chunk));
        }

        documents.forEach((document, i) => {
            const size = Buffer.byteLength(document, 'utf8');
            if (size > MAX_SITEMAP_SIZE_BYTES) {
                this.logger.warn(
                    `Sitemap document ${i} is ${size} bytes, over the ${MAX_SITEMAP_SIZE_BYTES} byte limit`
                );
            }
        });

        return documents;
    }

    private getSitemapUrl(index: number): string {
        return `${this.routes.routeToAbsoluteUrl('sitemapXml').replace(/\/+$/, '')}?index=${index}`;
    }
}
