export type ChangeFrequency =
    | 'always'
    | 'hourly'
    | 'daily'
    | 'weekly'
    | 'monthly'
    | 'yearly'
    | 'never';

export interface SitemapEntry {
    readonly url: string;
    readonly priority: number;
    readonly lastModified?: Date;
    readonly changeFrequency?: ChangeFrequency;
}

export type RouteParams = Record<string, string | number>;

export interface RouteResolver {
    routeToAbsoluteUrl(route: string, params?: RouteParams): string;
}

export interface Logger {
    warn(message: string): void;
}

export interface SitemapService {
    getDocument(index?: number): Promise<string | null>;
}

export interface CacheEntryOptions {
    slidingExpirationSeconds: number;
}

export interface DistributedCache {
    get(key: string): Promise<string | undefined>;
    set(key: string, value: string, options: CacheEntryOptions): Promise<void>;
    remove(key: string): Promise<void>;
}
