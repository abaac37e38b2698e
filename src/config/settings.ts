import { ConfigurationError } from '../errors';

export type CacheDriver = 'postgres' | 'memory';

export interface Settings {
    port: number;
    siteUrl: string;
    sitemapCacheDurationSeconds: number;
    cacheDriver: CacheDriver;
}

function parsePositiveInt(name: string, raw: string): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

function parseCacheDriver(raw: string): CacheDriver {
    if (raw === 'postgres' || raw === 'memory') {
        return raw;
    }
    throw new ConfigurationError(`Invalid CACHE_DRIVER: ${raw}`);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    return {
        port: parsePositiveInt('PORT', env.PORT || '3000'),
        siteUrl: env.SITE_URL || 'http://localhost:3000',
        // Sliding window for the SitemapNodes cache profile
        sitemapCacheDurationSeconds: parsePositiveInt(
            'SITEMAP_CACHE_DURATION_SECONDS',
            env.SITEMAP_CACHE_DURATION_SECONDS || '86400'
        ),
        cacheDriver: parseCacheDriver(env.CACHE_DRIVER || 'postgres'),
    };
}
