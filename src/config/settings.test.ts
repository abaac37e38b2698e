import { loadSettings } from './settings';

describe('loadSettings', () => {
    it('should fall back to defaults for an empty environment', () => {
        expect(loadSettings({})).toEqual({
            port: 3000,
            siteUrl: 'http://localhost:3000',
            sitemapCacheDurationSeconds: 86400,
            cacheDriver: 'postgres',
        });
    });

    it('should read values from the environment', () => {
        const settings = loadSettings({
            PORT: '8080',
            SITE_URL: 'https://example.test',
            SITEMAP_CACHE_DURATION_SECONDS: '600',
            CACHE_DRIVER: 'memory',
        });

        expect(settings).toEqual({
            port: 8080,
            siteUrl: 'https://example.test',
            sitemapCacheDurationSeconds: 600,
            cacheDriver: 'memory',
        });
    });

    it('should reject a non-numeric cache duration', () => {
        expect(() => loadSettings({ SITEMAP_CACHE_DURATION_SECONDS: 'soon' })).toThrow(
            'SITEMAP_CACHE_DURATION_SECONDS must be a positive integer, got "soon"'
        );
    });

    it('should reject an unknown cache driver', () => {
        expect(() => loadSettings({ CACHE_DRIVER: 'redis' })).toThrow('Invalid CACHE_DRIVER: redis');
    });
});
