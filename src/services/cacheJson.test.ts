import { MemoryDistributedCache } from './MemoryDistributedCache';
import { isStringArray, setAsJson, tryGetAsJson } from './cacheJson';

describe('cache JSON helpers', () => {
    let cache: MemoryDistributedCache;

    beforeEach(() => {
        cache = new MemoryDistributedCache();
    });

    it('should round-trip a string list', async () => {
        await setAsJson(cache, 'docs', ['<urlset/>', '<urlset></urlset>'], { slidingExpirationSeconds: 60 });

        expect(await cache.get('docs')).toBe('["<urlset/>","<urlset></urlset>"]');
        expect(await tryGetAsJson(cache, 'docs', isStringArray)).toEqual(['<urlset/>', '<urlset></urlset>']);
    });

    it('should treat unparsable JSON as a miss', async () => {
        await cache.set('docs', '{not json', { slidingExpirationSeconds: 60 });

        expect(await tryGetAsJson(cache, 'docs', isStringArray)).toBeUndefined();
    });

    it('should treat a value failing the guard as a miss', async () => {
        await cache.set('docs', '[1, 2]', { slidingExpirationSeconds: 60 });

        expect(await tryGetAsJson(cache, 'docs', isStringArray)).toBeUndefined();
    });
});
