import { MemoryDistributedCache } from './MemoryDistributedCache';
import { TypeOrmDistributedCache } from './TypeOrmDistributedCache';
import { getDistributedCache } from './caches';

describe('Distributed Cache Factory Tests', () => {
    it('should return TypeOrmDistributedCache for postgres', () => {
        const cache = getDistributedCache('postgres');
        expect(cache).toBeInstanceOf(TypeOrmDistributedCache);
    });

    it('should return MemoryDistributedCache for memory', () => {
        const cache = getDistributedCache('memory');
        expect(cache).toBeInstanceOf(MemoryDistributedCache);
    });

    it('should throw an error for invalid driver', () => {
        expect(() => getDistributedCache('redis')).toThrow('Invalid cache driver: redis');
    });
});
