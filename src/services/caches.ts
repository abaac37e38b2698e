import { MemoryDistributedCache } from './MemoryDistributedCache';
import { TypeOrmDistributedCache } from './TypeOrmDistributedCache';
import { DistributedCache } from '../types';

export function getDistributedCache(driver: string): DistributedCache {
    if (driver === 'postgres') {
        return new TypeOrmDistributedCache();
    } else if (driver === 'memory') {
        return new MemoryDistributedCache();
    }
    throw new Error(`Invalid cache driver: ${driver}`);
}
