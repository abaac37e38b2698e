import moment from 'moment';
import { CacheEntryOptions, DistributedCache } from '../types';
import { AppDataSource } from '../config/database';
import { CacheEntry } from '../entities/CacheEntry';

/** The subset of `Repository<CacheEntry>` the cache relies on. */
export interface CacheEntryRepository {
    findOneBy(where: { key: string }): Promise<CacheEntry | null>;
    upsert(
        entity: Pick<CacheEntry, 'key' | 'value' | 'slidingExpirationSeconds' | 'expiresAt'>,
        conflictPaths: string[]
    ): Promise<unknown>;
    update(criteria: { key: string }, partial: { expiresAt: Date }): Promise<unknown>;
    delete(criteria: { key: string }): Promise<unknown>;
}

/**
 * Cache table shared by every app instance pointing at the same database.
 */
export class TypeOrmDistributedCache implements DistributedCache {
    constructor(
        private readonly repo?: CacheEntryRepository,
        private readonly now: () => moment.Moment = () => moment()
    ) {}

    // Resolved per call so the cache can be built before the DataSource is initialized
    private get cacheRepo(): CacheEntryRepository {
        return this.repo || AppDataSource.getRepository(CacheEntry);
    }

    async get(key: string): Promise<string | undefined> {
        const cached = await this.cacheRepo.findOneBy({ key });
        if (!cached) {
            return undefined;
        }

        const now = this.now();
        if (!now.isBefore(cached.expiresAt)) {
            await this.cacheRepo.delete({ key });
            return undefined;
        }

        await this.cacheRepo.update(
            { key },
            { expiresAt: now.clone().add(cached.slidingExpirationSeconds, 'seconds').toDate() }
        );
        return cached.value;
    }

    async set(key: string, value: string, options: CacheEntryOptions): Promise<void> {
        await this.cacheRepo.upsert(
            {
                key,
                value,
                slidingExpirationSeconds: options.slidingExpirationSeconds,
                expiresAt: this.now().add(options.slidingExpirationSeconds, 'seconds').toDate(),
            },
            ['key']
        );
    }

    async remove(key: string): Promise<void> {
        await this.cacheRepo.delete({ key });
    }
}
