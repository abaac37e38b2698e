import moment from 'moment';
import { CacheEntryOptions, DistributedCache } from '../types';

interface MemoryEntry {
    value: string;
    slidingExpirationSeconds: number;
    expiresAt: moment.Moment;
}

export class MemoryDistributedCache implements DistributedCache {
    private readonly entries = new Map<string, MemoryEntry>();

    constructor(private readonly now: () => moment.Moment = () => moment()) {}

    async get(key: string): Promise<string | undefined> {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }

        const now = this.now();
        if (!now.isBefore(entry.expiresAt)) {
            this.entries.delete(key);
            return undefined;
        }

        // Sliding expiration: each read pushes the expiry out again
        entry.expiresAt = now.clone().add(entry.slidingExpirationSeconds, 'seconds');
        return entry.value;
    }

    async set(key: string, value: string, options: CacheEntryOptions): Promise<void> {
        this.entries.set(key, {
            value,
            slidingExpirationSeconds: options.slidingExpirationSeconds,
            expiresAt: this.now().add(options.slidingExpirationSeconds, 'seconds'),
        });
    }

    async remove(key: string): Promise<void> {
        this.entries.delete(key);
    }
}
