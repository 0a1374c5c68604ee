import { z } from 'zod';
import { logger } from './utils/logger';
import { RedisManager } from './utils/redis';
import type { QueueEntry } from './types/jobs';
import type { QueueStore } from './types/services';

export const QUEUE_KEY = 'queue:entries';

const QueueEntrySchema = z.object({
    job: z.object({
        source: z.enum(['greenhouse', 'lever', 'linkedin', 'other']),
        url: z.string(),
        title: z.string(),
        company: z.string(),
        location: z.string(),
        description: z.string()
    }),
    state: z.enum(['pending', 'applying', 'applied', 'declined', 'failed']),
    position: z.number().int(),
    enqueuedAt: z.string(),
    updatedAt: z.string(),
    retries: z.number().int().nonnegative(),
    attempts: z.number().int().nonnegative(),
    fieldsFilled: z.number().int().nonnegative(),
    lastReason: z.string().optional(),
    note: z.string().optional()
});

function parseEntry(url: string, raw: string): QueueEntry | null {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        logger.warn(`Skipping unreadable queue entry for ${url}`);
        return null;
    }

    const parsed = QueueEntrySchema.safeParse(data);
    if (!parsed.success) {
        logger.warn(`Skipping invalid queue entry for ${url}: ${parsed.error.message}`);
        return null;
    }
    return parsed.data;
}

/**
 * Queue entries in a Redis hash keyed by job URL.
 */
export class RedisQueueStore implements QueueStore {
    constructor(
        private readonly redis: RedisManager,
        private readonly key: string = QUEUE_KEY
    ) {}

    async load(): Promise<QueueEntry[]> {
        const stored = await this.redis.hashGetAll(this.key);
        const entries: QueueEntry[] = [];
        for (const [url, raw] of Object.entries(stored)) {
            const entry = parseEntry(url, raw);
            if (entry) entries.push(entry);
        }
        return entries;
    }

    async save(entry: QueueEntry): Promise<void> {
        await this.redis.hashSet(this.key, entry.job.url, entry);
    }
}
