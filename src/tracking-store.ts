import { RedisManager } from './utils/redis';
import type { TrackingEvent } from './types/jobs';
import type { TrackingSink } from './types/services';

export const TRACKING_KEY = 'tracking:events';

export class RedisTrackingStore implements TrackingSink {
    constructor(
        private readonly redis: RedisManager,
        private readonly key: string = TRACKING_KEY
    ) {}

    async append(event: TrackingEvent): Promise<void> {
        await this.redis.append(this.key, event);
    }
}
