import { logger } from './utils/logger';
import { QueueError } from './errors';
import { DEFAULT_RETRY_LIMITS, type RetryLimits } from './config';
import type { ApplicationAttempt } from './types/attempt';
import type { Job, QueueEntry, QueueState, QueueStats, TrackingEvent } from './types/jobs';
import type { QueueStore, TrackingSink } from './types/services';

export interface JobQueueOptions {
    retryLimits?: RetryLimits;
    tracking?: TrackingSink;
    store?: QueueStore;
    now?: () => Date;
}

/**
 * Job lifecycle: pending → applying → applied | declined | failed.
 * At most one job is applying at any time. Entries are held in memory and
 * written through to the store, when one is given, on every change.
 */
export class JobQueueManager {
    private readonly entries = new Map<string, QueueEntry>();
    private readonly retryLimits: RetryLimits;
    private readonly tracking?: TrackingSink;
    private readonly store?: QueueStore;
    private readonly now: () => Date;
    private sequence = 0;

    constructor(options: JobQueueOptions = {}) {
        this.retryLimits = options.retryLimits ?? DEFAULT_RETRY_LIMITS;
        this.tracking = options.tracking;
        this.store = options.store;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Reloads persisted entries. A job left applying by a crash goes back to
     * pending at its old position.
     */
    async restore(): Promise<number> {
        if (!this.store) return 0;

        const stored = await this.store.load();
        for (const entry of stored) {
            this.entries.set(entry.job.url, { ...entry, job: Object.freeze({ ...entry.job }) });
            this.sequence = Math.max(this.sequence, entry.position);
        }

        for (const entry of this.find('applying')) {
            await this.transition(entry, 'pending', 'interrupted');
        }

        logger.info(`Restored ${stored.length} queued job(s)`);
        return stored.length;
    }

    async enqueue(job: Job): Promise<QueueEntry> {
        const existing = this.entries.get(job.url);
        if (existing) {
            logger.debug(`Job already queued: ${job.url} (${existing.state})`);
            return { ...existing };
        }

        const at = this.timestamp();
        const entry: QueueEntry = {
            job: Object.freeze({ ...job }),
            state: 'pending',
            position: this.nextPosition(),
            enqueuedAt: at,
            updatedAt: at,
            retries: 0,
            attempts: 0,
            fieldsFilled: 0
        };
        this.entries.set(job.url, entry);
        await this.persist(entry);

        logger.info(`Queued ${job.title} at ${job.company} (${job.url})`);
        await this.track({ type: 'job_enqueued', at, job: entry.job });
        await this.track({ type: 'state_transition', at, jobUrl: job.url, from: null, to: 'pending' });
        return { ...entry };
    }

    async next(): Promise<QueueEntry | null> {
        const applying = this.find('applying');
        if (applying.length > 0) {
            throw new QueueError(`A job is already being applied to: ${applying[0].job.url}`);
        }

        const [oldest] = this.find('pending');
        if (!oldest) return null;

        await this.transition(oldest, 'applying');
        return { ...oldest };
    }

    async recordAttempt(url: string, attempt: ApplicationAttempt): Promise<QueueEntry> {
        const entry = this.require(url);
        if (entry.state !== 'applying') {
            throw new QueueError(`Cannot record an attempt for ${url} in state ${entry.state}`);
        }

        entry.attempts += 1;
        entry.fieldsFilled += attempt.fieldsFilled;
        await this.track({ type: 'attempt_recorded', at: this.timestamp(), jobUrl: url, attempt });

        if (attempt.status === 'succeeded') {
            delete entry.lastReason;
            await this.transition(entry, 'applied');
            return { ...entry };
        }

        const reason = attempt.reason ?? 'unexpected_error';
        const limit = this.retryLimits[reason] ?? 0;
        entry.lastReason = reason;

        if (entry.retries < limit) {
            entry.retries += 1;
            entry.position = this.nextPosition();
            logger.info(`Retrying ${url} after ${reason} (${entry.retries}/${limit})`);
            await this.transition(entry, 'pending', reason);
        } else {
            await this.transition(entry, 'failed', reason);
        }

        return { ...entry };
    }

    async decline(url: string, note?: string): Promise<QueueEntry> {
        const entry = this.require(url);
        if (entry.state !== 'pending') {
            throw new QueueError(`Only pending jobs can be declined; ${url} is ${entry.state}`);
        }

        if (note) entry.note = note;
        await this.transition(entry, 'declined', note);
        return { ...entry };
    }

    async requeue(url: string): Promise<QueueEntry> {
        const entry = this.require(url);
        if (entry.state !== 'failed') {
            throw new QueueError(`Only failed jobs can be requeued; ${url} is ${entry.state}`);
        }

        entry.retries = 0;
        entry.position = this.nextPosition();
        await this.transition(entry, 'pending', 'manual requeue');
        return { ...entry };
    }

    get(url: string): QueueEntry | null {
        const entry = this.entries.get(url);
        return entry ? { ...entry } : null;
    }

    list(state?: QueueState): QueueEntry[] {
        const entries = state ? this.find(state) : this.sorted();
        return entries.map(entry => ({ ...entry }));
    }

    stats(): QueueStats {
        const stats: QueueStats = {
            pending: 0,
            applying: 0,
            applied: 0,
            declined: 0,
            failed: 0,
            total: this.entries.size,
            attempts: 0,
            fieldsFilled: 0,
            successRate: 0
        };

        for (const entry of this.entries.values()) {
            stats[entry.state] += 1;
            stats.attempts += entry.attempts;
            stats.fieldsFilled += entry.fieldsFilled;
        }

        const finished = stats.applied + stats.declined + stats.failed;
        stats.successRate = finished === 0 ? 0 : stats.applied / finished;
        return stats;
    }

    private require(url: string): QueueEntry {
        const entry = this.entries.get(url);
        if (!entry) {
            throw new QueueError(`Unknown job: ${url}`);
        }
        return entry;
    }

    private sorted(): QueueEntry[] {
        return [...this.entries.values()].sort((a, b) => a.position - b.position);
    }

    private find(state: QueueState): QueueEntry[] {
        return this.sorted().filter(entry => entry.state === state);
    }

    private async transition(entry: QueueEntry, to: QueueState, reason?: string): Promise<void> {
        const from = entry.state;
        const at = this.timestamp();
        entry.state = to;
        entry.updatedAt = at;
        await this.persist(entry);

        logger.info(`Job ${entry.job.url}: ${from} → ${to}${reason ? ` (${reason})` : ''}`);
        await this.track({ type: 'state_transition', at, jobUrl: entry.job.url, from, to, reason });
    }

    private async persist(entry: QueueEntry): Promise<void> {
        if (this.store) await this.store.save({ ...entry });
    }

    private async track(event: TrackingEvent): Promise<void> {
        if (!this.tracking) return;
        try {
            await this.tracking.append(event);
        } catch (error) {
            logger.error(`Failed to record ${event.type} event:`, error);
        }
    }

    private nextPosition(): number {
        this.sequence += 1;
        return this.sequence;
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
