import { z } from 'zod';
import { logger } from './utils/logger';
import { RedisManager } from './utils/redis';
import { errorMessage } from './errors';
import { JobQueueManager } from './job-queue-manager';
import type { ApplicantProfile } from './config';
import type { ApplicationAttempt } from './types/attempt';
import {
    type Job,
    type JobDiscoveredTask,
    type JobSummaryTask,
    type QueueStats,
    type QueueTask,
    TaskType,
    detectJobSource
} from './types/jobs';
import type { ContentTailor, Notifier } from './types/services';

const JobDiscoveredSchema = z.object({
    url: z.string().url(),
    title: z.string().min(1),
    company: z.string().min(1),
    location: z.string().optional(),
    description: z.string().optional(),
    source: z.enum(['greenhouse', 'lever', 'linkedin', 'other']).optional()
});

export interface ApplicationRunner {
    apply(job: Job, profile: ApplicantProfile): Promise<ApplicationAttempt>;
}

export interface ProcessorOptions {
    idlePollSeconds?: number;
    notifier?: Notifier;
    tailor?: ContentTailor;
}

export interface HealthReport {
    status: 'healthy' | 'unhealthy';
    details: {
        redis?: boolean;
        isProcessing?: boolean;
        queueStats?: Record<string, number>;
        jobs?: QueueStats;
        error?: string;
    };
}

export function toJob(task: JobDiscoveredTask): Job {
    return {
        source: task.source ?? detectJobSource(task.url),
        url: task.url,
        title: task.title,
        company: task.company,
        location: task.location ?? '',
        description: task.description ?? ''
    };
}

export class ApplicationProcessor {
    private isProcessing: boolean = false;
    private readonly idlePollSeconds: number;

    constructor(
        private readonly redis: RedisManager,
        private readonly queue: JobQueueManager,
        private readonly engine: ApplicationRunner,
        private readonly profile: ApplicantProfile,
        private readonly options: ProcessorOptions = {}
    ) {
        this.idlePollSeconds = options.idlePollSeconds ?? 5;
    }

    async startProcessing(): Promise<void> {
        if (this.isProcessing) {
            logger.warn('Processor is already running');
            return;
        }

        this.isProcessing = true;
        logger.info('Starting job application processing...');

        while (this.isProcessing) {
            try {
                await this.drainDiscoveredJobs();

                const processed = await this.processNext();
                if (!processed) {
                    // Nothing queued: block on the discovery list instead of spinning
                    const task = await this.redis.consumeTask<JobDiscoveredTask>(
                        TaskType.JOB_DISCOVERED,
                        this.idlePollSeconds
                    );
                    if (task) {
                        await this.ingest(task);
                    }
                }
            } catch (error) {
                logger.error('Error in processing loop:', error);
                // Wait a bit before retrying to avoid tight error loops
                await this.sleep(5000);
            }
        }

        logger.info('Job application processing stopped');
    }

    async stopProcessing(): Promise<void> {
        logger.info('Stopping job application processing...');
        this.isProcessing = false;
    }

    async drainDiscoveredJobs(): Promise<number> {
        let ingested = 0;
        for (;;) {
            const task = await this.redis.consumeTask<JobDiscoveredTask>(TaskType.JOB_DISCOVERED);
            if (!task) return ingested;
            if (await this.ingest(task)) ingested += 1;
        }
    }

    /**
     * Takes the next queued job through one attempt. Returns false when the
     * queue had nothing pending.
     */
    async processNext(): Promise<boolean> {
        const entry = await this.queue.next();
        if (!entry) return false;

        const { job } = entry;
        const startTime = Date.now();
        logger.info(`Applying to ${job.title} at ${job.company} (attempt ${entry.attempts + 1})`);

        const attempt = await this.engine.apply(job, this.profile);
        const updated = await this.queue.recordAttempt(job.url, attempt);
        const processingTime = Date.now() - startTime;

        logger.info(`Attempt ${attempt.id} finished in ${processingTime}ms`, {
            jobUrl: job.url,
            status: attempt.status,
            reason: attempt.reason,
            fieldsFilled: attempt.fieldsFilled,
            queueState: updated.state,
            processingTimeMs: processingTime
        });

        await this.notify(job, attempt, updated.state);

        try {
            await this.redis.publishResult({
                success: attempt.status === 'succeeded',
                task_id: attempt.id,
                error: attempt.reason,
                data: attempt
            });
        } catch (error) {
            logger.error(`Failed to publish result for attempt ${attempt.id}:`, error);
        }

        return true;
    }

    private async ingest(task: QueueTask<JobDiscoveredTask>): Promise<boolean> {
        const parsed = JobDiscoveredSchema.safeParse(task.payload);
        if (!parsed.success) {
            logger.warn(`Discarding malformed discovered job ${task.id}: ${parsed.error.message}`);
            return false;
        }

        const job = toJob(parsed.data);
        const known = this.queue.get(job.url) !== null;
        await this.queue.enqueue(job);
        if (known) return false;

        await this.publishSummary(job);
        return true;
    }

    private async publishSummary(job: Job): Promise<void> {
        let matchScore: number | undefined;
        if (this.options.tailor) {
            try {
                matchScore = (await this.options.tailor.tailor(job, this.profile)).matchScore;
            } catch (error) {
                logger.warn(`Could not score ${job.url}:`, error);
            }
        }

        const summary: JobSummaryTask = {
            job_url: job.url,
            title: job.title,
            company: job.company,
            location: job.location,
            match_score: matchScore,
            actions: ['auto_apply', 'manual_apply', 'decline', 'preview']
        };

        try {
            await this.redis.publishTask(TaskType.JOB_SUMMARY, summary);
        } catch (error) {
            logger.error(`Failed to publish job summary for ${job.url}:`, error);
        }
    }

    private async notify(job: Job, attempt: ApplicationAttempt, state: string): Promise<void> {
        const { notifier } = this.options;
        if (!notifier) return;

        try {
            if (attempt.status === 'succeeded') {
                await notifier.notify({ type: 'application_succeeded', job, attempt });
            } else {
                await notifier.notify({
                    type: 'application_failed',
                    job,
                    attempt,
                    finalState: state === 'pending' ? 'pending' : 'failed'
                });
            }
        } catch (error) {
            logger.error(`Failed to send notification for ${job.url}: ${errorMessage(error)}`);
        }
    }

    private async sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }

    // Health check method
    async healthCheck(): Promise<HealthReport> {
        try {
            const redisHealthy = await this.redis.healthCheck();
            const queueStats = await this.redis.getQueueStats();

            return {
                status: redisHealthy ? 'healthy' : 'unhealthy',
                details: {
                    redis: redisHealthy,
                    isProcessing: this.isProcessing,
                    queueStats,
                    jobs: this.queue.stats()
                }
            };
        } catch (error) {
            return {
                status: 'unhealthy',
                details: {
                    error: errorMessage(error)
                }
            };
        }
    }
}
