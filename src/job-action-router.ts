import { z } from 'zod';
import { logger } from './utils/logger';
import { QueueError } from './errors';
import { JobQueueManager } from './job-queue-manager';
import { toJob } from './application-processor';
import { renderCoverLetter } from './tailoring';
import type { ApplicantProfile } from './config';
import type { Job, JobActionMessage } from './types/jobs';
import type { ContentTailor, Notifier } from './types/services';

export const JOB_ACTION_CHANNEL = 'job:actions';

const JobActionSchema = z.object({
    action: z.enum(['auto_apply', 'manual_apply', 'decline', 'preview']),
    job_url: z.string().url(),
    responder: z.string().optional(),
    job: z.object({
        url: z.string().url(),
        title: z.string().min(1),
        company: z.string().min(1),
        location: z.string().optional(),
        description: z.string().optional(),
        source: z.enum(['greenhouse', 'lever', 'linkedin', 'other']).optional()
    }).optional()
});

export function parseJobAction(message: string): JobActionMessage | null {
    try {
        const parsed = JobActionSchema.safeParse(JSON.parse(message));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

export interface JobActionRouterDeps {
    queue: JobQueueManager;
    profile: ApplicantProfile;
    tailor: ContentTailor;
    notifier: Notifier;
}

/**
 * Turns button presses from the chat bridge into queue operations.
 */
export class JobActionRouter {
    constructor(private readonly deps: JobActionRouterDeps) {}

    async handleMessage(message: string): Promise<void> {
        const action = parseJobAction(message);
        if (!action) {
            logger.warn(`Discarding malformed job action: ${message}`);
            return;
        }
        await this.route(action);
    }

    async route(message: JobActionMessage): Promise<void> {
        const { queue } = this.deps;
        logger.info(`Job action ${message.action} for ${message.job_url} from ${message.responder ?? 'unknown'}`);

        try {
            switch (message.action) {
                case 'auto_apply': {
                    const existing = queue.get(message.job_url);
                    if (existing?.state === 'failed') {
                        await queue.requeue(message.job_url);
                        return;
                    }
                    if (existing) {
                        logger.info(`${message.job_url} is already ${existing.state}`);
                        return;
                    }
                    if (!message.job) {
                        logger.warn(`Cannot queue ${message.job_url}: no job details supplied`);
                        return;
                    }
                    await queue.enqueue(toJob(message.job));
                    return;
                }
                case 'manual_apply':
                    await this.decline(message.job_url, 'applying manually');
                    return;
                case 'decline':
                    await this.decline(message.job_url);
                    return;
                case 'preview':
                    await this.preview(message);
                    return;
            }
        } catch (error) {
            if (error instanceof QueueError) {
                logger.warn(`Job action ${message.action} rejected: ${error.message}`);
                return;
            }
            throw error;
        }
    }

    private async decline(url: string, note?: string): Promise<void> {
        if (!this.deps.queue.get(url)) {
            logger.warn(`Ignoring decline for unknown job ${url}`);
            return;
        }
        await this.deps.queue.decline(url, note);
    }

    private async preview(message: JobActionMessage): Promise<void> {
        const job: Job | undefined = this.deps.queue.get(message.job_url)?.job
            ?? (message.job ? toJob(message.job) : undefined);
        if (!job) {
            logger.warn(`Cannot preview unknown job ${message.job_url}`);
            return;
        }

        const { profile, tailor, notifier } = this.deps;
        let summary = '';
        let matchScore: number | undefined;
        try {
            ({ summary, matchScore } = await tailor.tailor(job, profile));
        } catch (error) {
            logger.warn(`Tailoring failed for ${job.url}, previewing the untailored template:`, error);
        }

        const coverLetter = renderCoverLetter(profile.coverLetterTemplate, {
            company: job.company,
            title: job.title,
            summary,
            name: `${profile.firstName} ${profile.lastName}`
        });

        await notifier.notify({ type: 'cover_letter_preview', job, coverLetter, matchScore });
    }
}
