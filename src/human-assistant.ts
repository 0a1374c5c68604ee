import { logger } from './utils/logger';
import type { ScreenshotStore } from './captcha/screenshot-store';
import type { CaptchaChallenge, CaptchaResolution } from './types/attempt';
import type { CaptchaResponse, Job } from './types/jobs';
import type { EscalationChannel } from './types/services';

export type ElementCapture = (selector: string) => Promise<Buffer>;

export interface HumanAssistantOptions {
    timeoutSeconds: number;
}

/**
 * Escalates a CAPTCHA to a person and waits, bounded, for "solved" or "skip".
 * One waiter per challenge; the first response settles it.
 */
export class HumanAssistant {
    private readonly pending = new Map<string, (response: CaptchaResponse) => void>();
    private readonly unsubscribe: () => void;

    constructor(
        private readonly channel: EscalationChannel,
        private readonly screenshots: ScreenshotStore,
        private readonly options: HumanAssistantOptions
    ) {
        this.unsubscribe = channel.onResponse(response => this.handleResponse(response));
    }

    async requestHumanSolve(challenge: CaptchaChallenge, capture: ElementCapture, job: Job): Promise<CaptchaResolution> {
        try {
            const image = await capture(challenge.selector);
            challenge.screenshotRef = await this.screenshots.save(image);
        } catch (error) {
            logger.warn(`Could not capture CAPTCHA element ${challenge.selector} for challenge ${challenge.id}:`, error);
        }

        // registered before sending so an immediate answer is not lost
        const response = this.waitForResponse(challenge.id);

        try {
            await this.channel.send({
                challenge_id: challenge.id,
                kind: challenge.kind,
                page_url: challenge.pageUrl,
                job_title: job.title,
                company: job.company,
                screenshot_ref: challenge.screenshotRef,
                timeout_seconds: this.options.timeoutSeconds,
                actions: ['solved', 'skip']
            });
            logger.info(`CAPTCHA escalation sent for challenge ${challenge.id} (${job.company} - ${job.title})`);
        } catch (error) {
            logger.error(`Failed to send CAPTCHA escalation for challenge ${challenge.id}, waiting anyway:`, error);
        }

        const resolution = await response;
        challenge.resolution = resolution;
        return resolution;
    }

    pendingCount(): number {
        return this.pending.size;
    }

    dispose(): void {
        this.unsubscribe();
    }

    private waitForResponse(challengeId: string): Promise<CaptchaResolution> {
        return new Promise(resolve => {
            let settled = false;

            const settle = (resolution: CaptchaResolution): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                this.pending.delete(challengeId);
                resolve(resolution);
            };

            const timer = setTimeout(() => {
                logger.warn(`No response for CAPTCHA challenge ${challengeId} within ${this.options.timeoutSeconds}s`);
                settle('timed-out');
            }, this.options.timeoutSeconds * 1000);

            this.pending.set(challengeId, response => {
                logger.info(`CAPTCHA challenge ${challengeId} answered "${response.action}" by ${response.responder ?? 'unknown'}`);
                settle(response.action === 'solved' ? 'solved' : 'skipped');
            });
        });
    }

    private handleResponse(response: CaptchaResponse): void {
        const waiter = this.pending.get(response.challenge_id);
        if (!waiter) {
            logger.info(`Ignoring response for settled or unknown CAPTCHA challenge ${response.challenge_id}`);
            return;
        }
        waiter(response);
    }
}
