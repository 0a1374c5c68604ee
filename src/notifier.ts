import { logger } from './utils/logger';
import type { Notification, Notifier } from './types/services';

const FAILURE_HINTS: Record<string, string> = {
    navigation_error: 'The application page could not be loaded.',
    no_form_detected: 'No application form was found on the page.',
    captcha_unresolved: 'A CAPTCHA was skipped or not answered in time.',
    submission_rejected: 'The form reported validation errors after submitting.',
    submission_verification_ambiguous: 'The submission could not be confirmed.',
    unexpected_error: 'The attempt stopped on an unexpected error.'
};

interface SlackMessage {
    text: string;
    blocks: object[];
}

export function buildSlackMessage(notification: Notification): SlackMessage {
    const { job } = notification;
    const heading = `*<${job.url}|${job.title}>*\n${job.company}  •  ${job.location}`;

    switch (notification.type) {
        case 'application_succeeded': {
            const { attempt } = notification;
            return {
                text: `Applied to ${job.title} at ${job.company}`,
                blocks: [
                    { type: 'header', text: { type: 'plain_text', text: 'Application submitted' } },
                    { type: 'section', text: { type: 'mrkdwn', text: heading } },
                    {
                        type: 'context',
                        elements: [{ type: 'mrkdwn', text: `${attempt.fieldsFilled} field(s) filled  •  ${attempt.verification?.indicator ?? 'unverified'}` }]
                    }
                ]
            };
        }
        case 'application_failed': {
            const { attempt, finalState } = notification;
            const reason = attempt.reason ?? 'unexpected_error';
            const next = finalState === 'pending' ? 'Queued for another attempt.' : 'No further automatic attempts.';
            return {
                text: `Application to ${job.title} at ${job.company} failed: ${reason}`,
                blocks: [
                    { type: 'header', text: { type: 'plain_text', text: 'Application failed' } },
                    { type: 'section', text: { type: 'mrkdwn', text: heading } },
                    {
                        type: 'section',
                        text: { type: 'mrkdwn', text: `*${reason}*: ${FAILURE_HINTS[reason] ?? ''}${attempt.detail ? `\n${attempt.detail}` : ''}` }
                    },
                    { type: 'context', elements: [{ type: 'mrkdwn', text: next }] }
                ]
            };
        }
        case 'cover_letter_preview': {
            const score = notification.matchScore === undefined
                ? 'Untailored template'
                : `Match score: ${Math.round(notification.matchScore * 100)}%`;
            return {
                text: `Cover letter preview for ${job.title} at ${job.company}`,
                blocks: [
                    { type: 'header', text: { type: 'plain_text', text: 'Cover letter preview' } },
                    { type: 'section', text: { type: 'mrkdwn', text: heading } },
                    { type: 'section', text: { type: 'mrkdwn', text: notification.coverLetter.slice(0, 2900) } },
                    {
                        type: 'context',
                        elements: [{ type: 'mrkdwn', text: score }]
                    }
                ]
            };
        }
    }
}

export class SlackNotifier implements Notifier {
    constructor(
        private readonly webhookUrl: string | undefined,
        private readonly fetchImpl: typeof fetch = fetch
    ) {}

    async notify(notification: Notification): Promise<void> {
        if (!this.webhookUrl) {
            logger.debug(`No SLACK_WEBHOOK_URL set, skipping ${notification.type} notification`);
            return;
        }

        const response = await this.fetchImpl(this.webhookUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(buildSlackMessage(notification))
        });

        if (!response.ok) {
            const text = await response.text();
            logger.error(`Slack webhook failed (${response.status}): ${text}`);
        }
    }
}
