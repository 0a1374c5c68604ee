import { z } from 'zod';
import { logger } from './utils/logger';
import { RedisManager } from './utils/redis';
import { TaskType, type CaptchaEscalationTask, type CaptchaResponse } from './types/jobs';
import type { EscalationChannel, ResponseHandler } from './types/services';

export const CAPTCHA_RESPONSE_CHANNEL = 'captcha:responses';

const CaptchaResponseSchema = z.object({
    challenge_id: z.string().min(1),
    action: z.enum(['solved', 'skip']),
    responder: z.string().optional()
});

export function parseCaptchaResponse(message: string): CaptchaResponse | null {
    try {
        const parsed = CaptchaResponseSchema.safeParse(JSON.parse(message));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Escalations go out as tasks on the `captcha_escalation` list for the chat
 * bridge; button presses come back on the `captcha:responses` channel.
 */
export class RedisEscalationChannel implements EscalationChannel {
    private readonly handlers = new Set<ResponseHandler>();

    constructor(private readonly redis: RedisManager) {}

    async start(): Promise<void> {
        await this.redis.subscribe(CAPTCHA_RESPONSE_CHANNEL, message => this.dispatch(message));
    }

    async send(escalation: CaptchaEscalationTask): Promise<void> {
        await this.redis.publishTask(TaskType.CAPTCHA_ESCALATION, escalation, 10);
    }

    onResponse(handler: ResponseHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    private dispatch(message: string): void {
        const response = parseCaptchaResponse(message);
        if (!response) {
            logger.warn(`Discarding malformed CAPTCHA response: ${message}`);
            return;
        }
        for (const handler of this.handlers) {
            handler(response);
        }
    }
}
