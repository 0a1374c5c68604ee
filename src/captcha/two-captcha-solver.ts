import { z } from 'zod';
import { logger } from '../utils/logger';
import { errorMessage } from '../errors';
import type { CaptchaKind } from '../types/form';
import type { CaptchaSolveRequest, CaptchaSolveResult, CaptchaSolvingService } from '../types/services';

// USD per solve
export const TWO_CAPTCHA_PRICING: Partial<Record<CaptchaKind, number>> = {
    recaptcha_v2: 0.003,
    recaptcha_v3: 0.004,
    hcaptcha: 0.003,
    funcaptcha: 0.004,
    turnstile: 0.003
};

const CreateTaskResponseSchema = z.object({
    errorId: z.number(),
    errorCode: z.string().optional(),
    taskId: z.union([z.number(), z.string()]).optional()
});

const TaskResultResponseSchema = z.object({
    errorId: z.number(),
    errorCode: z.string().optional(),
    status: z.enum(['processing', 'ready']).optional(),
    solution: z.object({
        gRecaptchaResponse: z.string().optional(),
        token: z.string().optional()
    }).optional()
});

export interface TwoCaptchaOptions {
    apiKey: string;
    dailyBudget: number;
    baseUrl?: string;
    pollIntervalMs?: number;
    maxPolls?: number;
    fetchImpl?: typeof fetch;
    now?: () => Date;
}

export class TwoCaptchaSolver implements CaptchaSolvingService {
    private readonly baseUrl: string;
    private readonly pollIntervalMs: number;
    private readonly maxPolls: number;
    private readonly fetchImpl: typeof fetch;
    private readonly now: () => Date;
    private spent = { day: '', amount: 0 };

    constructor(private readonly options: TwoCaptchaOptions) {
        this.baseUrl = options.baseUrl ?? 'https://api.2captcha.com';
        this.pollIntervalMs = options.pollIntervalMs ?? 5000;
        this.maxPolls = options.maxPolls ?? 24;
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.now = options.now ?? (() => new Date());
    }

    supports(kind: CaptchaKind): boolean {
        return TWO_CAPTCHA_PRICING[kind] !== undefined;
    }

    getDailySpent(): number {
        return this.spent.day === this.today() ? this.spent.amount : 0;
    }

    async solve(request: CaptchaSolveRequest): Promise<CaptchaSolveResult> {
        const cost = TWO_CAPTCHA_PRICING[request.kind];
        if (cost === undefined) {
            return { status: 'unsolvable', reason: `unsupported captcha kind ${request.kind}` };
        }
        if (!request.siteKey) {
            return { status: 'unsolvable', reason: 'site key not found on page' };
        }
        if (this.getDailySpent() + cost > this.options.dailyBudget) {
            logger.warn(`Daily CAPTCHA budget ($${this.options.dailyBudget}) reached`);
            return { status: 'unsolvable', reason: 'daily budget exhausted' };
        }

        try {
            const created = CreateTaskResponseSchema.parse(
                await this.post('/createTask', { task: this.buildTask(request.kind, request.pageUrl, request.siteKey) })
            );
            if (created.errorId !== 0 || created.taskId === undefined) {
                return { status: 'unsolvable', reason: created.errorCode ?? 'task rejected' };
            }
            logger.info(`CAPTCHA submitted to solving service (task ${created.taskId})`);

            for (let poll = 0; poll < this.maxPolls; poll++) {
                await this.sleep(this.pollIntervalMs);

                const result = TaskResultResponseSchema.parse(
                    await this.post('/getTaskResult', { taskId: created.taskId })
                );
                if (result.errorId !== 0) {
                    return { status: 'unsolvable', reason: result.errorCode ?? 'solving failed' };
                }
                if (result.status !== 'ready') continue;

                const token = result.solution?.gRecaptchaResponse ?? result.solution?.token;
                if (!token) {
                    return { status: 'unsolvable', reason: 'solution carried no token' };
                }
                this.charge(cost);
                logger.info(`CAPTCHA solved by service (cost $${cost.toFixed(4)})`);
                return { status: 'solved', token, cost };
            }

            return { status: 'unsolvable', reason: 'solving service timed out' };
        } catch (error) {
            logger.error('CAPTCHA solving service request failed:', error);
            return { status: 'unsolvable', reason: errorMessage(error) };
        }
    }

    private buildTask(kind: CaptchaKind, websiteURL: string, websiteKey: string): Record<string, unknown> {
        switch (kind) {
            case 'recaptcha_v3':
                return { type: 'RecaptchaV3TaskProxyless', websiteURL, websiteKey, minScore: 0.3 };
            case 'hcaptcha':
                return { type: 'HCaptchaTaskProxyless', websiteURL, websiteKey };
            case 'turnstile':
                return { type: 'TurnstileTaskProxyless', websiteURL, websiteKey };
            case 'funcaptcha':
                return { type: 'FunCaptchaTaskProxyless', websiteURL, websitePublicKey: websiteKey };
            default:
                return { type: 'RecaptchaV2TaskProxyless', websiteURL, websiteKey };
        }
    }

    private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
        const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ clientKey: this.options.apiKey, ...body })
        });
        if (!response.ok) {
            throw new Error(`Solving service responded ${response.status}`);
        }
        return response.json();
    }

    private charge(cost: number): void {
        const day = this.today();
        this.spent = { day, amount: this.getDailySpent() + cost };
    }

    private today(): string {
        return this.now().toISOString().slice(0, 10);
    }

    private async sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
