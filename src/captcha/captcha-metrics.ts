import { z } from 'zod';
import { logger } from '../utils/logger';
import { RedisManager } from '../utils/redis';
import type { CaptchaMetricsRecorder, CaptchaOutcome } from '../types/services';

export const CAPTCHA_METRICS_KEY = 'captcha:metrics';

const CounterSchema = z.object({
    attempts: z.number().nonnegative(),
    success: z.number().nonnegative()
});

const CaptchaMetricsDataSchema = z.object({
    totalChallenges: z.number().nonnegative(),
    serviceSuccess: z.number().nonnegative(),
    humanSuccess: z.number().nonnegative(),
    failures: z.number().nonnegative(),
    totalCost: z.number().nonnegative(),
    daily: z.record(z.string(), CounterSchema.extend({ cost: z.number().nonnegative() })),
    byKind: z.record(z.string(), CounterSchema)
});

export type CaptchaMetricsData = z.infer<typeof CaptchaMetricsDataSchema>;

export interface CaptchaMetricsSummary extends CaptchaMetricsData {
    // percentage of challenges solved by either tier
    successRate: number;
}

export interface CaptchaMetricsStore {
    load(): Promise<CaptchaMetricsData | null>;
    save(data: CaptchaMetricsData): Promise<void>;
}

export function emptyMetrics(): CaptchaMetricsData {
    return {
        totalChallenges: 0,
        serviceSuccess: 0,
        humanSuccess: 0,
        failures: 0,
        totalCost: 0,
        daily: {},
        byKind: {}
    };
}

export class RedisCaptchaMetricsStore implements CaptchaMetricsStore {
    constructor(
        private readonly redis: RedisManager,
        private readonly key: string = CAPTCHA_METRICS_KEY
    ) {}

    async load(): Promise<CaptchaMetricsData | null> {
        const raw = await this.redis.getValue(this.key);
        if (!raw) return null;

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch {
            logger.warn(`Ignoring unreadable CAPTCHA metrics under ${this.key}`);
            return null;
        }

        const parsed = CaptchaMetricsDataSchema.safeParse(data);
        if (!parsed.success) {
            logger.warn(`Ignoring invalid CAPTCHA metrics under ${this.key}: ${parsed.error.message}`);
            return null;
        }
        return parsed.data;
    }

    async save(data: CaptchaMetricsData): Promise<void> {
        await this.redis.setValue(this.key, JSON.stringify(data));
    }
}

/**
 * Per-tier and per-kind counts of CAPTCHA challenges, with what they cost.
 */
export class CaptchaMetrics implements CaptchaMetricsRecorder {
    private data: CaptchaMetricsData = emptyMetrics();

    constructor(private readonly store?: CaptchaMetricsStore) {}

    async load(): Promise<void> {
        if (!this.store) return;
        this.data = (await this.store.load()) ?? emptyMetrics();
    }

    async record(outcome: CaptchaOutcome): Promise<void> {
        const solved = outcome.solvedBy !== null;
        const day = outcome.at.toISOString().slice(0, 10);
        const { data } = this;

        data.totalChallenges += 1;
        if (outcome.solvedBy === 'service') data.serviceSuccess += 1;
        else if (outcome.solvedBy === 'human') data.humanSuccess += 1;
        else data.failures += 1;
        data.totalCost += outcome.cost;

        const daily = data.daily[day] ?? { attempts: 0, success: 0, cost: 0 };
        daily.attempts += 1;
        if (solved) daily.success += 1;
        daily.cost += outcome.cost;
        data.daily[day] = daily;

        const byKind = data.byKind[outcome.kind] ?? { attempts: 0, success: 0 };
        byKind.attempts += 1;
        if (solved) byKind.success += 1;
        data.byKind[outcome.kind] = byKind;

        if (this.store) await this.store.save(data);
    }

    successRate(): number {
        const { totalChallenges, serviceSuccess, humanSuccess } = this.data;
        return totalChallenges === 0 ? 0 : ((serviceSuccess + humanSuccess) / totalChallenges) * 100;
    }

    dailyCost(day: string): number {
        return this.data.daily[day]?.cost ?? 0;
    }

    summary(): CaptchaMetricsSummary {
        return { ...structuredClone(this.data), successRate: this.successRate() };
    }
}
