import { describe, it, expect, vi } from 'vitest';
import {
  CAPTCHA_METRICS_KEY,
  CaptchaMetrics,
  RedisCaptchaMetricsStore,
  emptyMetrics,
  type CaptchaMetricsData,
  type CaptchaMetricsStore
} from './captcha-metrics';
import { RedisManager } from '../utils/redis';

const MORNING = new Date('2026-10-19T09:00:00.000Z');
const NEXT_DAY = new Date('2026-10-20T09:00:00.000Z');

describe('CaptchaMetrics', () => {
  it('should count outcomes per tier, per kind and per day', async () => {
    const metrics = new CaptchaMetrics();

    await metrics.record({ kind: 'recaptcha_v2', solvedBy: 'service', cost: 0.003, at: MORNING });
    await metrics.record({ kind: 'hcaptcha', solvedBy: 'human', cost: 0, at: MORNING });
    await metrics.record({ kind: 'hcaptcha', solvedBy: null, cost: 0, at: NEXT_DAY });
    await metrics.record({ kind: 'recaptcha_v2', solvedBy: 'service', cost: 0.003, at: NEXT_DAY });

    const summary = metrics.summary();
    expect(summary).toMatchObject({
      totalChallenges: 4,
      serviceSuccess: 2,
      humanSuccess: 1,
      failures: 1,
      successRate: 75,
      byKind: {
        recaptcha_v2: { attempts: 2, success: 2 },
        hcaptcha: { attempts: 2, success: 1 }
      }
    });
    expect(summary.totalCost).toBeCloseTo(0.006);
    expect(summary.daily['2026-10-19']).toEqual({ attempts: 2, success: 2, cost: 0.003 });
    expect(summary.daily['2026-10-20']).toEqual({ attempts: 2, success: 1, cost: 0.003 });
    expect(metrics.dailyCost('2026-10-21')).toBe(0);
  });

  it('should report a zero success rate before any challenge', () => {
    expect(new CaptchaMetrics().successRate()).toBe(0);
  });

  it('should continue from what the store held and save after each record', async () => {
    const stored: CaptchaMetricsData = { ...emptyMetrics(), totalChallenges: 3, failures: 3 };
    const store: CaptchaMetricsStore = {
      load: vi.fn().mockResolvedValue(stored),
      save: vi.fn().mockResolvedValue(undefined)
    };
    const metrics = new CaptchaMetrics(store);

    await metrics.load();
    await metrics.record({ kind: 'turnstile', solvedBy: 'human', cost: 0, at: MORNING });

    expect(metrics.summary()).toMatchObject({ totalChallenges: 4, failures: 3, humanSuccess: 1, successRate: 25 });
    expect(store.save).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledWith(expect.objectContaining({ totalChallenges: 4 }));
  });

  it('should not let callers change its counts through a summary', async () => {
    const metrics = new CaptchaMetrics();
    await metrics.record({ kind: 'hcaptcha', solvedBy: 'human', cost: 0, at: MORNING });

    metrics.summary().byKind.hcaptcha.attempts = 99;

    expect(metrics.summary().byKind.hcaptcha.attempts).toBe(1);
  });
});

describe('RedisCaptchaMetricsStore', () => {
  it('should save the metrics as JSON under one key', async () => {
    const mockRedis = { setValue: vi.fn().mockResolvedValue(undefined) };
    const store = new RedisCaptchaMetricsStore(mockRedis as unknown as RedisManager);

    await store.save(emptyMetrics());

    expect(mockRedis.setValue).toHaveBeenCalledWith(CAPTCHA_METRICS_KEY, JSON.stringify(emptyMetrics()));
  });

  it('should load stored metrics and ignore unreadable ones', async () => {
    const data: CaptchaMetricsData = { ...emptyMetrics(), totalChallenges: 2, humanSuccess: 2 };
    const mockRedis = {
      getValue: vi.fn()
        .mockResolvedValueOnce(JSON.stringify(data))
        .mockResolvedValueOnce('{ not json')
        .mockResolvedValueOnce(JSON.stringify({ totalChallenges: 'many' }))
        .mockResolvedValueOnce(null)
    };
    const store = new RedisCaptchaMetricsStore(mockRedis as unknown as RedisManager);

    expect(await store.load()).toEqual(data);
    expect(await store.load()).toBeNull();
    expect(await store.load()).toBeNull();
    expect(await store.load()).toBeNull();
  });
});
