import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError, FAILURE_REASONS, type FailureReason } from './errors';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
    REDIS_URL: z.string().default('redis://localhost:6379'),
    PROFILE_PATH: z.string().default('./profile.json'),

    BROWSER_ENV: z.enum(['LOCAL', 'BROWSERBASE']).default('LOCAL'),
    BROWSER_HEADLESS: booleanFlag.default('true'),
    BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    BROWSER_VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1280),
    BROWSER_VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(720),
    BROWSER_SETTLE_MS: z.coerce.number().int().nonnegative().default(3000),
    BROWSERBASE_API_KEY: z.string().optional(),
    BROWSERBASE_PROJECT_ID: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    MODEL_VERIFICATION: booleanFlag.default('false'),

    FIELD_WRITE_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    MAX_CAPTCHA_ROUNDS: z.coerce.number().int().min(1).default(2),

    // setTimeout caps at 2^31-1 ms
    CAPTCHA_TIMEOUT_SECONDS: z.coerce.number().int().positive().max(2147483).default(300),
    CAPTCHA_SCREENSHOT_DIR: z.string().default('./data/captcha_screenshots'),
    TWOCAPTCHA_API_KEY: z.string().optional(),
    CAPTCHA_DAILY_BUDGET: z.coerce.number().nonnegative().default(1),
    CAPTCHA_HOURLY_LIMIT: z.coerce.number().int().positive().default(20),

    RETRY_LIMITS: z.string().optional(),
    IDLE_POLL_SECONDS: z.coerce.number().int().positive().default(5),

    SLACK_WEBHOOK_URL: z.string().url().optional(),

    GOOGLE_CLIENT_ID: z.string().optional(),
    GOOGLE_CLIENT_SECRET: z.string().optional(),
    GMAIL_REFRESH_TOKEN: z.string().optional(),
    EMAIL_LOOKBACK_MINUTES: z.coerce.number().int().positive().default(30)
});

export type RetryLimits = Partial<Record<FailureReason, number>>;

export const DEFAULT_RETRY_LIMITS: RetryLimits = {
    navigation_error: 1,
    captcha_unresolved: 1,
    unexpected_error: 1
};

export interface BrowserConfig {
    env: 'LOCAL' | 'BROWSERBASE';
    headless: boolean;
    timeoutMs: number;
    settleMs: number;
    viewport: { width: number; height: number };
    browserbase?: { apiKey: string; projectId: string };
    openaiApiKey?: string;
    modelVerification: boolean;
}

export interface EngineConfig {
    fieldWriteAttempts: number;
    maxCaptchaRounds: number;
}

export interface CaptchaConfig {
    timeoutSeconds: number;
    screenshotDir: string;
    twoCaptchaApiKey?: string;
    dailyBudget: number;
    hourlyLimit: number;
}

export interface GmailConfig {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    lookbackMinutes: number;
}

export interface AppConfig {
    redisUrl: string;
    profilePath: string;
    browser: BrowserConfig;
    engine: EngineConfig;
    captcha: CaptchaConfig;
    retryLimits: RetryLimits;
    idlePollSeconds: number;
    slackWebhookUrl?: string;
    gmail?: GmailConfig;
}

/**
 * Parses `navigation_error=1,captcha_unresolved=2` style overrides on top of
 * the defaults.
 */
export function parseRetryLimits(overrides: string | undefined): RetryLimits {
    const limits: RetryLimits = { ...DEFAULT_RETRY_LIMITS };
    if (!overrides) return limits;

    for (const pair of overrides.split(',')) {
        const trimmed = pair.trim();
        if (!trimmed) continue;

        const [reason, count] = trimmed.split('=').map(part => part.trim());
        const limit = Number(count);
        const known = FAILURE_REASONS.find(candidate => candidate === reason);
        if (!known || !Number.isInteger(limit) || limit < 0) {
            throw new ConfigError(`Invalid RETRY_LIMITS entry "${trimmed}"`);
        }
        limits[known] = limit;
    }

    return limits;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
    }
    const vars = parsed.data;

    if (vars.BROWSER_ENV === 'BROWSERBASE' && !(vars.BROWSERBASE_API_KEY && vars.BROWSERBASE_PROJECT_ID)) {
        throw new ConfigError('BROWSER_ENV=BROWSERBASE requires BROWSERBASE_API_KEY and BROWSERBASE_PROJECT_ID');
    }

    const gmail = vars.GOOGLE_CLIENT_ID && vars.GOOGLE_CLIENT_SECRET && vars.GMAIL_REFRESH_TOKEN
        ? {
            clientId: vars.GOOGLE_CLIENT_ID,
            clientSecret: vars.GOOGLE_CLIENT_SECRET,
            refreshToken: vars.GMAIL_REFRESH_TOKEN,
            lookbackMinutes: vars.EMAIL_LOOKBACK_MINUTES
        }
        : undefined;

    return {
        redisUrl: vars.REDIS_URL,
        profilePath: vars.PROFILE_PATH,
        browser: {
            env: vars.BROWSER_ENV,
            headless: vars.BROWSER_HEADLESS,
            timeoutMs: vars.BROWSER_TIMEOUT_MS,
            settleMs: vars.BROWSER_SETTLE_MS,
            viewport: {
                width: vars.BROWSER_VIEWPORT_WIDTH,
                height: vars.BROWSER_VIEWPORT_HEIGHT
            },
            browserbase: vars.BROWSERBASE_API_KEY && vars.BROWSERBASE_PROJECT_ID
                ? { apiKey: vars.BROWSERBASE_API_KEY, projectId: vars.BROWSERBASE_PROJECT_ID }
                : undefined,
            openaiApiKey: vars.OPENAI_API_KEY,
            modelVerification: vars.MODEL_VERIFICATION && Boolean(vars.OPENAI_API_KEY)
        },
        engine: {
            fieldWriteAttempts: vars.FIELD_WRITE_ATTEMPTS,
            maxCaptchaRounds: vars.MAX_CAPTCHA_ROUNDS
        },
        captcha: {
            timeoutSeconds: vars.CAPTCHA_TIMEOUT_SECONDS,
            screenshotDir: vars.CAPTCHA_SCREENSHOT_DIR,
            twoCaptchaApiKey: vars.TWOCAPTCHA_API_KEY,
            dailyBudget: vars.CAPTCHA_DAILY_BUDGET,
            hourlyLimit: vars.CAPTCHA_HOURLY_LIMIT
        },
        retryLimits: parseRetryLimits(vars.RETRY_LIMITS),
        idlePollSeconds: vars.IDLE_POLL_SECONDS,
        slackWebhookUrl: vars.SLACK_WEBHOOK_URL,
        gmail
    };
}

const optionalAnswer = z.string().trim().min(1).optional();

export const ApplicantProfileSchema = z.object({
    firstName: z.string().min(1),
    lastName: z.string().min(1),
    preferredName: z.string().optional(),
    email: z.string().email(),
    phone: z.string().min(1),
    location: z.object({
        city: z.string().min(1),
        state: z.string().optional(),
        country: z.string().optional(),
        postalCode: z.string().optional(),
        address: z.string().optional()
    }),
    links: z.object({
        linkedin: z.string().url().optional(),
        github: z.string().url().optional(),
        portfolio: z.string().url().optional(),
        website: z.string().url().optional()
    }).default({}),
    resumePath: z.string().min(1),
    resumeText: z.string().optional(),
    coverLetterPath: z.string().optional(),
    coverLetterTemplate: z.string().min(1),
    workAuthorization: z.object({
        authorizedToWork: z.boolean(),
        requiresSponsorship: z.boolean()
    }),
    demographics: z.object({
        gender: optionalAnswer,
        race: optionalAnswer,
        ethnicity: optionalAnswer,
        veteranStatus: optionalAnswer,
        disabilityStatus: optionalAnswer
    }).default({}),
    answers: z.record(z.string(), z.string()).default({})
});

export type ApplicantProfile = z.infer<typeof ApplicantProfileSchema>;

export function parseProfile(data: unknown): ApplicantProfile {
    const parsed = ApplicantProfileSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid applicant profile: ${issues.join('; ')}`);
    }
    return parsed.data;
}

export async function loadProfile(path: string): Promise<ApplicantProfile> {
    let raw: string;
    try {
        raw = await readFile(path, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read applicant profile at ${path}`, { cause: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Applicant profile at ${path} is not valid JSON`, { cause: error });
    }

    return Object.freeze(parseProfile(data));
}
