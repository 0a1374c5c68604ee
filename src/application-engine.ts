import { randomUUID } from 'crypto';
import { logger } from './utils/logger';
import { analyze } from './dom-analyzer';
import { FieldMapper } from './field-mapper';
import { renderCoverLetter } from './tailoring';
import {
    ApplicationError,
    FieldWriteError,
    NavigationError,
    errorMessage
} from './errors';
import type { ApplicantProfile, EngineConfig } from './config';
import type { HumanAssistant } from './human-assistant';
import type { ApplicationAttempt, CaptchaChallenge, EngineState, VerificationResult } from './types/attempt';
import type { BrowserSession, BrowserSessionFactory } from './types/browser';
import type { FieldAssignment, FieldDescriptor, PageSignals } from './types/form';
import type { Job } from './types/jobs';
import type { CaptchaRateLimiter } from './captcha/rate-limiter';
import type {
    CaptchaMetricsRecorder,
    CaptchaOutcome,
    CaptchaSolvingService,
    ContentTailor,
    EmailConfirmationChecker
} from './types/services';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    fieldWriteAttempts: 3,
    maxCaptchaRounds: 2
};

const CONFIRMATION_TEXT = /thank you|application (has been )?(received|submitted)|successfully submitted|confirmation/i;
const SUCCESS_URL = /thank|confirm|success|submitted|complete/i;

export type HumanSolver = Pick<HumanAssistant, 'requestHumanSolve'>;

export interface ApplicationEngineDeps {
    sessions: BrowserSessionFactory;
    humanSolver: HumanSolver;
    mapper?: FieldMapper;
    solver?: CaptchaSolvingService;
    tailor?: ContentTailor;
    emailChecker?: EmailConfirmationChecker;
    captchaMetrics?: CaptchaMetricsRecorder;
    captchaRateLimiter?: CaptchaRateLimiter;
    config?: Partial<EngineConfig>;
    now?: () => Date;
}

/**
 * Reads the post-submit page. Validation errors outrank everything else.
 */
export function assessSignals(signals: PageSignals, jobUrl: string): VerificationResult {
    const finalUrl = signals.url;

    if (signals.validationErrors > 0) {
        return { verdict: 'rejected', finalUrl, detail: `${signals.validationErrors} validation error(s) shown after submit` };
    }
    if (CONFIRMATION_TEXT.test(signals.text)) {
        return { verdict: 'confirmed', indicator: 'confirmation_text', finalUrl };
    }
    if (finalUrl !== jobUrl && SUCCESS_URL.test(finalUrl)) {
        return { verdict: 'confirmed', indicator: 'url_change', finalUrl };
    }
    if (signals.modelAssessment?.isComplete) {
        return {
            verdict: 'confirmed',
            indicator: 'model_assessment',
            finalUrl,
            detail: signals.modelAssessment.confirmationMessage
        };
    }
    return { verdict: 'ambiguous', finalUrl };
}

function isSameField(candidate: FieldDescriptor, field: FieldDescriptor): boolean {
    return candidate.kind === field.kind
        && candidate.name === field.name
        && candidate.labels.join('|') === field.labels.join('|');
}

interface AttemptContext {
    job: Job;
    session: BrowserSession;
    attempt: ApplicationAttempt;
    captchaRounds: number;
    solvedSelectors: Set<string>;
}

export class ApplicationEngine {
    private readonly mapper: FieldMapper;
    private readonly config: EngineConfig;
    private readonly now: () => Date;

    constructor(private readonly deps: ApplicationEngineDeps) {
        this.mapper = deps.mapper ?? new FieldMapper();
        this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Runs one application attempt end to end. Never rejects: every failure
     * comes back as a failed attempt carrying its reason.
     */
    async apply(job: Job, profile: ApplicantProfile): Promise<ApplicationAttempt> {
        const attempt: ApplicationAttempt = {
            id: randomUUID(),
            jobUrl: job.url,
            startedAt: this.now().toISOString(),
            status: 'failed',
            outcome: 'failed',
            fieldsFilled: 0,
            fieldErrors: [],
            warnings: [],
            states: []
        };

        let session: BrowserSession | null = null;
        try {
            session = await this.deps.sessions.open();
            await this.run({ job, session, attempt, captchaRounds: 0, solvedSelectors: new Set() }, profile);

            attempt.status = 'succeeded';
            attempt.outcome = 'submitted';
            this.enter(attempt, 'SUCCEEDED');
            logger.info(`Applied to ${job.title} at ${job.company} (${attempt.fieldsFilled} fields filled)`);
        } catch (error) {
            this.fail(attempt, error);
        } finally {
            if (session) {
                try {
                    await session.close();
                } catch (error) {
                    logger.warn(`Failed to close browser session for ${job.url}:`, error);
                }
            }
            attempt.finishedAt = this.now().toISOString();
        }

        return attempt;
    }

    private async run(context: AttemptContext, profile: ApplicantProfile): Promise<void> {
        const { job, session, attempt } = context;

        this.enter(attempt, 'NAVIGATING');
        try {
            await session.goto(job.url);
        } catch (error) {
            if (error instanceof ApplicationError) throw error;
            throw new NavigationError(`Failed to load ${job.url}: ${errorMessage(error)}`, undefined, { cause: error });
        }

        this.enter(attempt, 'ANALYZING');
        const inventory = analyze(await session.snapshot());
        if (inventory.fields.length === 0) {
            throw new ApplicationError('no_form_detected', `No fillable form fields on ${inventory.url}`);
        }

        const wantsCoverLetter = inventory.fields.some(field =>
            field.kind === 'text' && this.mapper.classify(field) === 'cover_letter_text');
        const coverLetterText = wantsCoverLetter ? await this.renderCoverLetter(job, profile) : undefined;

        const mapping = this.mapper.map(inventory, profile, { coverLetterText });
        attempt.warnings = mapping.warnings;
        if (mapping.warnings.length > 0) {
            logger.info(`Mapping produced ${mapping.warnings.length} warning(s) for ${job.url}`, {
                reasons: mapping.warnings.map(warning => warning.reason)
            });
        }

        this.enter(attempt, 'FILLING');
        await this.checkCaptcha(context, 'FILLING');

        for (const assignment of mapping.assignments) {
            if (await this.writeField(session, assignment, attempt)) {
                attempt.fieldsFilled += 1;
            } else {
                await this.checkCaptcha(context, 'FILLING');
            }
        }

        await this.checkCaptcha(context, 'FILLING');

        this.enter(attempt, 'SUBMITTING');
        await session.submit();

        this.enter(attempt, 'VERIFYING');
        await this.verify(context);
    }

    private async renderCoverLetter(job: Job, profile: ApplicantProfile): Promise<string> {
        const values = {
            company: job.company,
            title: job.title,
            summary: '',
            name: `${profile.firstName} ${profile.lastName}`
        };

        if (this.deps.tailor) {
            try {
                const tailored = await this.deps.tailor.tailor(job, profile);
                values.summary = tailored.summary;
            } catch (error) {
                logger.warn(`Tailoring failed for ${job.url}, using the untailored template:`, error);
            }
        }

        return renderCoverLetter(profile.coverLetterTemplate, values);
    }

    private async writeField(session: BrowserSession, assignment: FieldAssignment, attempt: ApplicationAttempt): Promise<boolean> {
        const { key } = assignment;
        let { field, value } = assignment;

        for (let tries = 1; ; tries++) {
            try {
                switch (value.type) {
                    case 'text':
                        await session.fillText(field.handle, value.text);
                        break;
                    case 'option':
                        if (field.kind === 'select') {
                            await session.selectOption(field.handle, value.option.value);
                        } else {
                            await session.checkOption(value.option.handle);
                        }
                        break;
                    case 'check':
                        await session.setChecked(field.handle, value.checked);
                        break;
                    case 'file':
                        await session.uploadFile(field.handle, value.path);
                        break;
                }
                return true;
            } catch (error) {
                const failure = FieldWriteError.from(error);
                if (!failure.transient || tries >= this.config.fieldWriteAttempts) {
                    attempt.fieldErrors.push({ key, handle: field.handle, attempts: tries, error: failure.message });
                    logger.warn(`field_write_error on ${key} after ${tries} attempt(s): ${failure.message}`);
                    return false;
                }
                logger.debug(`Retrying ${key} after transient error: ${failure.message}`);
                ({ field, value } = await this.relocate(session, { key, field, value }));
            }
        }
    }

    /**
     * Re-renders drop the handle stamp, so find the field again in a fresh
     * snapshot before the next try.
     */
    private async relocate(session: BrowserSession, assignment: FieldAssignment): Promise<FieldAssignment> {
        const { field, value } = assignment;
        if (!field.name && field.labels.length === 0) return assignment;

        let fresh: FieldDescriptor | undefined;
        try {
            fresh = analyze(await session.snapshot()).fields.find(candidate => isSameField(candidate, field));
        } catch (error) {
            logger.debug(`Could not re-read the form while retrying ${assignment.key}: ${errorMessage(error)}`);
            return assignment;
        }
        if (!fresh) return assignment;

        if (value.type === 'option' && (fresh.kind === 'select' || fresh.kind === 'radio-group')) {
            const wanted = value.option;
            const option = fresh.options.find(candidate => candidate.value === wanted.value) ?? wanted;
            return { key: assignment.key, field: fresh, value: { type: 'option', option } };
        }
        return { key: assignment.key, field: fresh, value };
    }

    private async checkCaptcha(context: AttemptContext, resumeState: EngineState): Promise<void> {
        const { job, session, attempt } = context;

        const detected = await session.detectCaptcha();
        if (!detected || context.solvedSelectors.has(detected.selector)) return;

        context.captchaRounds += 1;
        if (context.captchaRounds > this.config.maxCaptchaRounds) {
            throw new ApplicationError(
                'captcha_unresolved',
                `CAPTCHA appeared ${context.captchaRounds} times, more than the ${this.config.maxCaptchaRounds} allowed`
            );
        }

        if (this.deps.captchaRateLimiter && !this.deps.captchaRateLimiter.tryAcquire()) {
            throw new ApplicationError(
                'captcha_unresolved',
                `CAPTCHA rate limit reached (${this.deps.captchaRateLimiter.maxPerHour}/hour)`
            );
        }

        const challenge: CaptchaChallenge = {
            id: randomUUID(),
            kind: detected.kind,
            selector: detected.selector,
            siteKey: detected.siteKey,
            pageUrl: await session.currentUrl(),
            detectedAt: this.now().toISOString(),
            resolution: 'pending'
        };
        attempt.captcha = challenge;
        this.enter(attempt, 'CAPTCHA_PENDING');
        logger.info(`Detected ${challenge.kind} CAPTCHA on ${challenge.pageUrl}`);

        const cost = await this.solveAutomatically(challenge, session);
        if (cost !== null) {
            await this.recordCaptcha({ kind: challenge.kind, solvedBy: 'service', cost, at: this.now() });
            context.solvedSelectors.add(challenge.selector);
            this.enter(attempt, resumeState);
            return;
        }

        const resolution = await this.deps.humanSolver.requestHumanSolve(
            challenge,
            selector => session.screenshotElement(selector),
            job
        );
        challenge.resolution = resolution;
        if (challenge.screenshotRef) attempt.screenshotRef = challenge.screenshotRef;
        await this.recordCaptcha({
            kind: challenge.kind,
            solvedBy: resolution === 'solved' ? 'human' : null,
            cost: 0,
            at: this.now()
        });

        if (resolution !== 'solved') {
            throw new ApplicationError('captcha_unresolved', `CAPTCHA ${resolution} on ${challenge.pageUrl}`);
        }

        challenge.solvedBy = 'human';
        context.solvedSelectors.add(challenge.selector);
        this.enter(attempt, resumeState);
    }

    /**
     * Resolves to the cost of the solve, or null when a person has to take over.
     */
    private async solveAutomatically(challenge: CaptchaChallenge, session: BrowserSession): Promise<number | null> {
        const { solver } = this.deps;
        if (!solver || !solver.supports(challenge.kind)) return null;

        const result = await solver.solve({ kind: challenge.kind, pageUrl: challenge.pageUrl, siteKey: challenge.siteKey });
        if (result.status !== 'solved') {
            logger.info(`Solving service could not handle ${challenge.kind}: ${result.reason}`);
            return null;
        }

        try {
            await session.injectCaptchaToken(challenge.kind, result.token);
        } catch (error) {
            logger.warn(`Could not inject CAPTCHA token, escalating to a person:`, error);
            return null;
        }

        challenge.resolution = 'solved';
        challenge.solvedBy = 'service';
        return result.cost;
    }

    private async recordCaptcha(outcome: CaptchaOutcome): Promise<void> {
        if (!this.deps.captchaMetrics) return;
        try {
            await this.deps.captchaMetrics.record(outcome);
        } catch (error) {
            logger.warn(`Failed to record ${outcome.kind} CAPTCHA metrics:`, error);
        }
    }

    private async verify(context: AttemptContext): Promise<void> {
        const { job, session, attempt } = context;

        const verification = assessSignals(await session.readSignals(), job.url);
        attempt.verification = verification;

        if (verification.verdict === 'confirmed') return;

        if (verification.verdict === 'rejected') {
            throw new ApplicationError('submission_rejected', verification.detail ?? 'Submission rejected by the form');
        }

        if (this.deps.emailChecker) {
            try {
                const email = await this.deps.emailChecker.findConfirmation(job, new Date(attempt.startedAt));
                if (email) {
                    attempt.verification = {
                        verdict: 'confirmed',
                        indicator: 'email_confirmation',
                        finalUrl: verification.finalUrl,
                        detail: email.subject
                    };
                    return;
                }
            } catch (error) {
                logger.warn(`Confirmation email lookup failed for ${job.url}:`, error);
            }
        }

        throw new ApplicationError(
            'submission_verification_ambiguous',
            `No confirmation found after submitting (final URL ${verification.finalUrl})`
        );
    }

    private fail(attempt: ApplicationAttempt, error: unknown): void {
        // first terminal reason wins
        if (!attempt.reason) {
            if (error instanceof ApplicationError) {
                attempt.reason = error.reason;
                attempt.detail = error.message;
            } else {
                attempt.reason = 'unexpected_error';
                attempt.detail = errorMessage(error);
                logger.error(`Unexpected error applying to ${attempt.jobUrl}:`, error);
            }
        }

        attempt.status = 'failed';
        attempt.outcome = attempt.reason === 'captcha_unresolved' ? 'captcha_unresolved' : 'failed';
        this.enter(attempt, 'FAILED');
        logger.warn(`Application to ${attempt.jobUrl} failed: ${attempt.reason} (${attempt.detail ?? ''})`);
    }

    private enter(attempt: ApplicationAttempt, state: EngineState): void {
        attempt.states.push(state);
        logger.debug(`${attempt.jobUrl}: ${state}`);
    }
}
