import { describe, it, expect, vi } from 'vitest';
import { ApplicationEngine, assessSignals, type HumanSolver } from './application-engine';
import { HumanAssistant } from './human-assistant';
import { JobQueueManager } from './job-queue-manager';
import { ApplicationError, NavigationError } from './errors';
import { CaptchaMetrics } from './captcha/captcha-metrics';
import { CaptchaRateLimiter } from './captcha/rate-limiter';
import {
  FakePageDriver,
  FakeSessionFactory,
  InMemoryEscalationChannel,
  MemoryScreenshotStore,
  applicationFormSnapshot,
  makeJob,
  makeProfile,
  type FakePageOptions
} from './test/fakes';
import type { DetectedCaptcha, PageSignals } from './types/form';
import type { CaptchaSolvingService, ContentTailor, EmailConfirmationChecker } from './types/services';

const job = makeJob();
const profile = makeProfile();

const CONFIRMED: PageSignals = {
  url: 'https://boards.greenhouse.io/acme/jobs/1/confirmation',
  text: 'Thank you for applying to Acme!',
  validationErrors: 0
};

const RECAPTCHA: DetectedCaptcha = { kind: 'recaptcha_v2', selector: '.g-recaptcha', siteKey: 'site-key' };

const neverAsked: HumanSolver = {
  requestHumanSolve: vi.fn().mockRejectedValue(new Error('human should not be asked'))
};

function setup(options: Partial<FakePageOptions> = {}, deps: Partial<ConstructorParameters<typeof ApplicationEngine>[0]> = {}) {
  const page = new FakePageDriver({
    snapshot: applicationFormSnapshot(),
    signalsAfterSubmit: CONFIRMED,
    ...options
  });
  const sessions = new FakeSessionFactory(page);
  const engine = new ApplicationEngine({ sessions, humanSolver: neverAsked, ...deps });
  return { page, sessions, engine };
}

function humanAnswering(action: 'solved' | 'skip' | null, timeoutSeconds = 300) {
  const channel = new InMemoryEscalationChannel(escalation =>
    action ? { challenge_id: escalation.challenge_id, action, responder: 'U123' } : null
  );
  const screenshots = new MemoryScreenshotStore();
  const assistant = new HumanAssistant(channel, screenshots, { timeoutSeconds });
  return { channel, screenshots, assistant };
}

describe('ApplicationEngine', () => {
  describe('successful application', () => {
    it('should fill the four fields and confirm the submission', async () => {
      const { page, sessions, engine } = setup();

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('succeeded');
      expect(attempt.outcome).toBe('submitted');
      expect(attempt.fieldsFilled).toBe(4);
      expect(attempt.reason).toBeUndefined();
      expect(attempt.verification).toEqual({
        verdict: 'confirmed',
        indicator: 'confirmation_text',
        finalUrl: CONFIRMED.url
      });
      expect(attempt.states).toEqual(['NAVIGATING', 'ANALYZING', 'FILLING', 'SUBMITTING', 'VERIFYING', 'SUCCEEDED']);
      expect(page.visited).toBe(job.url);
      expect(page.writes).toEqual([
        { op: 'fill', handle: 'h1', value: 'Ada' },
        { op: 'fill', handle: 'h2', value: 'Lovelace' },
        { op: 'fill', handle: 'h3', value: 'ada@example.com' },
        { op: 'upload', handle: 'h4', value: '/tmp/resume.pdf' }
      ]);
      expect(page.submitted).toBe(true);
      expect(page.closed).toBe(true);
      expect(sessions.opened).toBe(1);
      expect(attempt.finishedAt).toBeDefined();
    });

    it('should check for a CAPTCHA before filling and before submitting', async () => {
      const { page, engine } = setup();

      await engine.apply(job, profile);

      expect(page.detectCalls).toBe(2);
    });
  });

  describe('navigation', () => {
    it('should fail with navigation_error on HTTP 404', async () => {
      const { page, engine } = setup({ gotoError: new NavigationError('HTTP 404 loading page', 404) });

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('failed');
      expect(attempt.reason).toBe('navigation_error');
      expect(attempt.detail).toBe('HTTP 404 loading page');
      expect(attempt.states).toEqual(['NAVIGATING', 'FAILED']);
      expect(page.closed).toBe(true);
    });

    it('should treat low-level load errors as navigation errors', async () => {
      const { engine } = setup({ gotoError: new Error('net::ERR_NAME_NOT_RESOLVED') });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('navigation_error');
      expect(attempt.detail).toBe(`Failed to load ${job.url}: net::ERR_NAME_NOT_RESOLVED`);
    });

    it('should stop retrying a 404 once the retry limit is used up', async () => {
      const { sessions, engine } = setup({ gotoError: new NavigationError('HTTP 404 loading page', 404) });
      const queue = new JobQueueManager();
      await queue.enqueue(job);

      for (let round = 0; round < 3; round++) {
        const entry = await queue.next();
        if (!entry) break;
        await queue.recordAttempt(entry.job.url, await engine.apply(entry.job, profile));
      }

      expect(sessions.opened).toBe(2);
      expect(queue.get(job.url)).toMatchObject({ state: 'failed', retries: 1, attempts: 2, lastReason: 'navigation_error' });
    });
  });

  describe('analysis', () => {
    it('should fail with no_form_detected when the page has no fields', async () => {
      const { page, engine } = setup({ snapshot: { url: job.url, forms: [], controls: [] } });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('no_form_detected');
      expect(attempt.states).toEqual(['NAVIGATING', 'ANALYZING', 'FAILED']);
      expect(page.submitted).toBe(false);
    });

    it('should record mapping warnings on the attempt', async () => {
      const snapshot = applicationFormSnapshot();
      snapshot.controls.push({ ...snapshot.controls[0], handle: 'h7', labelText: 'Favourite colour', name: 'colour' });
      const { engine } = setup({ snapshot });

      const attempt = await engine.apply(job, profile);

      expect(attempt.warnings).toEqual([
        { handle: 'h7', labels: ['Favourite colour'], reason: 'unmapped_required' }
      ]);
      expect(attempt.status).toBe('succeeded');
    });
  });

  describe('cover letter', () => {
    it('should render the tailored cover letter into the text field', async () => {
      const snapshot = applicationFormSnapshot();
      snapshot.controls.splice(4, 0, {
        ...snapshot.controls[0], handle: 'h8', tag: 'textarea', type: 'textarea', name: 'cover', labelText: 'Cover Letter', required: false
      });
      const tailor: ContentTailor = { tailor: vi.fn().mockResolvedValue({ summary: 'I ship TypeScript.', matchScore: 0.5 }) };
      const { page, engine } = setup({ snapshot }, { tailor });

      await engine.apply(job, profile);

      expect(page.writes).toContainEqual({
        op: 'fill',
        handle: 'h8',
        value: 'Dear Acme, I am applying for Backend Engineer. I ship TypeScript. Regards, Ada Lovelace'
      });
    });

    it('should fall back to the untailored letter when tailoring fails', async () => {
      const snapshot = applicationFormSnapshot();
      snapshot.controls.splice(4, 0, {
        ...snapshot.controls[0], handle: 'h8', tag: 'textarea', type: 'textarea', name: 'cover', labelText: 'Cover Letter', required: false
      });
      const tailor: ContentTailor = { tailor: vi.fn().mockRejectedValue(new Error('tailor down')) };
      const { page, engine } = setup({ snapshot }, { tailor });

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('succeeded');
      expect(page.writes).toContainEqual({
        op: 'fill',
        handle: 'h8',
        value: 'Dear Acme, I am applying for Backend Engineer.  Regards, Ada Lovelace'
      });
    });
  });

  describe('field writes', () => {
    it('should retry a transient write failure', async () => {
      const { page, engine } = setup({
        writeErrors: { h1: [new Error('Element is not attached to the DOM')] }
      });

      const attempt = await engine.apply(job, profile);

      expect(attempt.fieldsFilled).toBe(4);
      expect(attempt.fieldErrors).toEqual([]);
      expect(page.writes[0]).toEqual({ op: 'fill', handle: 'h1', value: 'Ada' });
    });

    it('should find a re-rendered field again before retrying', async () => {
      const rerendered = applicationFormSnapshot();
      rerendered.controls = rerendered.controls.map(control =>
        control.handle === 'h3' ? { ...control, handle: 'h7' } : control);
      const { page, engine } = setup({
        laterSnapshots: [rerendered],
        writeErrors: { h3: [new Error('Element is not attached to the DOM'), new Error('Element is not attached to the DOM')] }
      });

      const attempt = await engine.apply(job, profile);

      expect(attempt.fieldsFilled).toBe(4);
      expect(attempt.fieldErrors).toEqual([]);
      expect(page.snapshotCalls).toBe(2);
      expect(page.writes).toContainEqual({ op: 'fill', handle: 'h7', value: 'ada@example.com' });
    });

    it('should give up after the configured number of transient failures', async () => {
      const detached = (): Error => new Error('Element is not attached to the DOM');
      const { engine } = setup(
        { writeErrors: { h1: [detached(), detached(), detached()] } },
        { config: { fieldWriteAttempts: 2 } }
      );

      const attempt = await engine.apply(job, profile);

      expect(attempt.fieldsFilled).toBe(3);
      expect(attempt.fieldErrors).toEqual([
        { key: 'first_name', handle: 'h1', attempts: 2, error: 'Element is not attached to the DOM' }
      ]);
      expect(attempt.status).toBe('succeeded');
    });

    it('should record a non-transient failure once and keep filling', async () => {
      const { page, engine } = setup({ writeErrors: { h3: [new Error('Cannot type into a read-only input')] } });

      const attempt = await engine.apply(job, profile);

      expect(attempt.fieldsFilled).toBe(3);
      expect(attempt.fieldErrors).toEqual([
        { key: 'email', handle: 'h3', attempts: 1, error: 'Cannot type into a read-only input' }
      ]);
      // before filling, after the failed field, before submitting
      expect(page.detectCalls).toBe(3);
    });
  });

  describe('CAPTCHA handling', () => {
    it('should fail with captcha_unresolved when the person skips', async () => {
      const { channel, screenshots, assistant } = humanAnswering('skip');
      const { page, engine } = setup({ captchas: [RECAPTCHA] }, { humanSolver: assistant });

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('failed');
      expect(attempt.reason).toBe('captcha_unresolved');
      expect(attempt.outcome).toBe('captcha_unresolved');
      expect(attempt.captcha).toMatchObject({
        kind: 'recaptcha_v2',
        selector: '.g-recaptcha',
        siteKey: 'site-key',
        pageUrl: job.url,
        resolution: 'skipped',
        screenshotRef: 'memory://captcha-1.png'
      });
      expect(attempt.screenshotRef).toBe('memory://captcha-1.png');
      expect(attempt.states).toEqual(['NAVIGATING', 'ANALYZING', 'FILLING', 'CAPTCHA_PENDING', 'FAILED']);
      expect(channel.sent).toHaveLength(1);
      expect(screenshots.saved).toHaveLength(1);
      expect(page.writes).toEqual([]);
      expect(page.submitted).toBe(false);
      expect(page.closed).toBe(true);
    });

    it('should resume filling once the person solves it', async () => {
      const { assistant } = humanAnswering('solved');
      const { page, engine } = setup({ captchas: [RECAPTCHA, RECAPTCHA] }, { humanSolver: assistant });

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('succeeded');
      expect(attempt.captcha).toMatchObject({ resolution: 'solved', solvedBy: 'human' });
      expect(attempt.states).toEqual([
        'NAVIGATING', 'ANALYZING', 'FILLING', 'CAPTCHA_PENDING', 'FILLING', 'SUBMITTING', 'VERIFYING', 'SUCCEEDED'
      ]);
      expect(page.writes).toHaveLength(4);
    });

    it('should fail with captcha_unresolved when nobody answers in time', async () => {
      const { assistant } = humanAnswering(null, 0.01);
      const { engine } = setup({ captchas: [RECAPTCHA] }, { humanSolver: assistant });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('captcha_unresolved');
      expect(attempt.captcha?.resolution).toBe('timed-out');
      expect(attempt.screenshotRef).toBe('memory://captcha-1.png');
    });

    it('should use the solving service before asking a person', async () => {
      const solver: CaptchaSolvingService = {
        supports: vi.fn().mockReturnValue(true),
        solve: vi.fn().mockResolvedValue({ status: 'solved', token: 'test-token', cost: 0.003 })
      };
      const { page, engine } = setup({ captchas: [RECAPTCHA] }, { solver });

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('succeeded');
      expect(solver.solve).toHaveBeenCalledWith({ kind: 'recaptcha_v2', pageUrl: job.url, siteKey: 'site-key' });
      expect(page.injected).toEqual([{ kind: 'recaptcha_v2', token: 'test-token' }]);
      expect(attempt.captcha).toMatchObject({ resolution: 'solved', solvedBy: 'service' });
      expect(neverAsked.requestHumanSolve).not.toHaveBeenCalled();
      // only the post-submit check reads the page signals
      expect(page.signalReads).toBe(1);
    });

    it('should escalate to a person when the service cannot solve the kind', async () => {
      const solver: CaptchaSolvingService = {
        supports: vi.fn().mockReturnValue(false),
        solve: vi.fn()
      };
      const { assistant, channel } = humanAnswering('solved');
      const { engine } = setup({ captchas: [{ kind: 'image', selector: 'img[src*="captcha"]' }] }, { solver, humanSolver: assistant });

      const attempt = await engine.apply(job, profile);

      expect(solver.solve).not.toHaveBeenCalled();
      expect(channel.sent[0]).toMatchObject({ kind: 'image', job_title: 'Backend Engineer', company: 'Acme', actions: ['solved', 'skip'] });
      expect(attempt.captcha?.solvedBy).toBe('human');
    });

    it('should give up after too many CAPTCHA rounds', async () => {
      const solver: CaptchaSolvingService = {
        supports: vi.fn().mockReturnValue(true),
        solve: vi.fn().mockResolvedValue({ status: 'solved', token: 'test-token', cost: 0.003 })
      };
      const { page, engine } = setup(
        { captchas: [RECAPTCHA, { kind: 'hcaptcha', selector: '.h-captcha', siteKey: 'other-key' }] },
        { solver, config: { maxCaptchaRounds: 1 } }
      );

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('captcha_unresolved');
      expect(attempt.detail).toBe('CAPTCHA appeared 2 times, more than the 1 allowed');
      expect(page.submitted).toBe(false);
    });

    it('should record service solves with their cost', async () => {
      const solver: CaptchaSolvingService = {
        supports: vi.fn().mockReturnValue(true),
        solve: vi.fn().mockResolvedValue({ status: 'solved', token: 'test-token', cost: 0.003 })
      };
      const captchaMetrics = new CaptchaMetrics();
      const { engine } = setup({ captchas: [RECAPTCHA] }, { solver, captchaMetrics });

      await engine.apply(job, profile);

      expect(captchaMetrics.summary()).toMatchObject({
        totalChallenges: 1,
        serviceSuccess: 1,
        totalCost: 0.003,
        byKind: { recaptcha_v2: { attempts: 1, success: 1 } }
      });
    });

    it('should record a challenge the person skipped as a failure', async () => {
      const { assistant } = humanAnswering('skip');
      const captchaMetrics = new CaptchaMetrics();
      const { engine } = setup({ captchas: [RECAPTCHA] }, { humanSolver: assistant, captchaMetrics });

      await engine.apply(job, profile);

      expect(captchaMetrics.summary()).toMatchObject({ totalChallenges: 1, humanSuccess: 0, failures: 1, successRate: 0 });
    });

    it('should stop once the hourly CAPTCHA limit is used up', async () => {
      const captchaRateLimiter = new CaptchaRateLimiter(1);
      captchaRateLimiter.tryAcquire();
      const { page, engine } = setup({ captchas: [RECAPTCHA] }, { captchaRateLimiter });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('captcha_unresolved');
      expect(attempt.detail).toBe('CAPTCHA rate limit reached (1/hour)');
      expect(attempt.captcha).toBeUndefined();
      expect(neverAsked.requestHumanSolve).not.toHaveBeenCalled();
      expect(page.submitted).toBe(false);
    });
  });

  describe('submission and verification', () => {
    it('should fail with unexpected_error when the form has no submit control', async () => {
      const { engine } = setup({
        submitError: new ApplicationError('unexpected_error', 'No submit control found on https://boards.greenhouse.io/acme/jobs/1')
      });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('unexpected_error');
      expect(attempt.detail).toBe('No submit control found on https://boards.greenhouse.io/acme/jobs/1');
      expect(attempt.states).toEqual(['NAVIGATING', 'ANALYZING', 'FILLING', 'SUBMITTING', 'FAILED']);
    });

    it('should fail with submission_rejected when validation errors show', async () => {
      const { engine } = setup({ signalsAfterSubmit: { url: job.url, text: 'Please fix the errors below', validationErrors: 2 } });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('submission_rejected');
      expect(attempt.verification?.verdict).toBe('rejected');
    });

    it('should accept a confirmation email when the page is ambiguous', async () => {
      const emailChecker: EmailConfirmationChecker = {
        findConfirmation: vi.fn().mockResolvedValue({
          messageId: 'm1',
          from: 'no-reply@acme.com',
          subject: 'Thank you for applying to Acme',
          receivedAt: '2026-10-19T10:00:00.000Z'
        })
      };
      const { engine } = setup({ signalsAfterSubmit: { url: job.url, text: 'Your form', validationErrors: 0 } }, { emailChecker });

      const attempt = await engine.apply(job, profile);

      expect(attempt.status).toBe('succeeded');
      expect(attempt.verification).toEqual({
        verdict: 'confirmed',
        indicator: 'email_confirmation',
        finalUrl: job.url,
        detail: 'Thank you for applying to Acme'
      });
    });

    it('should fail as ambiguous when neither page nor email confirms', async () => {
      const emailChecker: EmailConfirmationChecker = { findConfirmation: vi.fn().mockResolvedValue(null) };
      const { engine } = setup({ signalsAfterSubmit: { url: job.url, text: 'Your form', validationErrors: 0 } }, { emailChecker });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('submission_verification_ambiguous');
      expect(attempt.verification?.verdict).toBe('ambiguous');
    });
  });

  describe('session handling', () => {
    it('should close the session even when closing fails', async () => {
      const { page, engine } = setup({ closeError: new Error('browser already gone') });

      const attempt = await engine.apply(job, profile);

      expect(page.closed).toBe(true);
      expect(attempt.status).toBe('succeeded');
    });

    it('should turn a session that cannot open into unexpected_error', async () => {
      const engine = new ApplicationEngine({
        sessions: { open: vi.fn().mockRejectedValue(new Error('no browser')) },
        humanSolver: neverAsked
      });

      const attempt = await engine.apply(job, profile);

      expect(attempt.reason).toBe('unexpected_error');
      expect(attempt.detail).toBe('no browser');
      expect(attempt.states).toEqual(['FAILED']);
    });
  });
});

describe('assessSignals', () => {
  it('should let validation errors outrank confirmation text', () => {
    expect(assessSignals({ url: 'https://x.test/apply', text: 'Thank you', validationErrors: 1 }, 'https://x.test/apply').verdict)
      .toBe('rejected');
  });

  it('should accept a success-looking URL change', () => {
    expect(assessSignals({ url: 'https://x.test/apply/success', text: '', validationErrors: 0 }, 'https://x.test/apply'))
      .toEqual({ verdict: 'confirmed', indicator: 'url_change', finalUrl: 'https://x.test/apply/success' });
  });

  it('should not count an unchanged URL', () => {
    expect(assessSignals({ url: 'https://x.test/apply', text: '', validationErrors: 0 }, 'https://x.test/apply').verdict)
      .toBe('ambiguous');
  });
});
