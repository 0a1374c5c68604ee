import { describe, it, expect, beforeEach, vi } from 'vitest';
import { JobActionRouter, parseJobAction } from './job-action-router';
import { JobQueueManager } from './job-queue-manager';
import { makeJob, makeProfile } from './test/fakes';
import type { ApplicationAttempt } from './types/attempt';
import type { ContentTailor, Notifier } from './types/services';

const job = makeJob();

describe('parseJobAction', () => {
  it('should accept an action with job details', () => {
    const message = JSON.stringify({
      action: 'auto_apply',
      job_url: job.url,
      job: { url: job.url, title: 'Backend Engineer', company: 'Acme' }
    });

    expect(parseJobAction(message)).toEqual({
      action: 'auto_apply',
      job_url: job.url,
      job: { url: job.url, title: 'Backend Engineer', company: 'Acme' }
    });
  });

  it('should reject unknown actions and bad JSON', () => {
    expect(parseJobAction('{"action":"archive","job_url":"https://jobs.example.com/1"}')).toBeNull();
    expect(parseJobAction('{')).toBeNull();
  });
});

describe('JobActionRouter', () => {
  let queue: JobQueueManager;
  let tailor: ContentTailor;
  let notifier: Notifier;
  let router: JobActionRouter;

  beforeEach(() => {
    queue = new JobQueueManager({ retryLimits: {} });
    tailor = { tailor: vi.fn().mockResolvedValue({ summary: 'I ship TypeScript.', matchScore: 0.75 }) };
    notifier = { notify: vi.fn().mockResolvedValue(undefined) };
    router = new JobActionRouter({ queue, profile: makeProfile(), tailor, notifier });
  });

  async function failJob(): Promise<void> {
    await queue.enqueue(job);
    await queue.next();
    const failed: ApplicationAttempt = {
      id: 'attempt-1',
      jobUrl: job.url,
      startedAt: '2026-10-19T09:00:00.000Z',
      status: 'failed',
      outcome: 'failed',
      reason: 'submission_rejected',
      fieldsFilled: 0,
      fieldErrors: [],
      warnings: [],
      states: []
    };
    await queue.recordAttempt(job.url, failed);
  }

  it('should queue a job approved from its summary', async () => {
    await router.handleMessage(JSON.stringify({
      action: 'auto_apply',
      job_url: job.url,
      job: { url: job.url, title: job.title, company: job.company, location: job.location, description: job.description }
    }));

    expect(queue.get(job.url)).toMatchObject({ state: 'pending', job });
  });

  it('should requeue a failed job on auto_apply', async () => {
    await failJob();

    await router.route({ action: 'auto_apply', job_url: job.url });

    expect(queue.get(job.url)).toMatchObject({ state: 'pending', retries: 0 });
  });

  it('should leave a job that is already queued alone', async () => {
    await queue.enqueue(job);

    await router.route({ action: 'auto_apply', job_url: job.url });

    expect(queue.list()).toHaveLength(1);
    expect(queue.get(job.url)?.state).toBe('pending');
  });

  it('should not queue an unknown job without details', async () => {
    await router.route({ action: 'auto_apply', job_url: job.url });

    expect(queue.list()).toEqual([]);
  });

  it('should decline a job the person will apply to themselves', async () => {
    await queue.enqueue(job);

    await router.route({ action: 'manual_apply', job_url: job.url });

    expect(queue.get(job.url)).toMatchObject({ state: 'declined', note: 'applying manually' });
  });

  it('should decline a pending job', async () => {
    await queue.enqueue(job);

    await router.route({ action: 'decline', job_url: job.url, responder: 'U123' });

    expect(queue.get(job.url)?.state).toBe('declined');
  });

  it('should ignore a decline the queue does not allow', async () => {
    await failJob();

    await expect(router.route({ action: 'decline', job_url: job.url })).resolves.toBeUndefined();
    expect(queue.get(job.url)?.state).toBe('failed');
  });

  it('should ignore a decline for an unknown job', async () => {
    await expect(router.route({ action: 'decline', job_url: job.url })).resolves.toBeUndefined();
  });

  it('should send a tailored cover letter preview', async () => {
    await queue.enqueue(job);

    await router.route({ action: 'preview', job_url: job.url });

    expect(tailor.tailor).toHaveBeenCalledWith(job, makeProfile());
    expect(notifier.notify).toHaveBeenCalledWith({
      type: 'cover_letter_preview',
      job,
      coverLetter: 'Dear Acme, I am applying for Backend Engineer. I ship TypeScript. Regards, Ada Lovelace',
      matchScore: 0.75
    });
  });

  it('should preview the untailored template when tailoring fails', async () => {
    await queue.enqueue(job);
    vi.mocked(tailor.tailor).mockRejectedValueOnce(new Error('model unavailable'));

    await router.route({ action: 'preview', job_url: job.url });

    expect(notifier.notify).toHaveBeenCalledWith({
      type: 'cover_letter_preview',
      job,
      coverLetter: 'Dear Acme, I am applying for Backend Engineer.  Regards, Ada Lovelace',
      matchScore: undefined
    });
  });

  it('should not preview a job it knows nothing about', async () => {
    await router.route({ action: 'preview', job_url: job.url });

    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should discard malformed messages', async () => {
    await router.handleMessage('{"action":"auto_apply"}');

    expect(queue.list()).toEqual([]);
  });
});
