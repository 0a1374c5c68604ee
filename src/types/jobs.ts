import type { ApplicationAttempt } from './attempt';

export type JobSource = 'greenhouse' | 'lever' | 'linkedin' | 'other';

export interface Job {
    source: JobSource;
    url: string;
    title: string;
    company: string;
    location: string;
    description: string;
}

export type QueueState = 'pending' | 'applying' | 'applied' | 'declined' | 'failed';

export interface QueueEntry {
    job: Job;
    state: QueueState;
    // FIFO position; a job put back after a failed attempt moves to the tail
    position: number;
    enqueuedAt: string;
    updatedAt: string;
    retries: number;
    attempts: number;
    fieldsFilled: number;
    lastReason?: string;
    note?: string;
}

export interface QueueStats {
    pending: number;
    applying: number;
    applied: number;
    declined: number;
    failed: number;
    total: number;
    attempts: number;
    fieldsFilled: number;
    successRate: number;
}

export interface JobDiscoveredTask {
    url: string;
    title: string;
    company: string;
    location?: string;
    description?: string;
    source?: JobSource;
}

export interface CaptchaEscalationTask {
    challenge_id: string;
    kind: string;
    page_url: string;
    job_title: string;
    company: string;
    screenshot_ref?: string;
    timeout_seconds: number;
    actions: CaptchaAction[];
}

export interface JobSummaryTask {
    job_url: string;
    title: string;
    company: string;
    location: string;
    match_score?: number;
    actions: JobAction[];
}

export type CaptchaAction = 'solved' | 'skip';

export interface CaptchaResponse {
    challenge_id: string;
    action: CaptchaAction;
    responder?: string;
}

export type JobAction = 'auto_apply' | 'manual_apply' | 'decline' | 'preview';

export interface JobActionMessage {
    action: JobAction;
    job_url: string;
    responder?: string;
    job?: JobDiscoveredTask;
}

export enum TaskType {
    JOB_DISCOVERED = 'job_discovered',
    CAPTCHA_ESCALATION = 'captcha_escalation',
    JOB_SUMMARY = 'job_summary'
}

export interface QueueTask<T> {
    id: string;
    type: TaskType;
    payload: T;
    retries: number;
    created_at: string;
    priority?: number;
}

export interface TaskResult<T = unknown> {
    success: boolean;
    task_id: string;
    error?: string;
    data?: T;
}

export type TrackingEvent =
    | { type: 'job_enqueued'; at: string; job: Job }
    | { type: 'state_transition'; at: string; jobUrl: string; from: QueueState | null; to: QueueState; reason?: string }
    | { type: 'attempt_recorded'; at: string; jobUrl: string; attempt: ApplicationAttempt };

export function detectJobSource(url: string): JobSource {
    let host: string;
    try {
        host = new URL(url).hostname.toLowerCase();
    } catch {
        return 'other';
    }

    if (host.includes('greenhouse')) return 'greenhouse';
    if (host.includes('lever.co')) return 'lever';
    if (host.includes('linkedin')) return 'linkedin';
    return 'other';
}
