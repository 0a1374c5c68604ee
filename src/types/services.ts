import type { ApplicantProfile } from '../config';
import type { ApplicationAttempt } from './attempt';
import type { CaptchaKind } from './form';
import type { CaptchaEscalationTask, CaptchaResponse, Job, QueueEntry, TrackingEvent } from './jobs';

export interface TailoredContent {
    summary: string;
    matchScore: number;
}

export interface ContentTailor {
    tailor(job: Job, profile: ApplicantProfile): Promise<TailoredContent>;
}

export type ResponseHandler = (response: CaptchaResponse) => void;

export interface EscalationChannel {
    send(escalation: CaptchaEscalationTask): Promise<void>;
    // returns an unsubscribe function
    onResponse(handler: ResponseHandler): () => void;
}

export type Notification =
    | { type: 'application_succeeded'; job: Job; attempt: ApplicationAttempt }
    | { type: 'application_failed'; job: Job; attempt: ApplicationAttempt; finalState: 'pending' | 'failed' }
    // no match score when tailoring failed and the plain template was used
    | { type: 'cover_letter_preview'; job: Job; coverLetter: string; matchScore?: number };

export interface Notifier {
    notify(notification: Notification): Promise<void>;
}

export interface EmailConfirmation {
    messageId: string;
    from: string;
    subject: string;
    receivedAt: string;
}

export interface EmailConfirmationChecker {
    findConfirmation(job: Job, since: Date): Promise<EmailConfirmation | null>;
}

export interface TrackingSink {
    append(event: TrackingEvent): Promise<void>;
}

/**
 * Durable copy of the queue, one record per job URL.
 */
export interface QueueStore {
    load(): Promise<QueueEntry[]>;
    save(entry: QueueEntry): Promise<void>;
}

export interface CaptchaSolveRequest {
    kind: CaptchaKind;
    pageUrl: string;
    siteKey?: string;
}

export type CaptchaSolveResult =
    | { status: 'solved'; token: string; cost: number }
    | { status: 'unsolvable'; reason: string };

export interface CaptchaSolvingService {
    supports(kind: CaptchaKind): boolean;
    solve(request: CaptchaSolveRequest): Promise<CaptchaSolveResult>;
}

export interface CaptchaOutcome {
    kind: CaptchaKind;
    // null when the challenge was left unsolved
    solvedBy: 'service' | 'human' | null;
    cost: number;
    at: Date;
}

export interface CaptchaMetricsRecorder {
    record(outcome: CaptchaOutcome): Promise<void>;
}
