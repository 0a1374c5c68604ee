import type { FailureReason } from '../errors';
import type { CaptchaKind, MappingWarning, SemanticKey } from './form';

export type EngineState =
    | 'NAVIGATING'
    | 'ANALYZING'
    | 'FILLING'
    | 'CAPTCHA_PENDING'
    | 'SUBMITTING'
    | 'VERIFYING'
    | 'SUCCEEDED'
    | 'FAILED';

export type CaptchaResolution = 'pending' | 'solved' | 'skipped' | 'timed-out';

export interface CaptchaChallenge {
    id: string;
    kind: CaptchaKind;
    selector: string;
    siteKey?: string;
    pageUrl: string;
    detectedAt: string;
    resolution: CaptchaResolution;
    solvedBy?: 'service' | 'human';
    screenshotRef?: string;
}

export interface FieldWriteFailure {
    key: SemanticKey;
    handle: string;
    attempts: number;
    error: string;
}

export type VerificationIndicator = 'confirmation_text' | 'url_change' | 'model_assessment' | 'email_confirmation';

export interface VerificationResult {
    verdict: 'confirmed' | 'rejected' | 'ambiguous';
    indicator?: VerificationIndicator;
    finalUrl: string;
    detail?: string;
}

export type AttemptOutcome = 'submitted' | 'failed' | 'captcha_unresolved';

export interface ApplicationAttempt {
    id: string;
    jobUrl: string;
    startedAt: string;
    finishedAt?: string;
    status: 'succeeded' | 'failed';
    outcome: AttemptOutcome;
    reason?: FailureReason;
    detail?: string;
    fieldsFilled: number;
    fieldErrors: FieldWriteFailure[];
    warnings: MappingWarning[];
    states: EngineState[];
    screenshotRef?: string;
    captcha?: CaptchaChallenge;
    verification?: VerificationResult;
}
