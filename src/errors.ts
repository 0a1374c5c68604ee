export type FailureReason =
    | 'navigation_error'
    | 'no_form_detected'
    | 'captcha_unresolved'
    | 'submission_rejected'
    | 'submission_verification_ambiguous'
    | 'unexpected_error';

export const FAILURE_REASONS: readonly FailureReason[] = [
    'navigation_error',
    'no_form_detected',
    'captcha_unresolved',
    'submission_rejected',
    'submission_verification_ambiguous',
    'unexpected_error'
];

/**
 * Aborts an attempt with a known reason. The engine converts it into a failed
 * ApplicationAttempt; it never reaches the queue as an exception.
 */
export class ApplicationError extends Error {
    readonly reason: FailureReason;

    constructor(reason: FailureReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ApplicationError';
        this.reason = reason;
    }
}

export class NavigationError extends ApplicationError {
    readonly status?: number;

    constructor(message: string, status?: number, options?: { cause?: unknown }) {
        super('navigation_error', message, options);
        this.name = 'NavigationError';
        this.status = status;
    }
}

const TRANSIENT_PATTERNS = [
    /not attached/i,
    /detached/i,
    /intercepts pointer events/i,
    /element is not (visible|stable|enabled)/i,
    /timeout \d+ms exceeded/i,
    /execution context was destroyed/i
];

export class FieldWriteError extends Error {
    readonly transient: boolean;

    constructor(message: string, transient: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FieldWriteError';
        this.transient = transient;
    }

    static from(error: unknown): FieldWriteError {
        if (error instanceof FieldWriteError) return error;
        const message = errorMessage(error);
        return new FieldWriteError(message, isTransientInteractionError(message), { cause: error });
    }
}

export class QueueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'QueueError';
    }
}

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

export function isTransientInteractionError(message: string): boolean {
    return TRANSIENT_PATTERNS.some(pattern => pattern.test(message));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
