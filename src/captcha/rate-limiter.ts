const HOUR_MS = 60 * 60 * 1000;

/**
 * Fixed one-hour window of CAPTCHA attempts. The window restarts on the first
 * attempt after it has run out.
 */
export class CaptchaRateLimiter {
    private windowStart: number;
    private used = 0;

    constructor(
        readonly maxPerHour: number = 20,
        private readonly now: () => Date = () => new Date()
    ) {
        this.windowStart = now().getTime();
    }

    tryAcquire(): boolean {
        const now = this.now().getTime();
        if (now - this.windowStart > HOUR_MS) {
            this.windowStart = now;
            this.used = 0;
        }

        if (this.used >= this.maxPerHour) return false;
        this.used += 1;
        return true;
    }
}
