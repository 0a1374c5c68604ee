import type { CaptchaKind, CaptchaProbe, DetectedCaptcha } from '../types/form';

interface SelectorPattern {
    kind: CaptchaKind;
    selector: string;
}

// Ordered: the first matching selector decides the kind.
export const CAPTCHA_SELECTORS: SelectorPattern[] = [
    { kind: 'hcaptcha', selector: 'iframe[src*="hcaptcha"]' },
    { kind: 'hcaptcha', selector: '.h-captcha' },
    { kind: 'turnstile', selector: 'iframe[src*="challenges.cloudflare.com"]' },
    { kind: 'turnstile', selector: '.cf-turnstile' },
    { kind: 'funcaptcha', selector: 'iframe[src*="funcaptcha"]' },
    { kind: 'funcaptcha', selector: 'iframe[src*="arkoselabs"]' },
    { kind: 'funcaptcha', selector: '#FunCaptcha' },
    { kind: 'recaptcha_v2', selector: 'iframe[src*="recaptcha/api2/anchor"]' },
    { kind: 'recaptcha_v2', selector: 'iframe[title*="reCAPTCHA"]' },
    { kind: 'recaptcha_v2', selector: '.g-recaptcha' },
    { kind: 'recaptcha_v3', selector: '.grecaptcha-badge' },
    { kind: 'image', selector: 'img[src*="captcha"]' },
    { kind: 'image', selector: 'input[name*="captcha"]' },
    { kind: 'unknown', selector: '#captcha' },
    { kind: 'unknown', selector: '[data-captcha]' }
];

const TEXT_PATTERNS: RegExp[] = [
    /please complete the (security |captcha )?check/i,
    /verify you('re| are) (a )?human/i,
    /prove you('re| are) not a robot/i,
    /i['’]m not a robot/i
];

export function captchaSelectors(): string[] {
    return CAPTCHA_SELECTORS.map(pattern => pattern.selector);
}

/**
 * Turns what the page reported into a challenge description, or null when the
 * page shows no CAPTCHA.
 */
export function classifyCaptchaProbe(probe: CaptchaProbe): DetectedCaptcha | null {
    const matched = CAPTCHA_SELECTORS.find(pattern => probe.matchedSelectors.includes(pattern.selector));
    if (matched) {
        const detected: DetectedCaptcha = { kind: matched.kind, selector: matched.selector };
        if (probe.siteKey) detected.siteKey = probe.siteKey;
        return detected;
    }

    if (TEXT_PATTERNS.some(pattern => pattern.test(probe.text))) {
        return { kind: 'unknown', selector: 'body' };
    }

    return null;
}
