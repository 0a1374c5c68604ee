import type { CaptchaKind, CaptchaProbe, PageSnapshot, RawControl, RawForm } from './types/form';

// Functions in this module are serialized into the page by `page.evaluate`,
// so each one must be self-contained: no imports, no module-level helpers.

export const HANDLE_ATTRIBUTE = 'data-apply-handle';

export interface SnapshotArgs {
    handleAttribute: string;
}

export function collectSnapshot({ handleAttribute }: SnapshotArgs): PageSnapshot {
    const clean = (value: string | null | undefined): string => (value ?? '').replace(/\s+/g, ' ').trim();
    const submitSelector = 'button[type="submit"], input[type="submit"], button:not([type])';
    const textTypes = ['text', 'email', 'tel', 'url', 'number', 'search'];

    let counter = document.querySelectorAll(`[${handleAttribute}]`).length;
    const stamp = (element: Element): string => {
        const existing = element.getAttribute(handleAttribute);
        if (existing) return existing;
        counter += 1;
        const handle = `h${counter}`;
        element.setAttribute(handleAttribute, handle);
        return handle;
    };

    const isVisible = (element: HTMLElement): boolean => {
        const style = window.getComputedStyle(element);
        if (style.visibility === 'hidden' || style.display === 'none') return false;
        return element.getClientRects().length > 0;
    };

    const precedingText = (element: Element): string => {
        let node = element.previousSibling;
        while (node) {
            if (node instanceof HTMLElement) {
                if (node.matches('input, select, textarea, button')) return '';
                const text = clean(node.innerText);
                if (text) return text;
            } else if (node.nodeType === Node.TEXT_NODE) {
                const text = clean(node.textContent);
                if (text) return text;
            }
            node = node.previousSibling;
        }
        return '';
    };

    const containerText = (element: HTMLElement): string => {
        const container = element.parentElement?.closest('div, li, td, p, section');
        if (!(container instanceof HTMLElement)) return '';
        const owned = container.querySelectorAll('input:not([type="hidden"]), select, textarea');
        const sameGroup = Array.from(owned).every(other =>
            other === element || (other instanceof HTMLInputElement && element instanceof HTMLInputElement
                && other.type === 'radio' && other.name === element.name));
        return sameGroup ? clean(container.innerText).slice(0, 200) : '';
    };

    const ariaText = (element: Element): string => {
        const label = clean(element.getAttribute('aria-label'));
        if (label) return label;
        const ids = clean(element.getAttribute('aria-labelledby')).split(' ').filter(Boolean);
        return clean(ids.map(id => document.getElementById(id)?.textContent ?? '').join(' '));
    };

    const forms = Array.from(document.forms);
    const elements = Array.from(document.querySelectorAll('input, select, textarea'));

    const controls: RawControl[] = [];
    for (const element of elements) {
        if (!(element instanceof HTMLInputElement || element instanceof HTMLSelectElement || element instanceof HTMLTextAreaElement)) {
            continue;
        }
        const type = element instanceof HTMLInputElement ? element.type.toLowerCase() : element.tagName.toLowerCase();
        const labels = Array.from(element.labels ?? []);
        const visible = isVisible(element) || (type === 'file' && labels.some(isVisible));

        controls.push({
            handle: stamp(element),
            tag: element.tagName.toLowerCase(),
            type,
            name: element.name,
            id: element.id,
            formIndex: element.form ? forms.indexOf(element.form) : null,
            visible,
            disabled: element.disabled,
            required: element.required || element.getAttribute('aria-required') === 'true',
            labelText: clean(labels.map(label => label.innerText).join(' ')),
            ariaLabel: ariaText(element),
            placeholder: element instanceof HTMLSelectElement ? '' : clean(element.placeholder),
            precedingText: precedingText(element),
            containerText: containerText(element),
            legendText: clean(element.closest('fieldset')?.querySelector('legend')?.textContent),
            value: element instanceof HTMLInputElement ? element.value : '',
            options: element instanceof HTMLSelectElement
                ? Array.from(element.options).map(option => ({ value: option.value, label: clean(option.textContent) }))
                : []
        });
    }

    const rawForms: RawForm[] = forms.map((form, index) => {
        const submit = form.querySelector(submitSelector);
        const textInputCount = Array.from(form.querySelectorAll('input, textarea'))
            .filter(field => field instanceof HTMLTextAreaElement
                || (field instanceof HTMLInputElement && textTypes.includes(field.type.toLowerCase())))
            .length;
        return {
            index,
            hasSubmit: submit !== null,
            textInputCount,
            submitHandle: submit ? stamp(submit) : undefined
        };
    });

    const loose = Array.from(document.querySelectorAll('button, input[type="submit"], [role="button"]'))
        .find(button => button instanceof HTMLElement && !button.closest('form') && isVisible(button)
            && /submit|apply|send application/i.test(clean(button.innerText || button.getAttribute('value'))));

    return {
        url: window.location.href,
        forms: rawForms,
        controls,
        looseSubmitHandle: loose ? stamp(loose) : undefined
    };
}

export interface ProbeArgs {
    selectors: string[];
}

export function probeCaptcha({ selectors }: ProbeArgs): CaptchaProbe {
    const matchedSelectors = selectors.filter(selector => {
        try {
            return document.querySelector(selector) !== null;
        } catch {
            return false;
        }
    });

    let siteKey: string | undefined;
    const keyed = document.querySelector('[data-sitekey]');
    if (keyed) {
        siteKey = keyed.getAttribute('data-sitekey') ?? undefined;
    } else {
        const frame = document.querySelector('iframe[src*="recaptcha"], iframe[src*="hcaptcha"]');
        const source = frame?.getAttribute('src');
        if (source) {
            const url = new URL(source, window.location.href);
            siteKey = url.searchParams.get('k') ?? url.searchParams.get('sitekey') ?? undefined;
        }
    }

    return {
        matchedSelectors,
        text: (document.body?.innerText ?? '').slice(0, 5000),
        siteKey
    };
}

export interface TokenArgs {
    kind: CaptchaKind;
    token: string;
}

export function injectToken({ kind, token }: TokenArgs): boolean {
    const fieldsByKind: Record<CaptchaKind, string[]> = {
        recaptcha_v2: ['[name="g-recaptcha-response"]', '#g-recaptcha-response'],
        recaptcha_v3: ['[name="g-recaptcha-response"]', '#g-recaptcha-response'],
        hcaptcha: ['[name="h-captcha-response"]', '[name="g-recaptcha-response"]'],
        turnstile: ['[name="cf-turnstile-response"]'],
        funcaptcha: ['#FunCaptcha-Token', '[name="fc-token"]'],
        image: [],
        unknown: []
    };

    let written = 0;
    for (const selector of fieldsByKind[kind]) {
        for (const field of Array.from(document.querySelectorAll(selector))) {
            if (field instanceof HTMLTextAreaElement || field instanceof HTMLInputElement) {
                field.value = token;
                field.dispatchEvent(new Event('change', { bubbles: true }));
                written += 1;
            }
        }
    }

    const callbackName = document.querySelector('[data-callback]')?.getAttribute('data-callback');
    if (callbackName) {
        const callback: unknown = Reflect.get(window, callbackName);
        if (typeof callback === 'function') callback(token);
    }

    return written > 0;
}

export interface SignalArgs {
    errorSelectors: string[];
}

export function collectSignals({ errorSelectors }: SignalArgs): { url: string; text: string; validationErrors: number } {
    const visibleErrors = Array.from(document.querySelectorAll(errorSelectors.join(', ')))
        .filter(element => element instanceof HTMLElement
            && element.getClientRects().length > 0
            && element.innerText.trim().length > 0);

    return {
        url: window.location.href,
        text: (document.body?.innerText ?? '').slice(0, 10000),
        validationErrors: visibleErrors.length
    };
}
