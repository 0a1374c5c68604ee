import type { CaptchaKind, DetectedCaptcha, PageSignals, PageSnapshot } from './form';

/**
 * The narrow set of page capabilities the engine relies on. Everything that
 * touches a real DOM lives behind this interface.
 */
export interface PageDriver {
    goto(url: string): Promise<void>;
    currentUrl(): Promise<string>;
    snapshot(): Promise<PageSnapshot>;
    fillText(handle: string, text: string): Promise<void>;
    selectOption(handle: string, value: string): Promise<void>;
    checkOption(handle: string): Promise<void>;
    setChecked(handle: string, checked: boolean): Promise<void>;
    uploadFile(handle: string, path: string): Promise<void>;
    detectCaptcha(): Promise<DetectedCaptcha | null>;
    injectCaptchaToken(kind: CaptchaKind, token: string): Promise<void>;
    screenshotElement(selector: string): Promise<Buffer>;
    submit(): Promise<void>;
    readSignals(): Promise<PageSignals>;
}

export interface BrowserSession extends PageDriver {
    close(): Promise<void>;
}

export interface BrowserSessionFactory {
    open(): Promise<BrowserSession>;
}
