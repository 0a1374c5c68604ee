import { Stagehand, type Page } from '@browserbasehq/stagehand';
import { z } from 'zod';
import { logger } from './utils/logger';
import { ApplicationError, FieldWriteError, NavigationError } from './errors';
import { selectPrimaryForm } from './dom-analyzer';
import { captchaSelectors, classifyCaptchaProbe } from './captcha/captcha-detector';
import { HANDLE_ATTRIBUTE, collectSignals, collectSnapshot, injectToken, probeCaptcha } from './page-scripts';
import type { BrowserConfig } from './config';
import type { BrowserSession, BrowserSessionFactory } from './types/browser';
import type { CaptchaKind, DetectedCaptcha, PageSignals, PageSnapshot } from './types/form';

const VALIDATION_ERROR_SELECTORS = [
    '[aria-invalid="true"]',
    '.error',
    '.field-error',
    '.invalid-feedback',
    '.error-message',
    '[role="alert"]'
];

const CompletionSchema = z.object({
    isComplete: z.boolean(),
    confirmationMessage: z.string().optional()
});

/**
 * One browser per attempt. All element access goes through the handle
 * attribute stamped by the snapshot collector.
 */
export class StagehandSession implements BrowserSession {
    private lastSnapshot: PageSnapshot | null = null;

    constructor(
        private readonly stagehand: Stagehand,
        private readonly config: BrowserConfig
    ) {}

    private get page(): Page {
        return this.stagehand.page;
    }

    private locate(handle: string) {
        return this.page.locator(`[${HANDLE_ATTRIBUTE}="${handle}"]`);
    }

    async goto(url: string): Promise<void> {
        const response = await this.page.goto(url, {
            waitUntil: 'domcontentloaded',
            timeout: this.config.timeoutMs
        });
        if (response && response.status() >= 400) {
            throw new NavigationError(`HTTP ${response.status()} loading ${url}`, response.status());
        }
        await this.settle();
    }

    async currentUrl(): Promise<string> {
        return this.page.url();
    }

    async snapshot(): Promise<PageSnapshot> {
        this.lastSnapshot = await this.page.evaluate(collectSnapshot, { handleAttribute: HANDLE_ATTRIBUTE });
        return this.lastSnapshot;
    }

    async fillText(handle: string, text: string): Promise<void> {
        await this.interact(() => this.locate(handle).fill(text, { timeout: this.config.timeoutMs }));
    }

    async selectOption(handle: string, value: string): Promise<void> {
        await this.interact(() => this.locate(handle).selectOption({ value }, { timeout: this.config.timeoutMs }));
    }

    async checkOption(handle: string): Promise<void> {
        await this.interact(() => this.locate(handle).check({ timeout: this.config.timeoutMs }));
    }

    async setChecked(handle: string, checked: boolean): Promise<void> {
        await this.interact(() => this.locate(handle).setChecked(checked, { timeout: this.config.timeoutMs }));
    }

    async uploadFile(handle: string, path: string): Promise<void> {
        await this.interact(() => this.locate(handle).setInputFiles(path, { timeout: this.config.timeoutMs }));
    }

    async detectCaptcha(): Promise<DetectedCaptcha | null> {
        const probe = await this.page.evaluate(probeCaptcha, { selectors: captchaSelectors() });
        return classifyCaptchaProbe(probe);
    }

    async injectCaptchaToken(kind: CaptchaKind, token: string): Promise<void> {
        const written = await this.page.evaluate(injectToken, { kind, token });
        if (!written) {
            throw new Error(`No response field found for ${kind} token`);
        }
    }

    async screenshotElement(selector: string): Promise<Buffer> {
        return this.page.locator(selector).first().screenshot({ timeout: this.config.timeoutMs });
    }

    async submit(): Promise<void> {
        const snapshot = this.lastSnapshot ?? await this.snapshot();
        const primary = selectPrimaryForm(snapshot.forms, snapshot.controls);
        const form = snapshot.forms.find(candidate => candidate.index === primary);
        const handle = form?.submitHandle ?? snapshot.looseSubmitHandle;

        if (!handle) {
            throw new ApplicationError('unexpected_error', `No submit control found on ${snapshot.url}`);
        }

        await this.locate(handle).click({ timeout: this.config.timeoutMs });
        await this.page.waitForLoadState('domcontentloaded', { timeout: this.config.timeoutMs });
        await this.settle();
    }

    async readSignals(): Promise<PageSignals> {
        const signals: PageSignals = await this.page.evaluate(collectSignals, { errorSelectors: VALIDATION_ERROR_SELECTORS });

        if (this.config.modelVerification) {
            try {
                signals.modelAssessment = await this.page.extract({
                    instruction: 'Check if the job application has been successfully submitted. Look for confirmation messages, thank you pages, application IDs, or success indicators.',
                    schema: CompletionSchema
                });
            } catch (error) {
                logger.warn('Model-based completion check failed:', error);
            }
        }

        return signals;
    }

    async close(): Promise<void> {
        await this.stagehand.close();
        logger.debug('Browser session closed');
    }

    private async interact(action: () => Promise<unknown>): Promise<void> {
        try {
            await action();
        } catch (error) {
            throw FieldWriteError.from(error);
        }
    }

    private async settle(): Promise<void> {
        if (this.config.settleMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.config.settleMs));
        }
    }
}

export class StagehandSessionFactory implements BrowserSessionFactory {
    constructor(private readonly config: BrowserConfig) {}

    async open(): Promise<BrowserSession> {
        const { browserbase } = this.config;

        const stagehand = new Stagehand({
            env: this.config.env,
            apiKey: browserbase?.apiKey,
            projectId: browserbase?.projectId,
            modelName: 'gpt-4o',
            modelClientOptions: {
                apiKey: this.config.openaiApiKey
            },
            domSettleTimeoutMs: 2000,
            localBrowserLaunchOptions: {
                headless: this.config.headless,
                viewport: this.config.viewport
            },
            verbose: 1
        });

        await stagehand.init();
        logger.info(`Stagehand session started (${this.config.env})`);
        return new StagehandSession(stagehand, this.config);
    }
}
