/**
 * Gmail lookup for application confirmation emails.
 *
 * Used only when on-page verification is ambiguous: a confirmation that
 * arrived after the attempt started and names the company counts as proof.
 */

import { z } from 'zod';
import { logger } from './utils/logger';
import type { GmailConfig } from './config';
import type { Job } from './types/jobs';
import type { EmailConfirmation, EmailConfirmationChecker } from './types/services';

const GMAIL_API = 'https://gmail.googleapis.com/gmail/v1/users/me';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';

const CONFIRMATION_SUBJECT = /thank you|application (received|submitted|confirmation)|we('ve| have) received|confirm/i;

const TokenResponseSchema = z.object({
    access_token: z.string(),
    expires_in: z.number()
});

const MessageListSchema = z.object({
    messages: z.array(z.object({ id: z.string() })).optional()
});

const MessageSchema = z.object({
    id: z.string(),
    internalDate: z.string(),
    payload: z.object({
        headers: z.array(z.object({ name: z.string(), value: z.string() })).default([])
    })
});

export interface EmailSummary {
    id: string;
    from: string;
    subject: string;
    receivedAt: Date;
}

function companyTokens(company: string): string[] {
    return company
        .toLowerCase()
        .replace(/\b(inc|llc|ltd|corp|corporation|co)\b\.?/g, ' ')
        .split(/[^a-z0-9]+/)
        .filter(token => token.length > 2);
}

/**
 * Picks the first email that arrived after `since`, looks like a confirmation
 * and names the company in its sender or subject.
 */
export function matchConfirmation(emails: EmailSummary[], job: Job, since: Date): EmailConfirmation | null {
    const tokens = companyTokens(job.company);
    if (tokens.length === 0) return null;

    for (const email of emails) {
        if (email.receivedAt.getTime() < since.getTime()) continue;
        if (!CONFIRMATION_SUBJECT.test(email.subject)) continue;

        const haystack = `${email.from} ${email.subject}`.toLowerCase();
        if (!tokens.some(token => haystack.includes(token))) continue;

        return {
            messageId: email.id,
            from: email.from,
            subject: email.subject,
            receivedAt: email.receivedAt.toISOString()
        };
    }

    return null;
}

export class GmailConfirmationChecker implements EmailConfirmationChecker {
    private accessToken: { value: string; expiresAt: number } | null = null;

    constructor(
        private readonly config: GmailConfig,
        private readonly fetchImpl: typeof fetch = fetch
    ) {}

    async findConfirmation(job: Job, since: Date): Promise<EmailConfirmation | null> {
        const token = await this.getAccessToken();
        const windowStart = new Date(Math.max(since.getTime(), Date.now() - this.config.lookbackMinutes * 60_000));
        const after = Math.floor(windowStart.getTime() / 1000);
        const query = encodeURIComponent(`subject:(application OR confirmation OR received OR thank) after:${after}`);

        const list = MessageListSchema.parse(
            await this.get(`${GMAIL_API}/messages?q=${query}&maxResults=10`, token)
        );
        if (!list.messages || list.messages.length === 0) {
            logger.debug(`No confirmation emails since ${windowStart.toISOString()}`);
            return null;
        }

        const emails: EmailSummary[] = [];
        for (const { id } of list.messages) {
            const message = MessageSchema.parse(
                await this.get(`${GMAIL_API}/messages/${id}?format=metadata&metadataHeaders=From&metadataHeaders=Subject`, token)
            );
            const header = (name: string): string =>
                message.payload.headers.find(entry => entry.name.toLowerCase() === name)?.value ?? '';
            emails.push({
                id: message.id,
                from: header('from'),
                subject: header('subject'),
                receivedAt: new Date(Number(message.internalDate))
            });
        }

        const match = matchConfirmation(emails, job, windowStart);
        if (match) {
            logger.info(`Found confirmation email "${match.subject}" for ${job.company}`);
        }
        return match;
    }

    private async getAccessToken(): Promise<string> {
        if (this.accessToken && this.accessToken.expiresAt > Date.now()) {
            return this.accessToken.value;
        }

        const res = await this.fetchImpl(TOKEN_URL, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({
                refresh_token: this.config.refreshToken,
                client_id: this.config.clientId,
                client_secret: this.config.clientSecret,
                grant_type: 'refresh_token'
            }).toString()
        });

        if (!res.ok) {
            const err = await res.text();
            throw new Error(`Token refresh failed: ${res.status} ${err}`);
        }

        const data = TokenResponseSchema.parse(await res.json());
        // renew a minute early
        this.accessToken = { value: data.access_token, expiresAt: Date.now() + (data.expires_in - 60) * 1000 };
        return data.access_token;
    }

    private async get(url: string, accessToken: string): Promise<unknown> {
        const res = await this.fetchImpl(url, { headers: { Authorization: `Bearer ${accessToken}` } });
        if (!res.ok) {
            throw new Error(`Gmail request failed: ${res.status}`);
        }
        return res.json();
    }
}
