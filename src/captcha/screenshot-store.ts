import { createHash } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';

export interface ScreenshotStore {
    save(image: Buffer, at?: Date): Promise<string>;
}

/**
 * Writes CAPTCHA captures as `captcha-<timestamp>-<sha256 prefix>.png`.
 * The returned reference is the file path.
 */
export class FileScreenshotStore implements ScreenshotStore {
    constructor(private readonly directory: string) {}

    async save(image: Buffer, at: Date = new Date()): Promise<string> {
        const digest = createHash('sha256').update(image).digest('hex').slice(0, 12);
        const timestamp = at.toISOString().replace(/[-:]/g, '').replace(/\..+$/, '');
        const file = path.join(this.directory, `captcha-${timestamp}-${digest}.png`);

        await mkdir(this.directory, { recursive: true });
        await writeFile(file, image);

        logger.info(`CAPTCHA screenshot saved to ${file}`);
        return file;
    }
}
