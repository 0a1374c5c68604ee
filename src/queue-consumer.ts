import { RedisManager } from './utils/redis';
import { logger } from './utils/logger';
import { loadConfig, loadProfile, type AppConfig } from './config';
import { ApplicationProcessor } from './application-processor';
import { ApplicationEngine } from './application-engine';
import { JobQueueManager } from './job-queue-manager';
import { JobActionRouter, JOB_ACTION_CHANNEL } from './job-action-router';
import { HumanAssistant } from './human-assistant';
import { RedisEscalationChannel } from './escalation-channel';
import { RedisTrackingStore } from './tracking-store';
import { RedisQueueStore } from './queue-store';
import { SlackNotifier } from './notifier';
import { KeywordTailor } from './tailoring';
import { GmailConfirmationChecker } from './email-confirmation';
import { StagehandSessionFactory } from './stagehand-driver';
import { TwoCaptchaSolver } from './captcha/two-captcha-solver';
import { FileScreenshotStore } from './captcha/screenshot-store';
import { CaptchaMetrics, RedisCaptchaMetricsStore } from './captcha/captcha-metrics';
import { CaptchaRateLimiter } from './captcha/rate-limiter';

const SERVICE_NAME = 'apply-worker';

class JobApplicationService {
    private redisClient: RedisManager;
    private processor: ApplicationProcessor | null = null;
    private humanAssistant: HumanAssistant | null = null;
    private captchaMetrics: CaptchaMetrics | null = null;
    private isRunning = false;
    private heartbeatInterval?: NodeJS.Timeout;

    constructor(private readonly config: AppConfig) {
        this.redisClient = new RedisManager(config.redisUrl);
    }

    async start(): Promise<void> {
        try {
            logger.info('Starting Job Application Service...');

            const profile = await loadProfile(this.config.profilePath);
            logger.info(`Loaded applicant profile for ${profile.firstName} ${profile.lastName}`);

            await this.redisClient.connect();
            logger.info('Connected to Redis');

            const queue = new JobQueueManager({
                retryLimits: this.config.retryLimits,
                tracking: new RedisTrackingStore(this.redisClient),
                store: new RedisQueueStore(this.redisClient)
            });
            await queue.restore();
            const tailor = new KeywordTailor();
            const notifier = new SlackNotifier(this.config.slackWebhookUrl);

            const escalation = new RedisEscalationChannel(this.redisClient);
            await escalation.start();
            this.humanAssistant = new HumanAssistant(
                escalation,
                new FileScreenshotStore(this.config.captcha.screenshotDir),
                { timeoutSeconds: this.config.captcha.timeoutSeconds }
            );

            this.captchaMetrics = new CaptchaMetrics(new RedisCaptchaMetricsStore(this.redisClient));
            await this.captchaMetrics.load();

            const engine = new ApplicationEngine({
                sessions: new StagehandSessionFactory(this.config.browser),
                humanSolver: this.humanAssistant,
                solver: this.config.captcha.twoCaptchaApiKey
                    ? new TwoCaptchaSolver({
                        apiKey: this.config.captcha.twoCaptchaApiKey,
                        dailyBudget: this.config.captcha.dailyBudget
                    })
                    : undefined,
                tailor,
                emailChecker: this.config.gmail ? new GmailConfirmationChecker(this.config.gmail) : undefined,
                captchaMetrics: this.captchaMetrics,
                captchaRateLimiter: new CaptchaRateLimiter(this.config.captcha.hourlyLimit),
                config: this.config.engine
            });

            const router = new JobActionRouter({ queue, profile, tailor, notifier });
            await this.redisClient.subscribe(JOB_ACTION_CHANNEL, message => {
                router.handleMessage(message).catch(error => {
                    logger.error('Failed to handle job action:', error);
                });
            });

            this.processor = new ApplicationProcessor(this.redisClient, queue, engine, profile, {
                idlePollSeconds: this.config.idlePollSeconds,
                notifier,
                tailor
            });

            // Start heartbeat
            this.startHeartbeat();

            this.isRunning = true;

            await this.processor.startProcessing();
        } catch (error) {
            logger.error('Failed to start service:', error);
            throw error;
        }
    }

    private startHeartbeat(): void {
        this.heartbeatInterval = setInterval(async () => {
            try {
                await this.redisClient.publish(`heartbeat:${SERVICE_NAME}`, {
                    service: SERVICE_NAME,
                    timestamp: new Date().toISOString(),
                    status: 'healthy',
                    jobs: this.processor ? (await this.processor.healthCheck()).details.jobs : undefined,
                    captcha: this.captchaMetrics?.summary()
                });
            } catch (error) {
                logger.error('Failed to send heartbeat:', error);
            }
        }, 30000); // Every 30 seconds
    }

    async shutdown(): Promise<void> {
        logger.info('Shutting down Job Application Service...');

        this.isRunning = false;

        if (this.heartbeatInterval) {
            clearInterval(this.heartbeatInterval);
        }

        if (this.processor) {
            await this.processor.stopProcessing();
        }
        this.humanAssistant?.dispose();

        try {
            await this.redisClient.disconnect();
            logger.info('Redis client disconnected');
        } catch (error) {
            logger.error('Error disconnecting Redis client:', error);
        }

        logger.info('Service shutdown complete');
    }

    async healthCheck(): Promise<boolean> {
        if (!this.isRunning) return false;
        try {
            return await this.redisClient.healthCheck();
        } catch (error) {
            logger.error('Health check failed:', error);
            return false;
        }
    }
}

// Main execution
async function main() {
    const service = new JobApplicationService(loadConfig());

    // Handle graceful shutdown
    process.on('SIGINT', async () => {
        logger.info('Received SIGINT, shutting down gracefully...');
        await service.shutdown();
        process.exit(0);
    });

    process.on('SIGTERM', async () => {
        logger.info('Received SIGTERM, shutting down gracefully...');
        await service.shutdown();
        process.exit(0);
    });

    try {
        await service.start();
    } catch (error) {
        logger.error('Failed to start service:', error);
        process.exit(1);
    }
}

// Start the service
if (require.main === module) {
    main().catch((error) => {
        logger.error('Unhandled error in main:', error);
        process.exit(1);
    });
}

export { JobApplicationService };
