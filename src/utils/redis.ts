import { createClient } from 'redis';
import { logger } from './logger';
import { TaskType, type QueueTask, type TaskResult } from '../types/jobs';

type RedisClient = ReturnType<typeof createClient>;

export type MessageHandler = (message: string) => void;

export class RedisManager {
    private client: RedisClient;
    private subscriber: RedisClient | null = null;
    // blocking pops get their own connection so other commands don't queue behind them
    private blocker: RedisClient | null = null;
    private isConnected: boolean = false;

    constructor(redisUrl: string = process.env.REDIS_URL || 'redis://localhost:6379') {
        this.client = createClient({
            url: redisUrl,
            socket: {
                reconnectStrategy: (retries) => Math.min(retries * 50, 500)
            }
        });

        this.client.on('error', (err) => {
            logger.error('Redis Client Error', err);
            this.isConnected = false;
        });

        this.client.on('connect', () => {
            logger.info('Redis Client Connected');
            this.isConnected = true;
        });

        this.client.on('ready', () => {
            logger.info('Redis Client Ready');
            this.isConnected = true;
        });

        this.client.on('end', () => {
            logger.info('Redis Client Connection Ended');
            this.isConnected = false;
        });
    }

    async connect(): Promise<void> {
        if (!this.isConnected) {
            await this.client.connect();
        }
    }

    async disconnect(): Promise<void> {
        if (this.subscriber) {
            await this.subscriber.disconnect();
            this.subscriber = null;
        }
        if (this.blocker) {
            await this.blocker.disconnect();
            this.blocker = null;
        }
        if (this.isConnected) {
            await this.client.disconnect();
        }
    }

    private getQueueKey(taskType: TaskType): string {
        return `tasks:${taskType}`;
    }

    private async openDuplicate(role: string): Promise<RedisClient> {
        const connection = this.client.duplicate();
        connection.on('error', (err) => {
            logger.error(`Redis ${role} Error`, err);
        });
        await connection.connect();
        return connection;
    }

    private async blockingClient(): Promise<RedisClient> {
        if (!this.blocker) {
            this.blocker = await this.openDuplicate('Blocking Client');
        }
        return this.blocker;
    }

    async consumeTask<T>(taskType: TaskType, timeout: number = 0): Promise<QueueTask<T> | null> {
        try {
            const queueKey = this.getQueueKey(taskType);
            const result = timeout > 0
                ? await (await this.blockingClient()).blPop(queueKey, timeout)
                : await this.client.lPop(queueKey);

            if (!result) {
                return null;
            }

            const taskData = typeof result === 'string' ? result : result.element;
            const task = JSON.parse(taskData) as QueueTask<T>;

            logger.info(`Consumed task ${task.id} of type ${taskType}`);
            return task;
        } catch (error) {
            logger.error(`Error consuming task from ${taskType}:`, error);
            return null;
        }
    }

    async publishTask<T>(taskType: TaskType, payload: T, priority: number = 0): Promise<string> {
        try {
            const taskId = `${taskType}_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
            const task: QueueTask<T> = {
                id: taskId,
                type: taskType,
                payload,
                retries: 0,
                created_at: new Date().toISOString(),
                priority
            };

            const queueKey = this.getQueueKey(taskType);
            await this.client.rPush(queueKey, JSON.stringify(task));

            logger.info(`Published task ${taskId} to ${taskType}`);
            return taskId;
        } catch (error) {
            logger.error(`Error publishing task to ${taskType}:`, error);
            throw error;
        }
    }

    async publishResult<T>(result: TaskResult<T>): Promise<void> {
        try {
            const resultKey = `task_results:${result.task_id}`;
            await this.client.setEx(resultKey, 3600, JSON.stringify(result)); // Expire after 1 hour
            logger.info(`Published result for task ${result.task_id}`);
        } catch (error) {
            logger.error(`Error publishing result for task ${result.task_id}:`, error);
            throw error;
        }
    }

    async publish<T>(channel: string, data: T): Promise<void> {
        try {
            // Heartbeats are also stored with an expiry so health checks can read them
            if (channel.startsWith('heartbeat:')) {
                await this.client.setEx(channel, 120, JSON.stringify(data));
            }

            await this.client.publish(channel, JSON.stringify(data));

            logger.debug(`Published to channel ${channel}`);
        } catch (error) {
            logger.error(`Error publishing to channel ${channel}:`, error);
            throw error;
        }
    }

    async subscribe(channel: string, handler: MessageHandler): Promise<void> {
        if (!this.subscriber) {
            this.subscriber = await this.openDuplicate('Subscriber');
        }

        await this.subscriber.subscribe(channel, handler);
        logger.info(`Subscribed to channel ${channel}`);
    }

    async append<T>(key: string, entry: T): Promise<void> {
        try {
            await this.client.rPush(key, JSON.stringify(entry));
        } catch (error) {
            logger.error(`Error appending to ${key}:`, error);
            throw error;
        }
    }

    async getValue(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async setValue(key: string, value: string): Promise<void> {
        try {
            await this.client.set(key, value);
        } catch (error) {
            logger.error(`Error writing ${key}:`, error);
            throw error;
        }
    }

    async hashSet<T>(key: string, field: string, value: T): Promise<void> {
        try {
            await this.client.hSet(key, field, JSON.stringify(value));
        } catch (error) {
            logger.error(`Error writing ${field} to ${key}:`, error);
            throw error;
        }
    }

    async hashGetAll(key: string): Promise<Record<string, string>> {
        const raw = await this.client.hGetAll(key);
        return Object.fromEntries(Object.entries(raw).map(([field, value]) => [field, value.toString()]));
    }

    async getQueueLength(taskType: TaskType): Promise<number> {
        try {
            const queueKey = this.getQueueKey(taskType);
            return await this.client.lLen(queueKey);
        } catch (error) {
            logger.error(`Error getting queue length for ${taskType}:`, error);
            return 0;
        }
    }

    async healthCheck(): Promise<boolean> {
        try {
            const pong = await this.client.ping();
            return pong === 'PONG';
        } catch (error) {
            logger.error('Redis health check failed:', error);
            return false;
        }
    }

    async getQueueStats(): Promise<Record<string, number>> {
        const stats: Record<string, number> = {};

        for (const taskType of Object.values(TaskType)) {
            stats[taskType] = await this.getQueueLength(taskType);
        }

        return stats;
    }
}
