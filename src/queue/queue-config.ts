import { Job, Queue, Worker, QueueEvents } from 'bullmq';
import { Redis } from 'ioredis';
import { getSettings } from '../config/settings';
import { logger } from '../config/logger';
import type { IngestionJobData } from '../types/schemas';
import type { IngestionResult } from '../services/ingestion.service';

export const INGESTION_QUEUE = 'ingestion';

export type IngestionProcessor = (job: Job<IngestionJobData, IngestionResult>) => Promise<IngestionResult>;

/**
 * Queue Configuration
 *
 * BullMQ setup for background document ingestion. Jobs for unrelated
 * documents run in parallel up to the configured concurrency; versions of
 * one lineage still serialise on the chunk store's lineage lock.
 */
export class QueueConfig {
    private redis: Redis;
    private ingestionQueue: Queue<IngestionJobData, IngestionResult>;
    private ingestionWorker: Worker<IngestionJobData, IngestionResult> | null = null;
    private queueEvents: QueueEvents;

    constructor() {
        const settings = getSettings();

        // Redis connection
        this.redis = new Redis(settings.redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.ingestionQueue = new Queue<IngestionJobData, IngestionResult>(INGESTION_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 100,
                removeOnFail: 50,
                attempts: settings.ingestMaxAttempts,
                backoff: {
                    type: 'exponential',
                    delay: settings.ingestBackoffMs,
                },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(INGESTION_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    getIngestionQueue(): Queue<IngestionJobData, IngestionResult> {
        return this.ingestionQueue;
    }

    async enqueue(data: IngestionJobData): Promise<string | undefined> {
        const job = await this.ingestionQueue.add('ingest-file', data);
        logger.info({ jobId: job.id, filePath: data.filePath }, 'Ingestion job queued');
        return job.id;
    }

    /**
     * Start the ingestion worker
     */
    startWorker(processor: IngestionProcessor): void {
        this.ingestionWorker = new Worker<IngestionJobData, IngestionResult>(INGESTION_QUEUE, processor, {
            connection: this.redis,
            concurrency: getSettings().ingestConcurrency,
        });

        this.ingestionWorker.on('completed', (job, result) => {
            logger.info({
                jobId: job.id,
                docId: result.docId,
                status: result.status,
                duration: job.processedOn !== undefined ? Date.now() - job.processedOn : undefined
            }, 'Ingestion job completed');
        });

        this.ingestionWorker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                filePath: job?.data.filePath,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Ingestion job failed');
        });

        this.ingestionWorker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Ingestion job stalled');
        });
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners(): void {
        this.queueEvents.on('waiting', ({ jobId }) => {
            logger.debug({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.warn({ jobId, failedReason }, 'Job attempt failed');
        });
    }

    /**
     * Close all connections
     */
    async close(): Promise<void> {
        await this.ingestionWorker?.close();
        await this.ingestionQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
