import { Job } from 'bullmq';
import { logger, ILogger } from '../config/logger';
import { getIngestionService, IngestionResult, IngestionService } from '../services/ingestion.service';
import { ingestionJobSchema, IngestionJobData } from '../types/schemas';

// The fields of a BullMQ job the worker reads
export type IngestionJob = Pick<Job<IngestionJobData, IngestionResult>, 'id' | 'data' | 'attemptsMade'>;

export interface IIngestionWorker {
    processIngestion(job: IngestionJob): Promise<IngestionResult>;
}

/**
 * Ingestion Worker with Dependency Injection
 *
 * Validates queued job payloads and hands them to the ingestion service.
 * Errors propagate so BullMQ applies the configured retry policy.
 */
export class IngestionWorker implements IIngestionWorker {
    constructor(
        private ingestion: Pick<IngestionService, 'ingestFile'>,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): IngestionWorker {
        return new IngestionWorker(getIngestionService(), logger);
    }

    async processIngestion(job: IngestionJob): Promise<IngestionResult> {
        const { filePath, metadata } = ingestionJobSchema.parse(job.data);

        this.logger.info({
            workerJobId: job.id,
            filePath,
            title: metadata.title,
            attempt: job.attemptsMade + 1
        }, 'Starting ingestion job');

        return await this.ingestion.ingestFile(filePath, metadata);
    }
}

// Export worker function for BullMQ
export async function ingestionProcessor(job: Job<IngestionJobData, IngestionResult>): Promise<IngestionResult> {
    const worker = IngestionWorker.create();
    return await worker.processIngestion(job);
}
