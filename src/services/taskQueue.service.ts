// src/services/taskQueue.service.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import PQueue from 'p-queue';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Bounded queue for fire-and-forget tasks such as file watcher events.
 * A new queue per resolution, so each watch session owns its own.
 */
@injectable()
export class TaskQueueService {
    private readonly logger: Logger;
    private readonly queue: PQueue;
    public readonly concurrency: number;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.logger = this.loggingService.getLogger({ service: 'TaskQueueService' });
        this.concurrency = this.configService.checkConfiguration.concurrency;
        this.queue = new PQueue({ concurrency: this.concurrency });

        this.logger.debug({ event: 'task_queue_init', concurrency: this.concurrency },
            `Task queue initialized with concurrency: ${this.concurrency}.`);

        this.queue.on('idle', () => {
            this.logger.debug({ event: 'task_queue_idle' }, 'Task queue is now idle.');
        });
    }

    /**
     * Adds an asynchronous task to the queue. The task runs when concurrency allows.
     *
     * @param task - The work to run.
     * @param description - Short label used in the queue's log records.
     * @returns A Promise that resolves when the task has finished. It never rejects:
     *          a failing task is logged here, so callers can fire and forget.
     */
    add(task: () => Promise<void>, description: string): Promise<void> {
        this.logger.debug({ event: 'task_added', description, size: this.queue.size, pending: this.queue.pending }, `Queued task: ${description}.`);
        return this.queue.add(task).catch((error: unknown) => {
            const { message, stack } = getErrorMessageAndStack(error);
            this.logger.error({ event: 'task_failed', description, err: { message, stack } }, `Queued task failed: ${description}: "${message}".`);
        });
    }

    /** Drops tasks that have not started yet. */
    clear(): void {
        this.queue.clear();
    }

    /**
     * @returns A Promise that resolves once the queue is empty and no task is running.
     */
    onIdle(): Promise<void> {
        return this.queue.onIdle();
    }

    /** Number of tasks waiting to start. */
    get size(): number {
        return this.queue.size;
    }

    /** Number of tasks currently running. */
    get pending(): number {
        return this.queue.pending;
    }
}
