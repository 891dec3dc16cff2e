// src/container.ts
import 'reflect-metadata';
import { container, DependencyContainer } from 'tsyringe';

// --- Core Application Services and Configurations ---
import { ConfigService } from './config/config.service';
import { PROCESS_ENV } from './config/constants';
import { EnvironmentRecord } from './config/types';
import { LoggingService } from './services/logging.service';
import { FileSystemService } from './services/fileSystem.service';
import { TaskQueueService } from './services/taskQueue.service';

// --- Checking Pipeline ---
import { CheckApiClient } from './services/checkApiClient.service';
import { CheckInvokerService } from './services/checkInvoker.service';
import { BatchDispatcherService } from './services/batchDispatcher.service';
import { BrowserLauncherService } from './services/browserLauncher.service';
import { BatchRunService } from './services/batchRun.service';
import { AutoCheckService } from './services/autoCheck.service';
import { IBrowserLauncher, ICheckApiClient, IContentChecker } from './types/check.types';

/**
 * Registers every service in `target`. The environment is injected once here and
 * read only by ConfigService.
 */
export function registerServices(
    target: DependencyContainer = container,
    env: EnvironmentRecord = process.env,
): DependencyContainer {
    // --- 1. Configuration input ---
    target.register<EnvironmentRecord>(PROCESS_ENV, { useValue: env });

    // --- 2. Core Application Services (Singletons) ---
    target.registerSingleton(ConfigService);
    target.registerSingleton(LoggingService);
    target.registerSingleton(FileSystemService);

    // --- 3. Checking pipeline (Interfaces and Implementations) ---
    target.registerSingleton<ICheckApiClient>('ICheckApiClient', CheckApiClient);
    target.registerSingleton<IContentChecker>('IContentChecker', CheckInvokerService);
    target.registerSingleton<IBrowserLauncher>('IBrowserLauncher', BrowserLauncherService);
    target.registerSingleton(BatchDispatcherService);
    target.registerSingleton(BatchRunService);

    // --- 4. Per-session services (a fresh queue for each watch session) ---
    target.register(TaskQueueService, { useClass: TaskQueueService });
    target.register(AutoCheckService, { useClass: AutoCheckService });

    return target;
}
