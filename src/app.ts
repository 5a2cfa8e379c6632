import express, { type Request, type Response } from 'express';

import { loadConfig, type EngineConfig } from './config/env';
import { ensureStorageDirectories, resolveStorageLayout, type StorageLayout } from './config/storage';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { ConnectionManager } from './realtime/connectionManager';
import { createDownloadRouter } from './routes/download';
import { formatsRouter } from './routes/formats';
import { createCleanupRouter } from './routes/cleanup';
import { createSpaceRouter } from './routes/space';
import { createTaskRouter } from './routes/tasks';
import { createUploadRouter } from './routes/upload';
import { AdmissionController } from './services/admissionController';
import { BroadcastHub } from './services/broadcastHub';
import { ConversionRunner, type ConversionWorker } from './services/conversionRunner';
import { FfmpegWorker } from './services/ffmpegWorker';
import { SpaceAccountant, type DirectoryMeasure } from './services/spaceAccountant';
import { StorageCleaner } from './services/storageCleaner';
import { TaskEventPublisher } from './services/taskEventPublisher';
import { TaskRegistry } from './services/taskRegistry';
import { JsonFileSettingsStore, type SettingsStore } from './stores/settingsStore';
import { InMemoryTaskStore, type TaskStore } from './stores/taskStore';
import { systemClock, type Clock } from './utils/clock';
import { logger } from './utils/logger';

export interface EngineOptions {
  config?: Partial<EngineConfig>;
  storage?: StorageLayout;
  settings?: SettingsStore;
  taskStore?: TaskStore;
  worker?: ConversionWorker;
  measure?: DirectoryMeasure;
  clock?: Clock;
}

export interface EngineContext {
  config: EngineConfig;
  storage: StorageLayout;
  settings: SettingsStore;
  registry: TaskRegistry;
  accountant: SpaceAccountant;
  cleaner: StorageCleaner;
  admission: AdmissionController;
  hub: BroadcastHub;
  publisher: TaskEventPublisher;
  runner?: ConversionRunner;
  connections: ConnectionManager;
  /** Stops timers, workers and connections; resolves with the background errors seen while running. */
  dispose(): Promise<Error[]>;
}

export interface AppContext extends EngineContext {
  app: express.Express;
}

async function openSettings(storage: StorageLayout): Promise<SettingsStore> {
  const settings = new JsonFileSettingsStore(storage.settingsFile);
  await settings.load();
  return settings;
}

/** Builds and wires every engine component without any HTTP surface. */
export async function createEngine(options: EngineOptions = {}): Promise<EngineContext> {
  const config: EngineConfig = { ...loadConfig(), ...options.config };
  const storage = options.storage ?? resolveStorageLayout(config.STORAGE_ROOT);
  await ensureStorageDirectories(storage);

  const clock = options.clock ?? systemClock;
  const settings = options.settings ?? (await openSettings(storage));
  const registry = new TaskRegistry({
    store: options.taskStore ?? new InMemoryTaskStore(),
    clock,
    defaultMaxRetries: config.DEFAULT_MAX_RETRIES
  });
  const accountant = new SpaceAccountant({
    settings,
    roots: { sourceFiles: storage.uploads, outputFiles: storage.converted, tempFiles: storage.temp },
    clock,
    refreshIntervalMs: config.SPACE_REFRESH_INTERVAL_MS,
    measure: options.measure
  });
  const hub = new BroadcastHub({ queueLimit: config.HUB_QUEUE_LIMIT, clock });
  const publisher = new TaskEventPublisher(hub, clock).attach(registry, accountant);
  const admission = new AdmissionController(registry, accountant);
  const cleaner = new StorageCleaner({
    registry,
    accountant,
    settings,
    directories: { uploads: storage.uploads, converted: storage.converted, temp: storage.temp },
    clock,
    intervalMs: config.CLEANUP_INTERVAL_MS
  });
  const connections = new ConnectionManager({
    hub,
    registry,
    heartbeatIntervalMs: config.WS_HEARTBEAT_INTERVAL_MS
  });

  let runner: ConversionRunner | undefined;
  if (options.worker || config.WORKER_MODE === 'ffmpeg') {
    const worker = options.worker ?? new FfmpegWorker({ ffmpegPath: config.FFMPEG_PATH });
    if (worker instanceof FfmpegWorker) {
      logger.info('server', `Using ffmpeg executable at: ${worker.getExecutablePath()}`);
    }
    runner = new ConversionRunner({
      registry,
      worker,
      outputDirectory: storage.converted,
      tempDirectory: storage.temp,
      maxConcurrent: config.MAX_CONCURRENT_TASKS
    });
  } else {
    logger.info('server', 'Waiting for external workers to report through the task callbacks');
  }

  logger.info('server', `Using storage directory: ${storage.root}`);
  cleaner.start();
  await accountant.refresh();
  accountant.start();

  let disposed = false;
  async function dispose(): Promise<Error[]> {
    if (disposed) {
      return [];
    }
    disposed = true;

    const errors: Error[] = [];
    try {
      await connections.close();
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
    if (runner) {
      errors.push(...(await runner.stop()));
    }
    publisher.dispose();
    const cleanupError = await cleaner.stop();
    if (cleanupError) {
      errors.push(cleanupError);
    }
    await admission.dispose();
    const refreshError = await accountant.stop();
    if (refreshError) {
      errors.push(refreshError);
    }

    for (const error of errors) {
      logger.error('server', 'Background error reported during shutdown', error);
    }
    return errors;
  }

  return {
    config,
    storage,
    settings,
    registry,
    accountant,
    cleaner,
    admission,
    hub,
    publisher,
    runner,
    connections,
    dispose
  };
}

export async function createApp(options: EngineOptions = {}): Promise<AppContext> {
  const engine = await createEngine(options);
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/upload', createUploadRouter(engine.storage));
  app.use(
    '/tasks',
    createTaskRouter({
      registry: engine.registry,
      admission: engine.admission,
      runner: engine.runner,
      storage: engine.storage
    })
  );
  app.use('/space', createSpaceRouter(engine.accountant));
  app.use('/cleanup', createCleanupRouter(engine.cleaner));
  app.use('/download', createDownloadRouter(engine.registry));
  app.use('/formats', formatsRouter);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', connections: engine.connections.count() });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { ...engine, app };
}
