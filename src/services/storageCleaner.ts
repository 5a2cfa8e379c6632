import fs from 'fs';
import path from 'path';

import { errorMessage, isErrnoException, ValidationError } from '../errors';
import type { SettingsStore } from '../stores/settingsStore';
import type { SpaceUsageSnapshot } from '../types/space';
import type { ConversionTask } from '../types/task';
import { systemClock, type Clock } from '../utils/clock';
import { KeyedMutex } from '../utils/keyedMutex';
import { formatBytes, logger } from '../utils/logger';
import type { SpaceAccountant } from './spaceAccountant';
import type { TaskRegistry } from './taskRegistry';
import { isTerminal } from './taskStateMachine';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export const CLEANUP_MODES = ['scheduled', 'aggressive', 'emergency'] as const;

export type CleanupMode = (typeof CLEANUP_MODES)[number];

export type CleanupCategory = 'sources' | 'outputs' | 'temp' | 'orphans';

export const CLEANUP_SETTING_KEYS = {
  enabled: 'cleanup.enabled',
  sourceRetentionMinutes: 'cleanup.sourceRetentionMinutes',
  outputRetentionHours: 'cleanup.outputRetentionHours',
  tempRetentionHours: 'cleanup.tempRetentionHours',
  failedRetentionDays: 'cleanup.failedRetentionDays',
  orphanRetentionHours: 'cleanup.orphanRetentionHours',
  aggressiveThreshold: 'cleanup.aggressiveThreshold',
  emergencyThreshold: 'cleanup.emergencyThreshold',
  updatedAt: 'cleanup.updatedAt',
  updatedBy: 'cleanup.updatedBy'
} as const;

export interface CleanupPolicy {
  enabled: boolean;
  /** Sources of completed tasks. */
  sourceRetentionMinutes: number;
  /** Outputs of completed tasks. */
  outputRetentionHours: number;
  tempRetentionHours: number;
  /** Sources and outputs of failed or cancelled tasks. */
  failedRetentionDays: number;
  /** Files in the upload and output directories that no task refers to. */
  orphanRetentionHours: number;
  aggressiveThreshold: number;
  emergencyThreshold: number;
  updatedAt: Date;
  updatedBy: string;
}

export type CleanupPolicyUpdate = Partial<Omit<CleanupPolicy, 'updatedAt' | 'updatedBy'>>;

export const DEFAULT_CLEANUP_POLICY: Omit<CleanupPolicy, 'updatedAt' | 'updatedBy'> = {
  enabled: true,
  sourceRetentionMinutes: 5,
  outputRetentionHours: 24,
  tempRetentionHours: 2,
  failedRetentionDays: 7,
  orphanRetentionHours: 24,
  aggressiveThreshold: 90,
  emergencyThreshold: 95
};

export interface RemovedFiles {
  files: number;
  bytes: number;
}

export interface CleanupResult {
  mode: CleanupMode;
  removed: Record<CleanupCategory, RemovedFiles>;
  totalFiles: number;
  totalBytes: number;
  startedAt: Date;
  finishedAt: Date;
}

export interface CleanupStatistics {
  runs: number;
  totalFiles: number;
  totalBytes: number;
  lastRunAt?: Date;
  lastMode?: CleanupMode;
  lastEmergencyAt?: Date;
}

export interface CleanupDirectories {
  uploads: string;
  converted: string;
  temp: string;
}

export interface StorageCleanerOptions {
  registry: TaskRegistry;
  accountant: SpaceAccountant;
  settings: SettingsStore;
  directories: CleanupDirectories;
  clock?: Clock;
  intervalMs?: number;
  pressureCooldownMs?: number;
}

/** Retention windows in milliseconds for one run. */
interface Retention {
  sources: number;
  outputs: number;
  temp: number;
  failed: number;
  orphans: number;
}

interface StoredFile {
  path: string;
  size: number;
  modifiedAt: number;
}

function emptyRemoved(): Record<CleanupCategory, RemovedFiles> {
  return {
    sources: { files: 0, bytes: 0 },
    outputs: { files: 0, bytes: 0 },
    temp: { files: 0, bytes: 0 },
    orphans: { files: 0, bytes: 0 }
  };
}

function isInside(directory: string, filePath: string): boolean {
  const relative = path.relative(path.resolve(directory), path.resolve(filePath));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

async function listFiles(directory: string): Promise<StoredFile[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const nested = await Promise.all(
    entries.map(async (entry): Promise<StoredFile[]> => {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        return await listFiles(entryPath);
      }
      if (!entry.isFile()) {
        return [];
      }
      try {
        const stats = await fs.promises.stat(entryPath);
        return [{ path: entryPath, size: stats.size, modifiedAt: stats.mtimeMs }];
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return [];
        }
        throw error;
      }
    })
  );
  return nested.flat();
}

/**
 * Frees storage the engine no longer needs: sources and outputs of finished
 * tasks past their retention, stale scratch files, and files no task refers
 * to. Runs on a schedule, and early with shorter retention when the space
 * accountant reports usage above the aggressive or emergency threshold.
 * Files of pending or converting tasks are never touched.
 */
export class StorageCleaner {
  private readonly registry: TaskRegistry;
  private readonly accountant: SpaceAccountant;
  private readonly settings: SettingsStore;
  private readonly directories: CleanupDirectories;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private readonly pressureCooldownMs: number;
  private readonly runs = new KeyedMutex();
  private readonly background = new Set<Promise<unknown>>();

  private statistics: CleanupStatistics = { runs: 0, totalFiles: 0, totalBytes: 0 };
  private timer?: NodeJS.Timeout;
  private unsubscribe?: () => void;
  private lastPressureRunAt?: number;
  private lastRunError?: Error;

  constructor(options: StorageCleanerOptions) {
    this.registry = options.registry;
    this.accountant = options.accountant;
    this.settings = options.settings;
    this.directories = options.directories;
    this.clock = options.clock ?? systemClock;
    this.intervalMs = options.intervalMs ?? HOUR;
    this.pressureCooldownMs = options.pressureCooldownMs ?? 5 * MINUTE;
  }

  get lastError(): Error | undefined {
    return this.lastRunError;
  }

  getStatistics(): CleanupStatistics {
    return { ...this.statistics };
  }

  getPolicy(): CleanupPolicy {
    const keys = CLEANUP_SETTING_KEYS;
    const defaults = DEFAULT_CLEANUP_POLICY;
    return {
      enabled: this.settings.getBool(keys.enabled, defaults.enabled),
      sourceRetentionMinutes: this.settings.getDouble(keys.sourceRetentionMinutes, defaults.sourceRetentionMinutes),
      outputRetentionHours: this.settings.getDouble(keys.outputRetentionHours, defaults.outputRetentionHours),
      tempRetentionHours: this.settings.getDouble(keys.tempRetentionHours, defaults.tempRetentionHours),
      failedRetentionDays: this.settings.getDouble(keys.failedRetentionDays, defaults.failedRetentionDays),
      orphanRetentionHours: this.settings.getDouble(keys.orphanRetentionHours, defaults.orphanRetentionHours),
      aggressiveThreshold: this.settings.getDouble(keys.aggressiveThreshold, defaults.aggressiveThreshold),
      emergencyThreshold: this.settings.getDouble(keys.emergencyThreshold, defaults.emergencyThreshold),
      updatedAt: new Date(this.settings.getString(keys.updatedAt, new Date(0).toISOString())),
      updatedBy: this.settings.getString(keys.updatedBy, 'system')
    };
  }

  async setPolicy(update: CleanupPolicyUpdate, updatedBy = 'api'): Promise<CleanupPolicy> {
    const { updatedAt: _updatedAt, updatedBy: _updatedBy, ...current } = this.getPolicy();
    const next = { ...current, ...update };

    const issues: string[] = [];
    const retentions = [
      'sourceRetentionMinutes',
      'outputRetentionHours',
      'tempRetentionHours',
      'failedRetentionDays',
      'orphanRetentionHours'
    ] as const;
    for (const field of retentions) {
      if (!Number.isFinite(next[field]) || next[field] < 0) {
        issues.push(`${field} must be a non-negative number.`);
      }
    }
    if (!(next.aggressiveThreshold > 0 && next.aggressiveThreshold <= 100)) {
      issues.push('aggressiveThreshold must be between 0 and 100.');
    }
    if (!(next.emergencyThreshold > 0 && next.emergencyThreshold <= 100)) {
      issues.push('emergencyThreshold must be between 0 and 100.');
    }
    if (issues.length === 0 && next.aggressiveThreshold > next.emergencyThreshold) {
      issues.push('aggressiveThreshold must not exceed emergencyThreshold.');
    }
    if (issues.length > 0) {
      throw new ValidationError('Invalid cleanup configuration.', issues);
    }

    await this.settings.setMany({
      [CLEANUP_SETTING_KEYS.enabled]: next.enabled,
      [CLEANUP_SETTING_KEYS.sourceRetentionMinutes]: next.sourceRetentionMinutes,
      [CLEANUP_SETTING_KEYS.outputRetentionHours]: next.outputRetentionHours,
      [CLEANUP_SETTING_KEYS.tempRetentionHours]: next.tempRetentionHours,
      [CLEANUP_SETTING_KEYS.failedRetentionDays]: next.failedRetentionDays,
      [CLEANUP_SETTING_KEYS.orphanRetentionHours]: next.orphanRetentionHours,
      [CLEANUP_SETTING_KEYS.aggressiveThreshold]: next.aggressiveThreshold,
      [CLEANUP_SETTING_KEYS.emergencyThreshold]: next.emergencyThreshold,
      [CLEANUP_SETTING_KEYS.updatedAt]: this.clock.now().toISOString(),
      [CLEANUP_SETTING_KEYS.updatedBy]: updatedBy
    });
    logger.info('cleanup', `Cleanup policy updated by ${updatedBy}`);
    return this.getPolicy();
  }

  /** Picks the mode a usage snapshot calls for, if any. */
  modeFor(snapshot: SpaceUsageSnapshot): CleanupMode | undefined {
    if (!snapshot.enabled) {
      return undefined;
    }
    const policy = this.getPolicy();
    if (snapshot.usagePercentage >= policy.emergencyThreshold) {
      return 'emergency';
    }
    if (snapshot.usagePercentage >= policy.aggressiveThreshold) {
      return 'aggressive';
    }
    return undefined;
  }

  /** Runs one cleanup pass. Passes never overlap; a second call waits for the first. */
  async run(mode: CleanupMode = 'scheduled'): Promise<CleanupResult> {
    return await this.runs.run('cleanup', () => this.sweep(mode));
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.unsubscribe = this.accountant.onChange((snapshot) => this.onSpaceChanged(snapshot));
    this.timer = setInterval(() => {
      if (this.getPolicy().enabled) {
        this.track(this.run('scheduled'));
      }
    }, this.intervalMs);
    this.timer.unref();
  }

  /** Stops scheduling passes, waits for the one under way and reports the last failure, if any. */
  async stop(): Promise<Error | undefined> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await Promise.all(Array.from(this.background));
    return this.lastRunError;
  }

  private onSpaceChanged(snapshot: SpaceUsageSnapshot): void {
    if (!this.getPolicy().enabled) {
      return;
    }
    const mode = this.modeFor(snapshot);
    if (!mode) {
      return;
    }
    const now = this.clock.now().getTime();
    if (this.lastPressureRunAt !== undefined && now - this.lastPressureRunAt < this.pressureCooldownMs) {
      return;
    }
    this.lastPressureRunAt = now;
    logger.warn('cleanup', `Storage usage at ${snapshot.usagePercentage.toFixed(1)}%, starting ${mode} cleanup`);
    this.track(this.run(mode));
  }

  private track(run: Promise<unknown>): void {
    const tracked = run
      .catch((error: unknown) => {
        this.lastRunError = error instanceof Error ? error : new Error(String(error));
        logger.error('cleanup', 'Cleanup pass failed', error);
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  private retentionFor(mode: CleanupMode, policy: CleanupPolicy): Retention {
    if (mode === 'emergency') {
      return { sources: 0, outputs: 0, temp: 0, failed: 0, orphans: 0 };
    }

    const scheduled: Retention = {
      sources: policy.sourceRetentionMinutes * MINUTE,
      outputs: policy.outputRetentionHours * HOUR,
      temp: policy.tempRetentionHours * HOUR,
      failed: policy.failedRetentionDays * DAY,
      orphans: policy.orphanRetentionHours * HOUR
    };
    if (mode === 'scheduled') {
      return scheduled;
    }
    return {
      ...scheduled,
      outputs: Math.min(scheduled.outputs, 6 * HOUR),
      temp: Math.min(scheduled.temp, 30 * MINUTE),
      orphans: Math.min(scheduled.orphans, 6 * HOUR)
    };
  }

  private async sweep(mode: CleanupMode): Promise<CleanupResult> {
    const startedAt = this.clock.now();
    const now = startedAt.getTime();
    const retention = this.retentionFor(mode, this.getPolicy());
    const removed = emptyRemoved();
    const { uploads, converted, temp } = this.directories;

    const tasks = await this.registry.list();
    const active = tasks.filter((task) => !isTerminal(task.status));
    const protectedPaths = new Set(active.map((task) => path.resolve(task.source.path)));
    const referenced = new Set<string>();
    for (const task of tasks) {
      referenced.add(path.resolve(task.source.path));
      if (task.outputPath) {
        referenced.add(path.resolve(task.outputPath));
      }
    }

    const finishedBefore = (task: ConversionTask, windowMs: number) =>
      task.completedAt !== undefined && task.completedAt.getTime() <= now - windowMs;

    const remove = async (category: CleanupCategory, filePath: string | undefined, directory: string) => {
      if (!filePath || !isInside(directory, filePath) || protectedPaths.has(path.resolve(filePath))) {
        return;
      }
      const bytes = await this.removeFile(filePath);
      if (bytes !== undefined) {
        removed[category].files += 1;
        removed[category].bytes += bytes;
      }
    };

    for (const task of tasks) {
      if (task.status === 'completed') {
        if (finishedBefore(task, retention.sources)) {
          await remove('sources', task.source.path, uploads);
        }
        if (finishedBefore(task, retention.outputs)) {
          await remove('outputs', task.outputPath, converted);
        }
      } else if (isTerminal(task.status) && finishedBefore(task, retention.failed)) {
        await remove('sources', task.source.path, uploads);
        await remove('outputs', task.outputPath, converted);
      }
    }

    const activeIds = active.map((task) => task.id);
    for (const file of await listFiles(temp)) {
      const name = path.basename(file.path);
      if (activeIds.some((id) => name.startsWith(`${id}.`))) {
        continue;
      }
      if (file.modifiedAt <= now - retention.temp) {
        await remove('temp', file.path, temp);
      }
    }

    for (const directory of [uploads, converted]) {
      for (const file of await listFiles(directory)) {
        if (!referenced.has(path.resolve(file.path)) && file.modifiedAt <= now - retention.orphans) {
          await remove('orphans', file.path, directory);
        }
      }
    }

    const categories = Object.values(removed);
    const result: CleanupResult = {
      mode,
      removed,
      totalFiles: categories.reduce((total, entry) => total + entry.files, 0),
      totalBytes: categories.reduce((total, entry) => total + entry.bytes, 0),
      startedAt,
      finishedAt: this.clock.now()
    };

    this.statistics = {
      runs: this.statistics.runs + 1,
      totalFiles: this.statistics.totalFiles + result.totalFiles,
      totalBytes: this.statistics.totalBytes + result.totalBytes,
      lastRunAt: startedAt,
      lastMode: mode,
      lastEmergencyAt: mode === 'emergency' ? startedAt : this.statistics.lastEmergencyAt
    };

    if (result.totalFiles > 0) {
      logger.info('cleanup', `${mode} cleanup removed ${result.totalFiles} file(s), ${formatBytes(result.totalBytes)}`);
      await this.accountant.refresh();
    } else {
      logger.debug('cleanup', `${mode} cleanup found nothing to remove`);
    }
    return result;
  }

  /** Returns the bytes freed, or undefined when the file was gone or could not be removed. */
  private async removeFile(filePath: string): Promise<number | undefined> {
    try {
      const stats = await fs.promises.stat(filePath);
      await fs.promises.rm(filePath);
      return stats.size;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      logger.warn('cleanup', `Could not remove ${filePath}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
