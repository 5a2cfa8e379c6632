import fs from 'fs';
import path from 'path';

import { isErrnoException, ValidationError } from '../errors';
import type { SettingsStore } from '../stores/settingsStore';
import type {
  SpaceBreakdown,
  SpaceBudget,
  SpaceCategory,
  SpaceCheckResult,
  SpaceRequirement,
  SpaceUsageSnapshot
} from '../types/space';
import { systemClock, type Clock } from '../utils/clock';
import { formatBytes, logger } from '../utils/logger';

export const GIB = 1024 * 1024 * 1024;
export const DEFAULT_MAX_TOTAL_SPACE = 100 * GIB;
export const DEFAULT_RESERVED_SPACE = 5 * GIB;

const WARNING_PERCENTAGE = 80;
const CRITICAL_PERCENTAGE = 90;

export const SPACE_SETTING_KEYS = {
  maxTotal: 'space.maxTotal',
  reserved: 'space.reserved',
  enabled: 'space.enabled',
  updatedAt: 'space.updatedAt',
  updatedBy: 'space.updatedBy'
} as const;

export type StorageRoots = Record<SpaceCategory, string>;

export type DirectoryMeasure = (directory: string) => Promise<number>;

export type SpaceListener = (snapshot: SpaceUsageSnapshot) => void;

export interface SpaceBudgetUpdate {
  maxTotal: number;
  reserved: number;
  enabled: boolean;
}

export interface SpaceAccountantOptions {
  settings: SettingsStore;
  roots: StorageRoots;
  clock?: Clock;
  refreshIntervalMs?: number;
  measure?: DirectoryMeasure;
}

export interface ReservationResult {
  accepted: boolean;
  check: SpaceCheckResult;
}

const CATEGORIES: SpaceCategory[] = ['sourceFiles', 'outputFiles', 'tempFiles'];

function emptyBreakdown(): SpaceBreakdown {
  return { sourceFiles: 0, outputFiles: 0, tempFiles: 0 };
}

/** Sums the size of every regular file below `directory`. A missing directory counts as empty. */
export async function measureDirectory(directory: string): Promise<number> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }

  const sizes = await Promise.all(
    entries.map(async (entry) => {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        return await measureDirectory(entryPath);
      }
      if (entry.isFile()) {
        // Files can vanish between the listing and the stat.
        const stats = await fs.promises.stat(entryPath).catch((error: unknown) => {
          if (isErrnoException(error) && error.code === 'ENOENT') {
            return undefined;
          }
          throw error;
        });
        return stats?.size ?? 0;
      }
      return 0;
    })
  );

  return sizes.reduce((total, size) => total + size, 0);
}

/**
 * Tracks storage usage against the configured budget and holds the ledger of
 * bytes promised to admitted tasks. Usage is only ever replaced by a full walk
 * of the storage roots, never patched.
 */
export class SpaceAccountant {
  private readonly settings: SettingsStore;
  private readonly roots: StorageRoots;
  private readonly clock: Clock;
  private readonly refreshIntervalMs: number;
  private readonly measure: DirectoryMeasure;
  private readonly reservations = new Map<string, number>();
  private readonly listeners = new Set<SpaceListener>();

  private usage: SpaceBreakdown = emptyBreakdown();
  private calculatedAt: Date;
  private stale = true;
  private inFlight?: Promise<SpaceUsageSnapshot>;
  private timer?: NodeJS.Timeout;
  private lastRefreshError?: Error;

  constructor(options: SpaceAccountantOptions) {
    this.settings = options.settings;
    this.roots = options.roots;
    this.clock = options.clock ?? systemClock;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 30_000;
    this.measure = options.measure ?? measureDirectory;
    this.calculatedAt = this.clock.now();
  }

  get lastError(): Error | undefined {
    return this.lastRefreshError;
  }

  onChange(listener: SpaceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getBudget(): SpaceBudget {
    return {
      maxTotalSpace: this.settings.getInt(SPACE_SETTING_KEYS.maxTotal, DEFAULT_MAX_TOTAL_SPACE),
      reservedSpace: this.settings.getInt(SPACE_SETTING_KEYS.reserved, DEFAULT_RESERVED_SPACE),
      enabled: this.settings.getBool(SPACE_SETTING_KEYS.enabled, true),
      updatedAt: new Date(this.settings.getString(SPACE_SETTING_KEYS.updatedAt, new Date(0).toISOString())),
      updatedBy: this.settings.getString(SPACE_SETTING_KEYS.updatedBy, 'system')
    };
  }

  async setBudget(update: SpaceBudgetUpdate, updatedBy = 'api'): Promise<SpaceBudget> {
    const issues: string[] = [];
    if (!Number.isSafeInteger(update.maxTotal) || update.maxTotal <= 0) {
      issues.push('maxTotal must be a positive integer number of bytes.');
    }
    if (!Number.isSafeInteger(update.reserved) || update.reserved < 0) {
      issues.push('reserved must be a non-negative integer number of bytes.');
    }
    if (issues.length === 0 && update.maxTotal <= update.reserved) {
      issues.push('maxTotal must be greater than reserved.');
    }
    if (issues.length > 0) {
      throw new ValidationError('Invalid space configuration.', issues);
    }

    await this.settings.setMany({
      [SPACE_SETTING_KEYS.maxTotal]: update.maxTotal,
      [SPACE_SETTING_KEYS.reserved]: update.reserved,
      [SPACE_SETTING_KEYS.enabled]: update.enabled,
      [SPACE_SETTING_KEYS.updatedAt]: this.clock.now().toISOString(),
      [SPACE_SETTING_KEYS.updatedBy]: updatedBy
    });

    logger.info(
      'space',
      `Budget updated: max=${formatBytes(update.maxTotal)} reserved=${formatBytes(update.reserved)} enabled=${update.enabled}`
    );
    this.notify(this.getSnapshot());
    return this.getBudget();
  }

  getSnapshot(): SpaceUsageSnapshot {
    const budget = this.getBudget();
    const usedSpace = CATEGORIES.reduce((total, category) => total + this.usage[category], 0);
    const pendingReservations = this.pendingReservations();
    const available = budget.maxTotalSpace - budget.reservedSpace - usedSpace - pendingReservations;
    const usagePercentage = budget.maxTotalSpace > 0 ? (usedSpace / budget.maxTotalSpace) * 100 : 0;

    return {
      totalSpace: budget.maxTotalSpace,
      usedSpace,
      availableSpace: Math.max(0, available),
      reservedSpace: budget.reservedSpace,
      pendingReservations,
      usagePercentage: Math.round(usagePercentage * 100) / 100,
      hasSufficientSpace: !budget.enabled || available >= 0,
      enabled: budget.enabled,
      breakdown: { ...this.usage },
      calculatedAt: new Date(this.calculatedAt.getTime()),
      stale: this.stale
    };
  }

  /** Walks every storage root. Concurrent callers share one walk. */
  refresh(): Promise<SpaceUsageSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.recompute().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  checkSpace(requiredBytes: number, requirement?: SpaceRequirement): SpaceCheckResult {
    return this.evaluate(requiredBytes, requirement, this.pendingReservations());
  }

  /**
   * Compare-and-reserve. Nothing awaits between the check and the ledger
   * write, so two admissions can never both claim the same bytes.
   */
  reserve(key: string, bytes: number, requirement?: SpaceRequirement): ReservationResult {
    const check = this.evaluate(bytes, requirement, this.pendingReservations(key));
    if (!check.hasEnoughSpace) {
      return { accepted: false, check };
    }

    this.reservations.set(key, bytes);
    logger.debug('space', `Reserved ${formatBytes(bytes)} for ${key}`);
    return { accepted: true, check };
  }

  release(key: string): number {
    const bytes = this.reservations.get(key) ?? 0;
    if (this.reservations.delete(key)) {
      logger.debug('space', `Released ${formatBytes(bytes)} held by ${key}`);
    }
    return bytes;
  }

  transfer(fromKey: string, toKey: string): void {
    const bytes = this.reservations.get(fromKey);
    if (bytes === undefined) {
      return;
    }
    this.reservations.delete(fromKey);
    this.reservations.set(toKey, bytes);
  }

  reservationFor(key: string): number | undefined {
    return this.reservations.get(key);
  }

  pendingReservations(excludeKey?: string): number {
    let total = 0;
    for (const [key, bytes] of this.reservations) {
      if (key !== excludeKey) {
        total += bytes;
      }
    }
    return total;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    void this.refresh();
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.refreshIntervalMs);
    this.timer.unref();
  }

  /** Stops the refresh loop and reports the last refresh failure, if any. */
  async stop(): Promise<Error | undefined> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    return this.lastRefreshError;
  }

  private async recompute(): Promise<SpaceUsageSnapshot> {
    try {
      const sizes = await Promise.all(CATEGORIES.map((category) => this.measure(this.roots[category])));
      const next = emptyBreakdown();
      CATEGORIES.forEach((category, index) => {
        next[category] = sizes[index];
      });

      this.usage = next;
      this.calculatedAt = this.clock.now();
      this.stale = false;
      this.lastRefreshError = undefined;
    } catch (error) {
      this.stale = true;
      this.lastRefreshError = error instanceof Error ? error : new Error(String(error));
      logger.error('space', 'Space usage refresh failed, keeping previous snapshot', error);
    }

    const snapshot = this.getSnapshot();
    this.reportPressure(snapshot);
    this.notify(snapshot);
    return snapshot;
  }

  private evaluate(requiredBytes: number, requirement: SpaceRequirement | undefined, pending: number): SpaceCheckResult {
    if (!Number.isSafeInteger(requiredBytes) || requiredBytes < 0) {
      throw new ValidationError('requiredBytes must be a non-negative integer.');
    }

    const budget = this.getBudget();
    const usedSpace = CATEGORIES.reduce((total, category) => total + this.usage[category], 0);
    const breakdown = {
      originalFileSpace: requirement?.originalFileSize ?? requiredBytes,
      outputFileSpace: requirement?.estimatedOutputSize ?? 0,
      tempFileSpace: requirement?.tempFileSize ?? 0,
      reservedSpace: budget.reservedSpace,
      pendingReservations: pending,
      currentUsedSpace: usedSpace,
      totalConfiguredSpace: budget.maxTotalSpace
    };

    if (!budget.enabled) {
      return {
        hasEnoughSpace: true,
        requiredSpace: requiredBytes,
        availableSpace: Number.MAX_SAFE_INTEGER,
        message: 'Space limit disabled.',
        breakdown
      };
    }

    const available = budget.maxTotalSpace - budget.reservedSpace - usedSpace - pending;
    const hasEnoughSpace = available >= requiredBytes;

    return {
      hasEnoughSpace,
      requiredSpace: requiredBytes,
      availableSpace: Math.max(0, available),
      message: hasEnoughSpace
        ? 'Sufficient space available.'
        : `Insufficient space: ${formatBytes(requiredBytes)} required, ${formatBytes(Math.max(0, available))} available.`,
      breakdown
    };
  }

  private reportPressure(snapshot: SpaceUsageSnapshot): void {
    if (!snapshot.enabled) {
      return;
    }
    if (snapshot.usagePercentage > CRITICAL_PERCENTAGE) {
      logger.error('space', `Disk space critically low: ${snapshot.usagePercentage.toFixed(1)}% used`);
    } else if (snapshot.usagePercentage > WARNING_PERCENTAGE) {
      logger.warn('space', `Disk space running low: ${snapshot.usagePercentage.toFixed(1)}% used`);
    }
  }

  private notify(snapshot: SpaceUsageSnapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('space', 'Space listener failed', error);
      }
    }
  }
}
