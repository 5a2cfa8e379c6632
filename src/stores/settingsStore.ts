import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { isErrnoException } from '../errors';
import { KeyedMutex } from '../utils/keyedMutex';
import { logger } from '../utils/logger';

const settingsFileSchema = z.record(z.string());

/**
 * Flat key/value settings with typed accessors. Values are stored as strings;
 * a missing or unparsable value yields the supplied default.
 */
export abstract class SettingsStore {
  protected readonly values = new Map<string, string>();

  getString(key: string, defaultValue: string): string {
    return this.values.get(key) ?? defaultValue;
  }

  getBool(key: string, defaultValue: boolean): boolean {
    const raw = this.values.get(key)?.trim().toLowerCase();
    if (raw === 'true' || raw === '1') {
      return true;
    }
    if (raw === 'false' || raw === '0') {
      return false;
    }
    return defaultValue;
  }

  getInt(key: string, defaultValue: number): number {
    const raw = this.values.get(key)?.trim();
    if (!raw || !/^-?\d+$/.test(raw)) {
      return defaultValue;
    }
    const parsed = Number(raw);
    return Number.isSafeInteger(parsed) ? parsed : defaultValue;
  }

  getDouble(key: string, defaultValue: number): number {
    const raw = this.values.get(key)?.trim();
    if (!raw) {
      return defaultValue;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  async set(key: string, value: string | number | boolean): Promise<void> {
    await this.setMany({ [key]: value });
  }

  async setMany(updates: Record<string, string | number | boolean>): Promise<void> {
    for (const [key, value] of Object.entries(updates)) {
      this.values.set(key, String(value));
    }
    await this.persist();
  }

  protected abstract persist(): Promise<void>;
}

export class InMemorySettingsStore extends SettingsStore {
  constructor(initial: Record<string, string> = {}) {
    super();
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  protected async persist(): Promise<void> {}
}

export class JsonFileSettingsStore extends SettingsStore {
  private readonly writes = new KeyedMutex();

  constructor(private readonly filePath: string) {
    super();
  }

  async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.info('settings', `No settings file at ${this.filePath}, using defaults`);
        return;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      raw = undefined;
    }

    const parsed = settingsFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('settings', `Ignoring malformed settings file ${this.filePath}`);
      return;
    }

    this.values.clear();
    for (const [key, value] of Object.entries(parsed.data)) {
      this.values.set(key, value);
    }
  }

  /** Writes run one at a time; each one saves the values current when it starts. */
  protected async persist(): Promise<void> {
    await this.writes.run(this.filePath, async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await fs.promises.writeFile(tempPath, JSON.stringify(this.entries(), null, 2), 'utf8');
      await fs.promises.rename(tempPath, this.filePath);
    });
  }
}
