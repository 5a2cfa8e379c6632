import fs from 'fs';
import path from 'path';

import { ValidationError } from '../src/errors';
import { measureDirectory, SPACE_SETTING_KEYS, SpaceAccountant, type DirectoryMeasure } from '../src/services/spaceAccountant';
import { CLEANUP_SETTING_KEYS, StorageCleaner } from '../src/services/storageCleaner';
import { TaskRegistry } from '../src/services/taskRegistry';
import { InMemorySettingsStore } from '../src/stores/settingsStore';
import { InMemoryTaskStore } from '../src/stores/taskStore';
import { makeTempDir, ManualClock, removeDir, sequentialIds, waitFor } from './helpers';

const START = new Date('2024-05-01T08:00:00.000Z');
const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

async function writeFile(filePath: string, content: string, modifiedAt?: Date): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content);
  if (modifiedAt) {
    await fs.promises.utimes(filePath, modifiedAt, modifiedAt);
  }
  return filePath;
}

function createCleaner(root: string, options: { measure?: DirectoryMeasure; maxTotal?: number; settings?: Record<string, string> } = {}) {
  const clock = new ManualClock();
  const directories = {
    uploads: path.join(root, 'uploads'),
    converted: path.join(root, 'converted'),
    temp: path.join(root, 'temp')
  };
  const settings = new InMemorySettingsStore({
    [SPACE_SETTING_KEYS.maxTotal]: String(options.maxTotal ?? 1_000_000),
    [SPACE_SETTING_KEYS.reserved]: '0',
    ...options.settings
  });
  const registry = new TaskRegistry({ store: new InMemoryTaskStore(), clock, ids: sequentialIds('task') });
  const accountant = new SpaceAccountant({
    settings,
    roots: { sourceFiles: directories.uploads, outputFiles: directories.converted, tempFiles: directories.temp },
    clock,
    measure: options.measure ?? measureDirectory
  });
  const cleaner = new StorageCleaner({ registry, accountant, settings, directories, clock });
  return { clock, directories, registry, accountant, cleaner, settings };
}

describe('StorageCleaner', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('cleanup');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  /**
   * A completed task, a failed task and a pending task, plus scratch files and
   * files no task refers to. Everything happens at START.
   */
  async function populate(context: ReturnType<typeof createCleaner>) {
    const { registry, directories } = context;
    const { uploads, converted, temp } = directories;

    const done = await registry.create('done', { path: await writeFile(path.join(uploads, 'a.mp4'), 'aaaa'), size: 4 }, {});
    await registry.start(done.id);
    await registry.complete(done.id, await writeFile(path.join(converted, 'a-out.mkv'), 'ooooooo'));

    const broken = await registry.create('broken', { path: await writeFile(path.join(uploads, 'b.mp4'), 'bbbbb'), size: 5 }, {});
    await registry.fail(broken.id, 'Decoder error');

    const waiting = await registry.create('waiting', { path: await writeFile(path.join(uploads, 'c.mp4'), 'cc'), size: 2 }, {});

    const files = {
      doneSource: path.join(uploads, 'a.mp4'),
      doneOutput: path.join(converted, 'a-out.mkv'),
      brokenSource: path.join(uploads, 'b.mp4'),
      waitingSource: path.join(uploads, 'c.mp4'),
      staleTemp: await writeFile(path.join(temp, 'stale.tmp'), 'xx', new Date(START.getTime() - 3 * HOUR)),
      recentTemp: await writeFile(path.join(temp, 'recent.tmp'), 'r', new Date(START.getTime() - HOUR)),
      freshTemp: await writeFile(path.join(temp, 'fresh.tmp'), 'f', START),
      waitingTemp: await writeFile(path.join(temp, `${waiting.id}.mkv`), 'wwww', new Date(START.getTime() - 5 * HOUR)),
      strayUpload: await writeFile(path.join(uploads, 'stray.mp4'), 'sss', new Date('2024-04-29T08:00:00.000Z')),
      newUpload: await writeFile(path.join(uploads, 'new-upload.mp4'), 'nn', START)
    };
    return { done, broken, waiting, files };
  }

  it('removes only what is past its retention on a scheduled pass', async () => {
    const context = createCleaner(root);
    const { files } = await populate(context);
    context.clock.advance(10 * MINUTE);

    const result = await context.cleaner.run();

    expect(result.removed).toEqual({
      sources: { files: 1, bytes: 4 },
      outputs: { files: 0, bytes: 0 },
      temp: { files: 1, bytes: 2 },
      orphans: { files: 1, bytes: 3 }
    });
    expect(result).toMatchObject({ mode: 'scheduled', totalFiles: 3, totalBytes: 9 });
    expect(fs.existsSync(files.doneSource)).toBe(false);
    expect(fs.existsSync(files.staleTemp)).toBe(false);
    expect(fs.existsSync(files.strayUpload)).toBe(false);
    for (const kept of [
      files.doneOutput,
      files.brokenSource,
      files.waitingSource,
      files.recentTemp,
      files.freshTemp,
      files.waitingTemp,
      files.newUpload
    ]) {
      expect(fs.existsSync(kept)).toBe(true);
    }
  });

  it('shortens the scratch retention on an aggressive pass', async () => {
    const context = createCleaner(root);
    const { files } = await populate(context);

    const scheduled = await context.cleaner.run('scheduled');
    const aggressive = await context.cleaner.run('aggressive');

    expect(scheduled.removed.temp).toEqual({ files: 1, bytes: 2 });
    expect(aggressive.removed.temp).toEqual({ files: 1, bytes: 1 });
    expect(fs.existsSync(files.recentTemp)).toBe(false);
    expect(fs.existsSync(files.freshTemp)).toBe(true);
  });

  it('clears everything except the files of unfinished tasks on an emergency pass', async () => {
    const context = createCleaner(root);
    const { files } = await populate(context);

    const result = await context.cleaner.run('emergency');

    expect(result.removed).toEqual({
      sources: { files: 2, bytes: 9 },
      outputs: { files: 1, bytes: 7 },
      temp: { files: 3, bytes: 4 },
      orphans: { files: 2, bytes: 5 }
    });
    expect(fs.existsSync(files.waitingSource)).toBe(true);
    expect(fs.existsSync(files.waitingTemp)).toBe(true);
    expect(context.cleaner.getStatistics()).toEqual({
      runs: 1,
      totalFiles: 8,
      totalBytes: 25,
      lastRunAt: START,
      lastMode: 'emergency',
      lastEmergencyAt: START
    });
  });

  it('refreshes the space usage after removing files', async () => {
    const context = createCleaner(root);
    await populate(context);
    await context.accountant.refresh();
    const before = context.accountant.getSnapshot().usedSpace;

    await context.cleaner.run('emergency');

    expect(before).toBe(31);
    expect(context.accountant.getSnapshot().usedSpace).toBe(6);
  });

  it('never touches files outside the storage directories', async () => {
    const context = createCleaner(root);
    const outside = await writeFile(path.join(root, 'elsewhere', 'keep.mp4'), 'kkk');
    const task = await context.registry.create('outside', { path: outside, size: 3 }, {});
    await context.registry.cancel(task.id);

    const result = await context.cleaner.run('emergency');

    expect(result.totalFiles).toBe(0);
    expect(fs.existsSync(outside)).toBe(true);
  });

  describe('under storage pressure', () => {
    function pressured(usedBytes: number, settings: Record<string, string> = {}) {
      return createCleaner(root, {
        maxTotal: 100,
        settings,
        measure: async (directory) => (directory.endsWith('uploads') ? usedBytes : 0)
      });
    }

    it('starts an emergency pass above the emergency threshold', async () => {
      const { accountant, cleaner } = pressured(96);
      cleaner.start();

      await accountant.refresh();
      await waitFor(() => cleaner.getStatistics().runs === 1);

      expect(cleaner.getStatistics().lastMode).toBe('emergency');
      expect(await cleaner.stop()).toBeUndefined();
    });

    it('starts an aggressive pass between the two thresholds', async () => {
      const { accountant, cleaner } = pressured(92);
      cleaner.start();

      await accountant.refresh();
      await waitFor(() => cleaner.getStatistics().runs === 1);

      expect(cleaner.getStatistics().lastMode).toBe('aggressive');
      await cleaner.stop();
    });

    it('waits for the cooldown before reacting again', async () => {
      const { accountant, cleaner, clock } = pressured(96);
      cleaner.start();
      await accountant.refresh();
      await waitFor(() => cleaner.getStatistics().runs === 1);

      await accountant.refresh();
      await cleaner.stop();
      expect(cleaner.getStatistics().runs).toBe(1);

      cleaner.start();
      clock.advance(5 * MINUTE);
      await accountant.refresh();
      await waitFor(() => cleaner.getStatistics().runs === 2);
      await cleaner.stop();
    });

    it('does nothing below the thresholds or when disabled', async () => {
      const calm = pressured(50);
      calm.cleaner.start();
      await calm.accountant.refresh();
      await calm.cleaner.stop();

      const disabled = pressured(99, { [CLEANUP_SETTING_KEYS.enabled]: 'false' });
      disabled.cleaner.start();
      await disabled.accountant.refresh();
      await disabled.cleaner.stop();

      expect(calm.cleaner.getStatistics().runs).toBe(0);
      expect(disabled.cleaner.getStatistics().runs).toBe(0);
    });
  });

  describe('policy', () => {
    it('reads the defaults until something is stored', () => {
      const { cleaner } = createCleaner(root);

      expect(cleaner.getPolicy()).toEqual({
        enabled: true,
        sourceRetentionMinutes: 5,
        outputRetentionHours: 24,
        tempRetentionHours: 2,
        failedRetentionDays: 7,
        orphanRetentionHours: 24,
        aggressiveThreshold: 90,
        emergencyThreshold: 95,
        updatedAt: new Date(0),
        updatedBy: 'system'
      });
    });

    it('stores a partial update in the settings', async () => {
      const { cleaner, settings } = createCleaner(root);

      const policy = await cleaner.setPolicy({ tempRetentionHours: 0.5, enabled: false }, 'ops');

      expect(policy).toMatchObject({ tempRetentionHours: 0.5, enabled: false, outputRetentionHours: 24, updatedBy: 'ops' });
      expect(policy.updatedAt).toEqual(START);
      expect(settings.getString(CLEANUP_SETTING_KEYS.tempRetentionHours, '')).toBe('0.5');
    });

    it('rejects negative retention and inverted thresholds', async () => {
      const { cleaner } = createCleaner(root);

      const negative = await cleaner.setPolicy({ tempRetentionHours: -1 }).catch((error: unknown) => error);
      const inverted = await cleaner.setPolicy({ aggressiveThreshold: 96 }).catch((error: unknown) => error);

      expect(negative).toBeInstanceOf(ValidationError);
      expect(negative instanceof ValidationError && negative.details()).toEqual({
        issues: ['tempRetentionHours must be a non-negative number.']
      });
      expect(inverted instanceof ValidationError && inverted.details()).toEqual({
        issues: ['aggressiveThreshold must not exceed emergencyThreshold.']
      });
      expect(cleaner.getPolicy().tempRetentionHours).toBe(2);
    });
  });
});
