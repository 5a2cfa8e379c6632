import fs from 'fs';
import path from 'path';

import { ValidationError } from '../src/errors';
import {
  DEFAULT_MAX_TOTAL_SPACE,
  DEFAULT_RESERVED_SPACE,
  measureDirectory,
  SPACE_SETTING_KEYS,
  SpaceAccountant
} from '../src/services/spaceAccountant';
import { InMemorySettingsStore } from '../src/stores/settingsStore';
import type { SpaceUsageSnapshot } from '../src/types/space';
import { makeTempDir, ManualClock, MB, removeDir } from './helpers';

const roots = { sourceFiles: 'uploads', outputFiles: 'converted', tempFiles: 'temp' };

function budgetSettings(maxTotal: number, reserved: number, enabled = true) {
  return new InMemorySettingsStore({
    [SPACE_SETTING_KEYS.maxTotal]: String(maxTotal),
    [SPACE_SETTING_KEYS.reserved]: String(reserved),
    [SPACE_SETTING_KEYS.enabled]: String(enabled)
  });
}

function createAccountant(settings = budgetSettings(600 * MB, 100 * MB)) {
  const usage: Record<string, number> = { uploads: 0, converted: 0, temp: 0 };
  let failure: Error | undefined;
  let walks = 0;
  const accountant = new SpaceAccountant({
    settings,
    roots,
    clock: new ManualClock(),
    measure: async (directory) => {
      walks += 1;
      if (failure) {
        throw failure;
      }
      return usage[directory] ?? 0;
    }
  });

  return {
    accountant,
    settings,
    usage,
    failWith: (error: Error | undefined) => {
      failure = error;
    },
    walkCount: () => walks
  };
}

describe('SpaceAccountant', () => {
  it('reports missing space with the available amount', () => {
    const { accountant } = createAccountant();

    const result = accountant.checkSpace(800 * MB);

    expect(result.hasEnoughSpace).toBe(false);
    expect(result.availableSpace).toBe(500 * MB);
    expect(result.requiredSpace).toBe(800 * MB);
    expect(result.message).toBe('Insufficient space: 800.0MB required, 500.0MB available.');
  });

  it('accepts a request that fits', () => {
    const { accountant } = createAccountant();

    const result = accountant.checkSpace(200 * MB);

    expect(result).toMatchObject({ hasEnoughSpace: true, message: 'Sufficient space available.' });
    expect(result.breakdown).toMatchObject({
      originalFileSpace: 200 * MB,
      reservedSpace: 100 * MB,
      totalConfiguredSpace: 600 * MB,
      pendingReservations: 0
    });
  });

  it('counts measured usage after a refresh', async () => {
    const { accountant, usage } = createAccountant();
    usage.uploads = 60 * MB;
    usage.converted = 30 * MB;
    usage.temp = 10 * MB;

    const snapshot = await accountant.refresh();

    expect(snapshot).toMatchObject({
      totalSpace: 600 * MB,
      usedSpace: 100 * MB,
      availableSpace: 400 * MB,
      reservedSpace: 100 * MB,
      usagePercentage: 16.67,
      hasSufficientSpace: true,
      stale: false,
      breakdown: { sourceFiles: 60 * MB, outputFiles: 30 * MB, tempFiles: 10 * MB }
    });
    expect(accountant.checkSpace(450 * MB).hasEnoughSpace).toBe(false);
  });

  it('keeps the previous usage and marks it stale when a refresh fails', async () => {
    const { accountant, usage, failWith } = createAccountant();
    usage.uploads = 50 * MB;
    await accountant.refresh();

    usage.uploads = 10 * MB;
    failWith(new Error('storage offline'));
    const snapshot = await accountant.refresh();

    expect(snapshot.stale).toBe(true);
    expect(snapshot.usedSpace).toBe(50 * MB);
    expect(accountant.lastError?.message).toBe('storage offline');

    failWith(undefined);
    const recovered = await accountant.refresh();
    expect(recovered).toMatchObject({ stale: false, usedSpace: 10 * MB });
    expect(accountant.lastError).toBeUndefined();
  });

  it('shares one walk between concurrent refreshes', async () => {
    const { accountant, walkCount } = createAccountant();

    const [first, second] = await Promise.all([accountant.refresh(), accountant.refresh()]);

    expect(first).toBe(second);
    expect(walkCount()).toBe(3);
  });

  it('always passes when the limit is disabled', () => {
    const { accountant } = createAccountant(budgetSettings(600 * MB, 100 * MB, false));

    const result = accountant.checkSpace(10_000 * MB);

    expect(result).toMatchObject({
      hasEnoughSpace: true,
      availableSpace: Number.MAX_SAFE_INTEGER,
      message: 'Space limit disabled.'
    });
  });

  it('rejects a negative or fractional request', () => {
    const { accountant } = createAccountant();

    expect(() => accountant.checkSpace(-1)).toThrow(ValidationError);
    expect(() => accountant.checkSpace(1.5)).toThrow(ValidationError);
  });

  it('never promises the same bytes twice', () => {
    const { accountant } = createAccountant();

    const first = accountant.reserve('a', 300 * MB);
    const second = accountant.reserve('b', 300 * MB);

    expect(first.accepted).toBe(true);
    expect(second.accepted).toBe(false);
    expect(second.check.availableSpace).toBe(200 * MB);
    expect(accountant.pendingReservations()).toBe(300 * MB);
    expect(accountant.getSnapshot().availableSpace).toBe(200 * MB);
  });

  it('frees bytes on release and moves them on transfer', () => {
    const { accountant } = createAccountant();
    accountant.reserve('token', 300 * MB);

    accountant.transfer('token', 'task-1');
    expect(accountant.reservationFor('token')).toBeUndefined();
    expect(accountant.reservationFor('task-1')).toBe(300 * MB);

    expect(accountant.release('task-1')).toBe(300 * MB);
    expect(accountant.release('task-1')).toBe(0);
    expect(accountant.reserve('b', 500 * MB).accepted).toBe(true);
  });

  it('re-reserving a key replaces its own previous amount', () => {
    const { accountant } = createAccountant();
    accountant.reserve('a', 300 * MB);

    const grown = accountant.reserve('a', 450 * MB);

    expect(grown.accepted).toBe(true);
    expect(accountant.pendingReservations()).toBe(450 * MB);
  });

  it('uses the default budget when nothing is configured', () => {
    const { accountant } = createAccountant(new InMemorySettingsStore());

    expect(accountant.getBudget()).toMatchObject({
      maxTotalSpace: DEFAULT_MAX_TOTAL_SPACE,
      reservedSpace: DEFAULT_RESERVED_SPACE,
      enabled: true,
      updatedBy: 'system'
    });
  });

  it('persists a valid budget and announces the new snapshot', async () => {
    const { accountant, settings } = createAccountant();
    const snapshots: SpaceUsageSnapshot[] = [];
    accountant.onChange((snapshot) => snapshots.push(snapshot));

    const budget = await accountant.setBudget({ maxTotal: 1_000 * MB, reserved: 0, enabled: true }, 'operator');

    expect(budget).toMatchObject({ maxTotalSpace: 1_000 * MB, reservedSpace: 0, enabled: true, updatedBy: 'operator' });
    expect(budget.updatedAt.toISOString()).toBe('2024-05-01T08:00:00.000Z');
    expect(settings.getInt(SPACE_SETTING_KEYS.maxTotal, 0)).toBe(1_000 * MB);
    expect(snapshots).toHaveLength(1);
    expect(snapshots[0].availableSpace).toBe(1_000 * MB);
  });

  it('refuses a budget whose reserve swallows the total', async () => {
    const { accountant } = createAccountant();

    await expect(accountant.setBudget({ maxTotal: 100, reserved: 100, enabled: true })).rejects.toMatchObject({
      code: 'ValidationError',
      message: 'Invalid space configuration.'
    });
    await expect(accountant.setBudget({ maxTotal: 0, reserved: -1, enabled: true })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(accountant.getBudget().maxTotalSpace).toBe(600 * MB);
  });
});

describe('measureDirectory', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('measure');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('sums regular files recursively', async () => {
    await fs.promises.writeFile(path.join(root, 'a.bin'), Buffer.alloc(10));
    await fs.promises.mkdir(path.join(root, 'nested'));
    await fs.promises.writeFile(path.join(root, 'nested', 'b.bin'), Buffer.alloc(5));

    expect(await measureDirectory(root)).toBe(15);
  });

  it('treats a missing directory as empty', async () => {
    expect(await measureDirectory(path.join(root, 'missing'))).toBe(0);
  });
});
