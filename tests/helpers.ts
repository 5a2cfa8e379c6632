import fs from 'fs';
import os from 'os';
import path from 'path';

import type { EventEnvelope } from '../src/types/events';
import type { Clock, IdGenerator } from '../src/utils/clock';

export class ManualClock implements Clock {
  private current: number;

  constructor(start = '2024-05-01T08:00:00.000Z') {
    this.current = Date.parse(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function sequentialIds(prefix: string): IdGenerator {
  let counter = 0;
  return {
    next: () => {
      counter += 1;
      return `${prefix}-${counter}`;
    }
  };
}

export const MB = 1024 * 1024;
export const GB = 1024 * MB;

export const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** Lets queued promise callbacks run. */
export async function flush(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await Promise.resolve();
  }
}

export async function makeTempDir(label: string): Promise<string> {
  return await fs.promises.mkdtemp(path.join(os.tmpdir(), `conversion-engine-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function emptyDirectory(dir: string): Promise<void> {
  if (!fs.existsSync(dir)) {
    return;
  }

  const entries = await fs.promises.readdir(dir);
  await Promise.all(entries.map((entry) => fs.promises.rm(path.join(dir, entry), { recursive: true, force: true })));
}

export function envelope(taskId: string, type: EventEnvelope['type'] = 'StatusUpdate'): EventEnvelope {
  return { type, taskId, payload: { id: taskId }, timestamp: '2024-05-01T08:00:00.000Z' };
}

export async function waitFor(check: () => boolean | Promise<boolean>, attempts = 100): Promise<void> {
  for (let i = 0; i < attempts; i += 1) {
    if (await check()) {
      return;
    }
    await wait(10);
  }
  throw new Error('Condition was not met in time');
}
