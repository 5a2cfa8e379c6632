import { InvalidTransitionError, NotFoundError, OutOfRangeError, ValidationError } from '../src/errors';
import { TaskRegistry } from '../src/services/taskRegistry';
import { InMemoryTaskStore } from '../src/stores/taskStore';
import type { TaskEvent } from '../src/types/events';
import { ManualClock, sequentialIds } from './helpers';

const source = { path: 'uploads/clip.mp4', size: 1_000 };

function createRegistry() {
  const clock = new ManualClock();
  const registry = new TaskRegistry({ store: new InMemoryTaskStore(), clock, ids: sequentialIds('task') });
  const events: TaskEvent[] = [];
  registry.subscribe((event) => events.push(event));
  return { registry, clock, events };
}

describe('TaskRegistry', () => {
  it('creates a pending task and announces it', async () => {
    const { registry, events } = createRegistry();

    const task = await registry.create('  Holiday clip ', source, { outputFormat: 'mkv' }, { ownerId: 'user-7' });

    expect(task).toMatchObject({
      id: 'task-1',
      name: 'Holiday clip',
      status: 'pending',
      progress: 0,
      retryCount: 0,
      maxRetries: 0,
      ownerId: 'user-7'
    });
    expect(task.createdAt.toISOString()).toBe('2024-05-01T08:00:00.000Z');
    expect(events.map((event) => event.kind)).toEqual(['Created']);
    expect(Object.isFrozen(task.parameters)).toBe(true);
  });

  it('rejects an invalid definition', async () => {
    const { registry } = createRegistry();

    await expect(registry.create(' ', { path: '', size: -1 })).rejects.toBeInstanceOf(ValidationError);
    expect(await registry.list()).toEqual([]);
  });

  it('walks a task through start, progress and completion', async () => {
    const { registry, clock, events } = createRegistry();
    const { id } = await registry.create('clip', source);

    clock.advance(1_000);
    const started = await registry.start(id);
    expect(started.status).toBe('converting');
    expect(started.startedAt?.toISOString()).toBe('2024-05-01T08:00:01.000Z');

    const progressed = await registry.updateProgress(id, 40, 1.5, 90);
    expect(progressed).toMatchObject({ progress: 40, speed: 1.5, eta: 90 });

    clock.advance(1_000);
    const completed = await registry.complete(id, '/data/converted/clip.mkv');
    expect(completed).toMatchObject({ status: 'completed', progress: 100, outputPath: '/data/converted/clip.mkv' });
    expect(completed.completedAt?.toISOString()).toBe('2024-05-01T08:00:02.000Z');

    expect(events.map((event) => event.kind)).toEqual(['Created', 'StatusChanged', 'ProgressUpdated', 'Completed']);
  });

  it('refuses to complete a pending task and leaves it pending', async () => {
    const { registry, events } = createRegistry();
    const { id } = await registry.create('clip', source);

    const attempt = registry.complete(id);

    await expect(attempt).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(attempt).rejects.toMatchObject({ current: 'pending', requested: 'completed' });
    expect((await registry.get(id)).status).toBe('pending');
    expect(events).toHaveLength(1);
  });

  it('rejects progress above 100 and keeps the previous value', async () => {
    const { registry } = createRegistry();
    const { id } = await registry.create('clip', source);
    await registry.start(id);
    await registry.updateProgress(id, 40);

    await expect(registry.updateProgress(id, 150)).rejects.toBeInstanceOf(OutOfRangeError);
    await expect(registry.updateProgress(id, 12.5)).rejects.toBeInstanceOf(OutOfRangeError);
    expect((await registry.get(id)).progress).toBe(40);
  });

  it('accepts progress that goes backwards while converting', async () => {
    const { registry } = createRegistry();
    const { id } = await registry.create('clip', source);
    await registry.start(id);
    await registry.updateProgress(id, 60);

    const task = await registry.updateProgress(id, 30);

    expect(task.progress).toBe(30);
  });

  it('only accepts progress while converting', async () => {
    const { registry } = createRegistry();
    const { id } = await registry.create('clip', source);

    await expect(registry.updateProgress(id, 10)).rejects.toMatchObject({ code: 'InvalidTransition', requested: 'progress' });
  });

  it('fails from pending and from converting with a message', async () => {
    const { registry, events } = createRegistry();
    const first = await registry.create('first', source);
    const second = await registry.create('second', source);
    await registry.start(second.id);

    const failedPending = await registry.fail(first.id, 'Source unreadable');
    const failedConverting = await registry.fail(second.id, '   ');

    expect(failedPending).toMatchObject({ status: 'failed', errorMessage: 'Source unreadable' });
    expect(failedConverting.errorMessage).toBe('Conversion failed.');
    expect(events.filter((event) => event.kind === 'Completed')).toHaveLength(2);
  });

  it('cancels with a StatusChanged event and then refuses further transitions', async () => {
    const { registry, events } = createRegistry();
    const { id } = await registry.create('clip', source);

    const cancelled = await registry.cancel(id);

    expect(cancelled.status).toBe('cancelled');
    expect(events[events.length - 1]).toMatchObject({ kind: 'StatusChanged', task: { status: 'cancelled' } });
    await expect(registry.start(id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(registry.cancel(id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('counts retries up to the task limit', async () => {
    const { registry } = createRegistry();
    const { id } = await registry.create('clip', source, {}, { maxRetries: 1 });
    await registry.start(id);
    await registry.updateProgress(id, 70);

    const retried = await registry.recordRetry(id);

    expect(retried).toMatchObject({ retryCount: 1, progress: 0, status: 'converting' });
    await expect(registry.recordRetry(id)).rejects.toMatchObject({ requested: 'retry' });
  });

  it('deletes a task in any state and then reports it missing', async () => {
    const { registry, events } = createRegistry();
    const { id } = await registry.create('clip', source);
    await registry.start(id);

    const deleted = await registry.delete(id);

    expect(deleted.id).toBe(id);
    expect(events[events.length - 1].kind).toBe('Deleted');
    expect(await registry.find(id)).toBeUndefined();
    await expect(registry.delete(id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(registry.get(id)).rejects.toMatchObject({ code: 'NotFound', statusCode: 404 });
  });

  it('lists active tasks oldest first', async () => {
    const { registry, clock } = createRegistry();
    const a = await registry.create('a', source);
    clock.advance(10);
    const b = await registry.create('b', source);
    clock.advance(10);
    const c = await registry.create('c', source);
    await registry.cancel(b.id);

    const active = await registry.listActive();

    expect(active.map((task) => task.id)).toEqual([a.id, c.id]);
  });

  it('pages finished tasks newest first', async () => {
    const { registry, clock } = createRegistry();
    const ids: string[] = [];
    for (let i = 0; i < 5; i += 1) {
      const task = await registry.create(`clip-${i}`, source);
      ids.push(task.id);
    }
    for (const id of ids) {
      clock.advance(1_000);
      await registry.cancel(id);
    }

    const firstPage = await registry.listCompleted(1, 2);
    const lastPage = await registry.listCompleted(3, 2);

    expect(firstPage).toMatchObject({ page: 1, pageSize: 2, total: 5 });
    expect(firstPage.tasks.map((task) => task.id)).toEqual(['task-5', 'task-4']);
    expect(lastPage.tasks.map((task) => task.id)).toEqual(['task-1']);
  });

  it('validates paging bounds', async () => {
    const { registry } = createRegistry();

    await expect(registry.listCompleted(0, 10)).rejects.toBeInstanceOf(ValidationError);
    await expect(registry.listCompleted(1, 101)).rejects.toBeInstanceOf(OutOfRangeError);
    await expect(registry.listCompleted(1, 0)).rejects.toBeInstanceOf(OutOfRangeError);
  });

  it('serializes concurrent transitions on the same task', async () => {
    const { registry } = createRegistry();
    const { id } = await registry.create('clip', source);
    await registry.start(id);

    const results = await Promise.allSettled([registry.complete(id), registry.cancel(id), registry.fail(id, 'late')]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected', 'rejected']);
    expect((await registry.get(id)).status).toBe('completed');
  });

  it('keeps emitting when a listener throws', async () => {
    const { registry, events } = createRegistry();
    registry.subscribe(() => {
      throw new Error('listener broke');
    });

    await registry.create('clip', source);

    expect(events).toHaveLength(1);
  });

  it('returns copies that cannot change stored state', async () => {
    const { registry } = createRegistry();
    const task = await registry.create('clip', source);

    task.progress = 99;
    task.source.size = 5;

    const stored = await registry.get(task.id);
    expect(stored.progress).toBe(0);
    expect(stored.source.size).toBe(1_000);
  });
});
