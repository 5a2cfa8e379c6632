import { errorMessage, InsufficientSpaceError } from '../errors';
import type { TaskEvent } from '../types/events';
import type { SpaceRequirement } from '../types/space';
import type { ConversionParameters, ConversionTask } from '../types/task';
import { uuidGenerator, type IdGenerator } from '../utils/clock';
import { formatBytes, logger } from '../utils/logger';
import { calculateRequirement } from './outputEstimator';
import type { SpaceAccountant } from './spaceAccountant';
import type { TaskRegistry } from './taskRegistry';
import { isTerminal } from './taskStateMachine';

export interface StartTaskRequest {
  name: string;
  sourceSize: number;
  sourcePath?: string;
  sourceFilename?: string;
  parameters?: ConversionParameters;
  userId?: string;
  maxRetries?: number;
}

function releasesReservation(event: TaskEvent): boolean {
  return event.kind === 'Deleted' || isTerminal(event.task.status);
}

/**
 * Gate in front of task creation. A task only comes into existence after its
 * estimated footprint has been reserved in the space ledger; the reservation
 * is given back when the task finishes, is deleted, or fails to be created.
 */
export class AdmissionController {
  private readonly ids: IdGenerator;
  private readonly unsubscribe: () => void;
  private readonly releases = new Set<Promise<void>>();

  constructor(
    private readonly registry: TaskRegistry,
    private readonly accountant: SpaceAccountant,
    ids: IdGenerator = uuidGenerator
  ) {
    this.ids = ids;
    this.unsubscribe = registry.subscribe((event) => {
      if (releasesReservation(event)) {
        this.track(this.releaseFor(event.task.id));
      }
    });
  }

  estimate(request: Pick<StartTaskRequest, 'sourceSize' | 'parameters'>): SpaceRequirement {
    return calculateRequirement(request.sourceSize, request.parameters ?? {});
  }

  async admit(request: StartTaskRequest): Promise<ConversionTask> {
    const requirement = this.estimate(request);
    const token = `admission:${this.ids.next()}`;
    const reservation = this.accountant.reserve(token, requirement.totalRequiredSize, requirement);

    if (!reservation.accepted) {
      logger.warn(
        'admission',
        `Rejected "${request.name}": needs ${formatBytes(requirement.totalRequiredSize)}, ${formatBytes(reservation.check.availableSpace)} available`
      );
      throw new InsufficientSpaceError(reservation.check);
    }

    let task: ConversionTask;
    try {
      task = await this.registry.create(
        request.name,
        {
          path: request.sourcePath ?? request.name,
          size: request.sourceSize,
          filename: request.sourceFilename
        },
        request.parameters ?? {},
        {
          ownerId: request.userId,
          maxRetries: request.maxRetries,
          reservedBytes: requirement.totalRequiredSize
        }
      );
    } catch (error) {
      this.accountant.release(token);
      throw error;
    }

    this.accountant.transfer(token, task.id);

    // A listener may have finished the task before the reservation moved to its id.
    const current = await this.registry.find(task.id);
    if (!current || isTerminal(current.status)) {
      await this.releaseFor(task.id);
    }

    logger.info('admission', `Admitted task ${task.id} with ${formatBytes(requirement.totalRequiredSize)} reserved`);
    return task;
  }

  /** Resolves once every release that is under way has finished. */
  async settled(): Promise<void> {
    await Promise.all(Array.from(this.releases));
  }

  async dispose(): Promise<void> {
    this.unsubscribe();
    await this.settled();
  }

  private track(release: Promise<void>): void {
    const tracked = release.finally(() => {
      this.releases.delete(tracked);
    });
    this.releases.add(tracked);
  }

  /**
   * The bytes stay reserved until a walk has counted the files the task left
   * behind, so they are never missing from both the ledger and the usage.
   */
  private async releaseFor(taskId: string): Promise<void> {
    if (this.accountant.reservationFor(taskId) === undefined) {
      return;
    }
    try {
      await this.accountant.refresh();
    } catch (error) {
      logger.warn('admission', `Space refresh before releasing task ${taskId} failed: ${errorMessage(error)}`);
    } finally {
      this.accountant.release(taskId);
    }
  }
}
