import {
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { isUUID } from 'class-validator';
import {
  DEFAULT_ID_COLUMN,
  extractIdentifierColumn,
  MissingColumnError,
} from '@/shared/ban-check/identifiers/csv-identifiers';
import { normalizeIdentifiers } from '@/shared/ban-check/identifiers/steam-id';
import type { CheckOptions } from '@/shared/ban-check/interfaces/check-options.interface';
import {
  BanCheckTask,
  TaskPage,
  TaskStatus,
} from '@/shared/ban-check/interfaces/task.interface';
import { TaskStoreService } from '@/shared/ban-check/services/task-store.service';
import { errorMessage } from '@/shared/lib/util';
import { ProxyPoolFactory } from '@/shared/proxy/services/proxy-pool.factory';
import { BanCheckJob } from '@/shared/queue/interfaces/ban-check-job.interface';
import {
  JOB_NAMES,
  QUEUE_CONFIG,
  QUEUE_NAMES,
} from '@/shared/queue/queue.constants';
import type { Caller } from '../auth/entities/caller.entity';

export const NOTHING_TO_CHECK_MESSAGE = 'No SteamIDs provided. Nothing to check.';

export interface SubmissionReceipt {
  taskId: string;
  status: TaskStatus;
  message: string;
  totalCount: number;
  invalidCount: number;
  duplicateCount: number;
}

export interface TaskListRequest {
  limit: number;
  offset: number;
  status?: TaskStatus;
}

@Injectable()
export class BanCheckService {
  private readonly logger = new Logger(BanCheckService.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.BAN_CHECK_QUEUE)
    private readonly banCheckQueue: Queue,
    private readonly taskStore: TaskStoreService,
    private readonly proxyPoolFactory: ProxyPoolFactory,
  ) {}

  /**
   * `proxyFile` is the text of an uploaded proxy file; when it holds usable
   * proxies they are used instead of `options.proxyList`.
   */
  async submitIdentifiers(
    caller: Caller,
    rawIds: readonly string[],
    options: CheckOptions = {},
    proxyFile?: string,
  ): Promise<SubmissionReceipt> {
    const ids = normalizeIdentifiers(rawIds);

    if (ids.all.length === 0) {
      const task = await this.taskStore.createCompleted(caller.id, NOTHING_TO_CHECK_MESSAGE);
      return this.receipt(task, 0, ids.duplicates);
    }

    if (this.proxyPoolFactory.proxyRequired) {
      const { source } = this.proxyPoolFactory.resolve({
        file: proxyFile,
        list: options.proxyList,
      });
      if (source === 'none') {
        throw new UnprocessableEntityException(
          'A proxy list is required: direct connections are disabled',
        );
      }
    }

    const task = await this.taskStore.createPending(
      caller.id,
      ids.all.length,
      `Queued ${ids.all.length} SteamIDs for checking`,
    );

    const jobData: BanCheckJob = {
      taskId: task.taskId,
      steamIds: ids.all,
      options: { ...options },
      proxyFile,
      submittedAt: new Date().toISOString(),
    };

    try {
      await this.banCheckQueue.add(JOB_NAMES.RUN_BAN_CHECK, jobData, {
        jobId: task.taskId,
        ...QUEUE_CONFIG,
      });
    } catch (error) {
      this.logger.error(`Enqueue failed for task ${task.taskId}: ${errorMessage(error)}`);
      await this.taskStore
        .openWriter(task, ids.all)
        .fail(`Could not enqueue task: ${errorMessage(error)}`);
      throw new ServiceUnavailableException('Task queue unavailable, try again later');
    }

    this.logger.log(
      `Enqueued task ${task.taskId} for ${caller.id}: ${ids.all.length} ids ` +
        `(${ids.invalid.length} invalid, ${ids.duplicates} duplicates dropped)`,
    );
    return this.receipt(task, ids.invalid.length, ids.duplicates);
  }

  async submitCsv(
    caller: Caller,
    csv: string,
    idColumn: string = DEFAULT_ID_COLUMN,
    options: CheckOptions = {},
    proxyFile?: string,
  ): Promise<SubmissionReceipt> {
    let ids: string[];
    try {
      ids = extractIdentifierColumn(csv, idColumn);
    } catch (error) {
      if (error instanceof MissingColumnError) {
        throw new UnprocessableEntityException(error.message);
      }
      throw new UnprocessableEntityException(`Could not read CSV: ${errorMessage(error)}`);
    }
    return this.submitIdentifiers(caller, ids, options, proxyFile);
  }

  async getTask(caller: Caller, taskId: string): Promise<BanCheckTask> {
    const task = isUUID(taskId, 4) ? await this.taskStore.findById(taskId) : null;

    // Someone else's task is reported exactly like a missing one.
    if (!task || (caller.role !== 'admin' && task.ownerId !== caller.id)) {
      throw new NotFoundException(`Task ${taskId} not found`);
    }
    return task;
  }

  listTasks(caller: Caller, request: TaskListRequest): Promise<TaskPage> {
    return this.taskStore.list({
      ownerId: caller.role === 'admin' ? undefined : caller.id,
      status: request.status,
      limit: request.limit,
      offset: request.offset,
    });
  }

  private receipt(
    task: BanCheckTask,
    invalidCount: number,
    duplicateCount: number,
  ): SubmissionReceipt {
    return {
      taskId: task.taskId,
      status: task.status,
      message: task.message,
      totalCount: task.totalCount,
      invalidCount,
      duplicateCount,
    };
  }
}
