import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  BanCheckTask,
  TaskPage,
  TaskStatus,
} from '../interfaces/task.interface';
import {
  NewTask,
  TaskListQuery,
  TaskRepository,
} from '../repositories/task.repository';
import { TaskWriter } from './task-writer';

@Injectable()
export class TaskStoreService {
  constructor(
    private readonly repository: TaskRepository,
    private readonly configService: ConfigService,
  ) {}

  createPending(ownerId: string, totalCount: number, message: string): Promise<BanCheckTask> {
    const task: NewTask = {
      taskId: uuidv4(),
      ownerId,
      status: TaskStatus.PENDING,
      message,
      progress: 0,
      totalCount,
      results: [],
      proxyStats: null,
    };
    return this.repository.create(task);
  }

  /** A submission with nothing to check is complete on arrival. */
  createCompleted(ownerId: string, message: string): Promise<BanCheckTask> {
    return this.repository.create({
      taskId: uuidv4(),
      ownerId,
      status: TaskStatus.COMPLETED,
      message,
      progress: 100,
      totalCount: 0,
      results: [],
      proxyStats: null,
    });
  }

  findById(taskId: string): Promise<BanCheckTask | null> {
    return this.repository.findById(taskId);
  }

  async list(query: TaskListQuery): Promise<TaskPage> {
    const { tasks, total } = await this.repository.list(query);
    return { tasks, total, limit: query.limit, offset: query.offset };
  }

  findStale(updatedBefore: Date, limit: number): Promise<BanCheckTask[]> {
    return this.repository.findStale(updatedBefore, limit);
  }

  openWriter(task: BanCheckTask, submissionOrder: readonly string[]): TaskWriter {
    return new TaskWriter(task, submissionOrder, this.repository, {
      maxRetries: this.configService.get<number>('PERSIST_MAX_RETRIES') ?? 5,
      baseDelayMs: this.configService.get<number>('PERSIST_RETRY_BASE_MS') ?? 200,
    });
  }
}
