import type {
  BanCheckTask,
  TaskStatus,
} from '../interfaces/task.interface';

export type NewTask = Omit<BanCheckTask, 'createdAt' | 'updatedAt'>;

/** Every mutable column of a task, written together. */
export type TaskSnapshot = Pick<
  BanCheckTask,
  'taskId' | 'status' | 'message' | 'progress' | 'results' | 'proxyStats'
>;

export interface TaskListQuery {
  /** Restricts the page to one owner; omitted for admin callers. */
  ownerId?: string;
  status?: TaskStatus;
  limit: number;
  offset: number;
}

/**
 * Storage seam for Tasks. `save` replaces the mutable columns in one
 * statement, so a reader never sees part of a snapshot. It only applies to a
 * row that is not yet COMPLETED or FAILED, and throws TaskClosedError with
 * the stored task otherwise.
 */
export abstract class TaskRepository {
  abstract create(task: NewTask): Promise<BanCheckTask>;
  abstract findById(taskId: string): Promise<BanCheckTask | null>;
  abstract save(snapshot: TaskSnapshot): Promise<BanCheckTask>;
  abstract list(
    query: TaskListQuery,
  ): Promise<{ tasks: BanCheckTask[]; total: number }>;
  /** Non-terminal tasks whose last update is older than `updatedBefore`. */
  abstract findStale(updatedBefore: Date, limit: number): Promise<BanCheckTask[]>;
}
