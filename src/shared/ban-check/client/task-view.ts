import {
  BanCheckTask,
  TaskStatus,
} from '../interfaces/task.interface';

/** A task as it arrives over HTTP: timestamps are ISO strings. */
export type TaskView = Omit<BanCheckTask, 'createdAt' | 'updatedAt'> & {
  createdAt: string;
  updatedAt: string;
};

const STATUSES = new Set<string>(Object.values(TaskStatus));

export function isTaskView(value: unknown): value is TaskView {
  return (
    typeof value === 'object' &&
    value !== null &&
    'taskId' in value &&
    typeof value.taskId === 'string' &&
    'status' in value &&
    typeof value.status === 'string' &&
    STATUSES.has(value.status) &&
    'progress' in value &&
    typeof value.progress === 'number' &&
    'results' in value &&
    Array.isArray(value.results)
  );
}

export class TaskFetchError extends Error {
  readonly name = 'TaskFetchError';

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

export interface TaskFetcher {
  fetchTask(taskId: string, signal?: AbortSignal): Promise<TaskView>;
}
