import { Inject, Injectable } from '@nestjs/common';
import { Pool, QueryResultRow } from 'pg';
import { PG_POOL } from '@/shared/database/database.constants';
import { errorMessage } from '@/shared/lib/util';
import type { ProxyStats } from '@/shared/proxy/interfaces/proxy.interface';
import { PersistenceError, TaskClosedError } from '../errors/ban-check.errors';
import {
  BanCheckTask,
  CheckResult,
  isTerminal,
  TaskStatus,
} from '../interfaces/task.interface';
import {
  NewTask,
  TaskListQuery,
  TaskRepository,
  TaskSnapshot,
} from './task.repository';

type TaskRow = {
  task_id: string;
  owner_id: string;
  status: TaskStatus;
  message: string;
  progress: number;
  total_count: number;
  results: CheckResult[];
  proxy_stats: ProxyStats | null;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = `task_id, owner_id, status, message, progress, total_count,
  results, proxy_stats, created_at, updated_at`;

function toTask(row: TaskRow): BanCheckTask {
  return {
    taskId: row.task_id,
    ownerId: row.owner_id,
    status: row.status,
    message: row.message,
    progress: Number(row.progress),
    totalCount: row.total_count,
    results: row.results,
    proxyStats: row.proxy_stats,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

@Injectable()
export class PgTaskRepository extends TaskRepository {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {
    super();
  }

  async create(task: NewTask): Promise<BanCheckTask> {
    const rows = await this.query<TaskRow>(
      'create task',
      `INSERT INTO ban_check_tasks
         (task_id, owner_id, status, message, progress, total_count, results, proxy_stats)
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb)
       RETURNING ${COLUMNS}`,
      [
        task.taskId,
        task.ownerId,
        task.status,
        task.message,
        task.progress,
        task.totalCount,
        JSON.stringify(task.results),
        task.proxyStats === null ? null : JSON.stringify(task.proxyStats),
      ],
    );
    return toTask(rows[0]);
  }

  async findById(taskId: string): Promise<BanCheckTask | null> {
    const rows = await this.query<TaskRow>(
      'find task',
      `SELECT ${COLUMNS} FROM ban_check_tasks WHERE task_id = $1`,
      [taskId],
    );
    return rows.length > 0 ? toTask(rows[0]) : null;
  }

  async save(snapshot: TaskSnapshot): Promise<BanCheckTask> {
    const rows = await this.query<TaskRow>(
      'save task',
      `UPDATE ban_check_tasks
          SET status = $2, message = $3, progress = $4,
              results = $5::jsonb, proxy_stats = $6::jsonb, updated_at = NOW()
        WHERE task_id = $1 AND status NOT IN ($7, $8)
        RETURNING ${COLUMNS}`,
      [
        snapshot.taskId,
        snapshot.status,
        snapshot.message,
        snapshot.progress,
        JSON.stringify(snapshot.results),
        snapshot.proxyStats === null ? null : JSON.stringify(snapshot.proxyStats),
        TaskStatus.COMPLETED,
        TaskStatus.FAILED,
      ],
    );
    if (rows.length > 0) {
      return toTask(rows[0]);
    }

    const stored = await this.findById(snapshot.taskId);
    if (!stored) {
      throw new PersistenceError(`Task ${snapshot.taskId} does not exist`);
    }
    if (isTerminal(stored.status)) {
      throw new TaskClosedError(stored);
    }
    throw new PersistenceError(`Task ${snapshot.taskId} was not updated`);
  }

  async list(
    query: TaskListQuery,
  ): Promise<{ tasks: BanCheckTask[]; total: number }> {
    const filters = [query.ownerId ?? null, query.status ?? null];
    const where = `WHERE ($1::text IS NULL OR owner_id = $1)
                     AND ($2::text IS NULL OR status = $2)`;

    const [rows, counts] = await Promise.all([
      this.query<TaskRow>(
        'list tasks',
        `SELECT ${COLUMNS} FROM ban_check_tasks ${where}
          ORDER BY created_at DESC LIMIT $3 OFFSET $4`,
        [...filters, query.limit, query.offset],
      ),
      this.query<{ total: string }>(
        'count tasks',
        `SELECT COUNT(*) AS total FROM ban_check_tasks ${where}`,
        filters,
      ),
    ]);

    return { tasks: rows.map(toTask), total: Number(counts[0]?.total ?? 0) };
  }

  async findStale(updatedBefore: Date, limit: number): Promise<BanCheckTask[]> {
    const rows = await this.query<TaskRow>(
      'find stale tasks',
      `SELECT ${COLUMNS} FROM ban_check_tasks
        WHERE status IN ($1, $2) AND updated_at < $3
        ORDER BY updated_at ASC LIMIT $4`,
      [TaskStatus.PENDING, TaskStatus.PROCESSING, updatedBefore, limit],
    );
    return rows.map(toTask);
  }

  private async query<R extends QueryResultRow>(
    operation: string,
    text: string,
    values: unknown[],
  ): Promise<R[]> {
    try {
      const result = await this.pool.query<R>(text, values);
      return result.rows;
    } catch (error) {
      throw new PersistenceError(
        `Failed to ${operation}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
