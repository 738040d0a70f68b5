import type { ProxyStats } from '@/shared/proxy/interfaces/proxy.interface';

export enum TaskStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

export enum StatusSummary {
  BANNED = 'BANNED',
  CLEAN = 'CLEAN',
  PRIVATE = 'PRIVATE',
  ERROR = 'ERROR',
}

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.COMPLETED,
  TaskStatus.FAILED,
]);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface CheckResult {
  steamId: string;
  statusSummary: StatusSummary;
  details: string;
  proxyUsed: string;
  batchId: number | null;
  attempts: number;
}

export interface BanCheckTask {
  taskId: string;
  ownerId: string;
  status: TaskStatus;
  message: string;
  progress: number;
  totalCount: number;
  results: CheckResult[];
  proxyStats: ProxyStats | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TaskPage {
  tasks: BanCheckTask[];
  total: number;
  limit: number;
  offset: number;
}
