import type { CheckOptions } from '@/shared/ban-check/interfaces/check-options.interface';

export interface BanCheckJob {
  taskId: string;
  /** Distinct identifiers in submission order, invalid ones included. */
  steamIds: string[];
  options: CheckOptions;
  /** Contents of an uploaded proxy file; preferred over `options.proxyList`. */
  proxyFile?: string;
  submittedAt: string;
}
