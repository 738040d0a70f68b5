import { Dispatcher, request } from 'undici';
import { errorMessage } from '@/shared/lib/util';
import {
  isTaskView,
  TaskFetchError,
  TaskFetcher,
  TaskView,
} from './task-view';

export interface HttpTaskFetcherConfig {
  /** API origin, e.g. http://localhost:3000 */
  baseUrl: string;
  apiKey: string;
  ownerId: string;
  ownerRole?: 'admin' | 'user';
  dispatcher?: Dispatcher;
}

export class HttpTaskFetcher implements TaskFetcher {
  private readonly baseUrl: string;

  constructor(private readonly config: HttpTaskFetcherConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async fetchTask(taskId: string, signal?: AbortSignal): Promise<TaskView> {
    const url = `${this.baseUrl}/ban-check/tasks/${encodeURIComponent(taskId)}`;
    const headers: Record<string, string> = {
      accept: 'application/json',
      'x-api-key': this.config.apiKey,
      'x-owner-id': this.config.ownerId,
    };
    if (this.config.ownerRole) headers['x-owner-role'] = this.config.ownerRole;

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'GET',
        headers,
        signal,
        dispatcher: this.config.dispatcher,
      });
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      throw new TaskFetchError(`Request for task ${taskId} failed: ${errorMessage(error)}`);
    }

    if (response.statusCode !== 200) {
      await response.body.dump();
      throw new TaskFetchError(
        `Fetching task ${taskId} returned HTTP ${response.statusCode}`,
        response.statusCode,
      );
    }

    const payload: unknown = await response.body.json();
    if (!isTaskView(payload)) {
      throw new TaskFetchError(`Malformed task payload for ${taskId}`);
    }
    return payload;
  }
}
