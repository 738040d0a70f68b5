import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Dispatcher, ProxyAgent, request } from 'undici';
import { errorMessage } from '@/shared/lib/util';
import { TransientExternalError } from '../errors/ban-check.errors';
import {
  IProfileFetcher,
  ProfileFetchRequest,
  ProfileFetchResponse,
} from './profile-fetcher.interface';

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

interface ProxyRoute {
  agent: Dispatcher;
  /** Tasks that have sent a request through the agent and not released it. */
  tasks: Set<string>;
}

/**
 * Fetches profile pages with undici. Proxy agents are shared between the
 * tasks using the same proxy and closed once the last of them is released.
 */
@Injectable()
export class UndiciProfileFetcher implements IProfileFetcher, OnModuleDestroy {
  private readonly logger = new Logger(UndiciProfileFetcher.name);
  private readonly routes = new Map<string, ProxyRoute>();
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = (
      this.configService.get<string>('STEAM_PROFILE_BASE_URL') ||
      'https://steamcommunity.com/profiles'
    ).replace(/\/+$/, '');
    this.timeoutMs =
      this.configService.get<number>('CHECK_REQUEST_TIMEOUT_MS') || 25_000;
  }

  get openAgents(): number {
    return this.routes.size;
  }

  async fetchProfile({
    taskId,
    steamId,
    proxyUri,
    signal,
  }: ProfileFetchRequest): Promise<ProfileFetchResponse> {
    const url = `${this.baseUrl}/${encodeURIComponent(steamId)}`;

    try {
      const response = await request(url, {
        method: 'GET',
        headers: {
          'User-Agent':
            'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
          'Accept-Language': 'en-US,en;q=0.9',
          Accept: 'text/html,application/xhtml+xml',
        },
        dispatcher: proxyUri ? this.agentFor(taskId, proxyUri) : undefined,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        signal,
      });

      const body = await response.body.text();
      return { statusCode: response.statusCode, body };
    } catch (error) {
      if (signal?.aborted) throw signal.reason;

      const code = errorCode(error);
      const via = proxyUri ? ` via ${proxyUri}` : '';
      if (code && TIMEOUT_CODES.has(code)) {
        throw new TransientExternalError(`Timed out${via}`);
      }
      this.logger.debug(`Request for ${steamId} failed${via}: ${errorMessage(error)}`);
      throw new TransientExternalError(
        `${proxyUri ? 'Proxy' : 'Connection'} error${code ? ` (${code})` : ''}${via}: ${errorMessage(error)}`,
      );
    }
  }

  async release(taskId: string): Promise<void> {
    const idle: [string, Dispatcher][] = [];
    for (const [uri, route] of this.routes) {
      route.tasks.delete(taskId);
      if (route.tasks.size === 0) {
        this.routes.delete(uri);
        idle.push([uri, route.agent]);
      }
    }
    await this.closeAgents(idle);
  }

  async onModuleDestroy(): Promise<void> {
    const all = Array.from(this.routes, ([uri, route]): [string, Dispatcher] => [
      uri,
      route.agent,
    ]);
    this.routes.clear();
    await this.closeAgents(all);
  }

  protected createAgent(proxyUri: string): Dispatcher {
    return new ProxyAgent(proxyUri);
  }

  private agentFor(taskId: string, proxyUri: string): Dispatcher {
    let route = this.routes.get(proxyUri);
    if (!route) {
      route = { agent: this.createAgent(proxyUri), tasks: new Set() };
      this.routes.set(proxyUri, route);
    }
    route.tasks.add(taskId);
    return route.agent;
  }

  private async closeAgents(agents: [string, Dispatcher][]): Promise<void> {
    const outcomes = await Promise.allSettled(agents.map(([, agent]) => agent.close()));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        this.logger.warn(
          `Proxy agent for ${agents[index][0]} did not close: ${errorMessage(outcome.reason)}`,
        );
      }
    });
  }
}
