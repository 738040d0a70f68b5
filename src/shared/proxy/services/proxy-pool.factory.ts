import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'fs';
import path from 'path';
import { errorMessage } from '@/shared/lib/util';
import { ProxyPool } from '../proxy-pool';
import { parseProxyList } from '../proxy-list.parser';
import type { ProxyPoolPolicy } from '../interfaces/proxy.interface';

export type ProxySource = 'file' | 'list' | 'default' | 'none';

export interface ProxyInputs {
  /** Contents of an uploaded proxy file. */
  file?: string;
  /** Newline-delimited proxies sent as a form or JSON field. */
  list?: string;
}

export interface ResolvedProxies {
  proxies: string[];
  rejected: string[];
  source: ProxySource;
}

@Injectable()
export class ProxyPoolFactory implements OnModuleInit {
  private readonly logger = new Logger(ProxyPoolFactory.name);
  private defaultProxies: string[] = [];
  private defaultRejected: string[] = [];

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const file = this.configService.get<string>('PROXY_LIST_FILE');
    if (!file) return;

    const filePath = path.resolve(process.cwd(), file);
    try {
      const content = await fs.promises.readFile(filePath, 'utf8');
      const { proxies, rejected } = parseProxyList(content);
      this.defaultProxies = proxies;
      this.defaultRejected = rejected;
      this.logger.log(
        `Loaded ${proxies.length} default proxies from ${file}${rejected.length ? ` (${rejected.length} rejected)` : ''}`,
      );
    } catch (error) {
      this.logger.warn(
        `Default proxy file ${filePath} could not be read: ${errorMessage(error)}`,
      );
    }
  }

  get proxyRequired(): boolean {
    return this.configService.get<boolean>('PROXY_REQUIRED') === true;
  }

  get policy(): ProxyPoolPolicy {
    return {
      failureThreshold:
        this.configService.get<number>('PROXY_FAILURE_THRESHOLD') ?? 3,
      cooldownMs: this.configService.get<number>('PROXY_COOLDOWN_MS') ?? 60_000,
      allowDirectFallback:
        this.configService.get<boolean>('PROXY_DIRECT_FALLBACK') ?? true,
    };
  }

  /**
   * An uploaded file wins over the list field, which wins over the default
   * list. `rejected` holds the malformed entries of every source consulted.
   */
  resolve(inputs: ProxyInputs = {}): ResolvedProxies {
    const rejected: string[] = [];

    const fromFile = parseProxyList(inputs.file);
    rejected.push(...fromFile.rejected);
    if (fromFile.proxies.length > 0) {
      return { proxies: fromFile.proxies, rejected, source: 'file' };
    }

    const fromList = parseProxyList(inputs.list);
    rejected.push(...fromList.rejected);
    if (fromList.proxies.length > 0) {
      return { proxies: fromList.proxies, rejected, source: 'list' };
    }

    if (this.defaultProxies.length > 0) {
      return {
        proxies: [...this.defaultProxies],
        rejected: [...rejected, ...this.defaultRejected],
        source: 'default',
      };
    }
    return { proxies: [], rejected, source: 'none' };
  }

  create(uris: readonly string[]): ProxyPool {
    return new ProxyPool(uris, this.policy);
  }
}
