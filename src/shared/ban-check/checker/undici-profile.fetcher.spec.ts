import { ConfigService } from '@nestjs/config';
import {
  Dispatcher,
  getGlobalDispatcher,
  MockAgent,
  setGlobalDispatcher,
} from 'undici';
import { profilePages } from '@/testing/profile-pages';
import { TransientExternalError } from '../errors/ban-check.errors';
import { UndiciProfileFetcher } from './undici-profile.fetcher';

const ORIGIN = 'http://steam.test';
const STEAM_ID = '76561197960287930';
const TASK_ID = 'task-1';
const PROXY = 'http://10.0.0.1:8080';

/** Hands out mock agents in place of proxy agents. */
class MockRoutedFetcher extends UndiciProfileFetcher {
  readonly created: MockAgent[] = [];

  protected createAgent(): Dispatcher {
    const mock = new MockAgent();
    mock.disableNetConnect();
    mock
      .get(ORIGIN)
      .intercept({ path: `/profiles/${STEAM_ID}`, method: 'GET' })
      .reply(200, profilePages.clean())
      .persist();
    this.created.push(mock);
    return mock;
  }
}

describe('UndiciProfileFetcher', () => {
  let previous: Dispatcher;
  let agent: MockAgent;
  let fetcher: UndiciProfileFetcher;

  beforeEach(() => {
    previous = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    fetcher = new UndiciProfileFetcher(
      new ConfigService({ STEAM_PROFILE_BASE_URL: `${ORIGIN}/profiles/` }),
    );
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await agent.close();
    await fetcher.onModuleDestroy();
  });

  it('returns the status code and page body', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `/profiles/${STEAM_ID}`, method: 'GET' })
      .reply(200, profilePages.private());

    await expect(fetcher.fetchProfile({ taskId: TASK_ID, steamId: STEAM_ID, proxyUri: null })).resolves.toEqual({
      statusCode: 200,
      body: profilePages.private(),
    });
  });

  it('hands error statuses back without throwing', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `/profiles/${STEAM_ID}`, method: 'GET' })
      .reply(503, 'busy');

    await expect(fetcher.fetchProfile({ taskId: TASK_ID, steamId: STEAM_ID, proxyUri: null })).resolves.toEqual({
      statusCode: 503,
      body: 'busy',
    });
  });

  it('reports connection failures as transient', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `/profiles/${STEAM_ID}`, method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    await expect(
      fetcher.fetchProfile({ taskId: TASK_ID, steamId: STEAM_ID, proxyUri: null }),
    ).rejects.toThrow(TransientExternalError);
  });

  it('rethrows the abort reason once the task is cancelled', async () => {
    const controller = new AbortController();
    const reason = new Error('task timed out');
    controller.abort(reason);

    await expect(
      fetcher.fetchProfile({ taskId: TASK_ID, steamId: STEAM_ID, proxyUri: null, signal: controller.signal }),
    ).rejects.toBe(reason);
  });

  describe('proxy agents', () => {
    let routed: MockRoutedFetcher;

    beforeEach(() => {
      routed = new MockRoutedFetcher(
        new ConfigService({ STEAM_PROFILE_BASE_URL: `${ORIGIN}/profiles/` }),
      );
    });

    afterEach(async () => {
      await routed.onModuleDestroy();
    });

    it('shares one agent per proxy and closes it when the last task is released', async () => {
      await routed.fetchProfile({ taskId: 'task-a', steamId: STEAM_ID, proxyUri: PROXY });
      await routed.fetchProfile({ taskId: 'task-b', steamId: STEAM_ID, proxyUri: PROXY });

      expect(routed.created).toHaveLength(1);
      const close = jest.spyOn(routed.created[0], 'close');

      await routed.release('task-a');
      expect(close).not.toHaveBeenCalled();
      expect(routed.openAgents).toBe(1);

      await routed.release('task-b');
      expect(close).toHaveBeenCalledTimes(1);
      expect(routed.openAgents).toBe(0);
    });

    it('opens a fresh agent for a proxy reused after release', async () => {
      await routed.fetchProfile({ taskId: 'task-a', steamId: STEAM_ID, proxyUri: PROXY });
      await routed.release('task-a');
      await routed.fetchProfile({ taskId: 'task-b', steamId: STEAM_ID, proxyUri: PROXY });

      expect(routed.created).toHaveLength(2);
      expect(routed.openAgents).toBe(1);
    });

    it('leaves direct requests without an agent to release', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `/profiles/${STEAM_ID}`, method: 'GET' })
        .reply(200, profilePages.clean());

      await routed.fetchProfile({ taskId: 'task-a', steamId: STEAM_ID, proxyUri: null });

      expect(routed.created).toHaveLength(0);
      expect(routed.openAgents).toBe(0);
      await expect(routed.release('task-a')).resolves.toBeUndefined();
    });
  });
});
