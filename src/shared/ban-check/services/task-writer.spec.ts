import { InMemoryTaskRepository } from '@/testing/in-memory-task.repository';
import { PersistenceError } from '../errors/ban-check.errors';
import {
  BanCheckTask,
  CheckResult,
  StatusSummary,
  TaskStatus,
} from '../interfaces/task.interface';
import { computeProgress, summarizeResults, TaskWriter } from './task-writer';

const IDS = ['76561197960287930', '76561198000000001', '76561198000000002'];

function result(steamId: string, statusSummary = StatusSummary.CLEAN): CheckResult {
  return {
    steamId,
    statusSummary,
    details: statusSummary === StatusSummary.CLEAN ? 'No bans detected' : 'x',
    proxyUsed: 'direct',
    batchId: 1,
    attempts: 1,
  };
}

describe('computeProgress', () => {
  it('floors to two decimals and reaches 100 only when everything is resolved', () => {
    expect(computeProgress(1, 3)).toBe(33.33);
    expect(computeProgress(2, 3)).toBe(66.66);
    expect(computeProgress(2999, 3000)).toBe(99.96);
    expect(computeProgress(3, 3)).toBe(100);
    expect(computeProgress(0, 0)).toBe(100);
  });
});

describe('summarizeResults', () => {
  it('counts each status', () => {
    expect(
      summarizeResults([
        result('a', StatusSummary.BANNED),
        result('b', StatusSummary.PRIVATE),
        result('c', StatusSummary.CLEAN),
        result('d', StatusSummary.CLEAN),
        result('e', StatusSummary.ERROR),
      ]),
    ).toBe('Processing complete: 5 checked, 1 banned, 1 private, 2 clean, 1 errors.');
  });
});

describe('TaskWriter', () => {
  let repository: InMemoryTaskRepository;
  let task: BanCheckTask;

  const openWriter = (maxRetries = 2) =>
    new TaskWriter(task, IDS, repository, { maxRetries, baseDelayMs: 0 });

  beforeEach(async () => {
    repository = new InMemoryTaskRepository();
    task = await repository.create({
      taskId: 'task-1',
      ownerId: 'owner-1',
      status: TaskStatus.PENDING,
      message: 'Queued',
      progress: 0,
      totalCount: IDS.length,
      results: [],
      proxyStats: null,
    });
  });

  it('moves a pending task to PROCESSING', async () => {
    const writer = openWriter();

    const snapshot = await writer.markProcessing('Processing 3 ids');

    expect(snapshot).toMatchObject({
      status: TaskStatus.PROCESSING,
      message: 'Processing 3 ids',
      progress: 0,
    });
  });

  it('updates progress per result and completes on the last one', async () => {
    const writer = openWriter();

    expect((await writer.recordResult(result(IDS[0]))).progress).toBe(33.33);
    expect((await writer.recordResult(result(IDS[1]))).status).toBe(TaskStatus.PENDING);
    const done = await writer.recordResult(result(IDS[2], StatusSummary.BANNED));

    expect(done.status).toBe(TaskStatus.COMPLETED);
    expect(done.progress).toBe(100);
    expect(done.message).toBe(
      'Processing complete: 3 checked, 1 banned, 0 private, 2 clean, 0 errors.',
    );
    expect((await repository.findById('task-1'))?.status).toBe(TaskStatus.COMPLETED);
  });

  it('keeps the first result for a repeated identifier', async () => {
    const writer = openWriter();

    await writer.recordResult(result(IDS[0], StatusSummary.BANNED));
    const snapshot = await writer.recordResult(result(IDS[0], StatusSummary.CLEAN));

    expect(snapshot.results).toHaveLength(1);
    expect(snapshot.results[0].statusSummary).toBe(StatusSummary.BANNED);
    expect(snapshot.progress).toBe(33.33);
  });

  it('orders results by submission order once complete', async () => {
    const writer = openWriter();

    await Promise.all([
      writer.recordResult(result(IDS[2])),
      writer.recordResult(result(IDS[0])),
      writer.recordResult(result(IDS[1])),
    ]);

    expect(writer.snapshot().results.map((r) => r.steamId)).toEqual(IDS);
  });

  it('coalesces mutations queued during a write into one save', async () => {
    const writer = openWriter();

    await Promise.all(IDS.map((id) => writer.recordResult(result(id))));

    expect(repository.savedSnapshots).toHaveLength(1);
    expect(repository.savedSnapshots[0].status).toBe(TaskStatus.COMPLETED);
  });

  it('ignores mutations once the task is terminal', async () => {
    const writer = openWriter();
    await writer.fail('Task failed: storage gone');

    const after = await writer.recordResult(result(IDS[0]));

    expect(after.status).toBe(TaskStatus.FAILED);
    expect(after.results).toEqual([]);
    expect(after.progress).toBe(100);
    expect(repository.savedSnapshots).toHaveLength(1);
  });

  it('retries a failed save before giving up', async () => {
    const writer = openWriter(2);
    repository.failNextSaves = 2;

    const snapshot = await writer.recordResult(result(IDS[0]));

    expect(snapshot.results).toHaveLength(1);
    expect(repository.savedSnapshots).toHaveLength(1);
  });

  it('rejects with PersistenceError and keeps the last persisted snapshot when retries run out', async () => {
    const writer = openWriter(1);
    repository.failNextSaves = 2;

    await expect(writer.recordResult(result(IDS[0]))).rejects.toThrow(PersistenceError);
    expect(writer.snapshot().results).toEqual([]);

    const next = await writer.recordResult(result(IDS[1]));
    expect(next.results.map((r) => r.steamId)).toEqual([IDS[1]]);
  });

  it('stamps the tracked proxy stats on every write', async () => {
    const writer = openWriter();
    writer.trackProxyStats(() => ({
      totalProxies: 0,
      enabledProxies: 0,
      directFallbacks: 0,
      proxies: {},
    }));

    const snapshot = await writer.setMessage('Working');

    expect(snapshot.proxyStats).toEqual({
      totalProxies: 0,
      enabledProxies: 0,
      directFallbacks: 0,
      proxies: {},
    });
  });

  it('completes with the current results when asked', async () => {
    const writer = openWriter();
    await writer.recordResult(result(IDS[0]));

    const snapshot = await writer.complete();

    expect(snapshot.status).toBe(TaskStatus.COMPLETED);
    expect(snapshot.progress).toBe(100);
    expect(snapshot.message).toBe(
      'Processing complete: 1 checked, 0 banned, 0 private, 1 clean, 0 errors.',
    );
  });

  it('adopts a task closed by another writer instead of overwriting it', async () => {
    const writer = openWriter();
    await writer.markProcessing('Processing 3 ids');
    const stored = await repository.findById('task-1');
    if (!stored) throw new Error('Task was not created');
    await new TaskWriter(stored, IDS, repository, { maxRetries: 0, baseDelayMs: 0 }).fail(
      'Task abandoned',
    );

    const snapshot = await writer.recordResult(result(IDS[0]));
    await writer.complete();

    expect(snapshot).toMatchObject({
      status: TaskStatus.FAILED,
      message: 'Task abandoned',
      progress: 100,
      results: [],
    });
    expect(writer.closedElsewhere).toBe(true);
    expect(await repository.findById('task-1')).toMatchObject({
      status: TaskStatus.FAILED,
      progress: 100,
      results: [],
    });
    expect(repository.savedSnapshots.map((s) => s.status)).toEqual([
      TaskStatus.PROCESSING,
      TaskStatus.FAILED,
    ]);
  });
});
