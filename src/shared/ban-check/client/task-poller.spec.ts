import { TaskStatus } from '../interfaces/task.interface';
import { PollerState, TaskPoller } from './task-poller';
import { TaskFetchError, TaskFetcher, TaskView } from './task-view';

type Reply = TaskView | Error | Promise<TaskView>;

class FakeTaskFetcher implements TaskFetcher {
  readonly requests: string[] = [];
  private readonly replies: Reply[] = [];

  reply(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async fetchTask(taskId: string): Promise<TaskView> {
    this.requests.push(taskId);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('No scripted reply');
    if (next instanceof Error) throw next;
    return next;
  }
}

function view(status: TaskStatus, progress: number, taskId = 'task-1'): TaskView {
  return {
    taskId,
    ownerId: 'alice',
    status,
    message: status,
    progress,
    totalCount: 2,
    results: [],
    proxyStats: null,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

const rateLimited = () => new TaskFetchError('Fetching task task-1 returned HTTP 429', 429);

describe('TaskPoller', () => {
  let fetcher: FakeTaskFetcher;
  let updates: number[];
  let completed: TaskView[];
  let errors: unknown[];
  let states: PollerState[];
  let poller: TaskPoller;

  beforeEach(() => {
    jest.useFakeTimers();
    fetcher = new FakeTaskFetcher();
    updates = [];
    completed = [];
    errors = [];
    states = [];
    poller = new TaskPoller(
      fetcher,
      {
        onUpdate: (task) => updates.push(task.progress),
        onComplete: (task) => completed.push(task),
        onError: (error) => errors.push(error),
        onStateChange: (state) => states.push(state),
      },
      { baseIntervalMs: 1_000, jitterMs: 500, maxBackoffMs: 5_000, random: () => 0.5 },
    );
  });

  afterEach(() => {
    poller.stop();
    jest.useRealTimers();
  });

  it('polls on a jittered interval until the task is terminal', async () => {
    fetcher.reply(
      view(TaskStatus.PENDING, 0),
      view(TaskStatus.PROCESSING, 50),
      view(TaskStatus.COMPLETED, 100),
    );

    poller.start('task-1');
    await jest.advanceTimersByTimeAsync(0);
    expect(updates).toEqual([0]);

    await jest.advanceTimersByTimeAsync(1_249);
    expect(fetcher.requests).toHaveLength(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(updates).toEqual([0, 50]);

    await jest.advanceTimersByTimeAsync(1_250);
    expect(updates).toEqual([0, 50, 100]);
    expect(completed.map((t) => t.status)).toEqual([TaskStatus.COMPLETED]);
    expect(poller.state).toBe('not_polling');
    expect(poller.hasPendingTimer).toBe(false);
    expect(states).toEqual(['polling', 'not_polling']);
  });

  it('backs off exponentially on 429 and recovers on the next success', async () => {
    fetcher.reply(
      rateLimited(),
      rateLimited(),
      view(TaskStatus.PROCESSING, 50),
      view(TaskStatus.FAILED, 100),
    );

    poller.start('task-1');
    await jest.advanceTimersByTimeAsync(0);
    expect(poller.state).toBe('backing_off');

    await jest.advanceTimersByTimeAsync(2_000);
    expect(fetcher.requests).toHaveLength(2);

    await jest.advanceTimersByTimeAsync(3_999);
    expect(fetcher.requests).toHaveLength(2);
    await jest.advanceTimersByTimeAsync(1);
    expect(poller.state).toBe('polling');
    expect(updates).toEqual([50]);

    await jest.advanceTimersByTimeAsync(1_250);
    expect(completed.map((t) => t.status)).toEqual([TaskStatus.FAILED]);
    expect(states).toEqual(['polling', 'backing_off', 'polling', 'not_polling']);
    expect(errors).toEqual([]);
  });

  it('caps the backoff delay', async () => {
    fetcher.reply(rateLimited(), rateLimited(), rateLimited(), view(TaskStatus.COMPLETED, 100));

    poller.start('task-1');
    await jest.advanceTimersByTimeAsync(0);
    await jest.advanceTimersByTimeAsync(2_000);
    await jest.advanceTimersByTimeAsync(4_000);
    expect(fetcher.requests).toHaveLength(3);

    await jest.advanceTimersByTimeAsync(4_999);
    expect(fetcher.requests).toHaveLength(3);
    await jest.advanceTimersByTimeAsync(1);
    expect(completed).toHaveLength(1);
  });

  it('stops on a missing task and reports the error', async () => {
    const notFound = new TaskFetchError('Fetching task task-1 returned HTTP 404', 404);
    fetcher.reply(notFound);

    poller.start('task-1');
    await jest.advanceTimersByTimeAsync(0);

    expect(errors).toEqual([notFound]);
    expect(poller.state).toBe('not_polling');
    expect(poller.hasPendingTimer).toBe(false);
  });

  it('drops a response that arrives after stop', async () => {
    let respond: (task: TaskView) => void = () => undefined;
    fetcher.reply(new Promise<TaskView>((resolve) => (respond = resolve)));

    poller.start('task-1');
    await jest.advanceTimersByTimeAsync(0);
    poller.stop();
    respond(view(TaskStatus.COMPLETED, 100));
    await jest.advanceTimersByTimeAsync(10_000);

    expect(updates).toEqual([]);
    expect(completed).toEqual([]);
    expect(poller.hasPendingTimer).toBe(false);
  });

  it('switches to a new task on restart', async () => {
    fetcher.reply(view(TaskStatus.PROCESSING, 10), view(TaskStatus.COMPLETED, 100, 'task-2'));

    poller.start('task-1');
    await jest.advanceTimersByTimeAsync(0);
    poller.start('task-2');
    await jest.advanceTimersByTimeAsync(0);

    expect(fetcher.requests).toEqual(['task-1', 'task-2']);
    expect(completed.map((t) => t.taskId)).toEqual(['task-2']);
  });
});
