import type { RunReport } from '../types/index.js';
import SchedulerService from './scheduler.service.js';

const emptyRun: RunReport = { reports: [], totals: { mailboxes: 0, failed: 0, yielded: 0 } };

function createIngestion() {
  return { runAll: vi.fn<(names?: string[], options?: { signal?: AbortSignal }) => Promise<RunReport>>() };
}

describe('SchedulerService', () => {
  let ingestion: ReturnType<typeof createIngestion>;
  let scheduler: SchedulerService;

  beforeEach(() => {
    vi.useFakeTimers();
    ingestion = createIngestion();
    ingestion.runAll.mockResolvedValue(emptyRun);
    scheduler = new SchedulerService(ingestion, 60, {
      now: () => new Date('2024-05-06T10:00:00.000Z'),
    });
  });

  afterEach(async () => {
    await scheduler.stop();
    vi.useRealTimers();
  });

  it('runs immediately and then every interval', async () => {
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(ingestion.runAll).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(59_000);
    expect(ingestion.runAll).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(ingestion.runAll).toHaveBeenCalledTimes(2);
  });

  it('ignores a second start', async () => {
    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(ingestion.runAll).toHaveBeenCalledTimes(1);
  });

  it('never overlaps passes', async () => {
    let finish: (report: RunReport) => void = () => {};
    ingestion.runAll.mockImplementationOnce(
      async () =>
        new Promise<RunReport>((resolve) => {
          finish = resolve;
        }),
    );

    scheduler.start();
    await vi.advanceTimersByTimeAsync(300_000);
    expect(ingestion.runAll).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().running).toBe(true);

    finish(emptyRun);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(ingestion.runAll).toHaveBeenCalledTimes(2);
  });

  it('aborts the pass in flight on stop and waits for it', async () => {
    const seen: { signal?: AbortSignal } = {};
    let finish: (report: RunReport) => void = () => {};
    ingestion.runAll.mockImplementationOnce(async (_names, options) => {
      seen.signal = options?.signal;
      return new Promise<RunReport>((resolve) => {
        finish = resolve;
      });
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);

    expect(seen.signal?.aborted).toBe(true);
    expect(stopped).toBe(false);

    finish(emptyRun);
    await stopping;
    expect(stopped).toBe(true);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(ingestion.runAll).toHaveBeenCalledTimes(1);
  });

  it('keeps the last run report', async () => {
    expect(scheduler.getLastRun()).toBeNull();

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(scheduler.getLastRun()).toEqual({
      startedAt: '2024-05-06T10:00:00.000Z',
      finishedAt: '2024-05-06T10:00:00.000Z',
      report: emptyRun,
    });
    expect(scheduler.getStatus()).toMatchObject({ started: true, running: false, runs: 1 });
  });

  it('records a failed pass and keeps scheduling', async () => {
    ingestion.runAll.mockRejectedValueOnce(new Error('Mailbox "x" not found. Available: a'));

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.getLastRun()?.error).toBe('Mailbox "x" not found. Available: a');

    await vi.advanceTimersByTimeAsync(60_000);
    expect(ingestion.runAll).toHaveBeenCalledTimes(2);
    expect(scheduler.getLastRun()?.report).toEqual(emptyRun);
  });
});
