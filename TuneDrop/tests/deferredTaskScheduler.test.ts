import { DeferredTaskScheduler } from '../services/deferredTaskScheduler';
import { runNonCritical } from '../services/nonCritical';

describe('DeferredTaskScheduler', () => {
  let scheduler: DeferredTaskScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    scheduler = new DeferredTaskScheduler();
  });

  afterEach(() => {
    scheduler.cancelAll();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('should run the task once the delay has passed', async () => {
    const task = jest.fn();
    const handle = scheduler.schedule('cleanup', 1_000, task);

    await jest.advanceTimersByTimeAsync(999);
    expect(task).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    await handle.settled;
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingCount).toBe(0);
  });

  it('should log a failing task instead of rejecting', async () => {
    const handle = scheduler.schedule('cleanup', 10, async () => {
      throw new Error('message to delete not found');
    });

    await jest.advanceTimersByTimeAsync(10);
    await expect(handle.settled).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith('[deferredTaskScheduler] Task "cleanup" failed', expect.any(Error));
  });

  it('should not run a cancelled task', async () => {
    const task = jest.fn();
    const handle = scheduler.schedule('cleanup', 10, task);

    handle.cancel();
    await jest.advanceTimersByTimeAsync(100);

    expect(task).not.toHaveBeenCalled();
    await expect(handle.settled).resolves.toBeUndefined();
  });

  it('should drop every pending task on cancelAll', async () => {
    const task = jest.fn();
    scheduler.schedule('a', 10, task);
    scheduler.schedule('b', 20, task);
    expect(scheduler.pendingCount).toBe(2);

    scheduler.cancelAll();
    await jest.advanceTimersByTimeAsync(100);

    expect(scheduler.pendingCount).toBe(0);
    expect(task).not.toHaveBeenCalled();
  });
});

describe('runNonCritical', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass the result through', async () => {
    expect(await runNonCritical('promo', async () => true)).toBe(true);
  });

  it('should swallow and log failures', async () => {
    const result = await runNonCritical('promo', () => {
      throw new Error('chat not found');
    });

    expect(result).toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith('[nonCritical] promo failed', expect.any(Error));
  });
});
