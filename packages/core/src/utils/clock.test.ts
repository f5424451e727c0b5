import { MAX_TIMER_DELAY_MS, sleep } from "./clock";

describe("sleep", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("should resolve after the given delay", async () => {
    let done = false;
    const promise = sleep(1000).then(() => { done = true; });

    await jest.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toBe(true);
  });

  it("should wait out delays longer than the timer limit", async () => {
    let done = false;
    const promise = sleep(MAX_TIMER_DELAY_MS + 1000).then(() => { done = true; });

    await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(done).toBe(false);

    await jest.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toBe(true);
  });

  it("should stop a long wait when the signal aborts between chunks", async () => {
    const controller = new AbortController();
    let done = false;
    const promise = sleep(3 * MAX_TIMER_DELAY_MS, controller.signal).then(() => { done = true; });

    await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS + 10);
    expect(done).toBe(false);

    controller.abort();
    await promise;
    expect(done).toBe(true);
    expect(jest.getTimerCount()).toBe(0);
  });

  it("should resolve early when the signal aborts", async () => {
    const controller = new AbortController();
    let done = false;
    const promise = sleep(60_000, controller.signal).then(() => { done = true; });

    controller.abort();
    await promise;

    expect(done).toBe(true);
    expect(jest.getTimerCount()).toBe(0);
  });

  it("should resolve immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await sleep(60_000, controller.signal);

    expect(jest.getTimerCount()).toBe(0);
  });
});
