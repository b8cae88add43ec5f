import { BackgroundTaskRunner } from '../../src';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('BackgroundTaskRunner', () => {
  let runner: BackgroundTaskRunner;

  beforeEach(() => {
    runner = new BackgroundTaskRunner();
  });

  it('should return before the task completes', async () => {
    let finished = false;

    runner.submit('slow', async () => {
      await delay(10);
      finished = true;
    });

    expect(finished).toBe(false);
    expect(runner.pending).toBe(1);

    await runner.drain();

    expect(finished).toBe(true);
    expect(runner.pending).toBe(0);
  });

  it('should contain a failing task and count it', async () => {
    runner.submit('broken', async () => {
      throw new Error('relay board unplugged');
    });
    runner.submit('fine', async () => undefined);

    await runner.drain();

    expect(runner.getStatistics()).toEqual({ pending: 0, submitted: 2, failed: 1 });
  });

  it('should wait for tasks submitted while draining', async () => {
    const order: string[] = [];

    runner.submit('outer', async () => {
      await delay(5);
      order.push('outer');
      runner.submit('inner', async () => {
        await delay(5);
        order.push('inner');
      });
    });

    await runner.drain();

    expect(order).toEqual(['outer', 'inner']);
    expect(runner.pending).toBe(0);
  });
});
