import { CycleRunner } from '../cycleRunner';
import { InvalidAmountError } from '../../utils/errors';
import { createSilentLogger } from '../../utils/logger';

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('CycleRunner', () => {
  it('should run cycles back to back until stopped', async () => {
    const runner = new CycleRunner(createSilentLogger());
    const seen: number[] = [];

    const cycles = await runner.run(async (cycle) => {
      seen.push(cycle);
      if (cycle === 3) {
        runner.stop();
      }
    }, 0);

    expect(cycles).toBe(3);
    expect(seen).toEqual([1, 2, 3]);
    expect(runner.isRunning).toBe(false);
  });

  it('should finish the current cycle before honouring a stop', async () => {
    const runner = new CycleRunner(createSilentLogger());
    let finished = false;

    const cycles = await runner.run(async () => {
      runner.stop();
      await nextTick();
      finished = true;
    }, 0);

    expect(cycles).toBe(1);
    expect(finished).toBe(true);
  });

  it('should cut the pause short when stopped between cycles', async () => {
    const runner = new CycleRunner(createSilentLogger());
    const task = jest.fn(async () => undefined);

    const done = runner.run(task, 60 * 60 * 1000);
    await nextTick();
    expect(runner.isRunning).toBe(true);
    runner.stop();

    await expect(done).resolves.toBe(1);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should not start a cycle when stopped before running', async () => {
    const runner = new CycleRunner(createSilentLogger());
    const task = jest.fn(async () => undefined);

    runner.stop();

    await expect(runner.run(task, 5)).resolves.toBe(0);
    expect(task).not.toHaveBeenCalled();
    expect(runner.isRunning).toBe(false);
  });

  it('should consume a stop once so the next run goes ahead', async () => {
    const runner = new CycleRunner(createSilentLogger());
    runner.stop();
    await runner.run(async () => undefined, 0);

    const cycles = await runner.run(async (cycle) => {
      if (cycle === 2) {
        runner.stop();
      }
    }, 0);

    expect(cycles).toBe(2);
  });

  it('should keep going after a cycle fails', async () => {
    const logger = createSilentLogger();
    const error = jest.spyOn(logger, 'error');
    const runner = new CycleRunner(logger);

    const cycles = await runner.run(async (cycle) => {
      if (cycle === 1) {
        throw new Error('feed exploded');
      }
      runner.stop();
    }, 0);

    expect(cycles).toBe(2);
    expect(error).toHaveBeenCalledWith('Error in cycle', { cycle: 1, error: 'feed exploded' });
  });

  it('should halt on a contract violation', async () => {
    const runner = new CycleRunner(createSilentLogger());
    const task = jest.fn(async () => {
      throw new InvalidAmountError('Invalid credit amount: -1');
    });

    await expect(runner.run(task, 0)).rejects.toBeInstanceOf(InvalidAmountError);
    expect(task).toHaveBeenCalledTimes(1);
    expect(runner.isRunning).toBe(false);
  });

  it('should refuse to run twice at once', async () => {
    const runner = new CycleRunner(createSilentLogger());
    const first = runner.run(async () => undefined, 60 * 60 * 1000);

    await expect(runner.run(async () => undefined, 0)).rejects.toThrow('Cycle runner is already running');

    runner.stop();
    await first;
  });
});
