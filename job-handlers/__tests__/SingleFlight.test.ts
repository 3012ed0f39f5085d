import { describe, it, expect, vi } from 'vitest';
import SingleFlight from '../SingleFlight';
import { sleep } from '../../shared/util';

describe('SingleFlight', () => {
  it('shares one run between concurrent callers', async () => {
    const flights = new SingleFlight<string>();
    const work = vi.fn(async () => {
      await sleep(10);
      return 'result';
    });

    const first = flights.run('key', work);
    const second = flights.run('key', work);

    expect(second).toBe(first);
    expect(flights.state('key').status).toBe('in_flight');
    expect(await Promise.all([first, second])).toEqual(['result', 'result']);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('runs different keys independently', async () => {
    const flights = new SingleFlight<string>();
    const results = await Promise.all([
      flights.run('a', async () => 'A'),
      flights.run('b', async () => 'B'),
    ]);
    expect(results).toEqual(['A', 'B']);
  });

  it('clears the entry once the flight resolves', async () => {
    const flights = new SingleFlight<number>();
    await flights.run('key', async () => 1);

    expect(flights.state('key')).toEqual({ status: 'idle' });
    expect(flights.size).toBe(0);
    await expect(flights.run('key', async () => 2)).resolves.toBe(2);
  });

  it('clears the entry once the flight rejects', async () => {
    const flights = new SingleFlight<number>();
    const failing = flights.run('key', async () => {
      throw new Error('boom');
    });
    const attached = flights.run('key', async () => 2);

    await expect(failing).rejects.toThrow('boom');
    await expect(attached).rejects.toThrow('boom');
    expect(flights.size).toBe(0);
    await expect(flights.run('key', async () => 3)).resolves.toBe(3);
  });

  it('handles work that throws before returning a promise', async () => {
    const flights = new SingleFlight<number>();
    const failing = flights.run('key', () => {
      throw new Error('sync');
    });

    await expect(failing).rejects.toThrow('sync');
    expect(flights.state('key')).toEqual({ status: 'idle' });
  });
});
