import { KeyedMutex } from './keyed-mutex';

describe('KeyedMutex', () => {
  it('runs tasks on the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive('scan-a', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.runExclusive('scan-a', async () => {
      order.push('second');
    });
    const other = mutex.runExclusive('scan-b', async () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['first:start', 'other']);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
  });

  it('releases the key when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('scan-a', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('scan-a', async () => 'next')).resolves.toBe('next');
  });
});
