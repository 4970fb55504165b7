import { WriteQueue } from './write-queue';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('WriteQueue', () => {
  it('runs tasks sequentially in submission order', async () => {
    const queue = new WriteQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.enqueue(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = queue.enqueue(async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new WriteQueue();

    const failing = queue.enqueue(async () => {
      throw new Error('disk full');
    });
    const next = queue.enqueue(async () => 'ok');

    await expect(failing).rejects.toThrow('disk full');
    expect(await next).toBe('ok');
    await expect(queue.drain()).resolves.toBeUndefined();
  });
});
