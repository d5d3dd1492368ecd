import { withTimeout } from './with-timeout.js';

describe('withTimeout', () => {
  it('returns the value when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toEqual({
      status: 'fulfilled',
      value: 42,
    });
  });

  it('reports rejection without throwing', async () => {
    const error = new Error('boom');
    await expect(withTimeout(Promise.reject(error), 1000)).resolves.toEqual({
      status: 'rejected',
      error,
    });
  });

  it('reports a timeout when the promise is too slow', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 10)).resolves.toEqual({ status: 'timeout' });
  });
});
