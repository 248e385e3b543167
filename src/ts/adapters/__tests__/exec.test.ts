/**
 * Unit tests for timeout handling around external calls
 */

import { withTimeout } from '../exec';

describe('withTimeout', () => {
  test('should pass through a value that settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, () => new Error('late'))).resolves.toBe('ok');
  });

  test('should pass through a rejection that settles in time', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 1000, () => new Error('late'))).rejects.toThrow(
      'refused'
    );
  });

  test('should reject with the timeout error when the call hangs', async () => {
    const hanging = new Promise<string>(() => undefined);

    await expect(withTimeout(hanging, 20, () => new Error('timed out after 20ms'))).rejects.toThrow(
      'timed out after 20ms'
    );
  });
});
