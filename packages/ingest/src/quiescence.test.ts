import { describe, it, expect, vi } from 'vitest';
import { MISSING_SIZE, waitForQuiescence } from './quiescence.js';

function sizes(...values: Array<number | 'missing'>): (path: string) => Promise<number> {
  let index = 0;
  return async () => {
    const value = values[Math.min(index++, values.length - 1)];
    if (value === 'missing') {
      throw Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
    }
    return value;
  };
}

describe('waitForQuiescence', () => {
  it('accepts two equal consecutive samples', async () => {
    const sleep = vi.fn(async () => undefined);

    const result = await waitForQuiescence('doc.pdf', { intervalMs: 300, attempts: 10, sizeOf: sizes(10, 20, 20), sleep });

    expect(result).toEqual({ stable: true, size: 20, samples: 3 });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(300);
  });

  it('gives up after the last attempt with the last size', async () => {
    const sleep = vi.fn(async () => undefined);

    const result = await waitForQuiescence('doc.pdf', { intervalMs: 5, attempts: 3, sizeOf: sizes(1, 2, 3, 3), sleep });

    expect(result).toEqual({ stable: false, size: 3, samples: 3 });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('retries while the file is missing', async () => {
    const result = await waitForQuiescence('doc.pdf', {
      intervalMs: 0,
      attempts: 5,
      sizeOf: sizes('missing', 7, 7),
      sleep: async () => undefined,
    });

    expect(result).toEqual({ stable: true, size: 7, samples: 3 });
  });

  it('reports a file that stays missing', async () => {
    const result = await waitForQuiescence('doc.pdf', {
      intervalMs: 0,
      attempts: 4,
      sizeOf: sizes('missing'),
      sleep: async () => undefined,
    });

    expect(result).toEqual({ stable: true, size: MISSING_SIZE, samples: 2 });
  });
});
