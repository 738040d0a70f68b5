import { chunkArray, clamp, errorMessage, sleep, withJitter } from './util';

describe('util', () => {
  it('chunks arrays into fixed-size slices', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunkArray([], 3)).toEqual([]);
  });

  it('clamps into a range', () => {
    expect(clamp(11, 0, 10)).toBe(10);
    expect(clamp(-1, 0, 10)).toBe(0);
    expect(clamp(4, 0, 10)).toBe(4);
  });

  it('applies a jitter factor between 0.5 and 1.5', () => {
    expect(withJitter(1_000, () => 0)).toBe(500);
    expect(withJitter(1_000, () => 0.5)).toBe(1_000);
    expect(withJitter(1_000, () => 0.999)).toBe(1_499);
  });

  it('describes unknown errors', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage('plain')).toBe('plain');
  });

  it('rejects sleep immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));

    await expect(sleep(10_000, controller.signal)).rejects.toThrow('gone');
  });
});
