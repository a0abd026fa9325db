import { afterEach, describe, expect, it, vi } from 'vitest';
import { keepProcessAlive } from '../../../apps/agent/src/main/keepAlive';

afterEach(() => {
  vi.useRealTimers();
});

describe('keep alive', () => {
  it('holds a timer until released', () => {
    vi.useFakeTimers();

    const hold = keepProcessAlive(1000);
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(5000);
    expect(vi.getTimerCount()).toBe(1);

    hold.release();
    expect(vi.getTimerCount()).toBe(0);
  });
});
