import { describe, it, expect } from 'vitest';
import { Pacer } from '../pacer';
import { VirtualClock } from '../../__tests__/helpers/virtualClock';

describe('Pacer', () => {
  it('lets the first call through without sleeping', async () => {
    const clock = new VirtualClock(5_000);
    const pacer = new Pacer(1_000, clock);

    await pacer.wait();

    expect(clock.sleeps).toEqual([]);
    expect(clock.now()).toBe(5_000);
  });

  it('sleeps only the remainder of the interval', async () => {
    const clock = new VirtualClock();
    const pacer = new Pacer(1_000, clock);

    await pacer.wait();
    clock.advance(200);
    await pacer.wait();

    expect(clock.sleeps).toEqual([800]);
    expect(clock.now()).toBe(1_000);
  });

  it('does not sleep when the interval already elapsed', async () => {
    const clock = new VirtualClock();
    const pacer = new Pacer(1_000, clock);

    await pacer.wait();
    clock.advance(1_500);
    await pacer.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it('counts the interval from the release of the previous call', async () => {
    const clock = new VirtualClock();
    const pacer = new Pacer(1_000, clock);

    await pacer.wait();
    clock.advance(3_000);
    pacer.release();
    await pacer.wait();

    expect(clock.sleeps).toEqual([1_000]);
    expect(clock.now()).toBe(4_000);
  });

  it('starts over after reset', async () => {
    const clock = new VirtualClock();
    const pacer = new Pacer(1_000, clock);

    await pacer.wait();
    pacer.reset();
    await pacer.wait();

    expect(clock.sleeps).toEqual([]);
  });
});
