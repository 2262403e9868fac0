import { describe, expect, it } from 'vitest';
import { throwIfCancelled, withDeadline } from './abort';
import { CancelledError } from '../errors';

describe('withDeadline', () => {
  it('aborts once the timeout expires', async () => {
    const deadline = withDeadline(10);

    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
    deadline.dispose();
  });

  it('follows the caller signal without counting it as a timeout', () => {
    const controller = new AbortController();
    const deadline = withDeadline(1000, controller.signal);

    controller.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });

  it('starts aborted when the caller signal already is', () => {
    const controller = new AbortController();
    controller.abort();

    const deadline = withDeadline(1000, controller.signal);

    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it('stops the timer on dispose', async () => {
    const deadline = withDeadline(10);
    deadline.dispose();

    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(deadline.signal.aborted).toBe(false);
  });
});

describe('throwIfCancelled', () => {
  it('throws only for an aborted signal', () => {
    const controller = new AbortController();

    expect(() => throwIfCancelled(undefined)).not.toThrow();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(CancelledError);
  });
});
