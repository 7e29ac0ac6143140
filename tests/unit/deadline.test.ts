import { Deadline } from '../../src/core/deadline';
import { DeadlineExceededError } from '../../src/core/errors';

describe('Deadline', () => {
  it('is absent when no limit is configured', () => {
    expect(Deadline.after(undefined)).toBeUndefined();
  });

  it('tracks the remaining time against the clock', () => {
    let clock = 1000;
    const deadline = new Deadline(10, () => clock);

    expect(deadline.remainingMs()).toBe(10000);
    expect(() => deadline.assertCanContinue('batch 1', 10000)).not.toThrow();
    expect(() => deadline.assertCanContinue('batch 1', 10001)).toThrow(DeadlineExceededError);

    clock = 11000;
    expect(deadline.isExpired()).toBe(true);
    expect(deadline.remainingMs()).toBe(0);
    expect(() => deadline.assertCanContinue('batch 2')).toThrow('Run deadline of 10s exceeded during batch 2');
  });
});
