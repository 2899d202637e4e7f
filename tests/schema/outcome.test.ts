import { describe, expect, it } from 'vitest';

import {
  describeOutcome,
  durationOutcome,
  errorOutcome,
  isSuccess,
  outcomeSchema,
  timeoutOutcome,
} from '../../src/schema/index.js';

describe('outcomes', () => {
  it('renders each kind on one line', () => {
    expect(describeOutcome(durationOutcome(1.23456))).toBe('1.235s');
    expect(describeOutcome(timeoutOutcome())).toBe('timed out');
    expect(describeOutcome(errorOutcome('page crashed'))).toBe('ERROR: page crashed');
  });

  it('counts only durations as success', () => {
    expect(isSuccess(durationOutcome(0))).toBe(true);
    expect(isSuccess(timeoutOutcome())).toBe(false);
    expect(isSuccess(errorOutcome('x'))).toBe(false);
  });

  it('rejects negative durations and unknown kinds', () => {
    expect(outcomeSchema.safeParse({ kind: 'duration', seconds: -1 }).success).toBe(false);
    expect(outcomeSchema.safeParse({ kind: 'skipped' }).success).toBe(false);
  });
});
