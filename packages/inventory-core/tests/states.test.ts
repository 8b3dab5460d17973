import { describe, it, expect } from 'vitest';
import { assertTransition, canTransition, JOB_STATE_TRANSITIONS } from '../src/constants';
import { JobTransitionError } from '../src/errors';

describe('Job state transitions', () => {
  it('should allow the forward path', () => {
    expect(canTransition('pending', 'processing')).toBe(true);
    expect(canTransition('processing', 'completed')).toBe(true);
    expect(canTransition('processing', 'failed')).toBe(true);
  });

  it('should allow retry only from failed', () => {
    expect(canTransition('failed', 'pending')).toBe(true);
    expect(canTransition('completed', 'pending')).toBe(false);
    expect(canTransition('processing', 'pending')).toBe(false);
  });

  it('should treat completed as final', () => {
    expect(JOB_STATE_TRANSITIONS.completed).toEqual([]);
  });

  it('should throw a 409 error for forbidden moves', () => {
    try {
      assertTransition('job-1', 'completed', 'pending');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JobTransitionError);
      if (error instanceof JobTransitionError) {
        expect(error.statusCode).toBe(409);
        expect(error.message).toBe('Job job-1 cannot move from completed to pending');
      }
    }
  });
});
