import { describe, it, expect } from 'vitest';
import { TASK_NAME_LIST, TASK_SCHEDULES, isTaskName } from '../../src/scheduler/constants.js';

describe('task names', () => {
  it('recognises scheduled tasks only', () => {
    expect(isTaskName('close-polls')).toBe(true);
    expect(isTaskName('fetch-source')).toBe(false);
  });

  it('gives every task a schedule', () => {
    expect(TASK_NAME_LIST).toHaveLength(9);
    for (const task of TASK_NAME_LIST) expect(TASK_SCHEDULES[task]).toBeDefined();
  });

  it('checks kickoff-sensitive passes every few seconds', () => {
    expect(TASK_SCHEDULES['open-polls']).toEqual({ every: 10_000 });
    expect(TASK_SCHEDULES['close-polls']).toEqual({ every: 10_000 });
  });
});
