export const QUEUE_NAMES = {
  TASKS: 'pickem-tasks',
} as const;

export const TASK_NAMES = {
  SYNC_TEAMS: 'sync-teams',
  UPDATE_GAMES: 'update-games',
  RECONCILE_TEAMS: 'reconcile-teams',
  RECONCILE_GAMES: 'reconcile-games',
  CREATE_POLLS: 'create-polls',
  OPEN_POLLS: 'open-polls',
  SYNC_WAGERS: 'sync-wagers',
  CLOSE_POLLS: 'close-polls',
  POST_RESULTS: 'post-results',
} as const;

export type TaskName = (typeof TASK_NAMES)[keyof typeof TASK_NAMES];

export const TASK_NAME_LIST: readonly TaskName[] = Object.values(TASK_NAMES);

export function isTaskName(name: string): name is TaskName {
  return TASK_NAME_LIST.some((task) => task === name);
}

export type TaskRepeat = { pattern: string } | { every: number };

/** When each task runs. Cron patterns are evaluated in UTC. */
export const TASK_SCHEDULES: Record<TaskName, TaskRepeat> = {
  [TASK_NAMES.SYNC_TEAMS]: { pattern: '0 6 * * *' },
  [TASK_NAMES.UPDATE_GAMES]: { pattern: '*/5 * * * *' },
  [TASK_NAMES.RECONCILE_TEAMS]: { pattern: '30 6 * * *' },
  [TASK_NAMES.RECONCILE_GAMES]: { pattern: '15 * * * *' },
  [TASK_NAMES.CREATE_POLLS]: { pattern: '*/10 * * * *' },
  [TASK_NAMES.OPEN_POLLS]: { every: 10_000 },
  [TASK_NAMES.SYNC_WAGERS]: { pattern: '*/5 * * * *' },
  [TASK_NAMES.CLOSE_POLLS]: { every: 10_000 },
  [TASK_NAMES.POST_RESULTS]: { every: 30_000 },
};
