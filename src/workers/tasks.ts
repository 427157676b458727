import type { Config } from '../config.js';
import type { Store } from '../db/store.js';
import type { BatchReport, BatchSummary } from '../pipeline/batch.js';
import { reconcileGames } from '../pipeline/reconciler.js';
import { ingestSchedule } from '../pipeline/schedule-ingest.js';
import { reconcileTeams } from '../pipeline/team-resolver.js';
import { syncTeams } from '../pipeline/team-sync.js';
import { syncWagers } from '../polls/ledger.js';
import { closePolls, createPolls, openPolls, postResults } from '../polls/lifecycle.js';
import { TASK_NAMES, type TaskName } from '../scheduler/constants.js';
import type { ChatPlatform } from '../types/chat.js';
import type { ScheduleProvider, SecondaryProvider } from '../types/provider.js';
import type { ApiSource } from '../types/source.js';
import { logger } from '../utils/logger.js';

export interface TaskDeps {
  store: Store;
  chat: ChatPlatform;
  scheduleProvider: ScheduleProvider;
  secondaryProvider: SecondaryProvider;
  /** The source key the secondary provider's identifiers are stored under. */
  secondarySource: ApiSource;
  config: Pick<Config, 'SEASON' | 'POLL_WINDOW_DAYS' | 'MATCH_WINDOW_HOURS'>;
}

export type TaskHandler = (now: Date) => Promise<BatchSummary>;

function finish(report: BatchReport): BatchSummary {
  report.log(logger.child({ task: report.task }));
  return report.summary();
}

/**
 * One handler per scheduled task. Provider fetch failures propagate so the
 * job is marked failed; per-item failures only show up in the summary.
 */
export function createTaskHandlers(deps: TaskDeps): Record<TaskName, TaskHandler> {
  const { store, chat, scheduleProvider, secondaryProvider, secondarySource, config } = deps;

  return {
    [TASK_NAMES.SYNC_TEAMS]: async () => {
      const teams = await scheduleProvider.fetchTeams();
      return finish(await syncTeams(store, chat, teams));
    },

    [TASK_NAMES.UPDATE_GAMES]: async () => {
      const rows = await scheduleProvider.fetchSeasonSchedule(config.SEASON);
      return finish(await ingestSchedule(store, rows));
    },

    [TASK_NAMES.RECONCILE_TEAMS]: async () => {
      const rows = await secondaryProvider.fetchTeams();
      return finish(await reconcileTeams(store, secondarySource, rows));
    },

    [TASK_NAMES.RECONCILE_GAMES]: async () => {
      const events = await secondaryProvider.fetchEvents(config.SEASON);
      return finish(await reconcileGames(store, secondarySource, events, config.MATCH_WINDOW_HOURS));
    },

    [TASK_NAMES.CREATE_POLLS]: async (now) => finish(await createPolls(store, now, config.POLL_WINDOW_DAYS)),
    [TASK_NAMES.OPEN_POLLS]: async (now) => finish(await openPolls(store, chat, now)),
    [TASK_NAMES.SYNC_WAGERS]: async () => finish(await syncWagers(store, chat)),
    [TASK_NAMES.CLOSE_POLLS]: async (now) => finish(await closePolls(store, chat, now)),
    [TASK_NAMES.POST_RESULTS]: async (now) => finish(await postResults(store, chat, now)),
  };
}
