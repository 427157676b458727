import type { Store } from '../db/store.js';
import type { AppEmoji, ChatPlatform } from '../types/chat.js';
import type { TeamDescription } from '../types/provider.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { BatchReport, runIsolated } from './batch.js';

const log = logger.child({ task: 'sync-teams' });

/**
 * Finds the application emoji named after each team, uploading the logo for
 * teams that have none yet. Returns abbreviation -> emoji id.
 */
async function resolveEmojis(chat: ChatPlatform, teams: TeamDescription[]): Promise<Map<string, string>> {
  const ids = new Map<string, string>();

  let existing: AppEmoji[];
  try {
    existing = await chat.listEmojis();
  } catch (err) {
    // Without the list we cannot tell what exists, so nothing is uploaded this pass.
    log.warn({ err: errorMessage(err) }, 'Could not list application emojis');
    return ids;
  }

  for (const emoji of existing) ids.set(emoji.name, emoji.id);

  for (const team of teams) {
    if (ids.has(team.abbreviation) || !team.logo) continue;
    try {
      const created = await chat.createEmoji(team.abbreviation, team.logo);
      ids.set(team.abbreviation, created.id);
    } catch (err) {
      log.warn({ team: team.abbreviation, err: errorMessage(err) }, 'Could not create team emoji');
    }
  }
  return ids;
}

/**
 * Refreshes display fields of the team catalogue. The abbreviation is the
 * natural key and never changes; an emoji that could not be resolved keeps
 * whatever the team had before.
 */
export async function syncTeams(
  store: Store,
  chat: ChatPlatform,
  teams: TeamDescription[],
): Promise<BatchReport> {
  const report = new BatchReport('sync-teams');
  const emojis = await resolveEmojis(chat, teams);

  await store.transaction(async (tx) => {
    for (const team of teams) {
      await runIsolated(tx, report, team.abbreviation, async (unit) => {
        await unit.upsertTeam({
          id: team.abbreviation,
          name: team.name,
          logo: team.logo,
          color: team.color,
          emojiId: emojis.get(team.abbreviation) ?? null,
        });
      });
    }
  });

  return report;
}
