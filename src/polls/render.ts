import { pointsLabel } from '../results/grader.js';
import type { ChatMessage, PollDraft, PollOption } from '../types/chat.js';
import type { Game, GameType, GameTypeId, Team, User } from '../types/match.js';
import type { Choice } from '../types/outcome.js';
import { unixSeconds } from '../utils/date.js';

/** Polls stay open an hour past kickoff; closing happens on our side at kickoff. */
const POLL_GRACE_MS = 60 * 60 * 1000;
const DEFAULT_RESULT_COLOR = 0x3498db;

/** Option order of a published poll. Ties are only offered in the regular season. */
export function pollChoices(gameTypeId: GameTypeId): Choice[] {
  return gameTypeId === 'REG' ? ['HOME', 'AWAY', 'TIE'] : ['HOME', 'AWAY'];
}

export function choiceForOption(gameTypeId: GameTypeId, optionIndex: number): Choice | null {
  return pollChoices(gameTypeId)[optionIndex] ?? null;
}

export function teamEmoji(team: Team): string {
  return team.emojiId ? `<:${team.id}:${team.emojiId}>` : '';
}

function joinWords(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join(' ');
}

/** "#E31837" -> 0xE31837 */
export function parseColor(raw: string | null): number | null {
  if (!raw) return null;
  const match = /^#?([0-9a-f]{6})$/i.exec(raw.trim());
  return match?.[1] ? parseInt(match[1], 16) : null;
}

export interface PollContext {
  game: Game;
  home: Team;
  away: Team;
  gameType: GameType;
  factor: number;
}

export function renderPoll({ game, home, away, gameType, factor }: PollContext, now: Date): PollDraft {
  const options: PollOption[] = pollChoices(game.gameTypeId).map((choice) => {
    if (choice === 'HOME') return { text: home.name, emoji: home.emojiId ? { id: home.emojiId } : null };
    if (choice === 'AWAY') return { text: away.name, emoji: away.emojiId ? { id: away.emojiId } : null };
    return { text: 'Tie', emoji: { name: '🤝' } };
  });

  const kickoff = unixSeconds(game.kickoff);
  const lines = [
    `# ${joinWords(teamEmoji(home), home.name, '-', away.name, teamEmoji(away))}`,
    `### 🏈   ${gameType.name}${factor ? ` (Grants you ${pointsLabel(factor)})` : ''}`,
    `### 📅   <t:${kickoff}:F>`,
    `### ⏳   <t:${kickoff}:R>`,
    "-# Polls may close early, so don't vote on the last second",
  ];

  return {
    question: `${home.name} - ${away.name}`,
    options,
    content: lines.join('\n'),
    durationMs: game.kickoff.getTime() - now.getTime() + POLL_GRACE_MS,
  };
}

export function renderResult(
  { game, home, away, gameType, factor }: PollContext,
  winners: User[],
): ChatMessage {
  const winner = game.outcome === 'HOME' ? home : game.outcome === 'AWAY' ? away : null;
  const congrats = winners.length
    ? `GG ${winners.map((u) => `<@${u.id}>`).join(', ')}`
    : 'nobody......... What is wrong with you guys?!';

  return {
    embed: {
      title: '**Final Score**',
      description: `${gameType.name} (${pointsLabel(factor)})`,
      color: parseColor(winner?.color ?? null) ?? DEFAULT_RESULT_COLOR,
      fields: [
        { name: joinWords(teamEmoji(home), home.name), value: String(game.homeScore ?? '-'), inline: true },
        { name: joinWords(teamEmoji(away), away.name), value: String(game.awayScore ?? '-'), inline: true },
        { name: '---------', value: congrats, inline: false },
      ],
      ...(winner ? { thumbnailUrl: winner.logo } : {}),
    },
    mentionUsers: winners.map((u) => u.id),
  };
}

export function renderAnnouncement(roleId: string | null): ChatMessage {
  return {
    content: `New polls are incoming! Good luck everybody${roleId ? ` <@&${roleId}>` : ''}`,
    mentionRoles: roleId ? [roleId] : [],
  };
}
