/**
 * Gamification Module - Quest Verification
 *
 * Predicates deciding whether a quest's condition holds. Quests backed by
 * external systems (GitHub stars, PRs) get their verifiers from the caller.
 */

import { getAllQuests } from './catalog.js';
import { hasCompletedQuest } from './progress.js';
import { DAILY_STREAK_DAYS } from './types.js';

import type { QuestVerifier, QuestVerifiers } from './ports.js';
import type { Quest, UserProgress } from './types.js';
import type { Logger } from 'pino';

/** Prefix of the zero-point guard recorded on each day DuckTyper runs */
export const RUN_DAY_EVENT_PREFIX = 'run-ducktyper-day-';

/**
 * Day-scoped synthetic event id: "<action>-day-<YYYY-MM-DD>".
 */
export const makeDayEventId = (action: string, isoDate: string): string =>
  `${action}-day-${isoDate}`;

/**
 * Number of distinct days on which DuckTyper was run.
 */
export const countRunDays = (progress: Readonly<UserProgress>): number =>
  progress.completedEventIds.filter((id) => id.startsWith(RUN_DAY_EVENT_PREFIX)).length;

export const BUILT_IN_VERIFIERS: QuestVerifiers = {
  'run-ducktyper': (progress) => countRunDays(progress) > 0,
  'daily-streak': (progress) => countRunDays(progress) >= DAILY_STREAK_DAYS,
};

/**
 * Quests not yet completed whose verifier currently passes.
 * A verifier that throws is logged and treated as not satisfied.
 */
export function findSatisfiedQuests(
  progress: Readonly<UserProgress>,
  verifiers: QuestVerifiers,
  logger: Logger
): Quest[] {
  const satisfied: Quest[] = [];

  for (const quest of getAllQuests()) {
    if (hasCompletedQuest(progress, quest.id)) {
      continue;
    }

    const verify: QuestVerifier | undefined = verifiers[quest.id];
    if (verify === undefined) {
      continue;
    }

    try {
      if (verify(progress)) {
        satisfied.push(quest);
      }
    } catch (error) {
      logger.error({ err: error, questId: quest.id }, 'Error verifying quest');
    }
  }

  return satisfied;
}
