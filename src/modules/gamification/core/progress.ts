/**
 * Gamification Module - Progress Record
 *
 * Construction, queries and set-style updates for UserProgress.
 */

import { err, ok, type Result } from 'neverthrow';

import { getBadge, getQuest } from './catalog.js';
import { computeLevel } from './levels.js';

import type { GamificationError } from './errors.js';
import type { ProgressStore } from './ports.js';
import type { UserProgress } from './types.js';
import type { Logger } from 'pino';

/**
 * Creates an empty record for a user.
 */
export function createUserProgress(githubUsername: string): UserProgress {
  return {
    githubUsername,
    xp: 0,
    level: 0,
    completedEventIds: [],
    completedQuestIds: [],
    earnedBadgeIds: [],
    currentStreak: 0,
    longestStreak: 0,
    lastActiveDate: null,
    metadata: {},
  };
}

export const hasCompletedEvent = (progress: Readonly<UserProgress>, eventId: string): boolean =>
  progress.completedEventIds.includes(eventId);

export const hasCompletedQuest = (progress: Readonly<UserProgress>, questId: string): boolean =>
  progress.completedQuestIds.includes(questId);

export const hasEarnedBadge = (progress: Readonly<UserProgress>, badgeId: string): boolean =>
  progress.earnedBadgeIds.includes(badgeId);

/**
 * Appends a value unless already present.
 * @returns true if the list changed
 */
export function addUnique(list: string[], value: string): boolean {
  if (list.includes(value)) {
    return false;
  }
  list.push(value);
  return true;
}

/**
 * Quest and badge ids in a record that the catalogs do not know.
 */
export function findUnknownCatalogIds(progress: Readonly<UserProgress>): {
  questIds: string[];
  badgeIds: string[];
} {
  return {
    questIds: progress.completedQuestIds.filter((id) => getQuest(id) === null),
    badgeIds: progress.earnedBadgeIds.filter((id) => getBadge(id) === null),
  };
}

/**
 * Re-derives the level, drops duplicate ids and drops quest and badge ids
 * missing from the catalogs, for a record read from outside.
 */
export function normalizeProgress(progress: UserProgress): UserProgress {
  const dedupe = (ids: string[]): string[] => Array.from(new Set(ids));

  return {
    ...progress,
    level: computeLevel(progress.xp),
    completedEventIds: dedupe(progress.completedEventIds),
    completedQuestIds: dedupe(progress.completedQuestIds).filter((id) => getQuest(id) !== null),
    earnedBadgeIds: dedupe(progress.earnedBadgeIds).filter((id) => getBadge(id) !== null),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadProgressOptions {
  /** Username for a freshly created record */
  username: string;
  logger: Logger;
}

/**
 * Loads the persisted record, falling back to a new one (saved immediately)
 * when the store is empty or its contents cannot be read. An unreadable
 * record is backed up before it is overwritten.
 */
export function loadProgress(store: ProgressStore, options: LoadProgressOptions): UserProgress {
  const { username, logger } = options;
  const loaded = store.load();

  if (loaded.isOk() && loaded.value !== null) {
    const unknown = findUnknownCatalogIds(loaded.value);
    if (unknown.questIds.length > 0 || unknown.badgeIds.length > 0) {
      logger.warn(
        { questIds: unknown.questIds, badgeIds: unknown.badgeIds, path: store.location },
        'Dropping unknown quest and badge ids from progress'
      );
    }

    const progress = normalizeProgress(loaded.value);
    logger.debug(
      { xp: progress.xp, quests: progress.completedQuestIds.length },
      'Loaded user progress'
    );
    return progress;
  }

  if (loaded.isErr()) {
    logger.warn(
      { err: loaded.error, path: store.location },
      'Could not load progress file, starting fresh'
    );

    const backup = store.backup();
    if (backup.isOk()) {
      logger.warn({ backupPath: backup.value }, 'Backed up unreadable progress file');
    } else {
      logger.warn(
        { err: backup.error, path: store.location },
        'Could not back up unreadable progress file'
      );
    }
  } else {
    logger.debug({ path: store.location }, 'Progress file not found, creating new progress');
  }

  const progress = createUserProgress(username);
  const saved = store.save(progress);
  if (saved.isErr()) {
    logger.error({ err: saved.error, path: store.location }, 'Failed to save new progress');
  }
  return progress;
}

/**
 * Deletes the persisted record and returns a fresh one for the same user.
 */
export function resetProgress(
  store: ProgressStore,
  githubUsername: string
): Result<UserProgress, GamificationError> {
  const reset = store.reset();
  if (reset.isErr()) {
    return err(reset.error);
  }
  return ok(createUserProgress(githubUsername));
}
