/**
 * Gamification Module - Quest & Badge Catalogs
 *
 * Static registries plus read-only queries against a user's progress.
 */

import type { Badge, Quest, UserProgress, UserQuests } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Quests
// ─────────────────────────────────────────────────────────────────────────────

const QUESTS: ReadonlyMap<string, Quest> = new Map(
  (
    [
      {
        id: 'star-quackcore',
        name: 'Star QuackCore',
        description: 'Star the QuackCore repository on GitHub',
        rewardXp: 10,
        badgeId: 'github-collaborator',
      },
      {
        id: 'star-quackverse',
        name: 'Star QuackVerse',
        description: 'Star the QuackVerse organization on GitHub',
        rewardXp: 50,
        badgeId: null,
      },
      {
        id: 'open-pr',
        name: 'Open a PR',
        description: 'Open your first Pull Request to a QuackVerse repository',
        rewardXp: 100,
        badgeId: 'duck-contributor',
      },
      {
        id: 'merged-pr',
        name: 'Merged PR',
        description: 'Get a Pull Request merged into a QuackVerse repository',
        rewardXp: 200,
        badgeId: 'duck-team-player',
      },
      {
        id: 'run-ducktyper',
        name: 'Run DuckTyper',
        description: 'Run the DuckTyper CLI for the first time',
        rewardXp: 10,
        badgeId: null,
      },
      {
        id: 'daily-streak',
        name: 'Daily Streak',
        description: 'Use DuckTyper on three different days',
        rewardXp: 30,
        badgeId: null,
      },
      {
        id: 'complete-tutorial',
        name: 'Complete Tutorial',
        description: 'Complete the DuckTyper tutorial',
        rewardXp: 75,
        badgeId: 'duck-explorer',
      },
    ] satisfies Quest[]
  ).map((quest): [string, Quest] => [quest.id, quest])
);

// ─────────────────────────────────────────────────────────────────────────────
// Badges
// ─────────────────────────────────────────────────────────────────────────────

const BADGES: ReadonlyMap<string, Badge> = new Map(
  (
    [
      {
        id: 'duck-initiate',
        name: 'Duck Initiate',
        description: 'Earn your first 10 XP',
        requiredXp: 10,
        emoji: '🐣',
        trigger: 'xp',
      },
      {
        id: 'duck-novice',
        name: 'Duck Novice',
        description: 'Reach 100 XP',
        requiredXp: 100,
        emoji: '🦆',
        trigger: 'xp',
      },
      {
        id: 'duck-adept',
        name: 'Duck Adept',
        description: 'Reach 500 XP',
        requiredXp: 500,
        emoji: '🎯',
        trigger: 'xp',
      },
      {
        id: 'duck-expert',
        name: 'Duck Expert',
        description: 'Reach 1000 XP',
        requiredXp: 1000,
        emoji: '🏆',
        trigger: 'xp',
      },
      {
        id: 'github-collaborator',
        name: 'GitHub Collaborator',
        description: 'Star the QuackCore repository',
        requiredXp: 10,
        emoji: '⭐',
        trigger: 'quest',
      },
      {
        id: 'duck-contributor',
        name: 'Duck Contributor',
        description: 'Open a Pull Request to a QuackVerse repository',
        requiredXp: 0,
        emoji: '🔧',
        trigger: 'quest',
      },
      {
        id: 'duck-team-player',
        name: 'Duck Team Player',
        description: 'Get a Pull Request merged into a QuackVerse project',
        requiredXp: 0,
        emoji: '🤝',
        trigger: 'quest',
      },
      {
        id: 'duck-explorer',
        name: 'Duck Explorer',
        description: 'Complete the DuckTyper tutorial',
        requiredXp: 0,
        emoji: '🧭',
        trigger: 'quest',
      },
      {
        id: 'duck-graduate',
        name: 'Duck Graduate',
        description: 'Complete a QuackVerse course',
        requiredXp: 0,
        emoji: '🎓',
        trigger: 'manual',
      },
    ] satisfies Badge[]
  ).map((badge): [string, Badge] => [badge.id, badge])
);

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

export const getQuest = (questId: string): Quest | null => QUESTS.get(questId) ?? null;

export const getBadge = (badgeId: string): Badge | null => BADGES.get(badgeId) ?? null;

export const getAllQuests = (): Quest[] => Array.from(QUESTS.values());

export const getAllBadges = (): Badge[] => Array.from(BADGES.values());

/**
 * The quest that grants a badge, if any.
 */
export const getQuestForBadge = (badgeId: string): Quest | null => {
  return getAllQuests().find((quest) => quest.badgeId === badgeId) ?? null;
};

// ─────────────────────────────────────────────────────────────────────────────
// User Queries
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Splits all quests into completed and available for a user.
 */
export function getUserQuests(progress: Readonly<UserProgress>): UserQuests {
  const completed: Quest[] = [];
  const available: Quest[] = [];

  for (const quest of QUESTS.values()) {
    if (progress.completedQuestIds.includes(quest.id)) {
      completed.push(quest);
    } else {
      available.push(quest);
    }
  }

  return { completed, available };
}

/**
 * Unfinished quests ordered by reward (highest first).
 * Ties keep catalog order.
 */
export function getSuggestedQuests(progress: Readonly<UserProgress>, limit = 3): Quest[] {
  return getUserQuests(progress)
    .available.sort((a, b) => b.rewardXp - a.rewardXp)
    .slice(0, Math.max(0, limit));
}

/**
 * Catalog entries for the badges a user holds. Unknown ids are skipped.
 */
export function getUserBadges(progress: Readonly<UserProgress>): Badge[] {
  return progress.earnedBadgeIds
    .map((badgeId) => getBadge(badgeId))
    .filter((badge): badge is Badge => badge !== null);
}

/**
 * Unearned XP badges, closest first.
 */
export function getNextBadges(progress: Readonly<UserProgress>, limit = 3): Badge[] {
  return getAllBadges()
    .filter((badge) => badge.trigger === 'xp' && !progress.earnedBadgeIds.includes(badge.id))
    .sort((a, b) => a.requiredXp - b.requiredXp)
    .slice(0, Math.max(0, limit));
}

/**
 * Progress towards a badge in [0, 1].
 * Earned badges are complete; quest badges count their quest; XP badges count XP.
 */
export function getBadgeProgress(progress: Readonly<UserProgress>, badgeId: string): number {
  const badge = getBadge(badgeId);
  if (badge === null) {
    return 0;
  }
  if (progress.earnedBadgeIds.includes(badgeId)) {
    return 1;
  }

  if (badge.trigger === 'quest') {
    const quest = getQuestForBadge(badgeId);
    if (quest === null || !progress.completedQuestIds.includes(quest.id)) {
      return 0;
    }
  } else if (badge.trigger === 'manual') {
    return 0;
  }

  if (badge.requiredXp <= 0) {
    return 1;
  }
  return Math.min(1, progress.xp / badge.requiredXp);
}
