/**
 * Gamification Module - Domain Types
 *
 * Types for XP events, quest/badge catalogs and the persisted user progress record.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** XP awarded per producer action */
export const EVENT_POINTS = {
  githubPrSubmitted: 25,
  githubPrMerged: 50,
  githubStar: 10,
  moduleCompleted: 30,
  courseCompleted: 100,
  feedbackSubmitted: 5,
  toolUsed: 2,
} as const;

/** Maximum XP for a perfect assignment score */
export const ASSIGNMENT_MAX_POINTS = 50;

/** Prefix of the synthetic event that pays out a quest reward */
export const QUEST_EVENT_PREFIX = 'quest-';

/** Day guards needed before the daily-streak quest completes */
export const DAILY_STREAK_DAYS = 3;

/** Repositories that gate GitHub quests */
export const CORE_REPO = 'quackverse/quackcore';
export const ORG_REPO = 'quackverse/quackverse';
export const ORG_PREFIX = 'quackverse/';

// ─────────────────────────────────────────────────────────────────────────────
// JSON Values
// ─────────────────────────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = Record<string, JsonValue>;

/**
 * Narrows an untyped value to a JSON value.
 */
export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
};

/**
 * Narrows an untyped record to a JSON object.
 */
export const isJsonObject = (value: unknown): value is JsonObject => {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value)
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A single scored occurrence submitted to the engine.
 */
export interface XPEvent {
  /** Idempotence key */
  readonly id: string;
  /** Human-readable description */
  readonly label: string;
  /** Non-negative integer XP */
  readonly points: number;
  readonly metadata: Readonly<JsonObject>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Entries
// ─────────────────────────────────────────────────────────────────────────────

export interface Quest {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly rewardXp: number;
  /** Badge granted on completion (null if none) */
  readonly badgeId: string | null;
}

/**
 * How a badge is earned.
 * - xp: automatically once the user's XP reaches requiredXp
 * - quest: when its linked quest completes and XP reaches requiredXp
 * - manual: only through an explicit award
 */
export type BadgeTrigger = 'xp' | 'quest' | 'manual';

export interface Badge {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly requiredXp: number;
  readonly emoji: string;
  readonly trigger: BadgeTrigger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Progress Record
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Mutable progress record for the local user.
 * The id lists have set semantics: no duplicates, never shrink.
 */
export interface UserProgress {
  githubUsername: string;
  xp: number;
  /** Derived from xp, never set by callers */
  level: number;
  completedEventIds: string[];
  completedQuestIds: string[];
  earnedBadgeIds: string[];
  currentStreak: number;
  longestStreak: number;
  /** Last active day (YYYY-MM-DD) */
  lastActiveDate: string | null;
  metadata: JsonObject;
}

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outcome of an engine operation.
 */
export interface GamificationResult {
  xpAdded: number;
  level: number;
  levelUp: boolean;
  completedQuests: string[];
  earnedBadges: string[];
  message: string | null;
}

export type EventResult = GamificationResult;
export type QuestResult = GamificationResult;
export type BadgeResult = GamificationResult;

/**
 * Quests split by completion status.
 */
export interface UserQuests {
  completed: Quest[];
  available: Quest[];
}

/**
 * Summary of the user's standing.
 */
export interface ProgressStatus {
  githubUsername: string;
  xp: number;
  level: number;
  xpToNextLevel: number;
  completedQuestCount: number;
  earnedBadgeCount: number;
  currentStreak: number;
  longestStreak: number;
}
