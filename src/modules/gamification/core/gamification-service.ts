/**
 * Gamification Service
 *
 * Applies XP events to the user's progress record, completes quests, awards
 * badges and persists the record after every change. Producer helpers
 * (GitHub, academy, tools) translate domain actions into events and quests.
 *
 * Expected conditions (duplicate events, unknown quest or badge ids) never
 * throw; they return a zero-effect result. A failed save is logged and the
 * in-memory change stands.
 */

import { err, ok, type Result } from 'neverthrow';

import { getAllBadges, getBadge, getQuest, getQuestForBadge } from './catalog.js';
import { InvalidXPEventError, type GamificationError } from './errors.js';
import { computeLevel, getXpToNextLevel } from './levels.js';
import {
  addUnique,
  hasCompletedEvent,
  hasCompletedQuest,
  hasEarnedBadge,
  loadProgress,
  resetProgress,
} from './progress.js';
import {
  BUILT_IN_VERIFIERS,
  countRunDays,
  findSatisfiedQuests,
  makeDayEventId,
} from './quest-verification.js';
import { toIsoDate, updateStreak } from './streak.js';
import {
  ASSIGNMENT_MAX_POINTS,
  CORE_REPO,
  DAILY_STREAK_DAYS,
  EVENT_POINTS,
  ORG_PREFIX,
  ORG_REPO,
  QUEST_EVENT_PREFIX,
  type Badge,
  type BadgeResult,
  type EventResult,
  type GamificationResult,
  type ProgressStatus,
  type Quest,
  type QuestResult,
  type UserProgress,
  type XPEvent,
} from './types.js';

import type { ProgressStore, QuestVerifiers } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GamificationServiceDeps {
  store: ProgressStore;
  logger: Logger;
  progress: UserProgress;
  /** Clock for day guards and streaks; read once per operation */
  now?: () => Date;
}

export interface CreateGamificationServiceDeps {
  store: ProgressStore;
  logger: Logger;
  /** Username for a freshly created record */
  username: string;
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const emptyResult = (level: number, message: string | null = null): GamificationResult => ({
  xpAdded: 0,
  level,
  levelUp: false,
  completedQuests: [],
  earnedBadges: [],
  message,
});

/**
 * Combines the outcome of a follow-up operation into a base result.
 */
export function mergeResults(
  base: GamificationResult,
  extra: GamificationResult
): GamificationResult {
  const messages = [base.message, extra.message].filter(
    (message): message is string => message !== null && message !== ''
  );

  return {
    xpAdded: base.xpAdded + extra.xpAdded,
    level: Math.max(base.level, extra.level),
    levelUp: base.levelUp || extra.levelUp,
    completedQuests: [...base.completedQuests, ...extra.completedQuests],
    earnedBadges: [...base.earnedBadges, ...extra.earnedBadges],
    message: messages.length > 0 ? messages.join(' ') : null,
  };
}

const formatBadges = (badgeIds: string[]): string =>
  badgeIds
    .map((badgeId) => getBadge(badgeId))
    .filter((badge): badge is Badge => badge !== null)
    .map((badge) => `${badge.name} ${badge.emoji}`)
    .join(', ');

/**
 * XP for an assignment: floor(maxPoints × score / maxScore), clamped to [0, maxPoints].
 * A non-positive or non-finite maximum scores zero.
 */
export function computeAssignmentPoints(
  score: number,
  maxScore: number,
  maxPoints: number = ASSIGNMENT_MAX_POINTS
): { points: number; percentage: number } {
  if (!Number.isFinite(score) || !Number.isFinite(maxScore) || maxScore <= 0) {
    return { points: 0, percentage: 0 };
  }

  const percentage = score / maxScore;
  const raw = Math.floor((maxPoints * score) / maxScore);
  return {
    points: Math.min(maxPoints, Math.max(0, raw)),
    percentage,
  };
}

function assertValidEvent(event: XPEvent): void {
  if (event.id === '') {
    throw new InvalidXPEventError(event.id, 'id must not be empty');
  }
  if (!Number.isSafeInteger(event.points) || event.points < 0) {
    throw new InvalidXPEventError(
      event.id,
      `points must be a non-negative safe integer, got ${String(event.points)}`
    );
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

export class GamificationService {
  private progress: UserProgress;
  private changed = false;
  private readonly store: ProgressStore;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: GamificationServiceDeps) {
    this.store = deps.store;
    this.progress = deps.progress;
    this.log = deps.logger.child({ module: 'gamification-service' });
    this.now = deps.now ?? (() => new Date());
  }

  getProgress(): Readonly<UserProgress> {
    return this.progress;
  }

  getStatus(): ProgressStatus {
    const { progress } = this;
    return {
      githubUsername: progress.githubUsername,
      xp: progress.xp,
      level: progress.level,
      xpToNextLevel: getXpToNextLevel(progress.xp),
      completedQuestCount: progress.completedQuestIds.length,
      earnedBadgeCount: progress.earnedBadgeIds.length,
      currentStreak: progress.currentStreak,
      longestStreak: progress.longestStreak,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Events
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Applies an XP event at most once per event id.
   *
   * @throws InvalidXPEventError if the event has an empty id, invalid points,
   * or would push XP past Number.MAX_SAFE_INTEGER
   */
  handleEvent(event: XPEvent): EventResult {
    return this.applyEvent(event, this.currentDay());
  }

  /**
   * Applies events in order and aggregates their outcome.
   */
  handleEvents(events: readonly XPEvent[]): GamificationResult {
    const today = this.currentDay();
    const startLevel = this.progress.level;
    let xpAdded = 0;
    const completedQuests: string[] = [];
    const earnedBadges: string[] = [];

    for (const event of events) {
      const result = this.applyEvent(event, today);
      xpAdded += result.xpAdded;
      completedQuests.push(...result.completedQuests);
      earnedBadges.push(...result.earnedBadges);
    }

    const level = this.progress.level;
    const levelUp = level > startLevel;

    const parts: string[] = [];
    if (xpAdded > 0) {
      parts.push(`Earned ${String(xpAdded)} total XP`);
    }
    if (levelUp) {
      parts.push(`Leveled up to level ${String(level)}!`);
    }
    if (earnedBadges.length > 0) {
      parts.push(`Earned badges: ${formatBadges(earnedBadges)}`);
    }

    return {
      xpAdded,
      level,
      levelUp,
      completedQuests,
      earnedBadges,
      message: parts.length > 0 ? parts.join(' ') : null,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Quests & Badges
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Marks a quest complete, pays its reward through the synthetic event
   * "quest-<id>" and grants its badge once the badge's XP requirement is met.
   */
  completeQuest(questId: string): QuestResult {
    return this.applyQuest(questId, this.currentDay());
  }

  /**
   * Grants a badge. Badges are never revoked.
   */
  awardBadge(badgeId: string): BadgeResult {
    const { progress } = this;

    if (hasEarnedBadge(progress, badgeId)) {
      const name = getBadge(badgeId)?.name ?? badgeId;
      return emptyResult(progress.level, `Badge '${name}' was already earned`);
    }

    const badge = getBadge(badgeId);
    if (badge === null) {
      this.log.warn({ badgeId }, `Attempted to award non-existent badge: ${badgeId}`);
      return emptyResult(progress.level, `Badge ${badgeId} not found`);
    }

    addUnique(progress.earnedBadgeIds, badge.id);
    this.log.info({ badgeId: badge.id }, `Awarded badge: ${badge.name} (${badge.emoji})`);
    this.persist();

    return {
      ...emptyResult(progress.level, `Earned badge: ${badge.name} ${badge.emoji}`),
      earnedBadges: [badge.id],
    };
  }

  /**
   * Quests not yet completed whose verifier passes.
   */
  checkQuestCompletion(verifiers: QuestVerifiers = BUILT_IN_VERIFIERS): Quest[] {
    return findSatisfiedQuests(this.progress, verifiers, this.log);
  }

  /**
   * Completes every quest whose verifier passes.
   */
  applyVerifiedQuests(verifiers: QuestVerifiers = BUILT_IN_VERIFIERS): QuestResult {
    const today = this.currentDay();
    return this.checkQuestCompletion(verifiers).reduce<GamificationResult>(
      (result, quest) => mergeResults(result, this.applyQuest(quest.id, today)),
      emptyResult(this.progress.level)
    );
  }

  // ───────────────────────────────────────────────────────────────────────────
  // GitHub Producers
  // ───────────────────────────────────────────────────────────────────────────

  handleGithubPrSubmission(prNumber: number, repo: string): GamificationResult {
    const today = this.currentDay();
    const result = this.applyEvent(
      {
        id: `github-pr-${repo}-${String(prNumber)}`,
        label: `Submitted PR #${String(prNumber)} to ${repo}`,
        points: EVENT_POINTS.githubPrSubmitted,
        metadata: { repo, prNumber },
      },
      today
    );

    if (repo.toLowerCase() === CORE_REPO) {
      return this.withQuest(result, today, 'open-pr');
    }
    return result;
  }

  handleGithubPrMerged(prNumber: number, repo: string): GamificationResult {
    const today = this.currentDay();
    const result = this.applyEvent(
      {
        id: `github-pr-merged-${repo}-${String(prNumber)}`,
        label: `PR #${String(prNumber)} merged into ${repo}`,
        points: EVENT_POINTS.githubPrMerged,
        metadata: { repo, prNumber },
      },
      today
    );

    if (repo.toLowerCase().startsWith(ORG_PREFIX)) {
      return this.withQuest(result, today, 'merged-pr');
    }
    return result;
  }

  handleGithubStar(repo: string): GamificationResult {
    const today = this.currentDay();
    const result = this.applyEvent(
      {
        id: `github-star-${repo}`,
        label: `Starred repository ${repo}`,
        points: EVENT_POINTS.githubStar,
        metadata: { repo },
      },
      today
    );

    const normalized = repo.toLowerCase();
    if (normalized === CORE_REPO) {
      return this.withQuest(result, today, 'star-quackcore');
    }
    if (normalized === ORG_REPO) {
      return this.withQuest(result, today, 'star-quackverse');
    }
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Academy Producers
  // ───────────────────────────────────────────────────────────────────────────

  handleModuleCompletion(
    courseId: string,
    moduleId: string,
    moduleName: string
  ): GamificationResult {
    const today = this.currentDay();
    const result = this.applyEvent(
      {
        id: `academy-module-${courseId}-${moduleId}`,
        label: `Completed module: ${moduleName}`,
        points: EVENT_POINTS.moduleCompleted,
        metadata: { courseId, moduleId, moduleName },
      },
      today
    );

    if (moduleName.toLowerCase().includes('tutorial')) {
      return this.withQuest(result, today, 'complete-tutorial');
    }
    return result;
  }

  handleCourseCompletion(courseId: string, courseName: string): GamificationResult {
    const today = this.currentDay();
    const result = this.applyEvent(
      {
        id: `academy-course-${courseId}`,
        label: `Completed course: ${courseName}`,
        points: EVENT_POINTS.courseCompleted,
        metadata: { courseId, courseName },
      },
      today
    );

    if (hasEarnedBadge(this.progress, 'duck-graduate')) {
      return result;
    }
    return mergeResults(result, this.awardBadge('duck-graduate'));
  }

  handleAssignmentCompletion(
    assignmentId: string,
    assignmentName: string,
    score: number,
    maxScore: number
  ): GamificationResult {
    const today = this.currentDay();
    const { points, percentage } = computeAssignmentPoints(score, maxScore);

    return this.applyEvent(
      {
        id: `academy-assignment-${assignmentId}`,
        label: `Completed assignment: ${assignmentName}`,
        points,
        metadata: {
          assignmentId,
          assignmentName,
          score: Number.isFinite(score) ? score : 0,
          maxScore: Number.isFinite(maxScore) ? maxScore : 0,
          percentage,
        },
      },
      today
    );
  }

  handleFeedbackSubmission(feedbackId: string, context: string): GamificationResult {
    const today = this.currentDay();
    return this.applyEvent(
      {
        id: `feedback-${feedbackId}`,
        label: `Provided feedback: ${context}`,
        points: EVENT_POINTS.feedbackSubmitted,
        metadata: { feedbackId, context },
      },
      today
    );
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Tool Producers
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Awards tool usage once per tool, action and day. Running DuckTyper also
   * records the day guard "run-ducktyper-day-<date>" and drives the
   * run-ducktyper and daily-streak quests.
   */
  handleToolUsage(toolName: string, action: string): GamificationResult {
    const today = this.currentDay();

    let result = this.applyEvent(
      {
        id: `tool-${toolName}-${action}-${today}`,
        label: `Used ${toolName} to ${action}`,
        points: EVENT_POINTS.toolUsed,
        metadata: { tool: toolName, action, date: today },
      },
      today
    );

    if (toolName.toLowerCase() !== 'ducktyper' || action.toLowerCase() !== 'run') {
      return result;
    }

    const dayEventId = makeDayEventId('run-ducktyper', today);
    if (!hasCompletedEvent(this.progress, dayEventId)) {
      this.applyEvent(
        {
          id: dayEventId,
          label: `Used DuckTyper on ${today}`,
          points: 0,
          metadata: { date: today },
        },
        today
      );
    }

    result = this.withQuest(result, today, 'run-ducktyper');

    if (countRunDays(this.progress) >= DAILY_STREAK_DAYS) {
      result = this.withQuest(result, today, 'daily-streak');
    }

    return result;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Persistence
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Saves the record if a previous save failed.
   */
  save(): void {
    if (this.changed) {
      this.persist();
    }
  }

  /**
   * Deletes the persisted record and starts over with an empty one.
   */
  reset(): Result<void, GamificationError> {
    const result = resetProgress(this.store, this.progress.githubUsername);
    if (result.isErr()) {
      this.log.error({ err: result.error }, 'Failed to reset progress');
      return err(result.error);
    }

    this.progress = result.value;
    this.changed = false;
    this.log.info({ path: this.store.location }, 'Reset user progress');
    return ok(undefined);
  }

  /**
   * Saves the record, then copies the persisted file aside.
   * @returns Location of the backup
   */
  backup(name?: string): Result<string, GamificationError> {
    const saved = this.store.save(this.progress);
    if (saved.isErr()) {
      return err(saved.error);
    }
    this.changed = false;
    return this.store.backup(name);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Applies one event; `today` dates the streak update.
   */
  private applyEvent(event: XPEvent, today: string): EventResult {
    assertValidEvent(event);
    const { progress } = this;

    if (hasCompletedEvent(progress, event.id)) {
      this.log.debug({ eventId: event.id }, 'Event already recorded, no XP added');
      return emptyResult(progress.level, 'Event already recorded');
    }

    this.assertXpHeadroom(event.id, event.points);

    const oldLevel = progress.level;

    addUnique(progress.completedEventIds, event.id);
    progress.xp += event.points;
    progress.level = computeLevel(progress.xp);
    this.recordActivity(today);

    const levelUp = progress.level > oldLevel;
    this.log.info({ eventId: event.id, points: event.points }, `Added ${String(event.points)} XP`);
    if (levelUp) {
      this.log.info(
        { from: oldLevel, to: progress.level },
        `Leveled up to level ${String(progress.level)}`
      );
    }

    const earnedBadges = this.awardEligibleBadges();
    this.persist();

    const parts = [`Earned ${String(event.points)} XP from '${event.label}'`];
    if (levelUp) {
      parts.push(`Leveled up to level ${String(progress.level)}!`);
    }
    if (earnedBadges.length > 0) {
      parts.push(`Earned badges: ${formatBadges(earnedBadges)}`);
    }

    return {
      xpAdded: event.points,
      level: progress.level,
      levelUp,
      completedQuests: [],
      earnedBadges,
      message: parts.join(' '),
    };
  }

  private applyQuest(questId: string, today: string): QuestResult {
    const { progress } = this;
    const quest = getQuest(questId);

    if (quest === null) {
      this.log.warn({ questId }, `Attempted to complete non-existent quest: ${questId}`);
      return emptyResult(progress.level, `Quest ${questId} not found`);
    }

    if (hasCompletedQuest(progress, quest.id)) {
      return emptyResult(progress.level, `Quest '${quest.name}' was already completed`);
    }

    const rewardEventId = `${QUEST_EVENT_PREFIX}${quest.id}`;
    if (!hasCompletedEvent(progress, rewardEventId)) {
      this.assertXpHeadroom(rewardEventId, quest.rewardXp);
    }

    const oldLevel = progress.level;
    addUnique(progress.completedQuestIds, quest.id);
    this.log.info({ questId: quest.id }, `Completed quest: ${quest.name}`);

    let xpAdded = 0;
    const earnedBadges: string[] = [];

    if (quest.rewardXp > 0) {
      const rewardResult = this.applyEvent(
        {
          id: rewardEventId,
          label: `Completed quest: ${quest.name}`,
          points: quest.rewardXp,
          metadata: { questId: quest.id },
        },
        today
      );
      xpAdded = rewardResult.xpAdded;
      earnedBadges.push(...rewardResult.earnedBadges);
    }

    if (quest.badgeId !== null && !hasEarnedBadge(progress, quest.badgeId)) {
      const badge = getBadge(quest.badgeId);
      if (badge === null) {
        this.log.warn({ questId: quest.id, badgeId: quest.badgeId }, 'Quest links unknown badge');
      } else if (progress.xp >= badge.requiredXp) {
        earnedBadges.push(...this.awardBadge(badge.id).earnedBadges);
      } else {
        this.log.debug(
          { badgeId: badge.id, requiredXp: badge.requiredXp, xp: progress.xp },
          'Quest badge deferred until XP requirement is met'
        );
      }
    }

    this.persist();

    const levelUp = progress.level > oldLevel;
    const parts = [`Completed quest: ${quest.name}`];
    if (xpAdded > 0) {
      parts.push(`Earned ${String(xpAdded)} XP`);
    }
    if (levelUp) {
      parts.push(`Leveled up to level ${String(progress.level)}!`);
    }
    if (earnedBadges.length > 0) {
      parts.push(`Earned badges: ${formatBadges(earnedBadges)}`);
    }

    return {
      xpAdded,
      level: progress.level,
      levelUp,
      completedQuests: [quest.id],
      earnedBadges,
      message: parts.join(' '),
    };
  }

  /**
   * @throws InvalidXPEventError if adding the points would leave the safe integer range
   */
  private assertXpHeadroom(eventId: string, points: number): void {
    if (points > Number.MAX_SAFE_INTEGER - this.progress.xp) {
      throw new InvalidXPEventError(
        eventId,
        `points would raise XP past ${String(Number.MAX_SAFE_INTEGER)}`
      );
    }
  }

  private currentDay(): string {
    return toIsoDate(this.now());
  }

  private withQuest(
    result: GamificationResult,
    today: string,
    questId: string
  ): GamificationResult {
    if (hasCompletedQuest(this.progress, questId)) {
      return result;
    }
    return mergeResults(result, this.applyQuest(questId, today));
  }

  /**
   * Updates the daily streak for the given day (at most one change per day).
   */
  private recordActivity(today: string): void {
    const { progress } = this;
    const streak = updateStreak(
      {
        currentStreak: progress.currentStreak,
        longestStreak: progress.longestStreak,
        lastActiveDate: progress.lastActiveDate,
      },
      today
    );

    progress.currentStreak = streak.currentStreak;
    progress.longestStreak = streak.longestStreak;
    progress.lastActiveDate = streak.lastActiveDate;
  }

  /**
   * Grants XP badges, and quest badges whose quest is complete, once XP allows.
   * @returns ids of newly earned badges, in catalog order
   */
  private awardEligibleBadges(): string[] {
    const { progress } = this;
    const earned: string[] = [];

    for (const badge of getAllBadges()) {
      if (hasEarnedBadge(progress, badge.id) || progress.xp < badge.requiredXp) {
        continue;
      }

      let eligible = badge.trigger === 'xp';
      if (badge.trigger === 'quest') {
        const quest = getQuestForBadge(badge.id);
        eligible = quest !== null && hasCompletedQuest(progress, quest.id);
      }

      if (eligible && addUnique(progress.earnedBadgeIds, badge.id)) {
        this.log.info({ badgeId: badge.id }, `Awarded badge: ${badge.name} (${badge.emoji})`);
        earned.push(badge.id);
      }
    }

    return earned;
  }

  private persist(): void {
    this.changed = true;
    const saved = this.store.save(this.progress);

    if (saved.isErr()) {
      // In-memory state is kept; a later save() retries.
      this.log.error({ err: saved.error, path: this.store.location }, 'Failed to save progress');
      return;
    }

    this.changed = false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a service over the persisted record, creating the record if needed.
 */
export const createGamificationService = (
  deps: CreateGamificationServiceDeps
): GamificationService => {
  const progress = loadProgress(deps.store, { username: deps.username, logger: deps.logger });
  return new GamificationService({
    store: deps.store,
    logger: deps.logger,
    progress,
    now: deps.now,
  });
};
