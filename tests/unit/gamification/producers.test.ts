/**
 * Producer Tests
 *
 * GitHub, academy, feedback and tool-usage helpers of the gamification service.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  GamificationService,
  computeAssignmentPoints,
} from '@/modules/gamification/core/gamification-service.js';

import {
  createMockLogger,
  createTestProgress,
  makeFakeProgressStore,
} from '../../fixtures/fakes.js';

import type { UserProgress } from '@/modules/gamification/core/types.js';

const makeService = (progress: UserProgress = createTestProgress()): GamificationService =>
  new GamificationService({
    store: makeFakeProgressStore(),
    logger: createMockLogger(),
    progress,
  });

describe('computeAssignmentPoints', () => {
  it.each([
    [85, 100, 42, 0.85],
    [100, 100, 50, 1],
    [0, 100, 0, 0],
    [1, 3, 16, 1 / 3],
    [150, 100, 50, 1.5],
    [-10, 100, 0, -0.1],
  ])('scores %d of %d as %d points', (score, maxScore, points, percentage) => {
    expect(computeAssignmentPoints(score, maxScore)).toEqual({ points, percentage });
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])(
    'scores zero when the maximum is %d',
    (maxScore) => {
      expect(computeAssignmentPoints(10, maxScore)).toEqual({ points: 0, percentage: 0 });
    }
  );
});

describe('GamificationService producers', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2024, 2, 10, 12));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('GitHub', () => {
    it('completes open-pr for a PR to the core repository', () => {
      const service = makeService();

      const result = service.handleGithubPrSubmission(1, 'quackverse/quackcore');

      expect(result).toEqual({
        xpAdded: 125,
        level: 1,
        levelUp: true,
        completedQuests: ['open-pr'],
        earnedBadges: ['duck-initiate', 'duck-novice', 'duck-contributor'],
        message:
          "Earned 25 XP from 'Submitted PR #1 to quackverse/quackcore' Earned badges: Duck Initiate 🐣 " +
          'Completed quest: Open a PR Earned 100 XP Leveled up to level 1! Earned badges: Duck Novice 🦆, Duck Contributor 🔧',
      });
      expect(service.getProgress().completedEventIds).toEqual([
        'github-pr-quackverse/quackcore-1',
        'quest-open-pr',
      ]);
    });

    it('awards only XP for a PR to another repository', () => {
      const result = makeService().handleGithubPrSubmission(7, 'someone/else');

      expect(result.xpAdded).toBe(25);
      expect(result.completedQuests).toEqual([]);
    });

    it('completes merged-pr for any organization repository', () => {
      const result = makeService().handleGithubPrMerged(3, 'QuackVerse/ducktyper');

      expect(result.xpAdded).toBe(250);
      expect(result.completedQuests).toEqual(['merged-pr']);
      expect(result.earnedBadges).toContain('duck-team-player');
    });

    it('does not repeat the quest for a second PR', () => {
      const service = makeService();
      service.handleGithubPrSubmission(1, 'quackverse/quackcore');

      const result = service.handleGithubPrSubmission(2, 'quackverse/quackcore');

      expect(result.xpAdded).toBe(25);
      expect(result.completedQuests).toEqual([]);
    });

    it('maps stars to the matching quest', () => {
      const service = makeService();

      expect(service.handleGithubStar('quackverse/quackcore').completedQuests).toEqual([
        'star-quackcore',
      ]);
      expect(service.handleGithubStar('quackverse/quackverse').completedQuests).toEqual([
        'star-quackverse',
      ]);
      expect(service.handleGithubStar('octo/cat').completedQuests).toEqual([]);
      expect(service.getProgress().xp).toBe(10 + 10 + 10 + 50 + 10);
    });

    it('awards a star only once per repository', () => {
      const service = makeService();
      service.handleGithubStar('octo/cat');

      expect(service.handleGithubStar('octo/cat').xpAdded).toBe(0);
    });
  });

  describe('academy', () => {
    it('completes the tutorial quest for a tutorial module', () => {
      const result = makeService().handleModuleCompletion('basics', 'intro', 'Getting Started Tutorial');

      expect(result.xpAdded).toBe(105);
      expect(result.completedQuests).toEqual(['complete-tutorial']);
    });

    it('awards only XP for other modules', () => {
      const service = makeService();

      const result = service.handleModuleCompletion('basics', 'types', 'Types');

      expect(result.xpAdded).toBe(30);
      expect(result.message).toBe("Earned 30 XP from 'Completed module: Types' Earned badges: Duck Initiate 🐣");
      expect(service.getProgress().completedEventIds).toEqual(['academy-module-basics-types']);
    });

    it('awards the graduate badge for a course', () => {
      const result = makeService().handleCourseCompletion('basics', 'Basics');

      expect(result).toEqual({
        xpAdded: 100,
        level: 1,
        levelUp: true,
        completedQuests: [],
        earnedBadges: ['duck-initiate', 'duck-novice', 'duck-graduate'],
        message:
          "Earned 100 XP from 'Completed course: Basics' Leveled up to level 1! " +
          'Earned badges: Duck Initiate 🐣, Duck Novice 🦆 Earned badge: Duck Graduate 🎓',
      });
    });

    it('awards the graduate badge only once', () => {
      const service = makeService();
      service.handleCourseCompletion('basics', 'Basics');

      const result = service.handleCourseCompletion('advanced', 'Advanced');

      expect(result.earnedBadges).toEqual([]);
      expect(result.xpAdded).toBe(100);
    });

    it('scales assignment XP by score', () => {
      const service = makeService();

      const result = service.handleAssignmentCompletion('hw1', 'Quiz 1', 85, 100);

      expect(result.xpAdded).toBe(42);
      expect(result.message).toBe(
        "Earned 42 XP from 'Completed assignment: Quiz 1' Earned badges: Duck Initiate 🐣"
      );
      expect(service.getProgress().completedEventIds).toEqual(['academy-assignment-hw1']);
    });

    it('records an assignment with an invalid maximum at zero XP', () => {
      const service = makeService();

      const result = service.handleAssignmentCompletion('hw2', 'Quiz 2', 5, 0);

      expect(result.xpAdded).toBe(0);
      expect(service.getProgress().completedEventIds).toEqual(['academy-assignment-hw2']);
    });
  });

  describe('feedback', () => {
    it('awards feedback XP once per feedback id', () => {
      const service = makeService();

      const first = service.handleFeedbackSubmission('fb-1', 'docs');
      const second = service.handleFeedbackSubmission('fb-1', 'docs');

      expect(first.xpAdded).toBe(5);
      expect(first.message).toBe("Earned 5 XP from 'Provided feedback: docs'");
      expect(second.xpAdded).toBe(0);
    });
  });

  describe('tool usage', () => {
    it('awards other tools once per action and day', () => {
      const service = makeService();

      const first = service.handleToolUsage('linter', 'check');
      const second = service.handleToolUsage('linter', 'check');

      expect(first.xpAdded).toBe(2);
      expect(first.completedQuests).toEqual([]);
      expect(second.xpAdded).toBe(0);
      expect(service.getProgress().completedEventIds).toEqual(['tool-linter-check-2024-03-10']);
    });

    it('completes run-ducktyper on the first run', () => {
      const service = makeService();

      const result = service.handleToolUsage('ducktyper', 'run');

      expect(result).toEqual({
        xpAdded: 12,
        level: 0,
        levelUp: false,
        completedQuests: ['run-ducktyper'],
        earnedBadges: ['duck-initiate'],
        message:
          "Earned 2 XP from 'Used ducktyper to run' Completed quest: Run DuckTyper Earned 10 XP Earned badges: Duck Initiate 🐣",
      });
      expect(service.getProgress().completedEventIds).toEqual([
        'tool-ducktyper-run-2024-03-10',
        'run-ducktyper-day-2024-03-10',
        'quest-run-ducktyper',
      ]);
    });

    it('awards nothing for a second run on the same day', () => {
      const service = makeService();
      service.handleToolUsage('ducktyper', 'run');

      const result = service.handleToolUsage('ducktyper', 'run');

      expect(result.xpAdded).toBe(0);
      expect(result.completedQuests).toEqual([]);
      expect(result.message).toBe('Event already recorded');
      expect(service.getProgress().xp).toBe(12);
    });

    it('completes daily-streak on the third distinct day', () => {
      const service = makeService();

      service.handleToolUsage('ducktyper', 'run');
      vi.setSystemTime(new Date(2024, 2, 11, 12));
      const second = service.handleToolUsage('DuckTyper', 'Run');
      vi.setSystemTime(new Date(2024, 2, 12, 12));
      const third = service.handleToolUsage('ducktyper', 'run');

      expect(second.completedQuests).toEqual([]);
      expect(third).toEqual({
        xpAdded: 32,
        level: 0,
        levelUp: false,
        completedQuests: ['daily-streak'],
        earnedBadges: [],
        message:
          "Earned 2 XP from 'Used ducktyper to run' Completed quest: Daily Streak Earned 30 XP",
      });
      expect(service.getProgress()).toMatchObject({
        xp: 46,
        currentStreak: 3,
        longestStreak: 3,
      });
    });
  });
});
