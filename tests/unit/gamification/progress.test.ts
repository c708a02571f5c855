/**
 * Progress Record Tests
 */

import { describe, it, expect } from 'vitest';

import {
  addUnique,
  createUserProgress,
  findUnknownCatalogIds,
  loadProgress,
  normalizeProgress,
  resetProgress,
} from '@/modules/gamification/core/progress.js';

import {
  createMockLogger,
  createTestProgress,
  makeFakeProgressStore,
} from '../../fixtures/fakes.js';

describe('createUserProgress', () => {
  it('creates an empty record', () => {
    expect(createUserProgress('duck')).toEqual({
      githubUsername: 'duck',
      xp: 0,
      level: 0,
      completedEventIds: [],
      completedQuestIds: [],
      earnedBadgeIds: [],
      currentStreak: 0,
      longestStreak: 0,
      lastActiveDate: null,
      metadata: {},
    });
  });
});

describe('addUnique', () => {
  it('adds only missing values', () => {
    const list = ['a'];

    expect(addUnique(list, 'b')).toBe(true);
    expect(addUnique(list, 'a')).toBe(false);
    expect(list).toEqual(['a', 'b']);
  });
});

describe('normalizeProgress', () => {
  it('recomputes the level and drops duplicate ids', () => {
    const progress = createTestProgress({
      xp: 250,
      level: 9,
      completedEventIds: ['e1', 'e1', 'e2'],
      earnedBadgeIds: ['duck-novice', 'duck-novice'],
    });

    const normalized = normalizeProgress(progress);

    expect(normalized.level).toBe(2);
    expect(normalized.completedEventIds).toEqual(['e1', 'e2']);
    expect(normalized.earnedBadgeIds).toEqual(['duck-novice']);
  });

  it('drops quest and badge ids missing from the catalogs', () => {
    const progress = createTestProgress({
      completedQuestIds: ['star-quackcore', 'retired-quest'],
      earnedBadgeIds: ['ghost-badge', 'duck-novice'],
    });

    const normalized = normalizeProgress(progress);

    expect(normalized.completedQuestIds).toEqual(['star-quackcore']);
    expect(normalized.earnedBadgeIds).toEqual(['duck-novice']);
  });
});

describe('findUnknownCatalogIds', () => {
  it('lists ids the catalogs do not know', () => {
    const progress = createTestProgress({
      completedQuestIds: ['open-pr', 'retired-quest'],
      earnedBadgeIds: ['ghost-badge'],
    });

    expect(findUnknownCatalogIds(progress)).toEqual({
      questIds: ['retired-quest'],
      badgeIds: ['ghost-badge'],
    });
  });
});

describe('loadProgress', () => {
  it('returns the persisted record with a derived level', () => {
    const store = makeFakeProgressStore({
      progress: createTestProgress({ githubUsername: 'saved', xp: 120, level: 0 }),
    });

    const progress = loadProgress(store, { username: 'ignored', logger: createMockLogger() });

    expect(progress.githubUsername).toBe('saved');
    expect(progress.level).toBe(1);
    expect(store.saveAttempts()).toBe(0);
  });

  it('drops unknown quest and badge ids and logs them', () => {
    const logger = createMockLogger();
    const store = makeFakeProgressStore({
      progress: createTestProgress({
        completedQuestIds: ['open-pr', 'retired-quest'],
        earnedBadgeIds: ['duck-novice', 'ghost-badge'],
      }),
    });

    const progress = loadProgress(store, { username: 'duck', logger });

    expect(progress.completedQuestIds).toEqual(['open-pr']);
    expect(progress.earnedBadgeIds).toEqual(['duck-novice']);
    expect(logger.warn).toHaveBeenCalledWith(
      { questIds: ['retired-quest'], badgeIds: ['ghost-badge'], path: store.location },
      'Dropping unknown quest and badge ids from progress'
    );
  });

  it('does not warn about a record the catalogs fully know', () => {
    const logger = createMockLogger();
    const store = makeFakeProgressStore({
      progress: createTestProgress({ completedQuestIds: ['open-pr'] }),
    });

    loadProgress(store, { username: 'duck', logger });

    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('creates and saves a fresh record when nothing is stored', () => {
    const store = makeFakeProgressStore();

    const progress = loadProgress(store, { username: 'duck', logger: createMockLogger() });

    expect(progress).toEqual(createUserProgress('duck'));
    expect(store.current()).toEqual(createUserProgress('duck'));
  });

  it('starts fresh when the stored record cannot be read', () => {
    const logger = createMockLogger();
    const store = makeFakeProgressStore({ simulateLoadError: true });

    const progress = loadProgress(store, { username: 'duck', logger });

    expect(progress.xp).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path: store.location }),
      'Could not load progress file, starting fresh'
    );
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path: store.location }),
      'Could not back up unreadable progress file'
    );
  });

  it('backs up the unreadable record before overwriting it', () => {
    const logger = createMockLogger();
    const store = makeFakeProgressStore({
      progress: createTestProgress({ xp: 500, completedEventIds: ['e1'] }),
      simulateLoadError: true,
    });

    const progress = loadProgress(store, { username: 'duck', logger });

    expect(store.backupOf('backup-1.json')).toEqual(
      createTestProgress({ xp: 500, completedEventIds: ['e1'] })
    );
    expect(store.current()).toEqual(progress);
    expect(progress).toEqual(createUserProgress('duck'));
    expect(logger.warn).toHaveBeenCalledWith(
      { backupPath: 'memory://backup-1.json' },
      'Backed up unreadable progress file'
    );
  });

  it('logs but returns the fresh record when saving it fails', () => {
    const logger = createMockLogger();
    const store = makeFakeProgressStore({ simulateSaveError: true });

    const progress = loadProgress(store, { username: 'duck', logger });

    expect(progress.githubUsername).toBe('duck');
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ path: store.location }),
      'Failed to save new progress'
    );
  });
});

describe('resetProgress', () => {
  it('deletes the stored record and returns an empty one', () => {
    const store = makeFakeProgressStore({ progress: createTestProgress({ xp: 500 }) });

    const result = resetProgress(store, 'duck');

    expect(result._unsafeUnwrap()).toEqual(createUserProgress('duck'));
    expect(store.current()).toBeNull();
  });

  it('propagates store errors', () => {
    const store = makeFakeProgressStore({ simulateResetError: true });

    const result = resetProgress(store, 'duck');

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe('PersistenceError');
  });
});
