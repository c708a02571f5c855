/**
 * Progress Store - JSON File Implementation
 *
 * Implements the ProgressStore interface over a single JSON file.
 * The file uses snake_case keys; writes go to a temp file renamed into place.
 */

import fs from 'node:fs';
import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  createPersistenceError,
  createProgressParseError,
  type GamificationError,
} from '../../core/errors.js';
import { isJsonObject, type UserProgress } from '../../core/types.js';

import type { ProgressStore } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// File Schema
// ─────────────────────────────────────────────────────────────────────────────

const IdListSchema = Type.Array(Type.String());

export const ProgressFileSchema = Type.Object({
  github_username: Type.String(),
  xp: Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER }),
  level: Type.Optional(Type.Integer({ minimum: 0 })),
  completed_event_ids: Type.Optional(IdListSchema),
  completed_quest_ids: Type.Optional(IdListSchema),
  earned_badge_ids: Type.Optional(IdListSchema),
  current_streak: Type.Optional(Type.Integer({ minimum: 0 })),
  longest_streak: Type.Optional(Type.Integer({ minimum: 0 })),
  last_active_date: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export type ProgressFile = Static<typeof ProgressFileSchema>;

const validator = TypeCompiler.Compile(ProgressFileSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const toProgressFile = (progress: UserProgress): ProgressFile => ({
  github_username: progress.githubUsername,
  xp: progress.xp,
  level: progress.level,
  completed_event_ids: progress.completedEventIds,
  completed_quest_ids: progress.completedQuestIds,
  earned_badge_ids: progress.earnedBadgeIds,
  current_streak: progress.currentStreak,
  longest_streak: progress.longestStreak,
  last_active_date: progress.lastActiveDate,
  metadata: progress.metadata,
});

export const fromProgressFile = (file: ProgressFile): UserProgress => ({
  githubUsername: file.github_username,
  xp: file.xp,
  level: file.level ?? 0,
  completedEventIds: file.completed_event_ids ?? [],
  completedQuestIds: file.completed_quest_ids ?? [],
  earnedBadgeIds: file.earned_badge_ids ?? [],
  currentStreak: file.current_streak ?? 0,
  longestStreak: file.longest_streak ?? 0,
  lastActiveDate: file.last_active_date ?? null,
  metadata: isJsonObject(file.metadata) ? file.metadata : {},
});

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface JsonProgressStoreOptions {
  filePath: string;
  logger: Logger;
}

class JsonProgressStore implements ProgressStore {
  readonly location: string;
  private readonly log: Logger;

  constructor(options: JsonProgressStoreOptions) {
    this.location = path.resolve(options.filePath);
    this.log = options.logger.child({ module: 'json-progress-store' });
  }

  load(): Result<UserProgress | null, GamificationError> {
    let contents: string;
    try {
      contents = fs.readFileSync(this.location, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return ok(null);
      }
      return err(
        createPersistenceError(
          `Failed to read progress file: ${errorMessage(error)}`,
          this.location,
          error
        )
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      return err(
        createProgressParseError(
          `Progress file is not valid JSON: ${errorMessage(error)}`,
          this.location
        )
      );
    }

    if (!validator.Check(parsed)) {
      const details = [...validator.Errors(parsed)].map(
        (error) => `${error.path || '/'}: ${error.message}`
      );
      return err(
        createProgressParseError('Progress file failed schema validation', this.location, details)
      );
    }

    return ok(fromProgressFile(parsed));
  }

  save(progress: UserProgress): Result<void, GamificationError> {
    const tempPath = `${this.location}.${String(process.pid)}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(toProgressFile(progress), null, 2)}\n`, 'utf8');
      fs.renameSync(tempPath, this.location);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      return err(
        createPersistenceError(
          `Failed to write progress file: ${errorMessage(error)}`,
          this.location,
          error
        )
      );
    }

    this.log.debug({ path: this.location, xp: progress.xp }, 'Saved user progress');
    return ok(undefined);
  }

  reset(): Result<void, GamificationError> {
    try {
      fs.rmSync(this.location, { force: true });
    } catch (error) {
      return err(
        createPersistenceError(
          `Failed to delete progress file: ${errorMessage(error)}`,
          this.location,
          error
        )
      );
    }

    this.log.info({ path: this.location }, 'Deleted progress file');
    return ok(undefined);
  }

  backup(name?: string): Result<string, GamificationError> {
    if (!fs.existsSync(this.location)) {
      return err(createPersistenceError('No progress file to back up', this.location));
    }

    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const fileName = name ?? `${path.basename(this.location, '.json')}.${stamp}.bak.json`;
    const backupPath = path.join(path.dirname(this.location), fileName);

    try {
      fs.copyFileSync(this.location, backupPath);
    } catch (error) {
      return err(
        createPersistenceError(
          `Failed to back up progress file: ${errorMessage(error)}`,
          backupPath,
          error
        )
      );
    }

    this.log.info({ path: backupPath }, 'Backed up progress file');
    return ok(backupPath);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeJsonProgressStore = (options: JsonProgressStoreOptions): ProgressStore => {
  return new JsonProgressStore(options);
};
