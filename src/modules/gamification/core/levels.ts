/**
 * Gamification Module - Level Table
 *
 * The only place level thresholds are defined. Levels are always derived from XP.
 */

/**
 * Minimum XP for each level; index = level.
 * 100 XP per level up to level 10, then 200 XP per level up to level 20.
 */
export const LEVEL_THRESHOLDS: readonly number[] = [
  0, 100, 200, 300, 400, 500, 600, 700, 800, 900, 1000, 1200, 1400, 1600, 1800, 2000, 2200,
  2400, 2600, 2800, 3000,
];

const MAX_TABLE_LEVEL = LEVEL_THRESHOLDS.length - 1;
const LAST_THRESHOLD = LEVEL_THRESHOLDS[MAX_TABLE_LEVEL] ?? 0;

/** XP per level past the end of the table */
export const LEVEL_STEP_AFTER_TABLE =
  LAST_THRESHOLD - (LEVEL_THRESHOLDS[MAX_TABLE_LEVEL - 1] ?? 0);

/**
 * Minimum XP needed to reach a level.
 */
export function getLevelThreshold(level: number): number {
  if (level <= 0) {
    return 0;
  }
  if (level <= MAX_TABLE_LEVEL) {
    return LEVEL_THRESHOLDS[level] ?? 0;
  }
  return LAST_THRESHOLD + (level - MAX_TABLE_LEVEL) * LEVEL_STEP_AFTER_TABLE;
}

/**
 * Derives the level for an XP total.
 * Monotonic step function: level 0 at 0 XP, level 1 at 100 XP, ...
 */
export function computeLevel(xp: number): number {
  if (xp >= LAST_THRESHOLD) {
    return MAX_TABLE_LEVEL + Math.floor((xp - LAST_THRESHOLD) / LEVEL_STEP_AFTER_TABLE);
  }

  let level = 0;
  for (let candidate = 1; candidate <= MAX_TABLE_LEVEL; candidate++) {
    if (xp < getLevelThreshold(candidate)) {
      break;
    }
    level = candidate;
  }
  return level;
}

/**
 * XP still missing before the next level.
 */
export function getXpToNextLevel(xp: number): number {
  return getLevelThreshold(computeLevel(xp) + 1) - xp;
}
