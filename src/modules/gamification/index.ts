/**
 * Gamification Module - Public API
 *
 * XP events, quests, badges, levels, streaks and certificates for the local user.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Badge,
  BadgeResult,
  BadgeTrigger,
  EventResult,
  GamificationResult,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  ProgressStatus,
  Quest,
  QuestResult,
  UserProgress,
  UserQuests,
  XPEvent,
} from './core/types.js';

export {
  ASSIGNMENT_MAX_POINTS,
  CORE_REPO,
  DAILY_STREAK_DAYS,
  EVENT_POINTS,
  ORG_PREFIX,
  ORG_REPO,
  QUEST_EVENT_PREFIX,
  isJsonObject,
  isJsonValue,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CertificateError,
  GamificationError,
  PersistenceError,
  ProgressParseError,
} from './core/errors.js';

export {
  GAMIFICATION_ERROR_HTTP_STATUS,
  InvalidXPEventError,
  createCertificateError,
  createPersistenceError,
  createProgressParseError,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CertificateSigner,
  ProgressStore,
  QuestVerifier,
  QuestVerifiers,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic (Pure Functions)
// ─────────────────────────────────────────────────────────────────────────────

export {
  LEVEL_STEP_AFTER_TABLE,
  LEVEL_THRESHOLDS,
  computeLevel,
  getLevelThreshold,
  getXpToNextLevel,
} from './core/levels.js';

export {
  getAllBadges,
  getAllQuests,
  getBadge,
  getBadgeProgress,
  getNextBadges,
  getQuest,
  getQuestForBadge,
  getSuggestedQuests,
  getUserBadges,
  getUserQuests,
} from './core/catalog.js';

export {
  addUnique,
  createUserProgress,
  findUnknownCatalogIds,
  hasCompletedEvent,
  hasCompletedQuest,
  hasEarnedBadge,
  loadProgress,
  normalizeProgress,
  resetProgress,
  type LoadProgressOptions,
} from './core/progress.js';

export { toIsoDate, updateStreak, type DailyStreak } from './core/streak.js';

export {
  BUILT_IN_VERIFIERS,
  RUN_DAY_EVENT_PREFIX,
  countRunDays,
  findSatisfiedQuests,
  makeDayEventId,
} from './core/quest-verification.js';

export {
  CERTIFICATE_VERSION,
  CertificateSchema,
  canonicalJson,
  createCertificate,
  decodeCertificate,
  encodeCertificate,
  formatCertificateMarkdown,
  hasEarnedCertificate,
  verifyCertificate,
  type Certificate,
  type CreateCertificateOptions,
  type UnsignedCertificate,
} from './core/certificates.js';

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  GamificationService,
  computeAssignmentPoints,
  createGamificationService,
  mergeResults,
  type CreateGamificationServiceDeps,
  type GamificationServiceDeps,
} from './core/gamification-service.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Persistence & Identity
// ─────────────────────────────────────────────────────────────────────────────

export {
  ProgressFileSchema,
  fromProgressFile,
  makeJsonProgressStore,
  toProgressFile,
  type JsonProgressStoreOptions,
  type ProgressFile,
} from './shell/repo/json-progress-store.js';

export { makeHmacCertificateSigner } from './shell/crypto/hmac-signer.js';

export {
  readGitUserName,
  readOsUserName,
  resolveGithubUsername,
  type ResolveUsernameDeps,
} from './shell/identity.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeGamificationRoutes,
  type MakeGamificationRoutesDeps,
} from './shell/rest/routes.js';
