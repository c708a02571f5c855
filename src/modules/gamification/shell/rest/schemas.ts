/**
 * Gamification REST API Schemas
 *
 * TypeBox schemas for request/response validation.
 */

import { Type, type Static } from '@sinclair/typebox';

import { CertificateSchema } from '../../core/certificates.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shared
// ─────────────────────────────────────────────────────────────────────────────

const IdSchema = Type.String({ minLength: 1, maxLength: 200 });

/**
 * Free-form JSON object (narrowed to JSON values by the handler).
 */
export const MetadataSchema = Type.Record(Type.String(), Type.Unknown(), {
  description: 'Event metadata',
});

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const XPEventBodySchema = Type.Object(
  {
    id: IdSchema,
    label: Type.String({ maxLength: 500 }),
    points: Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER }),
    metadata: Type.Optional(MetadataSchema),
  },
  { additionalProperties: false }
);

export type XPEventBody = Static<typeof XPEventBodySchema>;

export const XPEventBatchBodySchema = Type.Object(
  {
    events: Type.Array(XPEventBodySchema, { maxItems: 100 }),
  },
  { additionalProperties: false }
);

export type XPEventBatchBody = Static<typeof XPEventBatchBodySchema>;

export const QuestParamsSchema = Type.Object({ questId: IdSchema });
export type QuestParams = Static<typeof QuestParamsSchema>;

export const CourseParamsSchema = Type.Object({ courseId: IdSchema });
export type CourseParams = Static<typeof CourseParamsSchema>;

export const BadgeParamsSchema = Type.Object({ badgeId: IdSchema });
export type BadgeParams = Static<typeof BadgeParamsSchema>;

export const SuggestedQuestsQuerySchema = Type.Object(
  {
    limit: Type.Optional(Type.Integer({ minimum: 0, maximum: 50, default: 3 })),
  },
  { additionalProperties: false }
);

export type SuggestedQuestsQuery = Static<typeof SuggestedQuestsQuerySchema>;

export const PullRequestBodySchema = Type.Object(
  {
    prNumber: Type.Integer({ minimum: 1 }),
    repo: IdSchema,
  },
  { additionalProperties: false }
);

export type PullRequestBody = Static<typeof PullRequestBodySchema>;

export const StarBodySchema = Type.Object({ repo: IdSchema }, { additionalProperties: false });
export type StarBody = Static<typeof StarBodySchema>;

export const ModuleCompletionBodySchema = Type.Object(
  {
    courseId: IdSchema,
    moduleId: IdSchema,
    moduleName: Type.String({ minLength: 1 }),
  },
  { additionalProperties: false }
);

export type ModuleCompletionBody = Static<typeof ModuleCompletionBodySchema>;

export const CourseCompletionBodySchema = Type.Object(
  {
    courseId: IdSchema,
    courseName: Type.String({ minLength: 1 }),
  },
  { additionalProperties: false }
);

export type CourseCompletionBody = Static<typeof CourseCompletionBodySchema>;

export const AssignmentCompletionBodySchema = Type.Object(
  {
    assignmentId: IdSchema,
    assignmentName: Type.String({ minLength: 1 }),
    score: Type.Number(),
    maxScore: Type.Number(),
  },
  { additionalProperties: false }
);

export type AssignmentCompletionBody = Static<typeof AssignmentCompletionBodySchema>;

export const FeedbackBodySchema = Type.Object(
  {
    feedbackId: IdSchema,
    context: Type.String(),
  },
  { additionalProperties: false }
);

export type FeedbackBody = Static<typeof FeedbackBodySchema>;

export const ToolUsageBodySchema = Type.Object(
  {
    tool: IdSchema,
    action: IdSchema,
  },
  { additionalProperties: false }
);

export type ToolUsageBody = Static<typeof ToolUsageBodySchema>;

export const IssueCertificateBodySchema = Type.Object(
  {
    courseId: IdSchema,
    courseName: Type.Optional(Type.String({ minLength: 1 })),
  },
  { additionalProperties: false }
);

export type IssueCertificateBody = Static<typeof IssueCertificateBodySchema>;

export const VerifyCertificateBodySchema = Type.Object(
  {
    certificate: Type.String({ minLength: 1, description: 'Base64-encoded certificate' }),
  },
  { additionalProperties: false }
);

export type VerifyCertificateBody = Static<typeof VerifyCertificateBodySchema>;

export const BackupBodySchema = Type.Object(
  {
    name: Type.Optional(Type.String({ minLength: 1, pattern: '^[A-Za-z0-9._-]+$' })),
  },
  { additionalProperties: false }
);

export type BackupBody = Static<typeof BackupBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ProgressSchema = Type.Object({
  githubUsername: Type.String(),
  xp: Type.Integer(),
  level: Type.Integer(),
  completedEventIds: Type.Array(Type.String()),
  completedQuestIds: Type.Array(Type.String()),
  earnedBadgeIds: Type.Array(Type.String()),
  currentStreak: Type.Integer(),
  longestStreak: Type.Integer(),
  lastActiveDate: Type.Union([Type.String(), Type.Null()]),
  metadata: MetadataSchema,
});

export const StatusSchema = Type.Object({
  githubUsername: Type.String(),
  xp: Type.Integer(),
  level: Type.Integer(),
  xpToNextLevel: Type.Integer(),
  completedQuestCount: Type.Integer(),
  earnedBadgeCount: Type.Integer(),
  currentStreak: Type.Integer(),
  longestStreak: Type.Integer(),
});

export const GamificationResultSchema = Type.Object({
  xpAdded: Type.Integer(),
  level: Type.Integer(),
  levelUp: Type.Boolean(),
  completedQuests: Type.Array(Type.String()),
  earnedBadges: Type.Array(Type.String()),
  message: Type.Union([Type.String(), Type.Null()]),
});

export const QuestSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  description: Type.String(),
  rewardXp: Type.Integer(),
  badgeId: Type.Union([Type.String(), Type.Null()]),
});

export const BadgeSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  description: Type.String(),
  requiredXp: Type.Integer(),
  emoji: Type.String(),
  trigger: Type.Union([Type.Literal('xp'), Type.Literal('quest'), Type.Literal('manual')]),
});

export const BadgeWithProgressSchema = Type.Object({
  ...BadgeSchema.properties,
  earned: Type.Boolean(),
  progress: Type.Number({ minimum: 0, maximum: 1 }),
});

export const GetProgressResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    progress: ProgressSchema,
    status: StatusSchema,
  }),
});

export const ResultResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: GamificationResultSchema,
});

export const GetQuestsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    completed: Type.Array(QuestSchema),
    available: Type.Array(QuestSchema),
    suggested: Type.Array(QuestSchema),
  }),
});

export const VerifyQuestsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    satisfied: Type.Array(Type.String()),
    result: GamificationResultSchema,
  }),
});

export const GetBadgesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    badges: Type.Array(BadgeWithProgressSchema),
    next: Type.Array(BadgeSchema),
  }),
});

export const IssueCertificateResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    certificate: CertificateSchema,
    encoded: Type.String(),
    markdown: Type.String(),
    result: GamificationResultSchema,
  }),
});

export const VerifyCertificateResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    valid: Type.Boolean(),
    certificate: CertificateSchema,
  }),
});

export const CertificateEligibilityResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ courseId: Type.String(), eligible: Type.Boolean() }),
});

export const BackupResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ path: Type.String() }),
});

export const OkResponseSchema = Type.Object({
  ok: Type.Literal(true),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
