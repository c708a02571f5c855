/**
 * Gamification REST Routes
 *
 * Endpoints over the local user's progress: XP events, quests, badges,
 * producer actions (GitHub, academy, tools), certificates and maintenance.
 */

import {
  AssignmentCompletionBodySchema,
  BackupBodySchema,
  BackupResponseSchema,
  BadgeParamsSchema,
  CertificateEligibilityResponseSchema,
  CourseCompletionBodySchema,
  CourseParamsSchema,
  ErrorResponseSchema,
  FeedbackBodySchema,
  GetBadgesResponseSchema,
  GetProgressResponseSchema,
  GetQuestsResponseSchema,
  IssueCertificateBodySchema,
  IssueCertificateResponseSchema,
  ModuleCompletionBodySchema,
  OkResponseSchema,
  PullRequestBodySchema,
  QuestParamsSchema,
  ResultResponseSchema,
  StarBodySchema,
  SuggestedQuestsQuerySchema,
  ToolUsageBodySchema,
  VerifyCertificateBodySchema,
  VerifyCertificateResponseSchema,
  VerifyQuestsResponseSchema,
  XPEventBatchBodySchema,
  XPEventBodySchema,
  type AssignmentCompletionBody,
  type BackupBody,
  type BadgeParams,
  type CourseCompletionBody,
  type CourseParams,
  type FeedbackBody,
  type IssueCertificateBody,
  type ModuleCompletionBody,
  type PullRequestBody,
  type QuestParams,
  type StarBody,
  type SuggestedQuestsQuery,
  type ToolUsageBody,
  type VerifyCertificateBody,
  type XPEventBatchBody,
  type XPEventBody,
} from './schemas.js';
import {
  getAllBadges,
  getBadgeProgress,
  getNextBadges,
  getSuggestedQuests,
  getUserQuests,
} from '../../core/catalog.js';
import {
  createCertificate,
  decodeCertificate,
  encodeCertificate,
  formatCertificateMarkdown,
  hasEarnedCertificate,
  verifyCertificate,
} from '../../core/certificates.js';
import { InvalidXPEventError, getHttpStatusForError } from '../../core/errors.js';
import { hasEarnedBadge } from '../../core/progress.js';
import { isJsonObject, type GamificationResult, type XPEvent } from '../../core/types.js';

import type { GamificationError } from '../../core/errors.js';
import type { GamificationService } from '../../core/gamification-service.js';
import type { CertificateSigner } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for gamification routes.
 */
export interface MakeGamificationRoutesDeps {
  service: GamificationService;
  signer: CertificateSigner;
  /** Issuer name written into certificates */
  certificateIssuer: string;
}

const BASE_PATH = '/api/v1/gamification';

const RESULT_RESPONSES = {
  200: ResultResponseSchema,
  400: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendDomainError(reply: FastifyReply, error: GamificationError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

/**
 * Runs an engine operation and sends its result.
 * Input contract violations become 400 responses.
 */
function sendResult(reply: FastifyReply, operation: () => GamificationResult) {
  let result: GamificationResult;
  try {
    result = operation();
  } catch (error) {
    if (error instanceof InvalidXPEventError) {
      return reply.status(400).send({
        ok: false,
        error: 'InvalidXPEventError',
        message: error.message,
      });
    }
    throw error;
  }

  return reply.status(200).send({ ok: true, data: result });
}

/**
 * Converts a request body into an engine event.
 * @returns null when metadata holds values that are not JSON
 */
function toXPEvent(body: XPEventBody): XPEvent | null {
  const metadata = body.metadata ?? {};
  if (!isJsonObject(metadata)) {
    return null;
  }
  return { id: body.id, label: body.label, points: body.points, metadata };
}

function sendInvalidMetadata(reply: FastifyReply, eventId: string) {
  return reply.status(400).send({
    ok: false,
    error: 'InvalidXPEventError',
    message: `Invalid XP event '${eventId}': metadata must be a JSON object`,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates gamification REST routes.
 */
export const makeGamificationRoutes = (deps: MakeGamificationRoutesDeps): FastifyPluginAsync => {
  const { service, signer, certificateIssuer } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // Progress
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get(
      `${BASE_PATH}/progress`,
      { schema: { response: { 200: GetProgressResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({
          ok: true,
          data: { progress: service.getProgress(), status: service.getStatus() },
        });
      }
    );

    fastify.delete(
      `${BASE_PATH}/progress`,
      { schema: { response: { 200: OkResponseSchema, 500: ErrorResponseSchema } } },
      async (_request, reply) => {
        const result = service.reset();
        if (result.isErr()) {
          return sendDomainError(reply, result.error);
        }
        return reply.status(200).send({ ok: true });
      }
    );

    fastify.post<{ Body: BackupBody }>(
      `${BASE_PATH}/progress/backup`,
      {
        schema: {
          body: BackupBodySchema,
          response: { 200: BackupResponseSchema, 500: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const result = service.backup(request.body.name);
        if (result.isErr()) {
          return sendDomainError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: { path: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Events
    // ─────────────────────────────────────────────────────────────────────────

    fastify.post<{ Body: XPEventBody }>(
      `${BASE_PATH}/events`,
      { schema: { body: XPEventBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const event = toXPEvent(request.body);
        if (event === null) {
          return sendInvalidMetadata(reply, request.body.id);
        }
        return sendResult(reply, () => service.handleEvent(event));
      }
    );

    fastify.post<{ Body: XPEventBatchBody }>(
      `${BASE_PATH}/events/batch`,
      { schema: { body: XPEventBatchBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const events: XPEvent[] = [];
        for (const body of request.body.events) {
          const event = toXPEvent(body);
          if (event === null) {
            return sendInvalidMetadata(reply, body.id);
          }
          events.push(event);
        }
        return sendResult(reply, () => service.handleEvents(events));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Quests
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Querystring: SuggestedQuestsQuery }>(
      `${BASE_PATH}/quests`,
      {
        schema: {
          querystring: SuggestedQuestsQuerySchema,
          response: { 200: GetQuestsResponseSchema },
        },
      },
      async (request, reply) => {
        const progress = service.getProgress();
        const { completed, available } = getUserQuests(progress);
        return reply.status(200).send({
          ok: true,
          data: {
            completed,
            available,
            suggested: getSuggestedQuests(progress, request.query.limit ?? 3),
          },
        });
      }
    );

    fastify.post<{ Params: QuestParams }>(
      `${BASE_PATH}/quests/:questId/complete`,
      { schema: { params: QuestParamsSchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        return sendResult(reply, () => service.completeQuest(request.params.questId));
      }
    );

    fastify.post(
      `${BASE_PATH}/quests/verify`,
      { schema: { response: { 200: VerifyQuestsResponseSchema } } },
      async (_request, reply) => {
        const satisfied = service.checkQuestCompletion().map((quest) => quest.id);
        const result = service.applyVerifiedQuests();
        return reply.status(200).send({ ok: true, data: { satisfied, result } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Badges
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get(
      `${BASE_PATH}/badges`,
      { schema: { response: { 200: GetBadgesResponseSchema } } },
      async (_request, reply) => {
        const progress = service.getProgress();
        const badges = getAllBadges().map((badge) => ({
          ...badge,
          earned: hasEarnedBadge(progress, badge.id),
          progress: getBadgeProgress(progress, badge.id),
        }));
        return reply.status(200).send({
          ok: true,
          data: { badges, next: getNextBadges(progress) },
        });
      }
    );

    fastify.post<{ Params: BadgeParams }>(
      `${BASE_PATH}/badges/:badgeId/award`,
      { schema: { params: BadgeParamsSchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        return sendResult(reply, () => service.awardBadge(request.params.badgeId));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GitHub
    // ─────────────────────────────────────────────────────────────────────────

    fastify.post<{ Body: PullRequestBody }>(
      `${BASE_PATH}/github/pull-requests`,
      { schema: { body: PullRequestBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { prNumber, repo } = request.body;
        return sendResult(reply, () => service.handleGithubPrSubmission(prNumber, repo));
      }
    );

    fastify.post<{ Body: PullRequestBody }>(
      `${BASE_PATH}/github/pull-requests/merged`,
      { schema: { body: PullRequestBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { prNumber, repo } = request.body;
        return sendResult(reply, () => service.handleGithubPrMerged(prNumber, repo));
      }
    );

    fastify.post<{ Body: StarBody }>(
      `${BASE_PATH}/github/stars`,
      { schema: { body: StarBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        return sendResult(reply, () => service.handleGithubStar(request.body.repo));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Academy
    // ─────────────────────────────────────────────────────────────────────────

    fastify.post<{ Body: ModuleCompletionBody }>(
      `${BASE_PATH}/academy/modules`,
      { schema: { body: ModuleCompletionBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { courseId, moduleId, moduleName } = request.body;
        return sendResult(reply, () =>
          service.handleModuleCompletion(courseId, moduleId, moduleName)
        );
      }
    );

    fastify.post<{ Body: CourseCompletionBody }>(
      `${BASE_PATH}/academy/courses`,
      { schema: { body: CourseCompletionBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { courseId, courseName } = request.body;
        return sendResult(reply, () => service.handleCourseCompletion(courseId, courseName));
      }
    );

    fastify.post<{ Body: AssignmentCompletionBody }>(
      `${BASE_PATH}/academy/assignments`,
      { schema: { body: AssignmentCompletionBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { assignmentId, assignmentName, score, maxScore } = request.body;
        return sendResult(reply, () =>
          service.handleAssignmentCompletion(assignmentId, assignmentName, score, maxScore)
        );
      }
    );

    fastify.post<{ Body: FeedbackBody }>(
      `${BASE_PATH}/feedback`,
      { schema: { body: FeedbackBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { feedbackId, context } = request.body;
        return sendResult(reply, () => service.handleFeedbackSubmission(feedbackId, context));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Tools
    // ─────────────────────────────────────────────────────────────────────────

    fastify.post<{ Body: ToolUsageBody }>(
      `${BASE_PATH}/tools/usage`,
      { schema: { body: ToolUsageBodySchema, response: RESULT_RESPONSES } },
      async (request, reply) => {
        const { tool, action } = request.body;
        return sendResult(reply, () => service.handleToolUsage(tool, action));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Certificates
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Params: CourseParams }>(
      `${BASE_PATH}/certificates/:courseId/eligibility`,
      {
        schema: {
          params: CourseParamsSchema,
          response: { 200: CertificateEligibilityResponseSchema },
        },
      },
      async (request, reply) => {
        const { courseId } = request.params;
        return reply.status(200).send({
          ok: true,
          data: { courseId, eligible: hasEarnedCertificate(service.getProgress(), courseId) },
        });
      }
    );

    fastify.post<{ Body: IssueCertificateBody }>(
      `${BASE_PATH}/certificates`,
      {
        schema: {
          body: IssueCertificateBodySchema,
          response: { 200: IssueCertificateResponseSchema, 400: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const { courseId, courseName } = request.body;

        const created = createCertificate(service.getProgress(), courseId, {
          signer,
          issuer: certificateIssuer,
          ...(courseName !== undefined && { courseName }),
        });
        if (created.isErr()) {
          return sendDomainError(reply, created.error);
        }

        const certificate = created.value;
        const result = service.handleCourseCompletion(courseId, certificate.courseName);

        return reply.status(200).send({
          ok: true,
          data: {
            certificate,
            encoded: encodeCertificate(certificate),
            markdown: formatCertificateMarkdown(certificate),
            result,
          },
        });
      }
    );

    fastify.post<{ Body: VerifyCertificateBody }>(
      `${BASE_PATH}/certificates/verify`,
      {
        schema: {
          body: VerifyCertificateBodySchema,
          response: { 200: VerifyCertificateResponseSchema, 400: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const decoded = decodeCertificate(request.body.certificate);
        if (decoded.isErr()) {
          return sendDomainError(reply, decoded.error);
        }

        const certificate = decoded.value;
        const valid = verifyCertificate(certificate, signer);
        request.log.info(
          { certificateId: certificate.id, recipient: certificate.recipient, valid },
          'Certificate verification'
        );

        return reply.status(200).send({ ok: true, data: { valid, certificate } });
      }
    );
  };
};
