/**
 * Submission API Routes
 * Submissions, their revisions and the data of the submissions page
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { failure, inject, serialize, success, type InjectionContext } from '@kendb/api-fields';
import { MinecraftVersion, Submission, SubmissionRevision } from '@kendb/database';
import { createChildLogger } from '@kendb/shared';
import { idParam, invalidRequest, send } from './respond.js';

const logger = createChildLogger({ component: 'SubmissionsAPI' });

// ===========================================
// Request Validation Schemas
// ===========================================

const submissionParamsSchema = z.object({
  submissionId: idParam,
});

const revisionParamsSchema = z.object({
  revisionId: idParam,
});

const revisionOfSubmissionParamsSchema = z.object({
  submissionId: idParam,
  revisionString: z.string().min(1).max(16),
});

export interface PageContext extends InjectionContext {
  injections: Record<string, string>;
}

export async function submissionsRoutes(app: FastifyInstance): Promise<void> {
  const datamanEndpoint = `${app.prefix}/dataman/MODEL_NAME`;

  /**
   * GET /submissions/
   */
  app.get('/submissions/', async (_request, reply) => {
    const submissions = await Submission.objects.all();
    return send(reply, success({ submissions: submissions.map((submission) => serialize(submission)) }));
  });

  /**
   * GET /submissions/revisions/
   */
  app.get('/submissions/revisions/', async (_request, reply) => {
    const revisions = await SubmissionRevision.objects.all();
    return send(reply, success({ revisions: revisions.map((revision) => serialize(revision)) }));
  });

  /**
   * GET /submissions/revisions/:revisionId
   */
  app.get('/submissions/revisions/:revisionId', async (request, reply) => {
    const params = revisionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return send(reply, invalidRequest(params.error));
    }

    const [revision] = await SubmissionRevision.objects.filter({ pk: params.data.revisionId });
    if (revision === undefined) {
      return send(reply, failure('Revision not found', 404));
    }
    return send(reply, success({ revision: serialize(revision) }));
  });

  /**
   * GET /submissions/page
   * Page data for the submission list
   */
  app.get('/submissions/page', async (_request, reply) => {
    const context = await pageContext(datamanEndpoint);

    const submissions = await Submission.objects.all();
    const latest = await Promise.all(
      submissions.map((submission) => submission.latestRevision({ raiseIfNone: false }))
    );

    await inject(context, submissions, '*', { registry: app.models, dump: true });
    await inject(context, latest, 'basic', { registry: app.models });
    return send(reply, success(context));
  });

  /**
   * GET /submissions/page/:submissionId
   * Page data for one submission and its latest revision
   */
  app.get('/submissions/page/:submissionId', async (request, reply) => {
    const params = submissionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return send(reply, invalidRequest(params.error));
    }

    const [submission] = await Submission.objects.filter({ pk: params.data.submissionId });
    if (submission === undefined) {
      return send(reply, failure('Submission not found', 404));
    }

    const context = await pageContext(datamanEndpoint);
    const latest = await submission.latestRevision({ raiseIfNone: false });
    await inject(context, [submission], '*', { registry: app.models });
    await inject(context, [latest], '*', { registry: app.models });
    return send(reply, success(context));
  });

  /**
   * GET /submissions/:submissionId
   */
  app.get('/submissions/:submissionId', async (request, reply) => {
    const params = submissionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return send(reply, invalidRequest(params.error));
    }

    const [submission] = await Submission.objects.filter({ pk: params.data.submissionId });
    if (submission === undefined) {
      logger.debug({ submissionId: params.data.submissionId }, 'Submission not found');
      return send(reply, failure('Submission not found', 404));
    }
    return send(reply, success({ submission: serialize(submission) }));
  });

  /**
   * GET /submissions/:submissionId/revisions/:revisionString
   */
  app.get('/submissions/:submissionId/revisions/:revisionString', async (request, reply) => {
    const params = revisionOfSubmissionParamsSchema.safeParse(request.params);
    if (!params.success) {
      return send(reply, invalidRequest(params.error));
    }

    const [revision] = await SubmissionRevision.objects.filter({
      revision_of: params.data.submissionId,
      revision_string: params.data.revisionString,
    });
    if (revision === undefined) {
      return send(reply, failure('Revision not found', 404));
    }
    return send(reply, success({ revision: serialize(revision) }));
  });

  /**
   * Context shared by both page variants: every Minecraft version and the
   * endpoint template of the data manager
   */
  async function pageContext(endpoint: string): Promise<PageContext> {
    const context: PageContext = { injections: { 'dataman-endpoint': endpoint } };
    const versions = await MinecraftVersion.objects.all();
    await inject(context, versions, '*', { registry: app.models, dump: true });
    return context;
  }
}
