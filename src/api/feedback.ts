/**
 * Feedback endpoints.
 * POST   /feedback      — Create a feedback record
 * GET    /feedback      — List all records (id ascending)
 * GET    /feedback/:id  — Get one record
 * PUT    /feedback/:id  — Replace a record's message
 * DELETE /feedback/:id  — Delete a record
 */

import { parseJsonBody, pipeline } from '../middleware/index.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { Feedback } from '../types/models.js';
import type { DeleteFeedbackResponse, FeedbackResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function toFeedbackResponse(feedback: Feedback): FeedbackResponse {
  return {
    id: feedback.id,
    message: feedback.message,
    created_at: feedback.createdAt.toISOString(),
    updated_at: feedback.updatedAt.toISOString(),
  };
}

/** Router patterns only admit digits, so this is a plain decimal parse. */
function idParam(ctx: HandlerContext): number {
  return Number(ctx.params.id);
}

function json(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

export function createFeedbackHandlers(container: Container) {
  const { feedbackService } = container;

  const create: Handler = pipeline(container.bodyLimit, parseJsonBody)(async (_req, ctx) => {
    const feedback = await feedbackService.create(ctx.body);
    return json(toFeedbackResponse(feedback), 201);
  });

  const list: Handler = async () => {
    const records = await feedbackService.list();
    return json(records.map(toFeedbackResponse), 200);
  };

  const getById: Handler = async (_req, ctx) => {
    const feedback = await feedbackService.getById(idParam(ctx));
    return json(toFeedbackResponse(feedback), 200);
  };

  const update: Handler = pipeline(container.bodyLimit, parseJsonBody)(async (_req, ctx) => {
    const feedback = await feedbackService.update(idParam(ctx), ctx.body);
    return json(toFeedbackResponse(feedback), 200);
  });

  const del: Handler = async (_req, ctx) => {
    const result = await feedbackService.delete(idParam(ctx));
    const body: DeleteFeedbackResponse = {
      ...result,
      message: 'Feedback deleted successfully',
    };
    return json(body, 200);
  };

  return { create, list, getById, update, delete: del };
}
