// Triage routes: intake assessment, follow-up reassessment, result lookup
import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '../app.js';
import { AssessRequestSchema, FollowUpRequestSchema } from '../models/schemas.js';
import { authenticate } from '../security/route-guards.js';
import { AppError } from '../utils/errors.js';

export async function triageRoutes(server: FastifyInstance, options: RouteOptions) {
  const { workflow } = options.services;

  // POST /v1/triage/assess - Create a visit, score it, queue it, alert on it
  server.post('/triage/assess', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    const parsed = AssessRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.issues);
    }

    const result = await workflow.assess(parsed.data);
    return reply.code(201).send({ ...result, message: 'Triage assessment completed' });
  });

  // POST /v1/triage/follow-up - Reassess an open visit
  server.post('/triage/follow-up', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    const parsed = FollowUpRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.issues);
    }

    const result = await workflow.followUp(parsed.data);
    return { ...result, message: 'Follow-up assessment completed' };
  });

  // GET /v1/triage/result/:visitId - Visit with its latest triage result
  server.get<{ Params: { visitId: string } }>('/triage/result/:visitId', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    return workflow.getResult(request.params.visitId);
  });
}
