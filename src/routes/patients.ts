// Patient routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from '../app.js';
import { PatientInputSchema, PatientUpdateSchema } from '../models/schemas.js';
import { authenticate } from '../security/route-guards.js';
import { AppError } from '../utils/errors.js';

const VisitHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export async function patientRoutes(server: FastifyInstance, options: RouteOptions) {
  const { patients } = options.services;

  // POST /v1/patients - Register a patient
  server.post('/patients', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    const parsed = PatientInputSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.issues);
    }

    const patient = await patients.create(parsed.data);
    return reply.code(201).send({ patient });
  });

  // GET /v1/patients/:id - Get a patient
  server.get<{ Params: { id: string } }>('/patients/:id', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    const patient = await patients.get(request.params.id);
    return { patient };
  });

  // PUT /v1/patients/:id - Update a patient
  server.put<{ Params: { id: string } }>('/patients/:id', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    const parsed = PatientUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.issues);
    }

    const patient = await patients.update(request.params.id, parsed.data);
    return { patient };
  });

  // GET /v1/patients/:id/visits - Visit history, latest first
  server.get<{ Params: { id: string } }>('/patients/:id/visits', async (request, reply) => {
    if (!authenticate(request, reply)) return reply;

    const query = VisitHistoryQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw AppError.validationError('Invalid query', query.error.issues);
    }

    const visits = await patients.listVisits(request.params.id, query.data.limit);
    return { visits };
  });
}
