// Doctor routes: queue operations, alerts, consultation notes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOptions } from '../app.js';
import { DoctorNoteInputSchema } from '../models/schemas.js';
import { requireDoctor } from '../security/route-guards.js';
import { AppError } from '../utils/errors.js';

const AlertQuerySchema = z.object({
  include: z.enum(['active', 'all']).default('active'),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export async function doctorRoutes(server: FastifyInstance, options: RouteOptions) {
  const { queue, notifications, notes, patients } = options.services;

  // GET /v1/doctor/queue - Ordered waiting queue with counts
  server.get('/doctor/queue', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    return queue.getStatistics();
  });

  // GET /v1/doctor/statistics - Counts, mean wait and long-wait findings
  server.get('/doctor/statistics', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    const stats = await queue.getStatistics();
    const longWait = await queue.findLongWaiting();
    return {
      totalPatients: stats.totalPatients,
      criticalCount: stats.criticalCount,
      moderateCount: stats.moderateCount,
      normalCount: stats.normalCount,
      averageWaitTime: stats.averageWaitTime,
      longWaitCount: longWait.length,
      longWaitPatients: longWait,
    };
  });

  // GET /v1/doctor/long-wait - Entries past their level's wait threshold
  server.get('/doctor/long-wait', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    const patientsWaiting = await queue.findLongWaiting();
    return { patients: patientsWaiting };
  });

  // POST /v1/doctor/queue/:visitId/call - Call the patient in
  server.post<{ Params: { visitId: string } }>('/doctor/queue/:visitId/call', async (request, reply) => {
    const doctor = requireDoctor(request, reply);
    if (!doctor) return reply;

    const entry = await queue.callPatient(request.params.visitId, doctor.id);
    return { entry };
  });

  // POST /v1/doctor/queue/:visitId/complete - Close the visit
  server.post<{ Params: { visitId: string } }>('/doctor/queue/:visitId/complete', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    const visit = await queue.completeVisit(request.params.visitId);
    return { visit };
  });

  // GET /v1/doctor/alerts - Active alerts (or all, for audit)
  server.get('/doctor/alerts', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    const query = AlertQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw AppError.validationError('Invalid query', query.error.issues);
    }

    const alerts =
      query.data.include === 'all'
        ? await notifications.listAlerts({ limit: query.data.limit })
        : await notifications.getActiveAlerts(query.data.limit);
    return { alerts };
  });

  // POST /v1/doctor/alerts/:id/acknowledge
  server.post<{ Params: { id: string } }>('/doctor/alerts/:id/acknowledge', async (request, reply) => {
    const doctor = requireDoctor(request, reply);
    if (!doctor) return reply;

    return notifications.acknowledge(request.params.id, doctor.id);
  });

  // POST /v1/doctor/notes - Save consultation notes and complete the visit
  server.post('/doctor/notes', async (request, reply) => {
    const doctor = requireDoctor(request, reply);
    if (!doctor) return reply;

    const parsed = DoctorNoteInputSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.issues);
    }

    const saved = await notes.saveNote(parsed.data, doctor);
    return reply.code(201).send(saved);
  });

  // GET /v1/doctor/notes/:visitId
  server.get<{ Params: { visitId: string } }>('/doctor/notes/:visitId', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    return { notes: await notes.getNotes(request.params.visitId) };
  });

  // GET /v1/doctor/patients/:id - Patient details with recent visits
  server.get<{ Params: { id: string } }>('/doctor/patients/:id', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    const patient = await patients.get(request.params.id);
    const visits = await patients.listVisits(patient.id);
    return { patient, visits };
  });
}
