// Device registration for push notifications
import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from '../app.js';
import { DeviceRegistrationSchema } from '../models/schemas.js';
import { authenticate } from '../security/route-guards.js';
import { AppError } from '../utils/errors.js';

export async function deviceRoutes(server: FastifyInstance, options: RouteOptions) {
  const { devices } = options.services;

  // POST /v1/devices - Register the caller's push token
  server.post('/devices', async (request, reply) => {
    const caller = authenticate(request, reply);
    if (!caller) return reply;

    const parsed = DeviceRegistrationSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.issues);
    }

    const result = await devices.register(caller, parsed.data.token);
    return reply.code(result.created ? 201 : 200).send(result);
  });
}
