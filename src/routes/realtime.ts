// Realtime routes (server-sent events)
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RouteOptions } from '../app.js';
import { requireDoctor } from '../security/route-guards.js';
import { SseListener, type RealtimeChannel } from '../services/realtime/index.js';

export async function realtimeRoutes(server: FastifyInstance, options: RouteOptions) {
  const { hub } = options.services;

  const stream = (channel: RealtimeChannel) => async (request: FastifyRequest, reply: FastifyReply) => {
    if (!requireDoctor(request, reply)) return reply;

    reply.hijack();
    const listener = new SseListener(reply.raw);
    listener.open();

    const closed = new AbortController();
    reply.raw.once('close', () => {
      closed.abort();
      listener.close();
    });

    try {
      await hub.connect(channel, listener, closed.signal);
    } catch (err) {
      request.log.error({ err, channel }, 'Failed to open realtime stream');
      closed.abort();
      listener.close();
    }
    return reply;
  };

  // GET /v1/realtime/queue - Queue snapshot, then queue_updated / long_wait_alert events
  server.get('/realtime/queue', stream('queue'));

  // GET /v1/realtime/alerts - Active alerts, then new_alert / long_wait_alert events
  server.get('/realtime/alerts', stream('alerts'));

  // POST /v1/realtime/connections/:id/refresh - Resend the snapshot to one connection
  server.post<{ Params: { id: string } }>('/realtime/connections/:id/refresh', async (request, reply) => {
    if (!requireDoctor(request, reply)) return reply;

    await hub.refresh(request.params.id);
    return { refreshed: true, connectionId: request.params.id };
  });
}
