import type { FastifyReply, FastifyRequest } from 'fastify';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../env.js';
import type { CallerIdentity } from '../models/types.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

// Tokens are issued elsewhere; only their claims are trusted here
const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['doctor', 'patient']),
  name: z.string().optional(),
});

function getHeaderValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) {
    return header[0] ?? '';
  }
  return String(header ?? '');
}

function extractBearerToken(authorizationHeader: string): string {
  if (!authorizationHeader) return '';
  const parts = authorizationHeader.split(' ');
  if (parts.length !== 2) return '';
  const [scheme, token] = parts;
  if (!scheme || !token || !/^Bearer$/i.test(scheme)) return '';
  return token.trim();
}

/**
 * Bearer header first; `?token=` is accepted for EventSource clients,
 * which cannot set headers.
 */
export function extractAuthToken(request: FastifyRequest): string {
  const bearer = extractBearerToken(getHeaderValue(request.headers.authorization));
  if (bearer) return bearer;

  const query = request.query;
  if (query && typeof query === 'object') {
    const token: unknown = Reflect.get(query, 'token');
    if (typeof token === 'string') return token.trim();
  }
  return '';
}

export function verifyCallerToken(token: string, secret: string = env.JWT_SECRET): CallerIdentity | null {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return null;
  }

  const claims = TokenClaimsSchema.safeParse(decoded);
  if (!claims.success) return null;

  return { id: claims.data.sub, role: claims.data.role, name: claims.data.name };
}

/**
 * Resolve the caller or reply 401. Returns null when the reply was sent.
 */
export function authenticate(request: FastifyRequest, reply: FastifyReply): CallerIdentity | null {
  const token = extractAuthToken(request);
  if (!token) {
    reply.code(401).send(formatErrorResponse(AppError.unauthorized('Missing bearer token')));
    return null;
  }

  const caller = verifyCallerToken(token);
  if (!caller) {
    reply.code(401).send(formatErrorResponse(AppError.unauthorized('Invalid or expired token')));
    return null;
  }
  return caller;
}

export function requireDoctor(request: FastifyRequest, reply: FastifyReply): CallerIdentity | null {
  const caller = authenticate(request, reply);
  if (!caller) return null;

  if (caller.role !== 'doctor') {
    reply.code(403).send(formatErrorResponse(AppError.forbidden('Doctor role required')));
    return null;
  }
  return caller;
}
