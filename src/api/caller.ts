import type { FastifyRequest } from 'fastify';
import type { CallerIdentity } from '@/core/types.js';

/** Identify the caller of an HTTP request from the `x-caller-id` / `x-caller-name` headers. */
export function callerFrom(request: FastifyRequest): CallerIdentity {
  const id = headerValue(request, 'x-caller-id') ?? 'anonymous';
  const name = headerValue(request, 'x-caller-name');
  return name ? { id, name, channel: 'http' } : { id, channel: 'http' };
}

function headerValue(request: FastifyRequest, header: string): string | undefined {
  const raw = request.headers[header];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
