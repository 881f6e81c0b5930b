import { timingSafeEqual } from 'node:crypto';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AuthRequiredError } from '../../utils/errors.js';

export interface SecurityOptions {
  corsOrigin?: boolean | string | string[];
  rateLimitMax?: number;
  rateLimitWindow?: string;
  /** When set, every route except `/health` requires `Authorization: Bearer <token>`. */
  apiToken?: string;
}

const PUBLIC_ROUTES = new Set(['/health']);

function bearerToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization;
  if (!header?.startsWith('Bearer ')) return undefined;
  return header.slice('Bearer '.length).trim();
}

export function tokenMatches(expected: string, provided: string | undefined): boolean {
  if (provided === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

async function securityPlugin(fastify: FastifyInstance, options: SecurityOptions = {}): Promise<void> {
  await fastify.register(cors, {
    origin: options.corsOrigin ?? false,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  await fastify.register(rateLimit, {
    max: options.rateLimitMax ?? 100,
    timeWindow: options.rateLimitWindow ?? '1 minute',
  });

  const { apiToken } = options;
  if (apiToken === undefined) return;

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    if (request.method === 'OPTIONS' || PUBLIC_ROUTES.has(request.routeOptions.url ?? '')) return;
    if (!tokenMatches(apiToken, bearerToken(request))) {
      throw new AuthRequiredError();
    }
  });
}

export default fp(securityPlugin, {
  name: 'security',
});
