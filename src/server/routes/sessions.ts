import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { BrowserName } from '../../browser/engine.js';
import { SessionNotFoundError, ValidationError } from '../../utils/errors.js';

interface CreateSessionBody {
  sessionId?: string;
  headless?: boolean;
  browser?: BrowserName;
  ownerPlugin?: string;
  tenantId?: string;
  /** Return the existing session for `sessionId` instead of refusing a second owner. */
  reuse?: boolean;
}

interface AttachBody {
  token?: string;
  pluginId?: string;
}

interface AuthorizeBody {
  pluginId: string;
  ownerPlugin: string;
  token: string;
  revoke?: boolean;
}

type IdParams = { id: string };

const idParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
  },
  required: ['id'],
} as const;

export async function sessionRoutes(fastify: FastifyInstance): Promise<void> {
  const sm = fastify.sessionManager;

  // POST /sessions - launch (or reuse) a pooled browser
  fastify.post<{ Body: CreateSessionBody }>(
    '/',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            sessionId: { type: 'string', minLength: 1, maxLength: 128 },
            headless: { type: 'boolean' },
            browser: { type: 'string', enum: ['chromium', 'firefox', 'webkit'] },
            ownerPlugin: { type: 'string', minLength: 1 },
            tenantId: { type: 'string', minLength: 1 },
            reuse: { type: 'boolean' },
          },
          additionalProperties: false,
        },
      },
    },
    async (request: FastifyRequest<{ Body: CreateSessionBody }>, reply: FastifyReply) => {
      const { sessionId, reuse, ...options } = request.body ?? {};

      const handle =
        reuse && sessionId !== undefined
          ? await sm.getOrCreateSession(sessionId, options)
          : await sm.createSession({ ...options, sessionId });

      return reply.status(201).send({
        session_id: handle.sessionId,
        ws_endpoint: handle.wsEndpoint,
        session_token: handle.sessionToken,
      });
    },
  );

  // GET /sessions - list active sessions
  fastify.get('/', async () => {
    return { sessions: sm.listSessions() };
  });

  // GET /sessions/:id - session info (never the token or endpoint)
  fastify.get<{ Params: IdParams }>(
    '/:id',
    { schema: { params: idParamsSchema } },
    async (request: FastifyRequest<{ Params: IdParams }>) => {
      const info = sm.getSession(request.params.id);
      if (!info) throw new SessionNotFoundError(request.params.id);
      return info;
    },
  );

  // DELETE /sessions/:id - close a session
  fastify.delete<{ Params: IdParams }>(
    '/:id',
    { schema: { params: idParamsSchema } },
    async (request: FastifyRequest<{ Params: IdParams }>) => {
      const closed = await sm.closeSession(request.params.id);
      return { closed };
    },
  );

  // POST /sessions/:id/attach - token-gated reattachment
  fastify.post<{ Params: IdParams; Body: AttachBody }>(
    '/:id/attach',
    {
      schema: {
        params: idParamsSchema,
        body: {
          type: 'object',
          properties: {
            token: { type: 'string' },
            pluginId: { type: 'string', minLength: 1 },
          },
          additionalProperties: false,
        },
      },
    },
    async (request: FastifyRequest<{ Params: IdParams; Body: AttachBody }>) => {
      const { token, pluginId } = request.body ?? {};
      if (!token) throw new ValidationError('A session token is required to attach');

      const endpoint = sm.verifyAccess(request.params.id, token, pluginId);
      return { session_id: endpoint.sessionId, ws_endpoint: endpoint.wsEndpoint };
    },
  );

  // POST /sessions/:id/authorize - owner grants or revokes another plugin
  fastify.post<{ Params: IdParams; Body: AuthorizeBody }>(
    '/:id/authorize',
    {
      schema: {
        params: idParamsSchema,
        body: {
          type: 'object',
          properties: {
            pluginId: { type: 'string', minLength: 1 },
            ownerPlugin: { type: 'string', minLength: 1 },
            token: { type: 'string', minLength: 1 },
            revoke: { type: 'boolean' },
          },
          required: ['pluginId', 'ownerPlugin', 'token'],
          additionalProperties: false,
        },
      },
    },
    async (request: FastifyRequest<{ Params: IdParams; Body: AuthorizeBody }>) => {
      const { pluginId, ownerPlugin, token, revoke } = request.body;
      if (revoke) {
        sm.revokePlugin(request.params.id, pluginId, ownerPlugin, token);
      } else {
        sm.authorizePlugin(request.params.id, pluginId, ownerPlugin, token);
      }
      return { session_id: request.params.id, plugin_id: pluginId, authorized: !revoke };
    },
  );
}
