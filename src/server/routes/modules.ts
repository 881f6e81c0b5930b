import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

interface ExecuteBody {
  moduleId: string;
  params?: Record<string, unknown>;
  context?: Record<string, unknown>;
  retry?: boolean;
  requestId?: string;
}

export async function moduleRoutes(fastify: FastifyInstance): Promise<void> {
  const { dispatcher, registry } = fastify;

  // GET /modules - registered modules and their declared capabilities
  fastify.get('/modules', async () => {
    return { environment: dispatcher.environment, modules: registry.list() };
  });

  // POST /execute - run one module; module failures are results, not HTTP errors
  fastify.post<{ Body: ExecuteBody }>(
    '/execute',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            moduleId: { type: 'string', minLength: 1 },
            params: { type: 'object' },
            context: { type: 'object' },
            retry: { type: 'boolean' },
            requestId: { type: 'string', minLength: 1 },
          },
          required: ['moduleId'],
          additionalProperties: false,
        },
      },
    },
    async (request: FastifyRequest<{ Body: ExecuteBody }>, reply: FastifyReply) => {
      const { moduleId, params, context, retry, requestId } = request.body;

      // Stop the module when the client goes away mid-request.
      const controller = new AbortController();
      const onClose = (): void => {
        if (!reply.raw.writableFinished) controller.abort();
      };
      reply.raw.once('close', onClose);

      try {
        const result = await dispatcher.dispatch(moduleId, {
          params,
          context,
          retry,
          requestId: requestId ?? request.id,
          signal: controller.signal,
        });
        return result.toPublicDict();
      } finally {
        reply.raw.off('close', onClose);
      }
    },
  );
}
