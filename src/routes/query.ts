/**
 * Query route — POST /api/query
 *
 * Accepts a natural language question plus the data context it refers to (an
 * attached file reference, a connection reference, or both) and returns the
 * AnalysisResult. `X-Cache` reports whether the result was served from the
 * cache, joined an in-flight run, or freshly computed.
 */

import type { FastifyInstance } from 'fastify';
import type { AnalysisService } from '../services/analysisService.js';
import type { QueryContext } from '../ai/types.js';

export interface QueryRouteDeps {
  analysisService: AnalysisService;
}

interface QueryBody {
  question: string;
  context?: QueryContext;
}

const REF_SCHEMA = { type: 'string' as const, minLength: 1, maxLength: 255 };

const querySchema = {
  body: {
    type: 'object' as const,
    required: ['question'],
    additionalProperties: false,
    properties: {
      question: { type: 'string' as const, minLength: 1, maxLength: 2000 },
      context: {
        type: 'object' as const,
        additionalProperties: false,
        properties: {
          attachedFileRef: REF_SCHEMA,
          connectionRef: REF_SCHEMA,
        },
      },
    },
  },
};

export async function queryRoutes(fastify: FastifyInstance, deps: QueryRouteDeps) {
  const { analysisService } = deps;

  fastify.post<{ Body: QueryBody }>('/api/query', { schema: querySchema }, async (request, reply) => {
    const { question, context = {} } = request.body;

    const { result, cache } = await analysisService.processQueryWithMeta(question, context);

    return reply.status(200).header('X-Cache', cache).send({
      success: true,
      data: result,
    });
  });
}
