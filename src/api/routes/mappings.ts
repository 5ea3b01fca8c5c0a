import { FastifyInstance, FastifyPluginOptions } from 'fastify';

interface MappingParams {
  index: string;
}

export async function registerMappingsRoutes(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions
): Promise<void> {
  fastify.get('/mappings', async (request) => {
    return { mappings: request.apiContext.mappingEngine.describeRules() };
  });

  fastify.get<{ Params: MappingParams }>('/mappings/:index', async (request, reply) => {
    const index = Number(request.params.index);
    const mapping = request.apiContext.mappingEngine
      .describeRules()
      .find((rule) => rule.index === index);

    if (!mapping) {
      return reply.code(404).send({ error: `No mapping with index ${request.params.index}` });
    }
    return mapping;
  });
}
