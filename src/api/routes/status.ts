import { FastifyInstance, FastifyPluginOptions } from 'fastify';

export async function registerStatusRoutes(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions
): Promise<void> {
  fastify.get('/status', async (request) => {
    const ctx = request.apiContext;
    return {
      mqtt: {
        brokerUrl: ctx.mqttClient?.getBrokerUrl() ?? null,
        state: ctx.mqttClient?.getState() ?? 'unavailable',
        subscriptions: ctx.mqttClient?.getSubscriptions() ?? [],
      },
      messages: ctx.handler.getStats(),
      sinks: ctx.sinks.map((sink) => sink.name),
    };
  });
}
