import { readFileSync } from 'fs';
import { fastify, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ApiConfig } from '../config/loader.js';
import { logger } from '../logger.js';
import { MappingEngine } from '../mapping/engine.js';
import { MqttClientWrapper } from '../mqtt/client.js';
import { MessageHandler } from '../mqtt/handler.js';
import { DataPointSink } from '../store/sink.js';
import { createAuthHook } from './middleware/auth.js';
import { registerMappingsRoutes } from './routes/mappings.js';
import { registerStatusRoutes } from './routes/status.js';

export interface ApiContext {
  mappingEngine: MappingEngine;
  handler: MessageHandler;
  sinks: DataPointSink[];
  mqttClient?: MqttClientWrapper;
}

declare module 'fastify' {
  interface FastifyRequest {
    apiContext: ApiContext;
  }
}

export async function createServer(config: ApiConfig, context: ApiContext): Promise<FastifyInstance> {
  const httpsOptions = config.tls ? {
    https: {
      key: readFileSync(config.tls.key),
      cert: readFileSync(config.tls.cert),
      ...(config.tls.ca && { ca: readFileSync(config.tls.ca) }),
    },
  } : {};

  const app = fastify({
    logger: { name: 'mqtt-influx-bridge', level: logger.level },
    ...httpsOptions,
  });

  await app.register(cors, {
    origin: true,
  });

  app.decorateRequest('apiContext', null as unknown as ApiContext);

  app.addHook('onRequest', async (request) => {
    request.apiContext = context;
  });

  if (config.apiKeys.length > 0) {
    app.addHook('onRequest', createAuthHook(config.apiKeys));
  }

  await app.register(registerStatusRoutes, { prefix: '' });
  await app.register(registerMappingsRoutes, { prefix: '' });

  return app;
}

export async function startServer(app: FastifyInstance, config: ApiConfig): Promise<void> {
  await app.listen({ port: config.port, host: config.host });
}
