#!/usr/bin/env node
/**
 * MQTT-to-InfluxDB bridge startup.
 * Loads the YAML configuration, compiles the mappings and starts bridging.
 */

import { FastifyInstance } from 'fastify';
import { createServer, startServer } from './api/server.js';
import { AppConfig, loadConfig } from './config/loader.js';
import { ConfigError } from './errors.js';
import { logger, setLogLevel } from './logger.js';
import { MappingEngine } from './mapping/engine.js';
import { attachHandler, createMessageHandler, createMqttClient } from './mqtt/index.js';
import { InfluxDbSink } from './store/influxdb.js';
import { DataPointSink } from './store/sink.js';

const STATS_INTERVAL_MS = 60_000;

function printUsage(): void {
  process.stdout.write(`
Usage: mqtt-influx-bridge <config-file>

Arguments:
  config-file   Path to YAML configuration file

Environment:
  LOG_LEVEL     Overrides the configured log level (trace, debug, info, warn, error)
`);
}

function createSinks(config: AppConfig): DataPointSink[] {
  return config.databases.map((db) => new InfluxDbSink(db));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    return;
  }

  const configPath = args[0];
  if (!configPath) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  // 1. Configuration and mappings: any bad rule stops startup
  let config: AppConfig;
  let mappingEngine: MappingEngine;
  try {
    config = loadConfig(configPath);
    setLogLevel(config.logLevel);
    mappingEngine = MappingEngine.fromConfig(config.mappings);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ kind: err.kind, file: configPath }, err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  logger.info({ file: configPath, mappings: config.mappings.length }, 'Configuration loaded');
  for (const rule of mappingEngine.describeRules()) {
    logger.debug(rule, 'Mapping compiled');
  }

  // 2. Databases
  const sinks = createSinks(config);
  for (const sink of sinks) {
    logger.info({ sink: sink.name }, 'Database configured');
  }

  // 3. MQTT
  const mqttClient = createMqttClient(config.mqtt);
  const handler = createMessageHandler({ mappingEngine, sinks });
  attachHandler(mqttClient, handler);
  mqttClient.subscribeMany(mappingEngine.getTopicPatterns());

  logger.info({ broker: mqttClient.getBrokerUrl() }, 'Connecting to MQTT broker');
  await mqttClient.connect();

  // 4. Optional status API
  let api: FastifyInstance | undefined;
  if (config.api) {
    api = await createServer(config.api, { mappingEngine, handler, sinks, mqttClient });
    await startServer(api, config.api);
  }

  const statsTimer = setInterval(() => {
    logger.info({ stats: handler.getStats(), mqtt: mqttClient.getState() }, 'Bridge stats');
  }, STATS_INTERVAL_MS);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    clearInterval(statsTimer);
    await mqttClient.disconnect();
    await api?.close();
    const closed = await Promise.allSettled(sinks.map((sink) => sink.close()));
    for (const outcome of closed) {
      if (outcome.status === 'rejected') {
        logger.warn({ err: outcome.reason }, 'Failed to close database writer');
      }
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
