import type { Logger } from 'pino';
import { logger } from '../logger.js';
import { DispatchResult, MappingEngine } from '../mapping/engine.js';
import { DataPoint } from '../mapping/point-mapper.js';
import { DataPointSink } from '../store/sink.js';
import { MqttClientWrapper } from './client.js';

export interface MessageHandlerDeps {
  mappingEngine: MappingEngine;
  sinks: DataPointSink[];
  logger?: Logger;
}

export interface MessageStats {
  received: number;
  matched: number;
  written: number;
  dropped: number;
  writeErrors: number;
}

export class MessageHandler {
  private mappingEngine: MappingEngine;
  private sinks: DataPointSink[];
  private log: Logger;
  private stats: MessageStats = {
    received: 0,
    matched: 0,
    written: 0,
    dropped: 0,
    writeErrors: 0,
  };

  constructor(deps: MessageHandlerDeps) {
    this.mappingEngine = deps.mappingEngine;
    this.sinks = deps.sinks;
    this.log = (deps.logger ?? logger).child({ component: 'handler' });
  }

  /**
   * Maps one message and writes the result to every sink. A bad message or
   * a failed write is logged and counted, not thrown.
   */
  async handle(topic: string, payload: Buffer): Promise<DispatchResult> {
    this.stats.received++;

    const result = this.mappingEngine.dispatch({ topic, payload });
    if (!result.ok) {
      const { error } = result;
      if (error.kind !== 'UnmatchedTopic') this.stats.matched++;
      this.stats.dropped++;
      this.log.warn(
        { topic, ruleIndex: error.ruleIndex, stage: error.stage, kind: error.kind },
        error.message
      );
      return result;
    }

    this.stats.matched++;
    await this.writeAll(result.point, topic);
    return result;
  }

  getStats(): MessageStats {
    return { ...this.stats };
  }

  /** Sinks are independent: one failing does not stop delivery to the others. */
  private async writeAll(point: DataPoint, topic: string): Promise<void> {
    const outcomes = await Promise.allSettled(this.sinks.map((sink) => sink.write(point)));

    outcomes.forEach((outcome, i) => {
      const sink = this.sinks[i].name;
      if (outcome.status === 'fulfilled') {
        this.stats.written++;
        this.log.debug({ topic, sink, field: point.fieldName }, 'Wrote data point');
      } else {
        this.stats.writeErrors++;
        this.log.error({ topic, sink, err: outcome.reason }, 'Failed to write to DB');
      }
    });
  }
}

export function attachHandler(client: MqttClientWrapper, handler: MessageHandler): void {
  client.on('message', (topic, payload) => {
    handler.handle(topic, payload).catch((err: unknown) => {
      logger.error({ err, topic }, 'Message handler failed');
    });
  });
}

export function createMessageHandler(deps: MessageHandlerDeps): MessageHandler {
  return new MessageHandler(deps);
}
