import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { mappingSchema } from '../config/loader.js';
import { MappingEngine } from '../mapping/engine.js';
import { DataPoint } from '../mapping/point-mapper.js';
import { DataPointSink } from '../store/sink.js';
import { MessageHandler } from './handler.js';

const silent = pino({ level: 'silent' });

const engine = MappingEngine.fromConfig(
  [mappingSchema.parse({ topic: 'sensors/+/temp', fieldName: 'temp_$1', valueType: 'float' })],
  { now: () => 1000 }
);

class MemorySink implements DataPointSink {
  readonly points: DataPoint[] = [];
  constructor(readonly name: string) {}

  async write(point: DataPoint): Promise<void> {
    this.points.push(point);
  }

  async close(): Promise<void> {}
}

class FailingSink implements DataPointSink {
  readonly name = 'failing';

  async write(): Promise<void> {
    throw new Error('connection refused');
  }

  async close(): Promise<void> {}
}

describe('MessageHandler', () => {
  it('writes mapped points to every sink', async () => {
    const a = new MemorySink('a');
    const b = new MemorySink('b');
    const handler = new MessageHandler({ mappingEngine: engine, sinks: [a, b], logger: silent });

    const result = await handler.handle('sensors/kitchen/temp', Buffer.from('21.5'));

    expect(result.ok).toBe(true);
    const expected: DataPoint = {
      timestamp: 1000,
      fieldName: 'temp_kitchen',
      value: { type: 'float', value: 21.5 },
      tags: [],
    };
    expect(a.points).toEqual([expected]);
    expect(b.points).toEqual([expected]);
    expect(handler.getStats()).toEqual({ received: 1, matched: 1, written: 2, dropped: 0, writeErrors: 0 });
  });

  it('keeps delivering to other sinks when one fails', async () => {
    const good = new MemorySink('good');
    const handler = new MessageHandler({
      mappingEngine: engine,
      sinks: [new FailingSink(), good],
      logger: silent,
    });

    await handler.handle('sensors/hall/temp', Buffer.from('19'));

    expect(good.points).toHaveLength(1);
    expect(handler.getStats()).toMatchObject({ written: 1, writeErrors: 1 });
  });

  it('drops bad messages and keeps processing', async () => {
    const sink = new MemorySink('s');
    const handler = new MessageHandler({ mappingEngine: engine, sinks: [sink], logger: silent });

    const unmatched = await handler.handle('other/topic', Buffer.from('1'));
    const invalid = await handler.handle('sensors/kitchen/temp', Buffer.from('hot'));
    await handler.handle('sensors/kitchen/temp', Buffer.from('22'));

    expect(unmatched).toMatchObject({ ok: false, error: { kind: 'UnmatchedTopic' } });
    expect(invalid).toMatchObject({ ok: false, error: { kind: 'InvalidNumber', ruleIndex: 0 } });
    expect(sink.points.map((p) => p.value)).toEqual([{ type: 'float', value: 22 }]);
    expect(handler.getStats()).toEqual({ received: 3, matched: 2, written: 1, dropped: 2, writeErrors: 0 });
  });

  it('logs dropped messages with their context', async () => {
    const lines: string[] = [];
    const log = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
    const handler = new MessageHandler({ mappingEngine: engine, sinks: [], logger: log });

    await handler.handle('sensors/kitchen/temp', Buffer.from('hot'));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 40,
      component: 'handler',
      topic: 'sensors/kitchen/temp',
      ruleIndex: 0,
      stage: 'value',
      kind: 'InvalidNumber',
      msg: "Value 'hot' is not a valid float",
    });
  });
});
