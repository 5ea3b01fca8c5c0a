import { InfluxDB, Point, WriteApi } from '@influxdata/influxdb-client';
import { formatTypedValue } from '../codecs/coerce.js';
import { InfluxDbConfig } from '../config/loader.js';
import { DataPoint } from '../mapping/point-mapper.js';
import { DataPointSink } from './sink.js';

export type PointWriter = Pick<WriteApi, 'writePoint' | 'flush' | 'close'>;

export function toInfluxPoint(measurement: string, dataPoint: DataPoint): Point {
  const point = new Point(measurement).timestamp(dataPoint.timestamp);
  const { fieldName, value } = dataPoint;

  switch (value.type) {
    case 'boolean':
      point.booleanField(fieldName, value.value);
      break;
    case 'float':
      point.floatField(fieldName, value.value);
      break;
    case 'signed-integer':
      // intField goes through parseInt, which rounds past 2^53; write the exact digits.
      point.fields[fieldName] = `${value.value}i`;
      break;
    case 'unsigned-integer':
      point.uintField(fieldName, value.value.toString());
      break;
    case 'text':
      point.stringField(fieldName, value.value);
      break;
  }

  for (const tag of dataPoint.tags) {
    point.tag(tag.name, formatTypedValue(tag.value));
  }
  return point;
}

/**
 * InfluxDB 1.x `username:password` auth and `db/retention-policy` buckets
 * go through the 2.x compatibility endpoints.
 */
export function createPointWriter(config: InfluxDbConfig): PointWriter {
  const token = config.token ?? (config.auth ? `${config.auth.username}:${config.auth.password}` : '');
  const bucket = config.retentionPolicy ? `${config.dbName}/${config.retentionPolicy}` : config.dbName;

  return new InfluxDB({ url: config.url, token }).getWriteApi(config.org, bucket, 'ms', {
    maxRetries: 0,
    flushInterval: 0,
  });
}

/** Writes each data point as soon as it arrives; no batching, no retries. */
export class InfluxDbSink implements DataPointSink {
  readonly name: string;
  private readonly measurement: string;
  private readonly writer: PointWriter;

  constructor(config: InfluxDbConfig, writer: PointWriter = createPointWriter(config)) {
    this.name = `influxdb:${config.url}/${config.dbName}`;
    this.measurement = config.measurement;
    this.writer = writer;
  }

  async write(dataPoint: DataPoint): Promise<void> {
    this.writer.writePoint(toInfluxPoint(this.measurement, dataPoint));
    await this.writer.flush();
  }

  async close(): Promise<void> {
    await this.writer.close();
  }
}
