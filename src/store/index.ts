export type { DataPointSink } from './sink.js';
export { InfluxDbSink, toInfluxPoint, createPointWriter } from './influxdb.js';
export type { PointWriter } from './influxdb.js';
