import { DataPoint } from '../mapping/point-mapper.js';

/** A destination that data points are written to. */
export interface DataPointSink {
  readonly name: string;
  write(point: DataPoint): Promise<void>;
  close(): Promise<void>;
}
