import { MetricUnit } from "../types";

export type MetricTags = Record<string, string>;

export interface MetricSink {
  readonly available: boolean;
  readonly namespace?: string;
  emit(name: string, value: number, unit?: MetricUnit, tags?: MetricTags): Promise<boolean>;
}

export class NoopMetricSink implements MetricSink {
  readonly available = false;

  async emit(): Promise<boolean> {
    return false;
  }
}
