import { CloudWatchClient, PutMetricDataCommand } from "@aws-sdk/client-cloudwatch";
import { toErrorMessage } from "../errors";
import { Logger } from "../logger";
import { MetricUnit } from "../types";
import { MetricSink, MetricTags } from "./metricSink";

export class CloudWatchMetricSink implements MetricSink {
  readonly available = true;
  private readonly client: CloudWatchClient;

  constructor(
    private readonly logger: Logger,
    readonly namespace: string,
    region: string
  ) {
    this.client = new CloudWatchClient({ region });
  }

  async emit(name: string, value: number, unit: MetricUnit = "Count", tags: MetricTags = {}): Promise<boolean> {
    const dimensions = Object.entries(tags).map(([Name, Value]) => ({ Name, Value }));

    try {
      await this.client.send(
        new PutMetricDataCommand({
          Namespace: this.namespace,
          MetricData: [
            {
              MetricName: name,
              Value: value,
              Unit: unit,
              Timestamp: new Date(),
              Dimensions: dimensions
            }
          ]
        })
      );
      this.logger.debug({ metric: name, value, unit }, "Metric posted to CloudWatch");
      return true;
    } catch (error: unknown) {
      this.logger.warn({ metric: name, error: toErrorMessage(error) }, "CloudWatch metric failed");
      return false;
    }
  }
}
