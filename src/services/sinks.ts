import { config } from "../config";
import { Logger } from "../logger";
import { AuditSink, FileAuditSink } from "./auditSink";
import { CloudWatchMetricSink } from "./cloudWatchMetricSink";
import { MetricSink, NoopMetricSink } from "./metricSink";
import { S3AuditSink } from "./s3AuditSink";

export interface Sinks {
  auditSink: AuditSink;
  metricSink: MetricSink;
}

/**
 * AWS sinks when a region is configured (S3 needs a bucket as well), the local
 * audit archive and a no-op metric sink otherwise.
 */
export const createSinks = (logger: Logger, settings = config): Sinks => {
  if (!settings.awsRegion) {
    logger.info({ auditDir: settings.auditDir }, "AWS not configured; using local audit archive");
    return {
      auditSink: new FileAuditSink(logger, settings.auditDir),
      metricSink: new NoopMetricSink()
    };
  }

  const auditSink = settings.s3Bucket
    ? new S3AuditSink(logger, settings.s3Bucket, settings.awsRegion)
    : new FileAuditSink(logger, settings.auditDir);

  return {
    auditSink,
    metricSink: new CloudWatchMetricSink(logger, settings.metricsNamespace, settings.awsRegion)
  };
};
