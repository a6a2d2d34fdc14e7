import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { toErrorMessage } from "../errors";
import { Logger } from "../logger";
import { AuditRecord } from "../schemas/auditRecord";
import { AuditSink, parseAuditRecord } from "./auditSink";

export const executionLogKey = (requestId: string): string => `executions/${requestId}.json`;

export class S3AuditSink implements AuditSink {
  readonly available = true;
  private readonly client: S3Client;

  constructor(
    private readonly logger: Logger,
    private readonly bucket: string,
    region: string
  ) {
    this.client = new S3Client({ region });
  }

  async write(requestId: string, record: AuditRecord): Promise<boolean> {
    const key = executionLogKey(requestId);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: JSON.stringify(record, null, 2),
          ContentType: "application/json"
        })
      );
      this.logger.info({ requestId, bucket: this.bucket, key }, "Uploaded execution log to S3");
      return true;
    } catch (error: unknown) {
      this.logger.error({ requestId, key, error: toErrorMessage(error) }, "S3 upload failed");
      return false;
    }
  }

  async read(requestId: string): Promise<AuditRecord | undefined> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: executionLogKey(requestId)
        })
      );
      const raw = await response.Body?.transformToString("utf-8");
      return raw ? parseAuditRecord(raw) : undefined;
    } catch (error: unknown) {
      if (error instanceof NoSuchKey) {
        return undefined;
      }
      throw error;
    }
  }
}
