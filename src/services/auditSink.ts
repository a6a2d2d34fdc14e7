import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config";
import { toErrorMessage } from "../errors";
import { Logger } from "../logger";
import { AuditRecord, auditRecordSchema } from "../schemas/auditRecord";

export interface AuditSink {
  readonly available: boolean;
  write(requestId: string, record: AuditRecord): Promise<boolean>;
  read(requestId: string): Promise<AuditRecord | undefined>;
}

export class NoopAuditSink implements AuditSink {
  readonly available = false;

  async write(): Promise<boolean> {
    return false;
  }

  async read(): Promise<AuditRecord | undefined> {
    return undefined;
  }
}

// Distinct ids always give distinct file names; "." is escaped so no name is "." or "..".
export const auditFileName = (requestId: string): string =>
  `${encodeURIComponent(requestId).replace(/\./g, "%2E")}.json`;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const parseAuditRecord = (raw: string): AuditRecord | undefined => {
  const parsed = auditRecordSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : undefined;
};

/**
 * Keeps one JSON document per request under the audit directory. Used when
 * no S3 bucket is configured.
 */
export class FileAuditSink implements AuditSink {
  readonly available = true;

  constructor(
    private readonly logger: Logger,
    private readonly rootDir = config.auditDir
  ) {}

  private filePath(requestId: string): string {
    return path.join(this.rootDir, auditFileName(requestId));
  }

  async write(requestId: string, record: AuditRecord): Promise<boolean> {
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      await fs.writeFile(this.filePath(requestId), JSON.stringify(record, null, 2), "utf8");
      this.logger.info({ requestId, path: this.filePath(requestId) }, "Wrote execution log");
      return true;
    } catch (error: unknown) {
      this.logger.error({ requestId, error: toErrorMessage(error) }, "Execution log write failed");
      return false;
    }
  }

  async read(requestId: string): Promise<AuditRecord | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath(requestId), "utf8");
    } catch (error: unknown) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    const record = parseAuditRecord(raw);
    if (record && record.request_id !== requestId) {
      this.logger.warn({ requestId, storedRequestId: record.request_id }, "Execution log belongs to another request");
      return undefined;
    }
    return record;
  }
}
