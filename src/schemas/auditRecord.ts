import { z } from "zod";
import { ExecutionRecord } from "../types";

const validationReportRecordSchema = z.object({
  status: z.enum(["passed", "flagged", "failed"]),
  issues: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  issue_count: z.number().int().min(0)
});

const baseAuditRecordSchema = z.object({
  request_id: z.string().min(1),
  task: z.string(),
  context: z.string().nullable(),
  execution_time_ms: z.number().min(0),
  timestamp: z.string().min(1)
});

const successAuditRecordSchema = baseAuditRecordSchema.extend({
  result: z.string(),
  confidence: z.number().min(0).max(1),
  validation: validationReportRecordSchema
});

const failureAuditRecordSchema = baseAuditRecordSchema.extend({
  error: z.string()
});

export const auditRecordSchema = z.union([successAuditRecordSchema, failureAuditRecordSchema]);

export type AuditRecord = z.infer<typeof auditRecordSchema>;

export const toAuditRecord = (record: ExecutionRecord): AuditRecord => {
  const base = {
    request_id: record.requestId,
    task: record.task,
    context: record.context ?? null,
    execution_time_ms: record.executionTimeMs,
    timestamp: record.timestamp
  };

  if (record.status === "error" || !record.validation || record.confidence === undefined) {
    return {
      ...base,
      error: record.error ?? "Unknown error"
    };
  }

  return {
    ...base,
    result: record.resultText,
    confidence: record.confidence,
    validation: {
      status: record.validation.status,
      issues: [...record.validation.issues],
      confidence: record.validation.confidence,
      issue_count: record.validation.issueCount
    }
  };
};
