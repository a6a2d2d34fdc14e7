import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const defaultWorkspaceRoot = path.resolve(__dirname, "..");

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const config = {
  version: "1.0.0",
  port: toInt(process.env.PORT, 3000),
  logLevel: process.env.LOG_LEVEL ?? "info",
  apiKey: process.env.API_KEY ?? "",
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
  model: process.env.OPENAI_MODEL ?? "gpt-4-turbo",
  temperature: toFloat(process.env.OPENAI_TEMPERATURE, 0.2),
  awsRegion: process.env.AWS_REGION ?? "",
  s3Bucket: process.env.AWS_S3_BUCKET ?? "",
  metricsNamespace: process.env.METRICS_NAMESPACE ?? "AgentTrustPipeline",
  auditDir: path.resolve(defaultWorkspaceRoot, process.env.AUDIT_DIR ?? path.join(".pipeline", "executions")),
  maxResultChars: toInt(process.env.MAX_RESULT_CHARS, 5000),
  lowConfidenceThreshold: toFloat(process.env.LOW_CONFIDENCE_THRESHOLD, 0.75),
  // 0 disables the per-stage deadline.
  stageTimeoutMs: toInt(process.env.STAGE_TIMEOUT_MS, 0),
  maxConcurrentPipelines: toInt(process.env.MAX_CONCURRENT_PIPELINES, 4)
};

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env.");
  }
};
