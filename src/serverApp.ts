import { randomUUID } from "node:crypto";
import fastify, { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { config } from "./config";
import { PipelineExecutionError, toErrorMessage } from "./errors";
import { getConfidenceLevel } from "./services/confidenceScorer";
import { AuditSink } from "./services/auditSink";
import { MetricSink } from "./services/metricSink";
import { LlmInvoker } from "./orchestrator/stageRunner";
import { llmPingSchema, taskParamsSchema, taskRequestSchema } from "./schemas/taskRequest";
import { ExecutionInput, ExecutionRecord } from "./types";

export interface PipelineRunnerLike {
  run(input: ExecutionInput): Promise<ExecutionRecord>;
}

export interface ServerDeps {
  pipeline: PipelineRunnerLike;
  auditSink: AuditSink;
  metricSink: MetricSink;
  llm: LlmInvoker;
  apiKey?: string;
  createRequestId?: () => string;
}

const maxPingOutputChars = 1000;

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: { level: config.logLevel } });
  const apiKey = deps.apiKey ?? config.apiKey;
  const createRequestId = deps.createRequestId ?? randomUUID;

  // No API_KEY configured means open test mode.
  const requireApiKey = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    if (!apiKey || request.headers["x-api-key"] === apiKey) return undefined;
    return reply.code(401).send({ error: "Invalid or missing API key" });
  };

  app.get("/api/health", async () => ({
    status: "healthy",
    timestamp: new Date().toISOString(),
    version: config.version,
    auditAvailable: deps.auditSink.available
  }));

  app.post("/api/tasks", { preHandler: requireApiKey }, async (request, reply) => {
    const parsed = taskRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const requestId = createRequestId();
    request.log.info({ requestId }, "Task endpoint called");

    try {
      const record = await deps.pipeline.run({
        task: parsed.data.description,
        context: parsed.data.context,
        requestId
      });
      const confidenceScore = record.confidence ?? 0;

      return {
        requestId: record.requestId,
        status: record.status,
        result: record.resultText,
        confidenceScore,
        confidenceLevel: getConfidenceLevel(confidenceScore),
        executionTimeMs: record.executionTimeMs,
        validationIssues: record.validation?.issues ?? []
      };
    } catch (error: unknown) {
      request.log.error({ requestId, error: toErrorMessage(error) }, "Task failed");
      return reply.code(500).send({
        requestId: error instanceof PipelineExecutionError ? error.requestId : requestId,
        error: toErrorMessage(error)
      });
    }
  });

  app.get("/api/tasks/:id", { preHandler: requireApiKey }, async (request, reply) => {
    const parsed = taskParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const { id } = parsed.data;
    if (!deps.auditSink.available) {
      return {
        requestId: id,
        status: "unknown",
        message: "Audit storage is not available for log retrieval"
      };
    }

    try {
      const executionLog = await deps.auditSink.read(id);
      if (!executionLog) {
        return reply.code(404).send({ error: "Task not found" });
      }
      return executionLog;
    } catch (error: unknown) {
      request.log.error({ requestId: id, error: toErrorMessage(error) }, "Status check failed");
      return reply.code(500).send({ error: toErrorMessage(error) });
    }
  });

  app.get("/api/metrics", { preHandler: requireApiKey }, async () => {
    if (!deps.metricSink.available) {
      return { message: "Metrics sink not available" };
    }

    return {
      status: "metrics available",
      namespace: deps.metricSink.namespace ?? null,
      timestamp: new Date().toISOString()
    };
  });

  // Goes through the same invoker as the pipeline stages.
  app.post("/api/tools/llm/ping", { preHandler: requireApiKey }, async (request, reply) => {
    const parsed = llmPingSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const started = Date.now();
    const elapsed = () => Date.now() - started;
    const reachable = await deps.llm.invoke(parsed.data.prompt).then(
      (output) => ({ ok: true as const, output }),
      (error: unknown) => ({ ok: false as const, error: toErrorMessage(error) })
    );

    if (!reachable.ok) {
      request.log.warn({ error: reachable.error }, "LLM ping failed");
      return reply.code(502).send({ ok: false, latencyMs: elapsed(), error: reachable.error });
    }
    return { ok: true, latencyMs: elapsed(), model: config.model, output: reachable.output.slice(0, maxPingOutputChars) };
  });

  return app;
};
