import { assertConfig, config } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { logger } from "./logger";
import { ExecutionSupervisor } from "./orchestrator/executionSupervisor";
import { PipelineCoordinator } from "./orchestrator/pipelineCoordinator";
import { PipelineQueue } from "./services/pipelineQueue";
import { createSinks } from "./services/sinks";
import { buildApp } from "./serverApp";

const llm = new OpenAiClient();
const { auditSink, metricSink } = createSinks(logger);
const supervisor = new ExecutionSupervisor(
  new PipelineCoordinator(llm, { timeoutMs: config.stageTimeoutMs }),
  logger,
  auditSink,
  metricSink
);
const queue = new PipelineQueue(config.maxConcurrentPipelines, {
  onQueued: (pending) => logger.info({ pending }, "Pipeline run queued")
});

const app = buildApp({
  pipeline: {
    run: (input) => queue.submit(() => supervisor.run(input))
  },
  auditSink,
  metricSink,
  llm
});

const start = async (): Promise<void> => {
  assertConfig();
  await llm.assertModelAvailable();
  await app.listen({ port: config.port, host: "0.0.0.0" });
  app.log.info(
    {
      version: config.version,
      auditAvailable: auditSink.available,
      metricsAvailable: metricSink.available,
      apiKeyRequired: Boolean(config.apiKey)
    },
    "Server started"
  );
};

start().catch((error) => {
  app.log.error(error);
  process.exit(1);
});
