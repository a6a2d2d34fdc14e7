import { assertConfig, config } from "./config";
import { PipelineExecutionError } from "./errors";
import { OpenAiClient } from "./llm/openaiClient";
import { logger } from "./logger";
import { ExecutionSupervisor } from "./orchestrator/executionSupervisor";
import { PipelineCoordinator } from "./orchestrator/pipelineCoordinator";
import { getConfidenceLevel } from "./services/confidenceScorer";
import { createSinks } from "./services/sinks";

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const main = async (): Promise<void> => {
  assertConfig();

  const task = getArgValue("task")?.trim();
  const context = getArgValue("context")?.trim();
  const requestId = getArgValue("request-id")?.trim();

  if (!task) {
    console.error('Usage: npm run cli -- --task "..." [--context "..."] [--request-id req-1]');
    process.exit(1);
  }

  const llm = new OpenAiClient();
  const { auditSink, metricSink } = createSinks(logger);
  const supervisor = new ExecutionSupervisor(
    new PipelineCoordinator(llm, { timeoutMs: config.stageTimeoutMs }),
    logger,
    auditSink,
    metricSink
  );

  const record = await supervisor.run({ task, context, requestId });
  const confidence = record.confidence ?? 0;

  console.log(`Request: ${record.requestId}`);
  console.log(`Status: ${record.status}`);
  console.log(`Confidence: ${confidence.toFixed(2)} (${getConfidenceLevel(confidence)})`);
  console.log(`Execution time: ${record.executionTimeMs}ms`);
  for (const issue of record.validation?.issues ?? []) {
    console.log(`- ${issue}`);
  }
  console.log(`\n${record.resultText}`);
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const requestId = error instanceof PipelineExecutionError ? ` [${error.requestId}]` : "";
  console.error(`${message}${requestId}`);
  process.exit(1);
});
