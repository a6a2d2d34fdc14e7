import { randomUUID } from "node:crypto";
import { config } from "../config";
import { InvalidTaskError, PipelineExecutionError, SinkWriteError, StageInvocationError, toErrorMessage } from "../errors";
import { Logger } from "../logger";
import { toAuditRecord } from "../schemas/auditRecord";
import { AuditSink, NoopAuditSink } from "../services/auditSink";
import { calculateConfidence } from "../services/confidenceScorer";
import { MetricSink, MetricTags, NoopMetricSink } from "../services/metricSink";
import { validateResponse } from "../services/responseValidator";
import { ExecutionInput, ExecutionRecord, MetricUnit, PipelineOutcome } from "../types";
import { PipelineTransitionListener } from "./pipelineCoordinator";

export interface PipelineCoordinatorLike {
  execute(task: string, context?: string, onTransition?: PipelineTransitionListener): Promise<PipelineOutcome>;
}

export interface ExecutionSupervisorOptions {
  maxResultChars?: number;
  lowConfidenceThreshold?: number;
}

const truncateCharacters = (text: string, maxChars: number): string =>
  Array.from(text).slice(0, maxChars).join("");

interface RunScope {
  requestId: string;
  task: string;
  context?: string;
  started: number;
  log: Logger;
}

export class ExecutionSupervisor {
  private readonly auditSink: AuditSink;
  private readonly metricSink: MetricSink;
  private readonly maxResultChars: number;
  private readonly lowConfidenceThreshold: number;

  constructor(
    private readonly coordinator: PipelineCoordinatorLike,
    private readonly logger: Logger,
    auditSink?: AuditSink,
    metricSink?: MetricSink,
    options: ExecutionSupervisorOptions = {}
  ) {
    this.auditSink = auditSink ?? new NoopAuditSink();
    this.metricSink = metricSink ?? new NoopMetricSink();
    this.maxResultChars = options.maxResultChars ?? config.maxResultChars;
    this.lowConfidenceThreshold = options.lowConfidenceThreshold ?? config.lowConfidenceThreshold;
  }

  /**
   * Runs the pipeline for one request and writes exactly one audit record,
   * whether the run completes or fails. Failures reject with an error that
   * carries the request id.
   */
  async run(input: ExecutionInput): Promise<ExecutionRecord> {
    if (!input.task.trim()) {
      throw new InvalidTaskError();
    }

    const requestId = input.requestId?.trim() || randomUUID();
    const scope: RunScope = {
      requestId,
      task: input.task,
      context: input.context,
      started: Date.now(),
      log: this.logger.child({ requestId })
    };

    scope.log.info({ task: input.task.slice(0, 100) }, "Task received");

    try {
      return await this.runPipeline(scope);
    } catch (error: unknown) {
      throw await this.recordFailure(scope, error);
    }
  }

  private async runPipeline(scope: RunScope): Promise<ExecutionRecord> {
    const onTransition: PipelineTransitionListener = (transition) => {
      scope.log.debug(transition, "Pipeline state changed");
    };

    const outcome = await this.coordinator.execute(scope.task, scope.context, onTransition);
    if (outcome.status === "failed") {
      throw new StageInvocationError(scope.requestId, outcome.failedStage, outcome.error);
    }

    const executionTimeMs = Date.now() - scope.started;
    const validation = validateResponse(outcome.finalText);
    const confidence = calculateConfidence(outcome.finalText, validation);

    if (confidence < this.lowConfidenceThreshold) {
      scope.log.warn({ confidence, issues: validation.issues }, "Low confidence");
      await this.emitMetric(scope, "LowConfidenceAlerts", 1, "Count");
    }

    const record: ExecutionRecord = Object.freeze({
      requestId: scope.requestId,
      task: scope.task,
      context: scope.context,
      resultText: truncateCharacters(outcome.finalText, this.maxResultChars),
      confidence,
      validation,
      executionTimeMs,
      timestamp: new Date().toISOString(),
      status: validation.status === "passed" ? "validated" : "flagged"
    });

    await this.writeAudit(scope, record);
    await this.emitMetric(scope, "ExecutionLatency", executionTimeMs, "Milliseconds");

    scope.log.info({ status: record.status, confidence, executionTimeMs }, "Task completed");
    return record;
  }

  private async recordFailure(scope: RunScope, error: unknown): Promise<PipelineExecutionError> {
    const failure =
      error instanceof PipelineExecutionError
        ? error
        : new PipelineExecutionError(scope.requestId, toErrorMessage(error), { cause: error });
    const executionTimeMs = Date.now() - scope.started;

    scope.log.error({ error: failure.message, executionTimeMs }, "Orchestration failed");

    const record: ExecutionRecord = Object.freeze({
      requestId: scope.requestId,
      task: scope.task,
      context: scope.context,
      resultText: "",
      executionTimeMs,
      timestamp: new Date().toISOString(),
      status: "error",
      error: failure.message,
      failedStage: failure instanceof StageInvocationError ? failure.stage : undefined
    });

    await this.writeAudit(scope, record);
    return failure;
  }

  private async writeAudit(scope: RunScope, record: ExecutionRecord): Promise<void> {
    try {
      const written = await this.auditSink.write(scope.requestId, toAuditRecord(record));
      if (!written && this.auditSink.available) {
        this.reportSinkFailure(scope, new SinkWriteError("audit", scope.requestId, "Audit sink rejected the record."));
      }
    } catch (error: unknown) {
      this.reportSinkFailure(
        scope,
        new SinkWriteError("audit", scope.requestId, toErrorMessage(error), { cause: error })
      );
    }
  }

  private async emitMetric(scope: RunScope, name: string, value: number, unit: MetricUnit): Promise<void> {
    const tags: MetricTags = { RequestID: scope.requestId.slice(0, 20) };
    try {
      const emitted = await this.metricSink.emit(name, value, unit, tags);
      if (!emitted && this.metricSink.available) {
        this.reportSinkFailure(scope, new SinkWriteError("metric", scope.requestId, `Metric ${name} was not accepted.`));
      }
    } catch (error: unknown) {
      this.reportSinkFailure(
        scope,
        new SinkWriteError("metric", scope.requestId, toErrorMessage(error), { cause: error })
      );
    }
  }

  private reportSinkFailure(scope: RunScope, error: SinkWriteError): void {
    scope.log.warn({ sink: error.sink, error: error.message }, "Sink write failed");
  }
}
