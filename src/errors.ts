import { StageRole } from "./types";

export const toErrorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class InvalidTaskError extends Error {
  constructor(message = "Task description is required.") {
    super(message);
    this.name = "InvalidTaskError";
  }
}

/**
 * Raised by the supervisor when a run does not complete. The audit record for
 * the run has already been written when this reaches the caller.
 */
export class PipelineExecutionError extends Error {
  constructor(
    readonly requestId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineExecutionError";
  }
}

export class StageInvocationError extends PipelineExecutionError {
  constructor(
    requestId: string,
    readonly stage: StageRole,
    message: string
  ) {
    super(requestId, `${stage} stage failed: ${message}`);
    this.name = "StageInvocationError";
  }
}

export class SinkWriteError extends Error {
  constructor(
    readonly sink: "audit" | "metric",
    readonly requestId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SinkWriteError";
  }
}
