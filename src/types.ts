export type StageRole = "Manager" | "Developer" | "Tester";

export const stageOrder: readonly StageRole[] = ["Manager", "Developer", "Tester"];

export type PipelineState =
  | "Pending"
  | "RunningManager"
  | "RunningDeveloper"
  | "RunningTester"
  | "Completed"
  | "Failed";

export interface AgentPersona {
  role: string;
  goal: string;
  backstory: string;
}

export interface StageSpec {
  readonly role: StageRole;
  readonly description: string;
  readonly expectedOutput: string;
}

export interface StageResult {
  readonly role: StageRole;
  readonly outputText: string;
  readonly succeeded: boolean;
  readonly error?: string;
}

export type PipelineOutcome =
  | {
      status: "completed";
      finalText: string;
      stages: StageResult[];
      durationMs: number;
    }
  | {
      status: "failed";
      failedStage: StageRole;
      error: string;
      stages: StageResult[];
      durationMs: number;
    };

export type ValidationStatus = "passed" | "flagged" | "failed";

export interface ValidationReport {
  status: ValidationStatus;
  issues: string[];
  confidence: number;
  issueCount: number;
}

export type ConfidenceLevel = "Very High" | "High" | "Medium" | "Low";

export type ExecutionStatus = "validated" | "flagged" | "error";

export interface ExecutionInput {
  task: string;
  context?: string;
  requestId?: string;
}

export interface ExecutionRecord {
  requestId: string;
  task: string;
  context?: string;
  resultText: string;
  confidence?: number;
  validation?: ValidationReport;
  executionTimeMs: number;
  timestamp: string;
  status: ExecutionStatus;
  error?: string;
  failedStage?: StageRole;
}

export type MetricUnit = "Count" | "Milliseconds" | "Seconds" | "None";
