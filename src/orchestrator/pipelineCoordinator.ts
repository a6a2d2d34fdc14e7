import { buildFullTask, createStageSpec } from "../agents/personas";
import { PipelineOutcome, PipelineState, StageResult, StageRole, stageOrder } from "../types";
import { LlmInvoker, StageRunOptions, runStage } from "./stageRunner";

export interface PipelineTransition {
  from: PipelineState;
  to: PipelineState;
  stage?: StageRole;
  error?: string;
}

export type PipelineTransitionListener = (transition: PipelineTransition) => void;

const runningState: Record<StageRole, PipelineState> = {
  Manager: "RunningManager",
  Developer: "RunningDeveloper",
  Tester: "RunningTester"
};

export class PipelineCoordinator {
  constructor(
    private readonly invoker: LlmInvoker,
    private readonly options: StageRunOptions = {}
  ) {}

  /**
   * Runs Manager, Developer and Tester in order. Each stage sees the request
   * and only the output of the stage right before it. The first failed stage
   * ends the run.
   */
  async execute(task: string, context?: string, onTransition?: PipelineTransitionListener): Promise<PipelineOutcome> {
    const started = Date.now();
    const fullTask = buildFullTask(task, context);
    const stages: StageResult[] = [];
    let state: PipelineState = "Pending";

    const moveTo = (next: PipelineState, stage?: StageRole, error?: string): void => {
      onTransition?.({ from: state, to: next, stage, error });
      state = next;
    };

    let previous: StageResult | undefined;
    for (const role of stageOrder) {
      moveTo(runningState[role], role);

      const result = await runStage(createStageSpec(role, fullTask), this.invoker, previous, {
        timeoutMs: this.options.timeoutMs
      });
      stages.push(result);

      if (!result.succeeded) {
        const error = result.error ?? "Stage failed without an error message.";
        moveTo("Failed", role, error);
        return {
          status: "failed",
          failedStage: role,
          error,
          stages,
          durationMs: Date.now() - started
        };
      }

      previous = result;
    }

    moveTo("Completed");
    return {
      status: "completed",
      finalText: previous?.outputText ?? "",
      stages,
      durationMs: Date.now() - started
    };
  }
}
