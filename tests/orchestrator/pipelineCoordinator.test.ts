import { describe, expect, it, vi } from "vitest";
import { PipelineCoordinator, PipelineTransition } from "../../src/orchestrator/pipelineCoordinator";

const scriptedInvoker = (outputs: Array<string | Error>) => {
  const prompts: string[] = [];
  const invoke = vi.fn(async (prompt: string): Promise<string> => {
    prompts.push(prompt);
    const next = outputs[prompts.length - 1];
    if (next instanceof Error) throw next;
    return next ?? "";
  });
  return { invoke, prompts };
};

describe("PipelineCoordinator", () => {
  it("runs Manager, Developer and Tester in order and returns the Tester output", async () => {
    const invoker = scriptedInvoker(["plan text", "code text", "tested code"]);
    const transitions: PipelineTransition[] = [];
    const coordinator = new PipelineCoordinator(invoker);

    const outcome = await coordinator.execute("Write a fibonacci function", undefined, (transition) =>
      transitions.push(transition)
    );

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.finalText).toBe("tested code");
    expect(outcome.stages.map((stage) => stage.role)).toEqual(["Manager", "Developer", "Tester"]);
    expect(outcome.durationMs).toBeGreaterThanOrEqual(0);

    expect(transitions.map((transition) => `${transition.from}->${transition.to}`)).toEqual([
      "Pending->RunningManager",
      "RunningManager->RunningDeveloper",
      "RunningDeveloper->RunningTester",
      "RunningTester->Completed"
    ]);
  });

  it("passes only the immediately preceding output forward", async () => {
    const invoker = scriptedInvoker(["plan text", "code text", "tested code"]);
    const coordinator = new PipelineCoordinator(invoker);

    await coordinator.execute("Write a fibonacci function", "n is non-negative");

    const [managerPrompt, developerPrompt, testerPrompt] = invoker.prompts;
    expect(managerPrompt).toContain("Task:\nWrite a fibonacci function\n\nContext:\nn is non-negative");
    expect(managerPrompt).not.toContain("Output from the");

    expect(developerPrompt).toContain("Original request:\nWrite a fibonacci function\n\nContext:\nn is non-negative");
    expect(developerPrompt).toContain("Output from the Manager stage:\nplan text");

    expect(testerPrompt).toContain("Original request:\nWrite a fibonacci function");
    expect(testerPrompt).toContain("Output from the Developer stage:\ncode text");
    expect(testerPrompt).not.toContain("plan text");
  });

  it("stops at the Manager stage when its call fails", async () => {
    const invoker = scriptedInvoker([new Error("transport error"), "code text", "tested code"]);
    const transitions: PipelineTransition[] = [];
    const coordinator = new PipelineCoordinator(invoker);

    const outcome = await coordinator.execute("task", undefined, (transition) => transitions.push(transition));

    expect(outcome).toMatchObject({
      status: "failed",
      failedStage: "Manager",
      error: "transport error"
    });
    expect(invoker.invoke).toHaveBeenCalledTimes(1);
    expect(transitions.at(-1)).toEqual({
      from: "RunningManager",
      to: "Failed",
      stage: "Manager",
      error: "transport error"
    });
  });

  it("never starts the Tester after a Developer failure", async () => {
    const invoker = scriptedInvoker(["plan text", new Error("model overloaded"), "tested code"]);
    const coordinator = new PipelineCoordinator(invoker);

    const outcome = await coordinator.execute("task");

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.failedStage).toBe("Developer");
    expect(outcome.error).toBe("model overloaded");
    expect(outcome.stages.map((stage) => stage.succeeded)).toEqual([true, false]);
    expect(invoker.invoke).toHaveBeenCalledTimes(2);
  });

  it("ignores a blank context", async () => {
    const invoker = scriptedInvoker(["a", "b", "c"]);
    await new PipelineCoordinator(invoker).execute("task", "   ");

    expect(invoker.prompts[0]).not.toContain("Context:");
  });
});
