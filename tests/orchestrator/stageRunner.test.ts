import { describe, expect, it, vi } from "vitest";
import { createStageSpec } from "../../src/agents/personas";
import { buildStagePrompt, runStage } from "../../src/orchestrator/stageRunner";
import { StageResult } from "../../src/types";

describe("runStage", () => {
  it("returns the model output for a successful call", async () => {
    const invoker = { invoke: vi.fn(async () => "1. Parse input\n2. Compute result") };
    const spec = createStageSpec("Manager", "Write a fibonacci function");

    const result = await runStage(spec, invoker);

    expect(result).toEqual({
      role: "Manager",
      outputText: "1. Parse input\n2. Compute result",
      succeeded: true
    });
    expect(invoker.invoke).toHaveBeenCalledOnce();
    expect(invoker.invoke).toHaveBeenCalledWith(buildStagePrompt(spec));
  });

  it("builds the prompt from persona, description and expected output", () => {
    const prompt = buildStagePrompt(createStageSpec("Manager", "Write a fibonacci function"));

    expect(prompt).toBe(
      [
        "You are the Manager.",
        "Goal: Analyze project requirements and create an execution plan",
        "Background: Expert software project manager",
        "Task:\nWrite a fibonacci function",
        "Expected output:\nClear step-by-step implementation plan with analysis"
      ].join("\n\n")
    );
  });

  it("appends the previous stage output as context", () => {
    const previous: StageResult = { role: "Manager", outputText: "Step 1: iterate", succeeded: true };
    const prompt = buildStagePrompt(createStageSpec("Developer", "Write a fibonacci function"), previous);

    expect(prompt).toContain("Task:\nImplement the manager's plan. Write production-ready code.\n\nOriginal request:\nWrite a fibonacci function");
    expect(prompt.endsWith("Output from the Manager stage:\nStep 1: iterate")).toBe(true);
  });

  it("returns a failed result instead of throwing when the call fails", async () => {
    const invoker = { invoke: vi.fn(async (): Promise<string> => {
      throw new Error("connection reset");
    }) };

    const result = await runStage(createStageSpec("Tester", "task"), invoker);

    expect(result).toEqual({
      role: "Tester",
      outputText: "",
      succeeded: false,
      error: "connection reset"
    });
    expect(invoker.invoke).toHaveBeenCalledOnce();
  });

  it("fails the stage when the optional deadline passes", async () => {
    const invoker = { invoke: vi.fn(() => new Promise<string>(() => undefined)) };

    const result = await runStage(createStageSpec("Developer", "task"), invoker, undefined, { timeoutMs: 20 });

    expect(result.succeeded).toBe(false);
    expect(result.error).toBe("Developer stage timed out after 20ms");
  });
});
