import { personas } from "../agents/personas";
import { toErrorMessage } from "../errors";
import { StageResult, StageSpec } from "../types";

export interface LlmInvoker {
  invoke(prompt: string): Promise<string>;
}

export interface StageRunOptions {
  // Deadline for the single model call; 0 or undefined means none.
  timeoutMs?: number;
}

const withTimeout = async <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const buildStagePrompt = (spec: StageSpec, previous?: StageResult): string => {
  const persona = personas[spec.role];
  const sections = [
    `You are the ${persona.role}.`,
    `Goal: ${persona.goal}`,
    `Background: ${persona.backstory}`,
    `Task:\n${spec.description}`,
    `Expected output:\n${spec.expectedOutput}`
  ];

  if (previous) {
    sections.push(`Output from the ${previous.role} stage:\n${previous.outputText || "(empty)"}`);
  }

  return sections.join("\n\n");
};

/**
 * Runs one stage with exactly one model call. Failures come back as an
 * unsuccessful result; this function does not throw.
 */
export const runStage = async (
  spec: StageSpec,
  invoker: LlmInvoker,
  previous?: StageResult,
  options: StageRunOptions = {}
): Promise<StageResult> => {
  const prompt = buildStagePrompt(spec, previous);

  try {
    const call = invoker.invoke(prompt);
    const outputText = options.timeoutMs && options.timeoutMs > 0
      ? await withTimeout(call, options.timeoutMs, `${spec.role} stage`)
      : await call;

    return Object.freeze({ role: spec.role, outputText, succeeded: true });
  } catch (error: unknown) {
    return Object.freeze({
      role: spec.role,
      outputText: "",
      succeeded: false,
      error: toErrorMessage(error)
    });
  }
};
