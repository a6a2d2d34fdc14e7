import { AgentPersona, StageRole, StageSpec } from "../types";

export const personas: Readonly<Record<StageRole, AgentPersona>> = {
  Manager: {
    role: "Manager",
    goal: "Analyze project requirements and create an execution plan",
    backstory: "Expert software project manager"
  },
  Developer: {
    role: "Software Developer",
    goal: "Write clean, optimized, and error-free code",
    backstory: "Senior developer with strong problem-solving skills"
  },
  Tester: {
    role: "Software Tester",
    goal: "Detect bugs, fix code, and generate test cases",
    backstory: "Detail-oriented tester obsessed with correctness"
  }
};

interface StageTemplate {
  description?: string;
  expectedOutput: string;
}

const stageTemplates: Readonly<Record<StageRole, StageTemplate>> = {
  // The manager works on the request itself.
  Manager: {
    expectedOutput: "Clear step-by-step implementation plan with analysis"
  },
  Developer: {
    description: "Implement the manager's plan. Write production-ready code.",
    expectedOutput: "Clean, optimized, well-commented code following best practices"
  },
  Tester: {
    description: "Test the code thoroughly, find bugs, generate test cases",
    expectedOutput: "Verified code with comprehensive test cases and bug report"
  }
};

export const buildFullTask = (task: string, context?: string): string =>
  context?.trim() ? `${task}\n\nContext:\n${context}` : task;

export const createStageSpec = (role: StageRole, fullTask: string): StageSpec => {
  const template = stageTemplates[role];
  const description = template.description
    ? [template.description, `Original request:\n${fullTask}`].join("\n\n")
    : fullTask;

  return Object.freeze({
    role,
    description,
    expectedOutput: template.expectedOutput
  });
};
