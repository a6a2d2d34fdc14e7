import { z } from "zod";

export const taskRequestSchema = z.object({
  description: z.string().trim().min(10, "Task description must be at least 10 characters."),
  context: z.string().max(20_000).optional()
});

export const llmPingSchema = z.object({
  prompt: z.string().min(1).max(200).default("Respond with one short line: pong")
});

export const taskParamsSchema = z.object({
  id: z.string().min(1).max(200)
});
