import OpenAI from "openai";
import { config } from "../config";
import { toErrorMessage } from "../errors";
import { LlmInvoker } from "../orchestrator/stageRunner";

const statusOf = (error: unknown): number | undefined =>
  typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
    ? error.status
    : undefined;

export class OpenAiClient implements LlmInvoker {
  private readonly client: OpenAI;
  private modelValidationPromise?: Promise<void>;

  constructor() {
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl
    });
  }

  private static isModelsListUnsupportedError(error: unknown): boolean {
    const status = statusOf(error);
    if (status === 404 || status === 405 || status === 501) {
      return true;
    }

    return /models?.*(not found|unsupported)|unsupported.*models?/i.test(toErrorMessage(error));
  }

  private async validateWithModelsList(): Promise<void> {
    const response = await this.client.models.list();
    const modelIds = (response.data ?? [])
      .map((item) => (typeof item.id === "string" ? item.id.trim() : ""))
      .filter(Boolean);

    if (modelIds.length === 0 || modelIds.includes(config.model)) {
      return;
    }

    const sample = modelIds.slice(0, 8).join(", ");
    throw new Error(`Configured OPENAI_MODEL "${config.model}" is not in provider model list. Available models (sample): ${sample}`);
  }

  private async runModelValidation(): Promise<void> {
    try {
      await this.validateWithModelsList();
    } catch (error: unknown) {
      // Providers without a models endpoint are checked by the first real call.
      if (!OpenAiClient.isModelsListUnsupportedError(error)) {
        throw error;
      }
    }
  }

  async assertModelAvailable(): Promise<void> {
    if (!this.modelValidationPromise) {
      this.modelValidationPromise = this.runModelValidation();
    }

    return this.modelValidationPromise;
  }

  async invoke(prompt: string): Promise<string> {
    await this.assertModelAvailable();

    const response = await this.client.chat.completions.create({
      model: config.model,
      temperature: config.temperature,
      messages: [{ role: "user", content: prompt }]
    });

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }
}
