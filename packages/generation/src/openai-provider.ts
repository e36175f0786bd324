import OpenAI from "openai";
import type { CompletionResult } from "@benchrag/types";
import type { IGenerationProvider } from "./generation-provider.interface.js";

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.1;

export interface OpenAIGenerationProviderConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class OpenAIGenerationProvider implements IGenerationProvider {
  readonly name = "openai";
  readonly model: string;
  private client: OpenAI;
  private temperature: number;

  constructor(config: OpenAIGenerationProviderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
  }

  async complete(prompt: string): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: this.temperature,
    });

    return {
      text: response.choices[0]?.message.content ?? "",
      model: response.model,
    };
  }
}
