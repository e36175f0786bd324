import { CohereClient } from "cohere-ai";
import type { CompletionResult } from "@benchrag/types";
import type { IGenerationProvider } from "./generation-provider.interface.js";

const DEFAULT_MODEL = "command-r-plus";
const DEFAULT_TEMPERATURE = 0.1;

export interface CohereGenerationProviderConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class CohereGenerationProvider implements IGenerationProvider {
  readonly name = "cohere";
  readonly model: string;
  private client: CohereClient;
  private temperature: number;
  private timeoutInSeconds: number | undefined;

  constructor(config: CohereGenerationProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutInSeconds = config.timeoutMs === undefined ? undefined : config.timeoutMs / 1000;
  }

  async complete(prompt: string): Promise<CompletionResult> {
    const response = await this.client.v2.chat(
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.temperature,
      },
      { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 },
    );

    const text = (response.message.content ?? [])
      .map((item) => (item.type === "text" ? item.text : ""))
      .join("");

    return { text, model: this.model };
  }
}
