import { GenerationError, messageOf, statusOf } from "@benchrag/errors";
import type { AugmentedPrompt, GenerationResult } from "@benchrag/types";
import type { IGenerationProvider } from "./generation-provider.interface.js";

/**
 * Sends an augmented prompt to the generation model. Holds nothing but the
 * provider; safe to share across sequential queries.
 */
export class GenerationService {
  constructor(private readonly provider: IGenerationProvider) {}

  get model(): string {
    return this.provider.model;
  }

  async generate(prompt: AugmentedPrompt): Promise<GenerationResult> {
    let text: string;
    let model: string;
    try {
      ({ text, model } = await this.provider.complete(prompt));
    } catch (error: unknown) {
      const rateLimited = statusOf(error) === 429;
      throw new GenerationError(
        `Generation request to ${this.provider.name} failed: ${messageOf(error)}`,
        rateLimited ? "rate_limited" : "transport",
        this.provider.model,
        { cause: error },
      );
    }

    if (text.trim().length === 0) {
      throw new GenerationError(
        `Generation model ${model} returned an empty response`,
        "empty_response",
        model,
      );
    }

    return { text, model };
  }
}
