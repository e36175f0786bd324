import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { TemplateError, messageOf } from "@benchrag/errors";
import type { AugmentedPrompt, ContextFormat, Question, ScoredChunk } from "@benchrag/types";
import { assembleContext } from "./context-assembler.js";

/** Fills the context slot when retrieval found nothing above the threshold. */
export const NO_CONTEXT_MARKER =
  "NO RELEVANT CONTEXT FOUND. The knowledge base returned no benchmark passages for this question. " +
  "Tell the user that no grounding context was found and do not present any part of the answer " +
  "as coming from the benchmarks.";

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;
const REQUIRED_PLACEHOLDERS = ["question", "context"] as const;

type PlaceholderName = (typeof REQUIRED_PLACEHOLDERS)[number];

function isPlaceholderName(name: string): name is PlaceholderName {
  return REQUIRED_PLACEHOLDERS.some((required) => required === name);
}

export interface PromptTemplate {
  readonly name: string;
  readonly source: string;
}

/**
 * Validate template text. Both `{{question}}` and `{{context}}` must appear;
 * anything else inside double braces is rejected.
 */
export function parsePromptTemplate(source: string, name: string): PromptTemplate {
  if (source.trim().length === 0) {
    throw new TemplateError(`Prompt template ${name} is empty`, name);
  }

  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER)) {
    const key = match[1] ?? "";
    if (!isPlaceholderName(key)) {
      throw new TemplateError(`Prompt template ${name} has unknown placeholder {{${key}}}`, name);
    }
    found.add(key);
  }

  const missing = REQUIRED_PLACEHOLDERS.filter((key) => !found.has(key));
  if (missing.length > 0) {
    throw new TemplateError(
      `Prompt template ${name} is missing ${missing.map((key) => `{{${key}}}`).join(", ")}`,
      name,
      { details: { missing } },
    );
  }

  const stripped = source.replace(PLACEHOLDER, "");
  if (stripped.includes("{{") || stripped.includes("}}")) {
    throw new TemplateError(`Prompt template ${name} has an unbalanced placeholder`, name);
  }

  return Object.freeze({ name, source });
}

export async function loadPromptTemplate(path: string): Promise<PromptTemplate> {
  let source: string;
  try {
    source = await readFile(path, "utf8");
  } catch (error: unknown) {
    throw new TemplateError(`Cannot read prompt template ${path}: ${messageOf(error)}`, basename(path), {
      cause: error,
    });
  }
  return parsePromptTemplate(source, basename(path));
}

/**
 * Pure rendering. Substitution is single-pass, so braces inside the
 * question or the chunks are never expanded.
 */
export function renderPrompt(
  template: PromptTemplate,
  question: Question,
  chunks: ScoredChunk[],
  format: ContextFormat,
): AugmentedPrompt {
  const context = chunks.length === 0 ? NO_CONTEXT_MARKER : assembleContext(chunks, format);
  return template.source.replace(PLACEHOLDER, (_match, key: string) =>
    key === "question" ? question : context,
  );
}

export interface PromptAugmenterOptions {
  contextFormat?: ContextFormat;
}

export class PromptAugmenter {
  private readonly contextFormat: ContextFormat;

  constructor(
    readonly template: PromptTemplate,
    options: PromptAugmenterOptions = {},
  ) {
    this.contextFormat = options.contextFormat ?? "markdown";
  }

  /** Load and validate the template once; the augmenter is then immutable. */
  static async fromFile(path: string, options?: PromptAugmenterOptions): Promise<PromptAugmenter> {
    return new PromptAugmenter(await loadPromptTemplate(path), options);
  }

  augment(question: Question, rankedChunks: ScoredChunk[]): AugmentedPrompt {
    return renderPrompt(this.template, question, rankedChunks, this.contextFormat);
  }
}
