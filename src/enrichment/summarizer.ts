import scale from "../config/scale";
import type { CompletionClient, SummarizeInput, Summarizer } from "./types";

export function buildSummaryPrompt(
  input: SummarizeInput,
  maxContent: number = scale.enrichment.summaryInputLength,
): string {
  const content =
    input.content.length > maxContent ? `${input.content.slice(0, maxContent)}...` : input.content;

  return `Summarize this web page in 2-3 sentences. Focus on the main topic and key takeaways.

Title: ${input.title || "Unknown"}
URL: ${input.url || "Unknown"}
User's note: ${input.description || "None provided"}

Content:
${content}

Summary:`;
}

export class LlmSummarizer implements Summarizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly maxTokens = scale.enrichment.summaryMaxTokens,
  ) {}

  get modelName(): string {
    return this.client.model;
  }

  async summarize(input: SummarizeInput): Promise<string> {
    const summary = await this.client.complete({
      prompt: buildSummaryPrompt(input),
      maxTokens: this.maxTokens,
    });

    if (!summary) throw new Error(`Empty summary from ${this.modelName}`);
    return summary;
  }
}
