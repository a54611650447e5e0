import type { LinkRecord, TagAssignment } from "../types";

export interface SummarizeInput {
  content: string;
  title?: string;
  description?: string;
  url?: string;
}

export interface Summarizer {
  /** Recorded as `summarizer_model` on every summary this produces. */
  readonly modelName: string;
  summarize(input: SummarizeInput): Promise<string>;
}

export interface Tagger {
  /** Resolves to `[]` when the provider fails or answers with nothing usable. */
  tag(link: LinkRecord): Promise<TagAssignment[]>;
}

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature?: number;
}

export interface CompletionClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}
