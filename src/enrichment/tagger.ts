import { z } from "zod";
import scale from "../config/scale";
import { errorMessage } from "../lib/helpers";
import logger from "../lib/logger";
import { isTagCategory, type LinkRecord, type TagAssignment } from "../types";
import type { CompletionClient, Tagger } from "./types";
import { formatTagList, isKnownTag, TAG_VOCABULARY, type TagVocabulary } from "./vocabulary";

const responseSchema = z.object({ tags: z.array(z.unknown()) });

const tagSchema = z.object({
  name: z.string(),
  category: z.string(),
  confidence: z.coerce.number().default(0.5),
});

function stripCodeFence(response: string): string {
  const trimmed = response.trim();
  if (!trimmed.startsWith("```")) return trimmed;

  const lines = trimmed.split("\n");
  const end = lines[lines.length - 1].trim() === "```" ? -1 : undefined;
  return lines.slice(1, end).join("\n");
}

/**
 * Reads `{"tags": [{"name", "category", "confidence"}]}` out of a model
 * answer. Entries outside the vocabulary are dropped; anything unparsable
 * yields `[]`.
 */
export function parseTagResponse(
  response: string,
  vocabulary: TagVocabulary = TAG_VOCABULARY,
): TagAssignment[] {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(response));
  } catch (error) {
    logger.warn(`[Tag] Failed to parse model response: ${errorMessage(error)}`);
    return [];
  }

  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn("[Tag] Model response has no tags array");
    return [];
  }

  const assignments: TagAssignment[] = [];
  const seen = new Set<string>();

  for (const item of parsed.data.tags) {
    const entry = tagSchema.safeParse(item);
    if (!entry.success) continue;

    const name = entry.data.name.trim().toLowerCase();
    const category = entry.data.category.trim().toLowerCase();

    if (!isTagCategory(category)) {
      logger.warn(`[Tag] Unknown category: ${category}`);
      continue;
    }

    const tag = { name, category };
    if (!isKnownTag(tag, vocabulary)) {
      logger.warn(`[Tag] Unknown tag: ${name} in ${category}`);
      continue;
    }

    if (seen.has(name)) continue;
    seen.add(name);

    const confidence = Number.isFinite(entry.data.confidence) ? entry.data.confidence : 0.5;
    assignments.push({ tag, confidence: Math.min(1, Math.max(0, confidence)) });
  }

  return assignments;
}

export function buildTagPrompt(link: LinkRecord, vocabulary: TagVocabulary = TAG_VOCABULARY): string {
  return `Analyze this web link and assign appropriate tags from the available categories.

AVAILABLE TAGS:
${formatTagList(vocabulary)}

LINK INFORMATION:
- Title: ${link.title || link.page_title || "Unknown"}
- URL: ${link.url}
- Domain: ${link.domain}
- User's description: ${link.description || "None"}
- Summary: ${link.summary || "None"}

INSTRUCTIONS:
1. Select 1-5 tags that best describe this content
2. Only use tags from the AVAILABLE TAGS list above
3. Assign a confidence score (0.0-1.0) for each tag
4. Higher confidence for explicit mentions, lower for inferred topics
5. Return ONLY valid JSON, no other text

Return your response as JSON in this exact format:
{"tags": [{"name": "tag-name", "category": "category_name", "confidence": 0.9}]}

JSON response:`;
}

export class LlmTagger implements Tagger {
  constructor(
    private readonly client: CompletionClient,
    private readonly vocabulary: TagVocabulary = TAG_VOCABULARY,
    private readonly maxTokens = scale.enrichment.tagMaxTokens,
  ) {}

  async tag(link: LinkRecord): Promise<TagAssignment[]> {
    try {
      const response = await this.client.complete({
        prompt: buildTagPrompt(link, this.vocabulary),
        maxTokens: this.maxTokens,
        temperature: 0,
      });
      return parseTagResponse(response, this.vocabulary);
    } catch (error) {
      logger.error(`[Tag] Tagging failed for ${link.url}: ${errorMessage(error)}`);
      return [];
    }
  }
}
