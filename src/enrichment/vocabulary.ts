import { z } from "zod";
import type { Tag, TagCategory } from "../types";
import rawVocabulary from "./tags.json";

const tagNames = z.array(
  z
    .string()
    .trim()
    .min(1)
    .regex(/^[a-z0-9-]+$/, "tag names are lowercase kebab-case"),
);

const vocabularySchema = z.object({
  programming_language: tagNames,
  technical_topic: tagNames,
  culture: tagNames,
}) satisfies z.ZodType<Record<TagCategory, string[]>>;

export type TagVocabulary = z.infer<typeof vocabularySchema>;

export function parseVocabulary(data: unknown): TagVocabulary {
  const vocabulary = vocabularySchema.parse(data);

  const seen = new Set<string>();
  for (const names of Object.values(vocabulary)) {
    for (const name of names) {
      if (seen.has(name)) throw new Error(`Tag "${name}" is listed in more than one category`);
      seen.add(name);
    }
  }
  return vocabulary;
}

export const TAG_VOCABULARY: TagVocabulary = parseVocabulary(rawVocabulary);

export function isKnownTag(tag: Tag, vocabulary: TagVocabulary = TAG_VOCABULARY): boolean {
  return vocabulary[tag.category].includes(tag.name);
}

// Category headings followed by indented "- name" lines, for prompts
export function formatTagList(vocabulary: TagVocabulary = TAG_VOCABULARY): string {
  return Object.entries(vocabulary)
    .map(([category, names]) => [`${category}:`, ...names.map((name) => `  - ${name}`)].join("\n"))
    .join("\n\n");
}
