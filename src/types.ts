export const FETCH_STATUSES = ["not_fetched", "success", "failed", "timeout", "skipped"] as const;
export type FetchStatus = (typeof FETCH_STATUSES)[number];

export const TAG_CATEGORIES = ["programming_language", "technical_topic", "culture"] as const;
export type TagCategory = (typeof TAG_CATEGORIES)[number];

export type TagSource = "llm" | "manual" | "auto";

// A dated note file, e.g. notes/2025/03/2025-03-15.md
export interface SourceFile {
  path: string;
  date: string; // YYYY-MM-DD
}

export interface ExtractedLink {
  url: string;
  title?: string;
  description?: string;
  source_date: string;
  source_file: string;
  indent_level: number;
  parent_url?: string;
}

export interface LinkRecord {
  id: string;
  url: string;
  title: string | null;
  description: string | null;
  domain: string;
  source_date: string;
  source_file: string;
  parent_url: string | null;
  indent_level: number;

  page_title: string | null;
  page_content: string | null;
  fetch_status: FetchStatus;
  fetch_error: string | null;
  fetched_at: string | null;

  summary: string | null;
  summarized_at: string | null;
  summarizer_model: string | null;

  /** Set once the tagger has answered for this record, tags or not. */
  tagged_at: string | null;

  created_at: string;
  updated_at: string;
}

export interface Tag {
  name: string;
  category: TagCategory;
}

export interface TagAssignment {
  tag: Tag;
  confidence: number;
}

export interface LinkTag extends Tag {
  confidence: number;
  source: TagSource;
}

export interface TagCount extends Tag {
  count: number;
}

export interface LinkStats {
  totalLinks: number;
  fetched: number;
  summarized: number;
  tagged: number;
}

export type LinkSort = "date_desc" | "date_asc" | "title" | "domain";

export interface LinkFilters {
  page?: number;
  perPage?: number;
  sort?: LinkSort;
  tags?: string[];
  domain?: string;
  dateFrom?: string;
  dateTo?: string;
}

export interface LinkQueryParams {
  page?: string;
  sort?: string;
  tag?: string | string[];
  domain?: string;
  dateFrom?: string;
  dateTo?: string;
}

export function isTagCategory(value: unknown): value is TagCategory {
  return TAG_CATEGORIES.some((category) => category === value);
}

export interface LinkPage {
  links: LinkRecord[];
  total: number;
  page: number;
  totalPages: number;
}

export interface DomainCount {
  domain: string;
  count: number;
}

export interface DateCount {
  date: string;
  count: number;
}

interface FetchOutcome {
  contentType?: string;
  fetchedAt: Date;
}

export type FetchResult =
  | (FetchOutcome & {
      status: "success";
      content: string;
      title?: string;
    })
  | (FetchOutcome & {
      status: "failed" | "timeout" | "skipped";
      error: string;
    });
