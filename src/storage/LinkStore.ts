import type { ExtractedLink, FetchStatus, LinkRecord, LinkStats, Tag, TagSource } from "../types";

/**
 * Read/write contract the pipeline runs against. `LinkRepository` is the
 * SQLite implementation; tests may substitute an in-memory one.
 */
export interface LinkStore {
  linkExists(url: string): boolean;
  /** Returns the new id, or the existing id when the URL is already stored. */
  insertLink(link: ExtractedLink): string;
  updateFetchResult(
    id: string,
    status: FetchStatus,
    content?: string | null,
    pageTitle?: string | null,
    error?: string | null,
  ): void;
  updateSummary(id: string, summary: string, model: string): void;
  addTag(id: string, tag: Tag, confidence: number, source?: TagSource): void;
  /** Records that the tag stage has run for a link, whatever it returned. */
  markTagged(id: string): void;

  fileNeedsProcessing(sourceFile: string, fileHash: string): boolean;
  markFileProcessed(sourceFile: string, fileHash: string): void;

  getUnfetchedLinks(limit: number): LinkRecord[];
  getUnsummarizedLinks(limit: number): LinkRecord[];
  getUntaggedLinks(limit: number): LinkRecord[];
  getEmptyContentLinks(limit: number, minLength?: number): LinkRecord[];
  getLinksWithContent(limit?: number): LinkRecord[];

  resetFetchStatus(id: string): void;
  clearAllTags(): void;
  getStats(): LinkStats;
}
