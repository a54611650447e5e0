import { promises as fs } from "fs";
import { performance } from "perf_hooks";
import scale from "../config/scale";
import type { Summarizer, Tagger } from "../enrichment/types";
import { errorMessage, hashContent } from "../lib/helpers";
import logger from "../lib/logger";
import type { LinkStore } from "../storage/LinkStore";
import type { ExtractedLink, FetchResult, LinkRecord, LinkStats } from "../types";
import type { DocumentFetcher } from "./fetcher";
import type { LinkParser } from "./parser";
import type { PdfFetcher } from "./pdf";
import type { ScanOptions, SourceScanner } from "./scanner";

export interface PipelineDependencies {
  store: LinkStore;
  scanner: Pick<SourceScanner, "scan">;
  parser: Pick<LinkParser, "parse">;
  fetcher: Pick<DocumentFetcher, "isPdf" | "fetch">;
  pdfFetcher: Pick<PdfFetcher, "fetch">;
  /** Required only when the summarize stage runs. */
  summarizer?: Summarizer;
  /** Required only when the tag stage or `retag` runs. */
  tagger?: Tagger;
  batchSize?: number;
}

export interface RunOptions extends ScanOptions {
  skipExisting?: boolean;
  fetch?: boolean;
  summarize?: boolean;
  tag?: boolean;
}

export interface PipelineReport {
  filesFound: number;
  filesParsed: number;
  linksFound: number;
  newLinks: number;
  fetched: number;
  summarized: number;
  tagged: number;
  stats: LinkStats;
}

export interface ExtractReport {
  filesFound: number;
  filesParsed: number;
  linksFound: number;
  newLinks: number;
}

export interface RefetchReport {
  links: LinkRecord[];
  reset: number;
}

export interface RetagReport {
  links: number;
  tagsApplied: number;
}

// page_title, then description, then title, deduplicated; the URL when all are empty
export function metadataSummary(link: LinkRecord): string {
  const parts: string[] = [];
  if (link.page_title) parts.push(link.page_title);
  if (link.description && link.description !== link.page_title) parts.push(link.description);
  if (link.title && !parts.includes(link.title)) parts.push(link.title);

  return parts.length > 0 ? parts.join(" - ") : link.url;
}

/**
 * Drives links through extract -> fetch -> summarize -> tag. Which links a
 * stage picks up depends only on what is already stored, so an interrupted
 * run can simply be started again.
 */
export class PipelineController {
  private readonly store: LinkStore;
  private readonly batchSize: number;

  constructor(private readonly deps: PipelineDependencies) {
    this.store = deps.store;
    this.batchSize = deps.batchSize ?? scale.pipeline.batchSize;
  }

  async run(options: RunOptions = {}): Promise<PipelineReport> {
    const startTime = performance.now();
    const { fetch = true, summarize = true, tag = true } = options;

    // Fail before any work when a requested stage has no provider
    if (summarize) this.requireSummarizer();
    if (tag) this.requireTagger();

    const extracted = await this.extractLinks(options);
    const fetched = fetch ? await this.fetchLinks() : 0;
    const summarized = summarize ? await this.summarizeLinks() : 0;
    const tagged = tag ? await this.tagLinks() : 0;

    const stats = this.store.getStats();
    logger.info(
      `[Pipeline] Done in ${((performance.now() - startTime) / 1000).toFixed(2)}s | ` +
        `${stats.totalLinks} total, ${stats.fetched} fetched, ` +
        `${stats.summarized} summarized, ${stats.tagged} tagged`,
    );

    return { ...extracted, fetched, summarized, tagged, stats };
  }

  async extractLinks(options: RunOptions = {}): Promise<ExtractReport> {
    const { skipExisting = true } = options;
    const files = await this.deps.scanner.scan({
      dateFrom: options.dateFrom,
      dateTo: options.dateTo,
    });
    logger.info(`[Extract] Found ${files.length} note files`);

    const report: ExtractReport = {
      filesFound: files.length,
      filesParsed: 0,
      linksFound: 0,
      newLinks: 0,
    };

    for (const file of files) {
      let bytes: Buffer;
      try {
        bytes = await fs.readFile(file.path);
      } catch (error) {
        logger.warn(`[Extract] Cannot read ${file.path}: ${errorMessage(error)}`);
        continue;
      }

      // The hash and the parse see the same bytes
      const fileHash = hashContent(bytes);
      if (skipExisting && !this.store.fileNeedsProcessing(file.path, fileHash)) continue;

      let links: ExtractedLink[];
      try {
        links = this.deps.parser.parse(bytes.toString("utf-8"), file);
      } catch (error) {
        logger.warn(`[Extract] Cannot parse ${file.path}: ${errorMessage(error)}`);
        continue;
      }

      report.filesParsed++;
      report.linksFound += links.length;

      for (const link of links) {
        if (this.store.linkExists(link.url)) continue;
        this.store.insertLink(link);
        report.newLinks++;
      }

      this.store.markFileProcessed(file.path, fileHash);
    }

    logger.info(
      `[Extract] Parsed ${report.filesParsed} files | ` +
        `${report.linksFound} links | ${report.newLinks} new`,
    );
    return report;
  }

  async fetchLinks(): Promise<number> {
    const links = this.store.getUnfetchedLinks(this.batchSize);
    if (links.length === 0) {
      logger.info("[Fetch] No unfetched links");
      return 0;
    }

    logger.info(`[Fetch] Fetching ${links.length} links...`);
    for (const link of links) {
      const result = this.deps.fetcher.isPdf(link.url)
        ? await this.deps.pdfFetcher.fetch(link.url)
        : await this.deps.fetcher.fetch(link.url);

      this.recordFetch(link, result);
    }
    return links.length;
  }

  async summarizeLinks(): Promise<number> {
    const summarizer = this.requireSummarizer();
    const links = this.store.getUnsummarizedLinks(this.batchSize);
    if (links.length === 0) {
      logger.info("[Summarize] No links to summarize");
      return 0;
    }

    logger.info(`[Summarize] Summarizing ${links.length} links...`);
    let summarized = 0;

    for (const link of links) {
      if (!link.page_content) {
        this.store.updateSummary(link.id, metadataSummary(link), "metadata");
        logger.debug(`[Summarize] [metadata] ${link.url}`);
        summarized++;
        continue;
      }

      try {
        const summary = await summarizer.summarize({
          content: link.page_content,
          title: link.page_title ?? link.title ?? undefined,
          description: link.description ?? undefined,
          url: link.url,
        });
        this.store.updateSummary(link.id, summary, summarizer.modelName);
        logger.debug(`[Summarize] ${link.url}`);
        summarized++;
      } catch (error) {
        logger.error(`[Summarize] Failed to summarize ${link.url}: ${errorMessage(error)}`);
      }
    }

    return summarized;
  }

  async tagLinks(): Promise<number> {
    const links = this.store.getUntaggedLinks(this.batchSize);
    if (links.length === 0) {
      logger.info("[Tag] No untagged links");
      return 0;
    }

    logger.info(`[Tag] Tagging ${links.length} links...`);
    const { linksTagged, tagsApplied } = await this.applyTags(links);
    logger.info(`[Tag] Applied ${tagsApplied} tags to ${linksTagged} links`);
    return linksTagged;
  }

  refetchEmptyContent(options: { limit?: number; dryRun?: boolean } = {}): RefetchReport {
    const links = this.store.getEmptyContentLinks(options.limit ?? 1000);
    if (options.dryRun) return { links, reset: 0 };

    for (const link of links) this.store.resetFetchStatus(link.id);
    logger.info(`[Refetch] Reset ${links.length} links for the next run`);
    return { links, reset: links.length };
  }

  async retag(options: { clearExisting?: boolean; limit?: number } = {}): Promise<RetagReport> {
    this.requireTagger();
    if (options.clearExisting) this.store.clearAllTags();

    const links = this.store.getLinksWithContent(options.limit);
    logger.info(`[Tag] Re-tagging ${links.length} links...`);

    const { tagsApplied } = await this.applyTags(links);
    return { links: links.length, tagsApplied };
  }

  private async applyTags(
    links: LinkRecord[],
  ): Promise<{ linksTagged: number; tagsApplied: number }> {
    const tagger = this.requireTagger();
    let linksTagged = 0;
    let tagsApplied = 0;

    for (const [index, link] of links.entries()) {
      try {
        const assignments = await tagger.tag(link);
        for (const { tag, confidence } of assignments) {
          this.store.addTag(link.id, tag, confidence, "llm");
        }
        this.store.markTagged(link.id);

        if (assignments.length > 0) {
          linksTagged++;
          tagsApplied += assignments.length;
        }
        logger.debug(
          `[Tag] [${index + 1}/${links.length}] ${link.url} -> ` +
            (assignments.map(({ tag }) => tag.name).join(", ") || "no tags"),
        );
      } catch (error) {
        logger.error(`[Tag] Failed to tag ${link.url}: ${errorMessage(error)}`);
      }
    }

    return { linksTagged, tagsApplied };
  }

  private recordFetch(link: LinkRecord, result: FetchResult): void {
    if (result.status === "success") {
      this.store.updateFetchResult(link.id, result.status, result.content, result.title ?? null);
      logger.info(`[Fetch] [OK] ${link.url}`);
    } else {
      this.store.updateFetchResult(link.id, result.status, null, null, result.error);
      logger.info(`[Fetch] [${result.status}] ${link.url} (${result.error})`);
    }
  }

  private requireSummarizer(): Summarizer {
    if (!this.deps.summarizer) throw new Error("Summarize stage requested without a summarizer");
    return this.deps.summarizer;
  }

  private requireTagger(): Tagger {
    if (!this.deps.tagger) throw new Error("Tag stage requested without a tagger");
    return this.deps.tagger;
  }
}
