import type { Database } from "better-sqlite3";
import { monotonicFactory } from "ulid";
import scale from "../config/scale";
import { extractDomain } from "../lib/helpers";
import logger from "../lib/logger";
import type {
  DateCount,
  DomainCount,
  ExtractedLink,
  FetchStatus,
  LinkFilters,
  LinkPage,
  LinkRecord,
  LinkSort,
  LinkStats,
  LinkTag,
  Tag,
  TagCount,
  TagSource,
} from "../types";
import type { LinkStore } from "./LinkStore";

const ulid = monotonicFactory();

// ULIDs are monotonic, so id breaks date ties in insertion order
const SORT_ORDER: Record<LinkSort, string> = {
  date_desc: "source_date DESC, id ASC",
  date_asc: "source_date ASC, id ASC",
  title: "COALESCE(title, description, url) ASC, id ASC",
  domain: "domain ASC, source_date DESC, id ASC",
};

// Quote every term so user input is never read as FTS5 syntax
export function toFtsQuery(query: string): string {
  return query
    .split(/\s+/)
    .filter(Boolean)
    .map((term) => `"${term.replace(/"/g, '""')}"`)
    .join(" ");
}

export class LinkRepository implements LinkStore {
  constructor(private readonly db: Database) {}

  linkExists(url: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>("SELECT 1 AS found FROM links WHERE url = ?")
      .get(url);
    return row !== undefined;
  }

  insertLink(link: ExtractedLink): string {
    return this.db.transaction(() => {
      this.db
        .prepare(
          `
          INSERT OR IGNORE INTO links
          (id, url, title, description, domain, source_date, source_file, parent_url, indent_level)
          VALUES (@id, @url, @title, @description, @domain, @source_date, @source_file, @parent_url, @indent_level)
        `,
        )
        .run({
          id: ulid(),
          url: link.url,
          title: link.title ?? null,
          description: link.description ?? null,
          domain: extractDomain(link.url),
          source_date: link.source_date,
          source_file: link.source_file,
          parent_url: link.parent_url ?? null,
          indent_level: link.indent_level,
        });

      const row = this.db
        .prepare<[string], { id: string }>("SELECT id FROM links WHERE url = ?")
        .get(link.url);
      if (!row) throw new Error(`Failed to store link ${link.url}`);
      return row.id;
    })();
  }

  updateFetchResult(
    id: string,
    status: FetchStatus,
    content: string | null = null,
    pageTitle: string | null = null,
    error: string | null = null,
  ): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `
          UPDATE links
          SET fetch_status = ?, page_content = ?, page_title = ?, fetch_error = ?,
              fetched_at = datetime('now'), updated_at = datetime('now')
          WHERE id = ?
        `,
        )
        .run(status, content, pageTitle, error, id);
    })();
  }

  updateSummary(id: string, summary: string, model: string): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `
          UPDATE links
          SET summary = ?, summarizer_model = ?,
              summarized_at = datetime('now'), updated_at = datetime('now')
          WHERE id = ?
        `,
        )
        .run(summary, model, id);
    })();
  }

  addTag(id: string, tag: Tag, confidence: number, source: TagSource = "auto"): void {
    this.db.transaction(() => {
      this.db
        .prepare("INSERT OR IGNORE INTO tags (name, category) VALUES (?, ?)")
        .run(tag.name, tag.category);

      const row = this.db
        .prepare<[string], { id: number }>("SELECT id FROM tags WHERE name = ?")
        .get(tag.name);
      if (!row) throw new Error(`Failed to store tag ${tag.name}`);

      this.db
        .prepare(
          `
          INSERT OR REPLACE INTO link_tags (link_id, tag_id, confidence, source)
          VALUES (?, ?, ?, ?)
        `,
        )
        .run(id, row.id, Math.min(1, Math.max(0, confidence)), source);
    })();
  }

  markTagged(id: string): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          "UPDATE links SET tagged_at = datetime('now'), updated_at = datetime('now') WHERE id = ?",
        )
        .run(id);
    })();
  }

  // Also forgets every tag attempt, so the tag stage offers the links again
  clearAllTags(): void {
    this.db.transaction(() => {
      const { changes } = this.db.prepare("DELETE FROM link_tags").run();
      this.db.prepare("UPDATE links SET tagged_at = NULL WHERE tagged_at IS NOT NULL").run();
      logger.info(`Cleared ${changes} tag associations`);
    })();
  }

  fileNeedsProcessing(sourceFile: string, fileHash: string): boolean {
    const row = this.db
      .prepare<[string], { file_hash: string }>(
        "SELECT file_hash FROM processing_log WHERE source_file = ?",
      )
      .get(sourceFile);
    return row === undefined || row.file_hash !== fileHash;
  }

  markFileProcessed(sourceFile: string, fileHash: string): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `
          INSERT INTO processing_log (source_file, file_hash, processed_at)
          VALUES (?, ?, datetime('now'))
          ON CONFLICT(source_file) DO UPDATE
          SET file_hash = excluded.file_hash, processed_at = excluded.processed_at
        `,
        )
        .run(sourceFile, fileHash);
    })();
  }

  getUnfetchedLinks(limit: number): LinkRecord[] {
    return this.db
      .prepare<[number], LinkRecord>(
        `SELECT * FROM links WHERE fetch_status = 'not_fetched' ORDER BY ${SORT_ORDER.date_desc} LIMIT ?`,
      )
      .all(limit);
  }

  getUnsummarizedLinks(limit: number): LinkRecord[] {
    return this.db
      .prepare<[number], LinkRecord>(
        `
        SELECT * FROM links
        WHERE fetch_status != 'not_fetched' AND summary IS NULL
        ORDER BY ${SORT_ORDER.date_desc}
        LIMIT ?
      `,
      )
      .all(limit);
  }

  getUntaggedLinks(limit: number): LinkRecord[] {
    return this.db
      .prepare<[number], LinkRecord>(
        `
        SELECT * FROM links
        WHERE fetch_status != 'not_fetched' AND tagged_at IS NULL
        ORDER BY ${SORT_ORDER.date_desc}
        LIMIT ?
      `,
      )
      .all(limit);
  }

  getEmptyContentLinks(limit: number, minLength = scale.pipeline.emptyContentThreshold): LinkRecord[] {
    return this.db
      .prepare<[number, number], LinkRecord>(
        `
        SELECT * FROM links
        WHERE fetch_status = 'success'
          AND (page_content IS NULL OR LENGTH(page_content) < ?)
        ORDER BY ${SORT_ORDER.date_desc}
        LIMIT ?
      `,
      )
      .all(minLength, limit);
  }

  // Every record that has left not_fetched; -1 lifts SQLite's LIMIT
  getLinksWithContent(limit?: number): LinkRecord[] {
    return this.db
      .prepare<[number], LinkRecord>(
        `
        SELECT * FROM links
        WHERE fetch_status != 'not_fetched'
        ORDER BY ${SORT_ORDER.date_desc}
        LIMIT ?
      `,
      )
      .all(limit ?? -1);
  }

  resetFetchStatus(id: string): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `
          UPDATE links
          SET fetch_status = 'not_fetched', page_content = NULL, page_title = NULL,
              fetch_error = NULL, fetched_at = NULL, updated_at = datetime('now')
          WHERE id = ?
        `,
        )
        .run(id);
    })();
  }

  getLinkById(id: string): LinkRecord | undefined {
    return this.db.prepare<[string], LinkRecord>("SELECT * FROM links WHERE id = ?").get(id);
  }

  getLinkByUrl(url: string): LinkRecord | undefined {
    return this.db.prepare<[string], LinkRecord>("SELECT * FROM links WHERE url = ?").get(url);
  }

  search(query: string, limit: number = scale.search.maxResults): LinkRecord[] {
    const match = toFtsQuery(query);
    if (!match) return [];

    return this.db
      .prepare<[string, number], LinkRecord>(
        `
        SELECT links.* FROM links_fts
        JOIN links ON links.id = links_fts.link_id
        WHERE links_fts MATCH ?
        ORDER BY rank
        LIMIT ?
      `,
      )
      .all(match, limit);
  }

  getLinksByTag(tagName: string): LinkRecord[] {
    return this.db
      .prepare<[string], LinkRecord>(
        `
        SELECT links.* FROM links
        JOIN link_tags ON links.id = link_tags.link_id
        JOIN tags ON link_tags.tag_id = tags.id
        WHERE tags.name = ?
        ORDER BY links.source_date DESC, links.id ASC
      `,
      )
      .all(tagName);
  }

  getLinksByDateRange(dateFrom: string, dateTo: string): LinkRecord[] {
    return this.db
      .prepare<[string, string], LinkRecord>(
        `SELECT * FROM links WHERE source_date BETWEEN ? AND ? ORDER BY ${SORT_ORDER.date_desc}`,
      )
      .all(dateFrom, dateTo);
  }

  getRecentLinks(limit = 20): LinkRecord[] {
    return this.db
      .prepare<[number], LinkRecord>(`SELECT * FROM links ORDER BY ${SORT_ORDER.date_desc} LIMIT ?`)
      .all(limit);
  }

  getAllTags(): TagCount[] {
    return this.db
      .prepare<[], TagCount>(
        `
        SELECT t.name, t.category, COUNT(lt.link_id) AS count
        FROM tags t
        LEFT JOIN link_tags lt ON t.id = lt.tag_id
        GROUP BY t.id
        ORDER BY count DESC, t.name ASC
      `,
      )
      .all();
  }

  getTagsForLink(id: string): LinkTag[] {
    return this.db
      .prepare<[string], LinkTag>(
        `
        SELECT t.name, t.category, lt.confidence, lt.source
        FROM tags t
        JOIN link_tags lt ON t.id = lt.tag_id
        WHERE lt.link_id = ?
        ORDER BY lt.confidence DESC, t.name ASC
      `,
      )
      .all(id);
  }

  getLinksPaginated(filters: LinkFilters = {}): LinkPage {
    const page = filters.page ?? 1;
    const perPage = filters.perPage ?? scale.search.pageSize;
    const conditions: string[] = [];
    const params: Record<string, string | number> = {};

    const tags = [...new Set(filters.tags ?? [])];
    if (tags.length > 0) {
      // AND semantics: the link must carry every requested tag
      const placeholders = tags.map((tag, index) => {
        params[`tag${index}`] = tag;
        return `@tag${index}`;
      });
      conditions.push(`
        id IN (
          SELECT link_id FROM link_tags
          JOIN tags ON link_tags.tag_id = tags.id
          WHERE tags.name IN (${placeholders.join(", ")})
          GROUP BY link_id
          HAVING COUNT(DISTINCT tags.name) = @tagCount
        )
      `);
      params.tagCount = tags.length;
    }

    if (filters.domain) {
      conditions.push("domain = @domain");
      params.domain = filters.domain;
    }

    if (filters.dateFrom) {
      conditions.push("source_date >= @dateFrom");
      params.dateFrom = filters.dateFrom;
    }

    if (filters.dateTo) {
      conditions.push("source_date <= @dateTo");
      params.dateTo = filters.dateTo;
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    const total =
      this.db
        .prepare<[Record<string, string | number>], { total: number }>(
          `SELECT COUNT(*) AS total FROM links ${whereClause}`,
        )
        .get(params)?.total ?? 0;

    const links = this.db
      .prepare<[Record<string, string | number>], LinkRecord>(
        `
        SELECT * FROM links
        ${whereClause}
        ORDER BY ${SORT_ORDER[filters.sort ?? "date_desc"]}
        LIMIT @limit OFFSET @offset
      `,
      )
      .all({ ...params, limit: perPage, offset: (page - 1) * perPage });

    return {
      links,
      total,
      page,
      totalPages: Math.ceil(total / perPage),
    };
  }

  getAllDomains(): DomainCount[] {
    return this.db
      .prepare<[], DomainCount>(
        "SELECT domain, COUNT(*) AS count FROM links GROUP BY domain ORDER BY count DESC, domain ASC",
      )
      .all();
  }

  getDateCounts(): DateCount[] {
    return this.db
      .prepare<[], DateCount>(
        "SELECT source_date AS date, COUNT(*) AS count FROM links GROUP BY source_date ORDER BY source_date DESC",
      )
      .all();
  }

  getStats(): LinkStats {
    const count = (sql: string) =>
      this.db.prepare<[], { total: number }>(sql).get()?.total ?? 0;

    return {
      totalLinks: count("SELECT COUNT(*) AS total FROM links"),
      fetched: count("SELECT COUNT(*) AS total FROM links WHERE fetch_status = 'success'"),
      summarized: count("SELECT COUNT(*) AS total FROM links WHERE summary IS NOT NULL"),
      tagged: count("SELECT COUNT(DISTINCT link_id) AS total FROM link_tags"),
    };
  }
}
