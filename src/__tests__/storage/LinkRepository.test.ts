import type { Database } from "better-sqlite3";
import { LinkRepository, toFtsQuery } from "../../storage/LinkRepository";
import { createTestRepository, makeLink } from "../fixtures";

describe("[Storage] LinkRepository", () => {
  let db: Database;
  let repository: LinkRepository;

  beforeEach(() => {
    ({ db, repository } = createTestRepository());
  });

  afterEach(() => {
    db.close();
  });

  test("should insert a link as not fetched with its domain", () => {
    const id = repository.insertLink(
      makeLink({ url: "https://docs.example.com:8443/guide", parent_url: "https://example.com" }),
    );

    expect(id).toMatch(/^[0-9A-Z]{26}$/);
    expect(repository.getLinkById(id)).toMatchObject({
      url: "https://docs.example.com:8443/guide",
      title: "Example post",
      description: null,
      domain: "docs.example.com:8443",
      source_date: "2025-03-15",
      parent_url: "https://example.com",
      indent_level: 0,
      fetch_status: "not_fetched",
      page_content: null,
      summary: null,
    });
  });

  test("should keep URLs unique and return the existing id", () => {
    const first = repository.insertLink(makeLink({ title: "First" }));
    const second = repository.insertLink(makeLink({ title: "Second" }));

    expect(second).toBe(first);
    expect(repository.getStats().totalLinks).toBe(1);
    expect(repository.getLinkById(first)?.title).toBe("First");
    expect(repository.linkExists("https://example.com/post")).toBe(true);
    expect(repository.linkExists("https://example.com/other")).toBe(false);
  });

  test("should record fetch results and clear them on reset", () => {
    const id = repository.insertLink(makeLink());

    repository.updateFetchResult(id, "success", "Readable text", "Page title");
    expect(repository.getLinkById(id)).toMatchObject({
      fetch_status: "success",
      page_content: "Readable text",
      page_title: "Page title",
      fetch_error: null,
      fetched_at: expect.any(String),
    });

    repository.resetFetchStatus(id);
    expect(repository.getLinkById(id)).toMatchObject({
      fetch_status: "not_fetched",
      page_content: null,
      page_title: null,
      fetched_at: null,
    });
  });

  test("should select unfetched links newest first in insertion order", () => {
    repository.insertLink(makeLink({ url: "https://a.test", source_date: "2025-03-14" }));
    repository.insertLink(makeLink({ url: "https://b.test", source_date: "2025-03-15" }));
    repository.insertLink(makeLink({ url: "https://c.test", source_date: "2025-03-15" }));

    expect(repository.getUnfetchedLinks(10).map((link) => link.url)).toEqual([
      "https://b.test",
      "https://c.test",
      "https://a.test",
    ]);
    expect(repository.getUnfetchedLinks(1)).toHaveLength(1);
  });

  test("should only offer links that left not_fetched for summarizing", () => {
    const skipped = repository.insertLink(makeLink({ url: "https://skipped.test/a.png" }));
    repository.insertLink(makeLink({ url: "https://pending.test" }));
    const done = repository.insertLink(makeLink({ url: "https://done.test" }));

    repository.updateFetchResult(skipped, "skipped", null, null, "Non-HTML content type (media file)");
    repository.updateFetchResult(done, "success", "text");
    repository.updateSummary(done, "Already summarized", "metadata");

    expect(repository.getUnsummarizedLinks(10).map((link) => link.id)).toEqual([skipped]);
  });

  test("should offer fetched links the tagger has not seen yet", () => {
    const tagged = repository.insertLink(makeLink({ url: "https://tagged.test" }));
    const untagged = repository.insertLink(makeLink({ url: "https://untagged.test" }));
    const noMatch = repository.insertLink(makeLink({ url: "https://no-match.test" }));
    repository.insertLink(makeLink({ url: "https://pending.test" }));
    repository.updateFetchResult(tagged, "success", "text");
    repository.updateFetchResult(untagged, "failed", null, null, "HTTP 500");
    repository.updateFetchResult(noMatch, "success", "text");

    repository.addTag(tagged, { name: "rust", category: "programming_language" }, 0.9, "llm");
    repository.markTagged(tagged);
    repository.markTagged(noMatch);

    expect(repository.getUntaggedLinks(10).map((link) => link.id)).toEqual([untagged]);
    expect(repository.getLinkById(noMatch)?.tagged_at).toEqual(expect.any(String));
    expect(repository.getLinksWithContent().map((link) => link.id)).toEqual([
      tagged,
      untagged,
      noMatch,
    ]);
    expect(repository.getLinksWithContent(1)).toHaveLength(1);

    repository.clearAllTags();
    expect(repository.getUntaggedLinks(10).map((link) => link.id)).toEqual([tagged, untagged, noMatch]);
  });

  test("should store tags once and replace an association", () => {
    const id = repository.insertLink(makeLink());
    const rust = { name: "rust", category: "programming_language" } as const;

    repository.addTag(id, rust, 0.4, "llm");
    repository.addTag(id, rust, 1.7, "manual");
    repository.addTag(id, { name: "tutorial", category: "technical_topic" }, 0.6);

    expect(repository.getTagsForLink(id)).toEqual([
      { name: "rust", category: "programming_language", confidence: 1, source: "manual" },
      { name: "tutorial", category: "technical_topic", confidence: 0.6, source: "auto" },
    ]);
    expect(repository.getAllTags()).toEqual([
      { name: "rust", category: "programming_language", count: 1 },
      { name: "tutorial", category: "technical_topic", count: 1 },
    ]);
    expect(repository.getLinksByTag("rust").map((link) => link.id)).toEqual([id]);

    repository.clearAllTags();
    expect(repository.getTagsForLink(id)).toEqual([]);
    expect(repository.getAllTags()).toEqual([
      { name: "rust", category: "programming_language", count: 0 },
      { name: "tutorial", category: "technical_topic", count: 0 },
    ]);
  });

  test("should detect changed files by hash only", () => {
    const file = "/notes/2025-03-15.md";

    expect(repository.fileNeedsProcessing(file, "hash-1")).toBe(true);
    repository.markFileProcessed(file, "hash-1");
    expect(repository.fileNeedsProcessing(file, "hash-1")).toBe(false);
    expect(repository.fileNeedsProcessing(file, "hash-2")).toBe(true);

    repository.markFileProcessed(file, "hash-2");
    expect(repository.fileNeedsProcessing(file, "hash-2")).toBe(false);
    expect(
      db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM processing_log").get()?.total,
    ).toBe(1);
  });

  test("should find short or missing content among successful fetches", () => {
    const empty = repository.insertLink(makeLink({ url: "https://empty.test" }));
    const short = repository.insertLink(makeLink({ url: "https://short.test" }));
    const full = repository.insertLink(makeLink({ url: "https://full.test" }));
    const failed = repository.insertLink(makeLink({ url: "https://failed.test" }));

    repository.updateFetchResult(empty, "success", "");
    repository.updateFetchResult(short, "success", "Loading...");
    repository.updateFetchResult(full, "success", "x".repeat(60));
    repository.updateFetchResult(failed, "failed", null, null, "HTTP 500");

    expect(repository.getEmptyContentLinks(10).map((link) => link.id)).toEqual([empty, short]);
    expect(repository.getEmptyContentLinks(10, 5).map((link) => link.id)).toEqual([empty]);
  });

  test("should search titles, descriptions, content and summaries", () => {
    const compilers = repository.insertLink(
      makeLink({ url: "https://a.test", title: "Crafting interpreters" }),
    );
    const database = repository.insertLink(
      makeLink({ url: "https://b.test", title: "Notes", description: "sqlite internals" }),
    );
    repository.updateFetchResult(database, "success", "B-tree pages and the write-ahead log");
    repository.updateSummary(compilers, "A book about building a bytecode VM.", "test-model");

    expect(repository.search("interpreters").map((link) => link.id)).toEqual([compilers]);
    expect(repository.search("write-ahead").map((link) => link.id)).toEqual([database]);
    expect(repository.search("bytecode").map((link) => link.id)).toEqual([compilers]);
    expect(repository.search("sqlite").map((link) => link.id)).toEqual([database]);
  });

  test("should not choke on FTS syntax in a query", () => {
    repository.insertLink(makeLink({ title: "C++ templates" }));

    expect(() => repository.search('AND "unbalanced (')).not.toThrow();
    expect(repository.search("   ")).toEqual([]);
    expect(toFtsQuery('say "hi" now')).toBe('"say" """hi""" "now"');
  });

  test("should page, filter and sort links", () => {
    const a = repository.insertLink(
      makeLink({ url: "https://one.test/a", title: "Zeta", source_date: "2025-01-01" }),
    );
    const b = repository.insertLink(
      makeLink({ url: "https://two.test/b", title: "Alpha", source_date: "2025-02-01" }),
    );
    const c = repository.insertLink(
      makeLink({ url: "https://one.test/c", title: "Mu", source_date: "2025-03-01" }),
    );
    repository.addTag(a, { name: "go", category: "programming_language" }, 0.9);
    repository.addTag(a, { name: "tutorial", category: "technical_topic" }, 0.9);
    repository.addTag(c, { name: "go", category: "programming_language" }, 0.9);

    const firstPage = repository.getLinksPaginated({ perPage: 2 });
    expect(firstPage.links.map((link) => link.id)).toEqual([c, b]);
    expect(firstPage).toMatchObject({ total: 3, page: 1, totalPages: 2 });
    expect(repository.getLinksPaginated({ perPage: 2, page: 2 }).links.map((l) => l.id)).toEqual([a]);

    expect(repository.getLinksPaginated({ sort: "title" }).links.map((l) => l.id)).toEqual([b, c, a]);
    expect(repository.getLinksPaginated({ sort: "date_asc" }).links.map((l) => l.id)).toEqual([a, b, c]);
    expect(repository.getLinksPaginated({ sort: "domain" }).links.map((l) => l.id)).toEqual([c, a, b]);

    expect(repository.getLinksPaginated({ tags: ["go"] }).links.map((l) => l.id)).toEqual([c, a]);
    expect(repository.getLinksPaginated({ tags: ["go", "tutorial"] }).links.map((l) => l.id)).toEqual([
      a,
    ]);
    expect(repository.getLinksPaginated({ domain: "two.test" }).links.map((l) => l.id)).toEqual([b]);
    expect(
      repository
        .getLinksPaginated({ dateFrom: "2025-01-15", dateTo: "2025-03-01" })
        .links.map((l) => l.id),
    ).toEqual([c, b]);
  });

  test("should count links per domain and date", () => {
    repository.insertLink(makeLink({ url: "https://one.test/a", source_date: "2025-01-01" }));
    repository.insertLink(makeLink({ url: "https://one.test/b", source_date: "2025-01-02" }));
    repository.insertLink(makeLink({ url: "https://two.test/a", source_date: "2025-01-02" }));

    expect(repository.getAllDomains()).toEqual([
      { domain: "one.test", count: 2 },
      { domain: "two.test", count: 1 },
    ]);
    expect(repository.getDateCounts()).toEqual([
      { date: "2025-01-02", count: 2 },
      { date: "2025-01-01", count: 1 },
    ]);
    expect(repository.getLinksByDateRange("2025-01-02", "2025-01-31").map((link) => link.url)).toEqual([
      "https://one.test/b",
      "https://two.test/a",
    ]);
    expect(repository.getRecentLinks(1).map((link) => link.url)).toEqual(["https://one.test/b"]);
  });

  test("should report stats", () => {
    const fetched = repository.insertLink(makeLink({ url: "https://a.test" }));
    const skipped = repository.insertLink(makeLink({ url: "https://b.test" }));
    repository.insertLink(makeLink({ url: "https://c.test" }));
    repository.updateFetchResult(fetched, "success", "text");
    repository.updateFetchResult(skipped, "skipped", null, null, "Non-HTML content: image/svg+xml");
    repository.updateSummary(skipped, "b.test", "metadata");
    repository.addTag(fetched, { name: "ai", category: "technical_topic" }, 0.8, "llm");

    expect(repository.getStats()).toEqual({ totalLinks: 3, fetched: 1, summarized: 1, tagged: 1 });
  });
});
