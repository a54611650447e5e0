export const REQUIRED_TABLES = ["links", "tags", "link_tags", "processing_log", "links_fts"];

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS links (
    id TEXT PRIMARY KEY,
    url TEXT NOT NULL UNIQUE,
    title TEXT,
    description TEXT,
    domain TEXT NOT NULL,
    source_date TEXT NOT NULL,
    source_file TEXT NOT NULL,
    parent_url TEXT,
    indent_level INTEGER NOT NULL DEFAULT 0,

    page_title TEXT,
    page_content TEXT,
    fetch_status TEXT NOT NULL DEFAULT 'not_fetched'
      CHECK(fetch_status IN ('not_fetched', 'success', 'failed', 'timeout', 'skipped')),
    fetch_error TEXT,
    fetched_at DATETIME,

    summary TEXT,
    summarized_at DATETIME,
    summarizer_model TEXT,
    tagged_at TEXT,

    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS tags (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    category TEXT NOT NULL
      CHECK(category IN ('programming_language', 'technical_topic', 'culture'))
  );

  CREATE TABLE IF NOT EXISTS link_tags (
    link_id TEXT NOT NULL REFERENCES links(id) ON DELETE CASCADE,
    tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
    confidence REAL NOT NULL DEFAULT 1.0 CHECK(confidence >= 0 AND confidence <= 1),
    source TEXT NOT NULL DEFAULT 'auto' CHECK(source IN ('llm', 'manual', 'auto')),
    PRIMARY KEY (link_id, tag_id)
  );

  CREATE TABLE IF NOT EXISTS processing_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_file TEXT NOT NULL UNIQUE,
    file_hash TEXT NOT NULL,
    processed_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_links_source_date ON links (source_date);
  CREATE INDEX IF NOT EXISTS idx_links_domain ON links (domain);
  CREATE INDEX IF NOT EXISTS idx_links_fetch_status ON links (fetch_status);
  CREATE INDEX IF NOT EXISTS idx_link_tags_tag_id ON link_tags (tag_id);

  -- link_id is stored unindexed so the join key never depends on rowid
  CREATE VIRTUAL TABLE IF NOT EXISTS links_fts USING fts5(
    link_id UNINDEXED,
    title,
    description,
    page_content,
    summary
  );

  CREATE TRIGGER IF NOT EXISTS links_ai AFTER INSERT ON links BEGIN
    INSERT INTO links_fts (link_id, title, description, page_content, summary)
    VALUES (new.id, new.title, new.description, new.page_content, new.summary);
  END;

  CREATE TRIGGER IF NOT EXISTS links_au AFTER UPDATE ON links BEGIN
    DELETE FROM links_fts WHERE link_id = old.id;
    INSERT INTO links_fts (link_id, title, description, page_content, summary)
    VALUES (new.id, new.title, new.description, new.page_content, new.summary);
  END;

  CREATE TRIGGER IF NOT EXISTS links_ad AFTER DELETE ON links BEGIN
    DELETE FROM links_fts WHERE link_id = old.id;
  END;
`;
