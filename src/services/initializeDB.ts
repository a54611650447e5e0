import type { Database } from "better-sqlite3";
import { createDatabase } from "../config/database";
import logger from "../lib/logger";
import { REQUIRED_TABLES, SCHEMA_SQL } from "../storage/schema";

export function applySchema(db: Database): void {
  db.exec(SCHEMA_SQL);

  // Verify tables exist
  const tables = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
    .all()
    .map((row) => row.name);

  const missing = REQUIRED_TABLES.filter((table) => !tables.includes(table));
  if (missing.length > 0) throw new Error(`Missing tables: ${missing.join(", ")}`);
}

export default function initializeDatabase(file: string): Database {
  const db = createDatabase(file);
  try {
    applySchema(db);
    logger.info(`✅ Database initialized successfully (${file})`);
    return db;
  } catch (error) {
    logger.error("❌ Database initialization failed:", error);
    db.close();
    throw error;
  }
}
