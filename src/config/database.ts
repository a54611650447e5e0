import Database from "better-sqlite3";
import scale from "./scale";

export function createDatabase(file: string): Database.Database {
  const db = new Database(file, {
    timeout: scale.database.timeout,
  });

  // Apply performance optimizations
  if (file !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("temp_store = MEMORY");
  db.pragma("foreign_keys = ON");

  return db;
}
