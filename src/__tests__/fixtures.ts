import fs from "fs";
import http from "http";
import os from "os";
import path from "path";
import type { Database } from "better-sqlite3";
import { applySchema } from "../services/initializeDB";
import { createDatabase } from "../config/database";
import { LinkRepository } from "../storage/LinkRepository";
import type { ExtractedLink } from "../types";

export function createTestRepository(): { db: Database; repository: LinkRepository } {
  const db = createDatabase(":memory:");
  applySchema(db);
  return { db, repository: new LinkRepository(db) };
}

export function makeLink(overrides: Partial<ExtractedLink> = {}): ExtractedLink {
  return {
    url: "https://example.com/post",
    title: "Example post",
    source_date: "2025-03-15",
    source_file: "/notes/2025/03/2025-03-15.md",
    indent_level: 0,
    ...overrides,
  };
}

// Writes { "relative/path.md": "content" } under a fresh temp directory
export function createNoteTree(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "daily-links-"));
  for (const [relative, content] of Object.entries(files)) {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

// Answers 200 at once, then sends a chunk every 100 ms for 1.5 s
export async function startTricklingServer(
  contentType: string,
): Promise<{ url: string; close: () => Promise<void> }> {
  const server = http.createServer((_req, res) => {
    res.writeHead(200, { "Content-Type": contentType });
    let sent = 0;
    const timer = setInterval(() => {
      res.write(`chunk ${sent}\n`);
      sent++;
      if (sent === 15) {
        clearInterval(timer);
        res.end();
      }
    }, 100);
    res.on("close", () => clearInterval(timer));
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server has no port");

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
