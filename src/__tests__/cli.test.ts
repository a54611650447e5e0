import path from "path";
import { main } from "../cli";
import initializeDatabase from "../services/initializeDB";
import { LinkRepository } from "../storage/LinkRepository";
import { createNoteTree, makeLink, removeTree } from "./fixtures";

describe("[CLI] main", () => {
  const originalDbName = process.env.SQLITE_DB_NAME;
  let root: string;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    root = createNoteTree({});
    const dbFile = path.join(root, "links.db");
    process.env.SQLITE_DB_NAME = dbFile;

    const db = initializeDatabase(dbFile);
    const repository = new LinkRepository(db);
    const older = repository.insertLink(
      makeLink({ url: "https://a.test", title: "Older", source_date: "2025-03-15" }),
    );
    repository.insertLink(makeLink({ url: "https://b.test", title: "Newer", source_date: "2025-03-16" }));
    repository.updateSummary(older, "Notes on older things", "test-model");
    repository.addTag(older, { name: "tutorial", category: "technical_topic" }, 0.6, "llm");
    db.close();

    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    if (originalDbName === undefined) delete process.env.SQLITE_DB_NAME;
    else process.env.SQLITE_DB_NAME = originalDbName;
    removeTree(root);
  });

  test("should list the most recent links", async () => {
    expect(await main(["recent", "--limit", "1"])).toBe(0);

    expect(logSpy.mock.calls).toEqual([["[2025-03-16] Newer"], ["  https://b.test\n"]]);
  });

  test("should list the links of a date range", async () => {
    expect(await main(["by-date", "2025-03-15"])).toBe(0);

    expect(logSpy.mock.calls).toEqual([
      ["Links from 2025-03-15 to 2025-03-15 (1):\n"],
      ["[2025-03-15] Older"],
      ["  https://a.test\n"],
    ]);
  });

  test("should show one link looked up by URL", async () => {
    expect(await main(["show", "https://a.test"])).toBe(0);

    expect(logSpy.mock.calls).toEqual([
      ["Older\n  https://a.test"],
      ["  Noted:   2025-03-15 (/notes/2025/03/2025-03-15.md)"],
      ["  Fetch:   not_fetched"],
      ["  Summary: Notes on older things"],
      ["  Tags:    tutorial (0.6)"],
    ]);
  });

  test("should exit with status 1 on a malformed date", async () => {
    expect(await main(["by-date", "2025-13-01"])).toBe(1);
    expect(logSpy).not.toHaveBeenCalled();
  });
});
