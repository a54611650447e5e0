#!/usr/bin/env node
import type { Database } from "better-sqlite3";
import { parseArgs } from "util";
import { ConfigError, loadSettings, requireNotesPath, type Settings } from "./config/settings";
import { startServer } from "./api/server";
import { DocumentFetcher } from "./core/fetcher";
import { LinkParser } from "./core/parser";
import { PdfFetcher } from "./core/pdf";
import { PipelineController } from "./core/pipeline";
import { HostRateLimiter } from "./core/rateLimiter";
import { SourceScanner } from "./core/scanner";
import { createCompletionClient } from "./enrichment/openai";
import { LlmSummarizer } from "./enrichment/summarizer";
import { LlmTagger } from "./enrichment/tagger";
import type { CompletionClient } from "./enrichment/types";
import { errorMessage, isCalendarDate } from "./lib/helpers";
import logger from "./lib/logger";
import initializeDatabase from "./services/initializeDB";
import { LinkRepository } from "./storage/LinkRepository";
import type { LinkRecord } from "./types";

const USAGE = `Usage: daily-links <command> [options]

Commands:
  extract   [--no-fetch] [--no-summarize] [--no-tag] [--date-from YYYY-MM-DD] [--date-to YYYY-MM-DD] [--force]
  refetch   [--limit N] [--dry-run]
  retag     [--clear-existing] [--limit N]
  search    <query> [--limit N]
  by-tag    <tag>
  by-date   <from YYYY-MM-DD> [<to YYYY-MM-DD>]
  recent    [--limit N]
  show      <id | url>
  tags
  stats
  serve     [--port N]`;

function positiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`--${name} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

function label(link: LinkRecord): string {
  return link.title || link.description || link.url;
}

function printLinks(links: LinkRecord[]): void {
  for (const link of links) {
    console.log(`[${link.source_date}] ${label(link)}`);
    console.log(`  ${link.url}\n`);
  }
}

function calendarDate(value: string | undefined, name: string): string {
  if (!value || !isCalendarDate(value)) {
    throw new ConfigError(`${name} expects a date as YYYY-MM-DD, got "${value ?? ""}"`);
  }
  return value;
}

function completionClient(settings: Settings, skipHint: string): CompletionClient {
  if (!settings.openai.apiKey) {
    throw new ConfigError(`OPENAI_API_KEY environment variable not set (${skipHint})`);
  }
  return createCompletionClient(settings.openai);
}

function createPipeline(
  settings: Settings,
  repository: LinkRepository,
  enrichment: { summarize: boolean; tag: boolean },
): PipelineController {
  const rateLimiter = new HostRateLimiter({ requestsPerSecond: settings.rateLimitPerSecond });
  const client =
    enrichment.summarize || enrichment.tag
      ? completionClient(settings, "use --no-summarize --no-tag to skip enrichment")
      : undefined;

  return new PipelineController({
    store: repository,
    scanner: new SourceScanner(requireNotesPath(settings), settings.noteExtension),
    parser: new LinkParser(settings.linksHeading),
    fetcher: new DocumentFetcher({
      timeoutMs: settings.fetchTimeoutMs,
      maxContentLength: settings.maxContentLength,
      userAgent: settings.userAgent,
      rateLimiter,
    }),
    pdfFetcher: new PdfFetcher({
      timeoutMs: settings.fetchTimeoutMs * 2,
      userAgent: settings.userAgent,
      rateLimiter,
    }),
    summarizer: client && enrichment.summarize ? new LlmSummarizer(client) : undefined,
    tagger: client && enrichment.tag ? new LlmTagger(client) : undefined,
    batchSize: settings.batchSize,
  });
}

async function runCommand(
  command: string,
  args: string[],
  settings: Settings,
  db: Database,
): Promise<void> {
  const repository = new LinkRepository(db);

  switch (command) {
    case "extract": {
      const { values } = parseArgs({
        args,
        options: {
          "no-fetch": { type: "boolean", default: false },
          "no-summarize": { type: "boolean", default: false },
          "no-tag": { type: "boolean", default: false },
          "date-from": { type: "string" },
          "date-to": { type: "string" },
          force: { type: "boolean", default: false },
        },
      });

      const summarize = !values["no-summarize"];
      const tag = !values["no-tag"];
      const pipeline = createPipeline(settings, repository, { summarize, tag });
      const report = await pipeline.run({
        dateFrom: values["date-from"],
        dateTo: values["date-to"],
        skipExisting: !values.force,
        fetch: !values["no-fetch"],
        summarize,
        tag,
      });

      console.log(`Files:      ${report.filesParsed} parsed of ${report.filesFound} found`);
      console.log(`Links:      ${report.newLinks} new of ${report.linksFound} found`);
      console.log(`Fetched:    ${report.fetched}`);
      console.log(`Summarized: ${report.summarized}`);
      console.log(`Tagged:     ${report.tagged}`);
      return;
    }

    case "refetch": {
      const { values } = parseArgs({
        args,
        options: {
          limit: { type: "string", short: "n" },
          "dry-run": { type: "boolean", default: false },
        },
      });

      const pipeline = createPipeline(settings, repository, { summarize: false, tag: false });
      const { links, reset } = pipeline.refetchEmptyContent({
        limit: positiveInt(values.limit, "limit"),
        dryRun: values["dry-run"],
      });

      if (links.length === 0) {
        console.log("No links with empty content to refetch.");
        return;
      }

      console.log(`Found ${links.length} links with empty content`);
      if (values["dry-run"]) {
        console.log("\nWould refetch:");
        for (const link of links.slice(0, 20)) console.log(`  ${link.url}`);
        if (links.length > 20) console.log(`  ... and ${links.length - 20} more`);
        return;
      }
      console.log(`Reset ${reset} links. Run 'extract' to refetch them.`);
      return;
    }

    case "retag": {
      const { values } = parseArgs({
        args,
        options: {
          "clear-existing": { type: "boolean", default: false },
          limit: { type: "string", short: "n" },
        },
      });

      const pipeline = createPipeline(settings, repository, { summarize: false, tag: true });
      const report = await pipeline.retag({
        clearExisting: values["clear-existing"],
        limit: positiveInt(values.limit, "limit"),
      });

      console.log(`Applied ${report.tagsApplied} tags to ${report.links} links`);
      console.log("\nTag distribution:");
      for (const { name, category, count } of repository.getAllTags().slice(0, 15)) {
        console.log(`  ${name} (${category}): ${count}`);
      }
      return;
    }

    case "search": {
      const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: { limit: { type: "string", short: "n" } },
      });

      const query = positionals.join(" ").trim();
      if (!query) throw new ConfigError("search expects a query");

      const results = repository.search(query, positiveInt(values.limit, "limit") ?? 20);
      if (results.length === 0) {
        console.log("No results found.");
        return;
      }

      console.log(`Found ${results.length} results:\n`);
      for (const link of results) {
        console.log(`[${link.source_date}] ${label(link)}`);
        console.log(`  ${link.url}`);
        if (link.summary) console.log(`  Summary: ${link.summary.slice(0, 100)}...`);
        console.log();
      }
      return;
    }

    case "by-tag": {
      const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
      const [tagName] = positionals;
      if (!tagName) throw new ConfigError("by-tag expects a tag name");

      const results = repository.getLinksByTag(tagName);
      if (results.length === 0) {
        console.log(`No links with tag '${tagName}'`);
        return;
      }

      console.log(`Links tagged '${tagName}' (${results.length}):\n`);
      printLinks(results);
      return;
    }

    case "by-date": {
      const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
      const dateFrom = calendarDate(positionals[0], "by-date");
      const dateTo = positionals[1] === undefined ? dateFrom : calendarDate(positionals[1], "by-date");

      const results = repository.getLinksByDateRange(dateFrom, dateTo);
      if (results.length === 0) {
        console.log(`No links between ${dateFrom} and ${dateTo}`);
        return;
      }

      console.log(`Links from ${dateFrom} to ${dateTo} (${results.length}):\n`);
      printLinks(results);
      return;
    }

    case "recent": {
      const { values } = parseArgs({
        args,
        options: { limit: { type: "string", short: "n" } },
      });

      const results = repository.getRecentLinks(positiveInt(values.limit, "limit"));
      if (results.length === 0) {
        console.log("No links yet.");
        return;
      }

      printLinks(results);
      return;
    }

    case "show": {
      const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
      const [key] = positionals;
      if (!key) throw new ConfigError("show expects a link id or URL");

      const link = repository.getLinkById(key) ?? repository.getLinkByUrl(key);
      if (!link) {
        console.log(`No link matches '${key}'`);
        return;
      }

      console.log(`${label(link)}\n  ${link.url}`);
      console.log(`  Noted:   ${link.source_date} (${link.source_file})`);
      console.log(`  Fetch:   ${link.fetch_status}${link.fetch_error ? ` (${link.fetch_error})` : ""}`);
      if (link.page_title) console.log(`  Page:    ${link.page_title}`);
      if (link.summary) console.log(`  Summary: ${link.summary}`);

      const tags = repository.getTagsForLink(link.id);
      if (tags.length > 0) {
        console.log(`  Tags:    ${tags.map(({ name, confidence }) => `${name} (${confidence})`).join(", ")}`);
      }
      return;
    }

    case "tags": {
      const tags = repository.getAllTags();
      if (tags.length === 0) {
        console.log("No tags found.");
        return;
      }

      console.log("Tags:\n");
      for (const { name, category, count } of tags) {
        console.log(`  ${name} (${category}): ${count} links`);
      }
      return;
    }

    case "stats": {
      const stats = repository.getStats();
      console.log("Database Statistics:");
      console.log(`  Total links:  ${stats.totalLinks}`);
      console.log(`  Fetched:      ${stats.fetched}`);
      console.log(`  Summarized:   ${stats.summarized}`);
      console.log(`  Tagged:       ${stats.tagged}`);
      return;
    }

    case "serve": {
      const { values } = parseArgs({
        args,
        options: { port: { type: "string", short: "p" } },
      });

      const server = startServer(repository, positiveInt(values.port, "port") ?? settings.port);
      // Keep the database open until the server stops
      await new Promise<void>((resolve, reject) => {
        server.on("close", resolve);
        server.on("error", reject);
      });
      return;
    }

    default:
      throw new ConfigError(`Unknown command "${command}"\n\n${USAGE}`);
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command, ...args] = argv;
  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  let db: Database | undefined;
  try {
    const settings = loadSettings();
    db = initializeDatabase(settings.databasePath);
    await runCommand(command, args, settings, db);
    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  } finally {
    db?.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error(errorMessage(error));
      process.exitCode = 1;
    },
  );
}
