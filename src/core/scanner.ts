import { promises as fs } from "fs";
import path from "path";
import { ConfigError } from "../config/settings";
import { isCalendarDate } from "../lib/helpers";
import logger from "../lib/logger";
import type { SourceFile } from "../types";

export interface ScanOptions {
  dateFrom?: string;
  dateTo?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function checkDate(name: string, value: string | undefined): void {
  if (value !== undefined && !isCalendarDate(value)) {
    throw new ConfigError(`Invalid ${name} "${value}", expected YYYY-MM-DD`);
  }
}

/**
 * Finds dated note files (`YYYY-MM-DD.md`) anywhere below a root directory.
 */
export class SourceScanner {
  private readonly pattern: RegExp;

  constructor(
    private readonly root: string,
    extension = ".md",
  ) {
    this.pattern = new RegExp(`^(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(extension)}$`);
  }

  async scan(options: ScanOptions = {}): Promise<SourceFile[]> {
    const { dateFrom, dateTo } = options;
    checkDate("dateFrom", dateFrom);
    checkDate("dateTo", dateTo);

    const files: SourceFile[] = [];
    await this.walk(this.root, files);

    // ISO dates compare correctly as strings
    const selected = files.filter(
      (file) =>
        (dateFrom === undefined || file.date >= dateFrom) &&
        (dateTo === undefined || file.date <= dateTo),
    );

    selected.sort((a, b) => {
      if (a.date !== b.date) return a.date < b.date ? 1 : -1;
      return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
    });

    logger.debug(`[Scan] ${selected.length} of ${files.length} note files selected`);
    return selected;
  }

  private async walk(dir: string, files: SourceFile[]): Promise<void> {
    const items = await fs.readdir(dir, { withFileTypes: true });

    for (const item of items) {
      const fullPath = path.join(dir, item.name);

      if (item.isDirectory()) {
        await this.walk(fullPath, files);
        continue;
      }

      if (!item.isFile()) continue;

      const match = this.pattern.exec(item.name);
      if (!match || !isCalendarDate(match[1])) continue;

      files.push({ path: fullPath, date: match[1] });
    }
  }
}
