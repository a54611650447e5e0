import type { ExtractedLink, SourceFile } from "../types";

const MARKDOWN_LINK = /\[([^\]]+)\]\((https?:\/\/[^)]+)\)/;
const MARKDOWN_LINKS = new RegExp(MARKDOWN_LINK.source, "g");
const BARE_URL = /(https?:\/\/[^\s)]+)/;
const LIST_ITEM = /^(\s*)[-*+]\s+(.+)$/;
const NEXT_SECTION = /^## /;

type LinkFields = Pick<ExtractedLink, "url" | "title" | "description">;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Trim spaces and dashes from both ends
function trimDashes(value: string): string {
  return value.replace(/^[ -]+|[ -]+$/g, "");
}

// A tab is one level, every four other whitespace characters another
export function indentLevel(indent: string): number {
  const tabs = indent.split("\t").length - 1;
  return tabs + Math.floor((indent.length - tabs) / 4);
}

export function parseLinkContent(content: string): LinkFields | undefined {
  const markdown = MARKDOWN_LINK.exec(content);
  if (markdown) {
    const description = trimDashes(content.replace(MARKDOWN_LINKS, ""));
    return {
      url: markdown[2],
      title: markdown[1],
      description: description || undefined,
    };
  }

  const bare = BARE_URL.exec(content);
  if (bare) {
    const description = trimDashes(content.slice(0, bare.index));
    return { url: bare[1], description: description || undefined };
  }

  return undefined;
}

/**
 * Reads the nested bullet list under the `## Links` heading of a note.
 *
 * ```md
 * ## Links
 * - [Rust book](https://doc.rust-lang.org/book/)
 *     - ownership chapter https://doc.rust-lang.org/book/ch04-00.html
 * ```
 *
 * yields two links, the second with `parent_url` set to the first.
 */
export class LinkParser {
  private readonly heading: RegExp;

  constructor(heading = "Links") {
    this.heading = new RegExp(`^## ${escapeRegExp(heading)}\\s*$`);
  }

  parse(text: string, source: SourceFile): ExtractedLink[] {
    const lines = this.sectionLines(text);
    const links: ExtractedLink[] = [];
    const parents: Array<{ level: number; url: string }> = [];

    for (const line of lines) {
      const item = LIST_ITEM.exec(line);
      if (!item) continue;

      const level = indentLevel(item[1]);
      while (parents.length > 0 && parents[parents.length - 1].level >= level) parents.pop();
      const parent = parents.length > 0 ? parents[parents.length - 1] : undefined;

      const fields = parseLinkContent(item[2].trim());
      if (!fields) continue;

      links.push({
        ...fields,
        source_date: source.date,
        source_file: source.path,
        indent_level: level,
        parent_url: parent?.url,
      });
      parents.push({ level, url: fields.url });
    }

    return links;
  }

  private sectionLines(text: string): string[] {
    const lines = text.split(/\r?\n/);
    const start = lines.findIndex((line) => this.heading.test(line));
    if (start === -1) return [];

    const rest = lines.slice(start + 1);
    const end = rest.findIndex((line) => NEXT_SECTION.test(line));
    return end === -1 ? rest : rest.slice(0, end);
  }
}
