import { load, type CheerioAPI } from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import scale from "../config/scale";
import { collapseWhitespace, truncate } from "../lib/helpers";

const REMOVE_SELECTOR = "script, style, nav, header, footer, aside, form, noscript";
const CONTENT_CLASS = /content|article|post/i;

// Text nodes in document order, each trimmed, blanks dropped
function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) parts.push(text);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

function textOf(node: AnyNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return collapseWhitespace(parts.join(" "));
}

function candidates($: CheerioAPI): AnyNode[] {
  const classed = $("[class]")
    .toArray()
    .filter((element) => CONTENT_CLASS.test($(element).attr("class") ?? ""));

  return [
    ...$("article").first().toArray(),
    ...$("main").first().toArray(),
    ...classed,
    ...$("body").first().toArray(),
  ];
}

export class ContentExtractor {
  constructor(private readonly minLength = scale.fetching.minExtractedTextLength) {}

  extract(html: string, maxLength: number = scale.fetching.extractedTextLength): string {
    const $ = load(html);
    $(REMOVE_SELECTOR).remove();

    for (const candidate of candidates($)) {
      const text = textOf(candidate);
      if (text.length >= this.minLength) return truncate(text, maxLength);
    }

    return "";
  }
}
