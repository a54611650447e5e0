import axios, { type AxiosInstance } from "axios";
import { load } from "cheerio";
import iconv from "iconv-lite";
import scale from "../config/scale";
import { errorMessage, truncate } from "../lib/helpers";
import logger from "../lib/logger";
import type { FetchResult } from "../types";
import { ContentExtractor } from "./content";
import { HostRateLimiter } from "./rateLimiter";

const MEDIA_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".webp", ".mp4", ".mp3", ".wav"];

export interface FetcherOptions {
  timeoutMs?: number;
  maxContentLength?: number;
  userAgent?: string;
  rateLimiter?: HostRateLimiter;
  extractor?: ContentExtractor;
  client?: AxiosInstance;
}

function urlPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return "";
  }
}

// A cancellation can only come from the request's own deadline signal
export function isTimeoutError(error: unknown): boolean {
  if (axios.isCancel(error)) return true;
  return axios.isAxiosError(error) && (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT");
}

function transportFailure(error: unknown): FetchResult {
  if (isTimeoutError(error)) {
    return { status: "timeout", error: "Request timed out", fetchedAt: new Date() };
  }
  return { status: "failed", error: errorMessage(error), fetchedAt: new Date() };
}

function charsetFromContentType(contentType: string): string | undefined {
  return /charset=["']?([a-z0-9_-]+)/i.exec(contentType)?.[1]?.toLowerCase();
}

function charsetFromMeta(buffer: Buffer): string | undefined {
  const head = buffer.subarray(0, 4096).toString("ascii");
  const meta =
    /<meta[^>]+charset=["']?\s*([a-z0-9_-]+)/i.exec(head) ??
    /<meta[^>]+content=["'][^"']*charset=([a-z0-9_-]+)/i.exec(head);
  return meta?.[1]?.toLowerCase();
}

export function decodeBody(buffer: Buffer, contentType: string): string {
  const charset = charsetFromContentType(contentType) ?? charsetFromMeta(buffer);
  return iconv.decode(buffer, charset && iconv.encodingExists(charset) ? charset : "utf8");
}

/**
 * Fetches HTML pages under the per-host rate limit and reduces them to
 * readable text. Every outcome is reported as a FetchResult; nothing throws.
 */
export class DocumentFetcher {
  private readonly timeoutMs: number;
  private readonly maxContentLength: number;
  private readonly userAgent: string;
  private readonly rateLimiter: HostRateLimiter;
  private readonly extractor: ContentExtractor;
  private readonly client: AxiosInstance;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? scale.fetching.httpTimeout;
    this.maxContentLength = options.maxContentLength ?? scale.fetching.maxContentLength;
    this.userAgent = options.userAgent ?? scale.fetching.userAgent;
    this.rateLimiter = options.rateLimiter ?? new HostRateLimiter();
    this.extractor = options.extractor ?? new ContentExtractor();
    this.client = options.client ?? axios.create();
  }

  isPdf(url: string): boolean {
    return urlPath(url).endsWith(".pdf");
  }

  shouldSkip(url: string): boolean {
    const pathname = urlPath(url);
    return MEDIA_EXTENSIONS.some((extension) => pathname.endsWith(extension));
  }

  async fetch(url: string): Promise<FetchResult> {
    if (this.shouldSkip(url)) {
      return {
        status: "skipped",
        error: "Non-HTML content type (media file)",
        fetchedAt: new Date(),
      };
    }

    if (this.isPdf(url)) {
      return {
        status: "skipped",
        error: "PDF - use pdf extractor",
        contentType: "application/pdf",
        fetchedAt: new Date(),
      };
    }

    let host: string;
    try {
      host = new URL(url).host;
    } catch (error) {
      return { status: "failed", error: `Invalid URL: ${errorMessage(error)}`, fetchedAt: new Date() };
    }

    await this.rateLimiter.acquire(host);

    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        // axios' timeout restarts on every chunk; the signal bounds the whole exchange
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        responseType: "arraybuffer",
        headers: { "User-Agent": this.userAgent },
        maxRedirects: 5,
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        return { status: "failed", error: `HTTP ${response.status}`, fetchedAt: new Date() };
      }

      const header = response.headers["content-type"];
      const contentType = typeof header === "string" ? header : "";
      if (!contentType.toLowerCase().includes("text/html")) {
        return {
          status: "skipped",
          error: `Non-HTML content: ${contentType}`,
          contentType,
          fetchedAt: new Date(),
        };
      }

      const html = truncate(decodeBody(Buffer.from(response.data), contentType), this.maxContentLength);
      const title = load(html)("title").first().text().trim();

      logger.debug(`[Fetch] ${url} -> ${html.length} chars`);
      return {
        status: "success",
        content: this.extractor.extract(html),
        title: title || undefined,
        contentType,
        fetchedAt: new Date(),
      };
    } catch (error) {
      return transportFailure(error);
    }
  }
}
