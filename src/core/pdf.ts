import axios, { type AxiosInstance } from "axios";
import { PDFParse } from "pdf-parse";
import scale from "../config/scale";
import { collapseWhitespace, errorMessage, truncate } from "../lib/helpers";
import logger from "../lib/logger";
import type { FetchResult } from "../types";
import { isTimeoutError } from "./fetcher";
import type { HostRateLimiter } from "./rateLimiter";

export interface PdfFetcherOptions {
  timeoutMs?: number;
  maxPages?: number;
  maxContentLength?: number;
  userAgent?: string;
  rateLimiter?: HostRateLimiter;
  client?: AxiosInstance;
}

export interface ParsedPdf {
  text: string;
  title?: string;
}

export class PdfFetcher {
  private readonly timeoutMs: number;
  private readonly maxPages: number;
  private readonly maxContentLength: number;
  private readonly userAgent: string;
  private readonly rateLimiter?: HostRateLimiter;
  private readonly client: AxiosInstance;

  constructor(options: PdfFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? scale.fetching.httpTimeout * 2;
    this.maxPages = options.maxPages ?? scale.pdf.maxPages;
    this.maxContentLength = options.maxContentLength ?? scale.pdf.maxContentLength;
    this.userAgent = options.userAgent ?? scale.fetching.userAgent;
    this.rateLimiter = options.rateLimiter;
    this.client = options.client ?? axios.create();
  }

  async fetch(url: string): Promise<FetchResult> {
    let buffer: Buffer;
    try {
      if (this.rateLimiter) await this.rateLimiter.acquire(new URL(url).host);

      const response = await this.client.get<ArrayBuffer>(url, {
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        responseType: "arraybuffer",
        headers: { "User-Agent": this.userAgent },
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        return { status: "failed", error: `HTTP ${response.status}`, fetchedAt: new Date() };
      }
      buffer = Buffer.from(response.data);
    } catch (error) {
      // Download errors of any kind, timeouts included, are reported as failed
      return {
        status: "failed",
        error: isTimeoutError(error) ? "Request timed out" : errorMessage(error),
        fetchedAt: new Date(),
      };
    }

    try {
      const { text, title } = await this.parse(buffer);
      logger.debug(`[Fetch] PDF ${url} -> ${text.length} chars`);
      return {
        status: "success",
        content: text,
        title,
        contentType: "application/pdf",
        fetchedAt: new Date(),
      };
    } catch (error) {
      return {
        status: "failed",
        error: `PDF parse error: ${errorMessage(error)}`,
        contentType: "application/pdf",
        fetchedAt: new Date(),
      };
    }
  }

  async parse(buffer: Buffer): Promise<ParsedPdf> {
    const parser = new PDFParse({ data: new Uint8Array(buffer) });

    try {
      const textResult = await parser.getText({ first: this.maxPages });
      const infoResult = await parser.getInfo();

      const pages = textResult.pages.slice(0, this.maxPages).map((page) => page.text);
      const raw = pages.length > 0 ? pages.join("\n") : textResult.text;

      const docTitle = typeof infoResult.info?.Title === "string" ? infoResult.info.Title.trim() : "";

      return {
        text: truncate(collapseWhitespace(raw), this.maxContentLength),
        title: docTitle || undefined,
      };
    } finally {
      await parser.destroy();
    }
  }
}
