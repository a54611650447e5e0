import { config } from "dotenv";
import os from "os";
import path from "path";
import { z } from "zod";
import scale from "./scale";

// Load environment variables FIRST
config({
  path:
    {
      production: ".env",
      test: ".env.test",
    }[process.env.NODE_ENV ?? ""] ?? ".env.local",
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface Settings {
  notesPath?: string;
  databasePath: string;
  linksHeading: string;
  noteExtension: string;
  rateLimitPerSecond: number;
  fetchTimeoutMs: number;
  maxContentLength: number;
  batchSize: number;
  userAgent: string;
  openai: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
  };
  port: number;
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NOTES_PATH: optionalString,
  SQLITE_DB_NAME: z.string().trim().min(1).default("links.db"),
  LINKS_HEADING: z.string().trim().min(1).default("Links"),
  NOTE_EXTENSION: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, "must look like .md")
    .default(".md"),
  RATE_LIMIT_PER_SECOND: positiveNumber(scale.fetching.requestsPerSecond),
  FETCH_TIMEOUT_MS: positiveInt(scale.fetching.httpTimeout),
  MAX_CONTENT_LENGTH: positiveInt(scale.fetching.maxContentLength),
  BATCH_SIZE: positiveInt(scale.pipeline.batchSize),
  USER_AGENT: z.string().trim().min(1).default(scale.fetching.userAgent),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().trim().url().optional(),
  OPENAI_MODEL: z.string().trim().min(1).default(scale.enrichment.model),
  PORT: positiveInt(5001),
});

// Expand a leading "~" the way a shell would
export function expandHome(file: string): string {
  if (file === "~") return os.homedir();
  if (file.startsWith("~/")) return path.join(os.homedir(), file.slice(2));
  return file;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    notesPath: values.NOTES_PATH ? expandHome(values.NOTES_PATH) : undefined,
    databasePath: expandHome(values.SQLITE_DB_NAME),
    linksHeading: values.LINKS_HEADING,
    noteExtension: values.NOTE_EXTENSION,
    rateLimitPerSecond: values.RATE_LIMIT_PER_SECOND,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    maxContentLength: values.MAX_CONTENT_LENGTH,
    batchSize: values.BATCH_SIZE,
    userAgent: values.USER_AGENT,
    openai: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      model: values.OPENAI_MODEL,
    },
    port: values.PORT,
  };
}

export function requireNotesPath(settings: Settings): string {
  if (!settings.notesPath) {
    throw new ConfigError("NOTES_PATH environment variable not set");
  }
  return settings.notesPath;
}
