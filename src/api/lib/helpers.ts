import { isCalendarDate } from "../../lib/helpers";
import type { LinkSort } from "../../types";
import { HttpError } from "./error";

const SORTS: readonly LinkSort[] = ["date_desc", "date_asc", "title", "domain"];

export function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new HttpError(`Invalid ${name} parameter`, 400);
  return parsed;
}

export function parseSort(value: string | undefined): LinkSort {
  if (value === undefined) return "date_desc";

  const sort = SORTS.find((candidate) => candidate === value);
  if (!sort) throw new HttpError("Invalid sort parameter", 400);
  return sort;
}

export function parseDate(value: string | undefined, name: string): string | undefined {
  if (value === undefined || value === "") return undefined;
  if (!isCalendarDate(value)) throw new HttpError(`Invalid ${name} parameter`, 400);
  return value;
}

// ?tag=a&tag=b arrives as an array, ?tag=a as a string
export function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map((item) => item.trim()).filter(Boolean);
}
