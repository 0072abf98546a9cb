/**
 * Page-number pagination: ?page=<n>&limit=<size>.
 * Envelope: { count, next, previous, results } with absolute page URLs.
 */

import type { PageWindow } from "@/lib/db/adapter";
import { json, notFoundError } from "./response-helpers";

export const DEFAULT_PAGE_SIZE = 6;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest extends PageWindow {
  page: number;
}

export interface Paginated<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

function positiveInt(raw: string | null): number | null {
  if (raw === null || !/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n > 0 ? n : null;
}

/**
 * Null when `page` is present but not a positive integer.
 * A bad `limit` falls back to the default; large ones are capped.
 */
export function parsePageRequest(params: URLSearchParams): PageRequest | null {
  const rawPage = params.get("page");
  let page = 1;
  if (rawPage !== null && rawPage !== "last") {
    const parsed = positiveInt(rawPage);
    if (parsed === null) return null;
    page = parsed;
  }
  const limit = Math.min(positiveInt(params.get("limit")) ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
  return { page, limit, offset: (page - 1) * limit };
}

/** Resolves `page=last` once the total is known. */
export function resolveLastPage(params: URLSearchParams, request: PageRequest, count: number): PageRequest {
  if (params.get("page") !== "last") return request;
  const page = Math.max(1, Math.ceil(count / request.limit));
  return { ...request, page, offset: (page - 1) * request.limit };
}

/** Pages past the end are invalid; page 1 is always valid, even when empty. */
export function isPageOutOfRange(request: PageRequest, count: number): boolean {
  return request.page > 1 && request.offset >= count;
}

function pageUrl(url: URL, page: number): string {
  const target = new URL(url);
  if (page === 1) target.searchParams.delete("page");
  else target.searchParams.set("page", String(page));
  return target.toString();
}

export function buildPage<T>(
  url: URL,
  request: PageRequest,
  count: number,
  results: T[]
): Paginated<T> {
  return {
    count,
    next: request.offset + request.limit < count ? pageUrl(url, request.page + 1) : null,
    previous: request.page > 1 ? pageUrl(url, request.page - 1) : null,
    results,
  };
}

export interface PaginateOptions<Row, Out> {
  count: () => Promise<number>;
  fetch: (window: PageWindow) => Promise<Row[]>;
  serialize: (rows: Row[]) => Promise<Out[]>;
}

/** Runs a paginated list query and renders the envelope (404 "Invalid page." when out of range). */
export async function paginate<Row, Out>(
  url: URL,
  options: PaginateOptions<Row, Out>
): Promise<Response> {
  const parsed = parsePageRequest(url.searchParams);
  if (!parsed) return notFoundError("Invalid page.");
  const count = await options.count();
  const request = resolveLastPage(url.searchParams, parsed, count);
  if (isPageOutOfRange(request, count)) return notFoundError("Invalid page.");
  const rows = await options.fetch({ limit: request.limit, offset: request.offset });
  return json(buildPage(url, request, count, await options.serialize(rows)));
}
