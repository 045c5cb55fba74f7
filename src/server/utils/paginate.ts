// =============================================================================
// Cursor pagination — the caller drives the loop, gateways return one page
// =============================================================================
import type { Page } from '../types';

export type PageFetcher<T> = (cursor: string | undefined) => Promise<Page<T>>;

/** Yields every item across pages, fetching the next page lazily. */
export async function* paginate<T>(fetchPage: PageFetcher<T>): AsyncGenerator<T> {
  let cursor: string | undefined;
  do {
    const page = await fetchPage(cursor);
    for (const item of page.items) yield item;
    cursor = page.nextCursor;
  } while (cursor);
}

export async function collectAll<T>(fetchPage: PageFetcher<T>): Promise<T[]> {
  const all: T[] = [];
  for await (const item of paginate(fetchPage)) all.push(item);
  return all;
}
