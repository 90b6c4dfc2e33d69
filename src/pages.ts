import type { Page, StoryId } from "./types.js";

export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 50;

export function lastPageIndex(total: number, pageSize: number): number {
  if (total <= 0) return 0;
  return Math.ceil(total / pageSize) - 1;
}

export function clampPageIndex(pageIndex: number, total: number, pageSize: number): number {
  return Math.max(0, Math.min(pageIndex, lastPageIndex(total, pageSize)));
}

/** The fixed-size slice of a category's ranking that a page shows. */
export function pageWindow(ids: readonly StoryId[], page: Page): StoryId[] {
  const start = page.pageIndex * page.pageSize;
  return ids.slice(start, start + page.pageSize);
}

export function samePage(a: Page, b: Page): boolean {
  return a.storyType === b.storyType && a.pageIndex === b.pageIndex && a.pageSize === b.pageSize;
}
