import type { HackerNewsGateway } from "./api.js";
import { type FetchError, toFetchError } from "./errors.js";
import { ConcurrencyLimiter } from "./limiter.js";
import { log } from "./logger.js";
import { pageWindow } from "./pages.js";
import type { Item, Page, PageValue } from "./types.js";

export type CacheStatus = "fresh" | "stale" | "loading" | "failed";

/**
 * Read-only view of one cache record. A new object is produced on every read,
 * so a snapshot handed to the render layer never changes underneath it.
 */
export interface CacheEntry<T> {
  value: T | undefined;
  status: CacheStatus;
  error: FetchError | undefined;
  fetchedAt: number;
  generation: number;
}

export type CacheKey = { kind: "page"; page: Page } | { kind: "item"; id: number };

export type FetchOutcome<T> = { ok: true; value: T } | { ok: false; error: FetchError };

/** A finished network call, travelling back to the tick loop through the event queue. */
export type SettledFetch =
  | { kind: "page"; page: Page; outcome: FetchOutcome<PageValue> }
  | { kind: "item"; id: number; outcome: FetchOutcome<Item> };

export type Completion =
  | { kind: "page"; page: Page; entry: CacheEntry<PageValue>; superseded: boolean }
  | { kind: "item"; id: number; entry: CacheEntry<Item>; superseded: boolean };

export interface CacheReader {
  peekPage(page: Page): CacheEntry<PageValue> | undefined;
  peekItem(id: number): CacheEntry<Item> | undefined;
}

export interface RequestOptions {
  force?: boolean;
}

export interface RefreshCacheOptions {
  ttlMs: number;
  maxPages: number;
  maxItems: number;
  maxConcurrent: number;
  onSettled: (settled: SettledFetch) => void;
  now?: () => number;
}

export function pageKey(page: Page): string {
  return `page:${page.storyType}:${page.pageIndex}:${page.pageSize}`;
}

export function itemKey(id: number): string {
  return `item:${id}`;
}

export function cacheKeyString(key: CacheKey): string {
  return key.kind === "page" ? pageKey(key.page) : itemKey(key.id);
}

interface StoredEntry<T> {
  value: T | undefined;
  error: FetchError | undefined;
  fetchedAt: number;
  generation: number;
  inFlight: boolean;
  // Generation of the newest caller waiting on the in-flight fetch
  pendingGeneration: number;
}

/**
 * Map-backed LRU: iteration order is access order, oldest first. Entries with
 * a fetch in flight and pinned entries are never evicted, so the store may
 * exceed its capacity while they outnumber it.
 */
class EntryStore<T> {
  private entries = new Map<string, StoredEntry<T>>();
  private pinned: ReadonlySet<string> = new Set();

  constructor(private readonly capacity: number) {}

  pin(keys: ReadonlySet<string>): void {
    this.pinned = keys;
  }

  get(key: string): StoredEntry<T> | undefined {
    return this.entries.get(key);
  }

  touch(key: string): StoredEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (entry) {
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return entry;
  }

  insert(key: string, entry: StoredEntry<T>): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.evict(key);
  }

  evict(keep?: string): void {
    if (this.entries.size <= this.capacity) return;
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.capacity) return;
      if (entry.inFlight || key === keep || this.pinned.has(key)) continue;
      this.entries.delete(key);
      log("[cache] evicted", key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Stale-while-revalidate cache in front of the gateway.
 *
 * `getPage`/`getItem` answer immediately with whatever is known and start at
 * most one fetch per key. Results are not written here when the network call
 * returns: they are handed to `onSettled`, and the tick loop passes them back
 * through `settle`, so the entry maps only change on the loop's turn.
 */
export class RefreshCache implements CacheReader {
  private readonly pages: EntryStore<PageValue>;
  private readonly items: EntryStore<Item>;
  private readonly limiter: ConcurrencyLimiter;
  private readonly now: () => number;
  private generation = 0;

  constructor(
    private readonly gateway: HackerNewsGateway,
    private readonly options: RefreshCacheOptions,
  ) {
    this.pages = new EntryStore(options.maxPages);
    this.items = new EntryStore(options.maxItems);
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent);
    this.now = options.now ?? Date.now;
  }

  setGeneration(generation: number): void {
    this.generation = generation;
  }

  getPage(page: Page, options: RequestOptions = {}): CacheEntry<PageValue> {
    const snapshot: Page = { ...page };
    return this.fetchInto(
      this.pages,
      pageKey(snapshot),
      options,
      async () => {
        const ids = await this.gateway.fetchCategoryIds(snapshot.storyType);
        return { ids: pageWindow(ids, snapshot), total: ids.length };
      },
      (outcome) => this.options.onSettled({ kind: "page", page: snapshot, outcome }),
    );
  }

  getItem(id: number, options: RequestOptions = {}): CacheEntry<Item> {
    return this.fetchInto(
      this.items,
      itemKey(id),
      options,
      () => this.gateway.fetchItem(id),
      (outcome) => this.options.onSettled({ kind: "item", id, outcome }),
    );
  }

  request(key: CacheKey, options: RequestOptions = {}): void {
    if (key.kind === "page") {
      this.getPage(key.page, options);
    } else {
      this.getItem(key.id, options);
    }
  }

  peekPage(page: Page): CacheEntry<PageValue> | undefined {
    const stored = this.pages.get(pageKey(page));
    return stored ? this.snapshot(stored) : undefined;
  }

  peekItem(id: number): CacheEntry<Item> | undefined {
    const stored = this.items.get(itemKey(id));
    return stored ? this.snapshot(stored) : undefined;
  }

  /**
   * Keys the active view is showing. They are kept through eviction until the
   * next call replaces the set.
   */
  pin(keys: readonly CacheKey[]): void {
    const pages = new Set<string>();
    const items = new Set<string>();
    for (const key of keys) {
      if (key.kind === "page") {
        pages.add(pageKey(key.page));
      } else {
        items.add(itemKey(key.id));
      }
    }
    this.pages.pin(pages);
    this.items.pin(items);
  }

  isInFlight(key: CacheKey): boolean {
    const stored =
      key.kind === "page" ? this.pages.get(pageKey(key.page)) : this.items.get(itemKey(key.id));
    return stored?.inFlight ?? false;
  }

  get size(): { pages: number; items: number } {
    return { pages: this.pages.size, items: this.items.size };
  }

  get activeFetches(): number {
    return this.limiter.running + this.limiter.queued;
  }

  /**
   * Write a finished fetch into its entry. The data is kept either way; the
   * returned flag tells the caller whether anyone still looking at the
   * current view asked for it.
   */
  settle(settled: SettledFetch): Completion {
    if (settled.kind === "page") {
      const { entry, superseded } = this.settleIn(this.pages, pageKey(settled.page), settled.outcome);
      return { kind: "page", page: settled.page, entry, superseded };
    }
    const { entry, superseded } = this.settleIn(this.items, itemKey(settled.id), settled.outcome);
    return { kind: "item", id: settled.id, entry, superseded };
  }

  private fetchInto<T>(
    store: EntryStore<T>,
    key: string,
    options: RequestOptions,
    load: () => Promise<T>,
    report: (outcome: FetchOutcome<T>) => void,
  ): CacheEntry<T> {
    const existing = store.touch(key);

    if (existing?.inFlight) {
      existing.pendingGeneration = Math.max(existing.pendingGeneration, this.generation);
      return this.snapshot(existing);
    }

    if (existing && !options.force && this.isFresh(existing)) {
      return this.snapshot(existing);
    }

    const entry: StoredEntry<T> = existing ?? {
      value: undefined,
      error: undefined,
      fetchedAt: 0,
      generation: this.generation,
      inFlight: false,
      pendingGeneration: this.generation,
    };
    entry.inFlight = true;
    entry.pendingGeneration = this.generation;
    if (!existing) {
      store.insert(key, entry);
    }

    log("[cache] fetch", key, `gen=${this.generation}`);
    this.limiter.schedule(async () => {
      let outcome: FetchOutcome<T>;
      try {
        outcome = { ok: true, value: await load() };
      } catch (error) {
        outcome = { ok: false, error: toFetchError(error) };
      }
      report(outcome);
    });

    return this.snapshot(entry);
  }

  private settleIn<T>(
    store: EntryStore<T>,
    key: string,
    outcome: FetchOutcome<T>,
  ): { entry: CacheEntry<T>; superseded: boolean } {
    let stored = store.touch(key);
    if (!stored) {
      stored = {
        value: undefined,
        error: undefined,
        fetchedAt: 0,
        generation: this.generation,
        inFlight: false,
        pendingGeneration: this.generation,
      };
      store.insert(key, stored);
    }

    stored.inFlight = false;
    stored.generation = stored.pendingGeneration;
    if (outcome.ok) {
      stored.value = outcome.value;
      stored.error = undefined;
      stored.fetchedAt = this.now();
    } else {
      stored.error = outcome.error;
      log("[cache] failed", key, outcome.error.kind, outcome.error.message);
    }
    store.evict(key);

    return {
      entry: this.snapshot(stored),
      superseded: stored.generation < this.generation,
    };
  }

  private isFresh<T>(stored: StoredEntry<T>): boolean {
    return (
      stored.value !== undefined &&
      stored.error === undefined &&
      this.now() - stored.fetchedAt < this.options.ttlMs
    );
  }

  private snapshot<T>(stored: StoredEntry<T>): CacheEntry<T> {
    let status: CacheStatus;
    if (stored.inFlight) {
      status = "loading";
    } else if (stored.error) {
      status = "failed";
    } else if (this.isFresh(stored)) {
      status = "fresh";
    } else {
      status = "stale";
    }

    return {
      value: stored.value,
      status,
      error: stored.error,
      fetchedAt: stored.fetchedAt,
      generation: stored.generation,
    };
  }
}
