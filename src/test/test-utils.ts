import type { HackerNewsGateway } from "../api.js";
import type { CacheEntry, CacheReader } from "../cache.js";
import { FetchError } from "../errors.js";
import { pageWindow, samePage } from "../pages.js";
import type { Item, Page, PageValue, StoryId, StoryType } from "../types.js";

interface PendingCall {
  key: string;
  run: () => void;
}

export interface FakeGatewayData {
  categories?: Partial<Record<StoryType, StoryId[]>>;
  items?: Item[];
}

/**
 * In-memory gateway. In manual mode every call waits until the test releases
 * it, so the order in which responses arrive is under the test's control.
 */
export class FakeGateway implements HackerNewsGateway {
  readonly calls: string[] = [];
  readonly failures = new Map<string, FetchError>();
  private readonly categories: Partial<Record<StoryType, StoryId[]>>;
  private readonly items = new Map<number, Item>();
  private pending: PendingCall[] = [];

  constructor(data: FakeGatewayData = {}, private readonly manual = false) {
    this.categories = { ...data.categories };
    for (const item of data.items ?? []) {
      this.items.set(item.id, item);
    }
  }

  setItem(item: Item): void {
    this.items.set(item.id, item);
  }

  fail(key: string, error: FetchError = new FetchError("network", "connection reset")): void {
    this.failures.set(key, error);
  }

  fetchCategoryIds(storyType: StoryType): Promise<StoryId[]> {
    return this.respond(`category:${storyType}`, () => {
      const ids = this.categories[storyType];
      if (!ids) throw new FetchError("not_found", `No ${storyType} list`);
      return [...ids];
    });
  }

  fetchItem(id: number): Promise<Item> {
    return this.respond(`item:${id}`, () => {
      const item = this.items.get(id);
      if (!item) throw new FetchError("not_found", `Item ${id} does not exist`);
      return item;
    });
  }

  pendingKeys(): string[] {
    return this.pending.map((call) => call.key);
  }

  /** Complete the oldest waiting call for `key`. */
  release(key: string): void {
    const index = this.pending.findIndex((call) => call.key === key);
    const call = this.pending[index];
    if (!call) throw new Error(`No pending call for ${key}`);
    this.pending.splice(index, 1);
    call.run();
  }

  releaseAll(): void {
    const calls = this.pending;
    this.pending = [];
    for (const call of calls) call.run();
  }

  private respond<T>(key: string, produce: () => T): Promise<T> {
    this.calls.push(key);
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        const failure = this.failures.get(key);
        if (failure) {
          reject(failure);
          return;
        }
        try {
          resolve(produce());
        } catch (error) {
          reject(error);
        }
      };
      if (this.manual) {
        this.pending.push({ key, run });
      } else {
        queueMicrotask(run);
      }
    });
  }
}

/** Let every pending promise callback run. */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

function entry<T>(value: T | undefined, status: CacheEntry<T>["status"], error?: FetchError): CacheEntry<T> {
  return { value, status, error, fetchedAt: 0, generation: 0 };
}

/**
 * Hand-fed cache view for testing the tree and the controller without a
 * gateway.
 */
export class FakeReader implements CacheReader {
  private readonly items = new Map<number, CacheEntry<Item>>();
  private readonly pages: { page: Page; entry: CacheEntry<PageValue> }[] = [];

  constructor(items: Item[] = []) {
    for (const item of items) this.set(item);
  }

  set(item: Item): this {
    this.items.set(item.id, entry(item, "fresh"));
    return this;
  }

  loading(id: number): this {
    this.items.set(id, entry<Item>(undefined, "loading"));
    return this;
  }

  /** A refresh in flight behind a cached value. */
  refreshing(id: number): this {
    this.items.set(id, entry(this.items.get(id)?.value, "loading"));
    return this;
  }

  fail(id: number, error: FetchError = new FetchError("network", "connection reset")): this {
    this.items.set(id, entry(this.items.get(id)?.value, "failed", error));
    return this;
  }

  remove(id: number): this {
    this.items.delete(id);
    return this;
  }

  /** Store the window of `ids` the page covers, as the cache would. */
  setPage(page: Page, ids: readonly StoryId[]): this {
    const value: PageValue = { ids: pageWindow(ids, page), total: ids.length };
    this.pages.push({ page, entry: entry(value, "fresh") });
    return this;
  }

  failPage(page: Page, error: FetchError = new FetchError("network", "connection reset")): this {
    this.pages.push({ page, entry: entry<PageValue>(undefined, "failed", error) });
    return this;
  }

  peekPage(page: Page): CacheEntry<PageValue> | undefined {
    for (let i = this.pages.length - 1; i >= 0; i--) {
      const stored = this.pages[i];
      if (stored && samePage(stored.page, page)) return stored.entry;
    }
    return undefined;
  }

  peekItem(id: number): CacheEntry<Item> | undefined {
    return this.items.get(id);
  }
}

export function range(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}
