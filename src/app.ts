import type { HackerNewsGateway } from "./api.js";
import { RefreshCache, cacheKeyString, type SettledFetch } from "./cache.js";
import { dispatchKey } from "./handlers/index.js";
import { log, logError } from "./logger.js";
import {
  initialModel,
  missingContent,
  reduce,
  retainedKeys,
  type AppEvent,
  type AppModel,
  type Effect,
} from "./navigation.js";
import { EventQueue } from "./queue.js";
import type { ReaderSettings } from "./settings.js";
import { buildSnapshot, type ScreenSnapshot } from "./snapshot.js";
import type { KeyEvent, StoryType } from "./types.js";

export interface AppCallbacks {
  onOpenUrl?: (url: string) => void;
  onExit?: () => void;
  onError?: (error: unknown) => void;
}

export interface ReaderAppOptions {
  settings: ReaderSettings;
  storyType: StoryType;
  now?: () => number;
}

// Everything that reaches the loop: keystrokes and finished fetches
type InboundEvent = { type: "key"; key: KeyEvent } | { type: "settled"; settled: SettledFetch };

/**
 * Owns the model, the cache and the inbound queue, and runs the tick loop.
 *
 * Input handlers and fetch callbacks only enqueue; `tick` is the single place
 * where the model and the cache entries change. Each tick publishes at most one
 * snapshot, and only when it differs from the previous one.
 */
export class ReaderApp {
  readonly cache: RefreshCache;
  private readonly queue = new EventQueue<InboundEvent>();
  private readonly listeners = new Set<() => void>();
  private readonly now: () => number;
  private model: AppModel;
  private snapshot: ScreenSnapshot;
  private serialized: string;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stopped = false;

  constructor(
    gateway: HackerNewsGateway,
    private readonly options: ReaderAppOptions,
    private readonly callbacks: AppCallbacks = {},
  ) {
    const { settings } = options;
    this.now = options.now ?? Date.now;
    this.cache = new RefreshCache(gateway, {
      ttlMs: settings.cacheTtlSeconds * 1000,
      maxPages: settings.maxCachedPages,
      maxItems: settings.maxCachedItems,
      maxConcurrent: settings.maxConcurrentFetches,
      onSettled: (settled) => this.queue.push({ type: "settled", settled }),
      now: this.now,
    });
    this.model = initialModel({
      storyType: options.storyType,
      pageIndex: 0,
      pageSize: settings.pageSize,
    });
    this.snapshot = buildSnapshot(this.model, this.cache, this.now());
    this.serialized = JSON.stringify(this.snapshot);
  }

  start(): void {
    if (this.timer || this.stopped) return;
    log("[app] start", `tick=${this.options.settings.tickMs}ms`);
    this.tick();
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        logError("tick", error);
        this.stop();
        this.callbacks.onError?.(error);
      }
    }, this.options.settings.tickMs);
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  handleKey(key: KeyEvent): void {
    this.queue.push({ type: "key", key });
  }

  /**
   * Drain the queue, apply everything in arrival order, fetch what the view
   * is missing, then publish. Returns whether the snapshot changed.
   */
  tick(): boolean {
    // Settling may evict; whatever the screen shows right now stays
    this.cache.pin(retainedKeys(this.model, this.cache));

    for (const event of this.queue.drain()) {
      if (event.type === "key") {
        const action = dispatchKey(event.key, { view: this.model.view.kind, showHelp: this.model.showHelp });
        if (action) {
          log("[app] action", action.type);
          this.apply({ type: "action", action });
          this.cache.pin(retainedKeys(this.model, this.cache));
        }
      } else {
        const completion = this.cache.settle(event.settled);
        this.apply({ type: "completion", completion });
      }
      if (this.model.quitting) return false;
    }

    this.cache.pin(retainedKeys(this.model, this.cache));
    for (const key of missingContent(this.model, this.cache)) {
      this.cache.request(key);
    }

    return this.publish();
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): ScreenSnapshot => this.snapshot;

  get state(): AppModel {
    return this.model;
  }

  private apply(event: AppEvent): void {
    const { model, effects } = reduce(this.model, event, this.cache);
    if (model.generation !== this.model.generation) {
      this.cache.setGeneration(model.generation);
    }
    this.model = model;
    for (const effect of effects) {
      this.run(effect);
    }
  }

  private run(effect: Effect): void {
    switch (effect.type) {
      case "request":
        log("[app] request", cacheKeyString(effect.key), effect.force ? "(force)" : "");
        this.cache.request(effect.key, { force: effect.force });
        break;
      case "open_url":
        log("[app] open", effect.url);
        this.callbacks.onOpenUrl?.(effect.url);
        break;
      case "quit":
        this.stop();
        this.callbacks.onExit?.();
        break;
    }
  }

  private publish(): boolean {
    const next = buildSnapshot(this.model, this.cache, this.now());
    const serialized = JSON.stringify(next);
    if (serialized === this.serialized) return false;

    this.snapshot = next;
    this.serialized = serialized;
    for (const listener of this.listeners) {
      listener();
    }
    return true;
  }
}
