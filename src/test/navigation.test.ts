import { describe, it, expect, beforeEach } from "vitest";
import type { CacheEntry, Completion } from "../cache.js";
import { FetchError } from "../errors.js";
import {
  initialModel,
  missingContent,
  reduce,
  resolveCursor,
  retainedKeys,
  treeFor,
  visibleComments,
  type Action,
  type AppModel,
  type CommentsView,
  type Transition,
} from "../navigation.js";
import { nodePhase } from "../tree.js";
import type { Item, Page, PageValue } from "../types.js";
import { createMockComment, createMockStory, createMockThread } from "./fixtures.js";
import { FakeReader, range } from "./test-utils.js";

const PAGE_0: Page = { storyType: "top", pageIndex: 0, pageSize: 10 };
const PAGE_1: Page = { ...PAGE_0, pageIndex: 1 };
const PAGE_2: Page = { ...PAGE_0, pageIndex: 2 };
const IDS = range(1, 23);

function act(model: AppModel, action: Action, reader: FakeReader): Transition {
  return reduce(model, { type: "action", action }, reader);
}

function run(model: AppModel, actions: Action[], reader: FakeReader): AppModel {
  return actions.reduce((current, action) => act(current, action, reader).model, model);
}

function failedEntry<T>(message = "connection reset"): CacheEntry<T> {
  return {
    value: undefined,
    status: "failed",
    error: new FetchError("network", message),
    fetchedAt: 0,
    generation: 0,
  };
}

function freshEntry<T>(value: T): CacheEntry<T> {
  return { value, status: "fresh", error: undefined, fetchedAt: 0, generation: 0 };
}

function pageCompletion(page: Page, entry: CacheEntry<PageValue>, superseded = false): Completion {
  return { kind: "page", page, entry, superseded };
}

function itemCompletion(id: number, entry: CacheEntry<Item>, superseded = false): Completion {
  return { kind: "item", id, entry, superseded };
}

/** A model whose remembered rows already match the reader's current page. */
function loadedModel(page: Page, reader: FakeReader): AppModel {
  const ids = reader.peekPage(page)?.value?.ids;
  return { ...initialModel(page), displayed: ids ? { page, ids } : null };
}

function commentsView(model: AppModel): CommentsView {
  if (model.view.kind !== "comments") throw new Error("Expected the comments view");
  return model.view;
}

describe("Stories view", () => {
  let reader: FakeReader;
  let model: AppModel;

  beforeEach(() => {
    reader = new FakeReader().setPage(PAGE_0, IDS).setPage(PAGE_1, IDS).setPage(PAGE_2, IDS);
    model = loadedModel(PAGE_0, reader);
  });

  describe("selection", () => {
    it("should clamp at the first row", () => {
      const { model: next } = act(model, { type: "move_selection", delta: -1 }, reader);
      expect(next).toBe(model);
    });

    it("should clamp at the last visible row", () => {
      const next = run(model, [{ type: "jump", to: "bottom" }, { type: "move_selection", delta: 1 }], reader);
      expect(next.view).toMatchObject({ kind: "stories", selectedIndex: 9 });
    });

    it("should not move while the page is unknown", () => {
      const next = act(initialModel(PAGE_0), { type: "move_selection", delta: 1 }, new FakeReader()).model;
      expect(next.view).toMatchObject({ selectedIndex: 0 });
    });
  });

  describe("paging", () => {
    it("should range over pages 0 to 2 for 23 ids and clamp beyond", () => {
      const forward: Action = { type: "change_page", delta: 1 };

      const first = act(model, forward, reader);
      expect(first.model.view).toMatchObject({ page: PAGE_1, selectedIndex: 0 });
      expect(first.effects).toEqual([{ type: "request", key: { kind: "page", page: PAGE_1 }, force: false }]);

      const second = act(first.model, forward, reader);
      expect(second.model.view).toMatchObject({ page: PAGE_2 });
      expect(reader.peekPage(PAGE_2)?.value?.ids).toEqual([21, 22, 23]);

      const third = act(second.model, forward, reader);
      expect(third.model).toBe(second.model);
      expect(third.effects).toEqual([]);
    });

    it("should reset the selection on a page change", () => {
      const next = run(model, [{ type: "jump", to: "bottom" }, { type: "change_page", delta: 1 }], reader);
      expect(next.view).toMatchObject({ page: PAGE_1, selectedIndex: 0 });
    });

    it("should not go before page 0", () => {
      expect(act(model, { type: "change_page", delta: -1 }, reader).model).toBe(model);
    });

    it("should not page forward without a known total", () => {
      const next = act(model, { type: "change_page", delta: 1 }, new FakeReader());
      expect(next.model).toBe(model);
    });

    it("should bump the generation on every view change", () => {
      const next = run(
        model,
        [
          { type: "change_page", delta: 1 },
          { type: "change_page", delta: -1 },
          { type: "switch_category", storyType: "new" },
        ],
        reader,
      );
      expect(next.generation).toBe(3);
    });
  });

  describe("switch_category", () => {
    it("should start the new category at page 0", () => {
      const onPage2 = run(model, [{ type: "change_page", delta: 1 }, { type: "change_page", delta: 1 }], reader);
      const { model: next, effects } = act(onPage2, { type: "switch_category", storyType: "best" }, reader);

      const page: Page = { storyType: "best", pageIndex: 0, pageSize: 10 };
      expect(next.view).toEqual({ kind: "stories", page, selectedIndex: 0 });
      expect(effects).toEqual([{ type: "request", key: { kind: "page", page }, force: false }]);
    });

    it("should do nothing for the current category", () => {
      expect(act(model, { type: "switch_category", storyType: "top" }, reader).model).toBe(model);
    });
  });

  describe("open_comments and back", () => {
    it("should open the selected story with the cursor at the root", () => {
      const selected = run(model, [{ type: "move_selection", delta: 1 }, { type: "move_selection", delta: 1 }], reader);
      const { model: next, effects } = act(selected, { type: "open_comments" }, reader);

      const view = commentsView(next);
      expect(view.storyId).toBe(3);
      expect(view.cursor).toEqual([]);
      expect(view.collapsedThreads.size).toBe(0);
      expect(next.trees.has(3)).toBe(true);
      expect(next.generation).toBe(selected.generation + 1);
      expect(effects).toEqual([{ type: "request", key: { kind: "item", id: 3 }, force: false }]);
    });

    it("should need a known story id", () => {
      const empty = new FakeReader();
      expect(act(model, { type: "open_comments" }, empty).model).toBe(model);
    });

    it("should return to the same page and selection", () => {
      const selected = run(model, [{ type: "change_page", delta: 1 }, { type: "jump", to: "bottom" }], reader);
      const { model: back } = act(act(selected, { type: "open_comments" }, reader).model, { type: "back" }, reader);

      expect(back.view).toEqual({ kind: "stories", page: PAGE_1, selectedIndex: 9 });
      expect(back.trees.has(20)).toBe(true);
    });
  });

  describe("open_url", () => {
    it("should open the story link", () => {
      reader.set(createMockStory({ id: 1, url: "https://example.com/one" }));
      const { effects } = act(model, { type: "open_url" }, reader);
      expect(effects).toEqual([{ type: "open_url", url: "https://example.com/one" }]);
    });

    it("should fall back to the discussion page for an unloaded story", () => {
      const { effects } = act(model, { type: "open_url" }, reader);
      expect(effects).toEqual([{ type: "open_url", url: "https://news.ycombinator.com/item?id=1" }]);
    });
  });

  describe("refresh", () => {
    it("should force the page and its stories without changing the view", () => {
      const { model: next, effects } = act(model, { type: "refresh" }, reader);

      expect(next).toBe(model);
      expect(effects[0]).toEqual({ type: "request", key: { kind: "page", page: PAGE_0 }, force: true });
      expect(effects.slice(1)).toEqual(
        range(1, 10).map((id) => ({ type: "request", key: { kind: "item", id }, force: true })),
      );
    });
  });

  describe("help and quit", () => {
    it("should toggle help", () => {
      const shown = act(model, { type: "toggle_help" }, reader).model;
      expect(shown.showHelp).toBe(true);
      expect(act(shown, { type: "toggle_help" }, reader).model.showHelp).toBe(false);
    });

    it("should emit a quit effect", () => {
      const { model: next, effects } = act(model, { type: "quit" }, reader);
      expect(next.quitting).toBe(true);
      expect(effects).toEqual([{ type: "quit" }]);
    });
  });

  describe("page completions", () => {
    it("should surface a failure for the current page", () => {
      const { model: next } = reduce(
        model,
        { type: "completion", completion: pageCompletion(PAGE_0, failedEntry()) },
        new FakeReader(),
      );
      expect(next.notice).toEqual({ source: "page", message: "Could not load Top stories: Network error: connection reset" });
    });

    it("should drop a superseded failure silently", () => {
      const { model: next } = reduce(
        model,
        { type: "completion", completion: pageCompletion(PAGE_0, failedEntry(), true) },
        new FakeReader(),
      );
      expect(next.notice).toBeNull();
    });

    it("should clear the page notice once the page loads", () => {
      const failed = reduce(
        model,
        { type: "completion", completion: pageCompletion(PAGE_0, failedEntry()) },
        new FakeReader(),
      ).model;
      const { model: next } = reduce(
        failed,
        { type: "completion", completion: pageCompletion(PAGE_0, freshEntry({ ids: IDS.slice(0, 10), total: 23 })) },
        reader,
      );
      expect(next.notice).toBeNull();
      expect(next.totals.top).toBe(23);
    });

    it("should clamp the selection when a refreshed page is shorter", () => {
      const atBottom = act(model, { type: "jump", to: "bottom" }, reader).model;
      const shorter = new FakeReader().setPage(PAGE_0, [1, 2, 3]);
      const { model: next } = reduce(
        atBottom,
        { type: "completion", completion: pageCompletion(PAGE_0, freshEntry({ ids: [1, 2, 3], total: 3 })) },
        shorter,
      );
      expect(next.view).toMatchObject({ selectedIndex: 2 });
    });

    it("should remember the shown rows while the next page loads", () => {
      const loaded = reduce(
        model,
        { type: "completion", completion: pageCompletion(PAGE_0, freshEntry({ ids: IDS.slice(0, 10), total: 23 })) },
        reader,
      ).model;
      expect(loaded.displayed?.page).toEqual(PAGE_0);

      const onlyFirst = new FakeReader().setPage(PAGE_0, IDS);
      const paged = act(loaded, { type: "change_page", delta: 1 }, onlyFirst).model;
      expect(paged.view).toMatchObject({ page: PAGE_1 });
      expect(paged.displayed).toEqual({ page: PAGE_0, ids: range(1, 10) });
    });
  });

  describe("missingContent", () => {
    it("should ask for the page first", () => {
      expect(missingContent(model, new FakeReader())).toEqual([{ kind: "page", page: PAGE_0 }]);
    });

    it("should ask for story rows that are absent or loading", () => {
      reader.set(createMockStory({ id: 1 })).loading(2).fail(3);
      const keys = missingContent(model, reader);

      expect(keys).toEqual([2, 4, 5, 6, 7, 8, 9, 10].map((id) => ({ kind: "item", id })));
    });

    it("should not retry a failed page on its own", () => {
      expect(missingContent(model, new FakeReader().failPage(PAGE_0))).toEqual([]);
    });
  });

  describe("retainedKeys", () => {
    it("should keep the page, its rows and the rows still on screen", () => {
      const onlyFirst = new FakeReader().setPage(PAGE_0, IDS);
      const paged = act(loadedModel(PAGE_0, onlyFirst), { type: "change_page", delta: 1 }, onlyFirst).model;

      const keys = retainedKeys(paged, onlyFirst);
      expect(keys[0]).toEqual({ kind: "page", page: PAGE_1 });
      expect(keys.slice(1)).toEqual(range(1, 10).map((id) => ({ kind: "item", id })));
    });
  });
});

describe("Comments view", () => {
  let reader: FakeReader;
  let model: AppModel;

  beforeEach(() => {
    const { story, comments } = createMockThread();
    reader = new FakeReader([story, ...comments]).setPage(PAGE_0, [1000]);
    model = act(initialModel(PAGE_0), { type: "open_comments" }, reader).model;
  });

  function cursorId(current: AppModel): number | undefined {
    const view = commentsView(current);
    const nodes = visibleComments(current, view, reader);
    return nodes[resolveCursor(nodes, view.cursor)]?.id;
  }

  function visible(current: AppModel): number[] {
    return visibleComments(current, commentsView(current), reader).map((node) => node.id);
  }

  it("should start on the first root comment", () => {
    expect(visible(model)).toEqual([1, 2]);
    expect(cursorId(model)).toBe(1);
  });

  it("should move through visible nodes and clamp at the ends", () => {
    const down = run(model, [{ type: "move_selection", delta: 1 }, { type: "move_selection", delta: 1 }], reader);
    expect(cursorId(down)).toBe(2);
    expect(commentsView(down).cursor).toEqual([1]);

    const up = run(down, [{ type: "jump", to: "top" }, { type: "move_selection", delta: -1 }], reader);
    expect(cursorId(up)).toBe(1);
  });

  it("should expand cached children without fetching", () => {
    const { model: next, effects } = act(model, { type: "toggle_expand" }, reader);

    expect(effects).toEqual([]);
    expect(visible(next)).toEqual([1, 11, 12, 2]);
  });

  it("should collapse an expanded node on a second toggle", () => {
    const next = run(model, [{ type: "toggle_expand" }, { type: "toggle_expand" }], reader);
    expect(visible(next)).toEqual([1, 2]);
    expect(nodePhase(treeFor(next, 1000), 1)).toBe("collapsed_cached");
  });

  it("should move between siblings and up to the parent", () => {
    const expanded = run(model, [{ type: "toggle_expand" }, { type: "move_selection", delta: 1 }], reader);
    expect(cursorId(expanded)).toBe(11);

    const sibling = act(expanded, { type: "move_sibling", delta: 1 }, reader).model;
    expect(cursorId(sibling)).toBe(12);
    expect(act(sibling, { type: "move_sibling", delta: 1 }, reader).model).toBe(sibling);

    const back = act(sibling, { type: "move_sibling", delta: -1 }, reader).model;
    expect(cursorId(back)).toBe(11);

    const parent = act(back, { type: "jump_parent" }, reader).model;
    expect(cursorId(parent)).toBe(1);
    expect(act(parent, { type: "jump_parent" }, reader).model).toBe(parent);
  });

  it("should jump to the last visible node", () => {
    const next = run(model, [{ type: "toggle_expand" }, { type: "jump", to: "bottom" }], reader);
    expect(cursorId(next)).toBe(2);
  });

  it("should collapse the nearest expanded thread above the cursor", () => {
    const deep = run(
      model,
      [
        { type: "toggle_expand" },
        { type: "move_selection", delta: 1 },
        { type: "toggle_expand" },
        { type: "move_selection", delta: 1 },
      ],
      reader,
    );
    expect(cursorId(deep)).toBe(111);
    expect(visible(deep)).toEqual([1, 11, 111, 12, 2]);

    const collapsed = act(deep, { type: "collapse_thread" }, reader).model;
    expect(cursorId(collapsed)).toBe(11);
    expect(visible(collapsed)).toEqual([1, 11, 12, 2]);
    expect(commentsView(collapsed).collapsedThreads.has(11)).toBe(true);

    const reopened = act(collapsed, { type: "toggle_expand" }, reader);
    expect(reopened.effects).toEqual([]);
    expect(visible(reopened.model)).toEqual([1, 11, 111, 12, 2]);
    expect(commentsView(reopened.model).collapsedThreads.has(11)).toBe(false);
  });

  it("should fetch missing children when expanding", () => {
    reader.remove(11).remove(12);
    const { model: next, effects } = act(model, { type: "toggle_expand" }, reader);

    expect(effects).toEqual([
      { type: "request", key: { kind: "item", id: 11 }, force: false },
      { type: "request", key: { kind: "item", id: 12 }, force: false },
    ]);
    expect(nodePhase(treeFor(next, 1000), 1)).toBe("loading");
  });

  it("should settle a loading parent even from a superseded completion", () => {
    reader.remove(11).remove(12);
    const loading = act(model, { type: "toggle_expand" }, reader).model;

    const comment11 = createMockComment({ id: 11 });
    const comment12 = createMockComment({ id: 12 });
    reader.set(comment11).set(comment12);
    const afterFirst = reduce(
      loading,
      { type: "completion", completion: itemCompletion(11, freshEntry<Item>(comment11), true) },
      reader,
    ).model;
    const done = reduce(
      afterFirst,
      { type: "completion", completion: itemCompletion(12, freshEntry<Item>(comment12)) },
      reader,
    ).model;

    expect(visible(done)).toEqual([1, 11, 12, 2]);
  });

  it("should retry a failed slot on expand", () => {
    reader.remove(2).fail(2);
    const onSlot = act(model, { type: "move_selection", delta: 1 }, reader).model;
    const { effects } = act(onSlot, { type: "toggle_expand" }, reader);

    expect(effects).toEqual([{ type: "request", key: { kind: "item", id: 2 }, force: true }]);
  });

  it("should refresh the story and failed slots", () => {
    reader.remove(2).fail(2);
    const { model: next, effects } = act(model, { type: "refresh" }, reader);

    expect(next).toBe(model);
    expect(effects).toEqual([
      { type: "request", key: { kind: "item", id: 1000 }, force: true },
      { type: "request", key: { kind: "item", id: 2 }, force: true },
    ]);
  });

  it("should surface a failure of the open story", () => {
    const { model: next } = reduce(
      model,
      { type: "completion", completion: itemCompletion(1000, failedEntry<Item>()) },
      reader,
    );
    expect(next.notice?.message).toBe("Could not load story: Network error: connection reset");
  });

  it("should open the story link", () => {
    const { effects } = act(model, { type: "open_url" }, reader);
    expect(effects).toEqual([{ type: "open_url", url: "https://example.com/post/1000" }]);
  });

  it("should retain the children of a parent still loading", () => {
    reader.remove(12);
    const loading = act(model, { type: "toggle_expand" }, reader).model;

    expect(retainedKeys(loading, reader)).toEqual([1000, 1, 2, 1, 11, 12].map((id) => ({ kind: "item", id })));
  });

  it("should ask for the story and visible comments that are missing", () => {
    reader.remove(2).loading(1);
    expect(missingContent(model, reader)).toEqual([
      { kind: "item", id: 1 },
      { kind: "item", id: 2 },
    ]);
  });
});
