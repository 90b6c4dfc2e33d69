import { discussionUrl, itemUrl } from "./api.js";
import type { CacheKey, CacheReader, CacheStatus, Completion } from "./cache.js";
import { describeFetchError } from "./errors.js";
import { clampPageIndex, lastPageIndex, samePage } from "./pages.js";
import {
  applyItemSettled,
  childIdsOf,
  collapse,
  collapseThread,
  createTree,
  flattenVisible,
  nodePhase,
  requestExpand,
  type CommentTree,
  type VisibleNode,
} from "./tree.js";
import { storyTypeLabel, type CommentId, type Page, type StoryId, type StoryType } from "./types.js";

export interface StoriesView {
  kind: "stories";
  page: Page;
  selectedIndex: number;
}

export interface CommentsView {
  kind: "comments";
  storyId: StoryId;
  cursor: readonly number[];
  // Thread roots folded with collapse-thread; the next expand on one reopens it
  collapsedThreads: ReadonlySet<CommentId>;
  returnTo: StoriesView;
}

export type ViewState = StoriesView | CommentsView;

export interface Notice {
  // Which request the notice is about, so a later success can clear it
  source: "page" | "story";
  message: string;
}

/** Page ids last shown, kept on screen while the next page loads. */
export interface DisplayedPage {
  page: Page;
  ids: readonly StoryId[];
}

export interface AppModel {
  view: ViewState;
  generation: number;
  trees: ReadonlyMap<StoryId, CommentTree>;
  totals: Partial<Record<StoryType, number>>;
  displayed: DisplayedPage | null;
  notice: Notice | null;
  showHelp: boolean;
  quitting: boolean;
}

export type Action =
  | { type: "move_selection"; delta: 1 | -1 }
  | { type: "change_page"; delta: 1 | -1 }
  | { type: "switch_category"; storyType: StoryType }
  | { type: "jump"; to: "top" | "bottom" }
  | { type: "open_comments" }
  | { type: "back" }
  | { type: "move_sibling"; delta: 1 | -1 }
  | { type: "jump_parent" }
  | { type: "toggle_expand" }
  | { type: "collapse_thread" }
  | { type: "open_url" }
  | { type: "refresh" }
  | { type: "toggle_help" }
  | { type: "quit" };

export type AppEvent = { type: "action"; action: Action } | { type: "completion"; completion: Completion };

export type Effect =
  | { type: "request"; key: CacheKey; force: boolean }
  | { type: "open_url"; url: string }
  | { type: "quit" };

export interface Transition {
  model: AppModel;
  effects: Effect[];
}

export function initialModel(page: Page): AppModel {
  return {
    view: { kind: "stories", page, selectedIndex: 0 },
    generation: 0,
    trees: new Map(),
    totals: {},
    displayed: null,
    notice: null,
    showHelp: false,
    quitting: false,
  };
}

function requestPage(page: Page, force = false): Effect {
  return { type: "request", key: { kind: "page", page }, force };
}

function requestItem(id: number, force = false): Effect {
  return { type: "request", key: { kind: "item", id }, force };
}

// ============================================================================
// Derived views
// ============================================================================

/** Ids of the rows the stories view shows for its current page, if known. */
export function currentPageIds(view: StoriesView, reader: CacheReader): readonly StoryId[] | undefined {
  return reader.peekPage(view.page)?.value?.ids;
}

export function knownTotal(model: AppModel, page: Page, reader: CacheReader): number | undefined {
  return reader.peekPage(page)?.value?.total ?? model.totals[page.storyType];
}

export function storyRootIds(storyId: StoryId, reader: CacheReader): readonly CommentId[] {
  const story = reader.peekItem(storyId)?.value;
  return story && story.kind === "story" ? story.childIds : [];
}

export function treeFor(model: AppModel, storyId: StoryId): CommentTree {
  return model.trees.get(storyId) ?? createTree(storyId);
}

export function visibleComments(model: AppModel, view: CommentsView, reader: CacheReader): VisibleNode[] {
  return flattenVisible(storyRootIds(view.storyId, reader), treeFor(model, view.storyId), reader);
}

function samePath(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

/**
 * Index of the cursor in the visible list. A cursor whose node is no longer
 * visible lands on its deepest visible ancestor, and `[]` means the first row.
 */
export function resolveCursor(nodes: readonly VisibleNode[], cursor: readonly number[]): number {
  if (nodes.length === 0) return -1;

  for (let length = cursor.length; length > 0; length--) {
    const prefix = cursor.slice(0, length);
    const index = nodes.findIndex((node) => samePath(node.path, prefix));
    if (index >= 0) return index;
  }
  return 0;
}

// ============================================================================
// Reducer
// ============================================================================

export function reduce(model: AppModel, event: AppEvent, reader: CacheReader): Transition {
  const transition =
    event.type === "action" ? reduceAction(model, event.action, reader) : reduceCompletion(model, event.completion, reader);
  return { model: syncDisplayed(transition.model, reader), effects: transition.effects };
}

/** Remember the rows of the current page once they are known. */
function syncDisplayed(model: AppModel, reader: CacheReader): AppModel {
  const view = model.view.kind === "stories" ? model.view : model.view.returnTo;
  const ids = currentPageIds(view, reader);
  if (!ids) return model;
  if (model.displayed && samePage(model.displayed.page, view.page) && model.displayed.ids === ids) {
    return model;
  }
  return { ...model, displayed: { page: view.page, ids } };
}

function changeView(model: AppModel, view: ViewState): AppModel {
  return { ...model, view, generation: model.generation + 1, notice: null };
}

function reduceAction(model: AppModel, action: Action, reader: CacheReader): Transition {
  switch (action.type) {
    case "quit":
      return { model: { ...model, quitting: true }, effects: [{ type: "quit" }] };
    case "toggle_help":
      return { model: { ...model, showHelp: !model.showHelp }, effects: [] };
    default:
      break;
  }

  if (model.view.kind === "stories") {
    return reduceStoriesAction(model, model.view, action, reader);
  }
  return reduceCommentsAction(model, model.view, action, reader);
}

function reduceStoriesAction(model: AppModel, view: StoriesView, action: Action, reader: CacheReader): Transition {
  const ids = currentPageIds(view, reader) ?? [];
  const lastRow = Math.max(0, ids.length - 1);

  switch (action.type) {
    case "move_selection": {
      const selectedIndex = Math.max(0, Math.min(lastRow, view.selectedIndex + action.delta));
      if (selectedIndex === view.selectedIndex) return { model, effects: [] };
      return { model: { ...model, view: { ...view, selectedIndex } }, effects: [] };
    }

    case "jump": {
      const selectedIndex = action.to === "top" ? 0 : lastRow;
      return { model: { ...model, view: { ...view, selectedIndex } }, effects: [] };
    }

    case "change_page": {
      const total = knownTotal(model, view.page, reader);
      // Without a known total there is no last page to move towards
      if (action.delta > 0 && total === undefined) return { model, effects: [] };
      const target = view.page.pageIndex + action.delta;
      const pageIndex =
        total === undefined ? Math.max(0, target) : clampPageIndex(target, total, view.page.pageSize);
      if (pageIndex === view.page.pageIndex) return { model, effects: [] };

      const page: Page = { ...view.page, pageIndex };
      return {
        model: changeView(model, { kind: "stories", page, selectedIndex: 0 }),
        effects: [requestPage(page)],
      };
    }

    case "switch_category": {
      if (action.storyType === view.page.storyType) return { model, effects: [] };
      const page: Page = { ...view.page, storyType: action.storyType, pageIndex: 0 };
      return {
        model: changeView(model, { kind: "stories", page, selectedIndex: 0 }),
        effects: [requestPage(page)],
      };
    }

    case "open_comments": {
      const storyId = ids[view.selectedIndex];
      if (storyId === undefined) return { model, effects: [] };
      const trees = model.trees.has(storyId) ? model.trees : new Map(model.trees).set(storyId, createTree(storyId));
      const next = changeView(
        { ...model, trees },
        { kind: "comments", storyId, cursor: [], collapsedThreads: new Set(), returnTo: view },
      );
      return { model: next, effects: [requestItem(storyId)] };
    }

    case "open_url": {
      const storyId = ids[view.selectedIndex];
      if (storyId === undefined) return { model, effects: [] };
      const story = reader.peekItem(storyId)?.value;
      const url = story && story.kind === "story" ? itemUrl(story) : discussionUrl(storyId);
      return { model, effects: [{ type: "open_url", url }] };
    }

    case "refresh":
      return {
        model,
        effects: [requestPage(view.page, true), ...ids.map((id) => requestItem(id, true))],
      };

    default:
      return { model, effects: [] };
  }
}

function reduceCommentsAction(model: AppModel, view: CommentsView, action: Action, reader: CacheReader): Transition {
  const nodes = visibleComments(model, view, reader);
  const index = resolveCursor(nodes, view.cursor);
  const current = index >= 0 ? nodes[index] : undefined;

  const moveTo = (node: VisibleNode | undefined): Transition => {
    if (!node || (current && samePath(node.path, view.cursor))) return { model, effects: [] };
    return { model: { ...model, view: { ...view, cursor: node.path } }, effects: [] };
  };

  switch (action.type) {
    case "back": {
      const next = changeView(model, view.returnTo);
      return { model: next, effects: [requestPage(view.returnTo.page)] };
    }

    case "move_selection":
      if (!current) return { model, effects: [] };
      return moveTo(nodes[Math.max(0, Math.min(nodes.length - 1, index + action.delta))]);

    case "jump":
      return moveTo(action.to === "top" ? nodes[0] : nodes[nodes.length - 1]);

    case "move_sibling": {
      if (!current) return { model, effects: [] };
      const last = current.path[current.path.length - 1] ?? 0;
      const siblingPath = [...current.path.slice(0, -1), last + action.delta];
      return moveTo(nodes.find((node) => samePath(node.path, siblingPath)));
    }

    case "jump_parent": {
      if (!current || current.path.length < 2) return { model, effects: [] };
      const parentPath = current.path.slice(0, -1);
      return moveTo(nodes.find((node) => samePath(node.path, parentPath)));
    }

    case "toggle_expand":
      if (!current) return { model, effects: [] };
      return toggleExpand(model, view, current, reader);

    case "collapse_thread":
      if (!current) return { model, effects: [] };
      return collapseNearestThread(model, view, current, nodes, reader);

    case "open_url": {
      const story = reader.peekItem(view.storyId)?.value;
      const url = story && story.kind === "story" ? itemUrl(story) : discussionUrl(view.storyId);
      return { model, effects: [{ type: "open_url", url }] };
    }

    case "refresh": {
      const failed = nodes.filter((node) => reader.peekItem(node.id)?.status === "failed");
      return {
        model,
        effects: [requestItem(view.storyId, true), ...failed.map((node) => requestItem(node.id, true))],
      };
    }

    default:
      return { model, effects: [] };
  }
}

function toggleExpand(model: AppModel, view: CommentsView, node: VisibleNode, reader: CacheReader): Transition {
  const entry = reader.peekItem(node.id);

  // A slot with no content: retry it if it failed, otherwise wait for it
  if (entry?.value === undefined) {
    if (entry?.status === "failed") {
      return { model, effects: [requestItem(node.id, true)] };
    }
    return { model, effects: [] };
  }

  const tree = treeFor(model, view.storyId);
  if (nodePhase(tree, node.id) === "expanded") {
    return {
      model: withTree(model, collapse(tree, node.id)),
      effects: [],
    };
  }

  const collapsedThreads = new Set(view.collapsedThreads);
  collapsedThreads.delete(node.id);
  const { tree: expanded, fetchIds } = requestExpand(tree, node.id, reader);
  const failed = new Set(
    childIdsOf(node.id, reader).filter((kid) => reader.peekItem(kid)?.status === "failed"),
  );
  return {
    model: withTree({ ...model, view: { ...view, collapsedThreads } }, expanded),
    effects: fetchIds.map((id) => requestItem(id, failed.has(id))),
  };
}

/** Collapse the nearest expanded node at or above the cursor, and everything under it. */
function collapseNearestThread(
  model: AppModel,
  view: CommentsView,
  current: VisibleNode,
  nodes: readonly VisibleNode[],
  reader: CacheReader,
): Transition {
  const tree = treeFor(model, view.storyId);
  for (let length = current.path.length; length > 0; length--) {
    const prefix = current.path.slice(0, length);
    const target = nodes.find((node) => samePath(node.path, prefix));
    if (!target || nodePhase(tree, target.id) !== "expanded") continue;

    return {
      model: withTree(
        {
          ...model,
          view: {
            ...view,
            cursor: target.path,
            collapsedThreads: new Set(view.collapsedThreads).add(target.id),
          },
        },
        collapseThread(tree, target.id, reader),
      ),
      effects: [],
    };
  }
  return { model, effects: [] };
}

function withTree(model: AppModel, tree: CommentTree): AppModel {
  const trees = new Map(model.trees);
  trees.set(tree.storyId, tree);
  return { ...model, trees };
}

// ============================================================================
// Completions
// ============================================================================

function reduceCompletion(model: AppModel, completion: Completion, reader: CacheReader): Transition {
  if (completion.kind === "page") {
    return { model: applyPageCompletion(model, completion), effects: [] };
  }

  // Tree bookkeeping settles even for superseded results so nothing stays loading
  let trees: Map<StoryId, CommentTree> | undefined;
  for (const [storyId, tree] of model.trees) {
    const settled = applyItemSettled(tree, completion.id, reader);
    if (settled !== tree) {
      trees ??= new Map(model.trees);
      trees.set(storyId, settled);
    }
  }
  const next = trees ? { ...model, trees } : model;

  if (completion.superseded) return { model: next, effects: [] };
  if (next.view.kind !== "comments" || next.view.storyId !== completion.id) {
    return { model: next, effects: [] };
  }

  const { entry } = completion;
  if (entry.error) {
    return {
      model: { ...next, notice: { source: "story", message: `Could not load story: ${describeFetchError(entry.error)}` } },
      effects: [],
    };
  }
  if (next.notice?.source === "story") {
    return { model: { ...next, notice: null }, effects: [] };
  }
  return { model: next, effects: [] };
}

function applyPageCompletion(model: AppModel, completion: Extract<Completion, { kind: "page" }>): AppModel {
  const { entry, page } = completion;
  let next = model;

  if (entry.value) {
    next = { ...next, totals: { ...next.totals, [page.storyType]: entry.value.total } };
  }

  if (completion.superseded || next.view.kind !== "stories" || !samePage(next.view.page, page)) {
    return next;
  }

  const view = next.view;
  if (entry.error) {
    const message = `Could not load ${storyTypeLabel(page.storyType)} stories: ${describeFetchError(entry.error)}`;
    return { ...next, notice: { source: "page", message } };
  }

  const rows = entry.value?.ids.length ?? 0;
  const selectedIndex = Math.max(0, Math.min(view.selectedIndex, rows - 1));
  const notice = next.notice?.source === "page" ? null : next.notice;
  return { ...next, notice, view: { ...view, selectedIndex } };
}

// ============================================================================
// Content the active view needs
// ============================================================================

function needsFetch(status: CacheStatus | undefined): boolean {
  return status === undefined || status === "loading";
}

function statusOf(key: CacheKey, reader: CacheReader): CacheStatus | undefined {
  return key.kind === "page" ? reader.peekPage(key.page)?.status : reader.peekItem(key.id)?.status;
}

/** Every key the active view shows, page or story first. */
function shownKeys(model: AppModel, reader: CacheReader): CacheKey[] {
  const view = model.view;

  if (view.kind === "stories") {
    const ids = reader.peekPage(view.page)?.value?.ids ?? [];
    return [{ kind: "page", page: view.page }, ...ids.map((id): CacheKey => ({ kind: "item", id }))];
  }

  return [
    { kind: "item", id: view.storyId },
    ...visibleComments(model, view, reader).map((node): CacheKey => ({ kind: "item", id: node.id })),
  ];
}

/**
 * Keys shown by the active view whose entries are absent or still loading.
 * Requesting a loading key attaches to its fetch and marks it as wanted by
 * the current view.
 */
export function missingContent(model: AppModel, reader: CacheReader): CacheKey[] {
  return shownKeys(model, reader).filter((key) => needsFetch(statusOf(key, reader)));
}

/**
 * Keys eviction must keep for the active view: what it shows, the rows kept
 * up while the next page loads, and the children of nodes still loading,
 * whose settle bookkeeping reads them.
 */
export function retainedKeys(model: AppModel, reader: CacheReader): CacheKey[] {
  const keys = shownKeys(model, reader);
  const view = model.view;

  if (view.kind === "stories") {
    for (const id of model.displayed?.ids ?? []) keys.push({ kind: "item", id });
    return keys;
  }

  const tree = treeFor(model, view.storyId);
  for (const [id, entry] of tree.entries) {
    if (!entry.loading) continue;
    keys.push({ kind: "item", id });
    for (const kid of childIdsOf(id, reader)) keys.push({ kind: "item", id: kid });
  }
  return keys;
}

export function lastPageFor(model: AppModel, page: Page, reader: CacheReader): number | undefined {
  const total = knownTotal(model, page, reader);
  return total === undefined ? undefined : lastPageIndex(total, page.pageSize);
}
