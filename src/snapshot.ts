import type { CacheEntry, CacheReader } from "./cache.js";
import { describeFetchError } from "./errors.js";
import {
  lastPageFor,
  resolveCursor,
  treeFor,
  visibleComments,
  type AppModel,
  type CommentsView,
  type StoriesView,
} from "./navigation.js";
import { samePage } from "./pages.js";
import { indentFor, nodePhase, type NodePhase } from "./tree.js";
import type { Item, Page, StoryId, StoryType } from "./types.js";
import { domainOf, formatTimeAgo, stripHtml } from "./utils.js";

export type RowStatus = "loading" | "ready" | "failed";

export interface StoryRow {
  id: StoryId;
  rank: number;
  status: RowStatus;
  title: string | null;
  domain: string | null;
  score: number;
  author: string | null;
  timeAgo: string | null;
  commentCount: number;
  error: string | null;
  selected: boolean;
}

export interface CommentRow {
  id: number;
  depth: number;
  indent: number;
  status: RowStatus;
  phase: NodePhase;
  author: string | null;
  text: string | null;
  timeAgo: string | null;
  replyCount: number;
  failedReplies: number;
  // Root of a thread folded with collapse-thread
  threadCollapsed: boolean;
  deleted: boolean;
  dead: boolean;
  error: string | null;
  selected: boolean;
}

export interface StoryDetails {
  id: StoryId;
  title: string;
  url: string | null;
  domain: string | null;
  text: string | null;
  score: number;
  author: string | null;
  timeAgo: string;
  commentCount: number;
}

export interface StoriesScreen {
  kind: "stories";
  storyType: StoryType;
  pageIndex: number;
  lastPage: number | null;
  rows: StoryRow[];
  // Rows are from an earlier request and a newer one is in flight
  dimmed: boolean;
  loading: boolean;
  selectedIndex: number;
}

export interface CommentsScreen {
  kind: "comments";
  storyId: StoryId;
  story: StoryDetails | null;
  storyStatus: RowStatus;
  rows: CommentRow[];
  // The story is being refreshed behind the rows shown
  dimmed: boolean;
  loading: boolean;
  selectedIndex: number;
}

export interface ScreenSnapshot {
  screen: StoriesScreen | CommentsScreen;
  notice: string | null;
  showHelp: boolean;
}

function rowStatus(entry: CacheEntry<Item> | undefined): RowStatus {
  if (entry?.value !== undefined) return "ready";
  return entry?.status === "failed" ? "failed" : "loading";
}

function entryError(entry: CacheEntry<Item> | undefined): string | null {
  return entry?.value === undefined && entry?.error ? describeFetchError(entry.error) : null;
}

function storyRow(id: StoryId, rank: number, selected: boolean, reader: CacheReader, now: number): StoryRow {
  const entry = reader.peekItem(id);
  const item = entry?.value;
  const story = item?.kind === "story" ? item : undefined;
  return {
    id,
    rank,
    status: rowStatus(entry),
    title: story?.title ?? null,
    domain: domainOf(story?.url ?? null),
    score: story?.score ?? 0,
    author: story?.author ?? null,
    timeAgo: story ? formatTimeAgo(story.submittedAt, now) : null,
    commentCount: story?.descendantCount ?? 0,
    error: entryError(entry),
    selected,
  };
}

function storyRows(
  shown: { page: Page; ids: readonly StoryId[] },
  view: StoriesView,
  reader: CacheReader,
  now: number,
): StoryRow[] {
  const current = samePage(shown.page, view.page);
  return shown.ids.map((id, index) => {
    const rank = shown.page.pageIndex * shown.page.pageSize + index + 1;
    return storyRow(id, rank, current && index === view.selectedIndex, reader, now);
  });
}

function buildStoriesScreen(model: AppModel, view: StoriesView, reader: CacheReader, now: number): StoriesScreen {
  const pageEntry = reader.peekPage(view.page);
  const loading = pageEntry === undefined || pageEntry.status === "loading";

  // Gentle loading: keep the last known rows up while the new ones arrive
  let shown: { page: Page; ids: readonly StoryId[] } | null = null;
  let dimmed = false;
  if (pageEntry?.value) {
    shown = { page: view.page, ids: pageEntry.value.ids };
    dimmed = pageEntry.status === "loading";
  } else if (model.displayed && loading) {
    shown = model.displayed;
    dimmed = true;
  }

  const rows = shown ? storyRows(shown, view, reader, now) : [];

  return {
    kind: "stories",
    storyType: view.page.storyType,
    pageIndex: view.page.pageIndex,
    lastPage: lastPageFor(model, view.page, reader) ?? null,
    rows,
    dimmed,
    loading,
    selectedIndex: view.selectedIndex,
  };
}

function buildCommentsScreen(model: AppModel, view: CommentsView, reader: CacheReader, now: number): CommentsScreen {
  const storyEntry = reader.peekItem(view.storyId);
  const item = storyEntry?.value;
  const story: StoryDetails | null =
    item?.kind === "story"
      ? {
          id: item.id,
          title: item.title,
          url: item.url,
          domain: domainOf(item.url),
          text: item.text === null ? null : stripHtml(item.text),
          score: item.score,
          author: item.author,
          timeAgo: formatTimeAgo(item.submittedAt, now),
          commentCount: item.descendantCount,
        }
      : null;

  const tree = treeFor(model, view.storyId);
  const nodes = visibleComments(model, view, reader);
  const selectedIndex = resolveCursor(nodes, view.cursor);

  const rows = nodes.map((node, index): CommentRow => {
    const entry = reader.peekItem(node.id);
    const comment = entry?.value?.kind === "comment" ? entry.value : undefined;
    const phase = nodePhase(tree, node.id);
    return {
      id: node.id,
      depth: node.depth,
      indent: indentFor(node.depth),
      status: rowStatus(entry),
      phase,
      author: comment?.author ?? null,
      text: comment?.text ? stripHtml(comment.text) : null,
      timeAgo: comment ? formatTimeAgo(comment.submittedAt, now) : null,
      replyCount: comment?.childIds.length ?? 0,
      failedReplies: tree.entries.get(node.id)?.failedChildIds.length ?? 0,
      threadCollapsed: view.collapsedThreads.has(node.id),
      deleted: comment?.deleted ?? false,
      dead: comment?.dead ?? false,
      error: entryError(entry),
      selected: index === selectedIndex,
    };
  });

  return {
    kind: "comments",
    storyId: view.storyId,
    story,
    storyStatus: rowStatus(storyEntry),
    rows,
    dimmed: storyEntry?.status === "loading" && storyEntry.value !== undefined,
    loading: storyEntry === undefined || storyEntry.status === "loading",
    selectedIndex,
  };
}

/** Pure projection of the model and cache into what the screen shows. */
export function buildSnapshot(model: AppModel, reader: CacheReader, now: number = Date.now()): ScreenSnapshot {
  const screen =
    model.view.kind === "stories"
      ? buildStoriesScreen(model, model.view, reader, now)
      : buildCommentsScreen(model, model.view, reader, now);

  return {
    screen,
    notice: model.notice?.message ?? null,
    showHelp: model.showHelp,
  };
}
