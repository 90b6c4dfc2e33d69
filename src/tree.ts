import type { CacheReader } from "./cache.js";
import type { CommentId } from "./types.js";

/** Indentation stops growing past this depth; nesting itself is unbounded. */
export const MAX_INDENT_DEPTH = 8;

/**
 * UI state of one comment node. Content lives in the cache; this only records
 * whether the node's children are shown and whether they have been loaded.
 */
export interface TreeEntry {
  expanded: boolean;
  childrenLoaded: boolean;
  loading: boolean;
  // Children still being fetched for the current expansion
  pendingChildIds: readonly CommentId[];
  // Children whose fetch failed on the last load
  failedChildIds: readonly CommentId[];
}

export type NodePhase = "collapsed" | "loading" | "expanded" | "collapsed_cached" | "load_failed";

/**
 * Arena of per-node flags for one story. Edges are the child id lists of the
 * cached items, so the tree never holds a reference to another node.
 */
export interface CommentTree {
  storyId: number;
  entries: ReadonlyMap<CommentId, TreeEntry>;
}

export interface VisibleNode {
  id: CommentId;
  depth: number;
  // Child index at every level, starting from the story's own kids
  path: readonly number[];
  parentId: CommentId | null;
}

export interface ExpandResult {
  tree: CommentTree;
  // Children to fetch; empty when the expansion needed no network
  fetchIds: CommentId[];
}

const COLLAPSED: TreeEntry = {
  expanded: false,
  childrenLoaded: false,
  loading: false,
  pendingChildIds: [],
  failedChildIds: [],
};

export function createTree(storyId: number): CommentTree {
  return { storyId, entries: new Map() };
}

export function getEntry(tree: CommentTree, id: CommentId): TreeEntry {
  return tree.entries.get(id) ?? COLLAPSED;
}

function withEntry(tree: CommentTree, id: CommentId, entry: TreeEntry): CommentTree {
  const entries = new Map(tree.entries);
  entries.set(id, entry);
  return { storyId: tree.storyId, entries };
}

/** Child ids as last delivered by the cache; unknown nodes have none yet. */
export function childIdsOf(id: CommentId, reader: CacheReader): readonly CommentId[] {
  const item = reader.peekItem(id)?.value;
  return item ? item.childIds : [];
}

function hasContent(id: CommentId, reader: CacheReader): boolean {
  return reader.peekItem(id)?.value !== undefined;
}

export function nodePhase(tree: CommentTree, id: CommentId): NodePhase {
  const entry = getEntry(tree, id);
  if (entry.loading) return "loading";
  if (entry.expanded) return "expanded";
  if (entry.childrenLoaded) return "collapsed_cached";
  if (entry.failedChildIds.length > 0) return "load_failed";
  return "collapsed";
}

/**
 * Decide what expanding a node takes. Loaded children flip back into view
 * without a fetch; otherwise only the children with no cached content are
 * requested, and the node stays `loading` until each of them settles.
 */
export function requestExpand(tree: CommentTree, id: CommentId, reader: CacheReader): ExpandResult {
  const entry = getEntry(tree, id);
  if (entry.loading || entry.expanded) {
    return { tree, fetchIds: [] };
  }

  if (entry.childrenLoaded) {
    return { tree: withEntry(tree, id, { ...entry, expanded: true }), fetchIds: [] };
  }

  const kids = childIdsOf(id, reader);
  const missing = kids.filter((kid) => !hasContent(kid, reader));
  if (missing.length === 0) {
    return {
      tree: withEntry(tree, id, {
        expanded: true,
        childrenLoaded: true,
        loading: false,
        pendingChildIds: [],
        failedChildIds: [],
      }),
      fetchIds: [],
    };
  }

  return {
    tree: withEntry(tree, id, {
      expanded: false,
      childrenLoaded: false,
      loading: true,
      pendingChildIds: missing,
      failedChildIds: [],
    }),
    fetchIds: missing,
  };
}

export function collapse(tree: CommentTree, id: CommentId): CommentTree {
  const entry = getEntry(tree, id);
  if (!entry.expanded) return tree;
  return withEntry(tree, id, { ...entry, expanded: false });
}

/**
 * Hide a whole thread: clear `expanded` on the root and every descendant.
 * Load flags are left alone, so re-expanding needs no network.
 */
export function collapseThread(tree: CommentTree, rootId: CommentId, reader: CacheReader): CommentTree {
  const entries = new Map(tree.entries);
  const seen = new Set<CommentId>();
  const stack: CommentId[] = [rootId];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);

    const entry = entries.get(id);
    if (!entry) continue;
    if (entry.expanded) {
      entries.set(id, { ...entry, expanded: false });
    }
    for (const kid of childIdsOf(id, reader)) {
      stack.push(kid);
    }
  }

  return { storyId: tree.storyId, entries };
}

/**
 * Bookkeeping for a settled item fetch. Loading parents waiting on it are
 * resolved once their last child settles: if any child arrived the parent
 * expands and remembers only the failed slots; if every child failed it
 * becomes `load_failed`. A late success also clears a recorded failed slot.
 */
export function applyItemSettled(tree: CommentTree, id: CommentId, reader: CacheReader): CommentTree {
  let entries: Map<CommentId, TreeEntry> | undefined;
  const ok = hasContent(id, reader);

  for (const [parentId, entry] of tree.entries) {
    const waiting = entry.loading && entry.pendingChildIds.includes(id);
    const recovered = ok && entry.failedChildIds.includes(id);
    if (!waiting && !recovered) continue;

    entries ??= new Map(tree.entries);

    if (!waiting) {
      const failedChildIds = entry.failedChildIds.filter((kid) => kid !== id);
      entries.set(parentId, {
        ...entry,
        failedChildIds,
        // A parent whose every child had failed gets its children back
        childrenLoaded: true,
        expanded: entry.childrenLoaded ? entry.expanded : true,
      });
      continue;
    }

    const pendingChildIds = entry.pendingChildIds.filter((kid) => kid !== id);
    if (pendingChildIds.length > 0) {
      entries.set(parentId, { ...entry, pendingChildIds });
      continue;
    }

    const kids = childIdsOf(parentId, reader);
    const failedChildIds = kids.filter((kid) => !hasContent(kid, reader));
    const anyLoaded = failedChildIds.length < kids.length;
    entries.set(parentId, {
      expanded: anyLoaded,
      childrenLoaded: anyLoaded,
      loading: false,
      pendingChildIds: [],
      failedChildIds,
    });
  }

  return entries ? { storyId: tree.storyId, entries } : tree;
}

/**
 * Depth-first, children after their parent. A node appearing twice (the
 * source does not enforce acyclic reply chains) is shown once.
 */
export function flattenVisible(
  rootIds: readonly CommentId[],
  tree: CommentTree,
  reader: CacheReader,
): VisibleNode[] {
  const visible: VisibleNode[] = [];
  const seen = new Set<CommentId>();

  type Frame = { ids: readonly CommentId[]; index: number; depth: number; path: readonly number[]; parentId: CommentId | null };
  const stack: Frame[] = [{ ids: rootIds, index: 0, depth: 0, path: [], parentId: null }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;
    if (frame.index >= frame.ids.length) {
      stack.pop();
      continue;
    }

    const position = frame.index++;
    const id = frame.ids[position];
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);

    const path = [...frame.path, position];
    visible.push({ id, depth: frame.depth, path, parentId: frame.parentId });

    if (getEntry(tree, id).expanded) {
      const kids = childIdsOf(id, reader);
      if (kids.length > 0) {
        stack.push({ ids: kids, index: 0, depth: frame.depth + 1, path, parentId: id });
      }
    }
  }

  return visible;
}

export function indentFor(depth: number): number {
  return Math.min(depth, MAX_INDENT_DEPTH);
}
