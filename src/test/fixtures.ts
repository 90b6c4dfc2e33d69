import type { CommentItem, Story } from "../types.js";

export function createMockStory(overrides: Partial<Story> = {}): Story {
  const id = overrides.id ?? 1000;
  return {
    kind: "story",
    id,
    title: `Test Story ${id}`,
    url: `https://example.com/post/${id}`,
    text: null,
    score: 100,
    author: "testuser",
    submittedAt: 1_700_000_000,
    childIds: [],
    descendantCount: 0,
    ...overrides,
  };
}

export function createMockComment(overrides: Partial<CommentItem> = {}): CommentItem {
  const id = overrides.id ?? 1;
  return {
    kind: "comment",
    id,
    parentId: null,
    author: "commenter",
    text: `<p>Comment ${id}</p>`,
    submittedAt: 1_700_000_000,
    childIds: [],
    deleted: false,
    dead: false,
    ...overrides,
  };
}

/** Raw item body in the shape the remote source sends. */
export function createRawItem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1000,
    type: "story",
    by: "testuser",
    time: 1_700_000_000,
    title: "Test Story 1000",
    url: "https://example.com/post/1000",
    score: 100,
    descendants: 0,
    ...overrides,
  };
}

/**
 * A story with a small thread:
 *
 *   1000
 *   ├── 1 ── 11 ── 111
 *   │    └── 12
 *   └── 2
 */
export function createMockThread(): { story: Story; comments: CommentItem[] } {
  const story = createMockStory({ id: 1000, childIds: [1, 2], descendantCount: 5 });
  const comments = [
    createMockComment({ id: 1, parentId: 1000, childIds: [11, 12] }),
    createMockComment({ id: 11, parentId: 1, childIds: [111] }),
    createMockComment({ id: 111, parentId: 11 }),
    createMockComment({ id: 12, parentId: 1 }),
    createMockComment({ id: 2, parentId: 1000 }),
  ];
  return { story, comments };
}
