export type StoryType = "top" | "new" | "best";

export const STORY_TYPES: readonly StoryType[] = ["top", "new", "best"];

export type StoryId = number;
export type CommentId = number;

/**
 * Keyboard event structure, normalized from Ink's input callback
 */
export interface KeyEvent {
  name?: string;
  shift?: boolean;
  ctrl?: boolean;
  meta?: boolean;
  sequence?: string;
}

export interface Story {
  kind: "story";
  id: StoryId;
  title: string;
  url: string | null;
  text: string | null;
  score: number;
  author: string | null;
  submittedAt: number;
  childIds: readonly CommentId[];
  descendantCount: number;
}

export interface CommentItem {
  kind: "comment";
  id: CommentId;
  parentId: number | null;
  author: string | null;
  text: string | null;
  submittedAt: number;
  childIds: readonly CommentId[];
  deleted: boolean;
  dead: boolean;
}

export type Item = Story | CommentItem;

export interface Page {
  storyType: StoryType;
  pageIndex: number;
  pageSize: number;
}

/** The visible window of a category's ranking. */
export interface PageValue {
  ids: readonly StoryId[];
  total: number;
}

export function isStoryType(value: string): value is StoryType {
  return value === "top" || value === "new" || value === "best";
}

export function storyTypeLabel(storyType: StoryType): string {
  switch (storyType) {
    case "top":
      return "Top";
    case "new":
      return "New";
    case "best":
      return "Best";
  }
}
