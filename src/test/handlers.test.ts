import { describe, it, expect } from "vitest";
import { dispatchKey, handleCommentKey, handleStoryKey } from "../handlers/index.js";

describe("handleStoryKey", () => {
  it("should move the selection with j/k and the arrows", () => {
    expect(handleStoryKey({ name: "j" })).toEqual({ type: "move_selection", delta: 1 });
    expect(handleStoryKey({ name: "down" })).toEqual({ type: "move_selection", delta: 1 });
    expect(handleStoryKey({ name: "k" })).toEqual({ type: "move_selection", delta: -1 });
    expect(handleStoryKey({ name: "up" })).toEqual({ type: "move_selection", delta: -1 });
  });

  it("should page with n/p", () => {
    expect(handleStoryKey({ name: "n" })).toEqual({ type: "change_page", delta: 1 });
    expect(handleStoryKey({ name: "p" })).toEqual({ type: "change_page", delta: -1 });
  });

  it("should switch category with the number keys", () => {
    expect(handleStoryKey({ name: "1" })).toEqual({ type: "switch_category", storyType: "top" });
    expect(handleStoryKey({ name: "2" })).toEqual({ type: "switch_category", storyType: "new" });
    expect(handleStoryKey({ name: "3" })).toEqual({ type: "switch_category", storyType: "best" });
  });

  it("should jump to the bottom with G or shift+g", () => {
    expect(handleStoryKey({ name: "g" })).toEqual({ type: "jump", to: "top" });
    expect(handleStoryKey({ name: "g", shift: true })).toEqual({ type: "jump", to: "bottom" });
    expect(handleStoryKey({ name: "G" })).toEqual({ type: "jump", to: "bottom" });
  });

  it("should open comments with c and the link with o or enter", () => {
    expect(handleStoryKey({ name: "c" })).toEqual({ type: "open_comments" });
    expect(handleStoryKey({ name: "o" })).toEqual({ type: "open_url" });
    expect(handleStoryKey({ name: "return" })).toEqual({ type: "open_url" });
  });

  it("should quit with q", () => {
    expect(handleStoryKey({ name: "q" })).toEqual({ type: "quit" });
  });

  it("should ignore unbound keys", () => {
    expect(handleStoryKey({ name: "z" })).toBeNull();
    expect(handleStoryKey({})).toBeNull();
  });
});

describe("handleCommentKey", () => {
  it("should move between siblings and to the parent", () => {
    expect(handleCommentKey({ name: "]" })).toEqual({ type: "move_sibling", delta: 1 });
    expect(handleCommentKey({ name: "[" })).toEqual({ type: "move_sibling", delta: -1 });
    expect(handleCommentKey({ name: "u" })).toEqual({ type: "jump_parent" });
  });

  it("should toggle with enter, l or right", () => {
    for (const name of ["return", "l", "right"]) {
      expect(handleCommentKey({ name })).toEqual({ type: "toggle_expand" });
    }
  });

  it("should collapse the thread with c", () => {
    expect(handleCommentKey({ name: "c" })).toEqual({ type: "collapse_thread" });
  });

  it("should go back instead of quitting", () => {
    for (const name of ["q", "escape", "h", "left"]) {
      expect(handleCommentKey({ name })).toEqual({ type: "back" });
    }
  });

  it("should ignore category keys", () => {
    expect(handleCommentKey({ name: "1" })).toBeNull();
  });
});

describe("dispatchKey", () => {
  it("should route by view", () => {
    expect(dispatchKey({ name: "q" }, { view: "stories", showHelp: false })).toEqual({ type: "quit" });
    expect(dispatchKey({ name: "q" }, { view: "comments", showHelp: false })).toEqual({ type: "back" });
  });

  it("should quit on ctrl+c from anywhere", () => {
    expect(dispatchKey({ name: "c", ctrl: true }, { view: "comments", showHelp: true })).toEqual({ type: "quit" });
  });

  it("should only close help or quit while help is shown", () => {
    const context = { view: "stories", showHelp: true } as const;
    expect(dispatchKey({ name: "?" }, context)).toEqual({ type: "toggle_help" });
    expect(dispatchKey({ name: "escape" }, context)).toEqual({ type: "toggle_help" });
    expect(dispatchKey({ name: "q" }, context)).toEqual({ type: "quit" });
    expect(dispatchKey({ name: "j" }, context)).toBeNull();
  });
});
