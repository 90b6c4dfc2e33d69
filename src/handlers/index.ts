/**
 * Keyboard dispatch for each view
 *
 * Handlers are pure: a key maps to at most one controller action and never
 * touches state. See src/test/handlers.test.ts for unit tests.
 */
import type { Key } from "ink";
import type { Action, ViewState } from "../navigation.js";
import type { KeyEvent } from "../types.js";
import { handleCommentKey } from "./comment-keys.js";
import { handleStoryKey } from "./story-keys.js";

export { handleStoryKey } from "./story-keys.js";
export { handleCommentKey } from "./comment-keys.js";

export interface DispatchContext {
  view: ViewState["kind"];
  showHelp: boolean;
}

export function dispatchKey(key: KeyEvent, context: DispatchContext): Action | null {
  if (key.ctrl && key.name === "c") {
    return { type: "quit" };
  }

  // The help overlay swallows everything except closing it and quitting
  if (context.showHelp) {
    if (key.name === "?" || key.name === "escape") return { type: "toggle_help" };
    if (key.name === "q") return { type: "quit" };
    return null;
  }

  return context.view === "stories" ? handleStoryKey(key) : handleCommentKey(key);
}

/** Normalize Ink's `useInput` arguments into a named key. */
export function toKeyEvent(input: string, key: Key): KeyEvent {
  const base = { shift: key.shift, ctrl: key.ctrl, meta: key.meta, sequence: input };
  if (key.upArrow) return { ...base, name: "up" };
  if (key.downArrow) return { ...base, name: "down" };
  if (key.leftArrow) return { ...base, name: "left" };
  if (key.rightArrow) return { ...base, name: "right" };
  if (key.return) return { ...base, name: "return" };
  if (key.escape) return { ...base, name: "escape" };
  if (key.tab) return { ...base, name: "tab" };
  if (key.backspace || key.delete) return { ...base, name: "backspace" };
  return { ...base, name: input };
}
