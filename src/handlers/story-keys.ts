/**
 * Story list keyboard handlers
 */
import type { Action } from "../navigation.js";
import type { KeyEvent } from "../types.js";

export function handleStoryKey(key: KeyEvent): Action | null {
  switch (key.name) {
    case "j":
    case "down":
      return { type: "move_selection", delta: 1 };
    case "k":
    case "up":
      return { type: "move_selection", delta: -1 };
    case "n":
    case "right":
      return { type: "change_page", delta: 1 };
    case "p":
    case "left":
      return { type: "change_page", delta: -1 };
    case "1":
      return { type: "switch_category", storyType: "top" };
    case "2":
      return { type: "switch_category", storyType: "new" };
    case "3":
      return { type: "switch_category", storyType: "best" };
    case "g":
      return { type: "jump", to: key.shift ? "bottom" : "top" };
    case "G":
      return { type: "jump", to: "bottom" };
    case "c":
      return { type: "open_comments" };
    case "o":
    case "return":
      return { type: "open_url" };
    case "r":
      return { type: "refresh" };
    case "?":
      return { type: "toggle_help" };
    case "q":
    case "escape":
      return { type: "quit" };
    default:
      return null;
  }
}
