/**
 * Comment tree keyboard handlers
 */
import type { Action } from "../navigation.js";
import type { KeyEvent } from "../types.js";

export function handleCommentKey(key: KeyEvent): Action | null {
  switch (key.name) {
    case "j":
    case "down":
      return { type: "move_selection", delta: 1 };
    case "k":
    case "up":
      return { type: "move_selection", delta: -1 };
    case "]":
      return { type: "move_sibling", delta: 1 };
    case "[":
      return { type: "move_sibling", delta: -1 };
    case "u":
      return { type: "jump_parent" };
    case "g":
      return { type: "jump", to: key.shift ? "bottom" : "top" };
    case "G":
      return { type: "jump", to: "bottom" };
    case "return":
    case "l":
    case "right":
      return { type: "toggle_expand" };
    case "c":
      return { type: "collapse_thread" };
    case "o":
      return { type: "open_url" };
    case "r":
      return { type: "refresh" };
    case "?":
      return { type: "toggle_help" };
    case "q":
    case "escape":
    case "h":
    case "left":
      return { type: "back" };
    default:
      return null;
  }
}
