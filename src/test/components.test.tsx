import { afterEach, describe, it, expect } from "vitest";
import { cleanup, render } from "ink-testing-library";
import { ScreenView } from "../components/Screen.js";
import { initialModel, reduce, type AppModel } from "../navigation.js";
import { buildSnapshot } from "../snapshot.js";
import type { Page } from "../types.js";
import { createMockComment, createMockStory, createMockThread } from "./fixtures.js";
import { FakeReader } from "./test-utils.js";

const NOW = 1_700_003_600 * 1000;
const PAGE: Page = { storyType: "top", pageIndex: 0, pageSize: 3 };

function frame(model: AppModel, reader: FakeReader): string {
  const { lastFrame } = render(<ScreenView snapshot={buildSnapshot(model, reader, NOW)} rows={40} />);
  return lastFrame() ?? "";
}

describe("ScreenView", () => {
  afterEach(() => {
    cleanup();
  });

  it("should show a loading message before the page arrives", () => {
    const output = frame(initialModel(PAGE), new FakeReader());
    expect(output).toContain("Loading Top stories…");
    expect(output).toContain("Top · page 1");
  });

  it("should show an empty category", () => {
    const output = frame(initialModel(PAGE), new FakeReader().setPage(PAGE, []));
    expect(output).toContain("No stories here");
  });

  it("should render ready stories next to placeholders", () => {
    const reader = new FakeReader()
      .setPage(PAGE, [1000, 1001, 1002, 1003])
      .set(createMockStory({ id: 1000, title: "First post", score: 42, descendantCount: 1 }))
      .loading(1001)
      .fail(1002);
    const output = frame(initialModel(PAGE), reader);

    expect(output).toContain("Top · page 1/2");
    expect(output).toContain("› 1.");
    expect(output).toContain("First post");
    expect(output).toContain("42 points · by testuser · 1 hour ago · 1 comment · example.com");
    expect(output).toContain("Loading story 1001…");
    expect(output).toContain("Network error: connection reset");
  });

  it("should show the notice with a retry hint", () => {
    const model: AppModel = { ...initialModel(PAGE), notice: { source: "page", message: "Could not load Top stories" } };
    expect(frame(model, new FakeReader())).toContain("Could not load Top stories (r to retry)");
  });

  it("should render the help overlay in place of the list", () => {
    const model: AppModel = { ...initialModel(PAGE), showHelp: true };
    const output = frame(model, new FakeReader());
    expect(output).toContain("expand or collapse replies");
    expect(output).not.toContain("Loading Top stories…");
  });

  it("should render the story header and comments", () => {
    const { story, comments } = createMockThread();
    const reader = new FakeReader([{ ...story, title: "Thread title" }, ...comments]).setPage(PAGE, [1000]);
    const opened = reduce(initialModel(PAGE), { type: "action", action: { type: "open_comments" } }, reader).model;
    const output = frame(opened, reader);

    expect(output).toContain("Comments");
    expect(output).toContain("Thread title");
    expect(output).toContain("100 points · by testuser · 1 hour ago · 5 comments");
    expect(output).toContain("Comment 1");
    expect(output).toContain("2 replies");
  });

  it("should label a folded thread", () => {
    const { story, comments } = createMockThread();
    const reader = new FakeReader([story, ...comments]).setPage(PAGE, [1000]);
    const folded = [{ type: "open_comments" }, { type: "toggle_expand" }, { type: "collapse_thread" }] as const;
    const model = folded.reduce<AppModel>(
      (current, action) => reduce(current, { type: "action", action }, reader).model,
      initialModel(PAGE),
    );

    expect(frame(model, reader)).toContain("2 replies, thread collapsed");
  });

  it("should mark deleted and loading comments", () => {
    const reader = new FakeReader([
      createMockStory({ id: 1000, childIds: [1, 2, 3] }),
      createMockComment({ id: 1, author: null, text: null, deleted: true }),
      createMockComment({ id: 3, dead: true }),
    ])
      .loading(2)
      .setPage(PAGE, [1000]);
    const opened = reduce(initialModel(PAGE), { type: "action", action: { type: "open_comments" } }, reader).model;
    const output = frame(opened, reader);

    expect(output).toContain("[deleted]");
    expect(output).toContain("Loading comment…");
    expect(output).toContain("[dead]");
  });
});
