import { z } from "zod";
import { FetchError, toFetchError } from "./errors.js";
import type { CommentItem, Item, Story, StoryId, StoryType } from "./types.js";

export const DEFAULT_API_URL = "https://hacker-news.firebaseio.com/v0";
const ITEM_PAGE_URL = "https://news.ycombinator.com/item?id=";
const USER_AGENT = "hnterm";

/**
 * The two read requests the remote source supports. Single attempt, no retry:
 * callers decide whether a failed request is still worth repeating.
 */
export interface HackerNewsGateway {
  fetchCategoryIds(storyType: StoryType): Promise<StoryId[]>;
  fetchItem(id: number): Promise<Item>;
}

export interface HttpGatewayOptions {
  baseUrl?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const idListSchema = z.array(z.number().int());

const itemSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  by: z.string().optional(),
  time: z.number().int().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  text: z.string().optional(),
  score: z.number().optional(),
  descendants: z.number().optional(),
  kids: z.array(z.number().int()).optional(),
  parent: z.number().int().optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});

type RawItem = z.infer<typeof itemSchema>;

function formatIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid shape";
  const path = issue.path.length > 0 ? issue.path.join(".") : "body";
  return `${path}: ${issue.message}`;
}

export function parseCategoryIds(body: unknown): StoryId[] {
  const parsed = idListSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchError("malformed", formatIssues(parsed.error));
  }
  return parsed.data;
}

function toStory(raw: RawItem): Story {
  return {
    kind: "story",
    id: raw.id,
    title: raw.title ?? "",
    url: raw.url ?? null,
    text: raw.text ?? null,
    score: raw.score ?? 0,
    author: raw.by ?? null,
    submittedAt: raw.time ?? 0,
    childIds: raw.kids ?? [],
    descendantCount: raw.descendants ?? 0,
  };
}

function toComment(raw: RawItem): CommentItem {
  const deleted = raw.deleted ?? false;
  const dead = raw.dead ?? false;
  return {
    kind: "comment",
    id: raw.id,
    parentId: raw.parent ?? null,
    author: deleted ? null : raw.by ?? null,
    text: deleted || dead ? null : raw.text ?? null,
    submittedAt: raw.time ?? 0,
    childIds: raw.kids ?? [],
    deleted,
    dead,
  };
}

/**
 * Validate an item body. The source answers unknown ids with a literal `null`.
 */
export function parseItem(id: number, body: unknown): Item {
  if (body === null) {
    throw new FetchError("not_found", `Item ${id} does not exist`);
  }

  const parsed = itemSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchError("malformed", formatIssues(parsed.error));
  }

  const raw = parsed.data;
  if (raw.id !== id) {
    throw new FetchError("malformed", `Asked for item ${id}, got ${raw.id}`);
  }

  switch (raw.type) {
    case "comment":
      return toComment(raw);
    // Jobs and polls rank alongside stories and carry a title
    case "story":
    case "job":
    case "poll":
      return toStory(raw);
    default:
      throw new FetchError("malformed", `Unsupported item type "${raw.type}"`);
  }
}

export function itemUrl(story: Story): string {
  return story.url ?? `${ITEM_PAGE_URL}${story.id}`;
}

export function discussionUrl(id: number): string {
  return `${ITEM_PAGE_URL}${id}`;
}

export function createHttpGateway(options: HttpGatewayOptions): HackerNewsGateway {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
  const doFetch = options.fetch ?? fetch;

  async function getJson(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await doFetch(url, {
          signal: controller.signal,
          headers: {
            Accept: "application/json",
            "User-Agent": USER_AGENT,
          },
        });
      } catch (error) {
        throw toFetchError(error);
      }

      if (response.status === 404) {
        throw new FetchError("not_found", `Nothing at ${url}`);
      }
      if (!response.ok) {
        throw new FetchError("network", `HTTP ${response.status} from ${url}`);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw toFetchError(error);
      }

      try {
        const body: unknown = JSON.parse(text);
        return body;
      } catch (error) {
        throw new FetchError("malformed", "Response is not valid JSON", { cause: error });
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    async fetchCategoryIds(storyType) {
      const body = await getJson(`${baseUrl}/${storyType}stories.json`);
      return parseCategoryIds(body);
    },

    async fetchItem(id) {
      const body = await getJson(`${baseUrl}/item/${id}.json`);
      return parseItem(id, body);
    },
  };
}
